/**
 * Copy expansion
 *
 * `\copydoc`, `\copybrief` and `\copydetails` leave Copy nodes in the tree.
 * Once every comment is parsed, the surrounding system hands back the nodes
 * of the target and they are cloned below the Copy node.
 */

import { DocKind, type CopyNode, type DocNode } from './ast-types.js';
import { cloneNode } from './ast-factory.js';
import { findNodes } from './ast-traversal.js';
import {
  DiagnosticCategory,
  DiagnosticSeverity,
  ParseErrorCode,
  type CopySource,
  type DiagnosticSink
} from './parser-interfaces.js';

const MAX_COPY_DEPTH = 8;

/**
 * Resolve every Copy node below `root`; returns the number expanded
 */
export function expandCopies(root: DocNode, source: CopySource, sink: DiagnosticSink, fileName = '<comment>'): number {
  return expandBelow(root, source, sink, fileName, new Set(), 0);
}

function expandBelow(
  root: DocNode,
  source: CopySource,
  sink: DiagnosticSink,
  fileName: string,
  active: Set<string>,
  depth: number
): number {
  let expanded = 0;
  for (const copy of findNodes(root, DocKind.Copy)) {
    if (copy.resolved) continue;
    if (active.has(copy.link) || depth >= MAX_COPY_DEPTH) {
      report(sink, fileName, copy, `recursive copy of '${copy.link}' ignored`);
      continue;
    }

    const nodes = source.resolveCopy(copy.link, { brief: copy.copyBrief, details: copy.copyDetails });
    if (nodes === undefined) {
      report(sink, fileName, copy, `target '${copy.link}' of \\copydoc command not found`);
      continue;
    }

    for (const node of nodes) copy.children.push(cloneNode(node, copy));
    copy.resolved = true;
    expanded++;

    active.add(copy.link);
    expanded += expandBelow(copy, source, sink, fileName, active, depth + 1);
    active.delete(copy.link);
  }
  return expanded;
}

function report(sink: DiagnosticSink, fileName: string, copy: CopyNode, message: string): void {
  sink.report({
    severity: DiagnosticSeverity.Warning,
    category: DiagnosticCategory.Reference,
    code: ParseErrorCode.UNRESOLVED_REFERENCE,
    message,
    subject: copy.link,
    fileName,
    line: 0,
    pos: 0,
    end: 0
  });
}
