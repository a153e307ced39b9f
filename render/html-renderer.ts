/**
 * HTML rendering entry points
 */

import type { DocNode } from '../parser/ast-types.js';
import { validateTree } from '../parser/ast-factory.js';
import { acceptNode } from '../parser/ast-traversal.js';
import { logDebug } from '../parser/debug.js';
import {
  DiagnosticCategory,
  DiagnosticSeverity,
  DocInvariantError,
  ParseErrorCode
} from '../parser/parser-interfaces.js';
import { HtmlOutputGenerator } from './html-output.js';
import { HtmlDocVisitor, type HtmlVisitorOptions } from './html-visitor.js';
import type { RenderContext } from './render-context.js';

export interface RenderOptions extends HtmlVisitorOptions {
  /** Prefix from the rendered page back to the output root */
  relPath?: string;
}

/**
 * Render a document tree to HTML; throws DocInvariantError for broken trees
 */
export function renderHtml(root: DocNode, ctx: RenderContext, options: RenderOptions = {}): string {
  validateTree(root);

  const out = new HtmlOutputGenerator({
    htmlFileExtension: ctx.htmlFileExtension,
    relPath: options.relPath,
    tabSize: ctx.tabSize,
    externalLinksInWindow: ctx.externalLinksInWindow,
    tagFileLocations: ctx.tagFileLocations,
    index: ctx.index
  });
  const start = performance.now();
  acceptNode(root, new HtmlDocVisitor(out, ctx, options));
  if (out.hidden) throw new DocInvariantError('Hidden output regions are not balanced', root);

  logDebug('render', `${options.fileName ?? '<comment>'} rendered in ${(performance.now() - start).toFixed(2)}ms`);
  return out.getContents();
}

/**
 * Like renderHtml, but an invariant failure only loses this document: it is
 * reported as an error and undefined is returned
 */
export function tryRenderHtml(root: DocNode, ctx: RenderContext, options: RenderOptions = {}): string | undefined {
  try {
    return renderHtml(root, ctx, options);
  } catch (error) {
    if (!(error instanceof DocInvariantError)) throw error;
    ctx.diagnostics.report({
      severity: DiagnosticSeverity.Error,
      category: DiagnosticCategory.Invariant,
      code: ParseErrorCode.INVARIANT_VIOLATION,
      message: error.message,
      fileName: options.fileName ?? '<comment>',
      line: 0,
      pos: 0,
      end: 0
    });
    return undefined;
  }
}
