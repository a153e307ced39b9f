/**
 * Section pre-scan
 *
 * Collects the labels declared by section and anchor commands without
 * building a tree, so a link resolver can learn about them before any
 * comment referring to them is parsed.
 */

import { createScanner } from './scanner/scanner.js';
import { SyntaxKind } from './scanner/token-types.js';

export interface SectionLabel {
  label: string;

  /** 0 for anchors, 1-4 for `\section` .. `\paragraph` */
  level: number;

  title: string;

  /** Offset of the declaring command */
  pos: number;
}

const levels: Readonly<Record<string, number>> = {
  anchor: 0,
  section: 1,
  subsection: 2,
  subsubsection: 3,
  paragraph: 4,
};

// Content of these blocks is never scanned for labels
const rawBlocks: Readonly<Record<string, string>> = {
  code: 'endcode',
  verbatim: 'endverbatim',
  htmlonly: 'endhtmlonly',
  latexonly: 'endlatexonly',
  xmlonly: 'endxmlonly',
  rtfonly: 'endrtfonly',
  manonly: 'endmanonly',
  docbookonly: 'enddocbookonly',
  dot: 'enddot',
  msc: 'endmsc',
  startuml: 'enduml',
};

export function findSections(text: string): SectionLabel[] {
  const labels: SectionLabel[] = [];
  const scanner = createScanner();
  scanner.initText(text);

  for (;;) {
    scanner.scan();
    const token = scanner.snapshot();
    if (token.kind === SyntaxKind.EndOfFileToken) break;
    if (token.kind !== SyntaxKind.Command) continue;

    const end = rawBlocks[token.value];
    if (end !== undefined) {
      scanner.scanRawUntil([`\\${end}`, `@${end}`]);
      continue;
    }

    const level = levels[token.value];
    if (level === undefined) continue;
    const label = scanner.scanArgument();
    if (label === undefined) continue;
    labels.push({ label, level, title: level > 0 ? scanner.scanRestOfLine() : '', pos: token.pos });
  }
  return labels;
}
