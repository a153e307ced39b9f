/**
 * Default collaborators for rendering without a full documentation system
 */

import type {
  CodeOutputInterface,
  DiagramRequest,
  DiagramResult,
  DiagramTool,
  HighlightRequest,
  IndexRegistry,
  LabelKey,
  SyntaxHighlighter,
  Translator
} from './output-interfaces.js';

const englishLabels: Readonly<Record<LabelKey, string>> = {
  seeAlso: 'See also',
  returns: 'Returns',
  author: 'Author',
  authors: 'Authors',
  version: 'Version',
  since: 'Since',
  date: 'Date',
  note: 'Note',
  warning: 'Warning',
  precondition: 'Precondition',
  postcondition: 'Postcondition',
  copyright: 'Copyright',
  invariant: 'Invariant',
  remarks: 'Remarks',
  attention: 'Attention',
  parameters: 'Parameters',
  returnValues: 'Return values',
  exceptions: 'Exceptions',
  templateParameters: 'Template Parameters',
};

export const englishTranslator: Translator = {
  translate: key => englishLabels[key],
};

/**
 * Emits code line by line without any highlighting
 */
export class PlainCodeHighlighter implements SyntaxHighlighter {
  parseCode(out: CodeOutputInterface, request: HighlightRequest): void {
    const lines = request.code.split('\n');
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

    lines.forEach((line, index) => {
      out.startCodeLine(request.showLineNumbers);
      if (request.showLineNumbers) out.writeLineNumber('', '', '', index + 1);
      out.codify(line);
      out.endCodeLine();
    });
  }
}

/**
 * Stand-in used when no diagram tool is installed; every request fails
 */
export class NullDiagramTool implements DiagramTool {
  render(request: DiagramRequest): DiagramResult {
    return { ok: false, reason: `no ${request.kind} tool available to render ${request.baseName}` };
  }
}

export class NoopIndexRegistry implements IndexRegistry {
  addIndexItem(_scope: string, _anchor: string, _entry: string): void {}
}
