/**
 * Output Interfaces
 *
 * The operations every backend supplies, plus the collaborators rendering
 * consumes: syntax highlighter, diagram tool, translator and index registry.
 * A backend may turn any hook it has no use for into a no-op, but never throws
 * for one.
 */

/**
 * Receiver of highlighted source code
 */
export interface CodeOutputInterface {
  /** Source text, escaped for the output format */
  codify(text: string): void;

  writeCodeLink(link: CodeLink): void;
  writeLineNumber(ref: string, file: string, anchor: string, lineNumber: number): void;
  startCodeLine(hasLineNumbers: boolean): void;
  endCodeLine(): void;
  startFontClass(className: string): void;
  endFontClass(): void;
  writeCodeAnchor(name: string): void;

  /** Feed a word to the search index */
  addWord(word: string, hiPriority: boolean): void;
}

export interface CodeLink {
  ref: string;
  file: string;
  anchor: string;
  name: string;
  tooltip: string;
}

/**
 * Target of a documentation link
 */
export interface LinkTarget {
  /** External tag file name, empty for local targets */
  ref: string;
  file: string;
  relPath: string;
  anchor: string;
  tooltip?: string;
}

/**
 * Capability set a documentation backend implements
 */
export interface DocOutputGenerator extends CodeOutputInterface {
  /** Markup passed through unchanged */
  writeString(text: string): void;

  /** Text escaped for the output format */
  docify(text: string): void;

  startLink(target: LinkTarget): void;
  endLink(): void;

  startParagraph(className: string): void;
  endParagraph(): void;

  startSection(anchor: string, level: number): void;
  endSection(level: number): void;

  startCodeFragment(): void;
  endCodeFragment(): void;

  writeRuler(): void;
  lineBreak(): void;
  writeAnchor(name: string): void;

  /** Register an `\addindex` entry */
  addIndexItem(scope: string, anchor: string, entry: string): void;

  /** Suppress output until the matching `popHidden` */
  pushHidden(): void;
  popHidden(): void;
  readonly hidden: boolean;

  getContents(): string;
}

/**
 * Buffer, hide stack and no-op hooks shared by backends
 */
export abstract class BaseOutputGenerator implements DocOutputGenerator {
  private readonly parts: string[] = [];
  private readonly hideStack: boolean[] = [];
  private hide = false;

  get hidden(): boolean {
    return this.hide;
  }

  pushHidden(): void {
    this.hideStack.push(this.hide);
    this.hide = true;
  }

  popHidden(): void {
    this.hide = this.hideStack.pop() ?? false;
  }

  writeString(text: string): void {
    if (!this.hide && text) this.parts.push(text);
  }

  docify(text: string): void {
    this.writeString(this.escape(text));
  }

  getContents(): string {
    return this.parts.join('');
  }

  protected abstract escape(text: string): string;

  abstract codify(text: string): void;
  abstract writeCodeLink(link: CodeLink): void;
  abstract startCodeLine(hasLineNumbers: boolean): void;
  abstract endCodeLine(): void;
  abstract startFontClass(className: string): void;
  abstract endFontClass(): void;
  abstract startLink(target: LinkTarget): void;
  abstract endLink(): void;
  abstract startParagraph(className: string): void;
  abstract endParagraph(): void;
  abstract startSection(anchor: string, level: number): void;
  abstract endSection(level: number): void;
  abstract startCodeFragment(): void;
  abstract endCodeFragment(): void;
  abstract writeRuler(): void;
  abstract lineBreak(): void;
  abstract writeAnchor(name: string): void;

  // Optional hooks

  writeLineNumber(_ref: string, _file: string, _anchor: string, _lineNumber: number): void {}

  writeCodeAnchor(_name: string): void {}

  addWord(_word: string, _hiPriority: boolean): void {}

  addIndexItem(_scope: string, _anchor: string, _entry: string): void {}
}

// -----------------------------------------------------------------------------
// Collaborators
// -----------------------------------------------------------------------------

export interface HighlightRequest {
  /** Language hint: a file extension or a name like `cpp` */
  language: string;
  code: string;
  /** Scope name of the documented entity */
  context: string;
  isExample: boolean;
  exampleFile: string;
  showLineNumbers: boolean;
}

/**
 * Source-code highlighter invoked for code blocks and includes
 */
export interface SyntaxHighlighter {
  parseCode(out: CodeOutputInterface, request: HighlightRequest): void;
}

export type DiagramKind = 'dot' | 'msc' | 'plantuml' | 'dia';

export interface DiagramRequest {
  kind: DiagramKind;

  /** Name of the image without extension, e.g. `inline_dotgraph_1` */
  baseName: string;

  /** Inline diagram source; absent for diagram files */
  source?: string;
  file?: string;

  imageFormat: string;

  /** Where the image is written */
  outputDirectory: string;
}

export type DiagramResult =
  | { ok: true; imageFile: string }
  | { ok: false; reason: string };

/**
 * External tool turning diagram sources into images
 */
export interface DiagramTool {
  render(request: DiagramRequest): DiagramResult;
}

export type LabelKey =
  | 'seeAlso'
  | 'returns'
  | 'author'
  | 'authors'
  | 'version'
  | 'since'
  | 'date'
  | 'note'
  | 'warning'
  | 'precondition'
  | 'postcondition'
  | 'copyright'
  | 'invariant'
  | 'remarks'
  | 'attention'
  | 'parameters'
  | 'returnValues'
  | 'exceptions'
  | 'templateParameters';

/**
 * Localized label strings
 */
export interface Translator {
  translate(key: LabelKey): string;
}

/**
 * Receiver of `\addindex` entries
 */
export interface IndexRegistry {
  addIndexItem(scope: string, anchor: string, entry: string): void;
}
