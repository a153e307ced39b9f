/**
 * HTML Output
 *
 * String-buffer backend for the HTML visitor and for the code highlighter.
 */

import {
  BaseOutputGenerator,
  type CodeLink,
  type IndexRegistry,
  type LinkTarget
} from './output-interfaces.js';

export const PREFRAG_START = '<div class="fragment">';
export const PREFRAG_END = '</div><!-- fragment -->';

export interface HtmlOutputOptions {
  /** Default: `.html` */
  htmlFileExtension?: string;

  /** Prefix from the current page back to the output root, used by code links */
  relPath?: string;

  /** Default: 4 */
  tabSize?: number;

  /** Open links into external documentation in a new window */
  externalLinksInWindow?: boolean;

  /** Base URL of each external tag file */
  tagFileLocations?: Readonly<Record<string, string>>;

  index?: IndexRegistry;
}

/**
 * Text content: escapes `<`, `>` and `&`
 */
export function escapeHtml(text: string): string {
  return text.replace(/[<>&]/g, ch => (ch === '<' ? '&lt;' : ch === '>' ? '&gt;' : '&amp;'));
}

const xmlEscapes: Readonly<Record<string, string>> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
  "'": '&apos;',
};

/**
 * Attribute values
 */
export function escapeXml(text: string): string {
  return text.replace(/[<>&"']/g, ch => xmlEscapes[ch] ?? ch);
}

/**
 * Double-quoted attribute content; apostrophes are kept
 */
export function escapeQuotedAttr(text: string): string {
  return text.replace(/[<>&"]/g, ch => xmlEscapes[ch] ?? ch);
}

const htmlTextEscapes: Readonly<Record<string, string>> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  "'": '&#39;',
  '"': '&quot;',
};

/**
 * Text escaped for use anywhere in a page, quotes included
 */
export function convertToHtml(text: string): string {
  return text.replace(/[<>&'"]/g, ch => htmlTextEscapes[ch] ?? ch);
}

export class HtmlOutputGenerator extends BaseOutputGenerator {
  readonly htmlFileExtension: string;
  private readonly relPath: string;
  private readonly tabSize: number;
  private readonly externalLinksInWindow: boolean;
  private readonly tagFileLocations: Readonly<Record<string, string>>;
  private readonly index: IndexRegistry | undefined;
  private column = 0;

  constructor(options: HtmlOutputOptions = {}) {
    super();
    this.htmlFileExtension = options.htmlFileExtension ?? '.html';
    this.relPath = options.relPath ?? '';
    this.tabSize = options.tabSize ?? 4;
    this.externalLinksInWindow = options.externalLinksInWindow ?? false;
    this.tagFileLocations = options.tagFileLocations ?? {};
    this.index = options.index;
  }

  protected escape(text: string): string {
    return escapeHtml(text);
  }

  /**
   * Base URL of an external tag file; `relPath` itself for local targets
   */
  externalRef(relPath: string, ref: string): string {
    if (!ref) return relPath;
    let dest = this.tagFileLocations[ref] ?? '';
    if (!dest) return '';
    if (relPath && dest.startsWith('.')) dest = relPath + dest;
    if (!dest.endsWith('/')) dest += '/';
    return dest;
  }

  private externalAttributes(relPath: string, ref: string): string {
    const target = this.externalLinksInWindow ? 'target="_blank" ' : '';
    const dest = this.externalRef(relPath, ref);
    return dest ? `${target}data-tagfile="${ref}:${dest}" ` : target;
  }

  startLink(target: LinkTarget): void {
    let markup = target.ref
      ? `<a class="elRef" ${this.externalAttributes(target.relPath, target.ref)}`
      : '<a class="el" ';
    markup += `href="${this.externalRef(target.relPath, target.ref)}`;
    if (target.file) markup += target.file + this.htmlFileExtension;
    if (target.anchor) markup += `#${target.anchor}`;
    markup += '"';
    if (target.tooltip) markup += ` title="${target.tooltip.replace(/"/g, '&quot;')}"`;
    this.writeString(markup + '>');
  }

  endLink(): void {
    this.writeString('</a>');
  }

  startParagraph(className: string): void {
    this.writeString(`<p${className}>`);
  }

  endParagraph(): void {
    this.writeString('</p>\n');
  }

  startSection(anchor: string, level: number): void {
    this.writeString(`<h${level}><a class="anchor" id="${anchor}"></a>\n`);
  }

  endSection(level: number): void {
    this.writeString(`</h${level}>\n`);
  }

  startCodeFragment(): void {
    this.writeString(PREFRAG_START);
  }

  endCodeFragment(): void {
    this.writeString(PREFRAG_END);
  }

  writeRuler(): void {
    this.writeString('<hr/>\n');
  }

  lineBreak(): void {
    this.writeString('<br />\n');
  }

  writeAnchor(name: string): void {
    this.writeString(`<a class="anchor" id="${name}"></a>`);
  }

  addIndexItem(scope: string, anchor: string, entry: string): void {
    this.index?.addIndexItem(scope, anchor, entry);
  }

  // ---------------------------------------------------------------------------
  // Code output
  // ---------------------------------------------------------------------------

  codify(text: string): void {
    let result = '';
    for (const ch of text) {
      switch (ch) {
        case '\t': {
          const spaces = this.tabSize - (this.column % this.tabSize);
          result += ' '.repeat(spaces);
          this.column += spaces;
          break;
        }
        case '\n':
          result += '\n';
          this.column = 0;
          break;
        case '\r':
          break;
        case '<': result += '&lt;'; this.column++; break;
        case '>': result += '&gt;'; this.column++; break;
        case '&': result += '&amp;'; this.column++; break;
        case "'": result += '&#39;'; this.column++; break;
        case '"': result += '&quot;'; this.column++; break;
        default:
          result += ch;
          this.column++;
      }
    }
    this.writeString(result);
  }

  writeCodeLink(link: CodeLink): void {
    let markup = link.ref
      ? `<a class="codeRef" ${this.externalAttributes(this.relPath, link.ref)}`
      : '<a class="code" ';
    markup += `href="${this.externalRef(this.relPath, link.ref)}`;
    if (link.file) markup += link.file + this.htmlFileExtension;
    if (link.anchor) markup += `#${link.anchor}`;
    markup += '"';
    if (link.tooltip) markup += ` title="${escapeQuotedAttr(link.tooltip)}"`;
    this.writeString(markup + '>');
    this.docify(link.name);
    this.writeString('</a>');
  }

  writeLineNumber(_ref: string, _file: string, _anchor: string, lineNumber: number): void {
    this.writeString(`<span class="lineno">${String(lineNumber).padStart(5, ' ')}</span>&#160;`);
  }

  startCodeLine(_hasLineNumbers: boolean): void {
    this.column = 0;
    this.writeString('<div class="line">');
  }

  endCodeLine(): void {
    this.writeString('</div>\n');
  }

  startFontClass(className: string): void {
    this.writeString(`<span class="${className}">`);
  }

  endFontClass(): void {
    this.writeString('</span>');
  }

  writeCodeAnchor(name: string): void {
    this.writeString(`<a name="${name}"></a>`);
  }
}
