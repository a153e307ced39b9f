/**
 * Token types for the comment scanner
 *
 * The scanner produces a flat stream; block structure (paragraphs, lists,
 * sections) is decided by the parser.
 */

import type { HtmlAttrib } from '../ast-types.js';

export const enum SyntaxKind {
  Unknown,
  EndOfFileToken,

  Word,                 // Run of text without whitespace
  Whitespace,           // Spaces, tabs and single line breaks
  NewParagraph,         // Blank line; indent of the following line in `indent`
  ListItem,             // `-`, `*`, `+`, `-#` or `N.` at the start of a line
  EndList,              // A line holding only `.`

  Command,              // `\name` or `@name`; name in `value`
  Symbol,               // Escape or `&name;` entity; table key in `value`
  Url,                  // Absolute URL or e-mail address
  HtmlStartTag,         // `<name attr=...>`; lower-case name in `value`
  HtmlEndTag,           // `</name>`
  RcsTag,               // `$Keyword: text $`; keyword in `value`, text in `text`
}

export const enum TokenFlags {
  None = 0,
  PrecedingLineBreak = 1 << 0,   // Token follows a line break
  IsAtLineStart = 1 << 1,        // Token appears at start of line
  IsEmail = 1 << 2,              // Url token is an e-mail address
  SelfClosing = 1 << 3,          // `<br/>`
  IsEnumList = 1 << 4,           // `-#` and `N.` list markers
}

/**
 * Detached copy of the scanner's current token
 */
export interface Token {
  kind: SyntaxKind;
  flags: TokenFlags;
  pos: number;
  end: number;

  /** Source text of the token (or the payload for RCS tags) */
  text: string;

  /** Command name, tag name, symbol key, word or URL */
  value: string;

  attribs: HtmlAttrib[];

  /** Column of a list marker, or of the line following a blank line */
  indent: number;

  /** Explicit number of an `N.` marker, -1 otherwise */
  itemNumber: number;
}

export function tokenKindName(kind: SyntaxKind): string {
  switch (kind) {
    case SyntaxKind.Unknown: return 'unknown';
    case SyntaxKind.EndOfFileToken: return 'end of comment';
    case SyntaxKind.Word: return 'word';
    case SyntaxKind.Whitespace: return 'whitespace';
    case SyntaxKind.NewParagraph: return 'paragraph break';
    case SyntaxKind.ListItem: return 'list item';
    case SyntaxKind.EndList: return 'end of list marker';
    case SyntaxKind.Command: return 'command';
    case SyntaxKind.Symbol: return 'symbol';
    case SyntaxKind.Url: return 'URL';
    case SyntaxKind.HtmlStartTag: return 'HTML start tag';
    case SyntaxKind.HtmlEndTag: return 'HTML end tag';
    case SyntaxKind.RcsTag: return 'RCS tag';
  }
}

/**
 * Human readable form of a token for diagnostics
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case SyntaxKind.Command: return `command \\${token.value}`;
    case SyntaxKind.HtmlStartTag: return `<${token.value}>`;
    case SyntaxKind.HtmlEndTag: return `</${token.value}>`;
    case SyntaxKind.Word: return `word "${token.value}"`;
    default: return tokenKindName(token.kind);
  }
}
