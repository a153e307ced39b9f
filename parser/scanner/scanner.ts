/**
 * Comment scanner
 *
 * Closure-based tokenizer over one comment block. Besides the token stream
 * it offers the argument readers commands need (next word, quoted string,
 * rest of line, attached `[..]`/`{..}` options) and raw capture for
 * verbatim blocks, all reading from the position right after the last token.
 */

import type { HtmlAttrib } from '../ast-types.js';
import { decodeNumericEntity, isKnownSymbol, matchCommandEscape } from '../entities.js';
import { isIdentifierChar, isIdentifierStart } from '../parser-utils.js';
import { logDebug } from '../debug.js';
import {
  CharacterCodes,
  isDigit,
  isLineBreak,
  isWhiteSpace,
  isWhiteSpaceSingleLine
} from './character-codes.js';
import { SyntaxKind, TokenFlags, type Token } from './token-types.js';

const TAB_SIZE = 4;

/**
 * HTML tags the parser understands; other `<...>` text stays a word
 */
export const knownHtmlTags: ReadonlySet<string> = new Set([
  'p', 'br', 'hr', 'b', 'strong', 'i', 'em', 'code', 'tt', 'kbd', 'center', 'small',
  'sub', 'sup', 'pre', 'span', 'div', 'ul', 'ol', 'li', 'dl', 'dt', 'dd', 'table',
  'tr', 'td', 'th', 'caption', 'a', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'img',
  'blockquote',
]);

const urlPattern = /^(?:https?|ftp|file|news):\/\/[^\s<>"]+|^www\.[^\s<>"]+/;
const emailPattern = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+(?:\.[a-zA-Z0-9-]+)+/;
const rcsPattern = /^\$([A-Za-z]+):([^\n$]+)\$/;

export interface RawBlock {
  text: string;
  terminated: boolean;
  /** The marker that ended the block */
  marker: string;
}

/**
 * Scanner interface
 */
export interface Scanner {
  initText(text: string): void;
  scan(): void;
  snapshot(): Token;
  rollback(position: number): void;

  setInsidePre(value: boolean): void;
  startAutoList(): void;
  endAutoList(): void;

  /** Capture text up to the first of `markers`; end commands must not continue as an identifier */
  scanRawUntil(markers: readonly string[]): RawBlock;
  /** Next whitespace-delimited argument on the current line */
  scanArgument(): string | undefined;
  /** `"..."` on the current line */
  scanQuotedArgument(): string | undefined;
  /** Remaining text of the current line, the line break is left in place */
  scanRestOfLine(): string;
  /** Option glued to the previous token, e.g. the `[in]` of `\param[in]` */
  scanAttached(open: string, close: string): string | undefined;
  skipHorizontalWhitespace(): void;

  readonly token: SyntaxKind;
  readonly tokenText: string;
  readonly tokenValue: string;
  readonly tokenFlags: TokenFlags;
  readonly tokenStart: number;
  readonly offsetNext: number;
  readonly source: string;
}

export function createScanner(): Scanner {
  let source = '';
  let pos = 0;
  let end = 0;
  let insidePre = false;
  let autoListLevel = 0;

  let token = SyntaxKind.Unknown;
  let tokenText = '';
  let tokenValue = '';
  let tokenFlags = TokenFlags.None;
  let tokenStart = 0;
  let tokenAttribs: HtmlAttrib[] = [];
  let tokenIndent = 0;
  let tokenItemNumber = -1;

  function setText(text: string): void {
    source = text;
    pos = 0;
    end = text.length;
    insidePre = false;
    autoListLevel = 0;
    token = SyntaxKind.Unknown;
    tokenText = '';
    tokenValue = '';
    tokenFlags = TokenFlags.None;
    tokenStart = 0;
  }

  function emit(kind: SyntaxKind, start: number, value: string, flags: TokenFlags = TokenFlags.None): void {
    token = kind;
    tokenStart = start;
    tokenText = source.slice(start, pos);
    tokenValue = value;
    tokenFlags = flags;
    if (isAtLineStart(start)) tokenFlags |= TokenFlags.IsAtLineStart;
    if (start > 0 && isLineBreak(source.charCodeAt(start - 1))) tokenFlags |= TokenFlags.PrecedingLineBreak;
    if (kind !== SyntaxKind.HtmlStartTag) tokenAttribs = [];
    if (kind !== SyntaxKind.ListItem && kind !== SyntaxKind.NewParagraph && kind !== SyntaxKind.EndList) {
      tokenIndent = 0;
    }
    if (kind !== SyntaxKind.ListItem) tokenItemNumber = -1;
  }

  function isAtLineStart(p: number): boolean {
    return p === 0 || source.charCodeAt(p - 1) === CharacterCodes.lineFeed;
  }

  /**
   * Column of the first non-blank character of the line starting at `p`
   */
  function indentAt(p: number): { column: number; contentStart: number } {
    let column = 0;
    let i = p;
    while (i < end && isWhiteSpaceSingleLine(source.charCodeAt(i))) {
      column = source.charCodeAt(i) === CharacterCodes.tab ? (Math.floor(column / TAB_SIZE) + 1) * TAB_SIZE : column + 1;
      i++;
    }
    return { column, contentStart: i };
  }

  /**
   * List marker at the line starting at `p`: returns the marker length
   */
  function matchListMarker(p: number): { start: number; length: number; isEnum: boolean; itemNumber: number; column: number } | undefined {
    const { column, contentStart } = indentAt(p);
    const ch = source.charCodeAt(contentStart);
    let length = 0;
    let isEnum = false;
    let itemNumber = -1;
    if (ch === CharacterCodes.minus && source.charCodeAt(contentStart + 1) === CharacterCodes.hash) {
      length = 2;
      isEnum = true;
    } else if (ch === CharacterCodes.minus || ch === CharacterCodes.asterisk || ch === CharacterCodes.plus) {
      length = 1;
    } else if (isDigit(ch)) {
      let i = contentStart;
      while (i < end && isDigit(source.charCodeAt(i))) i++;
      if (source.charCodeAt(i) !== CharacterCodes.dot) return undefined;
      itemNumber = parseInt(source.slice(contentStart, i), 10);
      length = i + 1 - contentStart;
      isEnum = true;
    } else {
      return undefined;
    }
    const after = source.charCodeAt(contentStart + length);
    if (!isWhiteSpaceSingleLine(after)) return undefined;
    return { start: contentStart, length, isEnum, itemNumber, column };
  }

  function matchEndList(p: number): { column: number; contentStart: number } | undefined {
    const indent = indentAt(p);
    if (source.charCodeAt(indent.contentStart) !== CharacterCodes.dot) return undefined;
    let i = indent.contentStart + 1;
    while (i < end && isWhiteSpaceSingleLine(source.charCodeAt(i))) i++;
    if (i < end && !isLineBreak(source.charCodeAt(i))) return undefined;
    return indent;
  }

  function scan(): void {
    const start = pos;
    if (pos >= end) {
      emit(SyntaxKind.EndOfFileToken, pos, '');
      return;
    }

    if (!insidePre && isAtLineStart(pos)) {
      const marker = matchListMarker(pos);
      if (marker) {
        pos = marker.start + marker.length;
        while (pos < end && isWhiteSpaceSingleLine(source.charCodeAt(pos))) pos++;
        tokenIndent = marker.column;
        tokenItemNumber = marker.itemNumber;
        emit(SyntaxKind.ListItem, start, source.slice(marker.start, marker.start + marker.length),
          marker.isEnum ? TokenFlags.IsEnumList : TokenFlags.None);
        return;
      }
      const endList = matchEndList(pos);
      if (endList) {
        pos = endList.contentStart + 1;
        while (pos < end && !isLineBreak(source.charCodeAt(pos))) pos++;
        if (pos < end) pos++;
        tokenIndent = endList.column;
        emit(SyntaxKind.EndList, start, '.');
        return;
      }
    }

    const ch = source.charCodeAt(pos);
    if (isWhiteSpace(ch)) {
      scanWhitespace(start);
      return;
    }

    if (ch === CharacterCodes.backslash || ch === CharacterCodes.at) {
      if (scanCommandOrEscape(start)) return;
    } else if (ch === CharacterCodes.lessThan) {
      if (scanHtmlComment()) {
        scan();
        return;
      }
      if (scanHtmlTag(start)) return;
    } else if (ch === CharacterCodes.ampersand) {
      if (scanEntity(start)) return;
    } else if (ch === CharacterCodes.dollar) {
      const rcs = rcsPattern.exec(source.slice(pos));
      if (rcs) {
        pos += rcs[0].length;
        emit(SyntaxKind.RcsTag, start, rcs[1]);
        tokenText = rcs[2].trim();
        return;
      }
    }

    if (scanUrl(start)) return;
    scanWord(start);
  }

  function scanWhitespace(start: number): void {
    let newLines = 0;
    let stoppedAtMarker = false;
    while (pos < end && isWhiteSpace(source.charCodeAt(pos))) {
      const c = source.charCodeAt(pos);
      pos++;
      if (c === CharacterCodes.lineFeed && !insidePre) {
        newLines++;
        if (matchListMarker(pos) || matchEndList(pos)) {
          stoppedAtMarker = true;
          break;
        }
      }
    }
    if (newLines >= 2 && !(stoppedAtMarker && autoListLevel > 0)) {
      tokenIndent = indentAt(lastLineStart(pos)).column;
      emit(SyntaxKind.NewParagraph, start, '');
      return;
    }
    emit(SyntaxKind.Whitespace, start, source.slice(start, pos));
  }

  function lastLineStart(p: number): number {
    let i = p;
    while (i > 0 && source.charCodeAt(i - 1) !== CharacterCodes.lineFeed) i--;
    return i;
  }

  function scanCommandOrEscape(start: number): boolean {
    const escape = matchCommandEscape(source, pos + 1);
    if (escape) {
      pos += 1 + escape.length;
      emit(SyntaxKind.Symbol, start, escape.symbol);
      return true;
    }
    const next = source.charAt(pos + 1);
    if (next === 'f' && pos + 2 < end && '$[]{}'.includes(source.charAt(pos + 2))) {
      pos += 3;
      emit(SyntaxKind.Command, start, 'f' + source.charAt(pos - 1));
      return true;
    }
    if (!isIdentifierStart(source.charCodeAt(pos + 1))) return false;
    let i = pos + 1;
    while (i < end && isIdentifierChar(source.charCodeAt(i))) i++;
    const name = source.slice(pos + 1, i);
    pos = i;
    emit(SyntaxKind.Command, start, name);
    logDebug('scan', 'command', name);
    return true;
  }

  function scanHtmlComment(): boolean {
    if (!source.startsWith('<!--', pos)) return false;
    const close = source.indexOf('-->', pos + 4);
    pos = close === -1 ? end : close + 3;
    return true;
  }

  function scanHtmlTag(start: number): boolean {
    let i = pos + 1;
    const closing = source.charCodeAt(i) === CharacterCodes.slash;
    if (closing) i++;
    const nameStart = i;
    while (i < end && isIdentifierChar(source.charCodeAt(i))) i++;
    const name = source.slice(nameStart, i).toLowerCase();
    if (!knownHtmlTags.has(name)) return false;

    const attribs: HtmlAttrib[] = [];
    let selfClosing = false;
    for (;;) {
      while (i < end && isWhiteSpace(source.charCodeAt(i))) i++;
      if (i >= end) return false;
      const c = source.charCodeAt(i);
      if (c === CharacterCodes.greaterThan) {
        i++;
        break;
      }
      if (c === CharacterCodes.slash && source.charCodeAt(i + 1) === CharacterCodes.greaterThan) {
        selfClosing = true;
        i += 2;
        break;
      }
      const attrStart = i;
      while (i < end && !isWhiteSpace(source.charCodeAt(i)) &&
        source.charCodeAt(i) !== CharacterCodes.equals &&
        source.charCodeAt(i) !== CharacterCodes.greaterThan &&
        !(source.charCodeAt(i) === CharacterCodes.slash && source.charCodeAt(i + 1) === CharacterCodes.greaterThan)) i++;
      const attrName = source.slice(attrStart, i).toLowerCase();
      if (!attrName) return false;
      let value = '';
      if (source.charCodeAt(i) === CharacterCodes.equals) {
        i++;
        const quote = source.charAt(i);
        if (quote === '"' || quote === '\'') {
          const close = source.indexOf(quote, i + 1);
          if (close === -1) return false;
          value = source.slice(i + 1, close);
          i = close + 1;
        } else {
          const valueStart = i;
          while (i < end && !isWhiteSpace(source.charCodeAt(i)) && source.charCodeAt(i) !== CharacterCodes.greaterThan) i++;
          value = source.slice(valueStart, i);
        }
      }
      attribs.push({ name: attrName, value });
    }

    pos = i;
    emit(closing ? SyntaxKind.HtmlEndTag : SyntaxKind.HtmlStartTag, start, name,
      selfClosing ? TokenFlags.SelfClosing : TokenFlags.None);
    tokenAttribs = attribs;
    return true;
  }

  function scanEntity(start: number): boolean {
    const match = /^&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z][a-zA-Z0-9]*);/.exec(source.slice(pos, pos + 40));
    if (!match) return false;
    if (match[1].startsWith('#')) {
      const decoded = decodeNumericEntity(match[0]);
      if (decoded === undefined) return false;
      pos += match[0].length;
      emit(SyntaxKind.Word, start, decoded);
      return true;
    }
    if (!isKnownSymbol(match[1])) return false;
    pos += match[0].length;
    emit(SyntaxKind.Symbol, start, match[1]);
    return true;
  }

  function scanUrl(start: number): boolean {
    const rest = source.slice(pos, pos + 2048);
    const url = urlPattern.exec(rest);
    if (url) {
      const text = url[0].replace(/[.,;:!?)\]]+$/, '');
      pos += text.length;
      emit(SyntaxKind.Url, start, text);
      return true;
    }
    const email = emailPattern.exec(rest);
    if (email) {
      pos += email[0].length;
      emit(SyntaxKind.Url, start, email[0], TokenFlags.IsEmail);
      return true;
    }
    return false;
  }

  function scanWord(start: number): void {
    pos++;
    while (pos < end) {
      const c = source.charCodeAt(pos);
      if (isWhiteSpace(c)) break;
      if ((c === CharacterCodes.backslash || c === CharacterCodes.at) && startsCommand(pos)) break;
      if (c === CharacterCodes.lessThan && startsHtmlTag(pos)) break;
      if (c === CharacterCodes.ampersand && /^&(#x?[0-9a-fA-F]+|[a-zA-Z][a-zA-Z0-9]*);/.test(source.slice(pos, pos + 40))) break;
      pos++;
    }
    const text = source.slice(start, pos);
    emit(SyntaxKind.Word, start, text);
  }

  function startsCommand(p: number): boolean {
    if (matchCommandEscape(source, p + 1)) return true;
    return isIdentifierStart(source.charCodeAt(p + 1)) && source.charCodeAt(p) === CharacterCodes.backslash;
  }

  function startsHtmlTag(p: number): boolean {
    const match = /^<\/?([a-zA-Z][a-zA-Z0-9]*)[\s/>]/.exec(source.slice(p, p + 20));
    return !!match && knownHtmlTags.has(match[1].toLowerCase());
  }

  function scanRawUntil(markers: readonly string[]): RawBlock {
    const start = pos;
    let best = -1;
    let bestMarker = '';
    for (const marker of markers) {
      let from = start;
      for (;;) {
        const found = source.indexOf(marker, from);
        if (found === -1) break;
        const last = marker.charCodeAt(marker.length - 1);
        const after = source.charCodeAt(found + marker.length);
        if (isIdentifierChar(last) && isIdentifierChar(after)) {
          from = found + 1;
          continue;
        }
        if (best === -1 || found < best) {
          best = found;
          bestMarker = marker;
        }
        break;
      }
    }
    if (best === -1) {
      pos = end;
      return { text: source.slice(start), terminated: false, marker: '' };
    }
    pos = best + bestMarker.length;
    return { text: source.slice(start, best), terminated: true, marker: bestMarker };
  }

  function skipHorizontalWhitespace(): void {
    while (pos < end && isWhiteSpaceSingleLine(source.charCodeAt(pos))) pos++;
  }

  function scanArgument(): string | undefined {
    skipHorizontalWhitespace();
    const start = pos;
    while (pos < end && !isWhiteSpace(source.charCodeAt(pos))) pos++;
    return pos > start ? source.slice(start, pos) : undefined;
  }

  function scanQuotedArgument(): string | undefined {
    const saved = pos;
    skipHorizontalWhitespace();
    if (source.charCodeAt(pos) !== CharacterCodes.doubleQuote) {
      pos = saved;
      return undefined;
    }
    let i = pos + 1;
    while (i < end && source.charCodeAt(i) !== CharacterCodes.doubleQuote && !isLineBreak(source.charCodeAt(i))) i++;
    if (source.charCodeAt(i) !== CharacterCodes.doubleQuote) {
      pos = saved;
      return undefined;
    }
    const text = source.slice(pos + 1, i);
    pos = i + 1;
    return text;
  }

  function scanRestOfLine(): string {
    const start = pos;
    while (pos < end && !isLineBreak(source.charCodeAt(pos))) pos++;
    return source.slice(start, pos).trim();
  }

  function scanAttached(open: string, close: string): string | undefined {
    if (source.charAt(pos) !== open) return undefined;
    const closeAt = source.indexOf(close, pos + 1);
    const lineEnd = source.indexOf('\n', pos);
    if (closeAt === -1 || (lineEnd !== -1 && closeAt > lineEnd)) return undefined;
    const text = source.slice(pos + 1, closeAt);
    pos = closeAt + 1;
    return text;
  }

  function rollback(position: number): void {
    if (position < 0 || position > source.length) {
      throw new Error(`Invalid rollback position: ${position}`);
    }
    pos = position;
    token = SyntaxKind.Unknown;
  }

  function snapshot(): Token {
    return {
      kind: token,
      flags: tokenFlags,
      pos: tokenStart,
      end: pos,
      text: tokenText,
      value: tokenValue,
      attribs: tokenAttribs,
      indent: tokenIndent,
      itemNumber: tokenItemNumber,
    };
  }

  const scanner: Scanner = {
    initText: setText,
    scan,
    snapshot,
    rollback,
    setInsidePre(value: boolean) { insidePre = value; },
    startAutoList() { autoListLevel++; },
    endAutoList() { if (autoListLevel > 0) autoListLevel--; },
    scanRawUntil,
    scanArgument,
    scanQuotedArgument,
    scanRestOfLine,
    scanAttached,
    skipHorizontalWhitespace,

    get token() { return token; },
    get tokenText() { return tokenText; },
    get tokenValue() { return tokenValue; },
    get tokenFlags() { return tokenFlags; },
    get tokenStart() { return tokenStart; },
    get offsetNext() { return pos; },
    get source() { return source; },
  };

  return scanner;
}
