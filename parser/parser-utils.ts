/**
 * Parser Utilities
 * Helper functions for common parsing operations
 */

import { CharacterCodes } from './scanner/character-codes.js';
import { ParamDirection, type HtmlAttrib } from './ast-types.js';

/**
 * 1-based line number of an offset
 */
export function lineOfOffset(text: string, pos: number): number {
  let line = 1;
  const limit = Math.min(pos, text.length);
  for (let i = 0; i < limit; i++) {
    if (text.charCodeAt(i) === CharacterCodes.lineFeed) line++;
  }
  return line;
}

/**
 * Prefix leading from an output file back to the output root (`a/b/page` -> `../../`)
 */
export function relativePathToRoot(outputFileBase: string | undefined): string {
  if (!outputFileBase) return '';
  const depth = outputFileBase.split('/').length - 1;
  return '../'.repeat(depth);
}

/**
 * Direction from the `[in]`, `[out]`, `[in,out]` option of `\param`
 */
export function parseParamDirection(option: string | undefined): ParamDirection | undefined {
  if (option === undefined) return undefined;
  const normalized = option.replace(/\s+/g, '').toLowerCase();
  switch (normalized) {
    case 'in': return ParamDirection.In;
    case 'out': return ParamDirection.Out;
    case 'in,out':
    case 'out,in': return ParamDirection.InOut;
    default: return undefined;
  }
}

/**
 * Text between the first two lines holding `marker`, as used by `\snippet`
 */
export function extractBlock(text: string, marker: string): string | undefined {
  const first = text.indexOf(marker);
  if (first === -1) return undefined;
  const startOfBlock = text.indexOf('\n', first + marker.length);
  if (startOfBlock === -1) return '';
  const second = text.indexOf(marker, startOfBlock + 1);
  if (second === -1) return text.slice(startOfBlock + 1);
  const endOfBlock = text.lastIndexOf('\n', second);
  return endOfBlock <= startOfBlock ? '' : text.slice(startOfBlock + 1, endOfBlock + 1);
}

/**
 * Extension of a file name without the dot, lower case
 */
export function fileExtension(name: string): string {
  const slash = name.lastIndexOf('/');
  const dot = name.lastIndexOf('.');
  return dot > slash ? name.slice(dot + 1).toLowerCase() : '';
}

export function baseName(name: string): string {
  return name.slice(name.lastIndexOf('/') + 1);
}

/**
 * Drop the line break that follows an opening block command and the
 * indentation before its end command
 */
export function trimBlockText(text: string): string {
  let result = text.replace(/^[ \t]*\r?\n/, '');
  const lastBreak = result.lastIndexOf('\n');
  if (lastBreak !== -1 && result.slice(lastBreak + 1).trim() === '') {
    result = result.slice(0, lastBreak + 1);
  }
  return result;
}

export function getAttribute(attribs: readonly HtmlAttrib[], name: string): string | undefined {
  return attribs.find(a => a.name === name)?.value;
}

export function withoutAttribute(attribs: readonly HtmlAttrib[], name: string): HtmlAttrib[] {
  return attribs.filter(a => a.name !== name);
}

/**
 * True for absolute URLs and schemes such as `mailto:`
 */
export function isAbsoluteUrl(url: string): boolean {
  return /^[a-zA-Z][a-zA-Z0-9+.-]*:/.test(url);
}

export function isTagNameStart(ch: number): boolean {
  return (ch >= CharacterCodes.a && ch <= CharacterCodes.z) ||
    (ch >= CharacterCodes.A && ch <= CharacterCodes.Z);
}

export function isIdentifierStart(ch: number): boolean {
  return isTagNameStart(ch) || ch === CharacterCodes.underscore;
}

export function isIdentifierChar(ch: number): boolean {
  return isIdentifierStart(ch) || (ch >= CharacterCodes._0 && ch <= CharacterCodes._9);
}
