/**
 * Symbol and entity table.
 *
 * Named symbols come from HTML entities (`&copy;`) and from backslash escapes
 * (`\\`, `\@`, ...). Each symbol has a rendering per output family: `html`
 * for markup backends and `text` for plain text ones.
 */

import { readFileSync } from 'node:fs';

export interface SymbolRendering {
  html: string;
  text: string;
}

export type SymbolFormat = keyof SymbolRendering;

let table: ReadonlyMap<string, SymbolRendering> | undefined;

function loadTable(): ReadonlyMap<string, SymbolRendering> {
  if (!table) {
    const raw: unknown = JSON.parse(readFileSync(new URL('./data/entities.json', import.meta.url), 'utf8'));
    const entries = new Map<string, SymbolRendering>();
    if (raw && typeof raw === 'object') {
      for (const [name, value] of Object.entries(raw)) {
        if (value && typeof value === 'object' && 'html' in value && 'text' in value &&
          typeof value.html === 'string' && typeof value.text === 'string') {
          entries.set(name, { html: value.html, text: value.text });
        }
      }
    }
    table = entries;
  }
  return table;
}

/**
 * Symbols produced by a backslash followed by one of these sequences
 */
const commandEscapes: Record<string, string> = {
  '\\': 'BSlash',
  '@': 'At',
  '<': 'Less',
  '>': 'Greater',
  '&': 'Amp',
  '$': 'Dollar',
  '#': 'Hash',
  '%': 'Percent',
  '|': 'Pipe',
  '"': 'Quot',
  '.': 'Dot',
  '=': 'Equal',
  '::': 'DoubleColon',
};

/**
 * Escape sequence starting at `text[pos]` (just after the backslash), if any
 */
export function matchCommandEscape(text: string, pos: number): { symbol: string; length: number } | undefined {
  if (text.startsWith('::', pos)) return { symbol: commandEscapes['::'], length: 2 };
  const ch = text.charAt(pos);
  if (ch !== ':' && ch in commandEscapes) return { symbol: commandEscapes[ch], length: 1 };
  return undefined;
}

export function isCommandEscapeChar(ch: string): boolean {
  return ch !== ':' && ch !== '' && ch in commandEscapes;
}

export function isKnownSymbol(name: string): boolean {
  return loadTable().has(name);
}

/**
 * Rendering of a symbol for the given output family, undefined when unsupported
 */
export function renderSymbol(name: string, format: SymbolFormat): string | undefined {
  return loadTable().get(name)?.[format];
}

export function symbolCount(): number {
  return loadTable().size;
}

/**
 * Decode a numeric entity like &#65; or &#x41;.
 * Returns undefined on invalid input.
 */
export function decodeNumericEntity(text: string): string | undefined {
  if (!text.startsWith('&#') || !text.endsWith(';')) return undefined;
  const body = text.slice(2, -1);
  let codePoint: number;
  if (body.length === 0) return undefined;
  if (body[0] === 'x' || body[0] === 'X') {
    const hex = body.slice(1);
    if (!/^[0-9A-Fa-f]+$/.test(hex)) return undefined;
    codePoint = parseInt(hex, 16);
  } else {
    if (!/^\d+$/.test(body)) return undefined;
    codePoint = parseInt(body, 10);
  }
  // Exclude surrogate halves and values past the Unicode range
  if (codePoint > 0x10FFFF) return undefined;
  if (codePoint >= 0xD800 && codePoint <= 0xDFFF) return undefined;
  return String.fromCodePoint(codePoint);
}
