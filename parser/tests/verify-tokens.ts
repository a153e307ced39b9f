import { createScanner } from '../scanner/scanner.js';
import { SyntaxKind, TokenFlags } from '../scanner/token-types.js';

/**
 * Annotated token assertions.
 *
 * A source line may be followed by a position line (`1   2`) marking token
 * starts and by `@N Kind "text" Flag|Flag` lines asserting the token found
 * under marker N. The input comes back unchanged when every assertion holds;
 * otherwise the result carries the actual tokens in the same format.
 */
export function verifyTokens(input: string): string {
  const blocks = splitAnnotated(input);
  const source = blocks.map(b => b.line).join('\n');

  const scanner = createScanner();
  scanner.initText(source);
  const tokens: ScannedToken[] = [];
  while (scanner.offsetNext < source.length) {
    scanner.scan();
    const token = scanner.snapshot();
    tokens.push({ kind: token.kind, text: token.text, start: token.pos, end: token.end, flags: token.flags });
  }

  let output = '';
  let lineStart = 0;
  blocks.forEach((block, index) => {
    output += block.line;
    if (index < blocks.length - 1 || block.markers.length > 0) output += '\n';

    if (block.markers.length > 0) {
      let positionLine = '';
      const assertionLines: string[] = [];
      block.markers.forEach((marker, n) => {
        const offset = lineStart + marker.column;
        const token = tokens.find(t => t.start <= offset && t.end > offset);
        const label = markerLabel(n);
        const column = token && token.start >= lineStart ? token.start - lineStart : marker.column;
        while (positionLine.length < column) positionLine += ' ';
        positionLine += label;

        if (!token) {
          assertionLines.push(`@${label} <no token>`);
        } else if (marker.assertion && matches(marker.assertion, token)) {
          assertionLines.push(`@${label}${marker.assertion.source}`);
        } else {
          assertionLines.push(describeActual(label, token, marker.assertion));
        }
      });
      output += positionLine + '\n' + assertionLines.join('\n');
      if (index < blocks.length - 1) output += '\n';
    }
    lineStart += block.line.length + 1;
  });

  return output.trimEnd() === input.trimEnd() ? input : output;
}

interface ScannedToken {
  kind: SyntaxKind;
  text: string;
  start: number;
  end: number;
  flags: TokenFlags;
}

interface Assertion {
  kind: SyntaxKind;
  text: string | undefined;
  flags: TokenFlags | undefined;
  /** Everything after the label, kept for matching output */
  source: string;
}

interface Marker {
  column: number;
  assertion: Assertion | undefined;
}

interface AnnotatedLine {
  line: string;
  markers: Marker[];
}

const kindNames: ReadonlyArray<[string, SyntaxKind]> = [
  ['Unknown', SyntaxKind.Unknown],
  ['EndOfFileToken', SyntaxKind.EndOfFileToken],
  ['Word', SyntaxKind.Word],
  ['Whitespace', SyntaxKind.Whitespace],
  ['NewParagraph', SyntaxKind.NewParagraph],
  ['ListItem', SyntaxKind.ListItem],
  ['EndList', SyntaxKind.EndList],
  ['Command', SyntaxKind.Command],
  ['Symbol', SyntaxKind.Symbol],
  ['Url', SyntaxKind.Url],
  ['HtmlStartTag', SyntaxKind.HtmlStartTag],
  ['HtmlEndTag', SyntaxKind.HtmlEndTag],
  ['RcsTag', SyntaxKind.RcsTag],
];

const flagNames: ReadonlyArray<[string, TokenFlags]> = [
  ['PrecedingLineBreak', TokenFlags.PrecedingLineBreak],
  ['IsAtLineStart', TokenFlags.IsAtLineStart],
  ['IsEmail', TokenFlags.IsEmail],
  ['SelfClosing', TokenFlags.SelfClosing],
  ['IsEnumList', TokenFlags.IsEnumList],
];

function kindToString(kind: SyntaxKind): string {
  return kindNames.find(([, k]) => k === kind)?.[0] ?? String(kind);
}

function markerLabel(index: number): string {
  return index < 9 ? String(index + 1) : String.fromCharCode('A'.charCodeAt(0) + index - 9);
}

function matches(assertion: Assertion, token: ScannedToken): boolean {
  if (assertion.kind !== token.kind) return false;
  if (assertion.text !== undefined && assertion.text !== token.text) return false;
  if (assertion.flags !== undefined && (token.flags & assertion.flags) !== assertion.flags) return false;
  return true;
}

function describeActual(label: string, token: ScannedToken, assertion: Assertion | undefined): string {
  let line = `@${label} ${kindToString(token.kind)}`;
  if (assertion?.text !== undefined) line += ' ' + JSON.stringify(token.text);
  if (assertion?.flags !== undefined) {
    const names = flagNames.filter(([, f]) => (token.flags & f) === f).map(([name]) => name);
    line += ' ' + (names.length ? names.join('|') : 'None');
  }
  return line;
}

function isPositionLine(line: string): boolean {
  return /^\s*1[1-9A-Z\s]*$/.test(line);
}

function splitAnnotated(input: string): AnnotatedLine[] {
  const lines = input.split('\n');
  const result: AnnotatedLine[] = [];
  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const next = lines[i + 1];
    if (result.length > 0 && isPositionLine(line) && next !== undefined && next.startsWith('@')) {
      const columns: number[] = [];
      for (let c = 0; c < line.length; c++) {
        if (line[c] !== ' ') columns.push(c);
      }
      const markers: Marker[] = columns.map(column => ({ column, assertion: undefined }));
      i++;
      while (i < lines.length && lines[i].startsWith('@')) {
        const match = /^@([1-9A-Z])(.*)$/.exec(lines[i]);
        if (match) {
          const index = /[1-9]/.test(match[1]) ? Number(match[1]) - 1 : match[1].charCodeAt(0) - 'A'.charCodeAt(0) + 9;
          const marker = markers[index];
          if (marker) marker.assertion = parseAssertion(match[2]);
        }
        i++;
      }
      result[result.length - 1].markers = markers;
      continue;
    }
    result.push({ line, markers: [] });
    i++;
  }
  return result;
}

function parseAssertion(source: string): Assertion | undefined {
  const match = /^\s+([A-Za-z]+)(?:\s+("(?:[^"\\]|\\.)*"))?(?:\s+([A-Za-z|]+))?\s*$/.exec(source);
  if (!match) return undefined;
  const kind = kindNames.find(([name]) => name === match[1])?.[1];
  if (kind === undefined) return undefined;

  let text: string | undefined;
  if (match[2] !== undefined) {
    const parsed: unknown = JSON.parse(match[2]);
    if (typeof parsed === 'string') text = parsed;
  }

  let flags: TokenFlags | undefined;
  if (match[3] !== undefined) {
    flags = TokenFlags.None;
    for (const name of match[3].split('|')) {
      const flag = flagNames.find(([n]) => n === name)?.[1];
      if (flag === undefined) return undefined;
      flags |= flag;
    }
  }
  return { kind, text, flags, source };
}
