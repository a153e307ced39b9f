/**
 * Tests for Stage 1: Comment Scanner
 *
 * Token stream of words, commands, list markers, entities, HTML tags and
 * URLs, plus the argument readers commands use.
 */

import { describe, test, expect } from 'vitest';
import { verifyTokens } from './verify-tokens.js';
import { createScanner } from '../scanner/scanner.js';
import { SyntaxKind, TokenFlags, type Token } from '../scanner/token-types.js';

function scanAll(text: string): Token[] {
  const scanner = createScanner();
  scanner.initText(text);
  const tokens: Token[] = [];
  for (;;) {
    scanner.scan();
    const token = scanner.snapshot();
    if (token.kind === SyntaxKind.EndOfFileToken) return tokens;
    tokens.push(token);
  }
}

describe('Stage 1: Comment Scanner', () => {
  describe('Annotated tokens', () => {
    test('words, commands and whitespace', () => {
      const tokenTest = `
Hello @b world
1     2 3
@1 Word "Hello"
@2 Command "@b"
@3 Whitespace " "`;
      expect(verifyTokens(tokenTest)).toBe(tokenTest);
    });

    test('ERROR in position: marker moved to the token start', () => {
      const tokenTestWrong = `
Hello @b world
1      2
@1 Word "Hello"
@2 Command "@b"`;
      const tokenTestCorrect = `
Hello @b world
1     2
@1 Word "Hello"
@2 Command "@b"`;
      expect(verifyTokens(tokenTestWrong)).toBe(tokenTestCorrect);
    });

    test('ERROR in kind: actual token reported', () => {
      const tokenTestWrong = `
plain
1
@1 Command "plain"`;
      const tokenTestCorrect = `
plain
1
@1 Word "plain"`;
      expect(verifyTokens(tokenTestWrong)).toBe(tokenTestCorrect);
    });

    test('list markers with indentation', () => {
      const tokenTest = `
- item
1 2
@1 ListItem "- "
@2 Word "item"
  -# nested
1    2
@1 ListItem "  -# " IsEnumList
@2 Word "nested"
3. third
1  2
@1 ListItem "3. " IsEnumList|IsAtLineStart
@2 Word "third"`;
      expect(verifyTokens(tokenTest)).toBe(tokenTest);
    });

    test('HTML tags', () => {
      const tokenTest = `
<b>x</b> <br/>
1  23   45
@1 HtmlStartTag "<b>"
@2 Word "x"
@3 HtmlEndTag "</b>"
@4 Whitespace " "
@5 HtmlStartTag "<br/>" SelfClosing`;
      expect(verifyTokens(tokenTest)).toBe(tokenTest);
    });

    test('e-mail addresses and URLs', () => {
      const tokenTest = `
mail test@example.com or https://example.com/x.
     1                   2
@1 Url "test@example.com" IsEmail
@2 Url "https://example.com/x"`;
      expect(verifyTokens(tokenTest)).toBe(tokenTest);
    });
  });

  describe('Token values', () => {
    test('command name without the prefix', () => {
      const tokens = scanAll('\\param x');
      expect(tokens[0].kind).toBe(SyntaxKind.Command);
      expect(tokens[0].value).toBe('param');
      expect(tokens[0].text).toBe('\\param');
    });

    test('escapes become symbols', () => {
      const tokens = scanAll('\\& \\:: \\\\');
      const symbols = tokens.filter(t => t.kind === SyntaxKind.Symbol).map(t => t.value);
      expect(symbols).toEqual(['Amp', 'DoubleColon', 'BSlash']);
    });

    test('formula delimiters are commands', () => {
      const tokens = scanAll('\\f$ \\f[ \\f{');
      const commands = tokens.filter(t => t.kind === SyntaxKind.Command).map(t => t.value);
      expect(commands).toEqual(['f$', 'f[', 'f{']);
    });

    test('known entity is a symbol, unknown entity stays a word', () => {
      const tokens = scanAll('&copy; &bogus;');
      expect(tokens[0].kind).toBe(SyntaxKind.Symbol);
      expect(tokens[0].value).toBe('copy');
      expect(tokens[2].kind).toBe(SyntaxKind.Word);
      expect(tokens[2].value).toBe('&bogus;');
    });

    test('numeric entity decodes to a word', () => {
      const tokens = scanAll('&#65;&#x42;');
      expect(tokens.map(t => t.value)).toEqual(['A', 'B']);
    });

    test('unknown HTML tag stays a word', () => {
      const tokens = scanAll('<foo>');
      expect(tokens).toHaveLength(1);
      expect(tokens[0].kind).toBe(SyntaxKind.Word);
      expect(tokens[0].value).toBe('<foo>');
    });

    test('tag attributes are collected', () => {
      const tokens = scanAll('<a href="x.html" target=_blank>');
      expect(tokens[0].kind).toBe(SyntaxKind.HtmlStartTag);
      expect(tokens[0].value).toBe('a');
      expect(tokens[0].attribs).toEqual([
        { name: 'href', value: 'x.html' },
        { name: 'target', value: '_blank' }
      ]);
    });

    test('HTML comments are skipped', () => {
      const tokens = scanAll('a <!-- hidden --> b');
      const words = tokens.filter(t => t.kind === SyntaxKind.Word).map(t => t.value);
      expect(words).toEqual(['a', 'b']);
    });

    test('RCS tag carries keyword and text', () => {
      const tokens = scanAll('$Id: file.c 42 $');
      expect(tokens[0].kind).toBe(SyntaxKind.RcsTag);
      expect(tokens[0].value).toBe('Id');
      expect(tokens[0].text).toBe('file.c 42');
    });
  });

  describe('Line structure', () => {
    test('blank line is a paragraph break with the next indent', () => {
      const tokens = scanAll('a\n\n  b');
      expect(tokens[1].kind).toBe(SyntaxKind.NewParagraph);
      expect(tokens[1].indent).toBe(2);
      expect(tokens[2].value).toBe('b');
    });

    test('single line break is whitespace', () => {
      const tokens = scanAll('a\nb');
      expect(tokens.map(t => t.kind)).toEqual([SyntaxKind.Word, SyntaxKind.Whitespace, SyntaxKind.Word]);
      expect(tokens[2].flags & TokenFlags.PrecedingLineBreak).toBe(TokenFlags.PrecedingLineBreak);
    });

    test('lone dot ends a list', () => {
      const tokens = scanAll('x\n.\ny');
      expect(tokens.map(t => t.kind)).toEqual([
        SyntaxKind.Word, SyntaxKind.Whitespace, SyntaxKind.EndList, SyntaxKind.Word
      ]);
    });

    test('explicit item number', () => {
      const tokens = scanAll('7. seven');
      expect(tokens[0].kind).toBe(SyntaxKind.ListItem);
      expect(tokens[0].itemNumber).toBe(7);
    });

    test('marker without following space is a word', () => {
      const tokens = scanAll('-x');
      expect(tokens[0].kind).toBe(SyntaxKind.Word);
      expect(tokens[0].value).toBe('-x');
    });

    test('no list markers inside pre', () => {
      const scanner = createScanner();
      scanner.initText('- a');
      scanner.setInsidePre(true);
      scanner.scan();
      expect(scanner.token).toBe(SyntaxKind.Word);
      expect(scanner.tokenValue).toBe('-');
    });
  });

  describe('Argument readers', () => {
    test('raw capture up to the end command', () => {
      const scanner = createScanner();
      scanner.initText('\\code\nint a;\n\\endcode rest');
      scanner.scan();
      const block = scanner.scanRawUntil(['\\endcode', '@endcode']);
      expect(block).toEqual({ text: '\nint a;\n', terminated: true, marker: '\\endcode' });
      scanner.scan();
      scanner.scan();
      expect(scanner.tokenValue).toBe('rest');
    });

    test('end command must not continue as an identifier', () => {
      const scanner = createScanner();
      scanner.initText('\\code x\\endcodex y\\endcode');
      scanner.scan();
      const block = scanner.scanRawUntil(['\\endcode']);
      expect(block.text).toBe(' x\\endcodex y');
      expect(block.terminated).toBe(true);
    });

    test('unterminated raw block runs to the end', () => {
      const scanner = createScanner();
      scanner.initText('\\verbatim abc');
      scanner.scan();
      const block = scanner.scanRawUntil(['\\endverbatim']);
      expect(block).toEqual({ text: ' abc', terminated: false, marker: '' });
    });

    test('attached option and argument', () => {
      const scanner = createScanner();
      scanner.initText('\\param[in] x rest');
      scanner.scan();
      expect(scanner.scanAttached('[', ']')).toBe('in');
      expect(scanner.scanArgument()).toBe('x');
      expect(scanner.scanRestOfLine()).toBe('rest');
    });

    test('quoted argument only on the current line', () => {
      const scanner = createScanner();
      scanner.initText('\\ref t "Some text" tail');
      scanner.scan();
      expect(scanner.scanArgument()).toBe('t');
      expect(scanner.scanQuotedArgument()).toBe('Some text');

      scanner.initText('\\ref t "open\nclose"');
      scanner.scan();
      scanner.scanArgument();
      expect(scanner.scanQuotedArgument()).toBeUndefined();
    });

    test('rollback rejects positions outside the text', () => {
      const scanner = createScanner();
      scanner.initText('abc');
      expect(() => scanner.rollback(10)).toThrow('Invalid rollback position: 10');
    });
  });
});
