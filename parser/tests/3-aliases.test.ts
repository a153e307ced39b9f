/**
 * Tests for Stage 3: Alias Expansion
 */

import { describe, test, expect } from 'vitest';
import {
  AliasTable,
  escapeAliasValue,
  parseAliasDefinition,
  splitAliasArguments,
  substituteArguments
} from '../alias-expander.js';
import { createCollectingSink, ParseErrorCode } from '../parser-interfaces.js';
import { createDocParser } from '../core-parser.js';
import { findNodes } from '../ast-traversal.js';
import { DocKind } from '../ast-types.js';

describe('Stage 3: Alias Expansion', () => {
  describe('Definitions', () => {
    test('plain and argument forms', () => {
      expect(parseAliasDefinition('sig=Signed off')).toEqual({ name: 'sig', argCount: 0, value: 'Signed off' });
      expect(parseAliasDefinition('bold{1} = <b>\\1</b>')).toEqual({ name: 'bold', argCount: 1, value: '<b>\\1</b>' });
    });

    test('malformed definition', () => {
      expect(parseAliasDefinition('bad line')).toBeUndefined();
      expect(parseAliasDefinition('1st=x')).toBeUndefined();
    });

    test('line break escape keeps longer commands', () => {
      expect(escapeAliasValue('x\\n')).toBe('x\\_linebr ');
      expect(escapeAliasValue('see \\note')).toBe('see \\note');
    });

    test('line break escape directly followed by text', () => {
      expect(escapeAliasValue('one\\ntwo')).toBe('one\\_linebr two');
      expect(escapeAliasValue('\\note')).toBe('\\note');
      expect(escapeAliasValue('\\namespace x')).toBe('\\namespace x');
      expect(escapeAliasValue('\\name y')).toBe('\\name y');
      expect(escapeAliasValue('\\nosubgrouping')).toBe('\\nosubgrouping');
      expect(escapeAliasValue('\\newline')).toBe('\\_linebr ewline');
    });

    test('malformed configuration lines are reported with their line', () => {
      const sink = createCollectingSink();
      const table = AliasTable.fromConfig(['ok=1', 'bad line'], sink);
      expect(table.size).toBe(1);
      expect(sink.diagnostics).toHaveLength(1);
      expect(sink.diagnostics[0].code).toBe(ParseErrorCode.INVALID_ALIAS);
      expect(sink.diagnostics[0].line).toBe(2);
      expect(sink.diagnostics[0].fileName).toBe('<config>');
    });
  });

  describe('Arguments', () => {
    test('top level commas split, nested braces and escapes do not', () => {
      expect(splitAliasArguments('{a,b{c,d},e\\,f}', 0)).toEqual({ args: ['a', 'b{c,d}', 'e,f'], end: 15 });
    });

    test('unterminated argument list', () => {
      expect(splitAliasArguments('{a,b', 0)).toBeUndefined();
    });

    test('placeholders beyond the arguments stay', () => {
      expect(substituteArguments('\\1-\\2-\\3', ['x', 'y'])).toBe('x-y-\\3');
    });
  });

  describe('Expansion', () => {
    test('argument alias', () => {
      const table = AliasTable.fromConfig(['bold{1}=<b>\\1</b>']);
      const once = table.expand('see \\bold{x} here');
      expect(once).toBe('see <b>x</b> here');
      expect(table.expand(once)).toBe(once);
    });

    test('expanding twice changes nothing', () => {
      const plain = AliasTable.fromConfig(['sig=Signed off']);
      const once = plain.expand('by \\sig today');
      expect(once).toBe('by Signed off today');
      expect(plain.expand(plain.expand(once))).toBe(once);

      const withArgs = AliasTable.fromConfig(['pair{2}=(\\1; \\2)', 'wrap{1}=[\\pair{\\1,z}]']);
      const expanded = withArgs.expand('see \\wrap{a}');
      expect(expanded).toBe('see [(a; z)]');
      expect(withArgs.expand(expanded)).toBe(expanded);
    });

    test('at-sign prefix', () => {
      const table = AliasTable.fromConfig(['sig=Signed']);
      expect(table.expand('@sig')).toBe('Signed');
    });

    test('several arguments', () => {
      const table = AliasTable.fromConfig(['pair{2}=(\\1; \\2)']);
      expect(table.expand('\\pair{a,b\\,c}')).toBe('(a; b,c)');
    });

    test('plain alias followed by an unrelated brace group', () => {
      const table = AliasTable.fromConfig(['sig=Signed']);
      expect(table.expand('\\sig{x}')).toBe('Signed{x}');
    });

    test('escaped backslash is not an alias reference', () => {
      const table = AliasTable.fromConfig(['bold{1}=<b>\\1</b>']);
      expect(table.expand('\\\\bold{x}')).toBe('\\\\bold{x}');
    });

    test('nested aliases', () => {
      const table = AliasTable.fromConfig(['inner=core', 'outer=[\\inner]']);
      expect(table.expand('\\outer')).toBe('[core]');
    });

    test('line break in a value', () => {
      const table = AliasTable.fromConfig(['two=one\\n two']);
      expect(table.expand('\\two')).toBe('one\\_linebr  two');
    });

    test('line break directly before text in a value', () => {
      const table = AliasTable.fromConfig(['two=one\\ntwo']);
      expect(table.expand('\\two')).toBe('one\\_linebr two');

      const parser = createDocParser({ aliases: table });
      const { root, diagnostics } = parser.parseDoc({ text: 'A \\two' });
      expect(diagnostics).toEqual([]);
      expect(findNodes(root, DocKind.Word).map(w => w.word)).toEqual(['A', 'one', 'two']);
    });

    test('recursion stops with a diagnostic', () => {
      const sink = createCollectingSink();
      const table = AliasTable.fromConfig(['loop=\\loop']);
      expect(table.expand('\\loop', sink, 'a.h')).toBe('\\loop');
      expect(sink.diagnostics).toHaveLength(1);
      expect(sink.diagnostics[0].code).toBe(ParseErrorCode.ALIAS_RECURSION);
      expect(sink.diagnostics[0].message).toBe('Recursive expansion of alias \\loop stopped');
      expect(sink.diagnostics[0].fileName).toBe('a.h');
    });

    test('recursion inside an expansion is reported at the outer reference', () => {
      const sink = createCollectingSink();
      const table = AliasTable.fromConfig(['loop=xxxxxxxxxx\\loop']);
      expect(table.expand('\\loop\nc\nd\ne', sink)).toBe('xxxxxxxxxx\\loop\nc\nd\ne');
      expect(sink.diagnostics).toHaveLength(1);
      expect(sink.diagnostics[0].code).toBe(ParseErrorCode.ALIAS_RECURSION);
      expect(sink.diagnostics[0].pos).toBe(0);
      expect(sink.diagnostics[0].line).toBe(1);
    });

    test('wrong argument count keeps the text', () => {
      const sink = createCollectingSink();
      const table = AliasTable.fromConfig(['bold{1}=<b>\\1</b>']);
      expect(table.expand('\\bold{a,b}', sink)).toBe('\\bold{a,b}');
      expect(sink.diagnostics.map(d => d.code)).toEqual([ParseErrorCode.ALIAS_ARGUMENT_COUNT]);
      expect(sink.diagnostics[0].message).toBe('Alias \\bold called with 2 argument(s), no matching definition');
    });

    test('parser expands before tokenizing', () => {
      const parser = createDocParser({ aliases: AliasTable.fromConfig(['bold{1}=<b>\\1</b>']) });
      const { root, diagnostics } = parser.parseDoc({ text: 'A \\bold{x}' });
      expect(diagnostics).toEqual([]);
      expect(findNodes(root, DocKind.StyleChange).map(s => s.enable)).toEqual([true, false]);
      expect(findNodes(root, DocKind.Word).map(w => w.word)).toEqual(['A', 'x']);
    });
  });
});
