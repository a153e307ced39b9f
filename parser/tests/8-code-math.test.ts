/**
 * Tests for Stage 8: Code, Formulas, Includes and Images
 */

import { describe, test, expect } from 'vitest';
import { createDocParser } from '../core-parser.js';
import { findNodes } from '../ast-traversal.js';
import { DiagramType, DocKind, ImageType, IncOperatorType, IncludeType, VerbatimType } from '../ast-types.js';
import { FormulaRegistry, ParseErrorCode, type FileSource } from '../parser-interfaces.js';
import { applyIncludeOperator, createIncludeBuffer } from '../include-operators.js';

const MAIN_C = 'int main()\n{\n  return 0;\n}\n';

const files = new Map<string, string>([
  ['main.c', MAIN_C],
  ['ex.c', 'head\n//! [init]\nint a = 1;\n//! [init]\ntail\n']
]);

const fileSource: FileSource = {
  readFile: name => files.get(name)
};

describe('Stage 8: Code, Formulas, Includes and Images', () => {
  describe('Verbatim blocks', () => {
    test('code block with a language hint', () => {
      const { root, diagnostics } = createDocParser().parseDoc({ text: '\\code{.py}\nprint(1)\n\\endcode' });
      expect(diagnostics).toEqual([]);
      const [block] = findNodes(root, DocKind.Verbatim);
      expect(block.verbatimType).toBe(VerbatimType.Code);
      expect(block.language).toBe('py');
      expect(block.text).toBe('print(1)\n');
    });

    test('unterminated code block', () => {
      const { root, diagnostics } = createDocParser().parseDoc({ text: '\\code\nint x;' });
      expect(findNodes(root, DocKind.Verbatim)[0].text).toBe('int x;');
      expect(diagnostics.map(d => d.message)).toEqual(['end of comment block while inside \\code block, missing \\endcode']);
    });

    test('verbatim keeps inline text as is', () => {
      const { root } = createDocParser().parseDoc({ text: '\\verbatim raw <b> \\endverbatim' });
      expect(findNodes(root, DocKind.Verbatim)[0].text).toBe(' raw <b> ');
    });

    test('block form of htmlonly', () => {
      const { root } = createDocParser().parseDoc({ text: '\\htmlonly[block]<b>x</b>\\endhtmlonly' });
      const [block] = findNodes(root, DocKind.Verbatim);
      expect(block.verbatimType).toBe(VerbatimType.HtmlOnly);
      expect(block.isBlock).toBe(true);
      expect(block.text).toBe('<b>x</b>');
    });

    test('inline diagram source is kept raw', () => {
      const { root } = createDocParser().parseDoc({ text: '\\dot\ndigraph { a -> b }\n\\enddot' });
      const [block] = findNodes(root, DocKind.Verbatim);
      expect(block.verbatimType).toBe(VerbatimType.Dot);
      expect(block.text).toBe('\ndigraph { a -> b }\n');
    });
  });

  describe('Formulas', () => {
    test('identical formulas share an id', () => {
      const formulas = new FormulaRegistry();
      const parser = createDocParser({ formulas });
      const first = findNodes(parser.parseDoc({ text: 'Area \\f$\\pi r^2\\f$ here' }).root, DocKind.Formula)[0];
      const again = findNodes(parser.parseDoc({ text: 'Again \\f$\\pi r^2\\f$' }).root, DocKind.Formula)[0];
      const display = findNodes(parser.parseDoc({ text: '\\f[x\\f]' }).root, DocKind.Formula)[0];

      expect(first.text).toBe('$\\pi r^2$');
      expect(first.name).toBe('form_0');
      expect(again.id).toBe(first.id);
      expect(display.text).toBe('\\[x\\]');
      expect(display.name).toBe('form_1');
      expect(formulas.size).toBe(2);
    });

    test('environment formula', () => {
      const { root } = createDocParser().parseDoc({ text: '\\f{eqnarray*}{x\\f}' });
      expect(findNodes(root, DocKind.Formula)[0].text).toBe('\\begin{eqnarray*}x\\end{eqnarray*}');
    });

    test('unterminated formula', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: '\\f$x' });
      expect(diagnostics.map(d => d.message)).toEqual(['end of comment block while inside formula started with \\f$']);
    });
  });

  describe('Includes', () => {
    test('dontinclude with line and until', () => {
      const { root, diagnostics } = createDocParser({ fileSource }).parseDoc({
        text: '\\dontinclude main.c\n\\line main\n\\until }'
      });
      expect(diagnostics).toEqual([]);
      const [include] = findNodes(root, DocKind.Include);
      expect(include.includeType).toBe(IncludeType.DontInclude);
      expect(include.text).toBe(MAIN_C);

      const ops = findNodes(root, DocKind.IncOperator);
      expect(ops.map(o => o.opType)).toEqual([IncOperatorType.Line, IncOperatorType.Until]);
      expect(ops.map(o => o.text)).toEqual(['int main()', '{\n  return 0;\n}']);
      expect(ops.map(o => [o.isFirst, o.isLast])).toEqual([[true, false], [false, true]]);
    });

    test('snippet block', () => {
      const { root } = createDocParser({ fileSource }).parseDoc({ text: '\\snippet ex.c [init]' });
      const [include] = findNodes(root, DocKind.Include);
      expect(include.includeType).toBe(IncludeType.Snippet);
      expect(include.blockId).toBe('[init]');
      expect(include.text).toBe('int a = 1;\n');
    });

    test('missing file', () => {
      const { diagnostics } = createDocParser({ fileSource }).parseDoc({ text: '\\include nothing.c' });
      expect(diagnostics.map(d => d.code)).toEqual([ParseErrorCode.MISSING_FILE]);
      expect(diagnostics[0].message).toBe('included file nothing.c is not found');
    });

    test('operator without dontinclude', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: '\\line x' });
      expect(diagnostics.map(d => d.message)).toEqual(['no preceding \\dontinclude found for \\line']);
    });

    test('skip positions the buffer without output', () => {
      const buffer = createIncludeBuffer(MAIN_C);
      expect(applyIncludeOperator(buffer, IncOperatorType.Skip, 'return')).toBe('');
      expect(buffer.offset).toBe(13);
      expect(applyIncludeOperator(buffer, IncOperatorType.SkipLine, 'return')).toBe('  return 0;');
      expect(buffer.offset).toBe(25);
    });

    test('line that does not match gives nothing but advances', () => {
      const buffer = createIncludeBuffer(MAIN_C);
      expect(applyIncludeOperator(buffer, IncOperatorType.Line, 'nothing')).toBe('');
      expect(buffer.offset).toBe(11);
    });
  });

  describe('Images and diagram files', () => {
    test('image with caption and size', () => {
      const { root } = createDocParser().parseDoc({ text: '\\image html pic.png "A caption" width=10' });
      const [image] = findNodes(root, DocKind.Image);
      expect(image.imageType).toBe(ImageType.Html);
      expect(image.name).toBe('pic.png');
      expect(image.width).toBe('10');
      expect(findNodes(image, DocKind.Word).map(w => w.word)).toEqual(['A', 'caption']);
    });

    test('external image', () => {
      const { root } = createDocParser().parseDoc({ text: '\\image html https://example.com/a.png' });
      const [image] = findNodes(root, DocKind.Image);
      expect(image.url).toBe('https://example.com/a.png');
      expect(image.relPath).toBe('');
    });

    test('unknown image type', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: '\\image pdf x.png' });
      expect(diagnostics.map(d => d.message)).toEqual([
        'image type pdf specified as the first argument of \\image is not valid, expected html, latex, rtf or docbook'
      ]);
    });

    test('image lookup through the file source', () => {
      const parser = createDocParser({
        fileSource: { readFile: () => undefined, findImage: name => name === 'known.png' ? 'images/known.png' : undefined }
      });
      const { root } = parser.parseDoc({ text: '\\image html known.png' });
      expect(findNodes(root, DocKind.Image)[0].name).toBe('images/known.png');
      const { diagnostics } = parser.parseDoc({ text: '\\image html other.png' });
      expect(diagnostics.map(d => d.message)).toEqual(['image file other.png is not found']);
    });

    test('diagram file', () => {
      const { root } = createDocParser().parseDoc({ text: '\\dotfile graph.dot "Flow"' });
      const [diagram] = findNodes(root, DocKind.DiagramFile);
      expect(diagram.diagramType).toBe(DiagramType.Dot);
      expect(diagram.file).toBe('graph.dot');
      expect(findNodes(diagram, DocKind.Word).map(w => w.word)).toEqual(['Flow']);
    });
  });
});
