/**
 * Tests for Stage 5: Sections
 *
 * Document sections, simple sections, parameter lists, cross-reference
 * items and internal blocks.
 */

import { describe, test, expect } from 'vitest';
import { createDocParser } from '../core-parser.js';
import { findNodes } from '../ast-traversal.js';
import { DocKind, ParamDirection, ParamSectType, SimpleSectType, type DocNode } from '../ast-types.js';
import { ParseErrorCode } from '../parser-interfaces.js';

function words(node: DocNode): string[] {
  return findNodes(node, DocKind.Word).map(w => w.word);
}

describe('Stage 5: Sections', () => {
  describe('Document sections', () => {
    test('nested by level', () => {
      const { root, diagnostics } = createDocParser().parseDoc({
        text: '\\section intro Introduction\nBody text\n\\subsection details More\nDeep'
      });
      expect(diagnostics).toEqual([]);
      expect(root.children).toHaveLength(1);
      const intro = root.children[0];
      if (intro.kind !== DocKind.Section) throw new Error('expected a section');
      expect(intro.id).toBe('intro');
      expect(intro.title).toBe('Introduction');
      expect(intro.level).toBe(1);
      expect(intro.children.map(c => c.kind)).toEqual([DocKind.Para, DocKind.Section]);

      const details = intro.children[1];
      if (details.kind !== DocKind.Section) throw new Error('expected a subsection');
      expect(details.title).toBe('More');
      expect(words(details)).toEqual(['Deep']);
    });

    test('sibling sections', () => {
      const { root } = createDocParser().parseDoc({ text: '\\section a A\none\n\\section b B\ntwo' });
      const sections = root.children.filter(c => c.kind === DocKind.Section);
      expect(sections).toHaveLength(2);
      expect(words(sections[1])).toEqual(['two']);
    });

    test('subsection at top level is reported', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: '\\subsection s Sub' });
      expect(diagnostics.map(d => d.code)).toEqual([ParseErrorCode.INVALID_SECTION]);
      expect(diagnostics[0].message).toBe('found \\subsection at top level, expected \\section');
    });

    test('file of the documented entity is recorded', () => {
      const { root } = createDocParser().parseDoc({
        text: '\\section s Title',
        context: { name: 'page', outputFileBase: 'page' }
      });
      const [section] = findNodes(root, DocKind.Section);
      expect(section.file).toBe('page');
      expect(section.anchor).toBe('s');
    });
  });

  describe('Simple sections', () => {
    test('consecutive sections of one type merge', () => {
      const { root } = createDocParser().parseDoc({ text: '@note A\n@note B' });
      const sects = findNodes(root, DocKind.SimpleSect);
      expect(sects).toHaveLength(1);
      expect(sects[0].sectType).toBe(SimpleSectType.Note);
      expect(sects[0].children.map(c => c.kind)).toEqual([DocKind.Para, DocKind.SimpleSectSep, DocKind.Para]);
    });

    test('different type starts a new section', () => {
      const { root } = createDocParser().parseDoc({ text: '@note A\n@warning B' });
      expect(findNodes(root, DocKind.SimpleSect).map(s => s.sectType)).toEqual([SimpleSectType.Note, SimpleSectType.Warning]);
    });

    test('aliases of one section type', () => {
      const { root } = createDocParser().parseDoc({ text: '\\returns x\n\\return y' });
      const sects = findNodes(root, DocKind.SimpleSect);
      expect(sects).toHaveLength(1);
      expect(sects[0].sectType).toBe(SimpleSectType.Return);
    });

    test('par carries a title and never merges', () => {
      const { root } = createDocParser().parseDoc({ text: '\\par Title here\nBody\n\\par Other\nMore' });
      const sects = findNodes(root, DocKind.SimpleSect);
      expect(sects).toHaveLength(2);
      const title = sects[0].title;
      if (!title) throw new Error('expected a title');
      expect(words(title)).toEqual(['Title', 'here']);
      expect(sects[0].children.map(c => c.kind)).toEqual([DocKind.Para]);
    });

    test('RCS keyword becomes a titled section', () => {
      const { root } = createDocParser().parseDoc({ text: '$Id: file.c 42 $' });
      const [sect] = findNodes(root, DocKind.SimpleSect);
      expect(sect.sectType).toBe(SimpleSectType.Rcs);
      expect(sect.title && words(sect.title)).toEqual(['Id']);
      expect(findNodes(sect, DocKind.Para).map(words)).toEqual([['file.c', '42']]);
    });
  });

  describe('Parameter sections', () => {
    test('direction and name', () => {
      const { root } = createDocParser().parseDoc({ text: '@param[in] x The value' });
      const [sect] = findNodes(root, DocKind.ParamSect);
      expect(sect.sectType).toBe(ParamSectType.Param);
      expect(sect.hasInOutSpecifier).toBe(true);
      const [list] = findNodes(root, DocKind.ParamList);
      expect(list.direction).toBe(ParamDirection.In);
      expect(list.params.map(p => p.word)).toEqual(['x']);
      expect(words(list.children[0])).toEqual(['The', 'value']);
    });

    test('several names in one list', () => {
      const { root } = createDocParser().parseDoc({ text: '@param a, b Both of them' });
      const [list] = findNodes(root, DocKind.ParamList);
      expect(list.params.map(p => p.word)).toEqual(['a', 'b']);
    });

    test('typed names', () => {
      const { root } = createDocParser().parseDoc({ text: '@param int|long#n count' });
      const [sect] = findNodes(root, DocKind.ParamSect);
      const [list] = findNodes(root, DocKind.ParamList);
      expect(sect.hasTypeSpecifier).toBe(true);
      expect(list.paramTypes.map(p => p.word)).toEqual(['int', 'long']);
      expect(list.params.map(p => p.word)).toEqual(['n']);
    });

    test('consecutive parameters share a section', () => {
      const { root } = createDocParser().parseDoc({ text: '@param a first\n@param b second' });
      expect(findNodes(root, DocKind.ParamSect)).toHaveLength(1);
      const lists = findNodes(root, DocKind.ParamList);
      expect(lists.map(l => [l.isFirst, l.isLast])).toEqual([[true, false], [false, true]]);
    });

    test('unknown direction and missing name', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: '@param[sideways] x y\n\n@retval' });
      expect(diagnostics.map(d => d.message)).toEqual([
        'unknown parameter direction [sideways], expected [in], [out] or [in,out]',
        'missing parameter name after \\retval'
      ]);
    });

    test('exception names link when resolvable', () => {
      const parser = createDocParser({
        linkResolver: { resolve: r => r.target === 'Oops' ? { file: 'classOops', anchor: '' } : undefined }
      });
      const { root } = parser.parseDoc({ text: '@throws Oops when it fails' });
      const [list] = findNodes(root, DocKind.ParamList);
      expect(list.params[0].kind).toBe(DocKind.LinkedWord);
    });
  });

  describe('Cross-reference items', () => {
    test('numbered per parser', () => {
      const parser = createDocParser();
      const first = findNodes(parser.parseDoc({ text: '@todo fix this' }).root, DocKind.XRefItem)[0];
      const second = findNodes(parser.parseDoc({ text: '@todo and this' }).root, DocKind.XRefItem)[0];
      expect(first.anchor).toBe('_todo000001');
      expect(first.title).toBe('Todo');
      expect(first.file).toBe('todo');
      expect(second.anchor).toBe('_todo000002');
    });

    test('custom list', () => {
      const { root } = createDocParser().parseDoc({ text: '\\xrefitem reviews "Review" "Reviews" check this' });
      const [item] = findNodes(root, DocKind.XRefItem);
      expect(item.key).toBe('reviews');
      expect(item.title).toBe('Review');
      expect(item.anchor).toBe('_reviews000001');
      expect(words(item)).toEqual(['check', 'this']);
    });

    test('configured titles', () => {
      const parser = createDocParser({ xrefTitles: { bug: 'Known bug' } });
      const [item] = findNodes(parser.parseDoc({ text: '@bug crash' }).root, DocKind.XRefItem);
      expect(item.title).toBe('Known bug');
    });
  });

  describe('Blocks', () => {
    test('internal block spans paragraphs', () => {
      const { root } = createDocParser().parseDoc({ text: 'Public\n\n\\internal\nSecret\n\nMore\n\\endinternal' });
      const [internal] = findNodes(root, DocKind.Internal);
      expect(internal.children.map(words)).toEqual([['Secret'], ['More']]);
    });

    test('nested internal is reported', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: '\\internal a \\internal b \\endinternal' });
      expect(diagnostics.map(d => d.message)).toEqual(['\\internal command found inside internal section']);
    });

    test('unterminated parblock', () => {
      const { root, diagnostics } = createDocParser().parseDoc({ text: '\\parblock\nOne\n\nTwo' });
      expect(findNodes(root, DocKind.ParBlock)[0].children).toHaveLength(2);
      expect(diagnostics.map(d => d.code)).toEqual([ParseErrorCode.UNTERMINATED_BLOCK]);
    });

    test('stray end command', () => {
      const { diagnostics } = createDocParser().parseDoc({ text: 'x \\endcode' });
      expect(diagnostics.map(d => d.message)).toEqual(['found \\endcode without matching start command']);
    });
  });
});
