/**
 * Tests for Stage 2: Document Tree
 *
 * Node factories, parent links, cloning, validation and traversal.
 */

import { describe, test, expect } from 'vitest';
import {
  DocKind,
  SimpleSectType,
  Style,
  type CompositeNode,
  type DocNode,
  type LeafNode
} from '../ast-types.js';
import {
  appendChild,
  cloneNode,
  createHtmlCellNode,
  createHtmlRowNode,
  createHtmlTableNode,
  createParaNode,
  createRootNode,
  createSimpleSectNode,
  createStyleChangeNode,
  createTitleNode,
  createWhiteSpaceNode,
  createWordNode,
  moveChildren,
  removeTrailingWhitespace,
  validateTree
} from '../ast-factory.js';
import {
  acceptNode,
  findAncestor,
  findNodes,
  indexInParent,
  isAncestor,
  VisitResult,
  walkDoc,
  type DocVisitor
} from '../ast-traversal.js';
import { createDocParser } from '../core-parser.js';
import { DocInvariantError } from '../parser-interfaces.js';

function buildSample() {
  const root = createRootNode(false);
  const para = appendChild(root, createParaNode(root));
  appendChild(para, createWordNode(para, 'Hello'));
  appendChild(para, createWhiteSpaceNode(para, ' '));
  appendChild(para, createWordNode(para, 'world'));
  return { root, para };
}

describe('Stage 2: Document Tree', () => {
  describe('Factories', () => {
    test('nodes start with no flags and the given parent', () => {
      const root = createRootNode(true);
      const para = createParaNode(root);
      expect(para.kind).toBe(DocKind.Para);
      expect(para.flags).toBe(0);
      expect(para.parent).toBe(root);
      expect(root.parent).toBeUndefined();
      expect(root.singleLine).toBe(true);
    });

    test('factories do not append', () => {
      const root = createRootNode(false);
      createParaNode(root);
      expect(root.children).toHaveLength(0);
    });

    test('style change records position and attributes', () => {
      const root = createRootNode(false);
      const para = createParaNode(root);
      const style = createStyleChangeNode(para, 12, Style.Bold, true);
      expect(style.style).toBe(Style.Bold);
      expect(style.enable).toBe(true);
      expect(style.position).toBe(12);
      expect(style.attribs).toEqual([]);
    });

    test('table cells start outside the grid', () => {
      const root = createRootNode(false);
      const table = createHtmlTableNode(root, []);
      const row = createHtmlRowNode(table, []);
      const cell = createHtmlCellNode(row, [], true);
      expect(table.numColumns).toBe(-1);
      expect(cell.rowIndex).toBe(-1);
      expect(cell.columnIndex).toBe(-1);
      expect(cell.isHeading).toBe(true);
    });
  });

  describe('Tree maintenance', () => {
    test('appendChild rejects a node created for another parent', () => {
      const root = createRootNode(false);
      const para = createParaNode(root);
      const other = createParaNode(root);
      expect(() => appendChild(other, createWordNode(para, 'x')))
        .toThrow('Word node appended to a parent it was not created for');
    });

    test('removeTrailingWhitespace drops only the tail', () => {
      const root = createRootNode(false);
      const para = appendChild(root, createParaNode(root));
      appendChild(para, createWhiteSpaceNode(para, ' '));
      appendChild(para, createWordNode(para, 'x'));
      appendChild(para, createWhiteSpaceNode(para, ' '));
      appendChild(para, createWhiteSpaceNode(para, '\n'));
      removeTrailingWhitespace(para);
      expect(para.children.map(c => c.kind)).toEqual([DocKind.WhiteSpace, DocKind.Word]);
    });

    test('moveChildren reparents', () => {
      const { root, para } = buildSample();
      const target = appendChild(root, createParaNode(root));
      moveChildren(para, target);
      expect(para.children).toHaveLength(0);
      expect(target.children).toHaveLength(3);
      expect(target.children.every(c => c.parent === target)).toBe(true);
      validateTree(root);
    });

    test('cloneNode copies deeply and links to the new parent', () => {
      const { root, para } = buildSample();
      const copy = cloneNode(para, root);
      if (copy.kind !== DocKind.Para) throw new Error('expected a paragraph');
      expect(copy).not.toBe(para);
      expect(copy.children).toHaveLength(3);
      expect(copy.children[0]).not.toBe(para.children[0]);
      expect(copy.children.every(c => c.parent === copy)).toBe(true);
      root.children.push(copy);
      validateTree(root);
    });

    test('cloneNode carries section titles along', () => {
      const root = createRootNode(false);
      const sect = appendChild(root, createSimpleSectNode(root, SimpleSectType.User));
      const title = createTitleNode(sect);
      appendChild(title, createWordNode(title, 'Heading'));
      sect.title = title;

      const copy = cloneNode(sect, root);
      if (copy.kind !== DocKind.SimpleSect || !copy.title) throw new Error('expected a titled section');
      expect(copy.title).not.toBe(title);
      expect(copy.title.parent).toBe(copy);
      expect(copy.title.children[0].parent).toBe(copy.title);
    });
  });

  describe('Validation', () => {
    test('consistent tree passes', () => {
      const { root } = buildSample();
      expect(() => validateTree(root)).not.toThrow();
    });

    test('broken parent link is reported', () => {
      const { root, para } = buildSample();
      const stray = createWordNode(root, 'stray');
      para.children.push(stray);
      expect(() => validateTree(root)).toThrow(DocInvariantError);
      expect(() => validateTree(root)).toThrow('Word node is listed by Para but points to another parent');
    });

    test('cell without a grid position fails once the grid ran', () => {
      const root = createRootNode(false);
      const table = appendChild(root, createHtmlTableNode(root, []));
      const row = appendChild(table, createHtmlRowNode(table, []));
      appendChild(row, createHtmlCellNode(row, [], false));
      expect(() => validateTree(root)).not.toThrow();
      table.numColumns = 1;
      expect(() => validateTree(root)).toThrow('Table cell has a negative grid index');
    });
  });

  describe('Traversal', () => {
    test('visitor sees pre, leaves and post in order', () => {
      const { root } = buildSample();
      const events: string[] = [];
      const visitor: DocVisitor = {
        visit(node: LeafNode) { events.push(`visit ${DocKind[node.kind]}`); },
        visitPre(node: CompositeNode) { events.push(`pre ${DocKind[node.kind]}`); },
        visitPost(node: CompositeNode) { events.push(`post ${DocKind[node.kind]}`); }
      };
      acceptNode(root, visitor);
      expect(events).toEqual([
        'pre Root',
        'pre Para',
        'visit Word',
        'visit WhiteSpace',
        'visit Word',
        'post Para',
        'post Root'
      ]);
    });

    test('section title is visited before the body', () => {
      const root = createRootNode(false);
      const sect = appendChild(root, createSimpleSectNode(root, SimpleSectType.User));
      const title = createTitleNode(sect);
      appendChild(title, createWordNode(title, 'Heading'));
      sect.title = title;
      const body = appendChild(sect, createParaNode(sect));
      appendChild(body, createWordNode(body, 'text'));

      const words: string[] = [];
      acceptNode(root, {
        visit(node) { if (node.kind === DocKind.Word) words.push(node.word); },
        visitPre() {},
        visitPost() {}
      });
      expect(words).toEqual(['Heading', 'text']);
    });

    test('walkDoc can skip and stop', () => {
      const { root, para } = buildSample();
      const skipped: DocKind[] = [];
      walkDoc(root, node => {
        skipped.push(node.kind);
        if (node === para) return VisitResult.Skip;
      });
      expect(skipped).toEqual([DocKind.Root, DocKind.Para]);

      const stopped: DocNode[] = [];
      walkDoc(root, node => {
        stopped.push(node);
        if (node.kind === DocKind.Word) return VisitResult.Stop;
      });
      expect(stopped).toHaveLength(3);
    });

    test('query helpers', () => {
      const { root, para } = buildSample();
      const words = findNodes(root, DocKind.Word);
      expect(words.map(w => w.word)).toEqual(['Hello', 'world']);
      expect(findAncestor(words[1], [DocKind.Root])).toBe(root);
      expect(isAncestor(root, words[0])).toBe(true);
      expect(isAncestor(para, root)).toBe(false);
      expect(indexInParent(words[1])).toBe(2);
      expect(indexInParent(root)).toBe(-1);
    });

    test('parsed tree has consistent links', () => {
      const parser = createDocParser();
      const { root } = parser.parseDoc({ text: 'First paragraph.\n\nSecond @b bold word.' });
      expect(() => validateTree(root)).not.toThrow();
      expect(findNodes(root, DocKind.Para)).toHaveLength(2);
      const styles = findNodes(root, DocKind.StyleChange);
      expect(styles.map(s => [s.style, s.enable])).toEqual([[Style.Bold, true], [Style.Bold, false]]);
    });
  });
});
