/**
 * Paragraph Boundary Balancer
 *
 * The parser nests block constructs (lists, tables, sections, block quotes)
 * inside paragraphs. Structural output cannot put them inside `<p>`, so the
 * paragraph is closed before such a node and reopened after it. The functions
 * here only decide; the backend writes the markers.
 */

import {
  DocKind,
  IncludeType,
  Style,
  VerbatimType,
  isInlineFormula,
  type DocNode,
  type ParaNode,
  type SimpleSectNode
} from '../parser/ast-types.js';

/**
 * Class suffixes for opening paragraph markers, indexed by `ParagraphContext.code`
 */
export const paragraphClasses: readonly string[] = [
  '',
  ' class="startli"',
  ' class="startdd"',
  ' class="endli"',
  ' class="enddd"',
  ' class="starttd"',
  ' class="endtd"',
];

export interface ParagraphContext {
  /** Index into `paragraphClasses` */
  code: number;
  isFirst: boolean;
  isLast: boolean;
}

const paragraphStyles: ReadonlySet<Style> = new Set([Style.Center, Style.Div, Style.Preformatted]);

/**
 * Whether the rendered form of `node` is illegal inside a paragraph
 */
export function mustBeOutsideParagraph(node: DocNode): boolean {
  switch (node.kind) {
    // lists
    case DocKind.HtmlList:
    case DocKind.SimpleList:
    case DocKind.AutoList:
    // definition lists
    case DocKind.SimpleSect:
    case DocKind.ParamSect:
    case DocKind.HtmlDescList:
    case DocKind.XRefItem:
    case DocKind.HtmlTable:
    // headers
    case DocKind.Section:
    case DocKind.HtmlHeader:
    case DocKind.Internal:
    // divs
    case DocKind.Image:
    case DocKind.DiagramFile:
    case DocKind.SecRefList:
    case DocKind.HorRuler:
    // copied documentation brings its own paragraphs
    case DocKind.Copy:
    case DocKind.HtmlBlockQuote:
    case DocKind.ParBlock:
      return true;
    case DocKind.Include:
      // these only feed the operators that follow and write nothing
      return node.includeType !== IncludeType.DontInclude && node.includeType !== IncludeType.LatexInclude;
    case DocKind.Verbatim:
      return node.verbatimType !== VerbatimType.HtmlOnly || node.isBlock;
    case DocKind.StyleChange:
      return paragraphStyles.has(node.style);
    case DocKind.Formula:
      return !isInlineFormula(node);
    default:
      return false;
  }
}

/**
 * A paragraph of a simple section enclosed by separators renders inside its
 * own `<dd>` and needs no markers
 */
export function isSeparatedParagraph(sect: SimpleSectNode, para: ParaNode): boolean {
  const nodes = sect.children;
  const i = nodes.indexOf(para);
  if (i === -1) return false;

  const count = nodes.length;
  const isSep = (index: number) => nodes[index]?.kind === DocKind.SimpleSectSep;
  if (count > 1 && i === 0) return isSep(1);
  if (count > 1 && i === count - 1) return isSep(i - 1);
  if (count > 2 && i > 0 && i < count - 1) return isSep(i - 1) && isSep(i + 1);
  return false;
}

/**
 * Position of a paragraph relative to the structural ancestor that already
 * provides a boundary (list item, definition data, table cell and so on)
 */
export function getParagraphContext(para: ParaNode): ParagraphContext {
  const result: ParagraphContext = { code: 0, isFirst: false, isLast: false };
  const parent = para.parent;
  if (!parent) return result;

  const children = parent.children;
  const first = children[0] === para;
  const last = children[children.length - 1] === para;

  switch (parent.kind) {
    case DocKind.ParBlock: {
      // N -> para -> parblock -> para
      const kind = parent.parent?.parent?.kind ?? DocKind.Para;
      result.isFirst = first;
      result.isLast = last;
      if (first) result.code = edgeCode(kind, 1, 2, 5);
      if (last) result.code = edgeCode(kind, 3, 4, 6);
      break;
    }
    case DocKind.AutoListItem:
      result.isFirst = first;
      result.isLast = last;
      result.code = 1;
      break;
    case DocKind.SimpleListItem:
    case DocKind.ParamList:
      result.isFirst = true;
      result.isLast = true;
      result.code = 1;
      break;
    case DocKind.HtmlListItem:
    case DocKind.SecRefItem:
      setEdges(result, first, last, 1, 3);
      break;
    case DocKind.HtmlDescData:
    case DocKind.XRefItem:
      setEdges(result, first, last, 2, 4);
      break;
    case DocKind.SimpleSect:
      setEdges(result, first, last, 2, 4);
      if (isSeparatedParagraph(parent, para)) {
        result.isFirst = true;
        result.isLast = true;
      }
      break;
    case DocKind.HtmlCell:
      setEdges(result, first, last, 5, 6);
      break;
    default:
      break;
  }
  return result;
}

function setEdges(result: ParagraphContext, first: boolean, last: boolean, firstCode: number, lastCode: number): void {
  result.isFirst = first;
  result.isLast = last;
  if (first) result.code = firstCode;
  if (last) result.code = lastCode;
}

function edgeCode(kind: DocKind, listCode: number, descCode: number, cellCode: number): number {
  switch (kind) {
    case DocKind.HtmlListItem:
    case DocKind.SecRefItem:
      return listCode;
    case DocKind.HtmlDescData:
    case DocKind.XRefItem:
    case DocKind.SimpleSect:
      return descCode;
    case DocKind.HtmlCell:
    case DocKind.ParamList:
      return cellCode;
    default:
      return 0;
  }
}

const taggedParents: ReadonlySet<DocKind> = new Set([
  DocKind.Section,
  DocKind.Internal,
  DocKind.HtmlListItem,
  DocKind.HtmlDescData,
  DocKind.HtmlCell,
  DocKind.SimpleListItem,
  DocKind.AutoListItem,
  DocKind.SimpleSect,
  DocKind.XRefItem,
  DocKind.Copy,
  DocKind.HtmlBlockQuote,
  DocKind.ParBlock,
]);

/**
 * Whether the paragraph writes its own opening (`start`) or closing (`end`) marker
 */
export function paragraphNeedsTag(para: ParaNode, edge: 'start' | 'end'): boolean {
  const parent = para.parent;
  if (!parent) return false;

  let needsTag: boolean;
  if (parent.kind === DocKind.Root) needsTag = !parent.singleLine;
  else needsTag = taggedParents.has(parent.kind);
  if (!needsTag) return false;

  // a block node at the edge already closed or will reopen the paragraph
  const children = para.children;
  const edgeNode = edge === 'start'
    ? children.find(c => c.kind !== DocKind.WhiteSpace)
    : findLast(children, c => c.kind !== DocKind.WhiteSpace);
  if (edgeNode && mustBeOutsideParagraph(edgeNode)) return false;

  const { isFirst, isLast } = getParagraphContext(para);
  return !(isFirst && isLast);
}

/**
 * Whether a center, div or pre span opened at or before `index` is still open
 */
export function insideStyleChangeOutsidePara(para: ParaNode, index: number): boolean {
  let closedMask = 0;
  for (let i = index; i >= 0; i--) {
    const node = para.children[i];
    if (node?.kind !== DocKind.StyleChange) continue;
    const bit = 1 << node.style;
    if (!node.enable) closedMask |= bit;
    if (node.enable && (closedMask & bit) === 0 && paragraphStyles.has(node.style)) return true;
  }
  return false;
}

/**
 * Whether a paragraph closing marker goes before the block node `node`
 */
export function shouldCloseParagraphBefore(node: DocNode): boolean {
  const para = node.parent;
  if (para?.kind !== DocKind.Para) return false;

  const children = para.children;
  let index = children.indexOf(node) - 1;
  while (index >= 0 && children[index].kind === DocKind.WhiteSpace) index--;
  // nothing but whitespace before: the paragraph was never opened
  if (index < 0) return false;
  if (mustBeOutsideParagraph(children[index])) return false;

  if (insideStyleChangeOutsidePara(para, index - 1)) return false;
  const { isFirst, isLast } = getParagraphContext(para);
  return !(isFirst && isLast);
}

/**
 * Whether a paragraph opening marker goes after the block node `node`
 */
export function shouldReopenParagraphAfter(node: DocNode): boolean {
  const para = node.parent;
  if (para?.kind !== DocKind.Para) return false;

  const children = para.children;
  let index = children.indexOf(node);
  if (insideStyleChangeOutsidePara(para, index)) return false;

  index++;
  while (index < children.length && children[index].kind === DocKind.WhiteSpace) index++;
  if (index >= children.length) return false;
  if (mustBeOutsideParagraph(children[index])) return false;

  const { isFirst, isLast } = getParagraphContext(para);
  return !(isFirst && isLast);
}

function findLast<T>(items: readonly T[], predicate: (item: T) => boolean): T | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return items[i];
  }
  return undefined;
}
