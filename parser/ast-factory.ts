/**
 * Document Node Factory
 *
 * Creation helpers for every node kind plus the operations that keep the
 * parent/child links consistent. Factories mirror node constructors: they
 * take the parent and the discriminating fields and do not append.
 */

import {
  DocFlags,
  DocKind,
  isCompositeNode,
  type AnchorNode,
  type AutoListItemNode,
  type AutoListNode,
  type CiteNode,
  type CompositeNode,
  type CopyNode,
  type DiagramFileNode,
  type DiagramType,
  type DocNode,
  type FormulaNode,
  type HRefNode,
  type HorRulerNode,
  type HtmlAttrib,
  type HtmlBlockQuoteNode,
  type HtmlCaptionNode,
  type HtmlCellNode,
  type HtmlDescDataNode,
  type HtmlDescListNode,
  type HtmlDescTitleNode,
  type HtmlHeaderNode,
  type HtmlListItemNode,
  type HtmlListNode,
  type HtmlListType,
  type HtmlRowNode,
  type HtmlTableNode,
  type ImageNode,
  type ImageType,
  type IncOperatorNode,
  type IncludeNode,
  type IndexEntryNode,
  type InternalNode,
  type InternalRefNode,
  type LineBreakNode,
  type LinkNode,
  type LinkedWordNode,
  type ParBlockNode,
  type ParaNode,
  type ParamDirection,
  type ParamListNode,
  type ParamSectNode,
  type ParamSectType,
  type RefNode,
  type RootNode,
  type SecRefItemNode,
  type SecRefListNode,
  type SectionNode,
  type SimpleListItemNode,
  type SimpleListNode,
  type SimpleSectNode,
  type SimpleSectSepNode,
  type SimpleSectType,
  type Style,
  type StyleChangeNode,
  type SymbolNode,
  type TextNode,
  type TitleNode,
  type URLNode,
  type VerbatimNode,
  type WhiteSpaceNode,
  type WordNode,
  type XRefItemNode
} from './ast-types.js';
import { DocInvariantError } from './parser-interfaces.js';

/**
 * Fields a factory takes besides the parent
 */
export type NodeFields<T extends DocNode> = Omit<T, 'kind' | 'flags' | 'parent' | 'children'>;

/**
 * Creates the common part of a node
 */
export function createNode<K extends DocKind>(kind: K, parent: CompositeNode | undefined): { kind: K; flags: DocFlags; parent: CompositeNode | undefined } {
  return {
    kind,
    flags: DocFlags.None,
    parent
  };
}

// =============================================================================
// Leaf nodes
// =============================================================================

export function createWordNode(parent: CompositeNode, word: string): WordNode {
  return { ...createNode(DocKind.Word, parent), word };
}

export function createLinkedWordNode(parent: CompositeNode, fields: NodeFields<LinkedWordNode>): LinkedWordNode {
  return { ...createNode(DocKind.LinkedWord, parent), ...fields };
}

export function createWhiteSpaceNode(parent: CompositeNode, chars: string): WhiteSpaceNode {
  return { ...createNode(DocKind.WhiteSpace, parent), chars };
}

export function createSymbolNode(parent: CompositeNode, symbol: string): SymbolNode {
  return { ...createNode(DocKind.Symbol, parent), symbol };
}

export function createURLNode(parent: CompositeNode, url: string, isEmail: boolean): URLNode {
  return { ...createNode(DocKind.URL, parent), url, isEmail };
}

export function createLineBreakNode(parent: CompositeNode): LineBreakNode {
  return createNode(DocKind.LineBreak, parent);
}

export function createHorRulerNode(parent: CompositeNode): HorRulerNode {
  return createNode(DocKind.HorRuler, parent);
}

export function createAnchorNode(parent: CompositeNode, anchor: string, file: string): AnchorNode {
  return { ...createNode(DocKind.Anchor, parent), anchor, file };
}

export function createStyleChangeNode(
  parent: CompositeNode,
  position: number,
  style: Style,
  enable: boolean,
  attribs: HtmlAttrib[] = []
): StyleChangeNode {
  return { ...createNode(DocKind.StyleChange, parent), style, enable, position, attribs };
}

export function createVerbatimNode(parent: CompositeNode, fields: NodeFields<VerbatimNode>): VerbatimNode {
  return { ...createNode(DocKind.Verbatim, parent), ...fields };
}

export function createIncludeNode(parent: CompositeNode, fields: NodeFields<IncludeNode>): IncludeNode {
  return { ...createNode(DocKind.Include, parent), ...fields };
}

export function createIncOperatorNode(parent: CompositeNode, fields: NodeFields<IncOperatorNode>): IncOperatorNode {
  return { ...createNode(DocKind.IncOperator, parent), ...fields };
}

export function createFormulaNode(parent: CompositeNode, id: number, name: string, text: string, relPath: string): FormulaNode {
  return { ...createNode(DocKind.Formula, parent), id, name, text, relPath };
}

export function createIndexEntryNode(parent: CompositeNode, entry: string, scope: string, memberAnchor: string): IndexEntryNode {
  return { ...createNode(DocKind.IndexEntry, parent), entry, scope, memberAnchor };
}

export function createSimpleSectSepNode(parent: CompositeNode): SimpleSectSepNode {
  return createNode(DocKind.SimpleSectSep, parent);
}

export function createCiteNode(parent: CompositeNode, fields: NodeFields<CiteNode>): CiteNode {
  return { ...createNode(DocKind.Cite, parent), ...fields };
}

// =============================================================================
// Composite nodes
// =============================================================================

export function createRootNode(singleLine: boolean, indent = false): RootNode {
  return { ...createNode(DocKind.Root, undefined), children: [], indent, singleLine };
}

export function createTextRootNode(): TextNode {
  return { ...createNode(DocKind.Text, undefined), children: [] };
}

export function createParaNode(parent: CompositeNode): ParaNode {
  return { ...createNode(DocKind.Para, parent), children: [], isFirst: false, isLast: false, attribs: [] };
}

export function createAutoListNode(parent: CompositeNode, indent: number, isEnumList: boolean, depth: number): AutoListNode {
  return { ...createNode(DocKind.AutoList, parent), children: [], indent, isEnumList, depth };
}

export function createAutoListItemNode(parent: CompositeNode, indent: number, itemNumber: number): AutoListItemNode {
  return { ...createNode(DocKind.AutoListItem, parent), children: [], indent, itemNumber };
}

export function createTitleNode(parent: CompositeNode): TitleNode {
  return { ...createNode(DocKind.Title, parent), children: [] };
}

export function createXRefItemNode(parent: CompositeNode, fields: NodeFields<XRefItemNode>): XRefItemNode {
  return { ...createNode(DocKind.XRefItem, parent), children: [], ...fields };
}

export function createImageNode(
  parent: CompositeNode,
  imageType: ImageType,
  name: string,
  fields: Partial<NodeFields<ImageNode>> = {}
): ImageNode {
  return {
    ...createNode(DocKind.Image, parent),
    children: [],
    imageType,
    name,
    width: fields.width ?? '',
    height: fields.height ?? '',
    relPath: fields.relPath ?? '',
    url: fields.url ?? '',
    attribs: fields.attribs ?? []
  };
}

export function createDiagramFileNode(
  parent: CompositeNode,
  diagramType: DiagramType,
  name: string,
  fields: Partial<NodeFields<DiagramFileNode>> = {}
): DiagramFileNode {
  return {
    ...createNode(DocKind.DiagramFile, parent),
    children: [],
    diagramType,
    name,
    file: fields.file ?? name,
    relPath: fields.relPath ?? '',
    width: fields.width ?? '',
    height: fields.height ?? '',
    context: fields.context ?? ''
  };
}

export function createHRefNode(parent: CompositeNode, url: string, relPath: string, attribs: HtmlAttrib[]): HRefNode {
  return { ...createNode(DocKind.HRef, parent), children: [], url, relPath, attribs };
}

export function createLinkNode(parent: CompositeNode, fields: NodeFields<LinkNode>): LinkNode {
  return { ...createNode(DocKind.Link, parent), children: [], ...fields };
}

export function createRefNode(parent: CompositeNode, fields: NodeFields<RefNode>): RefNode {
  return { ...createNode(DocKind.Ref, parent), children: [], ...fields };
}

export function createInternalRefNode(parent: CompositeNode, target: string, relPath: string): InternalRefNode {
  const hash = target.indexOf('#');
  return {
    ...createNode(DocKind.InternalRef, parent),
    children: [],
    file: hash === -1 ? target : target.slice(0, hash),
    anchor: hash === -1 ? '' : target.slice(hash + 1),
    relPath
  };
}

export function createHtmlListNode(parent: CompositeNode, listType: HtmlListType, attribs: HtmlAttrib[]): HtmlListNode {
  return { ...createNode(DocKind.HtmlList, parent), children: [], listType, attribs };
}

export function createHtmlListItemNode(parent: CompositeNode, itemNumber: number, attribs: HtmlAttrib[]): HtmlListItemNode {
  return { ...createNode(DocKind.HtmlListItem, parent), children: [], itemNumber, attribs };
}

export function createHtmlDescListNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlDescListNode {
  return { ...createNode(DocKind.HtmlDescList, parent), children: [], attribs };
}

export function createHtmlDescTitleNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlDescTitleNode {
  return { ...createNode(DocKind.HtmlDescTitle, parent), children: [], attribs };
}

export function createHtmlDescDataNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlDescDataNode {
  return { ...createNode(DocKind.HtmlDescData, parent), children: [], attribs };
}

export function createHtmlTableNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlTableNode {
  return { ...createNode(DocKind.HtmlTable, parent), children: [], attribs, caption: undefined, numColumns: -1 };
}

export function createHtmlRowNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlRowNode {
  return { ...createNode(DocKind.HtmlRow, parent), children: [], attribs, rowIndex: -1, visibleCells: 0 };
}

export function createHtmlCellNode(parent: CompositeNode, attribs: HtmlAttrib[], isHeading: boolean): HtmlCellNode {
  return {
    ...createNode(DocKind.HtmlCell, parent),
    children: [],
    attribs,
    isHeading,
    isFirst: false,
    isLast: false,
    rowIndex: -1,
    columnIndex: -1
  };
}

export function createHtmlCaptionNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlCaptionNode {
  return { ...createNode(DocKind.HtmlCaption, parent), children: [], attribs };
}

export function createHtmlBlockQuoteNode(parent: CompositeNode, attribs: HtmlAttrib[]): HtmlBlockQuoteNode {
  return { ...createNode(DocKind.HtmlBlockQuote, parent), children: [], attribs };
}

export function createHtmlHeaderNode(parent: CompositeNode, level: number, attribs: HtmlAttrib[]): HtmlHeaderNode {
  return { ...createNode(DocKind.HtmlHeader, parent), children: [], level, attribs };
}

export function createSectionNode(parent: CompositeNode, fields: NodeFields<SectionNode>): SectionNode {
  return { ...createNode(DocKind.Section, parent), children: [], ...fields };
}

export function createSecRefListNode(parent: CompositeNode): SecRefListNode {
  return { ...createNode(DocKind.SecRefList, parent), children: [] };
}

export function createSecRefItemNode(parent: CompositeNode, fields: NodeFields<SecRefItemNode>): SecRefItemNode {
  return { ...createNode(DocKind.SecRefItem, parent), children: [], ...fields };
}

export function createInternalNode(parent: CompositeNode): InternalNode {
  return { ...createNode(DocKind.Internal, parent), children: [] };
}

export function createParBlockNode(parent: CompositeNode): ParBlockNode {
  return { ...createNode(DocKind.ParBlock, parent), children: [] };
}

export function createSimpleListNode(parent: CompositeNode): SimpleListNode {
  return { ...createNode(DocKind.SimpleList, parent), children: [] };
}

export function createSimpleListItemNode(parent: CompositeNode): SimpleListItemNode {
  return { ...createNode(DocKind.SimpleListItem, parent), children: [] };
}

export function createSimpleSectNode(parent: CompositeNode, sectType: SimpleSectType): SimpleSectNode {
  return { ...createNode(DocKind.SimpleSect, parent), children: [], sectType, title: undefined };
}

export function createParamSectNode(parent: CompositeNode, sectType: ParamSectType): ParamSectNode {
  return { ...createNode(DocKind.ParamSect, parent), children: [], sectType, hasInOutSpecifier: false, hasTypeSpecifier: false };
}

export function createParamListNode(parent: CompositeNode, sectType: ParamSectType, direction: ParamDirection): ParamListNode {
  return {
    ...createNode(DocKind.ParamList, parent),
    children: [],
    sectType,
    direction,
    params: [],
    paramTypes: [],
    isFirst: false,
    isLast: false
  };
}

export function createCopyNode(parent: CompositeNode, link: string, copyBrief: boolean, copyDetails: boolean): CopyNode {
  return { ...createNode(DocKind.Copy, parent), children: [], link, copyBrief, copyDetails, resolved: false };
}

// =============================================================================
// Tree maintenance
// =============================================================================

/**
 * Append a child created for `parent`
 */
export function appendChild<T extends DocNode>(parent: CompositeNode, child: T): T {
  if (child.parent !== parent) {
    throw new DocInvariantError(`${DocKind[child.kind]} node appended to a parent it was not created for`, child);
  }
  parent.children.push(child);
  return child;
}

export function lastChild(parent: CompositeNode): DocNode | undefined {
  return parent.children[parent.children.length - 1];
}

/**
 * Drop whitespace nodes at the end of a composite
 */
export function removeTrailingWhitespace(parent: CompositeNode): void {
  while (parent.children.length > 0 && parent.children[parent.children.length - 1].kind === DocKind.WhiteSpace) {
    parent.children.pop();
  }
}

/**
 * Move all children of `from` into `to` at `index`
 */
export function moveChildren(from: CompositeNode, to: CompositeNode, index = to.children.length): void {
  const moved = from.children.splice(0, from.children.length);
  for (const child of moved) child.parent = to;
  to.children.splice(index, 0, ...moved);
}

/**
 * Deep copy of a subtree attached to `parent`
 */
export function cloneNode(node: DocNode, parent: CompositeNode | undefined): DocNode {
  if (!isCompositeNode(node)) return { ...node, parent };

  const children: DocNode[] = [];
  const copy: CompositeNode = { ...node, parent, children };
  for (const child of node.children) children.push(cloneNode(child, copy));

  switch (copy.kind) {
    case DocKind.SimpleSect:
      if (copy.title) copy.title = cloneTitle(copy.title, copy);
      break;
    case DocKind.HtmlTable:
      if (copy.caption) copy.caption = cloneCaption(copy.caption, copy);
      break;
    case DocKind.ParamList:
      copy.params = copy.params.map(p => ({ ...p, parent: copy }));
      copy.paramTypes = copy.paramTypes.map(p => ({ ...p, parent: copy }));
      break;
  }
  return copy;
}

function cloneTitle(title: TitleNode, parent: CompositeNode): TitleNode {
  const children: DocNode[] = [];
  const copy: TitleNode = { ...title, parent, children };
  for (const child of title.children) children.push(cloneNode(child, copy));
  return copy;
}

function cloneCaption(caption: HtmlCaptionNode, parent: CompositeNode): HtmlCaptionNode {
  const children: DocNode[] = [];
  const copy: HtmlCaptionNode = { ...caption, parent, children };
  for (const child of caption.children) children.push(cloneNode(child, copy));
  return copy;
}

/**
 * Check parent links and table grid indices below `root`
 */
export function validateTree(root: DocNode): void {
  const check = (node: DocNode, parent: CompositeNode) => {
    if (node.parent !== parent) {
      throw new DocInvariantError(
        `${DocKind[node.kind]} node is listed by ${DocKind[parent.kind]} but points to another parent`, node);
    }
    validateTree(node);
  };

  if (!isCompositeNode(root)) return;
  for (const child of root.children) check(child, root);

  switch (root.kind) {
    case DocKind.SimpleSect:
      if (root.title) check(root.title, root);
      break;
    case DocKind.HtmlTable:
      if (root.caption) check(root.caption, root);
      if (root.numColumns >= 0) {
        for (const row of root.children) {
          if (row.kind !== DocKind.HtmlRow) continue;
          for (const cell of row.children) {
            if (cell.kind === DocKind.HtmlCell && (cell.rowIndex < 0 || cell.columnIndex < 0)) {
              throw new DocInvariantError('Table cell has a negative grid index', cell);
            }
          }
        }
      }
      break;
    case DocKind.ParamList:
      for (const p of root.params) check(p, root);
      for (const p of root.paramTypes) check(p, root);
      break;
  }
}
