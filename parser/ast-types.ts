/**
 * Document Node Types
 *
 * Closed tagged union of documentation-comment constructs. Every node carries
 * its kind, flags and a back-reference to the composite that lists it.
 */

/**
 * Node kinds - each construct gets a unique identifier
 */
export enum DocKind {
  // Roots
  Root,
  Text,

  // Leaf nodes
  Word,
  LinkedWord,
  WhiteSpace,
  Symbol,
  URL,
  LineBreak,
  HorRuler,
  Anchor,
  StyleChange,
  Verbatim,
  Include,
  IncOperator,
  Formula,
  IndexEntry,
  SimpleSectSep,
  Cite,

  // Composite nodes
  Para,
  AutoList,
  AutoListItem,
  Title,
  XRefItem,
  Image,
  DiagramFile,
  HRef,
  Link,
  Ref,
  InternalRef,
  HtmlList,
  HtmlListItem,
  HtmlDescList,
  HtmlDescTitle,
  HtmlDescData,
  HtmlTable,
  HtmlRow,
  HtmlCell,
  HtmlCaption,
  HtmlBlockQuote,
  HtmlHeader,
  Section,
  SecRefList,
  SecRefItem,
  Internal,
  ParBlock,
  SimpleList,
  SimpleListItem,
  SimpleSect,
  ParamSect,
  ParamList,
  Copy,
}

/**
 * Node flags for additional metadata
 */
export enum DocFlags {
  None = 0,
  Synthetic = 1 << 0,           // Created by recovery, not present in source
  ContainsError = 1 << 1,       // A diagnostic was raised while building it
  InsidePreformatted = 1 << 2,  // Created inside a <pre> span
}

export interface HtmlAttrib {
  name: string;
  value: string;
}

/**
 * Base interface for all document nodes
 */
export interface DocNodeBase {
  kind: DocKind;
  flags: DocFlags;
  parent: CompositeNode | undefined;
}

// =============================================================================
// Leaf nodes
// =============================================================================

export interface WordNode extends DocNodeBase {
  kind: DocKind.Word;
  word: string;
}

export interface LinkedWordNode extends DocNodeBase {
  kind: DocKind.LinkedWord;
  word: string;
  ref: string;
  file: string;
  relPath: string;
  anchor: string;
  tooltip: string;
}

export interface WhiteSpaceNode extends DocNodeBase {
  kind: DocKind.WhiteSpace;
  chars: string;
}

export interface SymbolNode extends DocNodeBase {
  kind: DocKind.Symbol;
  /** Key into the entity table, e.g. `copy` or `BSlash` */
  symbol: string;
}

export interface URLNode extends DocNodeBase {
  kind: DocKind.URL;
  url: string;
  isEmail: boolean;
}

export interface LineBreakNode extends DocNodeBase {
  kind: DocKind.LineBreak;
}

export interface HorRulerNode extends DocNodeBase {
  kind: DocKind.HorRuler;
}

export interface AnchorNode extends DocNodeBase {
  kind: DocKind.Anchor;
  anchor: string;
  file: string;
}

export enum Style {
  Bold,
  Italic,
  Code,
  Center,
  Small,
  Subscript,
  Superscript,
  Preformatted,
  Span,
  Div,
}

export interface StyleChangeNode extends DocNodeBase {
  kind: DocKind.StyleChange;
  style: Style;
  enable: boolean;
  /** Offset of the toggle in the comment text */
  position: number;
  attribs: HtmlAttrib[];
}

export enum VerbatimType {
  Code,
  HtmlOnly,
  ManOnly,
  LatexOnly,
  RtfOnly,
  XmlOnly,
  DocbookOnly,
  Verbatim,
  Dot,
  Msc,
  PlantUML,
}

export interface VerbatimNode extends DocNodeBase {
  kind: DocKind.Verbatim;
  verbatimType: VerbatimType;
  text: string;
  context: string;
  isExample: boolean;
  exampleFile: string;
  /** `\htmlonly[block]` */
  isBlock: boolean;
  /** Language hint from `\code{.ext}`, without the dot */
  language: string;
}

export enum IncludeType {
  Include,
  DontInclude,
  VerbInclude,
  HtmlInclude,
  LatexInclude,
  IncWithLines,
  Snippet,
}

export interface IncludeNode extends DocNodeBase {
  kind: DocKind.Include;
  includeType: IncludeType;
  file: string;
  text: string;
  context: string;
  isExample: boolean;
  exampleFile: string;
  blockId: string;
}

export enum IncOperatorType {
  Line,
  SkipLine,
  Skip,
  Until,
}

export interface IncOperatorNode extends DocNodeBase {
  kind: DocKind.IncOperator;
  opType: IncOperatorType;
  pattern: string;
  text: string;
  context: string;
  isFirst: boolean;
  isLast: boolean;
  isExample: boolean;
  exampleFile: string;
}

export interface FormulaNode extends DocNodeBase {
  kind: DocKind.Formula;
  id: number;
  name: string;
  text: string;
  relPath: string;
}

export interface IndexEntryNode extends DocNodeBase {
  kind: DocKind.IndexEntry;
  entry: string;
  scope: string;
  memberAnchor: string;
}

export interface SimpleSectSepNode extends DocNodeBase {
  kind: DocKind.SimpleSectSep;
}

export interface CiteNode extends DocNodeBase {
  kind: DocKind.Cite;
  target: string;
  text: string;
  file: string;
  relPath: string;
  ref: string;
  anchor: string;
}

// =============================================================================
// Composite nodes
// =============================================================================

export interface CompositeBase extends DocNodeBase {
  children: DocNode[];
}

export interface RootNode extends CompositeBase {
  kind: DocKind.Root;
  indent: boolean;
  singleLine: boolean;
}

export interface TextNode extends CompositeBase {
  kind: DocKind.Text;
}

export interface ParaNode extends CompositeBase {
  kind: DocKind.Para;
  isFirst: boolean;
  isLast: boolean;
  attribs: HtmlAttrib[];
}

export interface AutoListNode extends CompositeBase {
  kind: DocKind.AutoList;
  indent: number;
  isEnumList: boolean;
  depth: number;
}

export interface AutoListItemNode extends CompositeBase {
  kind: DocKind.AutoListItem;
  indent: number;
  itemNumber: number;
}

export interface TitleNode extends CompositeBase {
  kind: DocKind.Title;
}

export interface XRefItemNode extends CompositeBase {
  kind: DocKind.XRefItem;
  id: number;
  key: string;
  file: string;
  anchor: string;
  title: string;
  relPath: string;
}

export enum ImageType {
  Html,
  Latex,
  Rtf,
  DocBook,
}

export interface ImageNode extends CompositeBase {
  kind: DocKind.Image;
  imageType: ImageType;
  name: string;
  width: string;
  height: string;
  relPath: string;
  url: string;
  attribs: HtmlAttrib[];
}

export enum DiagramType {
  Dot,
  Msc,
  Dia,
}

export interface DiagramFileNode extends CompositeBase {
  kind: DocKind.DiagramFile;
  diagramType: DiagramType;
  name: string;
  file: string;
  relPath: string;
  width: string;
  height: string;
  context: string;
}

export interface HRefNode extends CompositeBase {
  kind: DocKind.HRef;
  url: string;
  relPath: string;
  attribs: HtmlAttrib[];
}

export interface LinkNode extends CompositeBase {
  kind: DocKind.Link;
  target: string;
  file: string;
  relPath: string;
  ref: string;
  anchor: string;
  tooltip: string;
}

export interface RefNode extends CompositeBase {
  kind: DocKind.Ref;
  target: string;
  file: string;
  relPath: string;
  ref: string;
  anchor: string;
  targetTitle: string;
  refToAnchor: boolean;
  refToSection: boolean;
  isSubPage: boolean;
}

export interface InternalRefNode extends CompositeBase {
  kind: DocKind.InternalRef;
  file: string;
  relPath: string;
  anchor: string;
}

export enum HtmlListType {
  Unordered,
  Ordered,
}

export interface HtmlListNode extends CompositeBase {
  kind: DocKind.HtmlList;
  listType: HtmlListType;
  attribs: HtmlAttrib[];
}

export interface HtmlListItemNode extends CompositeBase {
  kind: DocKind.HtmlListItem;
  itemNumber: number;
  attribs: HtmlAttrib[];
}

export interface HtmlDescListNode extends CompositeBase {
  kind: DocKind.HtmlDescList;
  attribs: HtmlAttrib[];
}

export interface HtmlDescTitleNode extends CompositeBase {
  kind: DocKind.HtmlDescTitle;
  attribs: HtmlAttrib[];
}

export interface HtmlDescDataNode extends CompositeBase {
  kind: DocKind.HtmlDescData;
  attribs: HtmlAttrib[];
}

export interface HtmlTableNode extends CompositeBase {
  kind: DocKind.HtmlTable;
  attribs: HtmlAttrib[];
  caption: HtmlCaptionNode | undefined;
  /** -1 until the grid pass has run */
  numColumns: number;
}

export interface HtmlRowNode extends CompositeBase {
  kind: DocKind.HtmlRow;
  attribs: HtmlAttrib[];
  rowIndex: number;
  visibleCells: number;
}

export interface HtmlCellNode extends CompositeBase {
  kind: DocKind.HtmlCell;
  attribs: HtmlAttrib[];
  isHeading: boolean;
  isFirst: boolean;
  isLast: boolean;
  rowIndex: number;
  columnIndex: number;
}

export interface HtmlCaptionNode extends CompositeBase {
  kind: DocKind.HtmlCaption;
  attribs: HtmlAttrib[];
}

export interface HtmlBlockQuoteNode extends CompositeBase {
  kind: DocKind.HtmlBlockQuote;
  attribs: HtmlAttrib[];
}

export interface HtmlHeaderNode extends CompositeBase {
  kind: DocKind.HtmlHeader;
  level: number;
  attribs: HtmlAttrib[];
}

export interface SectionNode extends CompositeBase {
  kind: DocKind.Section;
  level: number;
  id: string;
  title: string;
  anchor: string;
  file: string;
}

export interface SecRefListNode extends CompositeBase {
  kind: DocKind.SecRefList;
}

export interface SecRefItemNode extends CompositeBase {
  kind: DocKind.SecRefItem;
  target: string;
  file: string;
  anchor: string;
  relPath: string;
}

export interface InternalNode extends CompositeBase {
  kind: DocKind.Internal;
}

export interface ParBlockNode extends CompositeBase {
  kind: DocKind.ParBlock;
}

export interface SimpleListNode extends CompositeBase {
  kind: DocKind.SimpleList;
}

export interface SimpleListItemNode extends CompositeBase {
  kind: DocKind.SimpleListItem;
}

export enum SimpleSectType {
  Unknown,
  See,
  Return,
  Author,
  Authors,
  Version,
  Since,
  Date,
  Note,
  Warning,
  Copyright,
  Pre,
  Post,
  Invar,
  Remark,
  Attention,
  User,
  Rcs,
}

export interface SimpleSectNode extends CompositeBase {
  kind: DocKind.SimpleSect;
  sectType: SimpleSectType;
  /** Heading for `\par` and RCS sections; visited before the children */
  title: TitleNode | undefined;
}

export enum ParamSectType {
  Param,
  RetVal,
  Exception,
  TemplateParam,
}

export enum ParamDirection {
  Unspecified = 0,
  In = 1,
  Out = 2,
  InOut = 3,
}

export interface ParamSectNode extends CompositeBase {
  kind: DocKind.ParamSect;
  sectType: ParamSectType;
  hasInOutSpecifier: boolean;
  hasTypeSpecifier: boolean;
}

export type ParamNameNode = WordNode | LinkedWordNode;

export interface ParamListNode extends CompositeBase {
  kind: DocKind.ParamList;
  sectType: ParamSectType;
  direction: ParamDirection;
  params: ParamNameNode[];
  paramTypes: ParamNameNode[];
  isFirst: boolean;
  isLast: boolean;
}

export interface CopyNode extends CompositeBase {
  kind: DocKind.Copy;
  link: string;
  copyBrief: boolean;
  copyDetails: boolean;
  /** Set once the surrounding system supplied the copied nodes */
  resolved: boolean;
}

// =============================================================================
// Unions
// =============================================================================

export type LeafNode =
  | WordNode
  | LinkedWordNode
  | WhiteSpaceNode
  | SymbolNode
  | URLNode
  | LineBreakNode
  | HorRulerNode
  | AnchorNode
  | StyleChangeNode
  | VerbatimNode
  | IncludeNode
  | IncOperatorNode
  | FormulaNode
  | IndexEntryNode
  | SimpleSectSepNode
  | CiteNode;

export type CompositeNode =
  | RootNode
  | TextNode
  | ParaNode
  | AutoListNode
  | AutoListItemNode
  | TitleNode
  | XRefItemNode
  | ImageNode
  | DiagramFileNode
  | HRefNode
  | LinkNode
  | RefNode
  | InternalRefNode
  | HtmlListNode
  | HtmlListItemNode
  | HtmlDescListNode
  | HtmlDescTitleNode
  | HtmlDescDataNode
  | HtmlTableNode
  | HtmlRowNode
  | HtmlCellNode
  | HtmlCaptionNode
  | HtmlBlockQuoteNode
  | HtmlHeaderNode
  | SectionNode
  | SecRefListNode
  | SecRefItemNode
  | InternalNode
  | ParBlockNode
  | SimpleListNode
  | SimpleListItemNode
  | SimpleSectNode
  | ParamSectNode
  | ParamListNode
  | CopyNode;

export type DocNode = LeafNode | CompositeNode;

const compositeKinds: ReadonlySet<DocKind> = new Set([
  DocKind.Root, DocKind.Text, DocKind.Para, DocKind.AutoList, DocKind.AutoListItem,
  DocKind.Title, DocKind.XRefItem, DocKind.Image, DocKind.DiagramFile, DocKind.HRef,
  DocKind.Link, DocKind.Ref, DocKind.InternalRef, DocKind.HtmlList, DocKind.HtmlListItem,
  DocKind.HtmlDescList, DocKind.HtmlDescTitle, DocKind.HtmlDescData, DocKind.HtmlTable,
  DocKind.HtmlRow, DocKind.HtmlCell, DocKind.HtmlCaption, DocKind.HtmlBlockQuote,
  DocKind.HtmlHeader, DocKind.Section, DocKind.SecRefList, DocKind.SecRefItem,
  DocKind.Internal, DocKind.ParBlock, DocKind.SimpleList, DocKind.SimpleListItem,
  DocKind.SimpleSect, DocKind.ParamSect, DocKind.ParamList, DocKind.Copy,
]);

export function isCompositeNode(node: DocNode): node is CompositeNode {
  return compositeKinds.has(node.kind);
}

export function isCompositeKind(kind: DocKind): boolean {
  return compositeKinds.has(kind);
}

/**
 * Narrow a node to the variant with the given kind
 */
export function isKind<K extends DocKind>(node: DocNode | undefined, kind: K): node is Extract<DocNode, { kind: K }> {
  return node !== undefined && node.kind === kind;
}

// Flag helpers

export function hasNodeFlag(node: DocNode, flag: DocFlags): boolean {
  return (node.flags & flag) !== 0;
}

export function addNodeFlag(node: DocNode, flag: DocFlags): void {
  node.flags |= flag;
}

export function isPreformatted(node: DocNode): boolean {
  return hasNodeFlag(node, DocFlags.InsidePreformatted);
}

/**
 * Inline formulas are stored wrapped in single dollars (`$x^2$`)
 */
export function isInlineFormula(node: FormulaNode): boolean {
  const text = node.text;
  return text.length >= 2 && text.startsWith('$') && text.endsWith('$') && !text.startsWith('$$');
}
