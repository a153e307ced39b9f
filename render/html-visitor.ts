/**
 * HTML Document Visitor
 *
 * Renders a document tree into an HtmlOutputGenerator. Block constructs met
 * inside a paragraph close it and reopen it afterwards, as decided by the
 * paragraph balancer.
 */

import {
  DiagramType,
  DocKind,
  HtmlListType,
  ImageType,
  IncOperatorType,
  IncludeType,
  ParamDirection,
  ParamSectType,
  SimpleSectType,
  Style,
  VerbatimType,
  isInlineFormula,
  isPreformatted,
  type CompositeNode,
  type DiagramFileNode,
  type DocNode,
  type FormulaNode,
  type HtmlAttrib,
  type ImageNode,
  type IncOperatorNode,
  type IncludeNode,
  type LeafNode,
  type ParamListNode,
  type ParamSectNode,
  type SimpleSectNode,
  type StyleChangeNode,
  type VerbatimNode,
  type XRefItemNode
} from '../parser/ast-types.js';
import type { DocVisitor } from '../parser/ast-traversal.js';
import { renderSymbol } from '../parser/entities.js';
import { DiagnosticCategory, DiagnosticSeverity, ParseErrorCode } from '../parser/parser-interfaces.js';
import { baseName, fileExtension, isAbsoluteUrl } from '../parser/parser-utils.js';
import { ensureTableGrid } from '../parser/table-grid.js';
import {
  convertToHtml,
  escapeQuotedAttr,
  escapeXml,
  type HtmlOutputGenerator
} from './html-output.js';
import type { DiagramKind, HighlightRequest, LabelKey } from './output-interfaces.js';
import {
  getParagraphContext,
  paragraphClasses,
  paragraphNeedsTag,
  shouldCloseParagraphBefore,
  shouldReopenParagraphAfter
} from './paragraph-balancer.js';
import type { RenderContext } from './render-context.js';

const listTypes = ['1', 'a', 'i', 'A'];

const simpleSectHeadings: Partial<Record<SimpleSectType, LabelKey>> = {
  [SimpleSectType.See]: 'seeAlso',
  [SimpleSectType.Return]: 'returns',
  [SimpleSectType.Author]: 'author',
  [SimpleSectType.Authors]: 'authors',
  [SimpleSectType.Version]: 'version',
  [SimpleSectType.Since]: 'since',
  [SimpleSectType.Date]: 'date',
  [SimpleSectType.Note]: 'note',
  [SimpleSectType.Warning]: 'warning',
  [SimpleSectType.Pre]: 'precondition',
  [SimpleSectType.Post]: 'postcondition',
  [SimpleSectType.Copyright]: 'copyright',
  [SimpleSectType.Invar]: 'invariant',
  [SimpleSectType.Remark]: 'remarks',
  [SimpleSectType.Attention]: 'attention',
};

const simpleSectClasses: Record<SimpleSectType, string> = {
  [SimpleSectType.Unknown]: 'unknown',
  [SimpleSectType.See]: 'see',
  [SimpleSectType.Return]: 'return',
  [SimpleSectType.Author]: 'author',
  [SimpleSectType.Authors]: 'authors',
  [SimpleSectType.Version]: 'version',
  [SimpleSectType.Since]: 'since',
  [SimpleSectType.Date]: 'date',
  [SimpleSectType.Note]: 'note',
  [SimpleSectType.Warning]: 'warning',
  [SimpleSectType.Copyright]: 'copyright',
  [SimpleSectType.Pre]: 'pre',
  [SimpleSectType.Post]: 'post',
  [SimpleSectType.Invar]: 'invariant',
  [SimpleSectType.Remark]: 'remark',
  [SimpleSectType.Attention]: 'attention',
  [SimpleSectType.User]: 'par',
  [SimpleSectType.Rcs]: 'rcs',
};

const paramSects: Record<ParamSectType, { className: string; heading: LabelKey }> = {
  [ParamSectType.Param]: { className: 'params', heading: 'parameters' },
  [ParamSectType.RetVal]: { className: 'retval', heading: 'returnValues' },
  [ParamSectType.Exception]: { className: 'exception', heading: 'exceptions' },
  [ParamSectType.TemplateParam]: { className: 'tparams', heading: 'templateParameters' },
};

const directionLabels: Record<ParamDirection, string> = {
  [ParamDirection.Unspecified]: '',
  [ParamDirection.In]: '[in]',
  [ParamDirection.Out]: '[out]',
  [ParamDirection.InOut]: '[in,out]',
};

const styleTags: Record<Style, string> = {
  [Style.Bold]: 'b',
  [Style.Italic]: 'em',
  [Style.Code]: 'code',
  [Style.Center]: 'center',
  [Style.Small]: 'small',
  [Style.Subscript]: 'sub',
  [Style.Superscript]: 'sup',
  [Style.Preformatted]: 'pre',
  [Style.Span]: 'span',
  [Style.Div]: 'div',
};

const diagramFiles: Record<DiagramType, { kind: DiagramKind; prefix: string; className: string }> = {
  [DiagramType.Dot]: { kind: 'dot', prefix: 'dot_', className: 'dotgraph' },
  [DiagramType.Msc]: { kind: 'msc', prefix: 'msc_', className: 'mscgraph' },
  [DiagramType.Dia]: { kind: 'dia', prefix: 'dia_', className: 'diagraph' },
};

/**
 * Attributes with a value, as ` name="value"`
 */
export function htmlAttribsToString(attribs: readonly HtmlAttrib[]): string {
  let result = '';
  for (const attr of attribs) {
    if (attr.value) result += ` ${attr.name}="${escapeXml(attr.value)}"`;
  }
  return result;
}

/**
 * Anchor name for an index word: `a` followed by the word, with every byte
 * outside `[A-Za-z0-9._-]` written as `:hh`
 */
export function indexWordToAnchor(word: string): string {
  let result = 'a';
  for (const byte of new TextEncoder().encode(word)) {
    const ch = String.fromCharCode(byte);
    if (/^[A-Za-z0-9._-]$/.test(ch)) result += ch;
    else result += `:${byte.toString(16).padStart(2, '0')}`;
  }
  return result;
}

function correctUrl(url: string, relPath: string): string {
  return relPath && !isAbsoluteUrl(url) && !url.startsWith('/') ? relPath + url : url;
}

function stripExtension(name: string): string {
  const base = baseName(name);
  const dot = base.indexOf('.');
  return dot === -1 ? base : base.slice(0, dot);
}

export interface HtmlVisitorOptions {
  /** Reported with render diagnostics */
  fileName?: string;

  /** Language of code blocks without their own hint */
  language?: string;
}

export class HtmlDocVisitor implements DocVisitor {
  private insidePre = false;
  private readonly fileName: string;
  private readonly language: string;

  constructor(
    private readonly out: HtmlOutputGenerator,
    private readonly ctx: RenderContext,
    options: HtmlVisitorOptions = {}
  ) {
    this.fileName = options.fileName ?? '<comment>';
    this.language = options.language ?? '';
  }

  // ---------------------------------------------------------------------------
  // Leaf nodes
  // ---------------------------------------------------------------------------

  visit(node: LeafNode): void {
    // include operators manage the hidden state themselves
    if (this.out.hidden && node.kind !== DocKind.IncOperator) return;
    const out = this.out;

    switch (node.kind) {
      case DocKind.Word:
        out.docify(node.word);
        break;
      case DocKind.LinkedWord:
        out.startLink(node);
        out.docify(node.word);
        out.endLink();
        break;
      case DocKind.WhiteSpace:
        out.writeString(this.insidePre ? node.chars : ' ');
        break;
      case DocKind.Symbol: {
        const rendered = renderSymbol(node.symbol, 'html');
        if (rendered === undefined) {
          this.warn(ParseErrorCode.UNSUPPORTED_SYMBOL, DiagnosticCategory.Syntax,
            `unsupported HTML entity found: ${node.symbol}`, node.symbol);
        } else {
          out.writeString(rendered);
        }
        break;
      }
      case DocKind.URL:
        if (node.isEmail) out.writeString(`<a href="${escapeXml(`mailto:${node.url}`)}">`);
        else out.writeString(`<a href="${node.url}">`);
        out.docify(node.url);
        out.writeString('</a>');
        break;
      case DocKind.LineBreak:
        out.lineBreak();
        break;
      case DocKind.HorRuler:
        this.forceEndParagraph(node);
        out.writeRuler();
        this.forceStartParagraph(node);
        break;
      case DocKind.Anchor:
        out.writeAnchor(node.anchor);
        break;
      case DocKind.StyleChange:
        this.visitStyleChange(node);
        break;
      case DocKind.Verbatim:
        this.visitVerbatim(node);
        break;
      case DocKind.Include:
        this.visitInclude(node);
        break;
      case DocKind.IncOperator:
        this.visitIncOperator(node);
        break;
      case DocKind.Formula:
        this.visitFormula(node);
        break;
      case DocKind.IndexEntry: {
        let anchor = indexWordToAnchor(node.entry);
        if (node.memberAnchor) anchor = `${node.memberAnchor}_${anchor}`;
        out.writeString(`<a name="${anchor}"></a>`);
        out.addIndexItem(node.scope, anchor, node.entry);
        break;
      }
      case DocKind.SimpleSectSep:
        out.writeString('</dd>\n<dd>\n');
        break;
      case DocKind.Cite:
        if (node.file) out.startLink(node);
        else out.writeString('<b>[');
        out.docify(node.text);
        if (node.file) out.endLink();
        else out.writeString(']</b>');
        break;
    }
  }

  private visitStyleChange(node: StyleChangeNode): void {
    const tag = styleTags[node.style];
    const out = this.out;

    if (node.enable) {
      const block = node.style === Style.Center || node.style === Style.Div || node.style === Style.Preformatted;
      if (block) this.forceEndParagraph(node);
      out.writeString(`<${tag}${htmlAttribsToString(node.attribs)}>`);
      if (node.style === Style.Preformatted) this.insidePre = true;
      return;
    }

    if (node.style === Style.Preformatted) this.insidePre = false;
    out.writeString(`</${tag}>`);
    if (node.style === Style.Center || node.style === Style.Div || node.style === Style.Preformatted) {
      this.forceStartParagraph(node);
    }
  }

  private highlight(request: Omit<HighlightRequest, 'showLineNumbers'>, showLineNumbers: boolean): void {
    this.ctx.highlighter.parseCode(this.out, { ...request, showLineNumbers });
  }

  private visitVerbatim(node: VerbatimNode): void {
    const out = this.out;
    switch (node.verbatimType) {
      case VerbatimType.Code:
        this.forceEndParagraph(node);
        out.startCodeFragment();
        this.highlight({
          language: node.language || this.language,
          code: node.text,
          context: node.context,
          isExample: node.isExample,
          exampleFile: node.exampleFile
        }, false);
        out.endCodeFragment();
        this.forceStartParagraph(node);
        break;
      case VerbatimType.Verbatim:
        this.forceEndParagraph(node);
        out.writeString('<pre class="fragment">');
        out.docify(node.text);
        out.writeString('</pre>');
        this.forceStartParagraph(node);
        break;
      case VerbatimType.HtmlOnly:
        if (node.isBlock) this.forceEndParagraph(node);
        out.writeString(node.text);
        if (node.isBlock) this.forceStartParagraph(node);
        break;
      case VerbatimType.ManOnly:
      case VerbatimType.LatexOnly:
      case VerbatimType.XmlOnly:
      case VerbatimType.RtfOnly:
      case VerbatimType.DocbookOnly:
        break;
      case VerbatimType.Dot:
        this.visitInlineDiagram(node, 'dot', 'inline_dotgraph_', 'dotgraph', node.text);
        break;
      case VerbatimType.Msc:
        this.visitInlineDiagram(node, 'msc', 'inline_mscgraph_', 'mscgraph', `msc {${node.text}}`);
        break;
      case VerbatimType.PlantUML:
        this.visitInlineDiagram(node, 'plantuml', 'inline_umlgraph_', 'plantumlgraph', node.text);
        break;
    }
  }

  private visitInlineDiagram(node: VerbatimNode, kind: DiagramKind, prefix: string, className: string, source: string): void {
    this.forceEndParagraph(node);
    this.out.writeString(`<div class="${className}">\n`);
    const name = this.ctx.nextDiagramName(prefix);
    this.writeDiagram(kind, name, { source }, '');
    this.out.writeString('</div>\n');
    this.forceStartParagraph(node);
  }

  private writeDiagram(kind: DiagramKind, name: string, input: { source?: string; file?: string }, relPath: string): void {
    const imageFormat = kind === 'dia' ? 'png' : this.ctx.imageFormat;
    const result = this.ctx.diagramTool.render({
      kind,
      baseName: name,
      imageFormat,
      outputDirectory: this.ctx.outputDirectory,
      ...input
    });
    if (!result.ok) {
      this.warn(ParseErrorCode.DIAGRAM_FAILED, DiagnosticCategory.Resource,
        `unable to render ${kind} diagram ${name}: ${result.reason}`, name);
      return;
    }
    if (imageFormat === 'svg') {
      this.out.writeString(`<object type="image/svg+xml" data="${relPath}${result.imageFile}"></object>\n`);
    } else {
      this.out.writeString(`<img src="${relPath}${result.imageFile}" alt="${name}"/>\n`);
    }
  }

  private visitInclude(node: IncludeNode): void {
    const out = this.out;
    const request = {
      language: fileExtension(node.file),
      code: node.text,
      context: node.context,
      isExample: node.isExample,
      exampleFile: node.exampleFile
    };

    switch (node.includeType) {
      case IncludeType.Include:
      case IncludeType.Snippet:
      case IncludeType.IncWithLines:
        this.forceEndParagraph(node);
        out.startCodeFragment();
        this.highlight(request, node.includeType === IncludeType.IncWithLines);
        out.endCodeFragment();
        this.forceStartParagraph(node);
        break;
      case IncludeType.DontInclude:
      case IncludeType.LatexInclude:
        break;
      case IncludeType.HtmlInclude:
        out.writeString(node.text);
        break;
      case IncludeType.VerbInclude:
        this.forceEndParagraph(node);
        out.writeString('<pre class="fragment">');
        out.docify(node.text);
        out.writeString('</pre>');
        this.forceStartParagraph(node);
        break;
    }
  }

  /**
   * Consecutive operators share one code fragment; between them output is hidden
   */
  private visitIncOperator(node: IncOperatorNode): void {
    const out = this.out;
    if (node.isFirst) {
      out.startCodeFragment();
      out.pushHidden();
    }

    if (node.opType !== IncOperatorType.Skip) {
      out.popHidden();
      if (!out.hidden) {
        this.highlight({
          language: this.language,
          code: node.text,
          context: node.context,
          isExample: node.isExample,
          exampleFile: node.exampleFile
        }, false);
      }
      out.pushHidden();
    }

    if (node.isLast) {
      out.popHidden();
      out.endCodeFragment();
    } else {
      out.writeString('\n');
    }
  }

  private visitFormula(node: FormulaNode): void {
    const out = this.out;
    const display = !isInlineFormula(node);
    if (display) {
      this.forceEndParagraph(node);
      out.writeString('<p class="formulaDsp">\n');
    }

    if (this.ctx.useMathJax) {
      if (display) {
        out.writeString(convertToHtml(node.text));
      } else {
        out.writeString(`\\(${convertToHtml(node.text.slice(1, -1))}\\)`);
      }
    } else {
      out.writeString(`<img class="formula${display ? 'Dsp' : 'Inl'}" alt="${escapeQuotedAttr(node.text)}"` +
        ` src="${node.relPath}${node.name}.png"/>`);
    }

    if (display) {
      out.writeString('\n</p>\n');
      this.forceStartParagraph(node);
    }
  }

  // ---------------------------------------------------------------------------
  // Composite nodes
  // ---------------------------------------------------------------------------

  visitPre(node: CompositeNode): void {
    const out = this.out;

    switch (node.kind) {
      case DocKind.Root:
      case DocKind.Text:
      case DocKind.Title:
      case DocKind.Copy:
      case DocKind.ParBlock:
        break;
      case DocKind.Internal:
        if (!this.ctx.internalDocs) out.pushHidden();
        break;
      case DocKind.Para:
        if (paragraphNeedsTag(node, 'start')) out.startParagraph(paragraphClasses[getParagraphContext(node).code]);
        break;
      case DocKind.AutoList:
        this.forceEndParagraph(node);
        out.writeString(node.isEnumList ? `<ol type="${listTypes[node.depth % listTypes.length]}">` : '<ul>');
        if (!isPreformatted(node)) out.writeString('\n');
        break;
      case DocKind.AutoListItem:
      case DocKind.SimpleListItem:
        out.writeString('<li>');
        break;
      case DocKind.XRefItem:
        this.visitPreXRefItem(node);
        break;
      case DocKind.Image:
        this.visitPreImage(node);
        break;
      case DocKind.DiagramFile:
        this.visitPreDiagramFile(node);
        break;
      case DocKind.HRef: {
        const url = node.url.startsWith('mailto:') ? node.url : correctUrl(node.url, node.relPath);
        out.writeString(`<a href="${escapeXml(url)}"${htmlAttribsToString(node.attribs)}>`);
        break;
      }
      case DocKind.Link:
        out.startLink(node);
        break;
      case DocKind.Ref:
        if (node.file) out.startLink({ ...node, anchor: node.isSubPage ? '' : node.anchor });
        if (node.children.length === 0) out.docify(node.targetTitle);
        break;
      case DocKind.InternalRef:
        out.startLink({ ref: '', file: node.file, relPath: node.relPath, anchor: node.anchor });
        break;
      case DocKind.HtmlList:
        this.forceEndParagraph(node);
        out.writeString(`<${node.listType === HtmlListType.Ordered ? 'ol' : 'ul'}${htmlAttribsToString(node.attribs)}>\n`);
        break;
      case DocKind.HtmlListItem:
        out.writeString(`<li${htmlAttribsToString(node.attribs)}>`);
        if (!isPreformatted(node)) out.writeString('\n');
        break;
      case DocKind.HtmlDescList:
        this.forceEndParagraph(node);
        out.writeString(`<dl${htmlAttribsToString(node.attribs)}>\n`);
        break;
      case DocKind.HtmlDescTitle:
        out.writeString(`<dt${htmlAttribsToString(node.attribs)}>`);
        break;
      case DocKind.HtmlDescData:
        out.writeString(`<dd${htmlAttribsToString(node.attribs)}>`);
        break;
      case DocKind.HtmlTable: {
        this.forceEndParagraph(node);
        ensureTableGrid(node);
        const attrs = htmlAttribsToString(node.attribs);
        out.writeString(attrs ? `<table${attrs}>\n` : '<table class="doxtable">\n');
        break;
      }
      case DocKind.HtmlRow:
        out.writeString(`<tr${htmlAttribsToString(node.attribs)}>\n`);
        break;
      case DocKind.HtmlCell:
        out.writeString(`<${node.isHeading ? 'th' : 'td'}${htmlAttribsToString(node.attribs)}>`);
        break;
      case DocKind.HtmlCaption:
        out.writeString(`<caption${htmlAttribsToString(node.attribs)}>`);
        break;
      case DocKind.HtmlBlockQuote: {
        this.forceEndParagraph(node);
        const attrs = htmlAttribsToString(node.attribs);
        out.writeString(attrs ? `<blockquote${attrs}>\n` : '<blockquote class="doxtable">\n');
        break;
      }
      case DocKind.HtmlHeader:
        this.forceEndParagraph(node);
        out.writeString(`<h${node.level}${htmlAttribsToString(node.attribs)}>`);
        break;
      case DocKind.Section:
        this.forceEndParagraph(node);
        out.startSection(node.anchor, node.level);
        out.docify(node.title);
        out.endSection(node.level);
        break;
      case DocKind.SecRefList:
        this.forceEndParagraph(node);
        out.writeString('<div class="multicol">\n<ul>\n');
        break;
      case DocKind.SecRefItem: {
        const ext = this.ctx.htmlFileExtension;
        const file = node.file.endsWith(ext) ? node.file : node.file + ext;
        out.writeString(`<li><a href="${node.relPath}${file}#${node.anchor}">`);
        break;
      }
      case DocKind.SimpleList:
        this.forceEndParagraph(node);
        out.writeString('<ul>');
        if (!isPreformatted(node)) out.writeString('\n');
        break;
      case DocKind.SimpleSect:
        this.visitPreSimpleSect(node);
        break;
      case DocKind.ParamSect:
        this.visitPreParamSect(node);
        break;
      case DocKind.ParamList:
        this.visitPreParamList(node);
        break;
    }
  }

  visitPost(node: CompositeNode): void {
    const out = this.out;

    switch (node.kind) {
      case DocKind.Root:
      case DocKind.Text:
      case DocKind.Copy:
      case DocKind.ParBlock:
        break;
      case DocKind.Internal:
        if (!this.ctx.internalDocs) out.popHidden();
        break;
      case DocKind.Para:
        if (paragraphNeedsTag(node, 'end')) out.endParagraph();
        break;
      case DocKind.Title:
        out.writeString('</dt><dd>');
        break;
      case DocKind.AutoList:
        out.writeString(node.isEnumList ? '</ol>' : '</ul>');
        if (!isPreformatted(node)) out.writeString('\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.AutoListItem:
      case DocKind.SimpleListItem:
        out.writeString('</li>');
        if (!isPreformatted(node)) out.writeString('\n');
        break;
      case DocKind.XRefItem:
        if (!node.title) break;
        out.writeString('</dd></dl>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.Image:
        if (node.imageType !== ImageType.Html) {
          out.popHidden();
          break;
        }
        if (node.children.length > 0) out.writeString('</div>');
        out.writeString('</div>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.DiagramFile:
        if (node.children.length > 0) out.writeString('</div>\n');
        out.writeString('</div>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.HRef:
        out.writeString('</a>');
        break;
      case DocKind.Link:
        out.endLink();
        break;
      case DocKind.Ref:
        if (node.file) out.endLink();
        break;
      case DocKind.InternalRef:
        out.endLink();
        out.writeString(' ');
        break;
      case DocKind.HtmlList:
        out.writeString(node.listType === HtmlListType.Ordered ? '</ol>' : '</ul>');
        if (!isPreformatted(node)) out.writeString('\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.HtmlListItem:
        out.writeString('</li>\n');
        break;
      case DocKind.HtmlDescList:
        out.writeString('</dl>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.HtmlDescTitle:
        out.writeString('</dt>\n');
        break;
      case DocKind.HtmlDescData:
        out.writeString('</dd>\n');
        break;
      case DocKind.HtmlTable:
        out.writeString('</table>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.HtmlRow:
        out.writeString('</tr>\n');
        break;
      case DocKind.HtmlCell:
        out.writeString(node.isHeading ? '</th>' : '</td>');
        break;
      case DocKind.HtmlCaption:
        out.writeString('</caption>\n');
        break;
      case DocKind.HtmlBlockQuote:
        out.writeString('</blockquote>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.HtmlHeader:
        out.writeString(`</h${node.level}>\n`);
        this.forceStartParagraph(node);
        break;
      case DocKind.Section:
        this.forceStartParagraph(node);
        break;
      case DocKind.SecRefList:
        out.writeString('</ul>\n</div>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.SecRefItem:
        out.writeString('</a></li>\n');
        break;
      case DocKind.SimpleList:
        out.writeString('</ul>');
        if (!isPreformatted(node)) out.writeString('\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.SimpleSect:
        out.writeString('</dd></dl>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.ParamSect:
        out.writeString('  </table>\n  </dd>\n</dl>\n');
        this.forceStartParagraph(node);
        break;
      case DocKind.ParamList:
        out.writeString('</td></tr>\n');
        break;
    }
  }

  private visitPreXRefItem(node: XRefItemNode): void {
    if (!node.title) return;
    this.forceEndParagraph(node);

    // anonymous enums have no page to link to
    const anonymous = node.file === '@';
    let markup = `<dl class="${node.key}"><dt><b>`;
    if (!anonymous) {
      markup += `<a class="el" href="${node.relPath}${node.file}${this.ctx.htmlFileExtension}#${node.anchor}">`;
    }
    this.out.writeString(markup);
    this.out.docify(node.title);
    this.out.writeString(`:${anonymous ? '' : '</a>'}</b></dt><dd>`);
  }

  private visitPreImage(node: ImageNode): void {
    const out = this.out;
    if (node.imageType !== ImageType.Html) {
      out.pushHidden();
      return;
    }

    this.forceEndParagraph(node);
    const name = baseName(node.name.replace(/\\/g, '/'));
    let sizeAttribs = '';
    if (node.width) sizeAttribs += ` width="${node.width}"`;
    if (node.height) sizeAttribs += ` height="${node.height}"`;
    const attrs = sizeAttribs + htmlAttribsToString(node.attribs);
    const isSvg = node.name.endsWith('.svg');

    out.writeString('<div class="image">\n');
    if (!node.url) {
      if (isSvg) {
        out.writeString(`<object type="image/svg+xml" data="${node.relPath}${node.name}"${attrs}>${name}</object>\n`);
      } else {
        out.writeString(`<img src="${node.relPath}${node.name}" alt="${name}"${attrs}/>\n`);
      }
    } else {
      const url = correctUrl(node.url, node.relPath);
      if (isSvg) out.writeString(`<object type="image/svg+xml" data="${url}"${attrs}></object>\n`);
      else out.writeString(`<img src="${url}"${attrs}/>\n`);
    }
    if (node.children.length > 0) out.writeString('<div class="caption">\n');
  }

  private visitPreDiagramFile(node: DiagramFileNode): void {
    const { kind, prefix, className } = diagramFiles[node.diagramType];
    this.forceEndParagraph(node);
    this.out.writeString(`<div class="${className}">\n`);
    if (!this.out.hidden) this.writeDiagram(kind, prefix + stripExtension(node.file), { file: node.file }, node.relPath);
    if (node.children.length > 0) this.out.writeString('<div class="caption">\n');
  }

  private visitPreSimpleSect(node: SimpleSectNode): void {
    const out = this.out;
    this.forceEndParagraph(node);
    out.writeString(`<dl class="section ${simpleSectClasses[node.sectType]}"><dt>`);
    const heading = simpleSectHeadings[node.sectType];
    if (heading) out.writeString(this.ctx.translator.translate(heading));

    // user and RCS headings close the term after their title
    const titled = node.sectType === SimpleSectType.User || node.sectType === SimpleSectType.Rcs;
    if (!titled || !node.title) out.writeString('</dt><dd>');
  }

  private visitPreParamSect(node: ParamSectNode): void {
    const { className, heading } = paramSects[node.sectType];
    this.forceEndParagraph(node);
    this.out.writeString(`<dl class="${className}"><dt>${this.ctx.translator.translate(heading)}</dt><dd>\n` +
      `  <table class="${className}">\n`);
  }

  private visitPreParamList(node: ParamListNode): void {
    const out = this.out;
    const sect = node.parent?.kind === DocKind.ParamSect ? node.parent : undefined;

    out.writeString('    <tr>');
    if (sect?.hasInOutSpecifier) {
      out.writeString(`<td class="paramdir">${directionLabels[node.direction]}</td>`);
    }
    if (sect?.hasTypeSpecifier) {
      out.writeString('<td class="paramtype">');
      node.paramTypes.forEach((type, index) => {
        if (index > 0) out.writeString('&#160;|&#160;');
        this.visit(type);
      });
      out.writeString('</td>');
    }
    out.writeString('<td class="paramname">');
    node.params.forEach((param, index) => {
      if (index > 0) out.writeString(',');
      this.visit(param);
    });
    out.writeString('</td><td>');
  }

  // ---------------------------------------------------------------------------
  // Paragraph balancing
  // ---------------------------------------------------------------------------

  private forceEndParagraph(node: DocNode): void {
    if (shouldCloseParagraphBefore(node)) this.out.writeString('</p>');
  }

  private forceStartParagraph(node: DocNode): void {
    if (shouldReopenParagraphAfter(node)) this.out.writeString('<p>');
  }

  private warn(code: ParseErrorCode, category: DiagnosticCategory, message: string, subject: string): void {
    this.ctx.diagnostics.report({
      severity: DiagnosticSeverity.Warning,
      category,
      code,
      message,
      subject,
      fileName: this.fileName,
      line: 0,
      pos: 0,
      end: 0
    });
  }
}
