/**
 * Core Parser Implementation
 *
 * Recursive descent over the scanner's token stream. Every construct
 * handler returns a ParseOutcome; a handler that meets a token belonging to
 * an enclosing construct hands it back as `Retry` and the enclosing level
 * re-dispatches it.
 */

import {
  DiagnosticCategory,
  DiagnosticSeverity,
  FormulaRegistry,
  ParseErrorCode,
  type DiagnosticSink,
  type DocParser,
  type ParseDiagnostic,
  type ParseInput,
  type ParseOptions,
  type ParseResult,
  type ResolvedLink
} from './parser-interfaces.js';

import {
  DiagramType,
  DocFlags,
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
  addNodeFlag,
  hasNodeFlag,
  isKind,
  type CompositeNode,
  type HtmlAttrib,
  type HtmlCellNode,
  type HtmlRowNode,
  type HtmlTableNode,
  type ParaNode,
  type ParamListNode,
  type ParamNameNode,
  type ParamSectNode,
  type RootNode,
  type SectionNode,
  type SimpleSectNode,
  type TextNode
} from './ast-types.js';

import {
  appendChild,
  createAnchorNode,
  createAutoListItemNode,
  createAutoListNode,
  createCiteNode,
  createCopyNode,
  createDiagramFileNode,
  createFormulaNode,
  createHRefNode,
  createHorRulerNode,
  createHtmlBlockQuoteNode,
  createHtmlCaptionNode,
  createHtmlCellNode,
  createHtmlDescDataNode,
  createHtmlDescListNode,
  createHtmlDescTitleNode,
  createHtmlHeaderNode,
  createHtmlListItemNode,
  createHtmlListNode,
  createHtmlRowNode,
  createHtmlTableNode,
  createImageNode,
  createIncOperatorNode,
  createIncludeNode,
  createIndexEntryNode,
  createInternalNode,
  createInternalRefNode,
  createLineBreakNode,
  createLinkNode,
  createLinkedWordNode,
  createParBlockNode,
  createParaNode,
  createParamListNode,
  createParamSectNode,
  createRefNode,
  createRootNode,
  createSecRefItemNode,
  createSecRefListNode,
  createSectionNode,
  createSimpleListItemNode,
  createSimpleListNode,
  createSimpleSectNode,
  createSimpleSectSepNode,
  createStyleChangeNode,
  createSymbolNode,
  createTextRootNode,
  createTitleNode,
  createURLNode,
  createVerbatimNode,
  createWhiteSpaceNode,
  createWordNode,
  createXRefItemNode,
  lastChild,
  moveChildren,
  removeTrailingWhitespace
} from './ast-factory.js';

import { findAncestor } from './ast-traversal.js';
import { applyIncludeOperator, createIncludeBuffer, type IncludeBuffer } from './include-operators.js';
import { computeTableGrid } from './table-grid.js';
import {
  extractBlock,
  getAttribute,
  isAbsoluteUrl,
  lineOfOffset,
  parseParamDirection,
  relativePathToRoot,
  trimBlockText,
  withoutAttribute
} from './parser-utils.js';
import { createScanner, type Scanner } from './scanner/scanner.js';
import { SyntaxKind, TokenFlags, describeToken, type Token } from './scanner/token-types.js';
import { logDebug } from './debug.js';

// =============================================================================
// Outcomes
// =============================================================================

export enum OutcomeKind {
  /** Token consumed, keep going at this level */
  Continue,

  /** Input exhausted */
  EndOfInput,

  /** Blank line (or `<p>`) ended the current paragraph */
  NewParagraph,

  /** Token belongs to an enclosing construct */
  Retry
}

export type ParseOutcome =
  | { kind: OutcomeKind.Continue }
  | { kind: OutcomeKind.EndOfInput }
  | { kind: OutcomeKind.NewParagraph; token: Token }
  | { kind: OutcomeKind.Retry; token: Token };

const CONTINUE: ParseOutcome = { kind: OutcomeKind.Continue };
const END_OF_INPUT: ParseOutcome = { kind: OutcomeKind.EndOfInput };

function retry(token: Token): ParseOutcome {
  return { kind: OutcomeKind.Retry, token };
}

function newParagraph(token: Token): ParseOutcome {
  return { kind: OutcomeKind.NewParagraph, token };
}

/**
 * What a paragraph container does when one of its paragraphs ended
 */
type ParagraphStep = { again: Token } | { done: ParseOutcome };

// =============================================================================
// Command tables
// =============================================================================

const sectionLevels: ReadonlyMap<string, number> = new Map([
  ['section', 1],
  ['subsection', 2],
  ['subsubsection', 3],
  ['paragraph', 4],
]);

const simpleSectionCommands: ReadonlyMap<string, SimpleSectType> = new Map([
  ['see', SimpleSectType.See],
  ['sa', SimpleSectType.See],
  ['return', SimpleSectType.Return],
  ['returns', SimpleSectType.Return],
  ['result', SimpleSectType.Return],
  ['author', SimpleSectType.Author],
  ['authors', SimpleSectType.Authors],
  ['version', SimpleSectType.Version],
  ['since', SimpleSectType.Since],
  ['date', SimpleSectType.Date],
  ['note', SimpleSectType.Note],
  ['warning', SimpleSectType.Warning],
  ['pre', SimpleSectType.Pre],
  ['post', SimpleSectType.Post],
  ['copyright', SimpleSectType.Copyright],
  ['invariant', SimpleSectType.Invar],
  ['remark', SimpleSectType.Remark],
  ['remarks', SimpleSectType.Remark],
  ['attention', SimpleSectType.Attention],
  ['par', SimpleSectType.User],
]);

const paramSectionCommands: ReadonlyMap<string, ParamSectType> = new Map([
  ['param', ParamSectType.Param],
  ['tparam', ParamSectType.TemplateParam],
  ['retval', ParamSectType.RetVal],
  ['exception', ParamSectType.Exception],
  ['throw', ParamSectType.Exception],
  ['throws', ParamSectType.Exception],
]);

const xrefCommands: ReadonlySet<string> = new Set(['todo', 'bug', 'test', 'deprecated', 'xrefitem']);

const defaultXRefTitles: Readonly<Record<string, string>> = {
  todo: 'Todo',
  bug: 'Bug',
  test: 'Test',
  deprecated: 'Deprecated',
};

const verbatimCommands: ReadonlyMap<string, { type: VerbatimType; end: string }> = new Map([
  ['code', { type: VerbatimType.Code, end: 'endcode' }],
  ['verbatim', { type: VerbatimType.Verbatim, end: 'endverbatim' }],
  ['htmlonly', { type: VerbatimType.HtmlOnly, end: 'endhtmlonly' }],
  ['latexonly', { type: VerbatimType.LatexOnly, end: 'endlatexonly' }],
  ['xmlonly', { type: VerbatimType.XmlOnly, end: 'endxmlonly' }],
  ['rtfonly', { type: VerbatimType.RtfOnly, end: 'endrtfonly' }],
  ['manonly', { type: VerbatimType.ManOnly, end: 'endmanonly' }],
  ['docbookonly', { type: VerbatimType.DocbookOnly, end: 'enddocbookonly' }],
  ['dot', { type: VerbatimType.Dot, end: 'enddot' }],
  ['msc', { type: VerbatimType.Msc, end: 'endmsc' }],
  ['startuml', { type: VerbatimType.PlantUML, end: 'enduml' }],
]);

const includeCommands: ReadonlyMap<string, IncludeType> = new Map([
  ['include', IncludeType.Include],
  ['includelineno', IncludeType.IncWithLines],
  ['dontinclude', IncludeType.DontInclude],
  ['verbinclude', IncludeType.VerbInclude],
  ['htmlinclude', IncludeType.HtmlInclude],
  ['latexinclude', IncludeType.LatexInclude],
  ['snippet', IncludeType.Snippet],
]);

const includeOperatorCommands: ReadonlyMap<string, IncOperatorType> = new Map([
  ['line', IncOperatorType.Line],
  ['skip', IncOperatorType.Skip],
  ['skipline', IncOperatorType.SkipLine],
  ['until', IncOperatorType.Until],
]);

const wordStyleCommands: ReadonlyMap<string, Style> = new Map([
  ['b', Style.Bold],
  ['c', Style.Code],
  ['p', Style.Code],
  ['e', Style.Italic],
  ['em', Style.Italic],
  ['a', Style.Italic],
]);

const diagramFileCommands: ReadonlyMap<string, DiagramType> = new Map([
  ['dotfile', DiagramType.Dot],
  ['mscfile', DiagramType.Msc],
  ['diafile', DiagramType.Dia],
]);

const imageTypes: ReadonlyMap<string, ImageType> = new Map([
  ['html', ImageType.Html],
  ['latex', ImageType.Latex],
  ['rtf', ImageType.Rtf],
  ['docbook', ImageType.DocBook],
]);

const htmlStyleTags: ReadonlyMap<string, Style> = new Map([
  ['b', Style.Bold],
  ['strong', Style.Bold],
  ['i', Style.Italic],
  ['em', Style.Italic],
  ['code', Style.Code],
  ['tt', Style.Code],
  ['kbd', Style.Code],
  ['center', Style.Center],
  ['small', Style.Small],
  ['sub', Style.Subscript],
  ['sup', Style.Superscript],
  ['pre', Style.Preformatted],
  ['span', Style.Span],
  ['div', Style.Div],
]);

// Commands handled by other stages of a documentation pipeline
const ignoredCommands: ReadonlySet<string> = new Set(['brief', 'short', 'details']);

const strayEndCommands: ReadonlySet<string> = new Set([
  ...[...verbatimCommands.values()].map(v => v.end),
  'endlink', 'endsecreflist', 'refitem', 'f]', 'f}',
]);

// Ancestors that own simple-section style commands met inside them
const sectionBlockKinds: readonly DocKind[] = [DocKind.SimpleSect, DocKind.ParamSect, DocKind.ParamList, DocKind.XRefItem];

// Block containers that keep their content to themselves
const htmlContainerKinds: readonly DocKind[] = [
  DocKind.HtmlListItem, DocKind.HtmlCell, DocKind.HtmlDescData, DocKind.HtmlBlockQuote,
  DocKind.ParBlock, DocKind.Internal,
];

// =============================================================================
// Context
// =============================================================================

interface OpenStyle {
  style: Style;
  tagName: string;
  attribs: HtmlAttrib[];
  owner: ParaNode;
}

/**
 * Parser context for state management
 */
interface ParserContext {
  scanner: Scanner;
  input: ParseInput;
  text: string;
  fileName: string;
  sink: DiagnosticSink;
  diagnostics: ParseDiagnostic[];

  /** Token read ahead by an argument reader and handed back */
  pending: Token | undefined;

  /** Path prefix from the comment's output file to the output root */
  relPath: string;

  styleStack: OpenStyle[];

  /** Styles closed at the end of the last paragraph, reopened by the next */
  reopenStyles: OpenStyle[];

  includeBuffer: IncludeBuffer | undefined;
  insidePre: boolean;
}

// =============================================================================
// Token predicates
// =============================================================================

function isCommand(token: Token, ...names: string[]): boolean {
  return token.kind === SyntaxKind.Command && names.includes(token.value);
}

function isStartTag(token: Token, ...names: string[]): boolean {
  return token.kind === SyntaxKind.HtmlStartTag && names.includes(token.value);
}

function isEndTag(token: Token, ...names: string[]): boolean {
  return token.kind === SyntaxKind.HtmlEndTag && names.includes(token.value);
}

function isSectionCommand(token: Token): boolean {
  return token.kind === SyntaxKind.Command && sectionLevels.has(token.value);
}

function isAutolinkCandidate(word: string): boolean {
  return word.includes('::') || word.endsWith('()') || (word.startsWith('#') && word.length > 1);
}

function headerLevel(tagName: string): number {
  const match = /^h([1-6])$/.exec(tagName);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Reset first/last markers of the paragraphs directly below `container`
 */
function markParagraphs(container: CompositeNode): void {
  const paras = container.children.filter((c): c is ParaNode => c.kind === DocKind.Para);
  paras.forEach((para, index) => {
    para.isFirst = index === 0;
    para.isLast = index === paras.length - 1;
  });
}

function appendParagraph(container: CompositeNode, para: ParaNode): void {
  if (para.children.length > 0) appendChild(container, para);
}

/**
 * Nearest block container, stopping at constructs that scope their content
 */
function nearestHtmlContainer(node: CompositeNode): CompositeNode | undefined {
  return findAncestor(node, htmlContainerKinds);
}

function insideSectionBlock(para: ParaNode): boolean {
  for (let current = para.parent; current; current = current.parent) {
    if (sectionBlockKinds.includes(current.kind)) return true;
    if (htmlContainerKinds.includes(current.kind)) return false;
  }
  return false;
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Core parser implementation class
 */
class CommentParser implements DocParser {
  private readonly formulas: FormulaRegistry;
  private readonly autolink: boolean;
  private readonly listMarkers: ReadonlySet<string>;
  private xrefCounter = 0;

  constructor(private readonly options: ParseOptions) {
    this.formulas = options.formulas ?? new FormulaRegistry();
    this.autolink = options.autolinkSupport ?? true;
    this.listMarkers = new Set(options.listMarkers ?? ['-', '*', '+']);
  }

  parseDoc(input: ParseInput): ParseResult {
    const startTime = performance.now();
    const ctx = this.createContext(input);
    const root = createRootNode(input.singleLine ?? false);

    this.parseRoot(ctx, root);

    for (const open of [...ctx.styleStack, ...ctx.reopenStyles]) {
      this.warn(ctx, ParseErrorCode.UNCLOSED_TAG, DiagnosticCategory.Nesting,
        `end of comment block while expecting command </${open.tagName}>`, ctx.text.length, ctx.text.length, open.tagName);
    }

    return {
      root,
      diagnostics: ctx.diagnostics,
      parseTime: performance.now() - startTime
    };
  }

  parseText(text: string, fileName?: string): { root: TextNode; diagnostics: ParseDiagnostic[] } {
    const ctx = this.createContext({ text, fileName });
    const root = createTextRootNode();
    this.fillText(root, ctx.text, ctx);
    return { root, diagnostics: ctx.diagnostics };
  }

  private createContext(input: ParseInput): ParserContext {
    const fileName = input.fileName ?? '<comment>';
    const diagnostics: ParseDiagnostic[] = [];
    const external = this.options.diagnostics;
    const sink: DiagnosticSink = {
      report(d) {
        diagnostics.push(d);
        external?.report(d);
      }
    };
    const text = this.options.aliases ? this.options.aliases.expand(input.text, sink, fileName) : input.text;
    const scanner = createScanner();
    scanner.initText(text);

    return {
      scanner,
      input,
      text,
      fileName,
      sink,
      diagnostics,
      pending: undefined,
      relPath: input.linkFromIndex ? '' : relativePathToRoot(input.context?.outputFileBase),
      styleStack: [],
      reopenStyles: [],
      includeBuffer: undefined,
      insidePre: false
    };
  }

  // ---------------------------------------------------------------------------
  // Token access and diagnostics
  // ---------------------------------------------------------------------------

  private next(ctx: ParserContext): Token {
    const pending = ctx.pending;
    if (pending) {
      ctx.pending = undefined;
      return pending;
    }
    ctx.scanner.scan();
    return ctx.scanner.snapshot();
  }

  private skipWhitespace(ctx: ParserContext): Token {
    let token = this.next(ctx);
    while (token.kind === SyntaxKind.Whitespace || token.kind === SyntaxKind.NewParagraph) {
      token = this.next(ctx);
    }
    return token;
  }

  private warn(
    ctx: ParserContext,
    code: ParseErrorCode,
    category: DiagnosticCategory,
    message: string,
    pos: number,
    end: number,
    subject?: string
  ): void {
    const diagnostic: ParseDiagnostic = {
      severity: DiagnosticSeverity.Warning,
      category,
      code,
      message,
      subject,
      fileName: ctx.fileName,
      line: (ctx.input.startLine ?? 1) + lineOfOffset(ctx.text, pos) - 1,
      pos,
      end
    };
    logDebug('parser', `${diagnostic.fileName}:${diagnostic.line}`, message);
    ctx.sink.report(diagnostic);
  }

  private warnAt(ctx: ParserContext, token: Token, code: ParseErrorCode, category: DiagnosticCategory, message: string): void {
    this.warn(ctx, code, category, message, token.pos, token.end, token.value || undefined);
  }

  private resolve(ctx: ParserContext, target: string): ResolvedLink | undefined {
    return this.options.linkResolver?.resolve({
      target,
      context: ctx.input.context,
      isExample: ctx.input.isExample ?? false,
      exampleName: ctx.input.exampleName ?? ''
    });
  }

  private setInsidePre(ctx: ParserContext, value: boolean): void {
    ctx.insidePre = value;
    ctx.scanner.setInsidePre(value);
  }

  // ---------------------------------------------------------------------------
  // Root and sections
  // ---------------------------------------------------------------------------

  private parseRoot(ctx: ParserContext, root: RootNode): void {
    let token = this.next(ctx);
    for (;;) {
      let outcome: ParseOutcome;
      if (isSectionCommand(token)) {
        const level = sectionLevels.get(token.value) ?? 1;
        if (level > 1) {
          this.warnAt(ctx, token, ParseErrorCode.INVALID_SECTION, DiagnosticCategory.Structure,
            `found \\${token.value} at top level, expected \\section`);
        }
        outcome = this.parseSection(ctx, root, token);
      } else {
        const para = createParaNode(root);
        outcome = this.parsePara(ctx, para, token);
        appendParagraph(root, para);
      }

      if (outcome.kind === OutcomeKind.EndOfInput) break;
      if (outcome.kind === OutcomeKind.Retry) {
        if (isSectionCommand(outcome.token)) {
          token = outcome.token;
          continue;
        }
        this.warnAt(ctx, outcome.token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
          `unexpected ${describeToken(outcome.token)} at top level`);
      }
      token = this.next(ctx);
    }
    markParagraphs(root);
  }

  private parseSection(ctx: ParserContext, parent: RootNode | SectionNode, token: Token): ParseOutcome {
    const level = sectionLevels.get(token.value) ?? 1;
    const id = ctx.scanner.scanArgument();
    const title = id === undefined ? '' : ctx.scanner.scanRestOfLine();
    if (id === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a section label after \\${token.value}`);
    }

    const section = appendChild(parent, createSectionNode(parent, {
      level,
      id: id ?? '',
      title,
      anchor: id ?? '',
      file: ctx.input.context?.outputFileBase ?? ''
    }));

    let next = this.next(ctx);
    for (;;) {
      let outcome: ParseOutcome;
      if (isSectionCommand(next)) {
        if ((sectionLevels.get(next.value) ?? 1) <= level) {
          markParagraphs(section);
          return retry(next);
        }
        outcome = this.parseSection(ctx, section, next);
      } else {
        const para = createParaNode(section);
        outcome = this.parsePara(ctx, para, next);
        appendParagraph(section, para);
      }

      if (outcome.kind === OutcomeKind.EndOfInput) {
        markParagraphs(section);
        return outcome;
      }
      if (outcome.kind === OutcomeKind.Retry) {
        if (isSectionCommand(outcome.token)) {
          next = outcome.token;
          continue;
        }
        this.warnAt(ctx, outcome.token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
          `unexpected ${describeToken(outcome.token)} in section ${section.id}`);
      }
      next = this.next(ctx);
    }
  }

  // ---------------------------------------------------------------------------
  // Paragraphs
  // ---------------------------------------------------------------------------

  /**
   * Paragraphs of a container until `step` decides the container is done
   */
  private parseParagraphs(
    ctx: ParserContext,
    container: CompositeNode,
    first: Token,
    step: (outcome: ParseOutcome) => ParagraphStep
  ): ParseOutcome {
    let token = first;
    for (;;) {
      const para = createParaNode(container);
      const outcome = this.parsePara(ctx, para, token);
      appendParagraph(container, para);
      const decision = step(outcome);
      if ('done' in decision) {
        markParagraphs(container);
        return decision.done;
      }
      token = decision.again;
    }
  }

  private parsePara(ctx: ParserContext, para: ParaNode, first: Token): ParseOutcome {
    this.reopenStyles(ctx, para);
    let outcome = this.dispatchInPara(ctx, para, first);
    while (outcome.kind === OutcomeKind.Continue) {
      outcome = this.dispatchInPara(ctx, para, this.next(ctx));
    }
    this.finishPara(ctx, para);
    return outcome;
  }

  /**
   * Handle one token; tokens handed back by nested constructs are tried
   * here before they travel further up
   */
  private dispatchInPara(ctx: ParserContext, para: ParaNode, first: Token): ParseOutcome {
    let token = first;
    for (;;) {
      const outcome = this.handleParaToken(ctx, para, token);
      if (outcome.kind !== OutcomeKind.Retry || outcome.token === token) return outcome;
      token = outcome.token;
    }
  }

  private reopenStyles(ctx: ParserContext, para: ParaNode): void {
    for (const open of ctx.reopenStyles) {
      const node = appendChild(para, createStyleChangeNode(para, ctx.scanner.tokenStart, open.style, true, open.attribs));
      addNodeFlag(node, DocFlags.Synthetic);
      ctx.styleStack.push({ ...open, owner: para });
      if (open.style === Style.Preformatted) this.setInsidePre(ctx, true);
    }
    ctx.reopenStyles = [];
  }

  /**
   * Trim trailing whitespace and close the styles this paragraph opened
   */
  private finishPara(ctx: ParserContext, para: ParaNode): void {
    if (!ctx.insidePre) removeTrailingWhitespace(para);

    const closed: OpenStyle[] = [];
    for (let top = ctx.styleStack.at(-1); top && top.owner === para; top = ctx.styleStack.at(-1)) {
      ctx.styleStack.pop();
      closed.unshift(top);
      if (top.style === Style.Preformatted) this.setInsidePre(ctx, false);
    }

    if (para.children.every(child => hasNodeFlag(child, DocFlags.Synthetic))) {
      // nothing but reopened styles: carry them on to the next paragraph
      para.children.length = 0;
    } else {
      for (const open of [...closed].reverse()) {
        const node = appendChild(para, createStyleChangeNode(para, ctx.scanner.offsetNext, open.style, false));
        addNodeFlag(node, DocFlags.Synthetic);
      }
      removeTrailingWhitespace(para);
    }
    ctx.reopenStyles.push(...closed);
  }

  private handleParaToken(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    switch (token.kind) {
      case SyntaxKind.EndOfFileToken:
        return END_OF_INPUT;

      case SyntaxKind.NewParagraph:
        return newParagraph(token);

      case SyntaxKind.Whitespace:
        if (ctx.insidePre) {
          const node = appendChild(para, createWhiteSpaceNode(para, token.text));
          addNodeFlag(node, DocFlags.InsidePreformatted);
        } else if (!para.children.every(child => hasNodeFlag(child, DocFlags.Synthetic))) {
          appendChild(para, createWhiteSpaceNode(para, token.text));
        }
        return CONTINUE;

      case SyntaxKind.Word:
        this.addWord(ctx, para, token);
        return CONTINUE;

      case SyntaxKind.Symbol:
        appendChild(para, createSymbolNode(para, token.value));
        return CONTINUE;

      case SyntaxKind.Url:
        appendChild(para, createURLNode(para, token.value, (token.flags & TokenFlags.IsEmail) !== 0));
        return CONTINUE;

      case SyntaxKind.ListItem:
        return this.handleAutoList(ctx, para, token);

      case SyntaxKind.EndList:
        if (findAncestor(para, [DocKind.AutoList])) return retry(token);
        this.warnAt(ctx, token, ParseErrorCode.LONELY_TAG, DiagnosticCategory.Structure,
          'end of list marker found without any preceding list items');
        return CONTINUE;

      case SyntaxKind.Command:
        return this.handleCommand(ctx, para, token);

      case SyntaxKind.HtmlStartTag:
        return this.handleHtmlStartTag(ctx, para, token);

      case SyntaxKind.HtmlEndTag:
        return this.handleHtmlEndTag(ctx, para, token);

      case SyntaxKind.RcsTag:
        this.handleRcsTag(ctx, para, token);
        return CONTINUE;

      case SyntaxKind.Unknown:
        return CONTINUE;
    }
  }

  // ---------------------------------------------------------------------------
  // Words and plain text
  // ---------------------------------------------------------------------------

  private addWord(ctx: ParserContext, parent: CompositeNode, token: Token): void {
    const word = token.value;
    if (!ctx.insidePre && this.autolink) {
      const body = word.replace(/[.,;:!?]+$/, '');
      if (isAutolinkCandidate(body)) {
        const target = body.startsWith('#') ? body.slice(1) : body;
        const resolved = this.resolve(ctx, target);
        if (resolved) {
          appendChild(parent, createLinkedWordNode(parent, {
            word: target,
            ref: resolved.ref ?? '',
            file: resolved.file,
            relPath: ctx.relPath,
            anchor: resolved.anchor,
            tooltip: resolved.tooltip ?? ''
          }));
          if (body.length < word.length) appendChild(parent, createWordNode(parent, word.slice(body.length)));
          return;
        }
      }
    }
    const node = appendChild(parent, createWordNode(parent, word));
    if (ctx.insidePre) addNodeFlag(node, DocFlags.InsidePreformatted);
  }

  /**
   * Words, whitespace, symbols and URLs of `text` appended to `parent`
   */
  private fillText(parent: CompositeNode, text: string, ctx?: ParserContext): void {
    const scanner = createScanner();
    scanner.initText(text);
    for (;;) {
      scanner.scan();
      const token = scanner.snapshot();
      if (token.kind === SyntaxKind.EndOfFileToken) break;
      switch (token.kind) {
        case SyntaxKind.Word:
          appendChild(parent, createWordNode(parent, token.value));
          break;
        case SyntaxKind.Whitespace:
        case SyntaxKind.NewParagraph:
          if (parent.children.length > 0) appendChild(parent, createWhiteSpaceNode(parent, ' '));
          break;
        case SyntaxKind.Symbol:
          appendChild(parent, createSymbolNode(parent, token.value));
          break;
        case SyntaxKind.Url:
          appendChild(parent, createURLNode(parent, token.value, (token.flags & TokenFlags.IsEmail) !== 0));
          break;
        default: {
          if (ctx && token.kind === SyntaxKind.Command) {
            this.warnAt(ctx, token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Syntax,
              `unexpected command \\${token.value} in plain text`);
          }
          const raw = token.text.trim();
          if (raw) appendChild(parent, createWordNode(parent, raw));
        }
      }
    }
    removeTrailingWhitespace(parent);
  }

  /**
   * Inline content of `container` until `isEnd` matches; other block
   * tokens end the container and travel up as `Retry`
   */
  private parseInline(ctx: ParserContext, container: CompositeNode, isEnd: (token: Token) => boolean): ParseOutcome {
    let token = this.next(ctx);
    for (;;) {
      if (isEnd(token)) {
        removeTrailingWhitespace(container);
        return CONTINUE;
      }

      switch (token.kind) {
        case SyntaxKind.EndOfFileToken:
          removeTrailingWhitespace(container);
          return END_OF_INPUT;
        case SyntaxKind.NewParagraph:
          removeTrailingWhitespace(container);
          return newParagraph(token);
        case SyntaxKind.Word:
          this.addWord(ctx, container, token);
          break;
        case SyntaxKind.Whitespace:
          if (container.children.length > 0) appendChild(container, createWhiteSpaceNode(container, token.text));
          break;
        case SyntaxKind.Symbol:
          appendChild(container, createSymbolNode(container, token.value));
          break;
        case SyntaxKind.Url:
          appendChild(container, createURLNode(container, token.value, (token.flags & TokenFlags.IsEmail) !== 0));
          break;
        case SyntaxKind.HtmlStartTag:
        case SyntaxKind.HtmlEndTag: {
          const style = htmlStyleTags.get(token.value);
          if (style !== undefined && style !== Style.Preformatted && style !== Style.Div && style !== Style.Center) {
            appendChild(container, createStyleChangeNode(container, token.pos, style,
              token.kind === SyntaxKind.HtmlStartTag, token.attribs));
          } else if (isStartTag(token, 'br')) {
            appendChild(container, createLineBreakNode(container));
          } else {
            removeTrailingWhitespace(container);
            return retry(token);
          }
          break;
        }
        case SyntaxKind.Command: {
          const style = wordStyleCommands.get(token.value);
          if (style !== undefined) {
            this.handleStyleArgument(ctx, container, token, style);
          } else if (token.value === 'n') {
            appendChild(container, createLineBreakNode(container));
          } else {
            removeTrailingWhitespace(container);
            return retry(token);
          }
          break;
        }
        default:
          removeTrailingWhitespace(container);
          return retry(token);
      }
      token = this.next(ctx);
    }
  }

  // ---------------------------------------------------------------------------
  // Styles
  // ---------------------------------------------------------------------------

  /**
   * `\b word`: style the next word, up to the following whitespace
   */
  private handleStyleArgument(ctx: ParserContext, parent: CompositeNode, token: Token, style: Style): void {
    ctx.scanner.skipHorizontalWhitespace();
    let next = this.next(ctx);
    const isArgument = (t: Token) =>
      t.kind === SyntaxKind.Word || t.kind === SyntaxKind.Symbol || t.kind === SyntaxKind.Url;

    if (!isArgument(next)) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a word after \\${token.value}`);
      ctx.pending = next;
      return;
    }

    appendChild(parent, createStyleChangeNode(parent, token.pos, style, true));
    while (isArgument(next)) {
      if (next.kind === SyntaxKind.Word) this.addWord(ctx, parent, next);
      else if (next.kind === SyntaxKind.Symbol) appendChild(parent, createSymbolNode(parent, next.value));
      else appendChild(parent, createURLNode(parent, next.value, (next.flags & TokenFlags.IsEmail) !== 0));
      next = this.next(ctx);
    }
    appendChild(parent, createStyleChangeNode(parent, next.pos, style, false));
    ctx.pending = next;
  }

  private handleStyleEnter(ctx: ParserContext, para: ParaNode, token: Token, style: Style): ParseOutcome {
    appendChild(para, createStyleChangeNode(para, token.pos, style, true, token.attribs));
    if ((token.flags & TokenFlags.SelfClosing) !== 0) {
      appendChild(para, createStyleChangeNode(para, token.end, style, false));
      return CONTINUE;
    }
    ctx.styleStack.push({ style, tagName: token.value, attribs: token.attribs, owner: para });
    if (style === Style.Preformatted) this.setInsidePre(ctx, true);
    return CONTINUE;
  }

  private handleStyleLeave(ctx: ParserContext, para: ParaNode, token: Token, style: Style): ParseOutcome {
    const top = ctx.styleStack.at(-1);
    if (!top || top.style !== style || top.owner !== para) {
      const message = top
        ? `found </${token.value}> tag while expecting </${top.tagName}>`
        : `found </${token.value}> tag without matching <${token.value}>`;
      this.warnAt(ctx, token, ParseErrorCode.MISMATCHED_CLOSE, DiagnosticCategory.Nesting, message);
      return CONTINUE;
    }
    ctx.styleStack.pop();
    if (!ctx.insidePre || style === Style.Preformatted) removeTrailingWhitespace(para);
    appendChild(para, createStyleChangeNode(para, token.pos, style, false));
    if (style === Style.Preformatted) this.setInsidePre(ctx, false);
    return CONTINUE;
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  private handleCommand(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const name = token.value;
    logDebug('parser', 'command', name);

    const wordStyle = wordStyleCommands.get(name);
    if (wordStyle !== undefined) {
      this.handleStyleArgument(ctx, para, token, wordStyle);
      return CONTINUE;
    }
    if (sectionLevels.has(name)) return retry(token);

    const simpleSect = simpleSectionCommands.get(name);
    if (simpleSect !== undefined) return this.handleSimpleSection(ctx, para, token, simpleSect);

    const paramSect = paramSectionCommands.get(name);
    if (paramSect !== undefined) return this.handleParamSection(ctx, para, token, paramSect);

    if (xrefCommands.has(name)) return this.handleXRefItem(ctx, para, token);

    const verbatim = verbatimCommands.get(name);
    if (verbatim) {
      this.handleVerbatim(ctx, para, token, verbatim.type, verbatim.end);
      return CONTINUE;
    }

    const include = includeCommands.get(name);
    if (include !== undefined) {
      this.handleInclude(ctx, para, token, include);
      return CONTINUE;
    }

    const operator = includeOperatorCommands.get(name);
    if (operator !== undefined) {
      this.handleIncludeOperator(ctx, para, token, operator);
      return CONTINUE;
    }

    const diagram = diagramFileCommands.get(name);
    if (diagram !== undefined) {
      this.handleDiagramFile(ctx, para, token, diagram);
      return CONTINUE;
    }

    switch (name) {
      case 'n':
        appendChild(para, createLineBreakNode(para));
        return CONTINUE;
      case '_linebr':
        appendChild(para, createWhiteSpaceNode(para, '\n'));
        return CONTINUE;
      case 'anchor':
        this.handleAnchor(ctx, para, token);
        return CONTINUE;
      case 'addindex':
        this.handleAddIndex(ctx, para);
        return CONTINUE;
      case 'li':
      case 'arg':
        return this.handleSimpleList(ctx, para, token);
      case 'internal':
        return this.handleInternal(ctx, para, token);
      case 'endinternal':
        if (findAncestor(para, [DocKind.Internal])) return retry(token);
        break;
      case 'parblock':
        return this.handleParBlock(ctx, para, token);
      case 'endparblock':
        if (findAncestor(para, [DocKind.ParBlock])) return retry(token);
        break;
      case 'secreflist':
        return this.handleSecRefList(ctx, para, token);
      case 'ref':
      case 'subpage':
        this.handleRef(ctx, para, token, name === 'subpage');
        return CONTINUE;
      case 'link':
        return this.handleLink(ctx, para, token);
      case 'cite':
        this.handleCite(ctx, para, token);
        return CONTINUE;
      case '_internalref':
        this.handleInternalRef(ctx, para, token);
        return CONTINUE;
      case 'copydoc':
      case 'copybrief':
      case 'copydetails':
        this.handleCopy(ctx, para, token);
        return CONTINUE;
      case 'image':
        this.handleImage(ctx, para, token);
        return CONTINUE;
      case 'f$':
      case 'f[':
      case 'f{':
        this.handleFormula(ctx, para, token);
        return CONTINUE;
      default:
        if (ignoredCommands.has(name)) return CONTINUE;
        if (!strayEndCommands.has(name)) {
          this.warnAt(ctx, token, ParseErrorCode.UNKNOWN_COMMAND, DiagnosticCategory.Syntax,
            `found unknown command '${token.text}'`);
          appendChild(para, createWordNode(para, token.text));
          return CONTINUE;
        }
    }

    this.warnAt(ctx, token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
      `found \\${name} without matching start command`);
    return CONTINUE;
  }

  private handleAnchor(ctx: ParserContext, para: ParaNode, token: Token): void {
    const id = ctx.scanner.scanArgument();
    if (id === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax, 'expected an anchor name after \\anchor');
      return;
    }
    appendChild(para, createAnchorNode(para, id, ctx.input.context?.outputFileBase ?? ''));
  }

  private handleAddIndex(ctx: ParserContext, para: ParaNode): void {
    const entry = ctx.scanner.scanRestOfLine();
    if (!entry || ctx.input.indexWords === false) return;
    appendChild(para, createIndexEntryNode(para, entry, ctx.input.context?.name ?? '', ctx.input.memberAnchor ?? ''));
  }

  // ---------------------------------------------------------------------------
  // Sections inside paragraphs
  // ---------------------------------------------------------------------------

  private handleSimpleSection(ctx: ParserContext, para: ParaNode, token: Token, type: SimpleSectType): ParseOutcome {
    if (insideSectionBlock(para)) return retry(token);

    const title = type === SimpleSectType.User ? ctx.scanner.scanRestOfLine() : '';
    const previous = lastChild(para);
    let sect: SimpleSectNode;
    if (isKind(previous, DocKind.SimpleSect) && previous.sectType === type && type !== SimpleSectType.User) {
      sect = previous;
      appendChild(sect, createSimpleSectSepNode(sect));
    } else {
      sect = appendChild(para, createSimpleSectNode(para, type));
      if (title) {
        sect.title = createTitleNode(sect);
        this.fillText(sect.title, title);
      }
    }

    return this.parseParagraphs(ctx, sect, this.next(ctx), outcome => ({ done: outcome }));
  }

  private handleRcsTag(ctx: ParserContext, para: ParaNode, token: Token): void {
    const sect = appendChild(para, createSimpleSectNode(para, SimpleSectType.Rcs));
    sect.title = createTitleNode(sect);
    this.fillText(sect.title, token.value, ctx);
    const body = createParaNode(sect);
    this.fillText(body, token.text, ctx);
    appendParagraph(sect, body);
    markParagraphs(sect);
  }

  private handleParamSection(ctx: ParserContext, para: ParaNode, token: Token, type: ParamSectType): ParseOutcome {
    if (insideSectionBlock(para)) return retry(token);

    const option = type === ParamSectType.Param ? ctx.scanner.scanAttached('[', ']') : undefined;
    const direction = parseParamDirection(option);
    if (option !== undefined && direction === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Attribute,
        `unknown parameter direction [${option}], expected [in], [out] or [in,out]`);
    }

    const previous = lastChild(para);
    const sect: ParamSectNode = isKind(previous, DocKind.ParamSect) && previous.sectType === type
      ? previous
      : appendChild(para, createParamSectNode(para, type));
    const list = appendChild(sect, createParamListNode(sect, type, direction ?? ParamDirection.Unspecified));
    if (direction !== undefined) sect.hasInOutSpecifier = true;

    this.parseParamNames(ctx, sect, list, token);

    const outcome = this.parseParagraphs(ctx, list, this.next(ctx), o => ({ done: o }));

    const lists = sect.children.filter((c): c is ParamListNode => c.kind === DocKind.ParamList);
    lists.forEach((l, index) => {
      l.isFirst = index === 0;
      l.isLast = index === lists.length - 1;
    });
    return outcome;
  }

  /**
   * Comma separated names, each optionally typed as `type1|type2#name`
   */
  private parseParamNames(ctx: ParserContext, sect: ParamSectNode, list: ParamListNode, token: Token): void {
    const names: string[] = [];
    let arg = ctx.scanner.scanArgument();
    while (arg !== undefined) {
      names.push(...arg.split(',').filter(part => part.length > 0));
      if (!arg.endsWith(',')) break;
      arg = ctx.scanner.scanArgument();
    }

    if (names.length === 0) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `missing parameter name after \\${token.value}`);
      return;
    }

    for (const raw of names) {
      let name = raw;
      const hash = raw.indexOf('#');
      if (hash > 0) {
        sect.hasTypeSpecifier = true;
        for (const type of raw.slice(0, hash).split('|')) {
          if (type) list.paramTypes.push(this.createParamName(ctx, list, type, true));
        }
        name = raw.slice(hash + 1);
      }
      list.params.push(this.createParamName(ctx, list, name, list.sectType === ParamSectType.Exception));
    }
  }

  private createParamName(ctx: ParserContext, list: ParamListNode, name: string, linkable: boolean): ParamNameNode {
    const resolved = linkable && this.autolink ? this.resolve(ctx, name) : undefined;
    if (!resolved) return createWordNode(list, name);
    return createLinkedWordNode(list, {
      word: name,
      ref: resolved.ref ?? '',
      file: resolved.file,
      relPath: ctx.relPath,
      anchor: resolved.anchor,
      tooltip: resolved.tooltip ?? ''
    });
  }

  private handleXRefItem(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    if (insideSectionBlock(para)) return retry(token);

    let key = token.value;
    let heading: string | undefined;
    if (key === 'xrefitem') {
      key = ctx.scanner.scanArgument() ?? '';
      heading = ctx.scanner.scanQuotedArgument();
      ctx.scanner.scanQuotedArgument();
      if (!key) {
        this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
          'expected a list key after \\xrefitem');
      }
    }

    const id = ++this.xrefCounter;
    const item = appendChild(para, createXRefItemNode(para, {
      id,
      key,
      file: key,
      anchor: `_${key}${String(id).padStart(6, '0')}`,
      title: heading ?? this.options.xrefTitles?.[key] ?? defaultXRefTitles[key] ?? key,
      relPath: ctx.relPath
    }));

    return this.parseParagraphs(ctx, item, this.next(ctx), outcome => ({ done: outcome }));
  }

  // ---------------------------------------------------------------------------
  // Lists
  // ---------------------------------------------------------------------------

  private handleAutoList(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const isEnumList = (token.flags & TokenFlags.IsEnumList) !== 0;
    if (!isEnumList && !this.listMarkers.has(token.value)) {
      this.addWord(ctx, para, token);
      appendChild(para, createWhiteSpaceNode(para, ' '));
      return CONTINUE;
    }

    const enclosing = findAncestor(para, [DocKind.AutoList]);
    if (isKind(enclosing, DocKind.AutoList) && enclosing.indent >= token.indent) return retry(token);

    let depth = 0;
    for (let current = para.parent; current; current = current.parent) {
      if (current.kind === DocKind.AutoList && current.isEnumList) depth++;
    }

    const list = appendChild(para, createAutoListNode(para, token.indent, isEnumList, depth));
    ctx.scanner.startAutoList();

    let item = token;
    let num = 1;
    let outcome: ParseOutcome;
    for (;;) {
      if (item.itemNumber !== -1) num = item.itemNumber;
      const listItem = appendChild(list, createAutoListItemNode(list, item.indent, num++));
      outcome = this.parseParagraphs(ctx, listItem, this.next(ctx), o => {
        if (o.kind === OutcomeKind.NewParagraph &&
          (o.token.indent > listItem.indent || o.token.kind === SyntaxKind.HtmlStartTag)) {
          return { again: this.next(ctx) };
        }
        return { done: o };
      });

      if (outcome.kind !== OutcomeKind.Retry) break;
      const t = outcome.token;
      const sameKind = t.kind === SyntaxKind.ListItem && t.indent === list.indent &&
        ((t.flags & TokenFlags.IsEnumList) !== 0) === list.isEnumList;
      if (!sameKind || (t.itemNumber !== -1 && t.itemNumber < num)) break;
      item = t;
    }

    ctx.scanner.endAutoList();

    if (outcome.kind === OutcomeKind.Retry && outcome.token.kind === SyntaxKind.EndList) {
      const outer = findAncestor(list, [DocKind.AutoList]);
      if (isKind(outer, DocKind.AutoList) && outer.indent >= outcome.token.indent) return outcome;
      return CONTINUE;
    }
    return outcome;
  }

  private handleSimpleList(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    if (para.parent?.kind === DocKind.SimpleListItem) return retry(token);

    const list = appendChild(para, createSimpleListNode(para));
    let outcome: ParseOutcome;
    do {
      const item = appendChild(list, createSimpleListItemNode(list));
      outcome = this.parseParagraphs(ctx, item, this.next(ctx), o => ({ done: o }));
    } while (outcome.kind === OutcomeKind.Retry && isCommand(outcome.token, 'li', 'arg'));
    return outcome;
  }

  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  private handleInternal(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    if (findAncestor(para, [DocKind.Internal])) {
      this.warnAt(ctx, token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Nesting,
        '\\internal command found inside internal section');
      return CONTINUE;
    }
    const node = appendChild(para, createInternalNode(para));
    return this.parseParagraphs(ctx, node, this.next(ctx), outcome => {
      if (outcome.kind === OutcomeKind.NewParagraph) return { again: this.next(ctx) };
      if (outcome.kind === OutcomeKind.Retry && isCommand(outcome.token, 'endinternal')) return { done: CONTINUE };
      return { done: outcome };
    });
  }

  private handleParBlock(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const node = appendChild(para, createParBlockNode(para));
    const outcome = this.parseParagraphs(ctx, node, this.next(ctx), o => {
      if (o.kind === OutcomeKind.NewParagraph) return { again: this.next(ctx) };
      if (o.kind === OutcomeKind.Retry && isCommand(o.token, 'endparblock')) return { done: CONTINUE };
      return { done: o };
    });
    if (outcome.kind === OutcomeKind.EndOfInput) {
      this.warnAt(ctx, token, ParseErrorCode.UNTERMINATED_BLOCK, DiagnosticCategory.Structure,
        'end of comment block while inside \\parblock, missing \\endparblock');
    }
    return outcome;
  }

  private handleSecRefList(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const list = appendChild(para, createSecRefListNode(para));
    let next = this.skipWhitespace(ctx);
    for (;;) {
      if (isCommand(next, 'refitem')) {
        const target = ctx.scanner.scanArgument();
        const text = ctx.scanner.scanRestOfLine();
        if (target === undefined) {
          this.warnAt(ctx, next, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax, 'expected a target after \\refitem');
        } else {
          const resolved = this.resolve(ctx, target);
          const item = appendChild(list, createSecRefItemNode(list, {
            target,
            file: resolved?.file ?? '',
            anchor: resolved?.anchor ?? '',
            relPath: ctx.relPath
          }));
          this.fillText(item, text || resolved?.title || target);
          if (!resolved) {
            this.warnAt(ctx, next, ParseErrorCode.UNRESOLVED_REFERENCE, DiagnosticCategory.Reference,
              `unable to resolve reference to '${target}' for \\refitem command`);
          }
        }
      } else if (isCommand(next, 'endsecreflist')) {
        return CONTINUE;
      } else if (next.kind === SyntaxKind.EndOfFileToken) {
        this.warnAt(ctx, token, ParseErrorCode.UNTERMINATED_BLOCK, DiagnosticCategory.Structure,
          'end of comment block while inside \\secreflist, missing \\endsecreflist');
        return END_OF_INPUT;
      } else {
        this.warnAt(ctx, next, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
          `unexpected ${describeToken(next)} inside \\secreflist`);
      }
      next = this.skipWhitespace(ctx);
    }
  }

  private handleVerbatim(ctx: ParserContext, para: ParaNode, token: Token, type: VerbatimType, end: string): void {
    const language = type === VerbatimType.Code ? (ctx.scanner.scanAttached('{', '}') ?? '').replace(/^\./, '') : '';
    const isBlock = type === VerbatimType.HtmlOnly && ctx.scanner.scanAttached('[', ']') === 'block';
    const block = ctx.scanner.scanRawUntil([`\\${end}`, `@${end}`]);
    if (!block.terminated) {
      this.warnAt(ctx, token, ParseErrorCode.UNTERMINATED_BLOCK, DiagnosticCategory.Structure,
        `end of comment block while inside \\${token.value} block, missing \\${end}`);
    }
    const text = type === VerbatimType.Code || type === VerbatimType.Verbatim ? trimBlockText(block.text) : block.text;
    appendChild(para, createVerbatimNode(para, {
      verbatimType: type,
      text,
      context: ctx.input.context?.name ?? '',
      isExample: ctx.input.isExample ?? false,
      exampleFile: ctx.input.exampleName ?? '',
      isBlock,
      language
    }));
  }

  private handleInclude(ctx: ParserContext, para: ParaNode, token: Token, type: IncludeType): void {
    const file = ctx.scanner.scanArgument();
    if (file === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a file name after \\${token.value}`);
      return;
    }

    let blockId = '';
    if (type === IncludeType.Snippet) {
      blockId = ctx.scanner.scanArgument() ?? '';
      if (!blockId) {
        this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
          `expected a block identifier after \\snippet ${file}`);
      }
    }

    const contents = this.options.fileSource?.readFile(file);
    let text = contents ?? '';
    if (contents === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_FILE, DiagnosticCategory.Resource,
        `included file ${file} is not found`);
    } else if (type === IncludeType.Snippet && blockId) {
      const block = extractBlock(contents, blockId);
      if (block === undefined) {
        this.warnAt(ctx, token, ParseErrorCode.MISSING_FILE, DiagnosticCategory.Resource,
          `block marker ${blockId} not found in file ${file}`);
      }
      text = block ?? '';
    }

    if (type === IncludeType.DontInclude) ctx.includeBuffer = createIncludeBuffer(text);

    appendChild(para, createIncludeNode(para, {
      includeType: type,
      file,
      text,
      context: ctx.input.context?.name ?? '',
      isExample: ctx.input.isExample ?? false,
      exampleFile: ctx.input.exampleName ?? '',
      blockId
    }));
  }

  private handleIncludeOperator(ctx: ParserContext, para: ParaNode, token: Token, opType: IncOperatorType): void {
    const pattern = ctx.scanner.scanRestOfLine();
    if (!pattern) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a pattern after \\${token.value}`);
    }

    let text = '';
    if (ctx.includeBuffer) {
      text = applyIncludeOperator(ctx.includeBuffer, opType, pattern);
    } else {
      this.warnAt(ctx, token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
        `no preceding \\dontinclude found for \\${token.value}`);
    }

    const children = para.children;
    const n1 = children[children.length - 1];
    const n2 = children[children.length - 2];
    const isFirst = n1 === undefined ||
      (n1.kind !== DocKind.IncOperator && n1.kind !== DocKind.WhiteSpace) ||
      (n1.kind === DocKind.WhiteSpace && n2 !== undefined && n2.kind !== DocKind.IncOperator);

    if (n1?.kind === DocKind.IncOperator) n1.isLast = false;
    else if (n1?.kind === DocKind.WhiteSpace && n2?.kind === DocKind.IncOperator) n2.isLast = false;

    appendChild(para, createIncOperatorNode(para, {
      opType,
      pattern,
      text,
      context: ctx.input.context?.name ?? '',
      isFirst,
      isLast: true,
      isExample: ctx.input.isExample ?? false,
      exampleFile: ctx.input.exampleName ?? ''
    }));
  }

  // ---------------------------------------------------------------------------
  // References
  // ---------------------------------------------------------------------------

  /**
   * Unresolved targets degrade to emphasized text
   */
  private appendEmphasized(para: ParaNode, position: number, build: () => void): void {
    appendChild(para, createStyleChangeNode(para, position, Style.Italic, true));
    build();
    appendChild(para, createStyleChangeNode(para, position, Style.Italic, false));
  }

  private handleRef(ctx: ParserContext, para: ParaNode, token: Token, isSubPage: boolean): void {
    const target = ctx.scanner.scanArgument();
    if (target === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a target after \\${token.value}`);
      return;
    }
    const text = ctx.scanner.scanQuotedArgument();
    const resolved = this.resolve(ctx, target);

    if (!resolved) {
      this.warnAt(ctx, token, ParseErrorCode.UNRESOLVED_REFERENCE, DiagnosticCategory.Reference,
        `unable to resolve reference to '${target}' for \\${token.value} command`);
      this.appendEmphasized(para, token.pos, () => {
        appendChild(para, createWordNode(para, text ?? target));
      });
      return;
    }

    const ref = appendChild(para, createRefNode(para, {
      target,
      file: resolved.file,
      relPath: ctx.relPath,
      ref: resolved.ref ?? '',
      anchor: resolved.anchor,
      targetTitle: resolved.title ?? target,
      refToAnchor: resolved.isAnchor ?? false,
      refToSection: resolved.isSection ?? false,
      isSubPage
    }));
    if (text !== undefined) this.fillText(ref, text);
  }

  private handleLink(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const target = ctx.scanner.scanArgument();
    if (target === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax, 'expected a target after \\link');
      return CONTINUE;
    }

    const resolved = this.resolve(ctx, target);
    const link = appendChild(para, createLinkNode(para, {
      target,
      file: resolved?.file ?? '',
      relPath: ctx.relPath,
      ref: resolved?.ref ?? '',
      anchor: resolved?.anchor ?? '',
      tooltip: resolved?.tooltip ?? ''
    }));

    const outcome = this.parseInline(ctx, link, t => isCommand(t, 'endlink'));
    if (outcome.kind !== OutcomeKind.Continue) {
      this.warnAt(ctx, token, ParseErrorCode.UNTERMINATED_BLOCK, DiagnosticCategory.Structure,
        `unable to find \\endlink for \\link ${target}`);
    }
    if (link.children.length === 0) appendChild(link, createWordNode(link, target));

    if (!resolved) {
      this.warnAt(ctx, token, ParseErrorCode.UNRESOLVED_REFERENCE, DiagnosticCategory.Reference,
        `unable to resolve link to '${target}' for \\link command`);
      para.children.splice(para.children.indexOf(link), 1);
      this.appendEmphasized(para, token.pos, () => moveChildren(link, para));
    }
    return outcome;
  }

  private handleCite(ctx: ParserContext, para: ParaNode, token: Token): void {
    const label = ctx.scanner.scanArgument();
    if (label === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax, 'expected a citation label after \\cite');
      return;
    }
    const resolved = this.options.linkResolver?.resolveCitation?.(label);
    if (!resolved) {
      this.warnAt(ctx, token, ParseErrorCode.UNRESOLVED_REFERENCE, DiagnosticCategory.Reference,
        `unable to resolve citation '${label}'`);
    }
    appendChild(para, createCiteNode(para, {
      target: label,
      text: resolved?.title ?? label,
      file: resolved?.file ?? '',
      relPath: ctx.relPath,
      ref: resolved?.ref ?? '',
      anchor: resolved?.anchor ?? ''
    }));
  }

  private handleInternalRef(ctx: ParserContext, para: ParaNode, token: Token): void {
    const target = ctx.scanner.scanArgument();
    if (target === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        'expected a file#anchor target after \\_internalref');
      return;
    }
    const text = ctx.scanner.scanQuotedArgument() ?? target;
    const ref = appendChild(para, createInternalRefNode(para, target, ctx.relPath));
    this.fillText(ref, text);
  }

  private handleCopy(ctx: ParserContext, para: ParaNode, token: Token): void {
    const link = ctx.scanner.scanArgument();
    if (link === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a target after \\${token.value}`);
      return;
    }
    const brief = token.value !== 'copydetails';
    const details = token.value !== 'copybrief';
    appendChild(para, createCopyNode(para, link, brief, details));
  }

  // ---------------------------------------------------------------------------
  // Images, diagrams and formulas
  // ---------------------------------------------------------------------------

  private scanSizeOptions(ctx: ParserContext): { width: string; height: string } {
    const size = { width: '', height: '' };
    for (;;) {
      const saved = ctx.scanner.offsetNext;
      const arg = ctx.scanner.scanArgument();
      const match = arg === undefined ? null : /^(width|height)=(.+)$/.exec(arg);
      if (!match) {
        ctx.scanner.rollback(saved);
        return size;
      }
      if (match[1] === 'width') size.width = match[2];
      else size.height = match[2];
    }
  }

  private handleImage(ctx: ParserContext, para: ParaNode, token: Token): void {
    const format = ctx.scanner.scanArgument();
    const file = format === undefined ? undefined : ctx.scanner.scanArgument();
    if (format === undefined || file === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        '\\image expects an output format and a file name');
      return;
    }
    const imageType = imageTypes.get(format.toLowerCase());
    if (imageType === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Attribute,
        `image type ${format} specified as the first argument of \\image is not valid, expected html, latex, rtf or docbook`);
      return;
    }
    const caption = ctx.scanner.scanQuotedArgument();
    const size = this.scanSizeOptions(ctx);

    const external = isAbsoluteUrl(file);
    let name = file;
    const fileSource = this.options.fileSource;
    if (!external && fileSource?.findImage) {
      const found = fileSource.findImage(file, format.toLowerCase());
      if (found === undefined) {
        this.warnAt(ctx, token, ParseErrorCode.MISSING_FILE, DiagnosticCategory.Resource, `image file ${file} is not found`);
      } else {
        name = found;
      }
    }

    const image = appendChild(para, createImageNode(para, imageType, name, {
      ...size,
      relPath: external ? '' : ctx.relPath,
      url: external ? file : ''
    }));
    if (caption) this.fillText(image, caption);
  }

  private handleDiagramFile(ctx: ParserContext, para: ParaNode, token: Token, type: DiagramType): void {
    const file = ctx.scanner.scanArgument();
    if (file === undefined) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Syntax,
        `expected a file name after \\${token.value}`);
      return;
    }
    const caption = ctx.scanner.scanQuotedArgument();
    const size = this.scanSizeOptions(ctx);
    const node = appendChild(para, createDiagramFileNode(para, type, file, {
      ...size,
      relPath: ctx.relPath,
      context: ctx.input.context?.name ?? ''
    }));
    if (caption) this.fillText(node, caption);
  }

  private handleFormula(ctx: ParserContext, para: ParaNode, token: Token): void {
    const scanner = ctx.scanner;
    let text: string;
    let terminated: boolean;

    switch (token.value) {
      case 'f$': {
        const block = scanner.scanRawUntil(['\\f$', '@f$']);
        text = `$${block.text}$`;
        terminated = block.terminated;
        break;
      }
      case 'f[': {
        const block = scanner.scanRawUntil(['\\f]', '@f]']);
        text = `\\[${block.text}\\]`;
        terminated = block.terminated;
        break;
      }
      default: {
        const env = scanner.scanRawUntil(['}']);
        if (scanner.source.charAt(scanner.offsetNext) === '{') scanner.rollback(scanner.offsetNext + 1);
        const block = scanner.scanRawUntil(['\\f}', '@f}']);
        const name = env.text.trim();
        text = `\\begin{${name}}${block.text}\\end{${name}}`;
        terminated = env.terminated && block.terminated;
      }
    }

    if (!terminated) {
      this.warnAt(ctx, token, ParseErrorCode.UNTERMINATED_BLOCK, DiagnosticCategory.Structure,
        `end of comment block while inside formula started with \\${token.value}`);
    }
    const { id, name } = this.formulas.register(text);
    appendChild(para, createFormulaNode(para, id, name, text, ctx.relPath));
  }

  // ---------------------------------------------------------------------------
  // HTML
  // ---------------------------------------------------------------------------

  private handleHtmlStartTag(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const style = htmlStyleTags.get(token.value);
    if (style !== undefined) return this.handleStyleEnter(ctx, para, token, style);

    const level = headerLevel(token.value);
    if (level > 0) return this.handleHtmlHeader(ctx, para, token, level);

    switch (token.value) {
      case 'p':
        if (para.children.every(child => hasNodeFlag(child, DocFlags.Synthetic))) {
          para.attribs = token.attribs;
          return CONTINUE;
        }
        return newParagraph(token);
      case 'br':
        appendChild(para, createLineBreakNode(para));
        return CONTINUE;
      case 'hr':
        appendChild(para, createHorRulerNode(para));
        return CONTINUE;
      case 'ul':
      case 'ol':
        return this.parseHtmlList(ctx, para, token);
      case 'dl':
        return this.parseHtmlDescList(ctx, para, token);
      case 'table':
        return this.parseHtmlTable(ctx, para, token);
      case 'blockquote':
        return this.parseHtmlBlockQuote(ctx, para, token);
      case 'a':
        return this.handleHtmlAnchor(ctx, para, token);
      case 'img':
        this.handleHtmlImage(ctx, para, token);
        return CONTINUE;
      case 'li':
        if (nearestHtmlContainer(para)?.kind === DocKind.HtmlListItem) return retry(token);
        break;
      case 'dt':
      case 'dd':
        if (nearestHtmlContainer(para)?.kind === DocKind.HtmlDescData) return retry(token);
        break;
      case 'tr':
      case 'td':
      case 'th':
        if (nearestHtmlContainer(para)?.kind === DocKind.HtmlCell) return retry(token);
        break;
    }

    this.warnAt(ctx, token, ParseErrorCode.LONELY_TAG, DiagnosticCategory.Structure,
      `found <${token.value}> tag outside its enclosing structure`);
    return CONTINUE;
  }

  private handleHtmlEndTag(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const style = htmlStyleTags.get(token.value);
    if (style !== undefined) return this.handleStyleLeave(ctx, para, token, style);

    const container = nearestHtmlContainer(para)?.kind;
    switch (token.value) {
      case 'p':
      case 'a':
      case 'br':
      case 'hr':
      case 'img':
        return CONTINUE;
      case 'li':
      case 'ul':
      case 'ol':
        if (container === DocKind.HtmlListItem) return retry(token);
        break;
      case 'dt':
      case 'dd':
      case 'dl':
        if (container === DocKind.HtmlDescData) return retry(token);
        break;
      case 'td':
      case 'th':
      case 'tr':
      case 'table':
        if (container === DocKind.HtmlCell) return retry(token);
        break;
      case 'blockquote':
        if (container === DocKind.HtmlBlockQuote) return retry(token);
        break;
    }

    this.warnAt(ctx, token, ParseErrorCode.LONELY_TAG, DiagnosticCategory.Nesting,
      `found </${token.value}> tag without matching <${token.value}>`);
    return CONTINUE;
  }

  /**
   * A construct left open: report it and let the token travel up
   */
  private closeImplicitly(ctx: ParserContext, opener: Token, next: Token): ParseOutcome {
    this.warnAt(ctx, opener, ParseErrorCode.UNCLOSED_TAG, DiagnosticCategory.Nesting,
      `<${opener.value}> tag is not closed before ${describeToken(next)}`);
    return retry(next);
  }

  private isStructuralToken(token: Token): boolean {
    return token.kind === SyntaxKind.Command || token.kind === SyntaxKind.HtmlStartTag ||
      token.kind === SyntaxKind.HtmlEndTag || token.kind === SyntaxKind.ListItem;
  }

  private warnUnclosedAtEnd(ctx: ParserContext, opener: Token): ParseOutcome {
    this.warnAt(ctx, opener, ParseErrorCode.UNCLOSED_TAG, DiagnosticCategory.Nesting,
      `end of comment block while inside <${opener.value}>, missing </${opener.value}>`);
    return END_OF_INPUT;
  }

  private parseHtmlList(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const listType = token.value === 'ol' ? HtmlListType.Ordered : HtmlListType.Unordered;
    const list = appendChild(para, createHtmlListNode(para, listType, token.attribs));
    let itemNumber = parseInt(getAttribute(token.attribs, 'start') ?? '1', 10) || 1;

    let next = this.skipWhitespace(ctx);
    for (;;) {
      if (isStartTag(next, 'li')) {
        const explicit = parseInt(getAttribute(next.attribs, 'value') ?? '', 10);
        if (!Number.isNaN(explicit)) itemNumber = explicit;
        const item = appendChild(list, createHtmlListItemNode(list, itemNumber++, next.attribs));
        const outcome = this.parseParagraphs(ctx, item, this.next(ctx), o => {
          if (o.kind === OutcomeKind.NewParagraph) return { again: this.next(ctx) };
          if (o.kind === OutcomeKind.Retry && isEndTag(o.token, 'li')) return { done: CONTINUE };
          return { done: o };
        });
        if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
        next = outcome.kind === OutcomeKind.Retry ? outcome.token : this.skipWhitespace(ctx);
        continue;
      }

      if (isEndTag(next, 'ul', 'ol')) {
        if (next.value !== token.value) {
          this.warnAt(ctx, next, ParseErrorCode.MISMATCHED_CLOSE, DiagnosticCategory.Nesting,
            `found </${next.value}> tag while expecting </${token.value}>`);
        }
        return CONTINUE;
      }
      if (next.kind === SyntaxKind.EndOfFileToken) return this.warnUnclosedAtEnd(ctx, token);
      if (this.isStructuralToken(next)) return this.closeImplicitly(ctx, token, next);

      this.warnAt(ctx, next, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
        `expected <li> tag but found ${describeToken(next)} instead`);
      next = this.skipWhitespace(ctx);
    }
  }

  private parseHtmlDescList(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const list = appendChild(para, createHtmlDescListNode(para, token.attribs));
    let next = this.skipWhitespace(ctx);
    for (;;) {
      if (isStartTag(next, 'dt')) {
        const title = appendChild(list, createHtmlDescTitleNode(list, next.attribs));
        const outcome = this.parseInline(ctx, title, t => isEndTag(t, 'dt'));
        if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
        next = outcome.kind === OutcomeKind.Retry ? outcome.token : this.skipWhitespace(ctx);
        continue;
      }

      if (isStartTag(next, 'dd')) {
        const data = appendChild(list, createHtmlDescDataNode(list, next.attribs));
        const outcome = this.parseParagraphs(ctx, data, this.next(ctx), o => {
          if (o.kind === OutcomeKind.NewParagraph) return { again: this.next(ctx) };
          if (o.kind === OutcomeKind.Retry && isEndTag(o.token, 'dd')) return { done: CONTINUE };
          return { done: o };
        });
        if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
        next = outcome.kind === OutcomeKind.Retry ? outcome.token : this.skipWhitespace(ctx);
        continue;
      }

      if (isEndTag(next, 'dl')) return CONTINUE;
      if (next.kind === SyntaxKind.EndOfFileToken) return this.warnUnclosedAtEnd(ctx, token);
      if (this.isStructuralToken(next)) return this.closeImplicitly(ctx, token, next);

      this.warnAt(ctx, next, ParseErrorCode.UNEXPECTED_TOKEN, DiagnosticCategory.Structure,
        `expected <dt> or <dd> tag but found ${describeToken(next)} instead`);
      next = this.skipWhitespace(ctx);
    }
  }

  private parseHtmlTable(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const table = appendChild(para, createHtmlTableNode(para, token.attribs));
    const outcome = this.parseTableContent(ctx, table, token);
    computeTableGrid(table);
    return outcome;
  }

  private parseTableContent(ctx: ParserContext, table: HtmlTableNode, token: Token): ParseOutcome {
    let next = this.skipWhitespace(ctx);
    for (;;) {
      if (isStartTag(next, 'caption')) {
        const caption = createHtmlCaptionNode(table, next.attribs);
        if (table.caption) {
          this.warnAt(ctx, next, ParseErrorCode.TABLE_STRUCTURE, DiagnosticCategory.Structure,
            'table already has a caption, found another one');
        } else {
          table.caption = caption;
        }
        const outcome = this.parseInline(ctx, caption, t => isEndTag(t, 'caption'));
        if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
        next = outcome.kind === OutcomeKind.Retry ? outcome.token : this.skipWhitespace(ctx);
        continue;
      }

      if (isStartTag(next, 'tr', 'td', 'th')) {
        let first: Token;
        let row: HtmlRowNode;
        if (next.value === 'tr') {
          row = appendChild(table, createHtmlRowNode(table, next.attribs));
          first = this.skipWhitespace(ctx);
        } else {
          this.warnAt(ctx, next, ParseErrorCode.TABLE_STRUCTURE, DiagnosticCategory.Structure,
            `expected <tr> tag but found <${next.value}> instead`);
          row = appendChild(table, createHtmlRowNode(table, []));
          first = next;
        }
        const outcome = this.parseHtmlRow(ctx, row, first);
        if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
        next = outcome.kind === OutcomeKind.Retry ? outcome.token : this.skipWhitespace(ctx);
        continue;
      }

      if (isEndTag(next, 'table')) return CONTINUE;
      if (next.kind === SyntaxKind.EndOfFileToken) return this.warnUnclosedAtEnd(ctx, token);
      if (isEndTag(next, 'tr')) {
        next = this.skipWhitespace(ctx);
        continue;
      }
      if (this.isStructuralToken(next)) return this.closeImplicitly(ctx, token, next);

      this.warnAt(ctx, next, ParseErrorCode.TABLE_STRUCTURE, DiagnosticCategory.Structure,
        `expected <tr> tag but found ${describeToken(next)} instead`);
      next = this.skipWhitespace(ctx);
    }
  }

  /**
   * Cells of one row; `</tr>` is consumed, tokens starting the next row or
   * closing the table are handed back
   */
  private parseHtmlRow(ctx: ParserContext, row: HtmlRowNode, first: Token): ParseOutcome {
    let next = first;
    let outcome: ParseOutcome | undefined;
    while (!outcome) {
      if (isStartTag(next, 'td', 'th')) {
        const cell = appendChild(row, createHtmlCellNode(row, next.attribs, next.value === 'th'));
        const cellOutcome = this.parseParagraphs(ctx, cell, this.next(ctx), o => {
          if (o.kind === OutcomeKind.NewParagraph) return { again: this.next(ctx) };
          // an explicit cell end does not end the cell content
          if (o.kind === OutcomeKind.Retry && isEndTag(o.token, 'td', 'th')) return { again: this.next(ctx) };
          return { done: o };
        });
        if (cellOutcome.kind === OutcomeKind.Retry) next = cellOutcome.token;
        else if (cellOutcome.kind === OutcomeKind.EndOfInput) outcome = cellOutcome;
        else next = this.skipWhitespace(ctx);
      } else if (isEndTag(next, 'tr')) {
        outcome = CONTINUE;
      } else if (isStartTag(next, 'tr', 'caption') || isEndTag(next, 'table') ||
        next.kind === SyntaxKind.EndOfFileToken) {
        outcome = next.kind === SyntaxKind.EndOfFileToken ? END_OF_INPUT : retry(next);
      } else if (next.kind === SyntaxKind.Whitespace || next.kind === SyntaxKind.NewParagraph) {
        next = this.skipWhitespace(ctx);
      } else if (this.isStructuralToken(next)) {
        outcome = retry(next);
      } else {
        this.warnAt(ctx, next, ParseErrorCode.TABLE_STRUCTURE, DiagnosticCategory.Structure,
          `expected <td> or <th> tag but found ${describeToken(next)} instead`);
        next = this.skipWhitespace(ctx);
      }
    }

    const cells = row.children.filter((c): c is HtmlCellNode => c.kind === DocKind.HtmlCell);
    cells.forEach((cell, index) => {
      cell.isFirst = index === 0;
      cell.isLast = index === cells.length - 1;
    });
    return outcome;
  }

  private parseHtmlBlockQuote(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const quote = appendChild(para, createHtmlBlockQuoteNode(para, token.attribs));
    const outcome = this.parseParagraphs(ctx, quote, this.next(ctx), o => {
      if (o.kind === OutcomeKind.NewParagraph) return { again: this.next(ctx) };
      if (o.kind === OutcomeKind.Retry && isEndTag(o.token, 'blockquote')) return { done: CONTINUE };
      return { done: o };
    });
    if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
    return outcome;
  }

  private handleHtmlHeader(ctx: ParserContext, para: ParaNode, token: Token, level: number): ParseOutcome {
    const header = appendChild(para, createHtmlHeaderNode(para, level, token.attribs));
    const outcome = this.parseInline(ctx, header, t => isEndTag(t, token.value));
    if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
    if (outcome.kind !== OutcomeKind.Continue) {
      this.warnAt(ctx, token, ParseErrorCode.UNCLOSED_TAG, DiagnosticCategory.Nesting,
        `<${token.value}> tag is not closed`);
    }
    return outcome;
  }

  private handleHtmlAnchor(ctx: ParserContext, para: ParaNode, token: Token): ParseOutcome {
    const name = getAttribute(token.attribs, 'name') ?? getAttribute(token.attribs, 'id');
    const href = getAttribute(token.attribs, 'href');

    if (href !== undefined) {
      const url = href;
      const node = appendChild(para, createHRefNode(para, url, isAbsoluteUrl(url) ? '' : ctx.relPath,
        withoutAttribute(token.attribs, 'href')));
      if ((token.flags & TokenFlags.SelfClosing) !== 0) return CONTINUE;
      const outcome = this.parseInline(ctx, node, t => isEndTag(t, 'a'));
      if (outcome.kind === OutcomeKind.EndOfInput) return this.warnUnclosedAtEnd(ctx, token);
      return outcome;
    }

    if (name !== undefined) {
      appendChild(para, createAnchorNode(para, name, ctx.input.context?.outputFileBase ?? ''));
      return CONTINUE;
    }

    this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Attribute,
      '<a> tag without name or href attribute');
    return CONTINUE;
  }

  private handleHtmlImage(ctx: ParserContext, para: ParaNode, token: Token): void {
    const src = getAttribute(token.attribs, 'src');
    if (!src) {
      this.warnAt(ctx, token, ParseErrorCode.MISSING_ARGUMENT, DiagnosticCategory.Attribute,
        '<img> tag does not have a src attribute');
      return;
    }
    const external = isAbsoluteUrl(src);
    appendChild(para, createImageNode(para, ImageType.Html, src, {
      relPath: external ? '' : ctx.relPath,
      url: external ? src : '',
      attribs: withoutAttribute(token.attribs, 'src')
    }));
  }
}

/**
 * Create a comment parser bound to its collaborators
 */
export function createDocParser(options: ParseOptions = {}): DocParser {
  return new CommentParser(options);
}
