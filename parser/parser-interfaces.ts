/**
 * Parser Interfaces and Types
 *
 * Inputs, results, diagnostics and the collaborators the parser consumes.
 */

import type { DocNode, RootNode, TextNode } from './ast-types.js';
import type { AliasTable } from './alias-expander.js';

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured error reporting
 */
export enum DiagnosticCategory {
  Syntax = 'syntax',
  Structure = 'structure',
  Nesting = 'nesting',
  Attribute = 'attribute',
  Reference = 'reference',
  Alias = 'alias',
  Resource = 'resource',
  Invariant = 'invariant'
}

/**
 * Error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  UNCLOSED_TAG = 'unclosed-tag',
  MISMATCHED_CLOSE = 'mismatched-close',
  LONELY_TAG = 'lonely-tag',
  UNEXPECTED_TOKEN = 'unexpected-token',
  UNEXPECTED_END = 'unexpected-end',
  MISSING_ARGUMENT = 'missing-argument',
  UNKNOWN_COMMAND = 'unknown-command',
  UNRESOLVED_REFERENCE = 'unresolved-reference',
  UNTERMINATED_BLOCK = 'unterminated-block',
  INVALID_ALIAS = 'invalid-alias',
  ALIAS_ARGUMENT_COUNT = 'alias-argument-count',
  ALIAS_RECURSION = 'alias-recursion',
  UNSUPPORTED_SYMBOL = 'unsupported-symbol',
  MISSING_FILE = 'missing-file',
  INVALID_SECTION = 'invalid-section',
  TABLE_STRUCTURE = 'invalid-table-structure',
  DIAGRAM_FAILED = 'diagram-failed',
  INVARIANT_VIOLATION = 'invariant-violation'
}

/**
 * Diagnostic information
 */
export interface ParseDiagnostic {
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  code: ParseErrorCode;
  message: string;

  /** Subject of the diagnostic (command name, tag, target) */
  subject?: string;

  fileName: string;

  /** 1-based line, relative to the start line of the comment */
  line: number;

  /** Offsets in the comment text */
  pos: number;
  end: number;
}

/**
 * Receiver of diagnostics
 */
export interface DiagnosticSink {
  report(diagnostic: ParseDiagnostic): void;
}

/**
 * Opaque handle of the documented entity the comment belongs to
 */
export interface EntityContext {
  /** Scope name handed back to the link resolver */
  name: string;

  /** Output file the comment is rendered into, e.g. `group__io` or `dir/page` */
  outputFileBase?: string;
}

/**
 * Result of resolving a reference target
 */
export interface ResolvedLink {
  file: string;
  anchor: string;

  /** Name of the external tag file the target comes from, empty when local */
  ref?: string;

  /** Display title of the target (section titles, page titles) */
  title?: string;
  tooltip?: string;
  isSection?: boolean;
  isAnchor?: boolean;
}

export interface LinkRequest {
  target: string;
  context: EntityContext | undefined;
  isExample: boolean;
  exampleName: string;
}

/**
 * Symbol table lookup used for references, links, citations and autolinks
 */
export interface LinkResolver {
  resolve(request: LinkRequest): ResolvedLink | undefined;

  /** Citation labels live in their own namespace */
  resolveCitation?(label: string): ResolvedLink | undefined;
}

/**
 * Source of files named by include, snippet and image commands
 */
export interface FileSource {
  readFile(name: string): string | undefined;

  /** Returns the name the image is published under, or undefined when unknown */
  findImage?(name: string, format: string): string | undefined;
}

/**
 * Assigns stable ids to formula texts
 */
export class FormulaRegistry {
  private readonly ids = new Map<string, number>();

  register(text: string): { id: number; name: string } {
    let id = this.ids.get(text);
    if (id === undefined) {
      id = this.ids.size;
      this.ids.set(text, id);
    }
    return { id, name: `form_${id}` };
  }

  get size(): number {
    return this.ids.size;
  }
}

/**
 * Parser configuration options
 */
export interface ParseOptions {
  /** Symbol table; without it every reference is unresolved */
  linkResolver?: LinkResolver;

  fileSource?: FileSource;

  /** Expanded over the raw text before tokenizing */
  aliases?: AliasTable;

  diagnostics?: DiagnosticSink;

  formulas?: FormulaRegistry;

  /** Turn `a::b`, `f()` and `#member` words into links (default: true) */
  autolinkSupport?: boolean;

  /** Labels for cross-reference item lists keyed by list key */
  xrefTitles?: Record<string, string>;

  /** Bullet markers that start auto lists (default: `-`, `*` and `+`) */
  listMarkers?: readonly string[];
}

/**
 * One comment block to parse
 */
export interface ParseInput {
  text: string;
  fileName?: string;
  startLine?: number;
  context?: EntityContext;
  isExample?: boolean;
  exampleName?: string;

  /** Caller wants no paragraph wrapping */
  singleLine?: boolean;

  /** Links are rendered from the index page, relative paths are empty */
  linkFromIndex?: boolean;

  /** Register `\addindex` entries (default: true) */
  indexWords?: boolean;

  /** Anchor of the documented member, recorded on index entries */
  memberAnchor?: string;
}

/**
 * Result of a parse operation
 */
export interface ParseResult {
  root: RootNode;
  diagnostics: ParseDiagnostic[];

  /** Parse time in milliseconds */
  parseTime: number;
}

export interface DocParser {
  parseDoc(input: ParseInput): ParseResult;
  parseText(text: string, fileName?: string): { root: TextNode; diagnostics: ParseDiagnostic[] };
}

/**
 * Collaborator supplying already-parsed nodes for `\copydoc` and friends
 */
export interface CopySource {
  resolveCopy(link: string, part: { brief: boolean; details: boolean }): DocNode[] | undefined;
}

/**
 * Thrown when the tree breaks a structural invariant
 */
export class DocInvariantError extends Error {
  constructor(message: string, readonly node?: DocNode) {
    super(message);
    this.name = 'DocInvariantError';
  }
}

/**
 * Sink that keeps every diagnostic it receives
 */
export function createCollectingSink(): DiagnosticSink & { diagnostics: ParseDiagnostic[] } {
  const diagnostics: ParseDiagnostic[] = [];
  return {
    diagnostics,
    report(diagnostic) {
      diagnostics.push(diagnostic);
    }
  };
}

/**
 * Sink printing `file:line: severity: message` to the console
 */
export function createConsoleSink(): DiagnosticSink {
  return {
    report(d) {
      const line = `${d.fileName}:${d.line}: ${d.severity}: ${d.message}`;
      if (d.severity === DiagnosticSeverity.Error) console.error(line);
      else console.warn(line);
    }
  };
}

/**
 * Forward every diagnostic to several sinks
 */
export function combineSinks(...sinks: DiagnosticSink[]): DiagnosticSink {
  return {
    report(d) {
      for (const sink of sinks) sink.report(d);
    }
  };
}
