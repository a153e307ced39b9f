/**
 * Render Context
 *
 * Settings and collaborators for one render pass, built once from the
 * configuration and handed to every visitor of the pass.
 */

import { loadDocConfig, type DocConfig, type ImageFormat } from '../config/doc-config.js';
import { createConsoleSink, type DiagnosticSink } from '../parser/parser-interfaces.js';
import { NoopIndexRegistry, NullDiagramTool, PlainCodeHighlighter, englishTranslator } from './collaborators.js';
import type { DiagramTool, IndexRegistry, SyntaxHighlighter, Translator } from './output-interfaces.js';

export interface RenderContext {
  readonly htmlFileExtension: string;
  readonly useMathJax: boolean;
  readonly imageFormat: ImageFormat;
  readonly externalLinksInWindow: boolean;
  readonly tagFileLocations: Readonly<Record<string, string>>;
  readonly internalDocs: boolean;
  readonly tabSize: number;
  readonly outputDirectory: string;

  readonly highlighter: SyntaxHighlighter;
  readonly diagramTool: DiagramTool;
  readonly translator: Translator;
  readonly index: IndexRegistry;
  readonly diagnostics: DiagnosticSink;

  /** Next free name for an inline diagram, e.g. `inline_dotgraph_1` */
  nextDiagramName(prefix: string): string;
}

export interface RenderCollaborators {
  highlighter?: SyntaxHighlighter;
  diagramTool?: DiagramTool;
  translator?: Translator;
  index?: IndexRegistry;
  diagnostics?: DiagnosticSink;
}

export function createRenderContext(config: DocConfig = loadDocConfig(), collaborators: RenderCollaborators = {}): RenderContext {
  const counters = new Map<string, number>();

  return {
    htmlFileExtension: config.htmlFileExtension,
    useMathJax: config.useMathJax,
    imageFormat: config.dotImageFormat,
    externalLinksInWindow: config.externalLinksInWindow,
    tagFileLocations: config.tagFileLocations,
    internalDocs: config.internalDocs,
    tabSize: config.tabSize,
    outputDirectory: config.outputDirectory,

    highlighter: collaborators.highlighter ?? new PlainCodeHighlighter(),
    diagramTool: collaborators.diagramTool ?? new NullDiagramTool(),
    translator: collaborators.translator ?? englishTranslator,
    index: collaborators.index ?? new NoopIndexRegistry(),
    diagnostics: collaborators.diagnostics ?? createConsoleSink(),

    nextDiagramName(prefix) {
      const next = (counters.get(prefix) ?? 0) + 1;
      counters.set(prefix, next);
      return `${prefix}${next}`;
    }
  };
}
