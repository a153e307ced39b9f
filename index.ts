/**
 * Documentation-comment compiler
 *
 * Parses annotated comment text into a document tree and renders it to HTML.
 */

import { loadDocConfig, type DocConfig } from './config/doc-config.js';
import { AliasTable } from './parser/alias-expander.js';
import type { RootNode } from './parser/ast-types.js';
import { createDocParser } from './parser/core-parser.js';
import {
  createConsoleSink,
  type DiagnosticSink,
  type DocParser,
  type FileSource,
  type LinkResolver,
  type ParseDiagnostic,
  type ParseInput
} from './parser/parser-interfaces.js';
import { relativePathToRoot } from './parser/parser-utils.js';
import { tryRenderHtml } from './render/html-renderer.js';
import { createRenderContext, type RenderCollaborators, type RenderContext } from './render/render-context.js';

export * from './parser/index.js';
export * from './render/index.js';
export { loadDocConfig, docConfigSchema, ConfigError, type DocConfig, type ImageFormat } from './config/doc-config.js';

export interface DocCompilerOptions extends RenderCollaborators {
  linkResolver?: LinkResolver;
  fileSource?: FileSource;
}

export interface CompileResult {
  root: RootNode;

  /** Undefined when the tree broke an invariant */
  html: string | undefined;

  diagnostics: ParseDiagnostic[];
}

export interface DocCompiler {
  readonly config: DocConfig;
  readonly parser: DocParser;
  readonly renderContext: RenderContext;
  compile(input: ParseInput): CompileResult;
}

/**
 * Validate the settings and build the alias table, parser and render context
 * for one pass. Everything built here is read-only afterwards.
 */
export function createDocCompiler(rawConfig: unknown = {}, options: DocCompilerOptions = {}): DocCompiler {
  const config = loadDocConfig(rawConfig);
  const diagnostics: DiagnosticSink = options.diagnostics ?? createConsoleSink();

  const parser = createDocParser({
    aliases: AliasTable.fromConfig(config.aliases, diagnostics),
    autolinkSupport: config.autolinkSupport,
    listMarkers: config.markdownListMarkers,
    linkResolver: options.linkResolver,
    fileSource: options.fileSource,
    diagnostics
  });
  const renderContext = createRenderContext(config, { ...options, diagnostics });

  return {
    config,
    parser,
    renderContext,
    compile(input) {
      const { root, diagnostics: found } = parser.parseDoc(input);
      const html = tryRenderHtml(root, renderContext, {
        fileName: input.fileName,
        relPath: input.linkFromIndex ? '' : relativePathToRoot(input.context?.outputFileBase)
      });
      return { root, html, diagnostics: found };
    }
  };
}
