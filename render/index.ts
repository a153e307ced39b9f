export * from './output-interfaces.js';
export {
  HtmlOutputGenerator,
  PREFRAG_START,
  PREFRAG_END,
  escapeHtml,
  escapeXml,
  convertToHtml,
  type HtmlOutputOptions
} from './html-output.js';
export { HtmlDocVisitor, htmlAttribsToString, indexWordToAnchor, type HtmlVisitorOptions } from './html-visitor.js';
export {
  mustBeOutsideParagraph,
  isSeparatedParagraph,
  getParagraphContext,
  paragraphNeedsTag,
  insideStyleChangeOutsidePara,
  shouldCloseParagraphBefore,
  shouldReopenParagraphAfter,
  paragraphClasses,
  type ParagraphContext
} from './paragraph-balancer.js';
export { createRenderContext, type RenderContext, type RenderCollaborators } from './render-context.js';
export { englishTranslator, PlainCodeHighlighter, NullDiagramTool, NoopIndexRegistry } from './collaborators.js';
export { renderHtml, tryRenderHtml, type RenderOptions } from './html-renderer.js';
