/**
 * Tests for Stage 2: HTML Visitor
 *
 * Parsed comments rendered to HTML with the default collaborators, plus
 * stand-ins for the highlighter, diagram tool and index.
 */

import { describe, test, expect } from 'vitest';
import { loadDocConfig } from '../../config/doc-config.js';
import { createDocParser } from '../../parser/core-parser.js';
import { createParaNode, createRootNode, createWordNode } from '../../parser/ast-factory.js';
import {
  createCollectingSink,
  DiagnosticSeverity,
  DocInvariantError,
  ParseErrorCode
} from '../../parser/parser-interfaces.js';
import { PlainCodeHighlighter } from '../collaborators.js';
import { indexWordToAnchor } from '../html-visitor.js';
import { renderHtml, tryRenderHtml } from '../html-renderer.js';
import type {
  CodeOutputInterface,
  DiagramRequest,
  DiagramTool,
  HighlightRequest,
  IndexRegistry
} from '../output-interfaces.js';
import { createRenderContext, type RenderCollaborators } from '../render-context.js';

interface Rendered {
  html: string;
  sink: ReturnType<typeof createCollectingSink>;
}

function render(text: string, config: object = {}, collaborators: RenderCollaborators = {}): Rendered {
  const sink = createCollectingSink();
  const ctx = createRenderContext(loadDocConfig(config), { diagnostics: sink, ...collaborators });
  const { root } = createDocParser().parseDoc({ text });
  return { html: renderHtml(root, ctx), sink };
}

function paragraphMarkers(html: string): { open: number; close: number } {
  return {
    open: html.match(/<p[\s>]/g)?.length ?? 0,
    close: html.match(/<\/p>/g)?.length ?? 0
  };
}

class RecordingHighlighter extends PlainCodeHighlighter {
  readonly languages: string[] = [];

  override parseCode(out: CodeOutputInterface, request: HighlightRequest): void {
    this.languages.push(request.language);
    super.parseCode(out, request);
  }
}

describe('Stage 2: HTML Visitor', () => {
  describe('Paragraphs', () => {
    test('single paragraph', () => {
      expect(render('Hello world').html).toBe('<p>Hello world</p>\n');
    });

    test('two paragraphs', () => {
      expect(render('One\n\nTwo').html).toBe('<p>One</p>\n<p>Two</p>\n');
    });

    test('table closes and reopens the paragraph', () => {
      expect(render('a <table><tr><td>x</td></tr></table> b').html).toBe(
        '<p>a </p><table class="doxtable">\n<tr>\n<td>x</td></tr>\n</table>\n<p> b</p>\n'
      );
    });

    test('table after leading whitespace opens no paragraph', () => {
      const { html } = render('  <table><tr><td>x</td></tr></table> b');
      expect(html).toBe('<table class="doxtable">\n<tr>\n<td>x</td></tr>\n</table>\n<p> b</p>\n');
      expect(paragraphMarkers(html)).toEqual({ open: 1, close: 1 });
    });

    test('rulers separated by whitespace', () => {
      const { html } = render('a <hr>  <hr> c');
      expect(html).toBe('<p>a </p><hr/>\n <hr/>\n<p> c</p>\n');
      expect(paragraphMarkers(html)).toEqual({ open: 2, close: 2 });
    });

    test('ruler followed by trailing whitespace', () => {
      const { html } = render('a <hr>  \n\nb');
      expect(html).toBe('<p>a </p><hr/>\n<p>b</p>\n');
      expect(paragraphMarkers(html)).toEqual({ open: 2, close: 2 });
    });

    test('ruler inside an open center span', () => {
      const { html } = render('x <center>a <hr> b</center> c');
      expect(html).toBe('<p>x </p><center>a <hr/>\n b</center><p> c</p>\n');
      expect(paragraphMarkers(html)).toEqual({ open: 2, close: 2 });
    });

    test('dontinclude keeps the paragraph open', () => {
      const { html } = render('\\dontinclude f.c\n\\line x');
      expect(html).toBe('<p> <div class="fragment"></div><!-- fragment --></p>\n');
      expect(paragraphMarkers(html)).toEqual({ open: 1, close: 1 });
    });

    test('line break', () => {
      expect(render('one \\n two').html).toBe('<p>one <br />\n two</p>\n');
    });
  });

  describe('Inline content', () => {
    test('escaped symbols', () => {
      expect(render('a \\& b').html).toBe('<p>a &amp; b</p>\n');
    });

    test('urls and e-mail addresses', () => {
      expect(render('see https://example.com/x.').html)
        .toBe('<p>see <a href="https://example.com/x">https://example.com/x</a>.</p>\n');
      expect(render('mail test@example.com').html)
        .toContain('<a href="mailto:test@example.com">test@example.com</a>');
    });

    test('unresolved reference is emphasized', () => {
      expect(render('See \\ref foo here').html).toBe('<p>See <em>foo</em> here</p>\n');
    });

    test('unclosed bold is closed at the paragraph end', () => {
      expect(render('Some <b>bold').html).toBe('<p>Some <b>bold</b></p>\n');
    });

    test('index entry writes an anchor and registers the word', () => {
      const entries: string[][] = [];
      const index: IndexRegistry = {
        addIndexItem: (scope, anchor, entry) => { entries.push([scope, anchor, entry]); }
      };
      expect(render('\\addindex widget', {}, { index }).html).toContain('<a name="awidget"></a>');
      expect(entries).toEqual([['', 'awidget', 'widget']]);
      expect(indexWordToAnchor('a b')).toBe('aa:20b');
    });
  });

  describe('Lists and sections', () => {
    test('nested automatic list', () => {
      expect(render('- a\n  - b\n- c').html)
        .toBe('<ul>\n<li>a <ul>\n<li>b</li>\n</ul>\n</li>\n<li>c</li>\n</ul>\n');
    });

    test('html list', () => {
      expect(render('<ul><li>one</li><li>two</li></ul>').html).toBe('<ul>\n<li>\none</li>\n<li>\ntwo</li>\n</ul>\n');
    });

    test('merged notes share one definition list', () => {
      expect(render('@note A\n@note B').html)
        .toBe('<dl class="section note"><dt>Note</dt><dd>A</dd>\n<dd>\nB</dd></dl>\n');
    });

    test('different section types', () => {
      expect(render('@note A\n@warning B').html).toBe(
        '<dl class="section note"><dt>Note</dt><dd>A</dd></dl>\n' +
        '<dl class="section warning"><dt>Warning</dt><dd>B</dd></dl>\n'
      );
    });

    test('parameter table', () => {
      expect(render('@param[in] x The value').html).toBe(
        '<dl class="params"><dt>Parameters</dt><dd>\n' +
        '  <table class="params">\n' +
        '    <tr><td class="paramdir">[in]</td><td class="paramname">x</td><td>The value</td></tr>\n' +
        '  </table>\n' +
        '  </dd>\n' +
        '</dl>\n'
      );
    });

    test('cross-reference item', () => {
      expect(render('@todo fix this').html).toBe(
        '<dl class="todo"><dt><b><a class="el" href="todo.html#_todo000001">Todo:</a></b></dt><dd>fix this</dd></dl>\n'
      );
    });

    test('document section', () => {
      expect(render('\\section intro Introduction\nBody text').html).toBe(
        '<h1><a class="anchor" id="intro"></a>\nIntroduction</h1>\n<p>Body text</p>\n'
      );
    });

    test('internal documentation follows the setting', () => {
      const text = 'Public\n\n\\internal\nSecret\n\\endinternal';
      expect(render(text).html).toBe('<p>Public</p>\n');
      expect(render(text, { internalDocs: true }).html).toBe('<p>Public</p>\n<p>Secret</p>\n');
    });
  });

  describe('Tables', () => {
    test('rows of different width', () => {
      expect(render('<table><tr><td>a</td><td>b</td></tr><tr><td>c</td><td>d</td><td>e</td></tr></table>').html).toBe(
        '<table class="doxtable">\n<tr>\n<td>a</td><td>b</td></tr>\n<tr>\n<td>c</td><td>d</td><td>e</td></tr>\n</table>\n'
      );
    });
  });

  describe('Code, formulas and diagrams', () => {
    test('inline formula as image or MathJax', () => {
      const text = 'Area \\f$\\pi r^2\\f$ here';
      expect(render(text).html).toBe('<p>Area <img class="formulaInl" alt="$\\pi r^2$" src="form_0.png"/> here</p>\n');
      expect(render(text, { useMathJax: true }).html).toBe('<p>Area \\(\\pi r^2\\) here</p>\n');
    });

    test('display formula', () => {
      expect(render('\\f[x\\f]').html)
        .toBe('<p class="formulaDsp">\n<img class="formulaDsp" alt="\\[x\\]" src="form_0.png"/>\n</p>\n');
    });

    test('code block', () => {
      expect(render('\\code\nint x;').html)
        .toBe('<div class="fragment"><div class="line">int x;</div>\n</div><!-- fragment -->');
    });

    test('language hint reaches the highlighter', () => {
      const highlighter = new RecordingHighlighter();
      const { html } = render('\\code{.py}\nprint(1)\n\\endcode', {}, { highlighter });
      expect(highlighter.languages).toEqual(['py']);
      expect(html).toBe('<div class="fragment"><div class="line">print(1)</div>\n</div><!-- fragment -->');
    });

    test('diagram without a tool is reported', () => {
      const { html, sink } = render('\\dot\ndigraph { a -> b }\n\\enddot');
      expect(html).toBe('<div class="dotgraph">\n</div>\n');
      expect(sink.diagnostics.map(d => [d.code, d.message])).toEqual([[
        ParseErrorCode.DIAGRAM_FAILED,
        'unable to render dot diagram inline_dotgraph_1: no dot tool available to render inline_dotgraph_1'
      ]]);
    });

    test('diagram rendered by the tool', () => {
      const diagramTool: DiagramTool = {
        render: request => ({ ok: true, imageFile: `${request.baseName}.${request.imageFormat}` })
      };
      const { html, sink } = render('\\dot\ndigraph { a -> b }\n\\enddot', {}, { diagramTool });
      expect(html).toBe('<div class="dotgraph">\n<img src="inline_dotgraph_1.png" alt="inline_dotgraph_1"/>\n</div>\n');
      expect(sink.diagnostics).toEqual([]);
    });

    test('diagram requests carry the output directory', () => {
      const requests: DiagramRequest[] = [];
      const diagramTool: DiagramTool = {
        render: request => {
          requests.push(request);
          return { ok: true, imageFile: `${request.baseName}.${request.imageFormat}` };
        }
      };
      render('\\dot\ndigraph { a -> b }\n\\enddot\n\n\\dotfile g.dot', { outputDirectory: 'out/html' }, { diagramTool });
      expect(requests.map(r => [r.baseName, r.file, r.outputDirectory])).toEqual([
        ['inline_dotgraph_1', undefined, 'out/html'],
        ['dot_g', 'g.dot', 'out/html']
      ]);
    });
  });

  describe('Images', () => {
    test('html image with caption', () => {
      expect(render('\\image html pic.png "A caption"').html).toBe(
        '<div class="image">\n<img src="pic.png" alt="pic.png"/>\n<div class="caption">\nA caption</div></div>\n'
      );
    });

    test('images for other formats are skipped', () => {
      expect(render('\\image latex pic.png').html).toBe('');
    });
  });

  describe('Broken trees', () => {
    test('invariant failure is reported, not thrown', () => {
      const root = createRootNode(false);
      const para = createParaNode(root);
      root.children.push(para);
      para.children.push(createWordNode(createParaNode(root), 'stray'));

      const sink = createCollectingSink();
      const ctx = createRenderContext(loadDocConfig(), { diagnostics: sink });
      expect(() => renderHtml(root, ctx)).toThrow(DocInvariantError);
      expect(tryRenderHtml(root, ctx)).toBeUndefined();
      expect(sink.diagnostics.map(d => [d.severity, d.code])).toEqual([
        [DiagnosticSeverity.Error, ParseErrorCode.INVARIANT_VIOLATION]
      ]);
    });
  });
});
