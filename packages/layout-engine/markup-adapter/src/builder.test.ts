import { describe, expect, it } from 'vitest';
import { MarkupBuildError } from '@folio/contracts';
import { defaultStyleFor } from '@folio/style-engine';
import { parseDocument } from './index.js';

const buildError = (source: string): MarkupBuildError => {
  try {
    parseDocument(source);
  } catch (error) {
    if (error instanceof MarkupBuildError) return error;
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail`);
};

describe('buildDocument', () => {
  it('wraps top-level items in a root vbox', () => {
    const { document, warnings } = parseDocument('(box ({bold} "hi") (# "top"))');
    expect(warnings).toEqual([]);
    expect(document.root).toEqual({
      kind: 'vbox',
      style: defaultStyleFor('vbox'),
      children: [
        {
          kind: 'box',
          style: defaultStyleFor('box'),
          children: [
            { kind: 'text', content: 'hi', style: { ...defaultStyleFor('text'), weight: 'bold' } },
            { kind: 'anchor', name: 'top' },
          ],
        },
      ],
    });
    expect(document.anchors).toEqual(['top']);
  });

  it('treats an explicit text head like a plain text list', () => {
    const { document } = parseDocument('(text {italic} "x")');
    expect(document.root.children).toEqual([
      { kind: 'text', content: 'x', style: { ...defaultStyleFor('text'), decorations: ['italic'] } },
    ]);
  });

  it('keeps the first of two anchors with the same name', () => {
    const { document, warnings } = parseDocument('(# "x")("a")(# "x")');
    expect(warnings).toEqual([
      {
        code: 'DUPLICATE_ANCHOR',
        message: 'anchor "x" is already defined; this one is dropped',
        position: { line: 1, column: 13 },
      },
    ]);
    expect(document.root.children.map((node) => node.kind)).toEqual(['anchor', 'text']);
    expect(document.anchors).toEqual(['x']);
  });

  it('leaves link text unset when omitted', () => {
    const [link] = parseDocument('(^ "frgi://home")').document.root.children;
    expect(link).toEqual({ kind: 'link', url: 'frgi://home', style: defaultStyleFor('link') });
    expect('text' in link).toBe(false);
  });

  it('keeps empty link text', () => {
    const [link] = parseDocument('(^ "frgi://home" "")').document.root.children;
    expect(link.kind === 'link' && link.text).toBe('');
  });

  it('builds binary references with scale and alt text', () => {
    const { document } = parseDocument('(& "header.jpg" {(scale "0.5")} "alt" " text")(& "header.jpg")');
    expect(document.root.children[0]).toEqual({
      kind: 'binary',
      name: 'header.jpg',
      style: { ...defaultStyleFor('binary'), scale: 0.5 },
      altText: 'alt text',
    });
    expect(document.binaryReferences).toEqual(['header.jpg']);
  });

  it('lets ad hoc modifiers override a named style', () => {
    const { document } = parseDocument('{ (A (fg "FF0000")) } ({A (fg "00FF00")} "x")');
    const [node] = document.root.children;
    expect(node.kind === 'text' && node.style.foreground).toBe('#00FF00');
  });

  it('applies kind rules, including the link and binary sigils', () => {
    const { document } = parseDocument('{ (text italic) ^ (bold) } ("x") (^ "u")');
    const [text, link] = document.root.children;
    expect(text.kind === 'text' && text.style.decorations).toEqual(['italic']);
    expect(link.kind === 'link' && link.style).toEqual({
      ...defaultStyleFor('link'),
      weight: 'bold',
    });
  });

  it('ignores the style list of an inline item', () => {
    const { document, warnings } = parseDocument('(inline {bold} ("a") (^ "u" "b"))');
    expect(warnings).toEqual([
      {
        code: 'IGNORED_STYLE_LIST',
        message: 'inline items take no style; style the items inside them instead',
        position: { line: 1, column: 1 },
      },
    ]);
    expect(document.root.children[0]).toEqual({
      kind: 'inline',
      children: [
        { kind: 'text', content: 'a', style: defaultStyleFor('text') },
        { kind: 'link', url: 'u', text: 'b', style: defaultStyleFor('link') },
      ],
    });
  });

  it('reports unknown style references and keeps the rest of the list', () => {
    const { document, warnings } = parseDocument('({ghost bold} "x")');
    expect(warnings).toEqual([
      { code: 'UNKNOWN_STYLE_REFERENCE', message: 'unknown style "ghost"', position: { line: 1, column: 3 } },
    ]);
    const [node] = document.root.children;
    expect(node.kind === 'text' && node.style.weight).toBe('bold');
  });

  it('reports style table problems once', () => {
    const { warnings } = parseDocument('{ (a b) (b a) } ({a} "x") ({b} "y")');
    expect(warnings).toEqual([
      {
        code: 'RECURSIVE_STYLE_REFERENCE',
        message: 'style "a" refers back to itself through a -> b -> a',
        position: { line: 1, column: 12 },
      },
    ]);
  });

  it('resolves styles that reference the next one twice, twenty levels deep', () => {
    const chain = Array.from({ length: 20 }, (_, i) => `(s${i} s${i + 1} s${i + 1})`).join(' ');
    const { document, warnings } = parseDocument(`{ ${chain} (s20 bold) } ({s0} "hi")`);
    expect(warnings).toEqual([]);
    const [node] = document.root.children;
    expect(node.kind === 'text' && node.style.weight).toBe('bold');
  });

  it('resolves a style list with hundreds of thousands of modifiers', () => {
    const { document, warnings } = parseDocument(`({${'bold '.repeat(300000)}} "hi")`);
    expect(warnings).toEqual([]);
    const [node] = document.root.children;
    expect(node.kind === 'text' && node.style.weight).toBe('bold');
  });

  it('reports every unknown reference in a long style list', () => {
    const { warnings } = parseDocument(`({${'ghost '.repeat(200000)}} "hi")`);
    expect(warnings).toHaveLength(200000);
    expect(warnings[199999].code).toBe('UNKNOWN_STYLE_REFERENCE');
  });

  it('builds deeply nested boxes', () => {
    const depth = 20000;
    const { document } = parseDocument(`${'(vbox '.repeat(depth)}("deep")${')'.repeat(depth)}`);
    let node = document.root.children[0];
    let levels = 0;
    while (node.kind === 'vbox') {
      node = node.children[0];
      levels += 1;
    }
    expect(levels).toBe(depth);
    expect(node.kind === 'text' && node.content).toBe('deep');
  });

  describe('structural errors', () => {
    it('rejects boxes inside inline items', () => {
      const error = buildError('(inline (box ("a")))');
      expect(error.code).toBe('INVALID_ITEM');
      expect(error.position).toEqual({ line: 1, column: 9 });
    });

    it('rejects bare strings in containers', () => {
      expect(buildError('(box "hi")').position).toEqual({ line: 1, column: 6 });
      expect(buildError('(inline "hi")').code).toBe('INVALID_ITEM');
    });

    it('rejects anchors with a style list or the wrong number of names', () => {
      expect(buildError('(# {bold} "x")').code).toBe('INVALID_ITEM');
      expect(buildError('(#)').code).toBe('INVALID_ITEM');
      expect(buildError('(# "a" ("b"))').code).toBe('INVALID_ITEM');
    });

    it('rejects links without a URL', () => {
      expect(buildError('(^ {bold})').message).toBe('links need a URL string (line 1, column 1)');
    });

    it('rejects binary references without a name', () => {
      expect(buildError('(&)').code).toBe('INVALID_ITEM');
    });

    it('rejects nested items in text lists', () => {
      expect(buildError('(text ("a"))').position).toEqual({ line: 1, column: 7 });
    });
  });
});
