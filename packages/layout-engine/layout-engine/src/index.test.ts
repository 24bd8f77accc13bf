import { describe, expect, it } from 'vitest';
import {
  LayoutError,
  ShaperTimeoutError,
  type FontDescriptor,
  type LayoutNode,
  type ShapedRun,
  type TextShaper,
} from '@folio/contracts';
import { parseDocument } from '@folio/markup-adapter';
import { layoutDocument, type LayoutOptions } from './index.js';

/** Every character is 10px wide; lines are as tall as the font size. */
class FixedWidthShaper implements TextShaper {
  calls = 0;

  measure(text: string, font: FontDescriptor): ShapedRun {
    this.calls += 1;
    return { width: [...text].length * 10, ascent: font.sizePx * 0.75, descent: font.sizePx * 0.25 };
  }
}

const layout = (source: string, overrides: Partial<LayoutOptions> = {}) =>
  layoutDocument(parseDocument(source).document.root, {
    viewportWidth: 800,
    viewportHeight: 600,
    dpi: 96,
    shaper: new FixedWidthShaper(),
    ...overrides,
  });

const childAt = (node: LayoutNode, ...path: number[]): LayoutNode => {
  let current = node;
  for (const index of path) {
    if (!('children' in current)) throw new Error(`${current.id} has no children`);
    current = current.children[index];
  }
  return current;
};

const rectOf = (node: { x: number; y: number; width: number; height: number }) => ({
  x: node.x,
  y: node.y,
  width: node.width,
  height: node.height,
});

describe('layoutDocument', () => {
  describe('widths', () => {
    it('splits a box between fill children after content-sized ones', () => {
      const result = layout('(box ({(fill "2")} "aaaa") ({(fill "4")} "bbbb") ("ccccc"))');
      const box = childAt(result.root, 0);
      expect(box.id).toBe('0');
      expect(rectOf(box)).toEqual({ x: 0, y: 0, width: 800, height: 16 });
      expect([0, 1, 2].map((i) => rectOf(childAt(box, i)))).toEqual([
        { x: 0, y: 0, width: 250, height: 16 },
        { x: 250, y: 0, width: 500, height: 16 },
        { x: 750, y: 0, width: 50, height: 16 },
      ]);
      expect(result.warnings).toEqual([]);
    });

    it('shares a box equally when nothing fills', () => {
      const result = layout('(box ("aa") ("bbbbbbbbbbbbbbbbbbbb") ("c"))', { viewportWidth: 301 });
      const box = childAt(result.root, 0);
      expect([0, 1, 2].map((i) => childAt(box, i).width)).toEqual([51, 200, 50]);
    });

    it('gives vbox children the full width', () => {
      const result = layout('(vbox ("a") ("b"))', { viewportWidth: 320.7 });
      expect(result.width).toBe(320);
      expect(childAt(result.root, 0, 1).width).toBe(320);
    });

    it('reports negative fill ratios and sizes the item to its content', () => {
      const result = layout('(box ({(fill "-1")} "aa") ("b"))', { viewportWidth: 100 });
      expect(result.warnings).toEqual([
        { code: 'INVALID_FILL_RATIO', message: 'fill ratio -1 is negative; the item is sized to its content', nodeId: '0.0' },
      ]);
      const box = childAt(result.root, 0);
      expect([childAt(box, 0).width, childAt(box, 1).width]).toEqual([50, 50]);
    });

    it('replaces an item with no width left by a placeholder', () => {
      const result = layout('(box ({(fill "1")} "a") ("bbbbbbbbbbbb"))', { viewportWidth: 100 });
      expect(result.warnings).toEqual([
        {
          code: 'ZERO_AVAILABLE_WIDTH',
          message: 'no horizontal space left for this text; drawn as a 1x1 placeholder',
          nodeId: '0.0',
        },
      ]);
      const box = childAt(result.root, 0);
      expect(childAt(box, 0)).toEqual({
        kind: 'placeholder',
        id: '0.0',
        x: 0,
        y: 0,
        width: 1,
        height: 1,
        reason: 'ZERO_AVAILABLE_WIDTH',
      });
      expect(rectOf(childAt(box, 1))).toEqual({ x: 0, y: 0, width: 120, height: 16 });
    });

    it('replaces the whole page when the viewport has no width', () => {
      const result = layout('(box ("a"))', { viewportWidth: 0 });
      expect(result.root.kind).toBe('placeholder');
      expect(result.warnings.map((w) => w.nodeId)).toEqual(['root']);
    });
  });

  describe('text', () => {
    it('wraps greedily at word boundaries', () => {
      const result = layout('("aaa bbb ccc")', { viewportWidth: 75 });
      const text = childAt(result.root, 0);
      expect(text.kind === 'text' && text.lines).toEqual([
        { x: 0, y: 0, width: 70, height: 16, text: 'aaa bbb' },
        { x: 0, y: 16, width: 30, height: 16, text: 'ccc' },
      ]);
      expect(text.height).toBe(32);
    });

    it('puts a word wider than the line on its own line', () => {
      const result = layout('("aaaaaaaaaaaa b")', { viewportWidth: 50 });
      const text = childAt(result.root, 0);
      expect(text.kind === 'text' && text.lines.map((line) => line.text)).toEqual(['aaaaaaaaaaaa', 'b']);
    });

    it('keeps one line for empty text', () => {
      const text = childAt(layout('("")').root, 0);
      expect(text.kind === 'text' && text.lines).toEqual([{ x: 0, y: 0, width: 0, height: 16, text: '' }]);
      expect(text.height).toBe(16);
    });

    it('sizes fonts from points and dpi', () => {
      const text = childAt(layout('({(size "12")} "a")', { dpi: 192 }).root, 0);
      expect(text.kind === 'text' && [text.font.sizePx, text.lineHeight]).toEqual([32, 32]);
    });
  });

  describe('heights', () => {
    const source =
      '(box ({(fill "1")} "aaaa bbbb cccc dddd") (vbox {(fill "1")} ({(fill "3")} "a") ({(fill "1")} "b")))';

    it('hands a taller slot to the fill children of a vbox', () => {
      const result = layout(source, { viewportWidth: 100 });
      const vbox = childAt(result.root, 0, 1);
      expect(vbox.kind === 'vbox' && [vbox.x, vbox.height, vbox.contentHeight]).toEqual([50, 64, 32]);
      expect([0, 1].map((i) => rectOf(childAt(vbox, i)))).toEqual([
        { x: 50, y: 0, width: 50, height: 40 },
        { x: 50, y: 40, width: 50, height: 24 },
      ]);
    });

    it('never changes the heights of the vbox or its ancestors', () => {
      const result = layout(source, { viewportWidth: 100 });
      const box = childAt(result.root, 0);
      expect(box.height).toBe(64);
      expect(result.root.kind === 'vbox' && [result.root.height, result.root.contentHeight]).toEqual([64, 64]);
      expect(result.height).toBe(64);
    });

    it('gives the page root no height constraint', () => {
      const result = layout('({(fill "1")} "a")', { viewportHeight: 1000 });
      expect(result.height).toBe(16);
      expect(childAt(result.root, 0).height).toBe(16);
    });

    it('stretches box children to the row height', () => {
      const result = layout('(box ("aaaa bbbb") ("c"))', { viewportWidth: 100 });
      const box = childAt(result.root, 0);
      expect([childAt(box, 0).height, childAt(box, 1).height]).toEqual([32, 32]);
    });
  });

  describe('inline flow', () => {
    const source = '(inline ("Read the ") (^ "frgi://intro" "intro") (" now") (# "end"))';

    it('flows its children as one line sequence', () => {
      const result = layout(source, { viewportWidth: 1000 });
      const inline = childAt(result.root, 0);
      expect(rectOf(inline)).toEqual({ x: 0, y: 0, width: 1000, height: 16 });
      expect([0, 1, 2].map((i) => rectOf(childAt(inline, i)))).toEqual([
        { x: 0, y: 0, width: 80, height: 16 },
        { x: 90, y: 0, width: 50, height: 16 },
        { x: 150, y: 0, width: 30, height: 16 },
      ]);
      const link = childAt(inline, 1);
      expect(link.kind === 'link' && link.lines).toEqual([{ x: 90, y: 0, width: 50, height: 16, text: 'intro' }]);
      expect(result.links).toEqual([{ url: 'frgi://intro', text: 'intro', nodeId: '0.1' }]);
      expect(result.anchors.get('end')).toBe(0);
    });

    it('wraps across children', () => {
      const result = layout(source, { viewportWidth: 100 });
      const inline = childAt(result.root, 0);
      expect(inline.height).toBe(32);
      expect(rectOf(childAt(inline, 1))).toEqual({ x: 0, y: 16, width: 50, height: 16 });
      expect(rectOf(childAt(inline, 2))).toEqual({ x: 60, y: 16, width: 30, height: 16 });
      expect(result.anchors.get('end')).toBe(16);
    });
  });

  describe('anchors and links', () => {
    it('maps anchors to their vertical offset', () => {
      const result = layout('("a")(# "mid")("b")');
      expect(result.anchors).toEqual(new Map([['mid', 16]]));
      expect(childAt(result.root, 2).y).toBe(16);
    });

    it('maps a repeated anchor name to its first occurrence', () => {
      const result = layout('("a")(# "x")("b")(# "x")');
      expect(result.anchors).toEqual(new Map([['x', 16]]));
      expect(result.root.kind === 'vbox' && result.root.children.map((node) => node.kind)).toEqual([
        'text',
        'anchor',
        'text',
      ]);
    });

    it('uses the URL as the text of a link without one', () => {
      const result = layout('(vbox (^ "frgi://home"))');
      expect(result.links).toEqual([{ url: 'frgi://home', text: 'frgi://home', nodeId: '0.0' }]);
    });
  });

  describe('binaries', () => {
    const images = new Map([['pic', { width: 200, height: 100 }]]);

    it('scales resolved images', () => {
      const node = childAt(layout('(& "pic" {(scale "0.5")} "alt")', { images }).root, 0);
      expect(node.kind === 'binary' && [node.resolved, node.image, node.height]).toEqual([
        true,
        { x: 0, y: 0, width: 100, height: 50 },
        50,
      ]);
    });

    it('shrinks images to the available width', () => {
      const node = childAt(layout('(& "pic")', { images, viewportWidth: 150 }).root, 0);
      expect(node.kind === 'binary' && node.image).toEqual({ x: 0, y: 0, width: 150, height: 75 });
    });

    it('renders the alt text of unresolved binaries', () => {
      const node = childAt(layout('(& "missing" "two words")', { images }).root, 0);
      expect(node.kind === 'binary' && [node.resolved, node.lines]).toEqual([
        false,
        [{ x: 0, y: 0, width: 90, height: 16, text: 'two words' }],
      ]);
    });
  });

  describe('shaping', () => {
    it('measures each distinct run once per call', () => {
      const shaper = new FixedWidthShaper();
      const { root } = parseDocument('("aa aa aa")').document;
      const options = { viewportWidth: 800, viewportHeight: 600, dpi: 96, shaper };
      layoutDocument(root, options);
      expect(shaper.calls).toBe(4);
      layoutDocument(root, options);
      expect(shaper.calls).toBe(8);
    });

    it('surfaces shaper timeouts as retryable layout errors', () => {
      const shaper: TextShaper = {
        measure: () => {
          throw new ShaperTimeoutError();
        },
      };
      let caught: unknown;
      try {
        layout('("a")', { shaper });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(LayoutError);
      expect(caught instanceof LayoutError && [caught.code, caught.retryable]).toEqual(['SHAPER_TIMEOUT', true]);
    });

    it('reports other shaper failures as not retryable', () => {
      const shaper: TextShaper = {
        measure: () => {
          throw new Error('font service unavailable');
        },
      };
      expect(() => layout('("a")', { shaper })).toThrow(LayoutError);
      try {
        layout('("a")', { shaper });
      } catch (error) {
        expect(error instanceof LayoutError && [error.code, error.retryable]).toEqual(['SHAPER_FAILED', false]);
      }
    });

    it('is deterministic', () => {
      const source = '(box ({(fill "1")} "one two three") (inline ("x") (# "a")))';
      expect(layout(source, { viewportWidth: 120 })).toEqual(layout(source, { viewportWidth: 120 }));
    });
  });

  it('numbers nested nodes by their child path', () => {
    const result = layout('(vbox (box ("a") ("b")))');
    expect(childAt(result.root, 0, 0, 1).id).toBe('0.0.1');
    expect(result.root.id).toBe('root');
  });
});
