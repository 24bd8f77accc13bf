/**
 * @folio/painter-html
 *
 * Paints a layout result as a standalone HTML page. Every node becomes an
 * absolutely positioned element at the coordinates layout gave it; nothing is
 * re-flowed by the browser.
 */

import type { FontDescriptor, LayoutLine, LayoutNode, LayoutResult, Style } from '@folio/contracts';

export const CLASS_NAMES = {
  page: 'folio-page',
  node: 'folio-node',
  line: 'folio-line',
  anchor: 'folio-anchor',
  alt: 'folio-alt',
  placeholder: 'folio-placeholder',
} as const;

export type PaintOptions = {
  /** URL for a resolved binary's `<img src>`. Defaults to the binary's name. */
  binaryUrl?: (name: string) => string;
  /** Document title. */
  title?: string;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const CSS_FAMILIES: Record<FontDescriptor['family'], string> = {
  serif: 'serif',
  sans: 'sans-serif',
  mono: 'monospace',
};

const PAGE_CSS = [
  'body{margin:0}',
  `.${CLASS_NAMES.page}{position:relative;overflow:hidden}`,
  `.${CLASS_NAMES.node},.${CLASS_NAMES.line}{position:absolute;margin:0;box-sizing:border-box}`,
  `.${CLASS_NAMES.line}{white-space:pre}`,
  `.${CLASS_NAMES.placeholder}{outline:1px dashed #999999}`,
].join('\n');

const SCROLL_TO_HASH_SCRIPT =
  'if(location.hash){var t=document.getElementById(decodeURIComponent(location.hash.slice(1)));if(t)window.scrollTo(0,t.offsetTop);}';

type Rect = { x: number; y: number; width: number; height: number };

const rectCss = (rect: Rect, origin: { x: number; y: number } = { x: 0, y: 0 }): string[] => [
  `left:${rect.x - origin.x}px`,
  `top:${rect.y - origin.y}px`,
  `width:${rect.width}px`,
  `height:${rect.height}px`,
];

/** CSS declarations for a resolved style and the font layout measured it with. */
export function textCss(style: Style, font: FontDescriptor, lineHeight: number): string[] {
  const css = [
    `font-family:${CSS_FAMILIES[font.family]}`,
    `font-size:${font.sizePx}px`,
    `font-weight:${font.weight}`,
    `line-height:${lineHeight}px`,
    `color:${style.foreground}`,
  ];
  if (font.italic) css.push('font-style:italic');

  const lines: string[] = [];
  if (style.decorations.includes('underline')) lines.push('underline');
  if (style.decorations.includes('strike')) lines.push('line-through');
  if (lines.length > 0) css.push(`text-decoration:${lines.join(' ')}`);
  return css;
}

const styleAttr = (css: string[]): string => `style="${escapeHtml(css.join(';'))}"`;

const lineSpans = (lines: readonly LayoutLine[], origin: Rect): string =>
  lines
    .map(
      (line) =>
        `<span class="${CLASS_NAMES.line}" ${styleAttr(rectCss(line, origin))}>${escapeHtml(line.text)}</span>`,
    )
    .join('');

const backgroundCss = (style: Style): string[] => (style.background ? [`background:${style.background}`] : []);

/** Markup for a single node, not including its children. */
function paintNode(node: LayoutNode, binaryUrl: (name: string) => string): string {
  const open = (tag: string, className: string, css: string[], attrs = ''): string =>
    `<${tag} class="${CLASS_NAMES.node}${className ? ` ${className}` : ''}" data-node="${escapeHtml(node.id)}"${attrs} ${styleAttr(css)}>`;

  switch (node.kind) {
    case 'box':
    case 'vbox':
      return `${open('div', '', [...rectCss(node), ...backgroundCss(node.style)])}</div>`;
    case 'inline':
      return `${open('div', '', rectCss(node))}</div>`;
    case 'text':
      return `${open('div', '', [...rectCss(node), ...backgroundCss(node.style), ...textCss(node.style, node.font, node.lineHeight)])}${lineSpans(node.lines, node)}</div>`;
    case 'link':
      return `${open('a', '', [...rectCss(node), ...backgroundCss(node.style), ...textCss(node.style, node.font, node.lineHeight)], ` href="${escapeHtml(node.url)}"`)}${lineSpans(node.lines, node)}</a>`;
    case 'binary':
      if (node.resolved && node.image) {
        return `${open('img', '', rectCss(node.image), ` src="${escapeHtml(binaryUrl(node.name))}" alt="${escapeHtml(node.altText)}"`)}`;
      }
      return `${open('div', CLASS_NAMES.alt, [...rectCss(node), ...backgroundCss(node.style), ...textCss(node.style, node.font, node.lineHeight)])}${lineSpans(node.lines, node)}</div>`;
    case 'anchor':
      return `${open('a', CLASS_NAMES.anchor, [`left:${node.x}px`, `top:${node.y}px`], ` id="${escapeHtml(node.name)}"`)}</a>`;
    case 'placeholder':
      return `${open('div', CLASS_NAMES.placeholder, rectCss(node))}</div>`;
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

/**
 * Renders a layout result as a complete HTML document.
 *
 * Nodes are emitted flat, parents before children, so later siblings paint over
 * earlier ones the same way they were laid out.
 */
export function paintHtml(result: LayoutResult, options: PaintOptions = {}): string {
  const binaryUrl = options.binaryUrl ?? ((name: string) => name);
  const elements: string[] = [];

  const stack: LayoutNode[] = [result.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    elements.push(paintNode(node, binaryUrl));
    if ('children' in node) {
      for (let i = node.children.length - 1; i >= 0; i -= 1) {
        stack.push(node.children[i]);
      }
    }
  }

  const hasAnchors = result.anchors.size > 0;
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(options.title ?? 'Document')}</title>`,
    `<style>\n${PAGE_CSS}\n</style>`,
    '</head>',
    '<body>',
    `<div class="${CLASS_NAMES.page}" style="width:${result.width}px;height:${result.height}px">`,
    ...elements,
    '</div>',
    ...(hasAnchors ? [`<script>${SCROLL_TO_HASH_SCRIPT}</script>`] : []),
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
