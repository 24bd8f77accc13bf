/**
 * @folio/layout-engine
 *
 * Two-phase layout of a built document into a positioned tree.
 *
 * 1. Widths, top-down: every box splits its width among its children by fill
 *    ratio or content size; vbox children take the full width.
 * 2. Heights, bottom-up then top-down: leaves wrap to their width and report a
 *    base height; containers sum (vbox) or max (box) their children; a vbox
 *    handed a taller slot than its base hands the slack to its fill children.
 *
 * The document is never mutated and every call owns its measurement cache, so
 * one document can be laid out at several viewport sizes concurrently. All
 * traversals keep their own work stacks.
 */

import type {
  BinaryNode,
  DocumentNode,
  FontDescriptor,
  IntrinsicSize,
  LayoutBinaryNode,
  LayoutLine,
  LayoutLinkNode,
  LayoutNode,
  LayoutRect,
  LayoutResult,
  LayoutTextNode,
  LayoutWarning,
  LinkTarget,
  TextShaper,
  VBoxNode,
} from '@folio/contracts';
import { allocateBoxWidths, distributeProportionally } from './distribute.js';
import { flowSegments, widestAtom, type FlowFragment, type FlowLayout, type FlowSegment } from './flow.js';
import { MeasurementContext } from './measurement.js';

export { allocateBoxWidths, distributeProportionally, type BoxSlot } from './distribute.js';
export { flowSegments, widestAtom, type FlowFragment, type FlowLayout, type FlowSegment } from './flow.js';
export { MeasurementContext, fontSizePx } from './measurement.js';

export const ROOT_ID = 'root';

export type LayoutOptions = {
  viewportWidth: number;
  viewportHeight: number;
  dpi: number;
  shaper: TextShaper;
  /** Intrinsic sizes of the binaries that resolved. Other binary references render their alt text. */
  images?: ReadonlyMap<string, IntrinsicSize>;
};

/** A node taking part in an inline flow, with the owners nested under it (for inline items). */
type FlowOwner = {
  node: DocumentNode;
  id: string;
  children: number[];
};

type FlowContent = {
  segments: FlowSegment[];
  owners: FlowOwner[];
  layout?: FlowLayout;
};

type Entry = {
  node: DocumentNode;
  id: string;
  parent: Entry | undefined;
  children: Entry[];
  /** Sanitized fill ratio: zero unless positive. */
  fill: number;
  required: number;
  width: number;
  baseHeight: number;
  placeholder: boolean;
  skipped: boolean;
  flow?: FlowContent;
};

type PlaceTask = {
  entry: Entry;
  x: number;
  y: number;
  height: number;
  siblings: LayoutNode[];
};

const childId = (parentId: string, index: number): string =>
  parentId === ROOT_ID ? String(index) : `${parentId}.${index}`;

const styleFill = (node: DocumentNode): number | undefined => {
  switch (node.kind) {
    case 'text':
    case 'box':
    case 'vbox':
    case 'link':
    case 'binary':
      return node.style.fill;
    case 'inline':
    case 'anchor':
      return undefined;
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
};

const linkText = (url: string, text: string | undefined): string => text ?? url;

const altTextOf = (node: BinaryNode): string => node.altText ?? node.name;

function boundingRect(rects: readonly LayoutRect[], fallback: LayoutRect): LayoutRect {
  if (rects.length === 0) return fallback;
  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;
  for (const rect of rects) {
    left = Math.min(left, rect.x);
    top = Math.min(top, rect.y);
    right = Math.max(right, rect.x + rect.width);
    bottom = Math.max(bottom, rect.y + rect.height);
  }
  return { x: left, y: top, width: right - left, height: bottom - top };
}

class DocumentLayout {
  private readonly measure: MeasurementContext;
  private readonly images: ReadonlyMap<string, IntrinsicSize>;
  private readonly options: LayoutOptions;
  readonly warnings: LayoutWarning[] = [];
  readonly anchors = new Map<string, number>();
  readonly links: LinkTarget[] = [];

  constructor(options: LayoutOptions) {
    this.options = options;
    this.measure = new MeasurementContext(options.shaper, options.dpi);
    this.images = options.images ?? new Map();
  }

  run(root: VBoxNode): LayoutResult {
    const entries = this.collectEntries(root);
    const [rootEntry] = entries;

    this.computeRequiredWidths(entries);
    rootEntry.width = Math.floor(this.options.viewportWidth);
    this.assignWidths(entries);
    this.computeBaseHeights(entries);
    const layoutRoot = this.place(rootEntry);

    return {
      root: layoutRoot,
      width: layoutRoot.width,
      height: layoutRoot.height,
      viewport: {
        width: this.options.viewportWidth,
        height: this.options.viewportHeight,
        dpi: this.options.dpi,
      },
      anchors: this.anchors,
      links: this.links,
      warnings: this.warnings,
    };
  }

  /** Block-level entries in pre-order: every parent precedes its descendants. */
  private collectEntries(root: VBoxNode): Entry[] {
    const entries: Entry[] = [];
    const stack: Array<{ node: DocumentNode; id: string; parent: Entry | undefined }> = [
      { node: root, id: ROOT_ID, parent: undefined },
    ];

    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;
      const { node, id, parent } = item;
      const entry: Entry = {
        node,
        id,
        parent,
        children: [],
        fill: this.sanitizeFill(node, id, parent),
        required: 0,
        width: 0,
        baseHeight: 0,
        placeholder: false,
        skipped: false,
      };
      entries.push(entry);
      parent?.children.push(entry);

      if (node.kind === 'box' || node.kind === 'vbox') {
        for (let i = node.children.length - 1; i >= 0; i -= 1) {
          stack.push({ node: node.children[i], id: childId(id, i), parent: entry });
        }
      } else if (node.kind !== 'anchor') {
        entry.flow = this.collectFlow(node, id);
      }
    }
    return entries;
  }

  private sanitizeFill(node: DocumentNode, id: string, parent: Entry | undefined): number {
    const fill = styleFill(node);
    if (fill === undefined) return 0;
    if (fill < 0) {
      if (parent) {
        this.warnings.push({
          code: 'INVALID_FILL_RATIO',
          message: `fill ratio ${fill} is negative; the item is sized to its content`,
          nodeId: id,
        });
      }
      return 0;
    }
    return fill;
  }

  private imageFor(node: BinaryNode): IntrinsicSize | undefined {
    const size = this.images.get(node.name);
    return size && size.width > 0 && size.height > 0 ? size : undefined;
  }

  private wordsSegment(owner: number, text: string, font: FontDescriptor): FlowSegment {
    return { kind: 'words', owner, text, font, lineHeight: this.measure.lineHeight(font) };
  }

  /** Flattens a leaf or an inline subtree into flow segments, in document order. */
  private collectFlow(node: DocumentNode, id: string): FlowContent {
    const owners: FlowOwner[] = [];
    const segments: FlowSegment[] = [];
    const stack: Array<{ node: DocumentNode; id: string; parent: number | undefined }> = [
      { node, id, parent: undefined },
    ];

    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;
      const owner = owners.length;
      owners.push({ node: item.node, id: item.id, children: [] });
      if (item.parent !== undefined) owners[item.parent].children.push(owner);

      const current = item.node;
      switch (current.kind) {
        case 'text':
          segments.push(this.wordsSegment(owner, current.content, this.measure.fontFor(current.style)));
          break;
        case 'link':
          segments.push(
            this.wordsSegment(owner, linkText(current.url, current.text), this.measure.fontFor(current.style)),
          );
          break;
        case 'binary': {
          const image = this.imageFor(current);
          if (image) {
            const scale = current.style.scale ?? 1;
            segments.push({
              kind: 'image',
              owner,
              width: Math.ceil(image.width * scale),
              aspectRatio: image.height / image.width,
            });
          } else {
            segments.push(this.wordsSegment(owner, altTextOf(current), this.measure.fontFor(current.style)));
          }
          break;
        }
        case 'anchor':
          segments.push({ kind: 'anchor', owner });
          break;
        case 'inline':
          for (let i = current.children.length - 1; i >= 0; i -= 1) {
            stack.push({ node: current.children[i], id: childId(item.id, i), parent: owner });
          }
          break;
        case 'box':
        case 'vbox':
          // The builder rejects block containers inside inline items.
          throw new Error(`${current.kind} ${item.id} cannot be laid out inside an inline flow`);
        default: {
          const _exhaustive: never = current;
          return _exhaustive;
        }
      }
    }
    return { segments, owners };
  }

  private computeRequiredWidths(entries: readonly Entry[]): void {
    for (let i = entries.length - 1; i >= 0; i -= 1) {
      const entry = entries[i];
      switch (entry.node.kind) {
        case 'box':
          entry.required = entry.children.reduce((acc, child) => acc + child.required, 0);
          break;
        case 'vbox':
          entry.required = entry.children.reduce((acc, child) => Math.max(acc, child.required), 0);
          break;
        case 'anchor':
          entry.required = 0;
          break;
        default:
          entry.required = entry.flow ? widestAtom(entry.flow.segments, this.measure) : 0;
      }
    }
  }

  private assignWidths(entries: readonly Entry[]): void {
    for (const entry of entries) {
      if (entry.parent && (entry.parent.placeholder || entry.parent.skipped)) {
        entry.skipped = true;
        continue;
      }
      if (entry.node.kind !== 'anchor' && entry.width <= 0) {
        entry.placeholder = true;
        this.warnings.push({
          code: 'ZERO_AVAILABLE_WIDTH',
          message: `no horizontal space left for this ${entry.node.kind}; drawn as a 1x1 placeholder`,
          nodeId: entry.id,
        });
        continue;
      }

      if (entry.node.kind === 'box') {
        const widths = allocateBoxWidths(
          entry.width,
          entry.children.map((child) => ({
            required: child.required,
            fill: child.fill,
            participates: child.node.kind !== 'anchor',
          })),
        );
        entry.children.forEach((child, index) => {
          child.width = widths[index];
        });
      } else if (entry.node.kind === 'vbox') {
        for (const child of entry.children) {
          child.width = child.node.kind === 'anchor' ? 0 : entry.width;
        }
      }
    }
  }

  private computeBaseHeights(entries: readonly Entry[]): void {
    for (let i = entries.length - 1; i >= 0; i -= 1) {
      const entry = entries[i];
      if (entry.skipped) continue;
      if (entry.placeholder) {
        entry.baseHeight = 1;
        continue;
      }

      const { node } = entry;
      switch (node.kind) {
        case 'box':
          entry.baseHeight = entry.children.reduce((acc, child) => Math.max(acc, this.slotBase(child)), 0);
          break;
        case 'vbox':
          entry.baseHeight = entry.children.reduce((acc, child) => acc + this.slotBase(child), 0);
          break;
        case 'anchor':
          entry.baseHeight = 0;
          break;
        default: {
          if (!entry.flow) break;
          const layout = flowSegments(entry.flow.segments, entry.width, this.measure);
          entry.flow.layout = layout;
          entry.baseHeight = layout.lineCount === 0 ? this.emptyLineHeight(entry.flow) : layout.height;
        }
      }
    }
  }

  private slotBase(entry: Entry): number {
    return entry.node.kind === 'anchor' ? 0 : entry.baseHeight;
  }

  /** Text-like leaves keep one line of their font even when empty; inline items collapse. */
  private emptyLineHeight(flow: FlowContent): number {
    const [segment] = flow.segments;
    return segment?.kind === 'words' && flow.owners.length === 1 ? segment.lineHeight : 0;
  }

  private place(rootEntry: Entry): LayoutNode {
    const holder: LayoutNode[] = [];
    const stack: PlaceTask[] = [
      { entry: rootEntry, x: 0, y: 0, height: rootEntry.baseHeight, siblings: holder },
    ];

    while (stack.length > 0) {
      const task = stack.pop();
      if (!task) break;
      task.siblings.push(this.placeEntry(task, stack));
    }

    const [root] = holder;
    return root;
  }

  private placeEntry(task: PlaceTask, stack: PlaceTask[]): LayoutNode {
    const { entry, x, y, height } = task;
    const { node, id } = entry;

    if (entry.placeholder) {
      return { kind: 'placeholder', id, x, y, width: 1, height: 1, reason: 'ZERO_AVAILABLE_WIDTH' };
    }

    switch (node.kind) {
      case 'box': {
        const children: LayoutNode[] = [];
        const tasks: PlaceTask[] = [];
        let cursor = x;
        for (const child of entry.children) {
          const childHeight = child.node.kind === 'anchor' ? 0 : height;
          tasks.push({ entry: child, x: cursor, y, height: childHeight, siblings: children });
          cursor += Math.max(0, child.width);
        }
        this.pushReversed(stack, tasks);
        return { kind: 'box', id, x, y, width: entry.width, height, style: node.style, contentHeight: entry.baseHeight, children };
      }

      case 'vbox': {
        const children: LayoutNode[] = [];
        const tasks: PlaceTask[] = [];
        const slack = Math.max(0, height - entry.baseHeight);
        const shares = distributeProportionally(
          slack,
          entry.children.map((child) => (child.placeholder || child.node.kind === 'anchor' ? 0 : child.fill)),
        );
        let cursor = y;
        entry.children.forEach((child, index) => {
          const childHeight = this.slotBase(child) + shares[index];
          tasks.push({ entry: child, x, y: cursor, height: childHeight, siblings: children });
          cursor += childHeight;
        });
        this.pushReversed(stack, tasks);
        return { kind: 'vbox', id, x, y, width: entry.width, height, style: node.style, contentHeight: entry.baseHeight, children };
      }

      case 'anchor':
        this.recordAnchor(node.name, y);
        return { kind: 'anchor', id, x, y, width: 0, height: 0, name: node.name };

      default:
        return this.placeFlow(entry, { x, y, width: entry.width, height });
    }
  }

  private pushReversed(stack: PlaceTask[], tasks: readonly PlaceTask[]): void {
    for (let i = tasks.length - 1; i >= 0; i -= 1) {
      stack.push(tasks[i]);
    }
  }

  private recordAnchor(name: string, y: number): void {
    if (!this.anchors.has(name)) this.anchors.set(name, y);
  }

  /**
   * Turns a laid out flow into layout nodes. Owners are visited in reverse
   * pre-order so each nested inline's children exist before the inline itself.
   */
  private placeFlow(entry: Entry, slot: LayoutRect): LayoutNode {
    const { flow } = entry;
    const layout = flow?.layout;
    if (!flow || !layout) {
      throw new Error(`layout node ${entry.id} was never measured`);
    }

    const byOwner = new Map<number, FlowFragment[]>();
    for (const fragment of layout.fragments) {
      const absolute = { ...fragment, x: fragment.x + slot.x, y: fragment.y + slot.y };
      const list = byOwner.get(fragment.owner);
      if (list) list.push(absolute);
      else byOwner.set(fragment.owner, [absolute]);
    }

    const origin: LayoutRect = { x: slot.x, y: slot.y, width: 0, height: 0 };
    const nodes: LayoutNode[] = [];
    for (let index = flow.owners.length - 1; index >= 0; index -= 1) {
      const owner = flow.owners[index];
      const fragments = byOwner.get(index) ?? [];
      const children = owner.children.map((child) => nodes[child]);
      const isRoot = index === 0;
      const rect = isRoot ? slot : boundingRect(coveredRects(owner, fragments, children), origin);
      nodes[index] = this.flowNode(owner, rect, fragments, children, isRoot, entry);
    }

    for (const owner of flow.owners) {
      const node = owner.node;
      if (node.kind === 'link') {
        this.links.push({ url: node.url, text: linkText(node.url, node.text), nodeId: owner.id });
      }
    }
    for (const fragment of layout.fragments) {
      if (fragment.kind !== 'anchor') continue;
      const owner = flow.owners[fragment.owner].node;
      if (owner.kind === 'anchor') this.recordAnchor(owner.name, fragment.y + slot.y);
    }

    return nodes[0];
  }

  private flowNode(
    owner: FlowOwner,
    rect: LayoutRect,
    fragments: readonly FlowFragment[],
    children: LayoutNode[],
    isRoot: boolean,
    entry: Entry,
  ): LayoutNode {
    const { node, id } = owner;
    const base = { id, x: rect.x, y: rect.y, width: rect.width, height: rect.height };

    switch (node.kind) {
      case 'text': {
        const font = this.measure.fontFor(node.style);
        const lineHeight = this.measure.lineHeight(font);
        const lines = this.linesOf(fragments, isRoot, rect, lineHeight);
        const result: LayoutTextNode = { kind: 'text', ...base, style: node.style, font, lineHeight, lines };
        return result;
      }
      case 'link': {
        const font = this.measure.fontFor(node.style);
        const lineHeight = this.measure.lineHeight(font);
        const lines = this.linesOf(fragments, isRoot, rect, lineHeight);
        const result: LayoutLinkNode = {
          kind: 'link',
          ...base,
          url: node.url,
          text: linkText(node.url, node.text),
          style: node.style,
          font,
          lineHeight,
          lines,
        };
        return result;
      }
      case 'binary': {
        const font = this.measure.fontFor(node.style);
        const lineHeight = this.measure.lineHeight(font);
        const image = fragments.find((fragment) => fragment.kind === 'image');
        const result: LayoutBinaryNode = {
          kind: 'binary',
          ...base,
          name: node.name,
          style: node.style,
          resolved: image !== undefined,
          altText: altTextOf(node),
          font,
          lineHeight,
          lines: image ? [] : this.linesOf(fragments, isRoot, rect, lineHeight),
        };
        if (image) {
          result.image = { x: image.x, y: image.y, width: image.width, height: image.height };
        }
        return result;
      }
      case 'anchor': {
        const [marker] = fragments;
        return {
          kind: 'anchor',
          id,
          x: marker?.x ?? rect.x,
          y: marker?.y ?? rect.y,
          width: 0,
          height: 0,
          name: node.name,
        };
      }
      case 'inline':
        return {
          kind: 'inline',
          ...base,
          contentHeight: isRoot ? entry.baseHeight : rect.height,
          children,
        };
      case 'box':
      case 'vbox':
        throw new Error(`${node.kind} ${id} cannot be laid out inside an inline flow`);
      default: {
        const _exhaustive: never = node;
        return _exhaustive;
      }
    }
  }

  private linesOf(fragments: readonly FlowFragment[], isRoot: boolean, rect: LayoutRect, lineHeight: number): LayoutLine[] {
    const lines = fragments
      .filter((fragment) => fragment.kind === 'words')
      .map((fragment) => ({
        x: fragment.x,
        y: fragment.y,
        width: Math.ceil(fragment.width),
        height: fragment.height,
        text: fragment.text,
      }));
    if (lines.length === 0 && isRoot) {
      return [{ x: rect.x, y: rect.y, width: 0, height: lineHeight, text: '' }];
    }
    return lines;
  }
}

/** Rects covered by a nested owner: its own fragments plus its children's boxes. */
function coveredRects(owner: FlowOwner, fragments: readonly FlowFragment[], children: readonly LayoutNode[]): LayoutRect[] {
  const rects: LayoutRect[] = fragments.map((fragment) => ({
    x: fragment.x,
    y: fragment.y,
    width: fragment.width,
    height: fragment.height,
  }));
  if (owner.node.kind === 'inline') {
    for (const child of children) {
      rects.push({ x: child.x, y: child.y, width: child.width, height: child.height });
    }
  }
  return rects;
}

/**
 * Lays out a document's root for a viewport.
 *
 * Recoverable problems (negative fill ratios, no room left for an item) are
 * returned as warnings with the affected node id; the layout still completes.
 *
 * @throws {LayoutError} When the text shaper times out (`SHAPER_TIMEOUT`, retryable) or fails
 *
 * @example
 * ```typescript
 * const result = layoutDocument(document.root, { viewportWidth: 800, viewportHeight: 600, dpi: 96, shaper });
 * result.anchors.get('intro'); // y offset of (# "intro")
 * ```
 */
export function layoutDocument(root: VBoxNode, options: LayoutOptions): LayoutResult {
  return new DocumentLayout(options).run(root);
}
