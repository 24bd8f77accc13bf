/**
 * Document builder
 *
 * Turns the raw parse tree into the typed document tree. Style lists are
 * resolved here against the document's named style table, and the argument
 * rules of each builtin are enforced:
 *
 * - `(& "name" {style} "alt text")`: name required, style and alt text optional
 * - `(# "name")`: exactly one string
 * - `(^ "url" {style} "text")`: URL required, text defaults to the URL
 * - `(box ...)`, `(vbox ...)`: child items only
 * - `(inline ...)`: text, links, anchors, binary references and inline items
 * - `({style} "text" ...)`, `(text ...)`: strings only
 *
 * Structural violations throw; style and anchor problems become warnings and
 * the affected node degrades.
 */

import {
  MarkupBuildError,
  type BoxNode,
  type DocumentNode,
  type Document,
  type InlineNode,
  type LayoutWarning,
  type RawDocument,
  type RawItem,
  type RawList,
  type RawStyleModifier,
  type RawText,
  type StyledKind,
  type Style,
  type VBoxNode,
} from '@folio/contracts';
import { createNamedStyleTable, resolveStyle, type NamedStyles } from '@folio/style-engine';

export type BuildResult = {
  document: Document;
  warnings: LayoutWarning[];
};

type FlowContext = 'block' | 'inline';

type BuildTask = {
  item: RawList;
  siblings: DocumentNode[];
  context: FlowContext;
};

type SplitList = {
  modifiers: RawStyleModifier[];
  hasStyleList: boolean;
  strings: RawText[];
  lists: RawList[];
};

function splitList(list: RawList): SplitList {
  const split: SplitList = { modifiers: [], hasStyleList: false, strings: [], lists: [] };
  for (const child of list.children) {
    switch (child.kind) {
      case 'styleList':
        split.hasStyleList = true;
        for (const modifier of child.modifiers) split.modifiers.push(modifier);
        break;
      case 'text':
        split.strings.push(child);
        break;
      case 'list':
        split.lists.push(child);
        break;
      default: {
        const _exhaustive: never = child;
        return _exhaustive;
      }
    }
  }
  return split;
}

const itemName = (list: RawList): string => (list.head === undefined ? 'text' : `(${list.head} ...)`);

const joinStrings = (strings: RawText[]): string => strings.map((s) => s.value).join('');

class DocumentBuilder {
  readonly warnings: LayoutWarning[] = [];
  private readonly anchors = new Set<string>();
  private readonly binaryReferences = new Set<string>();
  private readonly styles: NamedStyles;

  constructor(styles: NamedStyles) {
    this.styles = styles;
  }

  build(items: RawItem[]): Document {
    const root: VBoxNode = { kind: 'vbox', children: [], style: this.style('vbox', []) };
    const stack: BuildTask[] = [];
    this.pushChildren(stack, this.topLevelLists(items), root.children, 'block');

    while (stack.length > 0) {
      const task = stack.pop();
      if (!task) break;
      const node = this.buildItem(task, stack);
      if (node) task.siblings.push(node);
    }

    return {
      root,
      styles: this.styles.table,
      anchors: [...this.anchors],
      binaryReferences: [...this.binaryReferences],
    };
  }

  private topLevelLists(items: RawItem[]): RawList[] {
    return items.map((item) => {
      if (item.kind !== 'list') {
        throw new MarkupBuildError('expected a page item', item.position);
      }
      return item;
    });
  }

  /** Children are pushed in reverse so they pop, and are appended, in document order. */
  private pushChildren(stack: BuildTask[], lists: RawList[], siblings: DocumentNode[], context: FlowContext): void {
    for (let i = lists.length - 1; i >= 0; i -= 1) {
      stack.push({ item: lists[i], siblings, context });
    }
  }

  private style(kind: StyledKind, modifiers: RawStyleModifier[]): Style {
    const { style, warnings } = resolveStyle(kind, modifiers, this.styles);
    for (const warning of warnings) this.warnings.push(warning);
    return style;
  }

  private buildItem(task: BuildTask, stack: BuildTask[]): DocumentNode | undefined {
    const { item, context } = task;
    const split = splitList(item);

    switch (item.head) {
      case undefined:
      case 'text':
        if (split.lists.length > 0) {
          throw new MarkupBuildError('text items may only contain strings and a style list', split.lists[0].position);
        }
        return { kind: 'text', content: joinStrings(split.strings), style: this.style('text', split.modifiers) };

      case 'box':
      case 'vbox': {
        if (context === 'inline') {
          throw new MarkupBuildError(`${itemName(item)} cannot appear inside an inline item`, item.position);
        }
        this.rejectStrings(item, split);
        const kind = item.head === 'box' ? 'box' : 'vbox';
        const node: BoxNode | VBoxNode = { kind, children: [], style: this.style(kind, split.modifiers) };
        this.pushChildren(stack, split.lists, node.children, 'block');
        return node;
      }

      case 'inline': {
        if (split.hasStyleList) {
          this.warnings.push({
            code: 'IGNORED_STYLE_LIST',
            message: 'inline items take no style; style the items inside them instead',
            position: item.position,
          });
        }
        this.rejectStrings(item, split);
        const node: InlineNode = { kind: 'inline', children: [] };
        this.pushChildren(stack, split.lists, node.children, 'inline');
        return node;
      }

      case '#': {
        if (split.hasStyleList) {
          throw new MarkupBuildError('anchors take no style list', item.position);
        }
        this.rejectLists(item, split);
        if (split.strings.length !== 1) {
          throw new MarkupBuildError('anchors take exactly one name string', item.position);
        }
        const name = split.strings[0].value;
        if (this.anchors.has(name)) {
          this.warnings.push({
            code: 'DUPLICATE_ANCHOR',
            message: `anchor "${name}" is already defined; this one is dropped`,
            position: item.position,
          });
          return undefined;
        }
        this.anchors.add(name);
        return { kind: 'anchor', name };
      }

      case '^': {
        this.rejectLists(item, split);
        const [url, text, ...extra] = split.strings;
        if (!url) throw new MarkupBuildError('links need a URL string', item.position);
        if (extra.length > 0) throw new MarkupBuildError('links take a URL and at most one text', extra[0].position);
        const style = this.style('link', split.modifiers);
        return text !== undefined
          ? { kind: 'link', url: url.value, text: text.value, style }
          : { kind: 'link', url: url.value, style };
      }

      case '&': {
        this.rejectLists(item, split);
        const [name, alt, ...extra] = split.strings;
        if (!name) throw new MarkupBuildError('binary references need a name string', item.position);
        if (extra.length > 0) {
          throw new MarkupBuildError('binary references take a name and at most one alt text', extra[0].position);
        }
        this.binaryReferences.add(name.value);
        const style = this.style('binary', split.modifiers);
        return alt !== undefined
          ? { kind: 'binary', name: name.value, style, altText: alt.value }
          : { kind: 'binary', name: name.value, style };
      }

      default:
        // The parser only produces known heads.
        throw new MarkupBuildError(`unknown builtin item "${item.head}"`, item.position);
    }
  }

  private rejectStrings(item: RawList, split: SplitList): void {
    if (split.strings.length > 0) {
      throw new MarkupBuildError(
        `${itemName(item)} holds items, not bare strings; wrap text in ("...")`,
        split.strings[0].position,
      );
    }
  }

  private rejectLists(item: RawList, split: SplitList): void {
    if (split.lists.length > 0) {
      throw new MarkupBuildError(`${itemName(item)} cannot contain nested items`, split.lists[0].position);
    }
  }
}

/**
 * Builds the typed document from a parsed markup tree.
 *
 * The named style table is created here, once, and shared read-only by every
 * node's style resolution.
 *
 * @throws {MarkupBuildError} When an item breaks its builtin's argument rules
 */
export function buildDocument(raw: RawDocument): BuildResult {
  const { warnings: tableWarnings, ...styles } = createNamedStyleTable(raw.styleRules);
  const builder = new DocumentBuilder(styles);
  const document = builder.build(raw.items);
  return { document, warnings: tableWarnings.concat(builder.warnings) };
}
