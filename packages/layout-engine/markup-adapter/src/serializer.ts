import type { Document, DocumentNode, NamedStyleTable, RawStyleModifier, Style } from '@folio/contracts';

const INDENT = '  ';

/** Quotes a string with the markup's `\"` and `\\` escapes. */
export const quoteString = (value: string): string => `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

const formatNumber = (value: number): string => String(value);

const hex = (color: string): string => color.replace(/^#/, '');

const serializeModifier = (modifier: RawStyleModifier): string =>
  modifier.kind === 'word' ? modifier.name : `(${modifier.name} ${quoteString(modifier.argument)})`;

/**
 * Spells out every attribute of a resolved style as ad hoc modifiers, so the
 * list reproduces the same style whatever the style block says.
 */
export function serializeStyle(style: Style): string {
  const parts: string[] = [style.fontFamily, style.weight, 'none', ...style.decorations];
  parts.push(`(fg ${quoteString(hex(style.foreground))})`);
  parts.push(`(bg ${quoteString(style.background ? hex(style.background) : 'none')})`);
  parts.push(`(size ${quoteString(formatNumber(style.size))})`);
  if (style.fill !== undefined) parts.push(`(fill ${quoteString(formatNumber(style.fill))})`);
  if (style.scale !== undefined) parts.push(`(scale ${quoteString(formatNumber(style.scale))})`);
  return `{${parts.join(' ')}}`;
}

function serializeStyleBlock(table: NamedStyleTable): string[] {
  if (table.size === 0) return [];
  const lines = ['{'];
  for (const [name, modifiers] of table) {
    lines.push(`${INDENT}${name} (${modifiers.map(serializeModifier).join(' ')})`);
  }
  lines.push('}');
  return lines;
}

type SerializeTask = { kind: 'node'; node: DocumentNode; depth: number } | { kind: 'close'; depth: number };

function leafLine(node: Exclude<DocumentNode, { children: DocumentNode[] }>): string {
  switch (node.kind) {
    case 'text':
      return `(${serializeStyle(node.style)} ${quoteString(node.content)})`;
    case 'anchor':
      return `(# ${quoteString(node.name)})`;
    case 'link': {
      const text = node.text !== undefined ? ` ${quoteString(node.text)}` : '';
      return `(^ ${quoteString(node.url)} ${serializeStyle(node.style)}${text})`;
    }
    case 'binary': {
      const alt = node.altText !== undefined ? ` ${quoteString(node.altText)}` : '';
      return `(& ${quoteString(node.name)} ${serializeStyle(node.style)}${alt})`;
    }
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

/**
 * Writes a document back out as markup: the style block, then every node with
 * its resolved style spelled out. Parsing and building the output yields the
 * same document tree.
 */
export function serializeDocument(document: Document): string {
  const lines = serializeStyleBlock(document.styles);
  const stack: SerializeTask[] = [];
  for (let i = document.root.children.length - 1; i >= 0; i -= 1) {
    stack.push({ kind: 'node', node: document.root.children[i], depth: 0 });
  }

  while (stack.length > 0) {
    const task = stack.pop();
    if (!task) break;
    const indent = INDENT.repeat(task.depth);
    if (task.kind === 'close') {
      lines.push(`${indent})`);
      continue;
    }

    const { node } = task;
    if (node.kind === 'box' || node.kind === 'vbox' || node.kind === 'inline') {
      const style = node.kind === 'inline' ? '' : ` ${serializeStyle(node.style)}`;
      lines.push(`${indent}(${node.kind}${style}`);
      stack.push({ kind: 'close', depth: task.depth });
      for (let i = node.children.length - 1; i >= 0; i -= 1) {
        stack.push({ kind: 'node', node: node.children[i], depth: task.depth + 1 });
      }
      continue;
    }
    lines.push(`${indent}${leafLine(node)}`);
  }

  return `${lines.join('\n')}\n`;
}
