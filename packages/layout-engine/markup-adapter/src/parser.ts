import {
  MarkupSyntaxError,
  type RawDocument,
  type RawItem,
  type RawList,
  type RawStyleModifier,
  type RawStyleRule,
  type RawText,
  type SourcePosition,
} from '@folio/contracts';
import { Scanner, type Token } from './scanner.js';

export const BUILTIN_HEADS = ['box', 'vbox', 'inline', 'text', '&', '#', '^'] as const;

export type BuiltinHead = (typeof BUILTIN_HEADS)[number];

export const isBuiltinHead = (value: string): value is BuiltinHead =>
  BUILTIN_HEADS.some((head) => head === value);

/** Heads whose first string names a target (object, anchor, URL) and never merges with what follows. */
const TARGET_HEADS: ReadonlySet<string> = new Set(['&', '#', '^']);

type OpenList = {
  head?: string;
  position: SourcePosition;
  children: RawItem[];
  /** Index of a text child that later strings must not merge into. */
  sealedIndex: number;
  targetPending: boolean;
};

const isPlainTextList = (item: RawItem): item is RawList =>
  item.kind === 'list' && item.head === undefined && item.children.every((child) => child.kind === 'text');

const plainTextValue = (list: RawList): string =>
  list.children.map((child) => (child.kind === 'text' ? child.value : '')).join('');

/**
 * Concatenates runs of adjacent plain text lists, e.g. `("a")(" b")(" c")`
 * becomes a single `("a b c")`. Lists with a head or a style list are left
 * alone.
 */
export function mergeAdjacentText(items: RawItem[]): RawItem[] {
  const merged: RawItem[] = [];
  for (const item of items) {
    const previous = merged[merged.length - 1];
    if (previous && isPlainTextList(previous) && isPlainTextList(item)) {
      const value = plainTextValue(previous) + plainTextValue(item);
      const text: RawText = { kind: 'text', value, position: previous.children[0]?.position ?? previous.position };
      merged[merged.length - 1] = { ...previous, children: [text] };
      continue;
    }
    merged.push(item);
  }
  return merged;
}

function consume(scanner: Scanner, kind: Token['kind'], message: string): Token {
  const token = scanner.next();
  if (token.kind === kind) return token;
  if (token.kind === 'end') {
    throw new MarkupSyntaxError('UNMATCHED_DELIMITER', `${message}, reached end of input`, token.position);
  }
  throw new MarkupSyntaxError('UNEXPECTED_TOKEN', `${message}, got ${describeToken(token)}`, token.position);
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case 'string':
      return `string "${token.lexeme}"`;
    case 'symbol':
      return `symbol ${token.lexeme}`;
    case 'end':
      return 'end of input';
    default:
      return `"${token.lexeme}"`;
  }
}

/**
 * Reads bare words and `(name "argument")` calls until `closer`. The opening
 * delimiter has already been consumed.
 */
function parseModifiers(scanner: Scanner, open: Token, closer: 'rightParen' | 'rightBrace'): RawStyleModifier[] {
  const modifiers: RawStyleModifier[] = [];
  for (;;) {
    const token = scanner.next();
    if (token.kind === closer) return modifiers;

    switch (token.kind) {
      case 'symbol':
        modifiers.push({ kind: 'word', name: token.lexeme, position: token.position });
        break;
      case 'leftParen': {
        const name = consume(scanner, 'symbol', 'expected a style modifier name');
        const argument = consume(scanner, 'string', `expected an argument to style modifier ${name.lexeme}`);
        consume(scanner, 'rightParen', 'style modifiers take exactly one argument');
        modifiers.push({ kind: 'call', name: name.lexeme, argument: argument.lexeme, position: token.position });
        break;
      }
      case 'end':
        throw new MarkupSyntaxError('UNMATCHED_DELIMITER', `"${open.lexeme}" is never closed`, open.position);
      case 'rightParen':
      case 'rightBrace':
        throw new MarkupSyntaxError(
          'UNMATCHED_DELIMITER',
          `"${token.lexeme}" does not match "${open.lexeme}" opened at line ${open.position.line}`,
          token.position,
        );
      default:
        throw new MarkupSyntaxError('UNEXPECTED_TOKEN', `expected a style modifier, got ${describeToken(token)}`, token.position);
    }
  }
}

/**
 * Parses the leading style block. Rules are written either as
 * `name (modifier ...)` or `(name modifier ...)`.
 */
function parseStyleBlock(scanner: Scanner): RawStyleRule[] {
  const open = consume(scanner, 'leftBrace', 'expected a style block');
  const rules: RawStyleRule[] = [];

  for (;;) {
    const token = scanner.next();
    switch (token.kind) {
      case 'rightBrace':
        return rules;
      case 'symbol': {
        const body = consume(scanner, 'leftParen', `expected the modifiers of style ${token.lexeme}`);
        rules.push({ selector: token.lexeme, modifiers: parseModifiers(scanner, body, 'rightParen'), position: token.position });
        break;
      }
      case 'leftParen': {
        const selector = consume(scanner, 'symbol', 'expected a style name');
        rules.push({
          selector: selector.lexeme,
          modifiers: parseModifiers(scanner, token, 'rightParen'),
          position: selector.position,
        });
        break;
      }
      case 'end':
        throw new MarkupSyntaxError('UNMATCHED_DELIMITER', 'style block is never closed', open.position);
      case 'rightParen':
        throw new MarkupSyntaxError('UNMATCHED_DELIMITER', '")" does not match the style block "{"', token.position);
      default:
        throw new MarkupSyntaxError('UNEXPECTED_TOKEN', `expected a style rule, got ${describeToken(token)}`, token.position);
    }
  }
}

function openList(scanner: Scanner, open: Token): OpenList {
  const first = scanner.peek();
  let head: string | undefined;
  if (first.kind === 'symbol') {
    scanner.next();
    if (!isBuiltinHead(first.lexeme)) {
      throw new MarkupSyntaxError('UNKNOWN_BUILTIN', `unknown builtin item "${first.lexeme}"`, first.position);
    }
    head = first.lexeme;
  }
  return {
    head,
    position: open.position,
    children: [],
    sealedIndex: -1,
    targetPending: head !== undefined && TARGET_HEADS.has(head),
  };
}

function appendString(list: OpenList, token: Token): void {
  const lastIndex = list.children.length - 1;
  const last = list.children[lastIndex];
  if (last && last.kind === 'text' && lastIndex !== list.sealedIndex) {
    list.children[lastIndex] = { ...last, value: last.value + token.lexeme };
    return;
  }
  list.children.push({ kind: 'text', value: token.lexeme, position: token.position });
  if (list.targetPending) {
    list.targetPending = false;
    list.sealedIndex = list.children.length - 1;
  }
}

/**
 * Parses one parenthesized item and everything nested in it. Nesting is kept
 * on an explicit stack so deeply nested documents cannot exhaust the call stack.
 */
function parseItem(scanner: Scanner): RawList {
  const open = consume(scanner, 'leftParen', 'expected an item');
  const stack: OpenList[] = [openList(scanner, open)];

  for (;;) {
    const current = stack[stack.length - 1];
    const token = scanner.next();

    switch (token.kind) {
      case 'rightParen': {
        stack.pop();
        const list: RawList = {
          kind: 'list',
          ...(current.head !== undefined ? { head: current.head } : {}),
          children: mergeAdjacentText(current.children),
          position: current.position,
        };
        const parent = stack[stack.length - 1];
        if (!parent) return list;
        parent.children.push(list);
        break;
      }
      case 'leftParen':
        stack.push(openList(scanner, token));
        break;
      case 'leftBrace':
        current.children.push({
          kind: 'styleList',
          modifiers: parseModifiers(scanner, token, 'rightBrace'),
          position: token.position,
        });
        break;
      case 'string':
        appendString(current, token);
        break;
      case 'rightBrace':
        throw new MarkupSyntaxError('UNMATCHED_DELIMITER', '"}" has no matching "{"', token.position);
      case 'end':
        throw new MarkupSyntaxError('UNMATCHED_DELIMITER', '"(" is never closed', current.position);
      case 'symbol':
        throw new MarkupSyntaxError(
          'UNEXPECTED_TOKEN',
          `unexpected symbol ${token.lexeme}; only the first element of a list names a builtin`,
          token.position,
        );
      default: {
        const _exhaustive: never = token.kind;
        return _exhaustive;
      }
    }
  }
}

/**
 * Parses markup text into a raw item tree.
 *
 * Any syntax error aborts the whole document: there is no partial result.
 *
 * @throws {MarkupSyntaxError}
 *
 * @example
 * ```typescript
 * const raw = parseMarkup('{ note (italic) } (box ({note} "hi"))');
 * raw.styleRules[0].selector; // 'note'
 * ```
 */
export function parseMarkup(source: string): RawDocument {
  const scanner = new Scanner(source);
  const items: RawItem[] = [];
  let styleRules: RawStyleRule[] | undefined;

  for (;;) {
    const token = scanner.peek();
    switch (token.kind) {
      case 'end':
        return { styleRules: styleRules ?? [], items: mergeAdjacentText(items) };
      case 'leftBrace':
        if (styleRules || items.length > 0) {
          throw new MarkupSyntaxError(
            'UNEXPECTED_TOKEN',
            'the style block must come before every page item and appear once',
            token.position,
          );
        }
        styleRules = parseStyleBlock(scanner);
        break;
      case 'leftParen':
        items.push(parseItem(scanner));
        break;
      case 'rightParen':
      case 'rightBrace':
        throw new MarkupSyntaxError('UNMATCHED_DELIMITER', `"${token.lexeme}" has no matching opener`, token.position);
      case 'string':
      case 'symbol':
        throw new MarkupSyntaxError('UNEXPECTED_TOKEN', `expected an item, got ${describeToken(token)}`, token.position);
      default: {
        const _exhaustive: never = token.kind;
        return _exhaustive;
      }
    }
  }
}
