/**
 * @folio/markup-adapter
 *
 * Markup text in, typed document out. The scanner and parser produce a raw
 * item tree; the builder resolves styles and checks each builtin's arguments;
 * the serializer writes a document back out as markup.
 */

import { buildDocument, type BuildResult } from './builder.js';
import { parseMarkup } from './parser.js';

export { Scanner, type Token, type TokenKind } from './scanner.js';
export { parseMarkup, mergeAdjacentText, isBuiltinHead, BUILTIN_HEADS, type BuiltinHead } from './parser.js';
export { buildDocument, type BuildResult } from './builder.js';
export { serializeDocument, serializeStyle, quoteString } from './serializer.js';

/**
 * Parses and builds in one step.
 *
 * @throws {MarkupSyntaxError} On malformed markup
 * @throws {MarkupBuildError} On items that break their builtin's argument rules
 */
export function parseDocument(source: string): BuildResult {
  return buildDocument(parseMarkup(source));
}
