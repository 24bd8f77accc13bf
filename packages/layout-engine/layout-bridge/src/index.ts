/**
 * @folio/layout-bridge
 *
 * Runs the whole pipeline: markup -> document -> binary resolution -> layout.
 * Options are validated at this boundary; the packages below it trust their
 * inputs.
 */

import type { Document, LayoutResult, LayoutWarning } from '@folio/contracts';
import { layoutDocument } from '@folio/layout-engine';
import { parseDocument } from '@folio/markup-adapter';
import { createMetricsShaper } from '@folio/measuring-metrics';
import { resolveBinaries } from './binaries.js';
import { parseRenderOptions, type RenderOptions } from './options.js';

export { MISSING_BINARY, resolveBinaries, type BinaryPayload, type BinaryResolution } from './binaries.js';
export {
  DEFAULT_DPI,
  LayoutOptionsError,
  parseRenderOptions,
  renderOptionsSchema,
  type RenderOptions,
  type ResolvedRenderOptions,
} from './options.js';

const layoutDebugEnabled =
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.FOLIO_DEBUG_LAYOUT);

const perfLog = (...args: unknown[]): void => {
  if (!layoutDebugEnabled) return;

  console.log(...args);
};

export type PreparedDocument = {
  document: Document;
  /** Problems found while building: style references, duplicate anchors, ignored style lists. */
  warnings: LayoutWarning[];
};

/** One-line description of a warning, with its source position or node id. */
export function formatWarning(warning: LayoutWarning): string {
  const where = warning.position
    ? ` (line ${warning.position.line}, column ${warning.position.column})`
    : warning.nodeId !== undefined
      ? ` (node ${warning.nodeId})`
      : '';
  return `${warning.code}: ${warning.message}${where}`;
}

/**
 * Parses and builds markup once, so it can be laid out at several viewport
 * sizes without reparsing.
 *
 * @throws {MarkupSyntaxError} For malformed markup
 * @throws {MarkupBuildError} For items that break their builtin's rules
 */
export function prepareDocument(markup: string): PreparedDocument {
  const start = performance.now();
  const prepared = parseDocument(markup);
  perfLog(`[Perf] parse + build: ${(performance.now() - start).toFixed(2)}ms`);
  return prepared;
}

/** Names of the binaries a document refers to, in first-reference order. */
export const collectBinaryReferences = (document: Document): string[] => [...document.binaryReferences];

/**
 * Lays out a prepared document. The returned warnings include the document's
 * own build warnings, so nothing found earlier is lost.
 *
 * @throws {LayoutOptionsError} When the options fail validation
 * @throws {LayoutError} When the text shaper times out or fails
 */
export function layoutPrepared(prepared: PreparedDocument, options: RenderOptions): LayoutResult {
  const resolved = parseRenderOptions(options);

  const resolveStart = performance.now();
  const binaries = resolveBinaries(collectBinaryReferences(prepared.document), resolved.binaries ?? new Map());
  perfLog(
    `[Perf] resolve binaries: ${(performance.now() - resolveStart).toFixed(2)}ms (${binaries.images.size} resolved, ${binaries.warnings.length} missing)`,
  );

  const layoutStart = performance.now();
  const result = layoutDocument(prepared.document.root, {
    viewportWidth: resolved.viewportWidth,
    viewportHeight: resolved.viewportHeight,
    dpi: resolved.dpi,
    shaper: resolved.shaper ?? createMetricsShaper(),
    images: binaries.images,
  });
  perfLog(`[Perf] layout ${resolved.viewportWidth}x${resolved.viewportHeight}: ${(performance.now() - layoutStart).toFixed(2)}ms`);

  const warnings = [...prepared.warnings, ...binaries.warnings, ...result.warnings];
  if (resolved.logWarnings) {
    for (const warning of warnings) {
      console.warn(`[layout] ${formatWarning(warning)}`);
    }
  }

  return { ...result, warnings };
}

/**
 * Markup in, positioned layout out.
 *
 * @example
 * ```typescript
 * const result = renderMarkup('(box ({(fill "1")} "left") ({(fill "1")} "right"))', {
 *   viewportWidth: 800,
 *   viewportHeight: 600,
 * });
 * ```
 */
export function renderMarkup(markup: string, options: RenderOptions): LayoutResult {
  return layoutPrepared(prepareDocument(markup), options);
}
