/**
 * Font-metrics text shaper
 *
 * Measures text runs from per-family advance-width tables instead of a font
 * renderer, so layout runs the same under plain Node.js and in tests.
 *
 * Typography approximations:
 * - ascent = fontSize * 0.92 (baseline to top)
 * - descent = fontSize * 0.23 (baseline to bottom)
 * - characters missing from a family's table use the family's average advance
 * - bold and italic scale the proportional families' advances by a per-family factor
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { FontDescriptor, FontFamily, ShapedRun, TextShaper } from '@folio/contracts';

export const ASCENT_RATIO = 0.92;
export const DESCENT_RATIO = 0.23;

const familyMetricsSchema = z.object({
  average: z.number().positive(),
  boldFactor: z.number().positive(),
  italicFactor: z.number().positive(),
  widths: z.record(z.string(), z.number().nonnegative()),
});

const widthTableSchema = z.object({
  unitsPerEm: z.number().positive(),
  families: z.object({
    serif: familyMetricsSchema,
    sans: familyMetricsSchema,
    mono: familyMetricsSchema,
  }),
});

export type FamilyMetrics = z.infer<typeof familyMetricsSchema>;
export type WidthTable = z.infer<typeof widthTableSchema>;

let defaultTable: WidthTable | undefined;

/**
 * Loads the bundled advance-width tables. Parsed once per process.
 */
export function loadDefaultWidthTable(): WidthTable {
  if (!defaultTable) {
    const raw = readFileSync(new URL('./data/char-widths.json', import.meta.url), 'utf8');
    defaultTable = parseWidthTable(JSON.parse(raw));
  }
  return defaultTable;
}

/**
 * Validates a width table, e.g. one read from a custom metrics file.
 *
 * @throws {z.ZodError} When the table is malformed
 */
export const parseWidthTable = (value: unknown): WidthTable => widthTableSchema.parse(value);

export type MetricsShaperOptions = {
  table?: WidthTable;
};

class MetricsShaper implements TextShaper {
  private readonly table: WidthTable;

  constructor(table: WidthTable) {
    this.table = table;
  }

  measure(text: string, font: FontDescriptor): ShapedRun {
    const metrics = this.familyMetrics(font.family);
    let units = 0;
    for (const char of text) {
      units += metrics.widths[char] ?? metrics.average;
    }

    let factor = 1;
    if (font.weight === 'bold') factor *= metrics.boldFactor;
    if (font.italic) factor *= metrics.italicFactor;

    return {
      width: (units / this.table.unitsPerEm) * font.sizePx * factor,
      ascent: font.sizePx * ASCENT_RATIO,
      descent: font.sizePx * DESCENT_RATIO,
    };
  }

  private familyMetrics(family: FontFamily): FamilyMetrics {
    switch (family) {
      case 'serif':
        return this.table.families.serif;
      case 'sans':
        return this.table.families.sans;
      case 'mono':
        return this.table.families.mono;
      default: {
        const _exhaustive: never = family;
        return _exhaustive;
      }
    }
  }
}

/**
 * Creates a deterministic shaper. Without a table, the bundled Times- and
 * Helvetica-like tables are used for serif and sans, and a fixed 0.6em advance
 * for mono.
 *
 * @example
 * ```typescript
 * const shaper = createMetricsShaper();
 * shaper.measure('abcd', { family: 'mono', weight: 'normal', italic: false, sizePx: 10 }).width; // 24
 * ```
 */
export function createMetricsShaper(options: MetricsShaperOptions = {}): TextShaper {
  return new MetricsShaper(options.table ?? loadDefaultWidthTable());
}
