import { z } from 'zod';
import { FolioError, type TextShaper } from '@folio/contracts';
import { MISSING_BINARY } from './binaries.js';

export const DEFAULT_DPI = 96;

const shaperSchema = z.custom<TextShaper>(
  (value) => typeof value === 'object' && value !== null && 'measure' in value && typeof value.measure === 'function',
  { message: 'shaper must implement measure(text, font)' },
);

const payloadSchema = z.union([z.instanceof(Uint8Array), z.literal(MISSING_BINARY)]);

export const renderOptionsSchema = z.object({
  viewportWidth: z.number().finite().positive(),
  viewportHeight: z.number().finite().positive(),
  dpi: z.number().finite().positive().default(DEFAULT_DPI),
  /** Defaults to the font-metrics shaper. */
  shaper: shaperSchema.optional(),
  /** Binary payloads by reference name. */
  binaries: z.map(z.string(), payloadSchema).optional(),
  /** Print warnings with `console.warn` as well as returning them. */
  logWarnings: z.boolean().default(true),
});

export type RenderOptions = z.input<typeof renderOptionsSchema>;
export type ResolvedRenderOptions = z.output<typeof renderOptionsSchema>;

const describeIssue = (issue: z.ZodIssue): string => `${issue.path.join('.') || 'options'}: ${issue.message}`;

export class LayoutOptionsError extends FolioError<'INVALID_OPTIONS'> {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super('INVALID_OPTIONS', `invalid layout options: ${issues.map(describeIssue).join('; ')}`, { issues });
    this.name = 'LayoutOptionsError';
    this.issues = issues;
  }
}

/**
 * @throws {LayoutOptionsError} When the options fail validation
 */
export function parseRenderOptions(options: RenderOptions): ResolvedRenderOptions {
  const parsed = renderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new LayoutOptionsError(parsed.error.issues);
  }
  return parsed.data;
}
