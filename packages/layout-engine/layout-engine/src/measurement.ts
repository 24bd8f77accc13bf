import {
  LayoutError,
  ShaperTimeoutError,
  type FontDescriptor,
  type ShapedRun,
  type Style,
  type TextShaper,
} from '@folio/contracts';

/** Text measured for a font's line metrics. */
const LINE_PROBE = 'Hg';

const WHITESPACE = /\s+/;

const PREVIEW_LENGTH = 40;

export const fontSizePx = (sizePt: number, dpi: number): number => (sizePt * dpi) / 72;

const preview = (text: string): string => (text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}…` : text);

function toLayoutError(error: unknown, text: string): LayoutError {
  if (error instanceof LayoutError) return error;
  if (error instanceof ShaperTimeoutError) {
    return new LayoutError('SHAPER_TIMEOUT', `text shaper timed out measuring "${preview(text)}"`, {
      retryable: true,
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new LayoutError('SHAPER_FAILED', `text shaper failed measuring "${preview(text)}": ${reason}`, {
    retryable: false,
    cause: error,
  });
}

/**
 * Per-layout-call view of the text shaper. Every distinct (text, font) pair is
 * shaped once; shaper failures surface as {@link LayoutError}.
 */
export class MeasurementContext {
  private readonly shaper: TextShaper;
  private readonly dpi: number;
  private readonly runs = new Map<string, ShapedRun>();

  constructor(shaper: TextShaper, dpi: number) {
    this.shaper = shaper;
    this.dpi = dpi;
  }

  fontFor(style: Style): FontDescriptor {
    return {
      family: style.fontFamily,
      weight: style.weight,
      italic: style.decorations.includes('italic'),
      sizePx: fontSizePx(style.size, this.dpi),
    };
  }

  measure(text: string, font: FontDescriptor): ShapedRun {
    const key = `${font.family}|${font.weight}|${font.italic ? 'i' : 'r'}|${font.sizePx}|${text}`;
    const cached = this.runs.get(key);
    if (cached) return cached;

    let run: ShapedRun;
    try {
      run = this.shaper.measure(text, font);
    } catch (error) {
      throw toLayoutError(error, text);
    }
    this.runs.set(key, run);
    return run;
  }

  textWidth(text: string, font: FontDescriptor): number {
    return this.measure(text, font).width;
  }

  lineHeight(font: FontDescriptor): number {
    const run = this.measure(LINE_PROBE, font);
    return Math.ceil(run.ascent + run.descent);
  }

  /** Width of the widest whitespace-separated word, rounded up. */
  widestWord(text: string, font: FontDescriptor): number {
    let widest = 0;
    for (const word of text.split(WHITESPACE)) {
      if (word.length === 0) continue;
      widest = Math.max(widest, Math.ceil(this.textWidth(word, font)));
    }
    return widest;
  }
}
