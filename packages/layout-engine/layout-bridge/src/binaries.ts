import { imageSize } from 'image-size';
import type { IntrinsicSize, LayoutWarning } from '@folio/contracts';

/**
 * Marks a binary reference the caller knows cannot be fetched. It resolves the
 * same way as a name left out of the payload map.
 */
export const MISSING_BINARY: unique symbol = Symbol('folio.missingBinary');

export type BinaryPayload = Uint8Array | typeof MISSING_BINARY;

export type BinaryResolution = {
  images: Map<string, IntrinsicSize>;
  warnings: LayoutWarning[];
};

const unresolved = (name: string, detail: string): LayoutWarning => ({
  code: 'UNRESOLVED_BINARY_REFERENCE',
  message: `binary "${name}" ${detail}; showing its alt text`,
});

/** Reads the pixel size from an image header; throws for formats image-size does not know. */
function decodeSize(payload: Uint8Array): IntrinsicSize | undefined {
  const { width, height } = imageSize(payload);
  return width && height ? { width, height } : undefined;
}

/**
 * Decodes the intrinsic size of each referenced binary.
 *
 * Every name that does not end up with a size is reported once and renders as
 * its alt-text placeholder.
 */
export function resolveBinaries(
  names: readonly string[],
  payloads: ReadonlyMap<string, BinaryPayload>,
): BinaryResolution {
  const images = new Map<string, IntrinsicSize>();
  const warnings: LayoutWarning[] = [];

  for (const name of names) {
    const payload = payloads.get(name);
    if (payload === undefined || payload === MISSING_BINARY) {
      warnings.push(unresolved(name, 'has no payload'));
      continue;
    }

    let size: IntrinsicSize | undefined;
    try {
      size = decodeSize(payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      warnings.push(unresolved(name, `could not be decoded (${reason})`));
      continue;
    }

    if (!size) {
      warnings.push(unresolved(name, 'has no usable dimensions'));
      continue;
    }
    images.set(name, size);
  }

  return { images, warnings };
}
