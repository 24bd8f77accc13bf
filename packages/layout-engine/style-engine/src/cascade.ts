/**
 * Style cascade.
 *
 * Resolution is an ordered list of {@link StylePatch} entries applied to a
 * builtin default. Later patches override earlier ones attribute by attribute;
 * decorations accumulate until a `none` patch clears them.
 */

import type { Style, StylePatch } from '@folio/contracts';

export const cloneStyle = (style: Style): Style => ({ ...style, decorations: [...style.decorations] });

/**
 * Applies patches in order to a copy of `base`.
 *
 * @example
 * ```typescript
 * applyStylePatches(base, [
 *   { attribute: 'foreground', value: '#FF0000' },
 *   { attribute: 'foreground', value: '#00FF00' },
 * ]).foreground; // '#00FF00'
 * ```
 */
export function applyStylePatches(base: Style, patches: readonly StylePatch[]): Style {
  const style = cloneStyle(base);

  for (const patch of patches) {
    switch (patch.attribute) {
      case 'fontFamily':
        style.fontFamily = patch.value;
        break;
      case 'weight':
        style.weight = patch.value;
        break;
      case 'decoration':
        if (patch.value === 'none') {
          style.decorations = [];
        } else if (!style.decorations.includes(patch.value)) {
          style.decorations.push(patch.value);
        }
        break;
      case 'foreground':
        style.foreground = patch.value;
        break;
      case 'background':
        if (patch.value === null) {
          delete style.background;
        } else {
          style.background = patch.value;
        }
        break;
      case 'size':
        style.size = patch.value;
        break;
      case 'fill':
        style.fill = patch.value;
        break;
      case 'scale':
        style.scale = patch.value;
        break;
      default: {
        const _exhaustive: never = patch;
        return _exhaustive;
      }
    }
  }

  return style;
}
