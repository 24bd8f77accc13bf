/**
 * @folio/style-engine
 *
 * Resolves item style lists to complete {@link Style} values. This module owns
 * the precedence rules:
 *
 *   builtin default -> kind rule from the style block -> named references -> ad hoc modifiers
 *
 * Every step contributes an ordered list of patches; the last patch touching an
 * attribute wins. The named style table is built per document and passed in
 * explicitly; nothing here holds document state between calls.
 */

import type { LayoutWarning, RawStyleModifier, Style, StylePatch, StyledKind } from '@folio/contracts';
import { applyStylePatches, cloneStyle } from './cascade.js';
import { compactPatches, expandModifiers, kindSelectors, type NamedStyles } from './named-styles.js';

export { applyStylePatches, cloneStyle } from './cascade.js';
export { classifyModifier, normalizeColor, BUILTIN_FLAGS, BUILTIN_CALLS, type ClassifiedModifier } from './modifiers.js';
export {
  compactPatches,
  createNamedStyleTable,
  expandModifiers,
  kindSelectors,
  type NamedStyleTableResult,
  type NamedStyles,
  type StyleExpansions,
} from './named-styles.js';

export const DEFAULT_FONT_SIZE_PT = 12;
export const DEFAULT_FOREGROUND = '#000000';
export const DEFAULT_LINK_FOREGROUND = '#0000EE';

const BASE_STYLE: Style = {
  fontFamily: 'serif',
  weight: 'normal',
  decorations: [],
  foreground: DEFAULT_FOREGROUND,
  size: DEFAULT_FONT_SIZE_PT,
};

/**
 * Hardcoded defaults for a builtin kind. Fill and scale are never defaulted.
 */
export function defaultStyleFor(kind: StyledKind): Style {
  switch (kind) {
    case 'link':
      return { ...cloneStyle(BASE_STYLE), foreground: DEFAULT_LINK_FOREGROUND, decorations: ['underline'] };
    case 'text':
    case 'box':
    case 'vbox':
    case 'binary':
      return cloneStyle(BASE_STYLE);
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}

export type StyleResolution = {
  style: Style;
  /** Patches that produce the style from the builtin default, compacted to one per attribute. */
  patches: StylePatch[];
  warnings: LayoutWarning[];
};

/**
 * Resolves the final style of one item.
 *
 * Unknown references are reported and skipped; the rest of the list still
 * applies, so a broken reference degrades styling without failing the item.
 *
 * @example
 * ```typescript
 * const styles = createNamedStyleTable(rules); // { (a (fg "FF0000")) }
 * resolveStyle('text', [word('a'), call('fg', '00FF00')], styles).style.foreground; // '#00FF00'
 * ```
 */
export function resolveStyle(
  kind: StyledKind,
  modifiers: readonly RawStyleModifier[],
  styles: NamedStyles,
): StyleResolution {
  const warnings: LayoutWarning[] = [];
  let patches: StylePatch[] = [];

  for (const selector of kindSelectors(kind)) {
    const rule = styles.expansions.get(selector);
    if (rule) patches = patches.concat(rule);
  }
  patches = compactPatches(patches.concat(expandModifiers(modifiers, styles.expansions, warnings)));

  return { style: applyStylePatches(defaultStyleFor(kind), patches), patches, warnings };
}
