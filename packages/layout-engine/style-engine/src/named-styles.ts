import type {
  Decoration,
  LayoutWarning,
  NamedStyleTable,
  RawStyleModifier,
  RawStyleRule,
  StylePatch,
  StyledKind,
} from '@folio/contracts';
import { classifyModifier } from './modifiers.js';

/** Each named style's body with references resolved, compacted by {@link compactPatches}. */
export type StyleExpansions = ReadonlyMap<string, readonly StylePatch[]>;

/** A document's style table together with its expansions, computed once when the table is built. */
export type NamedStyles = {
  table: NamedStyleTable;
  expansions: StyleExpansions;
};

export type NamedStyleTableResult = NamedStyles & {
  warnings: LayoutWarning[];
};

/** Style block selectors that apply to every item of a builtin kind. */
const KIND_SELECTORS: Readonly<Record<StyledKind, readonly string[]>> = {
  text: ['text'],
  box: ['box'],
  vbox: ['vbox'],
  link: ['link', '^'],
  binary: ['binary', '&'],
};

export const kindSelectors = (kind: StyledKind): readonly string[] => KIND_SELECTORS[kind];

/** Compaction keeps long reference chains from growing the working list without bound. */
const COMPACT_THRESHOLD = 256;

/**
 * Reduces a patch list to one with the same effect on any base style: the
 * last patch of each attribute, then the last decoration reset and the
 * distinct decorations added after it. The result never holds more than a
 * dozen patches.
 */
export function compactPatches(patches: readonly StylePatch[]): StylePatch[] {
  let resetIndex = -1;
  for (let i = 0; i < patches.length; i += 1) {
    const patch = patches[i];
    if (patch.attribute === 'decoration' && patch.value === 'none') resetIndex = i;
  }

  const last = new Map<StylePatch['attribute'], StylePatch>();
  const decorations: StylePatch[] = [];
  const added = new Set<Decoration>();
  for (let i = 0; i < patches.length; i += 1) {
    const patch = patches[i];
    if (patch.attribute !== 'decoration') {
      last.delete(patch.attribute);
      last.set(patch.attribute, patch);
    } else if (patch.value === 'none') {
      if (i === resetIndex) decorations.push(patch);
    } else if (i > resetIndex && !added.has(patch.value)) {
      added.add(patch.value);
      decorations.push(patch);
    }
  }

  return [...last.values(), ...decorations];
}

/** Appends in place, one element at a time so long lists never become call arguments. */
const appendPatches = (target: StylePatch[], source: readonly StylePatch[]): void => {
  for (const patch of source) target.push(patch);
};

type ExpansionFrame = {
  name: string;
  body: readonly RawStyleModifier[];
  index: number;
  referenced: StylePatch[];
  adHoc: StylePatch[];
};

/**
 * Expands every named style once, depth first over an explicit stack.
 *
 * A reference back to a style still being expanded closes a cycle: it is
 * reported once and skipped. Problems inside a body are reported once, for
 * that body, however many styles reach it.
 */
function expandTable(table: NamedStyleTable, warnings: LayoutWarning[]): Map<string, StylePatch[]> {
  const expansions = new Map<string, StylePatch[]>();
  const active = new Set<string>();

  for (const [start, startBody] of table) {
    if (expansions.has(start)) continue;

    const stack: ExpansionFrame[] = [{ name: start, body: startBody, index: 0, referenced: [], adHoc: [] }];
    active.add(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.index >= frame.body.length) {
        stack.pop();
        active.delete(frame.name);
        appendPatches(frame.referenced, frame.adHoc);
        const expanded = compactPatches(frame.referenced);
        expansions.set(frame.name, expanded);
        const parent = stack[stack.length - 1];
        if (parent) {
          appendPatches(parent.referenced, expanded);
          if (parent.referenced.length > COMPACT_THRESHOLD) parent.referenced = compactPatches(parent.referenced);
        }
        continue;
      }

      const modifier = frame.body[frame.index];
      frame.index += 1;
      const classified = classifyModifier(modifier);
      switch (classified.kind) {
        case 'patch':
          frame.adHoc.push(classified.patch);
          break;
        case 'invalid':
          warnings.push({ code: 'INVALID_STYLE_ARGUMENT', message: classified.reason, position: modifier.position });
          break;
        case 'reference': {
          const { name } = classified;
          if (active.has(name)) {
            const trail = stack.map((entry) => entry.name);
            trail.push(name);
            warnings.push({
              code: 'RECURSIVE_STYLE_REFERENCE',
              message: `style "${name}" refers back to itself through ${trail.join(' -> ')}`,
              position: modifier.position,
            });
            break;
          }
          const done = expansions.get(name);
          if (done) {
            appendPatches(frame.referenced, done);
            if (frame.referenced.length > COMPACT_THRESHOLD) frame.referenced = compactPatches(frame.referenced);
            break;
          }
          const body = table.get(name);
          if (!body) {
            warnings.push({ code: 'UNKNOWN_STYLE_REFERENCE', message: `unknown style "${name}"`, position: modifier.position });
            break;
          }
          active.add(name);
          stack.push({ name, body, index: 0, referenced: [], adHoc: [] });
          break;
        }
        default: {
          const _exhaustive: never = classified;
          return _exhaustive;
        }
      }
    }
  }

  return expansions;
}

/**
 * Expands an item's modifier list into patches. References come first, in
 * order, each replaced by its precomputed expansion; ad hoc modifiers follow
 * in the order they were written.
 *
 * @param warnings - Sink for unknown references and invalid arguments in `modifiers`
 */
export function expandModifiers(
  modifiers: readonly RawStyleModifier[],
  expansions: StyleExpansions,
  warnings?: LayoutWarning[],
): StylePatch[] {
  let referenced: StylePatch[] = [];
  const adHoc: StylePatch[] = [];

  for (const modifier of modifiers) {
    const classified = classifyModifier(modifier);
    switch (classified.kind) {
      case 'patch':
        adHoc.push(classified.patch);
        break;
      case 'invalid':
        warnings?.push({ code: 'INVALID_STYLE_ARGUMENT', message: classified.reason, position: modifier.position });
        break;
      case 'reference': {
        const expanded = expansions.get(classified.name);
        if (!expanded) {
          warnings?.push({
            code: 'UNKNOWN_STYLE_REFERENCE',
            message: `unknown style "${classified.name}"`,
            position: modifier.position,
          });
          break;
        }
        appendPatches(referenced, expanded);
        if (referenced.length > COMPACT_THRESHOLD) referenced = compactPatches(referenced);
        break;
      }
      default: {
        const _exhaustive: never = classified;
        return _exhaustive;
      }
    }
  }

  appendPatches(referenced, adHoc);
  return compactPatches(referenced);
}

/**
 * Builds the document-scoped style table from the style block and expands
 * every entry.
 *
 * A selector listed twice keeps a single entry whose modifiers are the
 * concatenation of both rules. Each body is checked once here, so items that
 * reference a broken style are not reported again for the same problem.
 */
export function createNamedStyleTable(rules: readonly RawStyleRule[]): NamedStyleTableResult {
  const entries = new Map<string, RawStyleModifier[]>();
  for (const rule of rules) {
    const existing = entries.get(rule.selector);
    if (existing) {
      for (const modifier of rule.modifiers) existing.push(modifier);
    } else {
      entries.set(rule.selector, [...rule.modifiers]);
    }
  }

  const table: NamedStyleTable = new Map(
    [...entries].map(([name, modifiers]) => [name, Object.freeze(modifiers)] as const),
  );

  const warnings: LayoutWarning[] = [];
  const expansions = expandTable(table, warnings);

  return { table, expansions, warnings };
}
