import type { RawStyleModifier, RgbColor, StylePatch } from '@folio/contracts';

export type ClassifiedModifier =
  | { kind: 'patch'; patch: StylePatch }
  | { kind: 'reference'; name: string }
  | { kind: 'invalid'; reason: string };

const FLAG_PATCHES: ReadonlyMap<string, StylePatch> = new Map<string, StylePatch>([
  ['serif', { attribute: 'fontFamily', value: 'serif' }],
  ['sans', { attribute: 'fontFamily', value: 'sans' }],
  ['mono', { attribute: 'fontFamily', value: 'mono' }],
  ['bold', { attribute: 'weight', value: 'bold' }],
  ['normal', { attribute: 'weight', value: 'normal' }],
  ['italic', { attribute: 'decoration', value: 'italic' }],
  ['underline', { attribute: 'decoration', value: 'underline' }],
  ['strike', { attribute: 'decoration', value: 'strike' }],
  ['none', { attribute: 'decoration', value: 'none' }],
]);

export const BUILTIN_FLAGS: readonly string[] = [...FLAG_PATCHES.keys()];

export const BUILTIN_CALLS = ['fg', 'bg', 'size', 'fill', 'scale'] as const;

type BuiltinCall = (typeof BUILTIN_CALLS)[number];

const isBuiltinCall = (name: string): name is BuiltinCall => BUILTIN_CALLS.some((call) => call === name);

const HEX_COLOR = /^#?([0-9a-fA-F]{6})$/;

/**
 * Normalizes `RRGGBB` or `#RRGGBB` to `#RRGGBB`.
 *
 * @returns The normalized colour, or undefined when the value is not a hex triple
 */
export const normalizeColor = (value: string): RgbColor | undefined => {
  const match = HEX_COLOR.exec(value.trim());
  return match ? `#${match[1].toUpperCase()}` : undefined;
};

const parseNumber = (value: string): number | undefined => {
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
};

function classifyCall(name: BuiltinCall, argument: string): ClassifiedModifier {
  switch (name) {
    case 'fg': {
      const color = normalizeColor(argument);
      if (!color) return { kind: 'invalid', reason: `fg expects a RRGGBB colour, got "${argument}"` };
      return { kind: 'patch', patch: { attribute: 'foreground', value: color } };
    }
    case 'bg': {
      const trimmed = argument.trim().toLowerCase();
      if (trimmed === 'none' || trimmed === 'transparent') {
        return { kind: 'patch', patch: { attribute: 'background', value: null } };
      }
      const color = normalizeColor(argument);
      if (!color) return { kind: 'invalid', reason: `bg expects a RRGGBB colour, got "${argument}"` };
      return { kind: 'patch', patch: { attribute: 'background', value: color } };
    }
    case 'size': {
      const size = parseNumber(argument);
      if (size === undefined || size <= 0) {
        return { kind: 'invalid', reason: `size expects a positive number, got "${argument}"` };
      }
      return { kind: 'patch', patch: { attribute: 'size', value: size } };
    }
    case 'fill': {
      // Negative ratios are kept so layout can report them against the node.
      const fill = parseNumber(argument);
      if (fill === undefined) return { kind: 'invalid', reason: `fill expects a number, got "${argument}"` };
      return { kind: 'patch', patch: { attribute: 'fill', value: fill } };
    }
    case 'scale': {
      const scale = parseNumber(argument);
      if (scale === undefined || scale <= 0) {
        return { kind: 'invalid', reason: `scale expects a positive number, got "${argument}"` };
      }
      return { kind: 'patch', patch: { attribute: 'scale', value: scale } };
    }
    default: {
      const _exhaustive: never = name;
      return _exhaustive;
    }
  }
}

/**
 * Decides what a raw modifier means: a builtin attribute assignment, a
 * reference into the named style table, or an unusable modifier.
 */
export function classifyModifier(modifier: RawStyleModifier): ClassifiedModifier {
  if (modifier.kind === 'word') {
    const patch = FLAG_PATCHES.get(modifier.name);
    return patch ? { kind: 'patch', patch } : { kind: 'reference', name: modifier.name };
  }
  if (!isBuiltinCall(modifier.name)) {
    return { kind: 'invalid', reason: `unknown style modifier "${modifier.name}"` };
  }
  return classifyCall(modifier.name, modifier.argument);
}
