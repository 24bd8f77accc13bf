import { describe, expect, it } from 'vitest';
import type { RawStyleCall, RawStyleModifier, RawStyleRule, RawStyleWord, StylePatch } from '@folio/contracts';
import {
  applyStylePatches,
  compactPatches,
  createNamedStyleTable,
  defaultStyleFor,
  normalizeColor,
  resolveStyle,
} from './index.js';

const at = { line: 1, column: 1 };
const word = (name: string): RawStyleWord => ({ kind: 'word', name, position: at });
const call = (name: string, argument: string): RawStyleCall => ({ kind: 'call', name, argument, position: at });
const rule = (selector: string, ...modifiers: RawStyleModifier[]): RawStyleRule => ({
  selector,
  modifiers,
  position: at,
});

describe('defaultStyleFor', () => {
  it('gives text a serif, black, 12pt default', () => {
    expect(defaultStyleFor('text')).toEqual({
      fontFamily: 'serif',
      weight: 'normal',
      decorations: [],
      foreground: '#000000',
      size: 12,
    });
  });

  it('underlines links in blue', () => {
    const style = defaultStyleFor('link');
    expect(style.foreground).toBe('#0000EE');
    expect(style.decorations).toEqual(['underline']);
  });

  it('returns independent copies', () => {
    defaultStyleFor('box').decorations.push('italic');
    expect(defaultStyleFor('box').decorations).toEqual([]);
  });
});

describe('normalizeColor', () => {
  it('accepts bare and hash-prefixed hex triples', () => {
    expect(normalizeColor('00ff00')).toBe('#00FF00');
    expect(normalizeColor(' #b2c6ff ')).toBe('#B2C6FF');
  });

  it('rejects anything else', () => {
    expect(normalizeColor('30300')).toBeUndefined();
    expect(normalizeColor('red')).toBeUndefined();
  });
});

describe('createNamedStyleTable', () => {
  it('merges repeated selectors in order', () => {
    const { table, warnings } = createNamedStyleTable([rule('quote', word('italic')), rule('quote', word('bold'))]);
    expect(table.get('quote')?.map((m) => m.name)).toEqual(['italic', 'bold']);
    expect(warnings).toEqual([]);
  });

  it('reports broken bodies once at construction', () => {
    const { warnings } = createNamedStyleTable([rule('note', word('missing'), call('fg', 'xyz'), call('zip', '90210'))]);
    expect(warnings.map((w) => w.code)).toEqual([
      'UNKNOWN_STYLE_REFERENCE',
      'INVALID_STYLE_ARGUMENT',
      'INVALID_STYLE_ARGUMENT',
    ]);
  });

  it('reports reference cycles', () => {
    const { warnings } = createNamedStyleTable([rule('a', word('a'))]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].code).toBe('RECURSIVE_STYLE_REFERENCE');
    expect(warnings[0].message).toBe('style "a" refers back to itself through a -> a');
  });

  it('reports a cycle through two styles once', () => {
    const { warnings } = createNamedStyleTable([rule('a', word('b')), rule('b', word('a'))]);
    expect(warnings.map((w) => w.message)).toEqual(['style "a" refers back to itself through a -> b -> a']);
  });

  it('expands each style once, however often it is referenced', () => {
    const chain = Array.from({ length: 20 }, (_, i) => rule(`s${i}`, word(`s${i + 1}`), word(`s${i + 1}`)));
    const { expansions, warnings } = createNamedStyleTable([...chain, rule('s20', word('bold'))]);
    expect(warnings).toEqual([]);
    expect(expansions.get('s0')).toEqual([{ attribute: 'weight', value: 'bold' }]);
  });
});

describe('compactPatches', () => {
  const patches: StylePatch[] = [
    { attribute: 'foreground', value: '#FF0000' },
    { attribute: 'decoration', value: 'strike' },
    { attribute: 'decoration', value: 'none' },
    { attribute: 'decoration', value: 'italic' },
    { attribute: 'foreground', value: '#00FF00' },
    { attribute: 'decoration', value: 'underline' },
    { attribute: 'decoration', value: 'italic' },
    { attribute: 'weight', value: 'bold' },
  ];

  it('keeps the last value of each attribute and the decorations after the last reset', () => {
    expect(compactPatches(patches)).toEqual([
      { attribute: 'foreground', value: '#00FF00' },
      { attribute: 'weight', value: 'bold' },
      { attribute: 'decoration', value: 'none' },
      { attribute: 'decoration', value: 'italic' },
      { attribute: 'decoration', value: 'underline' },
    ]);
  });

  it('has the same effect as the full list', () => {
    const base = defaultStyleFor('link');
    expect(applyStylePatches(base, compactPatches(patches))).toEqual(applyStylePatches(base, patches));
  });
});

describe('resolveStyle', () => {
  it('resolves a doubling chain of named styles', () => {
    const chain = Array.from({ length: 24 }, (_, i) => rule(`s${i}`, word(`s${i + 1}`), word(`s${i + 1}`)));
    const styles = createNamedStyleTable([...chain, rule('s24', word('bold'), call('fg', '00FF00'))]);
    const { style, patches } = resolveStyle('text', [word('s0')], styles);
    expect([style.weight, style.foreground]).toEqual(['bold', '#00FF00']);
    expect(patches).toHaveLength(2);
  });

  it('resolves very long modifier lists', () => {
    const styles = createNamedStyleTable([rule('emph', word('italic'))]);
    const modifiers = Array.from({ length: 300000 }, (_, i) => (i % 2 === 0 ? word('emph') : word('bold')));
    const { style, patches, warnings } = resolveStyle('text', modifiers, styles);
    expect([style.weight, style.decorations]).toEqual(['bold', ['italic']]);
    expect(patches).toEqual([
      { attribute: 'weight', value: 'bold' },
      { attribute: 'decoration', value: 'italic' },
    ]);
    expect(warnings).toEqual([]);
  });

  it('lets an ad hoc modifier override a named style', () => {
    const styles = createNamedStyleTable([rule('A', call('fg', 'FF0000'))]);
    const { style, warnings } = resolveStyle('text', [word('A'), call('fg', '00FF00')], styles);
    expect(style.foreground).toBe('#00FF00');
    expect(warnings).toEqual([]);
  });

  it('ranks ad hoc modifiers above named references regardless of position', () => {
    const styles = createNamedStyleTable([rule('A', call('fg', 'FF0000'))]);
    const { style } = resolveStyle('text', [call('fg', '00FF00'), word('A')], styles);
    expect(style.foreground).toBe('#00FF00');
  });

  it('applies named references left to right', () => {
    const styles = createNamedStyleTable([
      rule('first', call('size', '10'), word('mono')),
      rule('second', call('size', '18')),
    ]);
    const { style } = resolveStyle('text', [word('first'), word('second')], styles);
    expect(style.size).toBe(18);
    expect(style.fontFamily).toBe('mono');
  });

  it('expands nested references before the body of the referring style', () => {
    const styles = createNamedStyleTable([
      rule('base', call('fg', '111111'), word('sans')),
      rule('footnote', call('fg', '757575'), word('base')),
    ]);
    const { style } = resolveStyle('text', [word('footnote')], styles);
    expect(style.foreground).toBe('#757575');
    expect(style.fontFamily).toBe('sans');
  });

  it('applies kind rules below every item modifier', () => {
    const styles = createNamedStyleTable([
      rule('text', word('sans'), call('bg', 'FFF8DC')),
      rule('^', word('bold')),
      rule('plain', word('serif')),
    ]);
    expect(resolveStyle('text', [], styles).style.fontFamily).toBe('sans');
    expect(resolveStyle('text', [word('plain')], styles).style.fontFamily).toBe('serif');
    expect(resolveStyle('text', [], styles).style.background).toBe('#FFF8DC');
    expect(resolveStyle('link', [], styles).style.weight).toBe('bold');
    expect(resolveStyle('box', [], styles).style.fontFamily).toBe('serif');
  });

  it('falls back without an unknown reference and reports it', () => {
    const styles = createNamedStyleTable([]);
    const { style, warnings } = resolveStyle('text', [word('ghost'), word('bold')], styles);
    expect(style.weight).toBe('bold');
    expect(warnings).toEqual([
      { code: 'UNKNOWN_STYLE_REFERENCE', message: 'unknown style "ghost"', position: at },
    ]);
  });

  it('skips invalid arguments but keeps the rest', () => {
    const styles = createNamedStyleTable([]);
    const { style, warnings } = resolveStyle('box', [call('size', 'big'), call('fill', '2')], styles);
    expect(style.size).toBe(12);
    expect(style.fill).toBe(2);
    expect(warnings.map((w) => w.code)).toEqual(['INVALID_STYLE_ARGUMENT']);
  });

  it('keeps negative fill ratios for layout to judge', () => {
    const styles = createNamedStyleTable([]);
    expect(resolveStyle('box', [call('fill', '-1')], styles).style.fill).toBe(-1);
  });

  it('combines decorations and clears them with none', () => {
    const styles = createNamedStyleTable([rule('emph', word('italic'), word('underline'))]);
    expect(resolveStyle('text', [word('emph'), word('strike')], styles).style.decorations).toEqual([
      'italic',
      'underline',
      'strike',
    ]);
    expect(resolveStyle('link', [word('none')], styles).style.decorations).toEqual([]);
  });

  it('makes a transparent background explicit with bg none', () => {
    const styles = createNamedStyleTable([rule('box', call('bg', 'FFF8DC'))]);
    expect(resolveStyle('box', [call('bg', 'none')], styles).style.background).toBeUndefined();
  });
});
