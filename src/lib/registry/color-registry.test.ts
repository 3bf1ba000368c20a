/**
 * Tests for ColorRegistry.
 */

import { describe, it, expect } from 'vitest';
import { Color } from '../core/color.js';
import { LookupError } from '../core/errors.js';
import { ColorRegistry, createColorEntry } from './color-registry.js';

const RED = new Color(200, 0, 0);
const BLUE = new Color(0, 0, 200);

describe('ColorRegistry', () => {
  it('starts empty', () => {
    const registry = new ColorRegistry();
    expect(registry.has(RED)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('records both labels', () => {
    const registry = new ColorRegistry();
    registry.addEntry(RED, { fullName: 'Red', oneChar: 'R' });

    expect(registry.has(RED)).toBe(true);
    expect(registry.has(new Color(200, 0, 0))).toBe(true);
    expect(registry.fullName(RED)).toBe('Red');
    expect(registry.oneChar(RED)).toBe('R');
    expect(registry.has(BLUE)).toBe(false);
  });

  it('last write wins', () => {
    const registry = new ColorRegistry();
    registry.addEntry(RED, { fullName: 'Red', oneChar: 'R' });
    registry.addEntry(RED, { fullName: 'Crimson', oneChar: 'C' });

    expect(registry.fullName(RED)).toBe('Crimson');
    expect(registry.oneChar(RED)).toBe('C');
    expect(registry.size).toBe(1);
  });

  it('throws LookupError for unregistered colors', () => {
    const registry = new ColorRegistry();
    expect(() => registry.fullName(BLUE)).toThrow(LookupError);
    expect(() => registry.oneChar(BLUE)).toThrow('No entry registered for #0000C8');
  });

  it('lists entries in insertion order', () => {
    const registry = new ColorRegistry();
    registry.addEntry(BLUE, { fullName: 'Blue', oneChar: 'B' });
    registry.addEntry(RED, { fullName: 'Red', oneChar: 'R' });

    const entries = [...registry.entries()];
    expect(entries.map(([color]) => color.toHex())).toEqual(['#0000C8', '#C80000']);
    expect(entries[1][1]).toEqual({ fullName: 'Red', oneChar: 'R' });
  });
});

describe('createColorEntry', () => {
  it('trims labels and keeps the first character', () => {
    expect(createColorEntry('  Red  ', ' rose ')).toEqual({ fullName: 'Red', oneChar: 'r' });
  });

  it('rejects empty labels', () => {
    expect(() => createColorEntry('   ', 'r')).toThrow('Color name must not be empty');
    expect(() => createColorEntry('Red', '  ')).toThrow('Color abbreviation must not be empty');
  });
});
