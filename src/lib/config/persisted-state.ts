/**
 * Serialisable per-image state: colour labels and walk progress.
 */

import JSON5 from 'json5';
import { Color } from '../core/color.js';
import { Cursor } from '../core/cursor.js';
import { ColorRegistry } from '../registry/color-registry.js';

export interface PersistedState {
  colorRegistry: ColorRegistry;
  cursor: Cursor;
}

/**
 * On-disk shape. Colours are keyed by `#RRGGBB`.
 */
export interface SerializedState {
  colorRegistry: Record<string, { fullName: string; oneChar: string }>;
  cursor: { row: number; col: number };
}

/**
 * Convert state to its plain serialisable form.
 */
export function serializeState(state: PersistedState): SerializedState {
  const colorRegistry: SerializedState['colorRegistry'] = {};
  for (const [color, entry] of state.colorRegistry.entries()) {
    colorRegistry[color.toHex()] = { fullName: entry.fullName, oneChar: entry.oneChar };
  }
  return {
    colorRegistry,
    cursor: { row: state.cursor.row, col: state.cursor.col },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Type guard for the serialised shape.
 */
export function isSerializedState(value: unknown): value is SerializedState {
  if (!isRecord(value) || !isRecord(value.colorRegistry) || !isRecord(value.cursor)) {
    return false;
  }
  if (!isCount(value.cursor.row) || !isCount(value.cursor.col)) {
    return false;
  }
  return Object.values(value.colorRegistry).every(
    entry => isRecord(entry) && typeof entry.fullName === 'string' && typeof entry.oneChar === 'string'
  );
}

/**
 * Rebuild state from its serialised form.
 *
 * @throws Error if the data is malformed
 */
export function deserializeState(data: unknown): PersistedState {
  if (!isSerializedState(data)) {
    throw new Error('Malformed pattern state: expected { colorRegistry: {...}, cursor: { row, col } }');
  }

  const colorRegistry = new ColorRegistry();
  for (const [hex, entry] of Object.entries(data.colorRegistry)) {
    colorRegistry.addEntry(Color.fromHex(hex), { fullName: entry.fullName, oneChar: entry.oneChar });
  }

  return {
    colorRegistry,
    cursor: new Cursor(data.cursor.row, data.cursor.col),
  };
}

/**
 * Render state as JSON5 text.
 */
export function stringifyState(state: PersistedState): string {
  return JSON5.stringify(serializeState(state), null, 2) + '\n';
}

/**
 * Parse JSON5 text into state.
 *
 * @throws Error if the text is not JSON5 or the data is malformed
 */
export function parseState(text: string): PersistedState {
  return deserializeState(JSON5.parse(text));
}

/**
 * Fresh state: nothing named yet, cursor at `start`.
 */
export function createDefaultState(start: Cursor): PersistedState {
  return {
    colorRegistry: new ColorRegistry(),
    cursor: start.clone(),
  };
}
