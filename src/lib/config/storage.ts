/**
 * Storage abstraction for per-image pattern state.
 * Supports a JSON5 file backend (CLI) and an in-memory backend (tests, embedding).
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import type { Cursor } from '../core/cursor.js';
import {
  type PersistedState,
  createDefaultState,
  parseState,
  stringifyState,
} from './persisted-state.js';

export interface SaveResult {
  success: boolean;
  error?: string;
}

export interface LoadResult {
  success: boolean;
  /** Absent when nothing has been saved yet */
  state?: PersistedState;
  error?: string;
}

/**
 * Storage interface for saving/loading pattern state
 */
export interface StorageAdapter {
  save(state: PersistedState): Promise<SaveResult>;
  load(): Promise<LoadResult>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File adapter: one JSON5 document per source image.
 */
export class FileStorageAdapter implements StorageAdapter {
  constructor(public readonly path: string) {}

  /**
   * Adapter for the config file belonging to `imagePath` inside `configDir`.
   */
  static forImage(configDir: string, imagePath: string): FileStorageAdapter {
    return new FileStorageAdapter(configPathFor(configDir, imagePath));
  }

  async save(state: PersistedState): Promise<SaveResult> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, stringifyState(state), 'utf8');
      return { success: true };
    } catch (error) {
      console.error(`Failed to save pattern state to ${this.path}:`, error);
      return { success: false, error: errorMessage(error) };
    }
  }

  async load(): Promise<LoadResult> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        // No stored state, use default
        return { success: true };
      }
      return { success: false, error: errorMessage(error) };
    }

    try {
      return { success: true, state: parseState(text) };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}

/**
 * In-memory adapter. Stores the serialised text so loads never alias saved
 * objects.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private text: string | null;

  constructor(initialText: string | null = null) {
    this.text = initialText;
  }

  get stored(): string | null {
    return this.text;
  }

  async save(state: PersistedState): Promise<SaveResult> {
    this.text = stringifyState(state);
    return { success: true };
  }

  async load(): Promise<LoadResult> {
    if (this.text === null) {
      return { success: true };
    }
    try {
      return { success: true, state: parseState(this.text) };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}

/**
 * Config file path for an image: `<configDir>/<image file name>.config.json5`.
 */
export function configPathFor(configDir: string, imagePath: string): string {
  return join(configDir, `${basename(imagePath)}.config.json5`);
}

/**
 * Pick the config directory: STITCHWALK_CONFIG_DIR, then
 * $XDG_CONFIG_HOME/stitchwalk, then ~/.config/stitchwalk.
 */
export function resolveConfigDir(
  env: Record<string, string | undefined> = process.env,
  home: string = homedir()
): string {
  if (env.STITCHWALK_CONFIG_DIR) {
    return env.STITCHWALK_CONFIG_DIR;
  }
  if (env.XDG_CONFIG_HOME) {
    return join(env.XDG_CONFIG_HOME, 'stitchwalk');
  }
  return join(home, '.config', 'stitchwalk');
}

/**
 * Load state, falling back to a fresh registry and `start` when nothing is
 * stored or the stored data cannot be read.
 */
export async function loadOrDefault(adapter: StorageAdapter, start: Cursor): Promise<PersistedState> {
  const result = await adapter.load();

  if (!result.success) {
    console.warn(`⚠️ Could not read saved state (${result.error}), starting fresh`);
    return createDefaultState(start);
  }
  if (!result.state) {
    console.log('📦 No saved state found, using default');
    return createDefaultState(start);
  }
  return result.state;
}
