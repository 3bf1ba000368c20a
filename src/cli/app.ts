/**
 * Command-line front end: name new colours, then walk the pattern.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { SEPARATOR_COLOR, type Color } from '../lib/core/color.js';
import { isInvariantViolation } from '../lib/core/errors.js';
import type { ColorEntry, PatternGrid } from '../lib/core/types.js';
import { loadOrDefault, FileStorageAdapter, resolveConfigDir, type StorageAdapter } from '../lib/config/storage.js';
import type { PersistedState } from '../lib/config/persisted-state.js';
import { loadPng } from '../lib/image/png-loader.js';
import { createColorEntry } from '../lib/registry/color-registry.js';
import { colorize } from '../lib/renderer/text.js';
import { segment } from '../lib/segmenter/segment.js';
import { createWalkerRules, type WalkerRules } from '../lib/walker/rules.js';
import { PatternWalker } from '../lib/walker/walker.js';
import { CONTROLS, WalkSession, parseCommand } from './session.js';

export const USAGE = 'Usage: stitchwalk <image.png> [--config-dir <dir>] [--no-color]';

/** Pattern lines shown at once. */
const FRAME_LINES = 20;

/** Pattern width when stdout is not a terminal. */
const FRAME_COLUMNS = 80;

/**
 * Anything that can ask the user a question.
 */
export interface Prompter {
  question(query: string): Promise<string>;
}

/**
 * Ask for a full name and an abbreviation until both are usable.
 */
export async function promptForColor(prompter: Prompter, color: Color, useColor: boolean): Promise<ColorEntry> {
  const label = useColor ? colorize(color.toHex(), color, SEPARATOR_COLOR) : color.toHex();
  console.log(`Found new color: ${label}`);

  for (;;) {
    const fullName = await prompter.question('Please give it a name: ');
    const oneChar = await prompter.question('Please give it a 1 character description: ');
    try {
      return createColorEntry(fullName, oneChar);
    } catch (error) {
      console.warn(`⚠️ ${error instanceof Error ? error.message : String(error)}, try again`);
    }
  }
}

/**
 * Build a walker at the saved cursor, or at the start if the saved cursor no
 * longer fits the pattern (the image changed since it was saved).
 */
export function restoreWalker(grid: PatternGrid, state: PersistedState, rules: WalkerRules): PatternWalker {
  try {
    return new PatternWalker(grid, state.cursor, rules);
  } catch (error) {
    if (!isInvariantViolation(error)) throw error;
    console.warn(`⚠️ Saved progress does not fit this pattern (${error.message}), starting over`);
    state.cursor = rules.start.clone();
    return new PatternWalker(grid, state.cursor, rules);
  }
}

async function saveState(adapter: StorageAdapter, state: PersistedState): Promise<void> {
  const result = await adapter.save(state);
  if (!result.success) {
    console.warn(`⚠️ Progress not saved: ${result.error}`);
  }
}

async function runWalk(
  rl: Interface,
  session: WalkSession,
  state: PersistedState,
  adapter: StorageAdapter
): Promise<void> {
  const draw = () => {
    console.log(session.render().join('\n'));
    rl.prompt();
  };

  console.log(CONTROLS);
  rl.setPrompt('> ');
  draw();

  for await (const input of rl) {
    const outcome = session.handle(parseCommand(input));
    if (outcome.message) {
      console.log(outcome.message);
    }
    if (outcome.progressed) {
      state.cursor = session.walker.cursor;
      await saveState(adapter, state);
    }
    if (outcome.quit) {
      break;
    }
    draw();
  }

  state.cursor = session.walker.cursor;
  await saveState(adapter, state);
}

/**
 * Run the CLI.
 *
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'config-dir': { type: 'string' },
      'no-color': { type: 'boolean', default: false },
    },
  });

  const file = positionals[0];
  if (!file) {
    console.error('File argument required.');
    console.error(USAGE);
    return 1;
  }
  console.log(`Opening file ${file}`);

  const useColor = values['no-color'] !== true;
  const rules = createWalkerRules();
  const adapter = FileStorageAdapter.forImage(values['config-dir'] ?? resolveConfigDir(), file);
  const state = await loadOrDefault(adapter, rules.start);
  const image = await loadPng(file);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const grid = await segment(image, state.colorRegistry, color => promptForColor(rl, color, useColor));
    await saveState(adapter, state);
    console.log(`✅ Found ${grid.length} rows`);

    const walker = restoreWalker(grid, state, rules);
    const session = new WalkSession(walker, state.colorRegistry, {
      frameLines: FRAME_LINES,
      frameColumns: process.stdout.columns || FRAME_COLUMNS,
      color: useColor,
    });
    await runWalk(rl, session, state, adapter);
  } finally {
    rl.close();
  }

  return 0;
}
