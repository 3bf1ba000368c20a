/**
 * Command handling and screen rendering for the line-driven walk loop.
 */

import type { ColorRegistry } from '../lib/registry/color-registry.js';
import { describePreview, renderLines } from '../lib/renderer/text.js';
import { ensureScrollToVisible, visibleWindow } from '../lib/viewport/scroll.js';
import type { PatternWalker } from '../lib/walker/walker.js';

/** Cells skipped by the fast-forward command. */
export const FAST_FORWARD_STEPS = 30;

export const CONTROLS =
  'Enter: Next link | p: Skip 30 links | h/j/k/l: Scroll left/down/up/right | r: Reset progress | q: Quit';

export type Command =
  | 'next'
  | 'fastForward'
  | 'reset'
  | 'scrollLeft'
  | 'scrollDown'
  | 'scrollUp'
  | 'scrollRight'
  | 'quit'
  | 'help';

/**
 * Map an input line to a command; unknown input shows help.
 */
export function parseCommand(input: string): Command {
  switch (input.trim()) {
    case '':
      return 'next';
    case 'p':
    case 'P':
      return 'fastForward';
    case 'r':
      return 'reset';
    case 'h':
      return 'scrollLeft';
    case 'j':
      return 'scrollDown';
    case 'k':
      return 'scrollUp';
    case 'l':
      return 'scrollRight';
    case 'q':
      return 'quit';
    default:
      return 'help';
  }
}

export interface CommandOutcome {
  /** Cursor moved; progress should be saved */
  readonly progressed: boolean;
  readonly quit: boolean;
  readonly message?: string;
}

export interface SessionOptions {
  /** Visible pattern lines */
  frameLines: number;
  /** Visible character columns */
  frameColumns: number;
  color: boolean;
}

/**
 * Wraps a walker with vertical and horizontal scroll positions.
 */
export class WalkSession {
  /** First visible line */
  public scroll: number;

  /** First visible character column */
  public hscroll: number;

  constructor(
    public readonly walker: PatternWalker,
    private readonly registry: ColorRegistry,
    private readonly options: SessionOptions
  ) {
    this.scroll = Math.max(walker.lines.length - options.frameLines, 0);
    this.hscroll = ensureScrollToVisible(options.frameColumns, this.contentColumns(), 0);
  }

  /**
   * Character width up to the newest revealed cell: one abbreviation plus one
   * space per cell.
   */
  private contentColumns(): number {
    const lines = this.walker.lines;
    const last = lines[lines.length - 1];
    return last ? last.length * 2 : 0;
  }

  handle(command: Command): CommandOutcome {
    switch (command) {
      case 'next':
        if (this.walker.isDone()) {
          return { progressed: false, quit: false, message: '🎉 Pattern complete' };
        }
        this.walker.advance();
        return { progressed: true, quit: false };

      case 'fastForward': {
        let steps = 0;
        while (steps < FAST_FORWARD_STEPS && !this.walker.isDone()) {
          this.walker.advance();
          steps++;
        }
        return { progressed: steps > 0, quit: false };
      }

      case 'reset':
        this.walker.reset();
        return { progressed: true, quit: false, message: '↩️ Progress reset' };

      case 'scrollLeft':
        this.hscroll = Math.max(this.hscroll - 1, 0);
        return { progressed: false, quit: false };

      case 'scrollRight':
        this.hscroll++;
        return { progressed: false, quit: false };

      case 'scrollDown':
        this.scroll++;
        return { progressed: false, quit: false };

      case 'scrollUp':
        this.scroll = Math.max(this.scroll - 1, 0);
        return { progressed: false, quit: false };

      case 'quit':
        return { progressed: false, quit: true };

      case 'help':
        return { progressed: false, quit: false, message: CONTROLS };
    }
  }

  /**
   * Screen contents: the visible pattern lines, then the previews.
   */
  render(): string[] {
    if (this.walker.consumeScrollRequest()) {
      this.scroll = ensureScrollToVisible(this.options.frameLines, this.walker.lines.length, this.scroll);
      this.hscroll = ensureScrollToVisible(this.options.frameColumns, this.contentColumns(), this.hscroll);
    }

    // Render before windowing so odd rows keep their indent
    const lines = visibleWindow(
      renderLines(this.walker.lines, this.registry, {
        color: this.options.color,
        columnOffset: this.hscroll,
        columns: this.options.frameColumns,
      }),
      this.options.frameLines,
      this.scroll
    );
    const { row, col } = this.walker.cursor;

    return [
      ...lines,
      '',
      `Row ${row}, link ${col}`,
      `Current link: ${describePreview(this.walker.currentPixel, this.registry).join(' / ')}`,
      `Next link: ${describePreview(this.walker.nextPixel, this.registry).join(' / ')}`,
    ];
  }
}
