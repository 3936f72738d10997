import { EventEmitter } from 'node:events';
import blessed from 'neo-blessed';
import type { BlessedProgram } from 'blessed';
import type { KeyPress } from '../KeyBindings.js';
import type { FrameUpdate } from '../types/frame.js';
import { ANSI_RESET, CLEAR_SCREEN, cursorTo, sgr } from '../utils/ansi.js';

const SHOW_CURSOR = '\x1b[?25h';
const HIDE_CURSOR = '\x1b[?25l';

type TerminalEventMap = {
  key: [KeyPress];
  resize: [];
};

/** The parts of a blessed key event this terminal reads. */
interface BlessedKey {
  name?: string;
  full?: string;
  sequence?: string;
}

/**
 * Normalize a blessed key event. Returns null for events that are only echoes
 * of another one.
 */
export function toKeyPress(ch: string | undefined, key: BlessedKey | undefined): KeyPress | null {
  if (!key) return ch ? { name: ch, ch } : null;

  // Enter arrives as 'return' and then again as a synthesized 'enter'
  if (key.name === 'return') return null;
  // A bare linefeed is Ctrl-J
  if (key.name === 'enter' && key.sequence === '\n') return { name: 'C-j' };

  const name = key.full ?? key.name ?? ch;
  if (!name) return null;
  return ch === undefined ? { name } : { name, ch };
}

/**
 * Serialize a frame update into one write: cursor moves and SGR runs.
 */
export function encodeFrame(update: FrameUpdate): string {
  let out = update.fullRedraw ? ANSI_RESET + CLEAR_SCREEN : '';
  for (const { row, col, segments } of update.updates) {
    out += cursorTo(row, col);
    for (const segment of segments) {
      out += sgr(segment.style) + segment.text;
    }
    out += ANSI_RESET;
  }
  if (update.cursor) {
    out += cursorTo(update.cursor.row, update.cursor.col);
    out += update.cursor.visible ? SHOW_CURSOR : HIDE_CURSOR;
  }
  return out;
}

/**
 * Terminal I/O over a neo-blessed program: decoded keys and resizes in,
 * frame updates out. Nothing else writes to stdout while it is open.
 */
export class BlessedTerminal extends EventEmitter<TerminalEventMap> {
  private program: BlessedProgram;

  constructor() {
    super();
    this.program = blessed.program();

    this.program.on('keypress', (ch: string | undefined, key: BlessedKey | undefined) => {
      const press = toKeyPress(ch, key);
      if (press) this.emit('key', press);
    });
    this.program.on('resize', () => {
      this.emit('resize');
    });
  }

  get width(): number {
    return this.program.cols;
  }

  get height(): number {
    return this.program.rows;
  }

  open(): void {
    this.program.alternateBuffer();
    this.program.hideCursor();
    this.program.clear();
  }

  write(update: FrameUpdate): void {
    const out = encodeFrame(update);
    if (out) this.program.write(out);
  }

  /**
   * Hand the terminal to a child process (pager, blame) for the duration of `fn`.
   */
  async suspend<T>(fn: () => Promise<T>): Promise<T> {
    const resume = this.program.pause();
    try {
      return await fn();
    } finally {
      resume();
      this.program.hideCursor();
    }
  }

  close(): void {
    this.program.clear();
    this.program.showCursor();
    this.program.normalBuffer();
    this.program.destroy();
  }
}
