/**
 * Terminal I/O for the interactive session: raw keypresses in, whole
 * frames out on the alternate screen. Kept thin; the behaviour lives in
 * the controller.
 */

import { createInterface, emitKeypressEvents } from 'node:readline';
import { parsePastedPaths } from '@tinythis/utils';
import type { SessionEvent } from './controller.js';

export interface Keypress {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  sequence?: string;
}

export type KeyHandler = (str: string | undefined, key: Keypress) => void;

const ESC = '\u001b[';
const ALT_SCREEN_ON = `${ESC}?1049h`;
const ALT_SCREEN_OFF = `${ESC}?1049l`;
const CURSOR_HIDE = `${ESC}?25l`;
const CURSOR_SHOW = `${ESC}?25h`;
const CLEAR = `${ESC}H${ESC}2J`;

/**
 * Map a keypress to a session event
 */
export function keyToEvent(str: string | undefined, key: Keypress): SessionEvent | null {
  if (key.ctrl) {
    if (key.name === 'c') return 'quit';
    if (key.name === 'o') return 'add-files';
    return null;
  }

  switch (key.name) {
    case 'up':
      return 'select-prev';
    case 'down':
      return 'select-next';
    case 'left':
      return 'preset-prev';
    case 'right':
      return 'preset-next';
    case 'backspace':
    case 'delete':
      return 'remove-selected';
    case 'return':
    case 'enter':
      return 'run';
    case 'escape':
      return 'cancel';
  }

  switch (str?.toLowerCase()) {
    case 'a':
      return 'add-files';
    case 'g':
      return 'toggle-accelerator';
    case 'r':
      return 'retry-selected';
    case 'q':
      return 'quit';
    default:
      return null;
  }
}

export class Terminal {
  private keyHandler: KeyHandler | null = null;
  private active = false;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout
  ) {}

  enter(): void {
    if (this.active) return;
    this.active = true;
    emitKeypressEvents(this.input);
    this.setRaw(true);
    this.input.resume();
    this.output.write(ALT_SCREEN_ON + CURSOR_HIDE);
  }

  leave(): void {
    if (!this.active) return;
    this.active = false;
    this.detachKeys();
    this.setRaw(false);
    this.input.pause();
    this.output.write(CURSOR_SHOW + ALT_SCREEN_OFF);
  }

  onKey(handler: KeyHandler): void {
    this.detachKeys();
    this.keyHandler = handler;
    this.input.on('keypress', handler);
  }

  draw(lines: string[]): void {
    if (!this.active) return;
    this.output.write(CLEAR + lines.join('\n') + '\n');
  }

  /**
   * Ask for one or more paths (pasted, dropped, quoted or file:// URLs)
   */
  async promptPaths(question: string): Promise<string[]> {
    const handler = this.keyHandler;
    this.detachKeys();
    this.setRaw(false);
    this.output.write(CURSOR_SHOW);

    const rl = createInterface({ input: this.input, output: this.output, terminal: true });
    try {
      const answer = await new Promise<string>(resolve => rl.question(question, resolve));
      return parsePastedPaths(answer);
    } finally {
      rl.close();
      this.input.resume();
      this.setRaw(true);
      this.output.write(CURSOR_HIDE);
      if (handler) this.onKey(handler);
    }
  }

  private detachKeys(): void {
    if (this.keyHandler) {
      this.input.off('keypress', this.keyHandler);
      this.keyHandler = null;
    }
  }

  private setRaw(raw: boolean): void {
    if (this.input.isTTY) {
      this.input.setRawMode(raw);
    }
  }
}
