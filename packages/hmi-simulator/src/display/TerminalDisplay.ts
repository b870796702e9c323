/**
 * Terminal display - renders a page as a title bar and one text line
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { TextDisplay } from 'multi-page-hmi';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface TerminalDisplayOptions {
  stream?: OutputStream;
  chalk?: ChalkInstance;
  /** Clear the screen before every frame */
  clear?: boolean;
  /** Width the title bar is padded to */
  width?: number;
}

export class TerminalDisplay implements TextDisplay {
  private readonly stream: OutputStream;
  private readonly chalk: ChalkInstance;
  private readonly clear: boolean;
  private readonly width: number;
  private frames = 0;

  constructor(options: TerminalDisplayOptions = {}) {
    this.stream = options.stream ?? process.stdout;
    this.chalk = options.chalk ?? chalk;
    this.clear = options.clear ?? true;
    this.width = options.width ?? 40;
  }

  /** Number of frames written so far */
  get frameCount(): number {
    return this.frames;
  }

  update(title: string, text: string): void {
    const bar = this.chalk.inverse.bold(` ${title}`.padEnd(this.width));
    this.stream.write(`${this.clear ? CLEAR_SCREEN : ''}${bar}\n${text}\n`);
    this.frames++;
  }
}
