/**
 * Keyboard input - raw mode key presses from a terminal
 */

import { emitKeypressEvents, type Key } from 'node:readline';

import { createKeymap, STOP_KEYS, type Keymap } from './keymap.js';
import type { InputEvent, InteractionSource } from './types.js';

export interface KeyboardStream extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export class KeyboardInput implements InteractionSource {
  private readonly stream: KeyboardStream;
  private readonly keymap: Keymap;
  private readonly pending: InputEvent[] = [];
  private readonly onKeypress = (sequence: string | undefined, key: Key | undefined): void => {
    const event = this.translate(sequence, key);
    if (event) {
      this.pending.push(event);
    }
  };

  constructor(stream: KeyboardStream = process.stdin, keymap: Keymap = createKeymap()) {
    this.stream = stream;
    this.keymap = keymap;

    emitKeypressEvents(stream);
    if (stream.isTTY) {
      stream.setRawMode?.(true);
    }
    stream.on('keypress', this.onKeypress);
    stream.resume();
  }

  poll(): InputEvent | undefined {
    return this.pending.shift();
  }

  close(): void {
    this.stream.removeListener('keypress', this.onKeypress);
    if (this.stream.isTTY) {
      this.stream.setRawMode?.(false);
    }
    this.stream.pause();
  }

  private translate(sequence: string | undefined, key: Key | undefined): InputEvent | undefined {
    if (key?.ctrl && key.name === 'c') {
      return { kind: 'stop' };
    }
    if (sequence === undefined) {
      return undefined;
    }
    if (STOP_KEYS.includes(sequence)) {
      return { kind: 'stop' };
    }
    const interaction = this.keymap.get(sequence);
    return interaction ? { kind: 'interaction', interaction } : undefined;
  }
}
