/**
 * Scripted input - replays a key sequence, one key per tick
 *
 * Keys without a binding (e.g. `.`) are idle ticks.
 */

import { createKeymap, STOP_KEYS, type Keymap } from './keymap.js';
import type { InputEvent, InteractionSource } from './types.js';

export class ScriptedInput implements InteractionSource {
  private readonly keys: string[];
  private readonly keymap: Keymap;
  private position = 0;

  constructor(script: string, keymap: Keymap = createKeymap()) {
    this.keys = [...script];
    this.keymap = keymap;
  }

  get exhausted(): boolean {
    return this.position >= this.keys.length;
  }

  poll(): InputEvent | undefined {
    const key = this.keys[this.position];
    if (key === undefined) {
      return undefined;
    }
    this.position++;

    if (STOP_KEYS.includes(key)) {
      return { kind: 'stop' };
    }
    const interaction = this.keymap.get(key);
    return interaction ? { kind: 'interaction', interaction } : undefined;
  }

  close(): void {
    this.position = this.keys.length;
  }
}
