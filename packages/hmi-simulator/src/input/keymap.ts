/**
 * Key bindings of the simulated buttons
 */

import { Interaction } from 'multi-page-hmi';

export type Keymap = ReadonlyMap<string, Interaction>;

export const DEFAULT_KEYS: Readonly<Record<string, Interaction>> = {
  ' ': Interaction.Action,
  n: Interaction.Next,
  p: Interaction.Previous,
  b: Interaction.Back,
  h: Interaction.Home,
};

/** Keys requesting a system stop; ctrl-c included */
export const STOP_KEYS: readonly string[] = ['q', '\u0003'];

/**
 * Create a keymap; overrides replace the default binding of their interaction
 */
export function createKeymap(overrides: Readonly<Record<string, Interaction>> = {}): Keymap {
  const overridden = new Set(Object.values(overrides));
  const keymap = new Map<string, Interaction>();

  for (const [key, interaction] of Object.entries(DEFAULT_KEYS)) {
    if (!overridden.has(interaction)) {
      keymap.set(key, interaction);
    }
  }
  for (const [key, interaction] of Object.entries(overrides)) {
    keymap.set(key, interaction);
  }
  return keymap;
}

export function describeKey(key: string): string {
  switch (key) {
    case ' ':
      return 'space';
    case '\u0003':
      return 'ctrl-c';
    default:
      return key;
  }
}

/** One `key  interaction` line per binding, in button order */
export function describeKeymap(keymap: Keymap): string[] {
  const order = Object.values(Interaction);
  return [...keymap.entries()]
    .sort(([, a], [, b]) => order.indexOf(a) - order.indexOf(b))
    .map(([key, interaction]) => `${describeKey(key).padEnd(6)}${interaction}`);
}
