/**
 * Input sources polled once per tick
 */

import type { Interaction } from 'multi-page-hmi';

export type InputEvent =
  | { kind: 'interaction'; interaction: Interaction }
  | { kind: 'stop' };

export interface InteractionSource {
  /** Next pending event, undefined when no button was pressed */
  poll(): InputEvent | undefined;
  close(): void;
}
