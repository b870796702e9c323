/**
 * Core types for the page navigation engine
 */

// ============================================================================
// Interactions
// ============================================================================

/**
 * Interactions derived from the button input.
 *
 * | Button | Semantics | Assigned activity                        |
 * | ------ | --------- | ---------------------------------------- |
 * | first  | action    | activate, confirm, trigger, modify, ...  |
 * | second | next      | select the next item                     |
 * | third  | previous  | select the previous item in list         |
 * | fourth | back      | navigate to the previous position        |
 * | fifth  | home      | go to home page, reset                   |
 *
 * A rotary knob can be modelled as three buttons (action, next, previous).
 */
export enum Interaction {
  Action = 'action',
  Next = 'next',
  Previous = 'previous',
  Back = 'back',
  Home = 'home',
}

// ============================================================================
// Navigation Directives
// ============================================================================

export type PageNavigation =
  | { readonly type: 'systemStart' }
  | { readonly type: 'systemStop' }
  | { readonly type: 'update' }
  | { readonly type: 'left' }
  | { readonly type: 'right' }
  | { readonly type: 'up' }
  | { readonly type: 'home' }
  | { readonly type: 'nthSubpage'; readonly index: number };

export type PageNavigationType = PageNavigation['type'];

export const PageNavigation = {
  SystemStart: Object.freeze({ type: 'systemStart' }),
  SystemStop: Object.freeze({ type: 'systemStop' }),
  Update: Object.freeze({ type: 'update' }),
  Left: Object.freeze({ type: 'left' }),
  Right: Object.freeze({ type: 'right' }),
  Up: Object.freeze({ type: 'up' }),
  Home: Object.freeze({ type: 'home' }),

  /** Navigate to the n-th sub page (1-based) */
  nthSubpage(index: number): PageNavigation {
    return Object.freeze({ type: 'nthSubpage', index });
  },
} satisfies Record<string, PageNavigation | ((index: number) => PageNavigation)>;

// ============================================================================
// Run State
// ============================================================================

export type RunState = 'startup' | 'operational' | 'shutdown';

// ============================================================================
// Result
// ============================================================================

export type Result<T, E = Error> = Ok<T> | Err<E>;

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Output
// ============================================================================

/**
 * Minimal alphanumeric display the built-in pages render to.
 * Any page may target a richer output type of its own.
 */
export interface TextDisplay {
  update(title: string, text: string): void;
}
