/**
 * Page capability contract
 *
 * Data structures implementing `Page` can be handled by the PageManager.
 * Pages never know about other pages or about their position in the tree.
 */

import type { PageError } from './errors.js';
import { defaultNavigation } from './navigation.js';
import { PageNavigation, ok, type Interaction, type Result } from './types.js';

/**
 * Titles of the sub pages of the active page.
 * Lazy, finite and restartable: every iteration starts from the first child.
 */
export type PageTitles = Iterable<string>;

export interface Page<D> {
  /** Render the current content; must not change page state */
  display(output: D): void;

  /**
   * Handle an interaction.
   * Pages with internal state (selection cursors, text buffers) consume
   * interactions themselves and only return a movement when leaving.
   * Defaults to {@link defaultNavigation}.
   */
  dispatch?(interaction: Interaction): PageNavigation;

  /**
   * Called once per tick for the page about to be displayed.
   * Defaults to `Update`.
   */
  update?(subpageTitles?: PageTitles): Result<PageNavigation, PageError>;

  /** Defaults to the empty string */
  title?(): string;
}

export function dispatchPage<D>(page: Page<D>, interaction: Interaction): PageNavigation {
  return page.dispatch ? page.dispatch(interaction) : defaultNavigation(interaction);
}

export function updatePage<D>(
  page: Page<D>,
  subpageTitles?: PageTitles
): Result<PageNavigation, PageError> {
  return page.update ? page.update(subpageTitles) : ok(PageNavigation.Update);
}

export function pageTitle<D>(page: Page<D>): string {
  return page.title?.() ?? '';
}
