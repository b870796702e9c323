/**
 * Navigation directive algebra
 */

import { Interaction, PageNavigation } from './types.js';

const DEFAULT_MAPPING: Record<Interaction, PageNavigation> = {
  [Interaction.Action]: PageNavigation.Update,
  [Interaction.Next]: PageNavigation.Left,
  [Interaction.Previous]: PageNavigation.Right,
  [Interaction.Back]: PageNavigation.Up,
  [Interaction.Home]: PageNavigation.Home,
};

/**
 * Map an interaction to the navigation a page without own input handling
 * produces. System start/stop are never part of this mapping.
 */
export function defaultNavigation(interaction: Interaction): PageNavigation {
  return DEFAULT_MAPPING[interaction];
}

export function navigationEquals(a: PageNavigation, b: PageNavigation): boolean {
  if (a.type === 'nthSubpage' && b.type === 'nthSubpage') {
    return a.index === b.index;
  }
  return a.type === b.type;
}

/**
 * Directives that move the cursor
 */
export function isMovement(navigation: PageNavigation): boolean {
  switch (navigation.type) {
    case 'left':
    case 'right':
    case 'up':
    case 'home':
    case 'nthSubpage':
      return true;
    default:
      return false;
  }
}

export function describeNavigation(navigation: PageNavigation): string {
  return navigation.type === 'nthSubpage'
    ? `nthSubpage(${navigation.index})`
    : navigation.type;
}
