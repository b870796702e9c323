/**
 * Page lifetime - how many update ticks a page survives without reset
 */

import { ConfigurationError } from './errors.js';
import { PageNavigation } from './types.js';

const MAX_UPDATES = 0xffff;

export class PageLifetime {
  /** Where to navigate once the lifetime is over */
  private readonly target: PageNavigation;
  /** How many update calls the page survives before deactivation */
  private readonly lifetimeInUpdates: number;
  private updateCounter = 0;

  constructor(target: PageNavigation, lifetimeInUpdates: number) {
    if (!Number.isInteger(lifetimeInUpdates) || lifetimeInUpdates < 0 || lifetimeInUpdates > MAX_UPDATES) {
      throw new ConfigurationError(`Invalid page lifetime: ${lifetimeInUpdates}`, [
        `lifetimeInUpdates must be an integer between 0 and ${MAX_UPDATES}`,
      ]);
    }
    this.target = target;
    this.lifetimeInUpdates = lifetimeInUpdates;
  }

  /** A lifetime of zero is over before the first update */
  isOver(): boolean {
    return this.updateCounter >= this.lifetimeInUpdates;
  }

  getTarget(): PageNavigation {
    return this.target;
  }

  increaseAge(): void {
    if (this.updateCounter < MAX_UPDATES) {
      this.updateCounter++;
    }
  }

  resetAge(): void {
    this.updateCounter = 0;
  }

  get age(): number {
    return this.updateCounter;
  }

  get limit(): number {
    return this.lifetimeInUpdates;
  }
}

/**
 * Age a page's lifetime by one update tick.
 *
 * Returns the lifetime target once it is over (and starts counting again),
 * `Update` otherwise or when the page has no lifetime.
 */
export function tickLifetime(lifetime?: PageLifetime): PageNavigation {
  if (!lifetime) {
    return PageNavigation.Update;
  }
  lifetime.increaseAge();
  if (lifetime.isOver()) {
    lifetime.resetAge();
    return lifetime.getTarget();
  }
  return PageNavigation.Update;
}
