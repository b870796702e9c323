/**
 * Basic page - title and optional lifetime shared by the built-in pages
 */

import type { PageLifetime } from '../core/lifetime.js';
import { tickLifetime } from '../core/lifetime.js';
import type { PageNavigation } from '../core/types.js';

export class BasicPage {
  readonly title: string;
  readonly lifetime?: PageLifetime;

  constructor(title: string, lifetime?: PageLifetime) {
    this.title = title;
    this.lifetime = lifetime;
  }

  /** Age the lifetime by one update; see {@link tickLifetime} */
  tick(): PageNavigation {
    return tickLifetime(this.lifetime);
  }

  resetLifetime(): void {
    this.lifetime?.resetAge();
  }
}
