/**
 * Shutdown page - shown while the system stops; fails once its time is up
 */

import { PageError } from '../core/errors.js';
import { PageLifetime } from '../core/lifetime.js';
import type { Page } from '../core/page.js';
import { PageNavigation, err, ok, type Result, type TextDisplay } from '../core/types.js';
import { BasicPage } from './BasicPage.js';

export class ShutdownPage implements Page<TextDisplay> {
  readonly basic: BasicPage;
  readonly text: string;

  constructor(text: string, durationInUpdates: number) {
    this.basic = new BasicPage('Shutdown', new PageLifetime(PageNavigation.SystemStop, durationInUpdates));
    this.text = text;
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, this.text);
  }

  dispatch(): PageNavigation {
    return PageNavigation.SystemStop;
  }

  /** Returns an error once the shutdown time is over, which ends the run loop */
  update(): Result<PageNavigation, PageError> {
    const lifetime = this.basic.lifetime;
    if (lifetime) {
      lifetime.increaseAge();
      if (lifetime.isOver()) {
        return err(new PageError('Shutdown time is over', { updates: lifetime.age }));
      }
    }
    return ok(PageNavigation.SystemStop);
  }

  title(): string {
    return this.basic.title;
  }
}
