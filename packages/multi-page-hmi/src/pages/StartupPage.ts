/**
 * Startup page - shown while the system starts, then hands over to home
 */

import { PageLifetime } from '../core/lifetime.js';
import type { Page } from '../core/page.js';
import { PageNavigation, ok, type Result, type TextDisplay } from '../core/types.js';
import type { PageError } from '../core/errors.js';
import { BasicPage } from './BasicPage.js';

export class StartupPage implements Page<TextDisplay> {
  readonly basic: BasicPage;
  readonly text: string;

  /**
   * @param durationInUpdates - update ticks until the home page takes over
   */
  constructor(text: string, durationInUpdates: number) {
    this.basic = new BasicPage('Startup', new PageLifetime(PageNavigation.Home, durationInUpdates));
    this.text = text;
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, this.text);
  }

  /** Interactions do not shorten the startup */
  dispatch(): PageNavigation {
    return PageNavigation.SystemStart;
  }

  update(): Result<PageNavigation, PageError> {
    const navigation = this.basic.tick();
    return ok(navigation.type === 'update' ? PageNavigation.SystemStart : navigation);
  }

  title(): string {
    return this.basic.title;
  }
}
