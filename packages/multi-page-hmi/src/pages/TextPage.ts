/**
 * Text page - static text, optionally leaving itself after a number of updates
 */

import type { Page } from '../core/page.js';
import { ok, type PageNavigation, type Result, type TextDisplay } from '../core/types.js';
import type { PageError } from '../core/errors.js';
import type { BasicPage } from './BasicPage.js';

export class TextPage implements Page<TextDisplay> {
  readonly basic: BasicPage;
  readonly text: string;

  constructor(basic: BasicPage, text: string) {
    this.basic = basic;
    this.text = text;
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, this.text);
  }

  update(): Result<PageNavigation, PageError> {
    return ok(this.basic.tick());
  }

  title(): string {
    return this.basic.title;
  }
}
