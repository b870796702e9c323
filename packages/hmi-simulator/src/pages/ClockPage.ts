/**
 * Clock page - shows the time of day
 */

import {
  BasicPage,
  ok,
  type Page,
  type PageError,
  type PageNavigation,
  type Result,
  type TextDisplay,
} from 'multi-page-hmi';

export type Clock = () => Date;

export function formatTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

export class ClockPage implements Page<TextDisplay> {
  readonly basic: BasicPage;
  private readonly clock: Clock;

  constructor(basic: BasicPage, clock: Clock = () => new Date()) {
    this.basic = basic;
    this.clock = clock;
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, formatTime(this.clock()));
  }

  update(): Result<PageNavigation, PageError> {
    return ok(this.basic.tick());
  }

  title(): string {
    return this.basic.title;
  }
}
