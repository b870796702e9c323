/**
 * Menu page - lists the titles of its sub pages and enters the selected one
 */

import type { PageError } from '../core/errors.js';
import type { Page, PageTitles } from '../core/page.js';
import { Interaction, PageNavigation, ok, type Result, type TextDisplay } from '../core/types.js';
import type { BasicPage } from './BasicPage.js';

export class MenuPage implements Page<TextDisplay> {
  readonly basic: BasicPage;
  /** Label of an extra last item leaving the menu upwards */
  readonly back?: string;
  private selected = 1;
  private maxItems = 1;
  private subTitles = '';

  constructor(basic: BasicPage, back?: string) {
    this.basic = basic;
    this.back = back;
  }

  /** 1-based index of the highlighted item */
  get selection(): number {
    return this.selected;
  }

  get itemCount(): number {
    return this.maxItems;
  }

  /** Item line as last rendered, e.g. `[ foo ] bar baz ` */
  get items(): string {
    return this.subTitles;
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, this.subTitles);
  }

  dispatch(interaction: Interaction): PageNavigation {
    this.basic.resetLifetime();

    switch (interaction) {
      case Interaction.Action:
        return this.isBackSelected() ? PageNavigation.Up : PageNavigation.nthSubpage(this.selected);
      case Interaction.Back:
        return PageNavigation.Up;
      case Interaction.Home:
        return PageNavigation.Home;
      case Interaction.Next:
        this.selected = Math.min(this.selected + 1, this.maxItems);
        return PageNavigation.Update;
      case Interaction.Previous:
        this.selected = Math.max(this.selected - 1, 1);
        return PageNavigation.Update;
    }
  }

  update(subpageTitles?: PageTitles): Result<PageNavigation, PageError> {
    if (subpageTitles) {
      this.rebuild(subpageTitles);
    }
    return ok(this.basic.tick());
  }

  title(): string {
    return this.basic.title;
  }

  private rebuild(subpageTitles: PageTitles): void {
    const labels = [...subpageTitles];
    if (this.back !== undefined) {
      labels.push(this.back);
    }

    this.maxItems = labels.length;
    if (this.selected > this.maxItems) {
      this.selected = Math.max(this.maxItems, 1);
    }
    this.subTitles = labels
      .map((label, i) => (i + 1 === this.selected ? `[ ${label} ] ` : `${label} `))
      .join('');
  }

  private isBackSelected(): boolean {
    return this.back !== undefined && this.selected === this.maxItems;
  }
}
