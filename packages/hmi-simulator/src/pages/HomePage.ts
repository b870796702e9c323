/**
 * Home page with system control
 *
 * Action enters the first sub page, back shuts the system down and previous
 * starts it again.
 */

import {
  BasicPage,
  Interaction,
  PageNavigation,
  type Page,
  type TextDisplay,
} from 'multi-page-hmi';

export class HomePage implements Page<TextDisplay> {
  readonly basic: BasicPage;
  readonly text: string;

  constructor(text: string, title = 'Home') {
    this.basic = new BasicPage(title);
    this.text = text;
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, this.text);
  }

  dispatch(interaction: Interaction): PageNavigation {
    switch (interaction) {
      case Interaction.Action:
        return PageNavigation.nthSubpage(1);
      case Interaction.Back:
        return PageNavigation.SystemStop;
      case Interaction.Home:
        return PageNavigation.Home;
      case Interaction.Next:
        return PageNavigation.Left;
      case Interaction.Previous:
        return PageNavigation.SystemStart;
    }
  }

  title(): string {
    return this.basic.title;
  }
}
