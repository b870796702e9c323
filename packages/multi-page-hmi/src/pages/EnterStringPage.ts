/**
 * Enter string page - composes a string character by character with the
 * next/previous/action buttons and stores it into a setting
 *
 * The selectable entries are the allowed characters, followed by an optional
 * back entry (delete the last character) and an optional finish entry (store
 * and leave).
 */

import type { PageError } from '../core/errors.js';
import { SettingError } from '../core/errors.js';
import type { Page } from '../core/page.js';
import { Interaction, PageNavigation, ok, type Result, type TextDisplay } from '../core/types.js';
import type { Setting } from '../setting/CellSetting.js';
import type { BasicPage } from './BasicPage.js';

export interface EnterStringLabels {
  /** Label of the delete-last-character entry */
  back?: string;
  /** Label of the store-and-leave entry */
  up?: string;
}

export class EnterStringPage<T> implements Page<TextDisplay> {
  readonly basic: BasicPage;
  private readonly characters: string[];
  private readonly labels: EnterStringLabels;
  private readonly setting: Setting<T>;
  private readonly maxChars: number;
  private currentChar = 0;
  private text: string;

  constructor(basic: BasicPage, allowedCharacters: string, setting: Setting<T>, labels: EnterStringLabels = {}) {
    this.basic = basic;
    this.characters = [...allowedCharacters];
    this.labels = labels;
    this.setting = setting;
    this.maxChars =
      this.characters.length + (labels.back !== undefined ? 1 : 0) + (labels.up !== undefined ? 1 : 0);
    this.text = String(setting.get());
  }

  /** The string entered so far */
  get buffer(): string {
    return this.text;
  }

  /** Name of the entry the action button currently triggers */
  actionString(): string {
    if (this.isBack() && this.labels.back !== undefined) {
      return this.labels.back;
    }
    if (this.isFinish() && this.labels.up !== undefined) {
      return this.labels.up;
    }
    return this.characters[this.currentChar] ?? '';
  }

  display(output: TextDisplay): void {
    output.update(this.basic.title, `${this.text} [${this.actionString()}]`);
  }

  dispatch(interaction: Interaction): PageNavigation {
    this.basic.resetLifetime();

    switch (interaction) {
      case Interaction.Action:
        if (this.isBack()) {
          this.removeLast();
          return PageNavigation.Update;
        }
        if (this.isFinish()) {
          return this.store();
        }
        this.text += this.characters[this.currentChar] ?? '';
        return PageNavigation.Update;
      case Interaction.Back:
        this.removeLast();
        return PageNavigation.Update;
      case Interaction.Home:
        return PageNavigation.Up;
      case Interaction.Next:
        this.currentChar = this.currentChar + 1 >= this.maxChars ? 0 : this.currentChar + 1;
        return PageNavigation.Update;
      case Interaction.Previous:
        this.currentChar = this.currentChar === 0 ? this.maxChars - 1 : this.currentChar - 1;
        return PageNavigation.Update;
    }
  }

  update(): Result<PageNavigation, PageError> {
    return ok(this.basic.tick());
  }

  title(): string {
    return this.basic.title;
  }

  private isBack(): boolean {
    return this.labels.back !== undefined && this.currentChar === this.characters.length;
  }

  private isFinish(): boolean {
    if (this.labels.up === undefined || this.currentChar < this.characters.length) {
      return false;
    }
    return this.labels.back === undefined || this.currentChar > this.characters.length;
  }

  /** A value the setting rejects keeps the page open with the buffer intact */
  private store(): PageNavigation {
    try {
      this.setting.setString(this.text);
    } catch (error) {
      if (error instanceof SettingError) {
        return PageNavigation.Update;
      }
      throw error;
    }
    return PageNavigation.Up;
  }

  private removeLast(): void {
    this.text = [...this.text].slice(0, -1).join('');
  }
}
