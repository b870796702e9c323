/**
 * Demo page trees
 */

import {
  BasicPage,
  MenuPage,
  PageLifetime,
  PageManager,
  PageNavigation,
  ShutdownPage,
  StartupPage,
  TextPage,
  type Logger,
  type TextDisplay,
} from 'multi-page-hmi';

import type { DemoName } from '../config.js';
import { ClockPage, type Clock } from '../pages/ClockPage.js';
import { HomePage } from '../pages/HomePage.js';

export interface DemoOptions {
  startupTicks?: number;
  shutdownTicks?: number;
  clock?: Clock;
  logger?: Logger;
}

type DemoBuilder = (display: TextDisplay, options: DemoOptions) => PageManager<TextDisplay>;

/**
 * A menu listing three pages; action enters the selected one, back returns
 */
function submenu(display: TextDisplay, options: DemoOptions): PageManager<TextDisplay> {
  const manager = new PageManager<TextDisplay>(display, new MenuPage(new BasicPage('Menu')), {
    logger: options.logger,
  });

  manager.registerSub(new TextPage(new BasicPage('First Page'), 'Content of the first page'));
  manager.register(new TextPage(new BasicPage('Second Page'), 'Content of the second page'));
  manager.register(new TextPage(new BasicPage('Third Page'), 'Content of the third page'));
  manager.activateHome();

  return manager;
}

/**
 * Information pages in a row, one of them moving on by itself, plus a
 * two level configuration menu below the home page
 */
function rolling(display: TextDisplay, options: DemoOptions): PageManager<TextDisplay> {
  const manager = new PageManager<TextDisplay>(display, new HomePage('!!! This is the home page !!!'), {
    logger: options.logger,
  });

  manager.registerStartup(new StartupPage('Welcome message', options.startupTicks ?? 8));
  manager.registerShutdown(new ShutdownPage('Bye bye message', options.shutdownTicks ?? 10));

  manager.register(
    new TextPage(
      new BasicPage('First', new PageLifetime(PageNavigation.Left, 6)),
      'First information page with 3 seconds lifetime; moving to next page'
    )
  );
  manager.register(new ClockPage(new BasicPage('Time'), options.clock));

  manager.activateHome();
  manager.registerSub(new MenuPage(new BasicPage('Menu')));
  manager.registerSub(new TextPage(new BasicPage('Config-1'), 'First config page'));
  manager.register(new MenuPage(new BasicPage('Sub-Menu')));
  manager.registerSub(new TextPage(new BasicPage('Config-2'), 'Second config page'));
  manager.register(new TextPage(new BasicPage('Config-3'), 'Third config page'));
  manager.activateHome();

  return manager;
}

export const DEMOS: Readonly<Record<DemoName, DemoBuilder>> = {
  submenu,
  rolling,
};

export function buildDemo(name: DemoName, display: TextDisplay, options: DemoOptions = {}): PageManager<TextDisplay> {
  return DEMOS[name](display, options);
}
