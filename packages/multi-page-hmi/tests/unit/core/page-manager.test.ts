/**
 * PageManager Unit Tests
 *
 * Cursor moves, dispatch protocol, run state and tear-down.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PageManager, createPageManager, DIRECTIONS } from '../../../src/core/PageManager.js';
import { PageError } from '../../../src/core/errors.js';
import type { Page } from '../../../src/core/page.js';
import { Interaction, PageNavigation, err, type TextDisplay } from '../../../src/core/types.js';
import { createLogger } from '../../../src/utils/logger.js';
import { StartupPage } from '../../../src/pages/StartupPage.js';
import { ShutdownPage } from '../../../src/pages/ShutdownPage.js';
import { PageMock, RecordingDisplay, createPageMock } from '../../mocks/index.js';

const logger = createLogger({ level: 'silent' });

function snapshotOf(manager: PageManager<TextDisplay>): Record<string, Page<TextDisplay>[]> {
  const chains: Record<string, Page<TextDisplay>[]> = { active: [manager.activePage] };
  for (const direction of DIRECTIONS) {
    chains[direction] = [...manager.chain(direction)];
  }
  return chains;
}

function dispatchAll(manager: PageManager<TextDisplay>, navigations: PageNavigation[]): void {
  for (const navigation of navigations) {
    manager.dispatch(navigation);
  }
}

describe('PageManager', () => {
  let display: RecordingDisplay;

  beforeEach(() => {
    display = new RecordingDisplay();
  });

  describe('Sibling row', () => {
    let manager: PageManager<TextDisplay>;

    beforeEach(() => {
      manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.register(new PageMock('foo'));
      manager.register(new PageMock('bar'));
      manager.register(new PageMock('baz'));
    });

    it('should make the last registered page active', () => {
      expect(manager.update().ok).toBe(true);
      expect(display.titles()).toEqual(['baz']);
    });

    it('should walk the row without wrapping', () => {
      manager.update();
      dispatchAll(manager, [
        PageNavigation.Home,
        PageNavigation.Left,
        PageNavigation.Left,
        PageNavigation.Left,
        PageNavigation.Right,
        PageNavigation.Right,
        PageNavigation.Right,
        PageNavigation.Right,
        PageNavigation.Left,
        PageNavigation.Left,
        PageNavigation.Left,
        PageNavigation.Left,
      ]);

      expect(display.titles()).toEqual([
        'baz',
        'Home',
        'foo',
        'bar',
        'baz',
        'bar',
        'foo',
        'Home',
        'Home',
        'foo',
        'bar',
        'baz',
        'baz',
      ]);
    });

    it('should report boundaries of the row', () => {
      manager.activateHome();

      expect(manager.activateLeft()).toBe(true);
      expect(manager.activateLeft()).toBe(true);
      expect(manager.activateLeft()).toBe(true);
      expect(manager.activateLeft()).toBe(false);
      expect(manager.activePage.title?.()).toBe('baz');
      expect(manager.activateRight()).toBe(true);
      expect(manager.activateRight()).toBe(true);
      expect(manager.activateRight()).toBe(true);
      expect(manager.activateRight()).toBe(false);
      expect(manager.activePage.title?.()).toBe('Home');
    });

    it('should restore the exact state after moving left and back right', () => {
      manager.activateHome();
      manager.activateLeft();
      const before = snapshotOf(manager);

      manager.activateLeft();
      manager.activateLeft();
      manager.activateRight();
      manager.activateRight();

      expect(snapshotOf(manager)).toEqual(before);
    });

    it('should not move up or down at the root level', () => {
      manager.activateHome();
      const before = snapshotOf(manager);

      expect(manager.activateDown()).toBe(false);
      expect(manager.activateUp()).toBe(false);
      expect(snapshotOf(manager)).toEqual(before);
    });
  });

  describe('Three pages', () => {
    it('should return booleans at both ends of the row', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('foo'), { logger });
      manager.register(new PageMock('bar'));
      manager.register(new PageMock('baz'));
      manager.activateHome();

      expect([manager.activateLeft(), manager.activateLeft()]).toEqual([true, true]);
      expect([
        manager.activateRight(),
        manager.activateRight(),
        manager.activateRight(),
        manager.activateRight(),
      ]).toEqual([true, true, false, false]);
      expect([
        manager.activateLeft(),
        manager.activateLeft(),
        manager.activateLeft(),
        manager.activateLeft(),
      ]).toEqual([true, true, false, false]);
    });
  });

  describe('Multiple levels', () => {
    let manager: PageManager<TextDisplay>;

    beforeEach(() => {
      manager = createPageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.register(new PageMock('level_1_second'));
      manager.registerSub(new PageMock('level_2_first'));
      manager.register(new PageMock('level_2_second'));
      manager.registerSub(new PageMock('level_3_first'));
      manager.register(new PageMock('level_3_second'));
    });

    it('should navigate across levels', () => {
      manager.update();
      dispatchAll(manager, [
        PageNavigation.Home,
        PageNavigation.Left,
        PageNavigation.Right,
        PageNavigation.nthSubpage(1),
        PageNavigation.Left,
        PageNavigation.nthSubpage(1),
        PageNavigation.nthSubpage(1),
        PageNavigation.Left,
        PageNavigation.nthSubpage(2),
        PageNavigation.Right,
        PageNavigation.Right,
        PageNavigation.Left,
        PageNavigation.Up,
        PageNavigation.nthSubpage(4),
      ]);

      expect(display.titles()).toEqual([
        'level_3_second',
        'Home',
        'level_1_second',
        'Home',
        'Home',
        'level_1_second',
        'level_2_first',
        'level_2_first',
        'level_2_second',
        'level_3_second',
        'level_3_first',
        'level_3_first',
        'level_3_second',
        'level_2_second',
        'level_3_second',
      ]);
    });

    it('should link the parent only from the rightmost sibling', () => {
      expect(manager.chain('up').next().done).toBe(true);
      expect(manager.activateRight()).toBe(true);
      expect([...manager.chain('up')].map((page) => page.title?.())).toEqual(['level_2_second']);
    });

    it('should restore the exact state after descending and ascending', () => {
      manager.activateHome();
      manager.activateLeft();
      const before = snapshotOf(manager);

      expect(manager.activateDown()).toBe(true);
      expect(manager.activateLeft()).toBe(true);
      expect(manager.activateUp()).toBe(true);

      expect(snapshotOf(manager)).toEqual(before);
    });

    it('should treat index zero like the first sub page', () => {
      manager.activateHome();
      manager.activateLeft();
      manager.dispatch(PageNavigation.nthSubpage(0));

      expect(manager.activePage.title?.()).toBe('level_2_first');
    });

    it('should return to the root from any depth', () => {
      manager.activateHome();

      expect(manager.activePage.title?.()).toBe('Home');
      expect(manager.chain('up').next().done).toBe(true);
      expect(manager.chain('right').next().done).toBe(true);
    });
  });

  describe('Sub pages', () => {
    it('should iterate children in registration order', () => {
      const home = new PageMock('Home');
      const manager = new PageManager<TextDisplay>(display, home, { logger });
      manager.registerSub(new PageMock('foo'));
      manager.register(new PageMock('bar'));
      manager.register(new PageMock('baz'));
      manager.activateHome();

      expect([...manager.subpages()].map((page) => page.title?.())).toEqual(['foo', 'bar', 'baz']);

      manager.update();
      expect(home.seenTitles).toEqual([['foo', 'bar', 'baz']]);
    });

    it('should pass restartable titles to the active page', () => {
      const iterations: string[][] = [];
      const home: Page<TextDisplay> = {
        display: () => undefined,
        update: (titles) => {
          iterations.push([...(titles ?? [])]);
          iterations.push([...(titles ?? [])]);
          return { ok: true, value: PageNavigation.Update };
        },
      };
      const manager = new PageManager<TextDisplay>(display, home, { logger });
      manager.registerSub(new PageMock('one'));
      manager.register(new PageMock('two'));
      manager.activateHome();
      manager.update();

      expect(iterations).toEqual([
        ['one', 'two'],
        ['one', 'two'],
      ]);
    });

    it('should pass no titles to a page without children', () => {
      const home = new PageMock('Home');
      const manager = new PageManager<TextDisplay>(display, home, { logger });
      manager.update();

      expect(home.seenTitles).toEqual([[]]);
    });

    it('should nest the previous children below a second sub page', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.registerSub(new PageMock('first'));
      manager.activateUp();
      manager.registerSub(new PageMock('second'));

      expect([...manager.subpages()].map((page) => page.title?.())).toEqual(['first']);
    });
  });

  describe('Lifetime redirect', () => {
    it('should execute the expired navigation and display twice', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.register(createPageMock('info', PageNavigation.Right, 1));

      expect(manager.update().ok).toBe(true);
      expect(display.titles()).toEqual(['Home', 'Home']);
    });

    it('should stay on the page while its lifetime lasts', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.register(createPageMock('info', PageNavigation.Home, 3));

      manager.update();
      manager.update();
      manager.update();

      expect(display.titles()).toEqual(['info', 'info', 'Home', 'Home']);
    });
  });

  describe('Errors', () => {
    it('should propagate a failing page update without displaying', () => {
      const failure = new PageError('sensor lost');
      const manager = new PageManager<TextDisplay>(
        display,
        new PageMock('Home', { updateResult: err(failure) }),
        { logger }
      );

      const result = manager.update();

      expect(result).toEqual({ ok: false, error: failure });
      expect(display.frames).toHaveLength(0);
    });

    it('should propagate a failure through a movement', () => {
      const failure = new PageError('broken');
      const manager = new PageManager<TextDisplay>(
        display,
        new PageMock('Home', { updateResult: err(failure) }),
        { logger }
      );
      manager.register(new PageMock('foo'));

      const result = manager.dispatch(PageNavigation.Home);

      expect(result.ok).toBe(false);
      expect(display.frames).toHaveLength(0);
    });
  });

  describe('System lifecycle', () => {
    it('should start in the startup state', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });

      expect(manager.state).toBe('startup');
      expect(manager.hasStartupPage()).toBe(false);
      expect(manager.hasShutdownPage()).toBe(false);
    });

    it('should become operational on start without a startup page', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });

      expect(manager.dispatch(PageNavigation.SystemStart)).toEqual({ ok: true, value: PageNavigation.Update });
      expect(manager.state).toBe('operational');
      expect(display.frames).toHaveLength(0);
    });

    it('should show the startup page before the home page', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.registerStartup(new StartupPage('Booting', 2));

      expect(manager.dispatch(PageNavigation.SystemStart)).toEqual({
        ok: true,
        value: PageNavigation.SystemStart,
      });
      expect(manager.state).toBe('startup');
      manager.dispatch(PageNavigation.Update);
      expect(manager.dispatch(PageNavigation.SystemStop)).toEqual({ ok: true, value: PageNavigation.SystemStop });

      expect(display.titles()).toEqual(['Startup', 'Foo']);
      expect(manager.state).toBe('shutdown');
    });

    it('should hand over to home once the startup page expires', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.registerStartup(new StartupPage('Booting', 2));

      const first = manager.dispatch(PageNavigation.SystemStart);
      const second = manager.dispatch(PageNavigation.SystemStart);

      expect(first).toEqual({ ok: true, value: PageNavigation.SystemStart });
      expect(second).toEqual({ ok: true, value: PageNavigation.Home });
      expect(manager.state).toBe('operational');

      manager.dispatch(PageNavigation.Home);
      expect(display.titles()).toEqual(['Startup', 'Startup', 'Foo']);
    });

    it('should return to the home page on start', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.register(new PageMock('Bar'));

      manager.dispatch(PageNavigation.SystemStart);

      expect(manager.activePage.title?.()).toBe('Foo');
    });

    it('should show the shutdown page and fail once it expires', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.registerShutdown(new ShutdownPage('Bye', 2));

      manager.dispatch(PageNavigation.SystemStart);
      manager.dispatch(PageNavigation.Update);
      const first = manager.dispatch(PageNavigation.SystemStop);
      const second = manager.dispatch(PageNavigation.SystemStop);

      expect(first).toEqual({ ok: true, value: PageNavigation.SystemStop });
      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error).toBeInstanceOf(PageError);
      }
      expect(display.titles()).toEqual(['Foo', 'Shutdown']);
      expect(manager.state).toBe('shutdown');
    });

    it('should route interactions to the startup page while starting', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.registerStartup(new StartupPage('Booting', 5));
      manager.dispatch(PageNavigation.SystemStart);

      const result = manager.dispatchInteraction(Interaction.Next);

      expect(result).toEqual({ ok: true, value: PageNavigation.SystemStart });
      expect(display.titles()).toEqual(['Startup', 'Startup']);
    });

    it('should route interactions to the active page when operational', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.register(new PageMock('Bar'));
      manager.dispatch(PageNavigation.SystemStart);

      manager.dispatchInteraction(Interaction.Next);

      expect(display.titles()).toEqual(['Bar']);
    });

    it('should fall back to the active page without a startup page', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.register(new PageMock('Bar'));
      manager.activateHome();

      const result = manager.dispatchInteraction(Interaction.Next);

      expect(result).toEqual({ ok: true, value: PageNavigation.Update });
      expect(manager.state).toBe('operational');
      expect(display.titles()).toEqual(['Bar']);
    });

    it('should route interactions to the shutdown page while stopping', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.registerShutdown(new ShutdownPage('Bye', 3));
      manager.dispatch(PageNavigation.SystemStart);
      manager.dispatch(PageNavigation.SystemStop);

      const result = manager.dispatchInteraction(Interaction.Home);

      expect(result).toEqual({ ok: true, value: PageNavigation.SystemStop });
      expect(display.titles()).toEqual(['Shutdown', 'Shutdown']);
    });
  });

  describe('Events', () => {
    it('should emit display, state and navigate events', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Foo'), { logger });
      manager.register(new PageMock('Bar'));
      const displayed = vi.fn();
      const states = vi.fn();
      const navigations = vi.fn();
      manager.on('display', displayed);
      manager.on('state', states);
      manager.on('navigate', navigations);

      manager.dispatch(PageNavigation.SystemStart);
      manager.dispatch(PageNavigation.Left);

      expect(displayed.mock.calls).toEqual([['Bar']]);
      expect(states.mock.calls).toEqual([['startup', 'operational']]);
      expect(navigations.mock.calls).toEqual([
        [PageNavigation.SystemStart, 'operational'],
        [PageNavigation.Left, 'operational'],
      ]);
    });
  });

  describe('dispose', () => {
    it('should release every node including stashed levels', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.register(new PageMock('level_1_second'));
      manager.registerSub(new PageMock('level_2_first'));
      manager.register(new PageMock('level_2_second'));
      manager.registerSub(new PageMock('level_3_first'));
      manager.register(new PageMock('level_3_second'));

      expect(manager.dispose()).toBe(5);
      for (const direction of DIRECTIONS) {
        expect(manager.chain(direction).next().done).toBe(true);
      }
      expect(manager.activePage.title?.()).toBe('level_3_second');
    });

    it('should tear down a very long row without recursion', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      for (let i = 0; i < 100_000; i++) {
        manager.register(new PageMock(`page ${i}`));
      }

      expect(manager.dispose()).toBe(100_000);
    });

    it('should remove event listeners', () => {
      const manager = new PageManager<TextDisplay>(display, new PageMock('Home'), { logger });
      manager.on('display', () => undefined);
      manager.dispose();

      expect(manager.listenerCount('display')).toBe(0);
    });
  });
});
