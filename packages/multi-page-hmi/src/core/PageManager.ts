/**
 * PageManager - switches among pages, dispatches interactions and keeps the
 * active page up to date. Pages do not know about each other.
 *
 * Only a home page is mandatory. Startup and shutdown pages are optional
 * information pages, shown only for the system start and stop directives.
 *
 * Exactly one page is active at a time. Every other page sits in one of four
 * singly linked chains, seen from the active page:
 *
 * ```text
 *   a-------------------b-----------c
 *   |                   |
 *   d-----e-----f       o-p
 *   |     |     |
 *   g-h-i j-k-l m-n
 * ```
 *
 * With `e` active, `d` is on the right chain, `f` on the left chain, `a` on the
 * up chain and `j` heads the down chain. Moving along one axis stashes the
 * chains of the other axis inside the node of the page that loses focus, and
 * restores the stash of the page that gains it. The root level is where the
 * up and right chains are both empty.
 */

import { EventEmitter } from 'eventemitter3';

import type { PageError } from './errors.js';
import { describeNavigation } from './navigation.js';
import { dispatchPage, pageTitle, updatePage, type Page, type PageTitles } from './page.js';
import {
  PageNavigation,
  ok,
  type Interaction,
  type Result,
  type RunState,
} from './types.js';
import { createLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type Direction = 'left' | 'right' | 'up' | 'down';

export const DIRECTIONS: readonly Direction[] = ['left', 'right', 'up', 'down'];

interface PageNode<D> {
  page: Page<D>;
  left?: PageNode<D>;
  right?: PageNode<D>;
  up?: PageNode<D>;
  down?: PageNode<D>;
}

type Link<D> = PageNode<D> | undefined;

type MovementNavigation = Extract<PageNavigation, { type: 'left' | 'right' | 'up' | 'home' | 'nthSubpage' }>;

const OPPOSITE: Record<Direction, Direction> = {
  left: 'right',
  right: 'left',
  up: 'down',
  down: 'up',
};

/** Chains a node stashes while it waits on a chain of the given direction */
const CROSS_AXIS: Record<Direction, readonly [Direction, Direction]> = {
  left: ['up', 'down'],
  right: ['up', 'down'],
  up: ['left', 'right'],
  down: ['left', 'right'],
};

export interface PageManagerEvents {
  navigate: (navigation: PageNavigation, state: RunState) => void;
  state: (from: RunState, to: RunState) => void;
  /** Title of the page that was just rendered */
  display: (title: string) => void;
}

export interface PageManagerOptions {
  logger?: Logger;
}

// ============================================================================
// PageManager Implementation
// ============================================================================

export class PageManager<D> extends EventEmitter<PageManagerEvents> {
  private readonly output: D;
  private page: Page<D>;
  private readonly links: Record<Direction, Link<D>> = {
    left: undefined,
    right: undefined,
    up: undefined,
    down: undefined,
  };
  private startup?: Page<D>;
  private shutdown?: Page<D>;
  private runState: RunState = 'startup';
  private readonly logger: Logger;

  /**
   * @param output - where every page renders to; never inspected by the manager
   * @param home - the mandatory home page; further pages come through `register*`
   */
  constructor(output: D, home: Page<D>, options: PageManagerOptions = {}) {
    super();
    this.output = output;
    this.page = home;
    this.logger = (options.logger ?? createLogger({ name: 'multi-page-hmi', level: 'warn' })).child({
      component: 'page-manager',
    });
  }

  get state(): RunState {
    return this.runState;
  }

  get activePage(): Page<D> {
    return this.page;
  }

  hasStartupPage(): boolean {
    return this.startup !== undefined;
  }

  hasShutdownPage(): boolean {
    return this.shutdown !== undefined;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a page next to the active page (in left direction).
   * The registered page becomes the active page.
   */
  register(page: Page<D>): void {
    this.push('left', page);
    this.activateLeft();
  }

  /**
   * Register a page below the active page.
   * The registered page becomes the active page.
   */
  registerSub(page: Page<D>): void {
    this.push('down', page);
    this.activateDown();
  }

  /** Replaces a previously registered startup page */
  registerStartup(page: Page<D>): void {
    this.startup = page;
  }

  /** Replaces a previously registered shutdown page */
  registerShutdown(page: Page<D>): void {
    this.shutdown = page;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Update the active page and display it.
   *
   * The active page receives the titles of its sub pages. If it asks for
   * another navigation (e.g. its lifetime is over), that navigation is
   * executed before displaying. A navigation that leads straight back into
   * another expiring page is not detected.
   */
  update(): Result<void, PageError> {
    const result = updatePage(this.page, this.subpageTitles());
    if (!result.ok) {
      this.logger.warn(
        { page: pageTitle(this.page), code: result.error.code, err: result.error },
        'Page update failed'
      );
      return result;
    }

    if (result.value.type !== 'update') {
      const dispatched = this.dispatch(result.value);
      if (!dispatched.ok) {
        return dispatched;
      }
    }

    this.show(this.page);
    return ok(undefined);
  }

  /**
   * Let the page in charge turn an interaction into a navigation and
   * execute it.
   *
   * The startup page is in charge while starting, the shutdown page while
   * stopping and the active page otherwise. A missing startup or shutdown
   * page falls back to the active page.
   */
  dispatchInteraction(interaction: Interaction): Result<PageNavigation, PageError> {
    const navigation = dispatchPage(this.interactionTarget(), interaction);
    this.logger.debug(
      { interaction, navigation: describeNavigation(navigation), state: this.runState },
      'Interaction dispatched'
    );
    return this.dispatch(navigation);
  }

  /**
   * Execute a navigation.
   *
   * Cursor movements are applied, the new active page is updated and
   * `Update` is returned. System start/stop return what the startup or
   * shutdown page asks for next. A failing page update is returned as is.
   */
  dispatch(navigation: PageNavigation): Result<PageNavigation, PageError> {
    let result: Result<PageNavigation, PageError>;

    switch (navigation.type) {
      case 'systemStart':
        result = this.start();
        break;
      case 'systemStop':
        result = this.stop();
        break;
      case 'update': {
        const updated = this.update();
        result = updated.ok ? ok(PageNavigation.Update) : updated;
        break;
      }
      default:
        result = this.move(navigation);
    }

    if (result.ok) {
      this.emit('navigate', navigation, this.runState);
    }
    return result;
  }

  private start(): Result<PageNavigation, PageError> {
    this.activateHome();

    if (!this.startup) {
      this.setState('operational');
      return ok(PageNavigation.Update);
    }

    const result = updatePage(this.startup);
    if (!result.ok) {
      return result;
    }
    this.show(this.startup);

    switch (result.value.type) {
      case 'systemStart':
        this.setState('startup');
        break;
      case 'systemStop':
        this.setState('shutdown');
        break;
      default:
        this.setState('operational');
    }
    return result;
  }

  private stop(): Result<PageNavigation, PageError> {
    this.setState('shutdown');

    if (!this.shutdown) {
      return ok(PageNavigation.SystemStop);
    }

    const result = updatePage(this.shutdown);
    if (!result.ok) {
      this.logger.debug({ code: result.error.code }, 'Shutdown page expired');
      return result;
    }
    this.show(this.shutdown);
    return result;
  }

  private move(navigation: MovementNavigation): Result<PageNavigation, PageError> {
    const before = this.page;

    switch (navigation.type) {
      case 'left':
        this.activateLeft();
        break;
      case 'right':
        this.activateRight();
        break;
      case 'up':
        this.activateUp();
        break;
      case 'home':
        this.activateHome();
        break;
      case 'nthSubpage':
        this.activateNthSubpage(navigation.index);
        break;
    }

    this.logger.debug(
      {
        navigation: describeNavigation(navigation),
        moved: before !== this.page,
        page: pageTitle(this.page),
      },
      'Cursor navigation'
    );

    this.setState('operational');
    const updated = this.update();
    return updated.ok ? ok(PageNavigation.Update) : updated;
  }

  private interactionTarget(): Page<D> {
    switch (this.runState) {
      case 'startup':
        return this.startup ?? this.page;
      case 'shutdown':
        return this.shutdown ?? this.page;
      default:
        return this.page;
    }
  }

  private setState(state: RunState): void {
    if (state === this.runState) {
      return;
    }
    const from = this.runState;
    this.runState = state;
    this.logger.info({ from, to: state }, 'Run state changed');
    this.emit('state', from, state);
  }

  private show(page: Page<D>): void {
    page.display(this.output);
    this.emit('display', pageTitle(page));
  }

  // ==========================================================================
  // Cursor
  // ==========================================================================

  /**
   * Navigate to the left page.
   * Returns false and keeps the active page when there is none.
   */
  activateLeft(): boolean {
    return this.activate('left');
  }

  /**
   * Navigate to the right page.
   * Returns false and keeps the active page when there is none.
   */
  activateRight(): boolean {
    return this.activate('right');
  }

  /**
   * Navigate to the first sub page.
   * Returns false and keeps the active page when there is none.
   */
  activateDown(): boolean {
    return this.activate('down');
  }

  /**
   * Navigate to the parent page.
   *
   * The current level is first moved to its rightmost page, the only one
   * holding the link to the parent. Returns false at the root level.
   */
  activateUp(): boolean {
    this.activateMostRight();
    return this.activate('up');
  }

  /** Ascend to the root level and activate its rightmost page */
  activateHome(): void {
    while (this.activateUp()) {
      // ascend level by level
    }
    this.activateMostRight();
  }

  private activateMostRight(): void {
    while (this.activateRight()) {
      // walk to the end of the row
    }
  }

  /** Descend, then step left as long as there are siblings (1-based index) */
  private activateNthSubpage(index: number): void {
    if (!this.activateDown()) {
      return;
    }
    let remaining = Math.max(Math.trunc(index), 1) - 1;
    while (remaining > 0 && this.activateLeft()) {
      remaining--;
    }
  }

  private activate(direction: Direction): boolean {
    const node = this.pop(direction);
    if (!node) {
      return false;
    }

    const [first, second] = CROSS_AXIS[direction];
    const displaced = this.page;
    this.page = node.page;
    this.push(OPPOSITE[direction], displaced, [this.links[first], this.links[second]]);
    this.links[first] = node[first];
    this.links[second] = node[second];
    return true;
  }

  private push(direction: Direction, page: Page<D>, stash: [Link<D>, Link<D>] = [undefined, undefined]): void {
    const [first, second] = CROSS_AXIS[direction];
    const node: PageNode<D> = { page };
    node[direction] = this.links[direction];
    node[first] = stash[0];
    node[second] = stash[1];
    this.links[direction] = node;
  }

  private pop(direction: Direction): Link<D> {
    const node = this.links[direction];
    if (!node) {
      return undefined;
    }
    this.links[direction] = node[direction];
    node[direction] = undefined;
    return node;
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  /** Sub pages of the active page, first registered first */
  *subpages(): IterableIterator<Page<D>> {
    for (let node = this.links.down; node; node = node.left) {
      yield node.page;
    }
  }

  /** Pages of one chain, nearest to the active page first */
  *chain(direction: Direction): IterableIterator<Page<D>> {
    for (let node = this.links[direction]; node; node = node[direction]) {
      yield node.page;
    }
  }

  private subpageTitles(): PageTitles {
    const head = this.links.down;
    return {
      *[Symbol.iterator]() {
        for (let node = head; node; node = node.left) {
          yield pageTitle(node.page);
        }
      },
    };
  }

  // ==========================================================================
  // Cleanup
  // ==========================================================================

  /**
   * Unlink every node of every chain, including stashed context.
   *
   * Works from an explicit worklist, so arbitrarily long chains never grow
   * the call stack. Returns the number of released nodes. The active,
   * startup and shutdown pages stay in place.
   */
  dispose(): number {
    const pending: PageNode<D>[] = [];
    for (const direction of DIRECTIONS) {
      const head = this.links[direction];
      if (head) {
        pending.push(head);
      }
      this.links[direction] = undefined;
    }

    let released = 0;
    for (let node = pending.pop(); node; node = pending.pop()) {
      for (const direction of DIRECTIONS) {
        const next = node[direction];
        if (next) {
          pending.push(next);
        }
        node[direction] = undefined;
      }
      released++;
    }

    this.removeAllListeners();
    this.logger.debug({ released }, 'Page manager disposed');
    return released;
  }
}

/**
 * Create a page manager
 */
export function createPageManager<D>(
  output: D,
  home: Page<D>,
  options?: PageManagerOptions
): PageManager<D> {
  return new PageManager(output, home, options);
}
