/**
 * Run loop - drives a page manager from an input source at a fixed tick
 *
 * Starts the system, then per tick either dispatches the polled interaction
 * or repeats the navigation the previous tick returned. The loop ends when
 * the shutdown page reports that its time is over.
 */

import { setTimeout as delay } from 'node:timers/promises';

import { EventEmitter } from 'eventemitter3';
import {
  ErrorCodes,
  HmiError,
  PageNavigation,
  createLogger,
  describeNavigation,
  type Logger,
  type PageError,
  type PageManager,
  type Result,
} from 'multi-page-hmi';

import type { InteractionSource } from '../input/types.js';

// ============================================================================
// Types
// ============================================================================

export type StopReason = 'shutdown' | 'maxTicks' | 'error';

export interface RunSummary {
  ticks: number;
  reason: StopReason;
  /** The failing page update for `shutdown` and `error` endings */
  error?: PageError;
}

export interface RunLoopOptions {
  tickMs?: number;
  /** Stop after this many ticks regardless of state */
  maxTicks?: number;
  logger?: Logger;
  /** Waits between ticks */
  sleep?: (ms: number) => Promise<unknown>;
}

export interface RunLoopEvents {
  tick: (tick: number, navigation: PageNavigation) => void;
  stopped: (summary: RunSummary) => void;
}

// ============================================================================
// RunLoop Implementation
// ============================================================================

export class RunLoop<D> extends EventEmitter<RunLoopEvents> {
  private readonly manager: PageManager<D>;
  private readonly input: InteractionSource;
  private readonly tickMs: number;
  private readonly maxTicks?: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private stopRequested = false;
  private running = false;

  constructor(manager: PageManager<D>, input: InteractionSource, options: RunLoopOptions = {}) {
    super();
    this.manager = manager;
    this.input = input;
    this.tickMs = options.tickMs ?? 500;
    this.maxTicks = options.maxTicks;
    this.logger = (options.logger ?? createLogger({ name: 'hmi-simulator', level: 'warn' })).child({
      component: 'run-loop',
    });
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Switch to shutdown on the next tick */
  stop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<RunSummary> {
    if (this.running) {
      throw new HmiError('Run loop is already running', ErrorCodes.INVALID_STATE);
    }
    this.running = true;
    this.logger.info({ tickMs: this.tickMs, maxTicks: this.maxTicks }, 'Run loop started');

    try {
      return this.finish(await this.loop());
    } finally {
      this.running = false;
      this.input.close();
    }
  }

  private async loop(): Promise<RunSummary> {
    const started = this.manager.dispatch(PageNavigation.SystemStart);
    if (!started.ok) {
      return { ticks: 0, reason: 'error', error: started.error };
    }

    let navigation = started.value;
    let ticks = 0;

    for (;;) {
      if (this.maxTicks !== undefined && ticks >= this.maxTicks) {
        return { ticks, reason: 'maxTicks' };
      }

      const result = this.step(navigation);
      ticks++;

      if (!result.ok) {
        const reason = this.manager.state === 'shutdown' ? 'shutdown' : 'error';
        return { ticks, reason, error: result.error };
      }
      navigation = result.value;
      this.emit('tick', ticks, navigation);

      if (this.manager.state === 'shutdown' && !this.manager.hasShutdownPage()) {
        return { ticks, reason: 'shutdown' };
      }

      await this.sleep(this.tickMs);
    }
  }

  private step(navigation: PageNavigation): Result<PageNavigation, PageError> {
    if (this.stopRequested) {
      this.stopRequested = false;
      return this.manager.dispatch(PageNavigation.SystemStop);
    }

    const event = this.input.poll();
    if (event?.kind === 'stop') {
      return this.manager.dispatch(PageNavigation.SystemStop);
    }
    if (event) {
      return this.manager.dispatchInteraction(event.interaction);
    }

    this.logger.trace({ navigation: describeNavigation(navigation) }, 'Idle tick');
    return this.manager.dispatch(navigation);
  }

  private finish(summary: RunSummary): RunSummary {
    if (summary.reason === 'error') {
      this.logger.error({ ticks: summary.ticks, err: summary.error }, 'Run loop aborted by page error');
    } else {
      this.logger.info({ ticks: summary.ticks, reason: summary.reason }, 'Run loop stopped');
    }
    this.emit('stopped', summary);
    return summary;
  }
}
