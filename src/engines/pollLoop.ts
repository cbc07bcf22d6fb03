/**
 * Poll Loop
 *
 * Runs a tick immediately, then once per interval. The next timer is armed
 * only after the previous tick finished, so ticks never overlap.
 */

import { getLogger } from '../utils/logger.js';
import { errorMessage } from '../errors/index.js';

export type TickFunction = (signal: AbortSignal) => Promise<void>;

/** Longest delay `setTimeout` honours; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class PollLoop {
  private readonly runTick: TickFunction;
  private readonly intervalMs: number;

  private controller: AbortController | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private followUpRequested = false;
  private ticks = 0;

  /**
   * @param runTick - One snapshot/diff/sync pass; receives the shutdown signal
   * @param intervalMs - Delay between the end of one tick and the next,
   * capped at {@link MAX_TIMER_DELAY_MS}
   */
  constructor(runTick: TickFunction, intervalMs: number) {
    this.runTick = runTick;
    this.intervalMs = Math.min(intervalMs, MAX_TIMER_DELAY_MS);
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  get isTicking(): boolean {
    return this.inFlight !== null;
  }

  /** Completed ticks, including failed ones */
  get tickCount(): number {
    return this.ticks;
  }

  /**
   * Start the loop with an immediate tick
   */
  start(): void {
    if (this.controller) {
      getLogger().warn('PollLoop', 'Poll loop already running, ignoring start request');
      return;
    }

    this.controller = new AbortController();
    getLogger().info('PollLoop', 'Poll loop started', { intervalMs: this.intervalMs });
    this.launch();
  }

  /**
   * Run a tick as soon as possible. While a tick is running, one follow-up
   * tick is queued; further requests fold into it.
   */
  requestTick(): void {
    if (!this.controller || this.controller.signal.aborted) {
      return;
    }

    if (this.inFlight) {
      this.followUpRequested = true;
      return;
    }

    this.clearTimer();
    this.launch();
  }

  /**
   * Stop scheduling, signal the running tick, and wait for it to finish
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }

    getLogger().info('PollLoop', 'Stopping poll loop');
    controller.abort();
    this.clearTimer();
    this.followUpRequested = false;

    if (this.inFlight) {
      await this.inFlight;
    }

    this.controller = null;
    getLogger().info('PollLoop', 'Poll loop stopped', { ticks: this.ticks });
  }

  private launch(): void {
    const controller = this.controller;
    if (!controller || controller.signal.aborted) {
      return;
    }

    this.inFlight = this.execute(controller.signal).finally(() => {
      this.inFlight = null;
      this.scheduleNext();
    });
  }

  private async execute(signal: AbortSignal): Promise<void> {
    const logger = getLogger();
    try {
      await this.runTick(signal);
    } catch (error) {
      logger.error('PollLoop', 'Tick failed, continuing with next interval', {
        error: errorMessage(error),
      });
    } finally {
      this.ticks++;
    }
  }

  private scheduleNext(): void {
    const controller = this.controller;
    if (!controller || controller.signal.aborted) {
      return;
    }

    if (this.followUpRequested) {
      this.followUpRequested = false;
      this.launch();
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.launch();
    }, this.intervalMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
