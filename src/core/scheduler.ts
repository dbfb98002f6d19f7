/**
 * Fixed-interval scheduler with drain-on-stop
 */

import type { SchedulerConfig } from '../types/index.js';
import type { LoggerLike } from '../utils/logger.js';

/**
 * Scheduler interface
 */
export interface Scheduler {
  readonly running: boolean;
  start(callback: () => Promise<void>): void;
  /** Resolves once the in-flight callback, if any, has finished */
  stop(): Promise<void>;
}

/**
 * Runs the callback immediately, then `pollSeconds` after each run completes
 */
export class IntervalScheduler implements Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private isRunning: boolean = false;
  private inFlight: Promise<void> | null = null;

  constructor(
    private config: SchedulerConfig,
    private logger: LoggerLike
  ) {}

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Start the scheduler with a callback
   */
  start(callback: () => Promise<void>): void {
    if (this.isRunning) {
      return;
    }
    this.isRunning = true;
    this.scheduleNext(callback, 0);
  }

  /**
   * Stop the scheduler; the current run completes but no further run starts
   */
  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private scheduleNext(callback: () => Promise<void>, delayMs: number): void {
    if (!this.isRunning) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.run(callback);
    }, delayMs);
  }

  private async run(callback: () => Promise<void>): Promise<void> {
    try {
      await callback();
    } catch (error) {
      this.logger.error('Scheduled run failed', error);
    } finally {
      this.inFlight = null;
    }

    this.scheduleNext(callback, this.config.pollSeconds * 1000);
  }
}

/**
 * Create a new scheduler
 */
export function createScheduler(config: SchedulerConfig, logger: LoggerLike): Scheduler {
  return new IntervalScheduler(config, logger);
}
