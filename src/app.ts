/**
 * Supervisor: wires the watcher, scheduler and keepalive server together
 */

import type { AppConfig } from './types/index.js';
import { createNotifier, type Notifier } from './core/notifier.js';
import { createScheduler, type Scheduler } from './core/scheduler.js';
import { createStatusStore, type StatusStore } from './core/status-store.js';
import { createSteamClient, type PlayerSource } from './core/steam-client.js';
import {
  PresenceWatcher,
  STARTUP_REASON,
  startupSnapshot,
  type TickOutcome,
} from './core/watcher.js';
import { createKeepaliveServer, type KeepaliveServer } from './infrastructure/keepalive/server.js';
import type { LoggerLike } from './utils/logger.js';

export type SupervisorPhase = 'INIT' | 'RUNNING' | 'DRAINING' | 'EXIT';

export interface SupervisorDeps {
  watcher: Pick<PresenceWatcher, 'announceStartup' | 'initialize' | 'tick'>;
  scheduler: Scheduler;
  logger: LoggerLike;
  keepalive?: Pick<KeepaliveServer, 'start' | 'close'>;
}

export class Supervisor {
  private state: SupervisorPhase = 'INIT';
  private draining: Promise<void> | null = null;
  private keepaliveListening = false;
  private failedTicks = 0;

  constructor(private deps: SupervisorDeps) {}

  get phase(): SupervisorPhase {
    return this.state;
  }

  /**
   * Keepalive, startup announcement, restore state, then start polling
   */
  async start(): Promise<void> {
    if (this.state !== 'INIT') {
      return;
    }
    const { watcher, scheduler, keepalive, logger } = this.deps;

    if (keepalive) {
      this.keepaliveListening = await keepalive.start();
      if (!this.keepaliveListening) {
        logger.warn('Continuing without the keepalive server');
      }
    }

    if (!(await watcher.announceStartup())) {
      logger.warn('Continuing without a startup notification');
    }
    await watcher.initialize();

    // Shutdown may have been requested while starting up
    if (this.state !== 'INIT') {
      await this.closeKeepalive();
      return;
    }
    scheduler.start(async () => {
      this.record(await watcher.tick());
    });
    this.state = 'RUNNING';
    logger.info('Polling started');
  }

  /**
   * Let the current tick finish and schedule no further ticks.
   * Every caller gets the same drain, so a repeated signal waits for it too.
   */
  shutdown(): Promise<void> {
    if (!this.draining) {
      this.draining = this.drain();
    }
    return this.draining;
  }

  private async drain(): Promise<void> {
    const { scheduler, logger } = this.deps;

    this.state = 'DRAINING';
    logger.info('Shutdown requested, finishing current poll...');
    await scheduler.stop();

    await this.closeKeepalive();
    this.state = 'EXIT';
  }

  private async closeKeepalive(): Promise<void> {
    const { keepalive } = this.deps;
    if (!keepalive || !this.keepaliveListening) {
      return;
    }
    this.keepaliveListening = false;
    await keepalive.close();
  }

  private record(outcome: TickOutcome): void {
    if (outcome.kind === 'failed') {
      this.failedTicks += 1;
      return;
    }
    if (this.failedTicks > 0) {
      this.deps.logger.info(`Polling recovered after ${this.failedTicks} failed attempt(s)`);
      this.failedTicks = 0;
    }
  }
}

/**
 * Collaborators that tests may replace
 */
export interface SupervisorOverrides {
  source?: PlayerSource;
  notifier?: Notifier;
  store?: StatusStore;
  scheduler?: Scheduler;
}

/**
 * Build a supervisor from config
 */
export function createSupervisor(
  config: AppConfig,
  logger: LoggerLike,
  overrides: SupervisorOverrides = {}
): Supervisor {
  const watcher = new PresenceWatcher({
    source: overrides.source ?? createSteamClient(config.steam),
    notifier: overrides.notifier ?? createNotifier(config.discord),
    store: overrides.store ?? createStatusStore(config.statusFile, logger),
    filters: config.filters,
    logger,
  });

  return new Supervisor({
    watcher,
    scheduler: overrides.scheduler ?? createScheduler(config.scheduler, logger),
    logger,
    keepalive: config.keepalive.enabled
      ? createKeepaliveServer(config.keepalive, logger)
      : undefined,
  });
}

/**
 * `--test`: send the startup message once and report the exit code
 */
export async function runTestMode(
  config: AppConfig,
  logger: LoggerLike,
  notifier: Notifier = createNotifier(config.discord)
): Promise<number> {
  logger.info(`Running in test mode (${config.discord.transport.mode})...`);
  try {
    await notifier.send(startupSnapshot(), STARTUP_REASON);
    logger.info('Test notification sent successfully!');
    return 0;
  } catch (error) {
    logger.error('Test notification failed', error);
    return 1;
  }
}
