/**
 * Presence watcher: one tick is fetch -> decide -> (send -> persist)
 */

import type { PlayerSnapshot, TransitionFilters } from '../types/index.js';
import type { LoggerLike } from '../utils/logger.js';
import { decide } from './detector.js';
import type { Notifier } from './notifier.js';
import type { StatusStore } from './status-store.js';
import type { PlayerSource } from './steam-client.js';

export const STARTUP_REASON = 'is now online ✅';

/**
 * Snapshot used to announce that the notifier itself is up
 */
export function startupSnapshot(now: number = Date.now()): PlayerSnapshot {
  return {
    name: 'Bot',
    personaState: 1,
    stateLabel: 'startup',
    inGame: false,
    avatarUrl: '',
    profileUrl: '',
    timestamp: Math.floor(now / 1000),
  };
}

export type TickOutcome =
  | { kind: 'notified'; reason: string; snapshot: PlayerSnapshot }
  | { kind: 'unchanged'; snapshot: PlayerSnapshot }
  | { kind: 'failed'; error: unknown };

export interface WatcherDeps {
  source: PlayerSource;
  notifier: Notifier;
  store: StatusStore;
  filters: TransitionFilters;
  logger: LoggerLike;
}

export class PresenceWatcher {
  // Last snapshot that produced a delivered notification
  private previous: PlayerSnapshot | null = null;

  constructor(private deps: WatcherDeps) {}

  get lastNotified(): PlayerSnapshot | null {
    return this.previous;
  }

  /**
   * Restore the last notified snapshot from disk
   */
  async initialize(): Promise<void> {
    this.previous = await this.deps.store.load();
    if (this.previous) {
      this.deps.logger.info(
        `Restored last status: ${this.previous.name} (${this.previous.stateLabel})`
      );
    }
  }

  /**
   * Send the unfiltered startup message; failures are logged and not rethrown
   */
  async announceStartup(): Promise<boolean> {
    try {
      await this.deps.notifier.send(startupSnapshot(), STARTUP_REASON);
      this.deps.logger.info(`Startup notification sent via ${this.deps.notifier.transport}`);
      return true;
    } catch (error) {
      this.deps.logger.error('Startup notification failed', error);
      return false;
    }
  }

  /**
   * Run one poll cycle
   *
   * `previous` only advances once a message was delivered, so suppressed or
   * failed transitions are evaluated again on the next tick.
   */
  async tick(): Promise<TickOutcome> {
    const { source, notifier, store, filters, logger } = this.deps;

    try {
      const current = await source.fetch();
      const decision = decide(this.previous, current, filters);

      logger.debug(
        `Polled ${current.name}: ${current.stateLabel}${current.inGame ? ` playing ${current.game}` : ''}`
      );

      if (!decision.notify) {
        return { kind: 'unchanged', snapshot: current };
      }

      await notifier.send(current, decision.reason);
      logger.info(`Notified: ${current.name} ${decision.reason}`);

      this.previous = current;
      await store.save(current);

      return { kind: 'notified', reason: decision.reason, snapshot: current };
    } catch (error) {
      logger.error('Poll failed', error);
      return { kind: 'failed', error };
    }
  }
}
