/**
 * Transition detector
 * Decides whether the change between two snapshots is worth a message
 */

import type {
  PlayerSnapshot,
  TransitionDecision,
  TransitionFilters,
} from '../types/index.js';

const NO_NOTIFICATION: TransitionDecision = { notify: false, reason: '' };

/**
 * Compare the last notified snapshot with the current one
 *
 * A missing `prev` counts as offline and not playing. Rules are checked in
 * order and the first match wins, so one tick yields at most one message.
 */
export function decide(
  prev: PlayerSnapshot | null,
  curr: PlayerSnapshot,
  filters: TransitionFilters
): TransitionDecision {
  // Going offline is never a notification
  if (curr.personaState === 0) {
    return NO_NOTIFICATION;
  }

  const prevState = prev?.personaState ?? 0;
  const prevInGame = prev?.inGame ?? false;
  const hasGameFilter = filters.onlyGames.size > 0;

  // 1) Offline -> online
  if (prevState === 0 && curr.personaState > 0) {
    if (filters.onlyOnline && hasGameFilter) {
      return NO_NOTIFICATION;
    }
    return { notify: true, reason: 'came online' };
  }

  // 2) Started playing; switching games does not count
  if (!prevInGame && curr.inGame) {
    if (filters.onlyOnline) {
      return NO_NOTIFICATION;
    }
    if (hasGameFilter && !filters.onlyGames.has((curr.game ?? '').toLowerCase())) {
      return NO_NOTIFICATION;
    }
    return { notify: true, reason: 'started playing' };
  }

  return NO_NOTIFICATION;
}
