/**
 * Steam Web API client
 * Reads one player record from ISteamUser/GetPlayerSummaries
 */

import { z } from 'zod';
import type { PlayerSnapshot, SteamConfig } from '../types/index.js';
import { NoPlayerDataError, SteamApiError } from '../utils/errors.js';

export const STEAM_SUMMARIES_URL =
  'https://api.steampowered.com/ISteamUser/GetPlayerSummaries/v2/';

const REQUEST_TIMEOUT_MS = 20_000;

/**
 * Persona state labels as published by Steam
 */
const PERSONA_LABELS: Record<number, string> = {
  0: 'offline',
  1: 'online',
  2: 'busy',
  3: 'away',
  4: 'snooze',
  5: 'looking to trade',
  6: 'looking to play',
};

export function personaLabel(personaState: number): string {
  return PERSONA_LABELS[personaState] ?? `unknown(${personaState})`;
}

/**
 * The subset of a player summary the notifier reads
 */
const PlayerSummarySchema = z.object({
  personaname: z.string().optional(),
  personastate: z.coerce.number().int().optional(),
  gameextrainfo: z.string().optional(),
  avatarfull: z.string().optional(),
  profileurl: z.string().optional(),
});

const SummariesResponseSchema = z.object({
  response: z
    .object({
      players: z.array(PlayerSummarySchema).default([]),
    })
    .default({ players: [] }),
});

export type PlayerSummary = z.infer<typeof PlayerSummarySchema>;

/**
 * Map a raw summary onto a snapshot
 */
export function toSnapshot(player: PlayerSummary, timestamp: number): PlayerSnapshot {
  const personaState = player.personastate ?? 0;
  // A blank title is treated as not playing
  const game = player.gameextrainfo || undefined;

  return {
    name: player.personaname ?? 'Friend',
    personaState,
    stateLabel: personaLabel(personaState),
    inGame: game !== undefined,
    game,
    avatarUrl: player.avatarfull,
    profileUrl: player.profileurl,
    timestamp,
  };
}

/**
 * Source of player snapshots
 */
export interface PlayerSource {
  fetch(): Promise<PlayerSnapshot>;
}

export class SteamClient implements PlayerSource {
  constructor(
    private config: SteamConfig,
    private timeoutMs: number = REQUEST_TIMEOUT_MS
  ) {}

  /**
   * Fetch the tracked player's current snapshot
   */
  async fetch(): Promise<PlayerSnapshot> {
    const url = new URL(STEAM_SUMMARIES_URL);
    url.searchParams.set('key', this.config.apiKey);
    url.searchParams.set('steamids', this.config.friendId64);

    const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new SteamApiError(
        `Steam request failed: ${response.status} ${response.statusText}${errorText ? ` - ${errorText}` : ''}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new SteamApiError('Steam response is not valid JSON', response.status);
    }

    const parsed = SummariesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SteamApiError(
        `Unexpected Steam response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        response.status
      );
    }

    const player = parsed.data.response.players[0];
    if (!player) {
      throw new NoPlayerDataError(this.config.friendId64);
    }

    return toSnapshot(player, Math.floor(Date.now() / 1000));
  }
}

export function createSteamClient(config: SteamConfig): SteamClient {
  return new SteamClient(config);
}
