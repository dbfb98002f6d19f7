/**
 * Error types raised by the upstream clients
 */

/**
 * Steam answered with a non-2xx status or a body that does not decode
 */
export class SteamApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'SteamApiError';
  }
}

/**
 * Steam answered, but with no player for the requested id
 */
export class NoPlayerDataError extends Error {
  constructor(steamId: string) {
    super(`No player data returned for ${steamId}; check STEAM_FRIEND_ID64 and STEAM_API_KEY`);
    this.name = 'NoPlayerDataError';
  }
}

/**
 * Discord rejected a message (status >= 300)
 */
export class NotificationError extends Error {
  constructor(
    public readonly transport: 'webhook' | 'bot',
    public readonly status: number,
    public readonly body: string
  ) {
    super(`${transport === 'webhook' ? 'Webhook' : 'Bot'} send failed: ${status} ${body}`);
    this.name = 'NotificationError';
  }
}
