/**
 * Discord notification module
 * Delivers the same message payload through a webhook or a bot token
 */

import type { DiscordConfig, PlayerSnapshot } from '../types/index.js';
import { NotificationError } from '../utils/errors.js';

export const DISCORD_API_BASE = 'https://discord.com/api/v10';

const REQUEST_TIMEOUT_MS = 20_000;

/**
 * Embed shape accepted by Discord (the subset we author)
 */
export interface DiscordEmbed {
  title: string;
  description: string;
  thumbnail: { url: string };
}

/**
 * Message body posted to Discord
 */
export interface DiscordMessagePayload {
  content: string;
  embeds: [DiscordEmbed];
  allowed_mentions: { parse: ['users'] };
}

/**
 * Build the message body for a snapshot and reason
 */
export function buildMessagePayload(
  snapshot: PlayerSnapshot,
  reason: string,
  mentionUserId?: string
): DiscordMessagePayload {
  const lines = [
    `Status: **${snapshot.stateLabel}**`,
    snapshot.inGame && snapshot.game ? `Game: **${snapshot.game}**` : '',
    snapshot.profileUrl ? `Profile: ${snapshot.profileUrl}` : '',
  ];

  return {
    content: mentionUserId ? `<@${mentionUserId}> Steam update:` : 'Steam update:',
    embeds: [
      {
        title: `${snapshot.name} ${reason}!`,
        description: lines.filter((line) => line.length > 0).join('\n'),
        thumbnail: { url: snapshot.avatarUrl ?? '' },
      },
    ],
    allowed_mentions: { parse: ['users'] },
  };
}

/**
 * Notifier interface
 */
export interface Notifier {
  readonly transport: 'webhook' | 'bot';
  send(snapshot: PlayerSnapshot, reason: string): Promise<void>;
}

/**
 * POST a payload as JSON; rejects with NotificationError on status >= 300
 */
async function postMessage(
  transport: Notifier['transport'],
  url: string,
  payload: DiscordMessagePayload,
  headers: Record<string, string> = {}
): Promise<void> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });

  if (response.status >= 300) {
    const errorText = await response.text().catch(() => '');
    throw new NotificationError(transport, response.status, errorText);
  }
}

/**
 * Incoming webhook implementation
 */
export class WebhookNotifier implements Notifier {
  readonly transport = 'webhook';

  constructor(
    private webhookUrl: string,
    private mentionUserId?: string
  ) {}

  async send(snapshot: PlayerSnapshot, reason: string): Promise<void> {
    await postMessage(
      this.transport,
      this.webhookUrl,
      buildMessagePayload(snapshot, reason, this.mentionUserId)
    );
  }
}

/**
 * Bot token implementation (channel messages endpoint)
 */
export class BotNotifier implements Notifier {
  readonly transport = 'bot';

  constructor(
    private botToken: string,
    private channelId: string,
    private mentionUserId?: string
  ) {}

  async send(snapshot: PlayerSnapshot, reason: string): Promise<void> {
    await postMessage(
      this.transport,
      `${DISCORD_API_BASE}/channels/${this.channelId}/messages`,
      buildMessagePayload(snapshot, reason, this.mentionUserId),
      { Authorization: `Bot ${this.botToken}` }
    );
  }
}

/**
 * Create the notifier selected by the Discord config
 */
export function createNotifier(config: DiscordConfig): Notifier {
  const { transport, mentionUserId } = config;
  if (transport.mode === 'bot') {
    return new BotNotifier(transport.botToken, transport.channelId, mentionUserId);
  }
  return new WebhookNotifier(transport.webhookUrl, mentionUserId);
}
