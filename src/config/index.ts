/**
 * Configuration loader: environment variables validated with Zod
 */

import { z } from 'zod';
import type { AppConfig, DiscordTransport } from '../types/index.js';
import { EnvSchema, type ParsedEnv } from './schema.js';

export type Environment = Record<string, string | undefined>;

/**
 * The liveness server always binds every interface
 */
const KEEPALIVE_HOST = '0.0.0.0';

/**
 * Map the validated environment onto the application config
 */
function toAppConfig(env: ParsedEnv): AppConfig {
  // superRefine has already rejected a bot mode without token or channel
  const transport: DiscordTransport =
    env.BOT_MODE && env.DISCORD_BOT_TOKEN && env.DISCORD_CHANNEL_ID
      ? { mode: 'bot', botToken: env.DISCORD_BOT_TOKEN, channelId: env.DISCORD_CHANNEL_ID }
      : { mode: 'webhook', webhookUrl: env.DISCORD_WEBHOOK_URL ?? '' };

  return Object.freeze({
    steam: Object.freeze({
      apiKey: env.STEAM_API_KEY,
      friendId64: env.STEAM_FRIEND_ID64,
    }),
    discord: Object.freeze({
      transport: Object.freeze(transport),
      mentionUserId: env.DISCORD_USER_ID,
    }),
    scheduler: Object.freeze({ pollSeconds: env.POLL_SECONDS }),
    keepalive: Object.freeze({
      enabled: env.KEEPALIVE,
      host: KEEPALIVE_HOST,
      port: env.PORT,
    }),
    filters: Object.freeze({
      onlyOnline: env.ONLY_ONLINE,
      onlyGames: env.ONLY_GAMES,
    }),
    logging: Object.freeze({ level: env.LOG_LEVEL, file: env.LOG_FILE }),
    statusFile: env.STATUS_FILE,
  });
}

/**
 * Load configuration from the process environment
 *
 * Throws a ZodError when a required variable is missing or malformed.
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  return toAppConfig(EnvSchema.parse(env));
}

/**
 * Load config with error handling for CLI use
 *
 * The error, if any, is a single line suitable for a fatal diagnostic.
 */
export function loadConfigSafe(env: Environment = process.env): {
  config: AppConfig | null;
  error: string | null;
} {
  try {
    return { config: loadConfig(env), error: null };
  } catch (err) {
    if (err instanceof z.ZodError) {
      const errors = err.errors.map((e) => `${e.path.join('.')} ${e.message}`).join('; ');
      return { config: null, error: `Configuration validation failed: ${errors}` };
    }
    if (err instanceof Error) {
      return { config: null, error: err.message };
    }
    return { config: null, error: 'Unknown error' };
  }
}
