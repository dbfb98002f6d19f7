/**
 * Environment schema validation using Zod
 */

import { z } from 'zod';

/**
 * Hard floor for the poll interval, to be kind to upstream APIs
 */
export const POLL_FLOOR_SECONDS = 15;

const TRUTHY_VALUES = new Set(['1', 'true', 'yes']);

/**
 * Boolean flag: `1|true|yes` (case-insensitive) is true, anything else set is false
 */
function booleanFlag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) =>
      value === undefined ? defaultValue : TRUTHY_VALUES.has(value.trim().toLowerCase())
    );
}

/**
 * Trimmed string; empty or unset becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

function requiredString() {
  return z.string({ required_error: 'must be set' }).trim().min(1, 'must be set');
}

function integerWithDefault(defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : String(defaultValue);
    })
    .pipe(
      z.coerce
        .number({ invalid_type_error: 'must be an integer' })
        .int('must be an integer')
    );
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * Comma-separated game titles, lowercased and trimmed, empty entries dropped
 */
const gameList = z
  .string()
  .optional()
  .transform(
    (value) =>
      new Set(
        (value ?? '')
          .split(',')
          .map((game) => game.trim().toLowerCase())
          .filter((game) => game.length > 0)
      )
  );

/**
 * Process environment schema
 */
export const EnvSchema = z
  .object({
    STEAM_API_KEY: requiredString(),
    STEAM_FRIEND_ID64: requiredString(),

    BOT_MODE: booleanFlag(false),
    DISCORD_BOT_TOKEN: optionalString,
    DISCORD_CHANNEL_ID: optionalString,
    DISCORD_WEBHOOK_URL: optionalString,
    DISCORD_USER_ID: optionalString,

    POLL_SECONDS: integerWithDefault(60).transform((seconds) =>
      Math.max(POLL_FLOOR_SECONDS, seconds)
    ),

    KEEPALIVE: booleanFlag(true),
    PORT: integerWithDefault(3000).pipe(
      z.number().min(0, 'must be a port number').max(65535, 'must be a port number')
    ),

    ONLY_ONLINE: booleanFlag(false),
    ONLY_GAMES: gameList,

    STATUS_FILE: optionalString.transform((value) => value ?? '.status.json'),
    LOG_LEVEL: optionalString.pipe(
      z
        .string()
        .toUpperCase()
        .pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']))
        .default('INFO')
    ),
    LOG_FILE: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.BOT_MODE) {
      if (!env.DISCORD_BOT_TOKEN) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['DISCORD_BOT_TOKEN'],
          message: 'must be set when BOT_MODE is enabled',
        });
      }
      if (!env.DISCORD_CHANNEL_ID) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['DISCORD_CHANNEL_ID'],
          message: 'must be set when BOT_MODE is enabled',
        });
      }
      return;
    }

    // The webhook is only read outside bot mode
    if (!env.DISCORD_WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DISCORD_WEBHOOK_URL'],
        message: 'must be set unless BOT_MODE is enabled',
      });
    } else if (!isHttpUrl(env.DISCORD_WEBHOOK_URL)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DISCORD_WEBHOOK_URL'],
        message: 'must be a valid http(s) URL',
      });
    }
  });

export type ParsedEnv = z.infer<typeof EnvSchema>;
