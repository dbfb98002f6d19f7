/**
 * Core type definitions for the Steam → Discord notifier
 */

/**
 * Normalized observation of the tracked user at one point in time
 */
export interface PlayerSnapshot {
  name: string;
  personaState: number; // 0 = offline
  stateLabel: string;
  inGame: boolean;
  game?: string; // present iff inGame
  avatarUrl?: string;
  profileUrl?: string;
  timestamp: number; // unix seconds
}

/**
 * Reasons the detector can report
 */
export type TransitionReason = 'came online' | 'started playing';

/**
 * Outcome of comparing two snapshots
 */
export type TransitionDecision =
  | { notify: true; reason: TransitionReason }
  | { notify: false; reason: '' };

/**
 * Filter flags applied by the detector
 */
export interface TransitionFilters {
  readonly onlyOnline: boolean;
  readonly onlyGames: ReadonlySet<string>; // lowercased titles
}

/**
 * Steam configuration
 */
export interface SteamConfig {
  readonly apiKey: string;
  readonly friendId64: string;
}

/**
 * Discord delivery: webhook or bot token
 */
export type DiscordTransport =
  | { readonly mode: 'webhook'; readonly webhookUrl: string }
  | { readonly mode: 'bot'; readonly botToken: string; readonly channelId: string };

/**
 * Discord configuration
 */
export interface DiscordConfig {
  readonly transport: DiscordTransport;
  readonly mentionUserId?: string;
}

/**
 * Scheduler configuration
 */
export interface SchedulerConfig {
  readonly pollSeconds: number;
}

/**
 * Liveness server configuration
 */
export interface KeepaliveConfig {
  readonly enabled: boolean;
  readonly host: string;
  readonly port: number;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Logging configuration
 */
export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  readonly steam: SteamConfig;
  readonly discord: DiscordConfig;
  readonly scheduler: SchedulerConfig;
  readonly keepalive: KeepaliveConfig;
  readonly filters: TransitionFilters;
  readonly logging: LoggingConfig;
  readonly statusFile: string;
}
