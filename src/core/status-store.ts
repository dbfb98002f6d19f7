/**
 * Status store: JSON file holding the last snapshot that produced a notification
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { PlayerSnapshot } from '../types/index.js';
import { describeError, type LoggerLike } from '../utils/logger.js';

/**
 * On-disk record; keys match the status files earlier deployments wrote
 */
const StoredStatusSchema = z.object({
  name: z.string(),
  state: z.string(),
  personastate: z.number().int(),
  in_game: z.boolean(),
  game: z.string().nullish(),
  avatar: z.string().nullish(),
  profile_url: z.string().nullish(),
  timestamp: z.number(),
});

type StoredStatus = z.infer<typeof StoredStatusSchema>;

function toStored(snapshot: PlayerSnapshot): StoredStatus {
  return {
    name: snapshot.name,
    state: snapshot.stateLabel,
    personastate: snapshot.personaState,
    in_game: snapshot.inGame,
    game: snapshot.game ?? null,
    avatar: snapshot.avatarUrl ?? null,
    profile_url: snapshot.profileUrl ?? null,
    timestamp: snapshot.timestamp,
  };
}

function fromStored(data: StoredStatus): PlayerSnapshot {
  const game = data.game || undefined;
  return {
    name: data.name,
    stateLabel: data.state,
    personaState: data.personastate,
    inGame: data.in_game && game !== undefined,
    game,
    avatarUrl: data.avatar ?? undefined,
    profileUrl: data.profile_url ?? undefined,
    timestamp: data.timestamp,
  };
}

/**
 * Status store interface
 */
export interface StatusStore {
  load(): Promise<PlayerSnapshot | null>;
  save(snapshot: PlayerSnapshot): Promise<void>;
}

/**
 * JSON file implementation of StatusStore
 */
export class JsonStatusStore implements StatusStore {
  constructor(
    private path: string,
    private logger: LoggerLike
  ) {}

  /**
   * Read the last notified snapshot; missing or corrupt files yield null
   */
  async load(): Promise<PlayerSnapshot | null> {
    if (!existsSync(this.path)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      this.logger.warn(`Ignoring unreadable status file ${this.path}: ${describeError(error)}`);
      return null;
    }

    const parsed = StoredStatusSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed status file ${this.path}`);
      return null;
    }
    return fromStored(parsed.data);
  }

  /**
   * Write the snapshot through a temp file and rename; failures are logged only
   */
  async save(snapshot: PlayerSnapshot): Promise<void> {
    const tempPath = `${this.path}.tmp`;
    try {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(tempPath, JSON.stringify(toStored(snapshot), null, 2), 'utf-8');
      renameSync(tempPath, this.path);
    } catch (error) {
      this.logger.warn(`Failed to save status file ${this.path}: ${describeError(error)}`);
    }
  }
}

export function createStatusStore(path: string, logger: LoggerLike): StatusStore {
  return new JsonStatusStore(path, logger);
}
