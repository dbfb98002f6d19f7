/**
 * Status store tests
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JsonStatusStore } from '../status-store.js';
import type { PlayerSnapshot } from '../../types/index.js';

const mockLogger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const playing: PlayerSnapshot = {
  name: 'A',
  personaState: 1,
  stateLabel: 'online',
  inGame: true,
  game: 'Dota 2',
  avatarUrl: 'https://avatars.example/a.jpg',
  profileUrl: 'https://steamcommunity.example/id/a/',
  timestamp: 1_700_000_000,
};

describe('JsonStatusStore', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'status-store-'));
    path = join(dir, '.status.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null when no file exists', async () => {
    expect(await new JsonStatusStore(path, mockLogger).load()).toBeNull();
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it('round-trips a snapshot', async () => {
    const store = new JsonStatusStore(path, mockLogger);
    await store.save(playing);

    expect(await new JsonStatusStore(path, mockLogger).load()).toEqual(playing);
  });

  it('round-trips a snapshot without optional fields', async () => {
    const online: PlayerSnapshot = {
      name: 'B',
      personaState: 3,
      stateLabel: 'away',
      inGame: false,
      timestamp: 1_700_000_100,
    };
    const store = new JsonStatusStore(path, mockLogger);
    await store.save(online);

    const loaded = await store.load();
    expect(loaded).toEqual(online);
    expect(loaded?.game).toBeUndefined();
  });

  it('writes the record with the status file keys and leaves no temp file', async () => {
    await new JsonStatusStore(path, mockLogger).save(playing);

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
      name: 'A',
      state: 'online',
      personastate: 1,
      in_game: true,
      game: 'Dota 2',
      avatar: 'https://avatars.example/a.jpg',
      profile_url: 'https://steamcommunity.example/id/a/',
      timestamp: 1_700_000_000,
    });
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it('treats a corrupt file as no prior state', async () => {
    writeFileSync(path, '{not json', 'utf-8');

    expect(await new JsonStatusStore(path, mockLogger).load()).toBeNull();
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('treats a file with the wrong shape as no prior state', async () => {
    writeFileSync(path, JSON.stringify({ name: 'A', personastate: 'one' }), 'utf-8');

    expect(await new JsonStatusStore(path, mockLogger).load()).toBeNull();
    expect(mockLogger.warn).toHaveBeenCalledWith(`Ignoring malformed status file ${path}`);
  });

  it('creates missing parent directories', async () => {
    const nested = join(dir, 'data', 'status.json');
    await new JsonStatusStore(nested, mockLogger).save(playing);

    expect(existsSync(nested)).toBe(true);
  });

  it('swallows write failures', async () => {
    // A directory where the temp file should go makes the write fail
    mkdirSync(`${path}.tmp`);

    await expect(new JsonStatusStore(path, mockLogger).save(playing)).resolves.toBeUndefined();
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
    expect(existsSync(path)).toBe(false);
  });
});
