import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CheckpointStore } from '../src/checkpointStore';
import { Diagnostics } from '../src/diagnostics';
import { StrategyCheckpoint } from '../src/strategy';
import { StrategyPhase } from '../src/strategyStates';
import { at, makeTick } from './helpers';
import { managerFixture } from './managerFixture';

const sampleCheckpoints = async (): Promise<StrategyCheckpoint[]> => {
  const { manager, clock } = managerFixture();
  await manager.create(
    { index: 'NIFTY', entryTime: '11:00', lookbackMinutes: 60, targetPremium: 50, stopLossPercent: 50, optionType: 'ANY' },
    { spotPrice: 26220 },
  );
  clock.set(at('10:00'));
  await manager.handleTick(makeTick(262001, 52.4, at('10:00')));
  return manager.toCheckpoint();
};

describe('CheckpointStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkpoint-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns nothing when no checkpoint exists', () => {
    const store = new CheckpointStore({ dir: path.join(dir, 'state'), diagnostics: new Diagnostics() });
    expect(store.load()).toEqual([]);
  });

  it('saves atomically and loads what it saved', async () => {
    const store = new CheckpointStore({ dir: path.join(dir, 'state'), diagnostics: new Diagnostics() });
    const checkpoints = await sampleCheckpoints();

    expect(await store.save(checkpoints, at('10:00'))).toBe(true);
    expect(store.degraded).toBe(false);
    expect(store.savedAt).toBe(new Date(at('10:00')).toISOString());
    expect(fs.readdirSync(path.join(dir, 'state'))).toEqual(['strategies.json']);

    const loaded = store.load();
    expect(loaded).toHaveLength(1);
    expect(loaded[0]).toMatchObject({ id: 's1', phase: StrategyPhase.LOOKBACK });
    expect(loaded[0].lookback).toEqual([
      { token: 262001, state: expect.objectContaining({ low: 52.4, sampleCount: 1 }) },
    ]);
  });

  it('retries, then reports degraded durability until a save succeeds', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const diagnostics = new Diagnostics();
    const changes: boolean[] = [];
    const broken = new CheckpointStore({
      dir: path.join(blocker, 'state'),
      diagnostics,
      baseDelayMs: 0,
      onDurabilityChange: (degraded) => changes.push(degraded),
    });

    expect(await broken.save([], at('10:00'))).toBe(false);
    expect(broken.degraded).toBe(true);
    expect(broken.savedAt).toBeNull();
    expect(diagnostics.get('checkpointFailures')).toBe(3);
    expect(changes).toEqual([true]);

    // Still failing: no repeat announcement.
    expect(await broken.save([], at('10:00', 5))).toBe(false);
    expect(changes).toEqual([true]);

    fs.rmSync(blocker);
    expect(await broken.save([], at('10:01'))).toBe(true);
    expect(broken.degraded).toBe(false);
    expect(changes).toEqual([true, false]);

    expect(await broken.save([], at('10:02'))).toBe(true);
    expect(changes).toEqual([true, false]);
  });

  it('starts empty from an unreadable file', () => {
    const store = new CheckpointStore({ dir, diagnostics: new Diagnostics() });
    fs.writeFileSync(store.filePath, '{"version":1,"savedAt":');
    expect(store.load()).toEqual([]);

    fs.writeFileSync(store.filePath, JSON.stringify({ version: 2, savedAt: 'x', strategies: [] }));
    expect(store.load()).toEqual([]);
  });
});
