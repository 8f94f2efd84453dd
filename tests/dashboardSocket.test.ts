import http from 'http';
import WebSocket from 'ws';
import { afterEach, describe, expect, it } from 'vitest';
import { DashboardSocket, handleDashboardAction } from '../src/dashboardSocket';
import { SnapshotFeed } from '../src/snapshotFeed';
import { StateSnapshot, buildStateSnapshot } from '../src/stateSnapshot';
import { managerFixture } from './managerFixture';

const strategy = {
  index: 'NIFTY',
  entryTime: '11:00',
  lookbackMinutes: 60,
  targetPremium: 50,
  stopLossPercent: 50,
  spotPrice: 26220,
};

describe('handleDashboardAction', () => {
  it('creates, updates and removes strategies', async () => {
    const { manager } = managerFixture();

    const created = await handleDashboardAction(manager, { action: 'create_strategy', strategy });
    expect(created).toMatchObject({ type: 'reply', status: 'ok', action: 'create_strategy', data: { id: 's1' } });

    const updated = await handleDashboardAction(manager, {
      action: 'update_strategy',
      strategyId: 's1',
      patch: { targetPremium: 65 },
    });
    expect(updated).toMatchObject({ status: 'ok', data: { config: { targetPremium: 65 } } });

    const removed = await handleDashboardAction(manager, { action: 'remove_strategy', strategyId: 's1' });
    expect(removed).toMatchObject({ status: 'ok', data: { phase: 'CANCELLED' } });
  });

  it('answers previews', async () => {
    const { manager } = managerFixture();
    const reply = await handleDashboardAction(manager, {
      action: 'get_preview',
      request: { index: 'NIFTY', entryTime: '11:00', lookbackMinutes: 60, targetPremium: 50, spotPrice: 26220 },
    });
    expect(reply).toMatchObject({ status: 'ok', data: { lookbackStart: '10:00', message: 'Tick archive is disabled' } });
  });

  it('reports errors instead of throwing', async () => {
    const { manager } = managerFixture();

    expect(await handleDashboardAction(manager, { action: 'remove_strategy', strategyId: 'nope' })).toEqual({
      type: 'reply',
      status: 'error',
      action: 'remove_strategy',
      error: 'NOT_FOUND',
      message: 'Strategy nope not found',
    });
    expect(await handleDashboardAction(manager, { action: 'launch' })).toMatchObject({
      status: 'error',
      action: 'launch',
      error: 'validation_failed',
    });
    expect(await handleDashboardAction(manager, 42)).toMatchObject({ status: 'error', action: null, error: 'validation_failed' });
    expect(
      await handleDashboardAction(manager, { action: 'update_strategy', strategyId: 's1', patch: { index: 'SENSEX' } }),
    ).toMatchObject({ status: 'error', error: 'validation_failed' });
  });
});

describe('DashboardSocket', () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const cleanup of cleanups.splice(0)) await cleanup();
  });

  it('pushes state on connect and answers actions', async () => {
    let snapshots: SnapshotFeed<StateSnapshot> | null = null;
    const { manager, diagnostics } = managerFixture(() => snapshots?.markDirty());
    const feed = new SnapshotFeed<StateSnapshot>(
      () => buildStateSnapshot({ manager, diagnostics, durability: { degraded: false, savedAt: null } }),
      0,
    );
    snapshots = feed;

    const server = http.createServer();
    const dashboard = new DashboardSocket({ server, manager, snapshots: feed });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    cleanups.push(async () => {
      await dashboard.close();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');

    const client = new WebSocket(`ws://127.0.0.1:${address.port}/ws`);
    const messages: unknown[] = [];
    const gotReply = new Promise<void>((resolve) => {
      client.on('message', (raw) => {
        const msg: unknown = JSON.parse(raw.toString());
        messages.push(msg);
        if (typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === 'reply') resolve();
      });
    });
    await new Promise<void>((resolve) => client.on('open', () => resolve()));

    client.send(JSON.stringify({ action: 'create_strategy', strategy }));
    await gotReply;

    expect(messages[0]).toMatchObject({ type: 'state', data: { summary: { total: 0 } } });
    expect(messages[1]).toMatchObject({ type: 'state', data: { summary: { total: 1 } } });
    expect(messages[2]).toMatchObject({ type: 'reply', status: 'ok', data: { id: 's1' } });
    expect(dashboard.clientCount).toBe(1);

    client.close();
  });
});
