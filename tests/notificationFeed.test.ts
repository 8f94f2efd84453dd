import { describe, expect, it } from 'vitest';
import { Diagnostics } from '../src/diagnostics';
import { NotificationFeed, formatNotification } from '../src/notificationFeed';
import { NotificationDraft, NotificationEvent } from '../src/types';
import { at, niftyCatalog } from './helpers';

const instrument = niftyCatalog().lookup('NIFTY', '2025-12-23', 26200, 'CE');

const draft = (newValue: number, overrides: Partial<NotificationDraft> = {}): NotificationDraft => ({
  strategyId: 's1',
  instrument,
  kind: 'NEW_LOW',
  oldValue: 60,
  newValue,
  dropPercent: null,
  nearTarget: false,
  timestamp: at('10:30'),
  ...overrides,
});

describe('NotificationFeed', () => {
  it('numbers events and delivers them in publish order', async () => {
    const feed = new NotificationFeed({ maxQueue: 10, diagnostics: new Diagnostics() });
    const seen: number[] = [];
    feed.addSink({ name: 'test', deliver: (e) => { seen.push(e.seq); } });

    const first = feed.publish(draft(55));
    feed.publish(draft(54));
    feed.publish(draft(53));
    await feed.drain();

    expect(first.seq).toBe(1);
    expect(seen).toEqual([1, 2, 3]);
    expect(feed.recent(2).map((e) => e.newValue)).toEqual([54, 53]);
    expect(feed.recent()).toHaveLength(3);
  });

  it('keeps delivering when a sink fails', async () => {
    const diagnostics = new Diagnostics();
    const feed = new NotificationFeed({ maxQueue: 10, diagnostics });
    const seen: number[] = [];
    feed.addSink({ name: 'broken', deliver: async () => { throw new Error('down'); } });
    feed.addSink({ name: 'ok', deliver: (e) => { seen.push(e.seq); } });

    feed.publish(draft(55));
    feed.publish(draft(54));
    await feed.drain();

    expect(seen).toEqual([1, 2]);
    expect(diagnostics.get('notificationSinkErrors')).toBe(2);
  });

  it('drops the oldest queued event when full', async () => {
    const diagnostics = new Diagnostics();
    const feed = new NotificationFeed({ maxQueue: 2, diagnostics, keepRecent: 2 });
    const seen: number[] = [];
    feed.addSink({ name: 'test', deliver: (e) => { seen.push(e.seq); } });

    feed.publish(draft(55));
    feed.publish(draft(54));
    feed.publish(draft(53));
    await feed.drain();

    expect(seen).toEqual([2, 3]);
    expect(diagnostics.get('notificationsDropped')).toBe(1);
    expect(feed.recent().map((e) => e.seq)).toEqual([2, 3]);
  });

  it('stops delivering to a removed sink', async () => {
    const feed = new NotificationFeed({ maxQueue: 10, diagnostics: new Diagnostics() });
    const seen: number[] = [];
    const remove = feed.addSink({ name: 'test', deliver: (e) => { seen.push(e.seq); } });
    remove();
    feed.publish(draft(55));
    await feed.drain();
    expect(seen).toEqual([]);
  });
});

describe('formatNotification', () => {
  const event = (d: NotificationDraft): NotificationEvent => ({ seq: 1, ...d });

  it('formats lows with the drop and target flag', () => {
    expect(
      formatNotification(event(draft(48.75, { kind: 'NEAR_TARGET', oldValue: 52.4, dropPercent: 6.9656, nearTarget: true }))),
    ).toBe('[s1] NEAR_TARGET NIFTY25122326200CE 52.40 -> 48.75 -6.97% near target');
  });

  it('formats entries and stop-losses', () => {
    expect(formatNotification(event(draft(48.75, { kind: 'ENTRY_SIGNAL', oldValue: 48.75 })))).toBe(
      '[s1] ENTRY NIFTY25122326200CE @ 48.75 (lookback low 48.75)',
    );
    expect(formatNotification(event(draft(24, { kind: 'STOP_LOSS_HIT', oldValue: 48.75 })))).toBe(
      '[s1] STOP LOSS NIFTY25122326200CE @ 24.00 (entry 48.75)',
    );
  });
});
