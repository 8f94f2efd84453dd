import { describe, expect, it } from 'vitest';
import { entrySignal, evaluate, isNearTarget, stopLossHit } from '../src/notifier';
import { at, niftyCatalog } from './helpers';

const instrument = niftyCatalog().lookup('NIFTY', '2025-12-23', 26200, 'CE');
const ctx = { strategyId: 's1', instrument, targetPremium: 50, nearThreshold: 15 };

describe('isNearTarget', () => {
  it('is inclusive of the threshold', () => {
    expect(isNearTarget(48.75, 50)).toBe(true);
    expect(isNearTarget(35, 50)).toBe(true);
    expect(isNearTarget(34.99, 50)).toBe(false);
    expect(isNearTarget(30, 50)).toBe(false);
    expect(isNearTarget(58, 50, 5)).toBe(false);
  });
});

describe('evaluate', () => {
  it('reports a new low near the target as NEAR_TARGET', () => {
    const drafts = evaluate(
      { kind: 'NEW_LOW', token: instrument.token, oldValue: 52.4, newValue: 48.75, at: at('10:30') },
      ctx,
    );
    expect(drafts).toHaveLength(1);
    expect(drafts[0]).toMatchObject({
      strategyId: 's1',
      kind: 'NEAR_TARGET',
      oldValue: 52.4,
      newValue: 48.75,
      nearTarget: true,
      timestamp: at('10:30'),
    });
    expect(drafts[0].instrument.tradingSymbol).toBe('NIFTY25122326200CE');
    expect(drafts[0].dropPercent).toBeCloseTo(6.9656, 4);
  });

  it('reports a far new low as NEW_LOW', () => {
    const [draft] = evaluate(
      { kind: 'NEW_LOW', token: instrument.token, oldValue: 40, newValue: 30, at: at('10:31') },
      ctx,
    );
    expect(draft.kind).toBe('NEW_LOW');
    expect(draft.nearTarget).toBe(false);
    expect(draft.dropPercent).toBe(25);
  });

  it('ignores new highs', () => {
    expect(
      evaluate({ kind: 'NEW_HIGH', token: instrument.token, oldValue: 52.4, newValue: 60, at: at('10:32') }, ctx),
    ).toEqual([]);
  });
});

describe('stopLossHit / entrySignal', () => {
  it('carries entry and exit prices', () => {
    const draft = stopLossHit({ ...ctx, entryPrice: 60, price: 30, at: at('11:05') });
    expect(draft).toMatchObject({ kind: 'STOP_LOSS_HIT', oldValue: 60, newValue: 30, dropPercent: 50, nearTarget: false });
  });

  it('reports the lookback low and entry price', () => {
    const draft = entrySignal({ ...ctx, lookbackLow: 48.75, entryPrice: 49.5, at: at('11:00') });
    expect(draft).toMatchObject({ kind: 'ENTRY_SIGNAL', oldValue: 48.75, newValue: 49.5, dropPercent: null, nearTarget: true });
  });
});
