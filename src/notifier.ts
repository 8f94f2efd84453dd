import { dropPercent } from './lowHighTracker';
import { ExtremeEvent, Instrument, NotificationDraft } from './types';

export const DEFAULT_NEAR_THRESHOLD = 15;

export interface NotifyContext {
  strategyId: string;
  instrument: Instrument;
  targetPremium: number;
  nearThreshold: number;
}

export const isNearTarget = (
  price: number,
  targetPremium: number,
  nearThreshold = DEFAULT_NEAR_THRESHOLD,
): boolean => Math.abs(price - targetPremium) <= nearThreshold;

/**
 * One notification per qualifying extreme, no history and no rate limiting.
 * A new low near the target premium is reported as NEAR_TARGET; both kinds
 * carry the nearTarget flag and the drop from the previous low.
 */
export function evaluate(event: ExtremeEvent, ctx: NotifyContext): NotificationDraft[] {
  if (event.kind !== 'NEW_LOW') return [];

  const nearTarget = isNearTarget(event.newValue, ctx.targetPremium, ctx.nearThreshold);
  return [
    {
      strategyId: ctx.strategyId,
      instrument: ctx.instrument,
      kind: nearTarget ? 'NEAR_TARGET' : 'NEW_LOW',
      oldValue: event.oldValue,
      newValue: event.newValue,
      dropPercent: dropPercent(event.oldValue, event.newValue),
      nearTarget,
      timestamp: event.at,
    },
  ];
}

export function stopLossHit(params: {
  strategyId: string;
  instrument: Instrument;
  entryPrice: number;
  price: number;
  targetPremium: number;
  nearThreshold: number;
  at: number;
}): NotificationDraft {
  return {
    strategyId: params.strategyId,
    instrument: params.instrument,
    kind: 'STOP_LOSS_HIT',
    oldValue: params.entryPrice,
    newValue: params.price,
    dropPercent: dropPercent(params.entryPrice, params.price),
    nearTarget: isNearTarget(params.price, params.targetPremium, params.nearThreshold),
    timestamp: params.at,
  };
}

export function entrySignal(params: {
  strategyId: string;
  instrument: Instrument;
  lookbackLow: number;
  entryPrice: number;
  targetPremium: number;
  nearThreshold: number;
  at: number;
}): NotificationDraft {
  return {
    strategyId: params.strategyId,
    instrument: params.instrument,
    kind: 'ENTRY_SIGNAL',
    oldValue: params.lookbackLow,
    newValue: params.entryPrice,
    dropPercent: null,
    nearTarget: isNearTarget(params.entryPrice, params.targetPremium, params.nearThreshold),
    timestamp: params.at,
  };
}
