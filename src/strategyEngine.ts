// src/strategyEngine.ts
import { logState } from './logger';
import { entrySignal, evaluate, stopLossHit } from './notifier';
import { isStopLossHit, pnlPercent, stopLossPrice } from './pnl';
import { complete, phaseForTime, selectNearest } from './strategy';
import { PHASE_RANK, StrategyContext, StrategyPhase, isTerminal } from './strategyStates';
import { NotificationDraft, Tick } from './types';

export interface EngineOptions {
  nearThreshold: number;
}

export type EmitNotification = (draft: NotificationDraft) => void;

const moveTo = (ctx: StrategyContext, phase: StrategyPhase): void => {
  logState(`Strategy ${ctx.id}: ${ctx.phase} -> ${phase}`);
  ctx.phase = phase;
};

const enterMonitoring = (
  ctx: StrategyContext,
  nowTs: number,
  opts: EngineOptions,
  emit: EmitNotification,
): void => {
  ctx.lookbackTracker.freezeExpired(nowTs);

  const pick = selectNearest(ctx);
  if (!pick) {
    logState(`Strategy ${ctx.id}: no lookback data for any candidate`, {
      optionType: ctx.config.optionType,
    });
    complete(ctx, StrategyPhase.COMPLETED, 'NO_DATA', nowTs);
    return;
  }

  moveTo(ctx, StrategyPhase.MONITORING);
  ctx.selectedInstrument = pick.instrument;
  ctx.entryPrice = pick.currentPrice;
  ctx.entryLow = pick.low;
  ctx.entryTs = nowTs;
  ctx.lastPrice = pick.currentPrice;

  logState(`Strategy ${ctx.id}: entry ${pick.instrument.tradingSymbol}`, {
    low: pick.low,
    entry: pick.currentPrice,
    sl: stopLossPrice(pick.currentPrice, ctx.config.stopLossPercent),
  });

  emit(
    entrySignal({
      strategyId: ctx.id,
      instrument: pick.instrument,
      lookbackLow: pick.low,
      entryPrice: pick.currentPrice,
      targetPremium: ctx.config.targetPremium,
      nearThreshold: opts.nearThreshold,
      at: nowTs,
    }),
  );
};

/**
 * Moves a strategy forward to where the clock says it should be, running
 * every intermediate transition in order. Never moves backwards; terminal
 * phases are left alone. Returns true when the phase changed.
 */
export const advancePhase = (
  ctx: StrategyContext,
  nowTs: number,
  opts: EngineOptions,
  emit: EmitNotification,
): boolean => {
  if (isTerminal(ctx.phase)) return false;

  const target = phaseForTime(ctx, nowTs);
  if (PHASE_RANK[target] <= PHASE_RANK[ctx.phase]) return false;

  if (ctx.phase === StrategyPhase.PENDING && PHASE_RANK[target] >= PHASE_RANK[StrategyPhase.LOOKBACK]) {
    moveTo(ctx, StrategyPhase.LOOKBACK);
  }

  // Past the close without ever having entered (e.g. restored from an old
  // checkpoint): there is no live price to enter on.
  if (ctx.phase === StrategyPhase.LOOKBACK && target === StrategyPhase.COMPLETED) {
    ctx.lookbackTracker.freezeExpired(nowTs);
    complete(ctx, StrategyPhase.COMPLETED, 'MARKET_CLOSE', nowTs);
    return true;
  }

  if (ctx.phase === StrategyPhase.LOOKBACK && target === StrategyPhase.MONITORING) {
    enterMonitoring(ctx, nowTs, opts, emit);
  }

  if (ctx.phase === StrategyPhase.MONITORING && target === StrategyPhase.COMPLETED) {
    ctx.monitoringTracker.freezeExpired(nowTs);
    complete(ctx, StrategyPhase.COMPLETED, 'MARKET_CLOSE', nowTs);
  }

  return true;
};

const handleTickInLookback = (
  ctx: StrategyContext,
  tick: Tick,
  opts: EngineOptions,
  emit: EmitNotification,
): boolean => {
  const { state, event } = ctx.lookbackTracker.update(
    tick.token,
    ctx.lookbackWindow,
    tick.ltp,
    tick.exchangeTs,
  );
  if (!state) return false;

  if (event) {
    const instrument = ctx.candidates.find((c) => c.token === tick.token);
    if (instrument) {
      for (const draft of evaluate(event, {
        strategyId: ctx.id,
        instrument,
        targetPremium: ctx.config.targetPremium,
        nearThreshold: opts.nearThreshold,
      })) {
        emit(draft);
      }
    }
  }
  return true;
};

const handleTickInMonitoring = (
  ctx: StrategyContext,
  tick: Tick,
  opts: EngineOptions,
  emit: EmitNotification,
): boolean => {
  const selected = ctx.selectedInstrument;
  const entryPrice = ctx.entryPrice;
  if (!selected || entryPrice === null || tick.token !== selected.token) return false;

  const { state, event } = ctx.monitoringTracker.update(
    tick.token,
    ctx.monitoringWindow,
    tick.ltp,
    tick.exchangeTs,
  );
  // Stale samples from before entry do not count against the position.
  if (!state) return false;

  ctx.lastPrice = tick.ltp;

  if (event) {
    for (const draft of evaluate(event, {
      strategyId: ctx.id,
      instrument: selected,
      targetPremium: ctx.config.targetPremium,
      nearThreshold: opts.nearThreshold,
    })) {
      emit(draft);
    }
  }

  if (isStopLossHit(entryPrice, tick.ltp, ctx.config.stopLossPercent)) {
    logState(`Strategy ${ctx.id}: stop-loss hit on ${selected.tradingSymbol}`, {
      entry: entryPrice,
      ltp: tick.ltp,
      pnlPercent: pnlPercent(entryPrice, tick.ltp),
    });
    emit(
      stopLossHit({
        strategyId: ctx.id,
        instrument: selected,
        entryPrice,
        price: tick.ltp,
        targetPremium: ctx.config.targetPremium,
        nearThreshold: opts.nearThreshold,
        at: tick.exchangeTs,
      }),
    );
    ctx.monitoringTracker.freezeExpired(Number.POSITIVE_INFINITY);
    complete(ctx, StrategyPhase.COMPLETED, 'STOP_LOSS', tick.exchangeTs);
  }
  return true;
};

// Call this for every tick of a candidate instrument, after advancePhase.
export const onStrategyTick = (
  ctx: StrategyContext,
  tick: Tick,
  opts: EngineOptions,
  emit: EmitNotification,
): boolean => {
  if (!ctx.candidateTokens.has(tick.token)) return false;

  switch (ctx.phase) {
    case StrategyPhase.LOOKBACK:
      return handleTickInLookback(ctx, tick, opts, emit);

    case StrategyPhase.MONITORING:
      return handleTickInMonitoring(ctx, tick, opts, emit);

    case StrategyPhase.PENDING:
    case StrategyPhase.COMPLETED:
    case StrategyPhase.CANCELLED:
      // No tracker activity outside LOOKBACK and MONITORING
      return false;

    default:
      logState('Unknown strategy phase on tick', { id: ctx.id, phase: ctx.phase });
      return false;
  }
};
