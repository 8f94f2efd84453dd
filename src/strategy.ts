// src/strategy.ts
import { z } from 'zod';
import { Resolution } from './instrumentResolver';
import { instrumentSchema } from './instruments';
import { LowHighTracker } from './lowHighTracker';
import { logState } from './logger';
import { formatHhMm, istDateKey, istHhMmToTs, parseHhMm } from './marketClock';
import {
  CompletionReason,
  StrategyConfig,
  StrategyContext,
  StrategyPhase,
} from './strategyStates';
import { createWindow } from './trackingWindow';
import { Instrument, OptionType, TrackerState, TrackingWindow } from './types';

export interface CandidateView {
  instrument: Instrument;
  low: number;
  currentPrice: number;
  sampleCount: number;
  distance: number;
}

export const buildWindows = (
  config: StrategyConfig,
  tradingDay: string,
  marketClose: string,
): { lookbackWindow: TrackingWindow; monitoringWindow: TrackingWindow } => {
  const entryTs = istHhMmToTs(tradingDay, config.entryTime);
  const closeTs = istHhMmToTs(tradingDay, marketClose);
  return {
    lookbackWindow: createWindow(entryTs - config.lookbackMinutes * 60_000, entryTs),
    monitoringWindow: createWindow(entryTs, Math.max(entryTs, closeTs)),
  };
};

export const lookbackStartLabel = (config: StrategyConfig): string =>
  formatHhMm(parseHhMm(config.entryTime) - config.lookbackMinutes);

export const createStrategy = (params: {
  id: string;
  config: StrategyConfig;
  createdAt: number;
  resolution: Resolution;
  marketClose: string;
}): StrategyContext => {
  const tradingDay = istDateKey(params.createdAt);
  const windows = buildWindows(params.config, tradingDay, params.marketClose);

  const ctx: StrategyContext = {
    id: params.id,
    config: { ...params.config },
    tradingDay,
    createdAt: params.createdAt,

    phase: StrategyPhase.PENDING,

    candidates: [...params.resolution.instruments],
    candidateTokens: new Set(params.resolution.instruments.map((i) => i.token)),
    spotPrice: params.resolution.spotPrice,
    atmStrike: params.resolution.atmStrike,
    expiry: params.resolution.expiry,

    lookbackWindow: windows.lookbackWindow,
    monitoringWindow: windows.monitoringWindow,
    lookbackTracker: new LowHighTracker(),
    monitoringTracker: new LowHighTracker(),

    selectedInstrument: null,
    entryPrice: null,
    entryLow: null,
    entryTs: null,
    lastPrice: null,

    completedAt: null,
    completionReason: null,
  };

  logState(`Strategy created: ${ctx.id}`, {
    index: ctx.config.index,
    entryTime: ctx.config.entryTime,
    lookbackStart: lookbackStartLabel(ctx.config),
    candidates: ctx.candidates.length,
    expiry: ctx.expiry,
  });
  return ctx;
};

// Where the clock says the strategy should be; callers only ever move forward.
export const phaseForTime = (ctx: StrategyContext, nowTs: number): StrategyPhase => {
  if (nowTs >= ctx.monitoringWindow.endTs) return StrategyPhase.COMPLETED;
  if (nowTs >= ctx.lookbackWindow.endTs) return StrategyPhase.MONITORING;
  if (nowTs >= ctx.lookbackWindow.startTs) return StrategyPhase.LOOKBACK;
  return StrategyPhase.PENDING;
};

export const replaceCandidates = (ctx: StrategyContext, resolution: Resolution): void => {
  ctx.candidates = [...resolution.instruments];
  ctx.candidateTokens = new Set(resolution.instruments.map((i) => i.token));
  ctx.spotPrice = resolution.spotPrice;
  ctx.atmStrike = resolution.atmStrike;
  ctx.expiry = resolution.expiry;
};

/**
 * Candidates with tracker data, nearest low to target first. Array.sort is
 * stable, so exact ties keep resolver order.
 */
export const rankByTarget = (params: {
  candidates: Instrument[];
  tracker: LowHighTracker;
  window: TrackingWindow;
  targetPremium: number;
  optionType?: OptionType;
  limit?: number;
}): CandidateView[] => {
  const views: CandidateView[] = [];
  for (const instrument of params.candidates) {
    if (params.optionType && instrument.optionType !== params.optionType) continue;
    const state = params.tracker.get(instrument.token, params.window);
    if (!state) continue;
    views.push({
      instrument,
      low: state.low,
      currentPrice: state.currentPrice,
      sampleCount: state.sampleCount,
      distance: Math.abs(state.low - params.targetPremium),
    });
  }
  views.sort((a, b) => a.distance - b.distance);
  return params.limit === undefined ? views : views.slice(0, params.limit);
};

export const rankCandidates = (
  ctx: StrategyContext,
  optionType?: OptionType,
  limit?: number,
): CandidateView[] =>
  rankByTarget({
    candidates: ctx.candidates,
    tracker: ctx.lookbackTracker,
    window: ctx.lookbackWindow,
    targetPremium: ctx.config.targetPremium,
    optionType,
    limit,
  });

export const selectNearest = (ctx: StrategyContext): CandidateView | null => {
  const pref = ctx.config.optionType;
  const ranked = rankCandidates(ctx, pref === 'ANY' ? undefined : pref, 1);
  return ranked[0] ?? null;
};

export const complete = (
  ctx: StrategyContext,
  phase: StrategyPhase.COMPLETED | StrategyPhase.CANCELLED,
  reason: CompletionReason,
  nowTs: number,
): void => {
  const from = ctx.phase;
  ctx.phase = phase;
  ctx.completedAt = nowTs;
  ctx.completionReason = reason;
  logState(`Strategy ${ctx.id}: ${from} -> ${phase}`, { reason });
};

// --- Checkpoint format ---

const trackerStateSchema = z.object({
  low: z.number(),
  high: z.number(),
  firstPrice: z.number(),
  currentPrice: z.number(),
  sampleCount: z.number().int().min(1),
  firstUpdateTs: z.number(),
  lastUpdateTs: z.number(),
  frozen: z.boolean(),
});

export const strategyConfigSchema = z.object({
  index: z.enum(['NIFTY', 'BANKNIFTY', 'FINNIFTY', 'SENSEX']),
  entryTime: z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/, 'entryTime must be HH:MM'),
  lookbackMinutes: z.number().int().min(1).max(24 * 60),
  targetPremium: z.number().positive(),
  stopLossPercent: z.number().positive().max(100),
  optionType: z.enum(['CE', 'PE', 'ANY']).default('ANY'),
});

export const strategyCheckpointSchema = z.object({
  id: z.string().min(1),
  config: strategyConfigSchema,
  tradingDay: z.string(),
  createdAt: z.number(),
  phase: z.nativeEnum(StrategyPhase),
  candidates: z.array(instrumentSchema),
  spotPrice: z.number(),
  atmStrike: z.number(),
  expiry: z.string(),
  selectedToken: z.number().nullable(),
  entryPrice: z.number().nullable(),
  entryLow: z.number().nullable(),
  entryTs: z.number().nullable(),
  lastPrice: z.number().nullable(),
  completedAt: z.number().nullable(),
  completionReason: z.enum(['STOP_LOSS', 'MARKET_CLOSE', 'NO_DATA', 'REMOVED']).nullable(),
  lookback: z.array(z.object({ token: z.number(), state: trackerStateSchema })),
  monitoring: z.array(z.object({ token: z.number(), state: trackerStateSchema })),
});

export type StrategyCheckpoint = z.infer<typeof strategyCheckpointSchema>;

const trackerRows = (
  tracker: LowHighTracker,
  window: TrackingWindow,
): Array<{ token: number; state: TrackerState }> =>
  tracker
    .entries()
    .filter((e) => e.window === window)
    .map((e) => ({ token: e.token, state: e.state }));

export const serializeStrategy = (ctx: StrategyContext): StrategyCheckpoint => ({
  id: ctx.id,
  config: { ...ctx.config },
  tradingDay: ctx.tradingDay,
  createdAt: ctx.createdAt,
  phase: ctx.phase,
  candidates: ctx.candidates,
  spotPrice: ctx.spotPrice,
  atmStrike: ctx.atmStrike,
  expiry: ctx.expiry,
  selectedToken: ctx.selectedInstrument ? ctx.selectedInstrument.token : null,
  entryPrice: ctx.entryPrice,
  entryLow: ctx.entryLow,
  entryTs: ctx.entryTs,
  lastPrice: ctx.lastPrice,
  completedAt: ctx.completedAt,
  completionReason: ctx.completionReason,
  lookback: trackerRows(ctx.lookbackTracker, ctx.lookbackWindow),
  monitoring: trackerRows(ctx.monitoringTracker, ctx.monitoringWindow),
});

export const restoreStrategy = (
  cp: StrategyCheckpoint,
  marketClose: string,
): StrategyContext => {
  const windows = buildWindows(cp.config, cp.tradingDay, marketClose);
  const lookbackTracker = new LowHighTracker();
  const monitoringTracker = new LowHighTracker();
  for (const row of cp.lookback) lookbackTracker.restore(row.token, windows.lookbackWindow, row.state);
  for (const row of cp.monitoring) monitoringTracker.restore(row.token, windows.monitoringWindow, row.state);

  const selected =
    cp.selectedToken === null
      ? null
      : cp.candidates.find((c) => c.token === cp.selectedToken) ?? null;

  return {
    id: cp.id,
    config: { ...cp.config },
    tradingDay: cp.tradingDay,
    createdAt: cp.createdAt,
    phase: cp.phase,
    candidates: [...cp.candidates],
    candidateTokens: new Set(cp.candidates.map((c) => c.token)),
    spotPrice: cp.spotPrice,
    atmStrike: cp.atmStrike,
    expiry: cp.expiry,
    lookbackWindow: windows.lookbackWindow,
    monitoringWindow: windows.monitoringWindow,
    lookbackTracker,
    monitoringTracker,
    selectedInstrument: selected,
    entryPrice: cp.entryPrice,
    entryLow: cp.entryLow,
    entryTs: cp.entryTs,
    lastPrice: cp.lastPrice,
    completedAt: cp.completedAt,
    completionReason: cp.completionReason,
  };
};

// --- Control-surface inputs ---

export const createStrategySchema = strategyConfigSchema.extend({
  spotPrice: z.number().positive().optional(),
});

export const strategyPatchSchema = strategyConfigSchema.omit({ index: true }).partial().strict();

export const previewRequestSchema = strategyConfigSchema
  .pick({ index: true, entryTime: true, lookbackMinutes: true, targetPremium: true })
  .extend({
    optionType: z.enum(['CE', 'PE', 'ANY']).optional(),
    spotPrice: z.number().positive().optional(),
  });
