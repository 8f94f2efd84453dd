import { randomUUID } from 'crypto';
import { Diagnostics } from './diagnostics';
import {
  ClockSkewError,
  InvalidStrategyError,
  NotFoundError,
  ResolutionError,
  StrategyStateError,
} from './errors';
import { INDEX_SPECS, getIndexBySpotToken } from './indices';
import { atmStrike, nearestExpiry, resolveInstruments } from './instrumentResolver';
import { InstrumentCatalog } from './instruments';
import { KeyedMutex } from './keyedMutex';
import { describeError, logState, logWarn } from './logger';
import { LowHighTracker } from './lowHighTracker';
import { Clock, istDateKey, istHhMmToTs, parseHhMm } from './marketClock';
import { lotPnl, pnlPercent, round2, stopLossPrice } from './pnl';
import {
  CandidateView,
  StrategyCheckpoint,
  buildWindows,
  complete,
  createStrategy,
  lookbackStartLabel,
  rankByTarget,
  rankCandidates,
  replaceCandidates,
  restoreStrategy,
  serializeStrategy,
} from './strategy';
import { EngineOptions, advancePhase, onStrategyTick } from './strategyEngine';
import {
  OptionPreference,
  StrategyConfig,
  StrategyContext,
  StrategyPhase,
  isTerminal,
} from './strategyStates';
import { TickHistory } from './tickArchive';
import { IndexName, Instrument, NotificationDraft, Tick } from './types';

const TOP_CANDIDATES = 3;

export interface StrategyManagerOptions {
  clock: Clock;
  catalog: InstrumentCatalog;
  diagnostics: Diagnostics;
  publish: (draft: NotificationDraft) => void;
  history?: TickHistory;
  marketClose: string;
  nearThreshold: number;
  strikesRange: number;
  clockSkewToleranceMs: number;
  retentionMinutes: number;
  phaseIntervalMs: number;
  idFactory?: () => string;
  onChange?: () => void;
}

export type StrategyPatch = Partial<
  Pick<StrategyConfig, 'entryTime' | 'lookbackMinutes' | 'targetPremium' | 'stopLossPercent' | 'optionType'>
>;

export interface PreviewRequest {
  index: IndexName;
  targetPremium: number;
  entryTime: string;
  lookbackMinutes: number;
  optionType?: OptionPreference;
  spotPrice?: number;
}

export interface PreviewResult {
  index: IndexName;
  targetPremium: number;
  lookbackStart: string;
  entryTime: string;
  expiry: string;
  atmStrike: number;
  ticksScanned: number;
  topCe: CandidateView[];
  topPe: CandidateView[];
  totalCe: number;
  totalPe: number;
  message: string | null;
}

export interface PositionView {
  instrument: Instrument;
  entryPrice: number;
  entryLow: number | null;
  entryTs: number | null;
  lastPrice: number | null;
  stopLossPrice: number;
  pnlPercent: number | null;
  lotPnl: number | null;
  low: number | null;
  high: number | null;
}

export interface StrategyView {
  id: string;
  config: StrategyConfig;
  tradingDay: string;
  phase: StrategyPhase;
  createdAt: number;
  completedAt: number | null;
  completionReason: StrategyContext['completionReason'];
  lookbackStart: string;
  lookbackWindow: { startTs: number; endTs: number };
  monitoringWindow: { startTs: number; endTs: number };
  spotPrice: number;
  atmStrike: number;
  expiry: string;
  candidateCount: number;
  topCe: CandidateView[];
  topPe: CandidateView[];
  position: PositionView | null;
}

export interface ManagerSnapshot {
  now: number;
  marketClose: string;
  spotPrices: Partial<Record<IndexName, { price: number; at: number }>>;
  strategies: StrategyView[];
  summary: {
    total: number;
    active: number;
    completed: number;
  };
}

/**
 * Owns the live strategy set.
 *
 * Every mutation of one strategy (tick, phase timer, create/update/remove)
 * runs inside that strategy's KeyedMutex scope. Removal takes the strategy out
 * of the live map before it waits for the lock, so tick work already queued
 * behind the lock finds it gone and does nothing.
 */
export class StrategyManager {
  private readonly strategies = new Map<string, StrategyContext>();
  private readonly mutex = new KeyedMutex();
  private readonly spotPrices = new Map<IndexName, { price: number; at: number }>();
  private readonly engineOpts: EngineOptions;
  private readonly idFactory: () => string;
  private readonly catalog: InstrumentCatalog;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: StrategyManagerOptions) {
    parseHhMm(opts.marketClose);
    this.catalog = opts.catalog;
    this.engineOpts = { nearThreshold: opts.nearThreshold };
    this.idFactory = opts.idFactory ?? (() => randomUUID().slice(0, 8));
  }

  // --- Lifecycle ---

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tickPhases().catch((err) => {
        logWarn('Phase timer failed', { error: describeError(err) });
      });
    }, this.opts.phaseIntervalMs);
    logState('Strategy phase timer started', { intervalMs: this.opts.phaseIntervalMs });
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  // --- Control surface ---

  async create(config: StrategyConfig, opts: { spotPrice?: number } = {}): Promise<StrategyView> {
    const now = this.opts.clock.now();
    this.assertSchedulable(config, istDateKey(now), now);

    const spotPrice = opts.spotPrice ?? this.spotPrices.get(config.index)?.price;
    if (spotPrice === undefined) {
      throw new ResolutionError(`No spot price for ${config.index} yet`, config.index);
    }
    const resolution = resolveInstruments(
      this.catalog,
      config.index,
      spotPrice,
      now,
      this.opts.strikesRange,
    );

    let id = this.idFactory();
    while (this.strategies.has(id)) id = this.idFactory();

    const ctx = createStrategy({
      id,
      config,
      createdAt: now,
      resolution,
      marketClose: this.opts.marketClose,
    });

    return this.mutex.runExclusive(id, () => {
      this.strategies.set(id, ctx);
      this.seedLookback(ctx, now);
      advancePhase(ctx, now, this.engineOpts, this.opts.publish);
      this.changed();
      return this.view(ctx);
    });
  }

  // Timing, target and stop-loss can change until the entry instant.
  async update(id: string, patch: StrategyPatch): Promise<StrategyView> {
    this.requireLive(id);

    return this.mutex.runExclusive(id, () => {
      const ctx = this.requireLive(id);
      const now = this.opts.clock.now();
      if (advancePhase(ctx, now, this.engineOpts, this.opts.publish)) this.changed();
      if (ctx.phase !== StrategyPhase.PENDING && ctx.phase !== StrategyPhase.LOOKBACK) {
        throw new StrategyStateError(`Strategy ${id} is ${ctx.phase}; only PENDING or LOOKBACK can be updated`);
      }

      const next: StrategyConfig = { ...ctx.config, ...definedOnly(patch) };
      this.assertSchedulable(next, ctx.tradingDay, now);

      const timingChanged =
        next.entryTime !== ctx.config.entryTime || next.lookbackMinutes !== ctx.config.lookbackMinutes;
      ctx.config = next;

      if (timingChanged) {
        const windows = buildWindows(next, ctx.tradingDay, this.opts.marketClose);
        ctx.lookbackWindow = windows.lookbackWindow;
        ctx.monitoringWindow = windows.monitoringWindow;
        ctx.lookbackTracker = new LowHighTracker();
        ctx.monitoringTracker = new LowHighTracker();
        this.seedLookback(ctx, now);
      }

      logState(`Strategy updated: ${id}`, { config: next, timingChanged });
      advancePhase(ctx, now, this.engineOpts, this.opts.publish);
      this.changed();
      return this.view(ctx);
    });
  }

  async remove(id: string): Promise<StrategyView> {
    const ctx = this.strategies.get(id);
    if (!ctx) throw new NotFoundError(`Strategy ${id} not found`);
    this.strategies.delete(id);

    return this.mutex.runExclusive(id, () => {
      if (!isTerminal(ctx.phase)) {
        complete(ctx, StrategyPhase.CANCELLED, 'REMOVED', this.opts.clock.now());
      }
      logState(`Strategy removed: ${id}`, { phase: ctx.phase });
      this.changed();
      return this.view(ctx);
    });
  }

  get(id: string): StrategyView {
    return this.view(this.requireLive(id));
  }

  list(): StrategyView[] {
    return [...this.strategies.values()].map((ctx) => this.view(ctx));
  }

  /**
   * Hypothetical lookback over archived ticks for today's session. Builds its
   * own tracker; live strategies are not touched.
   */
  getPreview(req: PreviewRequest): PreviewResult {
    const now = this.opts.clock.now();
    const tradingDay = istDateKey(now);
    const config: StrategyConfig = {
      index: req.index,
      entryTime: req.entryTime,
      lookbackMinutes: req.lookbackMinutes,
      targetPremium: req.targetPremium,
      stopLossPercent: 100,
      optionType: req.optionType ?? 'ANY',
    };
    const spotPrice = req.spotPrice ?? this.spotPrices.get(req.index)?.price;
    if (spotPrice === undefined) {
      throw new ResolutionError(`No spot price for ${req.index} yet`, req.index);
    }

    const resolution = resolveInstruments(this.catalog, req.index, spotPrice, now, this.opts.strikesRange);
    const { lookbackWindow } = buildWindows(config, tradingDay, this.opts.marketClose);
    const tracker = new LowHighTracker();

    let ticksScanned = 0;
    if (this.opts.history) {
      const tokens = new Set(resolution.instruments.map((i) => i.token));
      for (const t of this.opts.history.ticksBetween(tokens, lookbackWindow.startTs, lookbackWindow.endTs)) {
        tracker.update(t.token, lookbackWindow, t.ltp, t.exchangeTs);
        ticksScanned += 1;
      }
    }

    const rank = (optionType: 'CE' | 'PE'): CandidateView[] =>
      config.optionType === 'ANY' || config.optionType === optionType
        ? rankByTarget({
          candidates: resolution.instruments,
          tracker,
          window: lookbackWindow,
          targetPremium: req.targetPremium,
          optionType,
        })
        : [];
    const ce = rank('CE');
    const pe = rank('PE');

    let message: string | null = null;
    if (!this.opts.history) message = 'Tick archive is disabled';
    else if (!ticksScanned) message = `No archived ticks for ${req.index} between ${lookbackStartLabel(config)} and ${req.entryTime}`;

    return {
      index: req.index,
      targetPremium: req.targetPremium,
      lookbackStart: lookbackStartLabel(config),
      entryTime: req.entryTime,
      expiry: resolution.expiry,
      atmStrike: resolution.atmStrike,
      ticksScanned,
      topCe: ce.slice(0, TOP_CANDIDATES),
      topPe: pe.slice(0, TOP_CANDIDATES),
      totalCe: ce.length,
      totalPe: pe.length,
      message,
    };
  }

  // --- Feed side ---

  async handleTick(tick: Tick): Promise<void> {
    const now = this.opts.clock.now();
    if (Math.abs(tick.exchangeTs - now) > this.opts.clockSkewToleranceMs) {
      const err = new ClockSkewError(tick.token, tick.exchangeTs, now);
      this.opts.diagnostics.increment('ticksSkewIgnored');
      logWarn(err.message, { token: tick.token, exchangeTs: tick.exchangeTs, now });
      return;
    }

    const spot = getIndexBySpotToken(tick.token);
    if (spot) {
      await this.onSpotPrice(spot.name, tick.ltp, tick.exchangeTs);
      return;
    }

    for (const ctx of [...this.strategies.values()]) {
      if (!ctx.candidateTokens.has(tick.token)) continue;
      try {
        await this.mutex.runExclusive(ctx.id, () => {
          if (this.strategies.get(ctx.id) !== ctx) return;
          const moved = advancePhase(ctx, now, this.engineOpts, this.opts.publish);
          const touched = onStrategyTick(ctx, tick, this.engineOpts, this.opts.publish);
          if (moved || touched) this.changed();
        });
      } catch (err) {
        this.opts.diagnostics.increment('tickErrors');
        logWarn('Strategy tick failed', { id: ctx.id, token: tick.token, error: describeError(err) });
      }
    }
  }

  /**
   * Records the index spot and re-resolves PENDING strategies whose ATM strike
   * or nearest expiry has moved. Strategies past PENDING keep their candidates.
   */
  async onSpotPrice(index: IndexName, price: number, at: number): Promise<void> {
    if (!(price > 0)) return;
    this.spotPrices.set(index, { price, at });

    const now = this.opts.clock.now();
    const atm = atmStrike(price, INDEX_SPECS[index].strikeStep);
    const expiry = nearestExpiry(this.catalog, index, now);

    for (const ctx of [...this.strategies.values()]) {
      if (ctx.config.index !== index || ctx.phase !== StrategyPhase.PENDING) continue;
      if (ctx.atmStrike === atm && ctx.expiry === expiry) continue;

      try {
        await this.mutex.runExclusive(ctx.id, () => {
          if (this.strategies.get(ctx.id) !== ctx || ctx.phase !== StrategyPhase.PENDING) return;
          const previous = { atm: ctx.atmStrike, expiry: ctx.expiry };
          replaceCandidates(ctx, resolveInstruments(this.catalog, index, price, now, this.opts.strikesRange));
          logState(`Strategy ${ctx.id}: candidates re-resolved`, {
            from: previous,
            to: { atm: ctx.atmStrike, expiry: ctx.expiry },
            candidates: ctx.candidates.length,
          });
          this.changed();
        });
      } catch (err) {
        logWarn(`Strategy ${ctx.id}: re-resolve failed, keeping candidates`, { error: describeError(err) });
      }
    }
  }

  // Phase timer body: advances every strategy, then purges expired terminal ones.
  async tickPhases(): Promise<void> {
    const now = this.opts.clock.now();

    for (const ctx of [...this.strategies.values()]) {
      try {
        await this.mutex.runExclusive(ctx.id, () => {
          if (this.strategies.get(ctx.id) !== ctx) return;
          if (advancePhase(ctx, now, this.engineOpts, this.opts.publish)) this.changed();
        });
      } catch (err) {
        logWarn('Phase advance failed', { id: ctx.id, error: describeError(err) });
      }
    }

    this.purgeExpired(now);
  }

  getSpotPrice(index: IndexName): number | null {
    return this.spotPrices.get(index)?.price ?? null;
  }

  // --- Persistence ---

  toCheckpoint(): StrategyCheckpoint[] {
    return [...this.strategies.values()].map(serializeStrategy);
  }

  restore(checkpoints: StrategyCheckpoint[]): number {
    let restored = 0;
    for (const cp of checkpoints) {
      if (this.strategies.has(cp.id)) continue;
      try {
        this.strategies.set(cp.id, restoreStrategy(cp, this.opts.marketClose));
        restored += 1;
      } catch (err) {
        logWarn(`Strategy ${cp.id} could not be restored`, { error: describeError(err) });
      }
    }
    if (restored) {
      logState('Strategies restored from checkpoint', { restored });
      this.changed();
    }
    return restored;
  }

  snapshot(): ManagerSnapshot {
    const strategies = this.list();
    const spotPrices: ManagerSnapshot['spotPrices'] = {};
    for (const [index, spot] of this.spotPrices) spotPrices[index] = { ...spot };

    return {
      now: this.opts.clock.now(),
      marketClose: this.opts.marketClose,
      spotPrices,
      strategies,
      summary: {
        total: strategies.length,
        active: strategies.filter((s) => s.phase === StrategyPhase.LOOKBACK || s.phase === StrategyPhase.MONITORING).length,
        completed: strategies.filter((s) => s.phase === StrategyPhase.COMPLETED).length,
      },
    };
  }

  // --- Internals ---

  private requireLive(id: string): StrategyContext {
    const ctx = this.strategies.get(id);
    if (!ctx) throw new NotFoundError(`Strategy ${id} not found`);
    return ctx;
  }

  private assertSchedulable(config: StrategyConfig, tradingDay: string, now: number): void {
    const entryTs = istHhMmToTs(tradingDay, config.entryTime);
    const closeTs = istHhMmToTs(tradingDay, this.opts.marketClose);
    if (entryTs >= closeTs) {
      throw new InvalidStrategyError(
        `Entry ${config.entryTime} must be before market close ${this.opts.marketClose}`,
      );
    }
    if (now >= closeTs) {
      throw new StrategyStateError(`Market closed at ${this.opts.marketClose} for ${tradingDay}`);
    }
  }

  // Strategies created mid-lookback (or later) start from what was archived.
  private seedLookback(ctx: StrategyContext, now: number): void {
    const history = this.opts.history;
    if (!history) return;
    const end = Math.min(now, ctx.lookbackWindow.endTs);
    if (end <= ctx.lookbackWindow.startTs) return;

    const ticks = history.ticksBetween(ctx.candidateTokens, ctx.lookbackWindow.startTs, end);
    for (const t of ticks) ctx.lookbackTracker.update(t.token, ctx.lookbackWindow, t.ltp, t.exchangeTs);
    if (ticks.length) {
      logState(`Strategy ${ctx.id}: lookback seeded from archive`, {
        ticks: ticks.length,
        from: lookbackStartLabel(ctx.config),
        to: ctx.config.entryTime,
      });
    }
  }

  private purgeExpired(now: number): void {
    const horizonMs = this.opts.retentionMinutes * 60_000;
    for (const [id, ctx] of this.strategies) {
      if (!isTerminal(ctx.phase) || ctx.completedAt === null) continue;
      if (now - ctx.completedAt < horizonMs) continue;
      this.strategies.delete(id);
      logState(`Strategy purged: ${id}`, { phase: ctx.phase, reason: ctx.completionReason });
      this.changed();
    }
  }

  private changed(): void {
    this.opts.onChange?.();
  }

  private view(ctx: StrategyContext): StrategyView {
    const byType = (type: 'CE' | 'PE'): CandidateView[] =>
      rankCandidates(ctx, type, TOP_CANDIDATES);

    let position: PositionView | null = null;
    if (ctx.selectedInstrument && ctx.entryPrice !== null) {
      const inst = ctx.selectedInstrument;
      const monitored = ctx.monitoringTracker.get(inst.token, ctx.monitoringWindow);
      const last = ctx.lastPrice;
      position = {
        instrument: inst,
        entryPrice: ctx.entryPrice,
        entryLow: ctx.entryLow,
        entryTs: ctx.entryTs,
        lastPrice: last,
        stopLossPrice: stopLossPrice(ctx.entryPrice, ctx.config.stopLossPercent),
        pnlPercent: last === null || ctx.entryPrice <= 0 ? null : round2(pnlPercent(ctx.entryPrice, last)),
        lotPnl: last === null ? null : lotPnl(ctx.entryPrice, last, inst.lotSize),
        low: monitored?.low ?? null,
        high: monitored?.high ?? null,
      };
    }

    return {
      id: ctx.id,
      config: { ...ctx.config },
      tradingDay: ctx.tradingDay,
      phase: ctx.phase,
      createdAt: ctx.createdAt,
      completedAt: ctx.completedAt,
      completionReason: ctx.completionReason,
      lookbackStart: lookbackStartLabel(ctx.config),
      lookbackWindow: { startTs: ctx.lookbackWindow.startTs, endTs: ctx.lookbackWindow.endTs },
      monitoringWindow: { startTs: ctx.monitoringWindow.startTs, endTs: ctx.monitoringWindow.endTs },
      spotPrice: ctx.spotPrice,
      atmStrike: ctx.atmStrike,
      expiry: ctx.expiry,
      candidateCount: ctx.candidates.length,
      topCe: byType('CE'),
      topPe: byType('PE'),
      position,
    };
  }
}

function definedOnly(patch: StrategyPatch): StrategyPatch {
  const out: StrategyPatch = {};
  if (patch.entryTime !== undefined) out.entryTime = patch.entryTime;
  if (patch.lookbackMinutes !== undefined) out.lookbackMinutes = patch.lookbackMinutes;
  if (patch.targetPremium !== undefined) out.targetPremium = patch.targetPremium;
  if (patch.stopLossPercent !== undefined) out.stopLossPercent = patch.stopLossPercent;
  if (patch.optionType !== undefined) out.optionType = patch.optionType;
  return out;
}
