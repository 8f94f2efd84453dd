// src/strategyStates.ts

import { LowHighTracker } from './lowHighTracker';
import { IndexName, Instrument, OptionType, TrackingWindow } from './types';

export enum StrategyPhase {
  PENDING = 'PENDING',
  LOOKBACK = 'LOOKBACK',
  MONITORING = 'MONITORING',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

// Forward-only ordering; CANCELLED is reachable from any non-terminal phase.
export const PHASE_RANK: Record<StrategyPhase, number> = {
  [StrategyPhase.PENDING]: 0,
  [StrategyPhase.LOOKBACK]: 1,
  [StrategyPhase.MONITORING]: 2,
  [StrategyPhase.COMPLETED]: 3,
  [StrategyPhase.CANCELLED]: 3,
};

export const isTerminal = (phase: StrategyPhase): boolean =>
  phase === StrategyPhase.COMPLETED || phase === StrategyPhase.CANCELLED;

export type OptionPreference = OptionType | 'ANY';

export interface StrategyConfig {
  index: IndexName;
  entryTime: string;          // HH:MM IST
  lookbackMinutes: number;
  targetPremium: number;
  stopLossPercent: number;
  optionType: OptionPreference;
}

export type CompletionReason = 'STOP_LOSS' | 'MARKET_CLOSE' | 'NO_DATA' | 'REMOVED';

export interface StrategyContext {
  id: string;
  config: StrategyConfig;
  tradingDay: string;         // IST YYYY-MM-DD
  createdAt: number;

  phase: StrategyPhase;

  // Resolver output, in resolver order
  candidates: Instrument[];
  candidateTokens: Set<number>;
  spotPrice: number;
  atmStrike: number;
  expiry: string;

  lookbackWindow: TrackingWindow;
  monitoringWindow: TrackingWindow;
  lookbackTracker: LowHighTracker;
  monitoringTracker: LowHighTracker;

  // Assigned once, on entry into MONITORING
  selectedInstrument: Instrument | null;
  entryPrice: number | null;
  entryLow: number | null;
  entryTs: number | null;
  lastPrice: number | null;

  completedAt: number | null;
  completionReason: CompletionReason | null;
}
