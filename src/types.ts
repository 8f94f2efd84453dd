// src/types.ts
export type IndexName = 'NIFTY' | 'BANKNIFTY' | 'FINNIFTY' | 'SENSEX';

export type OptionType = 'CE' | 'PE';

export type OptionExchange = 'NFO' | 'BFO';

export interface Instrument {
  token: number;          // Kite instrument_token
  exchange: OptionExchange;
  tradingSymbol: string;  // e.g. "NIFTY25D2326200CE"
  index: IndexName;
  expiry: string;         // YYYY-MM-DD
  strike: number;
  optionType: OptionType;
  lotSize: number;
}

export interface Tick {
  token: number;
  ltp: number;          // last traded price
  exchangeTs: number;   // timestamp in ms
  receivedTs: number;
}

export interface TrackingWindow {
  startTs: number;
  endTs: number;        // exclusive
  granularityMs: number;
}

export interface TrackerState {
  low: number;
  high: number;
  firstPrice: number;
  currentPrice: number;
  sampleCount: number;
  firstUpdateTs: number;
  lastUpdateTs: number;
  frozen: boolean;
}

export type ExtremeKind = 'NEW_LOW' | 'NEW_HIGH';

export interface ExtremeEvent {
  kind: ExtremeKind;
  token: number;
  oldValue: number;
  newValue: number;
  at: number;
}

export type NotificationKind =
  | 'NEW_LOW'
  | 'NEAR_TARGET'
  | 'STOP_LOSS_HIT'
  | 'ENTRY_SIGNAL';

export interface NotificationEvent {
  seq: number;
  strategyId: string;
  instrument: Instrument;
  kind: NotificationKind;
  oldValue: number | null;
  newValue: number;
  dropPercent: number | null;
  nearTarget: boolean;
  timestamp: number;
}

export interface TickDropped {
  token: number;
  droppedExchangeTs: number;
  at: number;
}

export type NotificationDraft = Omit<NotificationEvent, 'seq'>;
