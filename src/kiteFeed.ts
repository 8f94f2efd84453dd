import { KiteTicker } from 'kiteconnect';
import { z } from 'zod';
import { describeError, logState, logWarn } from './logger';
import { Clock, systemClock } from './marketClock';
import { Tick } from './types';

const kiteTickSchema = z.object({
  instrument_token: z.number(),
  last_price: z.number(),
  exchange_timestamp: z.date().optional(),
  last_trade_time: z.date().optional(),
});

// LTP-mode ticks carry no exchange timestamp; the receive time stands in.
export function toTicks(raw: unknown, receivedTs: number): Tick[] {
  if (!Array.isArray(raw)) return [];
  const out: Tick[] = [];
  for (const item of raw) {
    const parsed = kiteTickSchema.safeParse(item);
    if (!parsed.success || !(parsed.data.last_price > 0)) continue;
    const stamp = parsed.data.exchange_timestamp ?? parsed.data.last_trade_time;
    out.push({
      token: parsed.data.instrument_token,
      ltp: parsed.data.last_price,
      exchangeTs: stamp ? stamp.getTime() : receivedTs,
      receivedTs,
    });
  }
  return out;
}

export interface KiteFeedOptions {
  apiKey: string;
  accessToken: string;
  tokens: number[];
  onTick: (tick: Tick) => void;
  clock?: Clock;
}

/**
 * KiteTicker in LTP mode. The tick callback only hands ticks to the ingestor;
 * all tracking work happens off this path.
 */
export class KiteFeed {
  private ticker: InstanceType<typeof KiteTicker> | null = null;
  private isConnected = false;
  private readonly tokens: number[];

  constructor(private readonly opts: KiteFeedOptions) {
    this.tokens = [...new Set(opts.tokens)];
  }

  get connected(): boolean {
    return this.isConnected;
  }

  start(): void {
    if (this.ticker) return;
    const clock = this.opts.clock ?? systemClock;
    const ticker = new KiteTicker({
      api_key: this.opts.apiKey,
      access_token: this.opts.accessToken,
    });
    this.ticker = ticker;

    ticker.on('connect', () => {
      this.isConnected = true;
      logState('[kite-feed] connected; subscribing', { tokens: this.tokens.length });
      this.applySubscription();
    });

    ticker.on('disconnect', (err: unknown) => {
      this.isConnected = false;
      logWarn('[kite-feed] disconnected', { error: describeError(err ?? '') });
    });

    ticker.on('error', (err: unknown) => {
      logWarn('[kite-feed] error', { error: describeError(err ?? '') });
    });

    ticker.on('reconnect', (attempt: unknown, interval: unknown) => {
      logState('[kite-feed] reconnecting', { attempt, interval });
    });

    ticker.on('noreconnect', () => {
      this.isConnected = false;
      logWarn('[kite-feed] gave up reconnecting');
    });

    ticker.on('ticks', (ticks: unknown) => {
      for (const tick of toTicks(ticks, clock.now())) this.opts.onTick(tick);
    });

    ticker.connect();
  }

  stop(): void {
    if (!this.ticker) return;
    this.ticker.disconnect();
    this.ticker = null;
    this.isConnected = false;
  }

  private applySubscription(): void {
    const ticker = this.ticker;
    if (!ticker || !this.tokens.length) return;
    ticker.subscribe(this.tokens);
    try {
      ticker.setMode(ticker.modeLTP, this.tokens);
    } catch (e) {
      logWarn('[kite-feed] setMode failed (continuing)', { error: describeError(e) });
    }
  }
}
