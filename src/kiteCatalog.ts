import { KiteConnect } from 'kiteconnect';
import { z } from 'zod';
import { INDEX_SPECS, isIndexName } from './indices';
import { InstrumentCatalog } from './instruments';
import { logState, logWarn } from './logger';
import { istDateKey } from './marketClock';
import { IndexName, Instrument, OptionExchange } from './types';

// The slice of KiteConnect this tracker uses; tests pass a stub.
export interface KiteRestClient {
  getInstruments(exchange: OptionExchange): Promise<unknown>;
  getLTP(instruments: string[]): Promise<unknown>;
}

export function createKiteClient(apiKey: string, accessToken: string): KiteRestClient {
  const kc = new KiteConnect({ api_key: apiKey, access_token: accessToken });
  return {
    getInstruments: (exchange) => kc.getInstruments(exchange),
    getLTP: (instruments) => kc.getLTP(instruments),
  };
}

const kiteInstrumentSchema = z.object({
  instrument_token: z.coerce.number().int().positive(),
  tradingsymbol: z.string(),
  name: z.string(),
  expiry: z.union([z.date(), z.string()]),
  strike: z.coerce.number(),
  lot_size: z.coerce.number().int(),
  instrument_type: z.string(),
  exchange: z.string(),
});

const ltpResponseSchema = z.record(
  z.object({
    instrument_token: z.number(),
    last_price: z.number(),
  }),
);

const expiryKey = (expiry: Date | string): string | null => {
  if (expiry instanceof Date) {
    return Number.isNaN(expiry.getTime()) ? null : istDateKey(expiry.getTime());
  }
  return /^\d{4}-\d{2}-\d{2}/.test(expiry) ? expiry.slice(0, 10) : null;
};

// One row of Kite's instrument dump, or null when it is not an index option we track.
export function toInstrument(row: unknown, indices: readonly IndexName[]): Instrument | null {
  const parsed = kiteInstrumentSchema.safeParse(row);
  if (!parsed.success) return null;
  const r = parsed.data;

  if (r.instrument_type !== 'CE' && r.instrument_type !== 'PE') return null;
  if (!isIndexName(r.name) || !indices.includes(r.name)) return null;
  const indexSpec = INDEX_SPECS[r.name];
  if (r.exchange !== indexSpec.optionExchange) return null;

  const expiry = expiryKey(r.expiry);
  if (!expiry || !(r.strike > 0) || !(r.lot_size > 0)) return null;

  return {
    token: r.instrument_token,
    exchange: indexSpec.optionExchange,
    tradingSymbol: r.tradingsymbol,
    index: r.name,
    expiry,
    strike: r.strike,
    optionType: r.instrument_type,
    lotSize: r.lot_size,
  };
}

export function buildCatalogFromDump(rows: unknown[], indices: readonly IndexName[]): InstrumentCatalog {
  const instruments: Instrument[] = [];
  for (const row of rows) {
    const inst = toInstrument(row, indices);
    if (inst) instruments.push(inst);
  }
  return new InstrumentCatalog(instruments);
}

export async function fetchKiteCatalog(
  kc: KiteRestClient,
  indices: readonly IndexName[],
): Promise<InstrumentCatalog> {
  const exchanges = [...new Set(indices.map((i) => INDEX_SPECS[i].optionExchange))];
  const rows: unknown[] = [];
  for (const exchange of exchanges) {
    const dump = await kc.getInstruments(exchange);
    if (!Array.isArray(dump)) throw new Error(`Instrument dump for ${exchange} is not a list`);
    rows.push(...dump);
  }

  const catalog = buildCatalogFromDump(rows, indices);
  logState('Instrument catalog loaded from Kite', {
    exchanges,
    rows: rows.length,
    options: catalog.size,
  });
  return catalog;
}

export async function fetchSpotPrices(
  kc: KiteRestClient,
  indices: readonly IndexName[],
): Promise<Partial<Record<IndexName, number>>> {
  const quotes = indices.map((i) => INDEX_SPECS[i].spotQuote);
  const parsed = ltpResponseSchema.safeParse(await kc.getLTP(quotes));
  if (!parsed.success) {
    logWarn('Unexpected getLTP response', { issues: parsed.error.issues.length });
    return {};
  }

  const out: Partial<Record<IndexName, number>> = {};
  for (const index of indices) {
    const quote = parsed.data[INDEX_SPECS[index].spotQuote];
    if (quote && quote.last_price > 0) out[index] = quote.last_price;
  }
  return out;
}
