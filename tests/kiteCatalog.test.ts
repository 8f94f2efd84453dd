import { describe, expect, it } from 'vitest';
import { KiteRestClient, buildCatalogFromDump, fetchKiteCatalog, fetchSpotPrices, toInstrument } from '../src/kiteCatalog';
import { OptionExchange } from '../src/types';

const row = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  instrument_token: 12345,
  exchange_token: 48,
  tradingsymbol: 'NIFTY25D2326200CE',
  name: 'NIFTY',
  last_price: 0,
  expiry: new Date('2025-12-23'),
  strike: 26200,
  tick_size: 0.05,
  lot_size: 75,
  instrument_type: 'CE',
  segment: 'NFO-OPT',
  exchange: 'NFO',
  ...overrides,
});

describe('toInstrument', () => {
  it('maps an index option row', () => {
    expect(toInstrument(row(), ['NIFTY'])).toEqual({
      token: 12345,
      exchange: 'NFO',
      tradingSymbol: 'NIFTY25D2326200CE',
      index: 'NIFTY',
      expiry: '2025-12-23',
      strike: 26200,
      optionType: 'CE',
      lotSize: 75,
    });
  });

  it('accepts string fields from a CSV dump', () => {
    const inst = toInstrument(
      row({ instrument_token: '12346', expiry: '2025-12-30', strike: '26250', lot_size: '75', instrument_type: 'PE' }),
      ['NIFTY'],
    );
    expect(inst).toMatchObject({ token: 12346, expiry: '2025-12-30', strike: 26250, optionType: 'PE' });
  });

  it('skips rows that are not tracked index options', () => {
    expect(toInstrument(row({ instrument_type: 'FUT' }), ['NIFTY'])).toBeNull();
    expect(toInstrument(row({ name: 'MIDCPNIFTY' }), ['NIFTY'])).toBeNull();
    expect(toInstrument(row({ name: 'BANKNIFTY' }), ['NIFTY'])).toBeNull();
    expect(toInstrument(row({ exchange: 'BFO' }), ['NIFTY'])).toBeNull();
    expect(toInstrument(row({ strike: 0 }), ['NIFTY'])).toBeNull();
    expect(toInstrument(row({ expiry: 'soon' }), ['NIFTY'])).toBeNull();
    expect(toInstrument({ tradingsymbol: 'X' }, ['NIFTY'])).toBeNull();
  });

  it('builds a catalog from a mixed dump', () => {
    const catalog = buildCatalogFromDump(
      [row(), row({ instrument_token: 12346, instrument_type: 'PE' }), row({ instrument_token: 1, instrument_type: 'FUT' })],
      ['NIFTY'],
    );
    expect(catalog.size).toBe(2);
    expect(catalog.lookup('NIFTY', '2025-12-23', 26200, 'PE').token).toBe(12346);
  });
});

describe('Kite REST helpers', () => {
  const stub = (dumps: Partial<Record<OptionExchange, unknown>>, ltp: unknown = {}) => {
    const calls: OptionExchange[] = [];
    const client: KiteRestClient = {
      getInstruments: async (exchange) => {
        calls.push(exchange);
        return dumps[exchange] ?? [];
      },
      getLTP: async () => ltp,
    };
    return { client, calls };
  };

  it('loads each option exchange once', async () => {
    const { client, calls } = stub({
      NFO: [row()],
      BFO: [row({ instrument_token: 999, name: 'SENSEX', exchange: 'BFO', strike: 85000, tradingsymbol: 'SENSEX25D2385000CE' })],
    });
    const catalog = await fetchKiteCatalog(client, ['NIFTY', 'BANKNIFTY', 'SENSEX']);
    expect(calls).toEqual(['NFO', 'BFO']);
    expect(catalog.size).toBe(2);
    expect(catalog.expiries('SENSEX')).toEqual(['2025-12-23']);
  });

  it('rejects a dump that is not a list', async () => {
    const { client } = stub({ NFO: { error: 'nope' } });
    await expect(fetchKiteCatalog(client, ['NIFTY'])).rejects.toThrow('Instrument dump for NFO is not a list');
  });

  it('reads spot prices by quote key', async () => {
    const { client } = stub({}, {
      'NSE:NIFTY 50': { instrument_token: 256265, last_price: 26220.5 },
      'NSE:NIFTY BANK': { instrument_token: 260105, last_price: 0 },
    });
    expect(await fetchSpotPrices(client, ['NIFTY', 'BANKNIFTY'])).toEqual({ NIFTY: 26220.5 });
  });

  it('returns no spot prices for an unexpected response', async () => {
    const { client } = stub({}, 'maintenance');
    expect(await fetchSpotPrices(client, ['NIFTY'])).toEqual({});
  });
});
