import { IndexName, OptionExchange } from './types';

export interface IndexSpec {
  name: IndexName;
  strikeStep: number;
  optionExchange: OptionExchange;
  spotToken: number;     // Kite token of the underlying index
  spotQuote: string;     // Kite quote key, e.g. "NSE:NIFTY 50"
}

export const INDEX_SPECS: Record<IndexName, IndexSpec> = {
  NIFTY: {
    name: 'NIFTY',
    strikeStep: 50,
    optionExchange: 'NFO',
    spotToken: 256265,
    spotQuote: 'NSE:NIFTY 50',
  },
  BANKNIFTY: {
    name: 'BANKNIFTY',
    strikeStep: 100,
    optionExchange: 'NFO',
    spotToken: 260105,
    spotQuote: 'NSE:NIFTY BANK',
  },
  FINNIFTY: {
    name: 'FINNIFTY',
    strikeStep: 50,
    optionExchange: 'NFO',
    spotToken: 257801,
    spotQuote: 'NSE:NIFTY FIN SERVICE',
  },
  SENSEX: {
    name: 'SENSEX',
    strikeStep: 100,
    optionExchange: 'BFO',
    spotToken: 265,
    spotQuote: 'BSE:SENSEX',
  },
};

export const INDEX_NAMES = ['NIFTY', 'BANKNIFTY', 'FINNIFTY', 'SENSEX'] as const;

export function isIndexName(value: string): value is IndexName {
  return INDEX_NAMES.some((name) => name === value);
}

const bySpotToken = new Map<number, IndexSpec>(
  Object.values(INDEX_SPECS).map((s) => [s.spotToken, s]),
);

export function getIndexBySpotToken(token: number): IndexSpec | undefined {
  return bySpotToken.get(token);
}
