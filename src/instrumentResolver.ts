import { ResolutionError, InstrumentNotFoundError } from './errors';
import { INDEX_SPECS } from './indices';
import { InstrumentCatalog } from './instruments';
import { istHhMmToTs } from './marketClock';
import { IndexName, Instrument, OptionType } from './types';

export const DEFAULT_STRIKES_RANGE = 15;
// Contracts stop trading at the close of their expiry day.
const EXPIRY_CLOSE = '15:30';

export interface Resolution {
  index: IndexName;
  spotPrice: number;
  atmStrike: number;
  expiry: string;
  instruments: Instrument[];
}

export const atmStrike = (spotPrice: number, strikeStep: number): number =>
  Math.round(spotPrice / strikeStep) * strikeStep;

export function nearestExpiry(
  catalog: InstrumentCatalog,
  index: IndexName,
  asOf: number,
): string | null {
  for (const expiry of catalog.expiries(index)) {
    if (asOf < istHhMmToTs(expiry, EXPIRY_CLOSE)) return expiry;
  }
  return null;
}

/**
 * Candidate option contracts around ATM for the nearest live expiry.
 *
 * Order is interleaved by distance from ATM (ATM CE, ATM PE, ATM+1 CE,
 * ATM-1 PE, ...); strategy selection breaks exact ties by this order.
 * Contracts missing from the catalog are skipped.
 */
export function resolveInstruments(
  catalog: InstrumentCatalog,
  index: IndexName,
  spotPrice: number,
  asOf: number,
  strikesRange = DEFAULT_STRIKES_RANGE,
): Resolution {
  if (!Number.isFinite(spotPrice) || spotPrice <= 0) {
    throw new ResolutionError(`Invalid spot price ${spotPrice} for ${index}`, index);
  }

  const expiry = nearestExpiry(catalog, index, asOf);
  if (!expiry) {
    throw new ResolutionError(`No unexpired contract for ${index}`, index);
  }

  const step = INDEX_SPECS[index].strikeStep;
  const atm = atmStrike(spotPrice, step);
  const instruments: Instrument[] = [];

  const push = (strike: number, optionType: OptionType): void => {
    try {
      instruments.push(catalog.lookup(index, expiry, strike, optionType));
    } catch (err) {
      if (!(err instanceof InstrumentNotFoundError)) throw err;
    }
  };

  for (let i = 0; i <= strikesRange; i += 1) {
    push(atm + i * step, 'CE');
    push(atm - i * step, 'PE');
  }

  if (!instruments.length) {
    throw new ResolutionError(
      `No contracts around ATM ${atm} for ${index} expiry ${expiry}`,
      index,
    );
  }

  return { index, spotPrice, atmStrike: atm, expiry, instruments };
}
