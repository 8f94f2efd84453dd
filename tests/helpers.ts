import { InstrumentCatalog } from '../src/instruments';
import { istHhMmToTs } from '../src/marketClock';
import { Instrument, OptionType, Tick } from '../src/types';

export const DAY = '2025-12-23';
export const NEXT_EXPIRY = '2025-12-30';

export const at = (hhmm: string, seconds = 0, day = DAY): number =>
  istHhMmToTs(day, hhmm) + seconds * 1000;

// 26200CE → 262001, 26200PE → 262002; the later expiry uses 3 and 4.
export const tokenFor = (strike: number, type: OptionType, expiry = DAY): number =>
  strike * 10 + (type === 'CE' ? 1 : 2) + (expiry === DAY ? 0 : 2);

const niftyOption = (expiry: string, strike: number, optionType: OptionType): Instrument => ({
  token: tokenFor(strike, optionType, expiry),
  exchange: 'NFO',
  tradingSymbol: `NIFTY${expiry.slice(2, 4)}${expiry.slice(5, 7)}${expiry.slice(8, 10)}${strike}${optionType}`,
  index: 'NIFTY',
  expiry,
  strike,
  optionType,
  lotSize: 75,
});

export function niftyInstruments(
  fromStrike = 25400,
  toStrike = 27000,
  expiries: string[] = [DAY, NEXT_EXPIRY],
): Instrument[] {
  const out: Instrument[] = [];
  for (const expiry of expiries) {
    for (let strike = fromStrike; strike <= toStrike; strike += 50) {
      out.push(niftyOption(expiry, strike, 'CE'), niftyOption(expiry, strike, 'PE'));
    }
  }
  return out;
}

export const niftyCatalog = (fromStrike?: number, toStrike?: number): InstrumentCatalog =>
  new InstrumentCatalog(niftyInstruments(fromStrike, toStrike));

export const makeTick = (token: number, ltp: number, exchangeTs: number): Tick => ({
  token,
  ltp,
  exchangeTs,
  receivedTs: exchangeTs,
});
