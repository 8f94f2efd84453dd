import { describe, expect, it } from 'vitest';
import { ResolutionError } from '../src/errors';
import { InstrumentCatalog } from '../src/instruments';
import { atmStrike, nearestExpiry, resolveInstruments } from '../src/instrumentResolver';
import { DAY, NEXT_EXPIRY, at, niftyCatalog, niftyInstruments } from './helpers';

describe('atmStrike', () => {
  it('rounds spot to the nearest strike step', () => {
    expect(atmStrike(26220, 50)).toBe(26200);
    expect(atmStrike(26230, 50)).toBe(26250);
    expect(atmStrike(59940, 100)).toBe(59900);
  });
});

describe('nearestExpiry', () => {
  it('keeps an expiry live until the close of its expiry day', () => {
    const catalog = niftyCatalog();
    expect(nearestExpiry(catalog, 'NIFTY', at('15:29'))).toBe(DAY);
    expect(nearestExpiry(catalog, 'NIFTY', at('15:30'))).toBe(NEXT_EXPIRY);
  });

  it('returns null when every expiry has passed', () => {
    const catalog = new InstrumentCatalog(niftyInstruments(26000, 26400, [DAY]));
    expect(nearestExpiry(catalog, 'NIFTY', at('16:00'))).toBeNull();
  });
});

describe('resolveInstruments', () => {
  it('returns ATM plus 15 strikes each side, interleaved by distance', () => {
    const res = resolveInstruments(niftyCatalog(), 'NIFTY', 26220, at('09:45'));

    expect(res.atmStrike).toBe(26200);
    expect(res.expiry).toBe(DAY);
    expect(res.instruments).toHaveLength(32);
    expect(res.instruments.slice(0, 4).map((i) => `${i.strike}${i.optionType}`)).toEqual([
      '26200CE',
      '26200PE',
      '26250CE',
      '26150PE',
    ]);
    expect(res.instruments[30].strike).toBe(26950);
    expect(res.instruments[31].strike).toBe(25450);
  });

  it('is deterministic for the same inputs', () => {
    const catalog = niftyCatalog();
    const a = resolveInstruments(catalog, 'NIFTY', 26220, at('09:45'));
    const b = resolveInstruments(catalog, 'NIFTY', 26220, at('09:45'));
    expect(a).toEqual(b);
  });

  it('skips contracts missing from the catalog', () => {
    const catalog = new InstrumentCatalog(niftyInstruments(26100, 26300, [DAY]));
    const res = resolveInstruments(catalog, 'NIFTY', 26210, at('09:45'));
    expect(res.instruments.map((i) => `${i.strike}${i.optionType}`)).toEqual([
      '26200CE',
      '26200PE',
      '26250CE',
      '26150PE',
      '26300CE',
      '26100PE',
    ]);
  });

  it('honours a smaller strikes range', () => {
    const res = resolveInstruments(niftyCatalog(), 'NIFTY', 26220, at('09:45'), 1);
    expect(res.instruments).toHaveLength(4);
  });

  it('throws ResolutionError when the index has no contracts', () => {
    expect(() => resolveInstruments(niftyCatalog(), 'BANKNIFTY', 59900, at('09:45'))).toThrow(
      ResolutionError,
    );
  });

  it('throws ResolutionError for a non-positive spot', () => {
    expect(() => resolveInstruments(niftyCatalog(), 'NIFTY', 0, at('09:45'))).toThrow(ResolutionError);
  });

  it('throws ResolutionError when nothing resolves around ATM', () => {
    const catalog = new InstrumentCatalog(niftyInstruments(25400, 25500, [DAY]));
    expect(() => resolveInstruments(catalog, 'NIFTY', 27000, at('09:45'), 2)).toThrow(ResolutionError);
  });
});
