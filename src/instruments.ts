import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { InstrumentNotFoundError } from './errors';
import { INDEX_NAMES } from './indices';
import { IndexName, Instrument, OptionType } from './types';

export const instrumentSchema = z.object({
  token: z.number().int().positive(),
  exchange: z.enum(['NFO', 'BFO']),
  tradingSymbol: z.string().min(1),
  index: z.enum(INDEX_NAMES),
  expiry: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  strike: z.number().positive(),
  optionType: z.enum(['CE', 'PE']),
  lotSize: z.number().int().positive(),
});

const catalogFileSchema = z.object({
  savedAt: z.string(),
  instruments: z.array(instrumentSchema),
});

type StrikeRow = Partial<Record<OptionType, Instrument>>;

/**
 * Contract lookup over one day's instrument dump.
 *
 * Contracts are keyed index → expiry → strike → option type, so a lookup never
 * depends on how a trading symbol happens to be spelled.
 */
export class InstrumentCatalog {
  private readonly byToken = new Map<number, Instrument>();
  private readonly contracts = new Map<IndexName, Map<string, Map<number, StrikeRow>>>();

  constructor(instruments: Instrument[]) {
    for (const inst of instruments) {
      this.byToken.set(inst.token, inst);

      let byExpiry = this.contracts.get(inst.index);
      if (!byExpiry) {
        byExpiry = new Map();
        this.contracts.set(inst.index, byExpiry);
      }
      let byStrike = byExpiry.get(inst.expiry);
      if (!byStrike) {
        byStrike = new Map();
        byExpiry.set(inst.expiry, byStrike);
      }
      const row = byStrike.get(inst.strike) ?? {};
      row[inst.optionType] = inst;
      byStrike.set(inst.strike, row);
    }
  }

  get size(): number {
    return this.byToken.size;
  }

  lookup(
    index: IndexName,
    expiry: string,
    strike: number,
    optionType: OptionType,
  ): Instrument {
    const found = this.contracts.get(index)?.get(expiry)?.get(strike)?.[optionType];
    if (!found) throw new InstrumentNotFoundError(index, expiry, strike, optionType);
    return found;
  }

  getByToken(token: number): Instrument | undefined {
    return this.byToken.get(token);
  }

  // Ascending YYYY-MM-DD
  expiries(index: IndexName): string[] {
    const byExpiry = this.contracts.get(index);
    if (!byExpiry) return [];
    return [...byExpiry.keys()].sort();
  }

  all(): Instrument[] {
    return [...this.byToken.values()];
  }
}

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

export function catalogFilePath(dir: string, dateKey: string): string {
  return path.join(dir, `instruments-${dateKey}.json`);
}

// Snapshot of the day's catalog so archived ticks can be replayed later.
export function saveCatalogFile(filePath: string, catalog: InstrumentCatalog): void {
  ensureDir(path.dirname(filePath));
  const body = { savedAt: new Date().toISOString(), instruments: catalog.all() };
  fs.writeFileSync(filePath, JSON.stringify(body), 'utf8');
}

export function loadCatalogFile(filePath: string): InstrumentCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const parsed = catalogFileSchema.parse(raw);
  return new InstrumentCatalog(parsed.instruments);
}
