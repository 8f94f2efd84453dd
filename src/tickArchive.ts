import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { describeError, logState, logWarn } from './logger';
import { istDateKey, minuteKeyIst } from './marketClock';
import { Tick } from './types';

const HEADER = 'timeIst,exchangeTs,receivedTs,token,ltp';
const FLUSH_AT_ROWS = 500;
const DAY_MS = 24 * 60 * 60 * 1000;

const rowSchema = z.tuple([z.string(), z.number(), z.number(), z.number().int(), z.number()]);

// Read side used for lookback seeding and previews.
export interface TickHistory {
  // Ticks for the given tokens with startTs <= exchangeTs < endTs, oldest first.
  ticksBetween(tokens: ReadonlySet<number>, startTs: number, endTs: number): Tick[];
}

export class MemoryTickHistory implements TickHistory {
  private readonly ticks: Tick[] = [];

  record(tick: Tick): void {
    this.ticks.push(tick);
  }

  ticksBetween(tokens: ReadonlySet<number>, startTs: number, endTs: number): Tick[] {
    return this.ticks
      .filter((t) => tokens.has(t.token) && t.exchangeTs >= startTs && t.exchangeTs < endTs)
      .sort((a, b) => a.exchangeTs - b.exchangeTs);
  }
}

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

function csvCell(value: unknown): string {
  // Always quote strings, escape quotes (via JSON.stringify).
  return JSON.stringify(value ?? '');
}

export function archiveFilePath(dir: string, dateKey: string): string {
  return path.join(dir, `ticks-${dateKey}.csv`);
}

export function formatArchiveRow(tick: Tick): string {
  return [minuteKeyIst(tick.exchangeTs).minuteKey, tick.exchangeTs, tick.receivedTs, tick.token, tick.ltp]
    .map(csvCell)
    .join(',');
}

// Each row is a list of JSON values, so wrapping it in [] parses it.
export function parseArchiveLines(raw: string): Tick[] {
  const out: Tick[] = [];
  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed === HEADER) continue;
    let cells: unknown;
    try {
      cells = JSON.parse(`[${trimmed}]`);
    } catch {
      continue; // torn last line after a crash
    }
    const parsed = rowSchema.safeParse(cells);
    if (!parsed.success) continue;
    const [, exchangeTs, receivedTs, token, ltp] = parsed.data;
    out.push({ token, ltp, exchangeTs, receivedTs });
  }
  return out;
}

/**
 * Append-only daily CSV of every ingested tick (ticks-YYYY-MM-DD.csv, IST
 * day of the exchange timestamp). Writes are buffered and flushed on a timer
 * or once enough rows pile up; a failed write is logged and never reaches
 * the ingest path.
 */
export class TickArchive implements TickHistory {
  private readonly pending = new Map<string, string[]>();
  private pendingRows = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly dir: string,
    private readonly flushIntervalMs = 1_000,
  ) {}

  get directory(): string {
    return this.dir;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.flush(), this.flushIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.flush();
  }

  append(tick: Tick): void {
    const dateKey = istDateKey(tick.exchangeTs);
    const rows = this.pending.get(dateKey) ?? [];
    rows.push(formatArchiveRow(tick));
    this.pending.set(dateKey, rows);
    this.pendingRows += 1;
    if (this.pendingRows >= FLUSH_AT_ROWS) this.flush();
  }

  flush(): void {
    for (const [dateKey, rows] of this.pending) {
      if (!rows.length) continue;
      const filePath = archiveFilePath(this.dir, dateKey);
      try {
        ensureDir(this.dir);
        const body = `${rows.join('\n')}\n`;
        if (!fs.existsSync(filePath)) fs.appendFileSync(filePath, `${HEADER}\n${body}`, 'utf8');
        else fs.appendFileSync(filePath, body, 'utf8');
      } catch (err) {
        logWarn('Tick archive write failed', { filePath, rows: rows.length, error: describeError(err) });
      }
    }
    this.pending.clear();
    this.pendingRows = 0;
  }

  ticksBetween(tokens: ReadonlySet<number>, startTs: number, endTs: number): Tick[] {
    if (endTs <= startTs) return [];
    this.flush();

    const out: Tick[] = [];
    for (const dateKey of this.daysBetween(startTs, endTs)) {
      const filePath = archiveFilePath(this.dir, dateKey);
      if (!fs.existsSync(filePath)) continue;
      for (const tick of parseArchiveLines(fs.readFileSync(filePath, 'utf8'))) {
        if (tokens.has(tick.token) && tick.exchangeTs >= startTs && tick.exchangeTs < endTs) {
          out.push(tick);
        }
      }
    }
    return out.sort((a, b) => a.exchangeTs - b.exchangeTs);
  }

  // Deletes archive days older than keepDays before nowTs.
  prune(keepDays: number, nowTs: number): string[] {
    if (!fs.existsSync(this.dir)) return [];
    const cutoff = istDateKey(nowTs - keepDays * DAY_MS);
    const removed: string[] = [];
    for (const name of fs.readdirSync(this.dir)) {
      const m = /^ticks-(\d{4}-\d{2}-\d{2})\.csv$/.exec(name);
      if (!m || m[1] >= cutoff) continue;
      fs.unlinkSync(path.join(this.dir, name));
      removed.push(name);
    }
    if (removed.length) logState('Pruned tick archive', { removed });
    return removed;
  }

  private daysBetween(startTs: number, endTs: number): string[] {
    const days: string[] = [];
    const last = istDateKey(endTs - 1);
    for (let ts = startTs; ; ts += DAY_MS) {
      const key = istDateKey(ts);
      if (!days.includes(key)) days.push(key);
      if (key >= last) break;
    }
    return days;
  }
}
