// src/marketClock.ts
// IST has no DST, so a fixed offset is enough for all session arithmetic.
export const IST_OFFSET_MS = 5.5 * 60 * 60 * 1000;

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// Deterministic clock for tests and tick replay.
export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(ts: number): void {
    this.current = ts;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export function minuteKeyIst(tsMs: number): { datePart: string; minuteKey: string } {
  const ist = new Date(tsMs + IST_OFFSET_MS);
  const iso = ist.toISOString(); // YYYY-MM-DDTHH:mm:ss.sssZ
  const datePart = iso.slice(0, 10);
  const timePart = iso.slice(11, 16);
  return { datePart, minuteKey: `${datePart} ${timePart}` };
}

export function istDateKey(tsMs: number): string {
  return minuteKeyIst(tsMs).datePart;
}

const HH_MM = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isHhMm(value: string): boolean {
  return HH_MM.test(value);
}

export function parseHhMm(value: string): number {
  const m = HH_MM.exec(value);
  if (!m) throw new Error(`Invalid HH:MM time: ${value}`);
  return Number(m[1]) * 60 + Number(m[2]);
}

export function formatHhMm(minutesOfDay: number): string {
  const clamped = Math.max(0, Math.min(24 * 60 - 1, minutesOfDay));
  const h = Math.floor(clamped / 60);
  const m = clamped % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

// Epoch ms of an IST wall-clock time on an IST trading day (YYYY-MM-DD).
export function istTimeOnDay(dateKey: string, minutesOfDay: number): number {
  const [y, mo, d] = dateKey.split('-').map(Number);
  return Date.UTC(y, mo - 1, d, 0, minutesOfDay) - IST_OFFSET_MS;
}

export function istHhMmToTs(dateKey: string, hhmm: string): number {
  return istTimeOnDay(dateKey, parseHhMm(hhmm));
}
