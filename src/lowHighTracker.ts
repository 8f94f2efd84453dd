import { isInsideWindow, isWindowExpired } from './trackingWindow';
import { ExtremeEvent, TrackerState, TrackingWindow } from './types';

export interface TrackerUpdate {
  state: TrackerState | null;  // null when the sample was outside the window
  event: ExtremeEvent | null;
}

export interface TrackerEntry {
  token: number;
  window: TrackingWindow;
  state: TrackerState;
}

// Drop from oldLow to newPrice in percent; undefined unless oldLow > 0.
export const dropPercent = (oldLow: number, newPrice: number): number | null =>
  oldLow > 0 ? ((oldLow - newPrice) / oldLow) * 100 : null;

/**
 * Running low/high per (instrument, window).
 *
 * Keys are structured: token first, then the window object itself. A new
 * low fires only on a strictly lower price, so a plateau at the low (or a
 * duplicated tick) never re-fires.
 */
export class LowHighTracker {
  private readonly states = new Map<number, Map<TrackingWindow, TrackerState>>();

  update(
    token: number,
    window: TrackingWindow,
    price: number,
    at: number,
  ): TrackerUpdate {
    if (!isInsideWindow(window, at)) return { state: null, event: null };

    let byWindow = this.states.get(token);
    if (!byWindow) {
      byWindow = new Map();
      this.states.set(token, byWindow);
    }

    const existing = byWindow.get(window);
    if (!existing) {
      const created: TrackerState = {
        low: price,
        high: price,
        firstPrice: price,
        currentPrice: price,
        sampleCount: 1,
        firstUpdateTs: at,
        lastUpdateTs: at,
        frozen: false,
      };
      byWindow.set(window, created);
      return { state: { ...created }, event: null };
    }

    if (existing.frozen) return { state: { ...existing }, event: null };

    existing.sampleCount += 1;
    existing.currentPrice = price;
    existing.lastUpdateTs = at;

    let event: ExtremeEvent | null = null;
    if (price < existing.low) {
      event = { kind: 'NEW_LOW', token, oldValue: existing.low, newValue: price, at };
      existing.low = price;
    } else if (price > existing.high) {
      event = { kind: 'NEW_HIGH', token, oldValue: existing.high, newValue: price, at };
      existing.high = price;
    }

    return { state: { ...existing }, event };
  }

  get(token: number, window: TrackingWindow): TrackerState | undefined {
    const state = this.states.get(token)?.get(window);
    return state ? { ...state } : undefined;
  }

  // Freezes every state whose window has ended as of nowTs.
  freezeExpired(nowTs: number): number {
    let frozen = 0;
    for (const byWindow of this.states.values()) {
      for (const [window, state] of byWindow) {
        if (!state.frozen && isWindowExpired(window, nowTs)) {
          state.frozen = true;
          frozen += 1;
        }
      }
    }
    return frozen;
  }

  entries(): TrackerEntry[] {
    const out: TrackerEntry[] = [];
    for (const [token, byWindow] of this.states) {
      for (const [window, state] of byWindow) {
        out.push({ token, window, state: { ...state } });
      }
    }
    return out;
  }

  // Restores a checkpointed state under a live window object.
  restore(token: number, window: TrackingWindow, state: TrackerState): void {
    let byWindow = this.states.get(token);
    if (!byWindow) {
      byWindow = new Map();
      this.states.set(token, byWindow);
    }
    byWindow.set(window, { ...state });
  }

  dropWindow(window: TrackingWindow): void {
    for (const [token, byWindow] of this.states) {
      byWindow.delete(window);
      if (!byWindow.size) this.states.delete(token);
    }
  }
}
