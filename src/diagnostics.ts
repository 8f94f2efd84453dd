import { TickDropped } from './types';

const MAX_DROP_RECORDS = 100;

export interface DiagnosticsSnapshot {
  ticksReceived: number;
  ticksProcessed: number;
  ticksDropped: number;
  ticksSkewIgnored: number;
  tickErrors: number;
  notificationsDropped: number;
  notificationSinkErrors: number;
  checkpointFailures: number;
  recentDrops: TickDropped[];
}

export type Counter = Exclude<keyof DiagnosticsSnapshot, 'recentDrops'>;

// Process-wide counters; nothing that is dropped or ignored goes uncounted.
export class Diagnostics {
  private readonly counters: Record<Counter, number> = {
    ticksReceived: 0,
    ticksProcessed: 0,
    ticksDropped: 0,
    ticksSkewIgnored: 0,
    tickErrors: 0,
    notificationsDropped: 0,
    notificationSinkErrors: 0,
    checkpointFailures: 0,
  };

  private readonly recentDrops: TickDropped[] = [];

  increment(counter: Counter, by = 1): void {
    this.counters[counter] += by;
  }

  get(counter: Counter): number {
    return this.counters[counter];
  }

  recordTickDropped(drop: TickDropped): void {
    this.counters.ticksDropped += 1;
    this.recentDrops.push(drop);
    if (this.recentDrops.length > MAX_DROP_RECORDS) this.recentDrops.shift();
  }

  snapshot(): DiagnosticsSnapshot {
    return { ...this.counters, recentDrops: [...this.recentDrops] };
  }
}
