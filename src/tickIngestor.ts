import { Diagnostics } from './diagnostics';
import { describeError, logWarn } from './logger';
import { Clock } from './marketClock';
import { Tick } from './types';

export type TickSubscriber = (tick: Tick) => void | Promise<void>;

export interface TickIngestorOptions {
  maxQueue: number;
  workers: number;
  diagnostics: Diagnostics;
  clock: Clock;
}

interface Partition {
  id: number;
  queue: Tick[];
  draining: boolean;
}

/**
 * Decouples the transport callback from tracker work.
 *
 * ingest() only enqueues. Ticks are partitioned by instrument token; each
 * partition drains on its own async loop, awaiting every subscriber before
 * the next tick, so one instrument is always delivered in arrival order while
 * other partitions keep moving.
 */
export class TickIngestor {
  private readonly partitions: Partition[];
  private readonly subscribers: TickSubscriber[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  // Queued ticks per token, across all partitions.
  private readonly perToken = new Map<number, number>();
  private queued = 0;
  private stopped = false;

  constructor(private readonly opts: TickIngestorOptions) {
    if (opts.workers < 1) throw new Error('TickIngestor needs at least one worker');
    if (opts.maxQueue < 1) throw new Error('TickIngestor maxQueue must be positive');
    this.partitions = Array.from({ length: opts.workers }, (_, id) => ({
      id,
      queue: [],
      draining: false,
    }));
  }

  get queuedCount(): number {
    return this.queued;
  }

  subscribe(subscriber: TickSubscriber): () => void {
    this.subscribers.push(subscriber);
    return () => {
      const idx = this.subscribers.indexOf(subscriber);
      if (idx !== -1) this.subscribers.splice(idx, 1);
    };
  }

  ingest(tick: Tick): void {
    if (this.stopped) return;
    this.opts.diagnostics.increment('ticksReceived');

    const partition = this.partitionFor(tick.token);
    if (this.queued >= this.opts.maxQueue) this.shed(partition, tick.token);

    partition.queue.push(tick);
    this.queued += 1;
    this.perToken.set(tick.token, (this.perToken.get(tick.token) ?? 0) + 1);
    this.schedule(partition);
  }

  // Resolves once every queued tick has been delivered.
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  stop(): void {
    this.stopped = true;
  }

  private partitionFor(token: number): Partition {
    return this.partitions[Math.abs(token) % this.partitions.length];
  }

  /**
   * Last value wins. The victim is the oldest queued tick of the incoming
   * instrument, else the oldest tick of any instrument that still has a newer
   * one queued. Only when every queued tick is its instrument's latest does
   * the head of the longest partition go.
   */
  private shed(partition: Partition, token: number): void {
    const victim =
      this.findVictim([partition], (t) => t.token === token) ??
      this.findVictim(this.partitions, (t) => (this.perToken.get(t.token) ?? 0) > 1);

    const target = victim ?? {
      partition: this.partitions.reduce((a, b) => (b.queue.length > a.queue.length ? b : a)),
      idx: 0,
    };

    const [dropped] = target.partition.queue.splice(target.idx, 1);
    if (!dropped) return;
    this.dequeued(dropped);
    this.opts.diagnostics.recordTickDropped({
      token: dropped.token,
      droppedExchangeTs: dropped.exchangeTs,
      at: this.opts.clock.now(),
    });
  }

  private findVictim(
    partitions: Partition[],
    match: (tick: Tick) => boolean,
  ): { partition: Partition; idx: number } | null {
    let best: { partition: Partition; idx: number; receivedTs: number } | null = null;
    for (const partition of partitions) {
      const idx = partition.queue.findIndex(match);
      if (idx === -1) continue;
      const { receivedTs } = partition.queue[idx];
      if (!best || receivedTs < best.receivedTs) best = { partition, idx, receivedTs };
    }
    return best;
  }

  private dequeued(tick: Tick): void {
    this.queued -= 1;
    const left = (this.perToken.get(tick.token) ?? 1) - 1;
    if (left > 0) this.perToken.set(tick.token, left);
    else this.perToken.delete(tick.token);
  }

  private schedule(partition: Partition): void {
    if (partition.draining) return;
    partition.draining = true;
    setImmediate(() => {
      this.drainPartition(partition).catch((err) => {
        partition.draining = false;
        logWarn('Tick partition drain failed', { partition: partition.id, error: describeError(err) });
      });
    });
  }

  private async drainPartition(partition: Partition): Promise<void> {
    for (;;) {
      const tick = partition.queue.shift();
      if (!tick) break;
      this.dequeued(tick);

      for (const subscriber of [...this.subscribers]) {
        try {
          await subscriber(tick);
        } catch (err) {
          // Per-tick faults stay with the tick; the ingest path keeps going.
          this.opts.diagnostics.increment('tickErrors');
          logWarn('Tick subscriber failed', { token: tick.token, error: describeError(err) });
        }
      }
      this.opts.diagnostics.increment('ticksProcessed');
    }

    partition.draining = false;
    if (this.isIdle()) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  private isIdle(): boolean {
    return this.queued === 0 && this.partitions.every((p) => !p.draining);
  }
}
