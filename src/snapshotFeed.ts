import { describeError, logWarn } from './logger';

export type SnapshotListener<T> = (snapshot: T) => void;

/**
 * Push-only projection for dashboards. markDirty() is called on every state
 * change; listeners get at most one snapshot per throttle interval, and always
 * the latest one after a burst. throttleMs = 0 publishes synchronously.
 */
export class SnapshotFeed<T> {
  private readonly listeners: SnapshotListener<T>[] = [];
  private timer: NodeJS.Timeout | null = null;
  private lastPublishedAt = 0;
  private dirty = false;

  constructor(
    private readonly build: () => T,
    private readonly throttleMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  subscribe(listener: SnapshotListener<T>): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  latest(): T {
    return this.build();
  }

  markDirty(): void {
    if (!this.listeners.length) return;
    if (this.throttleMs <= 0) {
      this.publish();
      return;
    }

    this.dirty = true;
    if (this.timer) return;
    const wait = Math.max(0, this.lastPublishedAt + this.throttleMs - this.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      if (this.dirty) this.publish();
    }, wait);
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.dirty = false;
  }

  private publish(): void {
    this.dirty = false;
    this.lastPublishedAt = this.now();
    const snapshot = this.build();
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot);
      } catch (err) {
        logWarn('Snapshot listener failed', { error: describeError(err) });
      }
    }
  }
}
