import fetch from 'node-fetch';
import { Diagnostics } from './diagnostics';
import { describeError, logWarn, logger } from './logger';
import { NotificationDraft, NotificationEvent } from './types';

export interface NotificationSink {
  name: string;
  deliver(event: NotificationEvent): void | Promise<void>;
}

export interface NotificationFeedOptions {
  maxQueue: number;
  diagnostics: Diagnostics;
  keepRecent?: number;
}

export const formatNotification = (event: NotificationEvent): string => {
  const sym = event.instrument.tradingSymbol;
  switch (event.kind) {
    case 'ENTRY_SIGNAL':
      return `[${event.strategyId}] ENTRY ${sym} @ ${event.newValue.toFixed(2)} (lookback low ${event.oldValue?.toFixed(2) ?? '-'})`;
    case 'STOP_LOSS_HIT':
      return `[${event.strategyId}] STOP LOSS ${sym} @ ${event.newValue.toFixed(2)} (entry ${event.oldValue?.toFixed(2) ?? '-'})`;
    case 'NEW_LOW':
    case 'NEAR_TARGET':
    default: {
      const drop = event.dropPercent === null ? '' : ` -${event.dropPercent.toFixed(2)}%`;
      const near = event.nearTarget ? ' near target' : '';
      return `[${event.strategyId}] ${event.kind} ${sym} ${event.oldValue?.toFixed(2) ?? '-'} -> ${event.newValue.toFixed(2)}${drop}${near}`;
    }
  }
};

export const logSink: NotificationSink = {
  name: 'log',
  deliver: (event) => {
    logger.info(formatNotification(event));
  },
};

export const webhookSink = (url: string): NotificationSink => ({
  name: 'webhook',
  deliver: async (event) => {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ message: formatNotification(event), event }),
    });
    if (!res.ok) throw new Error(`Webhook responded ${res.status}`);
  },
});

/**
 * Fire-and-forget notification delivery.
 *
 * publish() stamps a sequence number and enqueues; sinks are called in
 * publish order on a background loop. A full queue drops its oldest event.
 */
export class NotificationFeed {
  private readonly queue: NotificationEvent[] = [];
  private readonly sinks: NotificationSink[] = [];
  private readonly recentEvents: NotificationEvent[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly keepRecent: number;
  private seq = 0;
  private pumping = false;

  constructor(private readonly opts: NotificationFeedOptions) {
    this.keepRecent = opts.keepRecent ?? 200;
  }

  addSink(sink: NotificationSink): () => void {
    this.sinks.push(sink);
    return () => {
      const idx = this.sinks.indexOf(sink);
      if (idx !== -1) this.sinks.splice(idx, 1);
    };
  }

  publish(draft: NotificationDraft): NotificationEvent {
    this.seq += 1;
    const event: NotificationEvent = { seq: this.seq, ...draft };

    this.recentEvents.push(event);
    if (this.recentEvents.length > this.keepRecent) this.recentEvents.shift();

    if (this.queue.length >= this.opts.maxQueue) {
      const dropped = this.queue.shift();
      this.opts.diagnostics.increment('notificationsDropped');
      logWarn('Notification queue full, dropped oldest', { seq: dropped?.seq });
    }
    this.queue.push(event);
    this.schedule();
    return event;
  }

  // Newest last.
  recent(limit?: number): NotificationEvent[] {
    return limit === undefined ? [...this.recentEvents] : this.recentEvents.slice(-limit);
  }

  drain(): Promise<void> {
    if (!this.pumping && !this.queue.length) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.pumping) return;
    this.pumping = true;
    setImmediate(() => {
      this.pump().catch((err) => {
        this.pumping = false;
        logWarn('Notification pump failed', { error: describeError(err) });
      });
    });
  }

  private async pump(): Promise<void> {
    for (;;) {
      const event = this.queue.shift();
      if (!event) break;
      for (const sink of [...this.sinks]) {
        try {
          await sink.deliver(event);
        } catch (err) {
          this.opts.diagnostics.increment('notificationSinkErrors');
          logWarn('Notification sink failed', { sink: sink.name, seq: event.seq, error: describeError(err) });
        }
      }
    }
    this.pumping = false;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
