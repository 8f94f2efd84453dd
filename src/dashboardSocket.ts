import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { z, ZodError } from 'zod';
import { TrackerError } from './errors';
import { describeError, logState, logWarn, logger } from './logger';
import { NotificationSink } from './notificationFeed';
import { SnapshotFeed } from './snapshotFeed';
import { StateSnapshot } from './stateSnapshot';
import { createStrategySchema, previewRequestSchema, strategyPatchSchema } from './strategy';
import { StrategyManager } from './strategyManager';

const actionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('create_strategy'), strategy: createStrategySchema }),
  z.object({ action: z.literal('update_strategy'), strategyId: z.string().min(1), patch: strategyPatchSchema }),
  z.object({ action: z.literal('remove_strategy'), strategyId: z.string().min(1) }),
  z.object({ action: z.literal('get_preview'), request: previewRequestSchema }),
]);

export type DashboardReply =
  | { type: 'reply'; status: 'ok'; action: string; data: unknown }
  | { type: 'reply'; status: 'error'; action: string | null; error: string; message: string };

const actionName = (raw: unknown): string | null => {
  const parsed = z.object({ action: z.string() }).safeParse(raw);
  return parsed.success ? parsed.data.action : null;
};

// One dashboard request in, one reply out. Never throws.
export async function handleDashboardAction(
  manager: StrategyManager,
  raw: unknown,
): Promise<DashboardReply> {
  try {
    const msg = actionSchema.parse(raw);
    switch (msg.action) {
      case 'create_strategy': {
        const { spotPrice, ...config } = msg.strategy;
        const data = await manager.create(config, { spotPrice });
        return { type: 'reply', status: 'ok', action: msg.action, data };
      }
      case 'update_strategy': {
        const data = await manager.update(msg.strategyId, msg.patch);
        return { type: 'reply', status: 'ok', action: msg.action, data };
      }
      case 'remove_strategy': {
        const data = await manager.remove(msg.strategyId);
        return { type: 'reply', status: 'ok', action: msg.action, data };
      }
      case 'get_preview': {
        const data = manager.getPreview(msg.request);
        return { type: 'reply', status: 'ok', action: msg.action, data };
      }
    }
  } catch (err) {
    const action = actionName(raw);
    if (err instanceof ZodError) {
      const first = err.issues[0];
      const where = first && first.path.length ? `${first.path.join('.')}: ` : '';
      return { type: 'reply', status: 'error', action, error: 'validation_failed', message: `${where}${first?.message ?? 'invalid message'}` };
    }
    if (err instanceof TrackerError) {
      return { type: 'reply', status: 'error', action, error: err.code, message: err.message };
    }
    logWarn('Dashboard action failed', { action, error: describeError(err) });
    return { type: 'reply', status: 'error', action, error: 'internal_error', message: describeError(err) };
  }
}

export interface DashboardSocketOptions {
  server: http.Server;
  manager: StrategyManager;
  snapshots: SnapshotFeed<StateSnapshot>;
  path?: string;
}

/**
 * Push channel for the dashboard on /ws: state snapshots and notifications
 * go out to every client; strategy actions come in.
 */
export class DashboardSocket {
  private readonly wss: WebSocketServer;
  private readonly unsubscribe: () => void;

  constructor(private readonly opts: DashboardSocketOptions) {
    this.wss = new WebSocketServer({ server: opts.server, path: opts.path ?? '/ws' });

    this.wss.on('connection', (ws) => {
      logState('[dashboard] client connected', { clients: this.wss.clients.size });
      this.send(ws, { type: 'state', data: opts.snapshots.latest() });

      ws.on('message', (raw) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw.toString());
        } catch {
          this.send(ws, { type: 'reply', status: 'error', action: null, error: 'invalid_json', message: 'Message is not JSON' });
          return;
        }
        handleDashboardAction(opts.manager, parsed)
          .then((reply) => this.send(ws, reply))
          .catch((err) => logWarn('[dashboard] reply failed', { error: describeError(err) }));
      });

      ws.on('close', () => {
        logState('[dashboard] client disconnected', { clients: this.wss.clients.size });
      });

      ws.on('error', (err) => {
        logger.warn(`[dashboard] socket error: ${err.message}`);
      });
    });

    this.unsubscribe = opts.snapshots.subscribe((snapshot) => {
      this.broadcast({ type: 'state', data: snapshot });
    });
  }

  get clientCount(): number {
    return this.wss.clients.size;
  }

  // Notification sink that forwards every event to connected dashboards.
  readonly sink: NotificationSink = {
    name: 'dashboard',
    deliver: (event) => {
      this.broadcast({ type: 'notification', data: event });
    },
  };

  close(): Promise<void> {
    this.unsubscribe();
    for (const client of this.wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private broadcast(message: unknown): void {
    if (!this.wss.clients.size) return;
    const text = JSON.stringify(message);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(text);
    }
  }

  private send(ws: WebSocket, message: unknown): void {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(message));
  }
}
