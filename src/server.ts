import express from 'express';
import cors from 'cors';
import { z, ZodError } from 'zod';
import { Diagnostics } from './diagnostics';
import { TrackerError } from './errors';
import { describeError, getRecentLogs, logState, logWarn } from './logger';
import { Clock } from './marketClock';
import { NotificationFeed } from './notificationFeed';
import { StateSnapshot } from './stateSnapshot';
import { createStrategySchema, previewRequestSchema, strategyPatchSchema } from './strategy';
import { StrategyManager } from './strategyManager';
import { TickIngestor } from './tickIngestor';

export interface ApiDeps {
  manager: StrategyManager;
  ingestor: TickIngestor;
  notifications: NotificationFeed;
  diagnostics: Diagnostics;
  clock: Clock;
  getState: () => StateSnapshot;
  corsOrigins: '*' | string[];
}

const tickBodySchema = z.object({
  token: z.number().int().positive(),
  ltp: z.number().positive(),
  ts: z.number().optional(),
});

const limitQuerySchema = z.coerce.number().int().min(1).max(1000).optional();

type AsyncRoute = (req: express.Request, res: express.Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error handler by itself.
const route = (fn: AsyncRoute): express.RequestHandler => (req, res, next) => {
  fn(req, res).catch(next);
};

export function createApp(deps: ApiDeps): express.Express {
  const { manager } = deps;
  const app = express();

  app.use(cors({ origin: deps.corsOrigins, credentials: deps.corsOrigins !== '*' }));
  app.use(express.json());

  // GET /state → full dashboard projection
  app.get('/state', (_req, res) => {
    res.json(deps.getState());
  });

  app.get('/strategies', (_req, res) => {
    res.json({ strategies: manager.list() });
  });

  app.get('/strategies/:id', (req, res) => {
    res.json(manager.get(req.params.id));
  });

  app.post('/strategies', route(async (req, res) => {
    const { spotPrice, ...config } = createStrategySchema.parse(req.body);
    const view = await manager.create(config, { spotPrice });
    res.status(201).json(view);
  }));

  // Read-only lookback over archived ticks, for the strategy builder
  app.post('/strategies/preview', (req, res) => {
    res.json(manager.getPreview(previewRequestSchema.parse(req.body)));
  });

  app.patch('/strategies/:id', route(async (req, res) => {
    const patch = strategyPatchSchema.parse(req.body);
    res.json(await manager.update(req.params.id, patch));
  }));

  app.delete('/strategies/:id', route(async (req, res) => {
    res.json(await manager.remove(req.params.id));
  }));

  app.get('/notifications', (req, res) => {
    const limit = limitQuerySchema.parse(req.query.limit);
    const rows = deps.notifications.recent(limit);
    res.json({ count: rows.length, rows });
  });

  app.get('/diagnostics', (_req, res) => {
    res.json(deps.diagnostics.snapshot());
  });

  // GET /logs  → recent tracker logs for UI
  app.get('/logs', (_req, res) => {
    res.json({ logs: getRecentLogs() });
  });

  // Manual tick injection; same path as the Kite feed.
  app.post('/kite/tick', (req, res) => {
    const body = tickBodySchema.parse(req.body);
    const now = deps.clock.now();
    deps.ingestor.ingest({
      token: body.token,
      ltp: body.ltp,
      exchangeTs: body.ts ?? now,
      receivedTs: now,
    });
    res.status(202).json({ ok: true, queued: deps.ingestor.queuedCount });
  });

  // --- Error handler: bad JSON, validation, tracker errors ---
  const onError: express.ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) return next(err);

    const isBadJson =
      err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
    if (isBadJson) {
      logState('Invalid JSON body rejected', {
        method: req.method,
        path: req.path,
        contentType: req.headers['content-type'] || null,
      });
      return res.status(400).json({ error: 'invalid_json_body' });
    }

    if (err instanceof ZodError) {
      return res.status(400).json({
        error: 'validation_failed',
        issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      });
    }

    if (err instanceof TrackerError) {
      return res.status(err.statusCode).json({ error: err.code, message: err.message });
    }

    logWarn('Unhandled API error', { method: req.method, path: req.path, error: describeError(err) });
    return res.status(500).json({ error: 'internal_error' });
  };
  app.use(onError);

  return app;
}
