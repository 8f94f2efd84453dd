import fs from 'fs';
import http from 'http';
import { AppConfig, loadConfig, loadEnvFile } from './config';
import { CheckpointStore } from './checkpointStore';
import { DashboardSocket } from './dashboardSocket';
import { Diagnostics } from './diagnostics';
import { INDEX_SPECS } from './indices';
import { nearestExpiry } from './instrumentResolver';
import {
  InstrumentCatalog,
  catalogFilePath,
  loadCatalogFile,
  saveCatalogFile,
} from './instruments';
import { KiteRestClient, createKiteClient, fetchKiteCatalog, fetchSpotPrices } from './kiteCatalog';
import { KiteFeed } from './kiteFeed';
import { describeError, logState, logWarn, logger } from './logger';
import { istDateKey, systemClock } from './marketClock';
import { NotificationFeed, logSink, webhookSink } from './notificationFeed';
import { createApp } from './server';
import { SnapshotFeed } from './snapshotFeed';
import { StateSnapshot, buildStateSnapshot } from './stateSnapshot';
import { StrategyManager } from './strategyManager';
import { TickArchive } from './tickArchive';
import { TickIngestor } from './tickIngestor';

// Spot tokens plus every contract of each index's nearest expiry.
function feedTokens(catalog: InstrumentCatalog, config: AppConfig, now: number): number[] {
  const tokens: number[] = [];
  for (const index of config.market.indices) {
    tokens.push(INDEX_SPECS[index].spotToken);
    const expiry = nearestExpiry(catalog, index, now);
    if (!expiry) continue;
    for (const inst of catalog.all()) {
      if (inst.index === index && inst.expiry === expiry) tokens.push(inst.token);
    }
  }
  return tokens;
}

async function loadCatalog(
  config: AppConfig,
  kc: KiteRestClient | null,
  dateKey: string,
): Promise<InstrumentCatalog> {
  const snapshotPath = catalogFilePath(config.storage.tickArchiveDir, dateKey);
  if (kc) {
    const catalog = await fetchKiteCatalog(kc, config.market.indices);
    saveCatalogFile(snapshotPath, catalog);
    return catalog;
  }
  if (fs.existsSync(snapshotPath)) {
    const catalog = loadCatalogFile(snapshotPath);
    logState('Instrument catalog loaded from snapshot', { snapshotPath, instruments: catalog.size });
    return catalog;
  }
  logWarn('No Kite credentials and no catalog snapshot; strategies cannot resolve yet', { snapshotPath });
  return new InstrumentCatalog([]);
}

async function main(): Promise<void> {
  const envFile = loadEnvFile();
  const config = loadConfig();
  const clock = systemClock;
  const now = clock.now();
  logState('Tracker starting', { envFile, indices: config.market.indices, port: config.port });

  const diagnostics = new Diagnostics();

  const archive = new TickArchive(config.storage.tickArchiveDir);
  archive.start();
  archive.prune(config.storage.tickArchiveKeepDays, now);

  const { apiKey, accessToken } = config.kite;
  const kc = apiKey && accessToken ? createKiteClient(apiKey, accessToken) : null;
  const catalog = await loadCatalog(config, kc, istDateKey(now));

  const notifications = new NotificationFeed({
    maxQueue: config.notify.queueMax,
    diagnostics,
  });
  notifications.addSink(logSink);
  if (config.notify.webhookUrl) notifications.addSink(webhookSink(config.notify.webhookUrl));

  const store = new CheckpointStore({
    dir: config.storage.checkpointDir,
    diagnostics,
    onDurabilityChange: () => snapshots.markDirty(),
  });
  let feed: KiteFeed | null = null;

  const manager = new StrategyManager({
    clock,
    catalog,
    diagnostics,
    publish: (draft) => {
      notifications.publish(draft);
    },
    history: archive,
    marketClose: config.market.close,
    nearThreshold: config.notify.nearThreshold,
    strikesRange: config.market.strikesRange,
    clockSkewToleranceMs: config.engine.clockSkewToleranceMs,
    retentionMinutes: config.engine.retentionMinutes,
    phaseIntervalMs: config.engine.phaseIntervalMs,
    onChange: () => snapshots.markDirty(),
  });

  const getState = (): StateSnapshot =>
    buildStateSnapshot({
      manager,
      diagnostics,
      durability: { degraded: store.degraded, savedAt: store.savedAt },
      feed: feed ?? undefined,
    });
  const snapshots = new SnapshotFeed(getState, config.dashboard.throttleMs);

  manager.restore(store.load());

  if (kc) {
    const spots = await fetchSpotPrices(kc, config.market.indices);
    for (const index of config.market.indices) {
      const price = spots[index];
      if (price !== undefined) await manager.onSpotPrice(index, price, now);
    }
  }

  const ingestor = new TickIngestor({
    maxQueue: config.engine.tickQueueMax,
    workers: config.engine.tickWorkers,
    diagnostics,
    clock,
  });
  ingestor.subscribe((tick) => archive.append(tick));
  ingestor.subscribe((tick) => manager.handleTick(tick));

  const app = createApp({
    manager,
    ingestor,
    notifications,
    diagnostics,
    clock,
    getState,
    corsOrigins: config.dashboard.corsOrigins,
  });
  const server = http.createServer(app);
  const dashboard = new DashboardSocket({ server, manager, snapshots });
  notifications.addSink(dashboard.sink);

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  logger.info(`Tracker API listening at http://localhost:${config.port} (dashboard socket on /ws)`);

  if (apiKey && accessToken) {
    feed = new KiteFeed({
      apiKey,
      accessToken,
      tokens: feedTokens(catalog, config, now),
      onTick: (tick) => ingestor.ingest(tick),
      clock,
    });
    feed.start();
  } else {
    logWarn('KITE_API_KEY / KITE_ACCESS_TOKEN missing; live feed disabled (POST /kite/tick still works)');
  }

  manager.start();

  let saving = false;
  const checkpoint = async (): Promise<void> => {
    if (saving) return;
    saving = true;
    try {
      await store.save(manager.toCheckpoint(), clock.now());
    } finally {
      saving = false;
    }
  };
  const checkpointTimer = setInterval(() => {
    checkpoint().catch((err) => logWarn('Checkpoint tick failed', { error: describeError(err) }));
  }, config.storage.checkpointIntervalMs);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}; shutting down`);

    feed?.stop();
    manager.stop();
    clearInterval(checkpointTimer);
    await ingestor.drain();
    ingestor.stop();
    await notifications.drain();
    await checkpoint();
    archive.stop();
    snapshots.stop();
    await dashboard.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error(`Shutdown failed: ${describeError(err)}`);
          process.exit(1);
        });
    });
  }
}

main().catch((err) => {
  logger.error(`Tracker failed to start: ${describeError(err)}`);
  process.exit(1);
});
