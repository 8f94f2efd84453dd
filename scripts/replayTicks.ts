import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Diagnostics } from '../src/diagnostics';
import { getIndexBySpotToken } from '../src/indices';
import { catalogFilePath, loadCatalogFile } from '../src/instruments';
import { describeError } from '../src/logger';
import { ManualClock, istHhMmToTs } from '../src/marketClock';
import { createStrategySchema } from '../src/strategy';
import { StrategyManager } from '../src/strategyManager';
import { archiveFilePath, parseArchiveLines } from '../src/tickArchive';
import { IndexName, NotificationDraft, Tick } from '../src/types';

const strategiesFileSchema = z.array(createStrategySchema);

function usage(): never {
  // eslint-disable-next-line no-console
  console.log(
    [
      'Usage:',
      '  node dist/scripts/replayTicks.js --date YYYY-MM-DD --strategies strategies.json [--archiveDir logs/ticks] [--start 09:15] [--close 15:30]',
      '',
      'Input files (written by the live tracker):',
      '  <archiveDir>/ticks-YYYY-MM-DD.csv',
      '  <archiveDir>/instruments-YYYY-MM-DD.json',
      '',
      'strategies.json is a list of { index, entryTime, lookbackMinutes, targetPremium, stopLossPercent, optionType?, spotPrice? }.',
      'Without spotPrice, the first archived spot tick of the index is used.',
      '',
      'Output:',
      '  Creates a new folder under replay-output/ with notifications.json and strategies.json.',
    ].join('\n'),
  );
  process.exit(2);
}

function getArg(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

function firstSpotPrices(ticks: Tick[]): Map<IndexName, number> {
  const out = new Map<IndexName, number>();
  for (const t of ticks) {
    const index = getIndexBySpotToken(t.token);
    if (index && !out.has(index.name)) out.set(index.name, t.ltp);
  }
  return out;
}

async function main(): Promise<void> {
  const date = getArg('--date');
  const strategiesPath = getArg('--strategies');
  const archiveDir = getArg('--archiveDir') ?? path.join('logs', 'ticks');
  const start = getArg('--start') ?? '09:15';
  const close = getArg('--close') ?? '15:30';

  if (!date || !/^\d{4}-\d{2}-\d{2}$/.test(date) || !strategiesPath) usage();

  const configs = strategiesFileSchema.parse(JSON.parse(fs.readFileSync(strategiesPath, 'utf8')));
  const catalog = loadCatalogFile(catalogFilePath(archiveDir, date));
  const ticksPath = archiveFilePath(archiveDir, date);
  const ticks = fs.existsSync(ticksPath) ? parseArchiveLines(fs.readFileSync(ticksPath, 'utf8')) : [];
  ticks.sort((a, b) => a.exchangeTs - b.exchangeTs);

  // eslint-disable-next-line no-console
  console.log(`Loaded ${ticks.length} ticks and ${catalog.size} contracts for ${date}`);

  const clock = new ManualClock(istHhMmToTs(date, start));
  const notifications: NotificationDraft[] = [];
  let seq = 0;
  const manager = new StrategyManager({
    clock,
    catalog,
    diagnostics: new Diagnostics(),
    publish: (draft) => {
      notifications.push(draft);
    },
    marketClose: close,
    nearThreshold: 15,
    strikesRange: 15,
    // Replayed ticks are stamped by the clock that drives them.
    clockSkewToleranceMs: Number.POSITIVE_INFINITY,
    retentionMinutes: 24 * 60,
    phaseIntervalMs: 1_000,
    idFactory: () => {
      seq += 1;
      return `replay-${seq}`;
    },
  });

  const spots = firstSpotPrices(ticks);
  for (const { spotPrice, ...config } of configs) {
    const price = spotPrice ?? spots.get(config.index);
    try {
      const view = await manager.create(config, { spotPrice: price });
      // eslint-disable-next-line no-console
      console.log(`Created ${view.id}: ${config.index} @ ${config.entryTime} (ATM ${view.atmStrike}, ${view.candidateCount} contracts)`);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(`Skipped ${config.index} @ ${config.entryTime}: ${describeError(err)}`);
    }
  }

  for (const tick of ticks) {
    if (tick.exchangeTs > clock.now()) clock.set(tick.exchangeTs);
    await manager.tickPhases();
    await manager.handleTick(tick);
  }
  clock.set(Math.max(clock.now(), istHhMmToTs(date, close)));
  await manager.tickPhases();

  const runId = `${date}-${Date.now()}`;
  const outDir = path.join('replay-output', runId);
  ensureDir(outDir);
  fs.writeFileSync(path.join(outDir, 'notifications.json'), JSON.stringify(notifications, null, 2), 'utf8');
  fs.writeFileSync(path.join(outDir, 'strategies.json'), JSON.stringify(manager.list(), null, 2), 'utf8');

  for (const s of manager.list()) {
    const pos = s.position;
    // eslint-disable-next-line no-console
    console.log(
      `${s.id} ${s.phase}${s.completionReason ? ` (${s.completionReason})` : ''}` +
        (pos ? ` ${pos.instrument.tradingSymbol} entry ${pos.entryPrice} last ${pos.lastPrice ?? '-'} pnl ${pos.pnlPercent ?? '-'}%` : ''),
    );
  }
  // eslint-disable-next-line no-console
  console.log(`Replay complete: ${notifications.length} notifications. Output in ${path.resolve(outDir)}`);
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error('[replay] fatal', describeError(e));
  process.exit(1);
});
