import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { findEnvFile, loadConfig, loadEnvFile } from '../src/config';

describe('loadConfig', () => {
  it('fills defaults from an empty environment', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.kite).toEqual({ apiKey: null, accessToken: null });
    expect(config.market).toEqual({ close: '15:30', indices: ['NIFTY', 'BANKNIFTY'], strikesRange: 15 });
    expect(config.engine).toEqual({
      phaseIntervalMs: 1000,
      tickQueueMax: 10000,
      tickWorkers: 4,
      clockSkewToleranceMs: 5000,
      retentionMinutes: 1440,
    });
    expect(config.notify).toEqual({ queueMax: 1000, nearThreshold: 15, webhookUrl: null });
    expect(config.storage).toEqual({
      checkpointDir: 'state',
      checkpointIntervalMs: 5000,
      tickArchiveDir: 'logs/ticks',
      tickArchiveKeepDays: 7,
    });
    expect(config.dashboard).toEqual({ throttleMs: 250, corsOrigins: '*' });
  });

  it('coerces numbers and normalises the index list', () => {
    const config = loadConfig({
      PORT: '8080',
      INDICES: ' nifty, sensex,NIFTY ',
      NEAR_TARGET_THRESHOLD: '7.5',
      KITE_API_KEY: 'test-key',
      KITE_ACCESS_TOKEN: 'test-token',
    });
    expect(config.port).toBe(8080);
    expect(config.market.indices).toEqual(['NIFTY', 'SENSEX']);
    expect(config.notify.nearThreshold).toBe(7.5);
    expect(config.kite).toEqual({ apiKey: 'test-key', accessToken: 'test-token' });
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ PORT: '', MARKET_CLOSE: '  ', NOTIFY_WEBHOOK_URL: '' });
    expect(config.port).toBe(3000);
    expect(config.market.close).toBe('15:30');
    expect(config.notify.webhookUrl).toBeNull();
  });

  it('splits an explicit CORS origin list', () => {
    const config = loadConfig({ CORS_ORIGINS: 'http://a.test, http://b.test,' });
    expect(config.dashboard.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ INDICES: 'NIFTY,DOW' })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError);
    expect(() => loadConfig({ MARKET_CLOSE: '25:00' })).toThrow(ZodError);
    expect(() => loadConfig({ TICK_WORKERS: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ NOTIFY_WEBHOOK_URL: 'not a url' })).toThrow(ZodError);
  });
});

describe('env files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-'));
  });

  afterEach(() => {
    delete process.env.TRACKER_ENV_MARKER;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prefers .env.kite over .env', () => {
    expect(findEnvFile({}, dir)).toBeNull();

    fs.writeFileSync(path.join(dir, '.env'), 'PORT=1\n');
    expect(findEnvFile({}, dir)).toBe(path.join(dir, '.env'));

    fs.writeFileSync(path.join(dir, '.env.kite'), 'PORT=2\n');
    expect(findEnvFile({}, dir)).toBe(path.join(dir, '.env.kite'));
  });

  it('uses KITE_ENV_PATH when it names an existing file', () => {
    fs.writeFileSync(path.join(dir, '.env.kite'), 'PORT=2\n');
    fs.writeFileSync(path.join(dir, 'live.env'), 'PORT=3\n');

    expect(findEnvFile({ KITE_ENV_PATH: 'live.env' }, dir)).toBe(path.join(dir, 'live.env'));
    expect(findEnvFile({ KITE_ENV_PATH: 'missing.env' }, dir)).toBe(path.join(dir, '.env.kite'));
    expect(findEnvFile({ KITE_ENV_PATH: '  ' }, dir)).toBe(path.join(dir, '.env.kite'));
  });

  it('loads the file into the environment without overriding set values', () => {
    fs.writeFileSync(path.join(dir, '.env'), 'TRACKER_ENV_MARKER=from-file\n');
    expect(loadEnvFile(dir)).toBe(path.join(dir, '.env'));
    expect(process.env.TRACKER_ENV_MARKER).toBe('from-file');

    process.env.TRACKER_ENV_MARKER = 'from-shell';
    loadEnvFile(dir);
    expect(process.env.TRACKER_ENV_MARKER).toBe('from-shell');
  });
});
