// src/logger.ts
import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

// Format timestamp in Indian time (Asia/Kolkata) for readability
const logFormat = printf(info => {
  const tsRaw = (info.timestamp as string) ?? '';
  let tsIst = tsRaw;
  try {
    const d = new Date(tsRaw);
    tsIst = d.toLocaleString('en-IN', {
      timeZone: 'Asia/Kolkata',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    });
  } catch {
    // fall back to raw timestamp on any error
    tsIst = tsRaw;
  }
  return `${tsIst} [${info.level}] ${info.message}`;
});

// Ring of recent tracker logs for GET /logs
const MAX_IN_MEMORY_LOGS = 500;
const inMemoryLogs: string[] = [];

const logFile = process.env.LOG_FILE ?? 'logs/tracker.log';

const consoleTransport = new winston.transports.Console({
  format: combine(colorize(), timestamp(), logFormat),
});

// LOG_FILE= (empty) keeps logs on the console only
const transports = logFile.trim()
  ? [consoleTransport, new winston.transports.File({ filename: logFile.trim() })]
  : [consoleTransport];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'debug',
  format: combine(timestamp(), logFormat),
  transports,
});

const remember = (line: string): void => {
  inMemoryLogs.push(line);
  if (inMemoryLogs.length > MAX_IN_MEMORY_LOGS) {
    inMemoryLogs.shift();
  }
};

const formatLine = (msg: string, ctx?: unknown): string =>
  ctx !== undefined ? `${msg} ${JSON.stringify(ctx)}` : msg;

export const logState = (msg: string, ctx?: unknown): void => {
  const line = formatLine(msg, ctx);
  logger.debug(line);
  remember(line);
};

export const logWarn = (msg: string, ctx?: unknown): void => {
  const line = formatLine(msg, ctx);
  logger.warn(line);
  remember(`WARN ${line}`);
};

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export const getRecentLogs = (): string[] => {
  return inMemoryLogs;
};
