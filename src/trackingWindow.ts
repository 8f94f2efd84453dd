// src/trackingWindow.ts
import { TrackingWindow } from './types';

export const DEFAULT_GRANULARITY_MS = 1_000;

export const createWindow = (
  startTs: number,
  endTs: number,
  granularityMs = DEFAULT_GRANULARITY_MS,
): TrackingWindow => {
  if (endTs < startTs) {
    throw new Error(`Window end ${endTs} is before start ${startTs}`);
  }
  return { startTs, endTs, granularityMs };
};

// Half-open: a sample at endTs belongs to whatever window opens there.
export const isInsideWindow = (window: TrackingWindow, at: number): boolean =>
  at >= window.startTs && at < window.endTs;

export const isWindowExpired = (window: TrackingWindow, nowTs: number): boolean =>
  nowTs >= window.endTs;
