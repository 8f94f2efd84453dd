// src/pnl.ts

// Round to 2 decimal places
export const round2 = (value: number): number =>
  Math.round(value * 100) / 100;

// Long option position: premium paid at entry, marked at the latest price.
export const pnlPercent = (entryPrice: number, price: number): number =>
  ((price - entryPrice) / entryPrice) * 100;

export const stopLossPrice = (entryPrice: number, stopLossPercent: number): number =>
  round2(entryPrice * (1 - stopLossPercent / 100));

// Checked against the rounded level shown on the dashboard, not the raw percent.
export const isStopLossHit = (
  entryPrice: number,
  price: number,
  stopLossPercent: number,
): boolean => entryPrice > 0 && price <= stopLossPrice(entryPrice, stopLossPercent);

// Rupee P&L for one lot
export const lotPnl = (entryPrice: number, price: number, lotSize: number): number =>
  round2((price - entryPrice) * lotSize);
