/**
 * Numeric helpers shared by the estimators.
 */

import type { PricePoint } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DAYS_PER_YEAR = 365;

// Uniform generator in [0, 1)
export type RandomSource = () => number;

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1). Zero for fewer than two values.
 */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Nearest-rank percentile on an ascending array (q in [0, 1]).
 */
export function percentileOfSorted(sorted: number[], q: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.min(sorted.length - 1, Math.floor(sorted.length * q));
  return sorted[idx];
}

/**
 * Standard normal draw (Box-Muller).
 */
export function standardNormal(random: RandomSource): number {
  let u = 0;
  while (u === 0) u = random();
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Log returns scaled to a one-day horizon, so irregular sampling is comparable.
 */
export function dailyEquivalentReturns(points: PricePoint[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const curr = points[i];
    if (prev.price <= 0 || curr.price <= 0) continue;

    const dtDays = (curr.timestamp - prev.timestamp) / DAY_MS;
    if (dtDays <= 0) continue;

    returns.push(Math.log(curr.price / prev.price) / Math.sqrt(dtDays));
  }
  return returns;
}

/**
 * Annualized volatility of a price series, or null when fewer than two returns exist.
 */
export function annualizedVolatility(points: PricePoint[]): number | null {
  const returns = dailyEquivalentReturns(points);
  if (returns.length < 2) return null;
  return sampleStdDev(returns) * Math.sqrt(DAYS_PER_YEAR);
}

/**
 * Points whose timestamp falls within `windowMs` of the last point.
 */
export function trailingWindow(points: PricePoint[], windowMs: number): PricePoint[] {
  if (points.length === 0) return [];
  const cutoff = points[points.length - 1].timestamp - windowMs;
  return points.filter((p) => p.timestamp >= cutoff);
}

export { DAY_MS, DAYS_PER_YEAR };
