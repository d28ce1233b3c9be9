/**
 * Signal Score
 *
 * 0-100 heuristic rating how promising a market looks before deep analysis:
 * - Whale consensus (40)
 * - 24h volume (20)
 * - Price trend aligned with whales (20)
 * - Liquidity (10)
 * - Time to close (10)
 */

import type { WhaleFlow } from '../analysis/types.js';
import { whaleYesShare } from '../analysis/holders.js';

export interface SignalScoreInput {
  whaleFlow: WhaleFlow | null;
  volume24h: number;
  liquidity: number;
  daysToClose: number;
  yesPrice: number;
  priceChange24h: number;     // Absolute YES delta
  priceChange7d: number;      // Absolute YES delta
}

export interface SignalScoreBreakdown {
  whale: number;
  volume: number;
  trend: number;
  liquidity: number;
  time: number;
  total: number;
}

// Below this total whale volume, consensus is not trusted
const MIN_WHALE_VOLUME_USD = 10_000;

// [minimum, points], checked top-down
const WHALE_CONSENSUS_TIERS: Array<[number, number]> = [
  [0.30, 40],
  [0.20, 32],
  [0.15, 26],
  [0.10, 20],
];

const VOLUME_TIERS: Array<[number, number]> = [
  [500_000, 20],
  [200_000, 17],
  [100_000, 14],
  [50_000, 11],
  [20_000, 8],
];

const LIQUIDITY_TIERS: Array<[number, number]> = [
  [100_000, 10],
  [50_000, 8],
  [20_000, 6],
  [10_000, 4],
];

function tierPoints(value: number, tiers: Array<[number, number]>, fallback: number): number {
  for (const [min, points] of tiers) {
    if (value >= min) return points;
  }
  return fallback;
}

/**
 * Relative change from an absolute delta: (now - before) / before
 */
export function relativeChange(currentPrice: number, delta: number): number {
  const before = currentPrice - delta;
  return before > 0 ? delta / before : 0;
}

export function whaleScore(flow: WhaleFlow | null, significantVolumeUsd = MIN_WHALE_VOLUME_USD): number {
  if (!flow || flow.totalVolume < significantVolumeUsd) return 10;
  const deviation = Math.abs(whaleYesShare(flow) - 0.5);
  return tierPoints(deviation, WHALE_CONSENSUS_TIERS, 12);
}

export function volumeScore(volume24h: number): number {
  return tierPoints(volume24h, VOLUME_TIERS, 5);
}

export function trendScore(change24h: number, change7d: number, consensus: number): number {
  // Score momentum toward the side whales favor
  const c24 = consensus < 0.5 ? -change24h : change24h;
  const c7 = consensus < 0.5 ? -change7d : change7d;

  if (c24 >= 0.05 && c24 <= 0.15 && c7 > 0) return 20;
  if (c24 >= 0.02 && c24 <= 0.20 && c7 >= 0) return 16;
  if (c24 > 0.25) return 10;
  if (c24 > 0) return 14;
  if (c24 > -0.05) return 10;
  return 6;
}

export function liquidityScore(liquidity: number): number {
  return tierPoints(liquidity, LIQUIDITY_TIERS, 2);
}

export function timeScore(daysToClose: number): number {
  if (daysToClose >= 2 && daysToClose <= 7) return 10;
  if (daysToClose > 7 && daysToClose <= 14) return 9;
  if (daysToClose >= 1 && daysToClose < 2) return 7;
  if (daysToClose > 14 && daysToClose <= 21) return 7;
  if (daysToClose > 21 && daysToClose <= 30) return 5;
  if (daysToClose < 1) return 3;
  return 4;
}

export function scoreBreakdown(input: SignalScoreInput, significantVolumeUsd = MIN_WHALE_VOLUME_USD): SignalScoreBreakdown {
  const consensus = whaleYesShare(input.whaleFlow);
  const whale = whaleScore(input.whaleFlow, significantVolumeUsd);
  const volume = volumeScore(input.volume24h);
  const trend = trendScore(
    relativeChange(input.yesPrice, input.priceChange24h),
    relativeChange(input.yesPrice, input.priceChange7d),
    consensus
  );
  const liquidity = liquidityScore(input.liquidity);
  const time = timeScore(input.daysToClose);

  return {
    whale,
    volume,
    trend,
    liquidity,
    time,
    total: Math.min(100, whale + volume + trend + liquidity + time),
  };
}

export function calculateSignalScore(input: SignalScoreInput, significantVolumeUsd = MIN_WHALE_VOLUME_USD): number {
  return scoreBreakdown(input, significantVolumeUsd).total;
}
