/**
 * Holders Scorer
 *
 * Rates the quality and conviction of each side's holders, then blends it
 * with whale tilt and the model probability into a 0-100 smart score.
 */

import type { HolderPosition, HoldersAnalysis, Outcome, SideStats, SmartScoreBreakdown, WhaleFlow } from './types.js';
import { median } from './stats.js';

export const HOLDER_THRESHOLDS = {
  ABOVE_5K: 5_000,
  ABOVE_10K: 10_000,
  ABOVE_50K: 50_000,
  SMART_5K_PNL: 5_000,
  SMART_10K_PNL: 10_000,
};

// Each quality pillar is worth up to 25 points
const PILLAR_POINTS = 25;
// 10% of holders above $10K fills the whale pillar
export const ABOVE_10K_POINTS_PER_PCT = 2.5;

const STANDARD_WEIGHTS = { holders: 0.4, tilt: 0.3, model: 0.3 };
const NO_HOLDER_WEIGHTS = { holders: 0, tilt: 0.5, model: 0.5 };

export function calculateSideStats(positions: HolderPosition[], side: Outcome): SideStats {
  const held = positions.filter((p) => p.side === side && p.shares > 0);
  const count = held.length;

  if (count === 0) {
    return {
      side,
      count: 0,
      medianPnl: 0,
      profitableCount: 0,
      profitablePct: 0,
      above5kCount: 0,
      above10kCount: 0,
      above50kCount: 0,
      above5kPct: 0,
      above10kPct: 0,
      smart5kCount: 0,
      smart10kCount: 0,
      topHolderAddress: '',
      topHolderProfit: 0,
    };
  }

  const countWhere = (predicate: (p: HolderPosition) => boolean): number => held.filter(predicate).length;

  const profitableCount = countWhere((p) => p.lifetimePnl > 0);
  const above5kCount = countWhere((p) => p.currentValue > HOLDER_THRESHOLDS.ABOVE_5K);
  const above10kCount = countWhere((p) => p.currentValue > HOLDER_THRESHOLDS.ABOVE_10K);

  const top = held.reduce((best, p) => (p.lifetimePnl > best.lifetimePnl ? p : best));

  return {
    side,
    count,
    medianPnl: median(held.map((p) => p.lifetimePnl)),
    profitableCount,
    profitablePct: (profitableCount / count) * 100,
    above5kCount,
    above10kCount,
    above50kCount: countWhere((p) => p.currentValue > HOLDER_THRESHOLDS.ABOVE_50K),
    above5kPct: (above5kCount / count) * 100,
    above10kPct: (above10kCount / count) * 100,
    smart5kCount: countWhere((p) => p.lifetimePnl > HOLDER_THRESHOLDS.SMART_5K_PNL),
    smart10kCount: countWhere((p) => p.lifetimePnl > HOLDER_THRESHOLDS.SMART_10K_PNL),
    topHolderAddress: top.wallet,
    topHolderProfit: top.lifetimePnl,
  };
}

/**
 * Holder quality for one side, 0-100
 */
export function holderQualityScore(stats: SideStats): number {
  if (stats.count === 0) return 0;

  const profitable = PILLAR_POINTS * Math.min(1, stats.profitablePct / 100);
  const whales = Math.min(PILLAR_POINTS, stats.above10kPct * ABOVE_10K_POINTS_PER_PCT);
  const medianPositive = stats.medianPnl > 0 ? PILLAR_POINTS : 0;
  const hasSuperWhale = stats.above50kCount > 0 ? PILLAR_POINTS : 0;

  return profitable + whales + medianPositive + hasSuperWhale;
}

/**
 * YES share of whale volume, 0.5 without flow
 */
export function whaleYesShare(flow: WhaleFlow | null): number {
  if (!flow || flow.totalVolume <= 0) return 0.5;
  return flow.yesVolume / flow.totalVolume;
}

export function scoreHolders(
  positions: HolderPosition[],
  whaleFlow: WhaleFlow | null,
  modelYesProb: number
): HoldersAnalysis {
  const yesStats = calculateSideStats(positions, 'YES');
  const noStats = calculateSideStats(positions, 'NO');
  const hasHolderData = yesStats.count > 0 || noStats.count > 0;
  const weights = hasHolderData ? STANDARD_WEIGHTS : NO_HOLDER_WEIGHTS;

  const yesShare = whaleYesShare(whaleFlow);

  const breakdownYes: SmartScoreBreakdown = {
    holders: hasHolderData ? holderQualityScore(yesStats) : 0,
    tilt: yesShare * 100,
    model: modelYesProb * 100,
  };
  const breakdownNo: SmartScoreBreakdown = {
    holders: hasHolderData ? holderQualityScore(noStats) : 0,
    tilt: (1 - yesShare) * 100,
    model: (1 - modelYesProb) * 100,
  };

  const weigh = (b: SmartScoreBreakdown): number =>
    weights.holders * b.holders + weights.tilt * b.tilt + weights.model * b.model;

  const yes = weigh(breakdownYes);
  const no = weigh(breakdownNo);
  const noWins = no > yes;

  return {
    yesStats,
    noStats,
    smartScore: Math.trunc(noWins ? no : yes),
    smartScoreSide: noWins ? 'NO' : 'YES',
    breakdown: noWins ? breakdownNo : breakdownYes,
    scores: { yes, no },
    hasHolderData,
  };
}
