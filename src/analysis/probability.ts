/**
 * Probability Model
 *
 * Converts a market's signal score, whale tilt and smart-money ratio into a
 * model probability for YES. Whale tilt is not a probability on its own, so its
 * influence is bounded by a confidence ceiling that depends on signal strength.
 */

import type { MarketSnapshot, ProbabilityEstimate, Side } from './types.js';
import { clamp } from './stats.js';

export const MIN_MODEL_PROBABILITY = 0.03;
export const MAX_MODEL_PROBABILITY = 0.97;

// Maximum absolute adjustment per signal score tier
const CONFIDENCE_TIERS: Array<{ minScore: number; ceiling: number }> = [
  { minScore: 70, ceiling: 0.12 },
  { minScore: 55, ceiling: 0.08 },
  { minScore: 40, ceiling: 0.05 },
  { minScore: 25, ceiling: 0.03 },
];
const FLOOR_CEILING = 0.01;

const SMART_MONEY_BOOSTS: Array<{ minRatio: number; multiplier: number }> = [
  { minRatio: 0.5, multiplier: 1.3 },
  { minRatio: 0.3, multiplier: 1.1 },
];

// Side thresholds for a standalone probability
const YES_THRESHOLD = 0.55;
const NO_THRESHOLD = 0.45;

export function clampProbability(p: number): number {
  return clamp(p, MIN_MODEL_PROBABILITY, MAX_MODEL_PROBABILITY);
}

/**
 * Maximum adjustment permitted for a signal score, before the smart-money boost
 */
export function confidenceCeiling(signalScore: number): number {
  for (const tier of CONFIDENCE_TIERS) {
    if (signalScore >= tier.minScore) return tier.ceiling;
  }
  return FLOOR_CEILING;
}

export function smartMoneyMultiplier(smartMoneyRatio: number): number {
  for (const boost of SMART_MONEY_BOOSTS) {
    if (smartMoneyRatio >= boost.minRatio) return boost.multiplier;
  }
  return 1;
}

/**
 * Estimate the YES probability from market signal data.
 * Without significant whale flow the market price is trusted as-is.
 */
export function estimateProbability(market: MarketSnapshot): number {
  const base = market.yesPrice;
  const flow = market.whaleFlow;

  if (!flow || !flow.isSignificant) {
    return clampProbability(base);
  }

  const tilt = clamp(flow.tilt, -1, 1);
  const confidence = confidenceCeiling(market.signalScore) * smartMoneyMultiplier(market.smartMoneyRatio);

  return clampProbability(base + tilt * confidence);
}

export function signalEstimate(market: MarketSnapshot): ProbabilityEstimate {
  return { value: estimateProbability(market), source: 'signal' };
}

/**
 * Positive = YES underpriced, negative = YES overpriced
 */
export function calculateEdge(modelProb: number, marketPrice: number): number {
  return modelProb - marketPrice;
}

/**
 * Edge relative to market price (model=0.63, market=0.55 -> 14.5)
 */
export function edgePercentage(modelProb: number, marketPrice: number): number {
  if (marketPrice <= 0) return 0;
  return ((modelProb - marketPrice) / marketPrice) * 100;
}

export function recommendedSideFromProbability(modelProb: number): Side {
  if (modelProb >= YES_THRESHOLD) return 'YES';
  if (modelProb <= NO_THRESHOLD) return 'NO';
  return 'NEUTRAL';
}
