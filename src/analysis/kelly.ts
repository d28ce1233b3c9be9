/**
 * Kelly Sizer
 *
 * Fractional Kelly position sizing for binary outcomes.
 * f* = (b*p - q) / b, with b = net odds paid per unit staked (1/price - 1).
 * The scaled fraction is hard-capped at MAX_POSITION_PCT of bankroll and
 * results below MIN_POSITION_PCT are dropped as not worth executing.
 */

import { InvalidInputError } from '../errors.js';
import type { KellyResult, Outcome } from './types.js';

export const DEFAULT_KELLY_FRACTION = 0.25;
export const MAX_POSITION_PCT = 0.10;
export const MIN_POSITION_PCT = 0.01;

const FRACTION_NAMES: Array<{ maxFraction: number; name: string }> = [
  { maxFraction: 0.15, name: 'Eighth Kelly' },
  { maxFraction: 0.30, name: 'Quarter Kelly' },
  { maxFraction: 0.55, name: 'Half Kelly' },
];

export function fractionName(fraction: number): string {
  for (const entry of FRACTION_NAMES) {
    if (fraction <= entry.maxFraction) return entry.name;
  }
  return 'Full Kelly';
}

function validateInputs(modelProb: number, marketPrice: number, bankroll: number, fraction: number): void {
  if (!Number.isFinite(marketPrice) || marketPrice <= 0 || marketPrice > 1) {
    throw new InvalidInputError('marketPrice', `Market price must be in (0, 1], got ${marketPrice}`);
  }
  if (!Number.isFinite(bankroll) || bankroll <= 0) {
    throw new InvalidInputError('bankroll', `Bankroll must be positive, got ${bankroll}`);
  }
  if (!Number.isFinite(fraction) || fraction <= 0 || fraction > 1) {
    throw new InvalidInputError('fraction', `Kelly fraction must be in (0, 1], got ${fraction}`);
  }
  if (!Number.isFinite(modelProb) || modelProb < 0 || modelProb > 1) {
    throw new InvalidInputError('modelProbability', `Model probability must be in [0, 1], got ${modelProb}`);
  }
}

/**
 * Size a bet on an outcome priced at `marketPrice` that the model believes
 * wins with probability `modelProb`.
 */
export function sizePosition(
  modelProb: number,
  marketPrice: number,
  bankroll: number,
  fraction = DEFAULT_KELLY_FRACTION
): KellyResult {
  validateInputs(modelProb, marketPrice, bankroll, fraction);

  const base = {
    modelProbability: modelProb,
    marketPrice,
    bankroll,
    fraction,
    fractionName: fractionName(fraction),
  };

  const b = 1 / marketPrice - 1;
  const q = 1 - modelProb;
  const kellyFull = b > 0 ? (b * modelProb - q) / b : 0;

  if (kellyFull <= 0) {
    return {
      ...base,
      kellyFull,
      kellyScaled: 0,
      kellyFinalPct: 0,
      recommendedSize: 0,
      potentialProfit: 0,
      hasEdge: false,
      isTooSmall: false,
    };
  }

  const kellyScaled = kellyFull * fraction;
  let kellyFinalPct = Math.min(kellyScaled, MAX_POSITION_PCT);
  const isTooSmall = kellyFinalPct < MIN_POSITION_PCT;
  if (isTooSmall) kellyFinalPct = 0;

  const recommendedSize = Math.round(kellyFinalPct * bankroll);

  return {
    ...base,
    kellyFull,
    kellyScaled,
    kellyFinalPct,
    recommendedSize,
    potentialProfit: recommendedSize * b,
    hasEdge: true,
    isTooSmall,
  };
}

/**
 * Size the chosen side. NO is priced at 1 - yesPrice and wins with 1 - p.
 */
export function sizePositionForSide(
  side: Outcome,
  modelYesProb: number,
  yesPrice: number,
  bankroll: number,
  fraction = DEFAULT_KELLY_FRACTION
): KellyResult {
  if (side === 'YES') {
    return sizePosition(modelYesProb, yesPrice, bankroll, fraction);
  }
  return sizePosition(1 - modelYesProb, 1 - yesPrice, bankroll, fraction);
}

/**
 * Restate a sizing at the fraction of bankroll finally committed, after any
 * confidence shrink or override. Full and scaled Kelly are kept as computed.
 */
export function withFinalPct(result: KellyResult, finalPct: number): KellyResult {
  const b = 1 / result.marketPrice - 1;
  const recommendedSize = Math.round(finalPct * result.bankroll);

  return {
    ...result,
    kellyFinalPct: finalPct,
    recommendedSize,
    potentialProfit: recommendedSize * b,
  };
}
