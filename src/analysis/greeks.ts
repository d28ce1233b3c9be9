/**
 * Greeks Model
 *
 * Theta: how far the YES price should drift per day toward its likely
 * resolution, compared with how far it actually moved.
 * Vega: recent (24h) versus historical (7d) realized volatility.
 */

import type {
  GreeksResult,
  MarketSnapshot,
  NoData,
  Outcome,
  PricePoint,
  ThetaResult,
  VegaResult,
  VolatilityRegime,
} from './types.js';
import { annualizedVolatility, DAY_MS, trailingWindow } from './stats.js';

const HOUR = 60 * 60 * 1000;

export const THETA_LOOKBACK_POINTS = 24;
const MIN_DELTA_DAYS = 0.1;
const OPPORTUNITY_ANOMALY = 0.005;   // 0.5c per day
const OPPORTUNITY_MIN_DAYS = 3;

export const VOL_THRESHOLDS = {
  HISTORICAL_WINDOW_MS: 7 * 24 * HOUR,
  RECENT_WINDOW_MS: 24 * HOUR,
  SHOCK_RATIO: 2.5,
  DORMANT_RATIO: 0.4,
  DORMANT_MIN_HISTORICAL: 0.05,
  ELEVATED_RATIO: 1.5,
  MIN_HISTORICAL: 0.001,
};

function noData(reason: string): NoData {
  return { status: 'no_data', reason };
}

export function calculateTheta(
  market: Pick<MarketSnapshot, 'yesPrice' | 'daysToClose'>,
  history: PricePoint[]
): ThetaResult | NoData {
  if (history.length < 2) {
    return noData(`Need at least 2 price points, got ${history.length}`);
  }

  const price = market.yesPrice;
  const daysRemaining = Math.max(market.daysToClose, 1);

  const dominantSide: Outcome = price >= 0.5 ? 'YES' : 'NO';
  const target = dominantSide === 'YES' ? 1 : 0;
  const expected = (target - price) / daysRemaining;

  const n = Math.min(THETA_LOOKBACK_POINTS, history.length - 1);
  const last = history[history.length - 1];
  const past = history[history.length - 1 - n];
  const deltaDays = Math.max((last.timestamp - past.timestamp) / DAY_MS, MIN_DELTA_DAYS);
  const actual = (last.price - past.price) / deltaDays;

  const anomaly = expected - actual;

  // Price carried beyond the distance from 50c
  const intrinsic = Math.abs(price - 0.5);
  const timeValue = Math.max(0, (dominantSide === 'YES' ? price : 1 - price) - intrinsic);

  return {
    status: 'ok',
    daysRemaining,
    currentPrice: price,
    expected,
    actual,
    anomaly,
    dominantSide,
    timeValue,
    isOpportunity: Math.abs(anomaly) > OPPORTUNITY_ANOMALY && daysRemaining >= OPPORTUNITY_MIN_DAYS,
  };
}

export function classifyRegime(volRatio: number, historicalVol: number): VolatilityRegime {
  if (volRatio > VOL_THRESHOLDS.SHOCK_RATIO) return 'shock';
  if (volRatio < VOL_THRESHOLDS.DORMANT_RATIO && historicalVol > VOL_THRESHOLDS.DORMANT_MIN_HISTORICAL) {
    return 'dormant';
  }
  if (volRatio > VOL_THRESHOLDS.ELEVATED_RATIO) return 'elevated';
  return 'normal';
}

export function calculateVega(history: PricePoint[]): VegaResult | NoData {
  const historicalVol = annualizedVolatility(trailingWindow(history, VOL_THRESHOLDS.HISTORICAL_WINDOW_MS));
  if (historicalVol === null) {
    return noData('Not enough returns in the last 7 days');
  }

  const recentVol =
    annualizedVolatility(trailingWindow(history, VOL_THRESHOLDS.RECENT_WINDOW_MS)) ?? historicalVol;

  const volRatio = historicalVol > VOL_THRESHOLDS.MIN_HISTORICAL ? recentVol / historicalVol : 1;

  return {
    status: 'ok',
    historicalVol,
    recentVol,
    volRatio,
    regime: classifyRegime(volRatio, historicalVol),
  };
}

export function calculateGreeks(
  market: Pick<MarketSnapshot, 'yesPrice' | 'daysToClose'>,
  history: PricePoint[]
): GreeksResult {
  return {
    theta: calculateTheta(market, history),
    vega: calculateVega(history),
  };
}
