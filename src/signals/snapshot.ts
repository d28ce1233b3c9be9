/**
 * Market Snapshot Builder
 *
 * Turns a parsed Gamma market plus its recent trades into the snapshot the
 * orchestrator analyzes.
 */

import { InvalidInputError } from '../errors.js';
import { DAY_MS } from '../analysis/stats.js';
import type { MarketSnapshot, PricePoint } from '../analysis/types.js';
import type { MarketTrade, ParsedMarket } from '../ingestion/polymarket/types.js';
import { buildWhaleFlow } from './whale-flow.js';
import { calculateSignalScore } from './signal-score.js';

export interface SnapshotOptions {
  whaleMinTradeUsd?: number;
  significantVolumeUsd?: number;
  now?: number;
  priceHistory?: PricePoint[];
}

export function daysUntil(endDate: string, now: number): number {
  const end = Date.parse(endDate);
  if (Number.isNaN(end)) return 0;
  return Math.max(0, (end - now) / DAY_MS);
}

export function buildSnapshot(
  market: ParsedMarket,
  trades: MarketTrade[],
  options: SnapshotOptions = {}
): MarketSnapshot {
  const now = options.now ?? Date.now();
  const [yesPrice, noPriceRaw] = market.outcomePrices;

  if (yesPrice === undefined || !Number.isFinite(yesPrice) || yesPrice < 0 || yesPrice > 1) {
    throw new InvalidInputError('yesPrice', `Market ${market.conditionId} has no valid YES price`);
  }
  const noPrice = noPriceRaw !== undefined && Number.isFinite(noPriceRaw) ? noPriceRaw : 1 - yesPrice;

  const whaleFlow = buildWhaleFlow(trades, {
    minTradeUsd: options.whaleMinTradeUsd,
    significantVolumeUsd: options.significantVolumeUsd,
    now,
  });

  const tradeVolume = trades.reduce((sum, t) => sum + t.amountUsd, 0);
  const smartMoneyRatio = tradeVolume > 0 ? whaleFlow.totalVolume / tradeVolume : 0;
  const daysToClose = daysUntil(market.endDate, now);

  const signalScore = calculateSignalScore(
    {
      whaleFlow,
      volume24h: market.volume24h,
      liquidity: market.liquidity,
      daysToClose,
      yesPrice,
      priceChange24h: market.priceChange24h,
      priceChange7d: market.priceChange7d,
    },
    options.significantVolumeUsd
  );

  const snapshot: MarketSnapshot = {
    conditionId: market.conditionId,
    question: market.question,
    slug: market.slug,
    yesPrice,
    noPrice,
    priceChange24h: market.priceChange24h,
    volume24h: market.volume24h,
    volumeTotal: market.volume,
    liquidity: market.liquidity,
    daysToClose,
    clobTokenIds: market.tokenIds,
    whaleFlow,
    signalScore,
    smartMoneyRatio,
  };

  if (options.priceHistory && options.priceHistory.length > 0) {
    snapshot.priceHistory = options.priceHistory;
  }
  return snapshot;
}
