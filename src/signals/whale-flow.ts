/**
 * Whale Flow
 *
 * Aggregates whale-sized trades (by USD amount) into per-side volumes.
 */

import type { Side, WhaleFlow, WhaleTradeEvidence } from '../analysis/types.js';

const HOUR = 60 * 60 * 1000;

export const WHALE_FLOW_THRESHOLDS = {
  MIN_TRADE_USD: 500,
  SIGNIFICANT_VOLUME_USD: 10_000,
  MIN_TRADES: 2,
  DOMINANT_SHARE: 0.6,          // YES share >= 60% -> YES, <= 40% -> NO
};

export interface WhaleFlowOptions {
  minTradeUsd?: number;
  significantVolumeUsd?: number;
  now?: number;
}

export function buildWhaleFlow(trades: WhaleTradeEvidence[], options: WhaleFlowOptions = {}): WhaleFlow {
  const minTradeUsd = options.minTradeUsd ?? WHALE_FLOW_THRESHOLDS.MIN_TRADE_USD;
  const significantVolumeUsd = options.significantVolumeUsd ?? WHALE_FLOW_THRESHOLDS.SIGNIFICANT_VOLUME_USD;
  const now = options.now ?? Date.now();

  const whales = trades.filter((t) => t.amountUsd >= minTradeUsd);

  let yesVolume = 0;
  let noVolume = 0;
  let yesCount = 0;
  let noCount = 0;
  let lastYesTradeAt: number | null = null;
  let lastNoTradeAt: number | null = null;

  for (const trade of whales) {
    if (trade.side === 'YES') {
      yesVolume += trade.amountUsd;
      yesCount++;
      lastYesTradeAt = Math.max(lastYesTradeAt ?? trade.timestamp, trade.timestamp);
    } else {
      noVolume += trade.amountUsd;
      noCount++;
      lastNoTradeAt = Math.max(lastNoTradeAt ?? trade.timestamp, trade.timestamp);
    }
  }

  const totalVolume = yesVolume + noVolume;
  const tilt = totalVolume > 0 ? (yesVolume - noVolume) / totalVolume : 0;

  let dominantSide: Side = 'NEUTRAL';
  if (totalVolume > 0) {
    const yesShare = yesVolume / totalVolume;
    if (yesShare >= WHALE_FLOW_THRESHOLDS.DOMINANT_SHARE) dominantSide = 'YES';
    else if (yesShare <= 1 - WHALE_FLOW_THRESHOLDS.DOMINANT_SHARE) dominantSide = 'NO';
  }

  // Window spans from the oldest trade seen (whale or not) to now
  const oldest = trades.reduce<number | null>((min, t) => (min === null ? t.timestamp : Math.min(min, t.timestamp)), null);
  const windowHours = oldest === null ? 0 : Math.max(1, (now - oldest) / HOUR);

  return {
    yesVolume,
    noVolume,
    yesCount,
    noCount,
    totalVolume,
    isSignificant: totalVolume >= significantVolumeUsd && yesCount + noCount >= WHALE_FLOW_THRESHOLDS.MIN_TRADES,
    tilt,
    dominantSide,
    lastYesTradeAt,
    lastNoTradeAt,
    windowHours,
  };
}

