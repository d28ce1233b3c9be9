/**
 * Polymarket REST Types
 *
 * Response schemas for the Gamma, CLOB and Data APIs. Payloads are validated
 * with zod and mapped onto the analysis types.
 */

import { z } from 'zod';
import type { Outcome, PricePoint, WhaleTradeEvidence } from '../../analysis/types.js';

// Market data (Gamma API format)
export const gammaMarketSchema = z.object({
  id: z.string(),
  conditionId: z.string(),
  slug: z.string().nullish(),
  question: z.string(),
  description: z.string().nullish(),
  outcomes: z.string().nullish(),         // JSON string: '["Yes", "No"]'
  outcomePrices: z.string().nullish(),    // JSON string: '["0.55", "0.45"]'
  clobTokenIds: z.string().nullish(),     // JSON string: '["token1", "token2"]'
  volume: z.coerce.number().nullish(),
  volumeNum: z.number().nullish(),
  volume24hr: z.coerce.number().nullish(),
  liquidity: z.coerce.number().nullish(),
  liquidityNum: z.number().nullish(),
  oneDayPriceChange: z.coerce.number().nullish(),
  oneWeekPriceChange: z.coerce.number().nullish(),
  endDate: z.string().nullish(),
  endDateIso: z.string().nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
});

export type Market = z.infer<typeof gammaMarketSchema>;

export const gammaMarketListSchema = z.array(gammaMarketSchema);

// CLOB /prices-history (t in seconds)
export const priceHistorySchema = z.object({
  history: z.array(z.object({ t: z.number(), p: z.coerce.number() })).default([]),
});

// Data API /holders: one group per outcome token
export const holderGroupListSchema = z.array(
  z.object({
    token: z.string(),
    holders: z.array(
      z.object({
        proxyWallet: z.string(),
        amount: z.coerce.number(),
        outcomeIndex: z.coerce.number().int(),
      })
    ),
  })
);

// Data API /positions for one wallet
export const positionListSchema = z.array(
  z.object({
    proxyWallet: z.string(),
    conditionId: z.string(),
    size: z.coerce.number(),
    currentValue: z.coerce.number(),
    cashPnl: z.coerce.number().default(0),
    realizedPnl: z.coerce.number().default(0),
    outcomeIndex: z.coerce.number().int(),
  })
);

export type DataPosition = z.infer<typeof positionListSchema>[number];

// Data API /trades
export const tradeListSchema = z.array(
  z.object({
    proxyWallet: z.string().default(''),
    side: z.enum(['BUY', 'SELL']),
    size: z.coerce.number(),
    price: z.coerce.number(),
    usdcSize: z.coerce.number().nullish(),
    timestamp: z.coerce.number(),         // seconds
    outcomeIndex: z.coerce.number().int(),
  })
);

export type DataTrade = z.infer<typeof tradeListSchema>[number];

// Parsed market with typed arrays
export interface ParsedMarket {
  id: string;
  conditionId: string;
  slug: string;
  question: string;
  description: string;
  outcomes: string[];
  outcomePrices: number[];
  tokenIds: string[];
  volume: number;
  volume24h: number;
  liquidity: number;
  priceChange24h: number;     // YES price delta, absolute
  priceChange7d: number;
  endDate: string;
  active: boolean;
  closed: boolean;
}

// Holder entry from /holders
export interface MarketHolder {
  wallet: string;
  side: Outcome;
  shares: number;
}

// Trade with its fill price, timestamps in ms
export interface MarketTrade extends WhaleTradeEvidence {
  price: number;
}

const stringArraySchema = z.array(z.coerce.string());

const parseJsonArray = (str: string | null | undefined): string[] => {
  if (!str) return [];
  try {
    const parsed = stringArraySchema.safeParse(JSON.parse(str));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
};

// Helper to parse Market into ParsedMarket
export function parseMarket(market: Market): ParsedMarket {
  return {
    id: market.id,
    conditionId: market.conditionId,
    slug: market.slug ?? '',
    question: market.question,
    description: market.description ?? '',
    outcomes: parseJsonArray(market.outcomes),
    outcomePrices: parseJsonArray(market.outcomePrices).map(Number),
    tokenIds: parseJsonArray(market.clobTokenIds),
    volume: market.volumeNum ?? market.volume ?? 0,
    volume24h: market.volume24hr ?? 0,
    liquidity: market.liquidityNum ?? market.liquidity ?? 0,
    priceChange24h: market.oneDayPriceChange ?? 0,
    priceChange7d: market.oneWeekPriceChange ?? 0,
    endDate: market.endDateIso ?? market.endDate ?? '',
    active: market.active ?? false,
    closed: market.closed ?? false,
  };
}

/**
 * Outcome index 0 is YES. Buying YES or selling NO both back YES.
 */
export function tradeOutcome(side: 'BUY' | 'SELL', outcomeIndex: number): Outcome {
  const isYes = (side === 'BUY' && outcomeIndex === 0) || (side === 'SELL' && outcomeIndex === 1);
  return isYes ? 'YES' : 'NO';
}

export function parseTrade(trade: DataTrade): MarketTrade {
  return {
    wallet: trade.proxyWallet,
    side: tradeOutcome(trade.side, trade.outcomeIndex),
    amountUsd: Math.abs(trade.usdcSize ?? trade.size * trade.price),
    price: trade.price,
    timestamp: trade.timestamp * 1000,
  };
}

/**
 * Keep valid samples (0 < p <= 1), convert seconds to ms, sort ascending
 */
export function parsePriceHistory(points: Array<{ t: number; p: number }>): PricePoint[] {
  return points
    .filter((pt) => pt.t > 0 && pt.p > 0 && pt.p <= 1)
    .map((pt) => ({ timestamp: pt.t * 1000, price: pt.p }))
    .sort((a, b) => a.timestamp - b.timestamp);
}
