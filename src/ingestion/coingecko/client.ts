/**
 * CoinGecko Client
 *
 * Spot price plus drift and volatility estimated from 30 daily closes.
 */

import { z } from 'zod';
import type { CryptoData } from '../../analysis/types.js';
import { DAYS_PER_YEAR, mean, sampleStdDev } from '../../analysis/stats.js';

const COINGECKO_API_URL = 'https://api.coingecko.com/api/v3';
const DEFAULT_TIMEOUT_MS = 20_000;
const HISTORY_DAYS = 30;
const MIN_SAMPLES = 7;
const FALLBACK_VOLATILITY = 0.5;

// [[timestamp_ms, price], ...]
const marketChartSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])),
});

export interface CoinGeckoClientOptions {
  timeoutMs?: number;
}

/**
 * Annualized drift and volatility from consecutive daily log returns
 */
export function estimateDriftAndVolatility(prices: number[]): { drift: number; volatility: number } {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    if (prices[i - 1] > 0 && prices[i] > 0) {
      returns.push(Math.log(prices[i] / prices[i - 1]));
    }
  }

  if (returns.length < 2) {
    return { drift: 0, volatility: FALLBACK_VOLATILITY };
  }

  return {
    drift: mean(returns) * DAYS_PER_YEAR,
    volatility: sampleStdDev(returns) * Math.sqrt(DAYS_PER_YEAR),
  };
}

export class CoinGeckoClient {
  private timeoutMs: number;

  constructor(options: CoinGeckoClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Returns null when CoinGecko has fewer than a week of prices for the coin
   */
  async fetchCryptoData(assetId: string): Promise<CryptoData | null> {
    const url = new URL(`${COINGECKO_API_URL}/coins/${encodeURIComponent(assetId)}/market_chart`);
    url.searchParams.set('vs_currency', 'usd');
    url.searchParams.set('days', String(HISTORY_DAYS));
    url.searchParams.set('interval', 'daily');

    const response = await fetch(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });

    if (!response.ok) {
      throw new Error(`Failed to fetch ${assetId} market chart: ${response.status}`);
    }

    const parsed = marketChartSchema.safeParse(await response.json());
    if (!parsed.success) {
      console.warn(`[CoinGecko] Unexpected market chart payload for ${assetId}`);
      return null;
    }

    const prices = parsed.data.prices.map(([, price]) => price).filter((p) => p > 0);
    if (prices.length < MIN_SAMPLES) {
      return null;
    }

    const { drift, volatility } = estimateDriftAndVolatility(prices);

    return {
      assetId,
      currentPrice: prices[prices.length - 1],
      annualizedVolatility: volatility,
      annualizedDrift: drift,
      sampleCount: prices.length,
    };
  }
}
