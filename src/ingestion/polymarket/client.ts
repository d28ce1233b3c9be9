/**
 * Polymarket REST Client
 *
 * Reads the public Polymarket endpoints the analysis needs:
 * - Gamma: active markets and lookup by condition ID
 * - CLOB: YES token price history
 * - Data API: holders, wallet positions and recent trades
 */

import type { z } from 'zod';
import type { PricePoint } from '../../analysis/types.js';
import {
  gammaMarketListSchema,
  holderGroupListSchema,
  parsePriceHistory,
  parseTrade,
  positionListSchema,
  priceHistorySchema,
  tradeListSchema,
  type DataPosition,
  type Market,
  type MarketHolder,
  type MarketTrade,
} from './types.js';

const GAMMA_API_URL = 'https://gamma-api.polymarket.com';
const CLOB_API_URL = 'https://clob.polymarket.com';
const DATA_API_URL = 'https://data-api.polymarket.com';

const DEFAULT_TIMEOUT_MS = 20_000;

export interface PolymarketDataClientOptions {
  timeoutMs?: number;
}

export interface FetchMarketsParams {
  active?: boolean;
  closed?: boolean;
  limit?: number;
  offset?: number;
  order?: 'volume24hr' | 'volume' | 'liquidity' | 'endDate';
  ascending?: boolean;
}

export class PolymarketDataClient {
  private timeoutMs: number;

  constructor(options: PolymarketDataClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Fetch markets from the Gamma API
   */
  async fetchMarkets(params: FetchMarketsParams = {}): Promise<Market[]> {
    const url = new URL(`${GAMMA_API_URL}/markets`);

    if (params.active !== undefined) url.searchParams.set('active', String(params.active));
    if (params.closed !== undefined) url.searchParams.set('closed', String(params.closed));
    if (params.limit !== undefined) url.searchParams.set('limit', String(params.limit));
    if (params.offset !== undefined) url.searchParams.set('offset', String(params.offset));
    if (params.order !== undefined) url.searchParams.set('order', params.order);
    if (params.ascending !== undefined) url.searchParams.set('ascending', String(params.ascending));

    return this.getJSON(url, gammaMarketListSchema, 'markets');
  }

  /**
   * Fetch a single market by condition ID
   */
  async fetchMarketByConditionId(conditionId: string): Promise<Market | null> {
    const url = new URL(`${GAMMA_API_URL}/markets`);
    url.searchParams.set('condition_ids', conditionId);

    const markets = await this.getJSON(url, gammaMarketListSchema, 'market');
    return markets.find((m) => m.conditionId.toLowerCase() === conditionId.toLowerCase()) ?? null;
  }

  /**
   * Price history for a CLOB token (hourly points over the last week by default)
   */
  async fetchPriceHistory(tokenId: string, interval = '1w', fidelity = 60): Promise<PricePoint[]> {
    const url = new URL(`${CLOB_API_URL}/prices-history`);
    url.searchParams.set('market', tokenId);
    url.searchParams.set('interval', interval);
    url.searchParams.set('fidelity', String(fidelity));

    const data = await this.getJSON(url, priceHistorySchema, 'price history');
    return parsePriceHistory(data.history);
  }

  /**
   * Top holders of both outcome tokens
   */
  async fetchHolders(conditionId: string, limit = 20): Promise<MarketHolder[]> {
    const url = new URL(`${DATA_API_URL}/holders`);
    url.searchParams.set('market', conditionId);
    url.searchParams.set('limit', String(limit));

    const groups = await this.getJSON(url, holderGroupListSchema, 'holders');

    return groups.flatMap((group) =>
      group.holders.map((h) => ({
        wallet: h.proxyWallet,
        side: h.outcomeIndex === 0 ? ('YES' as const) : ('NO' as const),
        shares: h.amount,
      }))
    );
  }

  /**
   * A wallet's positions in one market
   */
  async fetchWalletPositions(wallet: string, conditionId: string): Promise<DataPosition[]> {
    const url = new URL(`${DATA_API_URL}/positions`);
    url.searchParams.set('user', wallet.toLowerCase());
    url.searchParams.set('market', conditionId);

    return this.getJSON(url, positionListSchema, 'positions');
  }

  /**
   * Recent trades for a market, newest first
   */
  async fetchTrades(conditionId: string, limit = 500): Promise<MarketTrade[]> {
    const url = new URL(`${DATA_API_URL}/trades`);
    url.searchParams.set('market', conditionId);
    url.searchParams.set('limit', String(limit));

    const trades = await this.getJSON(url, tradeListSchema, 'trades');
    return trades.map(parseTrade);
  }

  private async getJSON<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    const response = await fetch(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });

    if (!response.ok) {
      throw new Error(`Failed to fetch ${what}: ${response.status}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected ${what} payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }
}
