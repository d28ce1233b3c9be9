/**
 * Polymarket Data Source
 *
 * MarketDataSource over the Polymarket and CoinGecko clients, with a TTL cache
 * per data kind. Providers that return nothing usable raise MissingDataError.
 */

import { MissingDataError, errorMessage } from '../errors.js';
import type {
  CryptoData,
  HolderPosition,
  MarketDataSource,
  PricePoint,
  WhaleTradeEvidence,
} from '../analysis/types.js';
import { TtlCache } from './cache.js';
import type { PolymarketDataClient } from './polymarket/client.js';
import { parseMarket, type MarketHolder, type MarketTrade, type ParsedMarket } from './polymarket/types.js';
import type { CoinGeckoClient } from './coingecko/client.js';

const MINUTE = 60 * 1000;

export const CACHE_TTL_MS = {
  priceHistory: 5 * MINUTE,
  crypto: 10 * MINUTE,
  holders: 10 * MINUTE,
  trades: 2 * MINUTE,
};

const DEFAULT_WHALE_MIN_TRADE_USD = 500;
const DEFAULT_HOLDERS_PER_SIDE = 10;

export interface PolymarketDataSourceOptions {
  whaleMinTradeUsd?: number;
  holdersPerSide?: number;
  now?: () => number;
}

export class PolymarketDataSource implements MarketDataSource {
  private polymarket: PolymarketDataClient;
  private coingecko: CoinGeckoClient;
  private config: Required<Omit<PolymarketDataSourceOptions, 'now'>>;

  private priceCache: TtlCache<PricePoint[]>;
  private cryptoCache: TtlCache<CryptoData>;
  private holdersCache: TtlCache<HolderPosition[]>;
  private tradesCache: TtlCache<MarketTrade[]>;

  constructor(
    polymarket: PolymarketDataClient,
    coingecko: CoinGeckoClient,
    options: PolymarketDataSourceOptions = {}
  ) {
    this.polymarket = polymarket;
    this.coingecko = coingecko;
    this.config = {
      whaleMinTradeUsd: options.whaleMinTradeUsd ?? DEFAULT_WHALE_MIN_TRADE_USD,
      holdersPerSide: options.holdersPerSide ?? DEFAULT_HOLDERS_PER_SIDE,
    };

    const now = options.now ?? Date.now;
    this.priceCache = new TtlCache(CACHE_TTL_MS.priceHistory, now);
    this.cryptoCache = new TtlCache(CACHE_TTL_MS.crypto, now);
    this.holdersCache = new TtlCache(CACHE_TTL_MS.holders, now);
    this.tradesCache = new TtlCache(CACHE_TTL_MS.trades, now);
  }

  async fetchPriceHistory(tokenId: string): Promise<PricePoint[]> {
    return this.priceCache.getOrLoad(tokenId, async () => {
      const points = await this.polymarket.fetchPriceHistory(tokenId);
      if (points.length === 0) {
        throw new MissingDataError('priceHistory', `No price history for token ${tokenId}`);
      }
      return points;
    });
  }

  async fetchCryptoData(assetId: string): Promise<CryptoData | null> {
    return this.cryptoCache.getOrLoad(assetId, async () => {
      const data = await this.coingecko.fetchCryptoData(assetId);
      if (!data) {
        throw new MissingDataError('crypto', `No usable price data for ${assetId}`);
      }
      return data;
    });
  }

  /**
   * Top holders per side, each enriched with the wallet's position value and PnL
   */
  async fetchHolderPositions(conditionId: string): Promise<HolderPosition[]> {
    return this.holdersCache.getOrLoad(conditionId, async () => {
      const holders = await this.polymarket.fetchHolders(conditionId);
      const top = [
        ...this.topHolders(holders, 'YES'),
        ...this.topHolders(holders, 'NO'),
      ];

      if (top.length === 0) {
        throw new MissingDataError('holders', `No holders for market ${conditionId}`);
      }

      const results = await Promise.allSettled(top.map((h) => this.enrichHolder(h, conditionId)));

      const positions: HolderPosition[] = [];
      let failed = 0;
      results.forEach((result, i) => {
        if (result.status === 'fulfilled') {
          positions.push(result.value);
        } else {
          failed++;
          positions.push({ ...top[i], currentValue: 0, lifetimePnl: 0 });
        }
      });

      if (failed > 0) {
        console.warn(`[DataSource] ${failed}/${top.length} holder position lookups failed for ${conditionId}`);
      }
      return positions;
    });
  }

  async fetchWhaleTrades(conditionId: string): Promise<WhaleTradeEvidence[]> {
    const trades = await this.fetchMarketTrades(conditionId);
    return trades
      .filter((t) => t.amountUsd >= this.config.whaleMinTradeUsd)
      .map(({ wallet, side, amountUsd, timestamp }) => ({ wallet, side, amountUsd, timestamp }));
  }

  /**
   * All recent trades, used by the snapshot builder
   */
  async fetchMarketTrades(conditionId: string): Promise<MarketTrade[]> {
    return this.tradesCache.getOrLoad(conditionId, () => this.polymarket.fetchTrades(conditionId));
  }

  async fetchMarket(conditionId: string): Promise<ParsedMarket | null> {
    const market = await this.polymarket.fetchMarketByConditionId(conditionId);
    return market ? parseMarket(market) : null;
  }

  /**
   * Active, open markets ordered by 24h volume
   */
  async listActiveMarkets(limit: number): Promise<ParsedMarket[]> {
    try {
      const markets = await this.polymarket.fetchMarkets({
        active: true,
        closed: false,
        limit,
        order: 'volume24hr',
        ascending: false,
      });
      return markets.map(parseMarket);
    } catch (error) {
      console.error(`[DataSource] Failed to list markets: ${errorMessage(error)}`);
      throw error;
    }
  }

  private topHolders(holders: MarketHolder[], side: MarketHolder['side']): MarketHolder[] {
    return holders
      .filter((h) => h.side === side && h.shares > 0)
      .sort((a, b) => b.shares - a.shares)
      .slice(0, this.config.holdersPerSide);
  }

  private async enrichHolder(holder: MarketHolder, conditionId: string): Promise<HolderPosition> {
    const positions = await this.polymarket.fetchWalletPositions(holder.wallet, conditionId);
    const outcomeIndex = holder.side === 'YES' ? 0 : 1;
    const position = positions.find((p) => p.outcomeIndex === outcomeIndex);

    return {
      wallet: holder.wallet,
      side: holder.side,
      shares: position?.size ?? holder.shares,
      currentValue: position?.currentValue ?? 0,
      lifetimePnl: position ? position.cashPnl + position.realizedPnl : 0,
    };
  }
}
