/**
 * Shared fixtures for the test suites.
 */

import type {
  CryptoData,
  HolderPosition,
  MarketDataSource,
  MarketSnapshot,
  PricePoint,
  WhaleFlow,
  WhaleTradeEvidence,
} from '../src/analysis/types.js';
import type { RandomSource } from '../src/analysis/stats.js';

export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;
export const NOW = 1_700_000_000_000;

/**
 * Deterministic uniform generator in [0, 1)
 */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeFlow(overrides: Partial<WhaleFlow> = {}): WhaleFlow {
  const yesVolume = overrides.yesVolume ?? 0;
  const noVolume = overrides.noVolume ?? 0;
  const totalVolume = yesVolume + noVolume;
  return {
    yesVolume,
    noVolume,
    yesCount: 0,
    noCount: 0,
    totalVolume,
    isSignificant: false,
    tilt: totalVolume > 0 ? (yesVolume - noVolume) / totalVolume : 0,
    dominantSide: 'NEUTRAL',
    lastYesTradeAt: null,
    lastNoTradeAt: null,
    windowHours: 24,
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  const yesPrice = overrides.yesPrice ?? 0.5;
  return {
    conditionId: 'cond-1',
    question: 'Will the test event happen?',
    yesPrice,
    noPrice: 1 - yesPrice,
    priceChange24h: 0,
    volume24h: 100_000,
    volumeTotal: 1_000_000,
    liquidity: 60_000,
    daysToClose: 10,
    clobTokenIds: ['token-yes', 'token-no'],
    whaleFlow: null,
    signalScore: 50,
    smartMoneyRatio: 0,
    ...overrides,
  };
}

export interface FakeDataSourceOptions {
  history?: PricePoint[] | Error;
  crypto?: CryptoData | null | Error;
  holders?: HolderPosition[] | Error;
  trades?: WhaleTradeEvidence[] | Error;
}

/**
 * In-memory MarketDataSource. Error values are thrown from the matching fetch.
 */
export class FakeDataSource implements MarketDataSource {
  calls: { history: string[]; crypto: string[]; holders: string[]; trades: string[] } = {
    history: [],
    crypto: [],
    holders: [],
    trades: [],
  };

  constructor(private options: FakeDataSourceOptions = {}) {}

  async fetchPriceHistory(tokenId: string): Promise<PricePoint[]> {
    this.calls.history.push(tokenId);
    return this.resolve(this.options.history, []);
  }

  async fetchCryptoData(assetId: string): Promise<CryptoData | null> {
    this.calls.crypto.push(assetId);
    return this.resolve(this.options.crypto, null);
  }

  async fetchHolderPositions(conditionId: string): Promise<HolderPosition[]> {
    this.calls.holders.push(conditionId);
    return this.resolve(this.options.holders, []);
  }

  async fetchWhaleTrades(conditionId: string): Promise<WhaleTradeEvidence[]> {
    this.calls.trades.push(conditionId);
    return this.resolve(this.options.trades, []);
  }

  private resolve<T>(value: T | Error | undefined, fallback: T): T {
    if (value instanceof Error) throw value;
    return value === undefined ? fallback : value;
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}
