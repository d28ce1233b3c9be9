/**
 * Monte Carlo Engine
 *
 * Two modes:
 * - crypto: questions about a coin crossing a $ threshold are simulated with
 *   geometric Brownian motion from the coin's spot price and volatility.
 * - generic: everything else. The YES price itself is perturbed with the
 *   market's realized volatility to show risk bands. No winner is predicted,
 *   so probabilityYes is the current price.
 */

import type {
  CryptoData,
  CryptoMarketInfo,
  DistributionBucket,
  MarketSnapshot,
  MonteCarloResult,
  PricePoint,
  ThresholdDirection,
} from './types.js';
import {
  annualizedVolatility,
  clamp,
  DAYS_PER_YEAR,
  mean,
  percentileOfSorted,
  sampleStdDev,
  standardNormal,
  type RandomSource,
} from './stats.js';

export const DEFAULT_SIMULATIONS = 10_000;

const MIN_SIGMA = 0.01;
const DEFAULT_CRYPTO_SIGMA = 0.50;
const DEFAULT_GENERIC_SIGMA = 0.40;
const MIN_CRYPTO_SAMPLES = 7;
const PROBABILITY_FLOOR = 0.001;
const PROBABILITY_CAP = 0.999;

export type DriftMode = 'zero' | 'inferred';

export interface SimulationOptions {
  runs?: number;
  random?: RandomSource;
  driftMode?: DriftMode;
}

export interface SimulationInputs {
  history?: PricePoint[];
  crypto?: CryptoData | null;
}

// Question keyword -> CoinGecko coin id
const CRYPTO_KEYWORDS: Array<{ pattern: RegExp; assetId: string }> = [
  { pattern: /\bbitcoin\b|\bbtc\b/, assetId: 'bitcoin' },
  { pattern: /\bethereum\b|\beth\b|\bether\b/, assetId: 'ethereum' },
  { pattern: /\bsolana\b|\bsol\b/, assetId: 'solana' },
  { pattern: /\bdogecoin\b|\bdoge\b/, assetId: 'dogecoin' },
  { pattern: /\bxrp\b|\bripple\b/, assetId: 'ripple' },
  { pattern: /\bcardano\b|\bada\b/, assetId: 'cardano' },
  { pattern: /\bpolygon\b|\bmatic\b/, assetId: 'matic-network' },
  { pattern: /\bavalanche\b|\bavax\b/, assetId: 'avalanche-2' },
  { pattern: /\bchainlink\b/, assetId: 'chainlink' },
  { pattern: /\bpolkadot\b/, assetId: 'polkadot' },
  { pattern: /\bsui\b/, assetId: 'sui' },
  { pattern: /\baptos\b|\bapt\b/, assetId: 'aptos' },
  { pattern: /\bnear protocol\b/, assetId: 'near' },
  { pattern: /\btoncoin\b|\bton\b/, assetId: 'the-open-network' },
];

const PRICE_THRESHOLD_RE = /\$\s*([0-9][0-9,]*(?:\.\d+)?)\s*(thousand|million|billion|k|m|b)?\b/i;
const BELOW_RE = /\b(below|under|fall|falls|drop|drops|dip|dips|crash|crashes)\b/;

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
  thousand: 1_000,
  million: 1_000_000,
  billion: 1_000_000_000,
};

/**
 * Parse "Will Bitcoin exceed $120k by March?" into an asset, threshold and direction.
 */
export function detectCryptoMarket(question: string): CryptoMarketInfo | null {
  const lower = question.toLowerCase();

  const keyword = CRYPTO_KEYWORDS.find((k) => k.pattern.test(lower));
  if (!keyword) return null;

  const match = PRICE_THRESHOLD_RE.exec(question);
  if (!match) return null;

  const value = parseFloat(match[1].replace(/,/g, ''));
  const suffix = match[2]?.toLowerCase();
  const threshold = value * (suffix ? SUFFIX_MULTIPLIERS[suffix] : 1);
  if (!Number.isFinite(threshold) || threshold <= 0) return null;

  const direction: ThresholdDirection = BELOW_RE.test(lower) ? 'below' : 'above';

  return { assetId: keyword.assetId, threshold, direction };
}

export function isValidCryptoData(data: CryptoData | null | undefined): data is CryptoData {
  return !!data && data.currentPrice > 0 && data.sampleCount >= MIN_CRYPTO_SAMPLES;
}

export function simulate(
  market: Pick<MarketSnapshot, 'question' | 'yesPrice' | 'daysToClose'>,
  inputs: SimulationInputs = {},
  options: SimulationOptions = {}
): MonteCarloResult {
  const runs = Math.max(1, Math.floor(options.runs ?? DEFAULT_SIMULATIONS));
  const random = options.random ?? Math.random;
  const days = Math.max(1, Math.ceil(market.daysToClose));

  const info = detectCryptoMarket(market.question);
  if (info && isValidCryptoData(inputs.crypto) && inputs.crypto.assetId === info.assetId) {
    return simulateCrypto(market.yesPrice, info, inputs.crypto, days, runs, random, options.driftMode ?? 'zero');
  }

  return simulateGeneric(market.yesPrice, inputs.history ?? [], days, runs, random);
}

function simulateCrypto(
  yesPrice: number,
  info: CryptoMarketInfo,
  crypto: CryptoData,
  days: number,
  runs: number,
  random: RandomSource,
  driftMode: DriftMode
): MonteCarloResult {
  const dt = 1 / DAYS_PER_YEAR;
  const mu = driftMode === 'inferred' ? crypto.annualizedDrift : 0;
  const sigma = crypto.annualizedVolatility < MIN_SIGMA ? DEFAULT_CRYPTO_SIGMA : crypto.annualizedVolatility;

  const stepDrift = (mu - (sigma * sigma) / 2) * dt;
  const stepDiffusion = sigma * Math.sqrt(dt);

  const terminal: number[] = new Array<number>(runs);
  let hits = 0;

  for (let i = 0; i < runs; i++) {
    let s = crypto.currentPrice;
    for (let d = 0; d < days; d++) {
      s *= Math.exp(stepDrift + stepDiffusion * standardNormal(random));
    }
    terminal[i] = s;

    const hit = info.direction === 'above' ? s >= info.threshold : s <= info.threshold;
    if (hit) hits++;
  }

  const probabilityYes = clamp(hits / runs, PROBABILITY_FLOOR, PROBABILITY_CAP);
  const sorted = [...terminal].sort((a, b) => a - b);

  return {
    mode: 'crypto',
    runs,
    probabilityYes,
    marketPrice: yesPrice,
    edge: probabilityYes - yesPrice,
    ...summarize(sorted),
    distribution: cryptoDistribution(sorted, info.threshold),
    crypto: {
      assetId: crypto.assetId,
      currentPrice: crypto.currentPrice,
      threshold: info.threshold,
      direction: info.direction,
      volatility: sigma,
      drift: mu,
    },
  };
}

function simulateGeneric(
  yesPrice: number,
  history: PricePoint[],
  days: number,
  runs: number,
  random: RandomSource
): MonteCarloResult {
  const realized = annualizedVolatility(history);
  const sigma = realized === null || realized < MIN_SIGMA ? DEFAULT_GENERIC_SIGMA : realized;
  const totalVol = sigma * Math.sqrt(days / DAYS_PER_YEAR);

  const terminal: number[] = new Array<number>(runs);
  for (let i = 0; i < runs; i++) {
    terminal[i] = clamp(yesPrice + standardNormal(random) * totalVol, 0.01, 0.99);
  }

  const sorted = [...terminal].sort((a, b) => a - b);

  return {
    mode: 'generic',
    runs,
    probabilityYes: yesPrice,
    marketPrice: yesPrice,
    edge: 0,
    ...summarize(sorted),
    distribution: genericDistribution(sorted),
  };
}

function summarize(sorted: number[]) {
  return {
    percentile5: percentileOfSorted(sorted, 0.05),
    percentile50: percentileOfSorted(sorted, 0.5),
    percentile95: percentileOfSorted(sorted, 0.95),
    mean: mean(sorted),
    stdDev: sampleStdDev(sorted),
  };
}

function cryptoDistribution(values: number[], threshold: number): DistributionBucket[] {
  const step = threshold * 0.1;
  const bounds = [threshold - 2 * step, threshold - step, threshold, threshold + step];
  const labels = [
    `< $${formatPrice(bounds[0])}`,
    `$${formatPrice(bounds[0])}-$${formatPrice(bounds[1])}`,
    `$${formatPrice(bounds[1])}-$${formatPrice(bounds[2])}`,
    `$${formatPrice(bounds[2])}-$${formatPrice(bounds[3])}`,
    `> $${formatPrice(bounds[3])}`,
  ];

  const counts = [0, 0, 0, 0, 0];
  for (const v of values) {
    const idx = bounds.findIndex((b) => v < b);
    counts[idx === -1 ? 4 : idx]++;
  }

  return labels.map((label, i) => ({ label, share: counts[i] / values.length }));
}

const GENERIC_BUCKETS: Array<{ label: string; lo: number; hi: number }> = [
  { label: '0-20c', lo: 0, hi: 0.2 },
  { label: '20-40c', lo: 0.2, hi: 0.4 },
  { label: '40-60c', lo: 0.4, hi: 0.6 },
  { label: '60-80c', lo: 0.6, hi: 0.8 },
  { label: '80-100c', lo: 0.8, hi: 1.01 },
];

function genericDistribution(values: number[]): DistributionBucket[] {
  return GENERIC_BUCKETS.map(({ label, lo, hi }) => ({
    label,
    share: values.filter((v) => v >= lo && v < hi).length / values.length,
  }));
}

function formatPrice(v: number): string {
  if (v >= 1_000_000) return `${(v / 1_000_000).toFixed(1)}M`;
  if (v >= 1_000) return `${(v / 1_000).toFixed(0)}K`;
  return v.toFixed(0);
}
