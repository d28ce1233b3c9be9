/**
 * Deep Analysis Orchestrator
 *
 * Runs every estimator on one market and blends them into a single
 * recommendation:
 * 1. Fetch price history, crypto reference data, holders and whale trades concurrently
 * 2. Run the signal model, Monte Carlo, Bayesian update, Greeks and holders scoring
 * 3. Blend a consensus probability and gate the side on a minimum edge
 * 4. Size the side with Kelly, then check for conflicts and score confidence
 *
 * A failed fetch never fails the analysis; the source is listed in `degraded`
 * and the affected model falls back.
 */

import { InvalidInputError, errorMessage } from '../errors.js';
import type {
  AnalysisConflict,
  BayesianResult,
  ConsensusWeights,
  CryptoData,
  DataSourceKey,
  DeepAnalysisResult,
  HolderPosition,
  HoldersAnalysis,
  KellyResult,
  MarketDataSource,
  MarketSnapshot,
  MonteCarloResult,
  Outcome,
  PricePoint,
  ProbabilityEstimate,
  ProbabilitySource,
  Side,
  WhaleEvidence,
  WhaleTradeEvidence,
} from './types.js';
import { clamp, type RandomSource } from './stats.js';
import { clampProbability, edgePercentage, signalEstimate } from './probability.js';
import { DEFAULT_KELLY_FRACTION, sizePositionForSide, withFinalPct } from './kelly.js';
import { calculateGreeks } from './greeks.js';
import { detectCryptoMarket, simulate, DEFAULT_SIMULATIONS, type DriftMode } from './monte-carlo.js';
import { bayesianUpdate } from './bayesian.js';
import { scoreHolders } from './holders.js';

export const MIN_EDGE = 0.02;

export const CONSENSUS_WEIGHTS: Record<'crypto' | 'generic', ConsensusWeights> = {
  crypto: { monteCarlo: 0.5, signal: 0.25, bayesian: 0.25 },
  generic: { monteCarlo: 0.1, signal: 0.45, bayesian: 0.45 },
};

export const CONFLICT_THRESHOLDS = {
  HARD_SMART_SCORE: 80,
  SOFT_SMART_SCORE: 60,
  ESTIMATOR_DISAGREEMENT: 0.01,
  HARD_CONFIDENCE_CAP: 20,
  SOFT_PENALTY: 15,
};

const CONFIDENCE_POINTS = {
  ESTIMATOR: 15,
  HOLDERS_AGREE: 10,
  WHALES_AGREE: 10,
  LIQUIDITY_HIGH: 10,
  LIQUIDITY_MEDIUM: 5,
  NEUTRAL_BASE: 65,
  NEUTRAL_BAYES_CONFIRMS: 75,
  NEUTRAL_MC_BONUS: 5,
  NEUTRAL_MAX: 80,
};

const LIQUIDITY_HIGH_USD = 50_000;
const LIQUIDITY_MEDIUM_USD = 10_000;

// Confidence below which the Kelly size is shrunk
const KELLY_SHRINK = [
  { below: 30, factor: 0.3 },
  { below: 50, factor: 0.6 },
];

export interface OrchestratorOptions {
  simulations?: number;
  driftMode?: DriftMode;
  random?: RandomSource;
  now?: () => number;
}

interface FetchedData {
  history: PricePoint[];
  crypto: CryptoData | null;
  holders: HolderPosition[];
  trades: WhaleTradeEvidence[];
  degraded: DataSourceKey[];
  errors: Partial<Record<DataSourceKey, string>>;
}

interface Estimates {
  signal: number;
  monteCarlo: number;
  bayesian: number;
}

/**
 * Coerce an estimator output into [0, 1]. Percent-scale values are divided by 100
 * and non-finite values fall back to the market price.
 */
export function normalizeProbability(value: number, source: ProbabilitySource, marketPrice: number): number {
  if (!Number.isFinite(value)) {
    console.warn(`[Orchestrator] ${source} produced ${value}, falling back to market price ${marketPrice}`);
    return marketPrice;
  }

  let normalized = value;
  if (normalized > 1 && normalized <= 100) {
    console.warn(`[Orchestrator] ${source} produced percent-scale value ${value}, dividing by 100`);
    normalized /= 100;
  }

  if (normalized < 0 || normalized > 1) {
    console.warn(`[Orchestrator] ${source} produced out-of-range value ${value}, clamping`);
    normalized = clamp(normalized, 0, 1);
  }

  return normalized;
}

export function confidenceTierPoints(signalScore: number): number {
  if (signalScore >= 70) return 40;
  if (signalScore >= 55) return 32;
  if (signalScore >= 40) return 24;
  if (signalScore >= 25) return 16;
  return 8;
}

export class Orchestrator {
  private dataSource: MarketDataSource;
  private config: Required<Omit<OrchestratorOptions, 'random'>>;
  private random: RandomSource | undefined;

  constructor(dataSource: MarketDataSource, options: OrchestratorOptions = {}) {
    this.dataSource = dataSource;
    this.config = {
      simulations: options.simulations ?? DEFAULT_SIMULATIONS,
      driftMode: options.driftMode ?? 'zero',
      now: options.now ?? Date.now,
    };
    this.random = options.random;
  }

  async analyze(
    market: MarketSnapshot,
    bankroll: number,
    fraction = DEFAULT_KELLY_FRACTION
  ): Promise<DeepAnalysisResult> {
    this.validate(market, bankroll, fraction);

    const now = this.config.now();
    const fetched = await this.fetchAll(market);

    const marketPrice = market.yesPrice;

    // Models
    const signalEst = signalEstimate(market);
    const signal = normalizeProbability(signalEst.value, signalEst.source, marketPrice);

    const monteCarlo = simulate(
      market,
      { history: fetched.history, crypto: fetched.crypto },
      { runs: this.config.simulations, random: this.random, driftMode: this.config.driftMode }
    );

    const bayesian = bayesianUpdate(marketPrice, this.whaleEvidence(market, fetched.trades, now));
    const greeks = calculateGreeks(market, fetched.history);
    const holders = scoreHolders(fetched.holders, market.whaleFlow, signal);

    const estimates: Estimates = {
      signal,
      monteCarlo: normalizeProbability(monteCarlo.probabilityYes, 'monte_carlo', marketPrice),
      bayesian: normalizeProbability(bayesian.posterior, 'bayesian', marketPrice),
    };

    // Consensus
    const isCrypto = monteCarlo.mode === 'crypto';
    const weights = isCrypto ? CONSENSUS_WEIGHTS.crypto : CONSENSUS_WEIGHTS.generic;
    const blended = clamp(
      weights.signal * estimates.signal + weights.monteCarlo * estimates.monteCarlo + weights.bayesian * estimates.bayesian,
      0,
      1
    );
    const modelProbability = clampProbability(blended);
    const edge = modelProbability - marketPrice;

    const provenance: ProbabilityEstimate[] = [
      { value: estimates.signal, source: 'signal' },
      { value: estimates.monteCarlo, source: 'monte_carlo' },
      { value: estimates.bayesian, source: 'bayesian' },
      { value: modelProbability, source: 'consensus' },
    ];

    // Side and sizing
    let recommendedSide: Side = 'NEUTRAL';
    let kelly: KellyResult | null = null;

    if (Math.abs(edge) >= MIN_EDGE) {
      const side: Outcome = edge > 0 ? 'YES' : 'NO';
      const sidePrice = side === 'YES' ? marketPrice : 1 - marketPrice;

      if (sidePrice > 0) {
        kelly = sizePositionForSide(side, modelProbability, marketPrice, bankroll, fraction);
        if (kelly.kellyFinalPct > 0) recommendedSide = side;
      }
    }

    // Conflicts and confidence
    const conflicts: AnalysisConflict[] =
      recommendedSide === 'NEUTRAL'
        ? []
        : this.detectConflicts(recommendedSide, holders, estimates, marketPrice, isCrypto);
    const hasHardConflict = conflicts.some((c) => c.severity === 'hard');

    const confidence =
      recommendedSide === 'NEUTRAL'
        ? this.neutralConfidence(bayesian, monteCarlo)
        : this.directionalConfidence(recommendedSide, market, holders, estimates, conflicts, isCrypto);

    let kellyPct = 0;
    if (recommendedSide !== 'NEUTRAL' && kelly && !hasHardConflict) {
      kellyPct = kelly.kellyFinalPct * this.kellyShrink(confidence);
    }

    return {
      conditionId: market.conditionId,
      question: market.question,
      marketPrice,
      signalProbability: signal,
      modelProbability,
      consensusWeights: weights,
      estimates: provenance,
      edge,
      edgePercentage: edgePercentage(modelProbability, marketPrice),
      recommendedSide,
      confidence,
      kellyPct,
      kelly: kelly ? withFinalPct(kelly, kellyPct) : null,
      isPositiveSetup: recommendedSide !== 'NEUTRAL' && kellyPct > 0 && !hasHardConflict,
      conflicts,
      monteCarlo,
      bayesian,
      greeks,
      holders,
      degraded: fetched.degraded,
      errors: fetched.errors,
      analyzedAt: now,
    };
  }

  private validate(market: MarketSnapshot, bankroll: number, fraction: number): void {
    if (!Number.isFinite(market.yesPrice) || market.yesPrice <= 0 || market.yesPrice > 1) {
      throw new InvalidInputError('yesPrice', `YES price must be in (0, 1], got ${market.yesPrice}`);
    }
    if (!Number.isFinite(bankroll) || bankroll <= 0) {
      throw new InvalidInputError('bankroll', `Bankroll must be positive, got ${bankroll}`);
    }
    if (!Number.isFinite(fraction) || fraction <= 0 || fraction > 1) {
      throw new InvalidInputError('fraction', `Kelly fraction must be in (0, 1], got ${fraction}`);
    }
  }

  /**
   * Issue every fetch together. Rejections and empty payloads degrade the
   * source instead of failing the analysis.
   */
  private async fetchAll(market: MarketSnapshot): Promise<FetchedData> {
    const degraded: DataSourceKey[] = [];
    const errors: Partial<Record<DataSourceKey, string>> = {};

    const preloaded = market.priceHistory && market.priceHistory.length > 0 ? market.priceHistory : null;
    const yesTokenId = market.clobTokenIds[0];
    const cryptoInfo = detectCryptoMarket(market.question);

    const [historyResult, cryptoResult, holdersResult, tradesResult] = await Promise.allSettled([
      preloaded ? Promise.resolve(preloaded) : yesTokenId ? this.dataSource.fetchPriceHistory(yesTokenId) : Promise.resolve([]),
      cryptoInfo ? this.dataSource.fetchCryptoData(cryptoInfo.assetId) : Promise.resolve(null),
      this.dataSource.fetchHolderPositions(market.conditionId),
      this.dataSource.fetchWhaleTrades(market.conditionId),
    ]);

    const settle = <T>(key: DataSourceKey, result: PromiseSettledResult<T>, isEmpty: (value: T) => boolean): T | null => {
      if (result.status === 'rejected') {
        const message = errorMessage(result.reason);
        console.warn(`[Orchestrator] ${key} fetch failed for ${market.conditionId}: ${message}`);
        degraded.push(key);
        errors[key] = message;
        return null;
      }
      if (isEmpty(result.value)) {
        degraded.push(key);
        return null;
      }
      return result.value;
    };

    const history = settle('priceHistory', historyResult, (v) => v.length === 0) ?? [];
    const crypto = cryptoInfo ? settle('crypto', cryptoResult, (v) => v === null) : null;
    const holders = settle('holders', holdersResult, (v) => v.length === 0) ?? [];
    const trades = settle('trades', tradesResult, (v) => v.length === 0) ?? [];

    return { history, crypto, holders, trades, degraded, errors };
  }

  private whaleEvidence(market: MarketSnapshot, trades: WhaleTradeEvidence[], now: number): WhaleEvidence {
    const flow = market.whaleFlow;
    const avgHourlyWhaleVolume =
      flow && flow.windowHours > 0 && flow.totalVolume > 0 ? flow.totalVolume / flow.windowHours : 0;

    return { trades, priceChange24h: market.priceChange24h, avgHourlyWhaleVolume, now };
  }

  /**
   * +1 when the estimate leans toward the side by at least 1pp, -1 when it leans against
   */
  private lean(side: Outcome, estimate: number, marketPrice: number): -1 | 0 | 1 {
    const delta = side === 'YES' ? estimate - marketPrice : marketPrice - estimate;
    if (delta >= CONFLICT_THRESHOLDS.ESTIMATOR_DISAGREEMENT) return 1;
    if (delta <= -CONFLICT_THRESHOLDS.ESTIMATOR_DISAGREEMENT) return -1;
    return 0;
  }

  private votingEstimators(estimates: Estimates, isCrypto: boolean): Array<[string, number]> {
    const voters: Array<[string, number]> = [
      ['signal', estimates.signal],
      ['bayesian', estimates.bayesian],
    ];
    if (isCrypto) voters.push(['monte_carlo', estimates.monteCarlo]);
    return voters;
  }

  private detectConflicts(
    side: Outcome,
    holders: HoldersAnalysis,
    estimates: Estimates,
    marketPrice: number,
    isCrypto: boolean
  ): AnalysisConflict[] {
    const conflicts: AnalysisConflict[] = [];

    if (holders.smartScoreSide !== side) {
      if (holders.smartScore >= CONFLICT_THRESHOLDS.HARD_SMART_SCORE) {
        conflicts.push({
          type: 'smart_money_disagreement',
          severity: 'hard',
          description: `Smart money score ${holders.smartScore} favors ${holders.smartScoreSide}, model favors ${side}`,
        });
      } else if (holders.smartScore >= CONFLICT_THRESHOLDS.SOFT_SMART_SCORE) {
        conflicts.push({
          type: 'smart_money_disagreement',
          severity: 'soft',
          description: `Smart money leans ${holders.smartScoreSide} (${holders.smartScore}/100)`,
        });
      }
    }

    for (const [name, estimate] of this.votingEstimators(estimates, isCrypto)) {
      if (this.lean(side, estimate, marketPrice) === -1) {
        conflicts.push({
          type: 'estimator_disagreement',
          severity: 'soft',
          description: `${name} estimate ${(estimate * 100).toFixed(1)}% disagrees with ${side}`,
        });
      }
    }

    return conflicts;
  }

  private directionalConfidence(
    side: Outcome,
    market: MarketSnapshot,
    holders: HoldersAnalysis,
    estimates: Estimates,
    conflicts: AnalysisConflict[],
    isCrypto: boolean
  ): number {
    let confidence = confidenceTierPoints(market.signalScore);

    for (const [, estimate] of this.votingEstimators(estimates, isCrypto)) {
      confidence += this.lean(side, estimate, market.yesPrice) * CONFIDENCE_POINTS.ESTIMATOR;
    }

    if (holders.smartScoreSide === side && holders.smartScore >= CONFLICT_THRESHOLDS.SOFT_SMART_SCORE) {
      confidence += CONFIDENCE_POINTS.HOLDERS_AGREE;
    }

    const flow = market.whaleFlow;
    if (flow && flow.isSignificant && flow.dominantSide === side) {
      confidence += CONFIDENCE_POINTS.WHALES_AGREE;
    }

    if (market.liquidity >= LIQUIDITY_HIGH_USD) confidence += CONFIDENCE_POINTS.LIQUIDITY_HIGH;
    else if (market.liquidity >= LIQUIDITY_MEDIUM_USD) confidence += CONFIDENCE_POINTS.LIQUIDITY_MEDIUM;

    const smartMoney = conflicts.find((c) => c.type === 'smart_money_disagreement');
    if (smartMoney?.severity === 'soft') confidence -= CONFLICT_THRESHOLDS.SOFT_PENALTY;

    confidence = clamp(confidence, 0, 100);
    if (smartMoney?.severity === 'hard') {
      confidence = Math.min(confidence, CONFLICT_THRESHOLDS.HARD_CONFIDENCE_CAP);
    }
    return confidence;
  }

  private neutralConfidence(bayesian: BayesianResult, monteCarlo: MonteCarloResult): number {
    let confidence =
      bayesian.comment === 'confirms_market' ? CONFIDENCE_POINTS.NEUTRAL_BAYES_CONFIRMS : CONFIDENCE_POINTS.NEUTRAL_BASE;
    if (Math.abs(monteCarlo.edge) < MIN_EDGE) {
      confidence = Math.min(CONFIDENCE_POINTS.NEUTRAL_MAX, confidence + CONFIDENCE_POINTS.NEUTRAL_MC_BONUS);
    }
    return confidence;
  }

  private kellyShrink(confidence: number): number {
    for (const step of KELLY_SHRINK) {
      if (confidence < step.below) return step.factor;
    }
    return 1;
  }
}
