/**
 * Analysis Module Types
 *
 * Value objects for the signal-scoring and probability-estimation pipeline.
 * Everything here is created per analysis call and never persisted.
 */

export type Outcome = 'YES' | 'NO';
export type Side = Outcome | 'NEUTRAL';

// Price sample (timestamp in ms, price 0-1)
export interface PricePoint {
  timestamp: number;
  price: number;
}

// Aggregated whale trade flow for a market
export interface WhaleFlow {
  yesVolume: number;
  noVolume: number;
  yesCount: number;
  noCount: number;
  totalVolume: number;
  isSignificant: boolean;     // Minimum volume gate
  tilt: number;               // (yes - no) / total, in [-1, 1]
  dominantSide: Side;
  lastYesTradeAt: number | null;
  lastNoTradeAt: number | null;
  windowHours: number;        // Observation window the volumes cover
}

// Market snapshot handed to the orchestrator
export interface MarketSnapshot {
  conditionId: string;
  question: string;
  slug?: string;

  // Prices
  yesPrice: number;
  noPrice: number;
  priceChange24h: number;     // YES price delta (0.05 = +5pp)

  // Volume & liquidity
  volume24h: number;
  volumeTotal: number;
  liquidity: number;

  // Time
  daysToClose: number;

  // CLOB tokens [YES, NO]
  clobTokenIds: string[];

  // Optional pre-fetched history (skips the history fetch when present)
  priceHistory?: PricePoint[];

  // Whale analysis
  whaleFlow: WhaleFlow | null;
  signalScore: number;        // 0-100
  smartMoneyRatio: number;    // Share of volume from whale-sized trades (0-1)
}

// Crypto reference data for price-target markets
export interface CryptoData {
  assetId: string;
  currentPrice: number;
  annualizedVolatility: number;
  annualizedDrift: number;
  sampleCount: number;
}

// Single wallet stake in a market
export interface HolderPosition {
  wallet: string;
  side: Outcome;
  shares: number;
  currentValue: number;       // USDC value of the position
  lifetimePnl: number;        // USDC
}

// Large trade used as Bayesian evidence
export interface WhaleTradeEvidence {
  wallet: string;
  side: Outcome;
  amountUsd: number;
  timestamp: number;
}

export interface WhaleEvidence {
  trades: WhaleTradeEvidence[];
  priceChange24h: number;
  avgHourlyWhaleVolume: number;
  now: number;
}

export type ProbabilitySource = 'signal' | 'monte_carlo' | 'bayesian' | 'consensus';

export interface ProbabilityEstimate {
  value: number;
  source: ProbabilitySource;
}

// Kelly sizing result
export interface KellyResult {
  modelProbability: number;
  marketPrice: number;
  bankroll: number;
  fraction: number;
  fractionName: string;

  kellyFull: number;          // Unconstrained Kelly fraction
  kellyScaled: number;        // kellyFull * fraction
  kellyFinalPct: number;      // Capped fraction of bankroll (0.10 = 10%)
  recommendedSize: number;    // Currency amount
  potentialProfit: number;    // Profit if the bet wins

  hasEdge: boolean;
  isTooSmall: boolean;
}

// Greeks
export interface NoData {
  status: 'no_data';
  reason: string;
}

export interface ThetaResult {
  status: 'ok';
  daysRemaining: number;
  currentPrice: number;
  expected: number;           // Expected YES drift per day
  actual: number;             // Observed YES drift per day
  anomaly: number;            // expected - actual
  dominantSide: Outcome;
  timeValue: number;
  isOpportunity: boolean;
}

export type VolatilityRegime = 'shock' | 'dormant' | 'elevated' | 'normal';

export interface VegaResult {
  status: 'ok';
  historicalVol: number;      // 7d annualized
  recentVol: number;          // 24h annualized
  volRatio: number;
  regime: VolatilityRegime;
}

export interface GreeksResult {
  theta: ThetaResult | NoData;
  vega: VegaResult | NoData;
}

// Monte Carlo
export type SimulationMode = 'crypto' | 'generic';
export type ThresholdDirection = 'above' | 'below';

export interface CryptoMarketInfo {
  assetId: string;
  threshold: number;
  direction: ThresholdDirection;
}

export interface DistributionBucket {
  label: string;
  share: number;
}

export interface MonteCarloResult {
  mode: SimulationMode;
  runs: number;
  probabilityYes: number;
  marketPrice: number;
  edge: number;

  percentile5: number;
  percentile50: number;
  percentile95: number;
  mean: number;
  stdDev: number;
  distribution: DistributionBucket[];

  // Crypto mode only
  crypto?: {
    assetId: string;
    currentPrice: number;
    threshold: number;
    direction: ThresholdDirection;
    volatility: number;
    drift: number;
  };
}

// Bayesian
export type EvidenceKind = 'whale_surge' | 'price_volume_divergence' | 'consensus' | 'smart_money';

export interface Evidence {
  kind: EvidenceKind;
  description: string;
  likelihoodRatio: number;    // > 1 supports YES, < 1 supports NO
  strength: 'strong' | 'moderate' | 'weak';
}

export type BayesianComment = 'confirms_market' | 'weak_signal' | 'strong_signal';

export interface BayesianResult {
  prior: number;
  posterior: number;
  evidence: Evidence[];
  likelihoodRatios: {
    surge: number;
    divergence: number;
    consensus: number;
  };
  combinedLr: number;
  shift: number;              // |posterior - prior|
  direction: Side;
  comment: BayesianComment;
}

// Holders
export interface SideStats {
  side: Outcome;
  count: number;
  medianPnl: number;
  profitableCount: number;
  profitablePct: number;
  above5kCount: number;       // Position value > $5K
  above10kCount: number;
  above50kCount: number;
  above5kPct: number;
  above10kPct: number;
  smart5kCount: number;       // Lifetime PnL > $5K
  smart10kCount: number;
  topHolderAddress: string;
  topHolderProfit: number;
}

export interface SmartScoreBreakdown {
  holders: number;
  tilt: number;
  model: number;
}

export interface HoldersAnalysis {
  yesStats: SideStats;
  noStats: SideStats;
  smartScore: number;         // Integer 0-100
  smartScoreSide: Outcome;
  breakdown: SmartScoreBreakdown;
  scores: { yes: number; no: number };
  hasHolderData: boolean;
}

// Orchestrator output
export type DataSourceKey = 'priceHistory' | 'crypto' | 'holders' | 'trades';

export type ConflictType = 'smart_money_disagreement' | 'estimator_disagreement';

export interface AnalysisConflict {
  type: ConflictType;
  severity: 'hard' | 'soft';
  description: string;
}

export interface ConsensusWeights {
  signal: number;
  monteCarlo: number;
  bayesian: number;
}

export interface DeepAnalysisResult {
  conditionId: string;
  question: string;

  marketPrice: number;
  signalProbability: number;
  modelProbability: number;
  consensusWeights: ConsensusWeights;
  estimates: ProbabilityEstimate[]; // Normalized inputs to the blend, then the consensus

  edge: number;               // model - market
  edgePercentage: number;
  recommendedSide: Side;
  confidence: number;         // 0-100
  kellyPct: number;           // Fraction of bankroll after confidence shrink
  kelly: KellyResult | null;
  isPositiveSetup: boolean;
  conflicts: AnalysisConflict[];

  monteCarlo: MonteCarloResult;
  bayesian: BayesianResult;
  greeks: GreeksResult;
  holders: HoldersAnalysis;

  degraded: DataSourceKey[];
  errors: Partial<Record<DataSourceKey, string>>;
  analyzedAt: number;
}

// Boundary the orchestrator fetches through. Implementations own caching and timeouts.
export interface MarketDataSource {
  fetchPriceHistory(tokenId: string): Promise<PricePoint[]>;
  fetchCryptoData(assetId: string): Promise<CryptoData | null>;
  fetchHolderPositions(conditionId: string): Promise<HolderPosition[]>;
  fetchWhaleTrades(conditionId: string): Promise<WhaleTradeEvidence[]>;
}
