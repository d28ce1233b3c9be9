/**
 * Analysis Module
 *
 * Signal scoring and probability estimation:
 * - Signal-based probability model
 * - Kelly position sizing
 * - Greeks (time decay and volatility regime)
 * - Monte Carlo simulation
 * - Bayesian update from whale evidence
 * - Holder quality scoring
 * - Deep analysis orchestrator
 */

export {
  estimateProbability,
  signalEstimate,
  calculateEdge,
  edgePercentage,
  recommendedSideFromProbability,
  clampProbability,
  confidenceCeiling,
  smartMoneyMultiplier,
} from './probability.js';
export {
  sizePosition,
  sizePositionForSide,
  withFinalPct,
  fractionName,
  MAX_POSITION_PCT,
  DEFAULT_KELLY_FRACTION,
} from './kelly.js';
export { calculateTheta, calculateVega, calculateGreeks, classifyRegime } from './greeks.js';
export {
  simulate,
  detectCryptoMarket,
  isValidCryptoData,
  DEFAULT_SIMULATIONS,
  type DriftMode,
  type SimulationOptions,
  type SimulationInputs,
} from './monte-carlo.js';
export {
  bayesianUpdate,
  bayesianUpdateWithHolders,
  smartMoneyEvidence,
  detectWhaleSurge,
  detectPriceVolumeDivergence,
  detectConsensus,
} from './bayesian.js';
export { scoreHolders, calculateSideStats, holderQualityScore, ABOVE_10K_POINTS_PER_PCT } from './holders.js';
export { Orchestrator, normalizeProbability, MIN_EDGE, type OrchestratorOptions } from './orchestrator.js';
export type { RandomSource } from './stats.js';

export type {
  Outcome,
  Side,
  PricePoint,
  WhaleFlow,
  MarketSnapshot,
  CryptoData,
  HolderPosition,
  WhaleTradeEvidence,
  WhaleEvidence,
  ProbabilityEstimate,
  KellyResult,
  NoData,
  ThetaResult,
  VegaResult,
  GreeksResult,
  MonteCarloResult,
  BayesianResult,
  Evidence,
  SideStats,
  HoldersAnalysis,
  DataSourceKey,
  AnalysisConflict,
  DeepAnalysisResult,
  MarketDataSource,
} from './types.js';
