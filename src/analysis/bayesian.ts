/**
 * Bayesian Updater
 *
 * Updates a prior (usually the market price) in odds form:
 *   posterior_odds = prior_odds * LR_surge * LR_divergence * LR_consensus
 * Each likelihood ratio comes from whale behaviour: a volume surge, price
 * moving against whale flow, or several large wallets agreeing on a side.
 */

import type {
  BayesianComment,
  BayesianResult,
  Evidence,
  EvidenceKind,
  Outcome,
  Side,
  WhaleEvidence,
  WhaleTradeEvidence,
} from './types.js';
import { clamp } from './stats.js';

const HOUR = 60 * 60 * 1000;

export const LR_BOUNDS = { MIN: 0.33, MAX: 3.0 };

export const EVIDENCE_THRESHOLDS = {
  WHALE_TRADE_USD: 500,
  MIN_WINDOW_VOLUME_USD: 500,
  SURGE_WINDOW_MS: 2 * HOUR,
  SURGE_NO_BASELINE_USD: 5000,
  SURGE_MIN_RATIO: 1.5,
  DIVERGENCE_WINDOW_MS: 4 * HOUR,
  DIVERGENCE_MIN_MOVE: 0.05,
  CONSENSUS_WINDOW_MS: 4 * HOUR,
  CONSENSUS_TRADE_USD: 5000,
  CONSENSUS_MIN_WALLETS: 3,
  YES_SHARE_HIGH: 0.6,
  YES_SHARE_LOW: 0.4,
};

const PRIOR_BOUNDS = { MIN: 0.01, MAX: 0.99 };
const POSTERIOR_BOUNDS = { MIN: 0.03, MAX: 0.97 };

// Comment and direction cutoffs on |posterior - prior|
const CONFIRMS_MARKET_SHIFT = 0.02;
const WEAK_SIGNAL_SHIFT = 0.05;

// Smart-money evidence: score 60 -> 1.2x, score 100 -> 2.5x (or 1/2.5 for NO)
const SMART_MONEY_MIN_SCORE = 60;
const SMART_MONEY_WEAK_LR = 1.2;
const SMART_MONEY_STRONG_LR = 2.5;

export function clampLr(lr: number): number {
  return clamp(lr, LR_BOUNDS.MIN, LR_BOUNDS.MAX);
}

export function evidenceStrength(lr: number): Evidence['strength'] {
  if (lr >= 2.0 || lr <= 0.5) return 'strong';
  if (lr >= 1.3 || lr <= 0.77) return 'moderate';
  return 'weak';
}

function makeEvidence(kind: EvidenceKind, description: string, rawLr: number): Evidence {
  const likelihoodRatio = clampLr(rawLr);
  return { kind, description, likelihoodRatio, strength: evidenceStrength(likelihoodRatio) };
}

function tradesInWindow(trades: WhaleTradeEvidence[], now: number, windowMs: number, minUsd: number) {
  const cutoff = now - windowMs;
  return trades.filter((t) => t.timestamp >= cutoff && t.amountUsd >= minUsd);
}

function sideVolumes(trades: WhaleTradeEvidence[]): { yes: number; no: number; total: number } {
  let yes = 0;
  let no = 0;
  for (const t of trades) {
    if (t.side === 'YES') yes += t.amountUsd;
    else no += t.amountUsd;
  }
  return { yes, no, total: yes + no };
}

const pct = (share: number): string => `${(share * 100).toFixed(0)}%`;

/**
 * Whale volume in the last 2h against the hourly baseline
 */
export function detectWhaleSurge(evidence: WhaleEvidence): Evidence | null {
  const recent = tradesInWindow(
    evidence.trades,
    evidence.now,
    EVIDENCE_THRESHOLDS.SURGE_WINDOW_MS,
    EVIDENCE_THRESHOLDS.WHALE_TRADE_USD
  );
  const volumes = sideVolumes(recent);
  if (volumes.total < EVIDENCE_THRESHOLDS.MIN_WINDOW_VOLUME_USD) return null;

  const windowHours = EVIDENCE_THRESHOLDS.SURGE_WINDOW_MS / HOUR;
  let surgeRatio: number;
  if (evidence.avgHourlyWhaleVolume > 0) {
    surgeRatio = volumes.total / (evidence.avgHourlyWhaleVolume * windowHours);
  } else {
    surgeRatio = volumes.total > EVIDENCE_THRESHOLDS.SURGE_NO_BASELINE_USD ? 2 : 1;
  }

  if (surgeRatio < EVIDENCE_THRESHOLDS.SURGE_MIN_RATIO) return null;

  let baseLr = 1.3;
  if (surgeRatio >= 5) baseLr = 2.0;
  else if (surgeRatio >= 3) baseLr = 1.5;

  const yesShare = volumes.yes / volumes.total;
  if (yesShare > EVIDENCE_THRESHOLDS.YES_SHARE_HIGH) {
    return makeEvidence('whale_surge', `Whale surge ${surgeRatio.toFixed(1)}x avg, ${pct(yesShare)} YES`, baseLr);
  }
  if (yesShare < EVIDENCE_THRESHOLDS.YES_SHARE_LOW) {
    return makeEvidence('whale_surge', `Whale surge ${surgeRatio.toFixed(1)}x avg, ${pct(1 - yesShare)} NO`, 1 / baseLr);
  }
  return null;
}

/**
 * Price moving one way while whales buy the other
 */
export function detectPriceVolumeDivergence(evidence: WhaleEvidence): Evidence | null {
  const recent = tradesInWindow(
    evidence.trades,
    evidence.now,
    EVIDENCE_THRESHOLDS.DIVERGENCE_WINDOW_MS,
    EVIDENCE_THRESHOLDS.WHALE_TRADE_USD
  );
  const volumes = sideVolumes(recent);
  if (volumes.total < EVIDENCE_THRESHOLDS.MIN_WINDOW_VOLUME_USD) return null;

  const move = evidence.priceChange24h;
  const yesShare = volumes.yes / volumes.total;
  const lrFor = (change: number): number => 1.3 + Math.min(Math.abs(change) * 10, 1) * 0.7;

  if (move < -EVIDENCE_THRESHOLDS.DIVERGENCE_MIN_MOVE && yesShare > EVIDENCE_THRESHOLDS.YES_SHARE_HIGH) {
    return makeEvidence(
      'price_volume_divergence',
      `Price down ${(Math.abs(move) * 100).toFixed(1)}% but whales ${pct(yesShare)} YES`,
      lrFor(move)
    );
  }
  if (move > EVIDENCE_THRESHOLDS.DIVERGENCE_MIN_MOVE && yesShare < EVIDENCE_THRESHOLDS.YES_SHARE_LOW) {
    return makeEvidence(
      'price_volume_divergence',
      `Price up ${(move * 100).toFixed(1)}% but whales ${pct(1 - yesShare)} NO`,
      1 / lrFor(move)
    );
  }
  return null;
}

/**
 * Several distinct wallets placing $5K+ trades on the same side within 4h
 */
export function detectConsensus(evidence: WhaleEvidence): Evidence | null {
  const large = tradesInWindow(
    evidence.trades,
    evidence.now,
    EVIDENCE_THRESHOLDS.CONSENSUS_WINDOW_MS,
    EVIDENCE_THRESHOLDS.CONSENSUS_TRADE_USD
  );

  const yesWallets = new Set<string>();
  const noWallets = new Set<string>();
  for (const t of large) {
    if (!t.wallet) continue;
    (t.side === 'YES' ? yesWallets : noWallets).add(t.wallet);
  }

  const min = EVIDENCE_THRESHOLDS.CONSENSUS_MIN_WALLETS;
  const lrFor = (n: number): number => 1.4 + Math.min((n - min) * 0.15, 0.6);
  const minK = (EVIDENCE_THRESHOLDS.CONSENSUS_TRADE_USD / 1000).toFixed(0);

  if (yesWallets.size >= min && yesWallets.size > noWallets.size) {
    return makeEvidence('consensus', `${yesWallets.size} whales ($${minK}K+) consensus YES`, lrFor(yesWallets.size));
  }
  if (noWallets.size >= min && noWallets.size > yesWallets.size) {
    return makeEvidence('consensus', `${noWallets.size} whales ($${minK}K+) consensus NO`, 1 / lrFor(noWallets.size));
  }
  return null;
}

/**
 * Holder-quality evidence for a smart score of 60 or more
 */
export function smartMoneyEvidence(score: number, side: Outcome): Evidence | null {
  if (score < SMART_MONEY_MIN_SCORE) return null;

  const normalized = Math.min(1, (score - SMART_MONEY_MIN_SCORE) / (100 - SMART_MONEY_MIN_SCORE));
  const lr = SMART_MONEY_WEAK_LR + normalized * (SMART_MONEY_STRONG_LR - SMART_MONEY_WEAK_LR);

  return makeEvidence(
    'smart_money',
    `Smart money score ${score.toFixed(0)}/100 favors ${side}`,
    side === 'YES' ? lr : 1 / lr
  );
}

function commentFor(shift: number): BayesianComment {
  if (shift < CONFIRMS_MARKET_SHIFT) return 'confirms_market';
  if (shift < WEAK_SIGNAL_SHIFT) return 'weak_signal';
  return 'strong_signal';
}

function combine(prior: number, evidence: Evidence[]): BayesianResult {
  const clampedPrior = clamp(prior, PRIOR_BOUNDS.MIN, PRIOR_BOUNDS.MAX);

  const ratioOf = (kind: EvidenceKind): number =>
    evidence.find((e) => e.kind === kind)?.likelihoodRatio ?? 1;

  const combinedLr = evidence.reduce((product, e) => product * e.likelihoodRatio, 1);
  const odds = (clampedPrior / (1 - clampedPrior)) * combinedLr;
  const posterior = clamp(odds / (1 + odds), POSTERIOR_BOUNDS.MIN, POSTERIOR_BOUNDS.MAX);

  const shift = Math.abs(posterior - prior);
  let direction: Side = 'NEUTRAL';
  if (posterior > prior + CONFIRMS_MARKET_SHIFT) direction = 'YES';
  else if (posterior < prior - CONFIRMS_MARKET_SHIFT) direction = 'NO';

  return {
    prior,
    posterior,
    evidence,
    likelihoodRatios: {
      surge: ratioOf('whale_surge'),
      divergence: ratioOf('price_volume_divergence'),
      consensus: ratioOf('consensus'),
    },
    combinedLr,
    shift,
    direction,
    comment: commentFor(shift),
  };
}

function collectWhaleEvidence(evidence: WhaleEvidence): Evidence[] {
  return [detectWhaleSurge(evidence), detectPriceVolumeDivergence(evidence), detectConsensus(evidence)].filter(
    (e): e is Evidence => e !== null
  );
}

export function bayesianUpdate(prior: number, evidence: WhaleEvidence): BayesianResult {
  return combine(prior, collectWhaleEvidence(evidence));
}

export function bayesianUpdateWithHolders(
  prior: number,
  evidence: WhaleEvidence,
  smartScore: number,
  smartSide: Outcome
): BayesianResult {
  const items = collectWhaleEvidence(evidence);
  const holders = smartMoneyEvidence(smartScore, smartSide);
  if (holders) items.push(holders);
  return combine(prior, items);
}

export function emptyWhaleEvidence(now: number, priceChange24h = 0): WhaleEvidence {
  return { trades: [], priceChange24h, avgHourlyWhaleVolume: 0, now };
}
