import { InvalidInputError, MissingDataError } from '../src/errors.js';
import { Orchestrator, normalizeProbability, confidenceTierPoints } from '../src/analysis/orchestrator.js';
import type { HolderPosition, WhaleTradeEvidence } from '../src/analysis/types.js';
import { FakeDataSource, HOUR, NOW, makeFlow, makeSnapshot, mulberry32 } from './helpers.js';

function orchestrator(dataSource: FakeDataSource): Orchestrator {
  return new Orchestrator(dataSource, { simulations: 500, random: mulberry32(11), now: () => NOW });
}

describe('Orchestrator', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('normalizeProbability', () => {
    it('passes valid probabilities through', () => {
      expect(normalizeProbability(0.4, 'signal', 0.5)).toBe(0.4);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('divides percent-scale values by 100', () => {
      expect(normalizeProbability(62, 'bayesian', 0.5)).toBeCloseTo(0.62, 10);
      expect(normalizeProbability(1.5, 'signal', 0.5)).toBeCloseTo(0.015, 10);
      expect(warnSpy).toHaveBeenCalledTimes(2);
    });

    it('falls back to the market price for non-finite values', () => {
      expect(normalizeProbability(Number.NaN, 'monte_carlo', 0.45)).toBe(0.45);
      expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('[Orchestrator] monte_carlo'));
    });

    it('clamps values outside [0, 1]', () => {
      expect(normalizeProbability(-0.2, 'signal', 0.5)).toBe(0);
      expect(normalizeProbability(250, 'signal', 0.5)).toBe(1);
    });
  });

  it('maps signal scores to confidence points', () => {
    expect(confidenceTierPoints(80)).toBe(40);
    expect(confidenceTierPoints(60)).toBe(32);
    expect(confidenceTierPoints(45)).toBe(24);
    expect(confidenceTierPoints(30)).toBe(16);
    expect(confidenceTierPoints(5)).toBe(8);
  });

  it('stays neutral on a fairly priced market', async () => {
    const result = await orchestrator(new FakeDataSource()).analyze(
      makeSnapshot({ yesPrice: 0.5, signalScore: 20 }),
      10_000
    );

    expect(result.modelProbability).toBeCloseTo(0.5, 10);
    expect(result.recommendedSide).toBe('NEUTRAL');
    expect(result.kelly).toBeNull();
    expect(result.kellyPct).toBe(0);
    expect(result.isPositiveSetup).toBe(false);
    expect(result.conflicts).toEqual([]);
    // Bayes confirms the market (75) and Monte Carlo has no edge (+5)
    expect(result.confidence).toBe(80);
  });

  it('recommends YES when whales buy an underpriced market', async () => {
    const market = makeSnapshot({
      yesPrice: 0.4,
      signalScore: 80,
      smartMoneyRatio: 0.7,
      liquidity: 60_000,
      whaleFlow: makeFlow({ yesVolume: 9500, noVolume: 500, isSignificant: true, dominantSide: 'YES' }),
    });
    const result = await orchestrator(new FakeDataSource()).analyze(market, 10_000);

    expect(result.signalProbability).toBeCloseTo(0.5404, 10);
    expect(result.monteCarlo.mode).toBe('generic');
    expect(result.consensusWeights).toEqual({ monteCarlo: 0.1, signal: 0.45, bayesian: 0.45 });
    expect(result.modelProbability).toBeCloseTo(0.46318, 8);
    expect(result.estimates.map((e) => e.source)).toEqual(['signal', 'monte_carlo', 'bayesian', 'consensus']);
    expect(result.estimates[0].value).toBeCloseTo(0.5404, 10);
    expect(result.estimates[3].value).toBe(result.modelProbability);
    expect(result.edge).toBeCloseTo(0.06318, 8);
    expect(result.recommendedSide).toBe('YES');
    expect(result.kelly?.kellyFinalPct).toBeCloseTo(0.026325, 8);
    expect(result.kelly?.recommendedSize).toBe(263);
    expect(result.holders.smartScoreSide).toBe('YES');
    expect(result.holders.smartScore).toBe(74);
    // 40 tier + 15 signal + 10 holders + 10 whales + 10 liquidity
    expect(result.confidence).toBe(85);
    expect(result.kellyPct).toBeCloseTo(0.026325, 8);
    expect(result.conflicts).toEqual([]);
    expect(result.isPositiveSetup).toBe(true);
  });

  it('mirrors to NO when whales sell an overpriced market', async () => {
    const market = makeSnapshot({
      yesPrice: 0.6,
      signalScore: 80,
      smartMoneyRatio: 0.7,
      liquidity: 60_000,
      whaleFlow: makeFlow({ yesVolume: 500, noVolume: 9500, isSignificant: true, dominantSide: 'NO' }),
    });
    const result = await orchestrator(new FakeDataSource()).analyze(market, 10_000);

    expect(result.signalProbability).toBeCloseTo(0.4596, 10);
    expect(result.modelProbability).toBeCloseTo(0.53682, 8);
    expect(result.recommendedSide).toBe('NO');
    expect(result.kelly?.kellyFinalPct).toBeCloseTo(0.026325, 8);
    expect(result.holders.smartScoreSide).toBe('NO');
    expect(result.holders.smartScore).toBe(74);
    expect(result.confidence).toBe(85);
    expect(result.isPositiveSetup).toBe(true);
  });

  it('overrides the setup when smart money strongly disagrees', async () => {
    const trades: WhaleTradeEvidence[] = ['0x1', '0x2', '0x3', '0x4'].map((wallet) => ({
      wallet,
      side: 'YES',
      amountUsd: 6000,
      timestamp: NOW - HOUR / 2,
    }));
    const holders: HolderPosition[] = Array.from({ length: 10 }, (_, i) => ({
      wallet: `0xn${i}`,
      side: 'NO',
      shares: 1000,
      currentValue: 60_000,
      lifetimePnl: 20_000,
    }));
    const market = makeSnapshot({
      yesPrice: 0.4,
      signalScore: 80,
      liquidity: 60_000,
      whaleFlow: makeFlow({ yesVolume: 500, noVolume: 9500, isSignificant: false, windowHours: 5 }),
    });

    const result = await orchestrator(new FakeDataSource({ trades, holders })).analyze(market, 10_000);

    expect(result.bayesian.posterior).toBeCloseTo(0.673913, 5);
    expect(result.modelProbability).toBeCloseTo(0.523261, 5);
    expect(result.recommendedSide).toBe('YES');
    expect(result.holders.smartScoreSide).toBe('NO');
    expect(result.holders.smartScore).toBe(86);
    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0]).toMatchObject({ type: 'smart_money_disagreement', severity: 'hard' });
    expect(result.confidence).toBe(20);
    expect(result.kellyPct).toBe(0);
    expect(result.kelly?.kellyFinalPct).toBe(0);
    expect(result.kelly?.recommendedSize).toBe(0);
    expect(result.isPositiveSetup).toBe(false);
  });

  it('stays neutral when the edge clears the gate but Kelly is too small', async () => {
    const market = makeSnapshot({
      yesPrice: 0.1,
      signalScore: 80,
      whaleFlow: makeFlow({ yesVolume: 7500, noVolume: 2500, isSignificant: true, dominantSide: 'YES' }),
    });
    const result = await orchestrator(new FakeDataSource()).analyze(market, 10_000);

    // signal 0.1 + 0.5 * 0.12 = 0.16, blended with market-priced Bayes and Monte Carlo
    expect(result.modelProbability).toBeCloseTo(0.127, 10);
    expect(result.edge).toBeCloseTo(0.027, 10);
    expect(result.kelly?.isTooSmall).toBe(true);
    expect(result.kelly?.kellyFinalPct).toBe(0);
    expect(result.recommendedSide).toBe('NEUTRAL');
    expect(result.kellyPct).toBe(0);
    expect(result.isPositiveSetup).toBe(false);
  });

  it('blends with crypto weights and shrinks Kelly at low confidence', async () => {
    const dataSource = new FakeDataSource({
      crypto: {
        assetId: 'bitcoin',
        currentPrice: 100_000,
        annualizedVolatility: 0.5,
        annualizedDrift: 0,
        sampleCount: 30,
      },
    });
    const market = makeSnapshot({
      question: 'Will Bitcoin exceed $1,000,000 by Friday?',
      yesPrice: 0.1,
      daysToClose: 2,
      signalScore: 50,
      liquidity: 0,
    });

    const result = await orchestrator(dataSource).analyze(market, 10_000);

    expect(dataSource.calls.crypto).toEqual(['bitcoin']);
    expect(result.monteCarlo.mode).toBe('crypto');
    expect(result.monteCarlo.probabilityYes).toBe(0.001);
    expect(result.consensusWeights).toEqual({ monteCarlo: 0.5, signal: 0.25, bayesian: 0.25 });
    expect(result.modelProbability).toBeCloseTo(0.0505, 8);
    expect(result.recommendedSide).toBe('NO');
    expect(result.kelly?.kellyScaled).toBeGreaterThan(0.1);
    // 24 tier + 15 Monte Carlo + 10 holders, below 50 so the 10% cap is shrunk by 0.6
    expect(result.confidence).toBe(49);
    expect(result.kellyPct).toBeCloseTo(0.06, 10);
    expect(result.kelly?.kellyFinalPct).toBeCloseTo(0.06, 10);
    expect(result.kelly?.recommendedSize).toBe(600);
  });

  it('degrades failed and empty sources without failing', async () => {
    const dataSource = new FakeDataSource({
      history: new MissingDataError('priceHistory', 'No price history'),
      trades: new Error('socket hang up'),
    });

    const result = await orchestrator(dataSource).analyze(makeSnapshot(), 10_000);

    expect(result.degraded).toEqual(['priceHistory', 'holders', 'trades']);
    expect(result.errors).toEqual({ priceHistory: 'No price history', trades: 'socket hang up' });
    expect(result.greeks.theta.status).toBe('no_data');
    expect(result.holders.hasHolderData).toBe(false);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it('uses a preloaded price history instead of fetching', async () => {
    const dataSource = new FakeDataSource();
    const priceHistory = [
      { timestamp: NOW - 2 * HOUR, price: 0.5 },
      { timestamp: NOW - HOUR, price: 0.5 },
    ];

    const result = await orchestrator(dataSource).analyze(makeSnapshot({ priceHistory }), 10_000);

    expect(dataSource.calls.history).toEqual([]);
    expect(result.degraded).not.toContain('priceHistory');
    expect(result.greeks.theta.status).toBe('ok');
  });

  it('rejects invalid inputs', async () => {
    const o = orchestrator(new FakeDataSource());

    await expect(o.analyze(makeSnapshot(), 0)).rejects.toThrow(InvalidInputError);
    await expect(o.analyze(makeSnapshot(), 10_000, 2)).rejects.toThrow(InvalidInputError);
    await expect(o.analyze(makeSnapshot({ yesPrice: 0 }), 10_000)).rejects.toThrow(InvalidInputError);
  });
});
