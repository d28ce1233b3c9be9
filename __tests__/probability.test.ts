import {
  calculateEdge,
  clampProbability,
  confidenceCeiling,
  edgePercentage,
  estimateProbability,
  recommendedSideFromProbability,
  signalEstimate,
  smartMoneyMultiplier,
} from '../src/analysis/probability.js';
import { makeFlow, makeSnapshot } from './helpers.js';

describe('ProbabilityModel', () => {
  describe('confidenceCeiling', () => {
    it('steps down with the signal score', () => {
      expect(confidenceCeiling(85)).toBe(0.12);
      expect(confidenceCeiling(70)).toBe(0.12);
      expect(confidenceCeiling(60)).toBe(0.08);
      expect(confidenceCeiling(40)).toBe(0.05);
      expect(confidenceCeiling(25)).toBe(0.03);
      expect(confidenceCeiling(10)).toBe(0.01);
    });
  });

  describe('smartMoneyMultiplier', () => {
    it('boosts high smart-money ratios', () => {
      expect(smartMoneyMultiplier(0.7)).toBe(1.3);
      expect(smartMoneyMultiplier(0.3)).toBe(1.1);
      expect(smartMoneyMultiplier(0.1)).toBe(1);
    });
  });

  describe('signalEstimate', () => {
    it('tags the signal probability with its source', () => {
      expect(signalEstimate(makeSnapshot({ yesPrice: 0.4 }))).toEqual({ value: 0.4, source: 'signal' });
    });
  });

  describe('estimateProbability', () => {
    it('returns the market price without whale flow', () => {
      expect(estimateProbability(makeSnapshot({ yesPrice: 0.4 }))).toBe(0.4);
    });

    it('ignores flow that is not significant', () => {
      const market = makeSnapshot({
        yesPrice: 0.4,
        signalScore: 80,
        whaleFlow: makeFlow({ yesVolume: 9500, noVolume: 500, isSignificant: false }),
      });
      expect(estimateProbability(market)).toBe(0.4);
    });

    it('tilts toward whale flow by the capped ceiling', () => {
      const market = makeSnapshot({
        yesPrice: 0.4,
        signalScore: 80,
        smartMoneyRatio: 0.7,
        whaleFlow: makeFlow({ yesVolume: 9500, noVolume: 500, isSignificant: true }),
      });
      // 0.4 + 0.9 * 0.12 * 1.3
      expect(estimateProbability(market)).toBeCloseTo(0.5404, 10);
    });

    it('never moves further than the ceiling allows', () => {
      for (const score of [10, 30, 45, 60, 90]) {
        const market = makeSnapshot({
          yesPrice: 0.5,
          signalScore: score,
          smartMoneyRatio: 0.9,
          whaleFlow: makeFlow({ yesVolume: 0, noVolume: 20_000, isSignificant: true }),
        });
        const shift = Math.abs(estimateProbability(market) - 0.5);
        expect(shift).toBeLessThanOrEqual(confidenceCeiling(score) * 1.3 + 1e-12);
      }
    });

    it('stays within [0.03, 0.97]', () => {
      const high = makeSnapshot({
        yesPrice: 0.95,
        signalScore: 90,
        smartMoneyRatio: 0.7,
        whaleFlow: makeFlow({ yesVolume: 20_000, noVolume: 0, isSignificant: true }),
      });
      const low = makeSnapshot({ yesPrice: 0.01 });

      expect(estimateProbability(high)).toBe(0.97);
      expect(estimateProbability(low)).toBe(0.03);
    });
  });

  describe('edge helpers', () => {
    it('computes edge and edge percentage', () => {
      expect(calculateEdge(0.63, 0.55)).toBeCloseTo(0.08, 10);
      expect(edgePercentage(0.63, 0.55)).toBeCloseTo(14.545454, 5);
      expect(edgePercentage(0.4, 0.4)).toBe(0);
      expect(edgePercentage(0.4, 0)).toBe(0);
    });

    it('maps probabilities to sides at 0.55 and 0.45', () => {
      expect(recommendedSideFromProbability(0.55)).toBe('YES');
      expect(recommendedSideFromProbability(0.45)).toBe('NO');
      expect(recommendedSideFromProbability(0.5)).toBe('NEUTRAL');
    });

    it('clamps probabilities', () => {
      expect(clampProbability(1.2)).toBe(0.97);
      expect(clampProbability(-1)).toBe(0.03);
      expect(clampProbability(0.5)).toBe(0.5);
    });
  });
});
