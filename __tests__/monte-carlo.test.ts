import { detectCryptoMarket, isValidCryptoData, simulate } from '../src/analysis/monte-carlo.js';
import type { CryptoData } from '../src/analysis/types.js';
import { mulberry32 } from './helpers.js';

const bitcoin: CryptoData = {
  assetId: 'bitcoin',
  currentPrice: 100_000,
  annualizedVolatility: 0.5,
  annualizedDrift: 0,
  sampleCount: 30,
};

describe('MonteCarloEngine', () => {
  describe('detectCryptoMarket', () => {
    it('parses k suffixes and defaults to above', () => {
      expect(detectCryptoMarket('Will Bitcoin exceed $120k by March?')).toEqual({
        assetId: 'bitcoin',
        threshold: 120_000,
        direction: 'above',
      });
    });

    it('parses thousands separators and downward wording', () => {
      expect(detectCryptoMarket('Will ETH fall below $2,500 by Friday?')).toEqual({
        assetId: 'ethereum',
        threshold: 2500,
        direction: 'below',
      });
    });

    it('parses m suffixes and decimals', () => {
      expect(detectCryptoMarket('Will Solana reach $1.5m?')).toEqual({
        assetId: 'solana',
        threshold: 1_500_000,
        direction: 'above',
      });
    });

    it('parses written-out amounts', () => {
      expect(detectCryptoMarket('Will Bitcoin hit $1 million by 2030?')).toEqual({
        assetId: 'bitcoin',
        threshold: 1_000_000,
        direction: 'above',
      });
      expect(detectCryptoMarket('Will Ethereum reach $10 thousand?')?.threshold).toBe(10_000);
      expect(detectCryptoMarket('Will Bitcoin top $2.5 billion?')?.threshold).toBe(2_500_000_000);
    });

    it('does not take a suffix from the next word', () => {
      expect(detectCryptoMarket('Will Bitcoin be above $100 by March?')?.threshold).toBe(100);
      expect(detectCryptoMarket('Will Bitcoin hit $5 more than once?')?.threshold).toBe(5);
    });

    it('ignores non-crypto questions and questions without a threshold', () => {
      expect(detectCryptoMarket('Will the Fed cut rates in June?')).toBeNull();
      expect(detectCryptoMarket('Will Bitcoin be the top asset this year?')).toBeNull();
    });

    it('matches keywords on word boundaries', () => {
      expect(detectCryptoMarket('Will a solar stock close above $50?')).toBeNull();
    });
  });

  describe('isValidCryptoData', () => {
    it('requires a price and a week of samples', () => {
      expect(isValidCryptoData(bitcoin)).toBe(true);
      expect(isValidCryptoData({ ...bitcoin, currentPrice: 0 })).toBe(false);
      expect(isValidCryptoData({ ...bitcoin, sampleCount: 6 })).toBe(false);
      expect(isValidCryptoData(null)).toBe(false);
    });
  });

  describe('generic mode', () => {
    it('keeps probabilityYes at the market price', () => {
      const result = simulate(
        { question: 'Will the test event happen?', yesPrice: 0.37, daysToClose: 12 },
        {},
        { runs: 2000, random: mulberry32(7) }
      );

      expect(result.mode).toBe('generic');
      expect(result.probabilityYes).toBe(0.37);
      expect(result.edge).toBe(0);
      expect(result.crypto).toBeUndefined();
      expect(result.distribution.map((b) => b.label)).toEqual(['0-20c', '20-40c', '40-60c', '60-80c', '80-100c']);

      const totalShare = result.distribution.reduce((sum, b) => sum + b.share, 0);
      expect(totalShare).toBeCloseTo(1, 10);
      expect(result.percentile5).toBeGreaterThanOrEqual(0.01);
      expect(result.percentile95).toBeLessThanOrEqual(0.99);
      expect(result.percentile5).toBeLessThanOrEqual(result.percentile50);
      expect(result.percentile50).toBeLessThanOrEqual(result.percentile95);
    });

    it('falls back to generic when crypto data does not match the question', () => {
      const result = simulate(
        { question: 'Will Bitcoin exceed $120k by March?', yesPrice: 0.2, daysToClose: 30 },
        { crypto: { ...bitcoin, assetId: 'ethereum' } },
        { runs: 100, random: mulberry32(1) }
      );
      expect(result.mode).toBe('generic');
      expect(result.probabilityYes).toBe(0.2);
    });
  });

  describe('crypto mode', () => {
    it('is reproducible with a seeded generator', () => {
      const market = { question: 'Will Bitcoin exceed $110k by March?', yesPrice: 0.3, daysToClose: 30 };
      const first = simulate(market, { crypto: bitcoin }, { runs: 1000, random: mulberry32(42) });
      const second = simulate(market, { crypto: bitcoin }, { runs: 1000, random: mulberry32(42) });

      expect(first.mode).toBe('crypto');
      expect(first.probabilityYes).toBe(second.probabilityYes);
      expect(first.edge).toBeCloseTo(first.probabilityYes - 0.3, 12);
      expect(first.crypto).toEqual({
        assetId: 'bitcoin',
        currentPrice: 100_000,
        threshold: 110_000,
        direction: 'above',
        volatility: 0.5,
        drift: 0,
      });
    });

    it('lands near the lognormal probability', () => {
      // P(S_T >= 110k) for S0 100k, sigma 0.5, 30 days, zero drift: N(d2) ~ 0.2307
      const result = simulate(
        { question: 'Will Bitcoin exceed $110k by March?', yesPrice: 0.3, daysToClose: 30 },
        { crypto: bitcoin },
        { runs: 5000, random: mulberry32(42) }
      );

      expect(result.probabilityYes).toBeGreaterThan(0.2);
      expect(result.probabilityYes).toBeLessThan(0.26);
    });

    it('floors and caps the probability', () => {
      const above = simulate(
        { question: 'Will Bitcoin exceed $1,000,000 this week?', yesPrice: 0.05, daysToClose: 2 },
        { crypto: bitcoin },
        { runs: 500, random: mulberry32(3) }
      );
      const below = simulate(
        { question: 'Will Bitcoin fall below $1,000,000 this week?', yesPrice: 0.95, daysToClose: 2 },
        { crypto: bitcoin },
        { runs: 500, random: mulberry32(3) }
      );

      expect(above.probabilityYes).toBe(0.001);
      expect(below.probabilityYes).toBe(0.999);
    });

    it('labels buckets around the threshold', () => {
      const result = simulate(
        { question: 'Will Bitcoin exceed $120k by March?', yesPrice: 0.2, daysToClose: 30 },
        { crypto: bitcoin },
        { runs: 500, random: mulberry32(9) }
      );

      expect(result.distribution.map((b) => b.label)).toEqual([
        '< $96K',
        '$96K-$108K',
        '$108K-$120K',
        '$120K-$132K',
        '> $132K',
      ]);
      expect(result.distribution.reduce((sum, b) => sum + b.share, 0)).toBeCloseTo(1, 10);
    });

    it('uses the inferred drift only when asked', () => {
      const market = { question: 'Will Bitcoin exceed $110k by March?', yesPrice: 0.3, daysToClose: 30 };
      const inferred = simulate(
        market,
        { crypto: { ...bitcoin, annualizedDrift: 0.8 } },
        { runs: 100, random: mulberry32(5), driftMode: 'inferred' }
      );
      const zero = simulate(market, { crypto: { ...bitcoin, annualizedDrift: 0.8 } }, { runs: 100, random: mulberry32(5) });

      expect(inferred.crypto?.drift).toBe(0.8);
      expect(zero.crypto?.drift).toBe(0);
    });
  });
});
