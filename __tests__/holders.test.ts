import { calculateSideStats, holderQualityScore, scoreHolders } from '../src/analysis/holders.js';
import type { HolderPosition, Outcome } from '../src/analysis/types.js';
import { makeFlow } from './helpers.js';

function holder(wallet: string, side: Outcome, currentValue: number, lifetimePnl: number, shares = 100): HolderPosition {
  return { wallet, side, shares, currentValue, lifetimePnl };
}

describe('HoldersScorer', () => {
  const yesHolders = [
    holder('0xa', 'YES', 2_000, -100),
    holder('0xb', 'YES', 6_000, -50),
    holder('0xc', 'YES', 12_000, 200),
    holder('0xd', 'YES', 8_000, 300),
  ];

  describe('calculateSideStats', () => {
    it('summarizes one side', () => {
      const stats = calculateSideStats([...yesHolders, holder('0xe', 'NO', 90_000, 50_000)], 'YES');

      expect(stats.count).toBe(4);
      expect(stats.medianPnl).toBe(75);
      expect(stats.profitableCount).toBe(2);
      expect(stats.profitablePct).toBe(50);
      expect(stats.above5kCount).toBe(3);
      expect(stats.above10kCount).toBe(1);
      expect(stats.above10kPct).toBe(25);
      expect(stats.above50kCount).toBe(0);
      expect(stats.topHolderAddress).toBe('0xd');
      expect(stats.topHolderProfit).toBe(300);
    });

    it('skips positions with no shares', () => {
      const stats = calculateSideStats([holder('0xa', 'NO', 1_000, 10, 0)], 'NO');
      expect(stats.count).toBe(0);
      expect(stats.topHolderAddress).toBe('');
    });
  });

  describe('holderQualityScore', () => {
    it('adds the four pillars', () => {
      // 12.5 profitable + 25 whales (capped) + 25 median + 0 super whale
      expect(holderQualityScore(calculateSideStats(yesHolders, 'YES'))).toBe(62.5);
    });

    it('is zero for an empty side', () => {
      expect(holderQualityScore(calculateSideStats([], 'NO'))).toBe(0);
    });
  });

  describe('scoreHolders', () => {
    it('falls back to tilt and model weights without holder data', () => {
      const result = scoreHolders([], null, 0.5);

      expect(result.hasHolderData).toBe(false);
      expect(result.breakdown.holders).toBe(0);
      expect(result.scores).toEqual({ yes: 50, no: 50 });
      expect(result.smartScore).toBe(50);
      expect(result.smartScoreSide).toBe('YES');
    });

    it('picks the side with the higher weighted score', () => {
      const noHolders = Array.from({ length: 10 }, (_, i) => holder(`0x${i}`, 'NO', 60_000, 20_000, 1000));
      const flow = makeFlow({ yesVolume: 500, noVolume: 9500 });
      const result = scoreHolders(noHolders, flow, 0.4);

      // NO: 0.4 * 100 + 0.3 * 95 + 0.3 * 60
      expect(result.scores.no).toBeCloseTo(86.5, 10);
      // YES: 0.4 * 0 + 0.3 * 5 + 0.3 * 40
      expect(result.scores.yes).toBeCloseTo(13.5, 10);
      expect(result.smartScore).toBe(86);
      expect(result.smartScoreSide).toBe('NO');
      expect(result.breakdown.holders).toBe(100);
    });
  });
});
