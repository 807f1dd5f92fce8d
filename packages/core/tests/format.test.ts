/**
 * Tests for plain-text rendering
 */

import { describe, it, expect } from 'vitest';
import { formatAllocation, formatRecommendations } from '../src/format.js';
import { formatMoney, formatRate, monthKey } from '../src/money.js';
import type { Allocation, Recommendation } from '../src/types.js';

const recommendations: Recommendation[] = [
  {
    cardId: 'hdfc',
    savings: 120,
    reason: 'merchant multiplier 5x (swiggy)',
    effectiveRate: 0.05,
    rateSource: 'merchant',
    rewardCapped: false,
    milestoneBonus: 0,
  },
  {
    cardId: 'axis',
    savings: 12.5,
    reason: 'base rate 1.25%',
    effectiveRate: 0.0125,
    rateSource: 'base',
    rewardCapped: false,
    milestoneBonus: 0,
  },
];

const allocation: Allocation = {
  entries: [
    { cardId: 'hdfc', amount: 2000, savings: 100 },
    { cardId: 'axis', amount: 1000, savings: 20 },
  ],
  totalAmount: 3000,
  totalSavings: 120,
};

describe('formatRecommendations', () => {
  it('should list cards in order', () => {
    expect(formatRecommendations(recommendations)).toBe(
      '1. Use hdfc first (~₹120 savings, reason: merchant multiplier 5x (swiggy)).\n' +
      '2. Use axis next (~₹12.50 savings, reason: base rate 1.25%).'
    );
  });

  it('should append the split', () => {
    const text = formatRecommendations(recommendations.slice(0, 1), allocation, '$');
    expect(text.split('\n')).toEqual([
      '1. Use hdfc first (~$120 savings, reason: merchant multiplier 5x (swiggy)).',
      '',
      '✂️ Split $3000:',
      '  • hdfc: $2000 (saves $100)',
      '  • axis: $1000 (saves $20)',
      '💰 Total savings: $120',
    ]);
  });

  it('should handle an empty list', () => {
    expect(formatRecommendations([])).toBe('💳 No cards to recommend yet.');
  });
});

describe('formatAllocation', () => {
  it('should handle an empty split', () => {
    expect(formatAllocation({ entries: [], totalAmount: 0, totalSavings: 0 })).toBe('No split needed.');
  });
});

describe('money helpers', () => {
  it('should format whole and fractional amounts', () => {
    expect(formatMoney(2000)).toBe('₹2000');
    expect(formatMoney(19.999999)).toBe('₹20');
    expect(formatMoney(0.5, '$')).toBe('$0.50');
  });

  it('should format rates as percentages', () => {
    expect(formatRate(0.0125)).toBe('1.25%');
    expect(formatRate(0.02)).toBe('2%');
  });

  it('should key months in UTC', () => {
    expect(monthKey(new Date('2026-01-31T23:30:00-05:00'))).toBe('2026-02');
  });
});
