/**
 * Tests for boundary validation
 */

import { describe, it, expect } from 'vitest';
import { validateCard, validateContext } from '../src/schemas.js';

describe('validateCard', () => {
  it('should fill optional fields with defaults', () => {
    expect(validateCard({ cardId: 'axis-ace', bank: 'Axis', network: 'visa', baseRewardRate: 0.02 })).toEqual({
      success: true,
      data: {
        cardId: 'axis-ace',
        bank: 'Axis',
        network: 'visa',
        baseRewardRate: 0.02,
        monthlyRewardCap: 0,
        annualFee: 0,
        milestoneSpend: 0,
        milestoneBonus: 0,
        categoryMultipliers: {},
        channelMultipliers: {},
        merchantMultipliers: {},
      },
    });
  });

  it('should reject negative multipliers', () => {
    const result = validateCard({
      cardId: 'axis-ace',
      bank: 'Axis',
      network: 'visa',
      baseRewardRate: 0.02,
      merchantMultipliers: { swiggy: -2 },
    });

    expect(result).toEqual({
      success: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'Invalid card profile',
        issues: ['merchantMultipliers.swiggy: Number must be greater than or equal to 0'],
      },
    });
  });
});

describe('validateContext', () => {
  it('should trim the merchant and keep optional fields', () => {
    expect(validateContext({ merchant: ' Swiggy ', amount: 450.5, channel: 'app' })).toEqual({
      success: true,
      data: { merchant: 'Swiggy', amount: 450.5, channel: 'app' },
    });
  });

  it('should accept a bare merchant domain', () => {
    expect(validateContext({ merchant: 'Swiggy', amount: 100, merchantUrl: ' swiggy.com ' })).toEqual({
      success: true,
      data: { merchant: 'Swiggy', amount: 100, merchantUrl: 'swiggy.com' },
    });
  });

  it('should reject amounts too large to split exactly', () => {
    expect(validateContext({ merchant: 'Swiggy', amount: 123456789012345.67 })).toEqual({
      success: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'Invalid transaction',
        issues: ['amount: amount is too large'],
      },
    });
  });

  it('should accept amounts up to the limit', () => {
    expect(validateContext({ merchant: 'Swiggy', amount: 90071992547409 }).success).toBe(true);
  });
});
