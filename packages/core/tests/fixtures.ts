/**
 * Shared test builders
 */

import type { CardProfile, MonthlyUsage } from '../src/types.js';

export function makeCard(overrides: Partial<CardProfile> & { readonly cardId: string }): CardProfile {
  return {
    bank: 'Test Bank',
    network: 'visa',
    baseRewardRate: 0.01,
    monthlyRewardCap: 0,
    annualFee: 0,
    milestoneSpend: 0,
    milestoneBonus: 0,
    categoryMultipliers: {},
    channelMultipliers: {},
    merchantMultipliers: {},
    ...overrides,
  };
}

export function makeUsage(overrides: Partial<MonthlyUsage> & { readonly cardId: string }): MonthlyUsage {
  return {
    month: '2026-03',
    rewardEarnedThisMonth: 0,
    spendThisMonth: 0,
    milestoneCredited: false,
    ...overrides,
  };
}
