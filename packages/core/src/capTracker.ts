/**
 * Monthly reward cap clipping
 */

import type { CapClip, CardProfile, MonthlyUsage } from './types.js';

export function isUncapped(card: CardProfile): boolean {
  return card.monthlyRewardCap === 0;
}

export function remainingCap(card: CardProfile, usage: MonthlyUsage): number {
  return Math.max(0, card.monthlyRewardCap - usage.rewardEarnedThisMonth);
}

/**
 * Clip the reward for `amount` by what is left of the card's monthly cap.
 * Spend beyond `usableAmount` can still go on the card, it just earns nothing.
 */
export function clipToCap(
  card: CardProfile,
  usage: MonthlyUsage,
  amount: number,
  effectiveRate: number
): CapClip {
  const uncappedReward = amount * effectiveRate;

  if (isUncapped(card)) {
    return {
      usableAmount: amount,
      cappedReward: uncappedReward,
      uncappedReward,
      capped: false,
    };
  }

  const remaining = remainingCap(card, usage);
  if (uncappedReward <= remaining) {
    return {
      usableAmount: amount,
      cappedReward: uncappedReward,
      uncappedReward,
      remainingCap: remaining,
      capped: false,
    };
  }

  return {
    usableAmount: effectiveRate > 0 ? remaining / effectiveRate : 0,
    cappedReward: remaining,
    uncappedReward,
    remainingCap: remaining,
    capped: true,
  };
}
