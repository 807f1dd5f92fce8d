/**
 * Milestone bonus attribution
 *
 * The transaction that carries monthly spend across the threshold receives
 * the whole bonus. Spend before or after the crossing receives nothing; the
 * bonus is not amortized across the cycle.
 */

import type { CardProfile, MonthlyUsage } from './types.js';

export function hasMilestone(card: CardProfile): boolean {
  return card.milestoneSpend > 0;
}

export function milestoneAlreadyReached(card: CardProfile, usage: MonthlyUsage): boolean {
  return usage.milestoneCredited || usage.spendThisMonth >= card.milestoneSpend;
}

export function crossesMilestone(card: CardProfile, usage: MonthlyUsage, amount: number): boolean {
  if (!hasMilestone(card) || milestoneAlreadyReached(card, usage)) return false;
  return usage.spendThisMonth + amount >= card.milestoneSpend;
}

export function marginalCredit(card: CardProfile, usage: MonthlyUsage, amount: number): number {
  return crossesMilestone(card, usage, amount) ? card.milestoneBonus : 0;
}
