/**
 * Card Ranking
 * Scores every card in the wallet for a transaction and explains the number
 */

import type {
  CapClip,
  CardProfile,
  MonthlyUsage,
  RateResolution,
  Recommendation,
  TransactionContext,
} from './types.js';
import { DEFAULT_CURRENCY_SYMBOL } from './constants.js';
import { resolveRate } from './rateResolver.js';
import { clipToCap } from './capTracker.js';
import { marginalCredit } from './milestoneEstimator.js';
import { formatMoney, formatRate, roundCurrency, toMinorUnits } from './money.js';

// ============================================
// Types
// ============================================

export type UsageSnapshot = ReadonlyMap<string, MonthlyUsage>;

export interface RankedCard {
  readonly card: CardProfile;
  readonly usage: MonthlyUsage;
  readonly resolution: RateResolution;
  readonly clip: CapClip;
  readonly milestoneBonus: number;
  readonly savings: number;               // Full precision
}

export interface RankOptions {
  readonly month?: string;
  readonly currencySymbol?: string;
}

// ============================================
// Scoring
// ============================================

export function emptyUsage(cardId: string, month: string = ''): MonthlyUsage {
  return {
    cardId,
    month,
    rewardEarnedThisMonth: 0,
    spendThisMonth: 0,
    milestoneCredited: false,
  };
}

export function evaluateCard(
  card: CardProfile,
  usage: MonthlyUsage,
  context: TransactionContext
): RankedCard {
  const resolution = resolveRate(card, context);
  const clip = clipToCap(card, usage, context.amount, resolution.effectiveRate);
  const milestoneBonus = marginalCredit(card, usage, context.amount);

  return {
    card,
    usage,
    resolution,
    clip,
    milestoneBonus,
    savings: clip.cappedReward + milestoneBonus,
  };
}

/**
 * Savings descending (at displayed precision), then lower annual fee, then card id
 */
export function compareRankedCards(cardA: RankedCard, cardB: RankedCard): number {
  const savingsDelta = toMinorUnits(cardB.savings) - toMinorUnits(cardA.savings);
  if (savingsDelta !== 0) return savingsDelta;

  const feeDelta = cardA.card.annualFee - cardB.card.annualFee;
  if (feeDelta !== 0) return feeDelta;

  if (cardA.card.cardId === cardB.card.cardId) return 0;
  return cardA.card.cardId < cardB.card.cardId ? -1 : 1;
}

export function rankCards(
  wallet: readonly CardProfile[],
  usages: UsageSnapshot,
  context: TransactionContext,
  options: RankOptions = {}
): readonly RankedCard[] {
  return wallet
    .map(card => evaluateCard(card, usages.get(card.cardId) ?? emptyUsage(card.cardId, options.month), context))
    .sort(compareRankedCards);
}

// ============================================
// Explanation
// ============================================

function describeRate(resolution: RateResolution): string {
  switch (resolution.source) {
    case 'merchant':
    case 'category':
    case 'channel':
      return `${resolution.source} multiplier ${resolution.multiplier}x (${resolution.matchedKey ?? ''})`;
    case 'base':
      return `base rate ${formatRate(resolution.effectiveRate)}`;
  }
}

function describeCap(clip: CapClip, symbol: string): string | undefined {
  if (!clip.capped) return undefined;
  if (clip.remainingCap == null || clip.remainingCap === 0) {
    return 'monthly reward cap reached, no further reward this month';
  }
  return `capped by remaining ${formatMoney(clip.remainingCap, symbol)} this month`;
}

function describeMilestone(bonus: number, symbol: string): string | undefined {
  return bonus > 0
    ? `milestone bonus of ${formatMoney(bonus, symbol)} unlocked by this purchase`
    : undefined;
}

export function explainRanking(ranked: RankedCard, symbol: string = DEFAULT_CURRENCY_SYMBOL): string {
  return [
    describeRate(ranked.resolution),
    describeCap(ranked.clip, symbol),
    describeMilestone(ranked.milestoneBonus, symbol),
  ]
    .filter((part): part is string => part != null)
    .join(', ');
}

export function toRecommendation(ranked: RankedCard, symbol: string = DEFAULT_CURRENCY_SYMBOL): Recommendation {
  return {
    cardId: ranked.card.cardId,
    savings: roundCurrency(ranked.savings),
    reason: explainRanking(ranked, symbol),
    effectiveRate: ranked.resolution.effectiveRate,
    rateSource: ranked.resolution.source,
    rewardCapped: ranked.clip.capped,
    milestoneBonus: roundCurrency(ranked.milestoneBonus),
  };
}

/**
 * Ranked recommendations for every card; zero-savings cards are kept
 */
export function rankRecommendations(
  wallet: readonly CardProfile[],
  usages: UsageSnapshot,
  context: TransactionContext,
  options: RankOptions = {}
): readonly Recommendation[] {
  const symbol = options.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL;
  return rankCards(wallet, usages, context, options).map(ranked => toRecommendation(ranked, symbol));
}
