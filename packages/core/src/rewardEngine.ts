/**
 * Reward Engine
 * Entry points for the web layer: recommend (read-only) and recordExpense (the only mutation)
 */

import type {
  CardProfile,
  EngineResult,
  MonthlyUsage,
  RecommendationOutcome,
} from './types.js';
import { fail, ok } from './types.js';
import { DEFAULT_CURRENCY_SYMBOL, ERROR_CODE } from './constants.js';
import { AmountSchema, formatZodIssues, validateContext } from './schemas.js';
import { rankCards, toRecommendation, type UsageSnapshot } from './cardRanker.js';
import { allocateSplit } from './splitAllocator.js';
import { normalizeCategory, resolveRate } from './rateResolver.js';
import { formatMoney, monthKey } from './money.js';
import type { RewardStore } from './store.js';

// ============================================
// Types
// ============================================

export interface RecommendOptions {
  readonly split?: boolean;
}

export interface SnapshotOptions extends RecommendOptions {
  readonly month?: string;
  readonly currencySymbol?: string;
}

export interface RewardEngineOptions {
  readonly currencySymbol?: string;
  readonly now?: () => Date;
}

// ============================================
// Pure Recommendation
// ============================================

/**
 * Rank a wallet snapshot for a transaction, optionally splitting the amount.
 * Reads only; nothing in the snapshot is modified.
 */
export function recommendFromSnapshot(
  wallet: readonly CardProfile[],
  usages: UsageSnapshot,
  input: unknown,
  options: SnapshotOptions = {}
): EngineResult<RecommendationOutcome> {
  const validated = validateContext(input);
  if (!validated.success) return validated;

  if (wallet.length === 0) {
    return fail(ERROR_CODE.NO_CARDS, 'No cards in wallet. Add a card to get recommendations.');
  }

  const context = validated.data;
  const symbol = options.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL;
  const ranked = rankCards(wallet, usages, context, { month: options.month });
  const recommendations = ranked.map(candidate => toRecommendation(candidate, symbol));

  return options.split === true
    ? ok({ recommendations, allocation: allocateSplit(ranked, context.amount) })
    : ok({ recommendations });
}

// ============================================
// Engine
// ============================================

export class RewardEngine {
  private readonly store: RewardStore;
  private readonly currencySymbol: string;
  private readonly now: () => Date;

  constructor(store: RewardStore, options: RewardEngineOptions = {}) {
    this.store = store;
    this.currencySymbol = options.currencySymbol ?? DEFAULT_CURRENCY_SYMBOL;
    this.now = options.now ?? (() => new Date());
  }

  async recommend(input: unknown, options: RecommendOptions = {}): Promise<EngineResult<RecommendationOutcome>> {
    const validated = validateContext(input);
    if (!validated.success) return validated;

    const cards = await this.store.listCards();
    const month = monthKey(this.now());
    const usages = await this.loadUsages(cards, month);

    return recommendFromSnapshot(cards, usages, validated.data, {
      ...options,
      month,
      currencySymbol: this.currencySymbol,
    });
  }

  /**
   * Record spend on a card and commit its reward against the monthly cap.
   * `amount` defaults to the transaction amount; pass a split entry's amount
   * when recording one leg of a split.
   */
  async recordExpense(cardId: string, input: unknown, amount?: number): Promise<EngineResult<MonthlyUsage>> {
    const validated = validateContext(input);
    if (!validated.success) return validated;
    const context = validated.data;

    const parsedAmount = AmountSchema.safeParse(amount ?? context.amount);
    if (!parsedAmount.success) {
      return fail(ERROR_CODE.INVALID_INPUT, 'Invalid expense amount', formatZodIssues(parsedAmount.error));
    }

    const cards = await this.store.listCards();
    const card = cards.find(candidate => candidate.cardId === cardId);
    if (card == null) {
      return fail(ERROR_CODE.CARD_NOT_FOUND, `Card not found: ${cardId}`);
    }

    const { effectiveRate } = resolveRate(card, context);
    const commit = await this.store.reserveReward({
      cardId,
      month: monthKey(this.now()),
      amount: parsedAmount.data,
      effectiveRate,
      merchant: context.merchant,
      category: normalizeCategory(context.category),
      channel: context.channel,
    });

    if (commit == null) {
      return fail(ERROR_CODE.CARD_NOT_FOUND, `Card not found: ${cardId}`);
    }

    const milestoneNote = commit.milestoneUnlocked ? ', milestone unlocked' : '';
    console.log(
      `[RewardEngine] Recorded ${formatMoney(parsedAmount.data, this.currencySymbol)} on ${cardId}: ` +
      `reward ${formatMoney(commit.rewardCommitted, this.currencySymbol)}${milestoneNote}`
    );

    return ok(commit.usage);
  }

  private async loadUsages(cards: readonly CardProfile[], month: string): Promise<UsageSnapshot> {
    const usages = await Promise.all(
      cards.map(card => this.store.getMonthlyUsage(card.cardId, month))
    );
    return new Map<string, MonthlyUsage>(usages.map(usage => [usage.cardId, usage]));
  }
}
