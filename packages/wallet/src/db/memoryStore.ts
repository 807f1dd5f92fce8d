/**
 * In-memory wallet store
 * Holds cards, offers, monthly usage, expenses and the refresh log for one process
 */

import {
  applyOffers,
  clipToCap,
  crossesMilestone,
  emptyUsage,
  isUncapped,
  normalizeKey,
  Threshold,
  type CardProfile,
  type ExpenseRecord,
  type MonthlyUsage,
  type Offer,
  type RefreshLogEntry,
  type RewardCommit,
  type RewardReservation,
  type RewardStore,
} from '@cardwise/core';
import type { OfferSink, RefreshStatus } from '../types.js';

function usageKey(cardId: string, month: string): string {
  return `${cardId}:${month}`;
}

export interface MemoryStoreOptions {
  readonly cards?: readonly CardProfile[];
  readonly now?: () => Date;
}

export class InMemoryRewardStore implements RewardStore, OfferSink {
  private readonly cards = new Map<string, CardProfile>();
  private readonly offers = new Map<string, Offer>();
  private readonly usage = new Map<string, MonthlyUsage>();
  private readonly expenses: ExpenseRecord[] = [];
  private readonly refreshLog: RefreshLogEntry[] = [];
  private readonly now: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    options.cards?.forEach(card => this.cards.set(card.cardId, card));
  }

  // ============================================
  // Cards
  // ============================================

  /**
   * Card profiles with active offers folded into their multiplier maps
   */
  async listCards(): Promise<readonly CardProfile[]> {
    return applyOffers([...this.cards.values()], [...this.offers.values()]);
  }

  async upsertCards(cards: readonly CardProfile[]): Promise<number> {
    cards.forEach(card => this.cards.set(card.cardId, card));
    return cards.length;
  }

  async deleteCard(cardId: string): Promise<boolean> {
    return this.cards.delete(cardId);
  }

  async hasCards(): Promise<boolean> {
    return this.cards.size > 0;
  }

  // ============================================
  // Usage
  // ============================================

  async getMonthlyUsage(cardId: string, month: string): Promise<MonthlyUsage> {
    return this.usage.get(usageKey(cardId, month)) ?? emptyUsage(cardId, month);
  }

  /**
   * The read, clip and write below run without yielding to the event loop,
   * so concurrent reservations for a card are applied one after another.
   */
  async reserveReward(reservation: RewardReservation): Promise<RewardCommit | undefined> {
    const card = this.cards.get(reservation.cardId);
    if (card == null) return undefined;

    const key = usageKey(reservation.cardId, reservation.month);
    const current = this.usage.get(key) ?? emptyUsage(reservation.cardId, reservation.month);

    const clip = clipToCap(card, current, reservation.amount, reservation.effectiveRate);
    const milestoneUnlocked = crossesMilestone(card, current, reservation.amount);
    const earned = current.rewardEarnedThisMonth + clip.cappedReward;

    const next: MonthlyUsage = {
      ...current,
      rewardEarnedThisMonth: isUncapped(card) ? earned : Math.min(card.monthlyRewardCap, earned),
      spendThisMonth: current.spendThisMonth + reservation.amount,
      milestoneCredited: current.milestoneCredited || milestoneUnlocked,
    };

    this.usage.set(key, next);
    this.expenses.push({
      cardId: reservation.cardId,
      month: reservation.month,
      merchant: reservation.merchant,
      category: reservation.category,
      channel: reservation.channel,
      amount: reservation.amount,
      rewardEarned: clip.cappedReward,
      recordedAt: this.now().toISOString(),
    });

    return { rewardCommitted: clip.cappedReward, milestoneUnlocked, usage: next };
  }

  /**
   * Most recent first
   */
  async listExpenses(limit: number = Threshold.DEFAULT_EXPENSE_LIMIT): Promise<readonly ExpenseRecord[]> {
    return [...this.expenses].reverse().slice(0, limit);
  }

  // ============================================
  // Offers
  // ============================================

  /**
   * Deactivate everything previously supplied by `source`, then store the new batch
   */
  async replaceOffers(source: string, offers: readonly Offer[]): Promise<void> {
    this.offers.forEach((offer, offerId) => {
      if (offer.source === source) {
        this.offers.set(offerId, { ...offer, active: false });
      }
    });
    offers.forEach(offer => this.offers.set(offer.offerId, { ...offer, source }));
  }

  async listActiveOffers(merchant?: string): Promise<readonly Offer[]> {
    const wanted = normalizeKey(merchant);
    return [...this.offers.values()].filter(offer =>
      offer.active && (wanted === '' || normalizeKey(offer.merchant) === wanted)
    );
  }

  async logRefresh(source: string, status: RefreshStatus, detail: string): Promise<void> {
    this.refreshLog.push({ source, status, detail, refreshedAt: this.now().toISOString() });
  }

  async listRefreshLog(): Promise<readonly RefreshLogEntry[]> {
    return [...this.refreshLog];
  }
}
