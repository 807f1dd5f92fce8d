/**
 * Storage collaborator boundary
 */

import type { CardProfile, Category, MonthlyUsage } from './types.js';

export interface RewardReservation {
  readonly cardId: string;
  readonly month: string;
  readonly amount: number;
  readonly effectiveRate: number;
  readonly merchant: string;
  readonly category: Category;
  readonly channel?: string;
}

export interface RewardCommit {
  readonly rewardCommitted: number;
  readonly milestoneUnlocked: boolean;
  readonly usage: MonthlyUsage;
}

export interface RewardStore {
  listCards(): Promise<readonly CardProfile[]>;

  /** All-zero usage when nothing was recorded for the month */
  getMonthlyUsage(cardId: string, month: string): Promise<MonthlyUsage>;

  /**
   * Read the remaining cap, clip the reward and commit usage as one step.
   * Two reservations for the same card and month must never both see the
   * same starting usage. Resolves undefined when the card does not exist,
   * in which case nothing was written.
   */
  reserveReward(reservation: RewardReservation): Promise<RewardCommit | undefined>;
}
