/**
 * Core types for the reward engine
 */

// ============================================
// Card Types
// ============================================

export type CardNetwork = 'visa' | 'mastercard' | 'amex' | 'rupay' | 'diners' | string;

// Common categories (providers may add their own)
export type Category =
  | 'dining'
  | 'grocery'
  | 'fuel'
  | 'shopping'
  | 'travel'
  | 'utilities'
  | 'entertainment'
  | 'other'
  | string;

export type MultiplierMap = Readonly<Record<string, number>>;

export interface CardProfile {
  readonly cardId: string;
  readonly bank: string;
  readonly network: CardNetwork;
  readonly baseRewardRate: number;        // 0.02 = 2% back
  readonly monthlyRewardCap: number;      // 0 = uncapped
  readonly annualFee: number;
  readonly milestoneSpend: number;        // 0 = no milestone
  readonly milestoneBonus: number;
  readonly categoryMultipliers: MultiplierMap;
  readonly channelMultipliers: MultiplierMap;
  readonly merchantMultipliers: MultiplierMap;
}

export interface MonthlyUsage {
  readonly cardId: string;
  readonly month: string;                 // YYYY-MM (UTC)
  readonly rewardEarnedThisMonth: number;
  readonly spendThisMonth: number;
  readonly milestoneCredited: boolean;
}

// ============================================
// Transaction Types
// ============================================

export interface TransactionContext {
  readonly merchant: string;
  readonly amount: number;
  readonly category?: Category;
  readonly channel?: string;
  readonly merchantUrl?: string;          // Consumed by insight collaborators only
}

// ============================================
// Recommendation Types
// ============================================

export type RateSource = 'merchant' | 'category' | 'channel' | 'base';

export interface RateResolution {
  readonly effectiveRate: number;
  readonly source: RateSource;
  readonly multiplier: number;            // 1 when source is 'base'
  readonly matchedKey?: string;
}

export interface CapClip {
  readonly usableAmount: number;          // Portion of spend that still earns reward
  readonly cappedReward: number;
  readonly uncappedReward: number;
  readonly remainingCap?: number;         // Undefined for uncapped cards
  readonly capped: boolean;
}

export interface Recommendation {
  readonly cardId: string;
  readonly savings: number;
  readonly reason: string;
  readonly effectiveRate: number;
  readonly rateSource: RateSource;
  readonly rewardCapped: boolean;
  readonly milestoneBonus: number;
}

export interface AllocationEntry {
  readonly cardId: string;
  readonly amount: number;
  readonly savings: number;
}

export interface Allocation {
  readonly entries: readonly AllocationEntry[];
  readonly totalAmount: number;
  readonly totalSavings: number;
}

export interface RecommendationOutcome {
  readonly recommendations: readonly Recommendation[];
  readonly allocation?: Allocation;
}

// ============================================
// Offer & Expense Types
// ============================================

export interface Offer {
  readonly offerId: string;
  readonly cardId: string;
  readonly source: string;
  readonly active: boolean;
  readonly multiplier: number;
  readonly merchant?: string;
  readonly category?: Category;
  readonly channel?: string;
}

export interface ExpenseRecord {
  readonly cardId: string;
  readonly month: string;
  readonly merchant: string;
  readonly category: Category;
  readonly channel?: string;
  readonly amount: number;
  readonly rewardEarned: number;
  readonly recordedAt: string;            // ISO 8601
}

export interface RefreshLogEntry {
  readonly source: string;
  readonly status: 'ok' | 'failed';
  readonly detail: string;
  readonly refreshedAt: string;
}

// ============================================
// Result Types
// ============================================

export type EngineErrorCode = 'NO_CARDS' | 'INVALID_INPUT' | 'CARD_NOT_FOUND';

export interface EngineError {
  readonly code: EngineErrorCode;
  readonly message: string;
  readonly issues?: readonly string[];
}

export type EngineResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: EngineError };

export function ok<T>(data: T): EngineResult<T> {
  return { success: true, data };
}

export function fail<T>(code: EngineErrorCode, message: string, issues?: readonly string[]): EngineResult<T> {
  return {
    success: false,
    error: issues != null ? { code, message, issues } : { code, message },
  };
}
