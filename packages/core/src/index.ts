/**
 * @cardwise/core
 * Card reward recommendation and split-optimization engine
 */

// Types
export * from './types.js';
export * from './constants.js';

// Money & calendar helpers
export {
  roundCurrency,
  toMinorUnits,
  fromMinorUnits,
  floorMinorUnits,
  formatMoney,
  formatRate,
  monthKey,
} from './money.js';

// Schemas
export {
  MultiplierMapSchema,
  AmountSchema,
  TransactionContextSchema,
  CardProfileSchema,
  OfferSchema,
  OfferFileEntrySchema,
  formatZodIssues,
  validateContext,
  validateCard,
  validateOffer,
  type OfferFileEntry,
} from './schemas.js';

// Engine components
export { resolveRate, lookupMultiplier, normalizeKey, normalizeCategory } from './rateResolver.js';
export { clipToCap, remainingCap, isUncapped } from './capTracker.js';
export { marginalCredit, crossesMilestone, milestoneAlreadyReached } from './milestoneEstimator.js';
export {
  rankCards,
  rankRecommendations,
  evaluateCard,
  compareRankedCards,
  explainRanking,
  toRecommendation,
  emptyUsage,
  type RankedCard,
  type RankOptions,
  type UsageSnapshot,
} from './cardRanker.js';
export { allocateSplit, savingsForAmount } from './splitAllocator.js';

// Engine facade & collaborators
export {
  RewardEngine,
  recommendFromSnapshot,
  type RecommendOptions,
  type SnapshotOptions,
  type RewardEngineOptions,
} from './rewardEngine.js';
export type { RewardStore, RewardReservation, RewardCommit } from './store.js';
export { applyOffers } from './offers.js';

// Formatting
export { formatRecommendation, formatRecommendations, formatAllocation } from './format.js';
