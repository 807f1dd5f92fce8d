/**
 * Core constants for the reward engine
 * Eliminates magic strings throughout the codebase
 */

// ============================================
// Rate Sources (precedence order, highest first)
// ============================================

export const RATE_SOURCE = {
  MERCHANT: 'merchant',
  CATEGORY: 'category',
  CHANNEL: 'channel',
  BASE: 'base',
} as const;

// ============================================
// Spending Categories
// ============================================

export const CATEGORY = {
  DINING: 'dining',
  GROCERY: 'grocery',
  FUEL: 'fuel',
  SHOPPING: 'shopping',
  TRAVEL: 'travel',
  UTILITIES: 'utilities',
  ENTERTAINMENT: 'entertainment',
  OTHER: 'other',
} as const;

// ============================================
// Error Codes
// ============================================

export const ERROR_CODE = {
  NO_CARDS: 'NO_CARDS',
  INVALID_INPUT: 'INVALID_INPUT',
  CARD_NOT_FOUND: 'CARD_NOT_FOUND',
} as const;

// ============================================
// Numeric Thresholds
// ============================================

export const Threshold = {
  MINOR_UNITS: 100,
  // Absorbs float noise such as 100 / 0.05 = 1999.9999999999998
  MINOR_UNIT_EPSILON: 1e-6,
  DEFAULT_EXPENSE_LIMIT: 500,
  // Largest amount whose minor units stay exact integers
  MAX_AMOUNT: Number.MAX_SAFE_INTEGER / 100,
} as const;

export const DEFAULT_CURRENCY_SYMBOL = '₹';

export const Emoji = {
  CARD: '💳',
  MONEY: '💰',
  SPLIT: '✂️',
  BULLET: '•',
} as const;
