/**
 * Input Schemas
 * Zod schemas for everything that crosses the engine boundary
 */

import { z } from 'zod';
import { hasAtMostTwoDecimals } from './money.js';
import { Threshold } from './constants.js';
import { fail, ok, type CardProfile, type EngineResult, type Offer, type TransactionContext } from './types.js';

// ============================================
// Shared
// ============================================

export const MultiplierMapSchema = z.record(z.string(), z.number().nonnegative());

export const AmountSchema = z
  .number()
  .finite()
  .positive()
  .max(Threshold.MAX_AMOUNT, 'amount is too large')
  .refine(hasAtMostTwoDecimals, { message: 'amount must have at most two decimal places' });

// ============================================
// Transaction Context
// ============================================

export const TransactionContextSchema = z.object({
  merchant: z.string().trim().min(1, 'merchant is required'),
  amount: AmountSchema,
  category: z.string().optional(),
  channel: z.string().optional(),
  merchantUrl: z.string().trim().optional(),
});

// ============================================
// Card Profile
// ============================================

export const CardProfileSchema = z.object({
  cardId: z.string().trim().min(1, 'cardId is required'),
  bank: z.string().trim().min(1, 'bank is required'),
  network: z.string().trim().min(1, 'network is required'),
  baseRewardRate: z.number().nonnegative(),
  monthlyRewardCap: z.number().nonnegative().default(0),
  annualFee: z.number().nonnegative().default(0),
  milestoneSpend: z.number().nonnegative().default(0),
  milestoneBonus: z.number().nonnegative().default(0),
  categoryMultipliers: MultiplierMapSchema.default({}),
  channelMultipliers: MultiplierMapSchema.default({}),
  merchantMultipliers: MultiplierMapSchema.default({}),
});

// ============================================
// Offers
// ============================================

const OfferFieldsSchema = z.object({
  offerId: z.string().min(1),
  cardId: z.string().min(1),
  source: z.string().min(1),
  active: z.boolean().default(true),
  multiplier: z.number().nonnegative(),
  merchant: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  channel: z.string().min(1).optional(),
});

function targetsExactlyOne(offer: { merchant?: string; category?: string; channel?: string }): boolean {
  return [offer.merchant, offer.category, offer.channel].filter(target => target != null).length === 1;
}

const SINGLE_TARGET_MESSAGE = 'offer must target exactly one of merchant, category or channel';

export const OfferSchema = OfferFieldsSchema.refine(targetsExactlyOne, { message: SINGLE_TARGET_MESSAGE });

// Offer files omit what the provider stamps on each record
export const OfferFileEntrySchema = OfferFieldsSchema
  .omit({ source: true, active: true })
  .refine(targetsExactlyOne, { message: SINGLE_TARGET_MESSAGE });

export type OfferFileEntry = z.infer<typeof OfferFileEntrySchema>;

// ============================================
// Validation Helpers
// ============================================

export function formatZodIssues(error: z.ZodError): readonly string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function validateContext(input: unknown): EngineResult<TransactionContext> {
  const parsed = TransactionContextSchema.safeParse(input);
  return parsed.success
    ? ok(parsed.data)
    : fail('INVALID_INPUT', 'Invalid transaction', formatZodIssues(parsed.error));
}

export function validateCard(input: unknown): EngineResult<CardProfile> {
  const parsed = CardProfileSchema.safeParse(input);
  return parsed.success
    ? ok(parsed.data)
    : fail('INVALID_INPUT', 'Invalid card profile', formatZodIssues(parsed.error));
}

export function validateOffer(input: unknown): EngineResult<Offer> {
  const parsed = OfferSchema.safeParse(input);
  return parsed.success
    ? ok(parsed.data)
    : fail('INVALID_INPUT', 'Invalid offer', formatZodIssues(parsed.error));
}
