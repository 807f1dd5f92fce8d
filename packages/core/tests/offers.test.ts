/**
 * Tests for folding offers into multiplier maps
 */

import { describe, it, expect } from 'vitest';
import { applyOffers } from '../src/offers.js';
import { validateOffer } from '../src/schemas.js';
import type { Offer } from '../src/types.js';
import { makeCard } from './fixtures.js';

const card = makeCard({ cardId: 'hdfc', merchantMultipliers: { Amazon: 2 } });

function offer(overrides: Partial<Offer> & { readonly offerId: string }): Offer {
  return { cardId: 'hdfc', source: 'bank', active: true, multiplier: 1, ...overrides };
}

describe('applyOffers', () => {
  it('should fold active offers into the matching map', () => {
    const [updated] = applyOffers([card], [
      offer({ offerId: 'o1', merchant: 'AMAZON', multiplier: 5 }),
      offer({ offerId: 'o2', category: 'dining', multiplier: 10, active: false }),
      offer({ offerId: 'o3', cardId: 'other', merchant: 'amazon', multiplier: 9 }),
      offer({ offerId: 'o4', channel: 'App', multiplier: 3 }),
    ]);

    expect(updated.merchantMultipliers).toEqual({ amazon: 5 });
    expect(updated.categoryMultipliers).toEqual({});
    expect(updated.channelMultipliers).toEqual({ app: 3 });
  });

  it('should keep the larger multiplier on collision', () => {
    const [updated] = applyOffers([card], [offer({ offerId: 'o1', merchant: 'amazon', multiplier: 1.5 })]);
    expect(updated.merchantMultipliers).toEqual({ amazon: 2 });
  });

  it('should not modify the original card', () => {
    applyOffers([card], [offer({ offerId: 'o1', merchant: 'amazon', multiplier: 5 })]);
    expect(card.merchantMultipliers).toEqual({ Amazon: 2 });
  });
});

describe('validateOffer', () => {
  it('should require exactly one target', () => {
    const result = validateOffer({ offerId: 'o1', cardId: 'hdfc', source: 'bank', multiplier: 2, merchant: 'a', channel: 'b' });

    expect(result).toEqual({
      success: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'Invalid offer',
        issues: ['offer must target exactly one of merchant, category or channel'],
      },
    });
  });

  it('should default offers to active', () => {
    const result = validateOffer({ offerId: 'o1', cardId: 'hdfc', source: 'bank', multiplier: 2, category: 'dining' });
    expect(result.success && result.data.active).toBe(true);
  });
});
