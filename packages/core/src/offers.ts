/**
 * Offer normalization
 * Folds provider offers into card multiplier maps; the engine only ever sees the maps
 */

import type { CardProfile, MultiplierMap, Offer } from './types.js';
import { normalizeKey } from './rateResolver.js';

type MultiplierField = 'merchantMultipliers' | 'categoryMultipliers' | 'channelMultipliers';

interface OfferTarget {
  readonly field: MultiplierField;
  readonly key: string;
}

function offerTarget(offer: Offer): OfferTarget | undefined {
  if (offer.merchant != null) return { field: 'merchantMultipliers', key: normalizeKey(offer.merchant) };
  if (offer.category != null) return { field: 'categoryMultipliers', key: normalizeKey(offer.category) };
  if (offer.channel != null) return { field: 'channelMultipliers', key: normalizeKey(offer.channel) };
  return undefined;
}

function lowerCaseKeys(map: MultiplierMap): Record<string, number> {
  return Object.entries(map).reduce<Record<string, number>>((accumulator, [key, value]) => {
    const normalized = normalizeKey(key);
    const existing = accumulator[normalized];
    return {
      ...accumulator,
      [normalized]: existing != null ? Math.max(existing, value) : value,
    };
  }, {});
}

function withMultipliers(card: CardProfile, field: MultiplierField, map: MultiplierMap): CardProfile {
  switch (field) {
    case 'merchantMultipliers':
      return { ...card, merchantMultipliers: map };
    case 'categoryMultipliers':
      return { ...card, categoryMultipliers: map };
    case 'channelMultipliers':
      return { ...card, channelMultipliers: map };
  }
}

function mergeOffer(card: CardProfile, offer: Offer): CardProfile {
  const target = offerTarget(offer);
  if (target == null || target.key === '') return card;

  const map = lowerCaseKeys(card[target.field]);
  const existing = map[target.key];
  const multiplier = existing != null ? Math.max(existing, offer.multiplier) : offer.multiplier;

  return withMultipliers(card, target.field, { ...map, [target.key]: multiplier });
}

/**
 * Apply active offers to their cards. Where an offer collides with an
 * existing entry the larger multiplier wins.
 */
export function applyOffers(cards: readonly CardProfile[], offers: readonly Offer[]): readonly CardProfile[] {
  const activeOffers = offers.filter(offer => offer.active);

  return cards.map(card =>
    activeOffers
      .filter(offer => offer.cardId === card.cardId)
      .reduce(mergeOffer, card)
  );
}
