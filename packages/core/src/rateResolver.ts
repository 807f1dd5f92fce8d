/**
 * Effective reward rate resolution
 * Precedence: merchant > category > channel > base rate
 */

import type { CardProfile, MultiplierMap, RateResolution, RateSource, TransactionContext } from './types.js';
import { CATEGORY, RATE_SOURCE } from './constants.js';

export function normalizeKey(value: string | undefined): string {
  return value?.trim().toLowerCase() ?? '';
}

export function normalizeCategory(category: string | undefined): string {
  const key = normalizeKey(category);
  return key === '' ? CATEGORY.OTHER : key;
}

/**
 * Case-insensitive lookup in a multiplier map; keys differing only by case resolve to the larger value
 */
export function lookupMultiplier(map: MultiplierMap, key: string | undefined): number | undefined {
  const wanted = normalizeKey(key);
  if (wanted === '') return undefined;

  const matches = Object.entries(map)
    .filter(([candidate]) => normalizeKey(candidate) === wanted)
    .map(([, multiplier]) => multiplier);
  return matches.length > 0 ? Math.max(...matches) : undefined;
}

export function resolveRate(card: CardProfile, context: TransactionContext): RateResolution {
  const tiers: ReadonlyArray<{ source: RateSource; map: MultiplierMap; key: string }> = [
    { source: RATE_SOURCE.MERCHANT, map: card.merchantMultipliers, key: normalizeKey(context.merchant) },
    { source: RATE_SOURCE.CATEGORY, map: card.categoryMultipliers, key: normalizeCategory(context.category) },
    { source: RATE_SOURCE.CHANNEL, map: card.channelMultipliers, key: normalizeKey(context.channel) },
  ];

  for (const tier of tiers) {
    const multiplier = lookupMultiplier(tier.map, tier.key);
    if (multiplier != null) {
      return {
        effectiveRate: card.baseRewardRate * multiplier,
        source: tier.source,
        multiplier,
        matchedKey: tier.key,
      };
    }
  }

  return {
    effectiveRate: card.baseRewardRate,
    source: RATE_SOURCE.BASE,
    multiplier: 1,
  };
}
