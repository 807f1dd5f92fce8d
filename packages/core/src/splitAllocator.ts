/**
 * Split allocation across ranked cards
 *
 * Greedy by rank: each card takes as much of the remaining amount as still
 * earns reward under its own cap. Caps are per card, so earlier cards in the
 * split never reduce a later card's capacity. Whatever is left once every
 * card is exhausted goes to the top-ranked card, which can always be charged
 * past its cap. Milestone cliffs that depend on total monthly spend are not
 * optimized; this is a greedy approximation.
 */

import type { Allocation, AllocationEntry } from './types.js';
import type { RankedCard } from './cardRanker.js';
import { clipToCap } from './capTracker.js';
import { marginalCredit } from './milestoneEstimator.js';
import { floorMinorUnits, fromMinorUnits, roundCurrency, toMinorUnits } from './money.js';

interface MinorAllocation {
  readonly candidate: RankedCard;
  readonly amountMinor: number;
}

function usableMinorUnits(candidate: RankedCard, remainingMinor: number): number {
  const clip = clipToCap(
    candidate.card,
    candidate.usage,
    fromMinorUnits(remainingMinor),
    candidate.resolution.effectiveRate
  );
  return Math.min(remainingMinor, floorMinorUnits(clip.usableAmount));
}

function fillFromRanking(
  candidates: readonly RankedCard[],
  remainingMinor: number
): { readonly allocations: readonly MinorAllocation[]; readonly leftoverMinor: number } {
  if (candidates.length === 0 || remainingMinor === 0) {
    return { allocations: [], leftoverMinor: remainingMinor };
  }

  const [candidate, ...rest] = candidates;
  const takenMinor = usableMinorUnits(candidate, remainingMinor);
  const future = fillFromRanking(rest, remainingMinor - takenMinor);

  return takenMinor > 0
    ? { ...future, allocations: [{ candidate, amountMinor: takenMinor }, ...future.allocations] }
    : future;
}

function assignResidual(
  allocations: readonly MinorAllocation[],
  topCandidate: RankedCard,
  residualMinor: number
): readonly MinorAllocation[] {
  if (residualMinor === 0) return allocations;

  const topCardId = topCandidate.card.cardId;
  const alreadyAllocated = allocations.some(allocation => allocation.candidate.card.cardId === topCardId);

  return alreadyAllocated
    ? allocations.map(allocation =>
        allocation.candidate.card.cardId === topCardId
          ? { ...allocation, amountMinor: allocation.amountMinor + residualMinor }
          : allocation
      )
    : [{ candidate: topCandidate, amountMinor: residualMinor }, ...allocations];
}

/**
 * Savings of putting `amount` on a single card, at full precision
 */
export function savingsForAmount(candidate: RankedCard, amount: number): number {
  const clip = clipToCap(candidate.card, candidate.usage, amount, candidate.resolution.effectiveRate);
  return clip.cappedReward + marginalCredit(candidate.card, candidate.usage, amount);
}

export function allocateSplit(ranked: readonly RankedCard[], amount: number): Allocation {
  const totalMinor = toMinorUnits(amount);
  const { allocations, leftoverMinor } = fillFromRanking(ranked, totalMinor);
  const [topCandidate] = ranked;

  const finalAllocations = topCandidate != null
    ? assignResidual(allocations, topCandidate, leftoverMinor)
    : allocations;

  const scored = finalAllocations.map(({ candidate, amountMinor }) => {
    const entryAmount = fromMinorUnits(amountMinor);
    return { candidate, amountMinor, savings: savingsForAmount(candidate, entryAmount) };
  });

  const entries: readonly AllocationEntry[] = scored.map(({ candidate, amountMinor, savings }) => ({
    cardId: candidate.card.cardId,
    amount: fromMinorUnits(amountMinor),
    savings: roundCurrency(savings),
  }));

  return {
    entries,
    totalAmount: fromMinorUnits(scored.reduce((sum, entry) => sum + entry.amountMinor, 0)),
    totalSavings: roundCurrency(scored.reduce((sum, entry) => sum + entry.savings, 0)),
  };
}
