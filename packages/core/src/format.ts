/**
 * Plain-text rendering of engine results
 */

import type { Allocation, Recommendation } from './types.js';
import { DEFAULT_CURRENCY_SYMBOL, Emoji } from './constants.js';
import { formatMoney } from './money.js';

export function formatRecommendation(
  recommendation: Recommendation,
  position: number,
  symbol: string = DEFAULT_CURRENCY_SYMBOL
): string {
  const verb = position === 1 ? 'first' : 'next';
  return `${position}. Use ${recommendation.cardId} ${verb} (~${formatMoney(recommendation.savings, symbol)} savings, reason: ${recommendation.reason}).`;
}

export function formatAllocation(allocation: Allocation, symbol: string = DEFAULT_CURRENCY_SYMBOL): string {
  if (allocation.entries.length === 0) {
    return 'No split needed.';
  }

  const lines = allocation.entries.map(
    entry => `  ${Emoji.BULLET} ${entry.cardId}: ${formatMoney(entry.amount, symbol)} (saves ${formatMoney(entry.savings, symbol)})`
  );

  return [
    `${Emoji.SPLIT} Split ${formatMoney(allocation.totalAmount, symbol)}:`,
    ...lines,
    `${Emoji.MONEY} Total savings: ${formatMoney(allocation.totalSavings, symbol)}`,
  ].join('\n');
}

/**
 * Ordered summary of the top three cards, followed by the split if one was computed
 */
export function formatRecommendations(
  recommendations: readonly Recommendation[],
  allocation?: Allocation,
  symbol: string = DEFAULT_CURRENCY_SYMBOL
): string {
  if (recommendations.length === 0) {
    return `${Emoji.CARD} No cards to recommend yet.`;
  }

  const topLines = recommendations
    .slice(0, 3)
    .map((recommendation, index) => formatRecommendation(recommendation, index + 1, symbol));

  const splitSection = allocation != null
    ? ['', formatAllocation(allocation, symbol)]
    : [];

  return [...topLines, ...splitSection].join('\n');
}
