/**
 * Currency and calendar helpers
 */

import { Threshold, DEFAULT_CURRENCY_SYMBOL } from './constants.js';

/**
 * Round to 2 decimal places for currency
 */
export function roundCurrency(amount: number): number {
  return Math.round(amount * Threshold.MINOR_UNITS) / Threshold.MINOR_UNITS;
}

export function toMinorUnits(amount: number): number {
  return Math.round(amount * Threshold.MINOR_UNITS);
}

export function fromMinorUnits(minor: number): number {
  return minor / Threshold.MINOR_UNITS;
}

/**
 * Largest whole number of minor units not exceeding amount
 */
export function floorMinorUnits(amount: number): number {
  return Math.floor(amount * Threshold.MINOR_UNITS + Threshold.MINOR_UNIT_EPSILON);
}

export function hasAtMostTwoDecimals(amount: number): boolean {
  const scaled = amount * Threshold.MINOR_UNITS;
  return Math.abs(scaled - Math.round(scaled)) < Threshold.MINOR_UNIT_EPSILON;
}

/**
 * "₹120" for whole amounts, "₹12.50" otherwise
 */
export function formatMoney(amount: number, symbol: string = DEFAULT_CURRENCY_SYMBOL): string {
  const rounded = roundCurrency(amount);
  return Number.isInteger(rounded)
    ? `${symbol}${rounded}`
    : `${symbol}${rounded.toFixed(2)}`;
}

/**
 * Format a reward fraction as a percentage ("0.015" → "1.5%")
 */
export function formatRate(rate: number): string {
  return `${roundCurrency(rate * 100)}%`;
}

/**
 * Calendar month key in UTC (YYYY-MM)
 */
export function monthKey(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}-${month}`;
}
