/**
 * Environment configuration
 */

import { z } from 'zod';
import { DEFAULT_CURRENCY_SYMBOL, formatZodIssues } from '@cardwise/core';
import { daysToMs } from './services/refresh.js';
import type { OfferFileSource, WalletConfig } from './types.js';

const EnvironmentSchema = z.object({
  CURRENCY_SYMBOL: z.string().trim().min(1).default(DEFAULT_CURRENCY_SYMBOL),
  // Timer delays must fit in a signed 32-bit millisecond count
  REFRESH_INTERVAL_DAYS: z.coerce.number().positive().max(24).default(2),
  OFFER_FILES: z.string().default(''),
});

/**
 * "bank=./offers/bank.json,social=./offers/social.json"
 */
export function parseOfferFiles(value: string): readonly OfferFileSource[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry !== '')
    .map(entry => {
      const separator = entry.indexOf('=');
      const source = separator > 0 ? entry.slice(0, separator).trim() : '';
      const filePath = separator > 0 ? entry.slice(separator + 1).trim() : '';
      if (source === '' || filePath === '') {
        throw new Error(`Invalid OFFER_FILES entry "${entry}", expected source=path`);
      }
      return { source, filePath };
    });
}

export function loadConfig(
  environment: Readonly<Record<string, string | undefined>> = process.env
): WalletConfig {
  const parsed = EnvironmentSchema.safeParse(environment);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodIssues(parsed.error).join('; ')}`);
  }

  return {
    currencySymbol: parsed.data.CURRENCY_SYMBOL,
    refreshIntervalMs: daysToMs(parsed.data.REFRESH_INTERVAL_DAYS),
    offerFiles: parseOfferFiles(parsed.data.OFFER_FILES),
  };
}
