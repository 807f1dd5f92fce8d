/**
 * Offer Providers
 * Adapters that turn an external offer source into normalized offer records
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { OfferFileEntrySchema, formatZodIssues, type Offer } from '@cardwise/core';
import type { OfferProvider } from '../types.js';

const OfferFileSchema = z.array(OfferFileEntrySchema);

/**
 * Reads a JSON array of offers from disk. Every record is stamped with the
 * provider's source and marked active.
 */
export class JsonOfferProvider implements OfferProvider {
  readonly source: string;
  private readonly filePath: string;

  constructor(source: string, filePath: string) {
    this.source = source;
    this.filePath = filePath;
  }

  async fetchOffers(): Promise<readonly Offer[]> {
    const raw = await readFile(this.filePath, 'utf-8');
    const parsed = OfferFileSchema.safeParse(JSON.parse(raw));

    if (!parsed.success) {
      throw new Error(`Invalid offer file ${this.filePath}: ${formatZodIssues(parsed.error).join('; ')}`);
    }

    return parsed.data.map(entry => ({ ...entry, source: this.source, active: true }));
  }
}

/**
 * Placeholder for a browser-automation crawler; yields no offers until one is wired in
 */
export class CrawlerOfferProvider implements OfferProvider {
  readonly source: string;

  constructor(source: string) {
    this.source = source;
  }

  async fetchOffers(): Promise<readonly Offer[]> {
    return [];
  }
}
