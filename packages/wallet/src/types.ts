/**
 * Type definitions for the wallet package
 */

import type { Offer, RefreshLogEntry } from '@cardwise/core';

// ============================================
// Offer Providers
// ============================================

export interface OfferProvider {
  readonly source: string;
  fetchOffers(): Promise<readonly Offer[]>;
}

export type RefreshStatus = RefreshLogEntry['status'];

export interface OfferSink {
  replaceOffers(source: string, offers: readonly Offer[]): Promise<void>;
  logRefresh(source: string, status: RefreshStatus, detail: string): Promise<void>;
}

export interface RefreshSummary {
  readonly source: string;
  readonly status: RefreshStatus;
  readonly offerCount: number;
  readonly detail: string;
}

// ============================================
// Configuration
// ============================================

export interface OfferFileSource {
  readonly source: string;
  readonly filePath: string;
}

export interface WalletConfig {
  readonly currencySymbol: string;
  readonly refreshIntervalMs: number;
  readonly offerFiles: readonly OfferFileSource[];
}
