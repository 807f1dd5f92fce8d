/**
 * Wires the store, engine and offer providers together from configuration
 */

import { RewardEngine, type CardProfile } from '@cardwise/core';
import { InMemoryRewardStore } from './db/memoryStore.js';
import { JsonOfferProvider } from './services/offerProviders.js';
import { startRefreshSchedule, type RefreshSchedule } from './services/refresh.js';
import type { OfferProvider, WalletConfig } from './types.js';

export interface WalletRuntime {
  readonly store: InMemoryRewardStore;
  readonly engine: RewardEngine;
  readonly providers: readonly OfferProvider[];
  startRefresh(): RefreshSchedule;
}

export function createOfferProviders(config: WalletConfig): readonly OfferProvider[] {
  return config.offerFiles.map(({ source, filePath }) => new JsonOfferProvider(source, filePath));
}

export function createWalletRuntime(
  config: WalletConfig,
  options: { readonly cards?: readonly CardProfile[]; readonly now?: () => Date } = {}
): WalletRuntime {
  const store = new InMemoryRewardStore({ cards: options.cards, now: options.now });
  const engine = new RewardEngine(store, { currencySymbol: config.currencySymbol, now: options.now });
  const providers = createOfferProviders(config);

  return {
    store,
    engine,
    providers,
    startRefresh: () => startRefreshSchedule(store, providers, { intervalMs: config.refreshIntervalMs }),
  };
}
