/**
 * @cardwise/wallet
 * Storage, offer providers and configuration around the reward engine
 */

export * from './types.js';

export { InMemoryRewardStore, type MemoryStoreOptions } from './db/memoryStore.js';
export { JsonOfferProvider, CrawlerOfferProvider } from './services/offerProviders.js';
export { refreshOffers, startRefreshSchedule, daysToMs, type RefreshSchedule } from './services/refresh.js';
export { parseCardFile } from './utils/cardImport.js';
export { loadConfig, parseOfferFiles } from './config.js';
export { createWalletRuntime, createOfferProviders, type WalletRuntime } from './runtime.js';
