/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, parseOfferFiles } from '../src/config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      currencySymbol: '₹',
      refreshIntervalMs: 172800000,
      offerFiles: [],
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      CURRENCY_SYMBOL: '$',
      REFRESH_INTERVAL_DAYS: '1',
      OFFER_FILES: 'bank=./bank.json, social = ./social.json',
    });

    expect(config).toEqual({
      currencySymbol: '$',
      refreshIntervalMs: 86400000,
      offerFiles: [
        { source: 'bank', filePath: './bank.json' },
        { source: 'social', filePath: './social.json' },
      ],
    });
  });

  it('should reject refresh intervals longer than a timer can hold', () => {
    expect(() => loadConfig({ REFRESH_INTERVAL_DAYS: '30' })).toThrow(
      'Invalid configuration: REFRESH_INTERVAL_DAYS: Number must be less than or equal to 24'
    );
    expect(loadConfig({ REFRESH_INTERVAL_DAYS: '24' }).refreshIntervalMs).toBe(2073600000);
  });

  it('should reject a non-positive refresh interval', () => {
    expect(() => loadConfig({ REFRESH_INTERVAL_DAYS: '0' })).toThrow(
      'Invalid configuration: REFRESH_INTERVAL_DAYS: Number must be greater than 0'
    );
  });
});

describe('parseOfferFiles', () => {
  it('should reject entries without a source', () => {
    expect(() => parseOfferFiles('bank.json')).toThrow('Invalid OFFER_FILES entry "bank.json", expected source=path');
    expect(() => parseOfferFiles('=bank.json')).toThrow('Invalid OFFER_FILES entry "=bank.json", expected source=path');
  });

  it('should ignore empty entries', () => {
    expect(parseOfferFiles(' , bank=b.json,')).toEqual([{ source: 'bank', filePath: 'b.json' }]);
  });
});
