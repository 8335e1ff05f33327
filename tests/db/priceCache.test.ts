import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PriceCache, priceCacheKey, isPriceFrame } from '../../src/db/priceCache';
import type { PriceFrame } from '../../src/types/data';

const frame: PriceFrame = {
  dates: ['2024-01-02', '2024-01-03'],
  columns: { KO: [60.1, 60.4], PEP: [170.2, null] },
};

describe('priceCacheKey', () => {
  it('should not depend on ticker order', () => {
    expect(priceCacheKey(['PEP', 'KO'], '2018-01-01', '2025-01-01')).toBe(
      'adjclose_KO_PEP_2018-01-01_2025-01-01'
    );
    expect(priceCacheKey(['KO', 'PEP'], '2018-01-01', '2025-01-01')).toBe(
      'adjclose_KO_PEP_2018-01-01_2025-01-01'
    );
  });

  it('should make slashes file-name safe', () => {
    expect(priceCacheKey(['BRK/B'], '2020-01-01', '2020-12-31')).toBe(
      'adjclose_BRK-B_2020-01-01_2020-12-31'
    );
  });
});

describe('isPriceFrame', () => {
  it('should accept a well-formed frame', () => {
    expect(isPriceFrame(frame)).toBe(true);
  });

  it('should reject malformed values', () => {
    expect(isPriceFrame(null)).toBe(false);
    expect(isPriceFrame({ dates: ['2024-01-02'] })).toBe(false);
    expect(isPriceFrame({ dates: ['2024-01-02'], columns: { KO: [1, 2] } })).toBe(false);
    expect(isPriceFrame({ dates: ['2024-01-02'], columns: { KO: ['1'] } })).toBe(false);
  });
});

describe('PriceCache', () => {
  let cache: PriceCache;

  beforeEach(async () => {
    cache = new PriceCache(':memory:');
    await cache.initialize();
  });

  afterEach(async () => {
    await cache.close();
  });

  it('should start empty', async () => {
    expect(await cache.keys()).toEqual([]);
    expect(await cache.get('adjclose_KO_PEP_2024-01-01_2024-02-01')).toBeNull();
  });

  it('should store and return frames by key', async () => {
    const key = priceCacheKey(['KO', 'PEP'], '2024-01-01', '2024-02-01');
    await cache.put(key, { tickers: ['KO', 'PEP'], start: '2024-01-01', end: '2024-02-01', frame });

    expect(await cache.keys()).toEqual([key]);
    expect(await cache.get(key)).toEqual(frame);
  });

  it('should forget deleted keys', async () => {
    await cache.put('k', { tickers: ['KO'], start: '2024-01-01', end: '2024-02-01', frame });
    await cache.delete('k');

    expect(await cache.get('k')).toBeNull();
  });

  it('should not share data between instances', async () => {
    await cache.put('k', { tickers: ['KO'], start: '2024-01-01', end: '2024-02-01', frame });

    const other = new PriceCache(':memory:');
    await other.initialize();

    expect(await other.keys()).toEqual([]);
    await other.close();
  });

  it('should keep its data when initialized twice', async () => {
    await cache.put('k', { tickers: ['KO'], start: '2024-01-01', end: '2024-02-01', frame });
    await cache.initialize();

    expect(await cache.get('k')).toEqual(frame);
  });

  it('should refuse to work before initialization', async () => {
    const fresh = new PriceCache(':memory:');

    await expect(fresh.get('k')).rejects.toThrow('Price cache not initialized');
  });
});
