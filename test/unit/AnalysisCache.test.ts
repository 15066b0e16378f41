/**
 * Write-once cache tests
 */

import { AnalysisCache, WriteOnceCache } from '../../src/services/cache/AnalysisCache';

describe('WriteOnceCache', () => {
  it('should run the factory once for concurrent lookups', async () => {
    const cache = new WriteOnceCache<string, number>();
    const factory = jest.fn(async () => 42);

    const [first, second] = await Promise.all([
      cache.getOrCreate('a', factory),
      cache.getOrCreate('a', factory),
    ]);

    expect(first).toBe(42);
    expect(second).toBe(42);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.has('a')).toBe(true);
  });

  it('should count only settled entries', async () => {
    const cache = new WriteOnceCache<number, string>();
    let release: (value: string) => void = () => undefined;
    const pending = cache.getOrCreate(1, () => new Promise<string>((resolve) => (release = resolve)));

    expect(cache.has(1)).toBe(false);
    expect(cache.size).toBe(0);

    release('done');
    await pending;

    expect(cache.size).toBe(1);
  });

  it('should evict a rejected lookup so the next call retries', async () => {
    const cache = new WriteOnceCache<string, number>();
    const factory = jest
      .fn<Promise<number>, []>()
      .mockRejectedValueOnce(new Error('unavailable'))
      .mockResolvedValueOnce(7);

    await expect(cache.getOrCreate('k', factory)).rejects.toThrow('unavailable');
    expect(cache.has('k')).toBe(false);

    await expect(cache.getOrCreate('k', factory)).resolves.toBe(7);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('should forget everything on clear', async () => {
    const cache = new WriteOnceCache<string, number>();
    await cache.getOrCreate('a', async () => 1);

    cache.clear();

    expect(cache.size).toBe(0);
    await expect(cache.getOrCreate('a', async () => 2)).resolves.toBe(2);
  });
});

describe('AnalysisCache', () => {
  it('should report pool and reference price counts', async () => {
    const cache = new AnalysisCache();
    await cache.referencePrices.getOrCreate(3, async () => ({
      bucket: 3,
      priceMicro: 2_500_000_000n,
      source: 'historical-pool',
    }));

    expect(cache.stats()).toEqual({ pools: 0, referencePrices: 1 });
  });
});
