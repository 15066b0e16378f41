/**
 * Process-wide caches shared by analysis runs
 */

import { PoolMetadata } from '../../types/dex.types';
import { ReferencePriceSample } from '../../types/swap.types';

/**
 * Write-once cache: a key is computed at most once while its lookup is in
 * flight or succeeded. Rejected lookups are evicted so a later call retries.
 */
export class WriteOnceCache<K, V> {
  private entries: Map<K, Promise<V>> = new Map();
  private settled: Set<K> = new Set();

  getOrCreate(key: K, factory: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const pending = factory().then(
      (value) => {
        this.settled.add(key);
        return value;
      },
      (error: unknown) => {
        this.entries.delete(key);
        throw error;
      }
    );

    this.entries.set(key, pending);
    return pending;
  }

  has(key: K): boolean {
    return this.settled.has(key);
  }

  /**
   * Only settled entries count
   */
  get size(): number {
    return this.settled.size;
  }

  clear(): void {
    this.entries.clear();
    this.settled.clear();
  }
}

export interface CacheStats {
  pools: number;
  referencePrices: number;
}

export class AnalysisCache {
  readonly pools = new WriteOnceCache<string, PoolMetadata>();
  // Keyed by bucket; a null sample is never stored
  readonly referencePrices = new WriteOnceCache<number, ReferencePriceSample>();

  stats(): CacheStats {
    return {
      pools: this.pools.size,
      referencePrices: this.referencePrices.size,
    };
  }
}

export default AnalysisCache;
