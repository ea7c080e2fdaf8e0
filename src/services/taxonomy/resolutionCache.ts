/**
 * Result Cache
 *
 * Run-scoped map from canonical lineage key to MatchResult. A key being
 * resolved is claimed with its in-flight promise, so concurrent workers asking
 * for the same key share one remote lookup. Values are a pure function of the
 * key; the first stored value is kept.
 */

import { MatchResult } from './types';

export interface CacheStats {
    size: number;
    hits: number;
    misses: number;
    inFlight: number;
}

export interface CachedResolution {
    result: MatchResult;
    fromCache: boolean;
}

export class ResolutionCache {
    private readonly entries = new Map<string, MatchResult>();
    private readonly inFlight = new Map<string, Promise<MatchResult>>();
    private hits = 0;
    private misses = 0;

    get size(): number {
        return this.entries.size;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    /**
     * Read a key, counting the hit or miss.
     */
    get(key: string): MatchResult | undefined {
        const result = this.entries.get(key);
        if (result) {
            this.hits++;
        } else {
            this.misses++;
        }
        return result;
    }

    /**
     * Store a result. Returns the value that ends up cached for the key.
     */
    set(key: string, result: MatchResult): MatchResult {
        const existing = this.entries.get(key);
        if (existing) {
            return existing;
        }
        this.entries.set(key, result);
        return result;
    }

    /**
     * Return the cached result, join a lookup already in flight, or claim the
     * key and run `resolve`. Rejections release the claim without caching.
     */
    async getOrResolve(key: string, resolve: () => Promise<MatchResult>): Promise<CachedResolution> {
        const cached = this.entries.get(key);
        if (cached) {
            this.hits++;
            return { result: cached, fromCache: true };
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            this.hits++;
            return { result: await pending, fromCache: true };
        }

        this.misses++;
        const claim = resolve()
            .then(result => this.set(key, result))
            .finally(() => this.inFlight.delete(key));
        this.inFlight.set(key, claim);

        return { result: await claim, fromCache: false };
    }

    /**
     * Copy of the cached results, sorted by key.
     */
    snapshot(): Map<string, MatchResult> {
        return new Map([...this.entries.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    }

    stats(): CacheStats {
        return {
            size: this.entries.size,
            hits: this.hits,
            misses: this.misses,
            inFlight: this.inFlight.size,
        };
    }
}
