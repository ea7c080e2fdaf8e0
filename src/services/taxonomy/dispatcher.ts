/**
 * Parallel Dispatcher
 *
 * Drains distinct lineage keys through Cache → Local Index → Source Adapter
 * on a bounded pool. Repeats of a key are answered from the cache once the
 * pool has drained. Returns only once every key is terminal; merging must
 * not begin before that.
 */

import os from 'os';
import pLimit from 'p-limit';
import logger from '../../utils/logger';
import { LocalReferenceIndex } from './localReferenceIndex';
import { ResolutionCache } from './resolutionCache';
import { LineageQuery, MatchResult, TaxonomySource, noMatch } from './types';

export type KeyOutcome = 'cache-hit' | 'local-hit' | 'resolved' | 'unresolved';

export interface DispatchDependencies {
    cache: ResolutionCache;
    source: TaxonomySource;
    localIndex?: LocalReferenceIndex | null;
    /** 0 means one worker per available core */
    workers: number;
    onProgress?: (completed: number, total: number) => void;
}

export interface DispatchStats {
    distinct: number;
    /** Keys already cached before the run plus every repeat of a key */
    cacheHits: number;
    localHits: number;
    remoteQueries: number;
    resolved: number;
    unresolved: number;
    workerFailures: number;
}

export interface DispatchOutcome {
    /** One entry per distinct key, in first-seen order */
    results: Map<string, MatchResult>;
    outcomes: Map<string, KeyOutcome>;
    stats: DispatchStats;
}

export function resolvePoolSize(workers: number): number {
    return workers > 0 ? Math.floor(workers) : os.availableParallelism();
}

export function distinctQueries(queries: Iterable<LineageQuery>): LineageQuery[] {
    const byKey = new Map<string, LineageQuery>();
    for (const query of queries) {
        if (!byKey.has(query.key)) {
            byKey.set(query.key, query);
        }
    }
    return [...byKey.values()];
}

export async function dispatchLineageQueries(
    queries: Iterable<LineageQuery>,
    deps: DispatchDependencies
): Promise<DispatchOutcome> {
    const { cache, source, localIndex, onProgress } = deps;
    const all = [...queries];
    const unique = distinctQueries(all);
    const poolSize = resolvePoolSize(deps.workers);
    const limit = pLimit(poolSize);

    const settled = new Map<string, MatchResult>();
    const outcomes = new Map<string, KeyOutcome>();
    let remoteQueries = 0;
    let workerFailures = 0;
    let completed = 0;

    logger.debug(`Dispatching ${unique.length} lineage key(s) to ${source.name} with ${poolSize} worker(s)`);

    async function resolveKey(query: LineageQuery): Promise<[MatchResult, KeyOutcome]> {
        let localHit = false;

        try {
            const { result, fromCache } = await cache.getOrResolve(query.key, async () => {
                const local = localIndex?.lookup(query);
                if (local) {
                    localHit = true;
                    return local;
                }
                remoteQueries++;
                return source.resolve(query);
            });

            if (fromCache) {
                return [result, 'cache-hit'];
            }
            if (localHit) {
                return [result, 'local-hit'];
            }
            return [result, result.matchType === 'no-match' ? 'unresolved' : 'resolved'];
        } catch (error) {
            // A crashed lookup only costs its own key
            workerFailures++;
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Worker failed resolving "${query.verbatim}": ${message}`);
            return [cache.set(query.key, noMatch(query.key, source.name, 'worker', message)), 'unresolved'];
        }
    }

    await Promise.all(
        unique.map(query =>
            limit(async () => {
                const [result, outcome] = await resolveKey(query);
                settled.set(query.key, result);
                outcomes.set(query.key, outcome);
                completed++;
                onProgress?.(completed, unique.length);
            })
        )
    );

    const results = new Map<string, MatchResult>();
    let resolved = 0;
    let cacheHits = 0;
    let localHits = 0;

    const seen = new Set<string>();
    for (const query of all) {
        if (!seen.has(query.key)) {
            seen.add(query.key);
        } else if (cache.get(query.key)) {
            cacheHits++;
        }
    }

    for (const query of unique) {
        const result = settled.get(query.key) ?? noMatch(query.key, source.name, 'worker', 'Key never settled');
        results.set(query.key, result);
        if (result.matchType !== 'no-match') {
            resolved++;
        }
        const outcome = outcomes.get(query.key);
        if (outcome === 'cache-hit') {
            cacheHits++;
        } else if (outcome === 'local-hit') {
            localHits++;
        }
    }

    return {
        results,
        outcomes,
        stats: {
            distinct: unique.length,
            cacheHits,
            localHits,
            remoteQueries,
            resolved,
            unresolved: unique.length - resolved,
            workerFailures,
        },
    };
}
