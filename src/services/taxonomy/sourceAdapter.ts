/**
 * Source Adapter
 *
 * Shared lineage walk for the backbone providers. A provider only supplies
 * `lookupLevel`, which queries one name; the walk goes from the finest
 * remaining rank to the coarsest and stops at the first acceptable match.
 * Transient failures are retried per HTTP call against a per-key budget.
 */

import logger from '../../utils/logger';
import {
    PermanentRequestError,
    RetryBudget,
    RetryExhaustedError,
    RetryHooks,
    RetryPolicy,
    withRetry,
} from '../../utils/retry';
import { TaxonomyHttpClient } from './httpClient';
import { finestFirst, reportedRank } from './lineage';
import { rankAllowed } from './rankPolicy';
import {
    Classification,
    DWC_RANKS,
    DwcRank,
    LineageEntry,
    LineageQuery,
    MatchResult,
    MatchType,
    TaxonomySource,
    noMatch,
} from './types';

export interface LevelMatch {
    rank: string | null;
    name: string;
    identifier: string;
    matchType: Exclude<MatchType, 'no-match'>;
    classification?: Classification;
}

/** Retried JSON GET bound to the current key's retry budget */
export type BackboneRequest = (path: string, params?: Record<string, unknown>) => Promise<unknown>;

export type LevelLookup = (
    entry: LineageEntry,
    query: LineageQuery,
    request: BackboneRequest
) => Promise<LevelMatch | null>;

export interface SourceAdapterOptions {
    http: TaxonomyHttpClient;
    retry: RetryPolicy;
    hooks?: RetryHooks;
}

export function createSourceAdapter(
    name: TaxonomySource['name'],
    lookupLevel: LevelLookup,
    options: SourceAdapterOptions
): TaxonomySource {
    const { http, retry, hooks = {} } = options;

    async function resolve(query: LineageQuery): Promise<MatchResult> {
        if (query.entries.length === 0) {
            return noMatch(query.key, name, 'input', 'Lineage query has no entries');
        }

        const budget = new RetryBudget(retry.budgetMs);
        const request: BackboneRequest = (path, params) =>
            withRetry(() => http.get(path, params), retry, budget, {
                ...hooks,
                onRetry: (attempt, delayMs, error) => {
                    logger.debug(`${name} request ${path} throttled (attempt ${attempt}), retrying in ${delayMs}ms`);
                    hooks.onRetry?.(attempt, delayMs, error);
                },
            });

        try {
            for (const entry of finestFirst(query.entries)) {
                const match = await lookupLevel(entry, query, request);
                if (!match) {
                    continue;
                }

                const matchedRank = match.rank ?? reportedRank(entry);
                if (!rankAllowed(query, matchedRank)) {
                    continue;
                }

                return {
                    key: query.key,
                    matchedRank,
                    matchedName: match.name,
                    identifier: match.identifier,
                    matchType: match.matchType,
                    source: name,
                    queriedName: entry.name,
                    classification: match.classification,
                };
            }
        } catch (error) {
            if (error instanceof RetryExhaustedError) {
                logger.warn(`${name} lookup gave up for "${query.verbatim}": ${error.message}`);
                return noMatch(query.key, name, 'transient', error.message);
            }
            if (error instanceof PermanentRequestError) {
                logger.warn(`${name} rejected lookup for "${query.verbatim}": ${error.message}`);
                return noMatch(query.key, name, 'permanent', error.message);
            }
            throw error;
        }

        return noMatch(
            query.key,
            name,
            'no-candidate',
            `No ${name} match at any of ${query.entries.length} rank(s)`
        );
    }

    return { name, resolve };
}

/**
 * Candidates at the queried rank win over homonyms at other ranks.
 */
export function preferQueriedRank<T>(
    candidates: T[],
    entry: LineageEntry,
    rankOf: (candidate: T) => string | undefined
): T[] {
    const sameRank = candidates.filter(candidate => rankOf(candidate)?.toLowerCase() === entry.rank);
    return sameRank.length > 0 ? sameRank : candidates;
}

/**
 * Pick Darwin Core ranks out of a provider record.
 */
export function pickClassification(record: { [R in DwcRank]?: unknown }): Classification {
    const classification: Classification = {};
    for (const rank of DWC_RANKS) {
        const value = record[rank];
        if (typeof value === 'string' && value.length > 0) {
            classification[rank] = value;
        }
    }
    return classification;
}
