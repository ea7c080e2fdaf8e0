/**
 * GBIF Backbone source adapter
 *
 * Resolves lineage levels with the species match endpoint and follows
 * synonyms to their accepted usage.
 *
 * Reference: https://techdocs.gbif.org/en/openapi/v1/species
 */

import { RetryHooks, RetryPolicy } from '../../utils/retry';
import { TaxonomyHttpClient, createHttpClient } from './httpClient';
import {
    BackboneRequest,
    LevelLookup,
    LevelMatch,
    createSourceAdapter,
    pickClassification,
    preferQueriedRank,
} from './sourceAdapter';
import { hasUnrankedLevels } from './lineage';
import { rankAllowed } from './rankPolicy';
import { DWC_RANKS, LineageEntry, LineageQuery, TaxonomySource } from './types';

export const GBIF_API_BASE = 'https://api.gbif.org/v1';

export const GBIF_SPECIES_URL = 'https://www.gbif.org/species/';

export const DEFAULT_GBIF_MIN_CONFIDENCE = 80;

export interface GbifNameUsageMatch {
    matchType: 'EXACT' | 'FUZZY' | 'HIGHERRANK' | 'NONE' | string;
    usageKey?: number;
    acceptedUsageKey?: number;
    scientificName?: string;
    canonicalName?: string;
    rank?: string;
    status?: string;
    confidence?: number;
    synonym?: boolean;
    kingdom?: string;
    phylum?: string;
    class?: string;
    order?: string;
    family?: string;
    genus?: string;
    species?: string;
    alternatives?: unknown[];
}

export interface GbifNameUsage {
    key: number;
    scientificName: string;
    canonicalName?: string;
    rank?: string;
    kingdom?: string;
    phylum?: string;
    class?: string;
    order?: string;
    family?: string;
    genus?: string;
    species?: string;
}

const GBIF_RANKS = new Set<string>(DWC_RANKS);

export function gbifSpeciesUrl(usageKey: number): string {
    return `${GBIF_SPECIES_URL}${usageKey}`;
}

function isNameUsageMatch(value: unknown): value is GbifNameUsageMatch {
    return typeof value === 'object' && value !== null && 'matchType' in value && typeof value.matchType === 'string';
}

function isNameUsage(value: unknown): value is GbifNameUsage {
    return (
        typeof value === 'object' &&
        value !== null &&
        'key' in value &&
        typeof value.key === 'number' &&
        'scientificName' in value &&
        typeof value.scientificName === 'string'
    );
}

/**
 * Candidate choice: exact matches, and fuzzy matches at or above
 * `minConfidence`, at the queried rank when any exist. An accepted usage wins
 * over a synonym; otherwise GBIF's highest-confidence candidate is taken, the
 * primary match first on ties.
 */
export function selectGbifCandidate(
    response: GbifNameUsageMatch,
    entry: LineageEntry,
    query: LineageQuery,
    minConfidence: number
): GbifNameUsageMatch | null {
    const alternatives = (response.alternatives ?? []).filter(isNameUsageMatch);
    const eligible = [response, ...alternatives].filter(candidate =>
        typeof candidate.usageKey === 'number' &&
        (candidate.matchType === 'EXACT' ||
            (candidate.matchType === 'FUZZY' && (candidate.confidence ?? 0) >= minConfidence)) &&
        rankAllowed(query, candidate.rank)
    );

    // Array.prototype.sort is stable, so the primary match stays first on ties
    const ranked = preferQueriedRank(eligible, entry, candidate => candidate.rank)
        .sort((a, b) => (b.confidence ?? 0) - (a.confidence ?? 0));

    return ranked.find(candidate => candidate.status === 'ACCEPTED') ?? ranked[0] ?? null;
}

async function toLevelMatch(
    candidate: GbifNameUsageMatch,
    entry: LineageEntry,
    request: BackboneRequest
): Promise<LevelMatch | null> {
    if (typeof candidate.usageKey !== 'number') {
        return null;
    }

    const isSynonym = candidate.synonym === true || (candidate.status ?? '').includes('SYNONYM');
    if (isSynonym && typeof candidate.acceptedUsageKey === 'number') {
        const accepted = await request(`/species/${candidate.acceptedUsageKey}`);
        if (isNameUsage(accepted)) {
            return {
                rank: accepted.rank ? accepted.rank.toLowerCase() : null,
                name: accepted.canonicalName || accepted.scientificName,
                identifier: gbifSpeciesUrl(accepted.key),
                matchType: 'accepted-synonym',
                classification: pickClassification(accepted),
            };
        }
    }

    return {
        rank: candidate.rank ? candidate.rank.toLowerCase() : null,
        name: candidate.canonicalName || candidate.scientificName || entry.name,
        identifier: gbifSpeciesUrl(candidate.usageKey),
        matchType: candidate.matchType === 'EXACT' ? 'exact' : 'fuzzy',
        classification: pickClassification(candidate),
    };
}

export interface GbifSourceOptions {
    retry: RetryPolicy;
    timeoutMs: number;
    minConfidence?: number;
    http?: TaxonomyHttpClient;
    hooks?: RetryHooks;
}

export function createGbifSource(options: GbifSourceOptions): TaxonomySource {
    const http = options.http ?? createHttpClient(GBIF_API_BASE, options.timeoutMs);
    const minConfidence = options.minConfidence ?? DEFAULT_GBIF_MIN_CONFIDENCE;

    const lookupLevel: LevelLookup = async (entry, query, request) => {
        const params: Record<string, unknown> = {
            name: entry.name,
            strict: true,
            verbose: true,
        };
        if (GBIF_RANKS.has(entry.rank)) {
            params.rank = entry.rank.toUpperCase();
        }
        // positional kingdoms of an overflowing lineage are not trusted as a filter
        const kingdom = hasUnrankedLevels(query.entries)
            ? undefined
            : query.entries.find(level => level.rank === 'kingdom');
        if (kingdom) {
            params.kingdom = kingdom.name;
        }

        const data = await request('/species/match', params);
        if (!isNameUsageMatch(data)) {
            return null;
        }

        const candidate = selectGbifCandidate(data, entry, query, minConfidence);
        return candidate ? toLevelMatch(candidate, entry, request) : null;
    };

    return createSourceAdapter('gbif', lookupLevel, { http, retry: options.retry, hooks: options.hooks });
}
