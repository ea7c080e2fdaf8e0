/**
 * WoRMS (World Register of Marine Species) source adapter
 *
 * Resolves lineage levels with the AphiaRecordsByMatchNames endpoint, which
 * covers exact and fuzzy (phonetic / near) matching in a single call.
 *
 * Reference: https://www.marinespecies.org/rest/
 */

import { RetryHooks, RetryPolicy } from '../../utils/retry';
import { TaxonomyHttpClient, createHttpClient } from './httpClient';
import { LevelLookup, LevelMatch, createSourceAdapter, pickClassification, preferQueriedRank } from './sourceAdapter';
import { rankAllowed } from './rankPolicy';
import { LineageEntry, LineageQuery, TaxonomySource } from './types';

export const WORMS_API_BASE = 'https://www.marinespecies.org/rest';

export const WORMS_LSID_PREFIX = 'urn:lsid:marinespecies.org:taxname:';

export interface WoRMSTaxon {
    AphiaID: number;
    scientificname: string;
    authority?: string | null;
    status?: 'accepted' | 'unaccepted' | 'uncertain' | 'alternate representation' | string;
    unacceptreason?: string | null;
    valid_AphiaID?: number | null;
    valid_name?: string | null;
    kingdom?: string | null;
    phylum?: string | null;
    class?: string | null;
    order?: string | null;
    family?: string | null;
    genus?: string | null;
    match_type?: string;
    rank?: string | null;
    lsid?: string | null;
}

const EXACT_MATCH_TYPES = new Set(['exact', 'exact_subgenus']);
const FUZZY_MATCH_TYPES = new Set(['phonetic', 'near_1', 'near_2', 'near_3', 'like']);

export function wormsLsid(aphiaId: number | string): string {
    return `${WORMS_LSID_PREFIX}${aphiaId}`;
}

function isWoRMSTaxon(value: unknown): value is WoRMSTaxon {
    return (
        typeof value === 'object' &&
        value !== null &&
        'AphiaID' in value &&
        typeof value.AphiaID === 'number' &&
        'scientificname' in value &&
        typeof value.scientificname === 'string'
    );
}

/**
 * The endpoint answers one candidate list per submitted name; an empty
 * body (HTTP 204) means no candidates.
 */
export function parseMatchNamesResponse(data: unknown): WoRMSTaxon[] {
    if (!Array.isArray(data)) {
        return [];
    }
    const first: unknown = data[0];
    return Array.isArray(first) ? first.filter(isWoRMSTaxon) : [];
}

/**
 * `exact_genus` means only the genus of a binomial matched; the genus level
 * is queried on its own, so those candidates are dropped here.
 */
export function toMatchType(matchType: string | undefined): 'exact' | 'fuzzy' | null {
    if (matchType === undefined || EXACT_MATCH_TYPES.has(matchType)) {
        return 'exact';
    }
    return FUZZY_MATCH_TYPES.has(matchType) ? 'fuzzy' : null;
}

function classificationOf(taxon: WoRMSTaxon, name: string) {
    const classification = pickClassification(taxon);
    if (taxon.rank?.toLowerCase() === 'species') {
        classification.species = name;
    }
    return classification;
}

/**
 * Candidate choice when a name matches several records: an accepted record
 * wins, then an unaccepted record pointing at its accepted taxon, then the
 * first record in WoRMS' own order. No further tie-break is applied between
 * two accepted records at the same rank.
 */
export function selectWormsCandidate(
    taxa: WoRMSTaxon[],
    entry: LineageEntry,
    query: LineageQuery
): LevelMatch | null {
    const eligible = preferQueriedRank(
        taxa.filter(taxon => toMatchType(taxon.match_type) !== null && rankAllowed(query, taxon.rank)),
        entry,
        taxon => taxon.rank ?? undefined
    );

    const accepted = eligible.find(taxon => taxon.status === 'accepted') ?? null;
    const chosen = accepted ?? eligible[0];
    if (!chosen) {
        return null;
    }

    const rank = chosen.rank ? chosen.rank.toLowerCase() : null;
    const matchType = toMatchType(chosen.match_type) ?? 'fuzzy';

    if (!accepted) {
        const synonym = eligible.find(taxon => taxon.valid_AphiaID && taxon.valid_name);
        if (synonym?.valid_AphiaID && synonym.valid_name) {
            return {
                rank: synonym.rank ? synonym.rank.toLowerCase() : null,
                name: synonym.valid_name,
                identifier: wormsLsid(synonym.valid_AphiaID),
                matchType: 'accepted-synonym',
                classification: classificationOf(synonym, synonym.valid_name),
            };
        }
    }

    return {
        rank,
        name: chosen.scientificname,
        identifier: wormsLsid(chosen.AphiaID),
        matchType,
        classification: classificationOf(chosen, chosen.scientificname),
    };
}

export interface WormsSourceOptions {
    retry: RetryPolicy;
    timeoutMs: number;
    http?: TaxonomyHttpClient;
    hooks?: RetryHooks;
}

export function createWormsSource(options: WormsSourceOptions): TaxonomySource {
    const http = options.http ?? createHttpClient(WORMS_API_BASE, options.timeoutMs);

    const lookupLevel: LevelLookup = async (entry, query, request) => {
        const data = await request('/AphiaRecordsByMatchNames', {
            scientificnames: [entry.name],
            marine_only: 'false',
        });
        return selectWormsCandidate(parseMatchNamesResponse(data), entry, query);
    };

    return createSourceAdapter('worms', lookupLevel, { http, retry: options.retry, hooks: options.hooks });
}
