/**
 * Rank policy filter
 *
 * Some markers (16S, for example) produce species calls that should not be
 * trusted. For assays in the skip policy the species entry is dropped before
 * the canonical key is computed, so the key records the policy outcome and
 * two assays with different policies never share a cache entry.
 */

import { LineageQuery, ParsedLineage, SkipPolicy } from './types';
import { LineageInputError } from './errors';
import { canonicalKey } from './lineage';

export const SPECIES_RANK = 'species';

export function createSkipPolicy(assayNames: Iterable<string> = []): SkipPolicy {
    return new Set(Array.from(assayNames, name => name.trim()).filter(name => name.length > 0));
}

export function applyRankPolicy(lineage: ParsedLineage, policy: SkipPolicy): LineageQuery {
    const skipSpecies = policy.has(lineage.assayName.trim());
    const entries = skipSpecies
        ? lineage.entries.filter(entry => entry.rank !== SPECIES_RANK)
        : [...lineage.entries];
    // Flagged assays refuse species-rank candidates even without a species level.
    const speciesExcluded = skipSpecies;

    if (entries.length === 0) {
        throw new LineageInputError('Nothing left to match after species-rank removal', lineage.verbatim);
    }

    return {
        verbatim: lineage.verbatim,
        assayName: lineage.assayName,
        entries,
        speciesExcluded,
        key: canonicalKey(entries, speciesExcluded),
    };
}

/**
 * Whether a candidate at `rank` may be accepted for this query.
 */
export function rankAllowed(query: LineageQuery, rank: string | null | undefined): boolean {
    if (!query.speciesExcluded || !rank) {
        return true;
    }
    return rank.toLowerCase() !== SPECIES_RANK;
}
