/**
 * Shared types for lineage resolution.
 */

export const DWC_RANKS = ['kingdom', 'phylum', 'class', 'order', 'family', 'genus', 'species'] as const;

export type DwcRank = typeof DWC_RANKS[number];

const DWC_RANK_SET: ReadonlySet<string> = new Set(DWC_RANKS);

export function isDwcRank(rank: string): rank is DwcRank {
    return DWC_RANK_SET.has(rank);
}

export type TaxonomicProvider = 'WoRMS' | 'GBIF';

export type MatchType = 'exact' | 'fuzzy' | 'accepted-synonym' | 'no-match';

export type MatchSource = 'local' | 'worms' | 'gbif';

export type FailureCause = 'input' | 'no-candidate' | 'transient' | 'permanent' | 'worker';

export type Classification = Partial<Record<DwcRank, string>>;

export interface LineageEntry {
    rank: string; // lower-case; 'unranked' above the declared ranks
    name: string;
}

export interface ParsedLineage {
    verbatim: string;
    assayName: string;
    entries: LineageEntry[];
}

export interface LineageQuery extends ParsedLineage {
    speciesExcluded: boolean;
    key: string;
}

export interface MatchResult {
    key: string;
    matchedRank: string | null;
    matchedName: string | null;
    identifier: string | null;
    matchType: MatchType;
    source: MatchSource;
    queriedName?: string;
    classification?: Classification;
    failure?: {
        cause: FailureCause;
        message: string;
    };
}

export interface OccurrenceRow {
    asvId: string;
    sampleId: string;
    assayName: string;
    verbatimIdentification: string;
    [column: string]: unknown;
}

export interface ResolvedOccurrenceRow extends OccurrenceRow {
    scientificName: string;
    scientificNameID: string;
    taxonRank: string | null;
    nameAccordingTo: TaxonomicProvider;
    matchType: MatchType;
    matchSource: MatchSource;
    identificationRemarks: string;
    cleanedTaxonomy: string;
    kingdom: string | null;
    phylum: string | null;
    class: string | null;
    order: string | null;
    family: string | null;
    genus: string | null;
    species: string | null;
}

export type SkipPolicy = ReadonlySet<string>;

/**
 * Capability implemented by each backbone provider.
 */
export interface TaxonomySource {
    readonly name: Exclude<MatchSource, 'local'>;
    resolve(query: LineageQuery): Promise<MatchResult>;
}

export interface ResolutionSummary {
    provider: TaxonomicProvider;
    distinctLineages: number;
    resolved: number;
    unresolved: number;
    cacheHits: number;
    localHits: number;
    remoteQueries: number;
    workerFailures: number;
    rowsResolved: number;
    rowsUnresolved: number;
    unresolvedLineages: string[];
}

export function noMatch(
    key: string,
    source: MatchSource,
    cause: FailureCause,
    message: string
): MatchResult {
    return {
        key,
        matchedRank: null,
        matchedName: null,
        identifier: null,
        matchType: 'no-match',
        source,
        failure: { cause, message },
    };
}
