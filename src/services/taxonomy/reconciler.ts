/**
 * Merge/Reconciler
 *
 * Fans resolved lineage keys back out over every occurrence row. Rows whose
 * key did not resolve carry the "incertae sedis" placeholder so that each
 * record keeps a populated taxon reference.
 */

import { cleanedTaxonomy } from './lineage';
import {
    Classification,
    DwcRank,
    LineageQuery,
    MatchResult,
    OccurrenceRow,
    ResolvedOccurrenceRow,
    TaxonomicProvider,
    noMatch,
} from './types';

export const UNRESOLVED_TAXON_NAME = 'incertae sedis';

export const UNRESOLVED_TAXON_ID: Record<TaxonomicProvider, string> = {
    WoRMS: 'urn:lsid:marinespecies.org:taxname:12',
    GBIF: 'https://www.gbif.org/species/0',
};

/**
 * A row paired with the key it resolves under. `query` is null for rows whose
 * lineage failed to parse; their key points at an input-error result.
 */
export interface PreparedRow<R extends OccurrenceRow = OccurrenceRow> {
    row: R;
    key: string;
    query: LineageQuery | null;
}

export interface MergeResult<R extends OccurrenceRow = OccurrenceRow> {
    rows: Array<R & ResolvedOccurrenceRow>;
    rowsResolved: number;
    rowsUnresolved: number;
    /** Distinct verbatim lineages that ended unresolved, sorted */
    unresolvedLineages: string[];
}

export function identificationRemarks(result: MatchResult): string {
    const remark = result.matchType === 'no-match'
        ? `no match via ${result.source}`
        : `${result.matchType} match via ${result.source}`;
    return result.failure ? `${remark} (${result.failure.cause}: ${result.failure.message})` : remark;
}

export function attachMatch<R extends OccurrenceRow>(
    row: R,
    query: LineageQuery | null,
    result: MatchResult,
    provider: TaxonomicProvider
): R & ResolvedOccurrenceRow {
    const resolved = result.matchType !== 'no-match' && result.identifier !== null;
    const classification: Classification = result.classification ?? {};
    const rankValue = (rank: DwcRank) => (resolved ? classification[rank] ?? null : null);

    return {
        ...row,
        kingdom: rankValue('kingdom'),
        phylum: rankValue('phylum'),
        class: rankValue('class'),
        order: rankValue('order'),
        family: rankValue('family'),
        genus: rankValue('genus'),
        species: rankValue('species'),
        scientificName: resolved && result.matchedName ? result.matchedName : UNRESOLVED_TAXON_NAME,
        scientificNameID: resolved && result.identifier ? result.identifier : UNRESOLVED_TAXON_ID[provider],
        taxonRank: resolved ? result.matchedRank : null,
        nameAccordingTo: provider,
        matchType: resolved ? result.matchType : 'no-match',
        matchSource: result.source,
        identificationRemarks: identificationRemarks(result),
        cleanedTaxonomy: query ? cleanedTaxonomy(query.entries) : '',
    };
}

/**
 * Attach a MatchResult to every prepared row. Must only run after dispatch
 * has settled every key.
 */
export function mergeResolutions<R extends OccurrenceRow>(
    prepared: PreparedRow<R>[],
    results: ReadonlyMap<string, MatchResult>,
    provider: TaxonomicProvider
): MergeResult<R> {
    const source = provider === 'WoRMS' ? 'worms' : 'gbif';
    const unresolved = new Set<string>();
    let rowsResolved = 0;

    const rows = prepared.map(({ row, key, query }) => {
        const result = results.get(key) ?? noMatch(key, source, 'worker', 'No result recorded for lineage key');
        const merged = attachMatch(row, query, result, provider);

        if (merged.matchType === 'no-match') {
            unresolved.add(row.verbatimIdentification);
        } else {
            rowsResolved++;
        }
        return merged;
    });

    return {
        rows,
        rowsResolved,
        rowsUnresolved: rows.length - rowsResolved,
        unresolvedLineages: [...unresolved].sort(),
    };
}
