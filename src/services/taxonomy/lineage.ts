/**
 * Lineage string parsing
 *
 * Turns a semicolon-separated classifier lineage
 * (e.g. "Eukaryota;Chordata;Actinopteri;...;Thunnus_albacares") into
 * cleaned (rank, name) entries. Ranks come from the level's position,
 * so a skipped "unassigned" level never shifts the ranks below it. A lineage
 * deeper than its rank list (PR2 has nine levels) is aligned on its finest
 * level and the surplus upper levels are left unranked.
 */

import { Classification, DWC_RANKS, LineageEntry, ParsedLineage, isDwcRank } from './types';
import { LineageInputError } from './errors';

const PLACEHOLDER_NAMES = new Set(['unassigned', 'nan', 'none', 'na']);

export const SPECIES_EXCLUDED_SUFFIX = '|species-excluded';

export const UNRANKED = 'unranked';

/**
 * Clean a single lineage level. Returns null when nothing usable is left.
 */
export function cleanTaxonName(raw: string): string | null {
    let name = raw.replace(/[_\-/]/g, ' ').trim();

    if (!name || PLACEHOLDER_NAMES.has(name.toLowerCase())) {
        return null;
    }

    name = name
        .replace(/ spp?\./g, '')
        .replace(/\d+/g, '')
        .replace(/\s+/g, ' ')
        .trim();

    return name.length > 1 ? name : null;
}

export function parseLineage(
    verbatim: string,
    assayName: string,
    ranks: readonly string[] = DWC_RANKS
): ParsedLineage {
    const trimmed = verbatim.trim().replace(/;+$/, '');

    if (!trimmed) {
        throw new LineageInputError('Lineage is empty', verbatim);
    }

    const levels = trimmed.split(';');
    const surplus = Math.max(0, levels.length - ranks.length);

    const entries: LineageEntry[] = [];
    levels.forEach((level, index) => {
        const name = cleanTaxonName(level);
        if (name) {
            const rank = index < surplus ? UNRANKED : ranks[index - surplus].toLowerCase();
            entries.push({ rank, name });
        }
    });

    if (entries.length === 0) {
        throw new LineageInputError('Lineage has no assignable level', verbatim);
    }

    return { verbatim, assayName, entries };
}

export function canonicalKey(entries: readonly LineageEntry[], speciesExcluded: boolean): string {
    const body = entries.map(entry => `${entry.rank}:${entry.name.toLowerCase()}`).join(';');
    return speciesExcluded ? body + SPECIES_EXCLUDED_SUFFIX : body;
}

/**
 * Names actually sent to the backbone, as a lineage string.
 */
export function cleanedTaxonomy(entries: readonly LineageEntry[]): string {
    return entries.map(entry => entry.name).join(';');
}

/**
 * Finest-first walk order used by the source adapters.
 */
export function finestFirst(entries: readonly LineageEntry[]): LineageEntry[] {
    return [...entries].reverse();
}

/**
 * Rank to report for a match made on `entry`; unranked levels report none.
 */
export function reportedRank(entry: LineageEntry): string | null {
    return entry.rank === UNRANKED ? null : entry.rank;
}

export function hasUnrankedLevels(entries: readonly LineageEntry[]): boolean {
    return entries.some(entry => entry.rank === UNRANKED);
}

/**
 * Darwin Core ranks carried by the lineage itself. Empty for a lineage that
 * overflowed its rank list, whose positional ranks are only a guess.
 */
export function classificationFromEntries(entries: readonly LineageEntry[]): Classification {
    const classification: Classification = {};
    if (hasUnrankedLevels(entries)) {
        return classification;
    }
    for (const entry of entries) {
        if (isDwcRank(entry.rank)) {
            classification[entry.rank] = entry.name;
        }
    }
    return classification;
}
