/**
 * Local Reference Index
 *
 * Exact-name shortcut over a pre-resolved taxonomy spreadsheet (for example
 * the PR2 taxonomy export with WoRMS AphiaIDs). Built once per run and read
 * only afterwards. WoRMS provider only.
 *
 * Darwin Core rank columns (kingdom … species), where the sheet has them,
 * become the hit's classification; ranks the sheet leaves empty are taken
 * from the query lineage.
 */

import fs from 'fs';
import * as XLSX from 'xlsx';
import logger from '../../utils/logger';
import { LocalReferenceError } from './errors';
import { classificationFromEntries, reportedRank } from './lineage';
import { SPECIES_RANK } from './rankPolicy';
import { WORMS_LSID_PREFIX, wormsLsid } from './wormsService';
import { Classification, DWC_RANKS, LineageQuery, MatchResult, isDwcRank } from './types';

export interface LocalReferenceRecord {
    scientificName: string;
    identifier: string;
    rank: string | null;
    acceptedName: string | null;
    classification: Classification;
}

export type SpreadsheetRow = Record<string, unknown>;

const NAME_COLUMNS = ['scientificName', 'scientificname', 'species', 'name'];
const ID_COLUMNS = ['aphiaId', 'AphiaID', 'worms_id', 'scientificNameID'];
const RANK_COLUMNS = ['taxonRank', 'rank'];
const ACCEPTED_NAME_COLUMNS = ['acceptedName', 'valid_name'];

export function normalizeName(name: string): string {
    return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

function pickColumn(header: string[], candidates: string[]): string | undefined {
    return candidates.find(column => header.includes(column));
}

function cellText(value: unknown): string | null {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
    }
    return null;
}

function toIdentifier(raw: string): string | null {
    if (raw.startsWith(WORMS_LSID_PREFIX)) {
        return raw;
    }
    const aphiaId = Number(raw);
    return Number.isInteger(aphiaId) && aphiaId > 0 ? wormsLsid(aphiaId) : null;
}

export class LocalReferenceIndex {
    private readonly records: ReadonlyMap<string, LocalReferenceRecord>;

    constructor(records: Iterable<LocalReferenceRecord>) {
        const byName = new Map<string, LocalReferenceRecord>();
        for (const record of records) {
            const key = normalizeName(record.scientificName);
            // first row for a name wins, matching spreadsheet order
            if (!byName.has(key)) {
                byName.set(key, record);
            }
        }
        this.records = byName;
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Exact match on the query's finest name only.
     */
    lookup(query: LineageQuery): MatchResult | undefined {
        const finest = query.entries[query.entries.length - 1];
        if (!finest) {
            return undefined;
        }

        const record = this.records.get(normalizeName(finest.name));
        if (!record) {
            return undefined;
        }

        const matchedRank = record.rank ?? reportedRank(finest);
        if (query.speciesExcluded && matchedRank === SPECIES_RANK) {
            return undefined;
        }

        const matchedName = record.acceptedName ?? record.scientificName;
        const classification: Classification = {
            ...classificationFromEntries(query.entries),
            ...record.classification,
        };
        if (matchedRank && isDwcRank(matchedRank)) {
            classification[matchedRank] = matchedName;
        }

        return {
            key: query.key,
            matchedRank,
            matchedName,
            identifier: record.identifier,
            matchType: 'exact',
            source: 'local',
            queriedName: finest.name,
            classification,
        };
    }

    static fromRows(rows: SpreadsheetRow[], source: string = 'rows'): LocalReferenceIndex {
        const header = rows.length > 0 ? Object.keys(rows[0]) : [];
        const nameColumn = pickColumn(header, NAME_COLUMNS);
        const idColumn = pickColumn(header, ID_COLUMNS);

        if (!nameColumn || !idColumn) {
            throw new LocalReferenceError(
                `Local reference ${source} needs a name column (${NAME_COLUMNS.join(', ')}) ` +
                `and an identifier column (${ID_COLUMNS.join(', ')})`,
                source
            );
        }

        const rankColumn = pickColumn(header, RANK_COLUMNS);
        const acceptedColumn = pickColumn(header, ACCEPTED_NAME_COLUMNS);
        const records: LocalReferenceRecord[] = [];
        let skipped = 0;

        for (const row of rows) {
            const scientificName = cellText(row[nameColumn]);
            const rawId = cellText(row[idColumn]);
            const identifier = rawId ? toIdentifier(rawId) : null;

            if (!scientificName || !identifier) {
                skipped++;
                continue;
            }

            const rank = rankColumn ? cellText(row[rankColumn]) : null;
            const classification: Classification = {};
            for (const dwcRank of DWC_RANKS) {
                const value = cellText(row[dwcRank]);
                if (value) {
                    classification[dwcRank] = value;
                }
            }
            records.push({
                scientificName,
                identifier,
                rank: rank ? rank.toLowerCase() : null,
                acceptedName: acceptedColumn ? cellText(row[acceptedColumn]) : null,
                classification,
            });
        }

        if (skipped > 0) {
            logger.debug(`Local reference ${source}: skipped ${skipped} row(s) without a name or identifier`);
        }

        return new LocalReferenceIndex(records);
    }
}

/**
 * Read the reference spreadsheet. Any failure is a LocalReferenceError,
 * which callers treat as fatal.
 */
export function loadLocalReferenceIndex(filePath: string, sheetName?: string): LocalReferenceIndex {
    if (!fs.existsSync(filePath)) {
        throw new LocalReferenceError(`Local reference database not found: ${filePath}`, filePath);
    }

    let rows: SpreadsheetRow[];
    try {
        const workbook = XLSX.readFile(filePath);
        const name = sheetName ?? workbook.SheetNames[0];
        const sheet = name ? workbook.Sheets[name] : undefined;
        if (!sheet) {
            throw new Error(`sheet "${name ?? ''}" not found`);
        }
        rows = XLSX.utils.sheet_to_json<SpreadsheetRow>(sheet, { defval: null, raw: true });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new LocalReferenceError(`Local reference database unreadable (${filePath}): ${message}`, filePath);
    }

    const index = LocalReferenceIndex.fromRows(rows, filePath);
    logger.info(`📚 Local reference database loaded: ${index.size} names from ${filePath}`);
    return index;
}
