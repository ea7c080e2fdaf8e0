/**
 * Taxonomic Resolution Engine
 *
 * Resolves the lineage strings of a batch of eDNA occurrence rows against
 * WoRMS or GBIF and merges backbone identities back onto every row:
 *
 *   rows → parse → rank policy → canonical key
 *        → dispatch (cache → local index → source adapter)
 *        → merge
 *
 * A fresh ResolutionCache is built for each run and dropped when it ends.
 * Configuration problems (bad provider, unreadable local reference file)
 * surface from createResolutionEngine, before any lookup starts.
 */

import { ResolutionConfig, validateResolutionConfig } from '../../config/resolution';
import logger from '../../utils/logger';
import { RetryHooks } from '../../utils/retry';
import { dispatchLineageQueries, resolvePoolSize } from './dispatcher';
import { LineageInputError } from './errors';
import { createGbifSource } from './gbifService';
import { TaxonomyHttpClient } from './httpClient';
import { parseLineage } from './lineage';
import { LocalReferenceIndex, loadLocalReferenceIndex } from './localReferenceIndex';
import { applyRankPolicy, createSkipPolicy } from './rankPolicy';
import { PreparedRow, mergeResolutions } from './reconciler';
import { ResolutionCache } from './resolutionCache';
import {
    LineageQuery,
    MatchResult,
    OccurrenceRow,
    ResolutionSummary,
    ResolvedOccurrenceRow,
    SkipPolicy,
    TaxonomySource,
    noMatch,
} from './types';
import { createWormsSource } from './wormsService';

/** WoRMS throttles aggressively; more parallel clients only earn 429s */
export const WORMS_MAX_WORKERS = 3;

const INVALID_KEY_PREFIX = 'invalid:';

/** Lineages that carry no information below the domain are left incertae sedis */
const DOMAIN_ONLY_LINEAGES = new Set(['eukaryota']);

export interface ResolutionEngineOptions {
    config: ResolutionConfig;
    /** Replaces the configured backbone adapter */
    source?: TaxonomySource;
    /** HTTP client handed to the configured backbone adapter */
    http?: TaxonomyHttpClient;
    /** Pre-built local index; null disables it. Loaded from config when omitted. */
    localIndex?: LocalReferenceIndex | null;
    retryHooks?: RetryHooks;
}

export interface RunOptions {
    onProgress?: (completed: number, total: number) => void;
}

export interface ResolutionRun<R extends OccurrenceRow = OccurrenceRow> {
    rows: Array<R & ResolvedOccurrenceRow>;
    /** Canonical lineage key → result, for the downstream occurrence writer */
    results: Map<string, MatchResult>;
    summary: ResolutionSummary;
}

export interface TaxonomicResolutionEngine {
    readonly config: ResolutionConfig;
    readonly source: TaxonomySource;
    readonly localIndex: LocalReferenceIndex | null;
    readonly workers: number;
    resolveOccurrences<R extends OccurrenceRow>(rows: R[], options?: RunOptions): Promise<ResolutionRun<R>>;
}

export function createTaxonomySource(
    config: ResolutionConfig,
    deps: { http?: TaxonomyHttpClient; retryHooks?: RetryHooks } = {}
): TaxonomySource {
    switch (config.provider) {
        case 'WoRMS':
            return createWormsSource({
                retry: config.retry,
                timeoutMs: config.requestTimeoutMs,
                http: deps.http,
                hooks: deps.retryHooks,
            });
        case 'GBIF':
            return createGbifSource({
                retry: config.retry,
                timeoutMs: config.requestTimeoutMs,
                minConfidence: config.gbifMinConfidence,
                http: deps.http,
                hooks: deps.retryHooks,
            });
    }
}

export function resolveWorkerCount(config: ResolutionConfig): number {
    const workers = resolvePoolSize(config.workers[config.provider]);
    if (config.provider === 'WoRMS' && workers > WORMS_MAX_WORKERS) {
        logger.info(`Using ${WORMS_MAX_WORKERS} workers for WoRMS matching (requested ${workers})`);
        return WORMS_MAX_WORKERS;
    }
    return workers;
}

function loadConfiguredLocalIndex(config: ResolutionConfig): LocalReferenceIndex | null {
    const { enabled, path, sheet } = config.localReference;
    if (!enabled || config.provider !== 'WoRMS' || !path) {
        return null;
    }
    return loadLocalReferenceIndex(path, sheet ?? undefined);
}

export interface PreparedRows<R extends OccurrenceRow> {
    prepared: PreparedRow<R>[];
    queries: LineageQuery[];
    /** Results settled without a lookup (unparseable or domain-only lineages), keyed like the cache */
    inputFailures: Map<string, MatchResult>;
}

function isDomainOnly(verbatim: string): boolean {
    return DOMAIN_ONLY_LINEAGES.has(verbatim.trim().replace(/;+$/, '').trim().toLowerCase());
}

/**
 * Parse every row's lineage and apply the rank policy. Unparseable lineages
 * do not abort the run; they resolve to an input-error result. A bare
 * "Eukaryota" goes straight to incertae sedis without a lookup.
 */
export function prepareOccurrenceRows<R extends OccurrenceRow>(
    rows: R[],
    policy: SkipPolicy,
    source: TaxonomySource['name'],
    assayRanks: Record<string, string[]> = {}
): PreparedRows<R> {
    const prepared: PreparedRow<R>[] = [];
    const queries: LineageQuery[] = [];
    const inputFailures = new Map<string, MatchResult>();

    for (const row of rows) {
        const assay = row.assayName.trim();
        const ranks = Object.hasOwn(assayRanks, assay) ? assayRanks[assay] : undefined;
        try {
            const parsed = parseLineage(row.verbatimIdentification, row.assayName, ranks);
            const query = applyRankPolicy(parsed, policy);
            prepared.push({ row, key: query.key, query });
            if (!isDomainOnly(row.verbatimIdentification)) {
                queries.push(query);
            } else if (!inputFailures.has(query.key)) {
                inputFailures.set(
                    query.key,
                    noMatch(query.key, source, 'no-candidate', 'Domain-only lineage left incertae sedis')
                );
            }
        } catch (error) {
            if (!(error instanceof LineageInputError)) {
                throw error;
            }
            const key = INVALID_KEY_PREFIX + row.verbatimIdentification.trim().toLowerCase();
            if (!inputFailures.has(key)) {
                inputFailures.set(key, noMatch(key, source, 'input', error.message));
            }
            prepared.push({ row, key, query: null });
        }
    }

    return { prepared, queries, inputFailures };
}

export function createResolutionEngine(options: ResolutionEngineOptions): TaxonomicResolutionEngine {
    const { config } = options;
    validateResolutionConfig(config);

    const localIndex = config.provider !== 'WoRMS'
        ? null
        : options.localIndex !== undefined
            ? options.localIndex
            : loadConfiguredLocalIndex(config);
    const source = options.source ?? createTaxonomySource(config, options);
    const workers = resolveWorkerCount(config);
    const policy = createSkipPolicy(config.assaysToSkipSpeciesMatch);

    async function resolveOccurrences<R extends OccurrenceRow>(
        rows: R[],
        runOptions: RunOptions = {}
    ): Promise<ResolutionRun<R>> {
        const cache = new ResolutionCache();
        const { prepared, queries, inputFailures } = prepareOccurrenceRows(
            rows,
            policy,
            source.name,
            config.assayRanks
        );

        logger.info(
            `🧬 Resolving lineages of ${rows.length} occurrence row(s) against ${config.provider} ` +
            `(${workers} worker(s)${localIndex ? ', local reference enabled' : ''})`
        );
        if (inputFailures.size > 0) {
            logger.warn(`${inputFailures.size} lineage(s) are unparseable or domain-only and will be left unresolved`);
        }

        const dispatch = await dispatchLineageQueries(queries, {
            cache,
            source,
            localIndex,
            workers,
            onProgress: runOptions.onProgress,
        });

        const results = new Map<string, MatchResult>([...dispatch.results, ...inputFailures]);
        const merged = mergeResolutions(prepared, results, config.provider);

        const summary: ResolutionSummary = {
            provider: config.provider,
            distinctLineages: results.size,
            resolved: dispatch.stats.resolved,
            unresolved: dispatch.stats.unresolved + inputFailures.size,
            cacheHits: dispatch.stats.cacheHits,
            localHits: dispatch.stats.localHits,
            remoteQueries: dispatch.stats.remoteQueries,
            workerFailures: dispatch.stats.workerFailures,
            rowsResolved: merged.rowsResolved,
            rowsUnresolved: merged.rowsUnresolved,
            unresolvedLineages: merged.unresolvedLineages,
        };
        logSummary(summary);

        return { rows: merged.rows, results, summary };
    }

    return { config, source, localIndex, workers, resolveOccurrences };
}

function logSummary(summary: ResolutionSummary): void {
    logger.info(
        `✅ ${summary.provider} resolution complete: ${summary.resolved}/${summary.distinctLineages} lineage(s) resolved, ` +
        `${summary.unresolved} unresolved, ${summary.cacheHits} cache hit(s), ${summary.localHits} local hit(s), ` +
        `${summary.remoteQueries} remote quer${summary.remoteQueries === 1 ? 'y' : 'ies'}`
    );
    if (summary.unresolvedLineages.length > 0) {
        logger.warn(
            `Unresolved lineages for manual review:\n  ${summary.unresolvedLineages.join('\n  ')}`
        );
    }
}
