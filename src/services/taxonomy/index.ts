/**
 * Taxonomy Services Index
 *
 * Central export for eDNA lineage resolution.
 */

export * from './types';
export * from './errors';
export {
    cleanTaxonName,
    parseLineage,
    canonicalKey,
    cleanedTaxonomy,
    finestFirst,
    SPECIES_EXCLUDED_SUFFIX,
} from './lineage';
export { applyRankPolicy, createSkipPolicy, rankAllowed, SPECIES_RANK } from './rankPolicy';
export { createHttpClient } from './httpClient';
export type { TaxonomyHttpClient } from './httpClient';
export { createSourceAdapter } from './sourceAdapter';
export type { LevelMatch, LevelLookup, SourceAdapterOptions } from './sourceAdapter';
export { createWormsSource, selectWormsCandidate, wormsLsid, WORMS_API_BASE } from './wormsService';
export type { WoRMSTaxon } from './wormsService';
export { createGbifSource, selectGbifCandidate, gbifSpeciesUrl, GBIF_API_BASE } from './gbifService';
export type { GbifNameUsageMatch, GbifNameUsage } from './gbifService';
export { LocalReferenceIndex, loadLocalReferenceIndex } from './localReferenceIndex';
export { ResolutionCache } from './resolutionCache';
export type { CacheStats, CachedResolution } from './resolutionCache';
export { dispatchLineageQueries, resolvePoolSize } from './dispatcher';
export type { DispatchOutcome, DispatchStats, KeyOutcome } from './dispatcher';
export { mergeResolutions, attachMatch, UNRESOLVED_TAXON_NAME, UNRESOLVED_TAXON_ID } from './reconciler';
export type { PreparedRow, MergeResult } from './reconciler';

// The engine is the main entry point callers should use
export {
    createResolutionEngine,
    createTaxonomySource,
    prepareOccurrenceRows,
    resolveWorkerCount,
    WORMS_MAX_WORKERS,
} from './taxonomyResolver';
export type {
    ResolutionEngineOptions,
    ResolutionRun,
    RunOptions,
    TaxonomicResolutionEngine,
} from './taxonomyResolver';
