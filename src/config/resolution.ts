import logger from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from '../utils/retry';
import { ConfigurationError } from '../services/taxonomy/errors';
import { DEFAULT_GBIF_MIN_CONFIDENCE } from '../services/taxonomy/gbifService';
import { TaxonomicProvider } from '../services/taxonomy/types';

export interface ResolutionConfig {
  provider: TaxonomicProvider;
  /** Worker counts per provider; 0 = all available cores */
  workers: Record<TaxonomicProvider, number>;
  localReference: {
    enabled: boolean;
    path: string | null;
    sheet: string | null;
  };
  assaysToSkipSpeciesMatch: string[];
  /** Optional rank lists per assay, coarsest first */
  assayRanks: Record<string, string[]>;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  gbifMinConfidence: number;
}

type Env = Record<string, string | undefined>;

export const parseProvider = (value: string | undefined): TaxonomicProvider => {
  switch ((value ?? 'WoRMS').trim().toLowerCase()) {
    case 'worms':
      return 'WoRMS';
    case 'gbif':
      return 'GBIF';
    default:
      throw new ConfigurationError(`Invalid taxonomic_api_source "${value}": expected WoRMS or GBIF`);
  }
};

const parseInteger = (name: string, value: string | undefined, fallback: number, min: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
};

const parseBoolean = (name: string, value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const lower = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(lower)) return true;
  if (['false', '0', 'no'].includes(lower)) return false;
  throw new ConfigurationError(`${name} must be true or false, got "${value}"`);
};

const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

/**
 * ASSAY_RANKS: JSON object of assay name → rank names, coarsest first,
 * e.g. {"18S_V9":["domain","supergroup","division","subdivision","class","order","family","genus","species"]}
 */
const parseAssayRanks = (value: string | undefined): Record<string, string[]> => {
  if (value === undefined || value.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`ASSAY_RANKS must be valid JSON: ${message}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError('ASSAY_RANKS must be a JSON object of assay name to rank list');
  }

  const assayRanks: Record<string, string[]> = {};
  for (const [assay, ranks] of Object.entries(parsed)) {
    if (
      !Array.isArray(ranks) ||
      ranks.length === 0 ||
      !ranks.every((rank): rank is string => typeof rank === 'string' && rank.trim().length > 0)
    ) {
      throw new ConfigurationError(`ASSAY_RANKS["${assay}"] must be a non-empty list of rank names`);
    }
    assayRanks[assay.trim()] = ranks.map(rank => rank.trim().toLowerCase());
  }
  return assayRanks;
};

/**
 * Build the resolution config from environment variables (see .env.example).
 * Throws ConfigurationError on any invalid value.
 */
export const loadResolutionConfig = (env: Env = process.env): ResolutionConfig => {
  const config: ResolutionConfig = {
    provider: parseProvider(env.TAXONOMIC_API_SOURCE),
    workers: {
      WoRMS: parseInteger('WORMS_N_PROC', env.WORMS_N_PROC, 0, 0),
      GBIF: parseInteger('GBIF_N_PROC', env.GBIF_N_PROC, 0, 0),
    },
    localReference: {
      enabled: parseBoolean('USE_LOCAL_REFERENCE_DATABASE', env.USE_LOCAL_REFERENCE_DATABASE, false),
      path: env.LOCAL_REFERENCE_DATABASE_PATH?.trim() || null,
      sheet: env.LOCAL_REFERENCE_SHEET?.trim() || null,
    },
    assaysToSkipSpeciesMatch: parseList(env.ASSAYS_TO_SKIP_SPECIES_MATCH),
    assayRanks: parseAssayRanks(env.ASSAY_RANKS),
    requestTimeoutMs: parseInteger('TAXONOMY_REQUEST_TIMEOUT_MS', env.TAXONOMY_REQUEST_TIMEOUT_MS, 15000, 1),
    retry: {
      maxAttempts: parseInteger('TAXONOMY_MAX_ATTEMPTS', env.TAXONOMY_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts, 1),
      baseDelayMs: parseInteger('TAXONOMY_RETRY_BASE_DELAY_MS', env.TAXONOMY_RETRY_BASE_DELAY_MS, DEFAULT_RETRY_POLICY.baseDelayMs, 0),
      maxDelayMs: parseInteger('TAXONOMY_RETRY_MAX_DELAY_MS', env.TAXONOMY_RETRY_MAX_DELAY_MS, DEFAULT_RETRY_POLICY.maxDelayMs, 0),
      budgetMs: parseInteger('TAXONOMY_RETRY_BUDGET_MS', env.TAXONOMY_RETRY_BUDGET_MS, DEFAULT_RETRY_POLICY.budgetMs, 0),
    },
    gbifMinConfidence: parseInteger('GBIF_MIN_CONFIDENCE', env.GBIF_MIN_CONFIDENCE, DEFAULT_GBIF_MIN_CONFIDENCE, 0),
  };

  validateResolutionConfig(config);
  return config;
};

/**
 * Checks that span several settings. Also used for configs built in code.
 */
export const validateResolutionConfig = (config: ResolutionConfig): void => {
  parseProvider(config.provider);

  if (config.localReference.enabled && !config.localReference.path) {
    throw new ConfigurationError('USE_LOCAL_REFERENCE_DATABASE is set but LOCAL_REFERENCE_DATABASE_PATH is empty');
  }
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    throw new ConfigurationError('TAXONOMY_RETRY_MAX_DELAY_MS must not be below TAXONOMY_RETRY_BASE_DELAY_MS');
  }
  if (config.gbifMinConfidence > 100) {
    throw new ConfigurationError(`GBIF_MIN_CONFIDENCE must be between 0 and 100, got ${config.gbifMinConfidence}`);
  }
  for (const [provider, workers] of Object.entries(config.workers)) {
    if (!Number.isInteger(workers) || workers < 0) {
      throw new ConfigurationError(`Worker count for ${provider} must be a non-negative integer, got ${workers}`);
    }
  }
  if (config.localReference.enabled && config.provider !== 'WoRMS') {
    logger.warn('⚠️ Local reference database only applies to WoRMS; it is ignored for GBIF');
  }
};
