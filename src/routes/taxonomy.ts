/**
 * Taxonomy API Routes
 *
 * REST endpoint that resolves the lineages of a batch of eDNA occurrence rows
 * and returns them with backbone identifiers attached.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { OccurrenceRow, TaxonomicResolutionEngine } from '../services/taxonomy';
import logger from '../utils/logger';

export const MAX_ROWS_PER_REQUEST = 50000;

const REQUIRED_FIELDS = ['asvId', 'sampleId', 'assayName', 'verbatimIdentification'] as const;

function isOccurrenceRow(value: unknown): value is OccurrenceRow {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return REQUIRED_FIELDS.every(field => field in value && typeof Reflect.get(value, field) === 'string');
}

/**
 * Returns an error message, or null when the rows are acceptable.
 */
export function validateOccurrenceRows(rows: unknown): string | null {
    if (!Array.isArray(rows) || rows.length === 0) {
        return 'A non-empty array of occurrence rows is required';
    }
    if (rows.length > MAX_ROWS_PER_REQUEST) {
        return `Maximum ${MAX_ROWS_PER_REQUEST} rows per request`;
    }
    const invalid = rows.findIndex(row => !isOccurrenceRow(row));
    if (invalid !== -1) {
        return `Row ${invalid} must have string fields: ${REQUIRED_FIELDS.join(', ')}`;
    }
    return null;
}

export function createTaxonomyRouter(engine: TaxonomicResolutionEngine): Router {
    const router = Router();

    /**
     * POST /api/taxonomy/resolve-occurrences
     * Resolve every row's verbatimIdentification against the configured backbone
     */
    router.post('/resolve-occurrences', async (req: Request, res: Response, next: NextFunction) => {
        const rows: unknown = req.body?.rows;
        const problem = validateOccurrenceRows(rows);
        if (problem || !Array.isArray(rows)) {
            return res.status(400).json({
                success: false,
                error: problem ?? 'Invalid rows',
            });
        }

        try {
            const run = await engine.resolveOccurrences(rows.filter(isOccurrenceRow));

            res.json({
                success: true,
                summary: run.summary,
                mapping: Object.fromEntries(run.results),
                rows: run.rows,
            });
        } catch (error) {
            logger.error('Occurrence resolution error:', error);
            next(error);
        }
    });

    /**
     * GET /api/taxonomy/config
     * Active backbone and worker settings
     */
    router.get('/config', (req: Request, res: Response) => {
        res.json({
            success: true,
            provider: engine.config.provider,
            workers: engine.workers,
            localReference: engine.localIndex ? { enabled: true, names: engine.localIndex.size } : { enabled: false },
            assaysToSkipSpeciesMatch: engine.config.assaysToSkipSpeciesMatch,
        });
    });

    return router;
}
