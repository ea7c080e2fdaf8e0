import { AppError } from '../../middleware/errorHandler';

/** Invalid provider name, worker count or other setting. Fatal before a run starts. */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 500);
    }
}

/** Local reference spreadsheet is enabled but cannot be used. */
export class LocalReferenceError extends AppError {
    readonly path: string;

    constructor(message: string, path: string) {
        super(message, 500);
        this.path = path;
    }
}

/** Malformed or empty lineage; fails only the query it belongs to. */
export class LineageInputError extends AppError {
    readonly verbatim: string;

    constructor(message: string, verbatim: string) {
        super(message, 400);
        this.verbatim = verbatim;
    }
}
