/**
 * Retry with capped exponential backoff and jitter for backbone API calls.
 *
 * Timeouts, dropped connections, 408, 429 and 5xx responses are retried.
 * Any other failure is permanent and surfaces on the first attempt.
 */

import axios from 'axios';

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Total wait allowed across every call made for one lineage key */
    budgetMs: number;
}

export interface RetryHooks {
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export type FailureKind = 'transient' | 'permanent';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 500,
    maxDelayMs: 30000,
    budgetMs: 120000,
};

const TRANSIENT_STATUS = new Set([408, 425, 429]);

export class RetryExhaustedError extends Error {
    readonly attempts: number;
    readonly lastError: unknown;

    constructor(attempts: number, lastError: unknown, reason: string) {
        super(`${reason} after ${attempts} attempt(s): ${describeError(lastError)}`);
        this.name = 'RetryExhaustedError';
        this.attempts = attempts;
        this.lastError = lastError;
    }
}

export class PermanentRequestError extends Error {
    readonly requestError: unknown;

    constructor(requestError: unknown) {
        super(describeError(requestError));
        this.name = 'PermanentRequestError';
        this.requestError = requestError;
    }
}

/**
 * Wait budget shared by all retries made for one key.
 */
export class RetryBudget {
    private remaining: number;

    constructor(totalMs: number) {
        this.remaining = totalMs;
    }

    get remainingMs(): number {
        return this.remaining;
    }

    tryConsume(ms: number): boolean {
        if (ms > this.remaining) {
            return false;
        }
        this.remaining -= ms;
        return true;
    }
}

export function describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        return status ? `HTTP ${status} ${error.message}` : `${error.code || 'network error'}: ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function classifyFailure(error: unknown): FailureKind {
    if (!axios.isAxiosError(error)) {
        return 'permanent';
    }

    const status = error.response?.status;
    if (status === undefined) {
        // Timeout, reset or DNS failure: no response at all
        return 'transient';
    }

    return TRANSIENT_STATUS.has(status) || status >= 500 ? 'transient' : 'permanent';
}

/**
 * Parse a Retry-After header given in seconds or as an HTTP date.
 */
export function retryAfterMs(error: unknown, now: number = Date.now()): number | undefined {
    if (!axios.isAxiosError(error) || !error.response) {
        return undefined;
    }

    const header: unknown = error.response.headers?.['retry-after'];
    if (typeof header !== 'string' && typeof header !== 'number') {
        return undefined;
    }

    const seconds = Number(header);
    if (Number.isFinite(seconds)) {
        return Math.max(0, seconds * 1000);
    }

    const date = Date.parse(String(header));
    return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Delay before the retry that follows `attempt` (1-based).
 * Equal jitter: half the capped exponential delay is fixed, half random.
 */
export function computeBackoffDelay(
    attempt: number,
    policy: RetryPolicy,
    random: () => number = Math.random,
    minimumMs: number = 0
): number {
    const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
    const capped = Math.min(policy.maxDelayMs, exponential);
    const jittered = capped / 2 + (capped / 2) * random();
    return Math.round(Math.min(policy.maxDelayMs, Math.max(jittered, minimumMs)));
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    budget: RetryBudget,
    hooks: RetryHooks = {}
): Promise<T> {
    const sleep = hooks.sleep ?? defaultSleep;
    const random = hooks.random ?? Math.random;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (classifyFailure(error) === 'permanent') {
                throw new PermanentRequestError(error);
            }
            if (attempt >= policy.maxAttempts) {
                throw new RetryExhaustedError(attempt, error, 'Retries exhausted');
            }

            const delay = computeBackoffDelay(attempt, policy, random, retryAfterMs(error));
            if (!budget.tryConsume(delay)) {
                throw new RetryExhaustedError(attempt, error, 'Retry budget exhausted');
            }

            hooks.onRetry?.(attempt, delay, error);
            await sleep(delay);
        }
    }
}
