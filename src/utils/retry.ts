import { Logger } from '../modules/observability';
import { ConfigurationError, errorMessage } from './errors';

export interface RetryOptions {
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
    retryOn?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY: RetryOptions = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    multiplier: 2,
};

const sleep = (ms: number, signal?: AbortSignal) => new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
});

/**
 * Retry with exponential backoff, owned by the adapter that makes the calls.
 * The wait before attempt n+1 is baseDelayMs * multiplier^(n-1).
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly multiplier: number;
    private readonly retryOn?: (error: unknown) => boolean;

    constructor(options: Partial<RetryOptions> = {}, private logger?: Logger) {
        const merged = { ...DEFAULT_RETRY, ...options };
        if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
            throw new ConfigurationError(`Retry maxAttempts must be a positive integer (got ${merged.maxAttempts})`);
        }
        if (merged.baseDelayMs < 0 || merged.multiplier < 1) {
            throw new ConfigurationError('Retry baseDelayMs must be >= 0 and multiplier >= 1');
        }

        this.maxAttempts = merged.maxAttempts;
        this.baseDelayMs = merged.baseDelayMs;
        this.multiplier = merged.multiplier;
        this.retryOn = merged.retryOn;
    }

    delayFor(attempt: number): number {
        return this.baseDelayMs * Math.pow(this.multiplier, attempt - 1);
    }

    async execute<T>(operation: (attempt: number) => Promise<T>, label = 'operation', signal?: AbortSignal): Promise<T> {
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await operation(attempt);
            } catch (error) {
                lastError = error;

                if (this.retryOn && !this.retryOn(error)) throw error;
                if (attempt === this.maxAttempts || signal?.aborted) break;

                const wait = this.delayFor(attempt);
                this.logger?.warn(`[Retry] ${label} failed (attempt ${attempt}/${this.maxAttempts}). Retrying in ${wait}ms`, {
                    error: errorMessage(error)
                });
                await sleep(wait, signal);
            }
        }

        throw lastError;
    }
}
