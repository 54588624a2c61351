import { getLogger } from './logger.js';
import { RateLimitExceededError, TransportError } from './errors.js';
import { sleep } from './rate-governor.js';

export interface RetryOptions {
    retries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;

    /** Stops retrying, and cuts a backoff short, once aborted */
    signal?: AbortSignal;
}

/**
 * Caller-level retry around any remote operation.
 * Only retryable TransportErrors are retried; StructuralError and
 * everything else propagate on the first failure.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const { retries = 3, initialBackoffMs = 1000, maxBackoffMs = 30000, signal } = options;

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (!(error instanceof TransportError) || !error.retryable || attempt >= retries || signal?.aborted) {
                throw error;
            }

            const retryAfter = error instanceof RateLimitExceededError ? error.retryAfterMs : null;
            const backoff = retryAfter ?? calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);

            getLogger().warn(
                { status: error.status, kind: error.kind, attempt: attempt + 1, backoffMs: backoff },
                'Retryable transport error, backing off'
            );

            try {
                await sleep(backoff, signal);
            } catch (abortReason) {
                throw new TransportError('Request cancelled during retry backoff', {
                    kind: 'cancelled',
                    retryable: false,
                    url: error.url,
                    cause: abortReason,
                });
            }
        }
    }
}

export function calculateBackoff(attempt: number, initial: number, max: number): number {
    // Exponential backoff with jitter
    const exponential = initial * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(max, exponential + jitter);
}
