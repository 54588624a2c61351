/**
 * Error taxonomy shared by the network components and the session store.
 *
 * TransportError    network failure, timeout, cancellation, or non-success status
 * StructuralError   payload could not be parsed into the minimum shape
 * NotFoundError     no such session for this owner
 */
export class PubtrailError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PubtrailError';
    }
}

/** `cancelled`: the caller's own signal aborted the request */
export type TransportErrorKind = 'network' | 'timeout' | 'status' | 'cancelled';

export class TransportError extends PubtrailError {
    readonly kind: TransportErrorKind;
    readonly status: number;
    readonly retryable: boolean;
    readonly url: string;

    constructor(
        message: string,
        details: { kind: TransportErrorKind; status?: number; retryable: boolean; url: string; cause?: unknown }
    ) {
        super(message, { cause: details.cause });
        this.name = 'TransportError';
        this.kind = details.kind;
        this.status = details.status ?? 0;
        this.retryable = details.retryable;
        this.url = details.url;
    }
}

/**
 * HTTP 429 from the service. A TransportError subtype, so callers that
 * only check for TransportError still treat it as transient.
 */
export class RateLimitExceededError extends TransportError {
    constructor(url: string, readonly retryAfterMs: number | null) {
        super('HTTP 429: rate limit exceeded', { kind: 'status', status: 429, retryable: true, url });
        this.name = 'RateLimitExceededError';
    }
}

export class StructuralError extends PubtrailError {
    constructor(message: string, readonly payloadExcerpt?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StructuralError';
    }
}

export class NotFoundError extends PubtrailError {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * Message for end users, by error class.
 */
export function describeForUser(error: unknown): string {
    if (error instanceof RateLimitExceededError) return 'PubMed is throttling requests; retry in a few seconds.';
    if (error instanceof TransportError && error.kind === 'cancelled') return 'Cancelled.';
    if (error instanceof TransportError) return 'PubMed is temporarily unavailable; retry shortly.';
    if (error instanceof StructuralError) return 'PubMed sent an unexpected response; please report this.';
    if (error instanceof NotFoundError) return 'Not found.';
    return error instanceof Error ? error.message : String(error);
}
