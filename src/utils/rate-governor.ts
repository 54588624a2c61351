/**
 * Enforces a minimum gap between outbound requests.
 * One instance per remote service per process, injected into the HTTP client.
 */
export interface RateGovernor {
    /** Resolves when the caller may send. Rejects with the signal's reason if it aborts first. */
    acquire(signal?: AbortSignal): Promise<void>;
}

/**
 * Waiters are released one at a time, in arrival order. Each release is at
 * least `minIntervalMs` after the previous one, measured on the clock when
 * the previous waiter was actually let through.
 */
export class IntervalRateGovernor implements RateGovernor {
    private lastRelease = Number.NEGATIVE_INFINITY;
    private queue: Promise<void> = Promise.resolve();

    constructor(
        readonly minIntervalMs: number,
        private readonly now: () => number = () => performance.now()
    ) {
        if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
            throw new RangeError(`minIntervalMs must be a non-negative number, got ${minIntervalMs}`);
        }
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();

        const turn = this.queue.then(() => this.waitForGap(signal));
        // The caller sees the rejection through `turn`; the queue only needs to move on
        this.queue = turn.catch(() => undefined);

        await (signal ? untilAborted(turn, signal) : turn);
    }

    private async waitForGap(signal?: AbortSignal): Promise<void> {
        for (;;) {
            signal?.throwIfAborted();
            const waitMs = this.lastRelease + this.minIntervalMs - this.now();
            if (waitMs <= 0) break;
            // Timers may fire early; loop until the clock agrees
            await sleep(Math.ceil(waitMs), signal);
        }
        this.lastRelease = this.now();
    }
}

/**
 * Lets every call through immediately. For tests.
 */
export class NoopRateGovernor implements RateGovernor {
    acquireCount = 0;

    async acquire(signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        this.acquireCount++;
    }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

function untilAborted(turn: Promise<void>, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const onAbort = (): void => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        void turn.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
}
