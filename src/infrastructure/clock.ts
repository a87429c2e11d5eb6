import { performance } from 'node:perf_hooks';

/**
 * Monotonic time source and sleeper used by polling and retry loops.
 */
export interface Clock {
    /** Milliseconds from an arbitrary, monotonic origin. */
    now(): number;

    /**
     * Resolves after `ms`, or as soon as `signal` aborts. Never rejects on abort;
     * callers re-check the signal themselves.
     */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;

    /** A signal that aborts once `ms` have passed on this clock. */
    timeout(ms: number): AbortSignal;
}

export interface LinkedSignal {
    readonly signal: AbortSignal;
    /** Detaches from the sources. */
    dispose(): void;
}

/**
 * A signal that aborts when any of `sources` does.
 */
export function linkSignals(...sources: Array<AbortSignal | undefined>): LinkedSignal {
    const controller = new AbortController();
    const present = sources.filter((source): source is AbortSignal => source !== undefined);
    const onAbort = () => controller.abort();

    for (const source of present) {
        if (source.aborted) {
            controller.abort();
            break;
        }
        source.addEventListener('abort', onAbort, { once: true });
    }

    return {
        signal: controller.signal,
        dispose: () => {
            for (const source of present) source.removeEventListener('abort', onAbort);
        },
    };
}

export const systemClock: Clock = {
    now: () => performance.now(),

    sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise<void>((resolve) => {
            if (signal?.aborted) {
                resolve();
                return;
            }

            const onAbort = () => {
                clearTimeout(timer);
                resolve();
            };

            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, Math.max(0, ms));

            signal?.addEventListener('abort', onAbort, { once: true });
        });
    },

    timeout: (ms: number) => AbortSignal.timeout(Math.max(0, Math.ceil(ms))),
};
