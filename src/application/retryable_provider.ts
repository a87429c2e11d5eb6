import { classifyError, describeError } from '../domain/errors';
import { AcquiredNumber, CountryCode, DialCode, TaskId, VerificationCode } from '../domain/models';
import { Provider } from '../domain/provider';
import { DEFAULT_RETRY_POLICY, RetryPolicy, computeRetryDelay } from '../domain/retry_policy';
import { Clock, systemClock } from '../infrastructure/clock';

export interface RetryContext {
    readonly operation: 'acquireNumber' | 'pollCode';
    /** 1-based number of the call that just failed. */
    readonly attempt: number;
}

export type RetryObserver = (error: unknown, delayMs: number, context: RetryContext) => void;

export interface RetryableProviderOptions {
    policy?: RetryPolicy;
    onRetry?: RetryObserver;
    clock?: Clock;
}

/**
 * Decorator that retries `acquireNumber` and `pollCode` on errors whose
 * `isRetryable()` is true, with exponential backoff. `finish`, `cancel` and the
 * discovery queries pass straight through.
 *
 * Each call runs its own loop; the instance keeps no per-call state and may be
 * shared across concurrent verifications. Aborting the call's signal ends the
 * loop with the last error.
 */
export class RetryableProvider<TService = string> implements Provider<TService> {
    private readonly policy: RetryPolicy;
    private readonly onRetry?: RetryObserver;
    private readonly clock: Clock;

    constructor(
        private readonly inner: Provider<TService>,
        options: RetryableProviderOptions = {}
    ) {
        this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
        this.onRetry = options.onRetry;
        this.clock = options.clock ?? systemClock;
    }

    acquireNumber(country: CountryCode, service: TService, signal?: AbortSignal): Promise<AcquiredNumber> {
        return this.withRetry('acquireNumber', signal, () => this.inner.acquireNumber(country, service, signal));
    }

    pollCode(taskId: TaskId, signal?: AbortSignal): Promise<VerificationCode | null> {
        return this.withRetry('pollCode', signal, () => this.inner.pollCode(taskId, signal));
    }

    finish(taskId: TaskId): Promise<void> {
        return this.inner.finish(taskId);
    }

    cancel(taskId: TaskId): Promise<void> {
        return this.inner.cancel(taskId);
    }

    isDialCodeSupported(dialCode: DialCode): boolean {
        return this.inner.isDialCodeSupported(dialCode);
    }

    supportsService(service: TService): boolean {
        return this.inner.supportsService(service);
    }

    availableCountries(service: TService): CountryCode[] {
        return this.inner.availableCountries(service);
    }

    supportedServices(): TService[] {
        return this.inner.supportedServices();
    }

    /**
     * An aborted `signal` stops the schedule: the backoff sleep wakes early and
     * the last error is rethrown without another call.
     */
    private async withRetry<T>(
        operation: RetryContext['operation'],
        signal: AbortSignal | undefined,
        call: () => Promise<T>
    ): Promise<T> {
        let attempt = 0;
        for (;;) {
            try {
                return await call();
            } catch (error: unknown) {
                attempt++;
                if (!classifyError(error).retryable || attempt >= this.policy.maxAttempts || signal?.aborted) {
                    throw error;
                }

                const delayMs = computeRetryDelay(this.policy, attempt - 1);
                console.warn(
                    `[Retry] ${operation} failed (attempt ${attempt}/${this.policy.maxAttempts}), retrying in ${delayMs}ms: ${describeError(error)}`
                );
                this.onRetry?.(error, delayMs, { operation, attempt });
                await this.clock.sleep(delayMs, signal);
                if (signal?.aborted) {
                    throw error;
                }
            }
        }
    }
}
