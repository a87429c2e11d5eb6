import { RetryableError } from '../../src/domain/errors';
import { AcquiredNumber, CountryCode, DialCode, FullNumber, TaskId, VerificationCode } from '../../src/domain/models';
import { BaseProvider } from '../../src/domain/provider';

export class FlaggedError extends Error implements RetryableError {
    constructor(message: string, private readonly flags: { retryable: boolean; retryOperation: boolean }) {
        super(message);
        this.name = 'FlaggedError';
    }

    isRetryable(): boolean {
        return this.flags.retryable;
    }

    shouldRetryOperation(): boolean {
        return this.flags.retryOperation;
    }
}

export const transientError = (message = 'temporarily unavailable') =>
    new FlaggedError(message, { retryable: true, retryOperation: true });

export const permanentError = (message = 'bad request') =>
    new FlaggedError(message, { retryable: false, retryOperation: false });

/** A code string, null for "not yet", or an error to throw. */
export type PollStep = string | null | Error;

export type AcquireStep = { taskId: string; fullNumber: string } | Error;

/**
 * Scripted provider. Each script is consumed in order; once exhausted the
 * fallback is used.
 */
export class FakeProvider extends BaseProvider<string> {
    acquireScript: AcquireStep[] = [];
    acquireFallback: AcquireStep = { taskId: 'task-1', fullNumber: '+380501234567' };
    pollScript: PollStep[] = [];
    pollFallback: PollStep = null;
    cancelError: Error | null = null;
    finishError: Error | null = null;
    blacklist = new Set<string>();
    unsupportedServices = new Set<string>();
    countries: CountryCode[] = [];

    readonly acquireCalls: Array<{ country: CountryCode; service: string }> = [];
    readonly pollCalls: string[] = [];
    readonly finishCalls: string[] = [];
    readonly cancelCalls: string[] = [];
    /** Signals passed to acquireNumber and pollCode, in call order. */
    readonly signals: Array<AbortSignal | undefined> = [];

    async acquireNumber(country: CountryCode, service: string, signal?: AbortSignal): Promise<AcquiredNumber> {
        this.acquireCalls.push({ country, service });
        this.signals.push(signal);
        const step = this.acquireScript.shift() ?? this.acquireFallback;
        if (step instanceof Error) throw step;
        return { taskId: TaskId.of(step.taskId), fullNumber: FullNumber.of(step.fullNumber) };
    }

    async pollCode(taskId: TaskId, signal?: AbortSignal): Promise<VerificationCode | null> {
        this.pollCalls.push(taskId.value);
        this.signals.push(signal);
        const step = this.pollScript.length > 0 ? this.pollScript.shift() : this.pollFallback;
        if (step instanceof Error) throw step;
        if (step === null || step === undefined) return null;
        return VerificationCode.of(step);
    }

    async finish(taskId: TaskId): Promise<void> {
        this.finishCalls.push(taskId.value);
        if (this.finishError) throw this.finishError;
    }

    async cancel(taskId: TaskId): Promise<void> {
        this.cancelCalls.push(taskId.value);
        if (this.cancelError) throw this.cancelError;
    }

    isDialCodeSupported(dialCode: DialCode): boolean {
        return !this.blacklist.has(dialCode.value);
    }

    supportsService(service: string): boolean {
        return !this.unsupportedServices.has(service);
    }

    availableCountries(_service: string): CountryCode[] {
        return [...this.countries];
    }
}
