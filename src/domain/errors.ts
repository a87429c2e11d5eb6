import { CountryCode, DialCode, FullNumber, TaskId } from './models';

/**
 * Two independent retry questions every error answers.
 *
 * - isRetryable: would re-issuing the same call for the same task plausibly
 *   succeed (network blip, rate limit, backend briefly unavailable)?
 * - shouldRetryOperation: would abandoning this task and acquiring a fresh
 *   number plausibly succeed (number banned, task expired, backend healthy)?
 *
 * Both are mandatory. There is no default that derives one from the other.
 */
export interface RetryableError {
    isRetryable(): boolean;
    shouldRetryOperation(): boolean;
}

export interface RetryClassification {
    retryable: boolean;
    retryOperation: boolean;
}

export function isRetryableError(value: unknown): value is RetryableError {
    if (typeof value !== 'object' || value === null) return false;
    return typeof Reflect.get(value, 'isRetryable') === 'function'
        && typeof Reflect.get(value, 'shouldRetryOperation') === 'function';
}

/**
 * Values that do not implement RetryableError are treated as permanent on both axes.
 */
export function classifyError(error: unknown): RetryClassification {
    if (isRetryableError(error)) {
        return { retryable: error.isRetryable(), retryOperation: error.shouldRetryOperation() };
    }
    return { retryable: false, retryOperation: false };
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export enum ServiceErrorKind {
    PROVIDER_FAILURE = 'provider_failure',
    NO_DIAL_CODE = 'no_dial_code',
    MALFORMED_NUMBER = 'malformed_number',
    TIMED_OUT = 'timed_out',
    CANCELLED = 'cancelled',
    CANCEL_FAILED = 'cancel_failed',
    DIAL_CODE_BLACKLISTED = 'dial_code_blacklisted',
    NO_AVAILABLE_DIAL_CODES = 'no_available_dial_codes',
    SERVICE_NOT_SUPPORTED = 'service_not_supported',
}

/**
 * Errors surfaced by the verification service.
 * Discriminate on `kind`; every subclass states both retry flags explicitly.
 */
export abstract class ServiceError extends Error implements RetryableError {
    abstract readonly kind: ServiceErrorKind;

    abstract isRetryable(): boolean;

    abstract shouldRetryOperation(): boolean;
}

/**
 * A backend call failed. Carries the backend error and its retry flags forward.
 */
export class ProviderFailureError extends ServiceError {
    readonly kind = ServiceErrorKind.PROVIDER_FAILURE;
    readonly retryable: boolean;
    readonly retryOperation: boolean;

    constructor(public readonly operation: string, cause: unknown) {
        super(`Provider ${operation} failed: ${describeError(cause)}`, { cause });
        this.name = 'ProviderFailureError';
        const flags = classifyError(cause);
        this.retryable = flags.retryable;
        this.retryOperation = flags.retryOperation;
    }

    isRetryable(): boolean {
        return this.retryable;
    }

    shouldRetryOperation(): boolean {
        return this.retryOperation;
    }
}

export class NoDialCodeError extends ServiceError {
    readonly kind = ServiceErrorKind.NO_DIAL_CODE;

    constructor(public readonly country: CountryCode) {
        super(`No dial code known for country ${country}`);
        this.name = 'NoDialCodeError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

export class MalformedNumberError extends ServiceError {
    readonly kind = ServiceErrorKind.MALFORMED_NUMBER;

    constructor(
        public readonly fullNumber: FullNumber,
        public readonly dialCode: DialCode,
        public readonly reason: string
    ) {
        super(`Failed to parse phone number '${fullNumber.value}' with dial code ${dialCode.value}: ${reason}`);
        this.name = 'MalformedNumberError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

export class TimedOutError extends ServiceError {
    readonly kind = ServiceErrorKind.TIMED_OUT;

    constructor(
        public readonly taskId: TaskId,
        public readonly timeoutMs: number,
        public readonly elapsedMs: number,
        public readonly pollCount: number
    ) {
        super(`Timed out waiting for code after ${(elapsedMs / 1000).toFixed(1)}s (${pollCount} polls); task ${taskId.value}`);
        this.name = 'TimedOutError';
    }

    isRetryable(): boolean {
        return false;
    }

    // A fresh number may still receive the code.
    shouldRetryOperation(): boolean {
        return true;
    }
}

export class CancelledError extends ServiceError {
    readonly kind = ServiceErrorKind.CANCELLED;

    constructor(
        public readonly taskId: TaskId,
        public readonly elapsedMs: number,
        public readonly pollCount: number
    ) {
        super(`Cancelled after ${(elapsedMs / 1000).toFixed(1)}s (${pollCount} polls); task ${taskId.value}`);
        this.name = 'CancelledError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

/**
 * Cleanup failed after a timeout, cancellation or permanent error.
 * The rented number may still be live on the backend.
 */
export class CancelFailedError extends ServiceError {
    readonly kind = ServiceErrorKind.CANCEL_FAILED;

    constructor(
        public readonly taskId: TaskId,
        public readonly trigger: ServiceError,
        cause: unknown
    ) {
        super(`Failed to cancel task ${taskId.value} after ${trigger.kind}: ${describeError(cause)}`, { cause });
        this.name = 'CancelFailedError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return this.trigger.shouldRetryOperation();
    }
}

export class DialCodeBlacklistedError extends ServiceError {
    readonly kind = ServiceErrorKind.DIAL_CODE_BLACKLISTED;

    constructor(public readonly country: CountryCode, public readonly dialCode: DialCode) {
        super(`Dial code +${dialCode.value} (${country}) is not accepted by the provider`);
        this.name = 'DialCodeBlacklistedError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

export class NoAvailableDialCodesError extends ServiceError {
    readonly kind = ServiceErrorKind.NO_AVAILABLE_DIAL_CODES;

    constructor(public readonly service: string) {
        super(`No country with a usable dial code is available for service '${service}'`);
        this.name = 'NoAvailableDialCodesError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

export class ServiceNotSupportedError extends ServiceError {
    readonly kind = ServiceErrorKind.SERVICE_NOT_SUPPORTED;

    constructor(public readonly service: string) {
        super(`Service '${service}' is not supported by the provider`);
        this.name = 'ServiceNotSupportedError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}
