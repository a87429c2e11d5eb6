import { AcquiredNumber, CountryCode, DialCode, TaskId, VerificationCode } from './models';

/**
 * Capability contract every rental backend implements.
 *
 * `TService` selects what is being verified (an app code such as 'wa').
 * Operations reject with errors implementing `RetryableError`; anything else
 * that is thrown is treated as permanent on both retry axes.
 *
 * Instances are shared by concurrent verifications and must not keep per-call
 * mutable state.
 */
export interface Provider<TService = string> {
    /**
     * Rents a number for the given country and service. An aborted `signal`
     * ends any wait inside the call.
     */
    acquireNumber(country: CountryCode, service: TService, signal?: AbortSignal): Promise<AcquiredNumber>;

    /**
     * Resolves the code once it has arrived, or null when the caller should poll again.
     */
    pollCode(taskId: TaskId, signal?: AbortSignal): Promise<VerificationCode | null>;

    /**
     * Signals that the code was used. Idempotent, best-effort.
     */
    finish(taskId: TaskId): Promise<void>;

    /**
     * Releases the rented number. Idempotent; safe after any failure.
     */
    cancel(taskId: TaskId): Promise<void>;

    /**
     * Filtering policy (e.g. a blacklist), not identity.
     */
    isDialCodeSupported(dialCode: DialCode): boolean;

    supportsService(service: TService): boolean;

    availableCountries(service: TService): CountryCode[];

    supportedServices(): TService[];
}

/**
 * Permissive defaults for the discovery queries.
 */
export abstract class BaseProvider<TService = string> implements Provider<TService> {
    abstract acquireNumber(country: CountryCode, service: TService, signal?: AbortSignal): Promise<AcquiredNumber>;

    abstract pollCode(taskId: TaskId, signal?: AbortSignal): Promise<VerificationCode | null>;

    abstract finish(taskId: TaskId): Promise<void>;

    abstract cancel(taskId: TaskId): Promise<void>;

    isDialCodeSupported(_dialCode: DialCode): boolean {
        return true;
    }

    supportsService(_service: TService): boolean {
        return true;
    }

    availableCountries(_service: TService): CountryCode[] {
        return [];
    }

    supportedServices(): TService[] {
        return [];
    }
}
