import countryIds from '../../data/sms_activate_countries.json';
import { ActivationStatus, SmsActivateClient } from '../api/sms_activate_client';
import { SmsActivateError } from '../api/sms_activate_errors';
import { AcquiredNumber, CountryCode, DialCode, FullNumber, TaskId, VerificationCode } from '../domain/models';
import { BaseProvider } from '../domain/provider';

/**
 * Predefined service codes. Any other non-empty code is passed through as is.
 */
export enum SmsActivateService {
    FULL_RENT = 'full',
    INSTAGRAM = 'ig',
    WHATSAPP = 'wa',
    FACEBOOK = 'fb',
    VFS = 'afp',
}

export class SmsActivateCountryError extends SmsActivateError {
    constructor(public readonly country: CountryCode) {
        super(`No SMS-Activate mapping for country ${country}`);
        this.name = 'SmsActivateCountryError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

const COUNTRY_IDS: ReadonlyMap<CountryCode, number> = new Map(Object.entries(countryIds));

export interface SmsActivateProviderOptions {
    /** Dial codes never to rent from, with or without '+'. */
    blacklist?: Iterable<string>;
}

export class SmsActivateProvider extends BaseProvider<string> {
    private readonly blacklist = new Set<string>();

    constructor(private readonly client: SmsActivateClient, options: SmsActivateProviderOptions = {}) {
        super();
        for (const dialCode of options.blacklist ?? []) {
            this.blacklistDialCode(dialCode);
        }
    }

    static countryIdFor(country: CountryCode): number | null {
        return COUNTRY_IDS.get(country.trim().toUpperCase()) ?? null;
    }

    async acquireNumber(country: CountryCode, service: string, signal?: AbortSignal): Promise<AcquiredNumber> {
        const countryId = SmsActivateProvider.countryIdFor(country);
        if (countryId === null) {
            throw new SmsActivateCountryError(country);
        }

        const response = await this.client.getNumber(countryId, service, signal);
        console.log(`[SmsActivate] Activation ${response.activationId} rented for ${service} in ${country}`);
        return {
            taskId: TaskId.of(response.activationId),
            fullNumber: FullNumber.of(response.phoneNumber),
        };
    }

    /**
     * SMS code first, then the code read out in a call.
     */
    async pollCode(taskId: TaskId, signal?: AbortSignal): Promise<VerificationCode | null> {
        const status = await this.client.getStatus(taskId.value, signal);

        const smsCode = status.sms?.code.trim() ?? '';
        if (smsCode.length > 0) return VerificationCode.of(smsCode);

        const callCode = status.call?.code.trim() ?? '';
        if (callCode.length > 0) return VerificationCode.of(callCode);

        return null;
    }

    async finish(taskId: TaskId): Promise<void> {
        await this.client.setStatus(taskId.value, ActivationStatus.FINISH_ACTIVATION);
    }

    async cancel(taskId: TaskId): Promise<void> {
        await this.client.setStatus(taskId.value, ActivationStatus.CANCEL_ACTIVATION);
    }

    /**
     * Asks the backend to deliver another code to the same number, e.g. after
     * the first one was rejected by the service.
     */
    async requestAnotherCode(taskId: TaskId): Promise<void> {
        await this.client.setStatus(taskId.value, ActivationStatus.REQUEST_ANOTHER_CODE);
        console.log(`[SmsActivate] Another code requested for activation ${taskId.value}`);
    }

    async balance(): Promise<number> {
        return this.client.getBalance();
    }

    blacklistDialCode(dialCode: string): void {
        this.blacklist.add(DialCode.parse(dialCode).value);
    }

    removeFromBlacklist(dialCode: string): boolean {
        return this.blacklist.delete(DialCode.parse(dialCode).value);
    }

    blacklistedDialCodes(): string[] {
        return Array.from(this.blacklist);
    }

    isDialCodeSupported(dialCode: DialCode): boolean {
        return !this.blacklist.has(dialCode.value);
    }

    supportsService(service: string): boolean {
        return service.trim().length > 0;
    }

    availableCountries(_service: string): CountryCode[] {
        return Array.from(COUNTRY_IDS.keys());
    }

    supportedServices(): string[] {
        return Object.values(SmsActivateService);
    }
}
