import { CountryCode, DialCode } from './models';

/**
 * Country to dial-code lookup. Injected into the verification service.
 */
export interface DialCodeDirectory {
    /**
     * Returns null when the country is unknown.
     */
    dialCodeFor(country: CountryCode): DialCode | null;

    /**
     * Countries sharing the dial code (e.g. '1' maps to both US and CA).
     */
    countryFor(dialCode: DialCode): CountryCode[];

    countries(): CountryCode[];
}
