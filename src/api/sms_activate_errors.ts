import { RetryableError } from '../domain/errors';

export enum SmsActivateErrorCode {
    // Transient
    NO_NUMBERS = 'NO_NUMBERS',
    ERROR_SQL = 'ERROR_SQL',
    CHANNELS_LIMIT = 'CHANNELS_LIMIT',

    // Task-specific: a fresh activation may work
    NO_ACTIVATION = 'NO_ACTIVATION',
    WRONG_ACTIVATION_ID = 'WRONG_ACTIVATION_ID',

    // Account or request configuration
    BAD_KEY = 'BAD_KEY',
    BAD_ACTION = 'BAD_ACTION',
    ORDER_ALREADY_EXISTS = 'ORDER_ALREADY_EXISTS',
    BAD_SERVICE = 'BAD_SERVICE',
    WRONG_EXCEPTION_PHONE = 'WRONG_EXCEPTION_PHONE',
    BANNED = 'BANNED',
    WRONG_MAX_PRICE = 'WRONG_MAX_PRICE',
    EARLY_CANCEL_DENIED = 'EARLY_CANCEL_DENIED',
    BAD_STATUS = 'BAD_STATUS',

    UNKNOWN = 'UNKNOWN',
}

const DESCRIPTIONS: Record<SmsActivateErrorCode, string> = {
    [SmsActivateErrorCode.NO_NUMBERS]: 'No numbers available',
    [SmsActivateErrorCode.ERROR_SQL]: 'Internal SQL error on service side',
    [SmsActivateErrorCode.CHANNELS_LIMIT]: 'Account blocked by channel limits',
    [SmsActivateErrorCode.NO_ACTIVATION]: 'Activation does not exist',
    [SmsActivateErrorCode.WRONG_ACTIVATION_ID]: 'Invalid activation ID',
    [SmsActivateErrorCode.BAD_KEY]: 'Invalid API key',
    [SmsActivateErrorCode.BAD_ACTION]: 'Incorrect action',
    [SmsActivateErrorCode.ORDER_ALREADY_EXISTS]: 'Order already exists',
    [SmsActivateErrorCode.BAD_SERVICE]: 'Incorrect service code',
    [SmsActivateErrorCode.WRONG_EXCEPTION_PHONE]: 'Incorrect excluding prefixes',
    [SmsActivateErrorCode.BANNED]: 'Account banned',
    [SmsActivateErrorCode.WRONG_MAX_PRICE]: 'Maximum price is less than allowed minimum',
    [SmsActivateErrorCode.EARLY_CANCEL_DENIED]: 'Not allowed to cancel within first 2 minutes',
    [SmsActivateErrorCode.BAD_STATUS]: 'Incorrect status',
    [SmsActivateErrorCode.UNKNOWN]: 'Unknown error',
};

const RETRYABLE = new Set<SmsActivateErrorCode>([
    SmsActivateErrorCode.NO_NUMBERS,
    SmsActivateErrorCode.ERROR_SQL,
    SmsActivateErrorCode.CHANNELS_LIMIT,
]);

const RETRY_OPERATION = new Set<SmsActivateErrorCode>([
    SmsActivateErrorCode.NO_NUMBERS,
    SmsActivateErrorCode.ERROR_SQL,
    SmsActivateErrorCode.CHANNELS_LIMIT,
    SmsActivateErrorCode.NO_ACTIVATION,
    SmsActivateErrorCode.WRONG_ACTIVATION_ID,
]);

const ERROR_PREFIXES = ['NO_', 'ERROR_', 'BAD_', 'WRONG_', 'EARLY_', 'BANNED', 'CHANNELS_', 'ORDER_'];
const BANNED_PATTERN = /^BANNED\s*:\s*['"]([^'"]+)['"]$/;
const WRONG_MAX_PRICE_PATTERN = /^WRONG_MAX_PRICE\s*:\s*([0-9]+(?:\.[0-9]+)?)$/;

/**
 * Base for everything the SMS-Activate client throws.
 */
export abstract class SmsActivateError extends Error implements RetryableError {
    abstract isRetryable(): boolean;

    abstract shouldRetryOperation(): boolean;
}

/**
 * Plain-text error token returned by the handler API.
 */
export class SmsActivateServiceError extends SmsActivateError {
    constructor(
        public readonly code: SmsActivateErrorCode,
        public readonly raw: string,
        public readonly detail: { bannedUntil?: string; minPrice?: number } = {}
    ) {
        super(`SMS-Activate service error ${code === SmsActivateErrorCode.UNKNOWN ? raw : code}: ${describeCode(code, detail)}`);
        this.name = 'SmsActivateServiceError';
    }

    isRetryable(): boolean {
        return RETRYABLE.has(this.code);
    }

    shouldRetryOperation(): boolean {
        return RETRY_OPERATION.has(this.code);
    }
}

/**
 * The request never produced a usable HTTP response, or the response status was an error.
 */
export class SmsActivateTransportError extends SmsActivateError {
    constructor(message: string, public readonly statusCode: number | null) {
        super(message);
        this.name = 'SmsActivateTransportError';
    }

    // Network failures, rate limits and server errors are worth repeating.
    isRetryable(): boolean {
        return this.statusCode === null || this.statusCode === 429 || this.statusCode >= 500;
    }

    shouldRetryOperation(): boolean {
        return this.isRetryable();
    }
}

export class SmsActivateResponseError extends SmsActivateError {
    constructor(message: string, public readonly raw: string) {
        super(message);
        this.name = 'SmsActivateResponseError';
    }

    isRetryable(): boolean {
        return false;
    }

    shouldRetryOperation(): boolean {
        return false;
    }
}

/**
 * Returns null for anything that is not an error token, `ACCESS_*` replies included.
 */
export function parseSmsActivateError(text: string): SmsActivateServiceError | null {
    const raw = text.trim();
    if (raw.length === 0 || raw.startsWith('ACCESS_')) return null;

    const banned = BANNED_PATTERN.exec(raw);
    if (banned) {
        return new SmsActivateServiceError(SmsActivateErrorCode.BANNED, raw, { bannedUntil: banned[1] });
    }

    const wrongPrice = WRONG_MAX_PRICE_PATTERN.exec(raw);
    if (wrongPrice) {
        return new SmsActivateServiceError(SmsActivateErrorCode.WRONG_MAX_PRICE, raw, { minPrice: Number(wrongPrice[1]) });
    }

    const known = Object.values(SmsActivateErrorCode).find(
        (code) => code === raw && code !== SmsActivateErrorCode.UNKNOWN
    );
    if (known !== undefined) {
        return new SmsActivateServiceError(known, raw);
    }

    if (ERROR_PREFIXES.some((prefix) => raw.startsWith(prefix))) {
        return new SmsActivateServiceError(SmsActivateErrorCode.UNKNOWN, raw);
    }
    return null;
}

function describeCode(code: SmsActivateErrorCode, detail: { bannedUntil?: string; minPrice?: number }): string {
    if (code === SmsActivateErrorCode.BANNED && detail.bannedUntil !== undefined) {
        return `Account banned until ${detail.bannedUntil}`;
    }
    if (code === SmsActivateErrorCode.WRONG_MAX_PRICE && detail.minPrice !== undefined) {
        return `Maximum price is less than allowed minimum: ${detail.minPrice}`;
    }
    return DESCRIPTIONS[code];
}
