/**
 * ISO 3166-1 alpha-2 country code, e.g. 'UA' or 'US'.
 */
export type CountryCode = string;

export class ValueObjectError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'ValueObjectError';
    }
}

export class DialCodeError extends ValueObjectError {
    constructor(message: string, code: 'EMPTY' | 'NON_DIGIT') {
        super(message, code);
        this.name = 'DialCodeError';
    }
}

export class NationalNumberError extends ValueObjectError {
    constructor(
        message: string,
        code: 'NON_DIGIT' | 'INVALID_LENGTH' | 'LEADING_ZERO' | 'MISSING_DIAL_CODE'
    ) {
        super(message, code);
        this.name = 'NationalNumberError';
    }
}

const DIGITS = /^[0-9]+$/;

/**
 * Backend-assigned handle of one rental session.
 * Key for every poll / finish / cancel call on that session.
 */
export class TaskId {
    private constructor(public readonly value: string) { }

    static of(raw: string): TaskId {
        const value = raw.trim();
        if (value.length === 0) {
            throw new ValueObjectError('Task id cannot be empty', 'EMPTY_TASK_ID');
        }
        return new TaskId(value);
    }

    equals(other: TaskId): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}

/**
 * International calling code, digits only ('380', not '+380').
 */
export class DialCode {
    private constructor(public readonly value: string) { }

    static parse(raw: string): DialCode {
        const value = raw.trim().replace(/^\++/, '');
        if (value.length === 0) {
            throw new DialCodeError('Dial code cannot be empty', 'EMPTY');
        }
        if (!DIGITS.test(value)) {
            throw new DialCodeError(`Dial code must contain only digits: '${raw}'`, 'NON_DIGIT');
        }
        return new DialCode(value);
    }

    equals(other: DialCode): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}

/**
 * The number as the backend returned it, dial code included.
 * May or may not carry a leading '+'.
 */
export class FullNumber {
    private constructor(public readonly value: string) { }

    static of(raw: string): FullNumber {
        return new FullNumber(raw);
    }

    withPlusPrefix(): string {
        return `+${this.withoutPlusPrefix()}`;
    }

    withoutPlusPrefix(): string {
        return this.value.trim().replace(/^\++/, '');
    }

    equals(other: FullNumber): boolean {
        return this.withoutPlusPrefix() === other.withoutPlusPrefix();
    }

    toString(): string {
        return this.value;
    }
}

/**
 * Local part of a phone number: 4-14 digits, never starting with 0.
 */
export class NationalNumber {
    static readonly MIN_LENGTH = 4;
    static readonly MAX_LENGTH = 14;

    private constructor(public readonly value: string) { }

    static parse(raw: string): NationalNumber {
        const value = raw.trim();
        if (!DIGITS.test(value)) {
            throw new NationalNumberError(`Number must contain only digits: '${raw}'`, 'NON_DIGIT');
        }
        if (value.length < NationalNumber.MIN_LENGTH || value.length > NationalNumber.MAX_LENGTH) {
            throw new NationalNumberError(
                `Number must be between ${NationalNumber.MIN_LENGTH} and ${NationalNumber.MAX_LENGTH} digits: '${raw}'`,
                'INVALID_LENGTH'
            );
        }
        if (value.startsWith('0')) {
            throw new NationalNumberError(`Number cannot start with 0: '${raw}'`, 'LEADING_ZERO');
        }
        return new NationalNumber(value);
    }

    /**
     * Strips the dial code prefix off a backend-returned number.
     */
    static fromFullNumber(full: FullNumber, dialCode: DialCode): NationalNumber {
        const digits = full.withoutPlusPrefix();
        if (!digits.startsWith(dialCode.value)) {
            throw new NationalNumberError(
                `Dial code ${dialCode.value} not found at the beginning of '${full.value}'`,
                'MISSING_DIAL_CODE'
            );
        }
        return NationalNumber.parse(digits.slice(dialCode.value.length));
    }

    equals(other: NationalNumber): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}

/**
 * Code extracted from the received SMS or call. Opaque.
 */
export class VerificationCode {
    private constructor(public readonly value: string) { }

    static of(raw: string): VerificationCode {
        if (raw.trim().length === 0) {
            throw new ValueObjectError('Verification code cannot be empty', 'EMPTY_CODE');
        }
        return new VerificationCode(raw);
    }

    equals(other: VerificationCode): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}

/**
 * What a provider hands back when it rents a number.
 */
export interface AcquiredNumber {
    readonly taskId: TaskId;
    readonly fullNumber: FullNumber;
}

/**
 * Outcome of a successful acquisition, threaded by the caller into polling.
 */
export interface AcquisitionResult {
    readonly taskId: TaskId;
    readonly dialCode: DialCode;
    readonly nationalNumber: NationalNumber;
    readonly fullNumber: FullNumber;
    readonly country: CountryCode;
}
