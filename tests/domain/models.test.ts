import {
    DialCode,
    DialCodeError,
    FullNumber,
    NationalNumber,
    NationalNumberError,
    TaskId,
    ValueObjectError,
    VerificationCode,
} from '../../src/domain/models';

function caught(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e: unknown) {
        return e;
    }
    return undefined;
}

describe('Value objects', () => {
    describe('DialCode', () => {
        test('strips a leading plus and surrounding whitespace', () => {
            expect(DialCode.parse(' +380 ').value).toBe('380');
            expect(DialCode.parse('1').value).toBe('1');
        });

        test('rejects empty and non-digit input', () => {
            expect(() => DialCode.parse('+')).toThrow(DialCodeError);
            expect(() => DialCode.parse('38a')).toThrow(DialCodeError);
            expect(caught(() => DialCode.parse(''))).toMatchObject({ code: 'EMPTY' });
        });
    });

    describe('NationalNumber', () => {
        test('accepts 4 to 14 digits', () => {
            expect(NationalNumber.parse('1234').value).toBe('1234');
            expect(NationalNumber.parse('12345678901234').value).toBe('12345678901234');
        });

        test.each([
            ['123', 'INVALID_LENGTH'],
            ['123456789012345', 'INVALID_LENGTH'],
            ['0501234567', 'LEADING_ZERO'],
            ['50-123', 'NON_DIGIT'],
        ])('rejects %s with %s', (raw, code) => {
            const error = caught(() => NationalNumber.parse(raw));
            expect(error).toBeInstanceOf(NationalNumberError);
            expect(error).toMatchObject({ code });
        });

        test('fromFullNumber strips the dial code with or without plus', () => {
            const dial = DialCode.parse('380');
            expect(NationalNumber.fromFullNumber(FullNumber.of('+380501234567'), dial).value).toBe('501234567');
            expect(NationalNumber.fromFullNumber(FullNumber.of('380501234567'), dial).value).toBe('501234567');
        });

        test('fromFullNumber inverts concatenation', () => {
            const dial = DialCode.parse('44');
            const national = NationalNumber.parse('7911123456');
            const full = FullNumber.of(`${dial.value}${national.value}`);
            expect(NationalNumber.fromFullNumber(full, dial).equals(national)).toBe(true);
        });

        test('fromFullNumber fails when the prefix is missing', () => {
            const error = caught(() => NationalNumber.fromFullNumber(FullNumber.of('+14155550100'), DialCode.parse('380')));
            expect(error).toMatchObject({ code: 'MISSING_DIAL_CODE' });
        });
    });

    describe('FullNumber', () => {
        test('presentation helpers', () => {
            const full = FullNumber.of('380501234567');
            expect(full.withPlusPrefix()).toBe('+380501234567');
            expect(FullNumber.of('+380501234567').withoutPlusPrefix()).toBe('380501234567');
            expect(full.toString()).toBe('380501234567');
        });

        test('equality ignores the plus prefix', () => {
            expect(FullNumber.of('+15550100').equals(FullNumber.of('15550100'))).toBe(true);
        });
    });

    test('TaskId trims and rejects empty', () => {
        expect(TaskId.of(' 42 ').value).toBe('42');
        expect(() => TaskId.of('   ')).toThrow(ValueObjectError);
    });

    test('VerificationCode keeps its value and rejects blank', () => {
        expect(VerificationCode.of('123456').toString()).toBe('123456');
        expect(VerificationCode.of('123456').equals(VerificationCode.of('123456'))).toBe(true);
        expect(() => VerificationCode.of(' ')).toThrow(ValueObjectError);
    });
});
