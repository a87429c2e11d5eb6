import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { SmsActivateClient } from '../../src/api/sms_activate_client';
import { SmsActivateServiceError } from '../../src/api/sms_activate_errors';
import { VerificationService } from '../../src/application/verification_service';
import { DialCodeBlacklistedError, ProviderFailureError } from '../../src/domain/errors';
import { DialCode, TaskId } from '../../src/domain/models';
import { PollConfig } from '../../src/domain/poll_config';
import { StaticDialCodeDirectory } from '../../src/infrastructure/dial_code_directory';
import {
    SmsActivateCountryError,
    SmsActivateProvider,
    SmsActivateService,
} from '../../src/infrastructure/sms_activate_provider';
import { ManualClock } from '../support/manual_clock';

describe('SmsActivateProvider', () => {
    let mock: MockAdapter;
    let provider: SmsActivateProvider;
    const taskId = TaskId.of('555');

    beforeEach(() => {
        mock = new MockAdapter(axios);
        provider = new SmsActivateProvider(new SmsActivateClient('test-key', 'https://sms.test/handler'));
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        mock.restore();
        jest.restoreAllMocks();
    });

    test('acquireNumber maps the country to the backend id', async () => {
        mock.onGet().reply(config => {
            expect(config.params).toMatchObject({ action: 'getNumberV2', service: 'wa', country: '16' });
            return [200, '{"activationId":"555","phoneNumber":"447911123456"}'];
        });

        const acquired = await provider.acquireNumber('gb', SmsActivateService.WHATSAPP);

        expect(acquired.taskId.value).toBe('555');
        expect(acquired.fullNumber.value).toBe('447911123456');
    });

    test('acquireNumber rejects countries without a backend id', async () => {
        const error = await provider.acquireNumber('XK', 'wa').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SmsActivateCountryError);
        expect(error instanceof SmsActivateCountryError && error.shouldRetryOperation()).toBe(false);
    });

    test('pollCode prefers the SMS code, then the call code', async () => {
        mock.onGet().replyOnce(200, '{"sms":{"code":"111111","text":"code 111111"},"call":{"code":"222222"}}');
        mock.onGet().replyOnce(200, '{"sms":{"code":"","text":""},"call":{"code":"222222","text":"call"}}');
        mock.onGet().replyOnce(200, '{"sms":null}');

        expect((await provider.pollCode(taskId))?.value).toBe('111111');
        expect((await provider.pollCode(taskId))?.value).toBe('222222');
        expect(await provider.pollCode(taskId)).toBeNull();
    });

    test('finish and cancel set statuses 6 and 8', async () => {
        const statuses: unknown[] = [];
        mock.onGet().reply(config => {
            statuses.push(config.params.status);
            return [200, statuses.length === 1 ? 'ACCESS_ACTIVATION' : 'ACCESS_CANCEL'];
        });

        await provider.finish(taskId);
        await provider.cancel(taskId);

        expect(statuses).toEqual(['6', '8']);
    });

    test('requestAnotherCode sets status 3', async () => {
        const statuses: unknown[] = [];
        mock.onGet().reply(config => {
            statuses.push(config.params.status);
            return [200, 'ACCESS_RETRY_GET'];
        });

        await provider.requestAnotherCode(taskId);

        expect(statuses).toEqual(['3']);
    });

    test('acquireNumber and pollCode pass the abort signal to the client', async () => {
        const controller = new AbortController();
        const sent: unknown[] = [];
        mock.onGet().reply(config => {
            sent.push(config.signal);
            return config.params.action === 'getNumberV2'
                ? [200, '{"activationId":"555","phoneNumber":"447911123456"}']
                : [200, '{}'];
        });

        await provider.acquireNumber('GB', 'wa', controller.signal);
        await provider.pollCode(taskId, controller.signal);

        expect(sent).toEqual([controller.signal, controller.signal]);
    });

    test('blacklist management', () => {
        const listed = new SmsActivateProvider(new SmsActivateClient('test-key'), { blacklist: ['+7', '44'] });

        expect(listed.isDialCodeSupported(DialCode.parse('7'))).toBe(false);
        expect(listed.isDialCodeSupported(DialCode.parse('380'))).toBe(true);
        expect(listed.removeFromBlacklist('+44')).toBe(true);
        expect(listed.removeFromBlacklist('44')).toBe(false);
        listed.blacklistDialCode('380');
        expect(listed.blacklistedDialCodes().sort()).toEqual(['380', '7']);
    });

    test('discovery queries', () => {
        expect(provider.supportedServices()).toEqual(['full', 'ig', 'wa', 'fb', 'afp']);
        expect(provider.supportsService('custom')).toBe(true);
        expect(provider.supportsService(' ')).toBe(false);
        expect(provider.availableCountries('wa')).toContain('UA');
        expect(SmsActivateProvider.countryIdFor('us')).toBe(187);
        expect(SmsActivateProvider.countryIdFor('XK')).toBeNull();
    });

    describe('behind VerificationService', () => {
        const directory = StaticDialCodeDirectory.bundled();

        test('rents a Ukrainian number and reads the code', async () => {
            mock.onGet().replyOnce(200, '{"activationId":"555","phoneNumber":"380501234567"}');
            mock.onGet().replyOnce(200, '{}');
            mock.onGet().replyOnce(200, '{"sms":{"code":"654321","text":"654321 is your code"}}');

            const service = new VerificationService(provider, directory, PollConfig.of(60000, 10), new ManualClock());
            const acquisition = await service.acquireNumber('UA', 'wa');
            const code = await service.waitForCode(acquisition.taskId);

            expect(acquisition.nationalNumber.value).toBe('501234567');
            expect(code.value).toBe('654321');
        });

        test('backend errors surface with their retry flags', async () => {
            mock.onGet().reply(200, 'NO_NUMBERS');

            const service = new VerificationService(provider, directory, PollConfig.of(60000, 10), new ManualClock());
            const error = await service.acquireNumber('UA', 'wa').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderFailureError);
            expect(error instanceof ProviderFailureError && error.cause).toBeInstanceOf(SmsActivateServiceError);
            expect(error).toMatchObject({ retryable: true, retryOperation: true });
        });

        test('blacklisted dial codes never reach the backend', async () => {
            provider.blacklistDialCode('380');
            const service = new VerificationService(provider, directory, PollConfig.of(60000, 10), new ManualClock());

            await expect(service.acquireNumber('UA', 'wa')).rejects.toBeInstanceOf(DialCodeBlacklistedError);
        });
    });
});
