import { VerificationService } from '../../src/application/verification_service';
import { ProviderFailureError, TimedOutError } from '../../src/domain/errors';
import { PollConfig } from '../../src/domain/poll_config';
import { StaticDialCodeDirectory } from '../../src/infrastructure/dial_code_directory';
import { runVerificationWorkflow } from '../../src/workflow/verification_workflow';
import { FakeProvider, permanentError, transientError } from '../support/fake_provider';
import { ManualClock } from '../support/manual_clock';

describe('Verification workflow', () => {
    const directory = new StaticDialCodeDirectory([
        { code: 'UA', dial_code: '+380' },
        { code: 'GB', dial_code: '+44' },
    ]);

    let provider: FakeProvider;
    let clock: ManualClock;

    const deps = () => ({ service: new VerificationService(provider, directory, PollConfig.of(50, 10), clock) });

    beforeEach(() => {
        provider = new FakeProvider();
        clock = new ManualClock();
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('acquires, receives the code and finishes', async () => {
        provider.pollScript = [null, '123456'];

        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA' }, deps());

        expect(result.status).toBe('success');
        if (result.status === 'success') {
            expect(result.code.value).toBe('123456');
            expect(result.acquisition.nationalNumber.value).toBe('501234567');
            expect(result.attempts).toBe(1);
        }
        expect(provider.finishCalls).toEqual(['task-1']);
        expect(provider.cancelCalls).toEqual([]);
    });

    test('a timeout starts a fresh acquisition', async () => {
        provider.acquireScript = [
            { taskId: 'task-1', fullNumber: '+380501234567' },
            { taskId: 'task-2', fullNumber: '+380671234567' },
        ];
        provider.pollScript = [null, null, null, null, null, '777'];

        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA' }, deps());

        expect(result).toMatchObject({ status: 'success', attempts: 2 });
        expect(provider.cancelCalls).toEqual(['task-1']);
        expect(provider.finishCalls).toEqual(['task-2']);
    });

    test('gives up after maxOperationAttempts', async () => {
        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA', maxOperationAttempts: 2 }, deps());

        expect(result.status).toBe('failure');
        if (result.status === 'failure') {
            expect(result.error).toBeInstanceOf(TimedOutError);
            expect(result.attempts).toBe(2);
        }
        expect(provider.acquireCalls).toHaveLength(2);
        expect(provider.cancelCalls).toHaveLength(2);
    });

    test('does not repeat an operation that cannot succeed', async () => {
        provider.acquireScript = [permanentError('bad key')];

        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA' }, deps());

        expect(result.status).toBe('failure');
        if (result.status === 'failure') {
            expect(result.error).toBeInstanceOf(ProviderFailureError);
            expect(result.attempts).toBe(1);
        }
        expect(provider.acquireCalls).toHaveLength(1);
    });

    test('walks the candidate countries', async () => {
        provider.acquireScript = [transientError('no numbers')];
        provider.pollScript = ['4242'];

        const result = await runVerificationWorkflow({ service: 'wa', countries: ['GB', 'UA'] }, deps());

        expect(result.status).toBe('success');
        if (result.status === 'success') {
            expect(result.acquisition.country).toBe('UA');
            expect(result.attempts).toBe(1);
        }
    });

    test('halts when the caller aborts while waiting', async () => {
        const controller = new AbortController();
        clock = new ManualClock(() => controller.abort());

        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA', signal: controller.signal }, deps());

        expect(result).toEqual({ status: 'halt', reason: 'Cancelled after 0.0s (1 polls); task task-1', attempts: 1 });
        expect(provider.cancelCalls).toEqual(['task-1']);
        expect(provider.finishCalls).toEqual([]);
    });

    test('halts without renting when already aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA', signal: controller.signal }, deps());

        expect(result).toEqual({ status: 'halt', reason: 'Aborted before acquisition', attempts: 1 });
        expect(provider.acquireCalls).toHaveLength(0);
    });

    test('a failing finish does not fail the run', async () => {
        provider.pollScript = ['123456'];
        provider.finishError = permanentError('already finished');

        const result = await runVerificationWorkflow({ service: 'wa', country: 'UA' }, deps());

        expect(result.status).toBe('success');
        expect(console.warn).toHaveBeenCalledWith('[Workflow] Finish failed for task task-1: Provider finish failed: already finished');
    });

    test.each([
        [{ service: 'wa', country: 'UA', countries: ['GB'] }, 'Specify either country or countries, not both'],
        [{ service: 'wa', country: ' ' }, 'country cannot be empty'],
        [{ service: '', country: 'UA' }, 'Missing service'],
        [{ service: 'wa', maxOperationAttempts: 0 }, 'maxOperationAttempts must be a positive integer, got 0'],
    ])('rejects invalid request %j', async (request, message) => {
        const result = await runVerificationWorkflow(request, deps());

        expect(result.status).toBe('failure');
        if (result.status === 'failure') {
            expect(result.error.message).toBe(message);
            expect(result.attempts).toBe(0);
        }
        expect(provider.acquireCalls).toHaveLength(0);
    });
});
