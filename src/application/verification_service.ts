import {
    CancelFailedError,
    CancelledError,
    DialCodeBlacklistedError,
    MalformedNumberError,
    NoAvailableDialCodesError,
    NoDialCodeError,
    ProviderFailureError,
    ServiceError,
    ServiceNotSupportedError,
    TimedOutError,
    classifyError,
    describeError,
} from '../domain/errors';
import { DialCodeDirectory } from '../domain/dial_code_directory';
import {
    AcquiredNumber,
    AcquisitionResult,
    CountryCode,
    NationalNumber,
    TaskId,
    ValueObjectError,
    VerificationCode,
} from '../domain/models';
import { PollConfig } from '../domain/poll_config';
import { Provider } from '../domain/provider';
import { PollingSession, PollingStateMachine } from '../domain/state_machine';
import { Clock, linkSignals, systemClock } from '../infrastructure/clock';
import { PollOutcome, classifyPollResult, decideNextStep } from '../workflow/polling_logic';

export interface PollReport {
    readonly code: VerificationCode;
    readonly pollCount: number;
    readonly elapsedMs: number;
}

/**
 * Acquires numbers and waits for their codes against any Provider.
 *
 * Holds no per-verification state: one instance serves concurrent sessions.
 * Retries of individual calls belong to the provider (see RetryableProvider);
 * retries of the whole operation belong to the caller (see runVerificationWorkflow).
 */
export class VerificationService<TService = string> {
    constructor(
        private readonly provider: Provider<TService>,
        private readonly directory: DialCodeDirectory,
        private readonly config: PollConfig = PollConfig.defaults(),
        private readonly clock: Clock = systemClock
    ) { }

    get pollConfig(): PollConfig {
        return this.config;
    }

    async acquireNumber(country: CountryCode, service: TService, signal?: AbortSignal): Promise<AcquisitionResult> {
        if (!this.provider.supportsService(service)) {
            throw new ServiceNotSupportedError(String(service));
        }

        const normalizedCountry = country.trim().toUpperCase();
        const dialCode = this.directory.dialCodeFor(normalizedCountry);
        if (dialCode === null) {
            throw new NoDialCodeError(normalizedCountry);
        }
        if (!this.provider.isDialCodeSupported(dialCode)) {
            throw new DialCodeBlacklistedError(normalizedCountry, dialCode);
        }

        let acquired: AcquiredNumber;
        try {
            acquired = await this.provider.acquireNumber(normalizedCountry, service, signal);
        } catch (error: unknown) {
            const wrapped = new ProviderFailureError('acquireNumber', error);
            console.error(`[Service] ${wrapped.message}`);
            throw wrapped;
        }

        let nationalNumber: NationalNumber;
        try {
            nationalNumber = NationalNumber.fromFullNumber(acquired.fullNumber, dialCode);
        } catch (error: unknown) {
            if (!(error instanceof ValueObjectError)) throw error;
            const malformed = new MalformedNumberError(acquired.fullNumber, dialCode, error.message);
            console.error(`[Service] ${malformed.message}`);
            throw await this.releaseAfter(acquired.taskId, malformed);
        }

        console.log(
            `[Service] Acquired ${acquired.fullNumber.withPlusPrefix()} (${normalizedCountry}) for ${String(service)}, task ${acquired.taskId.value}`
        );

        return {
            taskId: acquired.taskId,
            dialCode,
            nationalNumber,
            fullNumber: acquired.fullNumber,
            country: normalizedCountry,
        };
    }

    /**
     * Tries each candidate country in order, moving on while the failure says a
     * fresh acquisition may succeed. Candidates default to the provider's
     * `availableCountries(service)`.
     */
    async acquireNumberFromAny(
        service: TService,
        countries?: readonly CountryCode[],
        signal?: AbortSignal
    ): Promise<AcquisitionResult> {
        if (!this.provider.supportsService(service)) {
            throw new ServiceNotSupportedError(String(service));
        }

        const candidates = (countries ?? this.provider.availableCountries(service)).filter((country) => {
            const dialCode = this.directory.dialCodeFor(country);
            return dialCode !== null && this.provider.isDialCodeSupported(dialCode);
        });
        if (candidates.length === 0) {
            throw new NoAvailableDialCodesError(String(service));
        }

        let lastError: unknown;
        for (const country of candidates) {
            try {
                return await this.acquireNumber(country, service, signal);
            } catch (error: unknown) {
                if (!classifyError(error).retryOperation || signal?.aborted) throw error;
                console.warn(`[Service] ${country} unavailable, trying next country: ${describeError(error)}`);
                lastError = error;
            }
        }
        throw lastError;
    }

    async waitForCode(taskId: TaskId): Promise<VerificationCode> {
        const report = await this.pollForCode(taskId);
        return report.code;
    }

    async waitForCodeCancellable(taskId: TaskId, signal: AbortSignal): Promise<VerificationCode> {
        const report = await this.pollForCode(taskId, signal);
        return report.code;
    }

    /**
     * Polls until a code arrives, the timeout elapses, `signal` aborts, or the
     * provider fails permanently. Every exit other than success cancels the
     * task exactly once.
     *
     * Each poll gets a signal that aborts on the caller's cancel or on the
     * deadline, so waits inside the provider end with the loop.
     */
    async pollForCode(taskId: TaskId, signal?: AbortSignal): Promise<PollReport> {
        const { timeoutMs, pollIntervalMs } = this.config;
        let session: PollingSession = PollingStateMachine.start(taskId.value, this.clock.now());
        const deadline = this.clock.timeout(timeoutMs);
        const linked = linkSignals(signal, deadline);

        try {
            for (;;) {
                const elapsedMs = this.clock.now() - session.startedAt;
                const step = decideNextStep({
                    aborted: signal?.aborted ?? false,
                    elapsedMs,
                    timeoutMs,
                    expired: deadline.aborted,
                });

                if (step.action === 'cancel') {
                    session = PollingStateMachine.transition(session, step.state);
                    console.log(`[Service] Task ${taskId.value} cancelled by caller after ${session.pollCount} polls`);
                    throw await this.releaseAfter(taskId, new CancelledError(taskId, elapsedMs, session.pollCount));
                }
                if (step.action === 'timeout') {
                    session = PollingStateMachine.transition(session, step.state);
                    const timedOut = new TimedOutError(taskId, timeoutMs, elapsedMs, session.pollCount);
                    console.warn(`[Service] ${timedOut.message}`);
                    throw await this.releaseAfter(taskId, timedOut);
                }

                const outcome = await this.pollOnce(taskId, linked.signal);
                session = PollingStateMachine.recordPoll(session);
                const decision = classifyPollResult(outcome);

                if (decision.status === 'success') {
                    session = PollingStateMachine.transition(session, decision.state);
                    const report: PollReport = {
                        code: decision.code,
                        pollCount: session.pollCount,
                        elapsedMs: this.clock.now() - session.startedAt,
                    };
                    console.log(`[Service] Code received for task ${taskId.value} after ${report.pollCount} polls`);
                    return report;
                }
                if (decision.status === 'failure') {
                    session = PollingStateMachine.transition(session, decision.state);
                    console.error(`[Service] ${decision.error.message}`);
                    throw await this.releaseAfter(taskId, decision.error);
                }

                if (outcome.kind === 'error') {
                    console.warn(`[Service] Transient poll error for task ${taskId.value}: ${decision.reason}`);
                }
                await this.clock.sleep(pollIntervalMs, linked.signal);
            }
        } finally {
            linked.dispose();
        }
    }

    async finish(taskId: TaskId): Promise<void> {
        try {
            await this.provider.finish(taskId);
        } catch (error: unknown) {
            throw new ProviderFailureError('finish', error);
        }
    }

    async cancel(taskId: TaskId): Promise<void> {
        try {
            await this.provider.cancel(taskId);
        } catch (error: unknown) {
            throw new ProviderFailureError('cancel', error);
        }
    }

    private async pollOnce(taskId: TaskId, signal: AbortSignal): Promise<PollOutcome> {
        try {
            const code = await this.provider.pollCode(taskId, signal);
            return code === null ? { kind: 'pending' } : { kind: 'code', code };
        } catch (error: unknown) {
            return { kind: 'error', error };
        }
    }

    /**
     * Best-effort cancel after a non-success exit. Returns the error to throw.
     */
    private async releaseAfter(taskId: TaskId, trigger: ServiceError): Promise<ServiceError> {
        try {
            await this.provider.cancel(taskId);
            return trigger;
        } catch (error: unknown) {
            const failed = new CancelFailedError(taskId, trigger, error);
            console.warn(`[Service] ${failed.message}`);
            return failed;
        }
    }
}
