import { ProviderFailureError, classifyError } from '../domain/errors';
import { VerificationCode } from '../domain/models';
import { PollingState } from '../domain/state_machine';

// ===========================================
// 1. DEFINITIONS
// ===========================================

/**
 * What the loop does on the current iteration, before touching the provider.
 */
export type NextStep =
    | { action: 'poll' }
    | { action: 'cancel'; state: PollingState.CANCELLED }
    | { action: 'timeout'; state: PollingState.TIMED_OUT };

export interface IterationInput {
    readonly aborted: boolean;
    readonly elapsedMs: number;
    readonly timeoutMs: number;
    /** The deadline timer has fired, whatever `elapsedMs` says. */
    readonly expired?: boolean;
}

/**
 * Raw outcome of one `pollCode` call.
 */
export type PollOutcome =
    | { kind: 'code'; code: VerificationCode }
    | { kind: 'pending' }
    | { kind: 'error'; error: unknown };

/**
 * Tri-state result
 * - success: code received, stop without cancelling
 * - continue: stay in POLLING, sleep and ask again
 * - failure: permanent error, leave POLLING
 */
export type PollDecision =
    | { status: 'success'; code: VerificationCode; state: PollingState.SUCCESS }
    | { status: 'continue'; reason: string }
    | { status: 'failure'; error: ProviderFailureError; state: PollingState.PERMANENT_FAILURE };

// ===========================================
// 2. PURE LOGIC
// ===========================================

/**
 * Cancellation wins over timeout, timeout wins over polling.
 */
export function decideNextStep(input: IterationInput): NextStep {
    if (input.aborted) {
        return { action: 'cancel', state: PollingState.CANCELLED };
    }
    if (input.expired || input.elapsedMs >= input.timeoutMs) {
        return { action: 'timeout', state: PollingState.TIMED_OUT };
    }
    return { action: 'poll' };
}

export function classifyPollResult(outcome: PollOutcome): PollDecision {
    switch (outcome.kind) {
        case 'code':
            return { status: 'success', code: outcome.code, state: PollingState.SUCCESS };
        case 'pending':
            return { status: 'continue', reason: 'code not received yet' };
        case 'error': {
            const wrapped = new ProviderFailureError('pollCode', outcome.error);
            if (classifyError(outcome.error).retryable) {
                return { status: 'continue', reason: wrapped.message };
            }
            return { status: 'failure', error: wrapped, state: PollingState.PERMANENT_FAILURE };
        }
    }
}
