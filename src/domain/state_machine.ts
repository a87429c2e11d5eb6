/**
 * Lifecycle of one wait-for-code session.
 *
 * POLLING is the only non-terminal state. Every exit from it is final.
 */
export enum PollingState {
    POLLING = 'polling',
    SUCCESS = 'success',
    TIMED_OUT = 'timed_out',
    CANCELLED = 'cancelled',
    PERMANENT_FAILURE = 'permanent_failure',
}

export interface PollingSession {
    readonly taskId: string;
    readonly state: PollingState;
    readonly pollCount: number;
    readonly startedAt: number;
}

export class StateMachineError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'StateMachineError';
    }
}

export class PollingStateMachine {
    /**
     * Format: CURRENT_STATE -> [ALLOWED_NEXT_STATES]
     */
    private static readonly VALID_TRANSITIONS: Record<PollingState, PollingState[]> = {
        [PollingState.POLLING]: [
            PollingState.POLLING,
            PollingState.SUCCESS,
            PollingState.TIMED_OUT,
            PollingState.CANCELLED,
            PollingState.PERMANENT_FAILURE,
        ],
        [PollingState.SUCCESS]: [],
        [PollingState.TIMED_OUT]: [],
        [PollingState.CANCELLED]: [],
        [PollingState.PERMANENT_FAILURE]: [],
    };

    public static start(taskId: string, startedAt: number): PollingSession {
        return { taskId, state: PollingState.POLLING, pollCount: 0, startedAt };
    }

    public static isTerminal(state: PollingState): boolean {
        return this.VALID_TRANSITIONS[state].length === 0;
    }

    public static transition(current: PollingSession, next: PollingState): PollingSession {
        const allowed = this.VALID_TRANSITIONS[current.state];
        if (!allowed.includes(next)) {
            throw new StateMachineError(
                `Illegal state transition: ${current.state} -> ${next}`,
                'ILLEGAL_TRANSITION'
            );
        }
        return { ...current, state: next };
    }

    /**
     * Counts one completed poll call. Only legal while polling.
     */
    public static recordPoll(current: PollingSession): PollingSession {
        if (current.state !== PollingState.POLLING) {
            throw new StateMachineError(
                `Cannot record a poll in terminal state ${current.state}`,
                'POLL_AFTER_TERMINAL'
            );
        }
        return { ...current, pollCount: current.pollCount + 1 };
    }
}
