import { Clock } from '../../src/infrastructure/clock';

/**
 * Deterministic clock: `sleep` advances time instantly.
 * Timers from `timeout` fire as time passes them; a sleep whose signal
 * aborts on the way stops at that point. An already aborted signal ends the
 * sleep without advancing.
 */
export class ManualClock implements Clock {
    readonly sleeps: number[] = [];
    private current = 0;
    private timers: Array<{ at: number; controller: AbortController }> = [];

    constructor(private readonly onSleep?: (ms: number, clock: ManualClock) => void) { }

    now(): number {
        return this.current;
    }

    advance(ms: number): void {
        this.advanceTo(this.current + ms);
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        this.sleeps.push(ms);
        this.onSleep?.(ms, this);
        if (signal?.aborted) return;
        this.advanceTo(this.current + ms, signal);
    }

    timeout(ms: number): AbortSignal {
        const controller = new AbortController();
        if (ms <= 0) {
            controller.abort();
        } else {
            this.timers.push({ at: this.current + ms, controller });
        }
        return controller.signal;
    }

    private advanceTo(target: number, signal?: AbortSignal): void {
        for (;;) {
            const due = this.timers
                .filter(timer => timer.at <= target)
                .sort((a, b) => a.at - b.at)[0];
            if (due === undefined) break;

            this.timers = this.timers.filter(timer => timer !== due);
            this.current = Math.max(this.current, due.at);
            due.controller.abort();
            if (signal?.aborted) return;
        }
        this.current = target;
    }
}
