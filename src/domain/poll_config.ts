export type PollConfigErrorCode =
    | 'INVALID_VALUE'
    | 'TIMEOUT_TOO_SHORT'
    | 'POLL_INTERVAL_TOO_SHORT'
    | 'POLL_INTERVAL_NOT_BELOW_TIMEOUT';

export class PollConfigError extends Error {
    constructor(message: string, public readonly code: PollConfigErrorCode) {
        super(message);
        this.name = 'PollConfigError';
    }
}

/**
 * How long to wait for a code and how often to ask for it.
 *
 * Instances are immutable; `with*` returns a copy. Construction does not
 * validate so that tight test loops can use sub-minimum values; call
 * `validate()` or `PollConfigBuilder.tryBuild()` for production settings.
 */
export class PollConfig {
    static readonly MIN_TIMEOUT_MS = 10_000;
    static readonly MIN_POLL_INTERVAL_MS = 100;

    private constructor(
        public readonly timeoutMs: number,
        public readonly pollIntervalMs: number
    ) { }

    static of(timeoutMs: number, pollIntervalMs: number): PollConfig {
        return new PollConfig(timeoutMs, pollIntervalMs);
    }

    /** Development and testing: 60s timeout, 1s interval. */
    static fast(): PollConfig {
        return new PollConfig(60_000, 1_000);
    }

    /** Most production setups: 120s timeout, 3s interval. */
    static balanced(): PollConfig {
        return new PollConfig(120_000, 3_000);
    }

    /** Slow backends or unreliable networks: 300s timeout, 5s interval. */
    static patient(): PollConfig {
        return new PollConfig(300_000, 5_000);
    }

    static defaults(): PollConfig {
        return PollConfig.balanced();
    }

    static builder(): PollConfigBuilder {
        return new PollConfigBuilder();
    }

    withTimeout(timeoutMs: number): PollConfig {
        return new PollConfig(timeoutMs, this.pollIntervalMs);
    }

    withPollInterval(pollIntervalMs: number): PollConfig {
        return new PollConfig(this.timeoutMs, pollIntervalMs);
    }

    /**
     * Throws PollConfigError on the first violated rule.
     */
    validate(): void {
        const { timeoutMs, pollIntervalMs } = this;

        if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || !Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
            throw new PollConfigError(
                `timeout and poll interval must be positive numbers (timeout=${timeoutMs}, pollInterval=${pollIntervalMs})`,
                'INVALID_VALUE'
            );
        }
        if (timeoutMs < PollConfig.MIN_TIMEOUT_MS) {
            throw new PollConfigError(
                `timeout ${timeoutMs}ms is below the minimum of ${PollConfig.MIN_TIMEOUT_MS}ms`,
                'TIMEOUT_TOO_SHORT'
            );
        }
        if (pollIntervalMs < PollConfig.MIN_POLL_INTERVAL_MS) {
            throw new PollConfigError(
                `poll interval ${pollIntervalMs}ms is below the minimum of ${PollConfig.MIN_POLL_INTERVAL_MS}ms`,
                'POLL_INTERVAL_TOO_SHORT'
            );
        }
        if (pollIntervalMs >= timeoutMs) {
            throw new PollConfigError(
                `poll interval ${pollIntervalMs}ms must be below timeout ${timeoutMs}ms`,
                'POLL_INTERVAL_NOT_BELOW_TIMEOUT'
            );
        }
    }

    isValid(): boolean {
        try {
            this.validate();
            return true;
        } catch (error: unknown) {
            if (error instanceof PollConfigError) return false;
            throw error;
        }
    }
}

/**
 * Starts from the balanced preset.
 */
export class PollConfigBuilder {
    private timeoutMs: number;
    private pollIntervalMs: number;

    constructor(base: PollConfig = PollConfig.defaults()) {
        this.timeoutMs = base.timeoutMs;
        this.pollIntervalMs = base.pollIntervalMs;
    }

    timeout(ms: number): this {
        this.timeoutMs = ms;
        return this;
    }

    pollInterval(ms: number): this {
        this.pollIntervalMs = ms;
        return this;
    }

    build(): PollConfig {
        return PollConfig.of(this.timeoutMs, this.pollIntervalMs);
    }

    tryBuild(): PollConfig {
        const config = this.build();
        config.validate();
        return config;
    }
}
