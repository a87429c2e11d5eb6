import * as dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { DEFAULT_SMS_ACTIVATE_URL } from './api/sms_activate_client';
import { DialCode, DialCodeError } from './domain/models';
import { PollConfig, PollConfigError } from './domain/poll_config';
import { RetryPolicy, RetryPolicyError, createRetryPolicy } from './domain/retry_policy';

export type Env = Record<string, string | undefined>;

export type PollPreset = 'fast' | 'balanced' | 'patient';

export interface AppConfig {
    apiKey: string;
    apiUrl: string;
    pollConfig: PollConfig;
    retryPolicy: RetryPolicy;
    /** Dial codes (digits only) the provider must not rent from. */
    blacklist: string[];
}

export class ConfigError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
        this.name = 'ConfigError';
    }
}

const PRESETS: Record<PollPreset, () => PollConfig> = {
    fast: PollConfig.fast,
    balanced: PollConfig.balanced,
    patient: PollConfig.patient,
};

function isPreset(value: string): value is PollPreset {
    return Object.prototype.hasOwnProperty.call(PRESETS, value);
}

/**
 * Reads configuration from environment variables. Collects every problem
 * before failing.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const problems: string[] = [];

    const apiKey = env.SMS_ACTIVATE_API_KEY?.trim() ?? '';
    if (!apiKey) problems.push('SMS_ACTIVATE_API_KEY is required');

    const apiUrl = env.SMS_ACTIVATE_API_URL?.trim() || DEFAULT_SMS_ACTIVATE_URL;
    if (!/^https?:\/\//.test(apiUrl)) problems.push(`SMS_ACTIVATE_API_URL must be an http(s) URL, got '${apiUrl}'`);

    const presetName = env.VERIFY_POLL_PRESET?.trim().toLowerCase() || 'balanced';
    let pollConfig = PollConfig.defaults();
    if (isPreset(presetName)) {
        pollConfig = PRESETS[presetName]();
    } else {
        problems.push(`VERIFY_POLL_PRESET must be one of fast, balanced, patient; got '${presetName}'`);
    }

    const timeoutMs = readInteger(env, 'VERIFY_TIMEOUT_MS', problems);
    if (timeoutMs !== undefined) pollConfig = pollConfig.withTimeout(timeoutMs);
    const pollIntervalMs = readInteger(env, 'VERIFY_POLL_INTERVAL_MS', problems);
    if (pollIntervalMs !== undefined) pollConfig = pollConfig.withPollInterval(pollIntervalMs);

    try {
        pollConfig.validate();
    } catch (error: unknown) {
        if (!(error instanceof PollConfigError)) throw error;
        problems.push(`poll settings: ${error.message}`);
    }

    const overrides: { -readonly [K in keyof RetryPolicy]?: RetryPolicy[K] } = {};
    const minDelayMs = readInteger(env, 'VERIFY_RETRY_MIN_DELAY_MS', problems);
    if (minDelayMs !== undefined) overrides.minDelayMs = minDelayMs;
    const maxDelayMs = readInteger(env, 'VERIFY_RETRY_MAX_DELAY_MS', problems);
    if (maxDelayMs !== undefined) overrides.maxDelayMs = maxDelayMs;
    const factor = readNumber(env, 'VERIFY_RETRY_FACTOR', problems);
    if (factor !== undefined) overrides.factor = factor;
    const maxAttempts = readInteger(env, 'VERIFY_RETRY_MAX_ATTEMPTS', problems);
    if (maxAttempts !== undefined) overrides.maxAttempts = maxAttempts;

    let retryPolicy: RetryPolicy | null = null;
    try {
        retryPolicy = createRetryPolicy(overrides);
    } catch (error: unknown) {
        if (!(error instanceof RetryPolicyError)) throw error;
        problems.push(`retry settings: ${error.message}`);
    }

    const blacklist: string[] = [];
    for (const item of (env.SMS_ACTIVATE_BLACKLIST ?? '').split(',')) {
        if (item.trim().length === 0) continue;
        try {
            blacklist.push(DialCode.parse(item).value);
        } catch (error: unknown) {
            if (!(error instanceof DialCodeError)) throw error;
            problems.push(`SMS_ACTIVATE_BLACKLIST: ${error.message}`);
        }
    }

    if (problems.length > 0 || retryPolicy === null) {
        throw new ConfigError(problems);
    }

    return { apiKey, apiUrl, pollConfig, retryPolicy, blacklist };
}

/**
 * Like loadConfig, with values from a .env file underneath `env`.
 * A missing file is not an error.
 */
export function loadConfigFromDotenv(path: string = '.env', env: Env = process.env): AppConfig {
    let fileValues: Env = {};
    try {
        fileValues = dotenv.parse(readFileSync(path));
    } catch (error: unknown) {
        if (!isMissingFile(error)) throw error;
    }
    return loadConfig({ ...fileValues, ...definedOnly(env) });
}

function definedOnly(env: Env): Env {
    const result: Env = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined) result[key] = value;
    }
    return result;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

function readNumber(env: Env, name: string, problems: string[]): number | undefined {
    const raw = env[name]?.trim();
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        problems.push(`${name} must be a number, got '${raw}'`);
        return undefined;
    }
    return value;
}

function readInteger(env: Env, name: string, problems: string[]): number | undefined {
    const raw = env[name]?.trim();
    if (raw === undefined || raw === '') return undefined;
    if (!/^[0-9]+$/.test(raw)) {
        problems.push(`${name} must be a non-negative integer, got '${raw}'`);
        return undefined;
    }
    return Number(raw);
}
