import { readFileSync } from 'node:fs';
import bundledEntries from '../../data/countries_with_dial_code.json';
import { DialCodeDirectory } from '../domain/dial_code_directory';
import { CountryCode, DialCode, DialCodeError } from '../domain/models';

export interface DialCodeEntry {
    name?: string;
    code: string;
    dial_code: string;
}

export class DialCodeDirectoryError extends Error {
    constructor(message: string, public readonly code: 'UNREADABLE' | 'INVALID_FORMAT') {
        super(message);
        this.name = 'DialCodeDirectoryError';
    }
}

/**
 * In-memory directory built from a fixed table. Entries whose dial code does
 * not parse are skipped with a warning.
 */
export class StaticDialCodeDirectory implements DialCodeDirectory {
    private readonly byCountry = new Map<CountryCode, DialCode>();
    private readonly byDialCode = new Map<string, CountryCode[]>();

    constructor(entries: readonly DialCodeEntry[]) {
        for (const entry of entries) {
            const country = entry.code.trim().toUpperCase();
            if (country.length === 0) {
                console.warn(`[Directory] Skipping entry without country code (${entry.name ?? 'unnamed'})`);
                continue;
            }

            let dialCode: DialCode;
            try {
                dialCode = DialCode.parse(entry.dial_code);
            } catch (error: unknown) {
                if (!(error instanceof DialCodeError)) throw error;
                console.warn(`[Directory] Skipping ${country}: ${error.message}`);
                continue;
            }

            this.byCountry.set(country, dialCode);
            const shared = this.byDialCode.get(dialCode.value) ?? [];
            if (!shared.includes(country)) shared.push(country);
            this.byDialCode.set(dialCode.value, shared);
        }
    }

    /**
     * The table shipped in data/countries_with_dial_code.json.
     */
    static bundled(): StaticDialCodeDirectory {
        return new StaticDialCodeDirectory(bundledEntries);
    }

    static fromFile(path: string): StaticDialCodeDirectory {
        let raw: string;
        try {
            raw = readFileSync(path, 'utf8');
        } catch (error: unknown) {
            throw new DialCodeDirectoryError(
                `Cannot read dial code table ${path}: ${error instanceof Error ? error.message : String(error)}`,
                'UNREADABLE'
            );
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error: unknown) {
            throw new DialCodeDirectoryError(
                `Dial code table ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
                'INVALID_FORMAT'
            );
        }

        return new StaticDialCodeDirectory(parseEntries(parsed, path));
    }

    dialCodeFor(country: CountryCode): DialCode | null {
        return this.byCountry.get(country.trim().toUpperCase()) ?? null;
    }

    countryFor(dialCode: DialCode): CountryCode[] {
        return [...(this.byDialCode.get(dialCode.value) ?? [])];
    }

    countries(): CountryCode[] {
        return Array.from(this.byCountry.keys());
    }
}

function parseEntries(value: unknown, source: string): DialCodeEntry[] {
    if (!Array.isArray(value)) {
        throw new DialCodeDirectoryError(`Dial code table ${source} must be a JSON array`, 'INVALID_FORMAT');
    }

    const entries: DialCodeEntry[] = [];
    for (const item of value) {
        const code: unknown = typeof item === 'object' && item !== null ? Reflect.get(item, 'code') : undefined;
        const dialCode: unknown = typeof item === 'object' && item !== null ? Reflect.get(item, 'dial_code') : undefined;
        const name: unknown = typeof item === 'object' && item !== null ? Reflect.get(item, 'name') : undefined;

        if (typeof code !== 'string' || typeof dialCode !== 'string') {
            console.warn(`[Directory] Skipping malformed entry in ${source}: ${JSON.stringify(item)}`);
            continue;
        }
        entries.push({ code, dial_code: dialCode, name: typeof name === 'string' ? name : undefined });
    }
    return entries;
}
