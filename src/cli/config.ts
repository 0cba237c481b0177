import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { getConcordDir } from '../logging/index.js';
import { ValidationError } from '../errors.js';
import type { ConcordGlobalConfig } from '../types.js';
import { defaultGlobalConfig } from '../types.js';

type NumericKey = Exclude<keyof ConcordGlobalConfig, 'databasePath'>;

const NUMERIC_KEYS: readonly NumericKey[] = [
    'maxRounds',
    'roundTimeoutMs',
    'negotiationTimeoutMs',
    'writeTimeoutMs',
    'recencyHalfLifeDays',
    'recorderMaxRetries',
];

// Keys whose value may be zero; the rest must be positive
const ZERO_ALLOWED: readonly NumericKey[] = ['recorderMaxRetries'];

export const CONFIG_KEYS: readonly (keyof ConcordGlobalConfig)[] = [...NUMERIC_KEYS, 'databasePath'];

function getConfigPath(): string {
    return join(getConcordDir(), 'config.json');
}

function isNumericKey(key: string): key is NumericKey {
    return NUMERIC_KEYS.some(k => k === key);
}

function minimumFor(key: NumericKey): number {
    return ZERO_ALLOWED.includes(key) ? 0 : 1;
}

// Only the recency half-life may be fractional
function isValidSetting(key: NumericKey, value: number): boolean {
    if (!Number.isFinite(value) || value < minimumFor(key)) return false;
    return key === 'recencyHalfLifeDays' || Number.isInteger(value);
}

/**
 * Merge the stored file over the defaults, ignoring unknown, mistyped or out-of-range entries
 */
export function parseGlobalConfig(content: string): ConcordGlobalConfig {
    const raw: unknown = JSON.parse(content);
    const config: ConcordGlobalConfig = { ...defaultGlobalConfig };
    if (typeof raw !== 'object' || raw === null) {
        return config;
    }
    for (const [key, value] of Object.entries(raw)) {
        if (isNumericKey(key) && typeof value === 'number' && isValidSetting(key, value)) {
            config[key] = value;
        } else if (key === 'databasePath' && typeof value === 'string') {
            config.databasePath = value;
        }
    }
    return config;
}

/**
 * Load global Concord configuration
 */
export function loadGlobalConfig(): ConcordGlobalConfig {
    const configPath = getConfigPath();
    if (!existsSync(configPath)) {
        return { ...defaultGlobalConfig };
    }

    try {
        return parseGlobalConfig(readFileSync(configPath, 'utf-8'));
    } catch {
        // An unreadable config file falls back to defaults
        return { ...defaultGlobalConfig };
    }
}

/**
 * Save global Concord configuration
 */
export function saveGlobalConfig(config: ConcordGlobalConfig): void {
    const dir = getConcordDir();
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }

    writeFileSync(getConfigPath(), JSON.stringify(config, null, 2));
}

/**
 * Parse and apply one `concord config <key> <value>` assignment
 */
export function applyConfigValue(config: ConcordGlobalConfig, key: string, value: string): ConcordGlobalConfig {
    if (key === 'databasePath') {
        return { ...config, databasePath: value };
    }
    if (!isNumericKey(key)) {
        throw new ValidationError(`Unknown config key: ${key}`, 'key', key);
    }
    const parsed = value.trim() === '' ? Number.NaN : Number(value);
    if (!isValidSetting(key, parsed)) {
        throw new ValidationError(
            `${key} must be ${key === 'recencyHalfLifeDays' ? 'a number' : 'an integer'} >= ${minimumFor(key)}`,
            key,
            value
        );
    }
    const next = { ...config };
    next[key] = parsed;
    return next;
}
