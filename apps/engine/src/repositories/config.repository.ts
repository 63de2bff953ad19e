import { isPlainObject } from '@runledger/sdk';
import { SqlQueryable } from '../db';
import { toStoreError } from '../errors';

const TAG = '[task-config]';

export type ConfigKey = 'timeout_seconds' | 'retention_days';

/**
 * Global janitor overrides that win over the environment defaults. Rows are
 * written by operators straight into task_config; the engine only reads them.
 */
export interface ConfigOverrides {
    /** null when unset or not a usable number. */
    getNumber(key: ConfigKey): Promise<number | null>;
}

type ConfigRow = { value: unknown };

export class PgTaskConfigRepository implements ConfigOverrides {
    constructor(private readonly db: SqlQueryable) { }

    async getNumber(key: ConfigKey): Promise<number | null> {
        let raw: unknown;
        try {
            raw = await this.get(key);
        } catch (err) {
            console.warn(`${TAG} could not read ${key}, using the default:`, err);
            return null;
        }
        if (raw === null) return null;

        const value = readNumber(key, raw);
        if (value === null) {
            console.warn(`${TAG} ignoring ${key}=${JSON.stringify(raw)}: expected a non-negative integer`);
        }
        return value;
    }

    private async get(key: ConfigKey): Promise<unknown> {
        try {
            const res = await this.db.query<ConfigRow>('SELECT value FROM task_config WHERE key = $1', [key]);
            return res.rows[0]?.value ?? null;
        } catch (err) {
            throw toStoreError('postgres', err);
        }
    }
}

/** Accepts `7` or `{ "retention_days": 7 }`. */
export function readNumber(key: string, raw: unknown): number | null {
    const candidate = isPlainObject(raw) ? raw[key] : raw;
    if (typeof candidate !== 'number' || !Number.isInteger(candidate) || candidate < 0) return null;
    return candidate;
}
