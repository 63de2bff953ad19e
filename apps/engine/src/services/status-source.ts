import { isPlainObject } from '@runledger/sdk';
import { toStoreError } from '../errors';

const TAG = '[status-source]';

export const DEFAULT_RESULT_KEY_PREFIX = 'task-meta-';

/** What the dispatcher reports for a run. status is raw and may be unrecognised. */
export interface ExternalStatus {
    status: string;
    result?: unknown;
    error?: string | null;
    traceback?: string | null;
}

export interface StatusSource {
    /** null means the source knows nothing about this run. */
    lookup(taskId: string): Promise<ExternalStatus | null>;
}

export interface ResultBackendClient {
    get(key: string): Promise<string | null>;
}

/**
 * Reads the dispatcher's result documents from Redis. Each run lives under
 * `<prefix><taskId>` as JSON with `status`, `result` and `traceback`; failed
 * runs carry the exception as `{ exc_type, exc_message }` in `result`.
 */
export class RedisResultBackend implements StatusSource {
    constructor(
        private readonly redis: ResultBackendClient,
        private readonly prefix: string = DEFAULT_RESULT_KEY_PREFIX,
    ) { }

    async lookup(taskId: string): Promise<ExternalStatus | null> {
        let raw: string | null;
        try {
            raw = await this.redis.get(`${this.prefix}${taskId}`);
        } catch (err) {
            throw toStoreError('redis', err);
        }
        if (raw === null) return null;

        const doc: unknown = JSON.parse(raw);
        if (!isPlainObject(doc) || typeof doc.status !== 'string') {
            throw new Error(`${TAG} malformed result document for task ${taskId}`);
        }

        const traceback = typeof doc.traceback === 'string' ? doc.traceback : null;
        if (doc.status.toUpperCase() === 'FAILURE') {
            return { status: doc.status, result: null, error: describeFailure(doc.result), traceback };
        }
        return { status: doc.status, result: doc.result ?? null, error: null, traceback };
    }
}

function describeFailure(result: unknown): string | null {
    if (typeof result === 'string') return result;
    if (!isPlainObject(result)) return null;

    const type = typeof result.exc_type === 'string' ? result.exc_type : null;
    const message = Array.isArray(result.exc_message)
        ? result.exc_message.map(String).join(' ')
        : typeof result.exc_message === 'string' ? result.exc_message : null;

    if (type && message) return `${type}: ${message}`;
    return type ?? message;
}
