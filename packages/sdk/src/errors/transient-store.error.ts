// Postgres SQLSTATE classes/codes worth retrying: connection exceptions (08xxx),
// serialization failure, deadlock, and operator/admin shutdowns.
const TRANSIENT_PG_CODES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);
const TRANSIENT_NET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);
const TRANSIENT_MESSAGES = [
    'Connection terminated',
    'timeout exceeded when trying to connect',
    'Connection is closed',
    'MaxRetriesPerRequestError',
];

/**
 * I/O failure of a shared store. Safe to retry with backoff; callers must
 * never drop it silently.
 */
export class TransientStoreError extends Error {
    constructor(
        public readonly store: 'postgres' | 'redis',
        cause: unknown,
    ) {
        super(`${store} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'TransientStoreError';
    }
}

export function isTransientFailure(err: unknown): boolean {
    if (!(err instanceof Error)) return false;

    const code = 'code' in err && typeof err.code === 'string' ? err.code : null;
    if (code && (code.startsWith('08') || TRANSIENT_PG_CODES.has(code) || TRANSIENT_NET_CODES.has(code))) {
        return true;
    }
    return TRANSIENT_MESSAGES.some(m => err.message.includes(m) || err.name === m);
}

/** Wraps connection-class failures; everything else is rethrown untouched. */
export function toStoreError(store: 'postgres' | 'redis', err: unknown): unknown {
    if (err instanceof TransientStoreError) return err;
    return isTransientFailure(err) ? new TransientStoreError(store, err) : err;
}
