import { createHash } from 'crypto';

const TAG = '[guard]';
const MAX_SCOPE_LENGTH = 200;

export type AcquireResult =
    | { ok: true; token: string }
    | { ok: false; reason: 'busy' };

/** Mutual-exclusion primitive the guard composes with. */
export interface Locker {
    acquire(key: string, ttlMs: number): Promise<AcquireResult>;
    release(key: string, token: string): Promise<boolean>;
}

export type GuardOutcome<T> =
    | { status: 'completed'; lockKey: string; value: T }
    | { status: 'skipped'; lockKey: string; reason: 'task_already_running' };

export interface GuardOptions<A extends unknown[]> {
    name: string;
    // Pick the TTL longer than the slowest expected run: a short TTL lets a
    // second run start while the first is still working, a long one keeps a
    // crashed holder's key blocking re-runs until it expires.
    ttlMs: number;
    // Per-parameter isolation: runs with different scope values don't exclude each other.
    scope?: (...args: A) => string | number | null | undefined;
}

/**
 * `name` alone, or `name:<scope>` when a scope value is given. Long scope
 * values are hashed so keys stay bounded.
 */
export function buildLockKey(name: string, scopeValue?: string | number | null): string {
    if (scopeValue === undefined || scopeValue === null || scopeValue === '') return name;

    const scope = String(scopeValue);
    if (scope.length > MAX_SCOPE_LENGTH) {
        const digest = createHash('md5').update(scope, 'utf8').digest('hex').slice(0, 16);
        return `${name}:${digest}`;
    }
    return `${name}:${scope}`;
}

/**
 * Wraps `work` so at most one invocation per lock key runs at a time.
 * A busy key skips the call instead of waiting; the lock is released on
 * every exit path and the work's own errors propagate unchanged.
 */
export function withDuplicateGuard<A extends unknown[], T>(
    locker: Locker,
    options: GuardOptions<A>,
    work: (...args: A) => Promise<T>,
): (...args: A) => Promise<GuardOutcome<T>> {
    return async (...args: A): Promise<GuardOutcome<T>> => {
        const lockKey = buildLockKey(options.name, options.scope?.(...args));

        const acquired = await locker.acquire(lockKey, options.ttlMs);
        if (!acquired.ok) {
            console.warn(`${TAG} ${lockKey} is already running, skipping`);
            return { status: 'skipped', lockKey, reason: 'task_already_running' };
        }

        try {
            const value = await work(...args);
            return { status: 'completed', lockKey, value };
        } finally {
            await releaseQuietly(locker, lockKey, acquired.token);
        }
    };
}

// A failed release must not replace the work's outcome; the TTL reclaims the key.
async function releaseQuietly(locker: Locker, lockKey: string, token: string): Promise<void> {
    try {
        await locker.release(lockKey, token);
    } catch (err) {
        console.error(`${TAG} failed to release ${lockKey}, it will expire by TTL:`, err);
    }
}
