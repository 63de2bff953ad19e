import { v7 as uuid } from 'uuid';
import { AcquireResult, Locker } from '../guard';
import { LockStore } from './lock.store';

const TAG = '[locks]';

export const DEFAULT_LOCK_PREFIX = 'runledger:lock';

/**
 * Mutual exclusion over a LockStore. One set-if-absent attempt per acquire:
 * it never waits and never retries, a held key is reported as busy.
 *
 * Every key is namespaced as `<prefix>:<key>`. Each successful acquire mints
 * a fresh owner token, and only that token can release the key.
 */
export class LockManager implements Locker {
    constructor(
        private readonly store: LockStore,
        private readonly prefix: string = DEFAULT_LOCK_PREFIX,
    ) { }

    async acquire(key: string, ttlMs: number): Promise<AcquireResult> {
        assertTtl(key, ttlMs);

        const token = uuid();
        const acquired = await this.store.setIfAbsent(this.namespaced(key), token, ttlMs);
        if (!acquired) return { ok: false, reason: 'busy' };

        return { ok: true, token };
    }

    async release(key: string, token: string): Promise<boolean> {
        const released = await this.store.compareAndDelete(this.namespaced(key), token);
        if (!released) {
            console.warn(`${TAG} release of ${key} ignored: lock expired or owned by another holder`);
        }
        return released;
    }

    // Advisory: the answer can be stale by the time the caller acts on it.
    async isLocked(key: string): Promise<boolean> {
        return (await this.store.get(this.namespaced(key))) !== null;
    }

    private namespaced(key: string): string {
        return this.prefix ? `${this.prefix}:${key}` : key;
    }
}

function assertTtl(key: string, ttlMs: number): void {
    if (typeof ttlMs !== 'number' || !Number.isFinite(ttlMs) || ttlMs <= 0) {
        throw new RangeError(`lock ${key} needs a positive finite ttlMs, got ${String(ttlMs)}`);
    }
}
