import { toStoreError } from '../errors/transient-store.error';
import { LockStore } from './lock.store';

// Only delete if we still own the key; GET+DEL in one script so no other
// holder can slip in between.
const COMPARE_AND_DELETE = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

/** The slice of ioredis the lock store calls. */
export interface RedisLockClient {
    set(key: string, value: string, mode: 'PX', ttlMs: number, flag: 'NX'): Promise<'OK' | null>;
    eval(script: string, numkeys: number, ...args: (string | number)[]): Promise<unknown>;
    get(key: string): Promise<string | null>;
}

export class RedisLockStore implements LockStore {
    constructor(private readonly redis: RedisLockClient) { }

    async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
        try {
            // PX only takes whole milliseconds
            const result = await this.redis.set(key, value, 'PX', Math.ceil(ttlMs), 'NX');
            return result === 'OK';
        } catch (err) {
            throw toStoreError('redis', err);
        }
    }

    async compareAndDelete(key: string, value: string): Promise<boolean> {
        try {
            const removed = await this.redis.eval(COMPARE_AND_DELETE, 1, key, value);
            return removed === 1;
        } catch (err) {
            throw toStoreError('redis', err);
        }
    }

    async get(key: string): Promise<string | null> {
        try {
            return await this.redis.get(key);
        } catch (err) {
            throw toStoreError('redis', err);
        }
    }
}
