/**
 * Atomic key-value primitives the lock manager is built on. Expiry is
 * enforced by the store, never by the reader.
 */
export interface LockStore {
    /** true when the key was absent and is now set to value for ttlMs. */
    setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
    /** Deletes key only if it still holds value. */
    compareAndDelete(key: string, value: string): Promise<boolean>;
    get(key: string): Promise<string | null>;
}
