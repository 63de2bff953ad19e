import { LockStore } from './lock.store';

interface Entry {
    value: string;
    expiresAt: number;
}

// Single-process only. Expired entries are dropped lazily on access.
export class MemoryLockStore implements LockStore {
    private readonly entries = new Map<string, Entry>();

    constructor(private readonly now: () => Date = () => new Date()) { }

    async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
        if (this.live(key)) return false;
        this.entries.set(key, { value, expiresAt: this.now().getTime() + ttlMs });
        return true;
    }

    async compareAndDelete(key: string, value: string): Promise<boolean> {
        const entry = this.live(key);
        if (!entry || entry.value !== value) return false;
        this.entries.delete(key);
        return true;
    }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null;
    }

    private live(key: string): Entry | null {
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (entry.expiresAt <= this.now().getTime()) {
            this.entries.delete(key);
            return null;
        }
        return entry;
    }
}
