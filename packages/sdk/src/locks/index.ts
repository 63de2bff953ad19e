export type { LockStore } from './lock.store';
export { RedisLockStore } from './redis-lock.store';
export type { RedisLockClient } from './redis-lock.store';
export { MemoryLockStore } from './memory-lock.store';
export { LockManager, DEFAULT_LOCK_PREFIX } from './lock-manager';
