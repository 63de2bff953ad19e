// public api for @runledger/sdk
// usage:
//   import { LockManager, RedisLockStore, withDuplicateGuard } from '@runledger/sdk';
//   const locks = new LockManager(new RedisLockStore(new Redis(process.env.REDIS_URL)));
//   const report = withDuplicateGuard(locks, { name: 'send_report', ttlMs: 60_000 }, sendReport);

export {
    TaskStatus,
    TERMINAL_STATUSES,
    ACTIVE_STATUSES,
    RUNNING_STATUSES,
    isTerminal,
    isTaskStatus,
    parseStatus,
} from './types';
export type {
    ExecutionRecord,
    Metadata,
    RegisterInput,
    UpdatePatch,
    UpdateOptions,
    UpdateSource,
} from './types';

export { withDuplicateGuard, buildLockKey } from './guard';
export type { AcquireResult, Locker, GuardOptions, GuardOutcome } from './guard';

export { LockManager, DEFAULT_LOCK_PREFIX, RedisLockStore, MemoryLockStore } from './locks';
export type { LockStore, RedisLockClient } from './locks';

export { TransientStoreError, isTransientFailure, toStoreError } from './errors/transient-store.error';

export { RunLogCollector } from './log-collector';
export type { LogLevel, RunLogEntry, RunLogSummary } from './log-collector';

export {
    serialize,
    deserialize,
    parseJsonObject,
    isPlainObject,
    SerializationError,
} from './utils/serialization';

export { toRecordMessage, fromRecordMessage, bufferText, parseJsonArray } from './codec';

export {
    loadTrackerService,
    loadHealthService,
    resolveService,
    protoOptions,
    TRACKER_PROTO_PATH,
    HEALTH_PROTO_PATH,
} from './proto';
export type {
    RegisterTaskRequest,
    UpdateTaskRequest,
    GetTaskRequest,
    TaskRecordMessage,
    HealthCheckRequest,
    HealthCheckResponse,
} from './proto';

export { connectTracker, createTrackerClient, isTrackerRpc } from './grpc-client';
export type { TrackerClient, TrackerRpc } from './grpc-client';
