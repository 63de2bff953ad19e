export { RedisResultBackend, DEFAULT_RESULT_KEY_PREFIX } from './status-source';
export type { StatusSource, ExternalStatus, ResultBackendClient } from './status-source';
export { Reconciler } from './reconciler';
export type { SyncOutcome, ReconcileSummary } from './reconciler';
export { Reaper } from './reaper';
export type { ReaperOptions, ReapResult } from './reaper';
export { RetentionCleaner } from './cleaner';
export type { CleanerOptions, CleanupResult } from './cleaner';
export { PeriodicJanitor, JANITOR_MODULE } from './janitor';
export type { JanitorOptions, JanitorTick } from './janitor';
export { TaskTracker } from './task-tracker';
export type { GetOptions } from './task-tracker';
