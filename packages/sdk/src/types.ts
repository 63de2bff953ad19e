/**
 * Lifecycle states for tracked task executions.
 * Runs progress: PENDING → STARTED (↔ RETRY) → SUCCESS/FAILURE/REVOKED
 */
export enum TaskStatus {
    PENDING = 'PENDING',
    STARTED = 'STARTED',
    SUCCESS = 'SUCCESS',
    FAILURE = 'FAILURE',
    RETRY = 'RETRY',
    REVOKED = 'REVOKED',
}

export const TERMINAL_STATUSES: readonly TaskStatus[] = [
    TaskStatus.SUCCESS,
    TaskStatus.FAILURE,
    TaskStatus.REVOKED,
];

export const ACTIVE_STATUSES: readonly TaskStatus[] = [
    TaskStatus.PENDING,
    TaskStatus.STARTED,
    TaskStatus.RETRY,
];

// Runs the reaper considers "in flight": they have a started_at to age against.
export const RUNNING_STATUSES: readonly TaskStatus[] = [
    TaskStatus.STARTED,
    TaskStatus.RETRY,
];

const ALL_STATUSES = new Set<string>(Object.values(TaskStatus));

export function isTerminal(status: TaskStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export function isTaskStatus(value: string): value is TaskStatus {
    return ALL_STATUSES.has(value);
}

/** Returns the canonical status for a raw string, or null when unrecognised. */
export function parseStatus(value: string | null | undefined): TaskStatus | null {
    if (!value) return null;
    const normalized = value.trim().toUpperCase();
    return isTaskStatus(normalized) ? normalized : null;
}

export type Metadata = Record<string, unknown>;

/**
 * Durable record of a single run. result/metadata shapes are owned by the
 * caller; the tracker only stores them.
 */
export interface ExecutionRecord {
    taskId: string;
    taskName: string;
    module: string;
    status: TaskStatus;
    taskArgs: unknown[];
    taskKwargs: Record<string, unknown>;
    result: unknown;
    error: string | null;
    traceback: string | null;
    metadata: Metadata;
    createdBy: string | null;
    createdAt: Date;
    startedAt: Date | null;
    finishedAt: Date | null;
}

export interface RegisterInput {
    taskId: string;
    taskName: string;
    module: string;
    taskArgs?: unknown[];
    taskKwargs?: Record<string, unknown>;
    createdBy?: string | null;
    metadata?: Metadata;
    // Periodic jobs have no dispatcher, so they register already STARTED.
    initialStatus?: TaskStatus.PENDING | TaskStatus.STARTED;
}

export interface UpdatePatch {
    status: TaskStatus;
    result?: unknown;
    error?: string;
    traceback?: string;
    metadata?: Metadata;
}

export type UpdateSource = 'caller' | 'reconciler' | 'reaper';

export interface UpdateOptions {
    source?: UpdateSource;
    // Allows a caller to move a terminal record to a different status.
    override?: boolean;
}
