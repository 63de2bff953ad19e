import {
    ExecutionRecord,
    RegisterInput,
    TaskStatus,
    UpdateOptions,
    UpdatePatch,
} from '@runledger/sdk';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface ExecutionFilter {
    module?: string;
    taskName?: string;
    status?: TaskStatus;
    createdBy?: string;
    createdAfter?: Date;
    createdBefore?: Date;
    limit?: number;
    offset?: number;
}

export type StatusCounts = { total: number } & Record<TaskStatus, number>;

export interface ExecutionStats extends StatusCounts {
    byModule: Record<string, StatusCounts>;
    byTaskName: Record<string, StatusCounts>;
}

// Position of the last record a page returned; the next page starts after it.
export interface ActiveCursor {
    createdAt: Date;
    taskId: string;
}

export interface DeleteExpiredOptions {
    cutoff: Date;
    // false also removes non-terminal orphans older than cutoff
    onlyCompleted: boolean;
    batchSize: number;
}

/**
 * Durable execution records. Implementations must make every update atomic
 * per record; concurrent updates resolve last-write-wins per scalar field and
 * per metadata key.
 */
export interface ExecutionStore {
    /** @throws AlreadyExistsError when taskId is taken; the stored record is untouched */
    register(input: RegisterInput): Promise<ExecutionRecord>;
    /** @throws NotFoundError */
    update(taskId: string, patch: UpdatePatch, options?: UpdateOptions): Promise<ExecutionRecord>;
    /** @throws NotFoundError */
    get(taskId: string): Promise<ExecutionRecord>;
    /** Non-terminal records ordered by (created_at, task_id), strictly after `after` when given. */
    findActive(limit: number, after?: ActiveCursor): Promise<ExecutionRecord[]>;
    /** STARTED/RETRY records whose started_at is before cutoff, oldest first. */
    findStale(cutoff: Date, limit: number): Promise<ExecutionRecord[]>;
    /** Deletes at most one batch; returns how many rows went. */
    deleteExpired(options: DeleteExpiredOptions): Promise<number>;
    list(filter?: ExecutionFilter): Promise<ExecutionRecord[]>;
    stats(filter?: ExecutionFilter): Promise<ExecutionStats>;
}

export interface StatusGroup {
    module: string;
    taskName: string;
    status: TaskStatus;
    count: number;
}

export function emptyCounts(): StatusCounts {
    return {
        total: 0,
        [TaskStatus.PENDING]: 0,
        [TaskStatus.STARTED]: 0,
        [TaskStatus.SUCCESS]: 0,
        [TaskStatus.FAILURE]: 0,
        [TaskStatus.RETRY]: 0,
        [TaskStatus.REVOKED]: 0,
    };
}

export function foldStats(groups: StatusGroup[]): ExecutionStats {
    const stats: ExecutionStats = { ...emptyCounts(), byModule: {}, byTaskName: {} };

    for (const group of groups) {
        const byModule = stats.byModule[group.module] ??= emptyCounts();
        const byName = stats.byTaskName[group.taskName] ??= emptyCounts();
        for (const counts of [stats, byModule, byName]) {
            counts.total += group.count;
            counts[group.status] += group.count;
        }
    }
    return stats;
}
