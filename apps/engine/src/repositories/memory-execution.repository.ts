import {
    ACTIVE_STATUSES,
    ExecutionRecord,
    RUNNING_STATUSES,
    RegisterInput,
    TaskStatus,
    UpdateOptions,
    UpdatePatch,
    isTerminal,
} from '@runledger/sdk';
import { AlreadyExistsError, NotFoundError } from '../errors';
import {
    ActiveCursor,
    Clock,
    DeleteExpiredOptions,
    ExecutionFilter,
    ExecutionStats,
    ExecutionStore,
    foldStats,
    systemClock,
} from './execution.store';
import { applyUpdate } from './transition';

const TAG = '[executions:memory]';

/**
 * Single-process ExecutionStore. Each call runs to completion before the
 * next one touches the map, which gives per-record atomicity for free.
 */
export class InMemoryExecutionRepository implements ExecutionStore {
    private readonly records = new Map<string, ExecutionRecord>();

    constructor(private readonly now: Clock = systemClock) { }

    async register(input: RegisterInput): Promise<ExecutionRecord> {
        if (this.records.has(input.taskId)) {
            console.warn(`${TAG} duplicate registration for task ${input.taskId}`);
            throw new AlreadyExistsError(input.taskId);
        }

        const createdAt = this.now();
        const status = input.initialStatus ?? TaskStatus.PENDING;
        const record: ExecutionRecord = {
            taskId: input.taskId,
            taskName: input.taskName,
            module: input.module,
            status,
            taskArgs: [...(input.taskArgs ?? [])],
            taskKwargs: { ...input.taskKwargs },
            result: null,
            error: null,
            traceback: null,
            metadata: { ...input.metadata },
            createdBy: input.createdBy ?? null,
            createdAt,
            startedAt: status === TaskStatus.STARTED ? createdAt : null,
            finishedAt: null,
        };
        this.records.set(record.taskId, record);
        return copy(record);
    }

    async update(taskId: string, patch: UpdatePatch, options: UpdateOptions = {}): Promise<ExecutionRecord> {
        const current = this.records.get(taskId);
        if (!current) throw new NotFoundError(taskId);

        const { record, outcome } = applyUpdate(current, patch, options, this.now());
        if (outcome === 'terminal_conflict') {
            console.warn(`${TAG} task ${taskId} is ${current.status}, ignoring ${patch.status} without override (metadata merged)`);
        }
        this.records.set(taskId, record);
        return copy(record);
    }

    async get(taskId: string): Promise<ExecutionRecord> {
        const record = this.records.get(taskId);
        if (!record) throw new NotFoundError(taskId);
        return copy(record);
    }

    async findActive(limit: number, after?: ActiveCursor): Promise<ExecutionRecord[]> {
        return this.sorted(byCreation)
            .filter(r => ACTIVE_STATUSES.includes(r.status) && (!after || byCreation(r, after) > 0))
            .slice(0, limit)
            .map(copy);
    }

    async findStale(cutoff: Date, limit: number): Promise<ExecutionRecord[]> {
        return [...this.records.values()]
            .filter(r => RUNNING_STATUSES.includes(r.status) && r.startedAt !== null && r.startedAt < cutoff)
            .sort((a, b) => (a.startedAt?.getTime() ?? 0) - (b.startedAt?.getTime() ?? 0))
            .slice(0, limit)
            .map(copy);
    }

    async deleteExpired({ cutoff, onlyCompleted, batchSize }: DeleteExpiredOptions): Promise<number> {
        const expired = this.sorted((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
            .filter(r => {
                if (isTerminal(r.status)) return (r.finishedAt ?? r.createdAt) < cutoff;
                return !onlyCompleted && r.createdAt < cutoff;
            })
            .slice(0, batchSize);

        for (const record of expired) {
            this.records.delete(record.taskId);
        }
        return expired.length;
    }

    async list(filter: ExecutionFilter = {}): Promise<ExecutionRecord[]> {
        const offset = filter.offset ?? 0;
        return this.sorted((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .filter(r => matches(r, filter))
            .slice(offset, offset + (filter.limit ?? 100))
            .map(copy);
    }

    async stats(filter: ExecutionFilter = {}): Promise<ExecutionStats> {
        return foldStats(
            [...this.records.values()]
                .filter(r => matches(r, filter))
                .map(r => ({ module: r.module, taskName: r.taskName, status: r.status, count: 1 })),
        );
    }

    get size(): number {
        return this.records.size;
    }

    private sorted(compare: (a: ExecutionRecord, b: ExecutionRecord) => number): ExecutionRecord[] {
        return [...this.records.values()].sort(compare);
    }
}

// created_at, then task_id as the tiebreak
function byCreation(a: ActiveCursor, b: ActiveCursor): number {
    const diff = a.createdAt.getTime() - b.createdAt.getTime();
    if (diff !== 0) return diff;
    if (a.taskId === b.taskId) return 0;
    return a.taskId < b.taskId ? -1 : 1;
}

function matches(record: ExecutionRecord, filter: ExecutionFilter): boolean {
    if (filter.module && record.module !== filter.module) return false;
    if (filter.taskName && record.taskName !== filter.taskName) return false;
    if (filter.status && record.status !== filter.status) return false;
    if (filter.createdBy && record.createdBy !== filter.createdBy) return false;
    if (filter.createdAfter && record.createdAt < filter.createdAfter) return false;
    if (filter.createdBefore && record.createdAt > filter.createdBefore) return false;
    return true;
}

function copy(record: ExecutionRecord): ExecutionRecord {
    return {
        ...record,
        taskArgs: [...record.taskArgs],
        taskKwargs: { ...record.taskKwargs },
        metadata: { ...record.metadata },
    };
}
