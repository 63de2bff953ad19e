import {
    ACTIVE_STATUSES,
    ExecutionRecord,
    RUNNING_STATUSES,
    RegisterInput,
    TERMINAL_STATUSES,
    TaskStatus,
    UpdateOptions,
    UpdatePatch,
    parseStatus,
} from '@runledger/sdk';
import { QueryResult, QueryResultRow } from 'pg';
import { SqlPool } from '../db';
import { ExecutionRow, encodeResult, toRecord } from '../db/execution.entity';
import { TransactionManager } from '../db/transaction.manager';
import { AlreadyExistsError, NotFoundError, toStoreError } from '../errors';
import {
    ActiveCursor,
    Clock,
    DeleteExpiredOptions,
    ExecutionFilter,
    ExecutionStats,
    ExecutionStore,
    StatusGroup,
    foldStats,
    systemClock,
} from './execution.store';
import { applyUpdate } from './transition';

const TAG = '[executions]';

type StatusGroupRow = {
    module: string;
    task_name: string;
    status: string;
    count: number;
};

export class PgExecutionRepository implements ExecutionStore {
    private readonly tx: TransactionManager;

    constructor(
        private readonly pool: SqlPool,
        private readonly now: Clock = systemClock,
    ) {
        this.tx = new TransactionManager(pool);
    }

    async register(input: RegisterInput): Promise<ExecutionRecord> {
        const createdAt = this.now();
        const status = input.initialStatus ?? TaskStatus.PENDING;

        const res = await this.query<ExecutionRow>(
            `INSERT INTO task_executions
                (task_id, task_name, module, status, task_args, task_kwargs, metadata, created_by, created_at, started_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
             ON CONFLICT (task_id) DO NOTHING
             RETURNING *`,
            [
                input.taskId,
                input.taskName,
                input.module,
                status,
                JSON.stringify(input.taskArgs ?? []),
                JSON.stringify(input.taskKwargs ?? {}),
                JSON.stringify(input.metadata ?? {}),
                input.createdBy ?? null,
                createdAt,
                status === TaskStatus.STARTED ? createdAt : null,
            ],
        );

        const row = res.rows[0];
        if (!row) {
            console.warn(`${TAG} duplicate registration for task ${input.taskId}`);
            throw new AlreadyExistsError(input.taskId);
        }
        console.log(`${TAG} registered task ${input.taskId} (${input.taskName}, module=${input.module})`);
        return toRecord(row);
    }

    async update(taskId: string, patch: UpdatePatch, options: UpdateOptions = {}): Promise<ExecutionRecord> {
        try {
            return await this.tx.run(async (client) => {
                const res = await client.query<ExecutionRow>(
                    'SELECT * FROM task_executions WHERE task_id = $1 FOR UPDATE',
                    [taskId],
                );
                const row = res.rows[0];
                if (!row) throw new NotFoundError(taskId);

                const current = toRecord(row);
                const { record, outcome } = applyUpdate(current, patch, options, this.now());

                if (outcome === 'terminal_sticky') return current;
                if (outcome === 'terminal_conflict') {
                    console.warn(
                        `${TAG} task ${taskId} is ${current.status}, ignoring ${patch.status} without override (metadata merged)`,
                    );
                }

                await client.query(
                    `UPDATE task_executions
                     SET status = $2, started_at = $3, finished_at = $4,
                         result = $5, error = $6, traceback = $7, metadata = $8
                     WHERE task_id = $1`,
                    [
                        taskId,
                        record.status,
                        record.startedAt,
                        record.finishedAt,
                        encodeResult(record.result),
                        record.error,
                        record.traceback,
                        JSON.stringify(record.metadata),
                    ],
                );

                if (current.status !== record.status) {
                    console.log(`${TAG} task ${taskId} (${record.taskName}) ${current.status} -> ${record.status}`);
                }
                return record;
            });
        } catch (err) {
            throw toStoreError('postgres', err);
        }
    }

    async get(taskId: string): Promise<ExecutionRecord> {
        const res = await this.query<ExecutionRow>('SELECT * FROM task_executions WHERE task_id = $1', [taskId]);
        const row = res.rows[0];
        if (!row) throw new NotFoundError(taskId);
        return toRecord(row);
    }

    async findActive(limit: number, after?: ActiveCursor): Promise<ExecutionRecord[]> {
        if (!after) {
            const res = await this.query<ExecutionRow>(
                `SELECT * FROM task_executions
                 WHERE status = ANY($1)
                 ORDER BY created_at ASC, task_id ASC
                 LIMIT $2`,
                [ACTIVE_STATUSES, limit],
            );
            return res.rows.map(toRecord);
        }

        const res = await this.query<ExecutionRow>(
            `SELECT * FROM task_executions
             WHERE status = ANY($1)
               AND (created_at, task_id) > ($2, $3)
             ORDER BY created_at ASC, task_id ASC
             LIMIT $4`,
            [ACTIVE_STATUSES, after.createdAt, after.taskId, limit],
        );
        return res.rows.map(toRecord);
    }

    async findStale(cutoff: Date, limit: number): Promise<ExecutionRecord[]> {
        const res = await this.query<ExecutionRow>(
            `SELECT * FROM task_executions
             WHERE status = ANY($1)
               AND started_at IS NOT NULL
               AND started_at < $2
             ORDER BY started_at ASC
             LIMIT $3`,
            [RUNNING_STATUSES, cutoff, limit],
        );
        return res.rows.map(toRecord);
    }

    // Terminal rows age by finished_at, orphans by created_at. One bounded
    // batch per call so no statement holds row locks for long.
    async deleteExpired({ cutoff, onlyCompleted, batchSize }: DeleteExpiredOptions): Promise<number> {
        const res = await this.query(
            `DELETE FROM task_executions
             WHERE task_id IN (
                 SELECT task_id FROM task_executions
                 WHERE (status = ANY($1) AND COALESCE(finished_at, created_at) < $2)
                    OR ($3 AND NOT (status = ANY($1)) AND created_at < $2)
                 ORDER BY created_at ASC
                 LIMIT $4
             )`,
            [TERMINAL_STATUSES, cutoff, !onlyCompleted, batchSize],
        );
        return res.rowCount ?? 0;
    }

    async list(filter: ExecutionFilter = {}): Promise<ExecutionRecord[]> {
        const { where, values } = buildWhere(filter);
        values.push(filter.limit ?? 100, filter.offset ?? 0);

        const res = await this.query<ExecutionRow>(
            `SELECT * FROM task_executions ${where}
             ORDER BY created_at DESC
             LIMIT $${values.length - 1} OFFSET $${values.length}`,
            values,
        );
        return res.rows.map(toRecord);
    }

    async stats(filter: ExecutionFilter = {}): Promise<ExecutionStats> {
        const { where, values } = buildWhere(filter);

        const res = await this.query<StatusGroupRow>(
            `SELECT module, task_name, status, COUNT(*)::int AS count
             FROM task_executions ${where}
             GROUP BY module, task_name, status`,
            values,
        );

        const groups: StatusGroup[] = [];
        for (const row of res.rows) {
            const status = parseStatus(row.status);
            if (!status) continue;
            groups.push({ module: row.module, taskName: row.task_name, status, count: row.count });
        }
        return foldStats(groups);
    }

    private async query<R extends QueryResultRow = ExecutionRow>(text: string, values: unknown[]): Promise<QueryResult<R>> {
        try {
            return await this.pool.query<R>(text, values);
        } catch (err) {
            throw toStoreError('postgres', err);
        }
    }
}

function buildWhere(filter: ExecutionFilter): { where: string; values: unknown[] } {
    const clauses: string[] = [];
    const values: unknown[] = [];
    const add = (sql: string, value: unknown) => {
        values.push(value);
        clauses.push(sql.replace('?', `$${values.length}`));
    };

    if (filter.module) add('module = ?', filter.module);
    if (filter.taskName) add('task_name = ?', filter.taskName);
    if (filter.status) add('status = ?', filter.status);
    if (filter.createdBy) add('created_by = ?', filter.createdBy);
    if (filter.createdAfter) add('created_at >= ?', filter.createdAfter);
    if (filter.createdBefore) add('created_at <= ?', filter.createdBefore);

    return { where: clauses.length ? `WHERE ${clauses.join(' AND ')}` : '', values };
}
