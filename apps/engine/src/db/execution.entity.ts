import { ExecutionRecord, deserialize, isPlainObject, parseStatus, serialize } from '@runledger/sdk';

/**
 * Row shape of task_executions as pg returns it (jsonb parsed, timestamptz as Date).
 * result is stored as superjson text so Dates/Maps in caller payloads survive.
 */
export type ExecutionRow = {
    task_id: string;
    task_name: string;
    module: string;
    status: string;
    task_args: unknown;
    task_kwargs: unknown;
    result: string | null;
    error: string | null;
    traceback: string | null;
    metadata: unknown;
    created_by: string | null;
    created_at: Date;
    started_at: Date | null;
    finished_at: Date | null;
};

export function toRecord(row: ExecutionRow): ExecutionRecord {
    const status = parseStatus(row.status);
    if (!status) {
        throw new Error(`task_executions row ${row.task_id} has invalid status "${row.status}"`);
    }

    return {
        taskId: row.task_id,
        taskName: row.task_name,
        module: row.module,
        status,
        taskArgs: Array.isArray(row.task_args) ? row.task_args : [],
        taskKwargs: isPlainObject(row.task_kwargs) ? row.task_kwargs : {},
        result: row.result === null ? null : deserialize<unknown>(row.result) ?? null,
        error: row.error,
        traceback: row.traceback,
        metadata: isPlainObject(row.metadata) ? row.metadata : {},
        createdBy: row.created_by,
        createdAt: row.created_at,
        startedAt: row.started_at,
        finishedAt: row.finished_at,
    };
}

export function encodeResult(result: unknown): string | null {
    return result === null || result === undefined ? null : serialize(result);
}
