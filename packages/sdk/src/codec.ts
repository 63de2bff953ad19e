import { ExecutionRecord, parseStatus } from './types';
import { TaskRecordMessage } from './proto';
import { SerializationError, deserialize, parseJsonObject, serialize } from './utils/serialization';

// ExecutionRecord <-> TaskRecord wire message. Shared by the engine's gRPC
// service and the SDK client so both ends agree on payload encodings.

export function toRecordMessage(record: ExecutionRecord): TaskRecordMessage {
    return {
        task_id: record.taskId,
        task_name: record.taskName,
        module: record.module,
        status: record.status,
        task_args: Buffer.from(JSON.stringify(record.taskArgs)),
        task_kwargs: Buffer.from(JSON.stringify(record.taskKwargs)),
        result: Buffer.from(record.result === null ? '' : serialize(record.result)),
        error: record.error ?? '',
        traceback: record.traceback ?? '',
        metadata: Buffer.from(JSON.stringify(record.metadata)),
        created_by: record.createdBy ?? '',
        created_at: record.createdAt.toISOString(),
        started_at: record.startedAt?.toISOString() ?? '',
        finished_at: record.finishedAt?.toISOString() ?? '',
    };
}

export function fromRecordMessage(message: TaskRecordMessage): ExecutionRecord {
    const status = parseStatus(message.status);
    if (!status) {
        throw new SerializationError(`Unknown status "${message.status}" for task ${message.task_id}`);
    }

    return {
        taskId: message.task_id,
        taskName: message.task_name,
        module: message.module,
        status,
        taskArgs: parseJsonArray(bufferText(message.task_args)),
        taskKwargs: parseJsonObject(bufferText(message.task_kwargs)) ?? {},
        result: deserialize<unknown>(bufferText(message.result)) ?? null,
        error: message.error || null,
        traceback: message.traceback || null,
        metadata: parseJsonObject(bufferText(message.metadata)) ?? {},
        createdBy: message.created_by || null,
        createdAt: new Date(message.created_at),
        startedAt: message.started_at ? new Date(message.started_at) : null,
        finishedAt: message.finished_at ? new Date(message.finished_at) : null,
    };
}

export function bufferText(value: Buffer | null | undefined): string {
    return value ? value.toString('utf-8') : '';
}

export function parseJsonArray(value: string): unknown[] {
    if (value.trim() === '') return [];

    let parsed: unknown;
    try {
        parsed = JSON.parse(value);
    } catch (err) {
        throw new SerializationError(`Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!Array.isArray(parsed)) {
        throw new SerializationError('Expected a JSON array');
    }
    return parsed;
}
