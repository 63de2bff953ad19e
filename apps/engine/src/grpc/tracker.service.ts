import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import {
    GetTaskRequest,
    RegisterInput,
    RegisterTaskRequest,
    SerializationError,
    TaskRecordMessage,
    TaskStatus,
    UpdatePatch,
    UpdateTaskRequest,
    bufferText,
    deserialize,
    parseJsonArray,
    parseJsonObject,
    parseStatus,
    toRecordMessage,
} from '@runledger/sdk';
import { AlreadyExistsError, InvalidArgumentError, NotFoundError, TransientStoreError } from '../errors';
import { TaskTracker } from '../services/task-tracker';

const TAG = '[TrackerService]';

// Handlers only read the request off the call.
export type UnaryRequest<Req> = Pick<ServerUnaryCall<Req, TaskRecordMessage>, 'request'>;

/**
 * gRPC surface over TaskTracker so workers in other processes can register
 * runs and report progress. Payload bytes follow the encodings declared in
 * tracker.service.proto.
 */
export class TrackerServiceImpl {
    constructor(private readonly tracker: TaskTracker) { }

    async registerTask(
        call: UnaryRequest<RegisterTaskRequest>,
        callback: sendUnaryData<TaskRecordMessage>,
    ) {
        try {
            const record = await this.tracker.register(toRegisterInput(call.request));
            callback(null, toRecordMessage(record));
        } catch (error) {
            this.fail('registerTask', error, callback);
        }
    }

    async updateTask(
        call: UnaryRequest<UpdateTaskRequest>,
        callback: sendUnaryData<TaskRecordMessage>,
    ) {
        try {
            const { task_id, override } = call.request;
            requireTaskId(task_id);
            const record = await this.tracker.update(task_id, toPatch(call.request), { override });
            callback(null, toRecordMessage(record));
        } catch (error) {
            this.fail('updateTask', error, callback);
        }
    }

    async getTask(
        call: UnaryRequest<GetTaskRequest>,
        callback: sendUnaryData<TaskRecordMessage>,
    ) {
        try {
            const { task_id, sync } = call.request;
            requireTaskId(task_id);
            const record = await this.tracker.get(task_id, { sync });
            callback(null, toRecordMessage(record));
        } catch (error) {
            this.fail('getTask', error, callback);
        }
    }

    private fail(method: string, error: unknown, callback: sendUnaryData<TaskRecordMessage>) {
        const code = statusFor(error);
        if (code === grpc.status.INTERNAL || code === grpc.status.UNAVAILABLE) {
            console.error(`${TAG} ${method} error:`, error);
        }
        callback({
            code,
            message: error instanceof Error ? error.message : 'Unknown error',
        });
    }
}

export function statusFor(error: unknown): grpc.status {
    if (error instanceof AlreadyExistsError) return grpc.status.ALREADY_EXISTS;
    if (error instanceof NotFoundError) return grpc.status.NOT_FOUND;
    if (error instanceof InvalidArgumentError || error instanceof SerializationError) return grpc.status.INVALID_ARGUMENT;
    if (error instanceof TransientStoreError) return grpc.status.UNAVAILABLE;
    return grpc.status.INTERNAL;
}

function requireTaskId(taskId: string) {
    if (!taskId) throw new InvalidArgumentError('task_id is required');
}

function toRegisterInput(req: RegisterTaskRequest): RegisterInput {
    requireTaskId(req.task_id);
    if (!req.task_name || !req.module) {
        throw new InvalidArgumentError('task_name and module are required');
    }

    let initialStatus: RegisterInput['initialStatus'];
    if (req.initial_status) {
        const status = parseStatus(req.initial_status);
        if (status !== TaskStatus.PENDING && status !== TaskStatus.STARTED) {
            throw new InvalidArgumentError(`initial_status must be PENDING or STARTED, got "${req.initial_status}"`);
        }
        initialStatus = status;
    }

    return {
        taskId: req.task_id,
        taskName: req.task_name,
        module: req.module,
        initialStatus,
        taskArgs: parseJsonArray(bufferText(req.task_args)),
        taskKwargs: parseJsonObject(bufferText(req.task_kwargs)) ?? {},
        metadata: parseJsonObject(bufferText(req.metadata)) ?? {},
        createdBy: req.created_by || null,
    };
}

function toPatch(req: UpdateTaskRequest): UpdatePatch {
    const status = parseStatus(req.status);
    if (!status) {
        throw new InvalidArgumentError(`unknown status "${req.status}"`);
    }

    const patch: UpdatePatch = { status };
    const result = bufferText(req.result);
    if (result) patch.result = deserialize<unknown>(result) ?? null;
    if (req.error) patch.error = req.error;
    if (req.traceback) patch.traceback = req.traceback;
    const metadata = parseJsonObject(bufferText(req.metadata));
    if (metadata) patch.metadata = metadata;
    return patch;
}
