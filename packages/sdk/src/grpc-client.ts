import * as grpc from '@grpc/grpc-js';
import { fromRecordMessage } from './codec';
import {
    GetTaskRequest,
    RegisterTaskRequest,
    TaskRecordMessage,
    UpdateTaskRequest,
    loadTrackerService,
} from './proto';
import { ExecutionRecord, RegisterInput, UpdateOptions, UpdatePatch } from './types';
import { serialize } from './utils/serialization';

type GrpcCallback<T> = (err: grpc.ServiceError | null, res?: T) => void;

function rpc<T>(fn: (cb: GrpcCallback<T>) => void): Promise<T> {
    return new Promise((resolve, reject) => {
        fn((err, res) => {
            if (err) return reject(err);
            if (res === undefined) return reject(new Error('empty gRPC response'));
            resolve(res);
        });
    });
}

/** The subset of the generated TrackerService client the SDK calls. */
export interface TrackerRpc {
    registerTask(req: RegisterTaskRequest, cb: GrpcCallback<TaskRecordMessage>): unknown;
    updateTask(req: UpdateTaskRequest, cb: GrpcCallback<TaskRecordMessage>): unknown;
    getTask(req: GetTaskRequest, cb: GrpcCallback<TaskRecordMessage>): unknown;
    close(): void;
}

export interface TrackerClient {
    register(input: RegisterInput): Promise<ExecutionRecord>;
    update(taskId: string, patch: UpdatePatch, options?: Pick<UpdateOptions, 'override'>): Promise<ExecutionRecord>;
    get(taskId: string, options?: { sync?: boolean }): Promise<ExecutionRecord>;
    close(): void;
}

// Workers in other processes report their progress through this client.
export function createTrackerClient(client: TrackerRpc): TrackerClient {
    return {
        register: (input) =>
            rpc<TaskRecordMessage>(cb => client.registerTask({
                task_id: input.taskId,
                task_name: input.taskName,
                module: input.module,
                initial_status: input.initialStatus ?? '',
                task_args: Buffer.from(JSON.stringify(input.taskArgs ?? [])),
                task_kwargs: Buffer.from(JSON.stringify(input.taskKwargs ?? {})),
                metadata: Buffer.from(JSON.stringify(input.metadata ?? {})),
                created_by: input.createdBy ?? '',
            }, cb)).then(fromRecordMessage),

        update: (taskId, patch, options) =>
            rpc<TaskRecordMessage>(cb => client.updateTask({
                task_id: taskId,
                status: patch.status,
                result: Buffer.from(patch.result === undefined ? '' : serialize(patch.result)),
                error: patch.error ?? '',
                traceback: patch.traceback ?? '',
                metadata: Buffer.from(patch.metadata ? JSON.stringify(patch.metadata) : ''),
                override: options?.override ?? false,
            }, cb)).then(fromRecordMessage),

        get: (taskId, options) =>
            rpc<TaskRecordMessage>(cb => client.getTask({ task_id: taskId, sync: options?.sync ?? false }, cb))
                .then(fromRecordMessage),

        close: () => client.close(),
    };
}

export function isTrackerRpc(client: object): client is TrackerRpc {
    return 'registerTask' in client && typeof client.registerTask === 'function'
        && 'updateTask' in client && typeof client.updateTask === 'function'
        && 'getTask' in client && typeof client.getTask === 'function'
        && 'close' in client && typeof client.close === 'function';
}

export function connectTracker(
    address: string,
    credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): TrackerClient {
    const TrackerService = loadTrackerService();
    const client = new TrackerService(address, credentials);
    if (!isTrackerRpc(client)) {
        throw new Error('TrackerService client is missing expected methods');
    }
    return createTrackerClient(client);
}
