import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import path from 'path';

export const PROTO_DIR = path.resolve(__dirname, '../../proto');
export const TRACKER_PROTO_PATH = path.join(PROTO_DIR, 'tracker.service.proto');
export const HEALTH_PROTO_PATH = path.join(PROTO_DIR, 'health.service.proto');

export const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

// Message shapes as proto-loader decodes them (keepCase, defaults on).
export interface RegisterTaskRequest {
    task_id: string;
    task_name: string;
    module: string;
    initial_status: string;
    task_args: Buffer;
    task_kwargs: Buffer;
    metadata: Buffer;
    created_by: string;
}

export interface UpdateTaskRequest {
    task_id: string;
    status: string;
    result: Buffer;
    error: string;
    traceback: string;
    metadata: Buffer;
    override: boolean;
}

export interface GetTaskRequest {
    task_id: string;
    sync: boolean;
}

export interface TaskRecordMessage {
    task_id: string;
    task_name: string;
    module: string;
    status: string;
    task_args: Buffer;
    task_kwargs: Buffer;
    result: Buffer;
    error: string;
    traceback: string;
    metadata: Buffer;
    created_by: string;
    created_at: string;
    started_at: string;
    finished_at: string;
}

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';
}

type GrpcNode = grpc.GrpcObject[string];

/** Walks a loaded package definition down to a service constructor, e.g. "runledger.TrackerService". */
export function resolveService(root: grpc.GrpcObject, servicePath: string): grpc.ServiceClientConstructor {
    let node: GrpcNode = root;
    for (const part of servicePath.split('.')) {
        if (typeof node === 'function' || 'format' in node) {
            throw new Error(`"${servicePath}" does not resolve to a service`);
        }
        const next: GrpcNode | undefined = node[part];
        if (!next) {
            throw new Error(`"${servicePath}" not found in proto definition`);
        }
        node = next;
    }
    if (typeof node !== 'function') {
        throw new Error(`"${servicePath}" is not a service`);
    }
    return node;
}

export function loadTrackerService(): grpc.ServiceClientConstructor {
    const def = protoLoader.loadSync(TRACKER_PROTO_PATH, protoOptions);
    return resolveService(grpc.loadPackageDefinition(def), 'runledger.TrackerService');
}

export function loadHealthService(): grpc.ServiceClientConstructor {
    const def = protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions);
    return resolveService(grpc.loadPackageDefinition(def), 'grpc.health.v1.Health');
}
