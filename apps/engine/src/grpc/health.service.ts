import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { HealthCheckRequest, HealthCheckResponse } from '@runledger/sdk';
import { SqlQueryable } from '../db';

export interface Pingable {
    ping(): Promise<string>;
}

/**
 * Standard gRPC health check.
 * SERVING only when both Postgres and Redis answer.
 */
export class HealthService {
    constructor(
        private readonly db: SqlQueryable,
        private readonly redis: Pingable,
    ) { }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ) {
        try {
            await this.db.query('SELECT 1');
            await this.redis.ping();
            callback(null, { status: 'SERVING' });
        } catch (error) {
            console.error('[health] check failed:', error);
            callback(null, { status: 'NOT_SERVING' });
        }
    }
}
