import { SqlClient, SqlPool } from './index';

const TAG = '[tx]';

/**
 * Runs a callback inside a database transaction on a dedicated client.
 * Commits on success, rolls back on error.
 */
export class TransactionManager {
    constructor(private readonly pool: SqlPool) { }

    /**
     * @returns Result from the callback
     * @throws Re-throws any error from the callback after rollback
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('SELECT * FROM task_executions WHERE task_id = $1 FOR UPDATE', [id]);
     *   await client.query('UPDATE task_executions SET status = $2 WHERE task_id = $1', [id, status]);
     * });
     */
    async run<T>(callback: (client: SqlClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackErr) {
                // the original error is the one worth surfacing
                console.error(`${TAG} rollback failed:`, rollbackErr);
            }
            throw e;
        } finally {
            client.release();
        }
    }
}
