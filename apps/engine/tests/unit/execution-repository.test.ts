import { TERMINAL_STATUSES, TaskStatus } from '@runledger/sdk';
import { toRecord } from '../../src/db/execution.entity';
import { AlreadyExistsError, NotFoundError, TransientStoreError } from '../../src/errors';
import { PgExecutionRepository } from '../../src/repositories/execution.repository';
import { manualClock } from '../helpers/clock';
import { createFakePool, executionRow, pgError } from '../helpers/db';

describe('PgExecutionRepository', () => {
    const NOW = new Date('2026-03-01T10:05:00.000Z');
    let fake: ReturnType<typeof createFakePool>;
    let repo: PgExecutionRepository;

    beforeEach(() => {
        fake = createFakePool();
        repo = new PgExecutionRepository(fake.pool, manualClock(NOW.toISOString()).now);
    });

    describe('register', () => {
        it('inserts a PENDING row and maps it back', async () => {
            fake.pool.query.mockResolvedValue({ rows: [executionRow({ task_args: [1], created_at: NOW })], rowCount: 1 });

            const record = await repo.register({
                taskId: 't1', taskName: 'send_report', module: 'reports', taskArgs: [1],
            });

            const [sql, values] = fake.pool.query.mock.calls[0];
            expect(sql).toContain('ON CONFLICT (task_id) DO NOTHING');
            expect(values).toEqual(['t1', 'send_report', 'reports', 'PENDING', '[1]', '{}', '{}', null, NOW, null]);
            expect(record.taskId).toBe('t1');
            expect(record.taskArgs).toEqual([1]);
        });

        it('stamps started_at for a STARTED registration', async () => {
            fake.pool.query.mockResolvedValue({ rows: [executionRow({ status: 'STARTED' })], rowCount: 1 });

            await repo.register({ taskId: 'j1', taskName: 'cleanup', module: 'runledger', initialStatus: TaskStatus.STARTED });

            const values = fake.pool.query.mock.calls[0][1];
            expect(values[3]).toBe('STARTED');
            expect(values[9]).toEqual(NOW);
        });

        it('throws AlreadyExistsError when the insert hits an existing id', async () => {
            fake.pool.query.mockResolvedValue({ rows: [], rowCount: 0 });

            await expect(repo.register({ taskId: 't1', taskName: 'send_report', module: 'reports' }))
                .rejects.toBeInstanceOf(AlreadyExistsError);
        });
    });

    describe('update', () => {
        function scriptTransaction(row: ReturnType<typeof executionRow> | null) {
            fake.client.query.mockImplementation(async (sql: string) => {
                if (sql.startsWith('SELECT')) return { rows: row ? [row] : [], rowCount: row ? 1 : 0 };
                return { rows: [], rowCount: 1 };
            });
        }

        function statements(): string[] {
            return fake.client.query.mock.calls.map(call => String(call[0]).trim().split(/\s+/)[0]);
        }

        it('locks the row, writes the merged record and commits', async () => {
            scriptTransaction(executionRow({ status: 'STARTED', started_at: new Date('2026-03-01T10:01:00.000Z'), metadata: { a: 1 } }));

            const record = await repo.update('t1', { status: TaskStatus.SUCCESS, result: { n: 1 }, metadata: { b: 2 } });

            expect(statements()).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'COMMIT']);
            expect(fake.client.query.mock.calls[1][0]).toContain('FOR UPDATE');
            expect(fake.client.query.mock.calls[2][1]).toEqual([
                't1',
                'SUCCESS',
                new Date('2026-03-01T10:01:00.000Z'),
                NOW,
                '{"json":{"n":1}}',
                null,
                null,
                '{"a":1,"b":2}',
            ]);
            expect(fake.client.release).toHaveBeenCalledTimes(1);

            expect(record.status).toBe(TaskStatus.SUCCESS);
            expect(record.finishedAt).toEqual(NOW);
            expect(record.metadata).toEqual({ a: 1, b: 2 });
        });

        it('writes nothing when a janitor hits a terminal record', async () => {
            scriptTransaction(executionRow({ status: 'SUCCESS', finished_at: NOW }));

            const record = await repo.update('t1', { status: TaskStatus.FAILURE, error: 'timeout' }, { source: 'reaper' });

            expect(statements()).toEqual(['BEGIN', 'SELECT', 'COMMIT']);
            expect(record.status).toBe(TaskStatus.SUCCESS);
            expect(record.error).toBeNull();
        });

        it('rolls back and throws NotFoundError for an unknown id', async () => {
            scriptTransaction(null);

            await expect(repo.update('nope', { status: TaskStatus.STARTED })).rejects.toBeInstanceOf(NotFoundError);
            expect(statements()).toEqual(['BEGIN', 'SELECT', 'ROLLBACK']);
            expect(fake.client.release).toHaveBeenCalledTimes(1);
        });

        it('wraps a dropped connection as TransientStoreError', async () => {
            fake.pool.connect.mockRejectedValue(pgError('Connection terminated unexpectedly', 'ECONNRESET'));

            await expect(repo.update('t1', { status: TaskStatus.STARTED })).rejects.toBeInstanceOf(TransientStoreError);
        });
    });

    describe('reads', () => {
        it('throws NotFoundError when get finds no row', async () => {
            fake.pool.query.mockResolvedValue({ rows: [], rowCount: 0 });

            await expect(repo.get('nope')).rejects.toBeInstanceOf(NotFoundError);
        });

        it('wraps admin shutdown errors as TransientStoreError', async () => {
            fake.pool.query.mockRejectedValue(pgError('terminating connection due to administrator command', '57P01'));

            await expect(repo.get('t1')).rejects.toBeInstanceOf(TransientStoreError);
        });

        it('leaves constraint errors alone', async () => {
            const violation = pgError('duplicate key value violates unique constraint', '23505');
            fake.pool.query.mockRejectedValue(violation);

            await expect(repo.get('t1')).rejects.toBe(violation);
        });

        it('queries stale runs by started_at with a limit', async () => {
            fake.pool.query.mockResolvedValue({ rows: [executionRow({ status: 'STARTED', started_at: NOW })], rowCount: 1 });
            const cutoff = new Date('2026-03-01T10:00:00.000Z');

            const stale = await repo.findStale(cutoff, 25);

            expect(fake.pool.query.mock.calls[0][1]).toEqual([['STARTED', 'RETRY'], cutoff, 25]);
            expect(stale.map(r => r.status)).toEqual([TaskStatus.STARTED]);
        });

        it('pages active runs with a (created_at, task_id) cursor', async () => {
            fake.pool.query.mockResolvedValue({ rows: [], rowCount: 0 });

            await repo.findActive(50);
            await repo.findActive(50, { createdAt: NOW, taskId: 't7' });

            const [[firstSql, firstValues], [nextSql, nextValues]] = fake.pool.query.mock.calls;
            expect(firstSql).toContain('ORDER BY created_at ASC, task_id ASC');
            expect(firstValues).toEqual([['PENDING', 'STARTED', 'RETRY'], 50]);
            expect(nextSql).toContain('AND (created_at, task_id) > ($2, $3)');
            expect(nextValues).toEqual([['PENDING', 'STARTED', 'RETRY'], NOW, 't7', 50]);
        });

        it('builds list filters with positional parameters', async () => {
            fake.pool.query.mockResolvedValue({ rows: [], rowCount: 0 });

            await repo.list({ module: 'billing', status: TaskStatus.SUCCESS, limit: 10 });

            const [sql, values] = fake.pool.query.mock.calls[0];
            expect(sql).toContain('WHERE module = $1 AND status = $2');
            expect(sql).toContain('LIMIT $3 OFFSET $4');
            expect(values).toEqual(['billing', 'SUCCESS', 10, 0]);
        });

        it('folds grouped counts into stats and skips unknown statuses', async () => {
            fake.pool.query.mockResolvedValue({
                rows: [
                    { module: 'billing', task_name: 'sync_invoices', status: 'SUCCESS', count: 2 },
                    { module: 'billing', task_name: 'refund', status: 'FAILURE', count: 1 },
                    { module: 'billing', task_name: 'refund', status: 'LOST', count: 4 },
                ],
                rowCount: 3,
            });

            const stats = await repo.stats();

            expect(stats.total).toBe(3);
            expect(stats[TaskStatus.SUCCESS]).toBe(2);
            expect(stats[TaskStatus.FAILURE]).toBe(1);
            expect(stats.byModule.billing.total).toBe(3);
            expect(stats.byTaskName.refund).toMatchObject({ total: 1, FAILURE: 1 });
        });
    });

    describe('deleteExpired', () => {
        it('deletes one bounded batch and returns the row count', async () => {
            fake.pool.query.mockResolvedValue({ rows: [], rowCount: 7 });
            const cutoff = new Date('2025-09-01T00:00:00.000Z');

            await expect(repo.deleteExpired({ cutoff, onlyCompleted: true, batchSize: 100 })).resolves.toBe(7);

            const [sql, values] = fake.pool.query.mock.calls[0];
            expect(sql).toContain('LIMIT $4');
            expect(values).toEqual([TERMINAL_STATUSES, cutoff, false, 100]);
        });

        it('includes orphans when onlyCompleted is false', async () => {
            fake.pool.query.mockResolvedValue({ rows: [], rowCount: null });

            await expect(repo.deleteExpired({ cutoff: NOW, onlyCompleted: false, batchSize: 5 })).resolves.toBe(0);
            expect(fake.pool.query.mock.calls[0][1][2]).toBe(true);
        });
    });
});

describe('toRecord', () => {
    it('rejects a row with an unknown status', () => {
        expect(() => toRecord(executionRow({ status: 'LOST' }))).toThrow('invalid status "LOST"');
    });

    it('decodes superjson results and normalises bad json columns', () => {
        const record = toRecord(executionRow({
            result: '{"json":"2026-01-01T00:00:00.000Z","meta":{"values":["Date"]}}',
            task_args: 'not-an-array',
            metadata: null,
        }));

        expect(record.result).toEqual(new Date('2026-01-01T00:00:00.000Z'));
        expect(record.taskArgs).toEqual([]);
        expect(record.metadata).toEqual({});
    });
});
