import { TaskStatus } from '@runledger/sdk';
import { InMemoryExecutionRepository } from '../../src/repositories/memory-execution.repository';
import { Reaper } from '../../src/services/reaper';
import { Reconciler } from '../../src/services/reconciler';
import { ManualClock, SECOND, manualClock } from '../helpers/clock';

describe('Reaper', () => {
    let clock: ManualClock;
    let store: InMemoryExecutionRepository;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        clock = manualClock('2026-03-01T10:00:00.000Z');
        store = new InMemoryExecutionRepository(clock.now);

        await store.register({ taskId: 'stuck', taskName: 'send_report', module: 'reports', initialStatus: TaskStatus.STARTED });
        await store.register({ taskId: 'done', taskName: 'send_report', module: 'reports', initialStatus: TaskStatus.STARTED });
        await store.update('done', { status: TaskStatus.SUCCESS, result: 'ok' });
        await store.register({ taskId: 'queued', taskName: 'send_report', module: 'reports' });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    function reaper(overrides: Partial<ConstructorParameters<typeof Reaper>[1]> = {}): Reaper {
        return new Reaper(store, { timeoutSeconds: 600, batchSize: 100, now: clock.now, ...overrides });
    }

    it('fails everything started before now when the timeout is 0', async () => {
        clock.advance(SECOND);

        const result = await reaper().reap(0);

        expect(result).toEqual({
            scanned: 1,
            failed: 1,
            recovered: 0,
            errors: 0,
            cutoff: new Date('2026-03-01T10:00:01.000Z'),
            timeoutSeconds: 0,
            skipped: false,
        });
        await expect(store.get('stuck')).resolves.toMatchObject({
            status: TaskStatus.FAILURE,
            error: 'Task timeout (exceeded 0 seconds, started before 2026-03-01T10:00:01.000Z)',
            finishedAt: new Date('2026-03-01T10:00:01.000Z'),
        });
        await expect(store.get('done')).resolves.toMatchObject({ status: TaskStatus.SUCCESS, result: 'ok', error: null });
        await expect(store.get('queued')).resolves.toMatchObject({ status: TaskStatus.PENDING });
    });

    it('leaves runs younger than the timeout alone', async () => {
        clock.advance(300 * SECOND);

        const result = await reaper().reap();

        expect(result.scanned).toBe(0);
        expect(result.timeoutSeconds).toBe(600);
        await expect(store.get('stuck')).resolves.toMatchObject({ status: TaskStatus.STARTED });
    });

    it('prefers the stored override over the configured timeout', async () => {
        const getNumber = jest.fn().mockResolvedValue(60);
        clock.advance(61 * SECOND);

        const result = await reaper({ overrides: { getNumber } }).reap();

        expect(getNumber).toHaveBeenCalledWith('timeout_seconds');
        expect(result).toMatchObject({ scanned: 1, failed: 1, timeoutSeconds: 60 });
        await expect(store.get('stuck')).resolves.toMatchObject({
            error: 'Task timeout (exceeded 60 seconds, started before 2026-03-01T10:00:01.000Z)',
        });
    });

    it('skips with invalid_timeout for a negative timeout', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        const result = await reaper().reap(-1);

        expect(result).toMatchObject({ skipped: true, reason: 'invalid_timeout', scanned: 0, timeoutSeconds: -1 });
        await expect(store.get('stuck')).resolves.toMatchObject({ status: TaskStatus.STARTED });
    });

    it('also reaps RETRY runs and respects the batch size', async () => {
        await store.register({ taskId: 'retrying', taskName: 'send_report', module: 'reports', initialStatus: TaskStatus.STARTED });
        await store.update('retrying', { status: TaskStatus.RETRY });
        clock.advance(SECOND);

        const first = await reaper({ batchSize: 1 }).reap(0);
        const second = await reaper({ batchSize: 1 }).reap(0);

        expect([first.failed, second.failed]).toEqual([1, 1]);
        await expect(store.get('retrying')).resolves.toMatchObject({ status: TaskStatus.FAILURE });
        await expect(store.get('stuck')).resolves.toMatchObject({ status: TaskStatus.FAILURE });
    });

    it('records the real outcome when the status check finds the run finished', async () => {
        const lookup = jest.fn().mockResolvedValue({ status: 'SUCCESS', result: { rows: 3 } });
        clock.advance(SECOND);

        const result = await reaper({ reconciler: new Reconciler(store, { lookup }) }).reap(0);

        expect(result).toMatchObject({ scanned: 1, failed: 0, recovered: 1 });
        await expect(store.get('stuck')).resolves.toMatchObject({ status: TaskStatus.SUCCESS, result: { rows: 3 }, error: null });
    });

    it('reaps anyway when the status check fails', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const lookup = jest.fn().mockRejectedValue(new Error('result backend unreachable'));
        clock.advance(SECOND);

        const result = await reaper({ reconciler: new Reconciler(store, { lookup }) }).reap(0);

        expect(result).toMatchObject({ scanned: 1, failed: 1, recovered: 0 });
    });

    it('counts per-record failures and keeps going', async () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        await store.register({ taskId: 'stuck-2', taskName: 'send_report', module: 'reports', initialStatus: TaskStatus.STARTED });
        clock.advance(SECOND);
        const update = store.update.bind(store);
        jest.spyOn(store, 'update').mockImplementation(async (taskId, patch, options) => {
            if (taskId === 'stuck') throw new Error('row is broken');
            return update(taskId, patch, options);
        });

        const result = await reaper().reap(0);

        expect(result).toMatchObject({ scanned: 2, failed: 1, errors: 1 });
        await expect(store.get('stuck-2')).resolves.toMatchObject({ status: TaskStatus.FAILURE });
    });
});
