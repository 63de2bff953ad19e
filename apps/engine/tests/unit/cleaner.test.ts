import { TaskStatus } from '@runledger/sdk';
import { ConfigError } from '../../src/errors';
import { InMemoryExecutionRepository } from '../../src/repositories/memory-execution.repository';
import { RetentionCleaner } from '../../src/services/cleaner';
import { DAY, ManualClock, manualClock } from '../helpers/clock';

describe('RetentionCleaner', () => {
    let clock: ManualClock;
    let store: InMemoryExecutionRepository;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        clock = manualClock('2026-02-28T10:00:00.000Z');
        store = new InMemoryExecutionRepository(clock.now);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    function cleaner(overrides: Partial<ConstructorParameters<typeof RetentionCleaner>[1]> = {}): RetentionCleaner {
        return new RetentionCleaner(store, { retentionDays: 180, onlyCompleted: true, batchSize: 100, now: clock.now, ...overrides });
    }

    async function finished(taskId: string, status = TaskStatus.SUCCESS): Promise<void> {
        await store.register({ taskId, taskName: 'send_report', module: 'reports' });
        await store.update(taskId, { status });
    }

    it('with retention 0 and onlyCompleted removes yesterday\'s finished runs only', async () => {
        await finished('old-success');
        await finished('old-revoked', TaskStatus.REVOKED);
        await store.register({ taskId: 'old-started', taskName: 'send_report', module: 'reports', initialStatus: TaskStatus.STARTED });
        await store.register({ taskId: 'old-pending', taskName: 'send_report', module: 'reports' });
        clock.advance(DAY);

        const result = await cleaner().cleanup(0);

        expect(result).toEqual({
            deletedCount: 2,
            cutoff: new Date('2026-03-01T10:00:00.000Z'),
            retentionDays: 0,
            onlyCompleted: true,
            batches: 1,
            skipped: false,
        });
        await expect(store.get('old-started')).resolves.toMatchObject({ status: TaskStatus.STARTED });
        await expect(store.get('old-pending')).resolves.toMatchObject({ status: TaskStatus.PENDING });
        expect(store.size).toBe(2);
    });

    it.each([0, -1, 2.5])('rejects batchSize %p', (batchSize) => {
        expect(() => cleaner({ batchSize })).toThrow(ConfigError);
    });

    it('removes old non-terminal orphans when onlyCompleted is off', async () => {
        await finished('old-success');
        await store.register({ taskId: 'old-pending', taskName: 'send_report', module: 'reports' });
        clock.advance(DAY);

        const result = await cleaner({ onlyCompleted: false }).cleanup(0);

        expect(result.deletedCount).toBe(2);
        expect(store.size).toBe(0);
    });

    it('deletes in batches until a short batch', async () => {
        for (let i = 0; i < 4; i++) await finished(`t${i}`);
        clock.advance(DAY);

        const result = await cleaner({ batchSize: 2 }).cleanup(0);

        expect(result).toMatchObject({ deletedCount: 4, batches: 3 });
    });

    it('keeps records inside the retention window', async () => {
        await finished('recent');
        clock.advance(10 * DAY);

        const result = await cleaner().cleanup();

        expect(result).toMatchObject({ deletedCount: 0, retentionDays: 180, batches: 1 });
        expect(store.size).toBe(1);
    });

    it('prefers the stored retention override', async () => {
        const getNumber = jest.fn().mockResolvedValue(30);
        await finished('month-old');
        clock.advance(31 * DAY);

        const result = await cleaner({ overrides: { getNumber } }).cleanup();

        expect(getNumber).toHaveBeenCalledWith('retention_days');
        expect(result).toMatchObject({ deletedCount: 1, retentionDays: 30 });
    });

    it('skips with invalid_retention_days for a negative retention', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        await finished('old-success');
        clock.advance(DAY);

        const result = await cleaner().cleanup(-1);

        expect(result).toMatchObject({ skipped: true, reason: 'invalid_retention_days', deletedCount: 0, batches: 0 });
        expect(store.size).toBe(1);
    });
});
