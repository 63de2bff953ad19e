import { ConfigError } from '../errors';
import { ConfigOverrides } from '../repositories/config.repository';
import { Clock, ExecutionStore, systemClock } from '../repositories/execution.store';

const TAG = '[cleaner]';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface CleanerOptions {
    retentionDays: number;
    onlyCompleted: boolean;
    batchSize: number;
    overrides?: ConfigOverrides;
    now?: Clock;
}

export interface CleanupResult {
    deletedCount: number;
    cutoff: Date;
    retentionDays: number;
    onlyCompleted: boolean;
    batches: number;
    skipped: boolean;
    reason?: 'invalid_retention_days';
}

/**
 * Deletes records past retention, one bounded batch at a time until a batch
 * comes back short. Terminal records age from finished_at; with
 * onlyCompleted=false, non-terminal orphans older than the cutoff go too.
 */
export class RetentionCleaner {
    private readonly now: Clock;

    constructor(
        private readonly store: ExecutionStore,
        private readonly options: CleanerOptions,
    ) {
        if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
            throw new ConfigError(`cleaner batchSize must be a positive integer, got ${options.batchSize}`);
        }
        this.now = options.now ?? systemClock;
    }

    async cleanup(retentionDays?: number, onlyCompleted: boolean = this.options.onlyCompleted): Promise<CleanupResult> {
        const days = retentionDays ?? await this.resolveRetention();
        const now = this.now();

        if (!Number.isFinite(days) || days < 0) {
            console.warn(`${TAG} retentionDays=${days} is invalid, skipping`);
            return { deletedCount: 0, cutoff: now, retentionDays: days, onlyCompleted, batches: 0, skipped: true, reason: 'invalid_retention_days' };
        }

        const cutoff = new Date(now.getTime() - days * DAY_MS);
        const { batchSize } = this.options;
        let deletedCount = 0;
        let batches = 0;

        for (;;) {
            const deleted = await this.store.deleteExpired({ cutoff, onlyCompleted, batchSize });
            batches++;
            deletedCount += deleted;
            if (deleted < batchSize) break;
        }

        if (deletedCount > 0) {
            console.log(`${TAG} deleted ${deletedCount} records in ${batches} batches (cutoff=${cutoff.toISOString()}, onlyCompleted=${onlyCompleted})`);
        }
        return { deletedCount, cutoff, retentionDays: days, onlyCompleted, batches, skipped: false };
    }

    private async resolveRetention(): Promise<number> {
        const override = await this.options.overrides?.getNumber('retention_days');
        return override ?? this.options.retentionDays;
    }
}
