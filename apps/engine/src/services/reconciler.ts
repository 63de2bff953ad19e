import { TaskStatus, UpdatePatch, isTerminal, parseStatus } from '@runledger/sdk';
import { ConfigError, ReconciliationMismatchError } from '../errors';
import { ActiveCursor, ExecutionStore } from '../repositories/execution.store';
import { StatusSource } from './status-source';

const TAG = '[reconciler]';

export type SyncOutcome =
    | { taskId: string; action: 'updated'; from: TaskStatus; to: TaskStatus }
    | { taskId: string; action: 'unchanged'; status: TaskStatus }
    | { taskId: string; action: 'skipped'; reason: 'terminal' | 'no_information' | 'unknown_status' };

export interface ReconcileSummary {
    synced: number;
    updated: number;
    unchanged: number;
    skipped: number;
    failed: number;
}

// Folds the dispatcher's view of each run into the store. Never writes when
// nothing changed and never touches a terminal record.
export class Reconciler {
    constructor(
        private readonly store: ExecutionStore,
        private readonly source: StatusSource,
        private readonly batchSize: number = 500,
    ) {
        assertBatchSize(batchSize);
    }

    async syncOne(taskId: string): Promise<SyncOutcome> {
        const current = await this.store.get(taskId);
        if (isTerminal(current.status)) {
            return { taskId, action: 'skipped', reason: 'terminal' };
        }

        const external = await this.source.lookup(taskId);
        if (!external) {
            return { taskId, action: 'skipped', reason: 'no_information' };
        }

        const status = parseStatus(external.status);
        if (!status) {
            const mismatch = new ReconciliationMismatchError(taskId, external.status);
            console.warn(`${TAG} ${mismatch.message}, skipping`);
            return { taskId, action: 'skipped', reason: 'unknown_status' };
        }
        if (status === current.status) {
            return { taskId, action: 'unchanged', status };
        }

        const patch: UpdatePatch = { status };
        if (external.result !== undefined && external.result !== null) patch.result = external.result;
        if (external.error) patch.error = external.error;
        if (external.traceback) patch.traceback = external.traceback;

        const updated = await this.store.update(taskId, patch, { source: 'reconciler' });
        if (updated.status !== status) {
            // a terminal status landed between our read and the update
            return { taskId, action: 'skipped', reason: 'terminal' };
        }

        console.log(`${TAG} task ${taskId} ${current.status} -> ${status}`);
        return { taskId, action: 'updated', from: current.status, to: status };
    }

    // Walks every non-terminal record in (created_at, task_id) pages, so old
    // records the source knows nothing about cannot hide newer ones.
    async reconcileAll(batchSize: number = this.batchSize): Promise<ReconcileSummary> {
        assertBatchSize(batchSize);
        const summary: ReconcileSummary = { synced: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };

        let after: ActiveCursor | undefined;
        for (;;) {
            const page = await this.store.findActive(batchSize, after);
            summary.synced += page.length;

            for (const record of page) {
                try {
                    const outcome = await this.syncOne(record.taskId);
                    summary[outcome.action]++;
                } catch (err) {
                    summary.failed++;
                    console.error(`${TAG} failed to sync task ${record.taskId}:`, err);
                }
            }

            const last = page[page.length - 1];
            if (!last || page.length < batchSize) break;
            after = { createdAt: last.createdAt, taskId: last.taskId };
        }

        if (summary.updated > 0 || summary.failed > 0) {
            console.log(
                `${TAG} synced=${summary.synced} updated=${summary.updated} unchanged=${summary.unchanged} ` +
                `skipped=${summary.skipped} failed=${summary.failed}`,
            );
        }
        return summary;
    }
}

function assertBatchSize(batchSize: number): void {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
        throw new ConfigError(`reconciler batchSize must be a positive integer, got ${batchSize}`);
    }
}
