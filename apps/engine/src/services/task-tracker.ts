import { ExecutionRecord, RegisterInput, UpdateOptions, UpdatePatch, isTerminal } from '@runledger/sdk';
import { ExecutionFilter, ExecutionStats, ExecutionStore } from '../repositories/execution.store';
import { Reconciler } from './reconciler';

const TAG = '[tracker]';

export interface GetOptions {
    // refresh from the status source before reading
    sync?: boolean;
}

/** Entry point for callers: the record store plus sync-on-read. */
export class TaskTracker {
    constructor(
        private readonly store: ExecutionStore,
        private readonly reconciler?: Reconciler,
    ) { }

    register(input: RegisterInput): Promise<ExecutionRecord> {
        return this.store.register(input);
    }

    update(taskId: string, patch: UpdatePatch, options?: UpdateOptions): Promise<ExecutionRecord> {
        return this.store.update(taskId, patch, options);
    }

    async get(taskId: string, options: GetOptions = {}): Promise<ExecutionRecord> {
        const record = await this.store.get(taskId);
        if (!options.sync || !this.reconciler || isTerminal(record.status)) return record;

        try {
            const outcome = await this.reconciler.syncOne(taskId);
            if (outcome.action !== 'updated') return record;
        } catch (err) {
            console.warn(`${TAG} sync of task ${taskId} failed, returning stored record:`, err);
            return record;
        }
        return this.store.get(taskId);
    }

    list(filter?: ExecutionFilter): Promise<ExecutionRecord[]> {
        return this.store.list(filter);
    }

    stats(filter?: ExecutionFilter): Promise<ExecutionStats> {
        return this.store.stats(filter);
    }
}
