import { Locker, TaskStatus, UpdatePatch, withDuplicateGuard } from '@runledger/sdk';
import { v7 as uuid } from 'uuid';
import { ExecutionStore } from '../repositories/execution.store';
import { Sleep, retryTransient } from '../utils/backoff';

export const JANITOR_MODULE = 'runledger';

export interface JanitorOptions<T> {
    // lock name and the task_name of the run records this janitor writes
    name: string;
    intervalMs: number;
    lockTtlMs: number;
    maxRetries: number;
    pass: () => Promise<T>;
    workerId?: string;
    sleep?: Sleep;
}

export type JanitorTick<T> =
    | { status: 'completed'; runId: string; value: T }
    | { status: 'skipped'; reason: 'task_already_running' | 'previous_tick_running' }
    | { status: 'failed'; error: unknown };

/**
 * Timer-driven housekeeping pass (reconcile, reap, cleanup). Each tick:
 * - skips if the previous tick of this janitor is still in flight,
 * - runs under the duplicate guard so one instance in the cluster does the pass,
 * - records itself as a STARTED run and finishes it SUCCESS or FAILURE,
 * - retries TransientStoreError with backoff up to maxRetries.
 */
export class PeriodicJanitor<T> {
    private readonly tag: string;
    private intervalHandle: NodeJS.Timeout | null = null;
    private inFlight: Promise<JanitorTick<T>> | null = null;
    private readonly guardedPass: () => Promise<JanitorTick<T>>;

    constructor(
        private readonly locker: Locker,
        private readonly store: ExecutionStore,
        private readonly options: JanitorOptions<T>,
    ) {
        this.tag = `[janitor:${options.name}]`;

        const guarded = withDuplicateGuard(
            this.locker,
            { name: options.name, ttlMs: options.lockTtlMs },
            () => this.recordedPass(),
        );
        this.guardedPass = async () => {
            const outcome = await guarded();
            if (outcome.status === 'skipped') return { status: 'skipped', reason: outcome.reason };
            return outcome.value;
        };
    }

    start(): void {
        if (this.intervalHandle) {
            console.warn(`${this.tag} already running`);
            return;
        }
        console.log(`${this.tag} started (interval: ${this.options.intervalMs}ms)`);

        // Fire immediately, then on schedule
        this.schedule();
        this.intervalHandle = setInterval(() => this.schedule(), this.options.intervalMs);
    }

    async stop(): Promise<void> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        if (this.inFlight) await this.inFlight;
        console.log(`${this.tag} stopped`);
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    async tick(): Promise<JanitorTick<T>> {
        if (this.inFlight) {
            console.warn(`${this.tag} previous tick still running, skipping`);
            return { status: 'skipped', reason: 'previous_tick_running' };
        }

        this.inFlight = this.guardedPass().catch((error: unknown): JanitorTick<T> => {
            console.error(`${this.tag} tick failed:`, error);
            return { status: 'failed', error };
        });
        try {
            return await this.inFlight;
        } finally {
            this.inFlight = null;
        }
    }

    private schedule(): void {
        this.tick().catch(err => console.error(`${this.tag} unexpected tick error:`, err));
    }

    private async recordedPass(): Promise<JanitorTick<T>> {
        const runId = uuid();
        const retry = { maxRetries: this.options.maxRetries, sleep: this.options.sleep };

        await retryTransient(() => this.store.register({
            taskId: runId,
            taskName: this.options.name,
            module: JANITOR_MODULE,
            createdBy: this.options.workerId ?? `janitor-${process.pid}`,
            initialStatus: TaskStatus.STARTED,
        }), { ...retry, label: `${this.options.name} register` });

        let value: T;
        try {
            value = await retryTransient(this.options.pass, { ...retry, label: this.options.name });
        } catch (err) {
            await this.finish(runId, {
                status: TaskStatus.FAILURE,
                error: err instanceof Error ? err.message : String(err),
                traceback: err instanceof Error ? err.stack : undefined,
            });
            throw err;
        }

        await this.finish(runId, { status: TaskStatus.SUCCESS, result: value });
        return { status: 'completed', runId, value };
    }

    // The pass already happened; failing to record its end only costs bookkeeping.
    private async finish(runId: string, patch: UpdatePatch): Promise<void> {
        try {
            await retryTransient(() => this.store.update(runId, patch), {
                maxRetries: this.options.maxRetries,
                sleep: this.options.sleep,
                label: `${this.options.name} finish`,
            });
        } catch (err) {
            console.error(`${this.tag} could not record the end of run ${runId}:`, err);
        }
    }
}
