import { TaskStatus, isTerminal } from '@runledger/sdk';
import { ConfigOverrides } from '../repositories/config.repository';
import { Clock, ExecutionStore, systemClock } from '../repositories/execution.store';
import { Reconciler } from './reconciler';

const TAG = '[reaper]';

export interface ReaperOptions {
    timeoutSeconds: number;
    batchSize: number;
    overrides?: ConfigOverrides;
    // fresh-status check before failing a run; skipped when absent
    reconciler?: Reconciler;
    now?: Clock;
}

export interface ReapResult {
    scanned: number;
    failed: number;
    recovered: number;
    errors: number;
    cutoff: Date;
    timeoutSeconds: number;
    skipped: boolean;
    reason?: 'invalid_timeout';
}

// Fails runs stuck in STARTED/RETRY past the deadline, e.g. after a worker
// died without reporting. Terminal status is sticky against the reaper, so a
// run that finished in the meantime keeps its real outcome.
export class Reaper {
    private readonly now: Clock;

    constructor(
        private readonly store: ExecutionStore,
        private readonly options: ReaperOptions,
    ) {
        this.now = options.now ?? systemClock;
    }

    async reap(timeoutSeconds?: number): Promise<ReapResult> {
        const timeout = timeoutSeconds ?? await this.resolveTimeout();
        const now = this.now();

        if (!Number.isFinite(timeout) || timeout < 0) {
            console.warn(`${TAG} timeoutSeconds=${timeout} is invalid, skipping`);
            return { scanned: 0, failed: 0, recovered: 0, errors: 0, cutoff: now, timeoutSeconds: timeout, skipped: true, reason: 'invalid_timeout' };
        }

        const cutoff = new Date(now.getTime() - timeout * 1000);
        const message = `Task timeout (exceeded ${timeout} seconds, started before ${cutoff.toISOString()})`;
        const stale = await this.store.findStale(cutoff, this.options.batchSize);

        const result: ReapResult = { scanned: stale.length, failed: 0, recovered: 0, errors: 0, cutoff, timeoutSeconds: timeout, skipped: false };

        for (const record of stale) {
            try {
                if (await this.finishedElsewhere(record.taskId)) {
                    result.recovered++;
                    continue;
                }

                const updated = await this.store.update(
                    record.taskId,
                    { status: TaskStatus.FAILURE, error: message },
                    { source: 'reaper' },
                );
                if (updated.status === TaskStatus.FAILURE && updated.error === message) {
                    result.failed++;
                } else {
                    result.recovered++;
                }
            } catch (err) {
                result.errors++;
                console.error(`${TAG} failed to reap task ${record.taskId}:`, err);
            }
        }

        if (stale.length > 0) {
            console.log(
                `${TAG} scanned=${result.scanned} failed=${result.failed} recovered=${result.recovered} ` +
                `errors=${result.errors} cutoff=${cutoff.toISOString()}`,
            );
        }
        return result;
    }

    private async resolveTimeout(): Promise<number> {
        const override = await this.options.overrides?.getNumber('timeout_seconds');
        return override ?? this.options.timeoutSeconds;
    }

    // Best effort: a failed lookup must not stop the run from being reaped.
    private async finishedElsewhere(taskId: string): Promise<boolean> {
        if (!this.options.reconciler) return false;
        try {
            const outcome = await this.options.reconciler.syncOne(taskId);
            return outcome.action === 'updated' && isTerminal(outcome.to);
        } catch (err) {
            console.warn(`${TAG} status check for task ${taskId} failed, reaping anyway:`, err);
            return false;
        }
    }
}
