import {
    ExecutionRecord,
    Metadata,
    TaskStatus,
    UpdateOptions,
    UpdatePatch,
    isTerminal,
} from '@runledger/sdk';

export type TransitionOutcome =
    | 'applied'
    // janitor update against a terminal record: nothing written
    | 'terminal_sticky'
    // caller tried to move a terminal record elsewhere without override
    | 'terminal_conflict';

export interface TransitionResult {
    record: ExecutionRecord;
    outcome: TransitionOutcome;
}

/**
 * Pure merge-update shared by every ExecutionStore backend.
 *
 * - started_at is stamped on the first move into STARTED, finished_at on the
 *   first move into a terminal status; neither is rewritten afterwards.
 * - result/error/traceback overwrite only when supplied.
 * - metadata merges per top-level key; nested values are replaced whole.
 * - terminal status is sticky for the reconciler and the reaper.
 */
export function applyUpdate(
    current: ExecutionRecord,
    patch: UpdatePatch,
    options: UpdateOptions,
    now: Date,
): TransitionResult {
    const source = options.source ?? 'caller';

    if (isTerminal(current.status)) {
        if (source !== 'caller') {
            return { record: current, outcome: 'terminal_sticky' };
        }
        if (patch.status !== current.status && !options.override) {
            const record = { ...current, metadata: mergeMetadata(current.metadata, patch.metadata) };
            return { record, outcome: 'terminal_conflict' };
        }
    }

    const next: ExecutionRecord = {
        ...current,
        status: patch.status,
        metadata: mergeMetadata(current.metadata, patch.metadata),
    };

    if (patch.status === TaskStatus.STARTED && !next.startedAt) {
        next.startedAt = now;
    }
    if (isTerminal(patch.status)) {
        next.finishedAt ??= now;
    } else if (isTerminal(current.status)) {
        // explicit re-open
        next.finishedAt = null;
    }

    if (patch.result !== undefined) next.result = patch.result;
    if (patch.error !== undefined) next.error = patch.error;
    if (patch.traceback !== undefined) next.traceback = patch.traceback;

    return { record: next, outcome: 'applied' };
}

export function mergeMetadata(current: Metadata, incoming: Metadata | undefined): Metadata {
    if (!incoming) return { ...current };
    return { ...current, ...incoming };
}
