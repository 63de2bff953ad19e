// The status source reported something outside the six canonical statuses.
export class ReconciliationMismatchError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly reportedStatus: string,
    ) {
        super(`Unrecognised status "${reportedStatus}" reported for task ${taskId}`);
        this.name = 'ReconciliationMismatchError';
    }
}
