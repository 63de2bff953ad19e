export class NotFoundError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task execution ${taskId} not found`);
        this.name = 'NotFoundError';
    }
}
