export class AlreadyExistsError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task execution ${taskId} is already registered`);
        this.name = 'AlreadyExistsError';
    }
}
