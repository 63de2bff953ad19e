// Malformed request from a remote caller; maps to gRPC INVALID_ARGUMENT.
export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}
