import superjson from 'superjson';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

// Result payloads are opaque to the tracker; superjson keeps Dates, Maps and
// Sets intact across the store and the wire.
export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);

        if (Buffer.byteLength(stringified) > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 1MB. Current size: ${(Buffer.byteLength(stringified) / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/** Parses a JSON object payload (metadata, kwargs); anything else is rejected. */
export function parseJsonObject(value: string | null | undefined): Record<string, unknown> | undefined {
    if (!value || value.trim() === '') return undefined;

    let parsed: unknown;
    try {
        parsed = JSON.parse(value);
    } catch (err) {
        throw new SerializationError(`Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isPlainObject(parsed)) {
        throw new SerializationError('Expected a JSON object');
    }
    return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
