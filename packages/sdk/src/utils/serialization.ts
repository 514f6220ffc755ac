import superjson from 'superjson';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_SIZE): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > maxBytes) {
        throw new SerializationError(
            `Payload size exceeds maximum limit of ${formatSize(maxBytes)}. Current size: ${formatSize(size)}`
        );
    }

    return stringified;
}

// Deep copy that keeps Dates and Maps intact; callers get a value they can't use to mutate the original.
export function snapshot<T>(value: T): T {
    return superjson.parse<T>(superjson.stringify(value));
}

function formatSize(bytes: number): string {
    return bytes >= 1024 * 1024
        ? `${(bytes / 1024 / 1024).toFixed(2)}MB`
        : `${(bytes / 1024).toFixed(2)}KB`;
}
