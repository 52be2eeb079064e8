import superjson from 'superjson';
import { TaskMetadata } from '../types';

const MAX_METADATA_SIZE = 64 * 1024; // 64KB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

function assertWithinLimit(size: number): void {
    if (size > MAX_METADATA_SIZE) {
        throw new SerializationError(
            `Metadata exceeds maximum size of 64KB. Current size: ${(size / 1024).toFixed(1)}KB`
        );
    }
}

const isPlainRecord = (value: unknown): value is TaskMetadata =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Encodes a task's metadata bag for transport. Dates, Maps, Sets and bigints
 * survive the round trip; an empty bag encodes to an empty string.
 */
export function encodeMetadata(metadata: TaskMetadata): string {
    if (Object.keys(metadata).length === 0) return '';

    let encoded: string;
    try {
        encoded = superjson.stringify(metadata);
    } catch (err) {
        throw new SerializationError(`Failed to encode metadata: ${err instanceof Error ? err.message : String(err)}`);
    }

    assertWithinLimit(Buffer.byteLength(encoded));
    return encoded;
}

export function decodeMetadata(raw: string | null | undefined): TaskMetadata {
    if (!raw || raw.trim() === '') return {};
    assertWithinLimit(Buffer.byteLength(raw));

    let decoded: unknown;
    try {
        decoded = superjson.parse<unknown>(raw);
    } catch (err) {
        throw new SerializationError(`Failed to decode metadata: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!isPlainRecord(decoded)) {
        throw new SerializationError('Metadata must decode to an object');
    }
    return decoded;
}
