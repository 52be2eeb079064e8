import { encodeMetadata, decodeMetadata, SerializationError } from '../src/utils/serialization';

describe('Metadata serialization', () => {
    test('should round-trip plain values', () => {
        const metadata = { root: 'C:/Users/test/Downloads', recursive: true, depth: 3 };
        expect(decodeMetadata(encodeMetadata(metadata))).toEqual(metadata);
    });

    test('should preserve dates, maps and sets', () => {
        const scannedAt = new Date('2026-03-01T12:00:00.000Z');
        const extensions = new Map([['.tmp', 12], ['.log', 4]]);
        const skipped = new Set(['thumbs.db']);

        const output = decodeMetadata(encodeMetadata({ scannedAt, extensions, skipped }));

        expect(output.scannedAt).toBeInstanceOf(Date);
        expect(output.scannedAt).toEqual(scannedAt);
        expect(output.extensions).toBeInstanceOf(Map);
        expect(output.extensions).toEqual(extensions);
        expect(output.skipped).toBeInstanceOf(Set);
        expect(output.skipped).toEqual(skipped);
    });

    test('should encode an empty bag as an empty string', () => {
        expect(encodeMetadata({})).toBe('');
        expect(decodeMetadata('')).toEqual({});
        expect(decodeMetadata(undefined)).toEqual({});
    });

    test('should enforce the 64KB size limit', () => {
        const metadata = { blob: 'a'.repeat(64 * 1024 + 1) };
        expect(() => encodeMetadata(metadata)).toThrow(SerializationError);
        expect(() => encodeMetadata(metadata)).toThrow(/Metadata exceeds maximum size of 64KB/);
    });

    test('should enforce the size limit when decoding', () => {
        const raw = JSON.stringify({ json: { blob: 'a'.repeat(100 * 1024) } });
        expect(() => decodeMetadata(raw)).toThrow(SerializationError);
        expect(() => decodeMetadata(raw)).toThrow(/Metadata exceeds maximum size of 64KB/);
    });

    test('should reject malformed input', () => {
        expect(() => decodeMetadata('not json')).toThrow(/Failed to decode metadata/);
    });

    test('should reject payloads that are not objects', () => {
        expect(() => decodeMetadata(JSON.stringify({ json: [1, 2] }))).toThrow('Metadata must decode to an object');
    });
});
