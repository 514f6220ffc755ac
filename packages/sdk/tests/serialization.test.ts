import { serialize, snapshot, SerializationError } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should serialize primitives', () => {
        expect(serialize(123)).toBe('{"json":123}');
        expect(serialize('hello')).toBe('{"json":"hello"}');
        expect(serialize(null)).toBe('{"json":null}');
    });

    test('should keep dates and nested stage payloads intact in a snapshot', () => {
        const createdAt = new Date('2026-01-02T03:04:05.000Z');
        const input = {
            createdAt,
            stageOutputs: { extract: { title: 'Tide tables', images: ['https://example.test/a.png'] } },
        };
        const output = snapshot(input);

        expect(output.createdAt).not.toBe(createdAt);
        expect(output.createdAt).toBeInstanceOf(Date);
        expect(output.createdAt.toISOString()).toBe('2026-01-02T03:04:05.000Z');
        expect(output.stageOutputs.extract.images).toEqual(['https://example.test/a.png']);
    });

    test('should enforce 1MB size limit', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1); // > 1MB
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/Payload size exceeds maximum limit of 1.00MB/);
    });

    test('should honour a custom size limit', () => {
        expect(() => serialize('a'.repeat(2048), 1024)).toThrow(/maximum limit of 1.00KB/);
        expect(serialize('ok', 1024)).toBe('{"json":"ok"}');
    });

    test('should handle undefined', () => {
        expect(serialize(undefined)).toBe('');
    });

    test('snapshot returns a detached deep copy', () => {
        const original = { tags: ['a'], at: new Date(0) };
        const copy = snapshot(original);

        copy.tags.push('b');
        expect(original.tags).toEqual(['a']);
        expect(copy.at).toBeInstanceOf(Date);
        expect(copy.at.getTime()).toBe(0);
    });
});
