import { describe, it, expect } from 'vitest';
import {
    overflowGuard,
    formatDataForConsole,
    formatConsoleLine,
    formatFileLine,
    serializeLogData,
    OVERSIZE_THRESHOLD,
    OVERSIZE_MESSAGE,
    CONSOLE_TRUNCATE_LENGTH
} from '../../../src/logging/logger';
import type { LogInfo } from '../../../src/logging/logger';
import type { Logform } from 'winston';

function guard(info: LogInfo): Logform.TransformableInfo {
    const result = overflowGuard().transform(info);
    if (typeof result === 'boolean') throw new Error('overflowGuard dropped the entry');
    return result;
}

describe('logging/logger', () => {
    it('serializes values by type', () => {
        expect(serializeLogData('hello')).toBe('hello');
        expect(serializeLogData(null)).toBe('null');
        expect(serializeLogData(undefined)).toBe('');
        expect(serializeLogData(NaN)).toBe('NaN');
        expect(serializeLogData(-Infinity)).toBe('-Infinity');
        expect(serializeLogData(false)).toBe('false');
        expect(serializeLogData({ x: 1 })).toBe('{"x":1}');
        expect(serializeLogData(new TypeError('bad'))).toBe('{"name":"TypeError","message":"bad"}');
        expect(serializeLogData(function named() { /* noop */ })).toBe('<function:named>');
    });

    it('falls back to inspect for circular objects', () => {
        const circular: { self?: unknown } = {};
        circular.self = circular;
        expect(serializeLogData(circular)).toBe('<ref *1> { self: [Circular *1] }');
    });

    it('attaches the serialized data', () => {
        const info = guard({ level: 'info', message: 'm', data: { a: 1 } });

        expect(info.__serializedData).toBe('{"a":1}');
        expect(info.message).toBe('m');
    });

    it('leaves entries without data untouched', () => {
        const info = guard({ level: 'info', message: 'm' });
        expect(info.__serializedData).toBeUndefined();
        expect(info.zone).toBeUndefined();
    });

    it('replaces oversized data with a logger-level error', () => {
        const info = guard({ level: 'info', message: 'm', zone: 'wud', data: 'x'.repeat(OVERSIZE_THRESHOLD + 1) });

        expect(info.message).toBe(OVERSIZE_MESSAGE);
        expect(info.zone).toBe('logger');
        expect(info.level).toBe('error');
        expect(info.data).toMatchObject({ bytes: OVERSIZE_THRESHOLD + 1 });
        expect(info.__serializedData).toBeUndefined();
    });

    it('truncates long console data', () => {
        const formatted = formatDataForConsole('a'.repeat(5_000));
        expect(formatted).toBe('a'.repeat(CONSOLE_TRUNCATE_LENGTH) + ' ... <truncated 5000 bytes>');
    });

    it('formats console and file lines', () => {
        const info: LogInfo = {
            level: 'warn',
            message: 'rate limited',
            zone: 'wud.releaseNotes',
            timestamp: '2026-01-01T00:00:00.000Z',
            __serializedData: '{"apiUrl":"u"}'
        };

        expect(formatConsoleLine(info)).toBe('[warn][wud.releaseNotes] rate limited {"apiUrl":"u"}');
        expect(formatFileLine(info)).toBe('2026-01-01T00:00:00.000Z wud.releaseNotes WARN: rate limited {"apiUrl":"u"}');
    });

    it('uses the core zone when none is given', () => {
        expect(formatConsoleLine({ level: 'info', message: 'started' })).toBe('[info][core] started');
    });
});
