import * as winston from 'winston';
import type { Logform } from 'winston';
import fs from 'fs';
import path from 'path';
import util from 'util';

export const OVERSIZE_THRESHOLD = 100_000; // bytes
export const CONSOLE_TRUNCATE_LENGTH = 1_000; // characters
export const OVERSIZE_MESSAGE = 'an oversized/invalid log message was received.';

const LOG_LEVEL = process.env.LOG_LEVEL || 'debug';
const LOG_FILE = process.env.LOG_FILE;

winston.addColors({
    info: 'cyan',
    debug: 'gray',
    error: 'red',
    warn: 'yellow'
});

export type LogInfo = Logform.TransformableInfo & {
    __serializedData?: string;
    zone?: string;
    data?: unknown;
    timestamp?: string;
};

/**
 * Type-aware serialization for the `data` attached to a log line.
 * Objects that JSON cannot represent fall back to util.inspect.
 */
export function serializeLogData(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === null) return 'null';
    if (data === undefined) return '';

    if (typeof data === 'number') {
        if (Number.isNaN(data)) return 'NaN';
        if (!Number.isFinite(data)) return data > 0 ? 'Infinity' : '-Infinity';
        return String(data);
    }

    if (typeof data === 'boolean' || typeof data === 'bigint') return String(data);
    if (typeof data === 'symbol') return data.toString();
    if (typeof data === 'function') return `<function:${data.name || 'anonymous'}>`;

    if (data instanceof Error) {
        return JSON.stringify({ name: data.name, message: data.message });
    }

    try {
        return JSON.stringify(data);
    } catch {
        return util.inspect(data, { depth: 2, breakLength: Infinity });
    }
}

function replaceWithOversizeError(info: LogInfo, stack: string, bytes: number): LogInfo {
    info.zone = 'logger';
    info.message = OVERSIZE_MESSAGE;
    info.data = { stack, bytes };
    info.level = 'error';
    delete info.__serializedData;
    return info;
}

// Serializes `data` once and swaps oversized payloads for an error entry
export const overflowGuard = winston.format((info: LogInfo) => {
    if (!Object.prototype.hasOwnProperty.call(info, 'data') || info.data === undefined) {
        return info;
    }

    let serialized: string;
    try {
        serialized = serializeLogData(info.data);
    } catch (err) {
        return replaceWithOversizeError(info, err instanceof Error && err.stack ? err.stack : String(err), 0);
    }

    const bytes = Buffer.byteLength(serialized, 'utf8');
    if (bytes > OVERSIZE_THRESHOLD) {
        const stack = new Error('Oversized log message').stack ?? '';
        return replaceWithOversizeError(info, stack, bytes);
    }

    info.__serializedData = serialized;
    return info;
});

export function formatDataForConsole(data: unknown): string {
    if (data === undefined) return '';

    let s: string;
    try {
        s = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
    } catch {
        s = String(data);
    }

    if (s.length > CONSOLE_TRUNCATE_LENGTH) {
        const bytes = Buffer.byteLength(s, 'utf8');
        return s.slice(0, CONSOLE_TRUNCATE_LENGTH) + ` ... <truncated ${bytes} bytes>`;
    }
    return s;
}

function dataOf(info: LogInfo): unknown {
    if (info.__serializedData !== undefined) return info.__serializedData;
    return Object.prototype.hasOwnProperty.call(info, 'data') ? info.data : undefined;
}

export function formatConsoleLine(info: LogInfo): string {
    const data = dataOf(info);
    const dataPart = data !== undefined ? ' ' + formatDataForConsole(data) : '';
    return `[${String(info.level)}][${info.zone ?? 'core'}] ${String(info.message)}${dataPart}`;
}

export function formatFileLine(info: LogInfo): string {
    const ts = info.timestamp || new Date().toISOString();
    const data = dataOf(info);
    const dataPart = data !== undefined ? ' ' + serializeLogData(data) : '';
    return `${ts} ${info.zone ?? 'core'} ${String(info.level).toUpperCase()}: ${String(info.message)}${dataPart}`;
}

export const consoleFormat = winston.format.combine(
    overflowGuard(),
    winston.format.colorize({ all: false }),
    winston.format.printf((info: LogInfo) => formatConsoleLine(info))
);

const fileFormat = winston.format.combine(
    overflowGuard(),
    winston.format.timestamp(),
    winston.format.printf((info: LogInfo) => formatFileLine(info))
);

function createTransports() {
    const consoleTransport = new winston.transports.Console({
        format: consoleFormat,
        silent: process.env.NODE_ENV === 'test'
    });
    if (!LOG_FILE) return [consoleTransport];

    try {
        fs.mkdirSync(path.dirname(LOG_FILE), { recursive: true });
    } catch (err) {
        // The logger is not up yet, so this is the one place console is used directly
        console.error('[logger] Cannot create log directory, continuing with console only:', err);
        return [consoleTransport];
    }
    return [consoleTransport, new winston.transports.File({ filename: LOG_FILE, format: fileFormat })];
}

export const baseLogger = winston.createLogger({
    level: LOG_LEVEL,
    transports: createTransports()
});
