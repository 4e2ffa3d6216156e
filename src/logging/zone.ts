import { baseLogger } from './logger';

/* Usage:
 * const log = zone("wud.coordinator");
 * log.info({ message: "Refresh finished", data: { containers: 4 } });
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogPayload = {
    message: string;
    data?: unknown;
    /** When true, data will be replaced with "<private>" */
    private?: boolean;
};

export type ZoneLogger = Record<LogLevel, (payload: string | LogPayload) => void>;

export function zone(name: string): ZoneLogger {
    function createLogFn(level: LogLevel) {
        return (payload: string | LogPayload) => {
            if (typeof payload === 'string') {
                baseLogger.log(level, payload, { zone: name });
                return;
            }

            const { message, data, private: isPrivate } = payload;
            if (data === undefined && !isPrivate) {
                baseLogger.log(level, message, { zone: name });
                return;
            }
            baseLogger.log(level, message, { zone: name, data: isPrivate ? '<private>' : data });
        };
    }

    return {
        error: createLogFn('error'),
        warn: createLogFn('warn'),
        info: createLogFn('info'),
        debug: createLogFn('debug')
    };
}

/** Render an unknown thrown value as a loggable message */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
