/**
 * Failures of a single outbound request. Callers catch `WudRequestError`
 * and decide whether to degrade or to report.
 */
export class WudRequestError extends Error {
    constructor(message: string, readonly url: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** DNS failure, refused connection, reset socket */
export class ConnectError extends WudRequestError { }

export class TimeoutError extends WudRequestError {
    constructor(url: string, readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`, url);
    }
}

export class HTTPStatusError extends WudRequestError {
    constructor(url: string, readonly status: number, readonly body?: string) {
        super(`Unexpected HTTP status ${status}`, url);
    }
}

/** Payload could not be parsed or lacks a field we depend on */
export class DataError extends WudRequestError { }

/** First refresh of an instance failed, so no entities can be created for it */
export class SetupError extends Error {
    constructor(readonly instanceName: string, options?: { cause?: unknown }) {
        super(`Failed to retrieve data from WUD instance '${instanceName}' at startup`, options);
        this.name = 'SetupError';
    }
}
