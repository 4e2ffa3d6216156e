import type { BasicAuth, HttpSession } from './types';
import { ConnectError, TimeoutError, WudRequestError } from './errors';

export const defaultSession: HttpSession = (input, init) => fetch(input, init);

export function basicAuthHeader(auth: BasicAuth): string {
    return 'Basic ' + Buffer.from(`${auth.username}:${auth.password}`, 'utf8').toString('base64');
}

/**
 * Run one request, including reading its body, under a timeout.
 * Transport failures become ConnectError and an expired timer TimeoutError;
 * errors already in the taxonomy pass through untouched.
 */
export async function withTimeout<T>(
    url: string,
    timeoutMs: number,
    run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
        return await run(controller.signal);
    } catch (err) {
        if (err instanceof WudRequestError) throw err;
        if (controller.signal.aborted) throw new TimeoutError(url, timeoutMs);
        if (err instanceof TypeError) {
            throw new ConnectError(`Cannot connect: ${err.message}`, url, { cause: err });
        }
        throw err;
    } finally {
        clearTimeout(timer);
    }
}
