import { TimeoutError } from '../errors.js';

/**
 * Envuelve una promesa con un límite de tiempo.
 * Si vence, rechaza con TimeoutError; la promesa original sigue su curso.
 */
export function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    operation: string
): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => {
            reject(new TimeoutError(operation, timeoutMs));
        }, timeoutMs);

        promise
            .then((result) => {
                clearTimeout(timer);
                resolve(result);
            })
            .catch((error: unknown) => {
                clearTimeout(timer);
                reject(error);
            });
    });
}
