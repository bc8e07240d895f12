export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function abortError(): Error {
    const err = new Error('The operation was aborted.');
    err.name = 'AbortError';
    return err;
}

/**
 * Resolve after `ms` milliseconds. When `signal` aborts first, the timer is
 * cleared and the promise rejects with an `AbortError`.
 */
export const sleep: SleepFn = (ms, signal) => {
    if (signal?.aborted) {
        return Promise.reject(abortError());
    }

    return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(abortError());
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));

        signal?.addEventListener('abort', onAbort, { once: true });
    });
};

/** Reject synchronously with an `AbortError` once `signal` has fired. */
export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw abortError();
}
