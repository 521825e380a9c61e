/**
 * Runs `work` against a deadline. On expiry the returned promise rejects with
 * `onTimeout()` and only then is the signal handed to `work` aborted, so work that
 * settles inside its abort listener cannot win the race. The timer is always cleared.
 */
export async function withTimeout<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error,
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(onTimeout());
            controller.abort();
        }, timeoutMs);
    });

    try {
        return await Promise.race([work(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
