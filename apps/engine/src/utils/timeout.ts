export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Races `run` against a timer. When the timer wins, the signal handed to `run`
 * is aborted and the promise rejects with `onTimeout()`; `run` itself is left
 * to settle on its own.
 */
export async function withTimeout<T>(
    timeoutMs: number,
    run: (signal: AbortSignal) => Promise<T>,
    onTimeout: () => Error,
): Promise<T> {
    const controller = new AbortController();
    let handle: NodeJS.Timeout | undefined;

    const timer = new Promise<never>((_, reject) => {
        handle = setTimeout(() => {
            controller.abort();
            reject(onTimeout());
        }, timeoutMs);
    });

    try {
        return await Promise.race([Promise.resolve().then(() => run(controller.signal)), timer]);
    } finally {
        clearTimeout(handle);
    }
}
