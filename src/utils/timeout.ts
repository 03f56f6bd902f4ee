import { CancelledAnalysisError, TimeoutError } from '../errors';

export interface CallOptions {
    signal?: AbortSignal;
}

/**
 * Runs an external call under a deadline. The call receives its own signal, which is
 * aborted when the deadline passes or when the caller's signal fires.
 * Rejects with TimeoutError on expiry and CancelledAnalysisError on caller abort.
 */
export async function withTimeout<T>(
    service: string,
    timeoutMs: number,
    parentSignal: AbortSignal | undefined,
    run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
    if (parentSignal?.aborted) throw new CancelledAnalysisError();

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const deadline = new Promise<never>((_, reject) => {
        // Settle before aborting so the deadline's error wins the race.
        timer = setTimeout(() => {
            reject(new TimeoutError(service, timeoutMs));
            controller.abort();
        }, timeoutMs);

        onAbort = () => {
            reject(new CancelledAnalysisError());
            controller.abort();
        };
        parentSignal?.addEventListener('abort', onAbort, { once: true });
    });

    try {
        return await Promise.race([run(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
        if (onAbort) parentSignal?.removeEventListener('abort', onAbort);
    }
}

/**
 * Cancellation is never degraded into a fallback tier.
 */
export function throwIfCancelled(error: unknown, signal?: AbortSignal): void {
    if (error instanceof CancelledAnalysisError) throw error;
    if (signal?.aborted) throw new CancelledAnalysisError();
}
