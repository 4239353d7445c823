/**
 * Async helpers shared by the resolver, the orchestrator and the session task loop.
 */

/**
 * Yield to the event loop so one tenant's long loop cannot starve the others.
 */
export function yieldToEventLoop(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Sleep for `ms`, rejecting early with `onAbort()` when `signal` fires.
 * The timer is cleared on abort so nothing keeps the process alive.
 */
export function abortableDelay(
    ms: number,
    signal: AbortSignal | undefined,
    onAbort: () => Error
): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(onAbort());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
        const abort = () => {
            clearTimeout(timer);
            reject(onAbort());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", abort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", abort, { once: true });
    });
}

export interface LinkedAbortSignal {
    signal: AbortSignal;
    /** Detach from the source signals once the work is done. */
    release(): void;
}

/** A signal that fires as soon as any of `sources` does. */
export function linkAbortSignals(...sources: Array<AbortSignal | undefined>): LinkedAbortSignal {
    const controller = new AbortController();
    const attached: AbortSignal[] = [];
    const abort = () => controller.abort();

    for (const source of sources) {
        if (!source) continue;
        if (source.aborted) {
            controller.abort();
            break;
        }
        source.addEventListener("abort", abort, { once: true });
        attached.push(source);
    }

    return {
        signal: controller.signal,
        release: () => {
            for (const source of attached) source.removeEventListener("abort", abort);
        },
    };
}
