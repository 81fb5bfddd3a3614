/**
 * Promise helpers shared by the embedding and generation call sites.
 */

export class TimeoutError extends Error {
    constructor(operationName: string, timeoutMs: number) {
        super(`${operationName} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Execute function with timeout. `fn` receives a signal that is aborted when
 * the timeout fires, so the underlying request is cancelled too.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number = 30000,
    operationName: string = 'Operation',
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    try {
        return await Promise.race([
            fn(controller.signal),
            new Promise<T>((_, reject) => {
                timer = setTimeout(() => {
                    const error = new TimeoutError(operationName, timeoutMs);
                    controller.abort(error);
                    reject(error);
                }, timeoutMs);
            }),
        ]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Execute with retry and timeout. Each attempt gets its own timeout; the delay
 * doubles after every failed attempt.
 */
export async function withRetryAndTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    options: {
        maxRetries?: number;
        timeoutMs?: number;
        initialDelayMs?: number;
        operationName?: string;
        onRetry?: (error: Error, attempt: number, delayMs: number) => void;
    } = {},
): Promise<T> {
    const {
        maxRetries = 2,
        timeoutMs = 30000,
        initialDelayMs = 500,
        operationName = 'Operation',
        onRetry,
    } = options;

    let lastError: Error = new Error('Unknown error');

    for (let attempt = 0; attempt < maxRetries; attempt++) {
        try {
            return await withTimeout(fn, timeoutMs, operationName);
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt < maxRetries - 1) {
                const delayMs = initialDelayMs * Math.pow(2, attempt);
                onRetry?.(lastError, attempt + 1, delayMs);
                await new Promise((resolve) => setTimeout(resolve, delayMs));
            }
        }
    }

    throw lastError;
}

/**
 * Split array into batches
 */
export function batchArray<T>(array: readonly T[], batchSize: number): T[][] {
    const size = Math.max(1, Math.floor(batchSize));
    const batches: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
        batches.push(array.slice(i, i + size));
    }
    return batches;
}
