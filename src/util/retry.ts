export interface RetryOptions {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs?: number;
    /** Called before each wait, with the attempt that just failed. */
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
    constructor(
        readonly attempts: number,
        readonly lastError: unknown,
    ) {
        super(`Gave up after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`, {
            cause: lastError,
        });
        this.name = 'RetryExhaustedError';
    }
}

export const sleep = (ms: number): Promise<void> =>
    new Promise((resolve) => setTimeout(resolve, ms));

/** Exponential backoff: base, 2x base, 4x base... capped at maxDelayMs. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number {
    return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export async function retryWithBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions,
): Promise<T> {
    const wait = options.sleep ?? sleep;
    let lastError: unknown;

    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            lastError = err;

            if (attempt < options.maxAttempts) {
                const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
                options.onRetry?.(attempt, err, delayMs);
                await wait(delayMs);
            }
        }
    }

    throw new RetryExhaustedError(options.maxAttempts, lastError);
}
