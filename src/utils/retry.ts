/**
 * Utility for sleeping/delaying execution.
 * @param ms - Milliseconds to sleep
 */
export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    /** Upper bound on any single backoff wait */
    maxDelay?: number;
    /** Injected for tests */
    wait?: (ms: number) => Promise<void>;
}

const getStatus = (error: unknown): number => {
    if (typeof error !== 'object' || error === null) return 0;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    return 0;
};

const getMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return '';
};

/**
 * Executes a function with exponential backoff retry.
 * Only rate-limit (429) failures are retried; anything else is rethrown at once.
 *
 * @returns The result of the function
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const {
        maxRetries = 3,
        initialDelay = 1000,
        maxDelay = 30_000,
        wait = sleep,
    } = options;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
        try {
            return await fn();
        } catch (error: unknown) {
            lastError = error;
            const status = getStatus(error);
            const message = getMessage(error);
            const isRateLimited = status === 429 || message.includes('429');

            if (!isRateLimited) {
                throw error;
            }

            let delay = initialDelay * Math.pow(2, attempt);

            // Honor an explicit hint such as "retry in 12.5s"
            const match = message.match(/retry in ([\d.]+)s/i);
            if (match) {
                const seconds = parseFloat(match[1]);
                delay = Math.max(delay, (seconds + 1) * 1000);
            }

            delay = Math.min(delay, maxDelay);

            console.warn(
                `API rate limited (429) - Retrying in ${Math.round(delay / 1000)}s (Attempt ${attempt + 1}/${maxRetries})`
            );
            await wait(delay);
        }
    }

    throw lastError;
}
