import { Logger } from '../logger/Logger';

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retries `fn` with exponential backoff while `isRetryable` accepts the error.
 * Other errors, and the error of the final attempt, are rethrown.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    label: string,
    policy: RetryPolicy,
    isRetryable: (error: unknown) => boolean
): Promise<T> {
    const logger = Logger.getInstance();

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (!isRetryable(error) || attempt >= policy.maxAttempts) {
                throw error;
            }

            const delay = Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
            logger.warn(`[Retry] ${label} attempt ${attempt}/${policy.maxAttempts}, waiting ${delay}ms`);
            await sleep(delay);
        }
    }
}
