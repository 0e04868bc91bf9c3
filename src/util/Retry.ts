import { isAbortError } from './Errors'
import type Util from './Utils'

export interface RetryPolicy {
    attempts: number;
    delayMs: number;
    // Wait before the first attempt too (completion polling)
    delayFirst?: boolean;
}

export type RetryResult<T> =
    | { ok: true, value: T, attempts: number }
    | { ok: false, attempts: number, lastError?: unknown }

/**
 * Bounded attempts with a fixed delay. An attempt fails by resolving `undefined`
 * or by throwing; only cancellation escapes.
 */
export default class Retry {
    private utils: Util

    constructor(utils: Util) {
        this.utils = utils
    }

    async run<T>(
        policy: RetryPolicy,
        attempt: (n: number) => Promise<T | undefined>,
        onError?: (error: unknown, n: number) => void
    ): Promise<RetryResult<T>> {
        const attempts = Math.max(1, Math.floor(policy.attempts))
        let lastError: unknown

        for (let n = 1; n <= attempts; n++) {
            if (n > 1 || policy.delayFirst) {
                await this.utils.wait(policy.delayMs)
            }
            try {
                const value = await attempt(n)
                if (value !== undefined) {
                    return { ok: true, value, attempts: n }
                }
            } catch (error) {
                if (isAbortError(error)) throw error
                lastError = error
                onError?.(error, n)
            }
        }

        return { ok: false, attempts, lastError }
    }
}
