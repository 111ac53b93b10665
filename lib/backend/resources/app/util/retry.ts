// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { setTimeout as sleep } from "node:timers/promises"

export interface RetryOptions {
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
    shouldRetry: (error: unknown) => boolean
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void
    wait?: (delayMs: number) => Promise<unknown>
}

export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
    return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs)
}

/**
 * Runs `operation` until it succeeds, `shouldRetry` rejects the error, or
 * `maxAttempts` is reached. The last error is rethrown as-is.
 */
export const retryWithBackoff = async<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
    const wait = options.wait ?? sleep

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt)
        } catch (e) {
            if (attempt >= options.maxAttempts || !options.shouldRetry(e)) {
                throw e
            }

            const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs)
            options.onRetry?.(e, attempt, delayMs)
            await wait(delayMs)
        }
    }
}
