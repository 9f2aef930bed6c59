/**
 * Bounded retry for API work: run, and on a retryable failure pause and run again,
 * up to a fixed number of attempts. The last error is re-thrown when they run out.
 */
import {
	AcInfinityAuthError,
	AcInfinityConfigError,
	AcInfinityUnsupportedError,
} from '../models/acInfinityTypes.js'
import { RETRY_ATTEMPTS, RETRY_DELAY_MS } from '../settings.js'

export type Sleep = (ms: number) => Promise<void>

export interface RetryOptions {
	/** Total attempts including the first. */
	attempts?: number
	delayMs?: number
	/** Injected in tests so retries do not wait on real timers. */
	sleep?: Sleep
	shouldRetry?: (error: unknown) => boolean
	/** Called before each pause with the attempt that just failed (1-based). */
	onRetry?: (error: unknown, attempt: number) => void
}

export const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Auth, config and unsupported-hardware failures will not change on a second try,
 * and TypeError is a caller bug. Everything else, connect and request errors
 * included, is retried.
 */
export function isRetryableError(error: unknown): boolean {
	return !(
		error instanceof AcInfinityAuthError
		|| error instanceof AcInfinityConfigError
		|| error instanceof AcInfinityUnsupportedError
		|| error instanceof TypeError
	)
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const attempts = Math.max(1, options.attempts ?? RETRY_ATTEMPTS)
	const delayMs = options.delayMs ?? RETRY_DELAY_MS
	const sleep = options.sleep ?? defaultSleep
	const shouldRetry = options.shouldRetry ?? isRetryableError

	let attempt = 1
	for (;;) {
		try {
			return await operation()
		} catch (error) {
			if (attempt >= attempts || !shouldRetry(error)) {
				throw error
			}
			options.onRetry?.(error, attempt)
			await sleep(delayMs)
			attempt++
		}
	}
}
