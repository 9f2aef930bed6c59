/**
 * errorLogManager.ts
 * Repeat suppression for the error log. A polling loop that fails every few
 * seconds would otherwise write the same line on every pass.
 *
 * The first occurrence is logged, repeats are muted for one cooldown, and the
 * next occurrence after the cooldown carries a summary of how many were muted.
 * Offline keys log at debug until `resetErrorState()` runs after a good refresh.
 */

export type LogLevel = 'error' | 'warn' | 'debug' | 'info' | 'none'

interface ErrorState {
	lastMessage: string
	lastTimestamp: number
	count: number
	suppressed: number
	offline: boolean
}

export const errorStates: Record<string, ErrorState> = {}

/**
 * Cooldown period (in ms) for suppressing repeated logs.
 */
export const COOLDOWN_MS = 60000

export function getErrorKey(name: string, message: string, ctx?: string): string {
	return `${name}:${message}:${ctx ?? ''}`
}

/**
 * Puts a key in offline mode, where every further occurrence logs at debug.
 *
 * @returns True if the key was already offline.
 */
export function setOffline(errorKey: string): boolean {
	const state = errorStates[errorKey]
	if (!state) {
		errorStates[errorKey] = {
			lastMessage: '',
			lastTimestamp: 0,
			count: 0,
			suppressed: 0,
			offline: true,
		}
		return false
	}
	const wasOffline = state.offline
	state.offline = true
	return wasOffline
}

/**
 * Called after a successful refresh: every key leaves offline mode and its counters
 * and cooldown restart, so the next failure is logged at once.
 */
export function resetErrorState(): void {
	for (const state of Object.values(errorStates)) {
		state.offline = false
		state.count = 0
		state.suppressed = 0
		state.lastTimestamp = 0
	}
}

/**
 * Decides whether an occurrence is logged and at which level.
 * `summary` is set on the first occurrence after a cooldown in which repeats were muted.
 *
 * @param level Level to use when the occurrence is not suppressed.
 */
export function shouldLogError(
	errorKey: string,
	message: string,
	level: LogLevel = 'error'
): { logLevel: LogLevel, summary?: string } {
	const now = Date.now()
	let state = errorStates[errorKey]
	if (!state) {
		state = errorStates[errorKey] = {
			lastMessage: message,
			lastTimestamp: 0,
			count: 0,
			suppressed: 0,
			offline: false,
		}
	}
	state.count++
	if (state.offline) {
		return { logLevel: 'debug' }
	}
	if (state.lastMessage !== message) {
		state.lastMessage = message
		state.count = 1
		state.suppressed = 0
		state.lastTimestamp = 0
	}
	if (state.lastTimestamp === 0 || now - state.lastTimestamp > COOLDOWN_MS) {
		const suppressed = state.suppressed
		state.lastTimestamp = now
		state.suppressed = 0
		if (suppressed > 0) {
			return { logLevel: level, summary: `${message} (repeated ${suppressed} more times since last logged)` }
		}
		return { logLevel: level }
	}
	state.suppressed++
	return { logLevel: 'none' }
}
