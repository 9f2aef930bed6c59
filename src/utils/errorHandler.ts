// Centralized error handling utilities
import type { Logger } from 'homebridge'
import {
	getErrorKey,
	shouldLogError,
	setOffline
} from './errorLogManager.js'

export interface ErrorContext {
	operation?: string
	controllerId?: string | number
	port?: number
}

const ERROR_LABELS: Record<string, string> = {
	AcInfinityConnectError: 'Connection error',
	AcInfinityAuthError: 'Authentication error',
	AcInfinityRequestError: 'Request error',
	AcInfinityConfigError: 'Config error',
	AcInfinityUnsupportedError: 'Unsupported operation',
}

/**
 * Centralized error handler for the AcInfinity error classes and generic errors.
 * Refresh and update failures are logged here and nowhere else.
 *
 * Usage: errorHandler(log, error, { operation: 'refresh' })
 */
export function errorHandler(
	log: Logger,
	error: unknown,
	context?: ErrorContext
): void {
	const ctxParts: string[] = []
	if (context?.operation) {
		ctxParts.push(`operation: ${context.operation}`)
	}
	if (context?.controllerId !== undefined) {
		ctxParts.push(`controller: ${context.controllerId}`)
	}
	if (context?.port !== undefined) {
		ctxParts.push(`port: ${context.port}`)
	}
	const ctx = ctxParts.join(', ')

	let name = 'UnknownError'
	let message: string
	if (error instanceof Error) {
		name = error.name
		message = error.message
	} else if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
		message = error.message
	} else {
		message = String(error)
	}
	const errorKey = getErrorKey(name, message, ctx)

	// Apply suppression/throttling for all errors
	const { logLevel, summary } = shouldLogError(errorKey, message)
	// Once a connection or auth problem has been summarized, further repeats go to debug
	if ((name === 'AcInfinityConnectError' || name === 'AcInfinityAuthError') && summary) {
		setOffline(errorKey)
	}
	if (logLevel === 'none') {
		return
	}

	let logFn: (msg: string) => void
	switch (logLevel) {
	case 'warn':
		logFn = log.warn.bind(log)
		break
	case 'info':
		logFn = log.info.bind(log)
		break
	case 'debug':
		logFn = log.debug.bind(log)
		break
	default:
		logFn = log.error.bind(log)
	}

	const label = ERROR_LABELS[name] ?? 'Error'
	logFn(`[API] ${label}${ctx ? ' [' + ctx + ']' : ''}: ${summary ?? message}`)
}
