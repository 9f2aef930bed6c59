import { describe, it, expect, beforeEach } from 'vitest'
import {
	COOLDOWN_MS,
	errorStates,
	getErrorKey,
	resetErrorState,
	setOffline,
	shouldLogError,
} from '../../src/utils/errorLogManager.js'

describe('errorLogManager', () => {
	beforeEach(() => {
		for (const key of Object.keys(errorStates)) {
			delete errorStates[key]
		}
	})

	it('builds keys from name, message and context', () => {
		expect(getErrorKey('AcInfinityConnectError', 'down', 'operation: refresh')).toBe('AcInfinityConnectError:down:operation: refresh')
		expect(getErrorKey('Error', 'down')).toBe('Error:down:')
	})

	describe('shouldLogError', () => {
		it('logs the first occurrence at the requested level', () => {
			expect(shouldLogError('TestError:fail:', 'fail')).toEqual({ logLevel: 'error' })
			expect(shouldLogError('TestError:warn:', 'warn', 'warn')).toEqual({ logLevel: 'warn' })
		})

		it('suppresses repeats within the cooldown', () => {
			const key = 'TestError:fail:'
			shouldLogError(key, 'fail')
			for (let i = 0; i < 5; i++) {
				expect(shouldLogError(key, 'fail')).toEqual({ logLevel: 'none' })
			}
			expect(errorStates[key].suppressed).toBe(5)
			expect(errorStates[key].count).toBe(6)
		})

		it('logs with a summary once the cooldown has passed', () => {
			const key = 'TestError:fail:'
			shouldLogError(key, 'fail')
			shouldLogError(key, 'fail')
			shouldLogError(key, 'fail')
			errorStates[key].lastTimestamp -= COOLDOWN_MS + 1000

			expect(shouldLogError(key, 'fail')).toEqual({
				logLevel: 'error',
				summary: 'fail (repeated 2 more times since last logged)',
			})
			expect(errorStates[key].suppressed).toBe(0)
		})

		it('logs without a summary when nothing was muted', () => {
			const key = 'TestError:fail:'
			shouldLogError(key, 'fail')
			errorStates[key].lastTimestamp -= COOLDOWN_MS + 1000

			expect(shouldLogError(key, 'fail')).toEqual({ logLevel: 'error' })
		})

		it('restarts the state when the message changes', () => {
			const key = 'TestError:msg:'
			shouldLogError(key, 'msg1')
			shouldLogError(key, 'msg1')

			expect(shouldLogError(key, 'msg2')).toEqual({ logLevel: 'error' })
			expect(errorStates[key].count).toBe(1)
		})

		it('downgrades to debug in offline mode', () => {
			const key = 'TestError:fail:'
			errorStates[key] = {
				lastMessage: 'fail',
				lastTimestamp: Date.now(),
				count: 0,
				suppressed: 0,
				offline: true,
			}

			expect(shouldLogError(key, 'fail')).toEqual({ logLevel: 'debug' })
		})
	})

	describe('setOffline', () => {
		it('creates an offline state for an unknown key', () => {
			expect(setOffline('OfflineTest:fail:')).toBe(false)
			expect(errorStates['OfflineTest:fail:'].offline).toBe(true)
		})

		it('reports whether the key was already offline', () => {
			const key = 'OfflineTest:fail:'
			shouldLogError(key, 'fail')

			expect(setOffline(key)).toBe(false)
			expect(setOffline(key)).toBe(true)
		})
	})

	describe('resetErrorState', () => {
		it('clears offline mode and counters for every key', () => {
			errorStates['A:a:'] = { lastMessage: 'a', lastTimestamp: 1, count: 3, suppressed: 2, offline: true }
			errorStates['B:b:'] = { lastMessage: 'b', lastTimestamp: 1, count: 1, suppressed: 0, offline: false }

			resetErrorState()

			expect(errorStates['A:a:']).toEqual({ lastMessage: 'a', lastTimestamp: 0, count: 0, suppressed: 0, offline: false })
			expect(errorStates['B:b:'].count).toBe(0)
		})

		it('logs the next failure at once instead of waiting out the cooldown', () => {
			const key = 'TestError:fail:'
			shouldLogError(key, 'fail')
			expect(shouldLogError(key, 'fail')).toEqual({ logLevel: 'none' })

			resetErrorState()

			expect(shouldLogError(key, 'fail')).toEqual({ logLevel: 'error' })
		})
	})
})
