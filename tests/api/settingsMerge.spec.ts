import { describe, it, expect } from 'vitest'
import {
	ADVANCED_SETTINGS,
	MODE_SETTINGS,
	mergeSettings,
	toInteger,
	toIntegerId,
} from '../../src/api/settingsMerge.js'
import { advancedSettingsFixture, portModeSettingsFixture } from '../fixtures/acInfinityFixtures.js'

describe('mergeSettings', () => {
	describe('mode settings', () => {
		it('never carries denylisted fields into the payload', () => {
			const payload = mergeSettings(MODE_SETTINGS, portModeSettingsFixture())

			for (const field of MODE_SETTINGS.denylist) {
				expect(payload).not.toHaveProperty(field)
			}
		})

		it('ignores changes to denylisted fields', () => {
			const payload = mergeSettings(MODE_SETTINGS, { devId: '1', devSetting: { a: 1 } }, [['devSetting', 3], ['onSpead', 4]])

			expect(payload).not.toHaveProperty('devSetting')
			expect(payload.onSpead).toBe(4)
		})

		it('adds required fields the read endpoint left out', () => {
			const payload = mergeSettings(MODE_SETTINGS, portModeSettingsFixture())

			expect(payload.vpdstatus).toBe(0)
			expect(payload.vpdnums).toBe(0)
		})

		it('keeps a value that is already present over the default', () => {
			const current = { ...portModeSettingsFixture(), vpdnums: 7 }

			expect(mergeSettings(MODE_SETTINGS, current).vpdnums).toBe(7)
		})

		it('converts ids too large for a double to exact integers', () => {
			const payload = mergeSettings(MODE_SETTINGS, portModeSettingsFixture())

			expect(payload.devId).toBe(54929097239553773072n)
			expect(payload.modeSetid).toBe(1424979258063365001n)
		})

		it('applies changes as integers', () => {
			const payload = mergeSettings(MODE_SETTINGS, portModeSettingsFixture(), [
				['atType', 2],
				['onSpead', 7.9],
				['activeHt', false],
				['activeLt', true],
			])

			expect(payload.atType).toBe(2)
			expect(payload.onSpead).toBe(7)
			expect(payload.activeHt).toBe(0)
			expect(payload.activeLt).toBe(1)
		})

		it('replaces nulls with an empty string for string fields and 0 otherwise', () => {
			const payload = mergeSettings(MODE_SETTINGS, portModeSettingsFixture())

			expect(payload.devTimeZone).toBe('')
			expect(payload.surplus).toBe(0)
		})

		it('leaves the input record untouched', () => {
			const current = portModeSettingsFixture()
			mergeSettings(MODE_SETTINGS, current, [['atType', 3]])

			expect(current).toEqual(portModeSettingsFixture())
		})

		it('produces identical payloads for identical input', () => {
			const current = portModeSettingsFixture()

			expect(mergeSettings(MODE_SETTINGS, current)).toEqual(mergeSettings(MODE_SETTINGS, current))
		})
	})

	describe('advanced settings', () => {
		it('injects the display name and strips the fields the write endpoint rejects', () => {
			const payload = mergeSettings(ADVANCED_SETTINGS, advancedSettingsFixture(''), [['devCt', 3]], { devName: 'Grow Tent' })

			expect(payload.devName).toBe('Grow Tent')
			expect(payload.devCt).toBe(3)
			for (const field of ['setId', 'devMacAddr', 'portResistance', 'devSettings', 'updateAllPorts', 'sensors']) {
				expect(payload).not.toHaveProperty(field)
			}
		})

		it('defaults the sensor and sub-device fields', () => {
			const payload = mergeSettings(ADVANCED_SETTINGS, advancedSettingsFixture())

			expect(payload.sensorTransBuff).toBe('')
			expect(payload.sensorTransBuffStr).toBe('')
			expect(payload.sensorSettingStr).toBe('')
			expect(payload.subDeviceId).toBe(0)
			expect(payload.subDeviceType).toBe(0)
			expect(payload.supportView).toBe(0)
		})

		it('zeroes fields that were read as null', () => {
			const payload = mergeSettings(ADVANCED_SETTINGS, advancedSettingsFixture())

			expect(payload.sensorSetting).toBe('')
			expect(payload.calibrationTime).toBe(0)
		})
	})
})

describe('toIntegerId', () => {
	it('accepts numbers, numeric strings and bigints', () => {
		expect(toIntegerId('devId', 42)).toBe(42n)
		expect(toIntegerId('devId', ' 17 ')).toBe(17n)
		expect(toIntegerId('devId', 5n)).toBe(5n)
	})

	it('throws TypeError for anything else', () => {
		expect(() => toIntegerId('devId', 'abc')).toThrow(TypeError)
		expect(() => toIntegerId('devId', 1.5)).toThrow(TypeError)
		expect(() => toIntegerId('devId', true)).toThrow(TypeError)
	})
})

describe('toInteger', () => {
	it('truncates toward zero', () => {
		expect(toInteger('devCt', -2.7)).toBe(-2)
	})

	it('throws TypeError for non-finite numbers', () => {
		expect(() => toInteger('devCt', Number.NaN)).toThrow('Cannot convert "devCt" to an integer: NaN')
	})
})
