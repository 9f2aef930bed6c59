import { describe, it, expect } from 'vitest'
import {
	AcInfinityEndpoint,
	FORM_CONTENT_TYPE,
	USER_AGENT,
	createHeaders,
	encodeForm,
	isAcInfinityEnvelope,
} from '../../src/api/acInfinityApiHelper.js'

describe('acInfinityApiHelper', () => {
	it('uses the vendor endpoint paths', () => {
		expect(AcInfinityEndpoint.Login).toBe('/api/user/appUserLogin')
		expect(AcInfinityEndpoint.DevicesListAll).toBe('/api/user/devInfoListAll')
		expect(AcInfinityEndpoint.SetModeSettings).toBe('/api/dev/addDevMode')
		expect(AcInfinityEndpoint.UpdateAdvancedSettings).toBe('/api/dev/updateAdvSetting')
	})

	describe('createHeaders', () => {
		it('omits the token header before login', () => {
			expect(createHeaders()).toEqual({
				'User-Agent': USER_AGENT,
				'Content-Type': FORM_CONTENT_TYPE,
			})
		})

		it('adds the token header once logged in', () => {
			expect(createHeaders('test-token')).toEqual({
				'User-Agent': USER_AGENT,
				'Content-Type': FORM_CONTENT_TYPE,
				token: 'test-token',
			})
		})
	})

	describe('encodeForm', () => {
		it('writes bigints in full and nulls as empty values', () => {
			expect(encodeForm({ devId: 54929097239553773072n, devTimeZone: null, port: 1 }))
				.toBe('devId=54929097239553773072&devTimeZone=&port=1')
		})

		it('skips undefined fields and sends nested values as JSON', () => {
			expect(encodeForm({ skipped: undefined, list: [1, 2], flag: true }))
				.toBe('list=%5B1%2C2%5D&flag=true')
		})

		it('encodes reserved characters', () => {
			expect(encodeForm({ appEmail: 'grower+tent@example.com' })).toBe('appEmail=grower%2Btent%40example.com')
		})
	})

	describe('isAcInfinityEnvelope', () => {
		it('accepts objects with a numeric code', () => {
			expect(isAcInfinityEnvelope({ code: 200, msg: 'success', data: [] })).toBe(true)
		})

		it('rejects anything else', () => {
			expect(isAcInfinityEnvelope(null)).toBe(false)
			expect(isAcInfinityEnvelope('<html></html>')).toBe(false)
			expect(isAcInfinityEnvelope({ code: '200' })).toBe(false)
		})
	})
})
