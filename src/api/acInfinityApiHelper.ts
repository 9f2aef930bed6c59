/**
 * Endpoint paths, the fixed header set and the form body encoding used by every
 * call to the AC Infinity cloud API.
 */
import type { JsonValue } from '../models/acInfinityTypes.js'

/**
 * Enum for the AC Infinity API endpoints.
 */
export enum AcInfinityEndpoint {
	Login = '/api/user/appUserLogin',
	DevicesListAll = '/api/user/devInfoListAll',
	GetModeSettings = '/api/dev/getdevModeSettingList',
	SetModeSettings = '/api/dev/addDevMode',
	GetAdvancedSettings = '/api/dev/getdevSetting',
	UpdateAdvancedSettings = '/api/dev/updateAdvSetting',
}

// The API refuses requests that do not identify as the vendor's mobile client.
export const USER_AGENT = 'ACController/1.8.2 (com.acinfinity.humiture; build:489; iOS 16.5.1) Alamofire/5.4.4'

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8'

/**
 * Value accepted in a form body. Ids are bigints because they exceed 2^53.
 */
export type FormValue = JsonValue | bigint | undefined

/**
 * Builds the header set sent with every request.
 *
 * @param token Session token; omitted for the login call.
 * @returns Header map for axios.
 */
export function createHeaders(token?: string): Record<string, string> {
	const headers: Record<string, string> = {
		'User-Agent': USER_AGENT,
		'Content-Type': FORM_CONTENT_TYPE,
	}
	if (token) {
		headers['token'] = token
	}
	return headers
}

/**
 * Serializes a payload as `application/x-www-form-urlencoded`.
 * Nested objects and arrays are sent as JSON text, nulls as empty strings, and
 * undefined fields are left out.
 */
export function encodeForm(payload: Record<string, FormValue>): string {
	const params = new URLSearchParams()
	for (const [key, value] of Object.entries(payload)) {
		if (value === undefined) {
			continue
		}
		params.append(key, formatFormValue(value))
	}
	return params.toString()
}

function formatFormValue(value: Exclude<FormValue, undefined>): string {
	if (value === null) {
		return ''
	}
	if (typeof value === 'object') {
		return JSON.stringify(value)
	}
	return String(value)
}

/**
 * Type guard for the `{code, msg, data}` envelope every endpoint answers with.
 */
export function isAcInfinityEnvelope(data: unknown): data is { code: number, msg?: string, data?: unknown } {
	return typeof data === 'object' && data !== null && 'code' in data && typeof data.code === 'number'
}
