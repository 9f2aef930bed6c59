/**
 * Settings merge for the AC Infinity write endpoints.
 *
 * The API only accepts a complete settings record on write, but callers change one
 * or two fields. The merge takes a freshly read record and turns it into a payload
 * the write endpoint accepts: fields it refuses are stripped, fields it requires are
 * defaulted, ids become integers, the caller's changes are applied and nulls are
 * replaced. The field lists are part of the vendor's contract.
 */
import type { JsonRecord, JsonValue, SettingChange } from '../models/acInfinityTypes.js'

/**
 * Per-endpoint rules for building a write payload.
 */
export interface SettingsClass {
	readonly name: string
	/** Fields the write endpoint rejects when echoed back. */
	readonly denylist: readonly string[]
	/** Fields the write endpoint requires but the read endpoint may omit. */
	readonly defaults: Readonly<Record<string, string | number>>
	/** Fields read as strings that must be written as integers. */
	readonly idFields: readonly string[]
	/** Fields whose null value becomes '' rather than 0. */
	readonly stringFields: readonly string[]
}

export type PayloadValue = Exclude<JsonValue, null> | bigint
export type SettingsPayload = Record<string, PayloadValue>

export const MODE_SETTINGS: SettingsClass = {
	name: 'mode settings',
	denylist: ['ipcSetting', 'devSetting'],
	defaults: {
		vpdstatus: 0,
		vpdnums: 0,
	},
	idFields: ['devId', 'modeSetid'],
	stringFields: ['devMacAddr', 'devTimeZone'],
}

export const ADVANCED_SETTINGS: SettingsClass = {
	name: 'advanced settings',
	denylist: ['setId', 'devMacAddr', 'portResistance', 'devSettings', 'updateAllPorts', 'sensors'],
	defaults: {
		calibrationTime: 0,
		sensorSetting: '',
		sensorTransBuff: '',
		sensorTransBuffStr: '',
		sensorSettingStr: '',
		subDeviceId: 0,
		subDeviceType: 0,
		supportView: 0,
	},
	idFields: ['devId'],
	stringFields: ['devName', 'sensorSetting', 'sensorTransBuff', 'sensorTransBuffStr', 'sensorSettingStr'],
}

/**
 * Builds a complete write payload from the current settings and the caller's changes.
 * The input record is left untouched.
 *
 * @param settingsClass Rules for the target endpoint.
 * @param current Settings record as last read from the API.
 * @param changes Fields to change; values are coerced to integers. Denylisted keys are ignored.
 * @param injected Fields the caller supplies outright, such as the display name.
 * @throws {TypeError} If an id or a change value cannot be read as an integer.
 */
export function mergeSettings(
	settingsClass: SettingsClass,
	current: JsonRecord,
	changes: readonly SettingChange[] = [],
	injected: Readonly<Record<string, string | number>> = {},
): SettingsPayload {
	const working = new Map<string, JsonValue | bigint>()

	for (const [key, value] of Object.entries(current)) {
		if (value === undefined || settingsClass.denylist.includes(key)) {
			continue
		}
		working.set(key, value)
	}

	for (const [key, value] of Object.entries(settingsClass.defaults)) {
		if (!working.has(key)) {
			working.set(key, value)
		}
	}

	for (const [key, value] of Object.entries(injected)) {
		working.set(key, value)
	}

	for (const key of settingsClass.idFields) {
		const value = working.get(key)
		if (value !== undefined && value !== null) {
			working.set(key, toIntegerId(key, value))
		}
	}

	for (const [key, value] of changes) {
		if (settingsClass.denylist.includes(key)) {
			continue
		}
		working.set(key, toInteger(key, value))
	}

	const payload: SettingsPayload = {}
	for (const [key, value] of working) {
		payload[key] = value ?? (settingsClass.stringFields.includes(key) ? '' : 0)
	}
	return payload
}

/**
 * Coerces an id to a bigint. Ids such as `"54929097239553773072"` do not fit in a
 * double, so they never pass through `number`.
 */
export function toIntegerId(key: string, value: JsonValue | bigint): bigint {
	if (typeof value === 'bigint') {
		return value
	}
	if (typeof value === 'number' && Number.isInteger(value)) {
		return BigInt(value)
	}
	if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
		return BigInt(value.trim())
	}
	throw new TypeError(`Cannot convert "${key}" to an integer id: ${JSON.stringify(value)}`)
}

/**
 * Coerces a change value to an integer, truncating toward zero.
 */
export function toInteger(key: string, value: number | boolean): number {
	if (typeof value === 'boolean') {
		return value ? 1 : 0
	}
	if (!Number.isFinite(value)) {
		throw new TypeError(`Cannot convert "${key}" to an integer: ${value}`)
	}
	return Math.trunc(value)
}
