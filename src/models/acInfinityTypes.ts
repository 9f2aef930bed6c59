/**
 * Type definitions and error classes for the AC Infinity cloud API.
 *
 * The vendor payloads have no stable schema across hardware generations, so every
 * record names the fields this plugin relies on and keeps an open index signature
 * for the rest. The settings merge works on the open side; accessors get typed
 * values for the named side.
 */
import type { PlatformConfig } from 'homebridge'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | JsonRecord

/**
 * A JSON object as received from the API. `undefined` is admitted so that records
 * with optional named fields can extend it and nest inside each other.
 */
export interface JsonRecord {
	[key: string]: JsonValue | undefined
}

/** Controller and port ids arrive as numbers or strings depending on the endpoint. */
export type ControllerId = string | number

/**
 * Envelope wrapping every API response.
 * `code` is 200 on success; `msg` carries the vendor's reason otherwise.
 */
export interface AcInfinityEnvelope<T> {
	code: number
	msg?: string
	data?: T
}

export interface LoginData extends JsonRecord {
	appId?: string
	appEmail?: string
	nickName?: string
}

/**
 * A single port entry from `deviceInfo.ports` of the controller list.
 */
export interface PortProperties extends JsonRecord {
	port: number
	portName?: string
	online?: number | null
	speak?: number | null
	curMode?: number | null
	remainTime?: number | null
	loadState?: number | null
	overcurrentStatus?: number | null
}

/**
 * A sensor entry from `deviceInfo.sensors`, reported by AI controllers only.
 */
export interface SensorProperties extends JsonRecord {
	accessPort: number
	sensorType: number
	sensorData?: number | null
	sensorPrecis?: number | null
	sensorUnit?: number | null
}

export interface ControllerDeviceInfo extends JsonRecord {
	temperature?: number | null
	temperatureF?: number | null
	humidity?: number | null
	vpdnums?: number | null
	online?: number | null
	ports?: PortProperties[] | null
	sensors?: SensorProperties[] | null
}

/**
 * One controller from `/api/user/devInfoListAll`.
 */
export interface ControllerProperties extends JsonRecord {
	devId: string | number
	devName?: string
	devMacAddr?: string | null
	devType?: number
	devPortCount?: number | null
	hardwareVersion?: string | null
	firmwareVersion?: string | null
	zoneId?: string | null
	devTimeZone?: string | null
	online?: number | null
	deviceInfo?: ControllerDeviceInfo | null
}

/**
 * Port mode settings from `/api/dev/getdevModeSettingList`: the active mode,
 * thresholds, timers, schedule and VPD targets of one port.
 */
export interface PortModeSettings extends JsonRecord {
	modeSetid?: string | number | null
	devId?: string | number | null
	externalPort?: number | null
	atType?: number | null
	onSpead?: number | null
	offSpead?: number | null
	activeHt?: number | null
	devHt?: number | null
	devHtf?: number | null
	activeLt?: number | null
	devLt?: number | null
	devLtf?: number | null
	activeHh?: number | null
	devHh?: number | null
	activeLh?: number | null
	devLh?: number | null
	activeHtVpd?: number | null
	activeHtVpdNums?: number | null
	activeLtVpd?: number | null
	activeLtVpdNums?: number | null
	acitveTimerOn?: number | null
	acitveTimerOff?: number | null
	activeCycleOn?: number | null
	activeCycleOff?: number | null
	schedStartTime?: number | null
	schedEndtTime?: number | null
	targetVpd?: number | null
	targetVpdSwitch?: number | null
	surplus?: number | null
	/** Some firmware nests part of the port configuration here. Stripped on write. */
	devSetting?: JsonRecord | null
	ipcSetting?: JsonRecord | null
}

/**
 * Advanced settings from `/api/dev/getdevSetting`. Port 0 holds the controller
 * level calibration; any other port holds that port's dynamic response tuning.
 */
export interface AdvancedSettings extends JsonRecord {
	setId?: string | number | null
	devId?: string | number | null
	devName?: string | null
	devCompany?: number | null
	devCt?: number | null
	devCth?: number | null
	devCh?: number | null
	vpdCt?: number | null
	vpdCth?: number | null
	isFlag?: number | null
	devTt?: number | null
	devTth?: number | null
	devTh?: number | null
	vpdTransition?: number | null
	devBt?: number | null
	devBth?: number | null
	devBh?: number | null
	devBvpd?: number | null
	onTimeSwitch?: number | null
	onTime?: number | null
}

/** A caller's requested change: setting key and its new value. */
export type SettingChange = readonly [key: string, value: number | boolean]

/**
 * Homebridge platform config for this plugin.
 *
 * @property email Account e-mail used in the AC Infinity app.
 * @property password Account password; only the first 25 characters are sent.
 * @property host API base URL, defaults to the vendor's production host.
 * @property pollingIntervalSeconds How often to refresh, in seconds. Default is 10.
 */
export interface AcInfinityPlatformConfig extends PlatformConfig {
	email: string
	password: string
	host?: string
	pollingIntervalSeconds?: number
}

/**
 * Thrown when the API cannot be reached, answers with a non-200 HTTP status,
 * or an authenticated call is made without a session.
 * @augments Error
 */
export class AcInfinityConnectError extends Error {
	constructor(message: string, public cause?: unknown) {
		super(message)
		this.name = 'AcInfinityConnectError'
	}
}

/**
 * Thrown when the login endpoint rejects the credentials.
 * @augments Error
 */
export class AcInfinityAuthError extends Error {
	constructor(message: string, public cause?: unknown) {
		super(message)
		this.name = 'AcInfinityAuthError'
	}
}

/**
 * Thrown when any endpoint other than login answers with a non-success code.
 * The raw envelope is kept for diagnostics.
 * @augments Error
 */
export class AcInfinityRequestError extends Error {
	constructor(message: string, public response?: AcInfinityEnvelope<unknown>, public cause?: unknown) {
		super(message)
		this.name = 'AcInfinityRequestError'
	}
}

/**
 * Error thrown for invalid or missing plugin configuration.
 * @augments Error
 */
export class AcInfinityConfigError extends Error {
	constructor(message: string, public cause?: unknown) {
		super(message)
		this.name = 'AcInfinityConfigError'
	}
}

/**
 * Thrown for operations the target hardware does not accept.
 * @augments Error
 */
export class AcInfinityUnsupportedError extends Error {
	constructor(message: string, public cause?: unknown) {
		super(message)
		this.name = 'AcInfinityUnsupportedError'
	}
}
