import type { Logger } from 'homebridge'
import Axios, { type AxiosInstance, type AxiosResponse } from 'axios'
import {
	AcInfinityEndpoint,
	type FormValue,
	createHeaders,
	encodeForm,
	isAcInfinityEnvelope,
} from './acInfinityApiHelper.js'
import { ADVANCED_SETTINGS, MODE_SETTINGS, type SettingsPayload, mergeSettings } from './settingsMerge.js'
import {
	AcInfinityAuthError,
	AcInfinityConnectError,
	type AcInfinityEnvelope,
	AcInfinityRequestError,
	type AdvancedSettings,
	type ControllerId,
	type ControllerProperties,
	type LoginData,
	type PortModeSettings,
	type SettingChange,
} from '../models/acInfinityTypes.js'
import { API_SUCCESS_CODE, MAX_PASSWORD_LENGTH, REQUEST_TIMEOUT_MS } from '../settings.js'

/**
 * AcInfinityClient
 * Raw authenticated access to the AC Infinity cloud API.
 *
 * - Owns the session token obtained from login.
 * - Sends every call as a form-encoded POST with the vendor's header set.
 * - Maps HTTP failures and API response codes to the error classes in acInfinityTypes.
 *
 * Nothing here retries; the refresh and update paths do that.
 */
export class AcInfinityClient {
	private readonly http: AxiosInstance
	private token: string | null = null

	constructor(
		private readonly host: string,
		private readonly email: string,
		private readonly password: string,
		private readonly log: Logger,
	) {
		this.http = Axios.create({
			baseURL: host,
			timeout: REQUEST_TIMEOUT_MS,
			// status codes are checked in post() so that every non-200 maps to one error class
			validateStatus: () => true,
		})
	}

	/**
	 * Logs in and keeps the session token for later calls.
	 *
	 * @throws {AcInfinityConnectError} If the API cannot be reached or answers with a non-200 status.
	 * @throws {AcInfinityAuthError} If the API rejects the credentials.
	 */
	async login(): Promise<void> {
		this.log.debug(`[Session] Logging in to "${this.host}"...`)
		const body = await this.post<LoginData>(AcInfinityEndpoint.Login, {
			appEmail: this.email,
			appPasswordl: this.password.slice(0, MAX_PASSWORD_LENGTH),
		}, false)
		const token = body.data?.appId
		if (!token) {
			throw new AcInfinityAuthError('Login response did not include a session token', body)
		}
		this.token = String(token)
		this.log.debug(`[Session] Login successful for host "${this.host}".`)
	}

	isLoggedIn(): boolean {
		return this.token !== null
	}

	/**
	 * Drops the session token; the next refresh logs in again.
	 */
	logout(): void {
		this.token = null
	}

	/**
	 * Fetches every controller on the account, with ports and sensors nested under `deviceInfo`.
	 */
	async getDevicesListAll(): Promise<ControllerProperties[]> {
		const token = this.requireToken()
		const body = await this.post<ControllerProperties[] | null>(AcInfinityEndpoint.DevicesListAll, { userId: token })
		if (body.data === undefined || body.data === null) {
			return []
		}
		if (!Array.isArray(body.data)) {
			throw new AcInfinityRequestError('Unexpected controller list structure', body)
		}
		return body.data
	}

	/**
	 * Fetches the mode settings of one port.
	 */
	async getDeviceModeSettingsList(controllerId: ControllerId, port: number): Promise<PortModeSettings> {
		this.requireToken()
		const body = await this.post<PortModeSettings>(AcInfinityEndpoint.GetModeSettings, {
			devId: String(controllerId),
			port,
		})
		return this.requireRecord(body, AcInfinityEndpoint.GetModeSettings)
	}

	/**
	 * Fetches advanced settings: controller level for port 0, otherwise for that port.
	 */
	async getDeviceSettings(controllerId: ControllerId, port: number): Promise<AdvancedSettings> {
		this.requireToken()
		const body = await this.post<AdvancedSettings>(AcInfinityEndpoint.GetAdvancedSettings, {
			devId: String(controllerId),
			port,
		})
		return this.requireRecord(body, AcInfinityEndpoint.GetAdvancedSettings)
	}

	/**
	 * Changes port mode settings. The current settings are read first and merged with
	 * `changes`, since the API only accepts whole records.
	 *
	 * @returns The payload that was sent.
	 */
	async setDeviceModeSettings(controllerId: ControllerId, port: number, changes: readonly SettingChange[]): Promise<SettingsPayload> {
		const current = await this.getDeviceModeSettingsList(controllerId, port)
		const payload = mergeSettings(MODE_SETTINGS, current, changes)
		await this.post<unknown>(AcInfinityEndpoint.SetModeSettings, payload)
		this.log.debug(`[Session] Mode settings updated for controller ${controllerId} port ${port}: ${describeChanges(changes)}`)
		return payload
	}

	/**
	 * Changes advanced settings for a controller (port 0) or a port.
	 * The API blanks the name when it is left out, so the current display name is sent along.
	 *
	 * @returns The payload that was sent.
	 */
	async updateDeviceSettings(
		controllerId: ControllerId,
		port: number,
		displayName: string,
		changes: readonly SettingChange[],
	): Promise<SettingsPayload> {
		const current = await this.getDeviceSettings(controllerId, port)
		const payload = mergeSettings(ADVANCED_SETTINGS, current, changes, { devName: displayName })
		await this.post<unknown>(AcInfinityEndpoint.UpdateAdvancedSettings, payload)
		this.log.debug(`[Session] Advanced settings updated for controller ${controllerId} port ${port}: ${describeChanges(changes)}`)
		return payload
	}

	private requireToken(): string {
		if (this.token === null) {
			throw new AcInfinityConnectError('AC Infinity client is not logged in.')
		}
		return this.token
	}

	private requireRecord<T extends object>(body: AcInfinityEnvelope<T>, endpoint: AcInfinityEndpoint): T {
		if (typeof body.data !== 'object' || body.data === null || Array.isArray(body.data)) {
			throw new AcInfinityRequestError(`Unexpected settings structure [endpoint: ${endpoint}]`, body)
		}
		return body.data
	}

	/**
	 * Sends a form-encoded POST and unwraps the response envelope.
	 *
	 * @throws {AcInfinityConnectError} On transport failure or a non-200 HTTP status.
	 * @throws {AcInfinityAuthError} On a non-success code from the login endpoint.
	 * @throws {AcInfinityRequestError} On a non-success code from any other endpoint.
	 */
	private async post<T>(endpoint: AcInfinityEndpoint, payload: Record<string, FormValue>, useToken = true): Promise<AcInfinityEnvelope<T>> {
		this.log.debug(`[Session] POST ${endpoint}`)
		let response: AxiosResponse<AcInfinityEnvelope<T>>
		try {
			response = await this.http.post<AcInfinityEnvelope<T>>(endpoint, encodeForm(payload), {
				headers: createHeaders(useToken && this.token !== null ? this.token : undefined),
			})
		} catch (error) {
			throw new AcInfinityConnectError(`Network error communicating with AC Infinity API [endpoint: ${endpoint}]`, error)
		}

		if (response.status !== 200) {
			throw new AcInfinityConnectError(`AC Infinity API answered with HTTP ${response.status} [endpoint: ${endpoint}]`)
		}

		const body = response.data
		if (!isAcInfinityEnvelope(body)) {
			throw new AcInfinityRequestError(`Unexpected response structure [endpoint: ${endpoint}]`, undefined, body)
		}
		if (body.code !== API_SUCCESS_CODE) {
			if (endpoint === AcInfinityEndpoint.Login) {
				throw new AcInfinityAuthError(`Login rejected by AC Infinity API: ${body.msg ?? `code ${body.code}`}`, body)
			}
			throw new AcInfinityRequestError(`Request failed with code ${body.code}: ${body.msg ?? 'no message'} [endpoint: ${endpoint}]`, body)
		}
		return body
	}
}

function describeChanges(changes: readonly SettingChange[]): string {
	return changes.map(([key, value]) => `${key}=${value}`).join(', ')
}
