/**
 * MutationFacade
 * Writes setting changes to the API with the same retry policy as refresh.
 *
 * The cache is never written here. A caller that wants to see the change
 * triggers another refresh afterwards.
 */
import type { Logger } from 'homebridge'
import type { AcInfinityClient } from '../api/acInfinityClient.js'
import type { SettingsPayload } from '../api/settingsMerge.js'
import type { ControllerCache } from '../cache/controllerCache.js'
import {
	AcInfinityAuthError,
	AcInfinityUnsupportedError,
	type ControllerId,
	type SettingChange,
} from '../models/acInfinityTypes.js'
import { AI_CONTROLLER_TYPES } from '../models/controller.js'
import { type ErrorContext, errorHandler } from '../utils/errorHandler.js'
import { type RetryOptions, withRetry } from '../utils/retry.js'

export class MutationFacade {
	constructor(
		private readonly client: AcInfinityClient,
		private readonly cache: ControllerCache,
		private readonly log: Logger,
		private readonly retryOptions: RetryOptions = {},
	) {}

	async updatePortSetting(controllerId: ControllerId, port: number, key: string, value: number | boolean): Promise<void> {
		await this.updatePortSettings(controllerId, port, [[key, value]])
	}

	/**
	 * Changes port mode settings (mode, speeds, triggers, timers, schedule).
	 *
	 * @throws {AcInfinityUnsupportedError} For AI controllers, which take port changes on a different endpoint.
	 */
	async updatePortSettings(controllerId: ControllerId, port: number, changes: readonly SettingChange[]): Promise<void> {
		this.rejectAiController(controllerId, 'Port settings')
		await this.run('update port settings', { controllerId, port }, () =>
			this.client.setDeviceModeSettings(controllerId, port, changes))
	}

	async updateControllerSetting(controllerId: ControllerId, key: string, value: number | boolean): Promise<void> {
		await this.updateControllerSettings(controllerId, [[key, value]])
	}

	/**
	 * Changes controller level advanced settings such as calibration offsets.
	 * The controller's cached name is sent along, since the API blanks it otherwise.
	 *
	 * @throws {AcInfinityUnsupportedError} For AI controllers, whose settings the API does not accept here.
	 */
	async updateControllerSettings(controllerId: ControllerId, changes: readonly SettingChange[]): Promise<void> {
		this.rejectAiController(controllerId, 'Controller settings')
		const devName = this.cache.getControllerProperty(controllerId, 'devName', '')
		const displayName = typeof devName === 'string' ? devName : ''
		await this.run('update controller settings', { controllerId }, () =>
			this.client.updateDeviceSettings(controllerId, 0, displayName, changes))
	}

	async updatePortAdvancedSetting(controllerId: ControllerId, port: number, key: string, value: number | boolean): Promise<void> {
		await this.updatePortAdvancedSettings(controllerId, port, [[key, value]])
	}

	/**
	 * Changes port advanced settings (dynamic response, transition, buffer).
	 * The port's cached name is sent as the display name.
	 *
	 * @throws {AcInfinityUnsupportedError} For AI controllers.
	 */
	async updatePortAdvancedSettings(controllerId: ControllerId, port: number, changes: readonly SettingChange[]): Promise<void> {
		this.rejectAiController(controllerId, 'Port advanced settings')
		const portName = this.cache.getPortProperty(controllerId, port, 'portName', `Port ${port}`)
		await this.run('update port advanced settings', { controllerId, port }, () =>
			this.client.updateDeviceSettings(controllerId, port, portName, changes))
	}

	private rejectAiController(controllerId: ControllerId, what: string): void {
		const deviceType = this.cache.getControllerProperty(controllerId, 'devType', 0)
		if (typeof deviceType === 'number' && AI_CONTROLLER_TYPES.has(deviceType)) {
			throw new AcInfinityUnsupportedError(`${what} cannot be changed on AI controllers [controller: ${controllerId}]`)
		}
	}

	private async run(operation: string, context: ErrorContext, action: () => Promise<SettingsPayload>): Promise<void> {
		try {
			await withRetry(action, {
				...this.retryOptions,
				onRetry: (error, attempt) => {
					const message = error instanceof Error ? error.message : String(error)
					this.log.warn(`[Update] Attempt ${attempt} to ${operation} failed, retrying: ${message}`)
				},
			})
		} catch (error) {
			if (error instanceof AcInfinityAuthError) {
				this.client.logout()
			}
			errorHandler(this.log, error, { operation, ...context })
			throw error
		}
	}
}
