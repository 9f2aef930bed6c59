/**
 * RefreshOrchestrator
 * Drives one refresh: log in when needed, list controllers, fetch every settings
 * record and commit each controller to the cache as one snapshot.
 *
 * Not reentrant. The platform coalesces refresh triggers so that at most one pass
 * is in flight.
 */
import type { Logger } from 'homebridge'
import type { AcInfinityClient } from '../api/acInfinityClient.js'
import type { ControllerCache, ControllerSnapshot } from '../cache/controllerCache.js'
import {
	AcInfinityAuthError,
	type AdvancedSettings,
	type ControllerProperties,
	type PortModeSettings,
} from '../models/acInfinityTypes.js'
import { errorHandler } from '../utils/errorHandler.js'
import { resetErrorState } from '../utils/errorLogManager.js'
import { type RetryOptions, withRetry } from '../utils/retry.js'

export type RefreshState = 'idle' | 'refreshing'

export class RefreshOrchestrator {
	private state: RefreshState = 'idle'
	private lastSuccess: Date | null = null

	constructor(
		private readonly client: AcInfinityClient,
		private readonly cache: ControllerCache,
		private readonly log: Logger,
		private readonly retryOptions: RetryOptions = {},
	) {}

	get isRefreshing(): boolean {
		return this.state === 'refreshing'
	}

	get lastSuccessfulRefresh(): Date | null {
		return this.lastSuccess
	}

	/**
	 * Refreshes the cache, retrying the whole pass on failure.
	 *
	 * @throws The last error once attempts are exhausted, or at once for auth failures.
	 */
	async refresh(): Promise<void> {
		this.state = 'refreshing'
		try {
			const count = await withRetry(() => this.refreshOnce(), {
				...this.retryOptions,
				onRetry: (error, attempt) => {
					const message = error instanceof Error ? error.message : String(error)
					this.log.warn(`[Refresh] Refresh attempt ${attempt} failed, retrying: ${message}`)
				},
			})
			this.lastSuccess = new Date()
			resetErrorState()
			this.log.debug(`[Refresh] Cache refreshed. ${count} controllers currently available.`)
		} catch (error) {
			if (error instanceof AcInfinityAuthError) {
				this.client.logout()
			}
			errorHandler(this.log, error, { operation: 'refresh' })
			throw error
		} finally {
			this.state = 'idle'
		}
	}

	private async refreshOnce(): Promise<number> {
		if (!this.client.isLoggedIn()) {
			await this.client.login()
		}

		const controllers = await this.client.getDevicesListAll()
		for (const properties of controllers) {
			this.cache.commitController(await this.fetchSnapshot(properties))
		}
		this.cache.retainControllers(controllers.map(controller => controller.devId))
		return controllers.length
	}

	private async fetchSnapshot(properties: ControllerProperties): Promise<ControllerSnapshot> {
		const controllerId = properties.devId
		const controllerSettings = await this.client.getDeviceSettings(controllerId, 0)

		const portSettings = new Map<number, PortModeSettings>()
		const portAdvancedSettings = new Map<number, AdvancedSettings>()
		for (const { port } of properties.deviceInfo?.ports ?? []) {
			portSettings.set(port, await this.client.getDeviceModeSettingsList(controllerId, port))
			portAdvancedSettings.set(port, await this.client.getDeviceSettings(controllerId, port))
		}

		return { properties, controllerSettings, portSettings, portAdvancedSettings }
	}
}
