import type { API, DynamicPlatformPlugin, Logger, PlatformAccessory, PlatformConfig } from 'homebridge'
import { AcInfinityConfigError, type AcInfinityPlatformConfig } from './models/acInfinityTypes.js'
import type { Controller } from './models/controller.js'
import { AcInfinityService } from './service/acInfinityService.js'
import { FIELD_CATALOG, type FieldTarget, type SettingField, isFieldSuitable, writeField } from './fields/fieldCatalog.js'
import { DEFAULT_HOST, DEFAULT_POLLING_INTERVAL_SECONDS, MIN_POLLING_INTERVAL_SECONDS } from './settings.js'

/**
 * AcInfinity Homebridge Platform
 * Validates the config, owns the AC Infinity service and polls it on a timer.
 *
 * @remarks
 * - Refreshes are single-flight: a trigger while one is running joins it.
 * - A failed refresh keeps the previous cache and is retried on the next tick.
 * - Configuration is validated at construction for required fields and values.
 */
export class AcInfinityPlatform implements DynamicPlatformPlugin {
	public readonly config: AcInfinityPlatformConfig
	public readonly service: AcInfinityService
	private readonly pollingIntervalMs: number
	private refreshTimer: NodeJS.Timeout | null = null
	private inFlightRefresh: Promise<void> | null = null

	constructor(
		public readonly log: Logger,
		config: PlatformConfig,
		public readonly api: API,
	) {
		this.config = this.loadConfig(config)
		const host = this.config.host ?? DEFAULT_HOST
		this.log.debug(`[Platform] Initializing AC Infinity platform: ${this.config.name ?? 'AC Infinity'} (host: ${host})`)

		this.service = new AcInfinityService({
			email: this.config.email,
			password: this.config.password,
			host,
		}, this.log)
		this.pollingIntervalMs = (this.config.pollingIntervalSeconds ?? DEFAULT_POLLING_INTERVAL_SECONDS) * 1000

		this.api.on('didFinishLaunching', this.handleDidFinishLaunching.bind(this))
		this.api.on('shutdown', this.shutdown.bind(this))
	}

	private handleDidFinishLaunching(): void {
		this.log.debug('[Platform] Finished loading, starting first refresh...')
		this.requestRefresh()
			.then(() => this.logControllers(this.service.getAllControllerProperties()))
			.catch((err: unknown) => {
				this.log.warn(`[Platform] First refresh failed, will retry in ${this.pollingIntervalMs / 1000} seconds: ${describeError(err)}`)
			})
		this.startRefreshTimer()
	}

	private loadConfig(config: PlatformConfig): AcInfinityPlatformConfig {
		try {
			return this.validateConfig(config)
		} catch (err) {
			if (err instanceof AcInfinityConfigError) {
				this.log.error(err.message)
			}
			throw err
		}
	}

	/**
	 * Validates the platform configuration.
	 *
	 * @throws {AcInfinityConfigError} Naming the offending field.
	 */
	private validateConfig(config: PlatformConfig): AcInfinityPlatformConfig {
		const { email, password, host, pollingIntervalSeconds } = config
		if (!email || typeof email !== 'string') {
			throw new AcInfinityConfigError('Config error: "email" is required and must be a string.')
		}
		if (!password || typeof password !== 'string') {
			throw new AcInfinityConfigError('Config error: "password" is required and must be a string.')
		}
		if (host !== undefined && (typeof host !== 'string' || !/^https?:\/\//.test(host))) {
			throw new AcInfinityConfigError('Config error: "host" must be an http(s) URL if provided.')
		}
		if (pollingIntervalSeconds !== undefined
			&& (typeof pollingIntervalSeconds !== 'number' || !Number.isFinite(pollingIntervalSeconds) || pollingIntervalSeconds < MIN_POLLING_INTERVAL_SECONDS)) {
			throw new AcInfinityConfigError(`Config error: "pollingIntervalSeconds" must be a number of at least ${MIN_POLLING_INTERVAL_SECONDS} if provided.`)
		}
		return {
			...config,
			email,
			password,
			host: typeof host === 'string' ? host : undefined,
			pollingIntervalSeconds: typeof pollingIntervalSeconds === 'number' ? pollingIntervalSeconds : undefined,
		}
	}

	/**
	 * Required by Homebridge. This plugin registers no accessories, so restored ones are only logged.
	 */
	configureAccessory(accessory: PlatformAccessory): void {
		this.log.info(`[Platform] Ignoring cached accessory: ${accessory.displayName}`)
	}

	/**
	 * Refreshes the cache, joining the refresh already in flight if there is one.
	 */
	requestRefresh(): Promise<void> {
		if (this.inFlightRefresh) {
			this.log.debug('[Platform] Refresh already in progress, joining it.')
			return this.inFlightRefresh
		}
		this.inFlightRefresh = this.service.refresh().finally(() => {
			this.inFlightRefresh = null
		})
		return this.inFlightRefresh
	}

	/**
	 * Writes a catalog field, then refreshes so the cache shows the new value.
	 */
	async setField(field: SettingField, target: FieldTarget, value: number): Promise<void> {
		await writeField(this.service, field, target, value)
		await this.refreshAfterWrite()
	}

	/**
	 * A refresh already in flight read its settings before the write, so it is not
	 * joined: wait for it to settle, then start a new one.
	 */
	private async refreshAfterWrite(): Promise<void> {
		if (this.inFlightRefresh) {
			this.log.debug('[Platform] Waiting for the running refresh before refreshing after a write.')
			await this.inFlightRefresh.catch(() => undefined)
		}
		await this.requestRefresh()
	}

	private startRefreshTimer(): void {
		if (this.refreshTimer) {
			clearInterval(this.refreshTimer)
		}
		this.refreshTimer = setInterval(() => {
			this.requestRefresh().catch((err: unknown) => {
				// already reported by the refresh itself
				this.log.debug(`[Platform] Scheduled refresh failed: ${describeError(err)}`)
			})
		}, this.pollingIntervalMs)
		this.log.info(`[Platform] Refresh timer started (every ${this.pollingIntervalMs / 1000} seconds).`)
	}

	shutdown(): void {
		if (this.refreshTimer) {
			clearInterval(this.refreshTimer)
			this.refreshTimer = null
		}
		this.service.close()
	}

	private logControllers(controllers: Controller[]): void {
		if (!controllers.length) {
			this.log.warn('[Platform] No controllers found on this AC Infinity account.')
			return
		}
		for (const controller of controllers) {
			this.log.info(`[Platform] Found ${controller.displayName} (${controller.model}, ${controller.ports.length} ports, ${controller.sensors.length} sensors)`)
			const targets: FieldTarget[] = [
				{ controllerId: controller.controllerId, port: 0 },
				...controller.ports.map(port => ({ controllerId: controller.controllerId, port: port.portIndex })),
			]
			for (const target of targets) {
				const fields = FIELD_CATALOG.filter(field => isFieldSuitable(this.service.cache, field, target)).map(field => field.id)
				if (fields.length) {
					this.log.debug(`[Platform] ${controller.displayName} port ${target.port}: ${fields.join(', ')}`)
				}
			}
		}
	}
}

function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
