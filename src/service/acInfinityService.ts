import type { Logger } from 'homebridge'
import { AcInfinityClient } from '../api/acInfinityClient.js'
import { ControllerCache } from '../cache/controllerCache.js'
import type { ControllerId, SettingChange } from '../models/acInfinityTypes.js'
import type { Controller } from '../models/controller.js'
import { DEFAULT_HOST } from '../settings.js'
import type { RetryOptions } from '../utils/retry.js'
import { MutationFacade } from './mutationFacade.js'
import { RefreshOrchestrator } from './refreshOrchestrator.js'

export interface AcInfinityServiceOptions {
	email: string
	password: string
	host?: string
	retry?: RetryOptions
	/** Replaces the client built from the credentials above. */
	client?: AcInfinityClient
}

/**
 * AcInfinityService
 * The one object a host holds: reads go through `cache`, writes through the
 * update methods, and `refresh()` brings the cache up to date.
 */
export class AcInfinityService {
	readonly cache: ControllerCache
	private readonly client: AcInfinityClient
	private readonly orchestrator: RefreshOrchestrator
	private readonly mutations: MutationFacade

	constructor(options: AcInfinityServiceOptions, log: Logger) {
		this.client = options.client ?? new AcInfinityClient(options.host ?? DEFAULT_HOST, options.email, options.password, log)
		this.cache = new ControllerCache(log)
		this.orchestrator = new RefreshOrchestrator(this.client, this.cache, log, options.retry)
		this.mutations = new MutationFacade(this.client, this.cache, log, options.retry)
	}

	refresh(): Promise<void> {
		return this.orchestrator.refresh()
	}

	get isRefreshing(): boolean {
		return this.orchestrator.isRefreshing
	}

	get lastSuccessfulRefresh(): Date | null {
		return this.orchestrator.lastSuccessfulRefresh
	}

	getAllControllerProperties(): Controller[] {
		return this.cache.getAllControllerProperties()
	}

	updatePortSetting(controllerId: ControllerId, port: number, key: string, value: number | boolean): Promise<void> {
		return this.mutations.updatePortSetting(controllerId, port, key, value)
	}

	updatePortSettings(controllerId: ControllerId, port: number, changes: readonly SettingChange[]): Promise<void> {
		return this.mutations.updatePortSettings(controllerId, port, changes)
	}

	updateControllerSetting(controllerId: ControllerId, key: string, value: number | boolean): Promise<void> {
		return this.mutations.updateControllerSetting(controllerId, key, value)
	}

	updateControllerSettings(controllerId: ControllerId, changes: readonly SettingChange[]): Promise<void> {
		return this.mutations.updateControllerSettings(controllerId, changes)
	}

	updatePortAdvancedSetting(controllerId: ControllerId, port: number, key: string, value: number | boolean): Promise<void> {
		return this.mutations.updatePortAdvancedSetting(controllerId, port, key, value)
	}

	updatePortAdvancedSettings(controllerId: ControllerId, port: number, changes: readonly SettingChange[]): Promise<void> {
		return this.mutations.updatePortAdvancedSettings(controllerId, port, changes)
	}

	/**
	 * Drops the session. The cache keeps its content.
	 */
	close(): void {
		this.client.logout()
	}
}
