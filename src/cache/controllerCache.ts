/**
 * ControllerCache
 * In-memory store of the blobs fetched by the last refresh, keyed by controller,
 * port and sensor.
 *
 * Only the refresh orchestrator writes here. Every value accessor resolves an
 * unknown id, an unknown key and a stored null through the same default path;
 * the `*Exists` checks report a key even when its value is null.
 */
import type { Logger } from 'homebridge'
import type {
	AdvancedSettings,
	ControllerDeviceInfo,
	ControllerId,
	ControllerProperties,
	JsonRecord,
	PortModeSettings,
	PortProperties,
	SensorProperties,
} from '../models/acInfinityTypes.js'
import { Controller } from '../models/controller.js'

/**
 * Everything fetched for one controller in one refresh pass.
 */
export interface ControllerSnapshot {
	properties: ControllerProperties
	controllerSettings: AdvancedSettings | null
	portSettings: ReadonlyMap<number, PortModeSettings>
	portAdvancedSettings: ReadonlyMap<number, AdvancedSettings>
}

export function controllerKey(controllerId: ControllerId): string {
	return String(controllerId)
}

export function portKey(controllerId: ControllerId, port: number): string {
	return `${controllerKey(controllerId)}:${port}`
}

export function sensorKey(controllerId: ControllerId, accessPort: number, sensorType: number): string {
	return `${controllerKey(controllerId)}:${accessPort}:${sensorType}`
}

function readValue<T extends JsonRecord, K extends string, D>(blob: T | undefined, key: K, defaultValue: D): NonNullable<T[K]> | D {
	return blob?.[key] ?? defaultValue
}

function hasKey(blob: JsonRecord | undefined, key: string): boolean {
	return blob !== undefined && key in blob
}

export class ControllerCache {
	private controllers: Map<string, ControllerProperties> = new Map()
	private ports: Map<string, PortProperties> = new Map()
	private sensors: Map<string, SensorProperties> = new Map()
	private controllerSettings: Map<string, AdvancedSettings> = new Map()
	private portSettings: Map<string, PortModeSettings> = new Map()
	private portAdvancedSettings: Map<string, AdvancedSettings> = new Map()

	constructor(private readonly log?: Logger) {}

	/**
	 * Replaces everything held for one controller with a fresh snapshot. Ports and
	 * sensors the controller no longer reports are dropped with it.
	 */
	commitController(snapshot: ControllerSnapshot): void {
		const { properties } = snapshot
		const id = controllerKey(properties.devId)
		this.removeController(id)

		this.controllers.set(id, properties)
		if (snapshot.controllerSettings !== null) {
			this.controllerSettings.set(id, snapshot.controllerSettings)
		}

		const info: ControllerDeviceInfo = properties.deviceInfo ?? {}
		for (const port of info.ports ?? []) {
			this.ports.set(portKey(id, port.port), port)
		}
		for (const sensor of info.sensors ?? []) {
			this.sensors.set(sensorKey(id, sensor.accessPort, sensor.sensorType), sensor)
		}
		for (const [port, settings] of snapshot.portSettings) {
			this.portSettings.set(portKey(id, port), settings)
		}
		for (const [port, settings] of snapshot.portAdvancedSettings) {
			this.portAdvancedSettings.set(portKey(id, port), settings)
		}
	}

	/**
	 * Drops every controller not in `controllerIds`. Called once a refresh pass has
	 * fetched all controllers, so a removed controller disappears with the next success.
	 */
	retainControllers(controllerIds: Iterable<ControllerId>): void {
		const keep = new Set(Array.from(controllerIds, controllerKey))
		for (const id of this.getControllerIds()) {
			if (!keep.has(id)) {
				this.log?.debug(`[Cache] Controller ${id} is no longer reported; removing it.`)
				this.removeController(id)
			}
		}
	}

	clear(): void {
		this.controllers.clear()
		this.ports.clear()
		this.sensors.clear()
		this.controllerSettings.clear()
		this.portSettings.clear()
		this.portAdvancedSettings.clear()
	}

	getControllerIds(): string[] {
		return Array.from(this.controllers.keys())
	}

	/**
	 * Builds fresh Controller views from the cached blobs. Nothing is fetched.
	 */
	getAllControllerProperties(): Controller[] {
		return Array.from(this.controllers.values(), properties => new Controller(properties, this.log))
	}

	/**
	 * Looks a key up on the controller blob, then on its nested `deviceInfo`.
	 * A key present at the top level wins even when its value is null.
	 */
	getControllerProperty<K extends string, D>(
		controllerId: ControllerId,
		key: K,
		defaultValue: D,
	): NonNullable<ControllerProperties[K]> | NonNullable<ControllerDeviceInfo[K]> | D {
		const blob = this.controllers.get(controllerKey(controllerId))
		if (blob === undefined) {
			return defaultValue
		}
		if (hasKey(blob, key)) {
			return readValue(blob, key, defaultValue)
		}
		return readValue(blob.deviceInfo ?? undefined, key, defaultValue)
	}

	getControllerPropertyExists(controllerId: ControllerId, key: string): boolean {
		const blob = this.controllers.get(controllerKey(controllerId))
		return hasKey(blob, key) || hasKey(blob?.deviceInfo ?? undefined, key)
	}

	getPortProperty<K extends string, D>(controllerId: ControllerId, port: number, key: K, defaultValue: D): NonNullable<PortProperties[K]> | D {
		return readValue(this.ports.get(portKey(controllerId, port)), key, defaultValue)
	}

	getPortPropertyExists(controllerId: ControllerId, port: number, key: string): boolean {
		return hasKey(this.ports.get(portKey(controllerId, port)), key)
	}

	getSensorProperty<K extends string, D>(
		controllerId: ControllerId,
		accessPort: number,
		sensorType: number,
		key: K,
		defaultValue: D,
	): NonNullable<SensorProperties[K]> | D {
		return readValue(this.sensors.get(sensorKey(controllerId, accessPort, sensorType)), key, defaultValue)
	}

	getSensorPropertyExists(controllerId: ControllerId, accessPort: number, sensorType: number, key: string): boolean {
		return hasKey(this.sensors.get(sensorKey(controllerId, accessPort, sensorType)), key)
	}

	/**
	 * Controller level advanced settings (calibration, units), fetched with port 0.
	 */
	getControllerSetting<K extends string, D>(controllerId: ControllerId, key: K, defaultValue: D): NonNullable<AdvancedSettings[K]> | D {
		return readValue(this.controllerSettings.get(controllerKey(controllerId)), key, defaultValue)
	}

	getControllerSettingExists(controllerId: ControllerId, key: string): boolean {
		return hasKey(this.controllerSettings.get(controllerKey(controllerId)), key)
	}

	/**
	 * Port mode settings: active mode, speeds, triggers, timers, schedule and VPD targets.
	 */
	getPortSetting<K extends string, D>(controllerId: ControllerId, port: number, key: K, defaultValue: D): NonNullable<PortModeSettings[K]> | D {
		return readValue(this.portSettings.get(portKey(controllerId, port)), key, defaultValue)
	}

	getPortSettingExists(controllerId: ControllerId, port: number, key: string): boolean {
		return hasKey(this.portSettings.get(portKey(controllerId, port)), key)
	}

	/**
	 * Port advanced settings: dynamic response, transition and buffer values.
	 */
	getPortAdvancedSetting<K extends string, D>(controllerId: ControllerId, port: number, key: K, defaultValue: D): NonNullable<AdvancedSettings[K]> | D {
		return readValue(this.portAdvancedSettings.get(portKey(controllerId, port)), key, defaultValue)
	}

	getPortAdvancedSettingExists(controllerId: ControllerId, port: number, key: string): boolean {
		return hasKey(this.portAdvancedSettings.get(portKey(controllerId, port)), key)
	}

	private removeController(id: string): void {
		this.controllers.delete(id)
		this.controllerSettings.delete(id)
		const prefix = `${id}:`
		for (const map of [this.ports, this.sensors, this.portSettings, this.portAdvancedSettings]) {
			for (const key of Array.from(map.keys())) {
				if (key.startsWith(prefix)) {
					map.delete(key)
				}
			}
		}
	}
}
