/**
 * Read-only views over cached controller blobs. They are rebuilt from the cache on
 * every enumeration and never fetch anything themselves.
 */
import type { Logger } from 'homebridge'
import type { ControllerDeviceInfo, ControllerProperties, PortProperties, SensorProperties } from './acInfinityTypes.js'

/**
 * Controller hardware codes reported in `devType`.
 */
export enum ControllerType {
	UIS_69_PRO = 11,
	UIS_69_PRO_PLUS = 18,
	UIS_89_AI_PLUS = 20,
	UIS_OUTLET_AI = 22,
	UIS_OUTLET_AI_PLUS = 24,
}

export const AI_CONTROLLER_TYPES: ReadonlySet<number> = new Set([
	ControllerType.UIS_89_AI_PLUS,
	ControllerType.UIS_OUTLET_AI,
	ControllerType.UIS_OUTLET_AI_PLUS,
])

/**
 * Sensor codes reported in `sensorType` by AI controllers.
 */
export enum SensorType {
	PROBE_TEMPERATURE_F = 0,
	PROBE_TEMPERATURE_C = 1,
	PROBE_HUMIDITY = 2,
	PROBE_VPD = 3,
	CONTROLLER_TEMPERATURE_F = 4,
	CONTROLLER_TEMPERATURE_C = 5,
	CONTROLLER_HUMIDITY = 6,
	CONTROLLER_VPD = 7,
	SOIL = 10,
	CO2 = 11,
	LIGHT = 12,
	WATER = 20,
}

const TEMPERATURE_SENSOR_TYPES: ReadonlySet<number> = new Set([
	SensorType.PROBE_TEMPERATURE_F,
	SensorType.PROBE_TEMPERATURE_C,
	SensorType.CONTROLLER_TEMPERATURE_F,
	SensorType.CONTROLLER_TEMPERATURE_C,
])

export function isTemperatureSensorType(sensorType: number): boolean {
	return TEMPERATURE_SENSOR_TYPES.has(sensorType)
}

/**
 * Maps a `devType` code to a model label. The vendor ships new hardware without
 * notice, so unknown codes get a generic label instead of an error.
 */
export function getControllerModel(deviceType: number): string {
	switch (deviceType) {
	case ControllerType.UIS_69_PRO:
		return 'UIS Controller 69 Pro (CTR69P)'
	case ControllerType.UIS_69_PRO_PLUS:
		return 'UIS Controller 69 Pro+ (CTR69Q)'
	case ControllerType.UIS_89_AI_PLUS:
		return 'UIS Controller AI+ (CTR89Q)'
	case ControllerType.UIS_OUTLET_AI:
		return 'UIS Controller Outlet AI (AC-ADA4)'
	case ControllerType.UIS_OUTLET_AI_PLUS:
		return 'UIS Controller Outlet AI+ (AC-ADA8)'
	default:
		return `UIS Controller Type ${deviceType}`
	}
}

const KNOWN_SENSOR_TYPES: ReadonlySet<number> = new Set(
	Object.values(SensorType).filter((value): value is number => typeof value === 'number'),
)

export function isKnownSensorType(sensorType: number): sensorType is SensorType {
	return KNOWN_SENSOR_TYPES.has(sensorType)
}

/**
 * Decodes a fixed-point sensor reading: `data / 10^(precision - 1)` when precision > 1.
 * `decodeSensorValue(2417, 3)` is 24.17.
 */
export function decodeSensorValue(data: number, precision: number): number {
	if (precision > 1) {
		return data / Math.pow(10, precision - 1)
	}
	return data
}

/**
 * Converts a decoded temperature to Celsius. Unit 0 means the reading is Fahrenheit.
 */
export function toCelsius(value: number, unit: number): number {
	if (unit === 0) {
		return Math.round(((value - 32) * 5 / 9) * 100) / 100
	}
	return value
}

/**
 * A numbered port on a controller. Holds a non-owning reference back to it.
 */
export class Port {
	readonly portIndex: number
	readonly portName: string

	constructor(readonly controller: Controller, json: PortProperties) {
		this.portIndex = json.port
		this.portName = json.portName ?? `Port ${json.port}`
	}
}

/**
 * A typed reading from an AI controller's sensor array.
 */
export class Sensor {
	readonly sensorType: SensorType
	readonly accessPort: number
	readonly data: number
	readonly precision: number
	readonly unit: number

	constructor(readonly controller: Controller, sensorType: SensorType, json: SensorProperties) {
		this.sensorType = sensorType
		this.accessPort = json.accessPort
		this.data = json.sensorData ?? 0
		this.precision = json.sensorPrecis ?? 1
		this.unit = json.sensorUnit ?? 0
	}

	get value(): number {
		return decodeSensorValue(this.data, this.precision)
	}

	get isTemperature(): boolean {
		return isTemperatureSensorType(this.sensorType)
	}

	/**
	 * The reading in Celsius for temperature sensors, otherwise undefined.
	 */
	get celsius(): number | undefined {
		return this.isTemperature ? toCelsius(this.value, this.unit) : undefined
	}
}

/**
 * One controller hub with its ports and, for AI hardware, its sensors.
 */
export class Controller {
	readonly controllerId: string
	readonly macAddress: string
	readonly displayName: string
	readonly hardwareVersion: string
	readonly firmwareVersion: string
	readonly deviceType: number
	readonly model: string
	readonly timezone: string
	readonly portCount: number
	readonly ports: Port[]
	readonly sensors: Sensor[]

	constructor(json: ControllerProperties, log?: Logger) {
		this.controllerId = String(json.devId)
		this.macAddress = json.devMacAddr ?? ''
		this.displayName = json.devName ?? `Controller ${this.controllerId}`
		this.hardwareVersion = json.hardwareVersion ?? ''
		this.firmwareVersion = json.firmwareVersion ?? ''
		this.deviceType = json.devType ?? 0
		this.model = getControllerModel(this.deviceType)
		this.timezone = json.zoneId ?? json.devTimeZone ?? ''

		const info: ControllerDeviceInfo = json.deviceInfo ?? {}
		this.ports = (info.ports ?? []).map(port => new Port(this, port))
		this.portCount = json.devPortCount ?? this.ports.length

		this.sensors = []
		for (const sensor of info.sensors ?? []) {
			if (isKnownSensorType(sensor.sensorType)) {
				this.sensors.push(new Sensor(this, sensor.sensorType, sensor))
			} else {
				log?.debug(`[Cache] Skipping unknown sensor type ${sensor.sensorType} on controller ${this.controllerId} port ${sensor.accessPort}`)
			}
		}
	}

	get isAiController(): boolean {
		return AI_CONTROLLER_TYPES.has(this.deviceType)
	}

	getPort(portIndex: number): Port | undefined {
		return this.ports.find(port => port.portIndex === portIndex)
	}
}
