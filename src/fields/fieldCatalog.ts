/**
 * Declarative table of the numeric fields a host can expose, one row per field.
 *
 * A row names where the value lives (its source and wire key) and how the wire
 * integer maps to the exposed number. Only rows backed by a settings record can
 * be written; `writeField` does not accept the others.
 */
import type { ControllerCache } from '../cache/controllerCache.js'
import type { ControllerId } from '../models/acInfinityTypes.js'
import { SensorType, decodeSensorValue, isTemperatureSensorType, toCelsius } from '../models/controller.js'
import type { MutationFacade } from '../service/mutationFacade.js'

export type FieldTransform =
	| { kind: 'identity' }
	| { kind: 'fixedPoint', divisor: number }
	| { kind: 'linearOffset', offset: number }

export type PropertySource = 'controllerProperty' | 'portProperty'
export type SettingSource = 'controllerSetting' | 'portSetting' | 'portAdvancedSetting'
export type FieldSource = PropertySource | 'sensorProperty' | SettingSource

interface FieldBase {
	id: string
	key: string
	transform: FieldTransform
}

export interface PropertyField extends FieldBase {
	source: PropertySource
	writable: false
}

/**
 * Reads `key` from the sensor of `sensorType` on the target's access port.
 * `sensorData` is decoded with the sensor's own precision before the transform,
 * and temperatures are converted to Celsius using the sensor's `sensorUnit`.
 */
export interface SensorField extends FieldBase {
	source: 'sensorProperty'
	sensorType: SensorType
	writable: false
}

export interface SettingField extends FieldBase {
	source: SettingSource
	writable: true
}

export type FieldDefinition = PropertyField | SensorField | SettingField

/**
 * Where a field is read. `port` is the port index for port sources and the access
 * port for sensors (0 for the controller's own sensors); controller sources ignore it.
 */
export interface FieldTarget {
	controllerId: ControllerId
	port?: number
}

export type FieldWriter = Pick<MutationFacade, 'updateControllerSetting' | 'updatePortSetting' | 'updatePortAdvancedSetting'>

const identity: FieldTransform = { kind: 'identity' }

export function fixedPoint(divisor: number): FieldTransform {
	return { kind: 'fixedPoint', divisor }
}

export function linearOffset(offset: number): FieldTransform {
	return { kind: 'linearOffset', offset }
}

function property(id: string, source: PropertySource, key: string, transform = identity): PropertyField {
	return { id, source, key, transform, writable: false }
}

function sensor(id: string, sensorType: SensorType, transform = identity): SensorField {
	return { id, source: 'sensorProperty', key: 'sensorData', sensorType, transform, writable: false }
}

function setting(id: string, source: SettingSource, key: string, transform = identity): SettingField {
	return { id, source, key, transform, writable: true }
}

export const FIELD_CATALOG: readonly FieldDefinition[] = [
	property('controllerTemperature', 'controllerProperty', 'temperature', fixedPoint(100)),
	property('controllerHumidity', 'controllerProperty', 'humidity', fixedPoint(100)),
	property('controllerVpd', 'controllerProperty', 'vpdnums', fixedPoint(100)),
	property('portPower', 'portProperty', 'speak'),
	property('portOnline', 'portProperty', 'online'),
	property('portRemainingTime', 'portProperty', 'remainTime'),

	sensor('probeTemperature', SensorType.PROBE_TEMPERATURE_F),
	sensor('probeTemperatureC', SensorType.PROBE_TEMPERATURE_C),
	sensor('probeHumidity', SensorType.PROBE_HUMIDITY),
	sensor('probeVpd', SensorType.PROBE_VPD),
	sensor('sensorTemperature', SensorType.CONTROLLER_TEMPERATURE_F),
	sensor('sensorTemperatureC', SensorType.CONTROLLER_TEMPERATURE_C),
	sensor('sensorHumidity', SensorType.CONTROLLER_HUMIDITY),
	sensor('sensorVpd', SensorType.CONTROLLER_VPD),
	sensor('co2', SensorType.CO2),
	sensor('light', SensorType.LIGHT),
	sensor('soil', SensorType.SOIL),
	sensor('water', SensorType.WATER),

	setting('temperatureCalibration', 'controllerSetting', 'devCt'),
	setting('humidityCalibration', 'controllerSetting', 'devCh'),
	setting('vpdCalibration', 'controllerSetting', 'vpdCt', fixedPoint(10)),

	// modes are 1-based on the wire, 0-based in the mode list
	setting('activeMode', 'portSetting', 'atType', linearOffset(-1)),
	setting('onSpeed', 'portSetting', 'onSpead'),
	setting('offSpeed', 'portSetting', 'offSpead'),
	setting('timerToOn', 'portSetting', 'acitveTimerOn'),
	setting('timerToOff', 'portSetting', 'acitveTimerOff'),
	setting('cycleOn', 'portSetting', 'activeCycleOn'),
	setting('cycleOff', 'portSetting', 'activeCycleOff'),
	setting('scheduleStart', 'portSetting', 'schedStartTime'),
	setting('scheduleEnd', 'portSetting', 'schedEndtTime'),
	setting('vpdHighTrigger', 'portSetting', 'activeHtVpdNums', fixedPoint(10)),
	setting('vpdLowTrigger', 'portSetting', 'activeLtVpdNums', fixedPoint(10)),
	setting('targetVpd', 'portSetting', 'targetVpd', fixedPoint(10)),

	setting('dynamicTransitionTemperature', 'portAdvancedSetting', 'devTt'),
	setting('dynamicTransitionHumidity', 'portAdvancedSetting', 'devTh'),
	setting('dynamicTransitionVpd', 'portAdvancedSetting', 'vpdTransition', fixedPoint(10)),
	setting('dynamicBufferTemperature', 'portAdvancedSetting', 'devBt'),
	setting('dynamicBufferHumidity', 'portAdvancedSetting', 'devBh'),
	setting('dynamicBufferVpd', 'portAdvancedSetting', 'devBvpd', fixedPoint(10)),
	setting('sunriseTimer', 'portAdvancedSetting', 'onTime'),
]

export function getField(id: string): FieldDefinition | undefined {
	return FIELD_CATALOG.find(field => field.id === id)
}

/**
 * True when the backing key was reported for this target, so a host should expose
 * the field. A key holding null still counts.
 */
export function isFieldSuitable(cache: ControllerCache, field: FieldDefinition, target: FieldTarget): boolean {
	const { controllerId } = target
	const port = target.port ?? 0
	switch (field.source) {
	case 'controllerProperty':
		return cache.getControllerPropertyExists(controllerId, field.key)
	case 'portProperty':
		return cache.getPortPropertyExists(controllerId, port, field.key)
	case 'sensorProperty':
		return cache.getSensorPropertyExists(controllerId, port, field.sensorType, field.key)
	case 'controllerSetting':
		return cache.getControllerSettingExists(controllerId, field.key)
	case 'portSetting':
		return cache.getPortSettingExists(controllerId, port, field.key)
	case 'portAdvancedSetting':
		return cache.getPortAdvancedSettingExists(controllerId, port, field.key)
	}
}

/**
 * Reads a field with its transform applied. Missing, null and non-numeric values
 * all give `defaultValue`.
 */
export function readField<D>(cache: ControllerCache, field: FieldDefinition, target: FieldTarget, defaultValue: D): number | D {
	const raw = readRaw(cache, field, target)
	if (typeof raw !== 'number') {
		return defaultValue
	}
	return applyTransform(field.transform, raw)
}

/**
 * Writes a field through the matching mutator after inverting its transform.
 */
export async function writeField(writer: FieldWriter, field: SettingField, target: FieldTarget, value: number): Promise<void> {
	const raw = invertTransform(field.transform, value)
	const port = target.port ?? 0
	switch (field.source) {
	case 'controllerSetting':
		await writer.updateControllerSetting(target.controllerId, field.key, raw)
		break
	case 'portSetting':
		await writer.updatePortSetting(target.controllerId, port, field.key, raw)
		break
	case 'portAdvancedSetting':
		await writer.updatePortAdvancedSetting(target.controllerId, port, field.key, raw)
		break
	}
}

export function applyTransform(transform: FieldTransform, raw: number): number {
	switch (transform.kind) {
	case 'identity':
		return raw
	case 'fixedPoint':
		return raw / transform.divisor
	case 'linearOffset':
		return raw + transform.offset
	}
}

export function invertTransform(transform: FieldTransform, value: number): number {
	switch (transform.kind) {
	case 'identity':
		return value
	case 'fixedPoint':
		return Math.round(value * transform.divisor)
	case 'linearOffset':
		return value - transform.offset
	}
}

function readRaw(cache: ControllerCache, field: FieldDefinition, target: FieldTarget): unknown {
	const { controllerId } = target
	const port = target.port ?? 0
	switch (field.source) {
	case 'controllerProperty':
		return cache.getControllerProperty(controllerId, field.key, undefined)
	case 'portProperty':
		return cache.getPortProperty(controllerId, port, field.key, undefined)
	case 'sensorProperty': {
		const data = cache.getSensorProperty(controllerId, port, field.sensorType, field.key, undefined)
		if (typeof data !== 'number' || field.key !== 'sensorData') {
			return data
		}
		const precision = cache.getSensorProperty(controllerId, port, field.sensorType, 'sensorPrecis', 1)
		const value = decodeSensorValue(data, precision)
		if (!isTemperatureSensorType(field.sensorType)) {
			return value
		}
		return toCelsius(value, cache.getSensorProperty(controllerId, port, field.sensorType, 'sensorUnit', 0))
	}
	case 'controllerSetting':
		return cache.getControllerSetting(controllerId, field.key, undefined)
	case 'portSetting':
		return cache.getPortSetting(controllerId, port, field.key, undefined)
	case 'portAdvancedSetting':
		return cache.getPortAdvancedSetting(controllerId, port, field.key, undefined)
	}
}
