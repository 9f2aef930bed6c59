// fixtures/acInfinityFixtures.ts
// Builders return fresh objects so a test can change its copy freely.
import type {
	AdvancedSettings,
	ControllerProperties,
	PortModeSettings,
	SensorProperties,
} from '../../src/models/acInfinityTypes.js'

export const CONTROLLER_ID = '54929097239553773072'
export const AI_CONTROLLER_ID = 1424979258063365
export const TEST_TOKEN = 'test-token'

export function controllerFixture(): ControllerProperties {
	return {
		devId: CONTROLLER_ID,
		devName: 'Grow Tent',
		devMacAddr: 'AABBCCDDEEFF',
		devType: 11,
		devPortCount: 4,
		hardwareVersion: '1.1',
		firmwareVersion: '3.2.25',
		zoneId: 'America/Chicago',
		online: 1,
		deviceInfo: {
			temperature: 2417,
			humidity: 7200,
			vpdnums: 83,
			ports: [
				{ port: 1, portName: 'Grow Lights', online: 1, speak: 5, curMode: 2, remainTime: 0 },
				{ port: 2, portName: 'Exhaust Fan', online: 1, speak: 7, curMode: 3, remainTime: 15 },
				{ port: 3, portName: 'Circulating Fan', online: 1, speak: 0, curMode: 1, remainTime: null },
				{ port: 4, portName: 'Port 4', online: 0, speak: 0, curMode: 1, remainTime: 0 },
			],
		},
	}
}

export function aiSensorsFixture(): SensorProperties[] {
	return [
		{ accessPort: 0, sensorType: 4, sensorData: 7520, sensorPrecis: 3, sensorUnit: 0 },
		{ accessPort: 0, sensorType: 6, sensorData: 5512, sensorPrecis: 3, sensorUnit: 1 },
		{ accessPort: 1, sensorType: 0, sensorData: 7700, sensorPrecis: 3, sensorUnit: 0 },
		{ accessPort: 1, sensorType: 11, sensorData: 850, sensorPrecis: 1, sensorUnit: 2 },
		{ accessPort: 2, sensorType: 99, sensorData: 1, sensorPrecis: 1, sensorUnit: 0 },
	]
}

export function aiControllerFixture(): ControllerProperties {
	return {
		devId: AI_CONTROLLER_ID,
		devName: 'Flower Tent',
		devMacAddr: '112233445566',
		devType: 20,
		devPortCount: 2,
		hardwareVersion: '2.0',
		firmwareVersion: '1.0.8',
		devTimeZone: 'Europe/Berlin',
		deviceInfo: {
			temperature: 2400,
			humidity: 5512,
			vpdnums: null,
			ports: [
				{ port: 1, portName: 'Heater', online: 1, speak: 3 },
				{ port: 2, online: 1, speak: 0 },
			],
			sensors: aiSensorsFixture(),
		},
	}
}

export function portModeSettingsFixture(port = 1): PortModeSettings {
	return {
		modeSetid: '1424979258063365001',
		devId: CONTROLLER_ID,
		externalPort: port,
		atType: 1,
		onSpead: 5,
		offSpead: 0,
		activeHt: 1,
		devHt: 32,
		devHtf: 90,
		activeLt: 0,
		devLt: 0,
		devLtf: 32,
		activeHh: 0,
		devHh: 0,
		activeLh: 0,
		devLh: 0,
		activeHtVpd: 0,
		activeHtVpdNums: 12,
		activeLtVpd: 0,
		activeLtVpdNums: 8,
		acitveTimerOn: 0,
		acitveTimerOff: 0,
		activeCycleOn: 0,
		activeCycleOff: 0,
		schedStartTime: 65535,
		schedEndtTime: 65535,
		targetVpd: 9,
		targetVpdSwitch: 0,
		surplus: null,
		devMacAddr: 'AABBCCDDEEFF',
		devTimeZone: null,
		ipcSetting: { ipcFlag: 0 },
		devSetting: { devCt: 0, devCh: 0 },
	}
}

export function advancedSettingsFixture(devName = 'Grow Tent'): AdvancedSettings {
	return {
		setId: '1424979258063365002',
		devId: CONTROLLER_ID,
		devName,
		devMacAddr: 'AABBCCDDEEFF',
		devCompany: 0,
		devCt: 0,
		devCth: 0,
		devCh: 0,
		vpdCt: 0,
		vpdCth: 0,
		isFlag: 0,
		devTt: 2,
		devTth: 4,
		devTh: 5,
		vpdTransition: 1,
		devBt: 1,
		devBth: 2,
		devBh: 3,
		devBvpd: 1,
		onTimeSwitch: 0,
		onTime: 0,
		calibrationTime: null,
		sensorSetting: null,
		portResistance: 5000,
		updateAllPorts: 0,
		sensors: null,
		devSettings: null,
	}
}
