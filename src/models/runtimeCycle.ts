/**
 * Models for raw device readings and completed runtime cycles
 */

/**
 * Latest raw snapshot reported by a thermostat
 */
export interface Reading {
	/** Unix timestamp in ms */
	timestamp: number;
	/** true = compressor/furnace active */
	running: boolean;
	/** Current room temperature, null if the device does not report it */
	currentTemperature: number | null;
	/** Setpoint, null if the device does not report it */
	targetTemperature: number | null;
	/** HVAC action label, e.g. "cooling", "heating", "idle" */
	hvacAction: string;
	/** Equipment running label, e.g. "compCool1,fan" */
	equipmentRunning: string;
}

/**
 * One completed interval of active runtime
 */
export interface RuntimeCycle {
	/** Device the cycle belongs to */
	deviceId: string;
	/** Cycle start timestamp (ms) */
	startTime: number;
	/** Cycle end timestamp (ms), never before startTime */
	endTime: number;
	/** endTime - startTime in seconds */
	durationSeconds: number;
	/** Temperature when the equipment started */
	startTemperature: number | null;
	/** Temperature when the equipment stopped */
	endTemperature: number | null;
	/** Outdoor temperature known when the cycle closed */
	outdoorTemperature?: number;
}

/**
 * Absolute temperature change over a cycle, or null if either end is unknown
 *
 * @param cycle completed cycle
 * @returns |start - end| or null
 */
export function temperatureDelta(cycle: RuntimeCycle): number | null {
	if (cycle.startTemperature === null || cycle.endTemperature === null) {
		return null;
	}
	return Math.abs(cycle.startTemperature - cycle.endTemperature);
}
