import type { Reading } from "../models/runtimeCycle";
import type { DeviceSettings } from "../lib/config";
import { ClimateInsightsError } from "../lib/errors";
import type { ForeignStateAccess } from "./WeatherService";

/**
 * Builds a device reading from the thermostat states configured for it
 */
export class ClimateStateReader {
	/**
	 * Create new ClimateStateReader
	 *
	 * @param adapter The ioBroker adapter instance
	 * @param device state ids of one thermostat
	 */
	constructor(
		private readonly adapter: ForeignStateAccess,
		private readonly device: DeviceSettings,
	) {}

	/**
	 * Read all configured states of the device
	 *
	 * @param now timestamp assigned to the reading (ms)
	 * @returns current reading
	 */
	async read(now: number): Promise<Reading> {
		const [currentTemperature, targetTemperature, hvacAction, equipmentRunning, runningState] = await Promise.all([
			this.readValue(this.device.currentTemperatureStateId),
			this.readValue(this.device.targetTemperatureStateId),
			this.readValue(this.device.hvacActionStateId),
			this.readValue(this.device.equipmentRunningStateId),
			this.readValue(this.device.runningStateId),
		]);

		const equipment = toText(equipmentRunning);
		const running = this.device.runningStateId
			? toFlag(runningState)
			: equipment.includes(this.device.runningPattern);

		return {
			timestamp: now,
			running,
			currentTemperature: toNumber(currentTemperature),
			targetTemperature: toNumber(targetTemperature),
			hvacAction: toText(hvacAction),
			equipmentRunning: equipment,
		};
	}

	private async readValue(id: string | undefined): Promise<ioBroker.StateValue | undefined> {
		if (!id) {
			return undefined;
		}
		try {
			const state = await this.adapter.getForeignStateAsync(id);
			return state?.val;
		} catch (error) {
			throw new ClimateInsightsError(`Error reading state ${id}: ${String(error)}`, this.device.id);
		}
	}
}

function toNumber(value: ioBroker.StateValue | undefined): number | null {
	if (value === null || value === undefined || typeof value === "boolean" || value === "") {
		return null;
	}
	const number = Number(value);
	return isNaN(number) ? null : number;
}

function toText(value: ioBroker.StateValue | undefined): string {
	if (value === null || value === undefined) {
		return "";
	}
	return typeof value === "string" ? value : String(value);
}

function toFlag(value: ioBroker.StateValue | undefined): boolean {
	if (typeof value === "string") {
		return value === "true" || value === "on" || value === "1";
	}
	return value === true || (typeof value === "number" && value !== 0);
}
