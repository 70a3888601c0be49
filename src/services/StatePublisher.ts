import type { Snapshot, SnapshotAttributes } from "../models/metrics";

/**
 * One-way sink for snapshots; the core never reads anything back from it
 */
export interface SnapshotPublisher {
	publish(snapshot: Snapshot): Promise<void>;
}

/**
 * Minimal object and state access needed from the adapter
 */
export interface StateWriter {
	setObjectNotExistsAsync(id: string, obj: ioBroker.SettableObject): Promise<unknown>;
	setStateAsync(id: string, state: ioBroker.StateValue, ack: boolean): Promise<unknown>;
}

export type PublishedState = "runtime" | keyof SnapshotAttributes | "failures";

interface StateDefinition {
	name: string;
	type: "number" | "string" | "boolean";
	role: string;
	unit?: string;
}

/**
 * Builds the object definitions of all published states
 *
 * @param temperatureUnit unit the thermostat reports in
 * @returns definition per state
 */
export function stateDefinitions(temperatureUnit: "F" | "C"): Record<PublishedState, StateDefinition> {
	const degrees = `°${temperatureUnit}`;
	return {
		runtime: { name: "Runtime of the current cycle", type: "number", role: "value.interval", unit: "min" },
		averageRuntime: { name: "Average cycle runtime", type: "number", role: "value.interval", unit: "min" },
		currentTemperature: { name: "Current temperature", type: "number", role: "value.temperature", unit: degrees },
		targetTemperature: { name: "Target temperature", type: "number", role: "value.temperature", unit: degrees },
		hvacAction: { name: "HVAC action", type: "string", role: "text" },
		equipmentRunning: { name: "Equipment running", type: "string", role: "text" },
		alert: { name: "Runtime above threshold", type: "boolean", role: "indicator.alarm" },
		avgTimePerDegree: {
			name: "Average time per degree",
			type: "number",
			role: "value",
			unit: `min/${degrees}`,
		},
		efficiencyScore: { name: "Efficiency score", type: "number", role: "value", unit: "%" },
		estimatedDailyCost: { name: "Estimated daily cost", type: "number", role: "value" },
		outdoorTemperature: { name: "Outdoor temperature", type: "number", role: "value.temperature", unit: degrees },
		outdoorTemperatureStale: { name: "Outdoor temperature is stale", type: "boolean", role: "indicator" },
		sampleCount: { name: "Cycles in the lookback window", type: "number", role: "value" },
		failures: { name: "Components that failed in the last poll", type: "string", role: "json" },
	};
}

/**
 * Writes snapshots into `<deviceId>.<state>` states of the adapter instance
 */
export class IoBrokerStatePublisher implements SnapshotPublisher {
	private readonly definitions: Record<PublishedState, StateDefinition>;
	private readonly createdDevices = new Set<string>();

	/**
	 * Create new IoBrokerStatePublisher
	 *
	 * @param adapter The ioBroker adapter instance
	 * @param temperatureUnit unit the thermostats report in
	 * @param deviceNames display names by device id
	 */
	constructor(
		private readonly adapter: StateWriter,
		temperatureUnit: "F" | "C",
		private readonly deviceNames: Readonly<Record<string, string>> = {},
	) {
		this.definitions = stateDefinitions(temperatureUnit);
	}

	async publish(snapshot: Snapshot): Promise<void> {
		await this.ensureObjects(snapshot.deviceId);

		const values: Record<PublishedState, ioBroker.StateValue> = {
			runtime: snapshot.state,
			...snapshot.attributes,
			failures: JSON.stringify(snapshot.failures),
		};
		await Promise.all(
			Object.entries(values).map(([key, value]) =>
				this.adapter.setStateAsync(`${snapshot.deviceId}.${key}`, value, true),
			),
		);
	}

	private async ensureObjects(deviceId: string): Promise<void> {
		if (this.createdDevices.has(deviceId)) {
			return;
		}
		await this.adapter.setObjectNotExistsAsync(deviceId, {
			type: "device",
			_id: deviceId,
			native: {},
			common: { name: this.deviceNames[deviceId] ?? deviceId },
		});
		await Promise.all(
			Object.entries(this.definitions).map(([key, definition]) =>
				this.adapter.setObjectNotExistsAsync(`${deviceId}.${key}`, {
					type: "state",
					_id: `${deviceId}.${key}`,
					native: {},
					common: {
						type: definition.type,
						name: definition.name,
						read: true,
						write: false,
						role: definition.role,
						...(definition.unit ? { unit: definition.unit } : {}),
					},
				}),
			),
		);
		this.createdDevices.add(deviceId);
	}
}
