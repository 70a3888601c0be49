/**
 * Composes the outputs of the analytics components into one immutable snapshot.
 * A failed component blanks exactly the attributes it owns and is listed in `failures`.
 */

import type { Reading } from "../models/runtimeCycle";
import type {
	MetricComponent,
	MetricResult,
	OutdoorTemperature,
	RollingStats,
	Snapshot,
	SnapshotAttributes,
	SnapshotFailure,
} from "../models/metrics";

export interface SnapshotInput {
	deviceId: string;
	reading: Reading;
	/** Duration of the open cycle in seconds, 0 while idle */
	openCycleSeconds: number;
	/** Appending completed cycles to the history */
	history: MetricResult<void>;
	stats: MetricResult<RollingStats>;
	alert: MetricResult<boolean>;
	efficiency: MetricResult<number | null>;
	cost: MetricResult<number | null>;
	outdoor: MetricResult<OutdoorTemperature | null>;
}

/**
 * Attributes owned by each component. Alert, efficiency and cost are derived from
 * the statistics, so a statistics failure blanks them as well.
 */
const COMPONENT_ATTRIBUTES: Record<MetricComponent, Array<keyof SnapshotAttributes>> = {
	history: [],
	statistics: ["averageRuntime", "avgTimePerDegree", "sampleCount", "alert", "efficiencyScore", "estimatedDailyCost"],
	efficiency: ["efficiencyScore"],
	cost: ["estimatedDailyCost"],
	weather: ["outdoorTemperature", "outdoorTemperatureStale"],
};

/**
 * Seconds → minutes, rounded to two decimals
 *
 * @param seconds duration in seconds
 * @returns minutes
 */
export function toMinutes(seconds: number): number {
	return Math.round((seconds / 60) * 100) / 100;
}

function valueOf<T>(result: MetricResult<T>): T | null {
	return result.ok ? result.value : null;
}

/**
 * Build the snapshot published for one poll
 *
 * @param input reading and component results
 * @returns deeply frozen snapshot
 */
export function assembleSnapshot(input: SnapshotInput): Snapshot {
	const { reading } = input;
	const stats = valueOf(input.stats);
	const outdoor = valueOf(input.outdoor);

	const attributes: SnapshotAttributes = {
		averageRuntime: stats?.averageRuntimeSeconds != null ? toMinutes(stats.averageRuntimeSeconds) : null,
		currentTemperature: reading.currentTemperature,
		targetTemperature: reading.targetTemperature,
		hvacAction: reading.hvacAction,
		equipmentRunning: reading.equipmentRunning,
		alert: valueOf(input.alert),
		avgTimePerDegree: stats?.averageSecondsPerDegree != null ? toMinutes(stats.averageSecondsPerDegree) : null,
		efficiencyScore: valueOf(input.efficiency),
		estimatedDailyCost: valueOf(input.cost),
		outdoorTemperature: outdoor ? outdoor.value : null,
		outdoorTemperatureStale: outdoor ? outdoor.stale : null,
		sampleCount: stats ? stats.sampleCount : null,
	};

	const failures: SnapshotFailure[] = [];
	for (const result of [input.history, input.stats, input.alert, input.efficiency, input.cost, input.outdoor]) {
		if (!result.ok && !failures.some(failure => failure.component === result.component)) {
			const owned = COMPONENT_ATTRIBUTES[result.component];
			for (const key of owned) {
				blank(attributes, key);
			}
			failures.push(
				Object.freeze({
					component: result.component,
					attributes: Object.freeze([...owned]),
					message: result.error.message,
				}),
			);
		}
	}

	return Object.freeze({
		deviceId: input.deviceId,
		timestamp: reading.timestamp,
		state: reading.running ? toMinutes(input.openCycleSeconds) : 0,
		attributes: Object.freeze(attributes),
		failures: Object.freeze(failures),
	});
}

function blank(attributes: SnapshotAttributes, key: keyof SnapshotAttributes): void {
	switch (key) {
		case "hvacAction":
		case "equipmentRunning":
			// taken from the reading, never owned by a failing component
			return;
		default:
			attributes[key] = null;
	}
}
