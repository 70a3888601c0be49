/**
 * Models for derived metrics and the published snapshot
 */

/**
 * Rolling statistics over the lookback window. Recomputed on every poll, never persisted.
 */
export interface RollingStats {
	/** Mean cycle duration in seconds, null without samples */
	averageRuntimeSeconds: number | null;
	/** Mean of duration / |temperature delta| over cycles with a nonzero delta */
	averageSecondsPerDegree: number | null;
	/** Cycles in the window */
	sampleCount: number;
	/** Cycles that contributed to averageSecondsPerDegree */
	degreeSampleCount: number;
	/** Observed cycles per day over the covered span, null without samples */
	cyclesPerDay: number | null;
	/** Start of the lookback window (ms) */
	windowStart: number;
}

/**
 * Outdoor temperature as served by the weather cache
 */
export interface OutdoorTemperature {
	value: number;
	/** When the value was fetched from upstream (ms) */
	fetchedAt: number;
	/** true once the value is older than the cache ttl */
	stale: boolean;
}

/** Components whose output feeds the snapshot */
export type MetricComponent = "history" | "statistics" | "efficiency" | "cost" | "weather";

/**
 * Outcome of one upstream component
 */
export type MetricResult<T> =
	| { ok: true; value: T }
	| { ok: false; component: MetricComponent; error: Error };

/**
 * Attribute set published next to the primary runtime value
 */
export interface SnapshotAttributes {
	/** minutes */
	averageRuntime: number | null;
	currentTemperature: number | null;
	targetTemperature: number | null;
	hvacAction: string;
	equipmentRunning: string;
	alert: boolean | null;
	/** minutes per degree */
	avgTimePerDegree: number | null;
	/** 0-100 */
	efficiencyScore: number | null;
	estimatedDailyCost: number | null;
	outdoorTemperature: number | null;
	outdoorTemperatureStale: boolean | null;
	sampleCount: number | null;
}

/**
 * A component that failed while assembling a snapshot
 */
export interface SnapshotFailure {
	component: MetricComponent;
	attributes: ReadonlyArray<keyof SnapshotAttributes>;
	message: string;
}

/**
 * Immutable reading exposed to the host once per poll
 */
export interface Snapshot {
	readonly deviceId: string;
	/** Reading timestamp (ms) */
	readonly timestamp: number;
	/** Current runtime in minutes, 0 while idle */
	readonly state: number;
	readonly attributes: Readonly<SnapshotAttributes>;
	readonly failures: ReadonlyArray<Readonly<SnapshotFailure>>;
}
