import type { RollingStats } from "../models/metrics";
import { temperatureDelta, type RuntimeCycle } from "../models/runtimeCycle";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Read access to the cycle history the statistics are computed from
 */
export interface CycleHistory {
	querySince(cutoff: number): RuntimeCycle[];
}

/**
 * Rolling runtime statistics over the lookback window.
 * Stateless: identical history yields identical results.
 */
export class StatisticsEngine {
	/**
	 * Create new StatisticsEngine
	 *
	 * @param history cycle history of one device
	 * @param lookbackDays trailing window the statistics cover
	 */
	constructor(
		private readonly history: CycleHistory,
		private readonly lookbackDays: number,
	) {}

	/**
	 * Compute rolling statistics
	 *
	 * @param now current timestamp (ms)
	 * @returns statistics over [now - lookback, now]
	 */
	compute(now: number): RollingStats {
		const windowStart = now - this.lookbackDays * DAY_MS;
		return summarizeCycles(this.history.querySince(windowStart), windowStart, now);
	}
}

/**
 * Aggregate a set of cycles
 *
 * @param cycles cycles in the window, oldest first
 * @param windowStart start of the window (ms)
 * @param now end of the window (ms)
 * @returns aggregated statistics
 */
export function summarizeCycles(cycles: RuntimeCycle[], windowStart: number, now: number): RollingStats {
	if (cycles.length === 0) {
		return {
			averageRuntimeSeconds: null,
			averageSecondsPerDegree: null,
			sampleCount: 0,
			degreeSampleCount: 0,
			cyclesPerDay: null,
			windowStart,
		};
	}

	const totalRuntime = cycles.reduce((sum, c) => sum + c.durationSeconds, 0);

	let perDegreeSum = 0;
	let degreeSampleCount = 0;
	for (const cycle of cycles) {
		const delta = temperatureDelta(cycle);
		if (delta !== null && delta > 0) {
			perDegreeSum += cycle.durationSeconds / delta;
			degreeSampleCount++;
		}
	}

	// Young histories span less than the window; never divide by less than a day
	const spanDays = Math.max(1, (now - cycles[0].startTime) / DAY_MS);

	return {
		averageRuntimeSeconds: totalRuntime / cycles.length,
		averageSecondsPerDegree: degreeSampleCount > 0 ? perDegreeSum / degreeSampleCount : null,
		sampleCount: cycles.length,
		degreeSampleCount,
		cyclesPerDay: cycles.length / spanDays,
		windowStart,
	};
}

/**
 * Runtime alert: the current cycle runs longer than threshold × average
 *
 * @param currentSeconds duration of the in-progress or just-completed cycle
 * @param stats rolling statistics
 * @param threshold multiplier, e.g. 1.5
 * @returns true only if an average exists and is strictly exceeded
 */
export function isRuntimeAlert(currentSeconds: number, stats: RollingStats, threshold: number): boolean {
	if (stats.averageRuntimeSeconds === null || stats.averageRuntimeSeconds <= 0) {
		return false;
	}
	return currentSeconds > stats.averageRuntimeSeconds * threshold;
}
