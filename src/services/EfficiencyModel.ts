/**
 * Efficiency score and daily cost estimate.
 * Pure functions over the current runtime and rolling statistics.
 */

import type { RollingStats } from "../models/metrics";
import { ConfigurationError } from "../lib/errors";

/**
 * Penalty weights of the efficiency score.
 * runtime: share of the overrun above the average runtime,
 * perDegree: share of the overrun above the baseline time per degree.
 */
export const EFFICIENCY_WEIGHTS = Object.freeze({ runtime: 0.5, perDegree: 0.5 });

export interface EfficiencyConfig {
	/** Seconds per degree considered normal for the installation */
	baselineSecondsPerDegree: number;
}

export interface CostConfig {
	/** Cost per kWh, undefined when not configured */
	energyRate?: number;
	/** Assumed electrical draw while running in kW */
	assumedDrawKw: number;
	/** Overrides the observed number of cycles per day */
	cyclesPerDayEstimate?: number;
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

function round(value: number, decimals: number): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}

/**
 * Score in [0, 100]. 100 while the current runtime does not exceed the average and the
 * time per degree does not exceed the baseline; decreases linearly in either overrun.
 *
 * @param currentSeconds duration of the in-progress or last cycle
 * @param stats rolling statistics
 * @param config baseline settings
 * @returns score rounded to one decimal, null without an average runtime
 */
export function calculateEfficiencyScore(currentSeconds: number, stats: RollingStats, config: EfficiencyConfig): number | null {
	if (stats.averageRuntimeSeconds === null || stats.averageRuntimeSeconds <= 0) {
		return null;
	}

	const runtimeRatio = currentSeconds / stats.averageRuntimeSeconds;
	const perDegreeRatio =
		stats.averageSecondsPerDegree === null ? 0 : stats.averageSecondsPerDegree / config.baselineSecondsPerDegree;

	const score =
		100 -
		EFFICIENCY_WEIGHTS.runtime * Math.max(0, runtimeRatio - 1) * 100 -
		EFFICIENCY_WEIGHTS.perDegree * Math.max(0, perDegreeRatio - 1) * 100;

	return round(clamp(score, 0, 100), 1);
}

/**
 * Projected daily energy cost
 *
 * @param stats rolling statistics
 * @param config rate and draw settings
 * @returns cost rounded to cents, null without an average runtime
 * @throws ConfigurationError when no energy rate is configured
 */
export function estimateDailyCost(stats: RollingStats, config: CostConfig): number | null {
	if (config.energyRate === undefined) {
		throw new ConfigurationError("No energy rate configured, daily cost cannot be estimated");
	}
	if (stats.averageRuntimeSeconds === null) {
		return null;
	}

	const cyclesPerDay = config.cyclesPerDayEstimate ?? stats.cyclesPerDay ?? 0;
	const averageRuntimeMinutes = stats.averageRuntimeSeconds / 60;
	const dailyHours = (averageRuntimeMinutes * cyclesPerDay) / 60;
	const cost = dailyHours * config.assumedDrawKw * config.energyRate;

	return round(Math.max(0, cost), 2);
}
