/**
 * Per-device analytics context: open-cycle slot, history handle, weather cache
 * and purge bookkeeping. One poll runs the full pipeline in strict sequence.
 */

import type { Reading, RuntimeCycle } from "../models/runtimeCycle";
import type { MetricResult, OutdoorTemperature, RollingStats, Snapshot } from "../models/metrics";
import type { LogCallback } from "../models/logging";
import type { AdapterSettings } from "../lib/config";
import { purgeHorizonDays } from "../lib/config";
import { StorageCorruptionError, StorageError, TransientIOError, toError } from "../lib/errors";
import { CycleTracker } from "./CycleTracker";
import { StatisticsEngine, isRuntimeAlert, type CycleHistory } from "./StatisticsEngine";
import { calculateEfficiencyScore, estimateDailyCost } from "./EfficiencyModel";
import { assembleSnapshot } from "./SnapshotAssembler";
import type { WeatherCache } from "./WeatherCache";

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

/** Completed cycles kept in memory while the history is unavailable */
const MAX_PENDING_CYCLES = 100;

/**
 * Storage operations the monitor needs; implemented by CycleStore
 */
export interface CycleRepository extends CycleHistory {
	append(cycle: RuntimeCycle): void;
	purgeOlderThan(cutoff: number): number;
	close(): void;
}

/**
 * Opens the history of a device; called again on the next poll while it throws a TransientIOError
 */
export type CycleRepositoryOpener = () => CycleRepository;

export type MonitorSettings = Pick<
	AdapterSettings,
	| "alertThreshold"
	| "lookbackDays"
	| "retentionDays"
	| "purgeIntervalHours"
	| "baselineSecondsPerDegree"
	| "energyRate"
	| "assumedDrawKw"
	| "cyclesPerDayEstimate"
>;

export class DeviceMonitor {
	private readonly tracker: CycleTracker;
	private readonly statistics: StatisticsEngine;
	private readonly pending: RuntimeCycle[] = [];
	private store: CycleRepository | null = null;
	private lastPurgeAt: number | null = null;

	/**
	 * Create new DeviceMonitor
	 *
	 * @param deviceId device identifier
	 * @param openStore opens the history of this device, which the monitor then owns
	 * @param weather outdoor temperature cache, null when no weather source is configured
	 * @param settings analytics settings
	 * @param logCallback log sink
	 */
	constructor(
		readonly deviceId: string,
		private readonly openStore: CycleRepositoryOpener,
		private readonly weather: WeatherCache | null,
		private readonly settings: MonitorSettings,
		private readonly logCallback: LogCallback,
	) {
		this.tracker = new CycleTracker(deviceId, logCallback);
		this.statistics = new StatisticsEngine(
			{ querySince: cutoff => this.history().querySince(cutoff) },
			settings.lookbackDays,
		);
	}

	/**
	 * Process one reading and build the snapshot for it
	 *
	 * @param reading latest device reading
	 * @returns snapshot of this poll
	 * @throws StorageCorruptionError when the history can no longer be used
	 */
	async poll(reading: Reading): Promise<Snapshot> {
		const now = reading.timestamp;
		const completed = this.tracker.observe(reading);
		const outdoor = await this.readOutdoorTemperature(now);

		if (completed) {
			this.enqueue(completed, outdoor.ok ? outdoor.value : null);
		}
		const history = this.flushPending();
		this.purgeIfDue(now);

		const openCycleSeconds = this.tracker.currentDurationSeconds(now);
		const currentSeconds = this.tracker.isCycleOpen() ? openCycleSeconds : (completed?.durationSeconds ?? 0);

		const stats = this.computeStatistics(now);
		let alert: MetricResult<boolean>;
		let efficiency: MetricResult<number | null>;
		let cost: MetricResult<number | null>;
		if (stats.ok) {
			alert = { ok: true, value: isRuntimeAlert(currentSeconds, stats.value, this.settings.alertThreshold) };
			efficiency = {
				ok: true,
				value: calculateEfficiencyScore(currentSeconds, stats.value, this.settings),
			};
			cost = this.estimateCost(stats.value);
		} else {
			alert = stats;
			efficiency = stats;
			cost = stats;
		}

		const snapshot = assembleSnapshot({
			deviceId: this.deviceId,
			reading,
			openCycleSeconds,
			history,
			stats,
			alert,
			efficiency,
			cost,
			outdoor,
		});
		this.logCallback(
			"debug",
			`[DeviceMonitor] ${this.deviceId}: runtime ${snapshot.state}min, average ${snapshot.attributes.averageRuntime ?? "n/a"}min, ` +
				`alert ${String(snapshot.attributes.alert)}`,
		);
		return snapshot;
	}

	/**
	 * Delete history beyond the retention horizon (never inside the lookback window)
	 *
	 * @param now current timestamp (ms)
	 * @returns number of deleted cycles
	 */
	purge(now: number): number {
		const cutoff = now - purgeHorizonDays(this.settings) * DAY_MS;
		const deleted = this.history().purgeOlderThan(cutoff);
		this.lastPurgeAt = now;
		return deleted;
	}

	/** Completed cycles waiting to be written */
	getPendingCount(): number {
		return this.pending.length;
	}

	close(): void {
		this.store?.close();
		this.store = null;
	}

	private history(): CycleRepository {
		if (!this.store) {
			this.store = this.openStore();
		}
		return this.store;
	}

	private async readOutdoorTemperature(now: number): Promise<MetricResult<OutdoorTemperature | null>> {
		if (!this.weather) {
			return { ok: true, value: null };
		}
		try {
			return { ok: true, value: await this.weather.getOutdoorTemperature(now) };
		} catch (error) {
			return { ok: false, component: "weather", error: toError(error) };
		}
	}

	private enqueue(cycle: RuntimeCycle, outdoor: OutdoorTemperature | null): void {
		this.pending.push(outdoor ? Object.freeze({ ...cycle, outdoorTemperature: outdoor.value }) : cycle);
		if (this.pending.length > MAX_PENDING_CYCLES) {
			const dropped = this.pending.shift();
			this.logCallback(
				"warn",
				`[DeviceMonitor] ${this.deviceId}: history unavailable for too long, dropping cycle started at ${dropped?.startTime}`,
			);
		}
	}

	private flushPending(): MetricResult<void> {
		let failure: MetricResult<void> = { ok: true, value: undefined };
		if (this.pending.length === 0) {
			return failure;
		}
		let store: CycleRepository;
		try {
			store = this.history();
		} catch (error) {
			if (error instanceof StorageCorruptionError) {
				throw error;
			}
			const cause = toError(error);
			this.logCallback("warn", `${cause.message}, keeping ${this.pending.length} cycle(s) for the next poll`);
			return { ok: false, component: "history", error: cause };
		}
		while (this.pending.length > 0) {
			try {
				store.append(this.pending[0]);
				this.pending.shift();
			} catch (error) {
				if (error instanceof StorageCorruptionError) {
					throw error;
				}
				if (error instanceof TransientIOError) {
					this.logCallback(
						"warn",
						`${error.message}, keeping ${this.pending.length} cycle(s) for the next poll`,
					);
					return { ok: false, component: "history", error };
				}
				const rejected = this.pending.shift();
				this.logCallback("error", `${toError(error).message}, dropping cycle started at ${rejected?.startTime}`);
				failure = { ok: false, component: "history", error: toError(error) };
			}
		}
		return failure;
	}

	private purgeIfDue(now: number): void {
		if (this.lastPurgeAt !== null && now - this.lastPurgeAt < this.settings.purgeIntervalHours * HOUR_MS) {
			return;
		}
		try {
			this.purge(now);
		} catch (error) {
			if (error instanceof StorageCorruptionError) {
				throw error;
			}
			this.logCallback("warn", `${toError(error).message}, retrying on the next poll`);
		}
	}

	private computeStatistics(now: number): MetricResult<RollingStats> {
		try {
			return { ok: true, value: this.statistics.compute(now) };
		} catch (error) {
			if (error instanceof StorageCorruptionError) {
				throw error;
			}
			const cause = toError(error);
			if (!(cause instanceof StorageError)) {
				this.logCallback("error", `[DeviceMonitor] ${this.deviceId}: statistics failed: ${cause.message}`);
			}
			return { ok: false, component: "statistics", error: cause };
		}
	}

	private estimateCost(stats: RollingStats): MetricResult<number | null> {
		try {
			return { ok: true, value: estimateDailyCost(stats, this.settings) };
		} catch (error) {
			return { ok: false, component: "cost", error: toError(error) };
		}
	}
}
