/**
 * Detects runtime cycle boundaries in the stream of device readings.
 * Holds the single open-cycle slot of one device; the slot is never persisted.
 */

import type { Reading, RuntimeCycle } from "../models/runtimeCycle";
import type { LogCallback } from "../models/logging";
import { DuplicateCycleStart } from "../lib/errors";

interface OpenCycle {
	startTime: number;
	startTemperature: number | null;
}

export class CycleTracker {
	private openCycle: OpenCycle | null = null;
	private lastRunning = false;

	constructor(
		private readonly deviceId: string,
		private readonly logCallback: LogCallback,
	) {}

	/**
	 * Feed the next reading and return the cycle it completes, if any
	 *
	 * @param reading latest device reading
	 * @returns the completed cycle on a running→idle transition, otherwise null
	 */
	public observe(reading: Reading): RuntimeCycle | null {
		const wasRunning = this.lastRunning;
		this.lastRunning = reading.running;

		if (reading.running) {
			if (this.openCycle && !wasRunning) {
				const anomaly = new DuplicateCycleStart(this.deviceId, this.openCycle.startTime);
				this.logCallback("warn", `[CycleTracker] ${this.deviceId}: ${anomaly.message}, discarding it`);
				this.openCycle = null;
			}
			if (!this.openCycle) {
				this.openCycle = { startTime: reading.timestamp, startTemperature: reading.currentTemperature };
				this.logCallback("debug", `[CycleTracker] Cycle started for device: ${this.deviceId}`);
			}
			return null;
		}

		if (!this.openCycle) {
			return null;
		}

		if (reading.timestamp < this.openCycle.startTime) {
			this.logCallback(
				"warn",
				`[CycleTracker] ${this.deviceId}: idle reading at ${reading.timestamp} predates cycle start ${this.openCycle.startTime}, ignoring`,
			);
			return null;
		}

		const cycle: RuntimeCycle = Object.freeze({
			deviceId: this.deviceId,
			startTime: this.openCycle.startTime,
			endTime: reading.timestamp,
			durationSeconds: (reading.timestamp - this.openCycle.startTime) / 1000,
			startTemperature: this.openCycle.startTemperature,
			endTemperature: reading.currentTemperature,
		});
		this.openCycle = null;

		this.logCallback(
			"debug",
			`[CycleTracker] Cycle completed for ${this.deviceId}: ${(cycle.durationSeconds / 60).toFixed(1)}min`,
		);
		return cycle;
	}

	/**
	 * Seconds the open cycle has been running
	 *
	 * @param now current timestamp (ms)
	 * @returns elapsed seconds, 0 when no cycle is open
	 */
	public currentDurationSeconds(now: number): number {
		if (!this.openCycle) {
			return 0;
		}
		return Math.max(0, (now - this.openCycle.startTime) / 1000);
	}

	public isCycleOpen(): boolean {
		return this.openCycle !== null;
	}
}
