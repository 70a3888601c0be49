import type { Reading } from "../models/runtimeCycle";
import type { LogCallback } from "../models/logging";
import { ClimateInsightsError, StorageCorruptionError, toError } from "../lib/errors";
import type { DeviceMonitor } from "./DeviceMonitor";
import type { SnapshotPublisher } from "./StatePublisher";
import type { WeatherCache } from "./WeatherCache";

/**
 * Source of the readings of one device
 */
export interface ReadingSource {
	read(now: number): Promise<Reading>;
}

/**
 * Called for every device whose poll failed; `disabled` is set when polling stopped for good
 */
export type DeviceFailureHandler = (deviceId: string, error: Error, disabled: boolean) => void;

export interface PollSummary {
	published: string[];
	failed: string[];
}

interface DeviceEntry {
	monitor: DeviceMonitor;
	reader: ReadingSource;
}

/**
 * All monitored devices of one adapter instance. Devices poll concurrently and fail independently.
 */
export class DeviceRegistry {
	private readonly devices = new Map<string, DeviceEntry>();
	private readonly disabled = new Set<string>();
	private readonly weatherCaches = new Map<string, WeatherCache>();

	constructor(
		private readonly publisher: SnapshotPublisher,
		private readonly logCallback: LogCallback,
		private readonly onDeviceFailure: DeviceFailureHandler = () => undefined,
	) {}

	register(monitor: DeviceMonitor, reader: ReadingSource): void {
		if (this.devices.has(monitor.deviceId)) {
			throw new ClimateInsightsError(`Device ${monitor.deviceId} is already registered`, monitor.deviceId);
		}
		this.devices.set(monitor.deviceId, { monitor, reader });
	}

	/**
	 * Weather cache shared by every device with the same weather source
	 *
	 * @param key identifies the upstream, e.g. its location
	 * @param create builds the cache on first use
	 * @returns shared cache
	 */
	sharedWeatherCache(key: string, create: () => WeatherCache): WeatherCache {
		let cache = this.weatherCaches.get(key);
		if (!cache) {
			cache = create();
			this.weatherCaches.set(key, cache);
		}
		return cache;
	}

	/**
	 * Poll every active device once and publish the snapshots
	 *
	 * @param now current timestamp (ms)
	 * @returns ids of published and failed devices
	 */
	async pollAll(now: number): Promise<PollSummary> {
		const active = [...this.devices.entries()].filter(([deviceId]) => !this.disabled.has(deviceId));
		const results = await Promise.allSettled(active.map(([, entry]) => this.pollDevice(entry, now)));

		const summary: PollSummary = { published: [], failed: [] };
		results.forEach((result, index) => {
			const [deviceId, entry] = active[index];
			if (result.status === "fulfilled") {
				summary.published.push(deviceId);
				return;
			}
			summary.failed.push(deviceId);
			this.handleFailure(deviceId, entry, toError(result.reason));
		});
		return summary;
	}

	isDisabled(deviceId: string): boolean {
		return this.disabled.has(deviceId);
	}

	getDeviceIds(): string[] {
		return [...this.devices.keys()];
	}

	close(): void {
		for (const [deviceId, entry] of this.devices) {
			try {
				entry.monitor.close();
			} catch (error) {
				this.logCallback("warn", `[DeviceRegistry] ${deviceId}: closing history failed: ${toError(error).message}`);
			}
		}
		this.devices.clear();
	}

	private async pollDevice(entry: DeviceEntry, now: number): Promise<void> {
		const reading = await entry.reader.read(now);
		const snapshot = await entry.monitor.poll(reading);
		await this.publisher.publish(snapshot);
	}

	private handleFailure(deviceId: string, entry: DeviceEntry, error: Error): void {
		if (error instanceof StorageCorruptionError) {
			this.disabled.add(deviceId);
			this.logCallback("error", `[DeviceRegistry] ${deviceId}: history unusable, polling stopped: ${error.message}`);
			try {
				entry.monitor.close();
			} catch (closeError) {
				this.logCallback("warn", `[DeviceRegistry] ${deviceId}: closing history failed: ${toError(closeError).message}`);
			}
			this.onDeviceFailure(deviceId, error, true);
			return;
		}
		this.logCallback("error", `[DeviceRegistry] ${deviceId}: poll failed: ${error.message}`);
		this.onDeviceFailure(deviceId, error, false);
	}
}
