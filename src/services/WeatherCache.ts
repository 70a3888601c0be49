/**
 * Time-bound cache in front of a rate-limited outdoor temperature source.
 *
 * EMPTY → FRESH (fetched) → STALE (age > ttl) → FRESH (refetched).
 * At most one upstream fetch is issued per ttl window, counted from the last
 * attempt whether it succeeded or not. A failed fetch keeps serving the last
 * known value, flagged as stale.
 */

import type { OutdoorTemperature } from "../models/metrics";
import type { LogCallback } from "../models/logging";
import type { OutdoorTemperatureSource } from "./WeatherService";
import { UpstreamUnavailable, toError } from "../lib/errors";

export type WeatherCacheState = "EMPTY" | "FRESH" | "STALE";

export interface WeatherCacheOptions {
	ttlSeconds: number;
	/** Upper bound for one upstream fetch */
	fetchTimeoutMs: number;
}

interface WeatherCacheEntry {
	value: number;
	fetchedAt: number;
}

export class WeatherCache {
	private entry: WeatherCacheEntry | null = null;
	private lastAttemptAt: number | null = null;
	private inFlight: Promise<void> | null = null;
	private fetchCount = 0;

	constructor(
		private readonly source: OutdoorTemperatureSource,
		private readonly options: WeatherCacheOptions,
		private readonly logCallback: LogCallback,
	) {}

	/**
	 * Current outdoor temperature, refreshing from upstream when stale and allowed
	 *
	 * @param now current timestamp (ms)
	 * @returns cached value with staleness flag, null while nothing was ever fetched
	 */
	async getOutdoorTemperature(now: number): Promise<OutdoorTemperature | null> {
		if (this.inFlight) {
			await this.inFlight;
		} else if (this.getState(now) !== "FRESH" && this.mayFetch(now)) {
			await this.refresh(now);
		}
		return this.read(now);
	}

	getState(now: number): WeatherCacheState {
		if (!this.entry) {
			return "EMPTY";
		}
		return now - this.entry.fetchedAt > this.ttlMs ? "STALE" : "FRESH";
	}

	/** Number of upstream fetches issued so far */
	getFetchCount(): number {
		return this.fetchCount;
	}

	private get ttlMs(): number {
		return this.options.ttlSeconds * 1000;
	}

	private mayFetch(now: number): boolean {
		return this.lastAttemptAt === null || now - this.lastAttemptAt >= this.ttlMs;
	}

	private read(now: number): OutdoorTemperature | null {
		if (!this.entry) {
			return null;
		}
		return {
			value: this.entry.value,
			fetchedAt: this.entry.fetchedAt,
			stale: this.getState(now) === "STALE",
		};
	}

	private async refresh(now: number): Promise<void> {
		this.lastAttemptAt = now;
		this.fetchCount++;
		this.inFlight = this.fetchWithTimeout()
			.then(
				value => {
					this.entry = { value, fetchedAt: now };
					this.logCallback("debug", `[WeatherCache] ${this.source.name}: outdoor temperature ${value}`);
				},
				(error: unknown) => {
					const fallback = this.entry ? "serving last known value" : "no value available";
					this.logCallback("warn", `[WeatherCache] ${this.source.name} unavailable (${toError(error).message}), ${fallback}`);
				},
			)
			.finally(() => {
				this.inFlight = null;
			});
		await this.inFlight;
	}

	private fetchWithTimeout(): Promise<number> {
		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() => reject(new UpstreamUnavailable(`${this.source.name} timed out after ${this.options.fetchTimeoutMs}ms`)),
				this.options.fetchTimeoutMs,
			);
		});
		const request = Promise.resolve().then(() => this.source.fetchTemperature());
		return Promise.race([request, timeout]).finally(() => clearTimeout(timer));
	}
}
