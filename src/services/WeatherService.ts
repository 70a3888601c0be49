import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { LogCallback } from "../models/logging";
import type { AdapterSettings, DeviceSettings } from "../lib/config";
import { UpstreamUnavailable } from "../lib/errors";

export const WEATHER_API_BASE_URL = "https://api.weatherapi.com/v1";

/**
 * Upstream provider of the current outdoor temperature.
 * Implementations throw UpstreamUnavailable when no value can be delivered.
 */
export interface OutdoorTemperatureSource {
	readonly name: string;
	fetchTemperature(): Promise<number>;
}

/**
 * Minimal state access needed from the adapter
 */
export interface ForeignStateAccess {
	getForeignStateAsync(id: string): Promise<ioBroker.State | null | undefined>;
}

/**
 * Reads the outdoor temperature from an ioBroker state, e.g. one written by a weather adapter
 */
export class ForeignStateSource implements OutdoorTemperatureSource {
	readonly name: string;

	/**
	 * Create new ForeignStateSource
	 *
	 * @param adapter The ioBroker adapter instance
	 * @param weatherStatePath Path to weather temperature state
	 */
	constructor(
		private readonly adapter: ForeignStateAccess,
		private readonly weatherStatePath: string,
	) {
		this.name = `state:${weatherStatePath}`;
	}

	/**
	 * Get current outside temperature from the configured weather state
	 *
	 * @returns Current outside temperature
	 */
	async fetchTemperature(): Promise<number> {
		let weatherState: ioBroker.State | null | undefined;
		try {
			weatherState = await this.adapter.getForeignStateAsync(this.weatherStatePath);
		} catch (error) {
			throw new UpstreamUnavailable(`Error reading weather state ${this.weatherStatePath}: ${String(error)}`);
		}

		if (!weatherState || weatherState.val === null || weatherState.val === undefined) {
			throw new UpstreamUnavailable(`Weather state ${this.weatherStatePath} is not available or has no value`);
		}

		const temperature = Number(weatherState.val);
		if (typeof weatherState.val === "boolean" || isNaN(temperature)) {
			throw new UpstreamUnavailable(
				`Weather state ${this.weatherStatePath} contains invalid temperature value: ${String(weatherState.val)}`,
			);
		}
		return temperature;
	}
}

const currentWeatherSchema = z.object({
	current: z.object({
		temp_f: z.number(),
		temp_c: z.number(),
	}),
});

export interface WeatherApiOptions {
	apiKey: string;
	/** ZIP code, city name or "lat,lon" */
	location: string;
	unit: "F" | "C";
	timeoutMs: number;
}

/**
 * Current conditions from weatherapi.com
 */
export class WeatherApiSource implements OutdoorTemperatureSource {
	readonly name: string;

	constructor(
		private readonly options: WeatherApiOptions,
		private readonly logCallback: LogCallback,
		private readonly client: AxiosInstance = axios.create({ baseURL: WEATHER_API_BASE_URL }),
	) {
		this.name = `weatherapi:${options.location}`;
	}

	async fetchTemperature(): Promise<number> {
		let data: unknown;
		try {
			const response = await this.client.get<unknown>("/current.json", {
				params: { key: this.options.apiKey, q: this.options.location },
				timeout: this.options.timeoutMs,
			});
			data = response.data;
		} catch (error) {
			throw this.translateError(error);
		}

		const parsed = currentWeatherSchema.safeParse(data);
		if (!parsed.success) {
			throw new UpstreamUnavailable(`Weather API returned an unexpected payload for ${this.options.location}`);
		}
		const temperature = this.options.unit === "F" ? parsed.data.current.temp_f : parsed.data.current.temp_c;
		this.logCallback("debug", `[WeatherService] Current outside temperature: ${temperature}°${this.options.unit}`);
		return temperature;
	}

	private translateError(error: unknown): UpstreamUnavailable {
		if (!axios.isAxiosError(error)) {
			return new UpstreamUnavailable(`Weather API request failed: ${String(error)}`);
		}
		const status = error.response?.status;
		if (status === 429) {
			this.logCallback("warn", "[WeatherService] Weather API rate limit reached");
			return new UpstreamUnavailable("Weather API rate limit reached", status);
		}
		if (status !== undefined) {
			return new UpstreamUnavailable(`Weather API error: ${status}`, status);
		}
		if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
			return new UpstreamUnavailable(`Weather API request timed out after ${this.options.timeoutMs}ms`);
		}
		return new UpstreamUnavailable(`Weather API request failed: ${error.message}`);
	}
}

export interface ResolvedWeatherSource {
	/** Devices with the same key share one cache */
	key: string;
	create: () => OutdoorTemperatureSource;
}

/**
 * Pick the outdoor temperature source of a device: weatherapi.com when a key and a
 * location are configured, otherwise the configured weather state, otherwise none
 *
 * @param settings validated adapter settings
 * @param device device settings
 * @param adapter The ioBroker adapter instance
 * @param logCallback log sink
 * @returns source factory with its sharing key, null when no source is configured
 */
export function resolveWeatherSource(
	settings: Pick<AdapterSettings, "weatherApiKey" | "weatherLocation" | "weatherStatePath" | "temperatureUnit" | "weatherFetchTimeoutMs">,
	device: Pick<DeviceSettings, "weatherLocation">,
	adapter: ForeignStateAccess,
	logCallback: LogCallback,
): ResolvedWeatherSource | null {
	const location = device.weatherLocation ?? settings.weatherLocation;
	const apiKey = settings.weatherApiKey;
	if (apiKey && location) {
		return {
			key: `weatherapi:${location}`,
			create: () =>
				new WeatherApiSource(
					{ apiKey, location, unit: settings.temperatureUnit, timeoutMs: settings.weatherFetchTimeoutMs },
					logCallback,
				),
		};
	}
	const statePath = settings.weatherStatePath;
	if (statePath) {
		return { key: `state:${statePath}`, create: () => new ForeignStateSource(adapter, statePath) };
	}
	return null;
}
