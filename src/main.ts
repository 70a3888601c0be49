/*
 * Created with @iobroker/create-adapter v2.1.1
 */

// The adapter-core module gives you access to the core ioBroker functions
// you need to create an adapter
import * as utils from "@iobroker/adapter-core";
import * as fs from "node:fs";
import * as path from "node:path";
import type { LogCallback } from "./models/logging";
import { configWarnings, deviceStateId, parseAdapterConfig, type AdapterSettings } from "./lib/config";
import { ClimateInsightsError, toError } from "./lib/errors";
import { SentryUtils } from "./lib/sentry";
import { ClimateStateReader } from "./services/ClimateStateReader";
import { CycleStore } from "./services/CycleStore";
import { DeviceMonitor } from "./services/DeviceMonitor";
import { DeviceRegistry } from "./services/DeviceRegistry";
import { IoBrokerStatePublisher } from "./services/StatePublisher";
import { WeatherCache } from "./services/WeatherCache";
import { resolveWeatherSource } from "./services/WeatherService";

class ClimateInsights extends utils.Adapter {
	interval: ioBroker.Interval | undefined;
	registry: DeviceRegistry | undefined;
	polling = false;

	public constructor(options: Partial<utils.AdapterOptions> = {}) {
		super({
			...options,
			name: "climate-insights",
		});
		this.on("ready", this.onReady.bind(this));
		this.on("unload", this.onUnload.bind(this));
	}

	private readonly logCallback: LogCallback = (level, message) => {
		switch (level) {
			case "debug":
				this.log.debug(message);
				break;
			case "info":
				this.log.info(message);
				break;
			case "warn":
				this.log.warn(message);
				break;
			case "error":
				this.log.error(message);
				break;
		}
	};

	/**
	 * Is called when databases are connected and adapter received configuration.
	 */
	async onReady(): Promise<void> {
		let settings: AdapterSettings;
		try {
			settings = parseAdapterConfig(this.config);
		} catch (error) {
			this.log.error(toError(error).message);
			return;
		}
		configWarnings(settings).forEach(warning => this.log.warn(warning));

		SentryUtils.init({
			dsn: settings.sentryDsn,
			adapterVersion: this.version ?? "unknown",
			adapterNamespace: this.namespace,
		});

		try {
			this.registry = this.buildRegistry(settings);
		} catch (error) {
			this.log.error(`Failed to set up devices: ${toError(error).message}`);
			SentryUtils.captureException(toError(error), { startup: { devices: settings.devices.length } }, "fatal");
			return;
		}
		this.log.info(`Monitoring ${settings.devices.length} device(s) every ${settings.updateInterval}s`);

		if (this.interval != undefined) {
			this.clearInterval(this.interval);
		}
		this.interval = this.setInterval(() => void this.poll(), settings.updateInterval * 1000);
		await this.poll();
	}

	private buildRegistry(settings: AdapterSettings): DeviceRegistry {
		const historyDirectory = settings.historyDirectory ?? utils.getAbsoluteInstanceDataDir(this);
		fs.mkdirSync(historyDirectory, { recursive: true });

		const names: Record<string, string> = {};
		const registry = new DeviceRegistry(
			new IoBrokerStatePublisher(this, settings.temperatureUnit, names),
			this.logCallback,
			(deviceId, error, disabled) => {
				if (disabled || !(error instanceof ClimateInsightsError)) {
					SentryUtils.captureException(error, { device: { id: deviceId, disabled } }, disabled ? "fatal" : "error");
				}
			},
		);

		for (const device of settings.devices) {
			const deviceId = deviceStateId(device.id);
			names[deviceId] = device.name ?? device.id;

			const resolved = resolveWeatherSource(settings, device, this, this.logCallback);
			const weather = resolved
				? registry.sharedWeatherCache(
						resolved.key,
						() =>
							new WeatherCache(
								resolved.create(),
								{ ttlSeconds: settings.weatherCacheSeconds, fetchTimeoutMs: settings.weatherFetchTimeoutMs },
								this.logCallback,
							),
					)
				: null;

			// opened on the first poll, so a broken history file only affects its own device
			const filename = path.join(historyDirectory, `${deviceId}.sqlite`);
			registry.register(
				new DeviceMonitor(
					deviceId,
					() => new CycleStore(deviceId, filename, this.logCallback),
					weather,
					settings,
					this.logCallback,
				),
				new ClimateStateReader(this, device),
			);
		}
		return registry;
	}

	private async poll(): Promise<void> {
		const registry = this.registry;
		if (!registry) {
			return;
		}
		if (this.polling) {
			this.log.debug("Previous poll still running, skipping this interval");
			return;
		}

		this.polling = true;
		try {
			const summary = await SentryUtils.startSpanAsync("poll", "adapter.poll", () => registry.pollAll(Date.now()));
			this.log.debug(`Poll finished: ${summary.published.length} published, ${summary.failed.length} failed`);
			if (registry.getDeviceIds().every(deviceId => registry.isDisabled(deviceId))) {
				this.log.error("All devices are disabled, stopping polls");
				if (this.interval != undefined) {
					this.clearInterval(this.interval);
					this.interval = undefined;
				}
			}
		} catch (error) {
			this.log.error(`Poll failed: ${toError(error).message}`);
			SentryUtils.captureException(toError(error));
		} finally {
			this.polling = false;
		}
	}

	/**
	 * Is called when adapter shuts down - callback has to be called under any circumstances!
	 *
	 * @param callback callback function to be called when cleanup is done
	 */
	onUnload(callback: () => void): void {
		try {
			if (this.interval != undefined) {
				this.clearInterval(this.interval);
			}
			this.registry?.close();
			void SentryUtils.close().then(
				() => callback(),
				() => callback(),
			);
		} catch {
			callback();
		}
	}
}

if (require.main !== module) {
	// Export the constructor in compact mode
	module.exports = (options: Partial<utils.AdapterOptions> | undefined) => new ClimateInsights(options);
} else {
	// otherwise start the instance directly
	(() => new ClimateInsights())();
}
