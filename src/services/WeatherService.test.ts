import { expect } from "chai";
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { ForeignStateSource, WeatherApiSource, resolveWeatherSource, type ForeignStateAccess } from "./WeatherService";
import { UpstreamUnavailable } from "../lib/errors";

function state(val: ioBroker.StateValue): ioBroker.State {
	return { val, ack: true, ts: Date.now(), lc: Date.now(), from: "system.adapter.weather.0" };
}

// Mock adapter for testing
class MockAdapter implements ForeignStateAccess {
	async getForeignStateAsync(id: string): Promise<ioBroker.State | null | undefined> {
		// Mock implementation based on test scenarios
		if (id === "weather.valid.temperature") {
			return state(22.5);
		}
		if (id === "weather.string.temperature") {
			return state("18.25");
		}
		if (id === "weather.invalid.temperature") {
			return state("invalid");
		}
		if (id === "weather.null.temperature") {
			return state(null);
		}
		if (id === "weather.broken") {
			throw new Error("connection to objects db lost");
		}
		return null;
	}
}

async function expectUnavailable(promise: Promise<unknown>, message: string): Promise<UpstreamUnavailable> {
	try {
		await promise;
	} catch (error) {
		if (!(error instanceof UpstreamUnavailable)) {
			throw error;
		}
		expect(error.message).to.include(message);
		return error;
	}
	throw new Error("expected promise to reject");
}

describe("WeatherService", () => {
	describe("ForeignStateSource", () => {
		const adapter = new MockAdapter();

		it("should return temperature for valid weather state", async () => {
			const result = await new ForeignStateSource(adapter, "weather.valid.temperature").fetchTemperature();
			expect(result).to.equal(22.5);
		});

		it("should convert numeric strings", async () => {
			const result = await new ForeignStateSource(adapter, "weather.string.temperature").fetchTemperature();
			expect(result).to.equal(18.25);
		});

		it("should reject invalid temperature value", async () => {
			await expectUnavailable(
				new ForeignStateSource(adapter, "weather.invalid.temperature").fetchTemperature(),
				"invalid temperature value: invalid",
			);
		});

		it("should reject null temperature value", async () => {
			await expectUnavailable(new ForeignStateSource(adapter, "weather.null.temperature").fetchTemperature(), "has no value");
		});

		it("should reject nonexistent weather state", async () => {
			await expectUnavailable(new ForeignStateSource(adapter, "weather.nonexistent").fetchTemperature(), "is not available");
		});

		it("should wrap adapter errors", async () => {
			await expectUnavailable(
				new ForeignStateSource(adapter, "weather.broken").fetchTemperature(),
				"Error reading weather state weather.broken",
			);
		});

		it("should name itself after the state", () => {
			expect(new ForeignStateSource(adapter, "weather.valid.temperature").name).to.equal("state:weather.valid.temperature");
		});
	});

	describe("WeatherApiSource", () => {
		let requests: InternalAxiosRequestConfig[];
		let logMessages: Array<{ level: string; message: string }>;

		function sourceWith(adapter: AxiosAdapter, unit: "F" | "C" = "F"): WeatherApiSource {
			return new WeatherApiSource(
				{ apiKey: "test-key", location: "10001", unit, timeoutMs: 5000 },
				(level, message) => logMessages.push({ level, message }),
				axios.create({ baseURL: "https://weather.invalid/v1", adapter }),
			);
		}

		function respond(data: unknown): AxiosAdapter {
			return async config => {
				requests.push(config);
				return { data, status: 200, statusText: "OK", headers: {}, config };
			};
		}

		function fail(status: number): AxiosAdapter {
			return async config => {
				requests.push(config);
				throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, null, {
					data: {},
					status,
					statusText: "",
					headers: {},
					config,
				});
			};
		}

		beforeEach(() => {
			requests = [];
			logMessages = [];
		});

		it("should request current conditions for the location", async () => {
			const result = await sourceWith(respond({ current: { temp_f: 91.4, temp_c: 33 } })).fetchTemperature();

			expect(result).to.equal(91.4);
			expect(requests).to.have.length(1);
			expect(requests[0].url).to.equal("/current.json");
			expect(requests[0].params).to.deep.equal({ key: "test-key", q: "10001" });
			expect(requests[0].timeout).to.equal(5000);
		});

		it("should read celsius when configured", async () => {
			const result = await sourceWith(respond({ current: { temp_f: 91.4, temp_c: 33 } }), "C").fetchTemperature();
			expect(result).to.equal(33);
		});

		it("should reject an unexpected payload", async () => {
			await expectUnavailable(sourceWith(respond({ error: "nope" })).fetchTemperature(), "unexpected payload for 10001");
		});

		it("should report rate limiting", async () => {
			const error = await expectUnavailable(sourceWith(fail(429)).fetchTemperature(), "rate limit");
			expect(error.status).to.equal(429);
			expect(logMessages).to.deep.equal([{ level: "warn", message: "[WeatherService] Weather API rate limit reached" }]);
		});

		it("should report other HTTP errors with their status", async () => {
			const error = await expectUnavailable(sourceWith(fail(401)).fetchTemperature(), "Weather API error: 401");
			expect(error.status).to.equal(401);
		});

		it("should report timeouts", async () => {
			const timeout: AxiosAdapter = async config => {
				throw new AxiosError("timeout of 5000ms exceeded", "ECONNABORTED", config);
			};
			await expectUnavailable(sourceWith(timeout).fetchTemperature(), "timed out after 5000ms");
		});
	});
});

describe("resolveWeatherSource", () => {
	const adapter = new MockAdapter();
	const settings = {
		weatherApiKey: "test-key",
		weatherLocation: "10001",
		weatherStatePath: undefined,
		temperatureUnit: "F" as const,
		weatherFetchTimeoutMs: 5_000,
	};
	const noop = (): void => undefined;

	it("should prefer the device location for weatherapi.com", () => {
		const resolved = resolveWeatherSource(settings, { weatherLocation: "94105" }, adapter, noop);
		expect(resolved?.key).to.equal("weatherapi:94105");
		expect(resolved?.create()).to.be.instanceOf(WeatherApiSource);
	});

	it("should fall back to the adapter location", () => {
		const resolved = resolveWeatherSource(settings, {}, adapter, noop);
		expect(resolved?.key).to.equal("weatherapi:10001");
	});

	it("should use the weather state without an API key", () => {
		const resolved = resolveWeatherSource(
			{ ...settings, weatherApiKey: undefined, weatherLocation: undefined, weatherStatePath: "weather.0.temperature" },
			{},
			adapter,
			noop,
		);
		expect(resolved?.key).to.equal("state:weather.0.temperature");
		expect(resolved?.create().name).to.equal("state:weather.0.temperature");
	});

	it("should return null without any weather configuration", () => {
		expect(
			resolveWeatherSource({ ...settings, weatherApiKey: undefined, weatherLocation: undefined }, {}, adapter, noop),
		).to.be.null;
	});
});
