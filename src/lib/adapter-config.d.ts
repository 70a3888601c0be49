// Augments the adapter config with the fields of io-package.json "native".
// Values come from the admin UI unchecked; parseAdapterConfig validates them.
declare global {
	namespace ioBroker {
		interface DeviceConfig {
			id: string;
			name?: string;
			runningStateId?: string;
			runningPattern?: string;
			currentTemperatureStateId: string;
			targetTemperatureStateId: string;
			hvacActionStateId?: string;
			equipmentRunningStateId?: string;
			weatherLocation?: string;
		}

		interface AdapterConfig {
			updateInterval: number;
			energyRate: number | string;
			alertThreshold: number;
			lookbackDays: number;
			retentionDays: number;
			purgeIntervalHours: number;
			weatherCacheSeconds: number;
			weatherFetchTimeoutMs: number;
			weatherApiKey: string;
			weatherLocation: string;
			weatherStatePath: string;
			temperatureUnit: "F" | "C";
			baselineSecondsPerDegree: number;
			assumedDrawKw: number;
			cyclesPerDayEstimate?: number | string;
			historyDirectory: string;
			sentryDsn: string;
			devices: DeviceConfig[];
		}
	}
}

// this is required so the above AdapterConfig is found by TypeScript / type checking
export {};
