import { z } from "zod";
import { ConfigurationError } from "./errors";

/**
 * Admin UI fields arrive as strings and may be left empty; empty means "not set".
 */
const emptyToUndefined = (value: unknown): unknown => (value === "" || value === null ? undefined : value);

const optionalText = z.preprocess(emptyToUndefined, z.string().trim().min(1).optional());

const positiveNumber = (defaultValue: number) => z.preprocess(emptyToUndefined, z.coerce.number().positive().default(defaultValue));

const positiveInt = (defaultValue: number, min = 1) =>
	z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(defaultValue));

/**
 * Default values for every recognized option
 */
export const DEFAULTS = {
	updateInterval: 60,
	alertThreshold: 1.5,
	lookbackDays: 30,
	retentionDays: 30,
	purgeIntervalHours: 6,
	weatherCacheSeconds: 300,
	weatherFetchTimeoutMs: 10_000,
	temperatureUnit: "F",
	baselineSecondsPerDegree: 600,
	assumedDrawKw: 3.5,
	runningPattern: "compCool",
} as const;

/** Anything but letters, digits, "_" and "-"; dots would nest the device in the object tree */
const UNSAFE_ID_CHARS = /[^\p{L}\p{N}_-]/gu;

/**
 * Id of a device in the adapter's object tree and name of its history file
 *
 * @param id device id as configured
 * @returns id with every unsafe character replaced by "_"
 */
export function deviceStateId(id: string): string {
	return id.replace(UNSAFE_ID_CHARS, "_");
}

export const deviceSettingsSchema = z.object({
	id: z.string().trim().min(1),
	name: optionalText,
	runningStateId: optionalText,
	runningPattern: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULTS.runningPattern)),
	currentTemperatureStateId: z.string().trim().min(1),
	targetTemperatureStateId: z.string().trim().min(1),
	hvacActionStateId: optionalText,
	equipmentRunningStateId: optionalText,
	weatherLocation: optionalText,
});

export const adapterSettingsSchema = z
	.object({
		updateInterval: positiveInt(DEFAULTS.updateInterval, 5),
		energyRate: z.preprocess(emptyToUndefined, z.coerce.number().positive().optional()),
		alertThreshold: positiveNumber(DEFAULTS.alertThreshold),
		lookbackDays: positiveInt(DEFAULTS.lookbackDays),
		retentionDays: positiveInt(DEFAULTS.retentionDays),
		purgeIntervalHours: positiveNumber(DEFAULTS.purgeIntervalHours),
		weatherCacheSeconds: positiveInt(DEFAULTS.weatherCacheSeconds),
		weatherFetchTimeoutMs: positiveInt(DEFAULTS.weatherFetchTimeoutMs, 100),
		weatherApiKey: optionalText,
		weatherLocation: optionalText,
		weatherStatePath: optionalText,
		temperatureUnit: z.preprocess(emptyToUndefined, z.enum(["F", "C"]).default(DEFAULTS.temperatureUnit)),
		baselineSecondsPerDegree: positiveNumber(DEFAULTS.baselineSecondsPerDegree),
		assumedDrawKw: positiveNumber(DEFAULTS.assumedDrawKw),
		cyclesPerDayEstimate: z.preprocess(emptyToUndefined, z.coerce.number().positive().optional()),
		historyDirectory: optionalText,
		sentryDsn: optionalText,
		devices: z.array(deviceSettingsSchema).min(1),
	})
	.superRefine((settings, ctx) => {
		const seen = new Map<string, string>();
		settings.devices.forEach((device, index) => {
			const stateId = deviceStateId(device.id);
			const previous = seen.get(stateId);
			if (previous === device.id) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["devices", index, "id"],
					message: `Duplicate device id "${device.id}"`,
				});
			} else if (previous !== undefined) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["devices", index, "id"],
					message: `Device id "${device.id}" maps to state id "${stateId}" already used by "${previous}"`,
				});
			} else {
				seen.set(stateId, device.id);
			}

			if (!settings.weatherApiKey && device.weatherLocation) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["devices", index, "weatherLocation"],
					message: "Weather API key is required when a weather location is provided",
				});
			}
			if (settings.weatherApiKey && !settings.weatherLocation && !device.weatherLocation) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["devices", index, "weatherLocation"],
					message: "Weather location is required when a weather API key is provided",
				});
			}
		});

		if (settings.weatherLocation && !settings.weatherApiKey) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["weatherApiKey"],
				message: "Weather API key is required when a weather location is provided",
			});
		}
	});

export type AdapterSettings = z.infer<typeof adapterSettingsSchema>;
export type DeviceSettings = z.infer<typeof deviceSettingsSchema>;

/**
 * Validate the raw adapter configuration once at startup
 *
 * @param raw adapter.config as delivered by the host
 * @returns validated settings with defaults applied
 */
export function parseAdapterConfig(raw: unknown): AdapterSettings {
	const result = adapterSettingsSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError(
			"Invalid adapter configuration",
			result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`),
		);
	}
	return result.data;
}

/**
 * Age in days beyond which history is purged. Never shorter than the lookback window.
 *
 * @param settings validated settings
 * @returns purge horizon in days
 */
export function purgeHorizonDays(settings: Pick<AdapterSettings, "retentionDays" | "lookbackDays">): number {
	return Math.max(settings.retentionDays, settings.lookbackDays);
}

/**
 * Non-fatal remarks about a valid configuration
 *
 * @param settings validated settings
 * @returns messages to log at startup
 */
export function configWarnings(settings: AdapterSettings): string[] {
	const warnings: string[] = [];
	if (settings.retentionDays < settings.lookbackDays) {
		warnings.push(
			`retentionDays (${settings.retentionDays}) is shorter than lookbackDays (${settings.lookbackDays}), ` +
				`history is kept for ${settings.lookbackDays} days`,
		);
	}
	if (settings.energyRate === undefined) {
		warnings.push("No energy rate configured, estimated daily cost will not be available");
	}
	return warnings;
}
