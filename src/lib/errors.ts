/**
 * Error types raised by the analytics core
 */

/**
 * Base class for all adapter errors
 */
export class ClimateInsightsError extends Error {
	constructor(
		message: string,
		public readonly deviceId?: string,
	) {
		super(message);
		this.name = "ClimateInsightsError";
	}
}

/**
 * Failure of the cycle history store
 */
export class StorageError extends ClimateInsightsError {
	constructor(
		message: string,
		deviceId?: string,
		public readonly code?: string,
	) {
		super(message, deviceId);
		this.name = "StorageError";
	}
}

/**
 * Storage temporarily unavailable (locked, busy, I/O hiccup). Retried on the next poll.
 */
export class TransientIOError extends StorageError {
	constructor(message: string, deviceId?: string, code?: string) {
		super(message, deviceId, code);
		this.name = "TransientIOError";
	}
}

/**
 * Storage corrupted or exhausted. Stops polling for the affected device.
 */
export class StorageCorruptionError extends StorageError {
	constructor(message: string, deviceId?: string, code?: string) {
		super(message, deviceId, code);
		this.name = "StorageCorruptionError";
	}
}

/**
 * Outdoor temperature lookup failed or timed out
 */
export class UpstreamUnavailable extends ClimateInsightsError {
	constructor(
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "UpstreamUnavailable";
	}
}

/**
 * Device reported a cycle start while a cycle was already open
 */
export class DuplicateCycleStart extends ClimateInsightsError {
	constructor(
		deviceId: string,
		public readonly discardedStartTime: number,
	) {
		super(`Cycle start reported while cycle from ${new Date(discardedStartTime).toISOString()} was still open`, deviceId);
		this.name = "DuplicateCycleStart";
	}
}

/**
 * Missing or invalid configuration value
 */
export class ConfigurationError extends ClimateInsightsError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
		this.name = "ConfigurationError";
	}
}

/**
 * Normalize an unknown thrown value into an Error
 *
 * @param error value caught in a catch block
 * @returns the value itself if it is an Error, otherwise a wrapping Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
