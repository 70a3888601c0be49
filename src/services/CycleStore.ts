/**
 * Durable, append-only history of completed runtime cycles.
 * One SQLite file per device; all writes run in transactions.
 */

import Database from "better-sqlite3";
import type { RuntimeCycle } from "../models/runtimeCycle";
import type { LogCallback } from "../models/logging";
import { StorageCorruptionError, StorageError, TransientIOError } from "../lib/errors";

/**
 * Row structure of the cycles table
 */
interface CycleRow {
	device_id: string;
	start_time: number;
	end_time: number;
	duration_seconds: number;
	start_temperature: number | null;
	end_temperature: number | null;
	outdoor_temperature: number | null;
}

const SCHEMA_VERSION = 1;

/**
 * SQLite result codes that mean the file can no longer be trusted or written
 */
const CORRUPTION_CODES = ["SQLITE_CORRUPT", "SQLITE_NOTADB", "SQLITE_FULL"];

/**
 * Result codes worth retrying on the next poll
 */
const TRANSIENT_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_IOERR", "SQLITE_CANTOPEN", "SQLITE_READONLY", "SQLITE_PROTOCOL"];

/** Raised by better-sqlite3 without a result code once the handle is closed */
const CLOSED_CONNECTION = /connection is not open/i;

export class CycleStore {
	private readonly db: Database.Database;
	private readonly insertStatement: Database.Statement<[CycleRow]>;
	private readonly querySinceStatement: Database.Statement<[number], CycleRow>;
	private readonly purgeStatement: Database.Statement<[number]>;
	private readonly countStatement: Database.Statement<[], { count: number }>;
	private readonly insertCycle: Database.Transaction<(row: CycleRow) => void>;
	private readonly purgeCycles: Database.Transaction<(cutoff: number) => number>;

	/**
	 * Open (and create if needed) the history file of one device
	 *
	 * @param deviceId device the history belongs to
	 * @param filename path of the SQLite file, ":memory:" for a transient store
	 * @param logCallback log sink
	 */
	constructor(
		private readonly deviceId: string,
		private readonly filename: string,
		private readonly logCallback: LogCallback,
	) {
		try {
			this.db = new Database(filename);
			if (filename !== ":memory:") {
				this.db.pragma("journal_mode = WAL");
			}
			this.db.pragma("busy_timeout = 5000");
			this.migrate();

			this.insertStatement = this.db.prepare<CycleRow>(
				`INSERT INTO cycles (device_id, start_time, end_time, duration_seconds, start_temperature, end_temperature, outdoor_temperature)
				 VALUES (@device_id, @start_time, @end_time, @duration_seconds, @start_temperature, @end_temperature, @outdoor_temperature)`,
			);
			this.querySinceStatement = this.db.prepare<[number], CycleRow>(
				`SELECT device_id, start_time, end_time, duration_seconds, start_temperature, end_temperature, outdoor_temperature
				 FROM cycles WHERE start_time >= ? ORDER BY start_time ASC, id ASC`,
			);
			this.purgeStatement = this.db.prepare<[number]>("DELETE FROM cycles WHERE start_time < ?");
			this.countStatement = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM cycles");

			this.insertCycle = this.db.transaction((row: CycleRow) => {
				this.insertStatement.run(row);
			});
			this.purgeCycles = this.db.transaction((cutoff: number) => this.purgeStatement.run(cutoff).changes);
		} catch (error) {
			throw this.translateError(error, `open ${filename}`);
		}
		this.logCallback("debug", `[CycleStore] Opened history for ${deviceId} at ${filename}`);
	}

	/**
	 * Persist one completed cycle. All-or-nothing: a failed append leaves prior rows untouched.
	 *
	 * @param cycle completed cycle
	 */
	public append(cycle: RuntimeCycle): void {
		try {
			this.insertCycle({
				device_id: cycle.deviceId,
				start_time: cycle.startTime,
				end_time: cycle.endTime,
				duration_seconds: cycle.durationSeconds,
				start_temperature: cycle.startTemperature,
				end_temperature: cycle.endTemperature,
				outdoor_temperature: cycle.outdoorTemperature ?? null,
			});
		} catch (error) {
			throw this.translateError(error, "append");
		}
	}

	/**
	 * Cycles that started at or after the cutoff, oldest first
	 *
	 * @param cutoff timestamp (ms)
	 * @returns matching cycles
	 */
	public querySince(cutoff: number): RuntimeCycle[] {
		let rows: CycleRow[];
		try {
			rows = this.querySinceStatement.all(cutoff);
		} catch (error) {
			throw this.translateError(error, "query");
		}
		return rows.map(row => this.toCycle(row));
	}

	/**
	 * Delete cycles that started before the cutoff
	 *
	 * @param cutoff timestamp (ms); cycles starting at or after it are kept
	 * @returns number of deleted cycles
	 */
	public purgeOlderThan(cutoff: number): number {
		let deleted: number;
		try {
			deleted = this.purgeCycles(cutoff);
		} catch (error) {
			throw this.translateError(error, "purge");
		}
		if (deleted > 0) {
			this.logCallback(
				"info",
				`[CycleStore] Purged ${deleted} cycles of ${this.deviceId} older than ${new Date(cutoff).toISOString()}`,
			);
		}
		return deleted;
	}

	public count(): number {
		try {
			return this.countStatement.get()?.count ?? 0;
		} catch (error) {
			throw this.translateError(error, "count");
		}
	}

	public close(): void {
		if (this.db.open) {
			this.db.close();
			this.logCallback("debug", `[CycleStore] Closed history for ${this.deviceId}`);
		}
	}

	private migrate(): void {
		const version = Number(this.db.pragma("user_version", { simple: true }));
		if (version >= SCHEMA_VERSION) {
			return;
		}
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS cycles (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				device_id TEXT NOT NULL,
				start_time INTEGER NOT NULL,
				end_time INTEGER NOT NULL CHECK (end_time >= start_time),
				duration_seconds REAL NOT NULL CHECK (duration_seconds >= 0),
				start_temperature REAL,
				end_temperature REAL,
				outdoor_temperature REAL
			);
			CREATE INDEX IF NOT EXISTS idx_cycles_start_time ON cycles(start_time);
		`);
		this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
	}

	private toCycle(row: CycleRow): RuntimeCycle {
		const cycle: RuntimeCycle = {
			deviceId: row.device_id,
			startTime: row.start_time,
			endTime: row.end_time,
			durationSeconds: row.duration_seconds,
			startTemperature: row.start_temperature,
			endTemperature: row.end_temperature,
		};
		if (row.outdoor_temperature !== null) {
			cycle.outdoorTemperature = row.outdoor_temperature;
		}
		return Object.freeze(cycle);
	}

	private translateError(error: unknown, operation: string): StorageError {
		const detail = error instanceof Error ? error.message : String(error);
		const message = `[CycleStore] ${operation} failed for ${this.deviceId} (${this.filename}): ${detail}`;
		return classifyStorageError(error, message, this.deviceId);
	}
}

/**
 * Map an error raised by better-sqlite3 onto the storage error taxonomy.
 * Only known SQLite result codes and a closed connection count as transient.
 *
 * @param error caught error
 * @param message message of the translated error
 * @param deviceId device the history belongs to
 * @returns corruption, transient or plain storage error
 */
export function classifyStorageError(error: unknown, message: string, deviceId: string): StorageError {
	const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

	if (code && CORRUPTION_CODES.some(prefix => code.startsWith(prefix))) {
		return new StorageCorruptionError(message, deviceId, code);
	}
	if (code && TRANSIENT_CODES.some(prefix => code.startsWith(prefix))) {
		return new TransientIOError(message, deviceId, code);
	}
	if (code === undefined && error instanceof Error && CLOSED_CONNECTION.test(error.message)) {
		return new TransientIOError(message, deviceId);
	}
	return new StorageError(message, deviceId, code);
}
