import { expect } from "chai";
import {
	ClimateInsightsError,
	ConfigurationError,
	DuplicateCycleStart,
	StorageCorruptionError,
	StorageError,
	TransientIOError,
	UpstreamUnavailable,
	toError,
} from "./errors";

describe("errors", () => {
	it("should keep the storage hierarchy", () => {
		const transient = new TransientIOError("database is locked", "living", "SQLITE_BUSY");
		expect(transient).to.be.instanceOf(StorageError);
		expect(transient).to.be.instanceOf(ClimateInsightsError);
		expect(transient.name).to.equal("TransientIOError");
		expect(transient.code).to.equal("SQLITE_BUSY");
		expect(transient.deviceId).to.equal("living");

		const corrupt = new StorageCorruptionError("malformed", "living", "SQLITE_CORRUPT");
		expect(corrupt).to.be.instanceOf(StorageError);
		expect(corrupt).to.not.be.instanceOf(TransientIOError);
	});

	it("should list configuration issues in the message", () => {
		const error = new ConfigurationError("Invalid adapter configuration", ["devices: required", "lookbackDays: too small"]);
		expect(error.message).to.equal("Invalid adapter configuration: devices: required; lookbackDays: too small");
		expect(error.issues).to.have.length(2);
	});

	it("should describe the discarded cycle on duplicate start", () => {
		const error = new DuplicateCycleStart("upstairs", 0);
		expect(error.message).to.equal("Cycle start reported while cycle from 1970-01-01T00:00:00.000Z was still open");
		expect(error.discardedStartTime).to.equal(0);
	});

	it("should carry the upstream status", () => {
		expect(new UpstreamUnavailable("rate limited", 429).status).to.equal(429);
	});

	it("should wrap non-error values", () => {
		const original = new Error("boom");
		expect(toError(original)).to.equal(original);
		expect(toError("text").message).to.equal("text");
	});
});
