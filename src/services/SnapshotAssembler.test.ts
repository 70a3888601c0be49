import { expect } from "chai";
import { assembleSnapshot, toMinutes, type SnapshotInput } from "./SnapshotAssembler";
import type { RollingStats } from "../models/metrics";
import { ConfigurationError, TransientIOError, UpstreamUnavailable } from "../lib/errors";

const stats: RollingStats = {
	averageRuntimeSeconds: 600,
	averageSecondsPerDegree: 200,
	sampleCount: 4,
	degreeSampleCount: 4,
	cyclesPerDay: 4,
	windowStart: 0,
};

function input(overrides: Partial<SnapshotInput> = {}): SnapshotInput {
	return {
		deviceId: "living",
		reading: {
			timestamp: 1_000_000,
			running: true,
			currentTemperature: 74,
			targetTemperature: 72,
			hvacAction: "cooling",
			equipmentRunning: "compCool1,fan",
		},
		openCycleSeconds: 450,
		history: { ok: true, value: undefined },
		stats: { ok: true, value: stats },
		alert: { ok: true, value: false },
		efficiency: { ok: true, value: 100 },
		cost: { ok: true, value: 0.56 },
		outdoor: { ok: true, value: { value: 91.4, fetchedAt: 900_000, stale: false } },
		...overrides,
	};
}

describe("SnapshotAssembler", () => {
	describe("assembleSnapshot", () => {
		it("should populate every attribute when all components succeed", () => {
			const snapshot = assembleSnapshot(input());

			expect(snapshot.deviceId).to.equal("living");
			expect(snapshot.timestamp).to.equal(1_000_000);
			expect(snapshot.state).to.equal(7.5);
			expect(snapshot.attributes).to.deep.equal({
				averageRuntime: 10,
				currentTemperature: 74,
				targetTemperature: 72,
				hvacAction: "cooling",
				equipmentRunning: "compCool1,fan",
				alert: false,
				avgTimePerDegree: 3.33,
				efficiencyScore: 100,
				estimatedDailyCost: 0.56,
				outdoorTemperature: 91.4,
				outdoorTemperatureStale: false,
				sampleCount: 4,
			});
			expect(snapshot.failures).to.deep.equal([]);
		});

		it("should report 0 as state while idle", () => {
			const snapshot = assembleSnapshot(
				input({ reading: { ...input().reading, running: false, hvacAction: "idle", equipmentRunning: "" } }),
			);
			expect(snapshot.state).to.equal(0);
		});

		it("should be deeply immutable", () => {
			const snapshot = assembleSnapshot(input({ cost: { ok: false, component: "cost", error: new Error("x") } }));

			expect(Object.isFrozen(snapshot)).to.be.true;
			expect(Object.isFrozen(snapshot.attributes)).to.be.true;
			expect(Object.isFrozen(snapshot.failures)).to.be.true;
			expect(Object.isFrozen(snapshot.failures[0])).to.be.true;
		});

		it("should report absent outdoor temperature when the cache is empty", () => {
			const snapshot = assembleSnapshot(input({ outdoor: { ok: true, value: null } }));

			expect(snapshot.attributes.outdoorTemperature).to.be.null;
			expect(snapshot.attributes.outdoorTemperatureStale).to.be.null;
			expect(snapshot.failures).to.deep.equal([]);
		});

		it("should report absent averages for an empty history", () => {
			const empty: RollingStats = { ...stats, averageRuntimeSeconds: null, averageSecondsPerDegree: null, sampleCount: 0 };
			const snapshot = assembleSnapshot(input({ stats: { ok: true, value: empty } }));

			expect(snapshot.attributes.averageRuntime).to.be.null;
			expect(snapshot.attributes.avgTimePerDegree).to.be.null;
			expect(snapshot.attributes.sampleCount).to.equal(0);
		});

		it("should degrade only the cost attribute without a rate", () => {
			const snapshot = assembleSnapshot(
				input({ cost: { ok: false, component: "cost", error: new ConfigurationError("No energy rate configured") } }),
			);

			expect(snapshot.attributes.estimatedDailyCost).to.be.null;
			expect(snapshot.attributes.efficiencyScore).to.equal(100);
			expect(snapshot.attributes.outdoorTemperature).to.equal(91.4);
			expect(snapshot.failures).to.deep.equal([
				{ component: "cost", attributes: ["estimatedDailyCost"], message: "No energy rate configured" },
			]);
		});

		it("should blank every statistics attribute when statistics fail", () => {
			const error = new TransientIOError("database is locked");
			const snapshot = assembleSnapshot(
				input({
					stats: { ok: false, component: "statistics", error },
					alert: { ok: false, component: "statistics", error },
					efficiency: { ok: false, component: "statistics", error },
					cost: { ok: false, component: "statistics", error },
				}),
			);

			expect(snapshot.attributes.averageRuntime).to.be.null;
			expect(snapshot.attributes.avgTimePerDegree).to.be.null;
			expect(snapshot.attributes.sampleCount).to.be.null;
			expect(snapshot.attributes.alert).to.be.null;
			expect(snapshot.attributes.efficiencyScore).to.be.null;
			expect(snapshot.attributes.estimatedDailyCost).to.be.null;
			expect(snapshot.attributes.currentTemperature).to.equal(74);
			expect(snapshot.state).to.equal(7.5);
			expect(snapshot.failures).to.deep.equal([
				{
					component: "statistics",
					attributes: [
						"averageRuntime",
						"avgTimePerDegree",
						"sampleCount",
						"alert",
						"efficiencyScore",
						"estimatedDailyCost",
					],
					message: "database is locked",
				},
			]);
		});

		it("should list every attribute a statistics failure blanks", () => {
			const error = new TransientIOError("database is locked");
			const snapshot = assembleSnapshot(
				input({
					stats: { ok: false, component: "statistics", error },
					alert: { ok: false, component: "statistics", error },
					efficiency: { ok: false, component: "statistics", error },
					cost: { ok: false, component: "statistics", error },
				}),
			);

			const blanked = Object.entries(snapshot.attributes)
				.filter(([, value]) => value === null)
				.map(([key]) => key);
			expect(snapshot.failures[0].attributes).to.have.members(blanked);
		});

		it("should list history failures without blanking attributes", () => {
			const snapshot = assembleSnapshot(
				input({ history: { ok: false, component: "history", error: new TransientIOError("disk I/O error") } }),
			);

			expect(snapshot.attributes.averageRuntime).to.equal(10);
			expect(snapshot.failures).to.deep.equal([{ component: "history", attributes: [], message: "disk I/O error" }]);
		});

		it("should list weather failures", () => {
			const snapshot = assembleSnapshot(
				input({ outdoor: { ok: false, component: "weather", error: new UpstreamUnavailable("timed out") } }),
			);

			expect(snapshot.attributes.outdoorTemperature).to.be.null;
			expect(snapshot.failures[0]).to.deep.equal({
				component: "weather",
				attributes: ["outdoorTemperature", "outdoorTemperatureStale"],
				message: "timed out",
			});
		});
	});

	describe("toMinutes", () => {
		it("should round to two decimals", () => {
			expect(toMinutes(600)).to.equal(10);
			expect(toMinutes(200)).to.equal(3.33);
			expect(toMinutes(0)).to.equal(0);
		});
	});
});
