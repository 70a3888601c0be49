import { expect } from "chai";
import { EFFICIENCY_WEIGHTS, calculateEfficiencyScore, estimateDailyCost } from "./EfficiencyModel";
import type { RollingStats } from "../models/metrics";
import { ConfigurationError } from "../lib/errors";

function stats(overrides: Partial<RollingStats> = {}): RollingStats {
	return {
		averageRuntimeSeconds: 600,
		averageSecondsPerDegree: 600,
		sampleCount: 10,
		degreeSampleCount: 10,
		cyclesPerDay: 24,
		windowStart: 0,
		...overrides,
	};
}

const efficiencyConfig = { baselineSecondsPerDegree: 600 };

describe("EfficiencyModel", () => {
	describe("calculateEfficiencyScore", () => {
		it("should score 100 at the average runtime and baseline time per degree", () => {
			expect(calculateEfficiencyScore(600, stats(), efficiencyConfig)).to.equal(100);
		});

		it("should score 100 below the average and baseline", () => {
			expect(calculateEfficiencyScore(300, stats({ averageSecondsPerDegree: 200 }), efficiencyConfig)).to.equal(100);
		});

		it("should penalize runtime above the average", () => {
			// r1 = 1.5 → 100 - 0.5 * 0.5 * 100
			expect(calculateEfficiencyScore(900, stats(), efficiencyConfig)).to.equal(75);
		});

		it("should penalize slow temperature change", () => {
			// r2 = 1.2 → 100 - 0.5 * 0.2 * 100
			expect(calculateEfficiencyScore(600, stats({ averageSecondsPerDegree: 720 }), efficiencyConfig)).to.equal(90);
		});

		it("should combine both penalties", () => {
			expect(calculateEfficiencyScore(900, stats({ averageSecondsPerDegree: 720 }), efficiencyConfig)).to.equal(65);
		});

		it("should clamp at 0", () => {
			expect(calculateEfficiencyScore(6000, stats(), efficiencyConfig)).to.equal(0);
		});

		it("should be monotonically non-increasing in the current runtime", () => {
			let previous = Number.POSITIVE_INFINITY;
			for (let seconds = 0; seconds <= 3000; seconds += 30) {
				const score = calculateEfficiencyScore(seconds, stats({ averageSecondsPerDegree: 650 }), efficiencyConfig);
				expect(score).to.be.a("number");
				if (score !== null) {
					expect(score).to.be.at.most(previous);
					previous = score;
				}
			}
		});

		it("should ignore time per degree when it is unknown", () => {
			expect(calculateEfficiencyScore(600, stats({ averageSecondsPerDegree: null }), efficiencyConfig)).to.equal(100);
		});

		it("should be absent without an average runtime", () => {
			expect(calculateEfficiencyScore(600, stats({ averageRuntimeSeconds: null }), efficiencyConfig)).to.be.null;
		});

		it("should keep the documented weights", () => {
			expect(EFFICIENCY_WEIGHTS).to.deep.equal({ runtime: 0.5, perDegree: 0.5 });
			expect(Object.isFrozen(EFFICIENCY_WEIGHTS)).to.be.true;
		});
	});

	describe("estimateDailyCost", () => {
		it("should multiply daily runtime hours by draw and rate", () => {
			// 10 min × 24 cycles = 4 h; 4 h × 3.5 kW × 0.12 = 1.68
			expect(estimateDailyCost(stats(), { energyRate: 0.12, assumedDrawKw: 3.5 })).to.equal(1.68);
		});

		it("should prefer the configured cycles per day", () => {
			// 10 min × 12 cycles = 2 h; 2 h × 2 kW × 0.25 = 1
			expect(estimateDailyCost(stats(), { energyRate: 0.25, assumedDrawKw: 2, cyclesPerDayEstimate: 12 })).to.equal(1);
		});

		it("should be absent without an average runtime", () => {
			expect(estimateDailyCost(stats({ averageRuntimeSeconds: null }), { energyRate: 0.12, assumedDrawKw: 3.5 })).to.be
				.null;
		});

		it("should raise a configuration error without a rate", () => {
			expect(() => estimateDailyCost(stats(), { assumedDrawKw: 3.5 })).to.throw(ConfigurationError, "No energy rate");
		});
	});
});
