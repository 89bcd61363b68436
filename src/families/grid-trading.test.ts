import { describe, expect, it } from "vitest";
import { type ConditionRecord, conditionRecord } from "../conditions/types.js";
import { buildGridTradingConfig, isGridTradingActive, validateGridTrading } from "./grid-trading.js";

const ENABLED: Partial<ConditionRecord> = { gridTradingEnabled: true };

describe("grid-trading family", () => {
	it("is active only with its own flag", () => {
		expect(isGridTradingActive(conditionRecord(ENABLED))).toBe(true);
		expect(isGridTradingActive(conditionRecord())).toBe(false);
	});

	describe("validate", () => {
		it("accepts the flag alone", () => {
			expect(validateGridTrading(conditionRecord(ENABLED)).ok).toBe(true);
		});

		it("accepts level bounds 1 and 100", () => {
			expect(validateGridTrading(conditionRecord({ ...ENABLED, gridLevels: 1 })).ok).toBe(true);
			expect(validateGridTrading(conditionRecord({ ...ENABLED, gridLevels: 100 })).ok).toBe(true);
		});

		const invalid: Array<[string, string, Partial<ConditionRecord>]> = [
			["zero levels", "gridLevels", { gridLevels: 0 }],
			["too many levels", "gridLevels", { gridLevels: 101 }],
			["fractional levels", "gridLevels", { gridLevels: 7.5 }],
			["negative upper price", "gridUpperPrice", { gridUpperPrice: -1 }],
			["negative investment", "gridInvestmentAmount", { gridInvestmentAmount: -500 }],
			["inverted bounds", "gridUpperPrice", { gridUpperPrice: 90, gridLowerPrice: 110 }],
			["equal bounds", "gridUpperPrice", { gridUpperPrice: 100, gridLowerPrice: 100 }],
			["stop loss above 100%", "gridStopLossPercent", { gridStopLossPercent: 150 }],
		];

		it.each(invalid)("rejects %s", (_name, field, fields) => {
			const result = validateGridTrading(conditionRecord({ ...ENABLED, ...fields }));

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.field).toBe(field);
			}
		});

		it("skips bound ordering when either bound is unset", () => {
			expect(validateGridTrading(conditionRecord({ ...ENABLED, gridUpperPrice: 0, gridLowerPrice: 50 })).ok).toBe(
				true,
			);
			expect(validateGridTrading(conditionRecord({ ...ENABLED, gridLowerPrice: 50 })).ok).toBe(true);
		});
	});

	describe("buildConfig", () => {
		it("defaults to 10 levels and isolated margin", () => {
			expect(buildGridTradingConfig(conditionRecord(ENABLED))).toEqual({
				strategyType: "grid_trading",
				upperPrice: 0,
				lowerPrice: 0,
				levels: 10,
				investmentAmount: 0,
				stopLoss: { enabled: false, percent: 0 },
				marginMode: "ISOLATED",
				leverage: { enabled: false, defaultLeverage: 1, maxLeverage: 100 },
			});
		});

		it("copies the configured ladder", () => {
			const config = buildGridTradingConfig(
				conditionRecord({
					...ENABLED,
					gridUpperPrice: 120,
					gridLowerPrice: 80,
					gridLevels: 20,
					gridInvestmentAmount: 1_000,
					gridStopLossEnabled: true,
					gridStopLossPercent: 5,
					marginMode: "CROSS",
				}),
			);

			expect(config.upperPrice).toBe(120);
			expect(config.lowerPrice).toBe(80);
			expect(config.levels).toBe(20);
			expect(config.investmentAmount).toBe(1_000);
			expect(config.stopLoss).toEqual({ enabled: true, percent: 5 });
			expect(config.marginMode).toBe("CROSS");
		});
	});
});
