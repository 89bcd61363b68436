import { describe, expect, it } from "vitest";
import { type ConditionRecord, conditionRecord } from "../conditions/types.js";
import { buildTraditionalConfig, isTraditionalActive, validateTraditional } from "./traditional.js";

describe("traditional family", () => {
	describe("activation", () => {
		const activators: Array<[string, Partial<ConditionRecord>]> = [
			["shortOnGainers", { shortOnGainers: true }],
			["longOnSmallGainers", { longOnSmallGainers: true }],
			["futuresPriceShortStrategyEnabled", { futuresPriceShortStrategyEnabled: true }],
		];

		it.each(activators)("is active when %s is set", (_name, flags) => {
			expect(isTraditionalActive(conditionRecord(flags))).toBe(true);
		});

		it("is inactive with no traditional flag", () => {
			expect(isTraditionalActive(conditionRecord({ gridTradingEnabled: true }))).toBe(false);
		});
	});

	describe("validate", () => {
		it("accepts a record with only the flag", () => {
			expect(validateTraditional(conditionRecord({ shortOnGainers: true })).ok).toBe(true);
		});

		const invalid: Array<[string, Partial<ConditionRecord>]> = [
			["gainersRankLimit", { gainersRankLimit: -1 }],
			["marketCapLimitShort", { marketCapLimitShort: -100 }],
			["shortMultiplier", { shortMultiplier: 0 }],
			["longMultiplier", { longMultiplier: -2 }],
			["tradingType", { tradingType: "margin" }],
			["futuresPriceShortLeverage", { futuresPriceShortLeverage: 0 }],
			["futuresPriceShortMinFundingRate", { futuresPriceShortMinFundingRate: Number.NaN }],
			["marginMode", { marginMode: "isolated" }],
		];

		it.each(invalid)("rejects an invalid %s", (field, fields) => {
			const result = validateTraditional(conditionRecord({ shortOnGainers: true, ...fields }));

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.field).toBe(field);
			}
		});

		it("allows a negative minimum funding rate", () => {
			const record = conditionRecord({
				futuresPriceShortStrategyEnabled: true,
				futuresPriceShortMinFundingRate: -0.01,
			});

			expect(validateTraditional(record).ok).toBe(true);
		});
	});

	describe("buildConfig", () => {
		it("converts market-cap limits from units of 10,000 exactly", () => {
			const config = buildTraditionalConfig(
				conditionRecord({ shortOnGainers: true, marketCapLimitShort: 1.1, marketCapLimitLong: 250 }),
			);

			expect(config.marketCapLimitShort).toBe(11_000);
			expect(config.marketCapLimitLong).toBe(2_500_000);
		});

		it("applies defaults for absent fields", () => {
			const config = buildTraditionalConfig(conditionRecord({ longOnSmallGainers: true }));

			expect(config).toEqual({
				strategyType: "traditional",
				shortOnGainers: false,
				longOnSmallGainers: true,
				gainersRankLimit: 0,
				longGainersRankLimit: 0,
				marketCapLimitShort: 0,
				marketCapLimitLong: 0,
				shortMultiplier: 1,
				longMultiplier: 1,
				futuresPriceRankFilterEnabled: false,
				maxFuturesPriceRank: 0,
				tradingType: "both",
				futuresPriceShort: { enabled: false, maxRank: 0, minFundingRate: 0, leverage: 1 },
				marginLossStopLoss: { enabled: false, percent: 0 },
				marginProfitTakeProfit: { enabled: false, percent: 0 },
				marginMode: "ISOLATED",
				leverage: { enabled: false, defaultLeverage: 1, maxLeverage: 100 },
			});
		});

		it("copies configured values", () => {
			const config = buildTraditionalConfig(
				conditionRecord({
					shortOnGainers: true,
					gainersRankLimit: 10,
					gainersRankLimitLong: 50,
					shortMultiplier: 1.5,
					tradingType: "futures",
					futuresPriceShortStrategyEnabled: true,
					futuresPriceShortMaxRank: 3,
					futuresPriceShortLeverage: 4,
					enableMarginLossStopLoss: true,
					marginLossStopLossPercent: 30,
				}),
			);

			expect(config.gainersRankLimit).toBe(10);
			expect(config.longGainersRankLimit).toBe(50);
			expect(config.shortMultiplier).toBe(1.5);
			expect(config.tradingType).toBe("futures");
			expect(config.futuresPriceShort).toEqual({ enabled: true, maxRank: 3, minFundingRate: 0, leverage: 4 });
			expect(config.marginLossStopLoss).toEqual({ enabled: true, percent: 30 });
		});

		it("returns a deeply frozen config", () => {
			const config = buildTraditionalConfig(conditionRecord({ shortOnGainers: true }));

			expect(Object.isFrozen(config)).toBe(true);
			expect(Object.isFrozen(config.futuresPriceShort)).toBe(true);
			expect(Object.isFrozen(config.leverage)).toBe(true);
		});
	});
});
