/**
 * Traditional momentum family: short top gainers, long small gainers, and
 * short futures whose price rank runs ahead of the market.
 */

import type { ConditionRecord } from "../conditions/types.js";
import { scaleExact } from "../lib/decimal/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { type Result, firstFailure } from "../shared/result.js";
import {
	buildLeverage,
	buildMarginMode,
	finite,
	nonNegative,
	oneOf,
	positive,
	positiveInteger,
	tokenOr,
	validateExecution,
} from "./rules.js";
import { type StrategyFamily, TRADING_TYPES, type TraditionalConfig } from "./types.js";

/** Stored market-cap limits are in units of this factor. */
export const MARKET_CAP_UNIT = 10_000;

export const TRADITIONAL_DEFAULTS = {
	rankLimit: 0,
	marketCapLimit: 0,
	multiplier: 1.0,
	tradingType: "both",
	futuresPriceShortLeverage: 1,
	percent: 0,
} as const;

export function isTraditionalActive(record: ConditionRecord): boolean {
	return record.shortOnGainers || record.longOnSmallGainers || record.futuresPriceShortStrategyEnabled;
}

export function validateTraditional(record: ConditionRecord): Result<void, ValidationError> {
	return firstFailure([
		() => nonNegative("gainersRankLimit", record.gainersRankLimit),
		() => nonNegative("gainersRankLimitLong", record.gainersRankLimitLong),
		() => nonNegative("marketCapLimitShort", record.marketCapLimitShort),
		() => nonNegative("marketCapLimitLong", record.marketCapLimitLong),
		() => positive("shortMultiplier", record.shortMultiplier),
		() => positive("longMultiplier", record.longMultiplier),
		() => nonNegative("maxFuturesPriceRank", record.maxFuturesPriceRank),
		() => oneOf("tradingType", record.tradingType, TRADING_TYPES),
		() => nonNegative("futuresPriceShortMaxRank", record.futuresPriceShortMaxRank),
		() => finite("futuresPriceShortMinFundingRate", record.futuresPriceShortMinFundingRate),
		() => positiveInteger("futuresPriceShortLeverage", record.futuresPriceShortLeverage),
		() => nonNegative("marginLossStopLossPercent", record.marginLossStopLossPercent),
		() => nonNegative("marginProfitTakeProfitPercent", record.marginProfitTakeProfitPercent),
		() => validateExecution(record),
	]);
}

export function buildTraditionalConfig(record: ConditionRecord): TraditionalConfig {
	const d = TRADITIONAL_DEFAULTS;
	const config: TraditionalConfig = {
		strategyType: "traditional",
		shortOnGainers: record.shortOnGainers,
		longOnSmallGainers: record.longOnSmallGainers,
		gainersRankLimit: record.gainersRankLimit ?? d.rankLimit,
		longGainersRankLimit: record.gainersRankLimitLong ?? d.rankLimit,
		marketCapLimitShort: scaleExact(record.marketCapLimitShort ?? d.marketCapLimit, MARKET_CAP_UNIT),
		marketCapLimitLong: scaleExact(record.marketCapLimitLong ?? d.marketCapLimit, MARKET_CAP_UNIT),
		shortMultiplier: record.shortMultiplier ?? d.multiplier,
		longMultiplier: record.longMultiplier ?? d.multiplier,
		futuresPriceRankFilterEnabled: record.futuresPriceRankFilterEnabled ?? false,
		maxFuturesPriceRank: record.maxFuturesPriceRank ?? d.rankLimit,
		tradingType: tokenOr(TRADING_TYPES, record.tradingType, d.tradingType),
		futuresPriceShort: Object.freeze({
			enabled: record.futuresPriceShortStrategyEnabled,
			maxRank: record.futuresPriceShortMaxRank ?? d.rankLimit,
			minFundingRate: record.futuresPriceShortMinFundingRate ?? 0,
			leverage: record.futuresPriceShortLeverage ?? d.futuresPriceShortLeverage,
		}),
		marginLossStopLoss: Object.freeze({
			enabled: record.enableMarginLossStopLoss ?? false,
			percent: record.marginLossStopLossPercent ?? d.percent,
		}),
		marginProfitTakeProfit: Object.freeze({
			enabled: record.enableMarginProfitTakeProfit ?? false,
			percent: record.marginProfitTakeProfitPercent ?? d.percent,
		}),
		marginMode: buildMarginMode(record),
		leverage: buildLeverage(record),
	};
	return Object.freeze(config);
}

export const traditional: StrategyFamily<"traditional"> = {
	strategyType: "traditional",
	activation: isTraditionalActive,
	validate: validateTraditional,
	buildConfig: buildTraditionalConfig,
};
