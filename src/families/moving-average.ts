/**
 * Moving-average crossover family.
 *
 * Unlike the other families, a moving-average route is unusable without its
 * type and both periods, so those three fields are required.
 */

import type { ConditionRecord } from "../conditions/types.js";
import type { ValidationError } from "../lib/validation/index.js";
import { type Result, firstFailure } from "../shared/result.js";
import {
	buildLeverage,
	buildMarginMode,
	lessThan,
	oneOf,
	positiveInteger,
	required,
	tokenOr,
	validateExecution,
} from "./rules.js";
import {
	MA_CROSS_SIGNALS,
	MA_SIGNAL_MODES,
	MA_TREND_DIRECTIONS,
	MA_TYPES,
	type MovingAverageConfig,
	type StrategyFamily,
} from "./types.js";

export const MOVING_AVERAGE_DEFAULTS = {
	// only reached for records that skipped validation
	maType: "SMA",
	shortPeriod: 5,
	longPeriod: 20,
	crossSignal: "BOTH",
	trendDirection: "BOTH",
	signalMode: "BALANCED",
	multiplier: 1.0,
} as const;

export function isMovingAverageActive(record: ConditionRecord): boolean {
	return record.movingAverageEnabled;
}

export function validateMovingAverage(record: ConditionRecord): Result<void, ValidationError> {
	return firstFailure([
		() => required("maType", record.maType),
		() => oneOf("maType", record.maType, MA_TYPES),
		() => required("shortMaPeriod", record.shortMaPeriod),
		() => positiveInteger("shortMaPeriod", record.shortMaPeriod),
		() => required("longMaPeriod", record.longMaPeriod),
		() => positiveInteger("longMaPeriod", record.longMaPeriod),
		() => lessThan("shortMaPeriod", record.shortMaPeriod, "longMaPeriod", record.longMaPeriod),
		() => oneOf("maCrossSignal", record.maCrossSignal, MA_CROSS_SIGNALS),
		() => oneOf("maTrendDirection", record.maTrendDirection, MA_TREND_DIRECTIONS),
		() => oneOf("maSignalMode", record.maSignalMode, MA_SIGNAL_MODES),
		() => validateExecution(record),
	]);
}

export function buildMovingAverageConfig(record: ConditionRecord): MovingAverageConfig {
	const d = MOVING_AVERAGE_DEFAULTS;
	const config: MovingAverageConfig = {
		strategyType: "moving_average",
		maType: tokenOr(MA_TYPES, record.maType, d.maType),
		shortPeriod: record.shortMaPeriod ?? d.shortPeriod,
		longPeriod: record.longMaPeriod ?? d.longPeriod,
		crossSignal: tokenOr(MA_CROSS_SIGNALS, record.maCrossSignal, d.crossSignal),
		trendFilter: record.maTrendFilter ?? false,
		trendDirection: tokenOr(MA_TREND_DIRECTIONS, record.maTrendDirection, d.trendDirection),
		signalMode: tokenOr(MA_SIGNAL_MODES, record.maSignalMode, d.signalMode),
		longMultiplier: d.multiplier,
		shortMultiplier: d.multiplier,
		marginMode: buildMarginMode(record),
		leverage: buildLeverage(record),
	};
	return Object.freeze(config);
}

export const movingAverage: StrategyFamily<"moving_average"> = {
	strategyType: "moving_average",
	activation: isMovingAverageActive,
	validate: validateMovingAverage,
	buildConfig: buildMovingAverageConfig,
};
