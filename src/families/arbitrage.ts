/**
 * Arbitrage family. Any of the five arbitrage modes activates it; all of them
 * share one minimum profit threshold, `spotFutureSpread`.
 */

import type { ConditionRecord } from "../conditions/types.js";
import type { ValidationError } from "../lib/validation/index.js";
import { type Result, firstFailure } from "../shared/result.js";
import { buildLeverage, buildMarginMode, positive, required, validateExecution } from "./rules.js";
import type { ArbitrageConfig, StrategyFamily } from "./types.js";

export function isArbitrageActive(record: ConditionRecord): boolean {
	return (
		record.crossExchangeArbEnabled ||
		record.spotFutureArbEnabled ||
		record.triangleArbEnabled ||
		record.statArbEnabled ||
		record.futuresSpotArbEnabled
	);
}

export function validateArbitrage(record: ConditionRecord): Result<void, ValidationError> {
	return firstFailure([
		() => required("spotFutureSpread", record.spotFutureSpread),
		() => positive("spotFutureSpread", record.spotFutureSpread),
		() => validateExecution(record),
	]);
}

export function buildArbitrageConfig(record: ConditionRecord): ArbitrageConfig {
	const config: ArbitrageConfig = {
		strategyType: "arbitrage",
		crossExchange: record.crossExchangeArbEnabled,
		spotFuture: record.spotFutureArbEnabled,
		triangle: record.triangleArbEnabled,
		statistical: record.statArbEnabled,
		futuresSpot: record.futuresSpotArbEnabled,
		minProfitThreshold: record.spotFutureSpread ?? 0,
		marginMode: buildMarginMode(record),
		leverage: buildLeverage(record),
	};
	return Object.freeze(config);
}

export const arbitrage: StrategyFamily<"arbitrage"> = {
	strategyType: "arbitrage",
	activation: isArbitrageActive,
	validate: validateArbitrage,
	buildConfig: buildArbitrageConfig,
};
