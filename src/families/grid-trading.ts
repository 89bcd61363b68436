/**
 * Grid trading family: fixed price ladder between a lower and upper bound.
 */

import type { ConditionRecord } from "../conditions/types.js";
import { ValidationError } from "../lib/validation/index.js";
import { OK_VOID, type Result, err, firstFailure } from "../shared/result.js";
import {
	buildLeverage,
	buildMarginMode,
	integerInRange,
	nonNegative,
	numberInRange,
	validateExecution,
} from "./rules.js";
import type { GridTradingConfig, StrategyFamily } from "./types.js";

export const GRID_DEFAULTS = {
	levels: 10,
	minLevels: 1,
	maxLevels: 100,
} as const;

export function isGridTradingActive(record: ConditionRecord): boolean {
	return record.gridTradingEnabled;
}

function boundsOrdered(record: ConditionRecord): Result<void, ValidationError> {
	const upper = record.gridUpperPrice ?? 0;
	const lower = record.gridLowerPrice ?? 0;
	// 0 means "derive from market price"
	if (upper <= 0 || lower <= 0 || upper > lower) return OK_VOID;
	return err(
		new ValidationError("gridUpperPrice", `must be greater than gridLowerPrice (${upper} <= ${lower})`),
	);
}

export function validateGridTrading(record: ConditionRecord): Result<void, ValidationError> {
	return firstFailure([
		() => nonNegative("gridUpperPrice", record.gridUpperPrice),
		() => nonNegative("gridLowerPrice", record.gridLowerPrice),
		() => boundsOrdered(record),
		() => integerInRange("gridLevels", record.gridLevels, GRID_DEFAULTS.minLevels, GRID_DEFAULTS.maxLevels),
		() => nonNegative("gridInvestmentAmount", record.gridInvestmentAmount),
		() => numberInRange("gridStopLossPercent", record.gridStopLossPercent, 0, 100),
		() => validateExecution(record),
	]);
}

export function buildGridTradingConfig(record: ConditionRecord): GridTradingConfig {
	const config: GridTradingConfig = {
		strategyType: "grid_trading",
		upperPrice: record.gridUpperPrice ?? 0,
		lowerPrice: record.gridLowerPrice ?? 0,
		levels: record.gridLevels ?? GRID_DEFAULTS.levels,
		investmentAmount: record.gridInvestmentAmount ?? 0,
		stopLoss: Object.freeze({
			enabled: record.gridStopLossEnabled ?? false,
			percent: record.gridStopLossPercent ?? 0,
		}),
		marginMode: buildMarginMode(record),
		leverage: buildLeverage(record),
	};
	return Object.freeze(config);
}

export const gridTrading: StrategyFamily<"grid_trading"> = {
	strategyType: "grid_trading",
	activation: isGridTradingActive,
	validate: validateGridTrading,
	buildConfig: buildGridTradingConfig,
};
