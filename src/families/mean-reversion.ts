/**
 * Mean-reversion family: Bollinger/channel reversion with an optional RSI
 * filter. Every tunable has a default, so the flag alone yields a usable
 * route.
 */

import type { ConditionRecord } from "../conditions/types.js";
import type { ValidationError } from "../lib/validation/index.js";
import { OK_VOID, type Result, firstFailure } from "../shared/result.js";
import {
	buildLeverage,
	buildMarginMode,
	lessThan,
	numberInRange,
	oneOf,
	positive,
	positiveInteger,
	tokenOr,
	validateExecution,
} from "./rules.js";
import { MR_SIGNAL_MODES, type MeanReversionConfig, type MrSignalMode, type StrategyFamily } from "./types.js";

export const MEAN_REVERSION_DEFAULTS = {
	period: 20,
	signalMode: "balanced",
	bollingerMultiplier: 2.0,
	rsiOverbought: 70,
	rsiOversold: 30,
	maxPositionSize: 0.02,
	maxHoldHours: 24,
	multiplier: 1.0,
} as const;

/** Minimum reversion strength applied when the record sets none. */
export const MODE_THRESHOLDS: Readonly<Record<MrSignalMode, number>> = Object.freeze({
	conservative: 0.8,
	balanced: 0.6,
	aggressive: 0.4,
	adaptive: 0.3,
});

export function isMeanReversionActive(record: ConditionRecord): boolean {
	return record.meanReversionEnabled;
}

export function validateMeanReversion(record: ConditionRecord): Result<void, ValidationError> {
	const d = MEAN_REVERSION_DEFAULTS;
	return firstFailure([
		() => positiveInteger("mrPeriod", record.mrPeriod),
		() => positiveInteger("mrChannelPeriod", record.mrChannelPeriod),
		() => oneOf("mrSignalMode", record.mrSignalMode, MR_SIGNAL_MODES),
		() => positive("mrBollingerMultiplier", record.mrBollingerMultiplier),
		() => positive("mrMinReversionStrength", record.mrMinReversionStrength),
		() => numberInRange("mrRsiOverbought", record.mrRsiOverbought, 0, 100),
		() => numberInRange("mrRsiOversold", record.mrRsiOversold, 0, 100),
		() =>
			record.mrRsiEnabled === true
				? lessThan(
						"mrRsiOversold",
						record.mrRsiOversold ?? d.rsiOversold,
						"mrRsiOverbought",
						record.mrRsiOverbought ?? d.rsiOverbought,
					)
				: OK_VOID,
		() => positive("mrMaxPositionSize", record.mrMaxPositionSize),
		() => numberInRange("mrMaxPositionSize", record.mrMaxPositionSize, 0, 1),
		() => positive("mrMaxHoldHours", record.mrMaxHoldHours),
		() => validateExecution(record),
	]);
}

export function buildMeanReversionConfig(record: ConditionRecord): MeanReversionConfig {
	const d = MEAN_REVERSION_DEFAULTS;
	const lookback = record.mrPeriod ?? d.period;
	const signalMode = tokenOr(MR_SIGNAL_MODES, record.mrSignalMode, d.signalMode);
	const config: MeanReversionConfig = {
		strategyType: "mean_reversion",
		lookback,
		channelPeriod: record.mrChannelPeriod ?? lookback,
		signalMode,
		threshold: record.mrMinReversionStrength ?? MODE_THRESHOLDS[signalMode],
		bollinger: Object.freeze({
			enabled: record.mrBollingerBandsEnabled ?? false,
			multiplier: record.mrBollingerMultiplier ?? d.bollingerMultiplier,
		}),
		rsi: Object.freeze({
			enabled: record.mrRsiEnabled ?? false,
			overbought: record.mrRsiOverbought ?? d.rsiOverbought,
			oversold: record.mrRsiOversold ?? d.rsiOversold,
		}),
		maxPositionSize: record.mrMaxPositionSize ?? d.maxPositionSize,
		maxHoldHours: record.mrMaxHoldHours ?? d.maxHoldHours,
		longMultiplier: d.multiplier,
		shortMultiplier: d.multiplier,
		marginMode: buildMarginMode(record),
		leverage: buildLeverage(record),
	};
	return Object.freeze(config);
}

export const meanReversion: StrategyFamily<"mean_reversion"> = {
	strategyType: "mean_reversion",
	activation: isMeanReversionActive,
	validate: validateMeanReversion,
	buildConfig: buildMeanReversionConfig,
};
