/**
 * Strategy families and their strongly-typed configurations.
 *
 * `StrategyConfig` is a closed union discriminated on `strategyType`. Each
 * variant holds only its own family's fields plus the shared margin and
 * leverage settings, so a builder cannot leak another family's tunables.
 */

import type { ConditionRecord } from "../conditions/types.js";
import type { ValidationError } from "../lib/validation/index.js";
import type { Result } from "../shared/result.js";

// ── Strategy types ───────────────────────────────────────────────────

export const StrategyType = {
	MeanReversion: "mean_reversion",
	MovingAverage: "moving_average",
	Traditional: "traditional",
	Arbitrage: "arbitrage",
	GridTrading: "grid_trading",
} as const;

export type StrategyType = (typeof StrategyType)[keyof typeof StrategyType];

export const STRATEGY_TYPES: readonly StrategyType[] = Object.values(StrategyType);

export function isStrategyType(value: string): value is StrategyType {
	return STRATEGY_TYPES.some((type) => type === value);
}

// ── Shared execution settings ────────────────────────────────────────

export const MARGIN_MODES = ["ISOLATED", "CROSS"] as const;
export type MarginMode = (typeof MARGIN_MODES)[number];

export interface LeverageSettings {
	readonly enabled: boolean;
	readonly defaultLeverage: number;
	readonly maxLeverage: number;
}

interface ExecutionSettings {
	readonly marginMode: MarginMode;
	readonly leverage: LeverageSettings;
}

// ── Family configs ───────────────────────────────────────────────────

export const TRADING_TYPES = ["spot", "futures", "both"] as const;
export type TradingType = (typeof TRADING_TYPES)[number];

export interface TraditionalConfig extends ExecutionSettings {
	readonly strategyType: "traditional";
	readonly shortOnGainers: boolean;
	readonly longOnSmallGainers: boolean;
	readonly gainersRankLimit: number;
	readonly longGainersRankLimit: number;
	/** Absolute market cap (record value × 10,000) */
	readonly marketCapLimitShort: number;
	/** Absolute market cap (record value × 10,000) */
	readonly marketCapLimitLong: number;
	readonly shortMultiplier: number;
	readonly longMultiplier: number;
	readonly futuresPriceRankFilterEnabled: boolean;
	readonly maxFuturesPriceRank: number;
	readonly tradingType: TradingType;
	readonly futuresPriceShort: {
		readonly enabled: boolean;
		readonly maxRank: number;
		readonly minFundingRate: number;
		readonly leverage: number;
	};
	readonly marginLossStopLoss: { readonly enabled: boolean; readonly percent: number };
	readonly marginProfitTakeProfit: { readonly enabled: boolean; readonly percent: number };
}

export const MA_TYPES = ["SMA", "EMA"] as const;
export type MaType = (typeof MA_TYPES)[number];
export const MA_CROSS_SIGNALS = ["GOLDEN_CROSS", "DEATH_CROSS", "BOTH"] as const;
export type MaCrossSignal = (typeof MA_CROSS_SIGNALS)[number];
export const MA_TREND_DIRECTIONS = ["UP", "DOWN", "BOTH"] as const;
export type MaTrendDirection = (typeof MA_TREND_DIRECTIONS)[number];
export const MA_SIGNAL_MODES = ["QUALITY_FIRST", "BALANCED", "QUANTITY_FIRST"] as const;
export type MaSignalMode = (typeof MA_SIGNAL_MODES)[number];

export interface MovingAverageConfig extends ExecutionSettings {
	readonly strategyType: "moving_average";
	readonly maType: MaType;
	readonly shortPeriod: number;
	readonly longPeriod: number;
	readonly crossSignal: MaCrossSignal;
	readonly trendFilter: boolean;
	readonly trendDirection: MaTrendDirection;
	readonly signalMode: MaSignalMode;
	readonly longMultiplier: number;
	readonly shortMultiplier: number;
}

export const MR_SIGNAL_MODES = ["conservative", "balanced", "aggressive", "adaptive"] as const;
export type MrSignalMode = (typeof MR_SIGNAL_MODES)[number];

export interface MeanReversionConfig extends ExecutionSettings {
	readonly strategyType: "mean_reversion";
	readonly lookback: number;
	readonly channelPeriod: number;
	readonly signalMode: MrSignalMode;
	/** Minimum reversion strength; falls back to the signal mode's threshold */
	readonly threshold: number;
	readonly bollinger: { readonly enabled: boolean; readonly multiplier: number };
	readonly rsi: { readonly enabled: boolean; readonly overbought: number; readonly oversold: number };
	readonly maxPositionSize: number;
	readonly maxHoldHours: number;
	readonly longMultiplier: number;
	readonly shortMultiplier: number;
}

export interface ArbitrageConfig extends ExecutionSettings {
	readonly strategyType: "arbitrage";
	readonly crossExchange: boolean;
	readonly spotFuture: boolean;
	readonly triangle: boolean;
	readonly statistical: boolean;
	readonly futuresSpot: boolean;
	readonly minProfitThreshold: number;
}

export interface GridTradingConfig extends ExecutionSettings {
	readonly strategyType: "grid_trading";
	readonly upperPrice: number;
	readonly lowerPrice: number;
	readonly levels: number;
	readonly investmentAmount: number;
	readonly stopLoss: { readonly enabled: boolean; readonly percent: number };
}

export type StrategyConfig =
	| TraditionalConfig
	| MovingAverageConfig
	| MeanReversionConfig
	| ArbitrageConfig
	| GridTradingConfig;

export type ConfigFor<S extends StrategyType> = Extract<StrategyConfig, { readonly strategyType: S }>;

// ── Family contract ──────────────────────────────────────────────────

/**
 * One strategy family: when it is on, whether its parameters are usable, and
 * how to turn a record into its config. All three are pure.
 */
export interface StrategyFamily<S extends StrategyType = StrategyType> {
	readonly strategyType: S;
	activation(record: ConditionRecord): boolean;
	validate(record: ConditionRecord): Result<void, ValidationError>;
	/** Never fails; only called on a record that passed `validate`. */
	buildConfig(record: ConditionRecord): ConfigFor<S>;
}
