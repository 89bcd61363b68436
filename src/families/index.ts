export {
	StrategyType,
	STRATEGY_TYPES,
	isStrategyType,
	MARGIN_MODES,
	type MarginMode,
	type LeverageSettings,
	TRADING_TYPES,
	type TradingType,
	MA_TYPES,
	type MaType,
	MA_CROSS_SIGNALS,
	type MaCrossSignal,
	MA_TREND_DIRECTIONS,
	type MaTrendDirection,
	MA_SIGNAL_MODES,
	type MaSignalMode,
	MR_SIGNAL_MODES,
	type MrSignalMode,
	type TraditionalConfig,
	type MovingAverageConfig,
	type MeanReversionConfig,
	type ArbitrageConfig,
	type GridTradingConfig,
	type StrategyConfig,
	type ConfigFor,
	type StrategyFamily,
} from "./types.js";
export { DEFAULT_MARGIN_MODE, LEVERAGE_DEFAULTS } from "./rules.js";
export {
	MARKET_CAP_UNIT,
	TRADITIONAL_DEFAULTS,
	buildTraditionalConfig,
	isTraditionalActive,
	traditional,
	validateTraditional,
} from "./traditional.js";
export {
	MOVING_AVERAGE_DEFAULTS,
	buildMovingAverageConfig,
	isMovingAverageActive,
	movingAverage,
	validateMovingAverage,
} from "./moving-average.js";
export {
	MEAN_REVERSION_DEFAULTS,
	MODE_THRESHOLDS,
	buildMeanReversionConfig,
	isMeanReversionActive,
	meanReversion,
	validateMeanReversion,
} from "./mean-reversion.js";
export { arbitrage, buildArbitrageConfig, isArbitrageActive, validateArbitrage } from "./arbitrage.js";
export {
	GRID_DEFAULTS,
	buildGridTradingConfig,
	gridTrading,
	isGridTradingActive,
	validateGridTrading,
} from "./grid-trading.js";
