// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type AccountId,
	type StrategyId,
	type TradingSymbol,
	type RequestId,
	accountId,
	strategyId,
	tradingSymbol,
	requestId,
	idToString,
	idToNumber,
	type Result,
	ok,
	err,
	map,
	unwrap,
	ErrorCategory,
	DispatchError,
	ConfigError,
	type RouteTableDefect,
	RouteTableError,
	NetworkError,
	TimeoutError,
	SystemError,
	classifyError,
	type DispatcherConfig,
	DEFAULT_DISPATCHER_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type LogLevel,
	type Logger,
	type LoggerConfig,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { type ValidationIssue, ValidationError } from "./lib/validation/index.js";
export { type EventMap, TypedEmitter } from "./lib/events/index.js";

// ── Conditions ───────────────────────────────────────────────────────
export {
	type ActivationFlags,
	type ConditionRecord,
	type ConditionRow,
	type ConditionStore,
	MemoryConditionStore,
	NO_FLAGS,
	conditionRecord,
	parseConditionRecord,
} from "./conditions/index.js";

// ── Strategy Families ────────────────────────────────────────────────
export {
	StrategyType,
	STRATEGY_TYPES,
	isStrategyType,
	type MarginMode,
	type LeverageSettings,
	type TraditionalConfig,
	type MovingAverageConfig,
	type MeanReversionConfig,
	type ArbitrageConfig,
	type GridTradingConfig,
	type StrategyConfig,
	type ConfigFor,
	type StrategyFamily,
	traditional,
	movingAverage,
	meanReversion,
	arbitrage,
	gridTrading,
} from "./families/index.js";

// ── Routing ──────────────────────────────────────────────────────────
export {
	type RouteDescriptor,
	type RouteDecision,
	route,
	RouteTable,
	STANDARD_PRIORITIES,
	Router,
} from "./routing/index.js";

// ── Execution ────────────────────────────────────────────────────────
export {
	type DispatchPlan,
	type ExecutionContext,
	type ExecutionReport,
	type MarketDataView,
	type RawMarketView,
	type StrategyExecutor,
	buildExecutionContext,
	buildExecutionMarketData,
	ExecutorRegistry,
} from "./execution/index.js";

// ── Dispatch ─────────────────────────────────────────────────────────
export {
	type DispatchOutcome,
	type DispatchOutcomeType,
	type DispatchRequest,
	type DispatchEvents,
	type OutcomeOf,
	Dispatcher,
	type DispatcherDeps,
} from "./dispatch/index.js";
