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
} from "./identifiers.js";

export {
	type Result,
	OK_VOID,
	ok,
	err,
	map,
	firstFailure,
	unwrap,
} from "./result.js";

export {
	ErrorCategory,
	DispatchError,
	ConfigError,
	type RouteTableDefect,
	RouteTableError,
	NetworkError,
	TimeoutError,
	SystemError,
	classifyError,
} from "./errors.js";

export {
	type DispatcherConfig,
	DEFAULT_DISPATCHER_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
