export type {
	DispatchPlan,
	ExecutionContext,
	ExecutionReport,
	MarketDataView,
	RawMarketView,
	StrategyExecutor,
} from "./types.js";
export { buildExecutionContext, buildExecutionMarketData } from "./context.js";
export { ExecutorRegistry } from "./executor-registry.js";
