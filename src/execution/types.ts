/**
 * Execution bounded context: what the dispatcher hands to a strategy backend.
 *
 * A StrategyExecutor runs one family. The dispatcher never talks to an
 * exchange itself; it builds a DispatchPlan and passes it through.
 */

import type { StrategyConfig, StrategyType } from "../families/types.js";
import type { AccountId, RequestId, TradingSymbol } from "../shared/identifiers.js";

/** Per-dispatch metadata for tracing and idempotency. */
export interface ExecutionContext {
	readonly symbol: TradingSymbol;
	readonly strategyType: StrategyType;
	readonly accountId: AccountId;
	/** `${strategyType}-${strategyId}-${symbol}` */
	readonly requestId: RequestId;
}

/** Market snapshot as the market-data provider delivers it. */
export interface RawMarketView {
	readonly symbol: string;
	readonly marketCap: number;
	readonly gainersRank: number;
	readonly hasSpot: boolean;
	readonly hasFutures: boolean;
}

/** Market snapshot in the shape strategy backends consume. */
export interface MarketDataView {
	readonly symbol: string;
	readonly marketCap: number;
	readonly gainersRank: number;
	readonly hasSpotMarket: boolean;
	readonly hasFuturesMarket: boolean;
}

/** Everything a backend needs to act on the selected route. */
export interface DispatchPlan {
	readonly strategyType: StrategyType;
	readonly config: StrategyConfig;
	readonly context: ExecutionContext;
	readonly marketData: MarketDataView;
}

export interface ExecutionReport {
	readonly requestId: RequestId;
	readonly strategyType: StrategyType;
	readonly accepted: boolean;
	readonly detail?: string | undefined;
}

/** Backend for a single strategy family, implemented outside this package. */
export interface StrategyExecutor {
	readonly strategyType: StrategyType;
	execute(plan: DispatchPlan): Promise<ExecutionReport>;
}
