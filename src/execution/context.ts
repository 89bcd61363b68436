import type { StrategyType } from "../families/types.js";
import {
	type AccountId,
	type StrategyId,
	type TradingSymbol,
	idToNumber,
	idToString,
	requestId,
} from "../shared/identifiers.js";
import type { ExecutionContext, MarketDataView, RawMarketView } from "./types.js";

/**
 * Builds the per-dispatch execution context. The request id is
 * deterministic, so re-dispatching the same strategy on the same symbol
 * yields the same key.
 *
 * @example
 * ```ts
 * buildExecutionContext(tradingSymbol("BTCUSDT"), "traditional", accountId(123), strategyId(456)).requestId;
 * // "traditional-456-BTCUSDT"
 * ```
 */
export function buildExecutionContext(
	symbol: TradingSymbol,
	strategyType: StrategyType,
	account: AccountId,
	strategy: StrategyId,
): ExecutionContext {
	return Object.freeze({
		symbol,
		strategyType,
		accountId: account,
		requestId: requestId(`${strategyType}-${idToNumber(strategy)}-${idToString(symbol)}`),
	});
}

/** Renames provider fields; values pass through unchecked. */
export function buildExecutionMarketData(raw: RawMarketView): MarketDataView {
	return Object.freeze({
		symbol: raw.symbol,
		marketCap: raw.marketCap,
		gainersRank: raw.gainersRank,
		hasSpotMarket: raw.hasSpot,
		hasFuturesMarket: raw.hasFutures,
	});
}
