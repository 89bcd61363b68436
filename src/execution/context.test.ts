import { describe, expect, it } from "vitest";
import { accountId, strategyId, tradingSymbol } from "../shared/identifiers.js";
import { buildExecutionContext, buildExecutionMarketData } from "./context.js";

describe("buildExecutionContext", () => {
	it("derives the request id from strategy type, strategy id and symbol", () => {
		const ctx = buildExecutionContext(tradingSymbol("BTCUSDT"), "traditional", accountId(123), strategyId(456));

		expect(ctx).toEqual({
			symbol: "BTCUSDT",
			strategyType: "traditional",
			accountId: 123,
			requestId: "traditional-456-BTCUSDT",
		});
	});

	it("is deterministic for the same inputs", () => {
		const build = () =>
			buildExecutionContext(tradingSymbol("ETHUSDT"), "grid_trading", accountId(1), strategyId(7));

		expect(build().requestId).toBe(build().requestId);
	});

	it("does not read the account id into the request id", () => {
		const a = buildExecutionContext(tradingSymbol("ETHUSDT"), "arbitrage", accountId(1), strategyId(9));
		const b = buildExecutionContext(tradingSymbol("ETHUSDT"), "arbitrage", accountId(2), strategyId(9));

		expect(a.requestId).toBe(b.requestId);
	});

	it("returns a frozen context", () => {
		const ctx = buildExecutionContext(tradingSymbol("SOLUSDT"), "mean_reversion", accountId(5), strategyId(0));

		expect(Object.isFrozen(ctx)).toBe(true);
		expect(ctx.requestId).toBe("mean_reversion-0-SOLUSDT");
	});
});

describe("buildExecutionMarketData", () => {
	it("renames provider fields without changing values", () => {
		const view = buildExecutionMarketData({
			symbol: "BTCUSDT",
			marketCap: 1_250_000_000.5,
			gainersRank: 3,
			hasSpot: true,
			hasFutures: false,
		});

		expect(view).toEqual({
			symbol: "BTCUSDT",
			marketCap: 1_250_000_000.5,
			gainersRank: 3,
			hasSpotMarket: true,
			hasFuturesMarket: false,
		});
	});

	it("passes odd values through unchecked", () => {
		const view = buildExecutionMarketData({
			symbol: "",
			marketCap: -1,
			gainersRank: 0,
			hasSpot: false,
			hasFutures: true,
		});

		expect(view.symbol).toBe("");
		expect(view.marketCap).toBe(-1);
		expect(view.hasFuturesMarket).toBe(true);
	});
});
