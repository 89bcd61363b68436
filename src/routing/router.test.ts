import { describe, expect, it } from "vitest";
import { parseConditionRecord } from "../conditions/schema.js";
import { type ConditionRecord, conditionRecord } from "../conditions/types.js";
import { arbitrage } from "../families/arbitrage.js";
import { gridTrading } from "../families/grid-trading.js";
import { unwrap } from "../shared/result.js";
import { RouteTable } from "./route-table.js";
import { Router } from "./router.js";
import { route } from "./types.js";

const MA_VALID: Partial<ConditionRecord> = {
	movingAverageEnabled: true,
	maType: "SMA",
	shortMaPeriod: 10,
	longMaPeriod: 30,
};

describe("Router", () => {
	const router = new Router(RouteTable.standard());

	describe("selectRoute", () => {
		const single: Array<[string, Partial<ConditionRecord>]> = [
			["mean_reversion", { meanReversionEnabled: true }],
			["moving_average", MA_VALID],
			["traditional", { shortOnGainers: true }],
			["arbitrage", { triangleArbEnabled: true, spotFutureSpread: 0.5 }],
			["grid_trading", { gridTradingEnabled: true }],
		];

		it.each(single)("selects %s when it is the only family enabled", (expected, fields) => {
			expect(router.selectRoute(conditionRecord(fields))?.strategyType).toBe(expected);
		});

		it("returns null when no family is enabled", () => {
			expect(router.selectRoute(conditionRecord())).toBeNull();
		});

		it("ignores tunables of families that are not enabled", () => {
			expect(router.selectRoute(conditionRecord({ gainersRankLimit: -1, maType: "INVALID" }))).toBeNull();
		});

		it("prefers the highest priority among valid enabled families", () => {
			const record = conditionRecord({ meanReversionEnabled: true, ...MA_VALID, shortOnGainers: true });

			expect(router.selectRoute(record)?.strategyType).toBe("mean_reversion");
		});

		it("prefers traditional over arbitrage and arbitrage over grid", () => {
			const arbAndGrid = { statArbEnabled: true, spotFutureSpread: 0.1, gridTradingEnabled: true };

			expect(router.selectRoute(conditionRecord({ ...arbAndGrid, longOnSmallGainers: true }))?.strategyType).toBe(
				"traditional",
			);
			expect(router.selectRoute(conditionRecord(arbAndGrid))?.strategyType).toBe("arbitrage");
		});
	});

	describe("no fallthrough", () => {
		const invalidWinners: Array<[string, Partial<ConditionRecord>]> = [
			["short period >= long period", { ...MA_VALID, shortMaPeriod: 30, longMaPeriod: 30 }],
			["unrecognized moving-average type", { ...MA_VALID, maType: "HMA" }],
			["negative rank limit", { shortOnGainers: true, gainersRankLimit: -5 }],
			["zero multiplier", { shortOnGainers: true, longMultiplier: 0 }],
		];

		it.each(invalidWinners)("returns null for %s even with a valid grid enabled", (_name, fields) => {
			const record = conditionRecord({ ...fields, gridTradingEnabled: true });

			expect(router.selectRoute(record)).toBeNull();
		});
	});

	describe("evaluate", () => {
		it("reports the selected route", () => {
			const decision = router.evaluate(conditionRecord({ gridTradingEnabled: true }));

			expect(decision.type).toBe("selected");
		});

		it("reports none when nothing is active", () => {
			expect(router.evaluate(conditionRecord())).toEqual({ type: "none" });
		});

		it("reports the rejected family and offending field", () => {
			const decision = router.evaluate(
				conditionRecord({ ...MA_VALID, shortMaPeriod: 50, gridTradingEnabled: true }),
			);

			expect(decision.type).toBe("rejected");
			if (decision.type === "rejected") {
				expect(decision.route.strategyType).toBe("moving_average");
				expect(decision.error.field).toBe("shortMaPeriod");
				expect(decision.error.reason).toBe("must be less than longMaPeriod (50 >= 30)");
			}
		});
	});

	describe("rows storing zero values for unset columns", () => {
		const selectFromRow = (row: Record<string, unknown>) =>
			router.selectRoute(unwrap(parseConditionRecord(row)));

		it("selects the route and defaults to isolated margin when margin mode is stored empty", () => {
			const record = unwrap(parseConditionRecord({ grid_trading_enabled: 1, margin_mode: "" }));
			const selected = router.selectRoute(record);

			expect(selected?.strategyType).toBe("grid_trading");
			expect(selected?.buildConfig(record).marginMode).toBe("ISOLATED");
		});

		it("defaults grid levels stored as 0", () => {
			const record = unwrap(parseConditionRecord({ grid_trading_enabled: 1, grid_levels: 0 }));
			const decision = router.evaluate(record);

			expect(decision.type).toBe("selected");
			if (decision.type === "selected") {
				const config = decision.route.buildConfig(record);
				expect(config.strategyType === "grid_trading" && config.levels).toBe(10);
			}
		});

		it("selects the route when leverage is off and its values are stored as 0", () => {
			const row = { short_on_gainers: 1, enable_leverage: 0, default_leverage: 0, max_leverage: 0 };

			expect(selectFromRow(row)?.strategyType).toBe("traditional");
		});
	});

	describe("with an alternate table", () => {
		it("follows the injected priorities", () => {
			const table = unwrap(RouteTable.create([route(gridTrading, 200), route(arbitrage, 100)]));
			const custom = new Router(table);
			const record = conditionRecord({ gridTradingEnabled: true, crossExchangeArbEnabled: true, spotFutureSpread: 1 });

			expect(custom.selectRoute(record)?.strategyType).toBe("grid_trading");
			expect(custom.routes()).toBe(table.all());
		});

		it("never selects a family missing from the table", () => {
			const custom = new Router(unwrap(RouteTable.create([route(gridTrading, 1)])));

			expect(custom.selectRoute(conditionRecord({ meanReversionEnabled: true }))).toBeNull();
		});
	});

	it("does not mutate the record", () => {
		const record = conditionRecord({ ...MA_VALID });
		const before = { ...record };

		router.evaluate(record);

		expect(record).toEqual(before);
	});
});
