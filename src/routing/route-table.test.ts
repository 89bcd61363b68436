import { describe, expect, it } from "vitest";
import { arbitrage } from "../families/arbitrage.js";
import { gridTrading } from "../families/grid-trading.js";
import { meanReversion } from "../families/mean-reversion.js";
import { traditional } from "../families/traditional.js";
import { RouteTableError } from "../shared/errors.js";
import { RouteTable, STANDARD_PRIORITIES } from "./route-table.js";
import { route } from "./types.js";

describe("RouteTable", () => {
	describe("standard()", () => {
		it("orders families by the production priorities", () => {
			const table = RouteTable.standard();

			expect(table.strategyTypes()).toEqual([
				"mean_reversion",
				"moving_average",
				"traditional",
				"arbitrage",
				"grid_trading",
			]);
			expect(table.all().map((r) => r.priority)).toEqual([100, 90, 70, 60, 50]);
			expect(table.size).toBe(5);
		});

		it("returns an immutable route list", () => {
			const routes = RouteTable.standard().all();

			expect(Object.isFrozen(routes)).toBe(true);
			expect(Object.isFrozen(routes[0])).toBe(true);
		});

		it("looks routes up by strategy type", () => {
			const table = RouteTable.standard();

			expect(table.get("arbitrage")?.priority).toBe(STANDARD_PRIORITIES.arbitrage);
		});
	});

	describe("create()", () => {
		it("sorts by descending priority", () => {
			const result = RouteTable.create([route(gridTrading, 1), route(traditional, 3), route(arbitrage, 2)]);

			expect(result.ok).toBe(true);
			if (result.ok) {
				expect(result.value.strategyTypes()).toEqual(["traditional", "arbitrage", "grid_trading"]);
			}
		});

		it("keeps declaration order for equal priorities", () => {
			const result = RouteTable.create([route(gridTrading, 5), route(arbitrage, 5), route(traditional, 9)]);

			expect(result.ok).toBe(true);
			if (result.ok) {
				expect(result.value.strategyTypes()).toEqual(["traditional", "grid_trading", "arbitrage"]);
			}
		});

		it("rejects a duplicate strategy type", () => {
			const result = RouteTable.create([route(gridTrading, 50), route(arbitrage, 60), route(gridTrading, 10)]);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(RouteTableError);
				expect(result.error.defect).toBe("duplicate_strategy_type");
				expect(result.error.context).toEqual({ strategyType: "grid_trading" });
				expect(result.error.isFatal).toBe(true);
			}
		});

		it("rejects an empty table", () => {
			const result = RouteTable.create([]);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.defect).toBe("empty_table");
			}
		});

		it.each([Number.NaN, Number.POSITIVE_INFINITY])("rejects an unorderable priority (%s)", (priority) => {
			const result = RouteTable.create([route(meanReversion, priority), route(arbitrage, 1)]);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.defect).toBe("non_monotonic_priority");
			}
		});

		it("does not reorder the caller's array", () => {
			const routes = [route(gridTrading, 1), route(traditional, 2)];

			RouteTable.create(routes);

			expect(routes.map((r) => r.strategyType)).toEqual(["grid_trading", "traditional"]);
		});
	});
});
