import { arbitrage } from "../families/arbitrage.js";
import { gridTrading } from "../families/grid-trading.js";
import { meanReversion } from "../families/mean-reversion.js";
import { movingAverage } from "../families/moving-average.js";
import { traditional } from "../families/traditional.js";
import type { StrategyType } from "../families/types.js";
import { RouteTableError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type RouteDescriptor, route } from "./types.js";

/**
 * Production priorities. Statistically-driven reversion beats trend following,
 * trend following beats momentum, momentum beats arbitrage, and arbitrage
 * beats the lowest-frequency grid. Changing them means redeploying.
 */
export const STANDARD_PRIORITIES: Readonly<Record<StrategyType, number>> = Object.freeze({
	mean_reversion: 100,
	moving_average: 90,
	traditional: 70,
	arbitrage: 60,
	grid_trading: 50,
});

/**
 * Immutable, priority-ordered set of routes.
 *
 * Built once at process start and injected into the {@link Router}. Routes are
 * sorted by descending priority; ties keep declaration order. Construction
 * rejects anything that could make two routes compete ambiguously.
 *
 * @example
 * ```ts
 * const table = RouteTable.standard();
 * table.strategyTypes(); // ["mean_reversion", "moving_average", ...]
 * ```
 */
export class RouteTable {
	private readonly routes: readonly RouteDescriptor[];

	private constructor(routes: readonly RouteDescriptor[]) {
		this.routes = routes;
	}

	/**
	 * Sorts and checks `routes`. Fails on an empty table, a repeated strategy
	 * type, or a priority that cannot be ordered (NaN, ±Infinity).
	 */
	static create(routes: readonly RouteDescriptor[]): Result<RouteTable, RouteTableError> {
		if (routes.length === 0) {
			return err(new RouteTableError("route table has no routes", "empty_table"));
		}

		const seen = new Set<StrategyType>();
		for (const r of routes) {
			if (seen.has(r.strategyType)) {
				return err(
					new RouteTableError(
						`duplicate route for strategy type "${r.strategyType}"`,
						"duplicate_strategy_type",
						{ strategyType: r.strategyType },
					),
				);
			}
			seen.add(r.strategyType);
		}

		for (const r of routes) {
			if (!Number.isFinite(r.priority)) {
				return err(
					new RouteTableError(
						`route "${r.strategyType}" has unorderable priority ${r.priority}`,
						"non_monotonic_priority",
						{ strategyType: r.strategyType, priority: r.priority },
					),
				);
			}
		}

		// Array.prototype.sort is stable, so equal priorities keep declaration order
		const sorted = [...routes].sort((a, b) => b.priority - a.priority);
		return ok(new RouteTable(Object.freeze(sorted)));
	}

	/**
	 * The production table: mean_reversion (100) > moving_average (90) >
	 * traditional (70) > arbitrage (60) > grid_trading (50).
	 * @throws RouteTableError if the table is malformed; the process must not start
	 */
	static standard(): RouteTable {
		const p = STANDARD_PRIORITIES;
		const result = RouteTable.create([
			route(meanReversion, p.mean_reversion),
			route(movingAverage, p.moving_average),
			route(traditional, p.traditional),
			route(arbitrage, p.arbitrage),
			route(gridTrading, p.grid_trading),
		]);
		if (!result.ok) throw result.error;
		return result.value;
	}

	/** Routes in evaluation order. */
	all(): readonly RouteDescriptor[] {
		return this.routes;
	}

	strategyTypes(): readonly StrategyType[] {
		return this.routes.map((r) => r.strategyType);
	}

	get(strategyType: StrategyType): RouteDescriptor | undefined {
		return this.routes.find((r) => r.strategyType === strategyType);
	}

	get size(): number {
		return this.routes.length;
	}
}
