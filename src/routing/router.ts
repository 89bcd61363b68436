import type { ConditionRecord } from "../conditions/types.js";
import type { RouteTable } from "./route-table.js";
import type { RouteDecision, RouteDescriptor } from "./types.js";

/**
 * Picks the single route that acts on a Condition Record.
 *
 * Routes are tried in priority order. The first active route is validated;
 * if it fails, nothing is selected. A lower-priority route never takes over
 * from an enabled-but-malformed higher-priority one.
 *
 * Pure and synchronous: safe to share one instance across concurrent callers.
 *
 * @example
 * ```ts
 * const router = new Router(RouteTable.standard());
 * const decision = router.evaluate(record);
 * if (decision.type === "rejected") log.warn(decision.error.toJSON(), "route rejected");
 * ```
 */
export class Router {
	private readonly table: RouteTable;

	constructor(table: RouteTable) {
		this.table = table;
	}

	evaluate(record: ConditionRecord): RouteDecision {
		for (const route of this.table.all()) {
			if (!route.activation(record)) continue;
			const validation = route.validate(record);
			return validation.ok
				? { type: "selected", route }
				: { type: "rejected", route, error: validation.error };
		}
		return { type: "none" };
	}

	/** Returns the selected route, or null when none is active or the winner is invalid. */
	selectRoute(record: ConditionRecord): RouteDescriptor | null {
		const decision = this.evaluate(record);
		return decision.type === "selected" ? decision.route : null;
	}

	/** The table this router evaluates, in priority order. */
	routes(): readonly RouteDescriptor[] {
		return this.table.all();
	}
}
