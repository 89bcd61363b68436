import type { ValidationError } from "../lib/validation/index.js";
import type { StrategyFamily, StrategyType } from "../families/types.js";

/**
 * A strategy family bound to its priority in a route table. Higher priority
 * wins when several families are active.
 */
export interface RouteDescriptor<S extends StrategyType = StrategyType> extends StrategyFamily<S> {
	readonly priority: number;
}

/** Outcome of evaluating a route table against one Condition Record. */
export type RouteDecision =
	| { readonly type: "selected"; readonly route: RouteDescriptor }
	| { readonly type: "none" }
	/** The highest-priority active route failed validation; nothing is selected. */
	| { readonly type: "rejected"; readonly route: RouteDescriptor; readonly error: ValidationError };

/** Binds a family to a priority. */
export function route<S extends StrategyType>(family: StrategyFamily<S>, priority: number): RouteDescriptor<S> {
	return Object.freeze({
		strategyType: family.strategyType,
		priority,
		activation: family.activation,
		validate: family.validate,
		buildConfig: family.buildConfig,
	});
}
