import type { DispatchPlan, ExecutionReport, RawMarketView } from "../execution/types.js";
import type { StrategyType } from "../families/types.js";
import type { ValidationError } from "../lib/validation/index.js";
import type { DispatchError } from "../shared/errors.js";
import type { AccountId, StrategyId, TradingSymbol } from "../shared/identifiers.js";

/** One decision request: which strategy to run for an account on a symbol. */
export interface DispatchRequest {
	readonly accountId: AccountId;
	readonly strategyId: StrategyId;
	readonly symbol: TradingSymbol;
	readonly market: RawMarketView;
}

/**
 * Result of a plan or dispatch call. Never thrown: collaborator failures
 * arrive as `failed`, with `plan` set when the failure came after planning.
 */
export type DispatchOutcome =
	| { readonly type: "planned"; readonly plan: DispatchPlan }
	| { readonly type: "executed"; readonly plan: DispatchPlan; readonly report: ExecutionReport }
	| { readonly type: "no_route"; readonly accountId: AccountId }
	| {
			readonly type: "rejected";
			readonly accountId: AccountId;
			readonly strategyType: StrategyType;
			readonly error: ValidationError;
	  }
	| { readonly type: "missing_conditions"; readonly accountId: AccountId }
	| { readonly type: "failed"; readonly plan: DispatchPlan | null; readonly error: DispatchError };

export type DispatchOutcomeType = DispatchOutcome["type"];

export type OutcomeOf<K extends DispatchOutcomeType> = Extract<DispatchOutcome, { readonly type: K }>;
