import type { DispatchOutcomeType, OutcomeOf } from "./types.js";

/** One event per outcome type; each handler receives the outcome itself. */
export type DispatchEvents = {
	readonly [K in DispatchOutcomeType]: (outcome: OutcomeOf<K>) => void;
};
