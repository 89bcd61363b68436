export {
	type ActivationFlags,
	type ExecutionTunables,
	type TraditionalTunables,
	type MovingAverageTunables,
	type MeanReversionTunables,
	type ArbitrageTunables,
	type GridTunables,
	type ConditionRecord,
	NO_FLAGS,
	conditionRecord,
} from "./types.js";
export { type ConditionRow, conditionRowSchema, parseConditionRecord } from "./schema.js";
export { type ConditionStore, MemoryConditionStore } from "./store.js";
