export type { DispatchOutcome, DispatchOutcomeType, DispatchRequest, OutcomeOf } from "./types.js";
export type { DispatchEvents } from "./events.js";
export { Dispatcher, type DispatcherDeps } from "./dispatcher.js";
