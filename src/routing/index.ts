export { type RouteDescriptor, type RouteDecision, route } from "./types.js";
export { RouteTable, STANDARD_PRIORITIES } from "./route-table.js";
export { Router } from "./router.js";
