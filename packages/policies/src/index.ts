export { RandomPolicy } from "./random-policy.js";
export { StickyDirectionalPolicy, DIRECTION_NAMES, resolveDirections } from "./sticky-directional-policy.js";
export type { StickyDirectionalOptions } from "./sticky-directional-policy.js";
export { listPolicies, assertPolicyName, createPolicy } from "./registry.js";
export type { PolicyOptions } from "./registry.js";
