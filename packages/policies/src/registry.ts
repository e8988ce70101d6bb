import { UnknownPolicyError } from "@tracelock/schemas";
import type { ActionPolicy } from "@tracelock/schemas";
import { RandomPolicy } from "./random-policy.js";
import { StickyDirectionalPolicy } from "./sticky-directional-policy.js";
import type { StickyDirectionalOptions } from "./sticky-directional-policy.js";

export interface PolicyOptions {
  sticky_dir?: StickyDirectionalOptions;
}

type PolicyFactory = (options: PolicyOptions) => ActionPolicy;

/** Built once; every lookup constructs a new, independently owned instance. */
const POLICIES: ReadonlyMap<string, PolicyFactory> = new Map<string, PolicyFactory>([
  ["random", () => new RandomPolicy()],
  ["sticky_dir", (options) => new StickyDirectionalPolicy(options.sticky_dir)],
]);

export function listPolicies(): string[] {
  return [...POLICIES.keys()].sort();
}

/** Throws UnknownPolicyError before any environment is touched. */
export function assertPolicyName(name: string): void {
  if (!POLICIES.has(name)) throw new UnknownPolicyError(name, listPolicies());
}

export function createPolicy(name: string, options: PolicyOptions = {}): ActionPolicy {
  const factory = POLICIES.get(name);
  if (!factory) throw new UnknownPolicyError(name, listPolicies());
  return factory(options);
}
