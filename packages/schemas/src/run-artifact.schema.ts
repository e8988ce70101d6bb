/**
 * Accepts current and legacy artifacts. Only the fields replay cannot do
 * without are required; the rest are defaulted by `parseRunArtifact`.
 */
export const RunArtifactSchema = {
  type: "object",
  required: ["spec", "actions", "total_reward", "final_obs_hash"],
  properties: {
    run_id: { type: "string", minLength: 1 },
    created_unix_s: { type: "number", minimum: 0 },
    spec: {
      type: "object",
      required: ["env_id", "seed"],
      properties: {
        env_key: { type: "string" },
        env_id: { type: "string", minLength: 1 },
        obs_type: { type: "string", enum: ["pixels", "state"] },
        seed: { type: "integer" },
        steps: { type: "integer", minimum: 0 },
        policy: { type: "string" },
        frameskip: { type: "integer", minimum: 1 },
        repeat_action_probability: { type: "number", minimum: 0, maximum: 1 },
        single_episode: { type: "boolean" },
      },
    },
    actions: { type: "array", items: { type: "integer", minimum: 0 } },
    total_reward: { type: "number" },
    final_obs_hash: { type: "string", pattern: "^[0-9a-f]{64}$" },
  },
} as const;
