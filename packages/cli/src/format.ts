import type { EnvSpec, ReplayReport, RunArtifact, RunEvent } from "@tracelock/schemas";
import type { TelemetrySummary } from "@tracelock/replay";

function pad(label: string): string {
  return `  ${(label + ":").padEnd(23)}`;
}

export function formatRecordSummary(artifact: RunArtifact, runDir: string, episodes: number): string[] {
  const { spec } = artifact;
  return [
    `Recorded run: ${artifact.run_id}`,
    `  env: ${spec.env_key} (${spec.env_id}) obs_type=${spec.obs_type}`,
    `  policy: ${spec.policy}`,
    `  seed: ${spec.seed}`,
    `  single_episode: ${spec.single_episode}`,
    `  steps_recorded: ${artifact.actions.length}`,
    `  episodes: ${episodes}`,
    `  total_reward: ${artifact.total_reward.toFixed(6)}`,
    `  final_obs_hash: ${artifact.final_obs_hash}`,
    `  saved: ${runDir}`,
  ];
}

export function formatReplayReport(report: ReplayReport): string[] {
  const { spec } = report;
  const steps =
    report.steps_replayed === report.steps ? String(report.steps) : `${report.steps} (replayed ${report.steps_replayed})`;
  return [
    "Replay complete",
    `${pad("env_key")}${spec.env_key}`,
    `${pad("env_id")}${spec.env_id}`,
    `${pad("obs_type")}${spec.obs_type}`,
    `${pad("policy")}${spec.policy}`,
    `${pad("steps")}${steps}`,
    `${pad("expected_total_reward")}${report.expected_total_reward.toFixed(6)}`,
    `${pad("actual_total_reward")}${report.actual_total_reward.toFixed(6)}`,
    `${pad("expected_final_hash")}${report.expected_final_hash}`,
    `${pad("actual_final_hash")}${report.actual_final_hash}`,
    `${pad("deterministic_reward")}${report.deterministic_reward}`,
    `${pad("deterministic_hash")}${report.deterministic_hash}`,
    `${pad("deterministic_steps")}${report.deterministic_steps}`,
  ];
}

export function formatEnvList(specs: readonly EnvSpec[]): string[] {
  return specs.map((s) => `${s.key.padEnd(12)}  ${s.env_id.padEnd(20)}  obs_type=${s.obs_type.padEnd(6)}  ${s.description}`);
}

export function formatTelemetrySummary(summary: TelemetrySummary, runDir: string): string[] {
  const lines = [
    `Telemetry: ${runDir}`,
    `  steps: ${summary.steps}`,
    `  episodes: ${summary.episodes.length}`,
  ];
  for (const episode of summary.episodes) {
    lines.push(`    episode ${episode.episode_id}: steps=${episode.steps} return=${episode.return.toFixed(6)}`);
  }
  lines.push(`  total_reward: ${summary.total_reward.toFixed(6)}`);
  lines.push(`  mean_wall_ms: ${summary.mean_wall_ms.toFixed(3)}`);
  return lines;
}

export function formatEventLine(event: RunEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 8) ?? "";
  return `[${ts}] ${event.type}`;
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
