import type { TelemetryRow } from "@tracelock/schemas";

export const TELEMETRY_COLUMNS = [
  "episode_id",
  "episode_step",
  "step",
  "action",
  "reward",
  "terminated",
  "truncated",
  "done",
  "episode_return",
  "obs_hash",
  "wall_ms",
] as const;

export type TelemetryColumn = (typeof TELEMETRY_COLUMNS)[number];

function formatCell(row: TelemetryRow, column: TelemetryColumn): string {
  switch (column) {
    case "reward":
    case "episode_return":
      return row[column].toFixed(6);
    case "wall_ms":
      return row.wall_ms.toFixed(3);
    case "terminated":
    case "truncated":
    case "done":
      return row[column] ? "1" : "0";
    case "obs_hash":
      return row.obs_hash;
    default:
      return String(row[column]);
  }
}

export function formatTelemetryRow(row: TelemetryRow): string {
  return TELEMETRY_COLUMNS.map((column) => formatCell(row, column)).join(",");
}

export function formatTelemetryCsv(rows: readonly TelemetryRow[]): string {
  const lines = [TELEMETRY_COLUMNS.join(","), ...rows.map(formatTelemetryRow)];
  return lines.join("\n") + "\n";
}

/** One parsed CSV record; cells keyed by header name. */
export type TelemetryRecord = Record<string, string>;

export function parseTelemetryCsv(content: string): TelemetryRecord[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== "");
  const header = lines[0];
  if (header === undefined) return [];

  const columns = header.split(",").map((c) => c.trim());
  return lines.slice(1).map((line) => {
    const cells = line.split(",");
    const record: TelemetryRecord = {};
    columns.forEach((column, i) => {
      record[column] = (cells[i] ?? "").trim();
    });
    return record;
  });
}

/** Non-numeric or missing cells read as 0. */
export function numericCell(record: TelemetryRecord, column: string): number {
  const raw = record[column];
  if (raw === undefined || raw === "") return 0;
  const value = Number(raw);
  return Number.isFinite(value) ? value : 0;
}

export interface EpisodeSummary {
  episode_id: number;
  steps: number;
  return: number;
}

export interface TelemetrySummary {
  steps: number;
  episodes: EpisodeSummary[];
  total_reward: number;
  /** Running reward total after each row. */
  cumulative_reward: number[];
  mean_wall_ms: number;
}

export function summarizeTelemetry(records: readonly TelemetryRecord[]): TelemetrySummary {
  const episodes = new Map<number, EpisodeSummary>();
  const cumulative: number[] = [];
  let total = 0;
  let wallTotal = 0;

  for (const record of records) {
    const episodeId = numericCell(record, "episode_id");
    const reward = numericCell(record, "reward");
    total += reward;
    cumulative.push(total);
    wallTotal += numericCell(record, "wall_ms");

    const episode = episodes.get(episodeId) ?? { episode_id: episodeId, steps: 0, return: 0 };
    episode.steps++;
    episode.return += reward;
    episodes.set(episodeId, episode);
  }

  return {
    steps: records.length,
    episodes: [...episodes.values()].sort((a, b) => a.episode_id - b.episode_id),
    total_reward: total,
    cumulative_reward: cumulative,
    mean_wall_ms: records.length > 0 ? wallTotal / records.length : 0,
  };
}
