import { UnknownEnvironmentError } from "@tracelock/schemas";
import type { EnvAdapter, EnvOptions, EnvSpec } from "@tracelock/schemas";
import { MazeEnv } from "./maze-env.js";

type EnvFactory = (spec: EnvSpec, options: EnvOptions) => EnvAdapter;

interface RegisteredEnv {
  spec: EnvSpec;
  create: EnvFactory;
}

const createMaze: EnvFactory = (spec, options) =>
  new MazeEnv({ ...options, envId: spec.env_id, obsType: spec.obs_type });

const MAZE_PIXELS: EnvSpec = { key: "maze", env_id: "Grid/Maze-v1", obs_type: "pixels", description: "Pellet maze (pixels)" };
const MAZE_STATE: EnvSpec = { key: "maze-state", env_id: "Grid/Maze-state-v1", obs_type: "state", description: "Pellet maze (state bytes)" };

const ENVS: ReadonlyMap<string, RegisteredEnv> = new Map<string, RegisteredEnv>([
  [MAZE_PIXELS.key, { spec: Object.freeze(MAZE_PIXELS), create: createMaze }],
  [MAZE_STATE.key, { spec: Object.freeze(MAZE_STATE), create: createMaze }],
]);

export function listEnvs(): EnvSpec[] {
  return [...ENVS.values()].map((e) => e.spec);
}

export function listEnvKeys(): string[] {
  return [...ENVS.keys()].sort();
}

function lookupKey(key: string): RegisteredEnv {
  const entry = ENVS.get(key);
  if (!entry) throw new UnknownEnvironmentError("key", key, listEnvKeys());
  return entry;
}

function lookupId(envId: string): RegisteredEnv {
  for (const entry of ENVS.values()) {
    if (entry.spec.env_id === envId) return entry;
  }
  throw new UnknownEnvironmentError("id", envId, listEnvs().map((s) => s.env_id).sort());
}

export function getEnvSpec(key: string): EnvSpec {
  return lookupKey(key).spec;
}

export function getEnvSpecById(envId: string): EnvSpec {
  return lookupId(envId).spec;
}

export function makeEnv(key: string, options: EnvOptions = {}): { spec: EnvSpec; env: EnvAdapter } {
  const entry = lookupKey(key);
  return { spec: entry.spec, env: entry.create(entry.spec, options) };
}

/** Replay opens environments by id, since older artifacts may lack the key. */
export function makeEnvById(envId: string, options: EnvOptions = {}): EnvAdapter {
  const entry = lookupId(envId);
  return entry.create(entry.spec, options);
}
