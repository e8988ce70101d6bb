import { describe, it, expect } from "vitest";
import { UnknownEnvironmentError } from "@tracelock/schemas";
import { getEnvSpec, getEnvSpecById, listEnvKeys, listEnvs, makeEnv, makeEnvById } from "./registry.js";

describe("environment registry", () => {
  it("lists registered environments", () => {
    expect(listEnvKeys()).toEqual(["maze", "maze-state"]);
    expect(listEnvs().map((s) => s.env_id)).toEqual(["Grid/Maze-v1", "Grid/Maze-state-v1"]);
  });

  it("looks specs up by key and by id", () => {
    expect(getEnvSpec("maze-state")).toEqual({
      key: "maze-state",
      env_id: "Grid/Maze-state-v1",
      obs_type: "state",
      description: "Pellet maze (state bytes)",
    });
    expect(getEnvSpecById("Grid/Maze-v1").key).toBe("maze");
  });

  it("names the valid keys for an unknown key", () => {
    expect(() => getEnvSpec("pacman")).toThrow(UnknownEnvironmentError);
    expect(() => getEnvSpec("pacman")).toThrow("Unknown env key 'pacman'. Valid: maze, maze-state");
    expect(() => makeEnvById("ALE/Pacman-v5")).toThrow("Unknown env id 'ALE/Pacman-v5'");
  });

  it("builds environments with the requested options", () => {
    const { spec, env } = makeEnv("maze-state", { frameskip: 2 });
    expect(spec.key).toBe("maze-state");
    expect(env.envId).toBe("Grid/Maze-state-v1");
    expect(env.obsType).toBe("state");
    env.reset(3);
    expect(env.step(2).reward).toBe(20);
  });

  it("builds a fresh instance on every call", () => {
    expect(makeEnvById("Grid/Maze-v1")).not.toBe(makeEnvById("Grid/Maze-v1"));
  });
});
