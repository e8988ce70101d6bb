import { randomInt } from "node:crypto";
import { DeterministicRng } from "@tracelock/determinism";
import { ConfigurationError } from "@tracelock/schemas";
import type { EnvAdapter, EnvOptions, Observation, ObsType, ResetResult, RgbFrame, StepResult } from "@tracelock/schemas";

const LAYOUT = [
  "###############",
  "#G............#",
  "#.###.###.###.#",
  "#.#.........#.#",
  "#.#.##.#.##.#.#",
  "#......P......#",
  "#.#.##.#.##.#.#",
  "#.#.........#.#",
  "#.###.###.###.#",
  "#............G#",
  "###############",
] as const;

export const MAZE_WIDTH = LAYOUT[0].length;
export const MAZE_HEIGHT = LAYOUT.length;
export const MAZE_ACTIONS = ["NOOP", "UP", "RIGHT", "LEFT", "DOWN"] as const;
export const STATE_BYTES = 128;
export const PIXEL_SCALE = 2;

export const PELLET_REWARD = 10;
export const CLEAR_BONUS = 100;
const CHASE_PROBABILITY = 0.7;

const MOVES: ReadonlyArray<readonly [number, number]> = [
  [0, 0],
  [0, -1],
  [1, 0],
  [-1, 0],
  [0, 1],
];

const COLORS = {
  wall: [33, 33, 222],
  pellet: [255, 184, 151],
  player: [255, 255, 0],
  ghost: [255, 0, 0],
} as const;

interface Cell {
  x: number;
  y: number;
}

function scanLayout(): { walls: boolean[]; pellets: number[]; start: Cell; spawns: Cell[] } {
  const walls: boolean[] = [];
  const pellets: number[] = [];
  const spawns: Cell[] = [];
  let start: Cell = { x: 1, y: 1 };
  LAYOUT.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      const ch = row[x];
      walls.push(ch === "#");
      if (ch === ".") pellets.push(y * MAZE_WIDTH + x);
      if (ch === "P") start = { x, y };
      if (ch === "G") spawns.push({ x, y });
    }
  });
  return { walls, pellets, start, spawns };
}

const MAZE = scanLayout();

export interface MazeEnvOptions extends EnvOptions {
  envId: string;
  obsType: ObsType;
}

/**
 * Pellet maze with a single chasing ghost. Every source of randomness (ghost
 * spawn, ghost moves, sticky actions) draws from one PRNG that `reset(seed)`
 * reseeds, so a seed plus an action list fixes the whole trajectory.
 */
export class MazeEnv implements EnvAdapter {
  readonly envId: string;
  readonly obsType: ObsType;
  readonly actionCount = MAZE_ACTIONS.length;
  readonly actionNames: readonly string[] = MAZE_ACTIONS;

  private readonly frameskip: number;
  private readonly repeatActionProbability: number;
  private readonly maxEpisodeSteps: number;

  private rng: DeterministicRng | undefined;
  private player: Cell = { ...MAZE.start };
  private ghost: Cell = { ...MAZE.start };
  private pellets = new Set<number>();
  private lastAction = 0;
  private frame = 0;
  private episodeSteps = 0;
  private finished = true;
  private closed = false;

  constructor(options: MazeEnvOptions) {
    this.envId = options.envId;
    this.obsType = options.obsType;
    this.frameskip = options.frameskip ?? 4;
    this.repeatActionProbability = options.repeatActionProbability ?? 0;
    this.maxEpisodeSteps = options.maxEpisodeSteps ?? 200;

    if (!Number.isInteger(this.frameskip) || this.frameskip < 1) {
      throw new ConfigurationError(`Invalid frameskip: ${this.frameskip} (must be a positive integer)`);
    }
    if (!(this.repeatActionProbability >= 0 && this.repeatActionProbability <= 1)) {
      throw new ConfigurationError(`Invalid repeat action probability: ${this.repeatActionProbability} (must be within [0, 1])`);
    }
    if (!Number.isInteger(this.maxEpisodeSteps) || this.maxEpisodeSteps < 1) {
      throw new ConfigurationError(`Invalid max episode steps: ${this.maxEpisodeSteps} (must be a positive integer)`);
    }
  }

  reset(seed?: number): ResetResult {
    this.assertOpen();
    if (seed !== undefined) {
      this.rng = new DeterministicRng(seed);
    } else if (!this.rng) {
      this.rng = new DeterministicRng(randomInt(0, 2 ** 31));
    }
    const spawn = this.rng.pick(MAZE.spawns) ?? MAZE.start;
    this.player = { ...MAZE.start };
    this.ghost = { ...spawn };
    this.pellets = new Set(MAZE.pellets);
    this.lastAction = 0;
    this.frame = 0;
    this.episodeSteps = 0;
    this.finished = false;
    return { observation: this.observe(), info: this.info() };
  }

  step(action: number): StepResult {
    this.assertOpen();
    const rng = this.rng;
    if (!rng || this.finished) {
      throw new Error("step() called without an active episode; call reset() first");
    }
    if (!Number.isInteger(action) || action < 0 || action >= this.actionCount) {
      throw new RangeError(`Invalid action ${action} (must be an integer in [0, ${this.actionCount}))`);
    }

    let reward = 0;
    let terminated = false;
    for (let i = 0; i < this.frameskip && !terminated; i++) {
      const sticky = rng.nextFloat() < this.repeatActionProbability;
      const frameAction = sticky ? this.lastAction : action;
      this.lastAction = frameAction;
      this.frame++;

      this.player = this.move(this.player, frameAction);
      const cell = this.player.y * MAZE_WIDTH + this.player.x;
      if (this.pellets.delete(cell)) {
        reward += PELLET_REWARD;
        if (this.pellets.size === 0) {
          reward += CLEAR_BONUS;
          terminated = true;
        }
      }
      if (this.caught()) {
        terminated = true;
      } else if (!terminated && this.frame % 2 === 1) {
        this.ghost = this.moveGhost(rng);
        terminated = this.caught();
      }
    }

    this.episodeSteps++;
    const truncated = !terminated && this.episodeSteps >= this.maxEpisodeSteps;
    this.finished = terminated || truncated;
    return { observation: this.observe(), reward, terminated, truncated, info: this.info() };
  }

  renderRgb(): RgbFrame | null {
    if (this.closed) return null;
    return this.renderFrame();
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new Error(`Environment ${this.envId} is closed`);
  }

  private move(from: Cell, action: number): Cell {
    const delta = MOVES[action] ?? [0, 0];
    const to = { x: from.x + delta[0], y: from.y + delta[1] };
    return MAZE.walls[to.y * MAZE_WIDTH + to.x] ? from : to;
  }

  private moveGhost(rng: DeterministicRng): Cell {
    const options: Cell[] = [];
    for (let action = 1; action < MOVES.length; action++) {
      const next = this.move(this.ghost, action);
      if (next.x !== this.ghost.x || next.y !== this.ghost.y) options.push(next);
    }
    if (rng.nextFloat() < CHASE_PROBABILITY) {
      let best: Cell | undefined;
      let bestDistance = Infinity;
      for (const option of options) {
        const distance = Math.abs(option.x - this.player.x) + Math.abs(option.y - this.player.y);
        if (distance < bestDistance) {
          best = option;
          bestDistance = distance;
        }
      }
      return best ?? this.ghost;
    }
    return rng.pick(options) ?? this.ghost;
  }

  private caught(): boolean {
    return this.player.x === this.ghost.x && this.player.y === this.ghost.y;
  }

  private info(): Record<string, unknown> {
    return {
      frame_number: this.frame,
      episode_steps: this.episodeSteps,
      pellets_remaining: this.pellets.size,
    };
  }

  private observe(): Observation {
    if (this.obsType === "state") {
      return { shape: [STATE_BYTES], data: this.encodeState() };
    }
    const frame = this.renderFrame();
    return { shape: [frame.height, frame.width, 3], data: frame.data };
  }

  /**
   * Layout: player x/y, ghost x/y, pellets remaining, episode steps (u16le),
   * last frame action, then one bit per maze cell holding a pellet.
   */
  private encodeState(): Uint8Array {
    const ram = new Uint8Array(STATE_BYTES);
    ram[0] = this.player.x;
    ram[1] = this.player.y;
    ram[2] = this.ghost.x;
    ram[3] = this.ghost.y;
    ram[4] = this.pellets.size;
    ram[5] = this.episodeSteps & 0xff;
    ram[6] = (this.episodeSteps >> 8) & 0xff;
    ram[7] = this.lastAction;
    for (const cell of this.pellets) {
      const index = 8 + (cell >> 3);
      ram[index] = (ram[index] ?? 0) | (1 << (cell & 7));
    }
    return ram;
  }

  private renderFrame(): RgbFrame {
    const width = MAZE_WIDTH * PIXEL_SCALE;
    const height = MAZE_HEIGHT * PIXEL_SCALE;
    const data = new Uint8Array(width * height * 3);
    const paint = (cell: Cell, color: readonly number[], full: boolean): void => {
      const size = full ? PIXEL_SCALE : 1;
      for (let dy = 0; dy < size; dy++) {
        for (let dx = 0; dx < size; dx++) {
          const offset = ((cell.y * PIXEL_SCALE + dy) * width + cell.x * PIXEL_SCALE + dx) * 3;
          data.set(color, offset);
        }
      }
    };
    for (let y = 0; y < MAZE_HEIGHT; y++) {
      for (let x = 0; x < MAZE_WIDTH; x++) {
        const cell = y * MAZE_WIDTH + x;
        if (MAZE.walls[cell]) paint({ x, y }, COLORS.wall, true);
        else if (this.pellets.has(cell)) paint({ x, y }, COLORS.pellet, false);
      }
    }
    paint(this.player, COLORS.player, true);
    paint(this.ghost, COLORS.ghost, true);
    return { width, height, data };
  }
}
