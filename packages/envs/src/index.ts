export {
  MazeEnv,
  MAZE_ACTIONS,
  MAZE_HEIGHT,
  MAZE_WIDTH,
  PIXEL_SCALE,
  STATE_BYTES,
  PELLET_REWARD,
  CLEAR_BONUS,
} from "./maze-env.js";
export type { MazeEnvOptions } from "./maze-env.js";
export { listEnvs, listEnvKeys, getEnvSpec, getEnvSpecById, makeEnv, makeEnvById } from "./registry.js";
