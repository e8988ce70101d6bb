export { DeterministicRng } from "./rng.js";
export { encodeObservation, fingerprint } from "./fingerprint.js";
export { initialSeed, reseedAfterDone, isDone } from "./seed-schedule.js";
