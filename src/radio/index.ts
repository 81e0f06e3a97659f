// Public API for the radio module
export { parseCandidate, parseCandidates } from "./candidate";
export { selectCandidate, SELECTION_WINDOW } from "./selector";
export { SerialQueue } from "./scheduler";
export {
  DiscoveryRunner,
  buildDiscoveryArgs,
  type DiscoveryProcess,
  type SpawnFn,
} from "./runner";
export { AutoplayController } from "./controller";
export type {
  DiscoveryOutcome,
  DiscoveryFailureKind,
  PlayCandidate,
  QueueEndResult,
} from "./types";
