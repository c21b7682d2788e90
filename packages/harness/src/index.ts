/**
 * @todo-probe/harness
 *
 * Race harness for concurrent writes on one conflict key, and a load runner
 * for concurrent request streams.
 *
 * @packageDocumentation
 */

// ============================================================================
// Race
// ============================================================================

export { DEFAULT_JOIN_TIMEOUT_MS, race } from "./race"
export type {
  AcceptedOutcome,
  ActorOutcome,
  RaceOptions,
  RaceResult,
  RejectedOutcome,
} from "./race"

export {
  DEFAULT_RACE_ACTORS,
  raceCreateDistinctIds,
  raceCreateSameId,
} from "./todo-races"
export type {
  DistinctIdRace,
  SameIdRace,
  SameIdRaceOptions,
  TodoRaceOptions,
} from "./todo-races"

// ============================================================================
// Load
// ============================================================================

export { DEFAULT_LOAD_TIMEOUT_MS, runLoad } from "./load-runner"
export type { LoadOptions, LoadReport } from "./load-runner"

export { calculateStats } from "./stats"
export type { Stats } from "./stats"

export {
  formatLoadReport,
  formatLoadSummary,
  printLoadReport,
  printLoadSummary,
} from "./report"
export type { LoadReportRow } from "./report"

// ============================================================================
// Errors
// ============================================================================

export { JoinTimeoutError, LoadTimeoutError } from "./error"
