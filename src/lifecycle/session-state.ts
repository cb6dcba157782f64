/**
 * Session phase machine. Pure logic, no I/O.
 *
 * The orchestrator consults this table before every operation; an operation
 * called in the wrong phase fails before anything reaches the daemon.
 */

export const SESSION_PHASES = ["start", "await-selection", "await-resume", "managing", "exited"] as const;

export type SessionPhase = (typeof SESSION_PHASES)[number];

/**
 * ```
 * start           → await-selection, await-resume, managing, exited
 * await-selection → await-selection, await-resume, managing, exited
 * await-resume    → managing, await-selection, exited
 * managing        → await-resume, await-selection, managing, exited
 * exited          → (terminal)
 * ```
 */
export const VALID_TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  start: ["await-selection", "await-resume", "managing", "exited"],
  "await-selection": ["await-selection", "await-resume", "managing", "exited"],
  "await-resume": ["managing", "await-selection", "exited"],
  managing: ["await-resume", "await-selection", "managing", "exited"],
  exited: [],
};

export type SessionOperation =
  | "open"
  | "reconcile"
  | "images"
  | "tracked"
  | "select"
  | "create"
  | "resume"
  | "recreate"
  | "discard"
  | "release"
  | "status"
  | "stats"
  | "logs"
  | "follow"
  | "listLedgers"
  | "describeLedger"
  | "deleteLedger"
  | "stop"
  | "destroy"
  | "exit";

const MANAGING: readonly SessionPhase[] = ["managing"];
const AWAIT_RESUME: readonly SessionPhase[] = ["await-resume"];

/** Phases in which each operation may be called. */
export const OPERATION_PHASES: Record<SessionOperation, readonly SessionPhase[]> = {
  open: ["start"],
  reconcile: ["start", "managing"],
  images: ["await-selection"],
  tracked: ["await-selection"],
  select: ["await-selection"],
  create: ["await-selection"],
  resume: AWAIT_RESUME,
  recreate: AWAIT_RESUME,
  discard: AWAIT_RESUME,
  release: ["await-resume", "managing"],
  status: MANAGING,
  stats: MANAGING,
  logs: MANAGING,
  follow: MANAGING,
  listLedgers: MANAGING,
  describeLedger: MANAGING,
  deleteLedger: MANAGING,
  stop: MANAGING,
  destroy: MANAGING,
  exit: ["start", "await-selection", "await-resume", "managing"],
};

export function isValidTransition(from: SessionPhase, to: SessionPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isAllowedIn(operation: SessionOperation, phase: SessionPhase): boolean {
  return OPERATION_PHASES[operation].includes(phase);
}
