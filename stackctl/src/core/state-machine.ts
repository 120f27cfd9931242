import type { DeployStatus } from "../types/outcome.js";

/**
 * All deploy phases in order.
 */
export const DEPLOY_PHASES = ["preflight", "confirm", "bootstrap", "stop", "build", "start", "verify"] as const;

export type DeployPhase = (typeof DEPLOY_PHASES)[number];

export type DeployState = DeployPhase | DeployStatus;

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "success" | "failure" | "declined" | "unhealthy" | "timeout";

const TERMINAL: ReadonlySet<DeployState> = new Set<DeployStatus>([
  "done",
  "cancelled",
  "failed_preflight",
  "failed_bootstrap",
  "failed_build",
  "failed_start",
  "unhealthy",
  "timed_out",
]);

/**
 * Transition table. A missing entry is an invalid transition.
 * A failed stop still moves on to build: a stale deployment must not block a fresh one.
 */
const TRANSITIONS: Record<DeployPhase, Partial<Record<TransitionEvent, DeployState>>> = {
  preflight: { success: "confirm", failure: "failed_preflight" },
  confirm: { success: "bootstrap", declined: "cancelled" },
  bootstrap: { success: "stop", failure: "failed_bootstrap" },
  stop: { success: "build", failure: "build" },
  build: { success: "start", failure: "failed_build" },
  start: { success: "verify", failure: "failed_start" },
  verify: { success: "done", unhealthy: "unhealthy", timeout: "timed_out" },
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly phase: DeployPhase,
    readonly event: TransitionEvent,
  ) {
    super(`Invalid transition: ${event} in phase ${phase}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Pure function: given current phase + event, return next state.
 */
export function nextState(current: DeployPhase, event: TransitionEvent): DeployState {
  const next = TRANSITIONS[current][event];
  if (next === undefined) throw new InvalidTransitionError(current, event);
  return next;
}

export function isTerminal(state: DeployState): state is DeployStatus {
  return TERMINAL.has(state);
}
