import type { PreflightCheck, PreflightResult } from "./preflight.js";
import type { LifecycleStage, StageOutcome } from "./lifecycle.js";
import type { HealthReport } from "./health.js";

/** Terminal states of a deploy run. */
export type DeployStatus =
  | "done"
  | "cancelled"
  | "failed_preflight"
  | "failed_bootstrap"
  | "failed_build"
  | "failed_start"
  | "unhealthy"
  | "timed_out";

export type BootstrapResult = {
  ok: boolean;
  created: string[];
  existing: string[];
  error?: { path: string; message: string };
};

export type DeployFailure =
  | { kind: "preflight"; checks: PreflightCheck[] }
  /** The confirmation prompt itself failed; the run is cancelled with nothing changed. */
  | { kind: "confirm"; reason: string }
  | { kind: "bootstrap"; path: string; message: string }
  | { kind: "lifecycle"; stage: LifecycleStage; reason: string; output?: string }
  | { kind: "health"; status: "unhealthy" | "timed_out"; reason: string };

export type Diagnostics = {
  /** Redacted tail of aggregated service logs. */
  logs?: string;
  logs_error?: string;
  /** The configured ready line was found in the log tail. */
  ready_logged?: boolean;
};

export type DeploymentOutcome = Readonly<{
  stack: string;
  status: DeployStatus;
  exit_code: number;
  preflight: PreflightResult;
  bootstrap: BootstrapResult | null;
  stages: Readonly<Record<LifecycleStage, StageOutcome>>;
  health: HealthReport;
  failure?: DeployFailure;
  diagnostics?: Diagnostics;
  started_at: string;
  finished_at: string;
}>;
