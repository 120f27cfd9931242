import type { DeployPhase } from "../core/state-machine.js";
import type { Endpoint } from "../types/config.js";
import type { HealthReport } from "../types/health.js";
import type { StageOutcome } from "../types/lifecycle.js";
import type { BootstrapResult, DeployFailure, DeploymentOutcome, Diagnostics } from "../types/outcome.js";
import type { PreflightResult } from "../types/preflight.js";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type LineWriter = (line: string) => void;

/** Stack facts the final summary points the operator to. */
export type SummaryContext = {
  stack: string;
  endpoints: Endpoint[];
  /** Compose invocation for the follow-up hints, e.g. "docker compose -p docproc". */
  composeInvocation: string;
};

/**
 * Renders progress as each phase resolves, diagnostics on fatal outcomes,
 * and the final summary.
 */
export interface Reporter {
  phaseStarted(phase: DeployPhase): void;
  preflight(result: PreflightResult): void;
  bootstrap(result: BootstrapResult): void;
  stage(outcome: StageOutcome): void;
  health(report: HealthReport): void;
  diagnostics(failure: DeployFailure, diagnostics: Diagnostics): void;
  /** Render the summary and return the process exit code. */
  finish(outcome: DeploymentOutcome): number;
}

export const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line + "\n");
};

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function statusHeadline(outcome: DeploymentOutcome): string {
  switch (outcome.status) {
    case "done":
      return `Deployment of ${outcome.stack} is healthy`;
    case "cancelled":
      return `Deployment of ${outcome.stack} cancelled; nothing was changed`;
    case "failed_preflight":
      return `Deployment of ${outcome.stack} aborted: preflight checks failed`;
    case "failed_bootstrap":
      return `Deployment of ${outcome.stack} aborted: could not create working directories`;
    case "failed_build":
      return `Deployment of ${outcome.stack} failed: image build failed`;
    case "failed_start":
      return `Deployment of ${outcome.stack} failed: services did not start`;
    case "unhealthy":
      return `Deployment of ${outcome.stack} is unhealthy`;
    case "timed_out":
      return `Deployment of ${outcome.stack} timed out waiting for the health check`;
  }
}

/** What the operator should do next after a fatal outcome. */
export function remediation(failure: DeployFailure, ctx: SummaryContext): string | null {
  switch (failure.kind) {
    case "preflight":
      return null;
    case "confirm":
      return `the confirmation prompt failed (${failure.reason}); rerun with --yes to deploy without it`;
    case "bootstrap":
      return `make ${failure.path} creatable under the project directory`;
    case "lifecycle":
      return failure.stage === "build"
        ? `fix the build error above, then rerun; \`${ctx.composeInvocation} build\` reproduces it`
        : `inspect the service logs below; \`${ctx.composeInvocation} ps --all\` shows container states`;
    case "health":
      return failure.status === "timed_out"
        ? `the stack was left running; check \`${ctx.composeInvocation} logs -f\` and rerun once it responds`
        : `no container stayed up; check \`${ctx.composeInvocation} ps --all\` for exit codes`;
  }
}
