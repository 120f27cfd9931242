import type { DeployPhase } from "../core/state-machine.js";
import type { HealthReport } from "../types/health.js";
import type { StageOutcome } from "../types/lifecycle.js";
import type { BootstrapResult, DeployFailure, DeploymentOutcome, Diagnostics } from "../types/outcome.js";
import type { PreflightResult } from "../types/preflight.js";
import { cleanOutput } from "./redact.js";
import { remediation, statusHeadline, stdoutWriter, type Diagnostic, type LineWriter, type Reporter, type SummaryContext } from "./reporter.js";

/** One JSON object per line, for CI logs and other machines. */
export class JsonlReporter implements Reporter {
  constructor(
    private readonly ctx: SummaryContext,
    private readonly write: LineWriter = stdoutWriter,
  ) {}

  phaseStarted(phase: DeployPhase): void {
    this.emit({ level: "info", code: "PHASE_STARTED", message: phase, details: { phase } });
  }

  preflight(result: PreflightResult): void {
    for (const check of result.checks) {
      this.emit({
        level: check.status === "fail" ? "error" : check.status === "warn" ? "warn" : "info",
        code: `PREFLIGHT_${check.status.toUpperCase()}`,
        message: check.message,
        details: { check: check.name, kind: check.kind, subject: check.subject, hint: check.hint },
      });
    }
  }

  bootstrap(result: BootstrapResult): void {
    if (result.error) {
      this.emit({
        level: "error",
        code: "BOOTSTRAP_FAILED",
        message: result.error.message,
        path: result.error.path,
        details: { created: result.created, existing: result.existing },
      });
      return;
    }
    this.emit({
      level: "info",
      code: "BOOTSTRAP_OK",
      message: `${result.created.length} created, ${result.existing.length} present`,
      details: { created: result.created, existing: result.existing },
    });
  }

  stage(outcome: StageOutcome): void {
    const level = outcome.status !== "failed" ? "info" : outcome.stage === "stop" ? "warn" : "error";
    this.emit({
      level,
      code: `STAGE_${outcome.status.toUpperCase()}`,
      message: outcome.reason ?? `${outcome.stage} ${outcome.status}`,
      details: {
        stage: outcome.stage,
        duration_ms: outcome.duration_ms,
        note: outcome.note,
        output: outcome.output === undefined ? undefined : cleanOutput(outcome.output),
      },
    });
  }

  health(report: HealthReport): void {
    this.emit({
      level: report.status === "healthy" ? "info" : "error",
      code: `HEALTH_${report.status.toUpperCase()}`,
      message: report.reason ?? report.status,
      details: {
        services: report.services,
        status_polls: report.status_polls,
        probe_attempts: report.probe_attempts,
        duration_ms: report.duration_ms,
      },
    });
  }

  diagnostics(failure: DeployFailure, diagnostics: Diagnostics): void {
    this.emit({
      level: "error",
      code: "DIAGNOSTICS",
      message: remediation(failure, this.ctx) ?? failure.kind,
      details: { ...diagnostics },
    });
  }

  finish(outcome: DeploymentOutcome): number {
    this.emit({
      level: outcome.exit_code === 0 ? "info" : "error",
      code: "DEPLOY_RESULT",
      message: statusHeadline(outcome),
      details: {
        stack: outcome.stack,
        status: outcome.status,
        exit_code: outcome.exit_code,
        stages: outcome.stages,
        health: outcome.health.status,
      },
    });
    return outcome.exit_code;
  }

  private emit(d: Diagnostic): void {
    this.write(JSON.stringify(d));
  }
}
