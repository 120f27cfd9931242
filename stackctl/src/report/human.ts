import { Chalk, type ChalkInstance } from "chalk";
import type { DeployPhase } from "../core/state-machine.js";
import type { HealthReport } from "../types/health.js";
import { LIFECYCLE_STAGES, type StageOutcome } from "../types/lifecycle.js";
import type { BootstrapResult, DeployFailure, DeploymentOutcome, Diagnostics } from "../types/outcome.js";
import type { CheckStatus, PreflightResult } from "../types/preflight.js";
import { cleanOutput } from "./redact.js";
import {
  formatDuration,
  remediation,
  statusHeadline,
  stdoutWriter,
  type LineWriter,
  type Reporter,
  type SummaryContext,
} from "./reporter.js";

const PHASE_TITLES: Record<DeployPhase, string | null> = {
  preflight: "Checking environment",
  confirm: null,
  bootstrap: "Preparing directories",
  stop: "Stopping previous deployment",
  build: "Building images",
  start: "Starting services",
  verify: "Verifying health",
};

function indent(text: string, prefix = "    "): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

export type HumanReporterOptions = {
  write?: LineWriter;
  /** Force colour on or off; defaults to chalk's terminal detection. */
  color?: boolean;
};

/** Console output for people at a terminal. */
export class HumanReporter implements Reporter {
  private readonly write: LineWriter;
  private readonly c: ChalkInstance;

  constructor(
    private readonly ctx: SummaryContext,
    opts: HumanReporterOptions = {},
  ) {
    this.write = opts.write ?? stdoutWriter;
    this.c = opts.color === undefined ? new Chalk() : new Chalk({ level: opts.color ? 1 : 0 });
  }

  phaseStarted(phase: DeployPhase): void {
    const title = PHASE_TITLES[phase];
    if (title) this.write(this.c.bold(`==> ${title}`));
  }

  preflight(result: PreflightResult): void {
    for (const check of result.checks) {
      this.write(`  ${this.badge(check.status)} ${check.name}: ${check.message}`);
      if (check.hint && check.status !== "pass") {
        this.write(this.c.dim(`         fix: ${check.hint}`));
      }
    }
  }

  bootstrap(result: BootstrapResult): void {
    for (const dir of result.created) this.write(`  ${this.c.green("created")} ${dir}`);
    if (result.existing.length > 0) {
      this.write(this.c.dim(`  ${result.existing.length} director${result.existing.length === 1 ? "y" : "ies"} already present`));
    }
    if (result.error) {
      this.write(`  ${this.badge("fail")} ${result.error.path}: ${result.error.message}`);
      this.write(this.c.dim("         fix: check that the project directory is writable by the current user"));
    }
  }

  stage(outcome: StageOutcome): void {
    const took = formatDuration(outcome.duration_ms);
    if (outcome.status === "succeeded") {
      this.write(`  ${this.c.green("ok")} ${outcome.stage} (${took})${outcome.note ? this.c.dim(` - ${outcome.note}`) : ""}`);
      return;
    }
    if (outcome.status === "skipped") {
      this.write(`  ${this.c.dim(`skipped ${outcome.stage}`)}`);
      return;
    }

    // Only stop is allowed to fail without ending the run.
    const label = outcome.stage === "stop" ? this.c.yellow("warning") : this.c.red("failed");
    this.write(`  ${label} ${outcome.stage} (${took}): ${outcome.reason ?? "unknown error"}`);
    if (outcome.note) this.write(this.c.dim(`    ${outcome.note}`));
    if (outcome.output) this.write(this.c.dim(indent(cleanOutput(outcome.output))));
    if (outcome.stage === "stop") this.write(this.c.dim("    continuing with a fresh build"));
  }

  health(report: HealthReport): void {
    const running = report.services.filter((s) => s.state === "running").map((s) => s.service);
    if (report.services.length > 0) {
      for (const svc of report.services) {
        const health = svc.health ? ` (${svc.health})` : "";
        this.write(`  ${svc.service.padEnd(28)} ${svc.state}${health}`);
      }
    }
    switch (report.status) {
      case "healthy":
        this.write(`  ${this.c.green("healthy")} ${running.length} service(s) running, health endpoint responded`);
        break;
      case "unhealthy":
        this.write(`  ${this.c.red("unhealthy")} ${report.reason ?? ""}`);
        break;
      case "timed_out":
        this.write(`  ${this.c.red("timed out")} ${report.reason ?? ""}`);
        break;
      case "pending":
        break;
    }
  }

  diagnostics(failure: DeployFailure, diagnostics: Diagnostics): void {
    const hint = remediation(failure, this.ctx);
    if (hint) this.write(this.c.yellow(`  fix: ${hint}`));
    if (diagnostics.ready_logged) {
      this.write(this.c.yellow("  the application logged that it is ready, but the health endpoint did not answer; check the published port"));
    }
    if (diagnostics.logs !== undefined) {
      this.write(this.c.bold("--- recent service logs ---"));
      this.write(diagnostics.logs.length > 0 ? diagnostics.logs : this.c.dim("(no log output)"));
      this.write(this.c.bold("---------------------------"));
    } else if (diagnostics.logs_error) {
      this.write(this.c.dim(`  could not fetch service logs: ${diagnostics.logs_error}`));
    }
  }

  finish(outcome: DeploymentOutcome): number {
    const ok = outcome.exit_code === 0;
    this.write("");
    this.write(this.c.bold(ok ? this.c.green(statusHeadline(outcome)) : this.c.red(statusHeadline(outcome))));

    if (outcome.status !== "cancelled" && outcome.status !== "failed_preflight") {
      for (const stage of LIFECYCLE_STAGES) {
        this.write(`  ${stage.padEnd(8)} ${outcome.stages[stage].status}`);
      }
      this.write(`  ${"health".padEnd(8)} ${outcome.health.status}`);
    }

    if (outcome.status === "failed_preflight") {
      const failed = outcome.preflight.checks.filter((c) => c.status === "fail");
      this.write(`  ${failed.length} check(s) failed: ${failed.map((c) => c.name).join(", ")}`);
    }

    if (outcome.status === "done" && this.ctx.endpoints.length > 0) {
      this.write("Services:");
      for (const ep of this.ctx.endpoints) this.write(`  ${ep.name}: ${ep.url}`);
    }

    if (outcome.stages.start.status === "succeeded") {
      this.write(`View logs: ${this.ctx.composeInvocation} logs -f`);
      this.write(`Stop all:  ${this.ctx.composeInvocation} down`);
    }
    return outcome.exit_code;
  }

  private badge(status: CheckStatus): string {
    switch (status) {
      case "pass":
        return this.c.green("PASS");
      case "warn":
        return this.c.yellow("WARN");
      case "fail":
        return this.c.red("FAIL");
    }
  }
}
