import path from "node:path";
import { ensureDirectories } from "../bootstrap/directories.js";
import { exitCodeFor } from "../commands/exit-codes.js";
import type { ComposeClient } from "../compose/compose.js";
import { loadEnvFile, type EnvFileLoad } from "../config/env-file.js";
import { HealthVerifier, pendingHealth } from "../health/verifier.js";
import type { LivenessProbe } from "../health/probe.js";
import type { HostProbe } from "../preflight/host.js";
import { runPreflight } from "../preflight/validator.js";
import { cleanOutput } from "../report/redact.js";
import type { Reporter } from "../report/reporter.js";
import type { StackSettings } from "../types/config.js";
import type { HealthReport } from "../types/health.js";
import type { LifecycleStage, StageOutcome } from "../types/lifecycle.js";
import type { BootstrapResult, DeployFailure, DeploymentOutcome, Diagnostics } from "../types/outcome.js";
import type { PreflightResult } from "../types/preflight.js";
import { LifecycleDriver } from "./lifecycle.js";
import { DEPLOY_PHASES, isTerminal, nextState, type DeployPhase, type DeployState, type TransitionEvent } from "./state-machine.js";
import { tailLines } from "./text.js";

/** Asks the operator a yes/no question; resolves false when they decline. */
export type Confirmer = (message: string) => Promise<boolean>;

export type OrchestratorDeps = {
  settings: StackSettings;
  projectDir: string;
  host: HostProbe;
  compose: ComposeClient;
  probe: LivenessProbe;
  reporter: Reporter;
  /** Null when running non-interactively: the confirmation gate is skipped. */
  confirm: Confirmer | null;
  loadEnv?: (filePath: string) => EnvFileLoad;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

/** Everything learned during one run; folded into the outcome at the end. */
type RunContext = {
  preflight: PreflightResult;
  bootstrap: BootstrapResult | null;
  stages: Record<LifecycleStage, StageOutcome>;
  health: HealthReport;
  failure?: DeployFailure;
};

function skipped(stage: LifecycleStage): StageOutcome {
  return { stage, status: "skipped", duration_ms: 0 };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Drives one deploy through the state machine:
 * preflight → confirm → bootstrap → stop → build → start → verify.
 *
 * Each phase reports as it resolves. The outcome is built once, after the
 * run reaches a terminal state, and frozen.
 */
export class DeployOrchestrator {
  private readonly settings: StackSettings;
  private readonly reporter: Reporter;
  private readonly driver: LifecycleDriver;
  private readonly verifier: HealthVerifier;
  private readonly now: () => number;
  private readonly loadEnv: (filePath: string) => EnvFileLoad;

  constructor(private readonly deps: OrchestratorDeps) {
    this.settings = deps.settings;
    this.reporter = deps.reporter;
    this.now = deps.now ?? Date.now;
    this.loadEnv = deps.loadEnv ?? loadEnvFile;

    this.driver = new LifecycleDriver(deps.compose, {
      legacyContainers: deps.settings.stack.legacy_containers,
      outputTailLines: deps.settings.report.log_tail_lines,
      now: this.now,
    });

    const health = deps.settings.health;
    this.verifier = new HealthVerifier(deps.compose, deps.probe, {
      url: health.url,
      settleMs: health.settle_seconds * 1000,
      maxWaitMs: health.max_wait_seconds * 1000,
      intervalMs: health.interval_seconds * 1000,
      requestTimeoutMs: health.request_timeout_seconds * 1000,
      sleep: deps.sleep,
      now: this.now,
    });
  }

  async run(): Promise<DeploymentOutcome> {
    const startedAt = new Date(this.now()).toISOString();
    const ctx: RunContext = {
      preflight: { ok: false, checks: [] },
      bootstrap: null,
      stages: { stop: skipped("stop"), build: skipped("build"), start: skipped("start") },
      health: pendingHealth(),
    };

    let state: DeployState = DEPLOY_PHASES[0];
    while (!isTerminal(state)) {
      const phase: DeployPhase = state;
      this.reporter.phaseStarted(phase);
      let event: TransitionEvent;
      try {
        event = await this.runPhase(phase, ctx);
      } catch (e) {
        event = this.phaseCrashed(phase, e, ctx);
      }
      state = nextState(phase, event);
    }

    let diagnostics: Diagnostics | undefined;
    if (ctx.failure) {
      diagnostics = await this.collectDiagnostics(ctx.failure);
      this.reporter.diagnostics(ctx.failure, diagnostics);
    }

    const outcome: DeploymentOutcome = Object.freeze({
      stack: this.settings.stack.name,
      status: state,
      exit_code: exitCodeFor(state),
      preflight: ctx.preflight,
      bootstrap: ctx.bootstrap,
      stages: Object.freeze({ ...ctx.stages }),
      health: ctx.health,
      failure: ctx.failure,
      diagnostics,
      started_at: startedAt,
      finished_at: new Date(this.now()).toISOString(),
    });

    this.reporter.finish(outcome);
    return outcome;
  }

  private async runPhase(phase: DeployPhase, ctx: RunContext): Promise<TransitionEvent> {
    switch (phase) {
      case "preflight": {
        const envFile = this.loadEnv(path.resolve(this.deps.projectDir, this.settings.env.file));
        const result = await runPreflight({
          settings: this.settings,
          projectDir: this.deps.projectDir,
          envFile,
          host: this.deps.host,
        });
        ctx.preflight = result;
        this.reporter.preflight(result);
        if (result.ok) return "success";
        ctx.failure = { kind: "preflight", checks: result.checks.filter((c) => c.status === "fail") };
        return "failure";
      }

      case "confirm": {
        if (!this.deps.confirm) return "success";
        const go = await this.deps.confirm(
          `Stop the running ${this.settings.stack.name} stack and deploy a fresh build?`,
        );
        return go ? "success" : "declined";
      }

      case "bootstrap": {
        const result = ensureDirectories(this.deps.projectDir, this.settings.directories);
        ctx.bootstrap = result;
        this.reporter.bootstrap(result);
        if (result.ok) return "success";
        ctx.failure = {
          kind: "bootstrap",
          path: result.error?.path ?? this.deps.projectDir,
          message: result.error?.message ?? "directory bootstrap failed",
        };
        return "failure";
      }

      case "stop":
        return this.recordStage(await this.driver.stop(), ctx);

      case "build":
        return this.recordStage(await this.driver.build(), ctx);

      case "start":
        return this.recordStage(await this.driver.start(), ctx);

      case "verify": {
        const report = await this.verifier.verify();
        ctx.health = report;
        this.reporter.health(report);
        if (report.status === "healthy") return "success";
        const status = report.status === "timed_out" ? "timed_out" : "unhealthy";
        ctx.failure = { kind: "health", status, reason: report.reason ?? status };
        return status === "timed_out" ? "timeout" : "unhealthy";
      }
    }
  }

  private recordStage(outcome: StageOutcome, ctx: RunContext): TransitionEvent {
    ctx.stages[outcome.stage] = outcome;
    this.reporter.stage(outcome);
    if (outcome.status !== "failed") return "success";
    // A failed stop is only a warning; it must not become the run's failure.
    if (outcome.stage !== "stop") {
      ctx.failure = {
        kind: "lifecycle",
        stage: outcome.stage,
        reason: outcome.reason ?? `${outcome.stage} failed`,
        output: outcome.output,
      };
    }
    return "failure";
  }

  /** Turn an unexpected exception inside a phase into that phase's failure event. */
  private phaseCrashed(phase: DeployPhase, e: unknown, ctx: RunContext): TransitionEvent {
    const message = errorMessage(e);
    switch (phase) {
      case "preflight": {
        const check = { name: "preflight", kind: "config_file" as const, status: "fail" as const, message };
        ctx.preflight = { ok: false, checks: [...ctx.preflight.checks, check] };
        this.reporter.preflight({ ok: false, checks: [check] });
        ctx.failure = { kind: "preflight", checks: [check] };
        return "failure";
      }
      case "confirm":
        ctx.failure = { kind: "confirm", reason: message };
        return "declined";
      case "bootstrap":
        ctx.bootstrap = { ok: false, created: [], existing: [], error: { path: this.deps.projectDir, message } };
        this.reporter.bootstrap(ctx.bootstrap);
        ctx.failure = { kind: "bootstrap", path: this.deps.projectDir, message };
        return "failure";
      case "stop":
      case "build":
      case "start":
        return this.recordStage({ stage: phase, status: "failed", duration_ms: 0, reason: message }, ctx);
      case "verify":
        ctx.health = { ...pendingHealth(), status: "unhealthy", reason: message };
        this.reporter.health(ctx.health);
        ctx.failure = { kind: "health", status: "unhealthy", reason: message };
        return "unhealthy";
    }
  }

  /** Service logs for fatal lifecycle and health outcomes. Never throws. */
  private async collectDiagnostics(failure: DeployFailure): Promise<Diagnostics> {
    if (failure.kind !== "lifecycle" && failure.kind !== "health") return {};
    const tail = this.settings.report.log_tail_lines;
    if (tail === 0) return {};

    let logs: string;
    try {
      logs = cleanOutput(tailLines(await this.deps.compose.logs(tail), tail));
    } catch (e) {
      return { logs_error: errorMessage(e) };
    }

    const diagnostics: Diagnostics = { logs };
    const pattern = this.settings.health.ready_log_pattern;
    if (failure.kind === "health" && pattern) {
      diagnostics.ready_logged = new RegExp(pattern).test(logs);
    }
    return diagnostics;
  }
}
