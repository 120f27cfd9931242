import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { EnvFileLoad } from "../src/config/env-file.js";
import { DeployOrchestrator, type Confirmer } from "../src/core/orchestrator.js";
import type { ProbeResult } from "../src/health/probe.js";
import { JsonlReporter } from "../src/report/jsonl.js";
import type { Diagnostic } from "../src/report/reporter.js";
import type { StackSettings } from "../src/types/config.js";
import { FakeClock, FakeCompose, FakeHost, GOOD_ENV, failed, loadedEnv, scriptedProbe, testSettings } from "./fakes.js";

type RunSetup = {
  compose?: FakeCompose;
  host?: FakeHost;
  probeResults?: ProbeResult[];
  env?: EnvFileLoad;
  confirm?: Confirmer | null;
  settings?: StackSettings;
};

describe("DeployOrchestrator", () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "stackctl-orch-"));
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  function setup(opts: RunSetup = {}) {
    const compose = opts.compose ?? new FakeCompose();
    const clock = new FakeClock();
    const lines: Diagnostic[] = [];
    const settings = opts.settings ?? testSettings();
    const { probe } = scriptedProbe(opts.probeResults ?? [{ ok: true, status: 200 }]);
    const reporter = new JsonlReporter(
      { stack: settings.stack.name, endpoints: settings.report.endpoints, composeInvocation: "docker compose -p teststack" },
      (line) => lines.push(JSON.parse(line)),
    );
    const orchestrator = new DeployOrchestrator({
      settings,
      projectDir,
      host: opts.host ?? new FakeHost(),
      compose,
      probe,
      reporter,
      confirm: opts.confirm === undefined ? null : opts.confirm,
      loadEnv: () => opts.env ?? loadedEnv(GOOD_ENV),
      sleep: clock.sleep,
      now: clock.now,
    });
    return { orchestrator, compose, lines };
  }

  it("deploys a healthy stack", async () => {
    const { orchestrator, compose, lines } = setup();
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("done");
    expect(outcome.exit_code).toBe(0);
    expect(outcome.health.status).toBe("healthy");
    expect(outcome.failure).toBeUndefined();
    expect(outcome.diagnostics).toBeUndefined();
    expect(compose.calls).toEqual(["down", "build", "up", "ps"]);
    expect(Object.values(outcome.stages).map((s) => s.status)).toEqual(["succeeded", "succeeded", "succeeded"]);
    expect(outcome.bootstrap?.created).toEqual(["outputs", "reports/daily"]);
    expect(fs.statSync(path.join(projectDir, "reports/daily")).isDirectory()).toBe(true);
    expect(lines[lines.length - 1]).toMatchObject({ code: "DEPLOY_RESULT", details: { status: "done", exit_code: 0 } });
  });

  it("freezes the outcome", async () => {
    const { orchestrator } = setup();
    const outcome = await orchestrator.run();
    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome.stages)).toBe(true);
  });

  it("reports phases in order", async () => {
    const { orchestrator, lines } = setup();
    await orchestrator.run();
    const phases = lines.filter((l) => l.code === "PHASE_STARTED").map((l) => l.message);
    expect(phases).toEqual(["preflight", "confirm", "bootstrap", "stop", "build", "start", "verify"]);
  });

  it("proceeds to build when there was nothing to stop", async () => {
    const compose = new FakeCompose();
    compose.downResult = failed("no such project: teststack");
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("done");
    expect(outcome.stages.stop).toMatchObject({ status: "succeeded", note: "nothing to stop" });
    expect(compose.lifecycleCalls()).toEqual(["down", "build", "up"]);
  });

  it("treats a failed stop as a warning and still deploys", async () => {
    const compose = new FakeCompose();
    compose.downResult = failed("Cannot connect to the Docker daemon");
    const { orchestrator, lines } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("done");
    expect(outcome.exit_code).toBe(0);
    expect(outcome.stages.stop.status).toBe("failed");
    expect(outcome.failure).toBeUndefined();
    expect(lines.find((l) => l.code === "STAGE_FAILED")?.level).toBe("warn");
  });

  it("stops after a build failure without starting or verifying", async () => {
    const compose = new FakeCompose();
    compose.buildResult = failed("failed to solve: requirements.txt not found");
    compose.logsText = "api-1  | previous run\n";
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_build");
    expect(outcome.exit_code).toBe(1);
    expect(compose.calls).toEqual(["down", "build", "logs:20"]);
    expect(outcome.stages.start).toEqual({ stage: "start", status: "skipped", duration_ms: 0 });
    expect(outcome.health.status).toBe("pending");
    expect(outcome.failure).toEqual({
      kind: "lifecycle",
      stage: "build",
      reason: "compose build exited with code 1",
      output: "failed to solve: requirements.txt not found",
    });
    expect(outcome.diagnostics).toEqual({ logs: "api-1  | previous run" });
  });

  it("fails the run when services do not start", async () => {
    const compose = new FakeCompose();
    compose.upResult = failed("port is already allocated");
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_start");
    expect(compose.calls).not.toContain("ps");
  });

  it("times out without tearing the stack down", async () => {
    const compose = new FakeCompose();
    compose.logsText = "api-1  | Application startup complete.\n";
    const settings = testSettings();
    settings.health.ready_log_pattern = "Application startup complete";
    const { orchestrator } = setup({ compose, settings, probeResults: [{ ok: false, error: "ECONNREFUSED" }] });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("timed_out");
    expect(outcome.exit_code).toBe(1);
    expect(compose.calls.filter((c) => c === "down")).toHaveLength(1);
    expect(compose.calls[compose.calls.length - 1]).toBe("logs:20");
    expect(outcome.failure).toMatchObject({ kind: "health", status: "timed_out" });
    expect(outcome.diagnostics?.ready_logged).toBe(true);
  });

  it("resolves unhealthy when nothing runs", async () => {
    const compose = new FakeCompose();
    compose.psResults = [[]];
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("unhealthy");
    expect(outcome.health.reason).toBe("no service reported running within 10s");
    expect(outcome.health.duration_ms).toBeLessThan(30_000);
  });

  it("redacts secrets from the log tail", async () => {
    const compose = new FakeCompose();
    compose.upResult = failed("container exited");
    compose.logsText = "api-1  | OPENAI_API_KEY=sk-abcdefghijklmnopqrstuv\napi-1  | \u001b[31mcrashed\u001b[0m\n";
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.diagnostics?.logs).toBe("api-1  | OPENAI_API_KEY=***\napi-1  | crashed");
  });

  it("records a log fetch failure instead of throwing", async () => {
    const compose = new FakeCompose();
    compose.buildResult = failed("boom");
    compose.logs = async () => {
      throw new Error("compose logs failed: daemon gone");
    };
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_build");
    expect(outcome.diagnostics).toEqual({ logs_error: "compose logs failed: daemon gone" });
  });

  it("aborts on a missing key before touching the runtime", async () => {
    const compose = new FakeCompose();
    const { orchestrator } = setup({ compose, env: loadedEnv({ OPENAI_API_KEY: "sk-test-key" }) });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_preflight");
    expect(outcome.exit_code).toBe(1);
    expect(compose.calls).toEqual([]);
    expect(outcome.bootstrap).toBeNull();
    expect(fs.existsSync(path.join(projectDir, "outputs"))).toBe(false);
    expect(outcome.failure).toMatchObject({ kind: "preflight", checks: [{ subject: "DB_PASSWORD", status: "fail" }] });
  });

  it("aborts when a directory cannot be created", async () => {
    const compose = new FakeCompose();
    fs.writeFileSync(path.join(projectDir, "outputs"), "in the way");
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_bootstrap");
    expect(compose.calls).toEqual([]);
    expect(outcome.failure).toEqual({ kind: "bootstrap", path: "outputs", message: "outputs exists and is not a directory" });
  });

  it("does nothing when the operator declines", async () => {
    const compose = new FakeCompose();
    const confirm = vi.fn(async () => false);
    const { orchestrator } = setup({ compose, confirm });
    const outcome = await orchestrator.run();

    expect(confirm).toHaveBeenCalledWith("Stop the running teststack stack and deploy a fresh build?");
    expect(outcome.status).toBe("cancelled");
    expect(outcome.exit_code).toBe(0);
    expect(compose.calls).toEqual([]);
    expect(fs.readdirSync(projectDir)).toEqual([]);
  });

  it("cancels with a summary when the prompt itself fails", async () => {
    const compose = new FakeCompose();
    const confirm = vi.fn(async (): Promise<boolean> => {
      throw new Error("stdin closed");
    });
    const { orchestrator, lines } = setup({ compose, confirm });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("cancelled");
    expect(outcome.exit_code).toBe(0);
    expect(outcome.failure).toEqual({ kind: "confirm", reason: "stdin closed" });
    expect(compose.calls).toEqual([]);
    expect(fs.readdirSync(projectDir)).toEqual([]);
    expect(lines.find((l) => l.code === "DIAGNOSTICS")?.message).toBe(
      "the confirmation prompt failed (stdin closed); rerun with --yes to deploy without it",
    );
    expect(lines[lines.length - 1]).toMatchObject({ code: "DEPLOY_RESULT", details: { status: "cancelled", exit_code: 0 } });
  });

  it("deploys after the operator confirms", async () => {
    const confirm = vi.fn(async () => true);
    const { orchestrator } = setup({ confirm });
    const outcome = await orchestrator.run();

    expect(confirm).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe("done");
  });

  it("does not prompt when preflight fails", async () => {
    const confirm = vi.fn(async () => true);
    const host = new FakeHost();
    host.tools.clear();
    const { orchestrator } = setup({ host, confirm });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_preflight");
    expect(confirm).not.toHaveBeenCalled();
  });

  it("turns a crashing phase into that phase's failure", async () => {
    const compose = new FakeCompose();
    compose.build = async () => {
      throw new Error("spawn docker ENOENT");
    };
    const { orchestrator } = setup({ compose });
    const outcome = await orchestrator.run();

    expect(outcome.status).toBe("failed_build");
    expect(outcome.failure).toMatchObject({ kind: "lifecycle", stage: "build", reason: "spawn docker ENOENT" });
  });
});
