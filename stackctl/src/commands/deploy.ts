import path from "node:path";
import { DockerCompose } from "../compose/compose.js";
import { deepMerge, loadConfig } from "../config/loader.js";
import { validateSettings } from "../config/validator.js";
import { DeployOrchestrator, type OrchestratorDeps } from "../core/orchestrator.js";
import { httpProbe } from "../health/probe.js";
import { SystemHost } from "../preflight/host.js";
import { HumanReporter } from "../report/human.js";
import { JsonlReporter } from "../report/jsonl.js";
import type { LineWriter, OutputFormat, Reporter, SummaryContext } from "../report/reporter.js";
import type { StackSettings } from "../types/config.js";
import type { DeploymentOutcome } from "../types/outcome.js";
import { confirmPrompt } from "./confirm.js";
import { EXIT } from "./exit-codes.js";

export type DeployOpts = {
  projectDir?: string;
  configDir?: string;
  env?: string;
  /** Skip the confirmation prompt. */
  yes?: boolean;
  /** Defaults to whether stdin is a terminal. */
  interactive?: boolean;
  timeoutSeconds?: number;
  format?: OutputFormat;
};

/** Replacements for the real collaborators, for tests and embedding. */
export type DeployOverrides = Partial<
  Pick<OrchestratorDeps, "host" | "compose" | "probe" | "confirm" | "loadEnv" | "sleep" | "now">
> & {
  write?: LineWriter;
  processEnv?: NodeJS.ProcessEnv;
};

export type DeployResult =
  | { ok: true; status: string; exitCode: number; outcome: DeploymentOutcome }
  | { ok: false; error: string; exitCode: number; outcome?: DeploymentOutcome };

export type SettingsResult = { ok: true; settings: StackSettings } | { ok: false; error: string };

/** Load layered settings, apply command-line overrides, validate. */
export function resolveSettings(opts: DeployOpts, processEnv: NodeJS.ProcessEnv = process.env): SettingsResult {
  let doc: Record<string, unknown>;
  try {
    doc = loadConfig(opts.env, opts.configDir, processEnv);
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  if (opts.timeoutSeconds !== undefined) {
    doc = deepMerge(doc, { health: { max_wait_seconds: opts.timeoutSeconds } });
  }

  const res = validateSettings(doc);
  if (!res.valid) return { ok: false, error: `Invalid settings: ${res.errors}` };
  return { ok: true, settings: res.settings };
}

export function composeInvocation(settings: StackSettings): string {
  return [...settings.stack.compose_command, "-p", settings.stack.name].join(" ");
}

function createReporter(format: OutputFormat, ctx: SummaryContext, write?: LineWriter): Reporter {
  return format === "jsonl" ? new JsonlReporter(ctx, write) : new HumanReporter(ctx, { write });
}

export async function deploy(opts: DeployOpts, overrides: DeployOverrides = {}): Promise<DeployResult> {
  const settingsRes = resolveSettings(opts, overrides.processEnv);
  if (!settingsRes.ok) {
    return { ok: false, error: settingsRes.error, exitCode: EXIT.INVALID_ARGS };
  }
  const settings = settingsRes.settings;
  const projectDir = path.resolve(opts.projectDir ?? process.cwd());

  const interactive = opts.interactive ?? Boolean(process.stdin.isTTY);
  const confirm = opts.yes || !interactive ? null : (overrides.confirm ?? confirmPrompt);

  const reporter = createReporter(
    opts.format ?? "human",
    { stack: settings.stack.name, endpoints: settings.report.endpoints, composeInvocation: composeInvocation(settings) },
    overrides.write,
  );

  const compose =
    overrides.compose ??
    new DockerCompose({
      command: settings.stack.compose_command,
      projectName: settings.stack.name,
      composeFile: settings.stack.compose_file,
      cwd: projectDir,
      timeoutMs: settings.stack.command_timeout_seconds * 1000,
    });

  const orchestrator = new DeployOrchestrator({
    settings,
    projectDir,
    host: overrides.host ?? new SystemHost(overrides.processEnv),
    compose,
    probe: overrides.probe ?? httpProbe,
    reporter,
    confirm,
    loadEnv: overrides.loadEnv,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  try {
    const outcome = await orchestrator.run();
    if (outcome.exit_code === EXIT.SUCCESS) {
      return { ok: true, status: outcome.status, exitCode: outcome.exit_code, outcome };
    }
    const error = outcome.failure?.kind === "preflight" ? "Preflight checks failed" : (outcome.health.reason ?? outcome.failure?.kind ?? outcome.status);
    return { ok: false, error, exitCode: outcome.exit_code, outcome };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e), exitCode: EXIT.DEPLOY_FAILED };
  }
}
