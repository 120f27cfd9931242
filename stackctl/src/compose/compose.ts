import { isPlainObject } from "../config/loader.js";
import type { ServiceState } from "../types/health.js";
import { execRunner, type CommandResult, type CommandRunner } from "./exec.js";

/**
 * Operations the orchestrator needs from the container runtime.
 * All runtime mutation goes through these calls.
 */
export interface ComposeClient {
  down(): Promise<CommandResult>;
  build(): Promise<CommandResult>;
  up(): Promise<CommandResult>;
  ps(): Promise<ServiceState[]>;
  logs(tail: number): Promise<string>;
  removeContainer(name: string): Promise<CommandResult>;
}

export type DockerComposeOptions = {
  /** e.g. ["docker", "compose"] or ["docker-compose"] */
  command: string[];
  projectName: string;
  composeFile: string;
  cwd: string;
  timeoutMs: number;
};

export class ComposeError extends Error {
  constructor(
    readonly operation: string,
    readonly result: CommandResult,
  ) {
    const detail = lastLine(result.stderr) || lastLine(result.stdout) || `exit code ${result.exitCode}`;
    super(`compose ${operation} failed: ${detail}`);
    this.name = "ComposeError";
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1].trim();
}

/** Docker Compose CLI adapter. */
export class DockerCompose implements ComposeClient {
  private readonly bin: string;
  private readonly prefix: string[];

  constructor(
    private readonly opts: DockerComposeOptions,
    private readonly runner: CommandRunner = execRunner,
  ) {
    if (opts.command.length === 0) {
      throw new Error("compose command must not be empty");
    }
    this.bin = opts.command[0];
    this.prefix = opts.command.slice(1);
  }

  down(): Promise<CommandResult> {
    return this.compose(["down", "--remove-orphans"]);
  }

  build(): Promise<CommandResult> {
    return this.compose(["build"]);
  }

  up(): Promise<CommandResult> {
    return this.compose(["up", "-d"]);
  }

  async ps(): Promise<ServiceState[]> {
    const res = await this.compose(["ps", "--all", "--format", "json"]);
    if (res.exitCode !== 0) throw new ComposeError("ps", res);
    return parsePsOutput(res.stdout);
  }

  async logs(tail: number): Promise<string> {
    const res = await this.compose(["logs", "--no-color", "--tail", String(tail)]);
    if (res.exitCode !== 0) throw new ComposeError("logs", res);
    return res.stdout;
  }

  removeContainer(name: string): Promise<CommandResult> {
    return this.runner("docker", ["rm", "-f", name], { cwd: this.opts.cwd, timeoutMs: this.opts.timeoutMs });
  }

  private compose(args: string[]): Promise<CommandResult> {
    return this.runner(
      this.bin,
      [...this.prefix, "-p", this.opts.projectName, "-f", this.opts.composeFile, ...args],
      { cwd: this.opts.cwd, timeoutMs: this.opts.timeoutMs },
    );
  }
}

function toServiceState(entry: unknown): ServiceState {
  if (!isPlainObject(entry)) {
    throw new Error(`Unexpected compose ps entry: ${JSON.stringify(entry)}`);
  }
  const { Service, Name, State, Health, ExitCode } = entry;
  if (typeof State !== "string") {
    throw new Error(`compose ps entry has no State: ${JSON.stringify(entry)}`);
  }
  const name = typeof Name === "string" ? Name : "";
  const state: ServiceState = {
    service: typeof Service === "string" ? Service : name,
    name,
    state: State.toLowerCase(),
  };
  if (typeof Health === "string" && Health.length > 0) state.health = Health;
  if (typeof ExitCode === "number") state.exit_code = ExitCode;
  return state;
}

/**
 * Parse `compose ps --format json`. Compose releases before 2.21 print one
 * JSON array; later ones print one object per line.
 */
export function parsePsOutput(stdout: string): ServiceState[] {
  const text = stdout.trim();
  if (text.length === 0) return [];

  if (text.startsWith("[")) {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) throw new Error("compose ps output is not a JSON array");
    return parsed.map(toServiceState);
  }

  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => toServiceState(JSON.parse(line)));
}
