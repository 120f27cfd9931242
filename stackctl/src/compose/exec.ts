import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024;

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  timeoutMs?: number;
};

/**
 * Runs an external command. A non-zero exit resolves with its output;
 * only failures to run at all (missing binary, killed on timeout) reject.
 */
export type CommandRunner = (command: string, args: string[], opts?: RunOptions) => Promise<CommandResult>;

function readOutput(e: Error, key: "stdout" | "stderr"): string {
  if (!(key in e)) return "";
  const value: unknown = Reflect.get(e, key);
  return typeof value === "string" ? value : "";
}

export const execRunner: CommandRunner = async (command, args, opts = {}) => {
  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      maxBuffer: MAX_OUTPUT_BUFFER,
      encoding: "utf8",
    });
    return { exitCode: 0, stdout, stderr };
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    if ("killed" in e && e.killed === true) {
      throw new Error(`${command} ${args.join(" ")} timed out after ${opts.timeoutMs ?? 0}ms`);
    }
    if ("code" in e && typeof e.code === "number") {
      return { exitCode: e.code, stdout: readOutput(e, "stdout"), stderr: readOutput(e, "stderr") };
    }
    throw e;
  }
};
