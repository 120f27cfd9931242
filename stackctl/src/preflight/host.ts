import fs from "node:fs";
import path from "node:path";
import { execRunner, type CommandRunner } from "../compose/exec.js";

export type FileStatus = "readable" | "missing" | "unreadable";

/** Read-only questions the validator asks about the machine it runs on. */
export interface HostProbe {
  platform(): string;
  isRoot(): boolean;
  /** Absolute path of an executable found on PATH, or null. */
  resolveExecutable(name: string): string | null;
  fileStatus(filePath: string): FileStatus;
  /** Group names of the invoking user, or null when they cannot be determined. */
  userGroups(): Promise<string[] | null>;
}

function isExecutable(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export class SystemHost implements HostProbe {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly runner: CommandRunner = execRunner,
  ) {}

  platform(): string {
    return process.platform;
  }

  isRoot(): boolean {
    return typeof process.getuid === "function" && process.getuid() === 0;
  }

  resolveExecutable(name: string): string | null {
    if (name.includes("/")) return isExecutable(name) ? path.resolve(name) : null;
    for (const dir of (this.env.PATH ?? "").split(path.delimiter)) {
      if (dir.length === 0) continue;
      const candidate = path.join(dir, name);
      if (isExecutable(candidate)) return candidate;
    }
    return null;
  }

  fileStatus(filePath: string): FileStatus {
    if (!fs.existsSync(filePath)) return "missing";
    try {
      if (!fs.statSync(filePath).isFile()) return "unreadable";
      fs.accessSync(filePath, fs.constants.R_OK);
      return "readable";
    } catch {
      return "unreadable";
    }
  }

  async userGroups(): Promise<string[] | null> {
    try {
      const res = await this.runner("id", ["-Gn"]);
      if (res.exitCode !== 0) return null;
      return res.stdout.trim().split(/\s+/).filter((g) => g.length > 0);
    } catch {
      return null;
    }
  }
}
