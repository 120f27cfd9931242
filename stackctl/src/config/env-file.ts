import fs from "node:fs";
import { parse as parseDotenv } from "dotenv";

/**
 * Read-only view of the stack's `.env` file. Values are captured once at
 * construction; nothing here reads or writes `process.env`.
 */
export class ConfigSource {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string>) {
    this.values = new Map(Object.entries(values));
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }
}

export type EnvFileLoad =
  | { status: "loaded"; path: string; source: ConfigSource }
  | { status: "missing"; path: string }
  | { status: "unreadable"; path: string; error: string };

/** Load and parse a dotenv file, distinguishing "absent" from "present but unreadable". */
export function loadEnvFile(filePath: string): EnvFileLoad {
  if (!fs.existsSync(filePath)) {
    return { status: "missing", path: filePath };
  }

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    return { status: "unreadable", path: filePath, error: e instanceof Error ? e.message : String(e) };
  }

  return { status: "loaded", path: filePath, source: new ConfigSource(parseDotenv(raw)) };
}
