import fs from "node:fs";
import path from "node:path";
import type { BootstrapResult } from "../types/outcome.js";

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Ensure each relative directory exists under `rootDir`, creating parents as
 * needed. Re-running with everything present changes nothing. Stops at the
 * first failure.
 */
export function ensureDirectories(rootDir: string, dirs: string[]): BootstrapResult {
  const root = path.resolve(rootDir);
  const created: string[] = [];
  const existing: string[] = [];

  for (const dir of dirs) {
    const target = path.resolve(root, dir);
    if (path.isAbsolute(dir) || !isWithinDir(root, target)) {
      return { ok: false, created, existing, error: { path: dir, message: `Directory escapes the project directory: ${dir}` } };
    }

    try {
      if (fs.existsSync(target)) {
        if (!fs.statSync(target).isDirectory()) {
          return { ok: false, created, existing, error: { path: dir, message: `${dir} exists and is not a directory` } };
        }
        existing.push(dir);
        continue;
      }
      fs.mkdirSync(target, { recursive: true });
      created.push(dir);
    } catch (e) {
      return { ok: false, created, existing, error: { path: dir, message: e instanceof Error ? e.message : String(e) } };
    }
  }

  return { ok: true, created, existing };
}
