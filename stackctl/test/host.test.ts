import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CommandRunner } from "../src/compose/exec.js";
import { SystemHost } from "../src/preflight/host.js";

describe("SystemHost", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "stackctl-host-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("resolves executables on PATH", () => {
    const binDir = path.join(tmpDir, "bin");
    fs.mkdirSync(binDir);
    fs.writeFileSync(path.join(binDir, "docker"), "#!/bin/sh\n", { mode: 0o755 });
    fs.writeFileSync(path.join(binDir, "notes.txt"), "", { mode: 0o644 });

    const host = new SystemHost({ PATH: ["", path.join(tmpDir, "empty"), binDir].join(path.delimiter) });
    expect(host.resolveExecutable("docker")).toBe(path.join(binDir, "docker"));
    expect(host.resolveExecutable("compose")).toBeNull();
    expect(host.resolveExecutable("notes.txt")).toBeNull();
  });

  it("treats a missing PATH as empty", () => {
    expect(new SystemHost({}).resolveExecutable("docker")).toBeNull();
  });

  it("classifies files", () => {
    const file = path.join(tmpDir, "docker-compose.yml");
    fs.writeFileSync(file, "services: {}\n");
    const host = new SystemHost({});
    expect(host.fileStatus(file)).toBe("readable");
    expect(host.fileStatus(path.join(tmpDir, "absent.yml"))).toBe("missing");
    expect(host.fileStatus(tmpDir)).toBe("unreadable");
  });

  it("reads group names from id", async () => {
    const calls: string[][] = [];
    const runner: CommandRunner = async (command, args) => {
      calls.push([command, ...args]);
      return { exitCode: 0, stdout: "deploy wheel docker\n", stderr: "" };
    };
    expect(await new SystemHost({}, runner).userGroups()).toEqual(["deploy", "wheel", "docker"]);
    expect(calls).toEqual([["id", "-Gn"]]);
  });

  it("returns null when groups cannot be listed", async () => {
    const failing: CommandRunner = async () => ({ exitCode: 1, stdout: "", stderr: "id: cannot find name" });
    const throwing: CommandRunner = async () => {
      throw new Error("spawn id ENOENT");
    };
    expect(await new SystemHost({}, failing).userGroups()).toBeNull();
    expect(await new SystemHost({}, throwing).userGroups()).toBeNull();
  });
});
