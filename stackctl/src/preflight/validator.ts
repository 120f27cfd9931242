import path from "node:path";
import type { ConfigSource, EnvFileLoad } from "../config/env-file.js";
import type { EnvConfig, RequiredKey, StackSettings } from "../types/config.js";
import type { PreflightCheck, PreflightResult } from "../types/preflight.js";
import type { HostProbe } from "./host.js";

export type PreflightInput = {
  settings: StackSettings;
  projectDir: string;
  envFile: EnvFileLoad;
  host: HostProbe;
};

const PLATFORM_NAMES: Record<string, string> = {
  linux: "Linux",
  darwin: "macOS",
  win32: "Windows",
};

function platformName(platform: string): string {
  return PLATFORM_NAMES[platform] ?? platform;
}

export function checkPlatform(expected: string, host: HostProbe): PreflightCheck {
  const actual = host.platform();
  if (actual === expected) {
    return { name: "platform", kind: "platform", status: "pass", message: `Running on ${platformName(actual)}` };
  }
  return {
    name: "platform",
    kind: "platform",
    status: "fail",
    subject: actual,
    message: `This stack runs on ${platformName(expected)}, but the host is ${platformName(actual)}`,
    hint: `Run the deploy on a ${platformName(expected)} host`,
  };
}

export function checkConfigFile(envFile: EnvFileLoad, env: EnvConfig): PreflightCheck {
  switch (envFile.status) {
    case "loaded":
      return { name: "config file", kind: "config_file", status: "pass", subject: env.file, message: `Found ${env.file}` };
    case "missing":
      return {
        name: "config file",
        kind: "config_file",
        status: "fail",
        subject: env.file,
        message: `Config file ${env.file} not found`,
        hint: `Copy ${env.example_file} to ${env.file} and fill in the values`,
      };
    case "unreadable":
      return {
        name: "config file",
        kind: "config_file",
        status: "fail",
        subject: env.file,
        message: `Config file ${env.file} exists but cannot be read: ${envFile.error}`,
        hint: `Make ${env.file} a regular file readable by the current user`,
      };
  }
}

export function checkComposeFile(projectDir: string, composeFile: string, host: HostProbe): PreflightCheck {
  const status = host.fileStatus(path.resolve(projectDir, composeFile));
  if (status === "readable") {
    return { name: "compose file", kind: "compose_file", status: "pass", subject: composeFile, message: `Found ${composeFile}` };
  }
  return {
    name: "compose file",
    kind: "compose_file",
    status: "fail",
    subject: composeFile,
    message: status === "missing" ? `Compose file ${composeFile} not found in ${projectDir}` : `Compose file ${composeFile} cannot be read`,
    hint: "Run from the project root or pass --project-dir",
  };
}

export function checkTool(tool: string, host: HostProbe): PreflightCheck {
  const resolved = host.resolveExecutable(tool);
  if (resolved) {
    return { name: `tool ${tool}`, kind: "tool", status: "pass", subject: tool, message: `${tool} found at ${resolved}` };
  }
  return {
    name: `tool ${tool}`,
    kind: "tool",
    status: "fail",
    subject: tool,
    message: `${tool} is not installed or not on PATH`,
    hint: `Install ${tool} and make sure it is on PATH`,
  };
}

/** Missing group membership only means the runtime will need sudo, so it never fails. */
export async function checkGroup(group: string, host: HostProbe): Promise<PreflightCheck | null> {
  if (group.length === 0) return null;
  const name = `group ${group}`;
  if (host.isRoot()) {
    return { name, kind: "group", status: "pass", subject: group, message: "Running as root" };
  }
  const groups = await host.userGroups();
  if (groups === null) {
    return {
      name,
      kind: "group",
      status: "warn",
      subject: group,
      message: `Could not determine whether the current user is in the ${group} group`,
      hint: "Run `id -Gn` to check group membership",
    };
  }
  if (groups.includes(group)) {
    return { name, kind: "group", status: "pass", subject: group, message: `User is in the ${group} group` };
  }
  return {
    name,
    kind: "group",
    status: "warn",
    subject: group,
    message: `Current user is not in the ${group} group; container commands may need sudo`,
    hint: `Run \`sudo usermod -aG ${group} $USER\` and log in again`,
  };
}

export function compilePlaceholderPatterns(patterns: string[]): RegExp[] {
  return patterns.map((p) => new RegExp(p, "i"));
}

export function isPlaceholder(value: string, requirement: RequiredKey, patterns: RegExp[]): boolean {
  const trimmed = value.trim();
  if (requirement.placeholders?.includes(trimmed)) return true;
  return patterns.some((re) => re.test(trimmed));
}

/** One check per required key, so every problem is reported in the same run. */
export function checkRequiredKeys(source: ConfigSource, env: EnvConfig): PreflightCheck[] {
  const patterns = compilePlaceholderPatterns(env.placeholder_patterns);

  return env.required_keys.map((requirement): PreflightCheck => {
    const name = `key ${requirement.key}`;
    const value = source.get(requirement.key);

    if (value === undefined || value.trim().length === 0) {
      return {
        name,
        kind: "required_key",
        status: "fail",
        subject: requirement.key,
        message: `${requirement.key} is not set in ${env.file}`,
        hint: `Set ${requirement.key} in ${env.file} (see ${env.example_file})`,
      };
    }

    if (isPlaceholder(value, requirement, patterns)) {
      return {
        name,
        kind: "required_key",
        status: "fail",
        subject: requirement.key,
        message: `${requirement.key} still has the placeholder value "${value.trim()}"`,
        hint: `Replace the placeholder for ${requirement.key} in ${env.file} with a real value`,
      };
    }

    return { name, kind: "required_key", status: "pass", subject: requirement.key, message: `${requirement.key} is set` };
  });
}

/**
 * Environment validation pass. Runs every check and never mutates the
 * environment or filesystem.
 */
export async function runPreflight(input: PreflightInput): Promise<PreflightResult> {
  const { settings, projectDir, envFile, host } = input;

  const checks: PreflightCheck[] = [
    checkPlatform(settings.host.platform, host),
    checkConfigFile(envFile, settings.env),
    checkComposeFile(projectDir, settings.stack.compose_file, host),
    ...settings.host.required_tools.map((tool) => checkTool(tool, host)),
  ];

  const group = await checkGroup(settings.host.runtime_group, host);
  if (group) checks.push(group);

  if (envFile.status === "loaded") {
    checks.push(...checkRequiredKeys(envFile.source, settings.env));
  } else if (settings.env.required_keys.length > 0) {
    checks.push({
      name: "required keys",
      kind: "required_key",
      status: "warn",
      message: `Required keys were not checked because ${settings.env.file} is unavailable`,
      hint: `Fix ${settings.env.file} and run again`,
    });
  }

  return { ok: !checks.some((c) => c.status === "fail"), checks };
}
