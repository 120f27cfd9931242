/** Orchestrator settings, loaded from config/*.yaml. */

export type RequiredKey = {
  key: string;
  /** Template values shipped in .env.example for this key. */
  placeholders?: string[];
};

export type StackConfig = {
  name: string;
  compose_file: string;
  compose_command: string[];
  command_timeout_seconds: number;
  legacy_containers: string[];
};

export type HostConfig = {
  platform: string;
  required_tools: string[];
  runtime_group: string;
};

export type EnvConfig = {
  file: string;
  example_file: string;
  required_keys: RequiredKey[];
  placeholder_patterns: string[];
};

export type HealthConfig = {
  url: string;
  settle_seconds: number;
  max_wait_seconds: number;
  interval_seconds: number;
  request_timeout_seconds: number;
  ready_log_pattern?: string;
};

export type Endpoint = {
  name: string;
  url: string;
};

export type ReportConfig = {
  log_tail_lines: number;
  endpoints: Endpoint[];
};

export type StackSettings = {
  schema_version: string;
  stack: StackConfig;
  host: HostConfig;
  env: EnvConfig;
  directories: string[];
  health: HealthConfig;
  report: ReportConfig;
};
