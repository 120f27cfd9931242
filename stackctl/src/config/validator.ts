import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { StackSettings } from "../types/config.js";

// CommonJS packages: under NodeNext the default import is module.exports.
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

const stringList = { type: "array", items: { type: "string", minLength: 1 } };

const SETTINGS_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["schema_version", "stack", "host", "env", "directories", "health", "report"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    stack: {
      type: "object",
      additionalProperties: false,
      required: ["name", "compose_file", "compose_command", "command_timeout_seconds", "legacy_containers"],
      properties: {
        name: { type: "string", pattern: "^[a-z0-9][a-z0-9_-]*$" },
        compose_file: { type: "string", minLength: 1 },
        compose_command: { ...stringList, minItems: 1 },
        command_timeout_seconds: { type: "integer", minimum: 1 },
        legacy_containers: stringList,
      },
    },
    host: {
      type: "object",
      additionalProperties: false,
      required: ["platform", "required_tools", "runtime_group"],
      properties: {
        platform: { type: "string", enum: ["linux", "darwin", "win32", "freebsd", "openbsd", "sunos", "aix"] },
        required_tools: stringList,
        runtime_group: { type: "string" },
      },
    },
    env: {
      type: "object",
      additionalProperties: false,
      required: ["file", "example_file", "required_keys", "placeholder_patterns"],
      properties: {
        file: { type: "string", minLength: 1 },
        example_file: { type: "string", minLength: 1 },
        required_keys: {
          type: "array",
          items: {
            type: "object",
            additionalProperties: false,
            required: ["key"],
            properties: {
              key: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
              placeholders: { type: "array", items: { type: "string" } },
            },
          },
        },
        placeholder_patterns: { type: "array", items: { type: "string", format: "regex" } },
      },
    },
    directories: stringList,
    health: {
      type: "object",
      additionalProperties: false,
      required: ["url", "settle_seconds", "max_wait_seconds", "interval_seconds", "request_timeout_seconds"],
      properties: {
        url: { type: "string", format: "uri", pattern: "^https?://" },
        settle_seconds: { type: "number", minimum: 0 },
        max_wait_seconds: { type: "number", exclusiveMinimum: 0 },
        interval_seconds: { type: "number", exclusiveMinimum: 0 },
        request_timeout_seconds: { type: "number", exclusiveMinimum: 0 },
        ready_log_pattern: { type: "string", minLength: 1, format: "regex" },
      },
    },
    report: {
      type: "object",
      additionalProperties: false,
      required: ["log_tail_lines", "endpoints"],
      properties: {
        log_tail_lines: { type: "integer", minimum: 0 },
        endpoints: {
          type: "array",
          items: {
            type: "object",
            additionalProperties: false,
            required: ["name", "url"],
            properties: {
              name: { type: "string", minLength: 1 },
              url: { type: "string", format: "uri" },
            },
          },
        },
      },
    },
  },
};

const ajv = new Ajv2020({ allErrors: true, strict: true });
addFormats(ajv);
const validate = ajv.compile<StackSettings>(SETTINGS_SCHEMA);

export type SettingsValidationResult =
  | { valid: true; settings: StackSettings }
  | { valid: false; errors: string };

/** Validate a loaded settings document against the settings schema. */
export function validateSettings(doc: unknown): SettingsValidationResult {
  if (validate(doc)) {
    return { valid: true, settings: doc };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors, { dataVar: "settings" }) };
}
