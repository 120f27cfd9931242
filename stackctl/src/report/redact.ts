const ANSI_ESCAPE = /\u001b\[[0-9;]*[A-Za-z]/g;
const SENSITIVE_ASSIGNMENT = /\b([A-Za-z0-9_.-]*(?:password|passwd|token|api[_-]?key|secret)[A-Za-z0-9_.-]*)(\s*[=:]\s*)("[^"]*"|'[^']*'|\S+)/gi;
const OPENAI_STYLE_KEY = /\bsk-[A-Za-z0-9_-]{16,}/g;
const AWS_ACCESS_KEY_ID = /\bAKIA[0-9A-Z]{16}\b/g;

/**
 * Redact sensitive values from service logs before they are printed.
 * Keeps the key name so the operator can still tell what was logged.
 */
export function redactSecrets(s: string): string {
  if (!s) return "";
  return s
    .replace(SENSITIVE_ASSIGNMENT, "$1$2***")
    .replace(OPENAI_STYLE_KEY, "sk-***")
    .replace(AWS_ACCESS_KEY_ID, "AKIA***");
}

export function stripAnsi(s: string): string {
  return s.replace(ANSI_ESCAPE, "");
}

/** Prepare captured process output for display. */
export function cleanOutput(s: string): string {
  return redactSecrets(stripAnsi(s));
}
