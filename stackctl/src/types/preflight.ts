export type CheckStatus = "pass" | "warn" | "fail";

export type CheckKind =
  | "platform"
  | "config_file"
  | "compose_file"
  | "tool"
  | "group"
  | "required_key";

export type PreflightCheck = {
  name: string;
  kind: CheckKind;
  status: CheckStatus;
  message: string;
  /** What the operator should do about a warn/fail. */
  hint?: string;
  /** The key, tool or path the check is about. */
  subject?: string;
};

export type PreflightResult = {
  ok: boolean;
  checks: PreflightCheck[];
};
