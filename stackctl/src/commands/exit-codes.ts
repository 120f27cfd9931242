import type { DeployStatus } from "../types/outcome.js";

/**
 * CLI exit codes. A declined confirmation is a clean no-op, not an error.
 */
export const EXIT = {
  SUCCESS: 0,
  CANCELLED: 0,
  DEPLOY_FAILED: 1,
  INVALID_ARGS: 2,
} as const;

export function exitCodeFor(status: DeployStatus): number {
  switch (status) {
    case "done":
      return EXIT.SUCCESS;
    case "cancelled":
      return EXIT.CANCELLED;
    case "failed_preflight":
    case "failed_bootstrap":
    case "failed_build":
    case "failed_start":
    case "unhealthy":
    case "timed_out":
      return EXIT.DEPLOY_FAILED;
  }
}
