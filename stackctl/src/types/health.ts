/**
 * Health status of a started stack.
 * `pending` until the verifier resolves; every other value is terminal.
 */
export type HealthStatus = "pending" | "healthy" | "unhealthy" | "timed_out";

export type ServiceState = {
  service: string;
  name: string;
  state: string;
  health?: string;
  exit_code?: number;
};

export type HealthReport = {
  status: HealthStatus;
  reason?: string;
  services: ServiceState[];
  status_polls: number;
  probe_attempts: number;
  last_probe_error?: string;
  duration_ms: number;
};
