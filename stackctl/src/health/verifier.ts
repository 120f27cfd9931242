import { setTimeout as delay } from "node:timers/promises";
import type { ComposeClient } from "../compose/compose.js";
import type { HealthReport, ServiceState } from "../types/health.js";
import type { LivenessProbe } from "./probe.js";

export type HealthVerifierOptions = {
  url: string;
  /** How long to wait for the first running service before giving up. */
  settleMs: number;
  maxWaitMs: number;
  /** Fixed spacing between polls. */
  intervalMs: number;
  requestTimeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export function pendingHealth(): HealthReport {
  return { status: "pending", services: [], status_polls: 0, probe_attempts: 0, duration_ms: 0 };
}

function isRunning(s: ServiceState): boolean {
  return s.state === "running";
}

function seconds(ms: number): string {
  return `${Math.round(ms / 100) / 10}s`;
}

/**
 * Confirms a started stack is serving: first a status poll until some
 * service runs, then a liveness poll against the health URL. Read-only.
 */
export class HealthVerifier {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly compose: ComposeClient,
    private readonly probe: LivenessProbe,
    private readonly opts: HealthVerifierOptions,
  ) {
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.now = opts.now ?? Date.now;
  }

  async verify(): Promise<HealthReport> {
    const started = this.now();
    const deadline = started + this.opts.maxWaitMs;
    const settleWindow = Math.min(this.opts.settleMs, this.opts.maxWaitMs);
    const settleDeadline = started + settleWindow;

    let services: ServiceState[] = [];
    let statusPolls = 0;
    let psError: string | undefined;

    // Fail fast: nothing came up, waiting out the full timeout will not help.
    const nothingRunning = (): HealthReport => ({
      status: "unhealthy",
      reason: psError
        ? `could not list services within ${seconds(settleWindow)}: ${psError}`
        : `no service reported running within ${seconds(settleWindow)}`,
      services,
      status_polls: statusPolls,
      probe_attempts: 0,
      duration_ms: this.now() - started,
    });

    for (;;) {
      statusPolls++;
      try {
        services = await this.compose.ps();
        psError = undefined;
      } catch (e) {
        psError = e instanceof Error ? e.message : String(e);
      }

      const now = this.now();
      // A running service seen after the window closed does not count.
      if (now <= settleDeadline && psError === undefined && services.some(isRunning)) break;
      if (now >= settleDeadline) return nothingRunning();

      await this.sleep(Math.min(this.opts.intervalMs, settleDeadline - now));
      if (this.now() >= settleDeadline) return nothingRunning();
    }

    let attempts = 0;
    let lastError: string | undefined;

    for (;;) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return {
          status: "timed_out",
          reason:
            `${this.opts.url} did not respond successfully within ${seconds(this.opts.maxWaitMs)}` +
            (lastError ? ` (last error: ${lastError})` : ""),
          services,
          status_polls: statusPolls,
          probe_attempts: attempts,
          last_probe_error: lastError,
          duration_ms: this.now() - started,
        };
      }

      attempts++;
      const res = await this.probe(this.opts.url, Math.min(this.opts.requestTimeoutMs, remaining));
      if (res.ok && this.now() <= deadline) {
        return {
          status: "healthy",
          services,
          status_polls: statusPolls,
          probe_attempts: attempts,
          duration_ms: this.now() - started,
        };
      }
      lastError = res.ok ? `HTTP ${res.status} arrived after the deadline` : res.error;

      const left = deadline - this.now();
      if (left > 0) await this.sleep(Math.min(this.opts.intervalMs, left));
    }
  }
}
