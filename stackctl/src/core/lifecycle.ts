import type { ComposeClient } from "../compose/compose.js";
import type { CommandResult } from "../compose/exec.js";
import type { LifecycleStage, StageOutcome } from "../types/lifecycle.js";
import { combineOutput, tailLines } from "./text.js";

/** Output of `down` when there was no previous deployment to remove. */
const NOTHING_TO_STOP = /no such (container|project|service)|not found|no resource found|nothing to (stop|remove)/i;

export type LifecycleOptions = {
  legacyContainers: string[];
  /** Lines of command output kept on failure. */
  outputTailLines: number;
  now?: () => number;
};

/**
 * Issues stop, build and start against the compose client. Each call
 * resolves to a StageOutcome; nothing here throws.
 */
export class LifecycleDriver {
  private readonly now: () => number;

  constructor(
    private readonly compose: ComposeClient,
    private readonly opts: LifecycleOptions,
  ) {
    this.now = opts.now ?? Date.now;
  }

  /** Best-effort: a failure here is reported but the run goes on to build. */
  async stop(): Promise<StageOutcome> {
    const started = this.now();
    const notes: string[] = [];
    let failure: { reason: string; output?: string } | null = null;

    try {
      const res = await this.compose.down();
      if (res.exitCode !== 0) {
        const output = combineOutput(res.stdout, res.stderr);
        if (NOTHING_TO_STOP.test(output)) {
          notes.push("nothing to stop");
        } else {
          failure = { reason: `compose down exited with code ${res.exitCode}`, output: tailLines(output, this.opts.outputTailLines) };
        }
      }
    } catch (e) {
      failure = { reason: e instanceof Error ? e.message : String(e) };
    }

    notes.push(...(await this.removeLegacyContainers()));
    const note = notes.length > 0 ? notes.join("; ") : undefined;

    if (failure) {
      return { stage: "stop", status: "failed", duration_ms: this.now() - started, ...failure, note };
    }
    return { stage: "stop", status: "succeeded", duration_ms: this.now() - started, note };
  }

  build(): Promise<StageOutcome> {
    return this.runFatal("build", () => this.compose.build(), "compose build");
  }

  start(): Promise<StageOutcome> {
    return this.runFatal("start", () => this.compose.up(), "compose up");
  }

  private async runFatal(stage: LifecycleStage, op: () => Promise<CommandResult>, label: string): Promise<StageOutcome> {
    const started = this.now();
    try {
      const res = await op();
      if (res.exitCode === 0) {
        return { stage, status: "succeeded", duration_ms: this.now() - started };
      }
      return {
        stage,
        status: "failed",
        duration_ms: this.now() - started,
        reason: `${label} exited with code ${res.exitCode}`,
        output: tailLines(combineOutput(res.stdout, res.stderr), this.opts.outputTailLines),
      };
    } catch (e) {
      return { stage, status: "failed", duration_ms: this.now() - started, reason: e instanceof Error ? e.message : String(e) };
    }
  }

  /** Containers from before the stack ran under compose; absent ones are fine. */
  private async removeLegacyContainers(): Promise<string[]> {
    const removed: string[] = [];
    const notes: string[] = [];
    for (const name of this.opts.legacyContainers) {
      try {
        const res = await this.compose.removeContainer(name);
        if (res.exitCode === 0 && res.stdout.trim().length > 0) removed.push(name);
      } catch (e) {
        notes.push(`could not remove ${name}: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    if (removed.length > 0) notes.unshift(`removed legacy containers: ${removed.join(", ")}`);
    return notes;
  }
}
