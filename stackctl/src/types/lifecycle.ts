export const LIFECYCLE_STAGES = ["stop", "build", "start"] as const;

export type LifecycleStage = (typeof LIFECYCLE_STAGES)[number];

export type StageStatus = "succeeded" | "skipped" | "failed";

export type StageOutcome = {
  stage: LifecycleStage;
  status: StageStatus;
  duration_ms: number;
  reason?: string;
  /** Tail of the captured command output, kept for failures. */
  output?: string;
  note?: string;
};
