import type { ProgressRecord } from "../../shared/schema.js";
import type { ProgressOutcome, ProgressWrite } from "./types.js";

export interface ProgressDecision {
  outcome: ProgressOutcome;
  /** False when the stored row must be left as it is. */
  write: boolean;
  value: number;
  completedAt: Date | null;
  completesNow: boolean;
}

export function initialCompletion(write: ProgressWrite): Date | null {
  return write.value >= write.target ? write.observedAt : null;
}

/**
 * The value only grows; a lower observation is stale and changes nothing.
 * Completion is stamped once, the first time the kept value reaches the target.
 */
export function decideProgressUpdate(
  existing: Pick<ProgressRecord, "value" | "completedAt">,
  write: ProgressWrite,
): ProgressDecision {
  const value = Math.max(existing.value, write.value);
  const completesNow = existing.completedAt === null && value >= write.target;
  const outcome: ProgressOutcome =
    write.value > existing.value ? "advanced" : write.value < existing.value ? "stale" : "unchanged";

  return {
    outcome,
    write: outcome === "advanced" || completesNow,
    value,
    completedAt: existing.completedAt ?? (completesNow ? write.observedAt : null),
    completesNow,
  };
}
