import type { ProgressOutcome } from "../../../server/storage/types.js";
import type { ChallengeTier, ProgressRecord } from "../../../shared/schema.js";

export interface UpdatedRecord {
  record: ProgressRecord;
  /** `stale` means the observation was lower than the stored value and changed nothing. */
  outcome: ProgressOutcome;
  completedNow: boolean;
  target: number;
}

export interface ProgressView {
  definitionId: number;
  key: string;
  name: string;
  tier: ChallengeTier;
  value: number;
  target: number;
  completedAt: Date | null;
  updatedAt: Date;
}

export interface DispatchSummary {
  processed: number;
  granted: number;
  skipped: number;
  failed: number;
}
