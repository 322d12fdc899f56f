import cron, { type ScheduledTask } from "node-cron";
import type { IStorage } from "../../../server/storage/types.js";
import type { CompletionEvent } from "../../../shared/schema.js";
import type { RoleGranter } from "../../services/discordRoleGranter.js";
import type { RoleConfigService } from "../roles/roles.service.js";
import type { DispatchSummary } from "./progress.types.js";

export const MAX_DISPATCH_ATTEMPTS = 5;

export interface CompletionDispatcherOptions {
  batchSize?: number;
  /** Grant attempts per event before it is left undelivered. */
  maxAttempts?: number;
  clock?: () => Date;
}

type EventResult = "granted" | "skipped" | "failed";

/**
 * Drains the completion outbox into role grants. A failed grant is recorded on
 * the event and retried on later passes, after events with fewer attempts,
 * until it reaches `maxAttempts`.
 */
export class CompletionDispatcher {
  private readonly batchSize: number;
  private readonly maxAttempts: number;
  private readonly clock: () => Date;
  private running = false;
  private lastRunAt: Date | null = null;
  private runCount = 0;

  constructor(
    private readonly storage: IStorage,
    private readonly roles: RoleConfigService,
    private readonly granter: RoleGranter,
    options: CompletionDispatcherOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 50;
    this.maxAttempts = options.maxAttempts ?? MAX_DISPATCH_ATTEMPTS;
    this.clock = options.clock ?? (() => new Date());
  }

  async drain(): Promise<DispatchSummary> {
    const summary: DispatchSummary = { processed: 0, granted: 0, skipped: 0, failed: 0 };
    if (this.running) {
      console.log("[CompletionDispatcher] Already running, skipping");
      return summary;
    }

    this.running = true;
    try {
      const events = await this.storage.listPendingCompletionEvents(this.batchSize, this.maxAttempts);
      for (const event of events) {
        const result = await this.dispatch(event);
        summary.processed++;
        summary[result]++;
      }
    } finally {
      this.running = false;
      this.lastRunAt = this.clock();
      this.runCount++;
    }

    if (summary.processed > 0) {
      console.log(
        `[CompletionDispatcher] Processed ${summary.processed} events: ${summary.granted} granted, ${summary.skipped} skipped, ${summary.failed} failed`,
      );
    }
    return summary;
  }

  getStatus() {
    return { running: this.running, lastRunAt: this.lastRunAt, runCount: this.runCount };
  }

  private async dispatch(event: CompletionEvent): Promise<EventResult> {
    const [person, selection, definition] = await Promise.all([
      this.storage.getPerson(event.personId),
      this.storage.getSelection(event.communityId, event.definitionId),
      this.storage.getDefinition(event.definitionId),
    ]);

    // Selection removed or person gone since the completion was recorded
    if (!person || !selection || !definition) {
      await this.storage.markCompletionEventDispatched(event.id, this.clock());
      return "skipped";
    }

    const roleId = await this.roles.resolveRewardRole(event.communityId, definition, selection);
    if (!roleId) {
      await this.storage.markCompletionEventDispatched(event.id, this.clock());
      return "skipped";
    }

    try {
      await this.granter.grantRole(person.discordId, event.communityId, roleId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[CompletionDispatcher] Role grant for event ${event.id} failed:`, error);
      await this.storage.markCompletionEventFailed(event.id, message);
      if (event.attempts + 1 >= this.maxAttempts) {
        console.warn(
          `[CompletionDispatcher] Giving up on event ${event.id} after ${event.attempts + 1} attempts; role ${roleId} not granted to ${person.discordId}`,
        );
      }
      return "failed";
    }

    await this.storage.markCompletionEventDispatched(event.id, this.clock());
    return "granted";
  }
}

export function startCompletionDispatchScheduler(dispatcher: CompletionDispatcher, expression: string): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid COMPLETION_DISPATCH_CRON expression: ${expression}`);
  }

  console.log(`[CompletionDispatcher] Scheduled outbox drain (${expression})`);
  return cron.schedule(expression, async () => {
    try {
      await dispatcher.drain();
    } catch (err) {
      console.error("[CompletionDispatcher] Scheduled drain failed:", err);
    }
  });
}
