import type { IStorage } from "../../../server/storage/types.js";
import type { CatalogSnapshot } from "../../../shared/catalog.js";
import type { ChallengeDefinition, CommunityChallengeSelection } from "../../../shared/schema.js";
import { ErrorKind, LedgerError } from "../../errors/ledgerError.js";
import { evaluateMetric } from "../challenges/challenges.metrics.js";
import { effectiveTarget } from "../challenges/challenges.types.js";
import type { AdminScopeToken, ScopeToken } from "../scope/scope.service.js";
import type { ProgressView, UpdatedRecord } from "./progress.types.js";

export class ProgressLedgerService {
  constructor(
    private readonly storage: IStorage,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Evaluates one selected challenge against a catalog snapshot and stores the
   * result. The value never decreases and completion is stamped at most once.
   */
  async recordObservation(token: ScopeToken, definitionId: number, snapshot: CatalogSnapshot): Promise<UpdatedRecord> {
    const selection = await this.storage.getSelection(token.communityId, definitionId);
    if (!selection) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge ${definitionId} is not selected in this community`);
    }
    const definition = await this.storage.getDefinition(definitionId);
    if (!definition) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge definition ${definitionId} not found`);
    }
    return this.observe(token, selection, definition, snapshot);
  }

  /** recordObservation for every active selection of the token's community, in selection order. */
  async recordSnapshot(token: ScopeToken, snapshot: CatalogSnapshot): Promise<UpdatedRecord[]> {
    const selections = await this.storage.listSelections(token.communityId);
    const results: UpdatedRecord[] = [];
    for (const selection of selections) {
      const definition = await this.storage.getDefinition(selection.definitionId);
      if (!definition?.isActive) continue;
      results.push(await this.observe(token, selection, definition, snapshot));
    }
    return results;
  }

  /** Zeroes the value and clears completion for everyone in this community. Other communities are untouched. */
  async resetProgress(token: AdminScopeToken, definitionId: number): Promise<{ resetRecords: number }> {
    const selection = await this.storage.getSelection(token.communityId, definitionId);
    if (!selection) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge ${definitionId} is not selected in this community`);
    }
    const resetRecords = await this.storage.resetProgress(token.communityId, definitionId);
    console.log(`[ProgressLedger] Community ${token.communityId} reset challenge ${definitionId} (${resetRecords} records)`);
    return { resetRecords };
  }

  async removeMemberProgress(token: AdminScopeToken, personId: string): Promise<{ removedRecords: number }> {
    const removedRecords = await this.storage.deleteMemberProgress(token.communityId, personId);
    console.log(`[ProgressLedger] Community ${token.communityId} removed ${removedRecords} records of person ${personId}`);
    return { removedRecords };
  }

  /** The token holder's own records in the token's community, in selection order. */
  async getProgress(token: ScopeToken): Promise<ProgressView[]> {
    const [selections, records] = await Promise.all([
      this.storage.listSelections(token.communityId),
      this.storage.listProgress({ communityIds: [token.communityId], personId: token.personId }),
    ]);
    const byDefinition = new Map(records.map((record) => [record.definitionId, record]));

    const views: ProgressView[] = [];
    for (const selection of selections) {
      const record = byDefinition.get(selection.definitionId);
      if (!record) continue;
      const definition = await this.storage.getDefinition(selection.definitionId);
      if (!definition) continue;
      views.push({
        definitionId: definition.id,
        key: definition.key,
        name: definition.name,
        tier: definition.tier,
        value: record.value,
        target: effectiveTarget(definition, selection),
        completedAt: record.completedAt,
        updatedAt: record.updatedAt,
      });
    }
    return views;
  }

  private async observe(
    token: ScopeToken,
    selection: CommunityChallengeSelection,
    definition: ChallengeDefinition,
    snapshot: CatalogSnapshot,
  ): Promise<UpdatedRecord> {
    const target = effectiveTarget(definition, selection);
    const value = evaluateMetric(definition.metric, snapshot);

    const result = await this.storage.applyProgress({
      personId: token.personId,
      communityId: token.communityId,
      definitionId: definition.id,
      value,
      target,
      observedAt: this.clock(),
    });

    if (result.outcome === "stale") {
      console.log(
        `[ProgressLedger] Ignored stale observation for ${definition.key} in ${token.communityId}: ${value} < ${result.record.value}`,
      );
    }
    if (result.completedNow) {
      console.log(`[ProgressLedger] Person ${token.personId} completed ${definition.key} in community ${token.communityId}`);
    }
    return { ...result, target };
  }
}
