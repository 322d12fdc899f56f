import type { IStorage } from "../../../server/storage/types.js";
import {
  insertChallengeDefinitionSchema,
  type ChallengeDefinition,
  type CommunityChallengeSelection,
  type InsertChallengeDefinition,
} from "../../../shared/schema.js";
import { ErrorKind, LedgerError, invalidInput } from "../../errors/ledgerError.js";
import type { AdminScopeToken } from "../scope/scope.service.js";
import { describeMetric } from "./challenges.metrics.js";
import {
  effectiveTarget,
  selectionOverridesSchema,
  type SeedResult,
  type SelectionView,
} from "./challenges.types.js";

const definitionPatchSchema = insertChallengeDefinitionSchema.omit({ key: true }).partial().strict();

export class ChallengeCatalogService {
  constructor(private readonly storage: IStorage) {}

  // --------------------------------------------------------------------------
  // Global definitions
  // --------------------------------------------------------------------------

  async listDefinitions(opts: { activeOnly?: boolean } = {}): Promise<ChallengeDefinition[]> {
    return this.storage.listDefinitions(opts);
  }

  async getDefinition(definitionId: number): Promise<ChallengeDefinition> {
    const definition = await this.storage.getDefinition(definitionId);
    if (!definition) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge definition ${definitionId} not found`);
    }
    return definition;
  }

  async createDefinition(input: unknown): Promise<ChallengeDefinition> {
    const parsed = insertChallengeDefinitionSchema.safeParse(input);
    if (!parsed.success) throw invalidInput(parsed.error);

    if (await this.storage.getDefinitionByKey(parsed.data.key)) {
      throw new LedgerError(ErrorKind.InvalidInput, `A challenge with key ${parsed.data.key} already exists`);
    }
    const definition = await this.storage.createDefinition(parsed.data);
    console.log(`[ChallengeCatalog] Created definition ${definition.id} (${definition.key})`);
    return definition;
  }

  /** Administrative correction of a global definition. The key is immutable. */
  async correctDefinition(definitionId: number, patch: unknown): Promise<ChallengeDefinition> {
    const parsed = definitionPatchSchema.safeParse(patch);
    if (!parsed.success) throw invalidInput(parsed.error);

    const updated = await this.storage.updateDefinition(definitionId, parsed.data);
    if (!updated) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge definition ${definitionId} not found`);
    }
    console.log(`[ChallengeCatalog] Corrected definition ${updated.id} (${updated.key})`);
    return updated;
  }

  /** Creates every seed whose key is not in the catalog yet. Existing definitions are left alone. */
  async seedDefinitions(seeds: InsertChallengeDefinition[]): Promise<SeedResult> {
    let created = 0;
    let skipped = 0;
    for (const seed of seeds) {
      if (await this.storage.getDefinitionByKey(seed.key)) {
        skipped++;
        continue;
      }
      await this.storage.createDefinition(seed);
      created++;
    }
    console.log(`[ChallengeCatalog] Seeded ${created} definitions (${skipped} already present)`);
    return { created, skipped };
  }

  // --------------------------------------------------------------------------
  // Community selections
  // --------------------------------------------------------------------------

  async selectChallenge(token: AdminScopeToken, definitionId: number, overrides: unknown = {}): Promise<SelectionView> {
    const parsed = selectionOverridesSchema.safeParse(overrides);
    if (!parsed.success) throw invalidInput(parsed.error);

    const definition = await this.storage.getDefinition(definitionId);
    if (!definition || !definition.isActive) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge definition ${definitionId} not found`);
    }

    const selection = await this.storage.createSelection({
      communityId: token.communityId,
      definitionId,
      customTarget: parsed.data.customTarget ?? null,
      rewardRoleId: parsed.data.rewardRoleId ?? null,
      selectedBy: token.personId,
    });
    if (!selection) {
      throw new LedgerError(ErrorKind.AlreadySelected, `${definition.name} is already selected in this community`, {
        communityId: token.communityId,
        definitionId,
      });
    }

    console.log(`[ChallengeCatalog] Community ${token.communityId} selected ${definition.key}`);
    return toSelectionView(selection, definition);
  }

  async updateOverrides(token: AdminScopeToken, definitionId: number, overrides: unknown): Promise<SelectionView> {
    const parsed = selectionOverridesSchema.safeParse(overrides);
    if (!parsed.success) throw invalidInput(parsed.error);

    const selection = await this.storage.updateSelection(token.communityId, definitionId, parsed.data);
    if (!selection) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge ${definitionId} is not selected in this community`);
    }
    const definition = await this.getDefinition(definitionId);
    return toSelectionView(selection, definition);
  }

  /** Ordered by insertion time. */
  async listSelections(communityId: string): Promise<SelectionView[]> {
    const selections = await this.storage.listSelections(communityId);
    const views: SelectionView[] = [];
    for (const selection of selections) {
      const definition = await this.storage.getDefinition(selection.definitionId);
      if (definition) views.push(toSelectionView(selection, definition));
    }
    return views;
  }

  async getSelection(communityId: string, definitionId: number): Promise<SelectionView> {
    const selection = await this.storage.getSelection(communityId, definitionId);
    if (!selection) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge ${definitionId} is not selected in this community`);
    }
    const definition = await this.getDefinition(definitionId);
    return toSelectionView(selection, definition);
  }

  /**
   * Destructive: drops the selection together with every progress record of
   * this community for the definition. Use resetProgress to keep the selection.
   */
  async removeSelection(token: AdminScopeToken, definitionId: number): Promise<{ removedRecords: number }> {
    const { deleted, removedRecords } = await this.storage.deleteSelection(token.communityId, definitionId);
    if (!deleted) {
      throw new LedgerError(ErrorKind.NotFound, `Challenge ${definitionId} is not selected in this community`);
    }
    console.warn(
      `[ChallengeCatalog] Community ${token.communityId} removed challenge ${definitionId}; deleted ${removedRecords} progress records`,
    );
    return { removedRecords };
  }
}

export function toSelectionView(selection: CommunityChallengeSelection, definition: ChallengeDefinition): SelectionView {
  return {
    selectionId: selection.id,
    communityId: selection.communityId,
    definition,
    effectiveTarget: effectiveTarget(definition, selection),
    customTarget: selection.customTarget,
    rewardRoleId: selection.rewardRoleId,
    metricLabel: describeMetric(definition.metric),
    selectedAt: selection.selectedAt,
  };
}
