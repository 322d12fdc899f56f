import { and, asc, desc, eq, inArray, isNull, lt, sql } from "drizzle-orm";
import type { Database } from "../db.js";
import {
  persons,
  communities,
  communityMembers,
  challengeDefinitions,
  communityChallengeSelections,
  progressRecords,
  roleConfigs,
  completionEvents,
  catalogSnapshots,
  recommendations,
  type Person,
  type Community,
  type InsertCommunity,
  type ChallengeDefinition,
  type InsertChallengeDefinition,
  type CommunityChallengeSelection,
  type ProgressRecord,
  type RoleConfig,
  type CompletionEvent,
  type StoredCatalogSnapshot,
  type Recommendation,
  type InsertRecommendation,
} from "../../shared/schema.js";
import type { CatalogSnapshot } from "../../shared/catalog.js";
import type {
  IStorage,
  DefinitionPatch,
  NewSelection,
  SelectionOverrides,
  ProgressWrite,
  ProgressWriteResult,
  ProgressQuery,
} from "./types.js";
import { decideProgressUpdate, initialCompletion } from "./progressRules.js";

/**
 * Postgres storage driver (drizzle-orm over node-postgres).
 */
export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // --------------------------------------------------------------------------
  // Persons
  // --------------------------------------------------------------------------

  async getPerson(id: string): Promise<Person | undefined> {
    const [person] = await this.db.select().from(persons).where(eq(persons.id, id)).limit(1);
    return person;
  }

  async getPersonByDiscordId(discordId: string): Promise<Person | undefined> {
    const [person] = await this.db.select().from(persons).where(eq(persons.discordId, discordId)).limit(1);
    return person;
  }

  async getPersonByAnilistUsername(username: string): Promise<Person | undefined> {
    const [person] = await this.db
      .select()
      .from(persons)
      .where(sql`lower(${persons.anilistUsername}) = lower(${username})`)
      .limit(1);
    return person;
  }

  async getPersonsByIds(ids: string[]): Promise<Person[]> {
    if (ids.length === 0) return [];
    return this.db.select().from(persons).where(inArray(persons.id, ids));
  }

  async createPerson(discordId: string): Promise<Person> {
    await this.db.insert(persons).values({ discordId }).onConflictDoNothing({ target: persons.discordId });
    const person = await this.getPersonByDiscordId(discordId);
    if (!person) throw new Error(`Person for Discord user ${discordId} vanished after insert`);
    return person;
  }

  async setPersonProfile(
    id: string,
    profile: { username: string; anilistId: number } | null,
  ): Promise<Person | undefined> {
    const now = new Date();
    const [person] = await this.db
      .update(persons)
      .set({
        anilistUsername: profile?.username ?? null,
        anilistId: profile?.anilistId ?? null,
        linkedAt: profile ? now : null,
        updatedAt: now,
      })
      .where(eq(persons.id, id))
      .returning();
    return person;
  }

  // --------------------------------------------------------------------------
  // Communities and membership
  // --------------------------------------------------------------------------

  async getCommunity(id: string): Promise<Community | undefined> {
    const [community] = await this.db.select().from(communities).where(eq(communities.id, id)).limit(1);
    return community;
  }

  async createCommunity(input: InsertCommunity): Promise<Community> {
    await this.db.insert(communities).values({ id: input.id, name: input.name }).onConflictDoNothing();
    const community = await this.getCommunity(input.id);
    if (!community) throw new Error(`Community ${input.id} vanished after insert`);
    return community;
  }

  async deleteCommunity(id: string): Promise<boolean> {
    // progress_records and completion_events follow through ON DELETE CASCADE
    const deleted = await this.db.delete(communities).where(eq(communities.id, id)).returning({ id: communities.id });
    return deleted.length > 0;
  }

  async addMember(communityId: string, personId: string): Promise<void> {
    await this.db.insert(communityMembers).values({ communityId, personId }).onConflictDoNothing();
  }

  async isMember(communityId: string, personId: string): Promise<boolean> {
    const [row] = await this.db
      .select({ personId: communityMembers.personId })
      .from(communityMembers)
      .where(and(eq(communityMembers.communityId, communityId), eq(communityMembers.personId, personId)))
      .limit(1);
    return row !== undefined;
  }

  async listMemberCommunityIds(personId: string): Promise<string[]> {
    const rows = await this.db
      .select({ communityId: communityMembers.communityId })
      .from(communityMembers)
      .where(eq(communityMembers.personId, personId))
      .orderBy(asc(communityMembers.communityId));
    return rows.map((row) => row.communityId);
  }

  // --------------------------------------------------------------------------
  // Challenge definitions
  // --------------------------------------------------------------------------

  async getDefinition(id: number): Promise<ChallengeDefinition | undefined> {
    const [definition] = await this.db.select().from(challengeDefinitions).where(eq(challengeDefinitions.id, id)).limit(1);
    return definition;
  }

  async getDefinitionByKey(key: string): Promise<ChallengeDefinition | undefined> {
    const [definition] = await this.db.select().from(challengeDefinitions).where(eq(challengeDefinitions.key, key)).limit(1);
    return definition;
  }

  async listDefinitions(opts: { activeOnly?: boolean } = {}): Promise<ChallengeDefinition[]> {
    return this.db
      .select()
      .from(challengeDefinitions)
      .where(opts.activeOnly ? eq(challengeDefinitions.isActive, true) : undefined)
      .orderBy(asc(challengeDefinitions.sortOrder), asc(challengeDefinitions.id));
  }

  async createDefinition(input: InsertChallengeDefinition): Promise<ChallengeDefinition> {
    const [definition] = await this.db.insert(challengeDefinitions).values(input).returning();
    return definition;
  }

  async updateDefinition(id: number, patch: DefinitionPatch): Promise<ChallengeDefinition | undefined> {
    const [definition] = await this.db
      .update(challengeDefinitions)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(challengeDefinitions.id, id))
      .returning();
    return definition;
  }

  // --------------------------------------------------------------------------
  // Community selections
  // --------------------------------------------------------------------------

  async getSelection(communityId: string, definitionId: number): Promise<CommunityChallengeSelection | undefined> {
    const [selection] = await this.db
      .select()
      .from(communityChallengeSelections)
      .where(and(
        eq(communityChallengeSelections.communityId, communityId),
        eq(communityChallengeSelections.definitionId, definitionId),
      ))
      .limit(1);
    return selection;
  }

  async createSelection(input: NewSelection): Promise<CommunityChallengeSelection | undefined> {
    const [selection] = await this.db
      .insert(communityChallengeSelections)
      .values(input)
      .onConflictDoNothing({
        target: [communityChallengeSelections.communityId, communityChallengeSelections.definitionId],
      })
      .returning();
    return selection;
  }

  async updateSelection(
    communityId: string,
    definitionId: number,
    overrides: SelectionOverrides,
  ): Promise<CommunityChallengeSelection | undefined> {
    const changes: Partial<typeof communityChallengeSelections.$inferInsert> = {};
    if (overrides.customTarget !== undefined) changes.customTarget = overrides.customTarget;
    if (overrides.rewardRoleId !== undefined) changes.rewardRoleId = overrides.rewardRoleId;
    if (Object.keys(changes).length === 0) return this.getSelection(communityId, definitionId);

    const [selection] = await this.db
      .update(communityChallengeSelections)
      .set(changes)
      .where(and(
        eq(communityChallengeSelections.communityId, communityId),
        eq(communityChallengeSelections.definitionId, definitionId),
      ))
      .returning();
    return selection;
  }

  async listSelections(communityId: string): Promise<CommunityChallengeSelection[]> {
    return this.db
      .select()
      .from(communityChallengeSelections)
      .where(eq(communityChallengeSelections.communityId, communityId))
      .orderBy(asc(communityChallengeSelections.selectedAt), asc(communityChallengeSelections.id));
  }

  async deleteSelection(communityId: string, definitionId: number): Promise<{ deleted: boolean; removedRecords: number }> {
    return this.db.transaction(async (tx) => {
      const removed = await tx
        .delete(progressRecords)
        .where(and(eq(progressRecords.communityId, communityId), eq(progressRecords.definitionId, definitionId)))
        .returning({ id: progressRecords.id });
      const deleted = await tx
        .delete(communityChallengeSelections)
        .where(and(
          eq(communityChallengeSelections.communityId, communityId),
          eq(communityChallengeSelections.definitionId, definitionId),
        ))
        .returning({ id: communityChallengeSelections.id });
      return { deleted: deleted.length > 0, removedRecords: removed.length };
    });
  }

  // --------------------------------------------------------------------------
  // Progress
  // --------------------------------------------------------------------------

  private tripleFilter(personId: string, communityId: string, definitionId: number) {
    return and(
      eq(progressRecords.personId, personId),
      eq(progressRecords.communityId, communityId),
      eq(progressRecords.definitionId, definitionId),
    );
  }

  async getProgress(personId: string, communityId: string, definitionId: number): Promise<ProgressRecord | undefined> {
    const [record] = await this.db
      .select()
      .from(progressRecords)
      .where(this.tripleFilter(personId, communityId, definitionId))
      .limit(1);
    return record;
  }

  async applyProgress(write: ProgressWrite): Promise<ProgressWriteResult> {
    return this.db.transaction(async (tx): Promise<ProgressWriteResult> => {
      const completedAt = initialCompletion(write);
      const [created] = await tx
        .insert(progressRecords)
        .values({
          personId: write.personId,
          communityId: write.communityId,
          definitionId: write.definitionId,
          value: write.value,
          completedAt,
          createdAt: write.observedAt,
          updatedAt: write.observedAt,
        })
        .onConflictDoNothing({
          target: [progressRecords.personId, progressRecords.communityId, progressRecords.definitionId],
        })
        .returning();

      if (created) {
        if (completedAt) {
          await tx.insert(completionEvents).values({
            personId: created.personId,
            communityId: created.communityId,
            definitionId: created.definitionId,
            value: created.value,
            completedAt,
          });
        }
        return { record: created, outcome: "created", completedNow: completedAt !== null };
      }

      // Row lock serialises concurrent observations of the same triple until commit
      const [existing] = await tx
        .select()
        .from(progressRecords)
        .where(this.tripleFilter(write.personId, write.communityId, write.definitionId))
        .for("update");
      if (!existing) {
        throw new Error(`Progress record for ${write.personId}/${write.communityId}/${write.definitionId} disappeared mid-update`);
      }

      const decision = decideProgressUpdate(existing, write);
      if (!decision.write) {
        return { record: existing, outcome: decision.outcome, completedNow: false };
      }

      const [record] = await tx
        .update(progressRecords)
        .set({ value: decision.value, completedAt: decision.completedAt, updatedAt: write.observedAt })
        .where(eq(progressRecords.id, existing.id))
        .returning();

      if (decision.completesNow) {
        await tx.insert(completionEvents).values({
          personId: record.personId,
          communityId: record.communityId,
          definitionId: record.definitionId,
          value: record.value,
          completedAt: write.observedAt,
        });
      }
      return { record, outcome: decision.outcome, completedNow: decision.completesNow };
    });
  }

  async listProgress(query: ProgressQuery): Promise<ProgressRecord[]> {
    if (query.communityIds.length === 0) return [];
    return this.db
      .select()
      .from(progressRecords)
      .where(and(
        inArray(progressRecords.communityId, query.communityIds),
        query.definitionId !== undefined ? eq(progressRecords.definitionId, query.definitionId) : undefined,
        query.personId !== undefined ? eq(progressRecords.personId, query.personId) : undefined,
      ))
      .orderBy(asc(progressRecords.id));
  }

  async resetProgress(communityId: string, definitionId: number): Promise<number> {
    const reset = await this.db
      .update(progressRecords)
      .set({ value: 0, completedAt: null, updatedAt: new Date() })
      .where(and(eq(progressRecords.communityId, communityId), eq(progressRecords.definitionId, definitionId)))
      .returning({ id: progressRecords.id });
    return reset.length;
  }

  async deleteMemberProgress(communityId: string, personId: string): Promise<number> {
    const removed = await this.db
      .delete(progressRecords)
      .where(and(eq(progressRecords.communityId, communityId), eq(progressRecords.personId, personId)))
      .returning({ id: progressRecords.id });
    return removed.length;
  }

  // --------------------------------------------------------------------------
  // Role configs
  // --------------------------------------------------------------------------

  async upsertRole(communityId: string, tierKey: string, roleId: string): Promise<RoleConfig> {
    const now = new Date();
    const [role] = await this.db
      .insert(roleConfigs)
      .values({ communityId, tierKey, roleId, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [roleConfigs.communityId, roleConfigs.tierKey],
        set: { roleId, updatedAt: now },
      })
      .returning();
    return role;
  }

  async listRoles(communityId: string): Promise<RoleConfig[]> {
    return this.db
      .select()
      .from(roleConfigs)
      .where(eq(roleConfigs.communityId, communityId))
      .orderBy(asc(roleConfigs.tierKey));
  }

  async deleteRole(communityId: string, tierKey: string): Promise<boolean> {
    const deleted = await this.db
      .delete(roleConfigs)
      .where(and(eq(roleConfigs.communityId, communityId), eq(roleConfigs.tierKey, tierKey)))
      .returning({ id: roleConfigs.id });
    return deleted.length > 0;
  }

  // --------------------------------------------------------------------------
  // Completion outbox
  // --------------------------------------------------------------------------

  async listPendingCompletionEvents(limit: number, maxAttempts?: number): Promise<CompletionEvent[]> {
    const pending = isNull(completionEvents.dispatchedAt);
    return this.db
      .select()
      .from(completionEvents)
      .where(maxAttempts === undefined ? pending : and(pending, lt(completionEvents.attempts, maxAttempts)))
      .orderBy(asc(completionEvents.attempts), asc(completionEvents.id))
      .limit(limit);
  }

  async markCompletionEventDispatched(id: number, at: Date): Promise<void> {
    await this.db
      .update(completionEvents)
      .set({ dispatchedAt: at, attempts: sql`${completionEvents.attempts} + 1`, lastError: null })
      .where(eq(completionEvents.id, id));
  }

  async markCompletionEventFailed(id: number, error: string): Promise<void> {
    await this.db
      .update(completionEvents)
      .set({ attempts: sql`${completionEvents.attempts} + 1`, lastError: error })
      .where(eq(completionEvents.id, id));
  }

  // --------------------------------------------------------------------------
  // Catalog snapshots
  // --------------------------------------------------------------------------

  async getCatalogSnapshot(personId: string): Promise<StoredCatalogSnapshot | undefined> {
    const [snapshot] = await this.db.select().from(catalogSnapshots).where(eq(catalogSnapshots.personId, personId)).limit(1);
    return snapshot;
  }

  async saveCatalogSnapshot(personId: string, anilistUsername: string, payload: CatalogSnapshot, fetchedAt: Date): Promise<void> {
    await this.db
      .insert(catalogSnapshots)
      .values({ personId, anilistUsername, payload, fetchedAt })
      .onConflictDoUpdate({
        target: catalogSnapshots.personId,
        set: { anilistUsername, payload, fetchedAt },
      });
  }

  async deleteCatalogSnapshot(personId: string): Promise<void> {
    await this.db.delete(catalogSnapshots).where(eq(catalogSnapshots.personId, personId));
  }

  // --------------------------------------------------------------------------
  // Recommendations
  // --------------------------------------------------------------------------

  async replaceRecommendations(personId: string, items: InsertRecommendation[]): Promise<Recommendation[]> {
    return this.db.transaction(async (tx) => {
      await tx.delete(recommendations).where(eq(recommendations.personId, personId));
      if (items.length === 0) return [];
      return tx
        .insert(recommendations)
        .values(items.map((item) => ({ ...item, personId })))
        .returning();
    });
  }

  async listRecommendations(personId: string, limit: number): Promise<Recommendation[]> {
    return this.db
      .select()
      .from(recommendations)
      .where(eq(recommendations.personId, personId))
      .orderBy(desc(recommendations.score), asc(recommendations.id))
      .limit(limit);
  }
}
