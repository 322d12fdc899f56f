import { randomUUID } from "node:crypto";
import type {
  Person,
  Community,
  InsertCommunity,
  ChallengeDefinition,
  InsertChallengeDefinition,
  CommunityChallengeSelection,
  ProgressRecord,
  RoleConfig,
  CompletionEvent,
  StoredCatalogSnapshot,
  Recommendation,
  InsertRecommendation,
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

const pairKey = (communityId: string, definitionId: number) => `${communityId}:${definitionId}`;
const tripleKey = (personId: string, communityId: string, definitionId: number) =>
  `${personId}:${communityId}:${definitionId}`;

/**
 * In-process storage driver. Used by the test suite and by `STORAGE_DRIVER=memory`.
 *
 * No method awaits between reading and writing its maps, so every operation is
 * atomic with respect to other callers on the event loop.
 */
export class MemStorage implements IStorage {
  private persons = new Map<string, Person>();
  private communities = new Map<string, Community>();
  private members = new Map<string, Map<string, Date>>();
  private definitions = new Map<number, ChallengeDefinition>();
  private selections = new Map<string, CommunityChallengeSelection>();
  private progress = new Map<string, ProgressRecord>();
  private roles = new Map<string, RoleConfig>();
  private events = new Map<number, CompletionEvent>();
  private snapshots = new Map<string, StoredCatalogSnapshot>();
  private recommendations = new Map<string, Recommendation[]>();
  private sequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private nextId(): number {
    this.sequence += 1;
    return this.sequence;
  }

  // --------------------------------------------------------------------------
  // Persons
  // --------------------------------------------------------------------------

  async getPerson(id: string): Promise<Person | undefined> {
    const person = this.persons.get(id);
    return person ? { ...person } : undefined;
  }

  async getPersonByDiscordId(discordId: string): Promise<Person | undefined> {
    for (const person of this.persons.values()) {
      if (person.discordId === discordId) return { ...person };
    }
    return undefined;
  }

  async getPersonByAnilistUsername(username: string): Promise<Person | undefined> {
    const wanted = username.toLowerCase();
    for (const person of this.persons.values()) {
      if (person.anilistUsername?.toLowerCase() === wanted) return { ...person };
    }
    return undefined;
  }

  async getPersonsByIds(ids: string[]): Promise<Person[]> {
    const result: Person[] = [];
    for (const id of ids) {
      const person = this.persons.get(id);
      if (person) result.push({ ...person });
    }
    return result;
  }

  async createPerson(discordId: string): Promise<Person> {
    for (const existing of this.persons.values()) {
      if (existing.discordId === discordId) return { ...existing };
    }
    const now = this.clock();
    const person: Person = {
      id: randomUUID(),
      discordId,
      anilistUsername: null,
      anilistId: null,
      linkedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.persons.set(person.id, person);
    return { ...person };
  }

  async setPersonProfile(
    id: string,
    profile: { username: string; anilistId: number } | null,
  ): Promise<Person | undefined> {
    const person = this.persons.get(id);
    if (!person) return undefined;
    if (profile) {
      const wanted = profile.username.toLowerCase();
      for (const other of this.persons.values()) {
        if (other.id !== id && other.anilistUsername?.toLowerCase() === wanted) {
          throw new Error(`duplicate key value violates unique constraint "persons_anilist_username_idx"`);
        }
      }
    }
    const now = this.clock();
    const updated: Person = {
      ...person,
      anilistUsername: profile?.username ?? null,
      anilistId: profile?.anilistId ?? null,
      linkedAt: profile ? now : null,
      updatedAt: now,
    };
    this.persons.set(id, updated);
    return { ...updated };
  }

  // --------------------------------------------------------------------------
  // Communities and membership
  // --------------------------------------------------------------------------

  async getCommunity(id: string): Promise<Community | undefined> {
    const community = this.communities.get(id);
    return community ? { ...community } : undefined;
  }

  async createCommunity(input: InsertCommunity): Promise<Community> {
    const existing = this.communities.get(input.id);
    if (existing) return { ...existing };
    const community: Community = { id: input.id, name: input.name, createdAt: this.clock() };
    this.communities.set(community.id, community);
    return { ...community };
  }

  async deleteCommunity(id: string): Promise<boolean> {
    if (!this.communities.delete(id)) return false;
    this.members.delete(id);
    for (const [key, selection] of this.selections) {
      if (selection.communityId === id) this.selections.delete(key);
    }
    for (const [key, record] of this.progress) {
      if (record.communityId === id) this.progress.delete(key);
    }
    for (const [key, role] of this.roles) {
      if (role.communityId === id) this.roles.delete(key);
    }
    for (const [eventId, event] of this.events) {
      if (event.communityId === id) this.events.delete(eventId);
    }
    return true;
  }

  async addMember(communityId: string, personId: string): Promise<void> {
    let roster = this.members.get(communityId);
    if (!roster) {
      roster = new Map();
      this.members.set(communityId, roster);
    }
    if (!roster.has(personId)) roster.set(personId, this.clock());
  }

  async isMember(communityId: string, personId: string): Promise<boolean> {
    return this.members.get(communityId)?.has(personId) ?? false;
  }

  async listMemberCommunityIds(personId: string): Promise<string[]> {
    const ids: string[] = [];
    for (const [communityId, roster] of this.members) {
      if (roster.has(personId)) ids.push(communityId);
    }
    return ids.sort();
  }

  // --------------------------------------------------------------------------
  // Challenge definitions
  // --------------------------------------------------------------------------

  async getDefinition(id: number): Promise<ChallengeDefinition | undefined> {
    const definition = this.definitions.get(id);
    return definition ? { ...definition } : undefined;
  }

  async getDefinitionByKey(key: string): Promise<ChallengeDefinition | undefined> {
    for (const definition of this.definitions.values()) {
      if (definition.key === key) return { ...definition };
    }
    return undefined;
  }

  async listDefinitions(opts: { activeOnly?: boolean } = {}): Promise<ChallengeDefinition[]> {
    return Array.from(this.definitions.values())
      .filter((d) => !opts.activeOnly || d.isActive)
      .sort((a, b) => a.sortOrder - b.sortOrder || a.id - b.id)
      .map((d) => ({ ...d }));
  }

  async createDefinition(input: InsertChallengeDefinition): Promise<ChallengeDefinition> {
    if (await this.getDefinitionByKey(input.key)) {
      throw new Error(`duplicate key value violates unique constraint "challenge_definitions_key_idx"`);
    }
    const now = this.clock();
    const definition: ChallengeDefinition = {
      id: this.nextId(),
      key: input.key,
      name: input.name,
      description: input.description ?? "",
      category: input.category,
      tier: input.tier,
      metric: input.metric,
      target: input.target,
      isActive: input.isActive ?? true,
      sortOrder: input.sortOrder ?? 0,
      createdAt: now,
      updatedAt: now,
    };
    this.definitions.set(definition.id, definition);
    return { ...definition };
  }

  async updateDefinition(id: number, patch: DefinitionPatch): Promise<ChallengeDefinition | undefined> {
    const definition = this.definitions.get(id);
    if (!definition) return undefined;
    const updated: ChallengeDefinition = {
      ...definition,
      name: patch.name ?? definition.name,
      description: patch.description ?? definition.description,
      category: patch.category ?? definition.category,
      tier: patch.tier ?? definition.tier,
      metric: patch.metric ?? definition.metric,
      target: patch.target ?? definition.target,
      isActive: patch.isActive ?? definition.isActive,
      sortOrder: patch.sortOrder ?? definition.sortOrder,
      updatedAt: this.clock(),
    };
    this.definitions.set(id, updated);
    return { ...updated };
  }

  // --------------------------------------------------------------------------
  // Community selections
  // --------------------------------------------------------------------------

  async getSelection(communityId: string, definitionId: number): Promise<CommunityChallengeSelection | undefined> {
    const selection = this.selections.get(pairKey(communityId, definitionId));
    return selection ? { ...selection } : undefined;
  }

  async createSelection(input: NewSelection): Promise<CommunityChallengeSelection | undefined> {
    const key = pairKey(input.communityId, input.definitionId);
    if (this.selections.has(key)) return undefined;
    const selection: CommunityChallengeSelection = {
      id: this.nextId(),
      communityId: input.communityId,
      definitionId: input.definitionId,
      customTarget: input.customTarget,
      rewardRoleId: input.rewardRoleId,
      selectedBy: input.selectedBy,
      selectedAt: this.clock(),
    };
    this.selections.set(key, selection);
    return { ...selection };
  }

  async updateSelection(
    communityId: string,
    definitionId: number,
    overrides: SelectionOverrides,
  ): Promise<CommunityChallengeSelection | undefined> {
    const key = pairKey(communityId, definitionId);
    const selection = this.selections.get(key);
    if (!selection) return undefined;
    const updated: CommunityChallengeSelection = {
      ...selection,
      customTarget: overrides.customTarget !== undefined ? overrides.customTarget : selection.customTarget,
      rewardRoleId: overrides.rewardRoleId !== undefined ? overrides.rewardRoleId : selection.rewardRoleId,
    };
    this.selections.set(key, updated);
    return { ...updated };
  }

  async listSelections(communityId: string): Promise<CommunityChallengeSelection[]> {
    return Array.from(this.selections.values())
      .filter((s) => s.communityId === communityId)
      .sort((a, b) => a.selectedAt.getTime() - b.selectedAt.getTime() || a.id - b.id)
      .map((s) => ({ ...s }));
  }

  async deleteSelection(communityId: string, definitionId: number): Promise<{ deleted: boolean; removedRecords: number }> {
    if (!this.selections.delete(pairKey(communityId, definitionId))) {
      return { deleted: false, removedRecords: 0 };
    }
    let removedRecords = 0;
    for (const [key, record] of this.progress) {
      if (record.communityId === communityId && record.definitionId === definitionId) {
        this.progress.delete(key);
        removedRecords++;
      }
    }
    return { deleted: true, removedRecords };
  }

  // --------------------------------------------------------------------------
  // Progress
  // --------------------------------------------------------------------------

  async getProgress(personId: string, communityId: string, definitionId: number): Promise<ProgressRecord | undefined> {
    const record = this.progress.get(tripleKey(personId, communityId, definitionId));
    return record ? { ...record } : undefined;
  }

  async applyProgress(write: ProgressWrite): Promise<ProgressWriteResult> {
    if (!this.selections.has(pairKey(write.communityId, write.definitionId))) {
      throw new Error(`insert or update on table "progress_records" violates foreign key constraint "progress_records_selection_fk"`);
    }

    const key = tripleKey(write.personId, write.communityId, write.definitionId);
    const existing = this.progress.get(key);

    if (!existing) {
      const completedAt = initialCompletion(write);
      const record: ProgressRecord = {
        id: this.nextId(),
        personId: write.personId,
        communityId: write.communityId,
        definitionId: write.definitionId,
        value: write.value,
        completedAt,
        createdAt: write.observedAt,
        updatedAt: write.observedAt,
      };
      this.progress.set(key, record);
      if (completedAt) this.queueCompletion(record, completedAt);
      return { record: { ...record }, outcome: "created", completedNow: completedAt !== null };
    }

    const decision = decideProgressUpdate(existing, write);
    if (!decision.write) {
      return { record: { ...existing }, outcome: decision.outcome, completedNow: false };
    }

    const record: ProgressRecord = {
      ...existing,
      value: decision.value,
      completedAt: decision.completedAt,
      updatedAt: write.observedAt,
    };
    this.progress.set(key, record);
    if (decision.completesNow) this.queueCompletion(record, write.observedAt);
    return { record: { ...record }, outcome: decision.outcome, completedNow: decision.completesNow };
  }

  private queueCompletion(record: ProgressRecord, completedAt: Date): void {
    const event: CompletionEvent = {
      id: this.nextId(),
      personId: record.personId,
      communityId: record.communityId,
      definitionId: record.definitionId,
      value: record.value,
      completedAt,
      attempts: 0,
      lastError: null,
      dispatchedAt: null,
      createdAt: completedAt,
    };
    this.events.set(event.id, event);
  }

  async listProgress(query: ProgressQuery): Promise<ProgressRecord[]> {
    const communityIds = new Set(query.communityIds);
    return Array.from(this.progress.values())
      .filter((r) => communityIds.has(r.communityId))
      .filter((r) => query.definitionId === undefined || r.definitionId === query.definitionId)
      .filter((r) => query.personId === undefined || r.personId === query.personId)
      .sort((a, b) => a.id - b.id)
      .map((r) => ({ ...r }));
  }

  async resetProgress(communityId: string, definitionId: number): Promise<number> {
    const now = this.clock();
    let count = 0;
    for (const [key, record] of this.progress) {
      if (record.communityId === communityId && record.definitionId === definitionId) {
        this.progress.set(key, { ...record, value: 0, completedAt: null, updatedAt: now });
        count++;
      }
    }
    return count;
  }

  async deleteMemberProgress(communityId: string, personId: string): Promise<number> {
    let count = 0;
    for (const [key, record] of this.progress) {
      if (record.communityId === communityId && record.personId === personId) {
        this.progress.delete(key);
        count++;
      }
    }
    return count;
  }

  // --------------------------------------------------------------------------
  // Role configs
  // --------------------------------------------------------------------------

  async upsertRole(communityId: string, tierKey: string, roleId: string): Promise<RoleConfig> {
    const key = `${communityId}:${tierKey}`;
    const now = this.clock();
    const existing = this.roles.get(key);
    const role: RoleConfig = existing
      ? { ...existing, roleId, updatedAt: now }
      : { id: this.nextId(), communityId, tierKey, roleId, createdAt: now, updatedAt: now };
    this.roles.set(key, role);
    return { ...role };
  }

  async listRoles(communityId: string): Promise<RoleConfig[]> {
    return Array.from(this.roles.values())
      .filter((r) => r.communityId === communityId)
      .sort((a, b) => a.tierKey.localeCompare(b.tierKey))
      .map((r) => ({ ...r }));
  }

  async deleteRole(communityId: string, tierKey: string): Promise<boolean> {
    return this.roles.delete(`${communityId}:${tierKey}`);
  }

  // --------------------------------------------------------------------------
  // Completion outbox
  // --------------------------------------------------------------------------

  async listPendingCompletionEvents(limit: number, maxAttempts = Number.POSITIVE_INFINITY): Promise<CompletionEvent[]> {
    return Array.from(this.events.values())
      .filter((e) => e.dispatchedAt === null && e.attempts < maxAttempts)
      .sort((a, b) => a.attempts - b.attempts || a.id - b.id)
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }

  async markCompletionEventDispatched(id: number, at: Date): Promise<void> {
    const event = this.events.get(id);
    if (event) this.events.set(id, { ...event, dispatchedAt: at, attempts: event.attempts + 1, lastError: null });
  }

  async markCompletionEventFailed(id: number, error: string): Promise<void> {
    const event = this.events.get(id);
    if (event) this.events.set(id, { ...event, attempts: event.attempts + 1, lastError: error });
  }

  // --------------------------------------------------------------------------
  // Catalog snapshots
  // --------------------------------------------------------------------------

  async getCatalogSnapshot(personId: string): Promise<StoredCatalogSnapshot | undefined> {
    const snapshot = this.snapshots.get(personId);
    return snapshot ? { ...snapshot } : undefined;
  }

  async saveCatalogSnapshot(personId: string, anilistUsername: string, payload: CatalogSnapshot, fetchedAt: Date): Promise<void> {
    this.snapshots.set(personId, { personId, anilistUsername, payload, fetchedAt });
  }

  async deleteCatalogSnapshot(personId: string): Promise<void> {
    this.snapshots.delete(personId);
  }

  // --------------------------------------------------------------------------
  // Recommendations
  // --------------------------------------------------------------------------

  async replaceRecommendations(personId: string, items: InsertRecommendation[]): Promise<Recommendation[]> {
    const now = this.clock();
    const stored = items.map((item) => ({
      id: this.nextId(),
      personId,
      mediaId: item.mediaId,
      mediaType: item.mediaType,
      title: item.title,
      score: item.score,
      source: item.source,
      createdAt: now,
    }));
    this.recommendations.set(personId, stored);
    return stored.map((r) => ({ ...r }));
  }

  async listRecommendations(personId: string, limit: number): Promise<Recommendation[]> {
    return (this.recommendations.get(personId) ?? [])
      .slice()
      .sort((a, b) => b.score - a.score || a.id - b.id)
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }
}
