/**
 * Storage contract shared by the Postgres and in-memory drivers.
 *
 * Every community-owned read or write takes the community id explicitly; the
 * services above this layer only ever pass ids taken from a scope token.
 */

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

export type DefinitionPatch = Partial<Omit<InsertChallengeDefinition, "key">>;

export interface NewSelection {
  communityId: string;
  definitionId: number;
  customTarget: number | null;
  rewardRoleId: string | null;
  selectedBy: string | null;
}

export interface SelectionOverrides {
  customTarget?: number | null;
  rewardRoleId?: string | null;
}

export interface ProgressWrite {
  personId: string;
  communityId: string;
  definitionId: number;
  value: number;
  target: number;
  observedAt: Date;
}

export type ProgressOutcome = "created" | "advanced" | "unchanged" | "stale";

export interface ProgressWriteResult {
  record: ProgressRecord;
  outcome: ProgressOutcome;
  completedNow: boolean;
}

export interface ProgressQuery {
  communityIds: string[];
  definitionId?: number;
  personId?: string;
}

export interface IStorage {
  // Persons
  getPerson(id: string): Promise<Person | undefined>;
  getPersonByDiscordId(discordId: string): Promise<Person | undefined>;
  getPersonByAnilistUsername(username: string): Promise<Person | undefined>;
  getPersonsByIds(ids: string[]): Promise<Person[]>;
  /** Returns the existing person when the Discord id is already registered. */
  createPerson(discordId: string): Promise<Person>;
  setPersonProfile(id: string, profile: { username: string; anilistId: number } | null): Promise<Person | undefined>;

  // Communities and membership
  getCommunity(id: string): Promise<Community | undefined>;
  createCommunity(community: InsertCommunity): Promise<Community>;
  deleteCommunity(id: string): Promise<boolean>;
  addMember(communityId: string, personId: string): Promise<void>;
  isMember(communityId: string, personId: string): Promise<boolean>;
  listMemberCommunityIds(personId: string): Promise<string[]>;

  // Challenge definitions
  getDefinition(id: number): Promise<ChallengeDefinition | undefined>;
  getDefinitionByKey(key: string): Promise<ChallengeDefinition | undefined>;
  listDefinitions(opts?: { activeOnly?: boolean }): Promise<ChallengeDefinition[]>;
  createDefinition(definition: InsertChallengeDefinition): Promise<ChallengeDefinition>;
  updateDefinition(id: number, patch: DefinitionPatch): Promise<ChallengeDefinition | undefined>;

  // Community selections
  getSelection(communityId: string, definitionId: number): Promise<CommunityChallengeSelection | undefined>;
  /** Returns undefined when the community already selected the definition. */
  createSelection(selection: NewSelection): Promise<CommunityChallengeSelection | undefined>;
  updateSelection(communityId: string, definitionId: number, overrides: SelectionOverrides): Promise<CommunityChallengeSelection | undefined>;
  listSelections(communityId: string): Promise<CommunityChallengeSelection[]>;
  /** Deletes the selection and every progress record of the pair. */
  deleteSelection(communityId: string, definitionId: number): Promise<{ deleted: boolean; removedRecords: number }>;

  // Progress
  getProgress(personId: string, communityId: string, definitionId: number): Promise<ProgressRecord | undefined>;
  /**
   * Atomic conditional write: the stored value only ever grows, the completion
   * timestamp is set once, and a completion event is queued in the same unit of work.
   */
  applyProgress(write: ProgressWrite): Promise<ProgressWriteResult>;
  listProgress(query: ProgressQuery): Promise<ProgressRecord[]>;
  resetProgress(communityId: string, definitionId: number): Promise<number>;
  deleteMemberProgress(communityId: string, personId: string): Promise<number>;

  // Role configs
  upsertRole(communityId: string, tierKey: string, roleId: string): Promise<RoleConfig>;
  listRoles(communityId: string): Promise<RoleConfig[]>;
  deleteRole(communityId: string, tierKey: string): Promise<boolean>;

  // Completion outbox
  /** Undispatched events below `maxAttempts`, fewest attempts first, then oldest. */
  listPendingCompletionEvents(limit: number, maxAttempts?: number): Promise<CompletionEvent[]>;
  markCompletionEventDispatched(id: number, at: Date): Promise<void>;
  markCompletionEventFailed(id: number, error: string): Promise<void>;

  // Catalog snapshots
  getCatalogSnapshot(personId: string): Promise<StoredCatalogSnapshot | undefined>;
  saveCatalogSnapshot(personId: string, anilistUsername: string, payload: CatalogSnapshot, fetchedAt: Date): Promise<void>;
  deleteCatalogSnapshot(personId: string): Promise<void>;

  // Recommendations
  replaceRecommendations(personId: string, items: InsertRecommendation[]): Promise<Recommendation[]>;
  listRecommendations(personId: string, limit: number): Promise<Recommendation[]>;
}
