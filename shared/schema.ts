import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  serial,
  timestamp,
  integer,
  boolean,
  json,
  real,
  index,
  uniqueIndex,
  unique,
  primaryKey,
  foreignKey,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { challengeMetricSchema, type CatalogSnapshot, type ChallengeMetric } from "./catalog.js";

export const CHALLENGE_TIERS = ["COMMON", "UNCOMMON", "RARE", "LEGENDARY", "MYTHIC"] as const;
export type ChallengeTier = (typeof CHALLENGE_TIERS)[number];

// Leaderboard weight of one completed challenge per tier
export const TIER_POINTS: Record<ChallengeTier, number> = {
  COMMON: 1,
  UNCOMMON: 2,
  RARE: 3,
  LEGENDARY: 5,
  MYTHIC: 8,
};

// ============================================================================
// PERSONS (global, one per Discord user)
// ============================================================================

export const persons = pgTable("persons", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  discordId: varchar("discord_id", { length: 32 }).notNull(),
  anilistUsername: text("anilist_username"),
  anilistId: integer("anilist_id"),
  linkedAt: timestamp("linked_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  discordIdIdx: uniqueIndex("persons_discord_id_idx").on(table.discordId),
  anilistUsernameIdx: uniqueIndex("persons_anilist_username_idx").on(sql`lower(${table.anilistUsername})`),
}));

export const insertPersonSchema = createInsertSchema(persons).pick({ discordId: true });
export type InsertPerson = z.infer<typeof insertPersonSchema>;
export type Person = typeof persons.$inferSelect;

// ============================================================================
// COMMUNITIES (guilds) AND MEMBERSHIP
// ============================================================================

export const communities = pgTable("communities", {
  id: varchar("id", { length: 32 }).primaryKey(), // Discord guild snowflake
  name: text("name").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const insertCommunitySchema = createInsertSchema(communities, {
  id: z.string().regex(/^\d{1,32}$/, "community id must be numeric"),
  name: z.string().min(1).max(100),
}).omit({ createdAt: true });
export type InsertCommunity = z.infer<typeof insertCommunitySchema>;
export type Community = typeof communities.$inferSelect;

export const communityMembers = pgTable("community_members", {
  communityId: varchar("community_id", { length: 32 }).notNull().references(() => communities.id, { onDelete: "cascade" }),
  personId: varchar("person_id").notNull().references(() => persons.id, { onDelete: "cascade" }),
  joinedAt: timestamp("joined_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.communityId, table.personId] }),
  personIdx: index("community_members_person_idx").on(table.personId),
}));

export type CommunityMember = typeof communityMembers.$inferSelect;

// ============================================================================
// CHALLENGE DEFINITIONS (global templates)
// ============================================================================

export const challengeDefinitions = pgTable("challenge_definitions", {
  id: serial("id").primaryKey(),
  key: varchar("key", { length: 64 }).notNull(),
  name: text("name").notNull(),
  description: text("description").notNull().default(""),
  category: varchar("category", { length: 64 }).notNull(),
  tier: varchar("tier", { length: 16 }).$type<ChallengeTier>().notNull(),
  metric: json("metric").$type<ChallengeMetric>().notNull(),
  target: integer("target").notNull(),
  isActive: boolean("is_active").notNull().default(true),
  sortOrder: integer("sort_order").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  keyIdx: uniqueIndex("challenge_definitions_key_idx").on(table.key),
  categoryIdx: index("challenge_definitions_category_idx").on(table.category),
}));

export const insertChallengeDefinitionSchema = createInsertSchema(challengeDefinitions, {
  key: z.string().regex(/^[a-z0-9][a-z0-9-]{0,63}$/, "key must be lowercase kebab-case"),
  name: z.string().min(1).max(100),
  category: z.string().min(1).max(64),
  tier: z.enum(CHALLENGE_TIERS),
  metric: challengeMetricSchema,
  target: z.number().int().positive(),
}).omit({ id: true, createdAt: true, updatedAt: true });
export type InsertChallengeDefinition = z.infer<typeof insertChallengeDefinitionSchema>;
export type ChallengeDefinition = typeof challengeDefinitions.$inferSelect;

// ============================================================================
// COMMUNITY CHALLENGE SELECTIONS (per-guild opt-in with overrides)
// ============================================================================

export const communityChallengeSelections = pgTable("community_challenge_selections", {
  id: serial("id").primaryKey(),
  communityId: varchar("community_id", { length: 32 }).notNull().references(() => communities.id, { onDelete: "cascade" }),
  definitionId: integer("definition_id").notNull().references(() => challengeDefinitions.id),
  customTarget: integer("custom_target"),
  rewardRoleId: varchar("reward_role_id", { length: 32 }),
  selectedBy: varchar("selected_by").references(() => persons.id, { onDelete: "set null" }),
  selectedAt: timestamp("selected_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  communityDefinitionUnique: unique("community_challenge_selections_community_definition_uniq").on(table.communityId, table.definitionId),
  communitySelectedAtIdx: index("community_challenge_selections_selected_at_idx").on(table.communityId, table.selectedAt),
}));

export type CommunityChallengeSelection = typeof communityChallengeSelections.$inferSelect;

// ============================================================================
// PROGRESS RECORDS (per person, per community, per definition)
// ============================================================================

export const progressRecords = pgTable("progress_records", {
  id: serial("id").primaryKey(),
  personId: varchar("person_id").notNull().references(() => persons.id, { onDelete: "cascade" }),
  communityId: varchar("community_id", { length: 32 }).notNull(),
  definitionId: integer("definition_id").notNull(),
  value: integer("value").notNull().default(0),
  completedAt: timestamp("completed_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  tripleIdx: uniqueIndex("progress_records_triple_idx").on(table.personId, table.communityId, table.definitionId),
  communityDefinitionIdx: index("progress_records_community_definition_idx").on(table.communityId, table.definitionId),
  selectionFk: foreignKey({
    name: "progress_records_selection_fk",
    columns: [table.communityId, table.definitionId],
    foreignColumns: [communityChallengeSelections.communityId, communityChallengeSelections.definitionId],
  }).onDelete("cascade"),
}));

export type ProgressRecord = typeof progressRecords.$inferSelect;

// ============================================================================
// ROLE CONFIGS (per-guild tier/challenge key -> Discord role)
// ============================================================================

export const roleConfigs = pgTable("role_configs", {
  id: serial("id").primaryKey(),
  communityId: varchar("community_id", { length: 32 }).notNull().references(() => communities.id, { onDelete: "cascade" }),
  tierKey: varchar("tier_key", { length: 64 }).notNull(),
  roleId: varchar("role_id", { length: 32 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  communityTierIdx: uniqueIndex("role_configs_community_tier_idx").on(table.communityId, table.tierKey),
}));

export type RoleConfig = typeof roleConfigs.$inferSelect;

// ============================================================================
// COMPLETION EVENTS (outbox consumed by the role-grant dispatcher)
// ============================================================================

export const completionEvents = pgTable("completion_events", {
  id: serial("id").primaryKey(),
  personId: varchar("person_id").notNull().references(() => persons.id, { onDelete: "cascade" }),
  communityId: varchar("community_id", { length: 32 }).notNull().references(() => communities.id, { onDelete: "cascade" }),
  definitionId: integer("definition_id").notNull(),
  value: integer("value").notNull(),
  completedAt: timestamp("completed_at", { withTimezone: true }).notNull(),
  attempts: integer("attempts").notNull().default(0),
  lastError: text("last_error"),
  dispatchedAt: timestamp("dispatched_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  pendingIdx: index("completion_events_pending_idx").on(table.dispatchedAt, table.id),
}));

export type CompletionEvent = typeof completionEvents.$inferSelect;

// ============================================================================
// CATALOG SNAPSHOTS (global, last fetched statistics per person)
// ============================================================================

export const catalogSnapshots = pgTable("catalog_snapshots", {
  personId: varchar("person_id").primaryKey().references(() => persons.id, { onDelete: "cascade" }),
  anilistUsername: text("anilist_username").notNull(),
  payload: json("payload").$type<CatalogSnapshot>().notNull(),
  fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull(),
});

export type StoredCatalogSnapshot = typeof catalogSnapshots.$inferSelect;

// ============================================================================
// RECOMMENDATIONS (results of an external scorer, stored per person)
// ============================================================================

export const recommendations = pgTable("recommendations", {
  id: serial("id").primaryKey(),
  personId: varchar("person_id").notNull().references(() => persons.id, { onDelete: "cascade" }),
  mediaId: integer("media_id").notNull(),
  mediaType: varchar("media_type", { length: 8 }).$type<"ANIME" | "MANGA">().notNull(),
  title: text("title").notNull(),
  score: real("score").notNull(),
  source: varchar("source", { length: 64 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  personScoreIdx: index("recommendations_person_score_idx").on(table.personId, table.score),
}));

export const insertRecommendationSchema = createInsertSchema(recommendations, {
  mediaId: z.number().int().positive(),
  mediaType: z.enum(["ANIME", "MANGA"]),
  title: z.string().min(1),
  score: z.number(),
  source: z.string().min(1).max(64),
}).omit({ id: true, personId: true, createdAt: true });
export type InsertRecommendation = z.infer<typeof insertRecommendationSchema>;
export type Recommendation = typeof recommendations.$inferSelect;
