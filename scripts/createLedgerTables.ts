import { sql } from 'drizzle-orm';
import { loadConfig } from '../server/config.js';
import { connectDatabase } from '../server/db.js';

async function createLedgerTables() {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL must be set to create tables');
  }
  const { pool, db } = connectDatabase(config.databaseUrl);
  console.log('Creating ledger tables...');

  try {
    await db.execute(sql`
      CREATE EXTENSION IF NOT EXISTS pgcrypto;

      CREATE TABLE IF NOT EXISTS persons (
        id VARCHAR PRIMARY KEY DEFAULT gen_random_uuid(),
        discord_id VARCHAR(32) NOT NULL,
        anilist_username TEXT,
        anilist_id INTEGER,
        linked_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
      CREATE UNIQUE INDEX IF NOT EXISTS persons_discord_id_idx ON persons(discord_id);
      CREATE UNIQUE INDEX IF NOT EXISTS persons_anilist_username_idx ON persons(lower(anilist_username));

      CREATE TABLE IF NOT EXISTS communities (
        id VARCHAR(32) PRIMARY KEY,
        name TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS community_members (
        community_id VARCHAR(32) NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
        person_id VARCHAR NOT NULL REFERENCES persons(id) ON DELETE CASCADE,
        joined_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (community_id, person_id)
      );
      CREATE INDEX IF NOT EXISTS community_members_person_idx ON community_members(person_id);

      CREATE TABLE IF NOT EXISTS challenge_definitions (
        id SERIAL PRIMARY KEY,
        key VARCHAR(64) NOT NULL,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        category VARCHAR(64) NOT NULL,
        tier VARCHAR(16) NOT NULL,
        metric JSON NOT NULL,
        target INTEGER NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        sort_order INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
      CREATE UNIQUE INDEX IF NOT EXISTS challenge_definitions_key_idx ON challenge_definitions(key);
      CREATE INDEX IF NOT EXISTS challenge_definitions_category_idx ON challenge_definitions(category);

      CREATE TABLE IF NOT EXISTS community_challenge_selections (
        id SERIAL PRIMARY KEY,
        community_id VARCHAR(32) NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
        definition_id INTEGER NOT NULL REFERENCES challenge_definitions(id),
        custom_target INTEGER,
        reward_role_id VARCHAR(32),
        selected_by VARCHAR REFERENCES persons(id) ON DELETE SET NULL,
        selected_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT community_challenge_selections_community_definition_uniq UNIQUE (community_id, definition_id)
      );
      CREATE INDEX IF NOT EXISTS community_challenge_selections_selected_at_idx
        ON community_challenge_selections(community_id, selected_at);

      CREATE TABLE IF NOT EXISTS progress_records (
        id SERIAL PRIMARY KEY,
        person_id VARCHAR NOT NULL REFERENCES persons(id) ON DELETE CASCADE,
        community_id VARCHAR(32) NOT NULL,
        definition_id INTEGER NOT NULL,
        value INTEGER NOT NULL DEFAULT 0,
        completed_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT progress_records_selection_fk FOREIGN KEY (community_id, definition_id)
          REFERENCES community_challenge_selections(community_id, definition_id) ON DELETE CASCADE
      );
      CREATE UNIQUE INDEX IF NOT EXISTS progress_records_triple_idx
        ON progress_records(person_id, community_id, definition_id);
      CREATE INDEX IF NOT EXISTS progress_records_community_definition_idx
        ON progress_records(community_id, definition_id);

      CREATE TABLE IF NOT EXISTS role_configs (
        id SERIAL PRIMARY KEY,
        community_id VARCHAR(32) NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
        tier_key VARCHAR(64) NOT NULL,
        role_id VARCHAR(32) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
      CREATE UNIQUE INDEX IF NOT EXISTS role_configs_community_tier_idx ON role_configs(community_id, tier_key);

      CREATE TABLE IF NOT EXISTS completion_events (
        id SERIAL PRIMARY KEY,
        person_id VARCHAR NOT NULL REFERENCES persons(id) ON DELETE CASCADE,
        community_id VARCHAR(32) NOT NULL REFERENCES communities(id) ON DELETE CASCADE,
        definition_id INTEGER NOT NULL,
        value INTEGER NOT NULL,
        completed_at TIMESTAMPTZ NOT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        dispatched_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
      CREATE INDEX IF NOT EXISTS completion_events_pending_idx ON completion_events(dispatched_at, id);

      CREATE TABLE IF NOT EXISTS catalog_snapshots (
        person_id VARCHAR PRIMARY KEY REFERENCES persons(id) ON DELETE CASCADE,
        anilist_username TEXT NOT NULL,
        payload JSON NOT NULL,
        fetched_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS recommendations (
        id SERIAL PRIMARY KEY,
        person_id VARCHAR NOT NULL REFERENCES persons(id) ON DELETE CASCADE,
        media_id INTEGER NOT NULL,
        media_type VARCHAR(8) NOT NULL,
        title TEXT NOT NULL,
        score REAL NOT NULL,
        source VARCHAR(64) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
      CREATE INDEX IF NOT EXISTS recommendations_person_score_idx ON recommendations(person_id, score);
    `);

    console.log('✅ Ledger tables created');
  } finally {
    await pool.end();
  }
}

createLedgerTables().catch((error: unknown) => {
  console.error('❌ Error creating ledger tables:', error);
  process.exit(1);
});
