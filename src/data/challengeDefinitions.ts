import { readFileSync } from "node:fs";
import { z } from "zod";
import { insertChallengeDefinitionSchema, type InsertChallengeDefinition } from "../../shared/schema.js";

const SEED_FILE = new URL("./challengeDefinitions.json", import.meta.url);

const seedFileSchema = z.array(insertChallengeDefinitionSchema);

/** Milestone challenges offered to every community out of the box. */
export function loadChallengeSeeds(file: URL = SEED_FILE): InsertChallengeDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  const parsed = seedFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid challenge seed file ${file.pathname}: ${issue?.path.join(".")} ${issue?.message}`);
  }

  const keys = new Set<string>();
  for (const seed of parsed.data) {
    if (keys.has(seed.key)) {
      throw new Error(`Duplicate challenge key ${seed.key} in ${file.pathname}`);
    }
    keys.add(seed.key);
  }
  return parsed.data;
}
