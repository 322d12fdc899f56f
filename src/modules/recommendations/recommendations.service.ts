import { z } from "zod";
import type { IStorage } from "../../../server/storage/types.js";
import { insertRecommendationSchema, type Recommendation } from "../../../shared/schema.js";
import { ErrorKind, LedgerError, invalidInput } from "../../errors/ledgerError.js";
import { clampLimit } from "../leaderboards/leaderboard.service.js";

const recommendationBatchSchema = z.array(insertRecommendationSchema).max(100);

/** Stores results produced by an external recommendation scorer. Nothing is scored here. */
export class RecommendationService {
  constructor(private readonly storage: IStorage) {}

  async saveRecommendations(personId: string, items: unknown): Promise<Recommendation[]> {
    await this.requirePerson(personId);
    const parsed = recommendationBatchSchema.safeParse(items);
    if (!parsed.success) throw invalidInput(parsed.error);

    const stored = await this.storage.replaceRecommendations(personId, parsed.data);
    console.log(`[Recommendations] Stored ${stored.length} recommendations for person ${personId}`);
    return stored;
  }

  /** Highest score first. */
  async listRecommendations(personId: string, limit?: number): Promise<Recommendation[]> {
    await this.requirePerson(personId);
    return this.storage.listRecommendations(personId, clampLimit(limit));
  }

  private async requirePerson(personId: string): Promise<void> {
    if (!(await this.storage.getPerson(personId))) {
      throw new LedgerError(ErrorKind.NotFound, `Person ${personId} is not registered`);
    }
  }
}
