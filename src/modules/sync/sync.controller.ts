import type { Request, Response } from "express";
import { z } from "zod";
import { guildIdParam, memberScopeFor, parseBody, sendError, snowflakeSchema } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

const syncRequestSchema = z.object({
  discordId: snowflakeSchema,
  force: z.boolean().optional(),
});

export function createSyncController(services: LedgerServices) {
  async function syncMember(req: Request, res: Response) {
    try {
      const { discordId, force } = parseBody(syncRequestSchema, req.body);
      const token = await memberScopeFor(services, discordId, guildIdParam(req, services));
      const result = await services.sync.syncPerson(token, { force });

      res.json({
        anilistUsername: result.anilistUsername,
        cached: result.cached,
        fetchedAt: result.fetchedAt,
        records: result.records.map(({ record, outcome, completedNow, target }) => ({
          definitionId: record.definitionId,
          value: record.value,
          target,
          completedAt: record.completedAt,
          outcome,
          completedNow,
        })),
      });
    } catch (error) {
      sendError(res, "Sync", error);
    }
  }

  return { syncMember };
}
