import type { Request, Response } from "express";
import { z } from "zod";
import { discordIdParam, parseBody, queryNumber, sendError } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

const saveRecommendationsSchema = z.object({ items: z.array(z.unknown()) });

export function createRecommendationsController(services: LedgerServices) {
  const { recommendations, identity } = services;

  async function listRecommendations(req: Request, res: Response) {
    try {
      const person = await identity.findByDiscordId(discordIdParam(req));
      const items = await recommendations.listRecommendations(person.id, queryNumber(req, "limit"));
      res.json({ recommendations: items });
    } catch (error) {
      sendError(res, "Recommendations", error);
    }
  }

  async function saveRecommendations(req: Request, res: Response) {
    try {
      const { items } = parseBody(saveRecommendationsSchema, req.body);
      const person = await identity.findByDiscordId(discordIdParam(req));
      const stored = await recommendations.saveRecommendations(person.id, items);
      res.json({ recommendations: stored });
    } catch (error) {
      sendError(res, "Recommendations", error);
    }
  }

  return { listRecommendations, saveRecommendations };
}
