import type { Request, Response } from "express";
import { z } from "zod";
import { guildIdParam, parseBody, sendError, snowflakeSchema } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

const registerGuildSchema = z.object({
  guildId: snowflakeSchema,
  name: z.string().trim().min(1).max(100),
});

export function createScopeController(services: LedgerServices) {
  const { resolver } = services;

  async function registerGuild(req: Request, res: Response) {
    try {
      const { guildId, name } = parseBody(registerGuildSchema, req.body);
      const community = await resolver.registerCommunity(guildId, name);
      res.status(201).json({ community });
    } catch (error) {
      sendError(res, "ScopeResolver", error);
    }
  }

  async function removeGuild(req: Request, res: Response) {
    try {
      await resolver.removeCommunity(guildIdParam(req, services));
      res.json({ success: true });
    } catch (error) {
      sendError(res, "ScopeResolver", error);
    }
  }

  return { registerGuild, removeGuild };
}
