import type { Request, Response } from "express";
import { z } from "zod";
import { discordIdParam, parseBody, sendError, snowflakeSchema } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

const registerPersonSchema = z.object({ discordId: snowflakeSchema });
const linkProfileSchema = z.object({ username: z.string().trim().min(1).max(64) });

export function createIdentityController(services: LedgerServices) {
  const { identity } = services;

  async function registerPerson(req: Request, res: Response) {
    try {
      const { discordId } = parseBody(registerPersonSchema, req.body);
      const person = await identity.registerPerson(discordId);
      res.status(201).json({ person });
    } catch (error) {
      sendError(res, "Identity", error);
    }
  }

  async function getProfile(req: Request, res: Response) {
    try {
      const person = await identity.findByDiscordId(discordIdParam(req));
      const profile = await identity.getProfile(person.id);
      res.json({ profile });
    } catch (error) {
      sendError(res, "Identity", error);
    }
  }

  async function linkProfile(req: Request, res: Response) {
    try {
      const { username } = parseBody(linkProfileSchema, req.body);
      const person = await identity.registerPerson(discordIdParam(req));
      const profile = await identity.linkProfile(person.id, username);
      res.json({ profile });
    } catch (error) {
      sendError(res, "Identity", error);
    }
  }

  async function unlinkProfile(req: Request, res: Response) {
    try {
      const person = await identity.findByDiscordId(discordIdParam(req));
      await identity.unlinkProfile(person.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, "Identity", error);
    }
  }

  return { registerPerson, getProfile, linkProfile, unlinkProfile };
}
