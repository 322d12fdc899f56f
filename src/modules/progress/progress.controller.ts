import type { Request, Response } from "express";
import {
  adminScopeFor,
  discordIdParam,
  guildIdParam,
  memberScopeFor,
  parseIdParam,
  sendError,
} from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

export function createProgressController(services: LedgerServices) {
  const { ledger, identity, dispatcher } = services;

  async function getMemberProgress(req: Request, res: Response) {
    try {
      const token = await memberScopeFor(services, discordIdParam(req), guildIdParam(req, services));
      const progress = await ledger.getProgress(token);
      res.json({ progress });
    } catch (error) {
      sendError(res, "ProgressLedger", error);
    }
  }

  async function resetChallenge(req: Request, res: Response) {
    try {
      const definitionId = parseIdParam(req.params.definitionId, "definitionId");
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      const result = await ledger.resetProgress(admin, definitionId);
      res.json(result);
    } catch (error) {
      sendError(res, "ProgressLedger", error);
    }
  }

  async function removeMemberProgress(req: Request, res: Response) {
    try {
      const member = await identity.findByDiscordId(discordIdParam(req));
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      const result = await ledger.removeMemberProgress(admin, member.id);
      res.json(result);
    } catch (error) {
      sendError(res, "ProgressLedger", error);
    }
  }

  async function runDispatch(_req: Request, res: Response) {
    try {
      const summary = await dispatcher.drain();
      res.json({ summary });
    } catch (error) {
      sendError(res, "CompletionDispatcher", error);
    }
  }

  function getDispatchStatus(_req: Request, res: Response) {
    res.json(dispatcher.getStatus());
  }

  return { getMemberProgress, resetChallenge, removeMemberProgress, runDispatch, getDispatchStatus };
}
