import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createProgressController } from "./progress.controller.js";

export function createProgressRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createProgressController(services);
  const router = Router();

  router.get("/guilds/:guildId/progress/:discordId", guards.requirePublic, controller.getMemberProgress);
  router.delete("/guilds/:guildId/members/:discordId/progress", guards.requireAdmin, controller.removeMemberProgress);
  router.post("/guilds/:guildId/challenges/:definitionId/reset", guards.requireAdmin, controller.resetChallenge);

  router.post("/dispatch/run", guards.requireAdmin, controller.runDispatch);
  router.get("/dispatch/status", guards.requireAdmin, controller.getDispatchStatus);

  return router;
}
