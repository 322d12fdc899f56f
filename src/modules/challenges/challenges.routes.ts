import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createChallengesController } from "./challenges.controller.js";

export function createChallengesRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createChallengesController(services);
  const router = Router();

  // Global catalog
  router.get("/challenges", guards.requirePublic, controller.listDefinitions);
  router.get("/challenges/:definitionId", guards.requirePublic, controller.getDefinition);
  router.post("/challenges", guards.requireAdmin, controller.createDefinition);
  router.patch("/challenges/:definitionId", guards.requireAdmin, controller.correctDefinition);

  // Per-guild selections
  router.get("/guilds/:guildId/challenges", guards.requirePublic, controller.listSelections);
  router.post("/guilds/:guildId/challenges", guards.requireAdmin, controller.selectChallenge);
  router.patch("/guilds/:guildId/challenges/:definitionId", guards.requireAdmin, controller.updateOverrides);
  router.delete("/guilds/:guildId/challenges/:definitionId", guards.requireAdmin, controller.removeSelection);

  return router;
}
