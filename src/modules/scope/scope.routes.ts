import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createScopeController } from "./scope.controller.js";

export function createScopeRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createScopeController(services);
  const router = Router();

  router.post("/guilds", guards.requireAdmin, controller.registerGuild);
  router.delete("/guilds/:guildId", guards.requireAdmin, controller.removeGuild);

  return router;
}
