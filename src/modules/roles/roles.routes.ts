import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createRolesController } from "./roles.controller.js";

export function createRolesRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createRolesController(services);
  const router = Router();

  router.get("/guilds/:guildId/roles", guards.requirePublic, controller.listRoles);
  router.put("/guilds/:guildId/roles/:tierKey", guards.requireAdmin, controller.setRole);
  router.delete("/guilds/:guildId/roles/:tierKey", guards.requireAdmin, controller.removeRole);

  return router;
}
