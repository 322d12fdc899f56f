import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createSyncController } from "./sync.controller.js";

export function createSyncRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createSyncController(services);
  const router = Router();

  router.post("/guilds/:guildId/sync", guards.requirePublic, controller.syncMember);

  return router;
}
