import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createIdentityController } from "./identity.controller.js";

export function createIdentityRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createIdentityController(services);
  const router = Router();

  router.post("/persons", guards.requirePublic, controller.registerPerson);
  router.get("/persons/:discordId/profile", guards.requirePublic, controller.getProfile);
  router.put("/persons/:discordId/profile", guards.requirePublic, controller.linkProfile);
  router.delete("/persons/:discordId/profile", guards.requirePublic, controller.unlinkProfile);

  return router;
}
