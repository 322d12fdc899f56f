import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createRecommendationsController } from "./recommendations.controller.js";

export function createRecommendationsRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createRecommendationsController(services);
  const router = Router();

  router.get("/persons/:discordId/recommendations", guards.requirePublic, controller.listRecommendations);
  router.put("/persons/:discordId/recommendations", guards.requireAdmin, controller.saveRecommendations);

  return router;
}
