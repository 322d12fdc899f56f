import { Router } from "express";
import type { RouteGuards } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { createLeaderboardController } from "./leaderboard.controller.js";

export function createLeaderboardRoutes(services: LedgerServices, guards: RouteGuards): Router {
  const controller = createLeaderboardController(services);
  const router = Router();

  router.get("/guilds/:guildId/leaderboard", guards.requirePublic, controller.getGuildLeaderboard);
  router.get("/persons/:discordId/leaderboard", guards.requirePublic, controller.getCrossGuildLeaderboard);

  return router;
}
