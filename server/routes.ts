import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { LedgerConfig } from "./config.js";
import { sendError, type RouteGuards } from "./http.js";
import { requireApiKey } from "./middleware/apiKeyAuth.js";
import { ledgerCors } from "./middleware/cors.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import type { LedgerServices } from "./services.js";
import { createChallengesRoutes } from "../src/modules/challenges/challenges.routes.js";
import { createIdentityRoutes } from "../src/modules/identity/identity.routes.js";
import { createLeaderboardRoutes } from "../src/modules/leaderboards/leaderboard.routes.js";
import { createProgressRoutes } from "../src/modules/progress/progress.routes.js";
import { createRecommendationsRoutes } from "../src/modules/recommendations/recommendations.routes.js";
import { createRolesRoutes } from "../src/modules/roles/roles.routes.js";
import { createScopeRoutes } from "../src/modules/scope/scope.routes.js";
import { createSyncRoutes } from "../src/modules/sync/sync.routes.js";

export function registerRoutes(app: Express, services: LedgerServices, config: LedgerConfig): void {
  const guards: RouteGuards = {
    requirePublic: requireApiKey(config.publicApiKey, "public"),
    requireAdmin: requireApiKey(config.adminApiKey, "admin"),
  };

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", dispatcher: services.dispatcher.getStatus() });
  });

  app.use("/api", ledgerCors(config.allowedOrigins), createRateLimiter());
  app.use("/api", createScopeRoutes(services, guards));
  app.use("/api", createIdentityRoutes(services, guards));
  app.use("/api", createChallengesRoutes(services, guards));
  app.use("/api", createProgressRoutes(services, guards));
  app.use("/api", createSyncRoutes(services, guards));
  app.use("/api", createLeaderboardRoutes(services, guards));
  app.use("/api", createRolesRoutes(services, guards));
  app.use("/api", createRecommendationsRoutes(services, guards));

  app.use("/api", (req: Request, res: Response) => {
    res.status(404).json({ success: false, error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } });
  });
}

export function createApp(services: LedgerServices, config: LedgerConfig): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));
  registerRoutes(app, services, config);

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, error: { code: "INVALID_INPUT", message: "Request body is not valid JSON" } });
      return;
    }
    sendError(res, "API", error);
  });
  return app;
}
