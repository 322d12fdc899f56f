import type { Request, Response } from "express";
import { discordIdParam, guildIdParam, queryNumber, queryString, sendError } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";
import { ErrorKind, LedgerError } from "../../errors/ledgerError.js";
import { parseLeaderboardMetric } from "./leaderboard.service.js";
import type { LeaderboardMetric } from "./leaderboard.types.js";

function metricQuery(req: Request): LeaderboardMetric {
  const metric = parseLeaderboardMetric(queryString(req, "metric"));
  if (!metric) {
    throw new LedgerError(ErrorKind.InvalidInput, "metric must be completions, points or challenge:<definitionId>");
  }
  return metric;
}

export function createLeaderboardController(services: LedgerServices) {
  const { leaderboards, identity } = services;

  async function getGuildLeaderboard(req: Request, res: Response) {
    try {
      const metric = metricQuery(req);
      const entries = await leaderboards.rank(guildIdParam(req, services), metric, queryNumber(req, "limit"));
      res.json({ metric, entries });
    } catch (error) {
      sendError(res, "Leaderboard", error);
    }
  }

  async function getCrossGuildLeaderboard(req: Request, res: Response) {
    try {
      const metric = metricQuery(req);
      const requester = await identity.findByDiscordId(discordIdParam(req));
      const entries = await leaderboards.rankCrossCommunity(requester.id, metric, queryNumber(req, "limit"));
      res.json({ metric, entries });
    } catch (error) {
      sendError(res, "Leaderboard", error);
    }
  }

  return { getGuildLeaderboard, getCrossGuildLeaderboard };
}
