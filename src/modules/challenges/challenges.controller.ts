import type { Request, Response } from "express";
import { z } from "zod";
import { adminScopeFor, guildIdParam, parseBody, parseIdParam, queryString, sendError } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

const selectChallengeSchema = z.object({ definitionId: z.coerce.number().int().positive() }).passthrough();

const ROUTING_FIELDS = new Set(["actorDiscordId", "definitionId"]);

/** The request body minus the fields that only route the request. */
function overridesFrom(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== "object") return {};
  return Object.fromEntries(Object.entries(body).filter(([field]) => !ROUTING_FIELDS.has(field)));
}

export function createChallengesController(services: LedgerServices) {
  const { catalog } = services;

  async function listDefinitions(req: Request, res: Response) {
    try {
      const definitions = await catalog.listDefinitions({ activeOnly: queryString(req, "activeOnly") === "true" });
      res.json({ definitions });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function getDefinition(req: Request, res: Response) {
    try {
      const definition = await catalog.getDefinition(parseIdParam(req.params.definitionId, "definitionId"));
      res.json({ definition });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function createDefinition(req: Request, res: Response) {
    try {
      const definition = await catalog.createDefinition(req.body);
      res.status(201).json({ definition });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function correctDefinition(req: Request, res: Response) {
    try {
      const definition = await catalog.correctDefinition(parseIdParam(req.params.definitionId, "definitionId"), req.body);
      res.json({ definition });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function listSelections(req: Request, res: Response) {
    try {
      const selections = await catalog.listSelections(guildIdParam(req, services));
      res.json({ selections });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function selectChallenge(req: Request, res: Response) {
    try {
      const { definitionId } = parseBody(selectChallengeSchema, req.body);
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      const selection = await catalog.selectChallenge(admin, definitionId, overridesFrom(req.body));
      res.status(201).json({ selection });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function updateOverrides(req: Request, res: Response) {
    try {
      const definitionId = parseIdParam(req.params.definitionId, "definitionId");
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      const selection = await catalog.updateOverrides(admin, definitionId, overridesFrom(req.body));
      res.json({ selection });
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  async function removeSelection(req: Request, res: Response) {
    try {
      const definitionId = parseIdParam(req.params.definitionId, "definitionId");
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      const result = await catalog.removeSelection(admin, definitionId);
      res.json(result);
    } catch (error) {
      sendError(res, "ChallengeCatalog", error);
    }
  }

  return {
    listDefinitions,
    getDefinition,
    createDefinition,
    correctDefinition,
    listSelections,
    selectChallenge,
    updateOverrides,
    removeSelection,
  };
}
