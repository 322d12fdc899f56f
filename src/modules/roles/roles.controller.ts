import type { Request, Response } from "express";
import { z } from "zod";
import { adminScopeFor, guildIdParam, parseBody, sendError } from "../../../server/http.js";
import type { LedgerServices } from "../../../server/services.js";

const setRoleSchema = z.object({ roleId: z.string() }).passthrough();

export function createRolesController(services: LedgerServices) {
  const { roles } = services;

  async function listRoles(req: Request, res: Response) {
    try {
      const mapping = await roles.listRoles(guildIdParam(req, services));
      res.json({ roles: mapping });
    } catch (error) {
      sendError(res, "RoleConfig", error);
    }
  }

  async function setRole(req: Request, res: Response) {
    try {
      const { roleId } = parseBody(setRoleSchema, req.body);
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      const role = await roles.setRole(admin, req.params.tierKey, roleId);
      res.json({ role });
    } catch (error) {
      sendError(res, "RoleConfig", error);
    }
  }

  async function removeRole(req: Request, res: Response) {
    try {
      const admin = await adminScopeFor(req, services, guildIdParam(req, services));
      await roles.removeRole(admin, req.params.tierKey);
      res.json({ success: true });
    } catch (error) {
      sendError(res, "RoleConfig", error);
    }
  }

  return { listRoles, setRole, removeRole };
}
