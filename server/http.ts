import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { ErrorKind, LedgerError, invalidInput, isLedgerError } from "../src/errors/ledgerError.js";
import type { AdminScopeToken, ScopeToken } from "../src/modules/scope/scope.service.js";
import type { LedgerServices } from "./services.js";

const ERROR_RESPONSES: Record<ErrorKind, { status: number; code: string }> = {
  [ErrorKind.UnknownCommunity]: { status: 404, code: "NOT_CONFIGURED" },
  [ErrorKind.AlreadyLinked]: { status: 409, code: "ALREADY_LINKED" },
  [ErrorKind.HandleNotFound]: { status: 404, code: "HANDLE_NOT_FOUND" },
  [ErrorKind.AlreadySelected]: { status: 409, code: "ALREADY_SELECTED" },
  [ErrorKind.NotFound]: { status: 404, code: "NOT_FOUND" },
  [ErrorKind.StaleWrite]: { status: 409, code: "STALE_WRITE" },
  [ErrorKind.NotLinked]: { status: 409, code: "NOT_LINKED" },
  [ErrorKind.NotPermitted]: { status: 403, code: "NOT_PERMITTED" },
  [ErrorKind.InvalidInput]: { status: 400, code: "INVALID_INPUT" },
};

/** Writes the `{ success: false, error }` body for any thrown value. */
export function sendError(res: Response, tag: string, error: unknown): void {
  if (isLedgerError(error)) {
    const { status, code } = ERROR_RESPONSES[error.kind];
    res.status(status).json({ success: false, error: { code, message: error.message } });
    return;
  }

  console.error(`[${tag}] Unhandled error:`, error);
  const message = error instanceof Error ? error.message : "Internal error";
  res.status(500).json({ success: false, error: { code: "INTERNAL_ERROR", message } });
}

export const snowflakeSchema = z.string().trim().regex(/^\d{1,32}$/, "must be a Discord snowflake");

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw invalidInput(parsed.error);
  return parsed.data;
}

export function parseIdParam(value: string | undefined, name: string): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id) || id <= 0) {
    throw new LedgerError(ErrorKind.InvalidInput, `${name} must be a positive integer`);
  }
  return id;
}

export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

export function queryNumber(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** The acting Discord user of an admin request, from the body or the query string. */
export function actorDiscordId(req: Request): string {
  const fromBody: unknown = req.body && typeof req.body === "object" ? Reflect.get(req.body, "actorDiscordId") : undefined;
  const parsed = snowflakeSchema.safeParse(fromBody ?? queryString(req, "actorDiscordId"));
  if (!parsed.success) {
    throw new LedgerError(ErrorKind.InvalidInput, "actorDiscordId is required and must be a Discord snowflake");
  }
  return parsed.data;
}

export interface RouteGuards {
  requirePublic: RequestHandler;
  requireAdmin: RequestHandler;
}

/** `primary` names the configured primary guild. */
export function guildIdParam(req: Request, services: LedgerServices): string {
  const raw = req.params.guildId;
  if (!raw || raw === "primary") return services.resolver.resolveCommunityId(undefined);
  const parsed = snowflakeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError(ErrorKind.InvalidInput, "guildId must be a Discord snowflake");
  }
  return parsed.data;
}

export function discordIdParam(req: Request): string {
  const parsed = snowflakeSchema.safeParse(req.params.discordId);
  if (!parsed.success) {
    throw new LedgerError(ErrorKind.InvalidInput, "discordId must be a Discord snowflake");
  }
  return parsed.data;
}

/**
 * Admin routes are only reachable with the admin API key, whose holder has
 * already checked the actor's guild permissions.
 */
export async function adminScopeFor(req: Request, services: LedgerServices, communityId: string): Promise<AdminScopeToken> {
  const person = await services.identity.registerPerson(actorDiscordId(req));
  return services.resolver.adminScope(person.id, communityId, { isAdministrator: true, autoRegister: true });
}

export async function memberScopeFor(services: LedgerServices, discordId: string, communityId: string): Promise<ScopeToken> {
  const person = await services.identity.findByDiscordId(discordId);
  return services.resolver.scope(person.id, communityId);
}
