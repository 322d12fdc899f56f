import type { ZodError } from "zod";

export const ErrorKind = {
  UnknownCommunity: "UNKNOWN_COMMUNITY",
  AlreadyLinked: "ALREADY_LINKED",
  HandleNotFound: "HANDLE_NOT_FOUND",
  AlreadySelected: "ALREADY_SELECTED",
  NotFound: "NOT_FOUND",
  /** Never thrown: a regressing observation is reported as the `stale` outcome. */
  StaleWrite: "STALE_WRITE",
  NotLinked: "NOT_LINKED",
  NotPermitted: "NOT_PERMITTED",
  InvalidInput: "INVALID_INPUT",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export class LedgerError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "LedgerError";
    this.kind = kind;
    this.details = details;
  }
}

export function isLedgerError(error: unknown, kind?: ErrorKind): error is LedgerError {
  return error instanceof LedgerError && (kind === undefined || error.kind === kind);
}

/** First validation issue as an InvalidInput error. */
export function invalidInput(error: ZodError): LedgerError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return new LedgerError(ErrorKind.InvalidInput, `${where}${issue?.message ?? "invalid input"}`);
}
