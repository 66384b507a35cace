import type { Request, RequestHandler, Response } from "express";
import type { ReasonCode, Rejection } from "../types/attendance";

const STATUS_BY_REASON: Record<ReasonCode, number> = {
  InvalidInput: 400,
  InvalidEmbedding: 422,
  ExtractionFailed: 422,
  UnknownEmployee: 404,
  DuplicateEmployee: 409,
  NoMatch: 401,
  ShiftMismatch: 403,
  AlreadyRegisteredToday: 409,
  ConfigurationError: 500,
  PersistenceFailure: 503,
  InternalError: 500,
};

export function statusForReason(reason: ReasonCode): number {
  return STATUS_BY_REASON[reason];
}

export function sendRejection(res: Response, rejection: Rejection) {
  return res.status(statusForReason(rejection.reason)).json(rejection);
}

/** Writes a facade outcome: rejections by reason, successes with `okStatus`. */
export function sendOutcome(res: Response, outcome: { ok: true } | Rejection, okStatus = 200) {
  if (!outcome.ok) return sendRejection(res, outcome);
  return res.status(okStatus).json(outcome);
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

/** Forwards a rejected handler promise to the error middleware. */
export function handle(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === "object" && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {};
}

/** Decodes a base64 image field, with or without a data-URL prefix. */
export function decodeImage(value: string): Buffer {
  const comma = value.startsWith("data:") ? value.indexOf(",") : -1;
  return Buffer.from(comma >= 0 ? value.slice(comma + 1) : value, "base64");
}
