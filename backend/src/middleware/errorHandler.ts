import type { NextFunction, Request, Response } from "express";
import { componentLogger } from "../utils/logger";
import { sendRejection } from "../utils/http";

const log = componentLogger("http");

export function notFound(req: Request, res: Response) {
  return res.status(404).json({
    ok: false,
    reason: "InvalidInput",
    message: `No route for ${req.method} ${req.path}`,
  });
}

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    (err.type === "entity.parse.failed" || err.type === "entity.too.large")
  );
}

// Express recognizes error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    return sendRejection(res, {
      ok: false,
      reason: "InvalidInput",
      message: "Request body is not valid JSON or is too large",
    });
  }

  log.error({ err, method: req.method, path: req.originalUrl }, "unhandled request error");
  if (res.headersSent) return;
  return sendRejection(res, {
    ok: false,
    reason: "InternalError",
    message: "Internal server error",
  });
}
