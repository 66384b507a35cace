import type { NextFunction, Request, Response } from "express";
import { componentLogger } from "../utils/logger";

const log = componentLogger("http");

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const started = process.hrtime.bigint();

  res.on("finish", () => {
    const ms = Number(process.hrtime.bigint() - started) / 1e6;
    const entry = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      ms: Math.round(ms * 10) / 10,
    };
    if (res.statusCode >= 500) log.error(entry, "request failed");
    else log.info(entry, "request completed");
  });

  next();
}
