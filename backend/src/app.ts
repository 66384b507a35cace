import cors from "cors";
import express from "express";
import config from "./config/env";
import { errorHandler, notFound } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";
import routes from "./routes";
import type { AttendanceService } from "./services/attendance.service";

export function createApp(service: AttendanceService, corsOrigin: string = config.CORS_ORIGIN) {
  const app = express();

  const allowedOrigins = corsOrigin
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  app.use(
    cors({
      origin: allowedOrigins,
      credentials: true,
    })
  );

  app.use(express.json({ limit: "5mb" }));
  app.use(requestLogger);
  app.use(routes(service));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
