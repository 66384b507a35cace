import { Router } from "express";
import { systemController } from "../controllers/system.controller";
import type { AttendanceService } from "../services/attendance.service";
import { handle } from "../utils/http";
import attendanceRoutes from "./attendance.routes";
import employeesRoutes from "./employees.routes";

export default function routes(service: AttendanceService) {
  const system = systemController(service);
  const router = Router();

  // system
  router.get("/health", handle(system.health));
  router.get("/shifts", handle(system.listShifts));
  router.post("/admin/refresh", handle(system.refresh));

  // core resources
  router.use("/employees", employeesRoutes(service));
  router.use("/attendance", attendanceRoutes(service));

  return router;
}
