import { Router } from "express";
import { employeesController } from "../controllers/employees.controller";
import type { AttendanceService } from "../services/attendance.service";
import { handle } from "../utils/http";

export default function employeesRoutes(service: AttendanceService) {
  const c = employeesController(service);
  const router = Router();

  router.get("/", handle(c.getEmployees));
  router.post("/", handle(c.registerEmployee));
  router.get("/:id/history", handle(c.getHistory));
  router.get("/:id/summary", handle(c.getSummary));

  return router;
}
