import { Router } from "express";
import { attendanceController } from "../controllers/attendance.controller";
import type { AttendanceService } from "../services/attendance.service";
import { handle } from "../utils/http";

export default function attendanceRoutes(service: AttendanceService) {
  const c = attendanceController(service);
  const router = Router();

  router.post("/validate", handle(c.validateClaim));
  router.post("/recognize", handle(c.recognize));
  router.post("/identify", handle(c.identify));
  // long-poll feed of recorded events
  router.get("/events", handle(c.attendanceEvents));

  return router;
}
