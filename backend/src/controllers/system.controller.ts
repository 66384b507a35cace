import type { Request, Response } from "express";
import type { AttendanceService } from "../services/attendance.service";
import { sendOutcome } from "../utils/http";

export function systemController(service: AttendanceService) {
  async function health(_req: Request, res: Response) {
    return res.json({ ok: true, employees: service.employeeCount });
  }

  async function listShifts(_req: Request, res: Response) {
    return res.json({ ok: true, shifts: service.listShifts() });
  }

  async function refresh(_req: Request, res: Response) {
    return sendOutcome(res, await service.refresh());
  }

  return { health, listShifts, refresh };
}
