import type { Request, Response } from "express";
import type { AttendanceService } from "../services/attendance.service";
import { bodyOf, decodeImage, sendOutcome, sendRejection } from "../utils/http";
import { describeIssues, imageFieldSchema } from "../validators/attendance.validators";

export function employeesController(service: AttendanceService) {
  async function getEmployees(_req: Request, res: Response) {
    return res.json(service.listEmployees());
  }

  // body carries either `embedding` or a base64 `image` for the AI service
  async function registerEmployee(req: Request, res: Response) {
    const body = bodyOf(req);
    const fields = { id: body.id, area: body.area, role: body.role, shift: body.shift };

    if (body.image === undefined) {
      const outcome = await service.registerEmployee({ ...fields, embedding: body.embedding });
      return sendOutcome(res, outcome, 201);
    }

    const image = imageFieldSchema.safeParse(body);
    if (!image.success) {
      return sendRejection(res, { ok: false, reason: "InvalidInput", message: describeIssues(image.error) });
    }
    const outcome = await service.enrollFromImage(fields, decodeImage(image.data.image));
    return sendOutcome(res, outcome, 201);
  }

  async function getHistory(req: Request, res: Response) {
    const outcome = await service.employeeHistory({
      employeeId: req.params.id,
      from: req.query.from,
      to: req.query.to,
    });
    return sendOutcome(res, outcome);
  }

  async function getSummary(req: Request, res: Response) {
    const outcome = await service.attendanceSummary({
      employeeId: req.params.id,
      year: req.query.year,
      month: req.query.month,
    });
    return sendOutcome(res, outcome);
  }

  return { getEmployees, registerEmployee, getHistory, getSummary };
}
