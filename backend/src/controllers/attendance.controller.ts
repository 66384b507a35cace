import type { Request, Response } from "express";
import type { AttendanceService } from "../services/attendance.service";
import { bodyOf, decodeImage, sendOutcome, sendRejection, statusForReason } from "../utils/http";
import {
  describeIssues,
  feedQuerySchema,
  imageFieldSchema,
} from "../validators/attendance.validators";

export function attendanceController(service: AttendanceService) {
  async function validateClaim(req: Request, res: Response) {
    const body = bodyOf(req);
    const result = service.validateClaim({ employeeId: body.employeeId, shift: body.shift });
    if (!result.valid) return res.status(statusForReason(result.reason)).json(result);
    return res.json(result);
  }

  async function recognize(req: Request, res: Response) {
    const body = bodyOf(req);
    // the match threshold is deployment configuration, never taken from the caller
    const claim = { employeeId: body.employeeId, shift: body.shift };

    if (body.image === undefined) {
      const outcome = await service.recognizeAndRecord({ ...claim, embedding: body.embedding });
      return sendOutcome(res, outcome, 201);
    }

    const image = imageFieldSchema.safeParse(body);
    if (!image.success) {
      return sendRejection(res, { ok: false, reason: "InvalidInput", message: describeIssues(image.error) });
    }
    const outcome = await service.recognizeFromImage(claim, decodeImage(image.data.image));
    return sendOutcome(res, outcome, 201);
  }

  async function identify(req: Request, res: Response) {
    const body = bodyOf(req);
    const outcome = await service.identifyEmployee({ embedding: body.embedding });
    return sendOutcome(res, outcome);
  }

  async function attendanceEvents(req: Request, res: Response) {
    const query = feedQuerySchema.safeParse({
      afterSeq: req.query.afterSeq ?? req.query.after_seq,
      limit: req.query.limit,
      waitMs: req.query.waitMs ?? req.query.wait_ms,
    });
    if (!query.success) {
      return sendRejection(res, { ok: false, reason: "InvalidInput", message: describeIssues(query.error) });
    }

    const ac = new AbortController();
    res.on("close", () => ac.abort());

    const page = await service.feed.poll({ ...query.data, signal: ac.signal });

    // client went away while we were waiting
    if (ac.signal.aborted) return;
    return res.json({ ok: true, ...page });
  }

  return { validateClaim, recognize, identify, attendanceEvents };
}
