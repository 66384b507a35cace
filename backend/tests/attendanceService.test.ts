import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createAttendanceService,
  type AttendanceService,
  type AttendanceSettings,
} from "../src/services/attendance.service";
import type {
  EmbeddingExtractor,
  ExtractionResult,
} from "../src/services/embeddingExtractor.service";
import { MemoryGateway, employee, fixedClock, sequentialIds, vector, withValueAt } from "./helpers";

const settings: AttendanceSettings = {
  FACE_MATCH_METRIC: "euclidean",
  FACE_MATCH_THRESHOLD: 0.6,
  FACE_MATCH_MODE: "verify",
  REJECT_OUT_OF_WINDOW: true,
  REPEAT_SCAN_WINDOW_SEC: 300,
  TIMEZONE: "UTC",
  ATT_EVENTS_MAX: 100,
};

const newcomer = { id: "E1", area: "Assembly", role: "Operator", shift: "morning" };

describe("AttendanceService", () => {
  let gateway: MemoryGateway;
  let clock: ReturnType<typeof fixedClock>;
  let service: AttendanceService;

  beforeEach(async () => {
    gateway = new MemoryGateway();
    clock = fixedClock("2024-03-04T05:50:00Z");
    service = createAttendanceService(settings, gateway, { clock: clock.now, newId: sequentialIds() });
    await service.refresh();
  });

  describe("registerEmployee", () => {
    it("registers and makes the employee visible without its embedding", async () => {
      const out = await service.registerEmployee({ ...newcomer, shift: "Morning", embedding: vector(0) });
      expect(out).toEqual({
        ok: true,
        employee: { id: "E1", area: "Assembly", role: "Operator", shift: "morning" },
      });
      expect(service.listEmployees()).toEqual([
        { id: "E1", area: "Assembly", role: "Operator", shift: "morning" },
      ]);
      expect(gateway.employees.get("E1")?.registeredAt).toBe("2024-03-04T05:50:00.000Z");
    });

    it("rejects an embedding of the wrong length", async () => {
      const out = await service.registerEmployee({
        id: "E2",
        area: "Assembly",
        role: "Operator",
        shift: "morning",
        embedding: new Array<number>(127).fill(0.1),
      });
      expect(out).toEqual({
        ok: false,
        reason: "InvalidEmbedding",
        message: "embedding must have exactly 128 values (got 127)",
      });
      expect(gateway.employees.size).toBe(0);
    });

    it("rejects an unknown shift", async () => {
      const out = await service.registerEmployee({ ...newcomer, shift: "evening", embedding: vector(0) });
      expect(out).toEqual({ ok: false, reason: "InvalidInput", message: "Unknown shift evening" });
    });

    it("rejects missing fields", async () => {
      const out = await service.registerEmployee({ ...newcomer, area: "", embedding: vector(0) });
      expect(out.ok === false && out.reason).toBe("InvalidInput");
    });

    it("refuses a second registration of the same id", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      const out = await service.registerEmployee({ ...newcomer, embedding: vector(1) });
      expect(out).toEqual({
        ok: false,
        reason: "DuplicateEmployee",
        message: "Employee E1 is already registered",
      });
    });

    it("lets exactly one of two concurrent registrations through", async () => {
      const [a, b] = await Promise.all([
        service.registerEmployee({ ...newcomer, embedding: vector(0) }),
        service.registerEmployee({ ...newcomer, embedding: vector(1) }),
      ]);
      expect([a.ok, b.ok].sort()).toEqual([false, true]);
      expect(gateway.employees.get("E1")?.embedding).toEqual(vector(0));
    });

    it("reports storage trouble as PersistenceFailure", async () => {
      gateway.failing.add("save");
      const out = await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      expect(out).toEqual({
        ok: false,
        reason: "PersistenceFailure",
        message: "Storage unavailable while trying to save the employee",
      });
      expect(service.listEmployees()).toEqual([]);
    });
  });

  describe("recognizeAndRecord", () => {
    beforeEach(async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
    });

    it("records a check-in and publishes it on the feed", async () => {
      const out = await service.recognizeAndRecord({
        employeeId: "E1",
        shift: "morning",
        embedding: vector(0),
        threshold: "0.01",
      });
      expect(out).toMatchObject({ ok: true, eventKind: "check-in", timing: "onTime" });
      expect(service.feed.snapshot(0, 10).events).toMatchObject([
        { seq: 1, employeeId: "E1", kind: "check-in", date: "2024-03-04", time: "05:50:00" },
      ]);
    });

    it("rejects a second identical call the same day", async () => {
      const req = { employeeId: "E1", shift: "morning", embedding: vector(0), threshold: 0.01 };
      await service.recognizeAndRecord(req);
      const out = await service.recognizeAndRecord(req);
      expect(out.ok === false && out.reason).toBe("AlreadyRegisteredToday");
    });

    it("echoes the assigned shift on a mismatch", async () => {
      const out = await service.recognizeAndRecord({ employeeId: "E1", shift: "afternoon", embedding: vector(0) });
      expect(out).toMatchObject({ ok: false, reason: "ShiftMismatch", assignedShift: "morning" });
    });

    it("rejects a negative threshold", async () => {
      const out = await service.recognizeAndRecord({
        employeeId: "E1",
        shift: "morning",
        embedding: vector(0),
        threshold: -1,
      });
      expect(out.ok === false && out.reason).toBe("InvalidInput");
    });

    it("reports a storage outage instead of throwing", async () => {
      gateway.failing.add("query");
      const out = await service.recognizeAndRecord({ employeeId: "E1", shift: "morning", embedding: vector(0) });
      expect(out).toEqual({
        ok: false,
        reason: "PersistenceFailure",
        message: "Storage unavailable while trying to read attendance history",
      });
    });
  });

  describe("validateClaim", () => {
    it("validates against the registered shift", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      expect(service.validateClaim({ employeeId: "E1", shift: "night" })).toMatchObject({
        valid: false,
        reason: "ShiftMismatch",
        assignedShift: "morning",
      });
      expect(service.validateClaim({ employeeId: "E1", shift: "morning" })).toMatchObject({
        valid: true,
        inSchedule: false,
      });
    });

    it("requires an employee id", () => {
      expect(service.validateClaim({ employeeId: " ", shift: "morning" })).toEqual({
        valid: false,
        reason: "InvalidInput",
        message: "employeeId is required",
      });
    });
  });

  describe("employeeHistory", () => {
    it("returns recorded events newest first", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      await service.recognizeAndRecord({ employeeId: "E1", shift: "morning", embedding: vector(0) });
      clock.set("2024-03-04T14:00:00Z");
      await service.recognizeAndRecord({ employeeId: "E1", shift: "morning", embedding: vector(0) });

      const out = await service.employeeHistory({ employeeId: "E1" });
      expect(out.ok && out.events.map((e) => e.kind)).toEqual(["check-out", "check-in"]);
    });

    it("returns an empty history for a registered employee", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      expect(await service.employeeHistory({ employeeId: "E1" })).toEqual({
        ok: true,
        employeeId: "E1",
        events: [],
      });
    });

    it("serves history for an id that is no longer registered", async () => {
      gateway.events.push({
        id: "old-1",
        employeeId: "E5",
        shift: "night",
        kind: "check-in",
        date: "2024-02-01",
        time: "22:00:00",
        createdAt: "2024-02-01T22:00:00.000Z",
        timing: "onTime",
      });
      const out = await service.employeeHistory({ employeeId: "E5" });
      expect(out.ok && out.events.map((e) => e.id)).toEqual(["old-1"]);
    });

    it("rejects an id with neither a record nor history", async () => {
      expect(await service.employeeHistory({ employeeId: "E9" })).toEqual({
        ok: false,
        reason: "UnknownEmployee",
        message: "Employee E9 is not registered",
      });
    });

    it("rejects malformed bounds", async () => {
      const out = await service.employeeHistory({ employeeId: "E1", from: "yesterday" });
      expect(out).toEqual({ ok: false, reason: "InvalidInput", message: "from: Expected YYYY-MM-DD" });
    });
  });

  describe("attendanceSummary", () => {
    it("defaults to the current month", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      await service.recognizeAndRecord({ employeeId: "E1", shift: "morning", embedding: vector(0) });

      const out = await service.attendanceSummary({ employeeId: "E1" });
      expect(out.ok && out.summary).toMatchObject({ year: 2024, month: 3, totalEvents: 1, checkIns: 1 });
    });

    it("accepts year and month as query strings", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      const out = await service.attendanceSummary({ employeeId: "E1", year: "2023", month: "12" });
      expect(out.ok && out.summary).toMatchObject({ year: 2023, month: 12, totalEvents: 0 });
    });
  });

  describe("identifyEmployee", () => {
    it("finds the nearest employee without recording anything", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      await service.registerEmployee({ ...newcomer, id: "E2", embedding: withValueAt(0, 1) });

      const out = await service.identifyEmployee({ embedding: withValueAt(0, 0.25) });
      expect(out).toEqual({
        ok: true,
        match: {
          found: true,
          employeeId: "E1",
          distance: 0.25,
          accepted: true,
          threshold: 0.6,
          metric: "euclidean",
        },
      });
      expect(gateway.events).toHaveLength(0);
    });

    it("validates the probe", async () => {
      const out = await service.identifyEmployee({ embedding: "not a vector" });
      expect(out).toEqual({
        ok: false,
        reason: "InvalidEmbedding",
        message: "embedding must be an array of numbers",
      });
    });
  });

  describe("refresh", () => {
    it("picks up employees written by another process", async () => {
      gateway.employees.set("E3", employee("E3", "afternoon"));
      expect(service.listEmployees()).toEqual([]);

      const out = await service.refresh();
      expect(out).toMatchObject({ ok: true, employees: 1 });
      expect(service.listEmployees().map((e) => e.id)).toEqual(["E3"]);
    });

    it("keeps the previous snapshot when a stored embedding is corrupt", async () => {
      await service.registerEmployee({ ...newcomer, embedding: vector(0) });
      gateway.employees.set("E4", { ...employee("E4", "night"), embedding: [1, 2, 3] });

      expect(await service.refresh()).toEqual({
        ok: false,
        reason: "PersistenceFailure",
        message: "Stored embedding for employee E4 is corrupt",
      });
      expect(service.employeeCount).toBe(1);
    });

    it("wraps a failing load as PersistenceFailure", async () => {
      vi.spyOn(gateway, "loadAllEmployees").mockImplementation(() => {
        throw new TypeError("boom");
      });
      expect(await service.refresh()).toEqual({
        ok: false,
        reason: "PersistenceFailure",
        message: "Storage unavailable while trying to load employees",
      });
    });
  });

  describe("image flows", () => {
    function withExtractor(extractor: EmbeddingExtractor) {
      return createAttendanceService(settings, gateway, { clock: clock.now, extractor });
    }

    it("enrolls from an image through the extractor", async () => {
      const extractEmbedding = vi.fn(
        async (_image: Buffer): Promise<ExtractionResult> => ({ ok: true, embedding: vector(0) })
      );
      const svc = withExtractor({ extractEmbedding });

      const out = await svc.enrollFromImage(newcomer, Buffer.from("jpeg-bytes"));
      expect(out.ok).toBe(true);
      expect(extractEmbedding).toHaveBeenCalledWith(Buffer.from("jpeg-bytes"));
    });

    it("reports extraction failures", async () => {
      const svc = withExtractor({
        extractEmbedding: async () => ({ ok: false, error: "No face detected" }),
      });
      const out = await svc.recognizeFromImage({ employeeId: "E1", shift: "morning" }, Buffer.from("x"));
      expect(out).toEqual({ ok: false, reason: "ExtractionFailed", message: "No face detected" });
    });

    it("hides the detail of an unexpected extractor error", async () => {
      const svc = withExtractor({
        extractEmbedding: async () => {
          throw new TypeError("socket hang up");
        },
      });
      const out = await svc.enrollFromImage(newcomer, Buffer.from("x"));
      expect(out).toEqual({
        ok: false,
        reason: "InternalError",
        message: "Internal error while trying to extract a face embedding",
      });
    });

    it("needs an extractor to be configured", async () => {
      const out = await service.enrollFromImage(newcomer, Buffer.from("x"));
      expect(out).toEqual({
        ok: false,
        reason: "ConfigurationError",
        message: "No embedding extractor is configured",
      });
    });
  });
});
