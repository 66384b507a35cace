import type { z } from "zod";
import { DEFAULT_SHIFT_SCHEDULE, type ShiftSchedule } from "../config/shifts";
import type { AppConfig } from "../config/env";
import { isAttendanceError } from "../errors/AttendanceError";
import type { PersistenceGateway } from "../persistence/gateway";
import type {
  AttendanceEvent,
  EmployeeRecord,
  EmployeeSummary,
  MatchResult,
  NoMatchFound,
  Rejection,
} from "../types/attendance";
import { checkEmbedding } from "../utils/embedding";
import { employeeSummary, isShift, normalizeEmployeeIdentifier } from "../utils/employee";
import { KeyedLock } from "../utils/keyedLock";
import { componentLogger } from "../utils/logger";
import {
  describeIssues,
  historyQuerySchema,
  identifySchema,
  recognizeSchema,
  registerEmployeeSchema,
  summaryQuerySchema,
} from "../validators/attendance.validators";
import { AttendanceFeed } from "./attendanceEvents";
import { AttendanceLedger, type AttendanceSummary } from "./attendanceLedger.service";
import {
  AttendanceOrchestrator,
  type RecognitionOutcome,
} from "./attendanceOrchestrator.service";
import type { EmbeddingExtractor } from "./embeddingExtractor.service";
import { EmbeddingStore } from "./embeddingStore.service";
import { FaceMatcher } from "./faceMatcher.service";
import { ShiftValidator, type ShiftInfo, type ShiftValidation } from "./shiftValidator.service";

const log = componentLogger("attendance-service");

export type RegisterEmployeeRequest = {
  id: unknown;
  area: unknown;
  role: unknown;
  shift: unknown;
  embedding?: unknown;
};

export type EnrollmentFields = Omit<RegisterEmployeeRequest, "embedding">;

export type RecognizeRequest = {
  employeeId?: unknown;
  shift: unknown;
  embedding?: unknown;
  threshold?: unknown;
};

export type RecognitionClaim = Omit<RecognizeRequest, "embedding">;

export type ClaimRequest = { employeeId: unknown; shift: unknown };

export type HistoryRequest = { employeeId: unknown; from?: unknown; to?: unknown };

export type SummaryRequest = { employeeId: unknown; year?: unknown; month?: unknown };

export type IdentifyRequest = { embedding: unknown; threshold?: unknown };

export type RegistrationOutcome = { ok: true; employee: EmployeeSummary } | Rejection;
export type HistoryOutcome = { ok: true; employeeId: string; events: AttendanceEvent[] } | Rejection;
export type SummaryOutcome = { ok: true; summary: AttendanceSummary } | Rejection;
export type IdentifyOutcome = { ok: true; match: MatchResult | NoMatchFound } | Rejection;
export type RefreshOutcome = { ok: true; employees: number; loadedAt: string } | Rejection;
export type RecognizeOutcome = RecognitionOutcome | Rejection;

export type ServiceDeps = {
  store: EmbeddingStore;
  ledger: AttendanceLedger;
  validator: ShiftValidator;
  orchestrator: AttendanceOrchestrator;
  feed: AttendanceFeed;
  extractor?: EmbeddingExtractor;
  clock?: () => Date;
};

function invalid(error: z.ZodError): Rejection {
  return { ok: false, reason: "InvalidInput", message: describeIssues(error) };
}

/**
 * Everything the HTTP layer (or any other caller) may ask of the attendance
 * core. Expected outcomes come back as `{ ok: false, reason }`; this class
 * does not throw.
 */
export class AttendanceService {
  readonly feed: AttendanceFeed;
  private readonly registrationLock = new KeyedLock();
  private readonly clock: () => Date;

  constructor(private readonly deps: ServiceDeps) {
    this.feed = deps.feed;
    this.clock = deps.clock ?? (() => new Date());
  }

  get employeeCount(): number {
    return this.deps.store.snapshot().size;
  }

  async registerEmployee(req: RegisterEmployeeRequest): Promise<RegistrationOutcome> {
    const parsed = registerEmployeeSchema.safeParse(req);
    if (!parsed.success) return invalid(parsed.error);
    const { id, area, role, shift } = parsed.data;

    if (!isShift(shift)) {
      return { ok: false, reason: "InvalidInput", message: `Unknown shift ${shift}` };
    }
    const embedding = checkEmbedding(parsed.data.embedding);
    if (!embedding.ok) {
      return { ok: false, reason: "InvalidEmbedding", message: embedding.message };
    }

    const record: EmployeeRecord = {
      id,
      area,
      role,
      shift,
      embedding: embedding.embedding,
      registeredAt: this.clock().toISOString(),
    };

    return this.guard("register the employee", () =>
      this.registrationLock.run(id, async () => {
        await this.deps.store.add(record);
        log.info({ employeeId: id, shift }, "employee registered");
        return { ok: true as const, employee: employeeSummary(record) };
      })
    );
  }

  async enrollFromImage(fields: EnrollmentFields, image: Buffer): Promise<RegistrationOutcome> {
    const extracted = await this.extract(image);
    if (!extracted.ok) return extracted;
    return this.registerEmployee({ ...fields, embedding: extracted.embedding });
  }

  async recognizeAndRecord(req: RecognizeRequest): Promise<RecognizeOutcome> {
    const parsed = recognizeSchema.safeParse(req);
    if (!parsed.success) return invalid(parsed.error);
    const { employeeId, shift, embedding, threshold } = parsed.data;

    return this.guard("record attendance", () =>
      this.deps.orchestrator.recognizeAndRecord({ employeeId, shift, embedding, threshold })
    );
  }

  async recognizeFromImage(claim: RecognitionClaim, image: Buffer): Promise<RecognizeOutcome> {
    const extracted = await this.extract(image);
    if (!extracted.ok) return extracted;
    return this.recognizeAndRecord({ ...claim, embedding: extracted.embedding });
  }

  validateClaim(req: ClaimRequest): ShiftValidation {
    const employeeId = normalizeEmployeeIdentifier(req.employeeId);
    if (!employeeId) {
      return { valid: false, reason: "InvalidInput", message: "employeeId is required" };
    }
    return this.deps.validator.validateShift(
      this.deps.store.snapshot(),
      employeeId,
      req.shift,
      this.clock()
    );
  }

  listEmployees(): EmployeeSummary[] {
    return this.deps.store.snapshot().records().map(employeeSummary);
  }

  async employeeHistory(req: HistoryRequest): Promise<HistoryOutcome> {
    const parsed = historyQuerySchema.safeParse(req);
    if (!parsed.success) return invalid(parsed.error);
    const { employeeId, from, to } = parsed.data;

    return this.guard("read attendance history", async () => {
      const events = await this.deps.ledger.history(employeeId, from, to);
      if (events.length === 0 && !(await this.isKnown(employeeId))) {
        return unknownEmployee(employeeId);
      }
      return { ok: true as const, employeeId, events };
    });
  }

  async attendanceSummary(req: SummaryRequest): Promise<SummaryOutcome> {
    const parsed = summaryQuerySchema.safeParse(req);
    if (!parsed.success) return invalid(parsed.error);
    const { employeeId } = parsed.data;

    const [thisYear, thisMonth] = this.deps.ledger.today(this.clock()).split("-").map(Number);
    const year = parsed.data.year ?? thisYear;
    const month = parsed.data.month ?? thisMonth;

    return this.guard("summarize attendance", async () => {
      if (!(await this.isKnown(employeeId))) return unknownEmployee(employeeId);
      const summary = await this.deps.ledger.summary(employeeId, year, month);
      return { ok: true as const, summary };
    });
  }

  async identifyEmployee(req: IdentifyRequest): Promise<IdentifyOutcome> {
    const parsed = identifySchema.safeParse(req);
    if (!parsed.success) return invalid(parsed.error);

    const probe = checkEmbedding(parsed.data.embedding);
    if (!probe.ok) return { ok: false, reason: "InvalidEmbedding", message: probe.message };

    const { orchestrator } = this.deps;
    return this.guard("identify the employee", async () => ({
      ok: true as const,
      match: orchestrator.identify(probe.embedding, parsed.data.threshold ?? orchestrator.threshold),
    }));
  }

  listShifts(): ShiftInfo[] {
    return this.deps.validator.listShifts();
  }

  async refresh(): Promise<RefreshOutcome> {
    return this.guard("reload employees", async () => {
      const snapshot = await this.deps.store.refresh();
      return { ok: true as const, employees: snapshot.size, loadedAt: snapshot.loadedAt.toISOString() };
    });
  }

  private async isKnown(employeeId: string): Promise<boolean> {
    return this.deps.store.snapshot().has(employeeId) || (await this.deps.ledger.hasHistory(employeeId));
  }

  private async extract(
    image: Buffer
  ): Promise<{ ok: true; embedding: readonly number[] } | Rejection> {
    const { extractor } = this.deps;
    if (!extractor) {
      return { ok: false, reason: "ConfigurationError", message: "No embedding extractor is configured" };
    }
    const result = await this.guard("extract a face embedding", () => extractor.extractEmbedding(image));
    if (result.ok) return result;
    if ("reason" in result) return result;
    return { ok: false, reason: "ExtractionFailed", message: result.error };
  }

  private async guard<T>(action: string, work: () => Promise<T>): Promise<T | Rejection> {
    try {
      return await work();
    } catch (e) {
      if (isAttendanceError(e)) {
        log.warn({ err: e, cause: e.cause, action }, "attendance operation failed");
        return { ok: false, reason: e.code, message: e.message };
      }
      log.error({ err: e, action }, "unexpected error");
      return { ok: false, reason: "InternalError", message: `Internal error while trying to ${action}` };
    }
  }
}

function unknownEmployee(employeeId: string): Rejection {
  return { ok: false, reason: "UnknownEmployee", message: `Employee ${employeeId} is not registered` };
}

export type AttendanceSettings = Pick<
  AppConfig,
  | "FACE_MATCH_METRIC"
  | "FACE_MATCH_THRESHOLD"
  | "FACE_MATCH_MODE"
  | "REJECT_OUT_OF_WINDOW"
  | "REPEAT_SCAN_WINDOW_SEC"
  | "TIMEZONE"
  | "ATT_EVENTS_MAX"
>;

export type ServiceOptions = {
  schedule?: ShiftSchedule;
  extractor?: EmbeddingExtractor;
  clock?: () => Date;
  newId?: () => string;
};

/** Wires the core components around one gateway. The store starts empty; call `refresh()`. */
export function createAttendanceService(
  settings: AttendanceSettings,
  gateway: PersistenceGateway,
  opts: ServiceOptions = {}
): AttendanceService {
  const store = new EmbeddingStore(gateway);
  const ledger = new AttendanceLedger(gateway, {
    timeZone: settings.TIMEZONE,
    clock: opts.clock,
    newId: opts.newId,
  });
  const validator = new ShiftValidator(opts.schedule ?? DEFAULT_SHIFT_SCHEDULE, settings.TIMEZONE);
  const feed = new AttendanceFeed(settings.ATT_EVENTS_MAX);
  const orchestrator = new AttendanceOrchestrator(
    store,
    new FaceMatcher(settings.FACE_MATCH_METRIC),
    validator,
    ledger,
    {
      threshold: settings.FACE_MATCH_THRESHOLD,
      mode: settings.FACE_MATCH_MODE,
      rejectOutOfWindow: settings.REJECT_OUT_OF_WINDOW,
      repeatScanWindowMs: settings.REPEAT_SCAN_WINDOW_SEC * 1000,
      clock: opts.clock,
      onRecorded: (event) => {
        feed.push(event, opts.clock?.());
      },
    }
  );

  return new AttendanceService({
    store,
    ledger,
    validator,
    orchestrator,
    feed,
    extractor: opts.extractor,
    clock: opts.clock,
  });
}
