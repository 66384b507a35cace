import type {
  AttendanceEvent,
  Embedding,
  EventKind,
  MatchResult,
  NoMatchFound,
  Rejection,
  Shift,
  Timing,
} from "../types/attendance";
import { checkEmbedding } from "../utils/embedding";
import { normalizeEmployeeIdentifier } from "../utils/employee";
import { KeyedLock } from "../utils/keyedLock";
import { componentLogger } from "../utils/logger";
import type { AttendanceLedger } from "./attendanceLedger.service";
import type { EmbeddingStore, EmployeeSnapshot } from "./embeddingStore.service";
import type { FaceMatcher } from "./faceMatcher.service";
import type { ShiftValidator } from "./shiftValidator.service";

const log = componentLogger("orchestrator");

export type MatchMode = "verify" | "search";

export type RecognitionRequest = {
  employeeId?: string;
  shift: string;
  embedding: unknown;
  threshold?: number;
};

export type RecognitionRejectReason =
  | "InvalidInput"
  | "InvalidEmbedding"
  | "UnknownEmployee"
  | "NoMatch"
  | "ShiftMismatch"
  | "AlreadyRegisteredToday"
  | "ConfigurationError";

export type RecognitionRejected = Rejection<RecognitionRejectReason> & {
  employeeId?: string;
  assignedShift?: Shift;
  distance?: number | null;
  eventKind?: EventKind;
};

export type RecognitionAccepted = {
  ok: true;
  employeeId: string;
  eventKind: EventKind;
  timing: Timing | "outOfWindow";
  distance: number;
  event: AttendanceEvent;
};

export type RecognitionOutcome = RecognitionAccepted | RecognitionRejected;

export type OrchestratorOptions = {
  threshold: number;
  mode: MatchMode;
  rejectOutOfWindow: boolean;
  /** A scan this soon after the employee's last event, on the same day, counts as a repeat of it. */
  repeatScanWindowMs?: number;
  clock?: () => Date;
  lock?: KeyedLock;
  onRecorded?: (event: AttendanceEvent, outcome: RecognitionAccepted) => void;
};

type Identified =
  | { ok: true; employeeId: string; distance: number }
  | RecognitionRejected;

function reject(
  reason: RecognitionRejectReason,
  message: string,
  extra?: Omit<RecognitionRejected, "ok" | "reason" | "message">
): RecognitionRejected {
  return { ok: false, reason, message, ...extra };
}

/**
 * One recognition attempt end to end: identity, shift, daily cap, timing,
 * commit. Stateless between attempts; history lives in the ledger. The
 * read-check-append part runs under a per-employee lock so two concurrent
 * attempts cannot both see the same expected kind.
 */
export class AttendanceOrchestrator {
  readonly lock: KeyedLock;
  private readonly clock: () => Date;

  constructor(
    private readonly store: EmbeddingStore,
    private readonly matcher: FaceMatcher,
    private readonly validator: ShiftValidator,
    private readonly ledger: AttendanceLedger,
    private readonly opts: OrchestratorOptions
  ) {
    this.lock = opts.lock ?? new KeyedLock();
    this.clock = opts.clock ?? (() => new Date());
  }

  get threshold(): number {
    return this.opts.threshold;
  }

  get mode(): MatchMode {
    return this.opts.mode;
  }

  /** Nearest registered employee to `probe`, without recording anything. */
  identify(probe: Embedding, threshold = this.opts.threshold): MatchResult | NoMatchFound {
    return this.matcher.searchBest(probe, this.store.snapshot().embeddings(), threshold);
  }

  async recognizeAndRecord(req: RecognitionRequest): Promise<RecognitionOutcome> {
    const probe = checkEmbedding(req.embedding);
    if (!probe.ok) return reject("InvalidEmbedding", probe.message);

    const threshold = req.threshold ?? this.opts.threshold;
    if (!Number.isFinite(threshold) || threshold < 0) {
      return reject("InvalidInput", "threshold must be a non-negative number");
    }

    const snapshot = this.store.snapshot();
    const claimedId = normalizeEmployeeIdentifier(req.employeeId);

    // 1. identity
    const who =
      this.opts.mode === "search"
        ? this.identifyBySearch(snapshot, probe.embedding, claimedId, threshold)
        : this.identifyByClaim(snapshot, probe.embedding, claimedId, threshold);
    if (!who.ok) {
      log.info({ employeeId: claimedId, reason: who.reason, distance: who.distance }, "recognition rejected");
      return who;
    }
    const employeeId = who.employeeId;

    // 2. shift authorization
    const shiftCheck = this.validator.validateShift(snapshot, employeeId, req.shift, this.clock());
    if (!shiftCheck.valid) {
      log.info({ employeeId, reason: shiftCheck.reason }, "recognition rejected");
      return reject(shiftCheck.reason, shiftCheck.message, {
        employeeId,
        assignedShift: shiftCheck.assignedShift,
        distance: who.distance,
      });
    }
    const shift = shiftCheck.assignedShift;

    // 3-5 under the employee's lock
    return this.lock.run(employeeId, async () => {
      const now = this.clock();
      const today = this.ledger.today(now);

      const latest = await this.ledger.latestEvent(employeeId);
      if (latest && this.isRepeatScan(latest, now, today)) {
        log.info({ employeeId, kind: latest.kind }, "repeat scan ignored");
        return reject("AlreadyRegisteredToday", `A ${latest.kind} was already recorded today`, {
          employeeId,
          eventKind: latest.kind,
          distance: who.distance,
        });
      }

      const expected = await this.ledger.nextExpectedKind(employeeId);
      if (await this.ledger.hasEventToday(employeeId, expected, today)) {
        log.info({ employeeId, kind: expected }, "daily cap reached");
        return reject("AlreadyRegisteredToday", `A ${expected} was already recorded today`, {
          employeeId,
          eventKind: expected,
          distance: who.distance,
        });
      }

      const timing = this.validator.classifyTiming(shift, expected, now);
      if (timing === "outOfWindow" && this.opts.rejectOutOfWindow) {
        log.error({ shift, kind: expected }, "no time window configured");
        return reject("ConfigurationError", `No ${expected} window is configured for shift ${shift}`, {
          employeeId,
          eventKind: expected,
        });
      }

      const event = await this.ledger.append(employeeId, shift, expected, {
        timing: timing === "outOfWindow" ? null : timing,
      });

      const accepted: RecognitionAccepted = {
        ok: true,
        employeeId,
        eventKind: expected,
        timing,
        distance: who.distance,
        event,
      };
      this.opts.onRecorded?.(event, accepted);
      return accepted;
    });
  }

  private isRepeatScan(latest: AttendanceEvent, now: Date, today: string): boolean {
    const windowMs = this.opts.repeatScanWindowMs ?? 0;
    if (windowMs <= 0 || latest.date !== today) return false;
    return now.getTime() - Date.parse(latest.createdAt) < windowMs;
  }

  private identifyByClaim(
    snapshot: EmployeeSnapshot,
    probe: Embedding,
    claimedId: string | null,
    threshold: number
  ): Identified {
    if (!claimedId) return reject("InvalidInput", "employeeId is required");

    const employee = snapshot.get(claimedId);
    if (!employee) {
      return reject("UnknownEmployee", `Employee ${claimedId} is not registered`, {
        employeeId: claimedId,
      });
    }

    const match = this.matcher.compareOne(probe, employee.embedding, threshold, claimedId);
    if (!match.accepted) {
      return reject("NoMatch", "Face does not match the employee", {
        employeeId: claimedId,
        distance: match.distance,
      });
    }
    return { ok: true, employeeId: claimedId, distance: match.distance };
  }

  private identifyBySearch(
    snapshot: EmployeeSnapshot,
    probe: Embedding,
    claimedId: string | null,
    threshold: number
  ): Identified {
    if (claimedId && !snapshot.has(claimedId)) {
      return reject("UnknownEmployee", `Employee ${claimedId} is not registered`, {
        employeeId: claimedId,
      });
    }

    const best = this.matcher.searchBest(probe, snapshot.embeddings(), threshold);
    if (!best.found) {
      return reject("NoMatch", "No registered employee matches this face", {
        employeeId: claimedId ?? undefined,
        distance: best.minDistance,
      });
    }
    if (claimedId && best.employeeId !== claimedId) {
      return reject("NoMatch", "Face does not match the employee", { employeeId: claimedId });
    }
    return { ok: true, employeeId: best.employeeId, distance: best.distance };
  }
}
