import { randomUUID } from "node:crypto";
import { AttendanceError, persistenceFailure } from "../errors/AttendanceError";
import type { PersistenceGateway } from "../persistence/gateway";
import {
  EVENT_KINDS,
  type AttendanceEvent,
  type EventKind,
  type EventQuery,
  type Shift,
  type Timing,
} from "../types/attendance";
import { isShift, normalizeEmployeeIdentifier } from "../utils/employee";
import { componentLogger } from "../utils/logger";
import { isYYYYMMDD, localDate, localTime, monthRange } from "../utils/time";

const log = componentLogger("ledger");

export type LedgerOptions = {
  timeZone: string;
  clock?: () => Date;
  newId?: () => string;
};

export type AttendanceSummary = {
  employeeId: string;
  year: number;
  month: number;
  totalEvents: number;
  checkIns: number;
  checkOuts: number;
  daysWorked: number;
  timing: Record<Timing | "unclassified", number>;
  recent: AttendanceEvent[];
};

function opposite(kind: EventKind): EventKind {
  return kind === "check-in" ? "check-out" : "check-in";
}

function assertDate(label: string, value: string | undefined) {
  if (value !== undefined && !isYYYYMMDD(value)) {
    throw new AttendanceError("InvalidInput", `${label} must be a date in YYYY-MM-DD format`);
  }
}

/**
 * Append-only attendance log. Reads always go to the gateway so several
 * processes sharing one store see the same history; callers that need
 * read-then-append atomicity hold a lock around both.
 */
export class AttendanceLedger {
  private readonly timeZone: string;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly gateway: PersistenceGateway,
    opts: LedgerOptions
  ) {
    this.timeZone = opts.timeZone;
    this.clock = opts.clock ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  /** Calendar date of `at` (default: now) in the ledger's time zone. */
  today(at: Date = this.clock()): string {
    return localDate(at, this.timeZone);
  }

  async append(
    employeeId: string,
    shift: Shift,
    kind: EventKind,
    opts?: { timing?: Timing | null }
  ): Promise<AttendanceEvent> {
    const id = normalizeEmployeeIdentifier(employeeId);
    if (!id) throw new AttendanceError("InvalidInput", "employeeId is required");
    if (!isShift(shift)) throw new AttendanceError("InvalidInput", `Unknown shift ${shift}`);
    if (!EVENT_KINDS.some((k) => k === kind)) {
      throw new AttendanceError("InvalidInput", `Unknown event kind ${kind}`);
    }

    const latest = await this.latestEvent(id);
    const expected = latest ? opposite(latest.kind) : "check-in";
    if (kind !== expected) {
      throw new AttendanceError("InvalidInput", `Out of sequence: the next event for ${id} must be a ${expected}`);
    }

    // keep creation strictly increasing per employee even if the clock stalls
    let at = this.clock();
    if (latest) {
      const floor = Date.parse(latest.createdAt) + 1;
      if (at.getTime() < floor) at = new Date(floor);
    }

    const event: AttendanceEvent = {
      id: this.newId(),
      employeeId: id,
      shift,
      kind,
      date: localDate(at, this.timeZone),
      time: localTime(at, this.timeZone),
      createdAt: at.toISOString(),
      timing: opts?.timing ?? null,
    };

    try {
      await this.gateway.appendEvent(event);
    } catch (e) {
      throw persistenceFailure("record attendance", e);
    }

    log.info(
      { employeeId: id, kind, shift, timing: event.timing, date: event.date, time: event.time },
      "attendance recorded"
    );
    return event;
  }

  async nextExpectedKind(employeeId: string): Promise<EventKind> {
    const latest = await this.latestEvent(employeeId);
    return latest ? opposite(latest.kind) : "check-in";
  }

  async hasHistory(employeeId: string): Promise<boolean> {
    return (await this.latestEvent(employeeId)) !== null;
  }

  async hasEventToday(employeeId: string, kind: EventKind, date: string): Promise<boolean> {
    assertDate("date", date);
    const hits = await this.query({ employeeId, kind, fromDate: date, toDate: date, limit: 1 });
    return hits.length > 0;
  }

  /** Newest first; bounds are inclusive calendar dates. */
  async history(employeeId: string, fromDate?: string, toDate?: string): Promise<AttendanceEvent[]> {
    assertDate("from", fromDate);
    assertDate("to", toDate);
    return this.query({ employeeId, fromDate, toDate, order: "desc" });
  }

  async summary(employeeId: string, year: number, month: number): Promise<AttendanceSummary> {
    if (!Number.isInteger(year) || year < 1970 || year > 9999) {
      throw new AttendanceError("InvalidInput", "year is out of range");
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new AttendanceError("InvalidInput", "month must be between 1 and 12");
    }

    const { from, to } = monthRange(year, month);
    const events = await this.history(employeeId, from, to);

    const timing: AttendanceSummary["timing"] = { onTime: 0, early: 0, late: 0, unclassified: 0 };
    let checkIns = 0;
    const days = new Set<string>();
    for (const e of events) {
      if (e.kind === "check-in") checkIns++;
      days.add(e.date);
      timing[e.timing ?? "unclassified"]++;
    }

    return {
      employeeId,
      year,
      month,
      totalEvents: events.length,
      checkIns,
      checkOuts: events.length - checkIns,
      daysWorked: days.size,
      timing,
      recent: events.slice(0, 10),
    };
  }

  /** Most recent event by creation time, or null for an employee with no history. */
  async latestEvent(employeeId: string): Promise<AttendanceEvent | null> {
    const [last] = await this.query({ employeeId, order: "desc", limit: 1 });
    return last ?? null;
  }

  private async query(filter: EventQuery): Promise<AttendanceEvent[]> {
    try {
      return await this.gateway.queryEvents(filter);
    } catch (e) {
      throw persistenceFailure("read attendance history", e);
    }
  }
}
