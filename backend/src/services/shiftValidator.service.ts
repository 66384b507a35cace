import type { ShiftSchedule, TimeWindow } from "../config/shifts";
import {
  EVENT_KINDS,
  SHIFTS,
  type EmployeeSummary,
  type EventKind,
  type Shift,
  type TimingClassification,
} from "../types/attendance";
import { employeeSummary, isShift, normalizeShiftName } from "../utils/employee";
import { parseTimeOfDay, secondsOfDay } from "../utils/time";
import type { EmployeeSnapshot } from "./embeddingStore.service";

export type ShiftWindow = TimeWindow & {
  shift: Shift;
  kind: EventKind;
};

export type ShiftInfo = {
  shift: Shift;
  hours: TimeWindow;
  windows: ShiftWindow[];
};

export type ShiftValidation =
  | {
      valid: true;
      assignedShift: Shift;
      inSchedule: boolean;
      employee: EmployeeSummary;
      message: string;
    }
  | {
      valid: false;
      reason: "InvalidInput" | "UnknownEmployee" | "ShiftMismatch";
      message: string;
      assignedShift?: Shift;
    };

type Bounds = { start: number; end: number; wraps: boolean };

function bounds(w: TimeWindow): Bounds | null {
  const start = parseTimeOfDay(w.start);
  const end = parseTimeOfDay(w.end);
  if (start === null || end === null) return null;
  return { start, end, wraps: w.wrapsMidnight };
}

function contains(b: Bounds, t: number): boolean {
  return b.wraps ? t >= b.start || t <= b.end : b.start <= t && t <= b.end;
}

/**
 * Shift authorization and punctuality. Never decides to reject anything;
 * callers apply their own policy to the classification.
 */
export class ShiftValidator {
  constructor(
    private readonly schedule: ShiftSchedule,
    private readonly timeZone: string
  ) {}

  validateShift(
    snapshot: EmployeeSnapshot,
    employeeId: string,
    claimedShift: unknown,
    at: Date = new Date()
  ): ShiftValidation {
    const claimed = normalizeShiftName(claimedShift);
    if (!claimed) {
      return { valid: false, reason: "InvalidInput", message: "shift is required" };
    }

    const employee = snapshot.get(employeeId);
    if (!employee) {
      return {
        valid: false,
        reason: "UnknownEmployee",
        message: `Employee ${employeeId} is not registered`,
      };
    }

    if (claimed !== employee.shift) {
      return {
        valid: false,
        reason: "ShiftMismatch",
        message: `Wrong shift. Your assigned shift is: ${employee.shift}`,
        assignedShift: employee.shift,
      };
    }

    const inSchedule = this.isWithinHours(employee.shift, at);
    return {
      valid: true,
      assignedShift: employee.shift,
      inSchedule,
      employee: employeeSummary(employee),
      message: inSchedule
        ? `Shift ${employee.shift} is valid`
        : `Shift ${employee.shift} is valid but outside its working hours`,
    };
  }

  windowFor(shift: string, kind: EventKind): ShiftWindow | null {
    const name = normalizeShiftName(shift);
    if (!name || !isShift(name)) return null;
    const w = this.schedule[name]?.windows[kind];
    return w ? { ...w, shift: name, kind } : null;
  }

  /**
   * onTime/early/late against the (shift, kind) window. For a window that
   * wraps midnight a time in the gap counts as late during the first half of
   * the gap and early during the second half.
   */
  classifyTiming(shift: string, kind: EventKind, at: Date): TimingClassification {
    const w = this.windowFor(shift, kind);
    const b = w ? bounds(w) : null;
    if (!b) return "outOfWindow";

    const t = secondsOfDay(at, this.timeZone);
    if (contains(b, t)) return "onTime";

    if (!b.wraps) return t < b.start ? "early" : "late";

    const sinceEnd = t - b.end;
    const untilStart = b.start - t;
    return sinceEnd <= untilStart ? "late" : "early";
  }

  isWithinHours(shift: Shift, at: Date): boolean {
    const def = this.schedule[shift];
    const b = def ? bounds(def.hours) : null;
    if (!b) return false;
    return contains(b, secondsOfDay(at, this.timeZone));
  }

  listShifts(): ShiftInfo[] {
    const out: ShiftInfo[] = [];
    for (const shift of SHIFTS) {
      const def = this.schedule[shift];
      if (!def) continue;
      const windows: ShiftWindow[] = [];
      for (const kind of EVENT_KINDS) {
        const w = def.windows[kind];
        if (w) windows.push({ ...w, shift, kind });
      }
      out.push({ shift, hours: def.hours, windows });
    }
    return out;
  }
}
