import {
  SHIFTS,
  type EmployeeRecord,
  type EmployeeSummary,
  type Shift,
} from "../types/attendance";

export function normalizeEmployeeIdentifier(value: unknown): string | null {
  if (typeof value !== "string" && typeof value !== "number") return null;
  const v = String(value).trim();
  return v ? v : null;
}

export function normalizeShiftName(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const v = value.trim().toLowerCase();
  return v ? v : null;
}

export function isShift(value: string): value is Shift {
  return SHIFTS.some((s) => s === value);
}

export function employeeSummary(e: EmployeeRecord): EmployeeSummary {
  return { id: e.id, area: e.area, role: e.role, shift: e.shift };
}
