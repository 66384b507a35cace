import { z } from "zod";
import { AttendanceError } from "../errors/AttendanceError";
import { EVENT_KINDS, SHIFTS, type AttendanceEvent, type EmployeeRecord } from "../types/attendance";

const shiftSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(SHIFTS));

export const storedEmployeeSchema = z.object({
  id: z.string().trim().min(1),
  area: z.string(),
  role: z.string(),
  shift: shiftSchema,
  embedding: z.array(z.number()),
  registeredAt: z.string().default(() => new Date(0).toISOString()),
});

export const storedEventSchema = z.object({
  id: z.string().min(1),
  employeeId: z.string().min(1),
  shift: shiftSchema,
  kind: z.enum(EVENT_KINDS),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  time: z.string().regex(/^\d{2}:\d{2}:\d{2}$/),
  createdAt: z.string().min(1),
  timing: z.enum(["onTime", "early", "late"]).nullable().default(null),
});

/**
 * Shape check for a record read back from storage. Dimension and finiteness
 * of the embedding are checked by the store when it builds a snapshot.
 */
export function parseStoredEmployee(raw: unknown, source: string): EmployeeRecord {
  const parsed = storedEmployeeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AttendanceError("PersistenceFailure", `Corrupt employee record in ${source}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function parseStoredEvent(raw: unknown, source: string): AttendanceEvent {
  const parsed = storedEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AttendanceError("PersistenceFailure", `Corrupt attendance event in ${source}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
