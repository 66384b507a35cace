import fs from "node:fs";
import { z } from "zod";
import type { EventKind, Shift } from "../types/attendance";
import { parseTimeOfDay } from "../utils/time";

export type TimeWindow = {
  start: string;
  end: string;
  wrapsMidnight: boolean;
};

export type ShiftDefinition = {
  /** Working hours; only used for the advisory "in schedule" flag. */
  hours: TimeWindow;
  windows: Partial<Record<EventKind, TimeWindow>>;
};

export type ShiftSchedule = Partial<Record<Shift, ShiftDefinition>>;

export const DEFAULT_SHIFT_SCHEDULE: ShiftSchedule = {
  morning: {
    hours: { start: "06:00", end: "14:00", wrapsMidnight: false },
    windows: {
      "check-in": { start: "05:30", end: "06:30", wrapsMidnight: false },
      "check-out": { start: "13:30", end: "14:30", wrapsMidnight: false },
    },
  },
  afternoon: {
    hours: { start: "14:00", end: "22:00", wrapsMidnight: false },
    windows: {
      "check-in": { start: "13:30", end: "14:30", wrapsMidnight: false },
      "check-out": { start: "21:30", end: "22:30", wrapsMidnight: false },
    },
  },
  night: {
    hours: { start: "22:00", end: "06:00", wrapsMidnight: true },
    windows: {
      "check-in": { start: "21:30", end: "22:30", wrapsMidnight: false },
      "check-out": { start: "05:30", end: "06:30", wrapsMidnight: false },
    },
  },
};

const timeOfDaySchema = z
  .string()
  .refine((v) => parseTimeOfDay(v) !== null, { message: "Expected HH:MM or HH:MM:SS" });

const timeWindowSchema = z
  .object({
    start: timeOfDaySchema,
    end: timeOfDaySchema,
    wrapsMidnight: z.boolean().default(false),
  })
  .superRefine((w, ctx) => {
    const start = parseTimeOfDay(w.start) ?? 0;
    const end = parseTimeOfDay(w.end) ?? 0;
    if (w.wrapsMidnight && start <= end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A window that wraps midnight must start after it ends",
      });
    }
    if (!w.wrapsMidnight && start > end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Window starts after it ends; set wrapsMidnight for overnight windows",
      });
    }
  });

const shiftDefinitionSchema = z.object({
  hours: timeWindowSchema,
  windows: z.object({
    "check-in": timeWindowSchema.optional(),
    "check-out": timeWindowSchema.optional(),
  }),
});

export const shiftScheduleSchema = z.object({
  morning: shiftDefinitionSchema.optional(),
  afternoon: shiftDefinitionSchema.optional(),
  night: shiftDefinitionSchema.optional(),
});

export function parseShiftSchedule(raw: unknown): ShiftSchedule {
  const parsed = shiftScheduleSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid shift schedule: ${problems}`);
  }
  return parsed.data;
}

/** Reads a schedule file when a path is given, otherwise the defaults. */
export function loadShiftSchedule(filePath?: string): ShiftSchedule {
  if (!filePath) return DEFAULT_SHIFT_SCHEDULE;
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return parseShiftSchedule(raw);
}
