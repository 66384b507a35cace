import { z } from "zod";

function normalizedString(maxLength: number) {
  return z.preprocess(
    (value) => (typeof value === "number" ? String(value) : value),
    z.string().trim().min(1).max(maxLength)
  );
}

function optionalNumber(schema: z.ZodNumber) {
  return z.preprocess((value) => {
    if (value === undefined || value === null) return undefined;
    if (typeof value === "string" && value.trim() === "") return undefined;
    return value;
  }, z.coerce.number().pipe(schema).optional());
}

const optionalDate = z.preprocess((value) => {
  if (value === undefined || value === null) return undefined;
  const s = String(value).trim();
  return s ? s : undefined;
}, z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD").optional());

const employeeIdSchema = normalizedString(64);
const shiftNameSchema = normalizedString(32).transform((v) => v.toLowerCase());
const thresholdSchema = optionalNumber(z.number().nonnegative().finite());

// embeddings are checked separately so a bad vector reports InvalidEmbedding
export const registerEmployeeSchema = z.object({
  id: employeeIdSchema,
  area: normalizedString(120),
  role: normalizedString(120),
  shift: shiftNameSchema,
  embedding: z.unknown().optional(),
});

export const recognizeSchema = z.object({
  employeeId: employeeIdSchema.optional(),
  shift: shiftNameSchema,
  embedding: z.unknown().optional(),
  threshold: thresholdSchema,
});

export const identifySchema = z.object({
  embedding: z.unknown().optional(),
  threshold: thresholdSchema,
});

export const historyQuerySchema = z.object({
  employeeId: employeeIdSchema,
  from: optionalDate,
  to: optionalDate,
});

export const summaryQuerySchema = z.object({
  employeeId: employeeIdSchema,
  year: optionalNumber(z.number().int().min(1970).max(9999)),
  month: optionalNumber(z.number().int().min(1).max(12)),
});

export const feedQuerySchema = z.object({
  afterSeq: optionalNumber(z.number().int().min(0)),
  limit: optionalNumber(z.number().int().min(1).max(200)),
  waitMs: optionalNumber(z.number().int().min(0).max(300_000)),
});

export const imageFieldSchema = z.object({
  image: z.string().min(1).max(7_000_000),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
