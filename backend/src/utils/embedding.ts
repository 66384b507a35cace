import { EMBEDDING_DIMENSIONS, type Embedding } from "../types/attendance";

export type EmbeddingCheck =
  | { ok: true; embedding: Embedding }
  | { ok: false; message: string };

/**
 * Accepts only arrays of exactly EMBEDDING_DIMENSIONS finite numbers.
 * Numeric strings are not coerced.
 */
export function checkEmbedding(value: unknown): EmbeddingCheck {
  if (!Array.isArray(value)) {
    return { ok: false, message: "embedding must be an array of numbers" };
  }
  if (value.length !== EMBEDDING_DIMENSIONS) {
    return {
      ok: false,
      message: `embedding must have exactly ${EMBEDDING_DIMENSIONS} values (got ${value.length})`,
    };
  }
  const out: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const x: unknown = value[i];
    if (typeof x !== "number" || !Number.isFinite(x)) {
      return { ok: false, message: `embedding[${i}] is not a finite number` };
    }
    out.push(x);
  }
  return { ok: true, embedding: Object.freeze(out) };
}
