import { AttendanceError } from "../errors/AttendanceError";
import type {
  DistanceMetric,
  Embedding,
  MatchResult,
  NoMatchFound,
} from "../types/attendance";

export type VectorFault = "DimensionMismatch" | "InvalidVector";

export class FaceMatchError extends AttendanceError {
  readonly fault: VectorFault;

  constructor(fault: VectorFault, message: string) {
    super("InvalidEmbedding", message);
    this.name = "FaceMatchError";
    this.fault = fault;
  }
}

function assertComparable(a: Embedding, b: Embedding) {
  if (a.length !== b.length) {
    throw new FaceMatchError(
      "DimensionMismatch",
      `Cannot compare vectors of length ${a.length} and ${b.length}`
    );
  }
  if (a.length === 0) {
    throw new FaceMatchError("InvalidVector", "Cannot compare empty vectors");
  }
  for (let i = 0; i < a.length; i++) {
    if (!Number.isFinite(a[i]) || !Number.isFinite(b[i])) {
      throw new FaceMatchError("InvalidVector", `Non-finite value at index ${i}`);
    }
  }
}

export function euclideanDistance(a: Embedding, b: Embedding): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * 1 - cos(a, b), clamped to [0, 2].
 * Two zero vectors are identical (0); a zero vector against anything else is 1.
 */
export function cosineDistance(a: Embedding, b: Embedding): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 && nb === 0) return 0;
  if (na === 0 || nb === 0) return 1;
  const d = 1 - dot / (Math.sqrt(na) * Math.sqrt(nb));
  return Math.min(2, Math.max(0, d));
}

/**
 * Distance-based face comparison. The metric is fixed per instance; the
 * threshold is supplied per call because it only makes sense for one metric.
 */
export class FaceMatcher {
  constructor(readonly metric: DistanceMetric = "euclidean") {}

  distance(a: Embedding, b: Embedding): number {
    assertComparable(a, b);
    return this.metric === "cosine" ? cosineDistance(a, b) : euclideanDistance(a, b);
  }

  compareOne(
    probe: Embedding,
    reference: Embedding,
    threshold: number,
    employeeId = ""
  ): MatchResult {
    const distance = this.distance(probe, reference);
    return {
      found: true,
      employeeId,
      distance,
      accepted: distance <= threshold,
      threshold,
      metric: this.metric,
    };
  }

  /**
   * Nearest candidate within `threshold`. Ties go to the first candidate in
   * iteration order, so callers pass an insertion-ordered map.
   */
  searchBest(
    probe: Embedding,
    candidates: ReadonlyMap<string, Embedding>,
    threshold: number
  ): MatchResult | NoMatchFound {
    let bestId: string | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const [id, reference] of candidates) {
      const d = this.distance(probe, reference);
      if (d < bestDistance) {
        bestDistance = d;
        bestId = id;
      }
    }

    if (bestId === null) {
      return { found: false, minDistance: null, threshold, metric: this.metric };
    }
    if (bestDistance > threshold) {
      return { found: false, minDistance: bestDistance, threshold, metric: this.metric };
    }
    return {
      found: true,
      employeeId: bestId,
      distance: bestDistance,
      accepted: true,
      threshold,
      metric: this.metric,
    };
  }
}
