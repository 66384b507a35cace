export const SHIFTS = ["morning", "afternoon", "night"] as const;
export type Shift = (typeof SHIFTS)[number];

export const EVENT_KINDS = ["check-in", "check-out"] as const;
export type EventKind = (typeof EVENT_KINDS)[number];

export const EMBEDDING_DIMENSIONS = 128;

export type Embedding = readonly number[];

export type EmployeeRecord = {
  id: string;
  area: string;
  role: string;
  shift: Shift;
  embedding: Embedding;
  registeredAt: string;
};

// what listings expose; embeddings stay inside the store
export type EmployeeSummary = {
  id: string;
  area: string;
  role: string;
  shift: Shift;
};

export type Timing = "onTime" | "early" | "late";
export type TimingClassification = Timing | "outOfWindow";

export type AttendanceEvent = {
  id: string;
  employeeId: string;
  shift: Shift;
  kind: EventKind;
  /** YYYY-MM-DD in the deployment time zone */
  date: string;
  /** HH:MM:SS in the deployment time zone */
  time: string;
  /** ISO-8601 instant */
  createdAt: string;
  timing: Timing | null;
};

export type EventQuery = {
  employeeId?: string;
  kind?: EventKind;
  fromDate?: string;
  toDate?: string;
  order?: "asc" | "desc";
  limit?: number;
};

export type DistanceMetric = "euclidean" | "cosine";

export type MatchResult = {
  found: true;
  employeeId: string;
  distance: number;
  accepted: boolean;
  threshold: number;
  metric: DistanceMetric;
};

export type NoMatchFound = {
  found: false;
  minDistance: number | null;
  threshold: number;
  metric: DistanceMetric;
};

export type ReasonCode =
  | "InvalidInput"
  | "UnknownEmployee"
  | "DuplicateEmployee"
  | "InvalidEmbedding"
  | "NoMatch"
  | "ShiftMismatch"
  | "AlreadyRegisteredToday"
  | "ConfigurationError"
  | "PersistenceFailure"
  | "ExtractionFailed"
  | "InternalError";

export type Rejection<R extends ReasonCode = ReasonCode> = {
  ok: false;
  reason: R;
  message: string;
};
