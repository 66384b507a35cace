import type {
  AttendanceEvent,
  EmployeeRecord,
  EventQuery,
} from "../types/attendance";

/**
 * Storage seam for the attendance core. Implementations throw on failure;
 * the core wraps whatever they throw as a PersistenceFailure.
 *
 * `saveEmployee` must reject an id that already exists by throwing an
 * AttendanceError with code "DuplicateEmployee".
 *
 * `queryEvents` orders by `createdAt`, ties by append order, ascending by
 * default; "desc" is the exact reverse. `limit` applies after ordering.
 */
export interface PersistenceGateway {
  readonly name: string;
  loadAllEmployees(): Promise<EmployeeRecord[]>;
  saveEmployee(record: EmployeeRecord): Promise<void>;
  appendEvent(event: AttendanceEvent): Promise<void>;
  queryEvents(filter: EventQuery): Promise<AttendanceEvent[]>;
  close?(): Promise<void>;
}

export function matchesQuery(e: AttendanceEvent, filter: EventQuery): boolean {
  if (filter.employeeId !== undefined && e.employeeId !== filter.employeeId) return false;
  if (filter.kind !== undefined && e.kind !== filter.kind) return false;
  if (filter.fromDate !== undefined && e.date < filter.fromDate) return false;
  if (filter.toDate !== undefined && e.date > filter.toDate) return false;
  return true;
}

export function compareCreation(a: AttendanceEvent, b: AttendanceEvent): number {
  const ta = Date.parse(a.createdAt);
  const tb = Date.parse(b.createdAt);
  return ta - tb;
}

/** Applies a query to events held in append order. */
export function applyQuery(events: readonly AttendanceEvent[], filter: EventQuery): AttendanceEvent[] {
  // Array.prototype.sort is stable, so equal timestamps keep append order
  const hits = events.filter((e) => matchesQuery(e, filter)).sort(compareCreation);
  if (filter.order === "desc") hits.reverse();
  if (filter.limit !== undefined && filter.limit >= 0) return hits.slice(0, filter.limit);
  return hits;
}
