import { AttendanceError } from "../src/errors/AttendanceError";
import { applyQuery, type PersistenceGateway } from "../src/persistence/gateway";
import {
  EMBEDDING_DIMENSIONS,
  type AttendanceEvent,
  type EmployeeRecord,
  type EventQuery,
  type Shift,
} from "../src/types/attendance";

export type GatewayCall = "load" | "save" | "append" | "query";

/** In-process stand-in for a storage backend. */
export class MemoryGateway implements PersistenceGateway {
  readonly name = "memory";
  readonly employees = new Map<string, EmployeeRecord>();
  readonly events: AttendanceEvent[] = [];
  readonly failing = new Set<GatewayCall>();

  async loadAllEmployees(): Promise<EmployeeRecord[]> {
    this.maybeFail("load");
    return [...this.employees.values()];
  }

  async saveEmployee(record: EmployeeRecord): Promise<void> {
    this.maybeFail("save");
    if (this.employees.has(record.id)) {
      throw new AttendanceError("DuplicateEmployee", `Employee ${record.id} is already registered`);
    }
    this.employees.set(record.id, record);
  }

  async appendEvent(event: AttendanceEvent): Promise<void> {
    this.maybeFail("append");
    this.events.push(event);
  }

  async queryEvents(filter: EventQuery): Promise<AttendanceEvent[]> {
    this.maybeFail("query");
    return applyQuery(this.events, filter);
  }

  private maybeFail(call: GatewayCall) {
    if (this.failing.has(call)) throw new Error(`connection refused (${call})`);
  }
}

export function vector(fill = 0): number[] {
  return new Array<number>(EMBEDDING_DIMENSIONS).fill(fill);
}

/** Zero vector with one coordinate set. */
export function withValueAt(index: number, value: number): number[] {
  const v = vector(0);
  v[index] = value;
  return v;
}

export function employee(id: string, shift: Shift, embedding: number[] = vector(0)): EmployeeRecord {
  return {
    id,
    area: "Assembly",
    role: "Operator",
    shift,
    embedding,
    registeredAt: "2024-01-01T00:00:00.000Z",
  };
}

/** Clock that only moves when told to. */
export function fixedClock(iso: string) {
  let now = new Date(iso);
  return {
    now: () => now,
    set(next: string) {
      now = new Date(next);
    },
  };
}

export function sequentialIds(prefix = "evt") {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
