import pg from "pg";
import { z } from "zod";
import { AttendanceError } from "../errors/AttendanceError";
import type { AttendanceEvent, EmployeeRecord, EventQuery } from "../types/attendance";
import { componentLogger } from "../utils/logger";
import type { PersistenceGateway } from "./gateway";
import { parseStoredEmployee, parseStoredEvent } from "./records";

const log = componentLogger("pg-gateway");

/** The slice of pg.Pool this gateway uses. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const timestampSchema = z.union([z.date(), z.string()]).transform(toIso);

const employeeRowSchema = z
  .object({
    id: z.string(),
    area: z.string(),
    role: z.string(),
    shift: z.string(),
    embedding: z.unknown(),
    registered_at: timestampSchema,
  })
  .transform(({ registered_at, ...rest }) => ({ ...rest, registeredAt: registered_at }));

const eventRowSchema = z
  .object({
    id: z.string(),
    employee_id: z.string(),
    shift: z.string(),
    kind: z.string(),
    event_date: z.string(),
    event_time: z.string(),
    created_at: timestampSchema,
    timing: z.string().nullable(),
  })
  .transform((r) => ({
    id: r.id,
    employeeId: r.employee_id,
    shift: r.shift,
    kind: r.kind,
    date: r.event_date,
    time: r.event_time,
    createdAt: r.created_at,
    timing: r.timing,
  }));

const countRowSchema = z.object({ n: z.coerce.number() });

function rowOf<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, table: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new AttendanceError("PersistenceFailure", `Unexpected row shape from ${table}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

const UNIQUE_VIOLATION = "23505";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS employees (
  id            TEXT PRIMARY KEY,
  area          TEXT NOT NULL,
  role          TEXT NOT NULL,
  shift         TEXT NOT NULL,
  embedding     JSONB NOT NULL,
  registered_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS attendance_events (
  seq         BIGSERIAL PRIMARY KEY,
  id          TEXT NOT NULL UNIQUE,
  employee_id TEXT NOT NULL,
  shift       TEXT NOT NULL,
  kind        TEXT NOT NULL CHECK (kind IN ('check-in', 'check-out')),
  event_date  TEXT NOT NULL,
  event_time  TEXT NOT NULL,
  created_at  TIMESTAMPTZ NOT NULL,
  timing      TEXT
);

CREATE INDEX IF NOT EXISTS attendance_events_employee_created_idx
  ON attendance_events (employee_id, created_at, seq);
`;

function toIso(v: Date | string): string {
  return v instanceof Date ? v.toISOString() : new Date(v).toISOString();
}

function hasCode(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

export function createPool(connectionString: string, max: number): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
  pool.on("error", (err) => {
    log.error({ err }, "unexpected error on idle database client");
  });
  return pool;
}

/**
 * PostgreSQL storage. Events carry a BIGSERIAL `seq` so rows sharing a
 * `created_at` still sort in append order. Employees have no foreign key from
 * events: history outlives the employee row.
 */
export class PostgresGateway implements PersistenceGateway {
  readonly name = "postgres";

  constructor(
    private readonly db: Queryable,
    private readonly onClose?: () => Promise<void>
  ) {}

  static fromPool(pool: pg.Pool): PostgresGateway {
    return new PostgresGateway(pool, () => pool.end());
  }

  async ensureSchema(): Promise<void> {
    await this.db.query(SCHEMA_SQL);
  }

  async countEmployees(): Promise<number> {
    const res = await this.db.query("SELECT COUNT(*)::text AS n FROM employees");
    return res.rows.length > 0 ? rowOf(countRowSchema, res.rows[0], "employees").n : 0;
  }

  async loadAllEmployees(): Promise<EmployeeRecord[]> {
    const res = await this.db.query(
      "SELECT id, area, role, shift, embedding, registered_at FROM employees ORDER BY registered_at ASC, id ASC"
    );
    return res.rows.map((row) => parseStoredEmployee(rowOf(employeeRowSchema, row, "employees"), "employees"));
  }

  async saveEmployee(record: EmployeeRecord): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO employees (id, area, role, shift, embedding, registered_at)
         VALUES ($1, $2, $3, $4, $5::jsonb, $6)`,
        [
          record.id,
          record.area,
          record.role,
          record.shift,
          JSON.stringify(record.embedding),
          record.registeredAt,
        ]
      );
    } catch (e) {
      if (hasCode(e, UNIQUE_VIOLATION)) {
        throw new AttendanceError("DuplicateEmployee", `Employee ${record.id} is already registered`, {
          cause: e,
        });
      }
      throw e;
    }
  }

  /** Inserts records that are not there yet; returns how many were new. */
  async importEmployees(records: readonly EmployeeRecord[]): Promise<number> {
    let inserted = 0;
    for (const record of records) {
      const res = await this.db.query(
        `INSERT INTO employees (id, area, role, shift, embedding, registered_at)
         VALUES ($1, $2, $3, $4, $5::jsonb, $6)
         ON CONFLICT (id) DO NOTHING`,
        [
          record.id,
          record.area,
          record.role,
          record.shift,
          JSON.stringify(record.embedding),
          record.registeredAt,
        ]
      );
      inserted += res.rowCount ?? 0;
    }
    return inserted;
  }

  async appendEvent(event: AttendanceEvent): Promise<void> {
    await this.db.query(
      `INSERT INTO attendance_events
         (id, employee_id, shift, kind, event_date, event_time, created_at, timing)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        event.id,
        event.employeeId,
        event.shift,
        event.kind,
        event.date,
        event.time,
        event.createdAt,
        event.timing,
      ]
    );
  }

  async queryEvents(filter: EventQuery): Promise<AttendanceEvent[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    const add = (clause: string, value: unknown) => {
      params.push(value);
      where.push(clause.replace("?", `$${params.length}`));
    };

    if (filter.employeeId !== undefined) add("employee_id = ?", filter.employeeId);
    if (filter.kind !== undefined) add("kind = ?", filter.kind);
    if (filter.fromDate !== undefined) add("event_date >= ?", filter.fromDate);
    if (filter.toDate !== undefined) add("event_date <= ?", filter.toDate);

    const dir = filter.order === "desc" ? "DESC" : "ASC";
    let sql =
      "SELECT id, employee_id, shift, kind, event_date, event_time, created_at, timing FROM attendance_events";
    if (where.length > 0) sql += ` WHERE ${where.join(" AND ")}`;
    sql += ` ORDER BY created_at ${dir}, seq ${dir}`;
    if (filter.limit !== undefined && filter.limit >= 0) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const res = await this.db.query(sql, params);
    return res.rows.map((row) =>
      parseStoredEvent(rowOf(eventRowSchema, row, "attendance_events"), "attendance_events")
    );
  }

  async close(): Promise<void> {
    if (this.onClose) await this.onClose();
  }
}
