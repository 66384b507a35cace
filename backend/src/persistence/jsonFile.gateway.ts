import fs from "node:fs/promises";
import path from "node:path";
import { AttendanceError } from "../errors/AttendanceError";
import type { AttendanceEvent, EmployeeRecord, EventQuery } from "../types/attendance";
import { KeyedLock } from "../utils/keyedLock";
import { componentLogger } from "../utils/logger";
import type { PersistenceGateway } from "./gateway";
import { applyQuery } from "./gateway";
import { parseStoredEmployee, parseStoredEvent } from "./records";

const log = componentLogger("json-gateway");

export const EMPLOYEES_FILE = "employees.json";
export const ATTENDANCE_FILE = "attendance.json";

type EmployeeFileEntry = Omit<EmployeeRecord, "id">;

function isMissingFile(e: unknown): boolean {
  return (
    typeof e === "object" &&
    e !== null &&
    "code" in e &&
    e.code === "ENOENT"
  );
}

async function readJson(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (isMissingFile(e)) return undefined;
    throw e;
  }
  if (!raw.trim()) return undefined;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new AttendanceError("PersistenceFailure", `Malformed JSON in ${path.basename(filePath)}`, {
      cause: e,
    });
  }
}

/**
 * Flat-file storage: `employees.json` is an object keyed by employee id,
 * `attendance.json` an array in append order. Every write rewrites the file
 * through a synced temp file + rename and resolves only after the rename.
 */
export class JsonFileGateway implements PersistenceGateway {
  readonly name = "json";
  private readonly writes = new KeyedLock();

  constructor(private readonly dataDir: string) {}

  get employeesPath() {
    return path.join(this.dataDir, EMPLOYEES_FILE);
  }

  get attendancePath() {
    return path.join(this.dataDir, ATTENDANCE_FILE);
  }

  async loadAllEmployees(): Promise<EmployeeRecord[]> {
    const data = await this.readEmployeeFile();
    return [...data].map(([id, entry]) =>
      parseStoredEmployee(
        typeof entry === "object" && entry !== null ? { ...entry, id } : entry,
        EMPLOYEES_FILE
      )
    );
  }

  async saveEmployee(record: EmployeeRecord): Promise<void> {
    await this.writes.run(EMPLOYEES_FILE, async () => {
      const data = await this.readEmployeeFile();
      if (data.has(record.id)) {
        throw new AttendanceError("DuplicateEmployee", `Employee ${record.id} is already registered`);
      }
      const entry: EmployeeFileEntry = {
        area: record.area,
        role: record.role,
        shift: record.shift,
        embedding: [...record.embedding],
        registeredAt: record.registeredAt,
      };
      data.set(record.id, entry);
      // fromEntries defines own properties, so ids such as "__proto__" survive
      await this.writeAtomic(this.employeesPath, Object.fromEntries(data));
      log.info({ employeeId: record.id }, "employee saved");
    });
  }

  async appendEvent(event: AttendanceEvent): Promise<void> {
    await this.writes.run(ATTENDANCE_FILE, async () => {
      const events = await this.readEventFile();
      events.push(event);
      await this.writeAtomic(this.attendancePath, events);
    });
  }

  async queryEvents(filter: EventQuery): Promise<AttendanceEvent[]> {
    return applyQuery(await this.readEventFile(), filter);
  }

  private async readEmployeeFile(): Promise<Map<string, unknown>> {
    const data = await readJson(this.employeesPath);
    if (data === undefined) return new Map();
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new AttendanceError("PersistenceFailure", `${EMPLOYEES_FILE} is not an object`);
    }
    return new Map(Object.entries(data));
  }

  private async readEventFile(): Promise<AttendanceEvent[]> {
    const data = await readJson(this.attendancePath);
    if (data === undefined) return [];
    if (!Array.isArray(data)) {
      throw new AttendanceError("PersistenceFailure", `${ATTENDANCE_FILE} is not an array`);
    }
    return data.map((raw: unknown) => parseStoredEvent(raw, ATTENDANCE_FILE));
  }

  private async writeAtomic(filePath: string, data: unknown) {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.${process.pid}.tmp`;
    try {
      const handle = await fs.open(tmp, "w");
      try {
        await handle.writeFile(JSON.stringify(data, null, 2), "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, filePath);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
  }
}
