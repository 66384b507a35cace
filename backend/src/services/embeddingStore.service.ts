import { AttendanceError, persistenceFailure } from "../errors/AttendanceError";
import type { PersistenceGateway } from "../persistence/gateway";
import type { Embedding, EmployeeRecord } from "../types/attendance";
import { checkEmbedding } from "../utils/embedding";
import { KeyedLock } from "../utils/keyedLock";
import { componentLogger } from "../utils/logger";

const log = componentLogger("embedding-store");

/**
 * Immutable view of every registered employee, in load/registration order.
 * A request takes one snapshot and uses it throughout.
 */
export class EmployeeSnapshot {
  private readonly byId: ReadonlyMap<string, EmployeeRecord>;
  private embeddingsCache: ReadonlyMap<string, Embedding> | null = null;

  constructor(
    records: readonly EmployeeRecord[],
    readonly loadedAt: Date
  ) {
    const m = new Map<string, EmployeeRecord>();
    for (const r of records) m.set(r.id, Object.freeze({ ...r }));
    this.byId = m;
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): EmployeeRecord | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  records(): EmployeeRecord[] {
    return [...this.byId.values()];
  }

  /** id → reference embedding, insertion ordered. */
  embeddings(): ReadonlyMap<string, Embedding> {
    if (!this.embeddingsCache) {
      const m = new Map<string, Embedding>();
      for (const [id, r] of this.byId) m.set(id, r.embedding);
      this.embeddingsCache = m;
    }
    return this.embeddingsCache;
  }

  with(record: EmployeeRecord): EmployeeSnapshot {
    return new EmployeeSnapshot([...this.byId.values(), record], new Date());
  }
}

function validated(record: EmployeeRecord): EmployeeRecord {
  const check = checkEmbedding(record.embedding);
  if (!check.ok) {
    throw new AttendanceError(
      "PersistenceFailure",
      `Stored embedding for employee ${record.id} is corrupt`,
      { cause: new Error(check.message) }
    );
  }
  return { ...record, embedding: check.embedding };
}

/**
 * Owns the employee records. Reads are served from the current snapshot;
 * `refresh()` replaces it wholesale and leaves it untouched on failure.
 * Reloads and registrations run one at a time.
 */
export class EmbeddingStore {
  private current = new EmployeeSnapshot([], new Date(0));
  private readonly writes = new KeyedLock();

  constructor(private readonly gateway: PersistenceGateway) {}

  snapshot(): EmployeeSnapshot {
    return this.current;
  }

  async refresh(): Promise<EmployeeSnapshot> {
    return this.writes.run("snapshot", async () => {
      let loaded: EmployeeRecord[];
      try {
        loaded = await this.gateway.loadAllEmployees();
      } catch (e) {
        throw persistenceFailure("load employees", e);
      }

      const next = new EmployeeSnapshot(loaded.map(validated), new Date());
      this.current = next;
      log.info({ employees: next.size, backend: this.gateway.name }, "employee snapshot loaded");
      return next;
    });
  }

  /**
   * Persists a new, already validated record and publishes a snapshot that
   * includes it. DuplicateEmployee from the gateway passes through unchanged.
   */
  async add(record: EmployeeRecord): Promise<EmployeeSnapshot> {
    return this.writes.run("snapshot", async () => {
      if (this.current.has(record.id)) {
        throw new AttendanceError("DuplicateEmployee", `Employee ${record.id} is already registered`);
      }
      try {
        await this.gateway.saveEmployee(record);
      } catch (e) {
        if (e instanceof AttendanceError && e.code === "DuplicateEmployee") throw e;
        throw persistenceFailure("save the employee", e);
      }
      this.current = this.current.with(record);
      return this.current;
    });
  }
}
