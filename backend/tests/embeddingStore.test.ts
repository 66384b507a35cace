import { describe, expect, it } from "vitest";
import { EmbeddingStore } from "../src/services/embeddingStore.service";
import type { EmployeeRecord } from "../src/types/attendance";
import { MemoryGateway, employee } from "./helpers";

/** Reads the employees right away but holds the answer until released. */
class SlowLoadGateway extends MemoryGateway {
  private gate: Promise<void> | null = null;
  private open: () => void = () => undefined;

  hold() {
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release() {
    this.open();
  }

  async loadAllEmployees(): Promise<EmployeeRecord[]> {
    const rows = await super.loadAllEmployees();
    if (this.gate) await this.gate;
    return rows;
  }
}

describe("EmbeddingStore", () => {
  it("keeps a registration that lands while a reload is in flight", async () => {
    const gateway = new SlowLoadGateway();
    gateway.employees.set("E1", employee("E1", "morning"));
    const store = new EmbeddingStore(gateway);

    gateway.hold();
    const reload = store.refresh();
    const adding = store.add(employee("E9", "night"));
    await new Promise((resolve) => setTimeout(resolve, 0));
    gateway.release();
    await Promise.all([reload, adding]);

    expect(store.snapshot().records().map((r) => r.id)).toEqual(["E1", "E9"]);
    expect([...gateway.employees.keys()]).toEqual(["E1", "E9"]);
  });

  it("keeps the previous snapshot when a stored embedding is corrupt", async () => {
    const gateway = new MemoryGateway();
    gateway.employees.set("E1", employee("E1", "morning"));
    const store = new EmbeddingStore(gateway);
    await store.refresh();

    gateway.employees.set("E2", employee("E2", "night", [0.1, 0.2]));
    await expect(store.refresh()).rejects.toMatchObject({
      code: "PersistenceFailure",
      message: "Stored embedding for employee E2 is corrupt",
    });
    expect(store.snapshot().records().map((r) => r.id)).toEqual(["E1"]);
  });

  it("refuses an id already in the snapshot without touching storage", async () => {
    const gateway = new MemoryGateway();
    gateway.employees.set("E1", employee("E1", "morning"));
    const store = new EmbeddingStore(gateway);
    await store.refresh();
    gateway.failing.add("save");

    await expect(store.add(employee("E1", "night"))).rejects.toMatchObject({
      code: "DuplicateEmployee",
      message: "Employee E1 is already registered",
    });
  });
});
