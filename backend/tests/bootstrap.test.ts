import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { seedFromJson } from "../src/bootstrap";
import { JsonFileGateway } from "../src/persistence/jsonFile.gateway";
import { PostgresGateway, type Queryable } from "../src/persistence/postgres.gateway";
import { employee } from "./helpers";

class CountingDb implements Queryable {
  readonly statements: string[] = [];

  constructor(private readonly existing: number) {}

  async query(text: string) {
    this.statements.push(text);
    if (text.startsWith("SELECT COUNT")) return { rows: [{ n: String(this.existing) }], rowCount: 1 };
    return { rows: [], rowCount: 1 };
  }
}

describe("seedFromJson", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "attendance-seed-"));
    const source = new JsonFileGateway(dir);
    await source.saveEmployee(employee("E1", "morning"));
    await source.saveEmployee(employee("E2", "night"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("imports every employee into an empty table", async () => {
    const db = new CountingDb(0);
    expect(await seedFromJson(new PostgresGateway(db), dir)).toBe(2);
    expect(db.statements.filter((s) => s.includes("INSERT INTO employees"))).toHaveLength(2);
  });

  it("leaves a populated table alone", async () => {
    const db = new CountingDb(3);
    expect(await seedFromJson(new PostgresGateway(db), dir)).toBe(0);
    expect(db.statements).toHaveLength(1);
  });
});
