import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AttendanceError } from "../src/errors/AttendanceError";
import { JsonFileGateway } from "../src/persistence/jsonFile.gateway";
import type { AttendanceEvent } from "../src/types/attendance";
import { employee, vector } from "./helpers";

function event(id: string, createdAt: string, kind: AttendanceEvent["kind"] = "check-in"): AttendanceEvent {
  return {
    id,
    employeeId: "E1",
    shift: "morning",
    kind,
    date: createdAt.slice(0, 10),
    time: createdAt.slice(11, 19),
    createdAt,
    timing: null,
  };
}

async function failureOf(work: Promise<unknown>): Promise<string> {
  try {
    await work;
    return "resolved";
  } catch (e) {
    return e instanceof AttendanceError ? `${e.code}: ${e.message}` : String(e);
  }
}

describe("JsonFileGateway", () => {
  let dir: string;
  let gateway: JsonFileGateway;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "attendance-json-"));
    gateway = new JsonFileGateway(dir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the files do not exist", async () => {
    expect(await gateway.loadAllEmployees()).toEqual([]);
    expect(await gateway.queryEvents({})).toEqual([]);
  });

  it("stores employees keyed by id and reads them back", async () => {
    await gateway.saveEmployee(employee("E1", "morning"));

    const onDisk: unknown = JSON.parse(await fs.readFile(gateway.employeesPath, "utf8"));
    expect(onDisk).toEqual({
      E1: {
        area: "Assembly",
        role: "Operator",
        shift: "morning",
        embedding: vector(0),
        registeredAt: "2024-01-01T00:00:00.000Z",
      },
    });
    expect(await gateway.loadAllEmployees()).toEqual([employee("E1", "morning")]);
  });

  it("refuses a duplicate id", async () => {
    await gateway.saveEmployee(employee("E1", "morning"));
    expect(await failureOf(gateway.saveEmployee(employee("E1", "night")))).toBe(
      "DuplicateEmployee: Employee E1 is already registered"
    );
  });

  it("accepts legacy records without a registration time and with a capitalized shift", async () => {
    await fs.writeFile(
      gateway.employeesPath,
      JSON.stringify({ "1001": { area: "Packing", role: "Lead", shift: "Night", embedding: [0.5] } })
    );
    expect(await gateway.loadAllEmployees()).toEqual([
      {
        id: "1001",
        area: "Packing",
        role: "Lead",
        shift: "night",
        embedding: [0.5],
        registeredAt: "1970-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("appends events and filters them", async () => {
    await gateway.appendEvent(event("a", "2024-03-04T06:00:00.000Z"));
    await gateway.appendEvent(event("b", "2024-03-04T14:00:00.000Z", "check-out"));
    await gateway.appendEvent(event("c", "2024-03-05T06:00:00.000Z"));

    expect((await gateway.queryEvents({ order: "desc", limit: 1 })).map((e) => e.id)).toEqual(["c"]);
    expect((await gateway.queryEvents({ kind: "check-in" })).map((e) => e.id)).toEqual(["a", "c"]);
    expect(
      (await gateway.queryEvents({ fromDate: "2024-03-04", toDate: "2024-03-04" })).map((e) => e.id)
    ).toEqual(["a", "b"]);
  });

  it("keeps every event when appends overlap", async () => {
    await Promise.all(
      ["a", "b", "c", "d"].map((id, i) => gateway.appendEvent(event(id, `2024-03-04T06:0${i}:00.000Z`)))
    );
    expect((await gateway.queryEvents({})).map((e) => e.id)).toEqual(["a", "b", "c", "d"]);
    expect(await fs.readdir(dir)).toEqual(["attendance.json"]);
  });

  it("stores ids that collide with Object.prototype keys", async () => {
    await gateway.saveEmployee(employee("__proto__", "night"));

    const raw = await fs.readFile(gateway.employeesPath, "utf8");
    expect(raw.startsWith('{\n  "__proto__": {\n    "area": "Assembly",')).toBe(true);

    const reloaded = await new JsonFileGateway(dir).loadAllEmployees();
    expect(reloaded.map((e) => [e.id, e.shift])).toEqual([["__proto__", "night"]]);
    expect(await failureOf(gateway.saveEmployee(employee("__proto__", "night")))).toBe(
      "DuplicateEmployee: Employee __proto__ is already registered"
    );
  });

  it("removes the temp file when the final rename fails", async () => {
    vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("disk full"));

    expect(await failureOf(gateway.saveEmployee(employee("E1", "morning")))).toBe("Error: disk full");
    expect(await fs.readdir(dir)).toEqual([]);
    expect(await gateway.loadAllEmployees()).toEqual([]);
  });

  it("reports malformed files as PersistenceFailure", async () => {
    await fs.writeFile(gateway.attendancePath, "{ not json");
    expect(await failureOf(gateway.queryEvents({}))).toBe("PersistenceFailure: Malformed JSON in attendance.json");

    await fs.writeFile(gateway.employeesPath, "[]");
    expect(await failureOf(gateway.loadAllEmployees())).toBe(
      "PersistenceFailure: employees.json is not an object"
    );
  });

  it("reports a corrupt record", async () => {
    await fs.writeFile(gateway.employeesPath, JSON.stringify({ E1: { area: "A", role: "B", shift: "dawn", embedding: [] } }));
    expect(await failureOf(gateway.loadAllEmployees())).toBe(
      "PersistenceFailure: Corrupt employee record in employees.json"
    );
  });
});
