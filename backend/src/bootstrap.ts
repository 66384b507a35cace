import type { AppConfig } from "./config/env";
import { loadShiftSchedule } from "./config/shifts";
import type { PersistenceGateway } from "./persistence/gateway";
import { JsonFileGateway } from "./persistence/jsonFile.gateway";
import { createPool, PostgresGateway } from "./persistence/postgres.gateway";
import { createAttendanceService, type AttendanceService } from "./services/attendance.service";
import { HttpEmbeddingExtractor } from "./services/embeddingExtractor.service";
import { componentLogger } from "./utils/logger";

const log = componentLogger("bootstrap");

export type Runtime = {
  service: AttendanceService;
  gateway: PersistenceGateway;
};

/**
 * Copies employees from a JSON data directory into an empty employees table.
 * Runs once: a table with any rows is left alone.
 */
export async function seedFromJson(target: PostgresGateway, seedDir: string): Promise<number> {
  if ((await target.countEmployees()) > 0) return 0;

  const source = new JsonFileGateway(seedDir);
  const records = await source.loadAllEmployees();
  const inserted = await target.importEmployees(records);
  log.info({ seedDir, found: records.length, inserted }, "employees imported from json");
  return inserted;
}

async function openGateway(cfg: AppConfig): Promise<PersistenceGateway> {
  if (cfg.STORAGE_DRIVER === "json") {
    log.info({ dataDir: cfg.DATA_DIR }, "using json storage");
    return new JsonFileGateway(cfg.DATA_DIR);
  }

  if (!cfg.DATABASE_URL) throw new Error("DATABASE_URL is required when STORAGE_DRIVER=postgres");
  const gateway = PostgresGateway.fromPool(createPool(cfg.DATABASE_URL, cfg.DB_POOL_MAX));
  await gateway.ensureSchema();
  if (cfg.SEED_JSON_PATH) await seedFromJson(gateway, cfg.SEED_JSON_PATH);
  log.info("using postgres storage");
  return gateway;
}

export async function bootstrap(cfg: AppConfig): Promise<Runtime> {
  const schedule = loadShiftSchedule(cfg.SHIFT_SCHEDULE_PATH);
  const gateway = await openGateway(cfg);

  const service = createAttendanceService(cfg, gateway, {
    schedule,
    extractor: new HttpEmbeddingExtractor(cfg.AI_BASE_URL, cfg.AI_TIMEOUT_MS),
  });

  const loaded = await service.refresh();
  if (!loaded.ok) {
    await gateway.close?.();
    throw new Error(`Could not load employees: ${loaded.message}`);
  }
  return { service, gateway };
}
