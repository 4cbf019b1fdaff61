import { createDb, runMigrations, type DbClient } from "@custody/db";
import { config } from "./config.js";
import { log } from "./log.js";

let db: DbClient | null = null;
let ready: Promise<DbClient> | null = null;

export const getDb = async () => {
  if (db) {
    return db;
  }
  if (!ready) {
    ready = (async () => {
      const client = createDb(config.DATABASE_URL);
      if (config.AUTO_MIGRATE) {
        await runMigrations(client);
        log.info("db.migrated", { registryId: config.REGISTRY_ID });
      }
      db = client;
      return client;
    })();
  }
  return ready;
};

export const closeDb = async () => {
  const current = db ?? (ready ? await ready : null);
  db = null;
  ready = null;
  if (current) {
    await current.destroy();
  }
};
