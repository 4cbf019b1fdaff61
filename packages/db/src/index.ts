import knex, { Knex } from "knex";
import * as trustChain from "../migrations/001_trust_chain.js";

export type DbClient = Knex;

type MigrationModule = {
  up: (knex: Knex) => Promise<void>;
  down: (knex: Knex) => Promise<void>;
};

type MigrationEntry = { name: string; module: MigrationModule };

const migrations: MigrationEntry[] = [{ name: "001_trust_chain", module: trustChain }];

// Static list so migrations load the same way under tsx, node:test and the compiled build.
const migrationSource: Knex.MigrationSource<MigrationEntry> = {
  getMigrations: async () => migrations,
  getMigrationName: (migration) => migration.name,
  getMigration: async (migration) => migration.module
};

const SQLITE_PREFIX = "sqlite:";

/**
 * `postgres://…` connects through pg; `sqlite::memory:` or `sqlite:/path/to/file.db`
 * opens an in-process better-sqlite3 database on a single connection.
 */
export const createDb = (connectionString: string) => {
  if (connectionString.startsWith(SQLITE_PREFIX)) {
    return knex({
      client: "better-sqlite3",
      connection: { filename: connectionString.slice(SQLITE_PREFIX.length) },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 }
    });
  }
  return knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: 10 }
  });
};

export const isPostgres = (db: DbClient) => String(db.client.config.client) === "pg";

/**
 * Row locks only exist on PostgreSQL; SQLite serializes writers on its single
 * connection, so the query is returned unchanged there.
 */
export const withRowLock = <TRecord extends {}, TResult>(
  db: DbClient,
  query: Knex.QueryBuilder<TRecord, TResult>,
  mode: "update" | "share"
) => {
  if (!isPostgres(db)) return query;
  return mode === "update" ? query.forUpdate() : query.forShare();
};

export const runMigrations = async (db: DbClient) => {
  await db.migrate.latest({ migrationSource });
};

export const closeDb = async (db: DbClient) => {
  await db.destroy();
};

export const toIsoTimestamp = (value: unknown) => {
  if (value instanceof Date) return value.toISOString();
  return new Date(String(value)).toISOString();
};

export const toBoolean = (value: unknown) => value === true || value === 1 || value === "1";

const UNIQUE_VIOLATION_CODES = new Set([
  "23505",
  "SQLITE_CONSTRAINT_PRIMARYKEY",
  "SQLITE_CONSTRAINT_UNIQUE"
]);

export const isUniqueViolation = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  UNIQUE_VIOLATION_CODES.has(String(error.code));
