import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("trust_verifiers", (table) => {
    table.text("registry_id").notNullable();
    table.text("address").notNullable();
    table.text("name").notNullable().defaultTo("");
    table.text("metadata").notNullable().defaultTo("");
    table.boolean("active").notNullable().defaultTo(true);
    table.timestamp("registered_at", { useTz: true }).notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable();
    table.primary(["registry_id", "address"]);
  });

  await knex.schema.createTable("trust_devices", (table) => {
    // Registration order; timestamps can tie within a batch.
    table.bigIncrements("registration_seq").primary();
    table.text("registry_id").notNullable();
    table.text("device_id").notNullable();
    table.text("verifier_address").notNullable();
    table.text("public_key").notNullable();
    table.text("metadata").notNullable().defaultTo("");
    table.boolean("active").notNullable().defaultTo(true);
    table.timestamp("registered_at", { useTz: true }).notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable();
    table.unique(["registry_id", "device_id"], { indexName: "trust_devices_registry_device_uq" });
    table.index(["registry_id", "verifier_address"], "trust_devices_verifier_idx");
  });

  await knex.schema.createTable("ledger_submissions", (table) => {
    table.text("data_hash").primary();
    table.bigInteger("sequence_number").notNullable().unique();
    table.text("registry_id").notNullable();
    table.text("device_id").notNullable();
    table.text("verifier_address").notNullable();
    table.text("signature").notNullable();
    table.text("data_uri").notNullable();
    table.text("metadata").notNullable().defaultTo("");
    table.boolean("verified").notNullable();
    table.timestamp("submitted_at", { useTz: true }).notNullable();
    table.text("prev_chain_hash").notNullable().defaultTo("");
    table.text("chain_hash").notNullable();
    table.index(["device_id", "sequence_number"], "ledger_submissions_device_idx");
    table.index(["verifier_address", "sequence_number"], "ledger_submissions_verifier_idx");
  });

  await knex.schema.createTable("system_metadata", (table) => {
    table.text("key").primary();
    table.text("value").notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("audit_logs", (table) => {
    table.bigIncrements("id").primary();
    table.text("event_type").notNullable();
    table.text("entity_id");
    table.text("data_hash").notNullable();
    table.text("prev_hash");
    table.text("chain_hash").notNullable();
    table.timestamp("created_at", { useTz: true }).notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("audit_logs");
  await knex.schema.dropTableIfExists("system_metadata");
  await knex.schema.dropTableIfExists("ledger_submissions");
  await knex.schema.dropTableIfExists("trust_devices");
  await knex.schema.dropTableIfExists("trust_verifiers");
}
