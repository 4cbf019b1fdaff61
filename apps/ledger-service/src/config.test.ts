import { test } from "node:test";
import assert from "node:assert/strict";

process.env.NODE_ENV = "test";
delete process.env.ANCHOR_ENABLED;

const PROD_SECRET = "A".repeat(43);

const load = async () => (await import("./config.js")).parseConfig;

test("defaults outside production", async () => {
  const parseConfig = await load();
  const config = parseConfig({ NODE_ENV: "development" });
  assert.equal(config.PORT, 3010);
  assert.equal(config.AUTO_MIGRATE, true);
  assert.equal(config.SERVICE_BIND_ADDRESS, "0.0.0.0");
  assert.equal(config.REGISTRY_ID, "default");
  assert.equal(config.HISTORY_MAX_PAGE_SIZE, 100);
  assert.equal(config.SERVICE_JWT_AUDIENCE, "custody.service.ledger");
  assert.equal(config.SERVICE_JWT_ISSUER, "ledger-gateway");
  assert.equal(config.SERVICE_JWT_SECRET_FORMAT_STRICT, false);
  assert.equal(config.ANCHOR_ENABLED, false);
});

test("numeric limits are clamped and fall back on garbage", async () => {
  const parseConfig = await load();
  const config = parseConfig({
    NODE_ENV: "test",
    HISTORY_MAX_PAGE_SIZE: "5000",
    RATE_LIMIT_MAX: "0",
    BODY_LIMIT_BYTES: "not-a-number",
    PORT: ""
  });
  assert.equal(config.HISTORY_MAX_PAGE_SIZE, 1000);
  assert.equal(config.RATE_LIMIT_MAX, 1);
  assert.equal(config.BODY_LIMIT_BYTES, 2 * 1024 * 1024);
  assert.equal(config.PORT, 3010);
});

test("production guards", async () => {
  const parseConfig = await load();
  const base = {
    NODE_ENV: "production",
    AUTO_MIGRATE: "false",
    SERVICE_JWT_SECRET: PROD_SECRET,
    DATABASE_URL: "postgres://ledger@db.internal/ledger"
  };

  const config = parseConfig(base);
  assert.equal(config.SERVICE_BIND_ADDRESS, "127.0.0.1");
  assert.equal(config.AUTO_MIGRATE, false);
  assert.equal(config.SERVICE_JWT_SECRET_FORMAT_STRICT, true);

  assert.throws(
    () => parseConfig({ ...base, AUTO_MIGRATE: "true" }),
    /auto_migrate_not_allowed_in_production/
  );
  // Unset in production means off.
  assert.equal(parseConfig({ ...base, AUTO_MIGRATE: "" }).AUTO_MIGRATE, false);
  assert.throws(
    () => parseConfig({ ...base, ALLOW_INSECURE_DEV_AUTH: "true" }),
    /insecure_dev_auth_not_allowed_in_production/
  );
  assert.throws(
    () => parseConfig({ ...base, SERVICE_JWT_SECRET: "" }),
    /service_jwt_secret_required_in_production/
  );
  assert.throws(
    () => parseConfig({ ...base, DATABASE_URL: "sqlite::memory:" }),
    /sqlite_not_allowed_in_production/
  );
  assert.throws(
    () => parseConfig({ ...base, SERVICE_JWT_SECRET: "not a base64url or hex secret!!!!!!!!" }),
    /service_jwt_secret_format_invalid:SERVICE_JWT_SECRET/
  );
});

test("short service secrets are rejected", async () => {
  const parseConfig = await load();
  assert.throws(() => parseConfig({ NODE_ENV: "test", SERVICE_JWT_SECRET: "test-secret" }));
});

test("anchoring needs its device, key and data uri", async () => {
  const parseConfig = await load();
  assert.throws(
    () => parseConfig({ NODE_ENV: "test", ANCHOR_ENABLED: "true", ANCHOR_DEVICE_ID: "a".repeat(64) }),
    /anchor_config_missing:ANCHOR_PRIVATE_KEY,ANCHOR_DATA_URI/
  );
  const config = parseConfig({
    NODE_ENV: "test",
    ANCHOR_ENABLED: "true",
    ANCHOR_DEVICE_ID: "a".repeat(64),
    ANCHOR_PRIVATE_KEY: "b".repeat(64),
    ANCHOR_DATA_URI: "https://ledger.example/anchors"
  });
  assert.equal(config.ANCHOR_ENABLED, true);
});
