import { config } from "./config.js";
import { getDb } from "./db.js";
import { closeLedgerContext } from "./ledger.js";
import { log } from "./log.js";
import { buildServer, isPrivateAddress } from "./server.js";

if (config.NODE_ENV === "production" && !isPrivateAddress(config.SERVICE_BIND_ADDRESS)) {
  throw new Error("refusing_to_bind_publicly_in_production");
}

const app = buildServer();
await getDb();

const shutdown = (signal: string) => {
  log.info("shutdown", { signal });
  app
    .close()
    .then(() => closeLedgerContext())
    .then(() => process.exit(0))
    .catch((error) => {
      log.error("shutdown.failed", { error });
      process.exit(1);
    });
};

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

app
  .listen({ port: config.PORT, host: config.SERVICE_BIND_ADDRESS })
  .then((address) => {
    log.info("listening", { address, registryId: config.REGISTRY_ID });
  })
  .catch((error) => {
    log.error("failed to start", { error });
    process.exit(1);
  });
