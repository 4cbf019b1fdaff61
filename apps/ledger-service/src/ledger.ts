import {
  createServiceJwtAdminAuthorizer,
  type AdminAuthorizer
} from "@custody/shared";
import { createTrustRegistry, type TrustRegistry, type TrustRegistryId } from "@custody/trust-registry";
import { createSubmissionLedger, type AnchorSigner, type SubmissionLedger } from "@custody/submission-ledger";
import { config } from "./config.js";
import { closeDb, getDb } from "./db.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";

export const ADMIN_SCOPE = "ledger:admin";

export type LedgerContext = {
  ledger: SubmissionLedger;
  /** Registry the ledger currently consults; admin registry routes act on it. */
  activeRegistry: () => Promise<TrustRegistry>;
  anchorSigner: AnchorSigner | null;
};

const buildAdminAuthorizer = (): AdminAuthorizer => {
  const secrets = [config.SERVICE_JWT_SECRET, config.SERVICE_JWT_SECRET_NEXT].filter(
    (secret): secret is string => Boolean(secret)
  );
  if (secrets.length === 0) {
    if (config.ALLOW_INSECURE_DEV_AUTH) {
      return async () => {
        log.warn("admin.auth.insecure_grant", { env: config.NODE_ENV });
        return { subject: "insecure-dev", scopes: [ADMIN_SCOPE] };
      };
    }
    return async () => {
      throw new Error("service_auth_not_configured");
    };
  }
  const authorizers = secrets.map((secret) =>
    createServiceJwtAdminAuthorizer({
      secret,
      audience: config.SERVICE_JWT_AUDIENCE,
      issuer: config.SERVICE_JWT_ISSUER,
      scopes: [ADMIN_SCOPE]
    })
  );
  // The next secret only gets a say when the current one fails on the signature, not on scope.
  return async (token) => {
    let lastError: unknown = new Error("jwt_invalid");
    for (const authorize of authorizers) {
      try {
        return await authorize(token);
      } catch (error) {
        if (error instanceof Error && error.message === "jwt_missing_required_scope") {
          throw error;
        }
        lastError = error;
      }
    }
    throw lastError;
  };
};

const buildAnchorSigner = (): AnchorSigner | null => {
  if (
    !config.ANCHOR_ENABLED ||
    !config.ANCHOR_DEVICE_ID ||
    !config.ANCHOR_PRIVATE_KEY ||
    !config.ANCHOR_DATA_URI
  ) {
    return null;
  }
  return {
    deviceId: config.ANCHOR_DEVICE_ID,
    privateKeyHex: config.ANCHOR_PRIVATE_KEY,
    dataUri: config.ANCHOR_DATA_URI
  };
};

let context: Promise<LedgerContext> | null = null;

export const getLedgerContext = () => {
  if (!context) {
    context = (async () => {
      const db = await getDb();
      const registries = new Map<TrustRegistryId, TrustRegistry>();
      const registryFor = (registryId: TrustRegistryId) => {
        const cached = registries.get(registryId);
        if (cached) return cached;
        const registry = createTrustRegistry({ db, registryId });
        registries.set(registryId, registry);
        return registry;
      };
      const ledger = createSubmissionLedger({
        db,
        registry: registryFor(config.REGISTRY_ID),
        resolveRegistry: registryFor,
        authorizeAdmin: buildAdminAuthorizer(),
        onListenerError: (error, event) => {
          metrics.incCounter("ledger_listener_removed_total");
          log.warn("ledger.listener.removed", { error, eventType: event.type });
        }
      });
      ledger.subscribe((event) => {
        if (event.type === "DataSubmitted") {
          metrics.incCounter("ledger_submissions_accepted_total");
          log.info("ledger.data_submitted", {
            dataHash: event.dataHash,
            deviceId: event.deviceId,
            sequenceNumber: event.sequenceNumber
          });
        }
      });
      return {
        ledger,
        activeRegistry: async () => registryFor(await ledger.getRegistryAddress()),
        anchorSigner: buildAnchorSigner()
      };
    })();
  }
  return context;
};

export const closeLedgerContext = async () => {
  context = null;
  await closeDb();
};
