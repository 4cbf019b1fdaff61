import { isUniqueViolation, toBoolean, toIsoTimestamp, withRowLock, type DbClient } from "@custody/db";
import {
  AuthorizationError,
  ConflictError,
  HistoryRangeError,
  IntegrityError,
  NotFoundError,
  ValidationError,
  ZERO_HASH,
  isHex32,
  normalizeHex32,
  sha256Hex,
  verifyDataHashSignature
} from "@custody/shared";
import {
  createTrustRegistry,
  writeAuditLog,
  type TrustRegistry,
  type TrustRegistryId
} from "@custody/trust-registry";
import { GENESIS_CHAIN_HASH, computeSubmissionChainHash, verifySubmissionChain } from "./auditChain.js";
import { createSerialQueue } from "./serialQueue.js";
import type {
  DataHash,
  LedgerEvent,
  LedgerListener,
  Submission,
  SubmissionLedger,
  SubmissionLedgerOptions
} from "./types.js";

const COUNT_KEY = "ledger_submission_count";
const HEAD_KEY = "ledger_chain_head";
const REGISTRY_KEY = "ledger_registry_id";

const MAX_DATA_URI = 2048;
const MAX_METADATA = 16_384;
const REGISTRY_ID_PATTERN = /^[\x21-\x7e]{1,128}$/;

type SubmissionRow = {
  data_hash: string;
  sequence_number: number | string;
  registry_id: string;
  device_id: string;
  verifier_address: string;
  signature: string;
  data_uri: string;
  metadata: string;
  verified: unknown;
  submitted_at: unknown;
  prev_chain_hash: string;
  chain_hash: string;
};

const toSubmission = (row: SubmissionRow): Submission => ({
  dataHash: row.data_hash,
  deviceId: row.device_id,
  verifierAddress: row.verifier_address,
  registryId: row.registry_id,
  signature: row.signature,
  timestamp: toIsoTimestamp(row.submitted_at),
  dataUri: row.data_uri,
  metadata: row.metadata,
  verified: toBoolean(row.verified),
  // pg returns bigint columns as strings.
  sequenceNumber: Number(row.sequence_number),
  prevChainHash: row.prev_chain_hash,
  chainHash: row.chain_hash
});

const requireDataHash = (value: string) => {
  const normalized = normalizeHex32(value);
  if (!isHex32(normalized)) {
    throw new ValidationError("data_hash_invalid", "Data hash must be 32 bytes of hex");
  }
  if (normalized === ZERO_HASH) {
    throw new ValidationError("data_hash_zero", "Data hash must not be the zero hash");
  }
  return normalized;
};

const requireIndex = (value: number, name: string) => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${name}_invalid`, `${name} must be a non-negative integer`);
  }
  return value;
};

export const createSubmissionLedger = (options: SubmissionLedgerOptions): SubmissionLedger => {
  const { db, authorizeAdmin } = options;
  const now = options.now ?? (() => new Date());
  const queue = createSerialQueue();
  const listeners = new Set<LedgerListener>();
  const registries = new Map<TrustRegistryId, TrustRegistry>([
    [options.registry.registryId, options.registry]
  ]);

  const registryFor = (registryId: TrustRegistryId) => {
    const cached = registries.get(registryId);
    if (cached) return cached;
    const registry = options.resolveRegistry
      ? options.resolveRegistry(registryId)
      : createTrustRegistry({ db, registryId, now });
    registries.set(registryId, registry);
    return registry;
  };

  const readRegistryId = async (conn: DbClient): Promise<TrustRegistryId> => {
    const row: { value: string } | undefined = await conn("system_metadata")
      .where({ key: REGISTRY_KEY })
      .first("value");
    return row?.value || options.registry.registryId;
  };

  const readCounter = async (conn: DbClient) => {
    const row: { value: string } | undefined = await conn("system_metadata")
      .where({ key: COUNT_KEY })
      .first("value");
    return row ? Number(row.value) : 0;
  };

  /** Creates the head rows on first use and locks them for the rest of the transaction. */
  const lockHead = async (trx: DbClient, timestamp: string) => {
    await trx("system_metadata")
      .insert([
        { key: COUNT_KEY, value: "0", updated_at: timestamp },
        { key: HEAD_KEY, value: GENESIS_CHAIN_HASH, updated_at: timestamp }
      ])
      .onConflict("key")
      .ignore();
    const rows: Array<{ key: string; value: string }> = await withRowLock(
      trx,
      trx("system_metadata").whereIn("key", [COUNT_KEY, HEAD_KEY]).select("key", "value"),
      "update"
    );
    const value = (key: string) => rows.find((row) => row.key === key)?.value ?? "";
    return { total: Number(value(COUNT_KEY) || "0"), chainHead: value(HEAD_KEY) };
  };

  const findSubmission = async (conn: DbClient, dataHash: string) => {
    const row: SubmissionRow | undefined = await conn("ledger_submissions")
      .where({ data_hash: normalizeHex32(dataHash) })
      .first();
    return row ? toSubmission(row) : null;
  };

  const emit = (event: LedgerEvent) => {
    for (const listener of [...listeners]) {
      try {
        listener(event);
      } catch (error) {
        listeners.delete(listener);
        options.onListenerError?.(error, event);
      }
    }
  };

  const submitData: SubmissionLedger["submitData"] = async (input) => {
    const dataHash = requireDataHash(input.dataHash);
    const signature = input.signature.trim();
    const dataUri = input.dataUri.trim();
    const metadata = input.metadata ?? "";
    if (!signature) {
      throw new ValidationError("signature_missing", "Signature must not be empty");
    }
    if (!dataUri) {
      throw new ValidationError("data_uri_missing", "Data URI must not be empty");
    }
    if (dataUri.length > MAX_DATA_URI) {
      throw new ValidationError("data_uri_too_long");
    }
    if (metadata.length > MAX_METADATA) {
      throw new ValidationError("metadata_too_long");
    }
    const deviceId = input.deviceId.trim().toLowerCase();

    let submission: Submission;
    try {
      submission = await queue.run(() =>
        db.transaction(async (trx) => {
          const timestamp = now().toISOString();
          const head = await lockHead(trx, timestamp);
          if (await findSubmission(trx, dataHash)) {
            throw new ConflictError("data_hash_duplicate", `Data hash ${dataHash} was already submitted`);
          }

          const registryId = await readRegistryId(trx);
          const authorization = await registryFor(registryId).readAuthorization(deviceId, trx);
          if (!authorization?.deviceActive) {
            throw new AuthorizationError("device_inactive", `Device ${deviceId} is not active`);
          }
          if (!authorization.verifierActive) {
            throw new AuthorizationError(
              "verifier_inactive",
              `Verifier ${authorization.verifierAddress} is not active`
            );
          }
          const signatureValid = verifyDataHashSignature({
            dataHashHex: dataHash,
            signatureHex: signature,
            publicKeyHex: authorization.publicKey
          });
          if (!signatureValid) {
            throw new IntegrityError("signature_invalid", "Signature does not match the device key");
          }

          const fields = {
            dataHash,
            deviceId: authorization.deviceId,
            verifierAddress: authorization.verifierAddress,
            registryId,
            signature: signature.toLowerCase(),
            dataUri,
            metadata,
            sequenceNumber: head.total,
            timestamp
          };
          const chainHash = computeSubmissionChainHash(head.chainHead, fields);
          await trx("ledger_submissions").insert({
            data_hash: fields.dataHash,
            sequence_number: fields.sequenceNumber,
            registry_id: fields.registryId,
            device_id: fields.deviceId,
            verifier_address: fields.verifierAddress,
            signature: fields.signature,
            data_uri: fields.dataUri,
            metadata: fields.metadata,
            verified: true,
            submitted_at: timestamp,
            prev_chain_hash: head.chainHead,
            chain_hash: chainHash
          });
          await trx("system_metadata")
            .where({ key: COUNT_KEY })
            .update({ value: String(head.total + 1), updated_at: timestamp });
          await trx("system_metadata")
            .where({ key: HEAD_KEY })
            .update({ value: chainHash, updated_at: timestamp });

          const stored: Submission = {
            ...fields,
            verified: true,
            prevChainHash: head.chainHead,
            chainHash
          };
          return stored;
        })
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("data_hash_duplicate", `Data hash ${dataHash} was already submitted`);
      }
      throw error;
    }

    emit({
      type: "DataSubmitted",
      dataHash: submission.dataHash,
      deviceId: submission.deviceId,
      verifierAddress: submission.verifierAddress,
      timestamp: submission.timestamp,
      dataUri: submission.dataUri,
      sequenceNumber: submission.sequenceNumber
    });
    emit({
      type: "SubmissionVerified",
      dataHash: submission.dataHash,
      deviceId: submission.deviceId,
      isValid: submission.verified
    });

    return {
      submissionId: submission.dataHash,
      sequenceNumber: submission.sequenceNumber,
      timestamp: submission.timestamp,
      chainHash: submission.chainHash
    };
  };

  const verifySubmission: SubmissionLedger["verifySubmission"] = async (dataHash) => {
    const submission = await findSubmission(db, dataHash);
    if (!submission) {
      throw new NotFoundError("submission_not_found", `No submission for data hash ${dataHash}`);
    }
    return submission;
  };

  const verifyDataIntegrity: SubmissionLedger["verifyDataIntegrity"] = async (dataHash, providedData) => {
    const submission = await verifySubmission(dataHash);
    return sha256Hex(providedData) === submission.dataHash;
  };

  const listHashes = async (where: Record<string, string>): Promise<DataHash[]> => {
    const rows: Array<{ data_hash: string }> = await db("ledger_submissions")
      .where(where)
      .orderBy("sequence_number", "asc")
      .select("data_hash");
    return rows.map((row) => row.data_hash);
  };

  const getDeviceSubmissions: SubmissionLedger["getDeviceSubmissions"] = async (deviceId) =>
    listHashes({ device_id: deviceId.trim().toLowerCase() });

  const getVerifierSubmissions: SubmissionLedger["getVerifierSubmissions"] = async (verifierAddress) =>
    listHashes({ verifier_address: verifierAddress.trim() });

  const getSubmissionDetails: SubmissionLedger["getSubmissionDetails"] = async (dataHash) => {
    const submission = await verifySubmission(dataHash);
    const registry = registryFor(submission.registryId);
    const device = await registry.getDevice(submission.deviceId);
    const verifier = await registry.getVerifier(device.verifierAddress);
    return { submission, device, verifier };
  };

  const hasSubmission: SubmissionLedger["hasSubmission"] = async (dataHash) =>
    (await findSubmission(db, dataHash)) !== null;

  const getTotalSubmissions: SubmissionLedger["getTotalSubmissions"] = async () => readCounter(db);

  const getSubmissionHistory: SubmissionLedger["getSubmissionHistory"] = async (startIndex, count) => {
    const start = requireIndex(startIndex, "start_index");
    const size = requireIndex(count, "count");
    const total = await readCounter(db);
    if (start >= total) {
      throw new HistoryRangeError(
        "history_start_out_of_range",
        `Start index ${start} is not below the total of ${total} submissions`
      );
    }
    if (size === 0) return [];
    const rows: Array<{ data_hash: string }> = await db("ledger_submissions")
      .orderBy("sequence_number", "asc")
      .offset(start)
      .limit(size)
      .select("data_hash");
    return rows.map((row) => row.data_hash);
  };

  const updateRegistryAddress: SubmissionLedger["updateRegistryAddress"] = async (newRegistry, adminToken) => {
    if (!adminToken) {
      throw new AuthorizationError("admin_token_missing", "An administrator token is required");
    }
    const grant = await authorizeAdmin(adminToken).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : "admin_token_invalid";
      throw new AuthorizationError("admin_token_rejected", reason);
    });
    const registryId = newRegistry.trim();
    if (!REGISTRY_ID_PATTERN.test(registryId)) {
      throw new ValidationError("registry_id_invalid", "Registry id must be 1-128 printable characters");
    }

    return queue.run(() =>
      db.transaction(async (trx) => {
        const timestamp = now().toISOString();
        const previousRegistryId = await readRegistryId(trx);
        await trx("system_metadata")
          .insert({ key: REGISTRY_KEY, value: registryId, updated_at: timestamp })
          .onConflict("key")
          .merge({ value: registryId, updated_at: timestamp });
        await writeAuditLog(
          trx,
          "ledger.registry_repointed",
          { entityId: registryId, previousRegistryId, subject: grant.subject },
          timestamp
        );
        return { registryId, previousRegistryId, grant };
      })
    );
  };

  const getRegistryAddress: SubmissionLedger["getRegistryAddress"] = async () => readRegistryId(db);

  const verifyAuditChain: SubmissionLedger["verifyAuditChain"] = async (startIndex = 0, count) => {
    const start = requireIndex(startIndex, "start_index");
    const total = await readCounter(db);
    if (total === 0 && start === 0) {
      return { valid: true, start, checked: 0, headHash: GENESIS_CHAIN_HASH };
    }
    if (start >= total) {
      throw new HistoryRangeError(
        "history_start_out_of_range",
        `Start index ${start} is not below the total of ${total} submissions`
      );
    }
    const size = count === undefined ? total - start : requireIndex(count, "count");
    let prevHash = GENESIS_CHAIN_HASH;
    if (start > 0) {
      const previous: { chain_hash: string } | undefined = await db("ledger_submissions")
        .where({ sequence_number: start - 1 })
        .first("chain_hash");
      if (!previous) {
        return { valid: false, start, checked: 0, brokenAt: start - 1, headHash: GENESIS_CHAIN_HASH };
      }
      prevHash = previous.chain_hash;
    }
    if (size === 0) {
      return { valid: true, start, checked: 0, headHash: prevHash };
    }
    const rows: SubmissionRow[] = await db("ledger_submissions")
      .orderBy("sequence_number", "asc")
      .offset(start)
      .limit(size);
    return verifySubmissionChain(rows.map(toSubmission), start, prevHash);
  };

  const subscribe: SubmissionLedger["subscribe"] = (listener) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    submitData,
    verifySubmission,
    verifyDataIntegrity,
    getDeviceSubmissions,
    getVerifierSubmissions,
    getSubmissionDetails,
    hasSubmission,
    getTotalSubmissions,
    getSubmissionHistory,
    updateRegistryAddress,
    getRegistryAddress,
    verifyAuditChain,
    subscribe
  };
};
