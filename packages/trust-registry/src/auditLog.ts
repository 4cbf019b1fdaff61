import { toIsoTimestamp, withRowLock, type DbClient } from "@custody/db";
import { hashCanonicalJson } from "@custody/shared";

const AUDIT_HEAD_KEY = "audit_log_head";

export type AuditEventType =
  | "verifier.registered"
  | "verifier.activation_changed"
  | "device.registered"
  | "device.activation_changed"
  | "ledger.registry_repointed";

export type AuditLogEntry = {
  eventType: AuditEventType;
  entityId: string | null;
  dataHash: string;
  prevHash: string | null;
  chainHash: string;
  createdAt: string;
};

/**
 * Appends to the hash-chained administrative log. Must run on a transaction so the
 * head read, insert and head update commit together with the change being audited.
 */
export const writeAuditLog = async (
  trx: DbClient,
  eventType: AuditEventType,
  data: Record<string, unknown> & { entityId?: string },
  createdAt: string
) => {
  await trx("system_metadata")
    .insert({ key: AUDIT_HEAD_KEY, value: "", updated_at: createdAt })
    .onConflict("key")
    .ignore();

  const headRow: { value: string } | undefined = await withRowLock(
    trx,
    trx("system_metadata").where({ key: AUDIT_HEAD_KEY }).first("value"),
    "update"
  );
  const prevHash = headRow?.value ?? "";
  const dataHash = hashCanonicalJson(data);
  const chainHash = hashCanonicalJson({
    prevHash,
    dataHash,
    eventType,
    entityId: data.entityId ?? null,
    createdAt
  });

  await trx("audit_logs").insert({
    event_type: eventType,
    entity_id: data.entityId ?? null,
    data_hash: dataHash,
    prev_hash: prevHash || null,
    chain_hash: chainHash,
    created_at: createdAt
  });

  await trx("system_metadata")
    .where({ key: AUDIT_HEAD_KEY })
    .update({ value: chainHash, updated_at: createdAt });

  return { chainHash, dataHash, createdAt };
};

export const readAuditLog = async (db: DbClient, limit = 100): Promise<AuditLogEntry[]> => {
  const rows: Array<{
    event_type: AuditEventType;
    entity_id: string | null;
    data_hash: string;
    prev_hash: string | null;
    chain_hash: string;
    created_at: unknown;
  }> = await db("audit_logs").orderBy("id", "asc").limit(limit);
  return rows.map((row) => ({
    eventType: row.event_type,
    entityId: row.entity_id,
    dataHash: row.data_hash,
    prevHash: row.prev_hash,
    chainHash: row.chain_hash,
    createdAt: toIsoTimestamp(row.created_at)
  }));
};
