import { isUniqueViolation, toBoolean, toIsoTimestamp, withRowLock, type DbClient } from "@custody/db";
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
  isEd25519PublicKeyHex,
  isHex32,
  normalizeHex32
} from "@custody/shared";
import { writeAuditLog } from "./auditLog.js";
import type {
  Device,
  DeviceAuthorization,
  DeviceId,
  TrustRegistry,
  TrustRegistryOptions,
  Verifier,
  VerifierAddress
} from "./types.js";

export const DEFAULT_REGISTRY_ID = "default";

const ADDRESS_PATTERN = /^[\x21-\x7e]{3,256}$/;
const MAX_TEXT_FIELD = 4096;

type VerifierRow = {
  registry_id: string;
  address: string;
  name: string;
  metadata: string;
  active: unknown;
  registered_at: unknown;
};

type DeviceRow = {
  registry_id: string;
  device_id: string;
  verifier_address: string;
  public_key: string;
  metadata: string;
  active: unknown;
  registered_at: unknown;
};

const toVerifier = (row: VerifierRow): Verifier => ({
  registryId: row.registry_id,
  address: row.address,
  name: row.name,
  metadata: row.metadata,
  active: toBoolean(row.active),
  registeredAt: toIsoTimestamp(row.registered_at)
});

const toDevice = (row: DeviceRow): Device => ({
  registryId: row.registry_id,
  deviceId: row.device_id,
  verifierAddress: row.verifier_address,
  publicKey: row.public_key,
  metadata: row.metadata,
  active: toBoolean(row.active),
  registeredAt: toIsoTimestamp(row.registered_at)
});

export const normalizeVerifierAddress = (address: string): VerifierAddress => {
  const trimmed = address.trim();
  if (!ADDRESS_PATTERN.test(trimmed)) {
    throw new ValidationError("verifier_address_invalid", "Verifier address must be 3-256 printable characters");
  }
  return trimmed;
};

export const normalizeDeviceId = (deviceId: string): DeviceId => {
  const normalized = normalizeHex32(deviceId);
  if (!isHex32(normalized)) {
    throw new ValidationError("device_id_invalid", "Device id must be 32 bytes of hex");
  }
  return normalized;
};

const boundedText = (value: string | undefined, field: string) => {
  const text = (value ?? "").trim();
  if (text.length > MAX_TEXT_FIELD) {
    throw new ValidationError(`${field}_too_long`);
  }
  return text;
};

// Lookups never fail on malformed keys: they simply match nothing.
const lookupKey = (value: string) => value.trim().toLowerCase();

export const createTrustRegistry = (options: TrustRegistryOptions): TrustRegistry => {
  const { db } = options;
  const registryId = options.registryId ?? DEFAULT_REGISTRY_ID;
  const now = options.now ?? (() => new Date());

  const findVerifier = async (conn: DbClient, address: string) => {
    const row: VerifierRow | undefined = await conn("trust_verifiers")
      .where({ registry_id: registryId, address: address.trim() })
      .first();
    return row ? toVerifier(row) : null;
  };

  const findDevice = async (conn: DbClient, deviceId: string) => {
    const row: DeviceRow | undefined = await conn("trust_devices")
      .where({ registry_id: registryId, device_id: lookupKey(deviceId) })
      .first();
    return row ? toDevice(row) : null;
  };

  const requireVerifier = async (conn: DbClient, address: string) => {
    const verifier = await findVerifier(conn, address);
    if (!verifier) {
      throw new NotFoundError("verifier_not_found", `Verifier ${address} is not registered`);
    }
    return verifier;
  };

  const requireDevice = async (conn: DbClient, deviceId: string) => {
    const device = await findDevice(conn, deviceId);
    if (!device) {
      throw new NotFoundError("device_not_found", `Device ${deviceId} is not registered`);
    }
    return device;
  };

  const registerVerifier: TrustRegistry["registerVerifier"] = async (address, details) => {
    const normalized = normalizeVerifierAddress(address);
    const name = boundedText(details?.name, "verifier_name");
    const metadata = boundedText(details?.metadata, "verifier_metadata");
    const timestamp = now().toISOString();
    try {
      return await db.transaction(async (trx) => {
        if (await findVerifier(trx, normalized)) {
          throw new ConflictError("verifier_already_registered", `Verifier ${normalized} is already registered`);
        }
        await trx("trust_verifiers").insert({
          registry_id: registryId,
          address: normalized,
          name,
          metadata,
          active: true,
          registered_at: timestamp,
          updated_at: timestamp
        });
        await writeAuditLog(
          trx,
          "verifier.registered",
          { entityId: normalized, registryId, name },
          timestamp
        );
        return requireVerifier(trx, normalized);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("verifier_already_registered", `Verifier ${normalized} is already registered`);
      }
      throw error;
    }
  };

  const setVerifierActive: TrustRegistry["setVerifierActive"] = async (address, active) =>
    db.transaction(async (trx) => {
      const verifier = await requireVerifier(trx, address);
      if (verifier.active === active) {
        return verifier;
      }
      const timestamp = now().toISOString();
      await trx("trust_verifiers")
        .where({ registry_id: registryId, address: verifier.address })
        .update({ active, updated_at: timestamp });
      await writeAuditLog(
        trx,
        "verifier.activation_changed",
        { entityId: verifier.address, registryId, active },
        timestamp
      );
      return { ...verifier, active };
    });

  const registerDevice: TrustRegistry["registerDevice"] = async (
    deviceId,
    verifierAddress,
    publicKey,
    details
  ) => {
    const normalizedId = normalizeDeviceId(deviceId);
    const normalizedKey = publicKey.trim().toLowerCase();
    if (!isEd25519PublicKeyHex(normalizedKey)) {
      throw new ValidationError("device_public_key_invalid", "Device public key must be a 32-byte Ed25519 key in hex");
    }
    const metadata = boundedText(details?.metadata, "device_metadata");
    const timestamp = now().toISOString();
    try {
      return await db.transaction(async (trx) => {
        if (await findDevice(trx, normalizedId)) {
          throw new ConflictError("device_already_registered", `Device ${normalizedId} is already registered`);
        }
        const verifier = await requireVerifier(trx, verifierAddress);
        if (!verifier.active) {
          throw new AuthorizationError("verifier_inactive", `Verifier ${verifier.address} is not active`);
        }
        await trx("trust_devices").insert({
          registry_id: registryId,
          device_id: normalizedId,
          verifier_address: verifier.address,
          public_key: normalizedKey,
          metadata,
          active: true,
          registered_at: timestamp,
          updated_at: timestamp
        });
        await writeAuditLog(
          trx,
          "device.registered",
          { entityId: normalizedId, registryId, verifierAddress: verifier.address, publicKey: normalizedKey },
          timestamp
        );
        return requireDevice(trx, normalizedId);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("device_already_registered", `Device ${normalizedId} is already registered`);
      }
      throw error;
    }
  };

  const setDeviceActive: TrustRegistry["setDeviceActive"] = async (deviceId, active) =>
    db.transaction(async (trx) => {
      const device = await requireDevice(trx, deviceId);
      if (device.active === active) {
        return device;
      }
      const timestamp = now().toISOString();
      await trx("trust_devices")
        .where({ registry_id: registryId, device_id: device.deviceId })
        .update({ active, updated_at: timestamp });
      await writeAuditLog(
        trx,
        "device.activation_changed",
        { entityId: device.deviceId, registryId, active },
        timestamp
      );
      return { ...device, active };
    });

  const isVerifierActive: TrustRegistry["isVerifierActive"] = async (address, trx) => {
    const verifier = await findVerifier(trx ?? db, address);
    return verifier?.active ?? false;
  };

  const isDeviceActive: TrustRegistry["isDeviceActive"] = async (deviceId, trx) => {
    const device = await findDevice(trx ?? db, deviceId);
    return device?.active ?? false;
  };

  const getVerifier: TrustRegistry["getVerifier"] = async (address, trx) =>
    requireVerifier(trx ?? db, address);

  const getDevice: TrustRegistry["getDevice"] = async (deviceId, trx) =>
    requireDevice(trx ?? db, deviceId);

  const getDevicePublicKey: TrustRegistry["getDevicePublicKey"] = async (deviceId, trx) =>
    (await requireDevice(trx ?? db, deviceId)).publicKey;

  const listVerifierDevices: TrustRegistry["listVerifierDevices"] = async (address) => {
    const verifier = await requireVerifier(db, address);
    const rows: Array<{ device_id: string }> = await db("trust_devices")
      .where({ registry_id: registryId, verifier_address: verifier.address })
      .orderBy("registration_seq", "asc")
      .select("device_id");
    return rows.map((row) => row.device_id);
  };

  const readAuthorization: TrustRegistry["readAuthorization"] = async (deviceId, trx) => {
    const conn = trx ?? db;
    const row:
      | { device_id: string; verifier_address: string; public_key: string; device_active: unknown; verifier_active: unknown }
      | undefined = await withRowLock(
      conn,
      conn("trust_devices as d")
        .join("trust_verifiers as v", function joinOwner() {
          this.on("v.registry_id", "=", "d.registry_id").andOn("v.address", "=", "d.verifier_address");
        })
        .where({ "d.registry_id": registryId, "d.device_id": lookupKey(deviceId) })
        .first(
          "d.device_id",
          "d.verifier_address",
          "d.public_key",
          "d.active as device_active",
          "v.active as verifier_active"
        ),
      "share"
    );
    if (!row) return null;
    const authorization: DeviceAuthorization = {
      deviceId: row.device_id,
      verifierAddress: row.verifier_address,
      publicKey: row.public_key,
      deviceActive: toBoolean(row.device_active),
      verifierActive: toBoolean(row.verifier_active)
    };
    return authorization;
  };

  return {
    registryId,
    registerVerifier,
    setVerifierActive,
    registerDevice,
    setDeviceActive,
    isVerifierActive,
    isDeviceActive,
    getVerifier,
    getDevice,
    getDevicePublicKey,
    listVerifierDevices,
    readAuthorization
  };
};
