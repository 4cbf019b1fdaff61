import type { DbClient } from "@custody/db";

export type TrustRegistryId = string & {};

/** Identity of a verifier (DID, account address or any stable principal id). */
export type VerifierAddress = string & {};

/** 32-byte device identifier, 64 lowercase hex characters. */
export type DeviceId = string & {};

export type Verifier = {
  registryId: TrustRegistryId;
  address: VerifierAddress;
  // Display only; not used for authorization.
  name: string;
  metadata: string;
  active: boolean;
  registeredAt: string;
};

export type Device = {
  registryId: TrustRegistryId;
  deviceId: DeviceId;
  verifierAddress: VerifierAddress;
  // Ed25519 public key, hex.
  publicKey: string;
  metadata: string;
  active: boolean;
  registeredAt: string;
};

/** Device and owning verifier as read together by one query. */
export type DeviceAuthorization = {
  deviceId: DeviceId;
  verifierAddress: VerifierAddress;
  publicKey: string;
  deviceActive: boolean;
  verifierActive: boolean;
};

export type TrustRegistryOptions = {
  db: DbClient;
  registryId?: TrustRegistryId;
  now?: () => Date;
};

/**
 * Registration and activation changes carry no capability check of their own: whoever
 * holds a registry may mutate it. The ledger service exposes them only behind the
 * `registry:write` scope. Repointing the ledger at another registry is different and is
 * checked by the ledger itself (`SubmissionLedger.updateRegistryAddress`).
 */
export type TrustRegistry = {
  readonly registryId: TrustRegistryId;
  registerVerifier: (
    address: VerifierAddress,
    details?: { name?: string; metadata?: string }
  ) => Promise<Verifier>;
  setVerifierActive: (address: VerifierAddress, active: boolean) => Promise<Verifier>;
  registerDevice: (
    deviceId: DeviceId,
    verifierAddress: VerifierAddress,
    publicKey: string,
    details?: { metadata?: string }
  ) => Promise<Device>;
  setDeviceActive: (deviceId: DeviceId, active: boolean) => Promise<Device>;
  isVerifierActive: (address: VerifierAddress, trx?: DbClient) => Promise<boolean>;
  isDeviceActive: (deviceId: DeviceId, trx?: DbClient) => Promise<boolean>;
  getVerifier: (address: VerifierAddress, trx?: DbClient) => Promise<Verifier>;
  getDevice: (deviceId: DeviceId, trx?: DbClient) => Promise<Device>;
  getDevicePublicKey: (deviceId: DeviceId, trx?: DbClient) => Promise<string>;
  listVerifierDevices: (address: VerifierAddress) => Promise<DeviceId[]>;
  readAuthorization: (deviceId: DeviceId, trx?: DbClient) => Promise<DeviceAuthorization | null>;
};
