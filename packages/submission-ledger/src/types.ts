import type { DbClient } from "@custody/db";
import type { AdminAuthorizer, AdminGrant } from "@custody/shared";
import type {
  Device,
  DeviceId,
  TrustRegistry,
  TrustRegistryId,
  Verifier,
  VerifierAddress
} from "@custody/trust-registry";

/** Content hash of the attested data, 64 lowercase hex characters. Doubles as the submission id. */
export type DataHash = string & {};

export type Submission = {
  dataHash: DataHash;
  deviceId: DeviceId;
  // Owner of the device when the submission was accepted.
  verifierAddress: VerifierAddress;
  registryId: TrustRegistryId;
  signature: string;
  timestamp: string;
  dataUri: string;
  metadata: string;
  verified: boolean;
  sequenceNumber: number;
  prevChainHash: string;
  chainHash: string;
};

export type SubmitDataInput = {
  deviceId: DeviceId;
  dataHash: DataHash;
  signature: string;
  dataUri: string;
  metadata?: string;
};

export type SubmissionReceipt = {
  submissionId: DataHash;
  sequenceNumber: number;
  timestamp: string;
  chainHash: string;
};

export type SubmissionDetails = {
  submission: Submission;
  device: Device;
  verifier: Verifier;
};

export type DataSubmittedEvent = {
  type: "DataSubmitted";
  dataHash: DataHash;
  deviceId: DeviceId;
  verifierAddress: VerifierAddress;
  timestamp: string;
  dataUri: string;
  sequenceNumber: number;
};

export type SubmissionVerifiedEvent = {
  type: "SubmissionVerified";
  dataHash: DataHash;
  deviceId: DeviceId;
  isValid: boolean;
};

export type LedgerEvent = DataSubmittedEvent | SubmissionVerifiedEvent;

export type LedgerListener = (event: LedgerEvent) => void;

export type AuditChainReport = {
  valid: boolean;
  start: number;
  checked: number;
  // Sequence number of the first submission whose stored hashes do not match.
  brokenAt?: number;
  headHash: string;
};

export type SubmissionLedgerOptions = {
  db: DbClient;
  /** Registry consulted until an administrator repoints the ledger. */
  registry: TrustRegistry;
  authorizeAdmin: AdminAuthorizer;
  /** Opens the registry stored under a given id; defaults to one on the same database. */
  resolveRegistry?: (registryId: TrustRegistryId) => TrustRegistry;
  /** Receives the error of a listener that threw and was unsubscribed. */
  onListenerError?: (error: unknown, event: LedgerEvent) => void;
  now?: () => Date;
};

export type SubmissionLedger = {
  submitData: (input: SubmitDataInput) => Promise<SubmissionReceipt>;
  verifySubmission: (dataHash: DataHash) => Promise<Submission>;
  verifyDataIntegrity: (dataHash: DataHash, providedData: Uint8Array | string) => Promise<boolean>;
  getDeviceSubmissions: (deviceId: DeviceId) => Promise<DataHash[]>;
  getVerifierSubmissions: (verifierAddress: VerifierAddress) => Promise<DataHash[]>;
  getSubmissionDetails: (dataHash: DataHash) => Promise<SubmissionDetails>;
  hasSubmission: (dataHash: DataHash) => Promise<boolean>;
  getTotalSubmissions: () => Promise<number>;
  getSubmissionHistory: (startIndex: number, count: number) => Promise<DataHash[]>;
  updateRegistryAddress: (
    newRegistry: TrustRegistryId,
    adminToken: string
  ) => Promise<{ registryId: TrustRegistryId; previousRegistryId: TrustRegistryId; grant: AdminGrant }>;
  getRegistryAddress: () => Promise<TrustRegistryId>;
  verifyAuditChain: (startIndex?: number, count?: number) => Promise<AuditChainReport>;
  subscribe: (listener: LedgerListener) => () => void;
};
