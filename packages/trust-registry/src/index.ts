export type {
  Device,
  DeviceAuthorization,
  DeviceId,
  TrustRegistry,
  TrustRegistryId,
  TrustRegistryOptions,
  Verifier,
  VerifierAddress
} from "./types.js";
export {
  DEFAULT_REGISTRY_ID,
  createTrustRegistry,
  normalizeDeviceId,
  normalizeVerifierAddress
} from "./registry.js";
export { readAuditLog, writeAuditLog } from "./auditLog.js";
export type { AuditEventType, AuditLogEntry } from "./auditLog.js";
