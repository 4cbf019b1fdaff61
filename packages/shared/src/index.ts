export { canonicalizeJson } from "./canonicalJson.js";
export {
  ZERO_HASH,
  hashCanonicalJson,
  isHex32,
  normalizeHex32,
  sha256Hex
} from "./hashing.js";
export {
  ED25519_PUBLIC_KEY_BYTES,
  ED25519_SIGNATURE_BYTES,
  bytesToHex,
  generateEd25519KeyPair,
  hexToBytes,
  isEd25519PublicKeyHex,
  publicKeyFromPrivateKey,
  signDataHash,
  verifyDataHashSignature
} from "./ed25519.js";
export type { Ed25519KeyPair } from "./ed25519.js";
export {
  AuthorizationError,
  ConflictError,
  HistoryRangeError,
  IntegrityError,
  LedgerError,
  NotFoundError,
  ValidationError,
  isLedgerError,
  makeErrorResponse
} from "./errors.js";
export type { ErrorCode, ErrorResponse, LedgerErrorKind } from "./errors.js";
export {
  SERVICE_JWT_ISSUER,
  createServiceJwtAdminAuthorizer,
  extractBearerToken,
  verifyServiceJwt
} from "./serviceAuth.js";
export type { AdminAuthorizer, AdminGrant } from "./serviceAuth.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
