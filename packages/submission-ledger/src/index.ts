export type {
  AuditChainReport,
  DataHash,
  DataSubmittedEvent,
  LedgerEvent,
  LedgerListener,
  Submission,
  SubmissionDetails,
  SubmissionLedger,
  SubmissionLedgerOptions,
  SubmissionReceipt,
  SubmissionVerifiedEvent,
  SubmitDataInput
} from "./types.js";
export { createSubmissionLedger } from "./ledger.js";
export { GENESIS_CHAIN_HASH, computeSubmissionChainHash, verifySubmissionChain } from "./auditChain.js";
export { anchorDocument, computeDocumentHash } from "./anchoring.js";
export type { AnchorMetadata, AnchorResult, AnchorSigner } from "./anchoring.js";
export { createSerialQueue } from "./serialQueue.js";
export type { SerialQueue } from "./serialQueue.js";
