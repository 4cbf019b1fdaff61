import { hashCanonicalJson } from "@custody/shared";
import type { AuditChainReport, Submission } from "./types.js";

type ChainedFields = Pick<
  Submission,
  | "dataHash"
  | "deviceId"
  | "verifierAddress"
  | "registryId"
  | "signature"
  | "dataUri"
  | "metadata"
  | "sequenceNumber"
  | "timestamp"
>;

export const GENESIS_CHAIN_HASH = "";

export const computeSubmissionChainHash = (prevHash: string, fields: ChainedFields) =>
  hashCanonicalJson({
    prevHash,
    dataHash: fields.dataHash,
    deviceId: fields.deviceId,
    verifierAddress: fields.verifierAddress,
    registryId: fields.registryId,
    signature: fields.signature,
    dataUri: fields.dataUri,
    metadata: fields.metadata,
    sequenceNumber: fields.sequenceNumber,
    timestamp: fields.timestamp
  });

/**
 * Walks `submissions` (ascending sequence numbers starting at `start`) and checks each
 * link against its predecessor. `prevHash` is the chain hash of submission `start - 1`,
 * or the genesis value when `start` is 0.
 */
export const verifySubmissionChain = (
  submissions: Submission[],
  start: number,
  prevHash: string
): AuditChainReport => {
  let expectedPrev = prevHash;
  let checked = 0;
  for (const submission of submissions) {
    const expectedSequence = start + checked;
    const recomputed = computeSubmissionChainHash(expectedPrev, submission);
    if (
      submission.sequenceNumber !== expectedSequence ||
      submission.prevChainHash !== expectedPrev ||
      submission.chainHash !== recomputed
    ) {
      return { valid: false, start, checked, brokenAt: expectedSequence, headHash: expectedPrev };
    }
    expectedPrev = submission.chainHash;
    checked += 1;
  }
  return { valid: true, start, checked, headHash: expectedPrev };
};
