import {
  ValidationError,
  canonicalizeJson,
  hashCanonicalJson,
  signDataHash
} from "@custody/shared";
import type { SubmissionLedger } from "./types.js";

/** Service-owned device that anchors documents produced outside any DSM. */
export type AnchorSigner = {
  deviceId: string;
  privateKeyHex: string;
  dataUri: string;
};

export type AnchorMetadata = {
  type: string;
  object_id: string | null;
  canonicalization: "json:sorted_keys";
  hash: "sha256";
};

export type AnchorResult = {
  dataHash: string;
  sequenceNumber: number;
  chainHash: string;
  metadata: AnchorMetadata;
  anchoredAt: string;
};

export const computeDocumentHash = (document: unknown) => hashCanonicalJson(document);

/**
 * Hashes the canonical JSON of `document`, signs the hash with the anchor device key and
 * records it on the ledger. The usual ledger failures (duplicate hash, inactive device)
 * propagate unchanged.
 */
export const anchorDocument = async (
  ledger: SubmissionLedger,
  signer: AnchorSigner,
  input: { document: unknown; dataType: string; objectId?: string }
): Promise<AnchorResult> => {
  const dataType = input.dataType.trim();
  if (!dataType) {
    throw new ValidationError("anchor_type_missing", "Anchored documents need a type");
  }
  const dataHash = computeDocumentHash(input.document);
  const metadata: AnchorMetadata = {
    type: dataType,
    object_id: input.objectId ?? null,
    canonicalization: "json:sorted_keys",
    hash: "sha256"
  };
  const receipt = await ledger.submitData({
    deviceId: signer.deviceId,
    dataHash,
    signature: signDataHash(dataHash, signer.privateKeyHex),
    dataUri: signer.dataUri,
    metadata: canonicalizeJson(metadata)
  });
  return {
    dataHash,
    sequenceNumber: receipt.sequenceNumber,
    chainHash: receipt.chainHash,
    metadata,
    anchoredAt: receipt.timestamp
  };
};
