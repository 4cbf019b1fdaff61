import { z } from "zod";
import {
  ValidationError,
  canonicalizeJson,
  generateEd25519KeyPair,
  isHex32,
  sha256Hex,
  signDataHash,
  type Ed25519KeyPair
} from "@custody/shared";

const SUPPORTED_URI_PROTOCOLS = ["http://", "https://", "ipfs://", "ar://"] as const;
const MAX_LABEL_LENGTH = 64;

export const isSupportedDataUri = (value: string) =>
  SUPPORTED_URI_PROTOCOLS.some((protocol) => value.startsWith(protocol));

/** Derives the 32-byte device id registered for a human readable device label. */
export const deviceIdFromLabel = (label: string) => {
  const trimmed = label.trim();
  if (!trimmed || trimmed.length > MAX_LABEL_LENGTH) {
    throw new ValidationError("device_label_invalid", "Device label must be 1-64 characters");
  }
  return sha256Hex(trimmed);
};

export const generateDeviceKeyPair = (): Ed25519KeyPair => generateEd25519KeyPair();

export const hashPayload = (payload: Uint8Array | string) => sha256Hex(payload);

export const dsmOutputSchema = z.object({
  deviceId: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .refine(isHex32, "deviceId must be 32 bytes of hex"),
  dataHash: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .refine(isHex32, "dataHash must be 32 bytes of hex"),
  signature: z.string().trim().min(1),
  timestamp: z.string().datetime(),
  dataUri: z
    .string()
    .trim()
    .min(1)
    .refine(isSupportedDataUri, "dataUri must use http, https, ipfs or ar"),
  metadata: z.string().default("")
});

export type DsmOutput = z.infer<typeof dsmOutputSchema>;

/**
 * Packages a capture the way a Device Security Module emits it: hash the payload,
 * sign the hash with the device key, attach the off-chain location.
 */
export const createDsmOutput = (input: {
  deviceId: string;
  privateKeyHex: string;
  payload: Uint8Array | string;
  dataUri: string;
  metadata?: Record<string, unknown> | string;
  capturedAt?: Date;
}): DsmOutput => {
  const dataUri = input.dataUri.trim();
  if (!isSupportedDataUri(dataUri)) {
    throw new ValidationError("data_uri_protocol_unsupported", "dataUri must use http, https, ipfs or ar");
  }
  const dataHash = hashPayload(input.payload);
  const metadata =
    input.metadata === undefined
      ? ""
      : typeof input.metadata === "string"
        ? input.metadata
        : canonicalizeJson(input.metadata);
  return dsmOutputSchema.parse({
    deviceId: input.deviceId,
    dataHash,
    signature: signDataHash(dataHash, input.privateKeyHex),
    timestamp: (input.capturedAt ?? new Date()).toISOString(),
    dataUri,
    metadata
  });
};

/** Submission body accepted by `POST /v1/submissions`. */
export const toSubmissionBody = (output: DsmOutput) => ({
  deviceId: output.deviceId,
  dataHash: output.dataHash,
  signature: output.signature,
  dataUri: output.dataUri,
  metadata: output.metadata
});
