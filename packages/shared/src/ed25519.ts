import { randomBytes } from "node:crypto";
import { getPublicKey, hashes, sign, verify } from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha2.js";

if (!hashes.sha512) {
  hashes.sha512 = sha512;
}

const HEX_PATTERN = /^(?:[a-f0-9]{2})+$/;

export const ED25519_PUBLIC_KEY_BYTES = 32;
export const ED25519_SIGNATURE_BYTES = 64;

export const hexToBytes = (value: string, expectedLength?: number) => {
  const normalized = value.trim().toLowerCase();
  if (!HEX_PATTERN.test(normalized)) {
    throw new Error("hex_invalid");
  }
  const bytes = new Uint8Array(Buffer.from(normalized, "hex"));
  if (expectedLength !== undefined && bytes.length !== expectedLength) {
    throw new Error("hex_length_invalid");
  }
  return bytes;
};

export const bytesToHex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex");

export const isEd25519PublicKeyHex = (value: string) => {
  try {
    hexToBytes(value, ED25519_PUBLIC_KEY_BYTES);
    return true;
  } catch {
    return false;
  }
};

export type Ed25519KeyPair = {
  privateKeyHex: string;
  publicKeyHex: string;
};

export const generateEd25519KeyPair = (): Ed25519KeyPair => {
  const privateKey = new Uint8Array(randomBytes(32));
  return {
    privateKeyHex: bytesToHex(privateKey),
    publicKeyHex: bytesToHex(getPublicKey(privateKey))
  };
};

export const publicKeyFromPrivateKey = (privateKeyHex: string) =>
  bytesToHex(getPublicKey(hexToBytes(privateKeyHex, 32)));

/** Signs the raw 32 bytes of a content hash, as a Device Security Module does. */
export const signDataHash = (dataHashHex: string, privateKeyHex: string) =>
  bytesToHex(sign(hexToBytes(dataHashHex, 32), hexToBytes(privateKeyHex, 32)));

/**
 * Checks an Ed25519 signature over the raw bytes of `dataHashHex`. Malformed hex,
 * wrong lengths and points that do not decode all count as a failed verification.
 */
export const verifyDataHashSignature = (input: {
  dataHashHex: string;
  signatureHex: string;
  publicKeyHex: string;
}) => {
  let message: Uint8Array;
  let signature: Uint8Array;
  let publicKey: Uint8Array;
  try {
    message = hexToBytes(input.dataHashHex, 32);
    signature = hexToBytes(input.signatureHex, ED25519_SIGNATURE_BYTES);
    publicKey = hexToBytes(input.publicKeyHex, ED25519_PUBLIC_KEY_BYTES);
  } catch {
    return false;
  }
  try {
    return verify(signature, message, publicKey);
  } catch {
    return false;
  }
};
