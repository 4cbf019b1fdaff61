import { createHash } from "node:crypto";
import { canonicalizeJson } from "./canonicalJson.js";

export const ZERO_HASH = "0".repeat(64);

const HEX_32_PATTERN = /^[a-f0-9]{64}$/;

export const sha256Hex = (data: Uint8Array | string) =>
  createHash("sha256").update(data).digest("hex");

export const hashCanonicalJson = (value: unknown) => sha256Hex(canonicalizeJson(value));

export const normalizeHex32 = (value: string) => value.trim().toLowerCase();

export const isHex32 = (value: string) => HEX_32_PATTERN.test(value);
