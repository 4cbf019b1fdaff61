import { test } from "node:test";
import assert from "node:assert/strict";
import { ValidationError, sha256Hex, verifyDataHashSignature } from "@custody/shared";
import {
  createDsmOutput,
  deviceIdFromLabel,
  dsmOutputSchema,
  generateDeviceKeyPair,
  hashPayload,
  isSupportedDataUri,
  toSubmissionBody
} from "./index.js";

test("device ids are the sha-256 of the trimmed label", () => {
  assert.equal(deviceIdFromLabel(" camera-001 "), sha256Hex("camera-001"));
  assert.throws(() => deviceIdFromLabel("   "), ValidationError);
  assert.throws(() => deviceIdFromLabel("x".repeat(65)), ValidationError);
});

test("supported data uri protocols", () => {
  assert.equal(isSupportedDataUri("ipfs://bafy"), true);
  assert.equal(isSupportedDataUri("ar://tx"), true);
  assert.equal(isSupportedDataUri("https://cdn.example.test/a.jpg"), true);
  assert.equal(isSupportedDataUri("ftp://host/a.jpg"), false);
  assert.equal(isSupportedDataUri("file:///tmp/a.jpg"), false);
});

test("dsm output carries a signature the device key verifies", () => {
  const keys = generateDeviceKeyPair();
  const deviceId = deviceIdFromLabel("camera-001");
  const output = createDsmOutput({
    deviceId,
    privateKeyHex: keys.privateKeyHex,
    payload: "raw frame bytes",
    dataUri: "ipfs://bafyframe",
    metadata: { lens: "wide", gps: [1, 2] },
    capturedAt: new Date("2024-05-01T10:00:00.000Z")
  });

  assert.equal(output.dataHash, hashPayload("raw frame bytes"));
  assert.equal(output.timestamp, "2024-05-01T10:00:00.000Z");
  assert.equal(output.metadata, '{"gps":[1,2],"lens":"wide"}');
  assert.equal(
    verifyDataHashSignature({
      dataHashHex: output.dataHash,
      signatureHex: output.signature,
      publicKeyHex: keys.publicKeyHex
    }),
    true
  );
  assert.deepEqual(toSubmissionBody(output), {
    deviceId,
    dataHash: output.dataHash,
    signature: output.signature,
    dataUri: "ipfs://bafyframe",
    metadata: '{"gps":[1,2],"lens":"wide"}'
  });
});

test("dsm output rejects unsupported storage locations", () => {
  const keys = generateDeviceKeyPair();
  assert.throws(
    () =>
      createDsmOutput({
        deviceId: deviceIdFromLabel("camera-001"),
        privateKeyHex: keys.privateKeyHex,
        payload: "frame",
        dataUri: "ftp://host/frame"
      }),
    { name: "ValidationError", code: "data_uri_protocol_unsupported" }
  );
});

test("incoming dsm packages are normalized by the schema", () => {
  const parsed = dsmOutputSchema.parse({
    deviceId: sha256Hex("camera-001").toUpperCase(),
    dataHash: ` ${sha256Hex("frame")} `,
    signature: "ab",
    timestamp: "2024-05-01T10:00:00.000Z",
    dataUri: "ar://tx"
  });
  assert.equal(parsed.deviceId, sha256Hex("camera-001"));
  assert.equal(parsed.dataHash, sha256Hex("frame"));
  assert.equal(parsed.metadata, "");
  assert.equal(dsmOutputSchema.safeParse({ ...parsed, dataUri: "gopher://x" }).success, false);
  assert.equal(dsmOutputSchema.safeParse({ ...parsed, deviceId: "camera-001" }).success, false);
});
