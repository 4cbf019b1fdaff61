import { test } from "node:test";
import assert from "node:assert/strict";
import { createDb, runMigrations } from "@custody/db";
import { HistoryRangeError, generateEd25519KeyPair, sha256Hex, signDataHash } from "@custody/shared";
import { createTrustRegistry } from "@custody/trust-registry";
import { GENESIS_CHAIN_HASH, computeSubmissionChainHash, verifySubmissionChain } from "./auditChain.js";
import { createSubmissionLedger } from "./ledger.js";
import type { Submission } from "./types.js";

const submission = (sequenceNumber: number, prevChainHash: string): Submission => {
  const fields = {
    dataHash: sha256Hex(`payload-${sequenceNumber}`),
    deviceId: sha256Hex("camera"),
    verifierAddress: "did:example:lab",
    registryId: "default",
    signature: "aa".repeat(64),
    dataUri: `ipfs://payload-${sequenceNumber}`,
    metadata: "",
    sequenceNumber,
    timestamp: "2024-05-01T00:00:00.000Z"
  };
  return {
    ...fields,
    verified: true,
    prevChainHash,
    chainHash: computeSubmissionChainHash(prevChainHash, fields)
  };
};

const buildChain = (length: number) => {
  const chain: Submission[] = [];
  let prev = GENESIS_CHAIN_HASH;
  for (let index = 0; index < length; index += 1) {
    const next = submission(index, prev);
    chain.push(next);
    prev = next.chainHash;
  }
  return chain;
};

test("chain hash covers every recorded field", () => {
  const base = submission(0, GENESIS_CHAIN_HASH);
  assert.match(base.chainHash, /^[a-f0-9]{64}$/);
  assert.notEqual(
    computeSubmissionChainHash(GENESIS_CHAIN_HASH, { ...base, dataUri: "ipfs://other" }),
    base.chainHash
  );
  assert.notEqual(computeSubmissionChainHash("ff", base), base.chainHash);
});

test("an intact chain verifies from any starting point", () => {
  const chain = buildChain(4);
  assert.deepEqual(verifySubmissionChain(chain, 0, GENESIS_CHAIN_HASH), {
    valid: true,
    start: 0,
    checked: 4,
    headHash: chain[3]?.chainHash
  });
  const tail = chain.slice(2);
  const report = verifySubmissionChain(tail, 2, chain[1]?.chainHash ?? "");
  assert.equal(report.valid, true);
  assert.equal(report.checked, 2);
});

test("an edited or missing link breaks the chain at that sequence number", () => {
  const chain = buildChain(4);
  const edited = chain.map((entry) =>
    entry.sequenceNumber === 2 ? { ...entry, metadata: "rewritten" } : entry
  );
  assert.deepEqual(verifySubmissionChain(edited, 0, GENESIS_CHAIN_HASH), {
    valid: false,
    start: 0,
    checked: 2,
    brokenAt: 2,
    headHash: chain[1]?.chainHash
  });

  const gap = [chain[0], chain[2]].filter((entry): entry is Submission => entry !== undefined);
  const report = verifySubmissionChain(gap, 0, GENESIS_CHAIN_HASH);
  assert.equal(report.valid, false);
  assert.equal(report.brokenAt, 1);
});

test("ledger audit chain detects a row edited behind its back", async () => {
  const db = createDb("sqlite::memory:");
  try {
    await runMigrations(db);
    const registry = createTrustRegistry({ db });
    const ledger = createSubmissionLedger({
      db,
      registry,
      authorizeAdmin: async () => ({ subject: "ops", scopes: [] })
    });
    assert.deepEqual(await ledger.verifyAuditChain(), {
      valid: true,
      start: 0,
      checked: 0,
      headHash: GENESIS_CHAIN_HASH
    });

    const keys = generateEd25519KeyPair();
    const deviceId = sha256Hex("camera");
    await registry.registerVerifier("did:example:lab");
    await registry.registerDevice(deviceId, "did:example:lab", keys.publicKeyHex);
    const hashes: string[] = [];
    for (const payload of ["a", "b", "c"]) {
      const dataHash = sha256Hex(payload);
      await ledger.submitData({
        deviceId,
        dataHash,
        signature: signDataHash(dataHash, keys.privateKeyHex),
        dataUri: `ipfs://${payload}`
      });
      hashes.push(dataHash);
    }

    const intact = await ledger.verifyAuditChain();
    assert.equal(intact.valid, true);
    assert.equal(intact.checked, 3);
    assert.equal(intact.headHash, (await ledger.verifySubmission(hashes[2] ?? "")).chainHash);
    assert.equal((await ledger.verifyAuditChain(1, 1)).checked, 1);
    await assert.rejects(ledger.verifyAuditChain(3), HistoryRangeError);

    await db("ledger_submissions").where({ data_hash: hashes[1] }).update({ data_uri: "ipfs://swapped" });
    const tampered = await ledger.verifyAuditChain();
    assert.equal(tampered.valid, false);
    assert.equal(tampered.brokenAt, 1);
    assert.equal(tampered.checked, 1);
    assert.equal((await ledger.verifyAuditChain(2)).valid, true);
  } finally {
    await db.destroy();
  }
});
