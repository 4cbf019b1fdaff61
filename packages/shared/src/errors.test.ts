import { test } from "node:test";
import assert from "node:assert/strict";
import {
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

test("ledger errors carry kind, code and http status", () => {
  const cases: Array<[LedgerError, string, number, string]> = [
    [new ValidationError("data_hash_zero"), "validation", 400, "invalid_request"],
    [new AuthorizationError("device_inactive"), "authorization", 403, "forbidden"],
    [new ConflictError("data_hash_duplicate"), "conflict", 409, "conflict"],
    [new NotFoundError("submission_not_found"), "not_found", 404, "not_found"],
    [new IntegrityError("signature_invalid"), "integrity", 422, "integrity_failed"],
    [new HistoryRangeError("history_start_out_of_range"), "range", 416, "range_invalid"]
  ];
  for (const [error, kind, status, responseCode] of cases) {
    assert.equal(error.kind, kind);
    assert.equal(error.statusCode, status);
    assert.equal(error.responseCode, responseCode);
    assert.equal(error.message, error.code);
    assert.equal(isLedgerError(error), true);
    assert.ok(error instanceof Error);
  }
  assert.equal(new ConflictError("data_hash_duplicate").name, "ConflictError");
  assert.equal(isLedgerError(new Error("plain")), false);
});

test("error response only includes debug details in dev mode", () => {
  const options = { details: "start=5", debug: { cause: "total=2" } };
  assert.deepEqual(makeErrorResponse("range_invalid", "Out of range", options), {
    error: "range_invalid",
    message: "Out of range",
    details: "start=5"
  });
  assert.deepEqual(makeErrorResponse("range_invalid", "Out of range", { ...options, devMode: true }), {
    error: "range_invalid",
    message: "Out of range",
    details: "start=5",
    debug: { cause: "total=2" }
  });
});
