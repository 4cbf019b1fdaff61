import { test } from "node:test";
import assert from "node:assert/strict";
import { SignJWT } from "jose";
import {
  SERVICE_JWT_ISSUER,
  createServiceJwtAdminAuthorizer,
  extractBearerToken,
  verifyServiceJwt
} from "./serviceAuth.js";

const secret = "test-secret-for-service-jwt-0123456789";
const audience = "custody.service.ledger";

const signToken = (scope: string[], options: { audience?: string; issuer?: string } = {}) =>
  new SignJWT({ scope })
    .setProtectedHeader({ alg: "HS256" })
    .setAudience(options.audience ?? audience)
    .setIssuedAt()
    .setExpirationTime("2m")
    .setIssuer(options.issuer ?? SERVICE_JWT_ISSUER)
    .setSubject(SERVICE_JWT_ISSUER)
    .sign(new TextEncoder().encode(secret));

test("bearer token extraction", () => {
  assert.equal(extractBearerToken("Bearer abc.def.ghi"), "abc.def.ghi");
  assert.equal(extractBearerToken("Basic abc"), null);
  assert.equal(extractBearerToken(undefined), null);
});

test("service jwt with the right audience and scope verifies", async () => {
  const token = await signToken(["ledger:submit"]);
  const payload = await verifyServiceJwt(token, {
    audience,
    secret,
    issuer: SERVICE_JWT_ISSUER,
    subject: SERVICE_JWT_ISSUER,
    requiredScopes: ["ledger:submit"]
  });
  assert.deepEqual(payload.scope, ["ledger:submit"]);
});

test("service jwt is rejected for wrong audience, secret or scope", async () => {
  const token = await signToken(["ledger:submit"]);
  await assert.rejects(verifyServiceJwt(token, { audience: "custody.service.other", secret }));
  await assert.rejects(verifyServiceJwt(token, { audience, secret: `${secret}-other` }));
  await assert.rejects(
    verifyServiceJwt(token, { audience, secret, requiredScopes: ["registry:write"] }),
    /jwt_missing_required_scope/
  );
});

test("admin authorizer accepts the admin wildcard or the exact scopes", async () => {
  const authorize = createServiceJwtAdminAuthorizer({ secret, audience, scopes: ["ledger:admin"] });
  const wildcard = await authorize(await signToken(["admin:*"]));
  assert.equal(wildcard.subject, SERVICE_JWT_ISSUER);
  assert.deepEqual(wildcard.scopes, ["admin:*"]);
  const scoped = await authorize(await signToken(["ledger:admin", "ledger:submit"]));
  assert.deepEqual(scoped.scopes, ["ledger:admin", "ledger:submit"]);
  await assert.rejects(authorize(await signToken(["ledger:submit"])), /jwt_missing_required_scope/);
  await assert.rejects(authorize(await signToken(["admin:*"], { issuer: "someone-else" })));
});
