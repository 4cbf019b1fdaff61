import { jwtVerify, type JWTPayload } from "jose";

const textEncoder = new TextEncoder();

export const SERVICE_JWT_ISSUER = "ledger-gateway";

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader?.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.slice(7);
};

const readScopes = (payload: JWTPayload) => {
  const scopeValue = payload.scope;
  return Array.isArray(scopeValue)
    ? scopeValue.map(String)
    : typeof scopeValue === "string"
      ? scopeValue.split(" ").filter(Boolean)
      : [];
};

export const verifyServiceJwt = async (
  token: string,
  options: {
    audience: string;
    secret: string;
    issuer?: string;
    subject?: string;
    requiredScopes?: string[];
    /** When set, token must have admin:* OR all of these scopes. */
    requireAdminScope?: string[];
  }
) => {
  const key = textEncoder.encode(options.secret);
  const { payload } = await jwtVerify(token, key, {
    audience: options.audience,
    issuer: options.issuer,
    subject: options.subject
  });
  if (!payload.exp || !payload.aud) {
    throw new Error("jwt_missing_required_claims");
  }
  const tokenScopes = readScopes(payload);

  if (options.requireAdminScope && options.requireAdminScope.length > 0) {
    const hasAdminWildcard = tokenScopes.includes("admin:*");
    const hasRequiredScopes = options.requireAdminScope.every((scope) =>
      tokenScopes.includes(scope)
    );
    if (!hasAdminWildcard && !hasRequiredScopes) {
      throw new Error("jwt_missing_required_scope");
    }
  } else if (options.requiredScopes && options.requiredScopes.length > 0) {
    if (!options.requiredScopes.every((scope) => tokenScopes.includes(scope))) {
      throw new Error("jwt_missing_required_scope");
    }
  }
  return payload;
};

export type AdminGrant = {
  subject: string;
  scopes: string[];
};

export type AdminAuthorizer = (token: string) => Promise<AdminGrant>;

/**
 * Builds the capability check for administrative ledger mutations: a service JWT
 * from the gateway carrying `admin:*` or every scope in `scopes`.
 */
export const createServiceJwtAdminAuthorizer = (options: {
  secret: string;
  audience: string;
  scopes: string[];
  issuer?: string;
}): AdminAuthorizer => {
  return async (token: string) => {
    const payload = await verifyServiceJwt(token, {
      audience: options.audience,
      secret: options.secret,
      issuer: options.issuer ?? SERVICE_JWT_ISSUER,
      requireAdminScope: options.scopes
    });
    return { subject: payload.sub ?? "unknown", scopes: readScopes(payload) };
  };
};
