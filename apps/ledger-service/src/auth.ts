import { FastifyReply, FastifyRequest } from "fastify";
import { extractBearerToken, makeErrorResponse, verifyServiceJwt } from "@custody/shared";
import { config } from "./config.js";
import { log } from "./log.js";

type ServiceAuthOptions = {
  requiredScopes?: string[];
  /** Accepts `admin:*` in place of these scopes. */
  adminScopes?: string[];
};

export const requireServiceAuth = async (
  request: FastifyRequest,
  reply: FastifyReply,
  options: ServiceAuthOptions = {}
) => {
  const serviceSecret = config.SERVICE_JWT_SECRET;
  const nextSecret = config.SERVICE_JWT_SECRET_NEXT;
  if (!serviceSecret) {
    if (config.ALLOW_INSECURE_DEV_AUTH && config.NODE_ENV !== "production") {
      return;
    }
    await reply
      .code(503)
      .send(
        makeErrorResponse("service_auth_not_configured", "Service authentication is not configured", {
          devMode: config.DEV_MODE
        })
      );
    return;
  }
  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    await reply.code(401).send(
      makeErrorResponse("invalid_request", "Missing service token", {
        devMode: config.DEV_MODE
      })
    );
    return;
  }
  const verify = (secret: string) =>
    verifyServiceJwt(token, {
      audience: config.SERVICE_JWT_AUDIENCE,
      secret,
      issuer: config.SERVICE_JWT_ISSUER,
      requiredScopes: options.requiredScopes,
      requireAdminScope: options.adminScopes
    });
  try {
    let payload;
    try {
      payload = await verify(serviceSecret);
    } catch (error) {
      if (error instanceof Error && error.message === "jwt_missing_required_scope") {
        throw error;
      }
      if (!nextSecret) {
        throw error;
      }
      payload = await verify(nextSecret);
    }
    log.info("service.auth.ok", {
      requestId: request.id,
      caller: payload.sub ?? payload.iss ?? "unknown",
      scope: payload.scope
    });
  } catch (error) {
    if (error instanceof Error && error.message === "jwt_missing_required_scope") {
      await reply.code(403).send(
        makeErrorResponse("service_auth_scope_missing", "Service token scope missing", {
          devMode: config.DEV_MODE
        })
      );
      return;
    }
    await reply.code(401).send(
      makeErrorResponse("invalid_request", "Invalid service token", {
        devMode: config.DEV_MODE
      })
    );
  }
};
