import fastify, { type FastifyError } from "fastify";
import rateLimit from "@fastify/rate-limit";
import websocket from "@fastify/websocket";
import net from "node:net";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { isLedgerError, makeErrorResponse } from "@custody/shared";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerRegistryRoutes } from "./routes/registry.js";
import { registerSubmissionRoutes } from "./routes/submissions.js";
import { registerAuditRoutes } from "./routes/audit.js";
import { registerAnchorRoutes } from "./routes/anchors.js";
import { registerEventRoutes } from "./routes/events.js";

const isLoopbackAddress = (value?: string) => {
  if (!value) return false;
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "localhost" || trimmed === "::1") return true;
  const mapped = trimmed.startsWith("::ffff:") ? trimmed.slice(7) : trimmed;
  if (net.isIP(mapped) === 4) {
    return mapped.split(".")[0] === "127";
  }
  return false;
};

export const isPrivateAddress = (value?: string) => {
  if (!value) return false;
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "localhost" || trimmed === "::1") return true;
  if (trimmed === "0.0.0.0" || trimmed === "::") return false;
  const mapped = trimmed.startsWith("::ffff:") ? trimmed.slice(7) : trimmed;
  const ipType = net.isIP(mapped);
  if (ipType === 4) {
    const [a = -1, b = -1] = mapped.split(".").map((part) => Number(part));
    if (a === 10 || a === 127) return true;
    if (a === 192 && b === 168) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    return false;
  }
  if (ipType === 6) {
    return mapped.startsWith("fc") || mapped.startsWith("fd");
  }
  return false;
};

const readHeader = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

const isFastifyError = (error: unknown): error is FastifyError =>
  error instanceof Error && "code" in error && typeof error.code === "string";

export const buildServer = () => {
  if (config.NODE_ENV === "production" && config.PUBLIC_SERVICE) {
    log.error("public.service.not_allowed", { env: config.NODE_ENV });
    throw new Error("public_service_not_allowed");
  }
  if (config.NODE_ENV === "production" && !isPrivateAddress(config.SERVICE_BIND_ADDRESS)) {
    log.error("service.bind.public_not_allowed", {
      env: config.NODE_ENV,
      bind: config.SERVICE_BIND_ADDRESS
    });
    throw new Error("public_bind_not_allowed");
  }
  if (config.ALLOW_INSECURE_DEV_AUTH) {
    const localDevAllowed =
      config.NODE_ENV === "test" ||
      (config.NODE_ENV === "development" &&
        (config.LOCAL_DEV || isLoopbackAddress(config.SERVICE_BIND_ADDRESS)));
    if (!localDevAllowed) {
      log.error("service.auth.insecure_not_allowed", {
        env: config.NODE_ENV,
        bind: config.SERVICE_BIND_ADDRESS
      });
      throw new Error("insecure_dev_auth_not_allowed");
    }
    log.warn("service.auth.insecure_enabled", { env: config.NODE_ENV });
  } else if (!config.SERVICE_JWT_SECRET) {
    log.warn("service.auth.missing", { env: config.NODE_ENV });
  }

  const app = fastify({
    logger: false,
    bodyLimit: config.BODY_LIMIT_BYTES,
    trustProxy: config.TRUST_PROXY,
    genReqId: (request) => readHeader(request.headers["x-request-id"]) ?? randomUUID()
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-Id", request.id);
    log.info("request", { requestId: request.id, method: request.method, url: request.url });
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url.split("?")[0] ?? request.url;
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error, request, reply) => {
    const devMode = config.DEV_MODE;
    if (isLedgerError(error)) {
      return reply.code(error.statusCode).send(
        makeErrorResponse(error.responseCode, error.message, { details: error.code, devMode })
      );
    }
    if (error instanceof ZodError) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
          devMode
        })
      );
    }
    const statusCode = isFastifyError(error) ? error.statusCode : undefined;
    const errorCode = isFastifyError(error) ? error.code : undefined;
    if (statusCode === 413 || errorCode === "FST_ERR_CTP_BODY_TOO_LARGE") {
      return reply.code(413).send(
        makeErrorResponse("invalid_request", "Request body too large", { devMode })
      );
    }
    if (statusCode === 429) {
      return reply.code(429).send(makeErrorResponse("rate_limited", "Too many requests", { devMode }));
    }
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      // Malformed JSON, unsupported media types and the like.
      return reply.code(statusCode).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: error instanceof Error ? error.message : undefined,
          devMode
        })
      );
    }
    const err = error instanceof Error ? error : new Error("unknown_error");
    log.error("request.failed", { requestId: request.id, error: err });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode,
        debug: devMode ? { cause: err.message } : undefined
      })
    );
  });

  app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS
  });
  app.register(websocket);

  registerHealthRoutes(app);
  registerRegistryRoutes(app);
  registerSubmissionRoutes(app);
  registerAuditRoutes(app);
  registerAnchorRoutes(app);
  app.register(async (instance) => {
    registerEventRoutes(instance);
  });

  return app;
};
