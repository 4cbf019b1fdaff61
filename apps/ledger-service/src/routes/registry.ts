import { FastifyInstance } from "fastify";
import { z } from "zod";
import { extractBearerToken } from "@custody/shared";
import { requireServiceAuth } from "../auth.js";
import { getLedgerContext } from "../ledger.js";
import { log } from "../log.js";

const REGISTRY_WRITE_SCOPE = "registry:write";

const addressParamsSchema = z.object({ address: z.string().min(1) });
const deviceParamsSchema = z.object({ deviceId: z.string().min(1) });

const registerVerifierSchema = z.object({
  address: z.string().min(1),
  name: z.string().max(256).optional(),
  metadata: z.string().optional()
});

const registerDeviceSchema = z.object({
  deviceId: z.string().min(1),
  publicKey: z.string().min(1),
  metadata: z.string().optional()
});

const activationSchema = z.object({ active: z.boolean() });

const repointSchema = z.object({ registryId: z.string().min(1) });

export const registerRegistryRoutes = (app: FastifyInstance) => {
  app.post("/v1/admin/verifiers", async (request, reply) => {
    await requireServiceAuth(request, reply, { adminScopes: [REGISTRY_WRITE_SCOPE] });
    if (reply.sent) return;
    const body = registerVerifierSchema.parse(request.body ?? {});
    const registry = await (await getLedgerContext()).activeRegistry();
    const verifier = await registry.registerVerifier(body.address, {
      name: body.name,
      metadata: body.metadata
    });
    log.info("registry.verifier.registered", { requestId: request.id, address: verifier.address });
    return reply.code(201).send(verifier);
  });

  app.patch("/v1/admin/verifiers/:address", async (request, reply) => {
    await requireServiceAuth(request, reply, { adminScopes: [REGISTRY_WRITE_SCOPE] });
    if (reply.sent) return;
    const { address } = addressParamsSchema.parse(request.params);
    const { active } = activationSchema.parse(request.body ?? {});
    const registry = await (await getLedgerContext()).activeRegistry();
    const verifier = await registry.setVerifierActive(address, active);
    log.info("registry.verifier.activation", { requestId: request.id, address, active });
    return reply.send(verifier);
  });

  app.post("/v1/admin/verifiers/:address/devices", async (request, reply) => {
    await requireServiceAuth(request, reply, { adminScopes: [REGISTRY_WRITE_SCOPE] });
    if (reply.sent) return;
    const { address } = addressParamsSchema.parse(request.params);
    const body = registerDeviceSchema.parse(request.body ?? {});
    const registry = await (await getLedgerContext()).activeRegistry();
    const device = await registry.registerDevice(body.deviceId, address, body.publicKey, {
      metadata: body.metadata
    });
    log.info("registry.device.registered", {
      requestId: request.id,
      deviceId: device.deviceId,
      address: device.verifierAddress
    });
    return reply.code(201).send(device);
  });

  app.patch("/v1/admin/devices/:deviceId", async (request, reply) => {
    await requireServiceAuth(request, reply, { adminScopes: [REGISTRY_WRITE_SCOPE] });
    if (reply.sent) return;
    const { deviceId } = deviceParamsSchema.parse(request.params);
    const { active } = activationSchema.parse(request.body ?? {});
    const registry = await (await getLedgerContext()).activeRegistry();
    const device = await registry.setDeviceActive(deviceId, active);
    log.info("registry.device.activation", { requestId: request.id, deviceId: device.deviceId, active });
    return reply.send(device);
  });

  // The ledger checks the bearer token itself, so there is no service auth guard here.
  app.put("/v1/admin/ledger/registry", async (request, reply) => {
    const body = repointSchema.parse(request.body ?? {});
    const token = extractBearerToken(request.headers.authorization) ?? "";
    const { ledger } = await getLedgerContext();
    const result = await ledger.updateRegistryAddress(body.registryId, token);
    log.warn("ledger.registry.repointed", {
      requestId: request.id,
      registryId: result.registryId,
      previousRegistryId: result.previousRegistryId,
      subject: result.grant.subject
    });
    return reply.send({ registryId: result.registryId, previousRegistryId: result.previousRegistryId });
  });

  app.get("/v1/verifiers/:address", async (request, reply) => {
    const { address } = addressParamsSchema.parse(request.params);
    const registry = await (await getLedgerContext()).activeRegistry();
    const verifier = await registry.getVerifier(address);
    const devices = await registry.listVerifierDevices(verifier.address);
    return reply.send({ ...verifier, devices });
  });

  app.get("/v1/devices/:deviceId", async (request, reply) => {
    const { deviceId } = deviceParamsSchema.parse(request.params);
    const registry = await (await getLedgerContext()).activeRegistry();
    return reply.send(await registry.getDevice(deviceId));
  });
};
