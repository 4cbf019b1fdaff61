import { FastifyInstance } from "fastify";
import { z } from "zod";
import { isLedgerError } from "@custody/shared";
import { requireServiceAuth } from "../auth.js";
import { getLedgerContext } from "../ledger.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";

const submitSchema = z.object({
  deviceId: z.string(),
  dataHash: z.string(),
  signature: z.string(),
  dataUri: z.string(),
  metadata: z.string().optional()
});

const dataHashParamsSchema = z.object({ dataHash: z.string().min(1) });
const deviceParamsSchema = z.object({ deviceId: z.string().min(1) });
const addressParamsSchema = z.object({ address: z.string().min(1) });

const integritySchema = z.object({
  data: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "data must be base64")
});

export const registerSubmissionRoutes = (app: FastifyInstance) => {
  app.post("/v1/submissions", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: ["ledger:submit"] });
    if (reply.sent) return;
    const body = submitSchema.parse(request.body ?? {});
    const { ledger } = await getLedgerContext();
    try {
      const receipt = await ledger.submitData(body);
      return reply.code(201).send(receipt);
    } catch (error) {
      if (isLedgerError(error)) {
        metrics.incCounter("ledger_submissions_rejected_total", { reason: error.code });
        log.warn("ledger.submission.rejected", {
          requestId: request.id,
          deviceId: body.deviceId,
          dataHash: body.dataHash,
          reason: error.code
        });
      }
      throw error;
    }
  });

  app.get("/v1/submissions/:dataHash", async (request, reply) => {
    const { dataHash } = dataHashParamsSchema.parse(request.params);
    const { ledger } = await getLedgerContext();
    return reply.send(await ledger.verifySubmission(dataHash));
  });

  app.get("/v1/submissions/:dataHash/details", async (request, reply) => {
    const { dataHash } = dataHashParamsSchema.parse(request.params);
    const { ledger } = await getLedgerContext();
    return reply.send(await ledger.getSubmissionDetails(dataHash));
  });

  app.post("/v1/submissions/:dataHash/integrity", async (request, reply) => {
    const { dataHash } = dataHashParamsSchema.parse(request.params);
    const { data } = integritySchema.parse(request.body ?? {});
    const { ledger } = await getLedgerContext();
    const matches = await ledger.verifyDataIntegrity(dataHash, Buffer.from(data, "base64"));
    return reply.send({ dataHash: dataHash.trim().toLowerCase(), matches });
  });

  app.get("/v1/devices/:deviceId/submissions", async (request, reply) => {
    const { deviceId } = deviceParamsSchema.parse(request.params);
    const { ledger } = await getLedgerContext();
    return reply.send({ deviceId, submissions: await ledger.getDeviceSubmissions(deviceId) });
  });

  app.get("/v1/verifiers/:address/submissions", async (request, reply) => {
    const { address } = addressParamsSchema.parse(request.params);
    const { ledger } = await getLedgerContext();
    return reply.send({
      verifierAddress: address,
      submissions: await ledger.getVerifierSubmissions(address)
    });
  });
};
