import { FastifyInstance } from "fastify";
import { z } from "zod";
import { makeErrorResponse } from "@custody/shared";
import { anchorDocument } from "@custody/submission-ledger";
import { requireServiceAuth } from "../auth.js";
import { config } from "../config.js";
import { getLedgerContext } from "../ledger.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";

const anchorSchema = z.object({
  document: z.record(z.unknown()),
  dataType: z.string().min(1).max(128),
  objectId: z.string().min(1).max(256).optional()
});

export const registerAnchorRoutes = (app: FastifyInstance) => {
  app.post("/v1/anchors", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: ["ledger:anchor"] });
    if (reply.sent) return;
    const body = anchorSchema.parse(request.body ?? {});
    const { ledger, anchorSigner } = await getLedgerContext();
    if (!anchorSigner) {
      return reply.code(503).send(
        makeErrorResponse("anchoring_disabled", "Document anchoring is not enabled", {
          devMode: config.DEV_MODE
        })
      );
    }
    const result = await anchorDocument(ledger, anchorSigner, body);
    metrics.incCounter("ledger_anchors_total", { type: result.metadata.type });
    log.info("ledger.document.anchored", {
      requestId: request.id,
      dataHash: result.dataHash,
      type: result.metadata.type,
      objectId: result.metadata.object_id
    });
    return reply.code(201).send(result);
  });
};
