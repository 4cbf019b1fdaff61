import { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config.js";
import { getLedgerContext } from "../ledger.js";

const historyQuerySchema = z.object({
  start: z.coerce.number().int().min(0).default(0),
  count: z.coerce.number().int().min(0).default(config.HISTORY_MAX_PAGE_SIZE)
});

const chainQuerySchema = z.object({
  start: z.coerce.number().int().min(0).default(0),
  count: z.coerce.number().int().min(0).optional()
});

const statsQuerySchema = z.object({
  dataHash: z.string().min(1).optional()
});

export const registerAuditRoutes = (app: FastifyInstance) => {
  app.get("/v1/audit/history", async (request, reply) => {
    const query = historyQuerySchema.parse(request.query ?? {});
    const count = Math.min(query.count, config.HISTORY_MAX_PAGE_SIZE);
    const { ledger } = await getLedgerContext();
    const submissions = await ledger.getSubmissionHistory(query.start, count);
    const total = await ledger.getTotalSubmissions();
    const nextStart = query.start + submissions.length;
    return reply.send({
      total,
      start: query.start,
      count: submissions.length,
      submissions,
      // Larger counts are served as pages of this size.
      maxPageSize: config.HISTORY_MAX_PAGE_SIZE,
      ...(nextStart < total ? { nextStart } : {})
    });
  });

  app.get("/v1/audit/chain", async (request, reply) => {
    const query = chainQuerySchema.parse(request.query ?? {});
    const { ledger } = await getLedgerContext();
    return reply.send(await ledger.verifyAuditChain(query.start, query.count));
  });

  app.get("/v1/ledger/stats", async (request, reply) => {
    const query = statsQuerySchema.parse(request.query ?? {});
    const { ledger } = await getLedgerContext();
    const [totalSubmissions, registryId] = await Promise.all([
      ledger.getTotalSubmissions(),
      ledger.getRegistryAddress()
    ]);
    return reply.send({
      totalSubmissions,
      registryId,
      ...(query.dataHash ? { hasSubmission: await ledger.hasSubmission(query.dataHash) } : {})
    });
  });
};
