import { FastifyInstance } from "fastify";
import { metrics } from "../metrics.js";
import { getLedgerContext } from "../ledger.js";

export const registerHealthRoutes = (app: FastifyInstance) => {
  app.get("/healthz", async () => ({ ok: true }));
  app.get("/metrics", async (_request, reply) => {
    const { ledger } = await getLedgerContext();
    metrics.setGauge("ledger_submissions_total", {}, await ledger.getTotalSubmissions());
    reply.header("content-type", "text/plain; version=0.0.4");
    return reply.send(metrics.render());
  });
};
