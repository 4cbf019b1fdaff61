import { FastifyInstance } from "fastify";
import type { LedgerEvent } from "@custody/submission-ledger";
import { getLedgerContext } from "../ledger.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";

let streamClients = 0;

const toWireEvent = (event: LedgerEvent) => JSON.stringify(event);

const setClientGauge = () => metrics.setGauge("ledger_event_stream_clients", {}, streamClients);

export const registerEventRoutes = (app: FastifyInstance) => {
  app.get("/v1/ledger/events", { websocket: true }, async (socket, request) => {
    let closed = false;
    let unsubscribe: () => void = () => undefined;
    streamClients += 1;
    setClientGauge();
    // Registered before any await so a client leaving early still releases its slot.
    socket.once("close", () => {
      closed = true;
      unsubscribe();
      streamClients = Math.max(0, streamClients - 1);
      setClientGauge();
    });
    socket.on("error", (error) => {
      log.warn("ledger.event_stream.error", { requestId: request.id, error });
    });

    const { ledger } = await getLedgerContext();
    if (closed) return;
    // A send to a closed socket throws, which unsubscribes this listener.
    unsubscribe = ledger.subscribe((event) => {
      if (socket.readyState !== socket.OPEN) {
        throw new Error("event_stream_closed");
      }
      socket.send(toWireEvent(event));
    });
    const registryId = await ledger.getRegistryAddress();
    if (closed) return;
    socket.send(JSON.stringify({ type: "ready", registryId }));
    log.info("ledger.event_stream.opened", { requestId: request.id });
  });
};
