import { createMetricsRegistry } from "@custody/shared";

export const metrics = createMetricsRegistry({ service: "ledger-service" });

const registerLedgerMetrics = () => {
  metrics.incCounter("ledger_submissions_accepted_total", {}, 0);
  metrics.incCounter("ledger_listener_removed_total", {}, 0);
  metrics.incCounter("ledger_anchors_total", {}, 0);
  metrics.setGauge("ledger_event_stream_clients", {}, 0);
};

registerLedgerMetrics();
