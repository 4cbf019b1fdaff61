import { test } from "node:test";
import assert from "node:assert/strict";
import { createMetricsRegistry } from "./metrics.js";

test("counters accumulate per label set and render in prometheus text", () => {
  const metrics = createMetricsRegistry({ service: "ledger-service" });
  metrics.incCounter("submissions_total", { outcome: "accepted" });
  metrics.incCounter("submissions_total", { outcome: "accepted" });
  metrics.incCounter("submissions_total", { outcome: "conflict" });
  metrics.setGauge("ledger_total_submissions", {}, 2);
  metrics.setGauge("ledger_total_submissions", {}, 3);

  assert.equal(metrics.getValue("submissions_total", { outcome: "accepted" }), 2);
  assert.equal(metrics.getValue("submissions_total", { outcome: "missing" }), 0);
  assert.equal(
    metrics.render(),
    [
      "# TYPE submissions_total counter",
      'submissions_total{outcome="accepted",service="ledger-service"} 2',
      'submissions_total{outcome="conflict",service="ledger-service"} 1',
      "# TYPE ledger_total_submissions gauge",
      'ledger_total_submissions{service="ledger-service"} 3',
      ""
    ].join("\n")
  );
});
