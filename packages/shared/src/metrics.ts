export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const labelsKey = (labels: MetricLabels) => JSON.stringify(normalizeLabels(labels));

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export type MetricsRegistry = ReturnType<typeof createMetricsRegistry>;

export const createMetricsRegistry = (baseLabels: MetricLabels = {}) => {
  const entries = new Map<string, MetricEntry>();

  const keyFor = (name: string, labels: MetricLabels) => {
    const merged = { ...baseLabels, ...labels };
    return { merged, key: `${name}:${labelsKey(merged)}` };
  };

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    const { merged, key } = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value += delta;
      return;
    }
    entries.set(key, { name, labels: merged, value: delta, type: "counter" });
  };

  const setGauge = (name: string, labels: MetricLabels = {}, value: number) => {
    const { merged, key } = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    entries.set(key, { name, labels: merged, value, type: "gauge" });
  };

  const getValue = (name: string, labels: MetricLabels = {}) =>
    entries.get(keyFor(name, labels).key)?.value ?? 0;

  const render = () => {
    const lines: string[] = [];
    const seenTypes = new Map<string, MetricType>();
    for (const entry of entries.values()) {
      if (!seenTypes.has(entry.name)) {
        lines.push(`# TYPE ${entry.name} ${entry.type}`);
        seenTypes.set(entry.name, entry.type);
      }
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, setGauge, getValue, render };
};
