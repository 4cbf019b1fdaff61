type LogMeta = Record<string, unknown>;
type LogLevel = "info" | "warn" | "error";
type LogSink = (level: LogLevel, line: string) => void;

const SERVICE_NAME = "ledger-service";

// Public identifiers (device ids, data hashes, public keys) stay readable in logs.
const PUBLIC_KEYS = new Set(["publicKey", "public_key", "publicKeyHex", "dataHash", "deviceId"]);
const SENSITIVE_KEY =
  /secret|private|signature|seed|token|authorization|bearer|password|api[_-]?key|^data$/i;
const JWT_PATTERN = /eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g;
const MAX_DEPTH = 4;

const redactString = (value: string) => {
  if (value.toLowerCase().startsWith("bearer ")) {
    return "Bearer [redacted]";
  }
  return value.replace(JWT_PATTERN, "[redacted]");
};

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > MAX_DEPTH) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    const code = "code" in value ? String(value.code) : undefined;
    return { name: value.name, message: redactString(value.message), ...(code ? { code } : {}) };
  }
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] =
        !PUBLIC_KEYS.has(key) && SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
};

let sink: LogSink = consoleSink;

/** Redirects log lines, e.g. to capture them in tests. Returns a restore function. */
export const setLogSink = (next: LogSink) => {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
};

const write = (level: LogLevel, event: string, bindings: LogMeta, meta?: LogMeta) => {
  const safeMeta = redact({ ...bindings, ...(meta ?? {}) });
  const payload = {
    level,
    service: SERVICE_NAME,
    time: new Date().toISOString(),
    event,
    ...(safeMeta && typeof safeMeta === "object" ? safeMeta : {})
  };
  sink(level, JSON.stringify(payload));
};

export type Logger = {
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
};

const createLogger = (bindings: LogMeta): Logger => ({
  info: (event, meta) => write("info", event, bindings, meta),
  warn: (event, meta) => write("warn", event, bindings, meta),
  error: (event, meta) => write("error", event, bindings, meta),
  child: (extra) => createLogger({ ...bindings, ...extra })
});

export const log = createLogger({});
