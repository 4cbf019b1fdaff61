const toHex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex");

// Dates become UTC ISO strings and byte arrays become hex, so anchored documents hash the
// same whichever store they were loaded from.
const sortValue = (value: unknown): unknown => {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return toHex(value);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sortValue(entry));
  }
  if (value && typeof value === "object") {
    const record = value as Record<string, unknown>;
    return Object.keys(record)
      .sort()
      .reduce<Record<string, unknown>>((acc, key) => {
        if (record[key] === undefined) return acc;
        acc[key] = sortValue(record[key]);
        return acc;
      }, {});
  }
  return value;
};

export const canonicalizeJson = (value: unknown) => JSON.stringify(sortValue(value));
