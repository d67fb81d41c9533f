function canonicalizeInternal(value: unknown): unknown {
  if (value === null) return null;
  if (value === undefined) return undefined;
  const type = typeof value;
  if (type === "string" || type === "boolean") return value;
  if (type === "number") return Number.isFinite(value) ? value : null;
  if (type === "bigint") return String(value);
  if (type === "symbol" || type === "function") return undefined;

  if (Array.isArray(value)) {
    return value.map((item) => {
      const normalized = canonicalizeInternal(item);
      return normalized === undefined ? null : normalized;
    });
  }

  if (type === "object") {
    const record = value as Record<string, unknown>;
    const keys = Object.keys(record).sort();
    const output: Record<string, unknown> = {};
    for (const key of keys) {
      const normalized = canonicalizeInternal(record[key]);
      if (normalized !== undefined) {
        output[key] = normalized;
      }
    }
    return output;
  }

  return String(value);
}

/**
 * canonicalizeJson executes a deterministic operation in this module.
 */
export function canonicalizeJson(value: unknown): unknown {
  const normalized = canonicalizeInternal(value);
  return normalized === undefined ? null : normalized;
}

/**
 * canonicalModelStringify executes a deterministic operation in this module.
 */
export function canonicalModelStringify(value: unknown): string {
  return JSON.stringify(canonicalizeJson(value));
}
