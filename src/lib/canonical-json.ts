function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortValue);
  }

  if (value instanceof Map) {
    return sortValue(Object.fromEntries(value));
  }

  if (value !== null && typeof value === "object") {
    const fields: Array<[string, unknown]> = Object.entries(value);
    const entries = fields
      .filter(([, child]) => child !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, child] of entries) {
      out[key] = sortValue(child);
    }
    return out;
  }

  return value;
}

// Key order is code-unit order so the digest does not depend on the host locale.
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(sortValue(value));
}
