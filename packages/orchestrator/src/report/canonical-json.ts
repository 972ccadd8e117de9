// JSON with object keys sorted at every depth; undefined members are dropped
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, member] of entries) {
      sorted[key] = canonicalize(member);
    }
    return sorted;
  }
  return value;
}

export function toCanonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
