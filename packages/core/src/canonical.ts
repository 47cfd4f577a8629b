import crypto from "node:crypto";

// Deterministic JSON: object keys sorted at every depth, array order kept.
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value && typeof value === "object") {
    const next: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      next[key] = sortKeys(entry);
    }
    return next;
  }
  return value;
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

// Short, non-reversible handle for a credential so logs never carry the token itself.
export function tokenFingerprint(token: string): string {
  return sha256Hex(token).slice(0, 8);
}
