export type HcloudErrorKind = "auth" | "rate-limit" | "network" | "validation" | "not-found" | "server" | "unknown";

export class HcloudApiError extends Error {
  readonly kind: HcloudErrorKind;
  readonly status?: number;
  readonly code?: string;

  constructor(kind: HcloudErrorKind, message: string, details: { status?: number; code?: string } = {}) {
    super(`[hcloud] ${message}`);
    this.name = "HcloudApiError";
    this.kind = kind;
    this.status = details.status;
    this.code = details.code;
  }
}

export function classifyStatus(status: number): HcloudErrorKind {
  if (status === 401 || status === 403) {
    return "auth";
  }
  if (status === 404) {
    return "not-found";
  }
  if (status === 429) {
    return "rate-limit";
  }
  if (status === 400 || status === 409 || status === 422) {
    return "validation";
  }
  if (status >= 500) {
    return "server";
  }
  return "unknown";
}

// Build an error from an `{ error: { code, message, details } }` envelope.
export function errorFromPayload(status: number, payload: unknown, request: string): HcloudApiError {
  const envelope = asRecord(asRecord(payload)?.error);
  const code = typeof envelope?.code === "string" ? envelope.code : undefined;
  const message = typeof envelope?.message === "string" ? envelope.message : `HTTP ${status}`;
  const fields = formatFieldErrors(asRecord(envelope?.details)?.fields);
  const text = `${request}: ${code ? `${code}: ` : ""}${message}${fields ? ` (${fields})` : ""}`;
  const kind = code === "rate_limit_exceeded" ? "rate-limit" : classifyStatus(status);
  return new HcloudApiError(kind, text, { status, code });
}

function formatFieldErrors(value: unknown): string {
  if (!Array.isArray(value)) {
    return "";
  }
  return value
    .map((entry) => {
      const field = asRecord(entry);
      const name = typeof field?.name === "string" ? field.name : "?";
      const messages = Array.isArray(field?.messages)
        ? field.messages.filter((message): message is string => typeof message === "string")
        : [];
      return `${name}: ${messages.join("; ")}`;
    })
    .join(", ");
}

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return value as Record<string, unknown>;
}
