import { describeError, type Firewall, type FirewallApi, type RuleSpec } from "@fwsync/core";
import { asRecord, errorFromPayload, HcloudApiError } from "./errors.js";
import { parseHcloudFirewall, toHcloudRules } from "./wire.js";

export const HCLOUD_API = "https://api.hetzner.cloud/v1";
export const DEFAULT_API_TIMEOUT_MS = 15_000;

export type HcloudClientOptions = {
  token: string;
  endpoint?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

// Firewall API bound to one project token.
export function createHcloudClient(options: HcloudClientOptions): FirewallApi {
  const endpoint = (options.endpoint ?? HCLOUD_API).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_API_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;

  const request = async (method: "GET" | "POST", path: string, body?: unknown): Promise<Record<string, unknown>> => {
    const label = `${method} ${path}`;
    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(`${endpoint}${path}`, {
        method,
        headers: {
          accept: "application/json",
          authorization: `Bearer ${options.token}`,
          ...(body === undefined ? {} : { "content-type": "application/json" })
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs)
      });
      text = await response.text();
    } catch (err) {
      throw new HcloudApiError("network", `${label}: ${describeError(err)}`);
    }

    const payload = parseJson(text);
    if (!response.ok || asRecord(payload)?.error) {
      throw errorFromPayload(response.status, payload, label);
    }
    const record = asRecord(payload);
    if (!record) {
      throw new HcloudApiError("unknown", `${label}: response is not a JSON object`, { status: response.status });
    }
    return record;
  };

  const findFirewall = async (name: string): Promise<Firewall | null> => {
    const path = `/firewalls?name=${encodeURIComponent(name)}`;
    const payload = await request("GET", path);
    const firewalls = Array.isArray(payload.firewalls) ? payload.firewalls : [];
    for (const entry of firewalls) {
      const firewall = parseHcloudFirewall(entry);
      if (firewall && firewall.name === name) {
        return firewall;
      }
    }
    return null;
  };

  const createFirewall = async (name: string, rules: RuleSpec[]): Promise<Firewall> => {
    const payload = await request("POST", "/firewalls", { name, rules: toHcloudRules(rules) });
    const firewall = parseHcloudFirewall(payload.firewall);
    if (!firewall) {
      throw new HcloudApiError("unknown", "POST /firewalls: response carries no firewall");
    }
    return firewall;
  };

  const updateFirewallRules = async (id: number, rules: RuleSpec[]): Promise<void> => {
    await request("POST", `/firewalls/${id}/actions/set_rules`, { rules: toHcloudRules(rules) });
  };

  return { findFirewall, createFirewall, updateFirewallRules };
}

function parseJson(text: string): unknown {
  if (!text.trim()) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
