import http from "node:http";
import https from "node:https";
import { describeError, hostCidr, type AddressDiscovery, type AddressFamily } from "@fwsync/core";

export const DEFAULT_IP_ENDPOINT = "https://ip.fotoallerlei.com";
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 10_000;

const MAX_BODY_CHARS = 256;

// Fetch the plain-text body of `url`, connecting over the given address family only.
export type FetchText = (url: string, family: AddressFamily, timeoutMs: number) => Promise<string>;

export type HttpDiscoveryOptions = {
  endpoint?: string;
  ipv4Endpoint?: string;
  ipv6Endpoint?: string;
  timeoutMs?: number;
  fetchText?: FetchText;
};

export class DiscoveryError extends Error {
  readonly family: AddressFamily;

  constructor(family: AddressFamily, message: string) {
    super(message);
    this.name = "DiscoveryError";
    this.family = family;
  }
}

// Discovery against an endpoint that answers with the caller's address as plain text.
// Each family may use its own endpoint; both default to `endpoint`.
export function createHttpDiscovery(options: HttpDiscoveryOptions = {}): AddressDiscovery {
  const endpoint = options.endpoint ?? DEFAULT_IP_ENDPOINT;
  const endpoints: Record<AddressFamily, string> = {
    ipv4: options.ipv4Endpoint ?? endpoint,
    ipv6: options.ipv6Endpoint ?? endpoint
  };
  const timeoutMs = options.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
  const fetchText = options.fetchText ?? requestText;

  const discover = async (family: AddressFamily): Promise<string> => {
    const url = endpoints[family];
    let body: string;
    try {
      body = await fetchText(url, family, timeoutMs);
    } catch (err) {
      throw new DiscoveryError(family, `request to ${url} failed: ${describeError(err)}`);
    }
    const address = body.trim();
    try {
      hostCidr(address, family);
    } catch {
      throw new DiscoveryError(family, `${url} returned "${truncate(address, 64)}", not an ${family} address`);
    }
    return address;
  };

  return { discover };
}

export const requestText: FetchText = (url, family, timeoutMs) =>
  new Promise<string>((resolve, reject) => {
    const target = new URL(url);
    const options: http.RequestOptions = {
      family: family === "ipv4" ? 4 : 6,
      timeout: timeoutMs,
      headers: { accept: "text/plain" }
    };
    const onResponse = (response: http.IncomingMessage): void => {
      const status = response.statusCode ?? 0;
      if (status < 200 || status >= 300) {
        response.resume();
        reject(new Error(`HTTP ${status}`));
        return;
      }
      response.setEncoding("utf8");
      let body = "";
      response.on("data", (chunk: string) => {
        body += chunk;
        if (body.length > MAX_BODY_CHARS) {
          request.destroy(new Error("response body too large"));
        }
      });
      response.on("end", () => resolve(body));
      response.on("error", reject);
    };
    const request =
      target.protocol === "http:" ? http.get(target, options, onResponse) : https.get(target, options, onResponse);
    request.on("timeout", () => request.destroy(new Error(`timed out after ${timeoutMs}ms`)));
    request.on("error", reject);
  });

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max)}...`;
}
