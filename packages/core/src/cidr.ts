import { Address4, Address6 } from "ip-address";
import { CidrError, describeError } from "./errors.js";
import type { AddressFamily, Cidr } from "./types.js";

const PREFIX_PATTERN = /^\d{1,3}$/;

export function maxPrefix(family: AddressFamily): number {
  return family === "ipv4" ? 32 : 128;
}

export function detectFamily(address: string): AddressFamily {
  return address.includes(":") ? "ipv6" : "ipv4";
}

// Parse a CIDR in network-id form. The provider rejects blocks with host bits set,
// so "10.0.0.1/24" is an error while "10.0.0.0/24" is accepted.
export function parseCidr(input: string): Cidr {
  const text = input.trim();
  const slash = text.indexOf("/");
  if (slash === -1) {
    throw new CidrError(input, "missing prefix length");
  }
  const prefixText = text.slice(slash + 1);
  if (!PREFIX_PATTERN.test(prefixText)) {
    throw new CidrError(input, "prefix length must be a number");
  }
  const family = detectFamily(text);
  const prefix = Number.parseInt(prefixText, 10);
  if (prefix > maxPrefix(family)) {
    throw new CidrError(input, `prefix length exceeds ${maxPrefix(family)}`);
  }
  const parsed = parseAddress(text, family, input);
  const network = parsed.startAddress().correctForm();
  if (network !== parsed.correctForm()) {
    throw new CidrError(input, `host bits are set, use ${network}/${prefix}`);
  }
  return { family, network, prefix };
}

// Turn a discovered bare address into a CIDR, masking it down to `prefix`.
export function hostCidr(address: string, family: AddressFamily, prefix = maxPrefix(family)): Cidr {
  const text = address.trim();
  if (!text || text.includes("/")) {
    throw new CidrError(address, "expected a bare address");
  }
  if (detectFamily(text) !== family) {
    throw new CidrError(address, `expected an ${family} address`);
  }
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix(family)) {
    throw new CidrError(address, `prefix length ${prefix} is out of range`);
  }
  const parsed = parseAddress(`${text}/${prefix}`, family, address);
  return { family, network: parsed.startAddress().correctForm(), prefix };
}

export function formatCidr(cidr: Cidr): string {
  return `${cidr.network}/${cidr.prefix}`;
}

// Canonical text for a CIDR received from elsewhere, without enforcing the network-id rule.
// Unparsable input is kept (trimmed, lowercased) so it still compares as different.
export function canonicalCidr(input: string): string {
  const text = input.trim().toLowerCase();
  const family = detectFamily(text);
  const withPrefix = text.includes("/") ? text : `${text}/${maxPrefix(family)}`;
  try {
    const parsed = family === "ipv4" ? new Address4(withPrefix) : new Address6(withPrefix);
    return `${parsed.correctForm()}/${parsed.subnetMask}`;
  } catch {
    return text;
  }
}

// Deduplicate by canonical text, ipv4 before ipv6, then lexical.
export function uniqueCidrs(cidrs: Cidr[]): Cidr[] {
  const seen = new Map<string, Cidr>();
  for (const cidr of cidrs) {
    seen.set(formatCidr(cidr), cidr);
  }
  return Array.from(seen.values()).sort(compareCidrs);
}

function compareCidrs(a: Cidr, b: Cidr): number {
  if (a.family !== b.family) {
    return a.family === "ipv4" ? -1 : 1;
  }
  const left = formatCidr(a);
  const right = formatCidr(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function parseAddress(text: string, family: AddressFamily, input: string): Address4 | Address6 {
  try {
    return family === "ipv4" ? new Address4(text) : new Address6(text);
  } catch (err) {
    throw new CidrError(input, describeError(err));
  }
}
