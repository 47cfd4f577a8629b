import { formatCidr, hostCidr, maxPrefix, uniqueCidrs } from "./cidr.js";
import { describeError } from "./errors.js";
import type { AddressDiscovery, AddressFamily, AddressSet, Cidr, DiscoveryFailure, Logger } from "./types.js";

export type AddressBookOptions = {
  ipv4: boolean;
  ipv6: boolean;
  static: Cidr[];
  /** Prefix applied to the discovered IPv6 address; 128 allows the single host. */
  ipv6Prefix?: number;
  logger?: Logger;
};

type FamilyResult = { family: AddressFamily; cidr: Cidr } | { family: AddressFamily; failure: DiscoveryFailure };

// Discover the enabled address families and merge them with the static CIDRs.
// A family that cannot be discovered is reported and left out for this cycle.
export async function resolveAddresses(discovery: AddressDiscovery, options: AddressBookOptions): Promise<AddressSet> {
  const families: AddressFamily[] = [];
  if (options.ipv4) {
    families.push("ipv4");
  }
  if (options.ipv6) {
    families.push("ipv6");
  }

  const results = await Promise.all(
    families.map((family) => discoverFamily(discovery, family, prefixFor(family, options)))
  );

  const discovered: AddressSet["discovered"] = {};
  const dynamic: Cidr[] = [];
  const failures: DiscoveryFailure[] = [];
  for (const result of results) {
    if ("failure" in result) {
      options.logger?.warn?.(`Could not discover public ${result.family} address: ${result.failure.message}`);
      failures.push(result.failure);
      continue;
    }
    options.logger?.debug?.(`Discovered public ${result.family} address ${formatCidr(result.cidr)}`);
    discovered[result.family] = result.cidr;
    dynamic.push(result.cidr);
  }

  return {
    sources: uniqueCidrs([...dynamic, ...options.static]),
    discovered,
    failures
  };
}

async function discoverFamily(discovery: AddressDiscovery, family: AddressFamily, prefix: number): Promise<FamilyResult> {
  try {
    const address = await discovery.discover(family);
    return { family, cidr: hostCidr(address, family, prefix) };
  } catch (err) {
    return { family, failure: { family, message: describeError(err) } };
  }
}

function prefixFor(family: AddressFamily, options: AddressBookOptions): number {
  if (family === "ipv6" && typeof options.ipv6Prefix === "number") {
    return options.ipv6Prefix;
  }
  return maxPrefix(family);
}
