import {
  canonicalCidr,
  formatPortRange,
  normalizePortRanges,
  parsePortRange,
  type Direction,
  type Firewall,
  type PortRange,
  type Protocol,
  type RuleSpec
} from "@fwsync/core";
import { asRecord } from "./errors.js";

const PROTOCOLS: Protocol[] = ["icmp", "gre", "esp", "tcp", "udp"];

/** Rule as the provider stores it: one port or port range per rule. */
export type HcloudRule = {
  description: string | null;
  direction: Direction;
  protocol: Protocol;
  port: string | null;
  source_ips: string[];
  destination_ips: string[];
};

// Fan each RuleSpec out to the provider's one-port-per-rule form.
export function toHcloudRules(rules: RuleSpec[]): HcloudRule[] {
  const wire: HcloudRule[] = [];
  for (const rule of rules) {
    const base = {
      direction: rule.direction,
      protocol: rule.protocol,
      source_ips: [...rule.sources],
      destination_ips: [...rule.destinations]
    };
    if (!("ports" in rule)) {
      wire.push({ ...base, description: rule.protocol.toUpperCase(), port: null });
      continue;
    }
    for (const range of normalizePortRanges(rule.ports)) {
      const port = formatPortRange(range);
      wire.push({ ...base, description: `${rule.protocol.toUpperCase()}-${port}`, port });
    }
  }
  return wire;
}

type RuleGroup = { rule: HcloudRule; ports: PortRange[]; unparsable: boolean };

// Group provider rules back into RuleSpecs. Rules only merge when protocol, direction and
// both address sets match, so anything edited out of band still shows up as a difference.
// A repeated simple rule, or a port that repeats or overlaps one already in the group,
// opens a new group so duplicates keep their own count.
export function fromHcloudRules(rules: HcloudRule[]): RuleSpec[] {
  const groups: RuleGroup[] = [];
  const byKey = new Map<string, RuleGroup[]>();
  for (const rule of rules) {
    const key = [
      rule.protocol,
      rule.direction,
      canonicalList(rule.source_ips),
      canonicalList(rule.destination_ips)
    ].join("|");
    const range = rule.port === null ? null : parseWirePort(rule.port);
    const candidates = byKey.get(key) ?? [];
    let group = candidates.find((candidate) => fitsGroup(candidate, rule, range));
    if (!group) {
      group = { rule, ports: [], unparsable: false };
      candidates.push(group);
      groups.push(group);
      byKey.set(key, candidates);
    }
    if (range) {
      group.ports.push(range);
    } else if (rule.port !== null) {
      group.unparsable = true;
    }
  }

  return groups.map(({ rule, ports, unparsable }): RuleSpec => {
    const base = {
      direction: rule.direction,
      sources: [...rule.source_ips],
      destinations: [...rule.destination_ips]
    };
    if (rule.protocol === "tcp" || rule.protocol === "udp") {
      // A port we cannot read leaves the rule portless, which never matches a desired rule.
      return { ...base, protocol: rule.protocol, ports: unparsable ? [] : normalizePortRanges(ports) };
    }
    return { ...base, protocol: rule.protocol };
  });
}

function fitsGroup(group: RuleGroup, rule: HcloudRule, range: PortRange | null): boolean {
  if (rule.protocol !== "tcp" && rule.protocol !== "udp") {
    return false;
  }
  if (!range) {
    return true;
  }
  return !group.ports.some((existing) => range.start <= existing.end && existing.start <= range.end);
}

export function parseHcloudFirewall(value: unknown): Firewall | null {
  const record = asRecord(value);
  if (!record || typeof record.id !== "number" || typeof record.name !== "string") {
    return null;
  }
  const rawRules = Array.isArray(record.rules) ? record.rules : [];
  const rules = rawRules.map(parseHcloudRule).filter((rule): rule is HcloudRule => rule !== null);
  return { id: record.id, name: record.name, rules: fromHcloudRules(rules) };
}

export function parseHcloudRule(value: unknown): HcloudRule | null {
  const record = asRecord(value);
  if (!record) {
    return null;
  }
  const protocol = PROTOCOLS.find((candidate) => candidate === record.protocol);
  const direction = record.direction === "in" || record.direction === "out" ? record.direction : null;
  if (!protocol || !direction) {
    return null;
  }
  return {
    description: typeof record.description === "string" ? record.description : null,
    direction,
    protocol,
    port: typeof record.port === "string" ? record.port : null,
    source_ips: stringList(record.source_ips),
    destination_ips: stringList(record.destination_ips)
  };
}

function parseWirePort(port: string): PortRange | null {
  if (port.trim().toLowerCase() === "any") {
    return { start: 1, end: 65535 };
  }
  try {
    return parsePortRange(port);
  } catch {
    return null;
  }
}

function canonicalList(values: string[]): string {
  return Array.from(new Set(values.map(canonicalCidr))).sort().join(",");
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];
}
