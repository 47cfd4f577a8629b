import { canonicalCidr } from "./cidr.js";
import { sha256Hex, stableStringify } from "./canonical.js";
import { formatPortRange, normalizePortRanges } from "./ports.js";
import type { Direction, Protocol, RuleSpec } from "./types.js";

const PROTOCOL_ORDER: Record<Protocol, number> = {
  icmp: 0,
  gre: 1,
  esp: 2,
  tcp: 3,
  udp: 4
};

export type CanonicalRule = {
  protocol: Protocol;
  direction: Direction;
  ports: string[];
  sources: string[];
  destinations: string[];
};

export type RuleDiff = {
  equal: boolean;
  missing: CanonicalRule[];
  unexpected: CanonicalRule[];
};

// Representation-independent form of a rule: sets become sorted, deduplicated lists.
export function canonicalizeRule(rule: RuleSpec): CanonicalRule {
  return {
    protocol: rule.protocol,
    direction: rule.direction,
    ports: "ports" in rule ? normalizePortRanges(rule.ports).map(formatPortRange) : [],
    sources: canonicalSet(rule.sources),
    destinations: canonicalSet(rule.destinations)
  };
}

export function canonicalizeRules(rules: RuleSpec[]): CanonicalRule[] {
  return rules
    .map(canonicalizeRule)
    .map((rule) => ({ rule, key: stableStringify(rule) }))
    .sort((a, b) => PROTOCOL_ORDER[a.rule.protocol] - PROTOCOL_ORDER[b.rule.protocol] || compareText(a.key, b.key))
    .map((entry) => entry.rule);
}

// Multiset comparison of canonical rules. Ordering of rules, ports and CIDRs never matters;
// any difference in count, protocol, ports, sources or destinations does.
export function diffRules(desired: RuleSpec[], current: RuleSpec[]): RuleDiff {
  const remaining = new Map<string, CanonicalRule[]>();
  for (const rule of canonicalizeRules(current)) {
    const key = stableStringify(rule);
    remaining.set(key, [...(remaining.get(key) ?? []), rule]);
  }

  const missing: CanonicalRule[] = [];
  for (const rule of canonicalizeRules(desired)) {
    const bucket = remaining.get(stableStringify(rule));
    if (bucket && bucket.length > 0) {
      bucket.pop();
      continue;
    }
    missing.push(rule);
  }

  const unexpected = Array.from(remaining.values()).flat();
  return { equal: missing.length === 0 && unexpected.length === 0, missing, unexpected };
}

export function rulesEqual(desired: RuleSpec[], current: RuleSpec[]): boolean {
  return diffRules(desired, current).equal;
}

// Stable hash of a rule set, identical for any permutation of equivalent rules.
export function fingerprintRules(rules: RuleSpec[]): string {
  return sha256Hex(stableStringify(canonicalizeRules(rules)));
}

export function formatCanonicalRule(rule: CanonicalRule): string {
  const ports = rule.ports.length > 0 ? ` ${rule.ports.join(",")}` : "";
  const sources = rule.sources.length > 0 ? rule.sources.join(",") : "-";
  const destinations = rule.destinations.length > 0 ? ` to ${rule.destinations.join(",")}` : "";
  return `${rule.direction} ${rule.protocol}${ports} from ${sources}${destinations}`;
}

function canonicalSet(values: string[]): string[] {
  return Array.from(new Set(values.map(canonicalCidr))).sort(compareText);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
