import { formatCidr, uniqueCidrs } from "./cidr.js";
import { formatPortSpec, normalizePortRanges } from "./ports.js";
import type { Cidr, PortProtocol, PortRange, RuleOptions, RuleSpec, SimpleProtocol } from "./types.js";

const SIMPLE_PROTOCOLS: SimpleProtocol[] = ["icmp", "gre", "esp"];

// Build the desired inbound rule set: one rule per enabled simple protocol, one each for
// TCP and UDP when they have ports. Every rule carries the full source set, even when empty.
export function buildRuleSpecs(options: RuleOptions, sources: Cidr[]): RuleSpec[] {
  const sourceList = uniqueCidrs(sources).map(formatCidr);
  const rules: RuleSpec[] = [];

  for (const protocol of SIMPLE_PROTOCOLS) {
    if (options[protocol]) {
      rules.push({ protocol, direction: "in", sources: [...sourceList], destinations: [] });
    }
  }

  pushPortRule(rules, "tcp", options.tcp, sourceList);
  pushPortRule(rules, "udp", options.udp, sourceList);

  return rules;
}

function pushPortRule(rules: RuleSpec[], protocol: PortProtocol, ports: PortRange[], sources: string[]): void {
  const normalized = normalizePortRanges(ports);
  if (normalized.length === 0) {
    return;
  }
  rules.push({ protocol, direction: "in", ports: normalized, sources: [...sources], destinations: [] });
}

export function hasEnabledRules(options: RuleOptions): boolean {
  return options.icmp || options.gre || options.esp || options.tcp.length > 0 || options.udp.length > 0;
}

export function describeRule(rule: RuleSpec): string {
  const protocol = rule.protocol.toUpperCase();
  const ports = "ports" in rule ? ` ${formatPortSpec(rule.ports)}` : "";
  const sources = rule.sources.length > 0 ? rule.sources.join(", ") : "no sources";
  return `${rule.direction} ${protocol}${ports} from ${sources}`;
}
