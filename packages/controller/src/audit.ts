import { formatCidr, hasEnabledRules, isFullPortRange } from "@fwsync/core";
import type { ControllerConfig } from "./config.js";

export type AuditSeverity = "low" | "medium" | "high";

export type AuditFinding = {
  id: string;
  severity: AuditSeverity;
  message: string;
  path?: string;
  hint?: string;
};

// Hetzner allows 3600 requests per hour per project; each cycle costs one to three.
const MIN_SAFE_INTERVAL_SEC = 10;

// Flag settings that open the firewall wider than intended or cannot work as configured.
export function auditControllerConfig(config: ControllerConfig): AuditFinding[] {
  const findings: AuditFinding[] = [];

  for (const cidr of config.addresses.static) {
    if (cidr.prefix === 0) {
      findings.push({
        id: `addresses.static.open-${cidr.family}`,
        severity: "high",
        message: `Static network ${formatCidr(cidr)} admits every ${cidr.family} source.`,
        path: "addresses.static",
        hint: "Remove the entry unless the firewall should not restrict sources at all."
      });
    }
  }

  if (!config.addresses.ipv4 && !config.addresses.ipv6 && config.addresses.static.length === 0) {
    findings.push({
      id: "addresses.none",
      severity: "medium",
      message: "Address discovery is disabled for both families and no static networks are set.",
      path: "addresses",
      hint: "Rules will be created without sources and admit no traffic."
    });
  }

  if (!hasEnabledRules(config.rules)) {
    findings.push({
      id: "rules.none",
      severity: "medium",
      message: "No protocol is enabled, so the firewall will be kept empty.",
      path: "rules",
      hint: "Enable icmp, gre or esp, or set tcp or udp ports."
    });
  }

  if (isFullPortRange(config.rules.tcp) || isFullPortRange(config.rules.udp)) {
    findings.push({
      id: "rules.ports.full-range",
      severity: "low",
      message: "Every TCP or UDP port is opened to the allowed sources.",
      path: "rules",
      hint: "List only the ports the servers actually serve."
    });
  }

  if (!config.schedule.runOnce && config.schedule.intervalSec < MIN_SAFE_INTERVAL_SEC) {
    findings.push({
      id: "schedule.interval.short",
      severity: "low",
      message: `Reconciling every ${config.schedule.intervalSec}s may exhaust the API rate limit.`,
      path: "schedule.interval",
      hint: `Use an interval of at least ${MIN_SAFE_INTERVAL_SEC} seconds.`
    });
  }

  return findings;
}

export function formatAuditFindings(findings: AuditFinding[]): string {
  if (findings.length === 0) {
    return "Audit: no configuration findings.";
  }
  const lines = [`Audit findings (${findings.length}):`];
  for (const finding of findings) {
    const path = finding.path ? ` (${finding.path})` : "";
    const hint = finding.hint ? ` Hint: ${finding.hint}` : "";
    lines.push(`- [${finding.severity}] ${finding.message}${path}${hint}`);
  }
  return lines.join("\n");
}
