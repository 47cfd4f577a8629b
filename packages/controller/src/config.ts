import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import {
  ConfigError,
  DEFAULT_ACCOUNT_DELAY_MS,
  DEFAULT_INTERVAL_SEC,
  describeError,
  parseCidr,
  parsePortSpec,
  tokenFingerprint,
  type Account,
  type Cidr,
  type LogLevel,
  type PortRange,
  type RuleOptions
} from "@fwsync/core";
import { DEFAULT_DISCOVERY_TIMEOUT_MS, DEFAULT_IP_ENDPOINT } from "@fwsync/discovery";
import { DEFAULT_API_TIMEOUT_MS, HCLOUD_API } from "@fwsync/hcloud";

export const DEFAULT_FIREWALL_NAME = "fwsync";
export const DEFAULT_IPV6_PREFIX = 128;

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".config", "fwsync", "config.yaml");
const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export type ControllerConfig = {
  accounts: Account[];
  firewallName: string;
  rules: RuleOptions;
  addresses: {
    ipv4: boolean;
    ipv6: boolean;
    ipv6Prefix: number;
    static: Cidr[];
  };
  discovery: {
    ipv4Endpoint: string;
    ipv6Endpoint: string;
    timeoutMs: number;
  };
  api: {
    endpoint: string;
    timeoutMs: number;
  };
  schedule: {
    intervalSec: number;
    runOnce: boolean;
    accountDelayMs: number;
    parallel: boolean;
  };
  logLevel: LogLevel;
  auditOnStart: boolean;
};

/** One source of settings (file, environment or flags), not yet validated. */
export type ConfigLayer = {
  accounts?: unknown;
  tokens?: unknown;
  firewallName?: unknown;
  rules?: Record<string, unknown>;
  addresses?: Record<string, unknown>;
  discovery?: Record<string, unknown>;
  api?: Record<string, unknown>;
  schedule?: Record<string, unknown>;
  logLevel?: unknown;
  auditOnStart?: unknown;
};

export type LoadedConfig = {
  config: ControllerConfig;
  warnings: string[];
  sources: string[];
};

type Section = "rules" | "addresses" | "discovery" | "api" | "schedule";
const SECTIONS: Section[] = ["rules", "addresses", "discovery", "api", "schedule"];

export const DEFAULT_CONFIG_YAML = `# fwsync configuration
# Flags and FWSYNC_* environment variables override the values in this file.

# Name of the firewall to manage in every project.
firewallName: ${DEFAULT_FIREWALL_NAME}

# One entry per Hetzner Cloud project. The token needs read and write permissions.
accounts:
  - token: replace-with-api-token
    # firewallName: office-firewall
    # label: office

rules:
  icmp: true
  gre: false
  esp: false
  # Comma separated ports or ranges, e.g. "22,80,443" or "8000-8100".
  tcp: "22"
  udp: ""

addresses:
  ipv4: true
  ipv6: true
  # Prefix applied to the discovered IPv6 address, 64 allows the whole delegated network.
  ipv6Prefix: ${DEFAULT_IPV6_PREFIX}
  # Static networks in CIDR notation. The address must be the network id:
  # 198.51.100.0/24 works, 198.51.100.1/24 does not.
  static: []

discovery:
  endpoint: ${DEFAULT_IP_ENDPOINT}
  timeoutMs: ${DEFAULT_DISCOVERY_TIMEOUT_MS}

schedule:
  # Seconds between reconciliation cycles.
  interval: ${DEFAULT_INTERVAL_SEC}
  runOnce: false

logLevel: info
auditOnStart: true
`;

export function getDefaultConfigPath(): string {
  return DEFAULT_CONFIG_PATH;
}

// Resolve the config file: explicit path, then FWSYNC_CONFIG, then the default location.
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): {
  path: string;
  explicit: boolean;
} {
  if (explicitPath && explicitPath.trim()) {
    return { path: explicitPath.trim(), explicit: true };
  }
  const fromEnv = env.FWSYNC_CONFIG?.trim();
  if (fromEnv) {
    return { path: fromEnv, explicit: true };
  }
  return { path: DEFAULT_CONFIG_PATH, explicit: false };
}

// Load defaults < config file < environment < flags, then validate the result.
// Throws ConfigError listing every invalid setting.
export function loadControllerConfig(params: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  flags?: ConfigLayer;
} = {}): LoadedConfig {
  const env = params.env ?? process.env;
  const warnings: string[] = [];
  const issues: string[] = [];
  const sources: string[] = ["defaults"];
  const layers: ConfigLayer[] = [];

  const resolved = resolveConfigPath(params.configPath, env);
  const fileLayer = loadConfigFile(resolved.path, resolved.explicit, warnings, issues);
  if (fileLayer) {
    layers.push(fileLayer);
    sources.push(resolved.path);
  }

  const envLayer = loadEnvLayer(env);
  if (!isEmptyLayer(envLayer)) {
    layers.push(envLayer);
    sources.push("environment");
  }

  if (params.flags && !isEmptyLayer(params.flags)) {
    layers.push(params.flags);
    sources.push("flags");
  }

  const config = normalizeConfig(mergeLayers(layers), warnings, issues);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return { config, warnings, sources };
}

export function requireAccounts(config: ControllerConfig): void {
  if (config.accounts.length === 0) {
    throw new ConfigError([
      "No API token configured. Set accounts in the config file, FWSYNC_HCLOUD_TOKEN or --token."
    ]);
  }
}

function loadConfigFile(filePath: string, explicit: boolean, warnings: string[], issues: string[]): ConfigLayer | null {
  if (!fs.existsSync(filePath)) {
    if (explicit) {
      warnings.push(`Config file not found at ${filePath}; using environment and flags only.`);
    }
    return null;
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    issues.push(`Failed to parse config file at ${filePath}: ${describeError(err)}`);
    return null;
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const record = asRecord(parsed);
  if (!record) {
    issues.push(`Config file at ${filePath} must contain a mapping at the top level.`);
    return null;
  }
  return toLayer(record);
}

// FWSYNC_* variables, named after the matching flags.
export function loadEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  const rules: Record<string, unknown> = {};
  const addresses: Record<string, unknown> = {};
  const discovery: Record<string, unknown> = {};
  const api: Record<string, unknown> = {};
  const schedule: Record<string, unknown> = {};

  setIfPresent(layer, "tokens", env.FWSYNC_HCLOUD_TOKEN);
  setIfPresent(layer, "firewallName", env.FWSYNC_FIREWALL_NAME);
  setIfPresent(layer, "logLevel", env.FWSYNC_LOG_LEVEL ?? env.LOG_LEVEL);
  setIfPresent(layer, "auditOnStart", env.FWSYNC_AUDIT_ON_START);
  setIfPresent(rules, "icmp", env.FWSYNC_ICMP);
  setIfPresent(rules, "gre", env.FWSYNC_GRE);
  setIfPresent(rules, "esp", env.FWSYNC_ESP);
  setIfPresent(rules, "tcp", env.FWSYNC_TCP);
  setIfPresent(rules, "udp", env.FWSYNC_UDP);
  setIfPresent(addresses, "static", env.FWSYNC_IP);
  setIfPresent(addresses, "disableIpv4", env.FWSYNC_DISABLE_IPV4);
  setIfPresent(addresses, "disableIpv6", env.FWSYNC_DISABLE_IPV6);
  setIfPresent(addresses, "ipv6Prefix", env.FWSYNC_IPV6_PREFIX);
  setIfPresent(discovery, "endpoint", env.FWSYNC_IP_ENDPOINT);
  setIfPresent(api, "endpoint", env.FWSYNC_API_ENDPOINT);
  setIfPresent(schedule, "interval", env.FWSYNC_RECONCILIATION_INTERVAL);
  setIfPresent(schedule, "runOnce", env.FWSYNC_RUN_ONCE);

  const sections: Record<Section, Record<string, unknown>> = { rules, addresses, discovery, api, schedule };
  for (const section of SECTIONS) {
    if (Object.keys(sections[section]).length > 0) {
      layer[section] = sections[section];
    }
  }
  return layer;
}

// Later layers win per key; accounts come whole from the last layer that names any.
export function mergeLayers(layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    if (layer.accounts !== undefined || layer.tokens !== undefined) {
      merged.accounts = layer.accounts;
      merged.tokens = layer.tokens;
    }
    if (layer.firewallName !== undefined) {
      merged.firewallName = layer.firewallName;
    }
    if (layer.logLevel !== undefined) {
      merged.logLevel = layer.logLevel;
    }
    if (layer.auditOnStart !== undefined) {
      merged.auditOnStart = layer.auditOnStart;
    }
    for (const section of SECTIONS) {
      const values = layer[section];
      if (values) {
        merged[section] = { ...merged[section], ...(section === "addresses" ? foldDisableFlags(values) : values) };
      }
    }
  }
  return merged;
}

// disableIpv4/disableIpv6 set the family switch of their own layer, so a later layer can turn it back on.
function foldDisableFlags(addresses: Record<string, unknown>): Record<string, unknown> {
  const folded = { ...addresses };
  for (const [flag, family] of [
    ["disableIpv4", "ipv4"],
    ["disableIpv6", "ipv6"]
  ] as const) {
    const disabled = parseBoolean(folded[flag]);
    if (disabled !== undefined) {
      folded[family] = !disabled;
      delete folded[flag];
    }
  }
  return folded;
}

function normalizeConfig(layer: ConfigLayer, warnings: string[], issues: string[]): ControllerConfig {
  const rules = layer.rules ?? {};
  const addresses = layer.addresses ?? {};
  const discovery = layer.discovery ?? {};
  const api = layer.api ?? {};
  const schedule = layer.schedule ?? {};

  const firewallName = normalizeName(layer.firewallName, DEFAULT_FIREWALL_NAME, "firewallName", warnings);
  const endpoint = normalizeUrl(discovery.endpoint, DEFAULT_IP_ENDPOINT, "discovery.endpoint", issues);

  const interval = normalizeNumber(schedule.interval, DEFAULT_INTERVAL_SEC);
  if (interval === null || interval <= 0) {
    issues.push(`schedule.interval must be a positive number of seconds, got "${String(schedule.interval)}".`);
  }
  const ipv6Prefix = normalizeNumber(addresses.ipv6Prefix, DEFAULT_IPV6_PREFIX);
  if (ipv6Prefix === null || !Number.isInteger(ipv6Prefix) || ipv6Prefix < 0 || ipv6Prefix > 128) {
    issues.push(`addresses.ipv6Prefix must be an integer between 0 and 128, got "${String(addresses.ipv6Prefix)}".`);
  }

  return {
    accounts: normalizeAccounts(layer.accounts, layer.tokens, firewallName, warnings, issues),
    firewallName,
    rules: {
      icmp: normalizeBoolean(rules.icmp, false, "rules.icmp", warnings),
      gre: normalizeBoolean(rules.gre, false, "rules.gre", warnings),
      esp: normalizeBoolean(rules.esp, false, "rules.esp", warnings),
      tcp: normalizePorts(rules.tcp, "rules.tcp", issues),
      udp: normalizePorts(rules.udp, "rules.udp", issues)
    },
    addresses: {
      ipv4:
        normalizeBoolean(addresses.ipv4, true, "addresses.ipv4", warnings) &&
        !normalizeBoolean(addresses.disableIpv4, false, "addresses.disableIpv4", warnings),
      ipv6:
        normalizeBoolean(addresses.ipv6, true, "addresses.ipv6", warnings) &&
        !normalizeBoolean(addresses.disableIpv6, false, "addresses.disableIpv6", warnings),
      ipv6Prefix: ipv6Prefix ?? DEFAULT_IPV6_PREFIX,
      static: normalizeCidrs(addresses.static, issues)
    },
    discovery: {
      ipv4Endpoint: normalizeUrl(discovery.ipv4Endpoint, endpoint, "discovery.ipv4Endpoint", issues),
      ipv6Endpoint: normalizeUrl(discovery.ipv6Endpoint, endpoint, "discovery.ipv6Endpoint", issues),
      timeoutMs: normalizePositive(discovery.timeoutMs, DEFAULT_DISCOVERY_TIMEOUT_MS, "discovery.timeoutMs", warnings)
    },
    api: {
      endpoint: normalizeUrl(api.endpoint, HCLOUD_API, "api.endpoint", issues),
      timeoutMs: normalizePositive(api.timeoutMs, DEFAULT_API_TIMEOUT_MS, "api.timeoutMs", warnings)
    },
    schedule: {
      intervalSec: interval ?? DEFAULT_INTERVAL_SEC,
      runOnce: normalizeBoolean(schedule.runOnce, false, "schedule.runOnce", warnings),
      accountDelayMs: normalizeNonNegative(schedule.accountDelayMs, DEFAULT_ACCOUNT_DELAY_MS, "schedule.accountDelayMs", warnings),
      parallel: normalizeBoolean(schedule.parallel, false, "schedule.parallel", warnings)
    },
    logLevel: normalizeLogLevel(layer.logLevel, warnings),
    auditOnStart: normalizeBoolean(layer.auditOnStart, true, "auditOnStart", warnings)
  };
}

function normalizeAccounts(
  accounts: unknown,
  tokens: unknown,
  defaultName: string,
  warnings: string[],
  issues: string[]
): Account[] {
  const entries: Array<{ token: string; firewallName?: string; label?: string }> = [];

  if (Array.isArray(accounts)) {
    accounts.forEach((entry, index) => {
      if (typeof entry === "string") {
        entries.push(...splitTokens(entry));
        return;
      }
      const record = asRecord(entry);
      const token = typeof record?.token === "string" ? record.token.trim() : "";
      if (!record || !token) {
        issues.push(`accounts[${index}] is missing a token.`);
        return;
      }
      const next: { token: string; firewallName?: string; label?: string } = { token };
      if (typeof record.firewallName === "string" && record.firewallName.trim()) {
        next.firewallName = record.firewallName.trim();
      }
      if (typeof record.label === "string" && record.label.trim()) {
        next.label = record.label.trim();
      }
      entries.push(next);
    });
  } else if (accounts !== undefined && accounts !== null) {
    issues.push("accounts must be a list.");
  }

  for (const value of toStringList(tokens)) {
    entries.push(...splitTokens(value));
  }

  const seen = new Set<string>();
  const result: Account[] = [];
  for (const entry of entries) {
    const firewallName = entry.firewallName ?? defaultName;
    const key = `${entry.token}\u0000${firewallName}`;
    if (seen.has(key)) {
      warnings.push(`Duplicate account for firewall '${firewallName}' ignored.`);
      continue;
    }
    seen.add(key);
    const label = entry.label ?? `account-${result.length + 1} (${tokenFingerprint(entry.token)})`;
    result.push({ label, token: entry.token, firewallName });
  }
  return result;
}

// "tokenA,tokenB@other-firewall" -> two accounts, the second with a firewall name override.
function splitTokens(value: string): Array<{ token: string; firewallName?: string }> {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const at = entry.indexOf("@");
      if (at <= 0) {
        return { token: entry };
      }
      const firewallName = entry.slice(at + 1).trim();
      return firewallName ? { token: entry.slice(0, at), firewallName } : { token: entry.slice(0, at) };
    });
}

function normalizePorts(value: unknown, key: string, issues: string[]): PortRange[] {
  try {
    return parsePortSpec(toStringList(value));
  } catch (err) {
    issues.push(`${key}: ${describeError(err)}`);
    return [];
  }
}

function normalizeCidrs(value: unknown, issues: string[]): Cidr[] {
  const cidrs: Cidr[] = [];
  const entries = toStringList(value)
    .flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  for (const entry of entries) {
    try {
      cidrs.push(parseCidr(entry));
    } catch (err) {
      issues.push(`addresses.static: ${describeError(err)}`);
    }
  }
  return cidrs;
}

function normalizeBoolean(value: unknown, fallback: boolean, key: string, warnings: string[]): boolean {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = parseBoolean(value);
  if (parsed === undefined) {
    warnings.push(`${key} must be true or false, got "${String(value)}"; using ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function normalizeNumber(value: unknown, fallback: number): number | null {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  return parseNumber(value) ?? null;
}

function normalizePositive(value: unknown, fallback: number, key: string, warnings: string[]): number {
  const parsed = normalizeNumber(value, fallback);
  if (parsed === null || parsed <= 0) {
    warnings.push(`${key} must be a positive number, got "${String(value)}"; using ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function normalizeNonNegative(value: unknown, fallback: number, key: string, warnings: string[]): number {
  const parsed = normalizeNumber(value, fallback);
  if (parsed === null || parsed < 0) {
    warnings.push(`${key} must not be negative, got "${String(value)}"; using ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function normalizeName(value: unknown, fallback: string, key: string, warnings: string[]): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string" || !value.trim()) {
    warnings.push(`${key} must be a non-empty string; using "${fallback}".`);
    return fallback;
  }
  return value.trim();
}

function normalizeUrl(value: unknown, fallback: string, key: string, issues: string[]): string {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  if (typeof value !== "string" || !isAbsoluteUrl(value.trim())) {
    issues.push(`${key} must be an absolute URL, got "${String(value)}".`);
    return fallback;
  }
  return value.trim();
}

function isAbsoluteUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function normalizeLogLevel(value: unknown, warnings: string[]): LogLevel {
  if (value === undefined || value === null || value === "") {
    return "info";
  }
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    warnings.push(`logLevel must be one of ${LOG_LEVELS.join("|")}, got "${String(value)}"; using info.`);
    return "info";
  }
  return level;
}

export function parseBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") {
      return true;
    }
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") {
      return false;
    }
  }
  return undefined;
}

export function parseNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function toStringList(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  const values = Array.isArray(value) ? value : [value];
  return values
    .filter((entry): entry is string | number => typeof entry === "string" || typeof entry === "number")
    .map((entry) => String(entry));
}

function toLayer(record: Record<string, unknown>): ConfigLayer {
  const layer: ConfigLayer = {
    accounts: record.accounts,
    tokens: record.tokens,
    firewallName: record.firewallName,
    logLevel: record.logLevel,
    auditOnStart: record.auditOnStart
  };
  for (const section of SECTIONS) {
    const values = asRecord(record[section]);
    if (values) {
      layer[section] = values;
    }
  }
  return layer;
}

function isEmptyLayer(layer: ConfigLayer): boolean {
  return Object.values(layer).every((value) => value === undefined);
}

function setIfPresent(target: Record<string, unknown>, key: string, value: string | undefined): void {
  if (value !== undefined && value.trim() !== "") {
    target[key] = value;
  }
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return value as Record<string, unknown>;
}
