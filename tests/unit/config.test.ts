import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, tokenFingerprint } from "../../packages/core/src/index.js";
import {
  DEFAULT_CONFIG_YAML,
  loadControllerConfig,
  parseBoolean,
  parseNumber,
  requireAccounts,
  resolveConfigPath
} from "../../packages/controller/src/index.js";

let tempDir = "";

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwsync-config-"));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeConfig(contents: string): string {
  const configPath = path.join(tempDir, "config.yaml");
  fs.writeFileSync(configPath, contents);
  return configPath;
}

function loadIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err.issues;
    }
    throw err;
  }
  return [];
}

const FILE_CONFIG = `
accounts:
  - token: test-secret-a
    label: office
  - token: test-secret-b
    firewallName: lab-fw
rules:
  icmp: true
  tcp: "22,443"
  udp: [51820]
addresses:
  static:
    - 198.51.100.0/24
schedule:
  interval: 120
`;

describe("controller config loading", () => {
  it("falls back to defaults and warns about a missing explicit file", () => {
    const configPath = path.join(tempDir, "missing.yaml");
    const loaded = loadControllerConfig({ configPath, env: {} });
    expect(loaded.warnings).toEqual([`Config file not found at ${configPath}; using environment and flags only.`]);
    expect(loaded.sources).toEqual(["defaults"]);
    expect(loaded.config).toEqual({
      accounts: [],
      firewallName: "fwsync",
      rules: { icmp: false, gre: false, esp: false, tcp: [], udp: [] },
      addresses: { ipv4: true, ipv6: true, ipv6Prefix: 128, static: [] },
      discovery: {
        ipv4Endpoint: "https://ip.fotoallerlei.com",
        ipv6Endpoint: "https://ip.fotoallerlei.com",
        timeoutMs: 10_000
      },
      api: { endpoint: "https://api.hetzner.cloud/v1", timeoutMs: 15_000 },
      schedule: { intervalSec: 60, runOnce: false, accountDelayMs: 500, parallel: false },
      logLevel: "info",
      auditOnStart: true
    });
  });

  it("reads accounts, rules and networks from the YAML file", () => {
    const configPath = writeConfig(FILE_CONFIG);
    const { config, sources } = loadControllerConfig({ configPath, env: {} });
    expect(sources).toEqual(["defaults", configPath]);
    expect(config.accounts).toEqual([
      { label: "office", token: "test-secret-a", firewallName: "fwsync" },
      { label: `account-2 (${tokenFingerprint("test-secret-b")})`, token: "test-secret-b", firewallName: "lab-fw" }
    ]);
    expect(config.rules).toEqual({
      icmp: true,
      gre: false,
      esp: false,
      tcp: [
        { start: 22, end: 22 },
        { start: 443, end: 443 }
      ],
      udp: [{ start: 51820, end: 51820 }]
    });
    expect(config.addresses.static).toEqual([{ family: "ipv4", network: "198.51.100.0", prefix: 24 }]);
    expect(config.schedule.intervalSec).toBe(120);
  });

  it("lets the environment override the file per key", () => {
    const configPath = writeConfig(FILE_CONFIG);
    const { config, sources } = loadControllerConfig({
      configPath,
      env: {
        FWSYNC_HCLOUD_TOKEN: "test-secret-c@edge, test-secret-d",
        FWSYNC_TCP: "80",
        FWSYNC_DISABLE_IPV6: "true",
        FWSYNC_RECONCILIATION_INTERVAL: "30"
      }
    });
    expect(sources).toEqual(["defaults", configPath, "environment"]);
    expect(config.accounts).toEqual([
      { label: `account-1 (${tokenFingerprint("test-secret-c")})`, token: "test-secret-c", firewallName: "edge" },
      { label: `account-2 (${tokenFingerprint("test-secret-d")})`, token: "test-secret-d", firewallName: "fwsync" }
    ]);
    expect(config.rules.tcp).toEqual([{ start: 80, end: 80 }]);
    expect(config.rules.icmp).toBe(true);
    expect(config.addresses.ipv6).toBe(false);
    expect(config.schedule.intervalSec).toBe(30);
  });

  it("lets a later layer turn a disabled family back on", () => {
    const configPath = writeConfig("addresses:\n  ipv4: false\n  disableIpv6: true\n");
    const fromFile = loadControllerConfig({ configPath, env: {} }).config.addresses;
    expect(fromFile.ipv4).toBe(false);
    expect(fromFile.ipv6).toBe(false);

    const { config } = loadControllerConfig({
      configPath,
      env: { FWSYNC_DISABLE_IPV4: "false" },
      flags: { addresses: { disableIpv6: false } }
    });
    expect(config.addresses.ipv4).toBe(true);
    expect(config.addresses.ipv6).toBe(true);
  });

  it("gives flags the final word", () => {
    const { config, sources } = loadControllerConfig({
      configPath: path.join(tempDir, "missing.yaml"),
      env: { FWSYNC_HCLOUD_TOKEN: "test-secret-d", FWSYNC_RECONCILIATION_INTERVAL: "30" },
      flags: { firewallName: "cli-fw", schedule: { interval: "15" } }
    });
    expect(sources).toEqual(["defaults", "environment", "flags"]);
    expect(config.accounts[0]?.firewallName).toBe("cli-fw");
    expect(config.schedule.intervalSec).toBe(15);
  });

  it("collects every invalid setting into one error", () => {
    const configPath = writeConfig(`
rules:
  tcp: "80,abc"
addresses:
  ipv6Prefix: 200
  static: ["10.0.0.1/8"]
discovery:
  endpoint: ftp://ip.test
schedule:
  interval: 0
`);
    expect(loadIssues(() => loadControllerConfig({ configPath, env: {} }))).toEqual([
      'discovery.endpoint must be an absolute URL, got "ftp://ip.test".',
      'schedule.interval must be a positive number of seconds, got "0".',
      'addresses.ipv6Prefix must be an integer between 0 and 128, got "200".',
      'rules.tcp: Invalid port specification "abc": expected PORT or START-END',
      'addresses.static: Invalid CIDR "10.0.0.1/8": host bits are set, use 10.0.0.0/8'
    ]);
  });

  it("reports unreadable YAML", () => {
    const configPath = writeConfig("rules: [\n");
    const issues = loadIssues(() => loadControllerConfig({ configPath, env: {} }));
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith(`Failed to parse config file at ${configPath}:`)).toBe(true);
  });

  it("warns about unusable booleans and accepts LOG_LEVEL", () => {
    const { config, warnings } = loadControllerConfig({
      configPath: path.join(tempDir, "missing.yaml"),
      env: { FWSYNC_ICMP: "maybe", LOG_LEVEL: "DEBUG" }
    });
    expect(config.rules.icmp).toBe(false);
    expect(config.logLevel).toBe("debug");
    expect(warnings).toContain('rules.icmp must be true or false, got "maybe"; using false.');
  });

  it("drops duplicate accounts", () => {
    const { config, warnings } = loadControllerConfig({
      configPath: path.join(tempDir, "missing.yaml"),
      env: { FWSYNC_HCLOUD_TOKEN: "test-secret,test-secret" }
    });
    expect(config.accounts).toHaveLength(1);
    expect(warnings).toContain("Duplicate account for firewall 'fwsync' ignored.");
  });

  it("requires at least one account to run", () => {
    const { config } = loadControllerConfig({ configPath: path.join(tempDir, "missing.yaml"), env: {} });
    expect(() => requireAccounts(config)).toThrow(
      "No API token configured. Set accounts in the config file, FWSYNC_HCLOUD_TOKEN or --token."
    );
  });

  it("loads the generated example config", () => {
    const configPath = writeConfig(DEFAULT_CONFIG_YAML);
    const { config, warnings } = loadControllerConfig({ configPath, env: {} });
    expect(warnings).toEqual([]);
    expect(config.accounts.map((account) => account.token)).toEqual(["replace-with-api-token"]);
    expect(config.rules.icmp).toBe(true);
    expect(config.rules.tcp).toEqual([{ start: 22, end: 22 }]);
    expect(config.rules.udp).toEqual([]);
  });
});

describe("config helpers", () => {
  it("resolves the config path from FWSYNC_CONFIG", () => {
    expect(resolveConfigPath(undefined, { FWSYNC_CONFIG: "/etc/fwsync.yaml" })).toEqual({
      path: "/etc/fwsync.yaml",
      explicit: true
    });
    expect(resolveConfigPath("/tmp/a.yaml", { FWSYNC_CONFIG: "/etc/fwsync.yaml" }).path).toBe("/tmp/a.yaml");
    expect(resolveConfigPath(undefined, {}).explicit).toBe(false);
  });

  it("parses booleans and numbers from text", () => {
    expect(parseBoolean("Yes")).toBe(true);
    expect(parseBoolean("off")).toBe(false);
    expect(parseBoolean("sometimes")).toBeUndefined();
    expect(parseNumber(" 42 ")).toBe(42);
    expect(parseNumber("forty")).toBeUndefined();
  });
});
