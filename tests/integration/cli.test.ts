import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { tokenFingerprint } from "../../packages/core/src/index.js";
import { DEFAULT_CONFIG_YAML, registerControllerCli } from "../../packages/controller/src/index.js";
import { FakeFirewallApi, captureLogger, fakeDiscovery } from "../helpers/fakes.js";

let tempDir = "";
let missingConfig = "";

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwsync-cli-"));
  missingConfig = path.join(tempDir, "missing.yaml");
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function setup(api = new FakeFirewallApi()) {
  const capture = captureLogger();
  const exitCodes: number[] = [];
  const program = new Command();
  program.exitOverride();
  registerControllerCli(program, {
    logger: capture.logger,
    env: {},
    timestamps: false,
    deps: {
      discovery: fakeDiscovery({ ipv4: "203.0.113.5" }),
      createApi: () => api,
      sleep: async () => {}
    },
    setExitCode: (code) => exitCodes.push(code)
  });
  const run = async (...args: string[]) => {
    await program.parseAsync(args, { from: "user" });
  };
  return { api, run, exitCodes, lines: capture.lines };
}

const account = `account-1 (${tokenFingerprint("test-secret")})`;

describe("fwsync cli", () => {
  it("plans a missing firewall and signals drift with --exit-code", async () => {
    const cli = setup();
    await cli.run("plan", "--config", missingConfig, "--token", "test-secret", "--icmp", "--tcp", "22", "--exit-code");
    expect(cli.api.calls).toEqual(["find fwsync"]);
    expect(cli.exitCodes).toEqual([2]);
    const output = cli.lines.filter((line) => !/^\w+ (DEBUG|INFO|WARN|ERROR) /.test(line));
    expect(output).toEqual([
      "info Desired rules:",
      "info   in ICMP from 203.0.113.5/32",
      "info   in TCP 22 from 203.0.113.5/32",
      `info [${account}] fwsync: missing, would be created`
    ]);
  });

  it("plans cleanly once the firewall matches", async () => {
    const cli = setup();
    await cli.run("run", "--once", "--config", missingConfig, "--token", "test-secret", "--icmp");
    const again = setup(cli.api);
    await again.run("plan", "--config", missingConfig, "--token", "test-secret", "--icmp", "--exit-code");
    expect(again.exitCodes).toEqual([0]);
    expect(again.lines).toContain(`info [${account}] fwsync (id: 100): in sync`);
  });

  it("applies the rules in run-once mode and stays idempotent", async () => {
    const cli = setup();
    await cli.run("run", "--once", "--config", missingConfig, "--token", "test-secret", "--tcp", "22,443");
    expect(cli.exitCodes).toEqual([0]);
    expect(cli.api.calls).toEqual(["find fwsync", "create fwsync", "update 100"]);
    expect(cli.api.firewalls[0]?.rules).toEqual([
      {
        protocol: "tcp",
        direction: "in",
        ports: [
          { start: 22, end: 22 },
          { start: 443, end: 443 }
        ],
        sources: ["203.0.113.5/32"],
        destinations: []
      }
    ]);

    cli.api.calls.length = 0;
    const again = setup(cli.api);
    await again.run("run", "--once", "--config", missingConfig, "--token", "test-secret", "--tcp", "22,443");
    expect(cli.api.calls).toEqual(["find fwsync"]);
  });

  it("exits with 1 when an account fails in run-once mode", async () => {
    const api = new FakeFirewallApi();
    api.failures.find = new Error("[hcloud] GET /firewalls?name=fwsync: unauthorized: unable to authenticate");
    const cli = setup(api);
    await cli.run("run", "--once", "--config", missingConfig, "--token", "test-secret", "--icmp");
    expect(cli.exitCodes).toEqual([1]);
  });

  it("does not write in dry-run mode", async () => {
    const cli = setup();
    await cli.run("run", "--once", "--dry-run", "--config", missingConfig, "--token", "test-secret", "--icmp");
    expect(cli.api.calls).toEqual(["find fwsync"]);
    expect(cli.exitCodes).toEqual([0]);
  });

  it("refuses to run without a token", async () => {
    const cli = setup();
    await cli.run("plan", "--config", missingConfig, "--icmp");
    expect(cli.exitCodes).toEqual([1]);
    expect(cli.lines).toEqual([
      "error Configuration error: No API token configured. Set accounts in the config file, FWSYNC_HCLOUD_TOKEN or --token."
    ]);
  });

  it("validates the configuration offline", async () => {
    const cli = setup();
    await cli.run(
      "validate",
      "--config",
      missingConfig,
      "--ip",
      "198.51.100.0/24",
      "--tcp",
      "22",
      "--tcp",
      "443",
      "--disable-ipv6"
    );
    expect(cli.exitCodes).toEqual([0]);
    expect(cli.api.calls).toEqual([]);
    expect(cli.lines.filter((line) => !line.startsWith("warn "))).toEqual([
      "info Config sources: defaults, flags",
      "info Accounts: 0",
      "info Static networks: 198.51.100.0/24",
      "info Discovered families: ipv4",
      "info Rules (static sources only):",
      "info   in TCP 22,443 from 198.51.100.0/24"
    ]);
  });

  it("reports invalid networks", async () => {
    const cli = setup();
    await cli.run("validate", "--config", missingConfig, "--ip", "198.51.100.1/24");
    expect(cli.exitCodes).toEqual([1]);
    expect(cli.lines).toEqual([
      'error Configuration error: addresses.static: Invalid CIDR "198.51.100.1/24": host bits are set, use 198.51.100.0/24'
    ]);
  });

  it("audits the configuration", async () => {
    const cli = setup();
    await cli.run("audit", "--config", missingConfig, "--ip", "0.0.0.0/0");
    expect(cli.exitCodes).toEqual([0]);
    expect(cli.lines).toContain(
      [
        "info Audit findings (2):",
        "- [high] Static network 0.0.0.0/0 admits every ipv4 source. (addresses.static) Hint: Remove the entry unless the firewall should not restrict sources at all.",
        "- [medium] No protocol is enabled, so the firewall will be kept empty. (rules) Hint: Enable icmp, gre or esp, or set tcp or udp ports."
      ].join("\n")
    );
  });

  it("writes the example config once unless forced", async () => {
    const target = path.join(tempDir, "nested", "config.yaml");
    const first = setup();
    await first.run("init", "--path", target);
    expect(first.exitCodes).toEqual([0]);
    expect(first.lines).toEqual([`info Config created at ${target}.`]);
    expect(fs.readFileSync(target, "utf8")).toBe(DEFAULT_CONFIG_YAML);

    const second = setup();
    await second.run("init", "--path", target);
    expect(second.exitCodes).toEqual([1]);
    expect(second.lines).toEqual([`error Failed to create config at ${target}: file exists, use --force to overwrite`]);

    const forced = setup();
    await forced.run("init", "--path", target, "--force");
    expect(forced.exitCodes).toEqual([0]);
  });
});
