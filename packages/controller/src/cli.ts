import fs from "node:fs";
import path from "node:path";
import type { Command } from "commander";
import {
  ConfigError,
  buildRuleSpecs,
  describeRule,
  formatCidr,
  runScheduler,
  type AccountOutcome,
  type Logger,
  type SchedulerDeps
} from "@fwsync/core";
import { auditControllerConfig, formatAuditFindings } from "./audit.js";
import {
  DEFAULT_CONFIG_YAML,
  getDefaultConfigPath,
  loadControllerConfig,
  requireAccounts,
  type ConfigLayer,
  type ControllerConfig,
  type LoadedConfig
} from "./config.js";
import { createLogger } from "./logger.js";
import { createRuntimeDeps, installShutdownHandlers, toSchedulerConfig } from "./runtime.js";

export type ControllerCliOptions = {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Overrides for the production collaborators. */
  deps?: Partial<SchedulerDeps>;
  timestamps?: boolean;
  setExitCode?: (code: number) => void;
};

type Prepared = {
  loaded: LoadedConfig;
  config: ControllerConfig;
  logger: Logger;
};

// Register the controller commands on a commander program (or a sub-command of one).
export function registerControllerCli(program: Command, options: ControllerCliOptions = {}): void {
  const output = options.logger;
  const env = options.env ?? process.env;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const prepare = (opts: Record<string, unknown>, needsAccounts: boolean): Prepared | null => {
    let loaded: LoadedConfig;
    try {
      loaded = loadControllerConfig({ configPath: stringOption(opts.config), env, flags: flagsLayer(opts) });
      if (needsAccounts) {
        requireAccounts(loaded.config);
      }
    } catch (err) {
      if (err instanceof ConfigError) {
        err.issues.forEach((issue) => output?.error?.(`Configuration error: ${issue}`));
        return null;
      }
      throw err;
    }
    const logger = createLogger(loaded.config.logLevel, output ?? {}, { timestamps: options.timestamps ?? true });
    loaded.warnings.forEach((warning) => logger.warn?.(warning));
    logger.debug?.(`Config sources: ${loaded.sources.join(", ")}`);
    return { loaded, config: loaded.config, logger };
  };

  const buildDeps = (config: ControllerConfig, logger: Logger): SchedulerDeps => ({
    ...createRuntimeDeps(config, logger),
    ...options.deps,
    logger
  });

  addConfigOptions(
    program
      .command("run", { isDefault: true })
      .description("Keep the firewall allow-list in sync with the current public addresses")
  )
    .option("--once", "Run a single reconciliation cycle and exit, for cron or other schedulers")
    .option("--dry-run", "Report drift without creating or updating firewalls")
    .action(async (...args: unknown[]) => {
      const opts = getOptions(args);
      const prepared = prepare(opts, true);
      if (!prepared) {
        setExitCode(1);
        return;
      }
      const { config, logger } = prepared;
      reportAudit(config, logger);

      const runOnce = opts.once === true || config.schedule.runOnce;
      const controller = new AbortController();
      const removeHandlers = runOnce ? undefined : installShutdownHandlers(controller, logger);
      try {
        const result = await runScheduler(
          toSchedulerConfig(config, { runOnce, dryRun: opts.dryRun === true }),
          buildDeps(config, logger),
          { signal: controller.signal }
        );
        if (runOnce) {
          setExitCode(result.failed ? 1 : 0);
        }
      } finally {
        removeHandlers?.();
      }
    });

  addConfigOptions(
    program.command("plan").description("Show the desired rules and which firewalls would change")
  )
    .option("--exit-code", "Exit with 2 when any firewall differs from the desired rules")
    .action(async (...args: unknown[]) => {
      const opts = getOptions(args);
      const prepared = prepare(opts, true);
      if (!prepared) {
        setExitCode(1);
        return;
      }
      const { config, logger } = prepared;
      const result = await runScheduler(
        toSchedulerConfig(config, { runOnce: true, dryRun: true }),
        buildDeps(config, logger)
      );
      const report = result.lastReport;
      if (!report) {
        setExitCode(1);
        return;
      }
      output?.info?.("Desired rules:");
      report.rules.forEach((rule) => output?.info?.(`  ${describeRule(rule)}`));
      report.outcomes.forEach((outcome) => output?.info?.(formatOutcome(outcome)));
      const drift = report.outcomes.some((outcome) => outcome.status === "drift");
      setExitCode(report.failed > 0 ? 1 : drift && opts.exitCode === true ? 2 : 0);
    });

  addConfigOptions(program.command("validate").description("Validate the configuration and print the static rules"))
    .action((...args: unknown[]) => {
      const prepared = prepare(getOptions(args), false);
      if (!prepared) {
        setExitCode(1);
        return;
      }
      const { loaded, config } = prepared;
      output?.info?.(`Config sources: ${loaded.sources.join(", ")}`);
      output?.info?.(
        `Accounts: ${config.accounts.length}${config.accounts.length > 0 ? ` (${config.accounts.map((account) => `${account.label} -> ${account.firewallName}`).join(", ")})` : ""}`
      );
      const families = [config.addresses.ipv4 ? "ipv4" : null, config.addresses.ipv6 ? "ipv6" : null].filter(
        (family): family is string => family !== null
      );
      output?.info?.(`Static networks: ${config.addresses.static.map(formatCidr).join(", ") || "none"}`);
      output?.info?.(`Discovered families: ${families.join(", ") || "none"}`);
      output?.info?.("Rules (static sources only):");
      buildRuleSpecs(config.rules, config.addresses.static).forEach((rule) =>
        output?.info?.(`  ${describeRule(rule)}`)
      );
      setExitCode(0);
    });

  addConfigOptions(program.command("audit").description("Check the configuration for risky settings"))
    .action((...args: unknown[]) => {
      const prepared = prepare(getOptions(args), false);
      if (!prepared) {
        setExitCode(1);
        return;
      }
      output?.info?.(formatAuditFindings(auditControllerConfig(prepared.config)));
      setExitCode(0);
    });

  program
    .command("init")
    .description("Write an example configuration file")
    .option("--path <path>", "Config file path")
    .option("--force", "Overwrite an existing file")
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      const configPath = stringOption(opts.path) ?? getDefaultConfigPath();
      const result = writeExampleConfig(configPath, opts.force === true);
      if (result.ok) {
        output?.info?.(`Config created at ${configPath}.`);
        setExitCode(0);
      } else {
        output?.error?.(`Failed to create config at ${configPath}: ${result.error}`);
        setExitCode(1);
      }
    });
}

function addConfigOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Config file path (FWSYNC_CONFIG)")
    .option(
      "-t, --token <token>",
      "Hetzner Cloud API token, repeatable or comma separated; append @name to override the firewall name",
      collect
    )
    .option("-f, --firewall-name <name>", "Name of the firewall to manage")
    .option("--tcp <ports>", "TCP ports or ranges to allow, e.g. '80,443' or '8000-8100'", collect)
    .option("--udp <ports>", "UDP ports or ranges to allow, see --tcp", collect)
    .option("--icmp", "Allow ICMP traffic")
    .option("--gre", "Allow GRE traffic")
    .option("--esp", "Allow ESP traffic")
    .option("--ip <cidr>", "Static network in CIDR notation (network id), repeatable", collect)
    .option("--disable-ipv4", "Do not discover the public IPv4 address")
    .option("--disable-ipv6", "Do not discover the public IPv6 address")
    .option("--ipv6-prefix <bits>", "Prefix applied to the discovered IPv6 address")
    .option("-r, --interval <seconds>", "Reconciliation interval in seconds")
    .option("-i, --ip-endpoint <url>", "Endpoint answering with the public address as plain text")
    .option("--api-endpoint <url>", "Hetzner Cloud API base URL")
    .option("--parallel", "Reconcile accounts concurrently")
    .option("--log-level <level>", "debug|info|warn|error");
}

// Build the highest-precedence config layer from parsed flags.
export function flagsLayer(opts: Record<string, unknown>): ConfigLayer {
  const layer: ConfigLayer = {};
  const rules: Record<string, unknown> = {};
  const addresses: Record<string, unknown> = {};
  const discovery: Record<string, unknown> = {};
  const api: Record<string, unknown> = {};
  const schedule: Record<string, unknown> = {};

  setDefined(layer, "tokens", opts.token);
  setDefined(layer, "firewallName", opts.firewallName);
  setDefined(layer, "logLevel", opts.logLevel);
  setDefined(rules, "tcp", opts.tcp);
  setDefined(rules, "udp", opts.udp);
  setFlag(rules, "icmp", opts.icmp);
  setFlag(rules, "gre", opts.gre);
  setFlag(rules, "esp", opts.esp);
  setDefined(addresses, "static", opts.ip);
  setFlag(addresses, "disableIpv4", opts.disableIpv4);
  setFlag(addresses, "disableIpv6", opts.disableIpv6);
  setDefined(addresses, "ipv6Prefix", opts.ipv6Prefix);
  setDefined(discovery, "endpoint", opts.ipEndpoint);
  setDefined(api, "endpoint", opts.apiEndpoint);
  setDefined(schedule, "interval", opts.interval);
  setFlag(schedule, "parallel", opts.parallel);

  if (Object.keys(rules).length > 0) {
    layer.rules = rules;
  }
  if (Object.keys(addresses).length > 0) {
    layer.addresses = addresses;
  }
  if (Object.keys(discovery).length > 0) {
    layer.discovery = discovery;
  }
  if (Object.keys(api).length > 0) {
    layer.api = api;
  }
  if (Object.keys(schedule).length > 0) {
    layer.schedule = schedule;
  }
  return layer;
}

export function formatOutcome(outcome: AccountOutcome): string {
  const prefix = `[${outcome.account}] ${outcome.firewallName}`;
  switch (outcome.status) {
    case "in-sync":
      return `${prefix} (id: ${outcome.firewallId}): in sync`;
    case "applied":
      return `${prefix} (id: ${outcome.firewallId}): ${outcome.created ? "created and updated" : "updated"}`;
    case "drift":
      return outcome.firewallId === null
        ? `${prefix}: missing, would be created`
        : `${prefix} (id: ${outcome.firewallId}): would be updated`;
    case "failed":
      return `${prefix}: ${outcome.stage} failed: ${outcome.error}`;
  }
}

function reportAudit(config: ControllerConfig, logger: Logger): void {
  if (!config.auditOnStart) {
    return;
  }
  const findings = auditControllerConfig(config);
  if (findings.length > 0) {
    logger.warn?.(formatAuditFindings(findings));
  }
}

function writeExampleConfig(configPath: string, force: boolean): { ok: boolean; error?: string } {
  try {
    if (fs.existsSync(configPath) && !force) {
      return { ok: false, error: "file exists, use --force to overwrite" };
    }
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, DEFAULT_CONFIG_YAML);
    return { ok: true };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

function getOptions(args: unknown[]): Record<string, unknown> {
  const last = args[args.length - 1];
  if (last && typeof last === "object") {
    const maybeCommand = last as { opts?: () => unknown };
    if (typeof maybeCommand.opts === "function") {
      const value = maybeCommand.opts();
      if (value && typeof value === "object") {
        return value as Record<string, unknown>;
      }
    }
    return last as Record<string, unknown>;
  }
  return {};
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function setDefined(target: Record<string, unknown>, key: string, value: unknown): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function setFlag(target: Record<string, unknown>, key: string, value: unknown): void {
  if (value === true) {
    target[key] = true;
  }
}
