import { setTimeout as delay } from "node:timers/promises";
import { resolveAddresses } from "./address-book.js";
import { formatCidr } from "./cidr.js";
import { describeError } from "./errors.js";
import { reconcileAccount } from "./reconcile.js";
import { buildRuleSpecs } from "./rules.js";
import type {
  Account,
  AccountOutcome,
  AddressDiscovery,
  Cidr,
  CycleReport,
  FirewallApi,
  Logger,
  RuleOptions
} from "./types.js";

export const DEFAULT_INTERVAL_SEC = 60;
export const DEFAULT_ACCOUNT_DELAY_MS = 500;

export type SchedulerConfig = {
  accounts: Account[];
  rules: RuleOptions;
  addresses: {
    ipv4: boolean;
    ipv6: boolean;
    ipv6Prefix: number;
    static: Cidr[];
  };
  intervalSec: number;
  runOnce: boolean;
  /** Pause between accounts when reconciling sequentially. */
  accountDelayMs: number;
  parallel: boolean;
  dryRun?: boolean;
};

export type SchedulerDeps = {
  discovery: AddressDiscovery;
  createApi: (account: Account) => FirewallApi;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

export type SchedulerRunOptions = {
  signal?: AbortSignal;
  onCycle?: (report: CycleReport) => void;
};

export type SchedulerResult = {
  cycles: number;
  lastReport: CycleReport | null;
  /** True when the last completed cycle had a failed account. */
  failed: boolean;
};

// One reconciliation cycle: resolve addresses once, then converge every account.
export async function runCycle(config: SchedulerConfig, deps: SchedulerDeps): Promise<CycleReport> {
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const startedAt = now();

  const addresses = await resolveAddresses(deps.discovery, {
    ipv4: config.addresses.ipv4,
    ipv6: config.addresses.ipv6,
    ipv6Prefix: config.addresses.ipv6Prefix,
    static: config.addresses.static,
    logger: deps.logger
  });
  const sources = addresses.sources.map(formatCidr);
  const rules = buildRuleSpecs(config.rules, addresses.sources);
  deps.logger?.debug?.(`Desired sources: ${sources.length > 0 ? sources.join(", ") : "none"}`);

  const reconcile = (account: Account) => reconcileIsolated(account, rules, config, deps);
  let outcomes: AccountOutcome[];
  if (config.parallel) {
    outcomes = await Promise.all(config.accounts.map(reconcile));
  } else {
    outcomes = [];
    for (const [index, account] of config.accounts.entries()) {
      if (index > 0 && config.accountDelayMs > 0) {
        await sleep(config.accountDelayMs);
      }
      outcomes.push(await reconcile(account));
    }
  }

  const report: CycleReport = {
    startedAt: new Date(startedAt).toISOString(),
    durationMs: now() - startedAt,
    sources,
    discoveryFailures: addresses.failures,
    rules,
    outcomes,
    failed: outcomes.filter((outcome) => outcome.status === "failed").length
  };
  deps.logger?.info?.(summarizeCycle(report));
  return report;
}

// Run once, or repeat every interval until the signal aborts. An abort never interrupts
// a cycle that is already reconciling; it only ends the wait before the next one.
export async function runScheduler(
  config: SchedulerConfig,
  deps: SchedulerDeps,
  options: SchedulerRunOptions = {}
): Promise<SchedulerResult> {
  const sleep = deps.sleep ?? defaultSleep;
  const { signal } = options;
  let cycles = 0;
  let lastReport: CycleReport | null = null;

  while (!signal?.aborted) {
    deps.logger?.debug?.("Reconciliation cycle started");
    lastReport = await runCycle(config, deps);
    cycles += 1;
    options.onCycle?.(lastReport);

    if (config.runOnce || signal?.aborted) {
      break;
    }
    deps.logger?.debug?.(`Sleeping for ${config.intervalSec} seconds`);
    try {
      await sleep(config.intervalSec * 1000, signal);
    } catch (err) {
      if (signal?.aborted) {
        break;
      }
      throw err;
    }
  }

  return { cycles, lastReport, failed: (lastReport?.failed ?? 0) > 0 };
}

export function summarizeCycle(report: CycleReport): string {
  const counts: Record<AccountOutcome["status"], number> = {
    "in-sync": 0,
    applied: 0,
    drift: 0,
    failed: 0
  };
  for (const outcome of report.outcomes) {
    counts[outcome.status] += 1;
  }
  const parts = [`${counts["in-sync"]} in sync`, `${counts.applied} updated`];
  if (counts.drift > 0) {
    parts.push(`${counts.drift} drifted`);
  }
  parts.push(`${counts.failed} failed`);
  const degraded = report.discoveryFailures.length > 0
    ? ` (discovery failed for ${report.discoveryFailures.map((failure) => failure.family).join(", ")})`
    : "";
  return `Reconciliation cycle finished in ${report.durationMs}ms: ${parts.join(", ")}${degraded}`;
}

async function reconcileIsolated(
  account: Account,
  rules: CycleReport["rules"],
  config: SchedulerConfig,
  deps: SchedulerDeps
): Promise<AccountOutcome> {
  try {
    const api = deps.createApi(account);
    return await reconcileAccount(api, account, rules, {
      dryRun: config.dryRun === true,
      logger: deps.logger
    });
  } catch (err) {
    const error = describeError(err);
    deps.logger?.error?.(`[${account.label}] Reconciliation failed: ${error}`);
    return { status: "failed", account: account.label, firewallName: account.firewallName, stage: "lookup", error };
  }
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : undefined);
}
