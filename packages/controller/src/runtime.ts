import type { Logger, SchedulerConfig, SchedulerDeps } from "@fwsync/core";
import { createHttpDiscovery } from "@fwsync/discovery";
import { createHcloudClient } from "@fwsync/hcloud";
import type { ControllerConfig } from "./config.js";

export type RunMode = {
  runOnce?: boolean;
  dryRun?: boolean;
};

export function toSchedulerConfig(config: ControllerConfig, mode: RunMode = {}): SchedulerConfig {
  return {
    accounts: config.accounts,
    rules: config.rules,
    addresses: config.addresses,
    intervalSec: config.schedule.intervalSec,
    runOnce: mode.runOnce ?? config.schedule.runOnce,
    accountDelayMs: config.schedule.accountDelayMs,
    parallel: config.schedule.parallel,
    dryRun: mode.dryRun ?? false
  };
}

// Production collaborators: HTTP discovery plus one Hetzner client per account token.
export function createRuntimeDeps(config: ControllerConfig, logger?: Logger): SchedulerDeps {
  return {
    discovery: createHttpDiscovery({
      ipv4Endpoint: config.discovery.ipv4Endpoint,
      ipv6Endpoint: config.discovery.ipv6Endpoint,
      timeoutMs: config.discovery.timeoutMs
    }),
    createApi: (account) =>
      createHcloudClient({
        token: account.token,
        endpoint: config.api.endpoint,
        timeoutMs: config.api.timeoutMs
      }),
    logger
  };
}

// Abort `controller` on SIGINT/SIGTERM; returns a function that removes the handlers.
export function installShutdownHandlers(controller: AbortController, logger?: Logger): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger?.info?.(`Received ${signal}, stopping after the current cycle`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return () => {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  };
}
