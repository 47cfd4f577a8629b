import { diffRules, fingerprintRules, formatCanonicalRule } from "./diff.js";
import { describeError } from "./errors.js";
import type { Account, AccountOutcome, FailureStage, Firewall, FirewallApi, Logger, RuleSpec } from "./types.js";

export type ReconcileOptions = {
  /** Report drift without creating or updating anything. */
  dryRun?: boolean;
  logger?: Logger;
};

// Converge one account's firewall toward `desired`:
// lookup -> (create) -> diff -> skip | apply. Failures end the cycle for this account only.
export async function reconcileAccount(
  api: FirewallApi,
  account: Account,
  desired: RuleSpec[],
  options: ReconcileOptions = {}
): Promise<AccountOutcome> {
  const logger = options.logger;
  const name = account.firewallName;
  const tag = `[${account.label}]`;
  logger?.debug?.(`${tag} Desired rules fingerprint ${fingerprintRules(desired).slice(0, 12)}`);

  let firewall: Firewall | null;
  try {
    firewall = await api.findFirewall(name);
  } catch (err) {
    return fail(account, "lookup", err, logger);
  }

  let created = false;
  if (!firewall) {
    if (options.dryRun) {
      logger?.info?.(`${tag} Firewall '${name}' does not exist and would be created`);
      return { status: "drift", account: account.label, firewallName: name, firewallId: null };
    }
    try {
      firewall = await api.createFirewall(name, []);
    } catch (err) {
      return fail(account, "create", err, logger);
    }
    created = true;
    logger?.info?.(`${tag} Created new firewall '${name}' (id: ${firewall.id})`);
  } else {
    logger?.debug?.(`${tag} Existing firewall '${name}' (id: ${firewall.id}) found with ${firewall.rules.length} rules`);
  }

  const diff = diffRules(desired, firewall.rules);
  if (diff.equal) {
    logger?.info?.(`${tag} Rules of '${name}' (id: ${firewall.id}) are already up to date`);
    return { status: "in-sync", account: account.label, firewallName: name, firewallId: firewall.id, created };
  }

  diff.missing.forEach((rule) => logger?.debug?.(`${tag} + ${formatCanonicalRule(rule)}`));
  diff.unexpected.forEach((rule) => logger?.debug?.(`${tag} - ${formatCanonicalRule(rule)}`));

  if (options.dryRun) {
    logger?.info?.(
      `${tag} Rules of '${name}' (id: ${firewall.id}) differ: ${diff.missing.length} missing, ${diff.unexpected.length} unexpected`
    );
    return { status: "drift", account: account.label, firewallName: name, firewallId: firewall.id };
  }

  try {
    await api.updateFirewallRules(firewall.id, desired);
  } catch (err) {
    return fail(account, "apply", err, logger);
  }
  logger?.info?.(`${tag} Rules of '${name}' (id: ${firewall.id}) have been updated`);
  return { status: "applied", account: account.label, firewallName: name, firewallId: firewall.id, created };
}

function fail(
  account: Account,
  stage: FailureStage,
  err: unknown,
  logger: Logger | undefined
): AccountOutcome {
  const error = describeError(err);
  logger?.error?.(`[${account.label}] Firewall ${stage} failed for '${account.firewallName}': ${error}`);
  return { status: "failed", account: account.label, firewallName: account.firewallName, stage, error };
}
