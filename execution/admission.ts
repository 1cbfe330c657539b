import { logger } from "../config/logger.js";
import type { UsageLedger } from "../state/usageLedger.js";
import { checkAndUpdateCooldown } from "./cooldownGate.js";
import { checkQuota, type QuotaScope } from "./quotaGate.js";

export interface AdmissionPolicy {
  readonly cooldownSeconds: number;
  readonly monthlyCap: number;
}

export type AdmissionOutcome<T> =
  | { readonly status: "cooldown"; readonly retryAfterSeconds: number }
  | {
      readonly status: "quota_exceeded";
      readonly scope: QuotaScope;
      readonly used: number;
      readonly limit: number;
    }
  | { readonly status: "generation_failed"; readonly error?: string }
  | { readonly status: "admitted"; readonly result: T };

/**
 * Runs a metered task: cooldown, then quota, then `generate`, then the usage
 * increment. A task that resolves to null or throws consumes no quota.
 *
 * The cooldown timestamp is written when the cooldown gate admits, before
 * the task runs, so a failed task still starts a new cooldown window.
 */
export async function admitAndRecord<T>(
  ledger: UsageLedger,
  policy: AdmissionPolicy,
  userId: string,
  generate: () => Promise<T | null>,
): Promise<AdmissionOutcome<T>> {
  const cooldown = await checkAndUpdateCooldown(ledger, userId, policy.cooldownSeconds);
  if (!cooldown.allowed) {
    return { status: "cooldown", retryAfterSeconds: cooldown.retryAfterSeconds };
  }

  const quota = await checkQuota(ledger, userId, policy.monthlyCap);
  if (!quota.allowed) {
    return { status: "quota_exceeded", scope: quota.scope, used: quota.used, limit: quota.limit };
  }

  let result: T | null;
  try {
    result = await generate();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ userId, error: message }, "Metered task threw; quota not consumed");
    return { status: "generation_failed", error: message };
  }

  if (result === null) {
    logger.warn({ userId }, "Metered task produced no result; quota not consumed");
    return { status: "generation_failed" };
  }

  await ledger.incrementUsage(userId);
  return { status: "admitted", result };
}
