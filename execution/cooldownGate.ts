import { logger } from "../config/logger.js";
import type { UsageLedger } from "../state/usageLedger.js";
import { nowSeconds } from "../state/usageKeys.js";

export type CooldownResult =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly retryAfterSeconds: number };

const COOLDOWN_ALLOWED: CooldownResult = { allowed: true };

/**
 * Admits when at least `minGapSeconds` passed since the user's last admitted
 * request, stamping `last_ts` with the current time. Only the timestamp is
 * written; the count is never rewritten here.
 */
export async function checkAndUpdateCooldown(
  ledger: UsageLedger,
  userId: string,
  minGapSeconds: number,
): Promise<CooldownResult> {
  const usage = await ledger.getUsage(userId);
  const now = nowSeconds();
  const elapsed = now - usage.lastTs;

  if (elapsed < minGapSeconds) {
    const retryAfterSeconds = Math.max(1, Math.ceil(minGapSeconds - elapsed));
    logger.info({ userId, elapsed, minGapSeconds }, "Cooldown rejected request");
    return { allowed: false, retryAfterSeconds };
  }

  await ledger.stampLastRequest(userId, now);
  return COOLDOWN_ALLOWED;
}
