import { logger } from "../config/logger.js";
import type { UsageLedger } from "../state/usageLedger.js";

export type QuotaScope = "daily" | "monthly";

export type QuotaResult =
  | { readonly allowed: true; readonly used: number; readonly limit: number }
  | {
      readonly allowed: false;
      readonly scope: QuotaScope;
      readonly used: number;
      readonly limit: number;
    };

/**
 * Check only: nothing is reserved, so two requests from the same user can
 * both pass before either increments.
 */
export async function checkQuota(
  ledger: UsageLedger,
  userId: string,
  monthlyCap: number,
): Promise<QuotaResult> {
  const dailyLimit = await ledger.getDailyLimit(userId);
  const usage = await ledger.getUsage(userId);

  if (usage.count >= dailyLimit) {
    logger.warn({ userId, count: usage.count, dailyLimit }, "Daily quota reached");
    return { allowed: false, scope: "daily", used: usage.count, limit: dailyLimit };
  }

  const monthlyTotal = await ledger.getMonthlyTotal();
  if (monthlyTotal >= monthlyCap) {
    logger.warn({ userId, monthlyTotal, monthlyCap }, "Monthly global cap reached");
    return { allowed: false, scope: "monthly", used: monthlyTotal, limit: monthlyCap };
  }

  return { allowed: true, used: usage.count, limit: dailyLimit };
}
