import type { LimitsConfig } from "../config/limits.js";
import { logger } from "../config/logger.js";
import { isUserId } from "../state/usageKeys.js";
import type { UsageLedger } from "../state/usageLedger.js";

export interface AdminResult {
  readonly success: boolean;
  readonly message: string;
}

export interface QuotaReport {
  readonly userId: string;
  readonly used: number;
  readonly dailyLimit: number;
  readonly remaining: number;
  readonly monthlyTotal: number;
  readonly monthlyCap: number;
  readonly recording: boolean;
}

export interface UsageStats {
  readonly monthlyTotal: number;
  readonly monthlyCap: number;
  readonly defaultDailyLimit: number;
  readonly cooldownSeconds: number;
  readonly adminCount: number;
  readonly recording: boolean;
}

const STORE_DISABLED: AdminResult = {
  success: false,
  message: "Usage store is not configured; nothing was changed.",
};

function invalidUserId(userId: string): AdminResult {
  return { success: false, message: `Invalid user id: ${userId}` };
}

export function isAdmin(limits: LimitsConfig, userId: string): boolean {
  return limits.adminUserIds.has(userId);
}

export async function resetUserQuota(
  ledger: UsageLedger,
  userId: string,
  requestedBy: string,
): Promise<AdminResult> {
  if (!isUserId(userId)) return invalidUserId(userId);
  if (!ledger.recording) return STORE_DISABLED;

  const written = await ledger.resetUserDaily(userId);
  if (!written) {
    return { success: false, message: `Could not reset today's usage for ${userId}.` };
  }

  logger.info({ userId, requestedBy }, "Daily usage reset");
  return { success: true, message: `Today's usage for ${userId} was reset.` };
}

export async function resetMonthlyQuota(
  ledger: UsageLedger,
  requestedBy: string,
): Promise<AdminResult> {
  if (!ledger.recording) return STORE_DISABLED;

  const written = await ledger.resetMonthlyTotal();
  if (!written) {
    return { success: false, message: "Could not reset the monthly image total." };
  }

  logger.info({ requestedBy }, "Monthly total reset");
  return { success: true, message: "Monthly image total was reset to 0." };
}

export async function setUserDailyLimit(
  ledger: UsageLedger,
  userId: string,
  daily: number,
  requestedBy: string,
): Promise<AdminResult> {
  if (!isUserId(userId)) return invalidUserId(userId);
  if (!Number.isInteger(daily) || daily < 1) {
    return { success: false, message: "Daily limit must be a positive integer." };
  }
  if (!ledger.recording) return STORE_DISABLED;

  const written = await ledger.setDailyLimit(userId, daily);
  if (!written) {
    return { success: false, message: `Could not set the daily limit for ${userId}.` };
  }

  logger.info({ userId, daily, requestedBy }, "Daily limit override set");
  return { success: true, message: `Daily limit for ${userId} set to ${daily}.` };
}

export async function getQuotaReport(
  ledger: UsageLedger,
  monthlyCap: number,
  userId: string,
): Promise<QuotaReport> {
  const dailyLimit = await ledger.getDailyLimit(userId);
  const usage = await ledger.getUsage(userId);
  const monthlyTotal = await ledger.getMonthlyTotal();

  return {
    userId,
    used: usage.count,
    dailyLimit,
    remaining: Math.max(0, dailyLimit - usage.count),
    monthlyTotal,
    monthlyCap,
    recording: ledger.recording,
  };
}

export async function getUsageStats(ledger: UsageLedger, limits: LimitsConfig): Promise<UsageStats> {
  return {
    monthlyTotal: await ledger.getMonthlyTotal(),
    monthlyCap: limits.monthlyGlobalCap,
    defaultDailyLimit: limits.defaultDailyLimit,
    cooldownSeconds: limits.cooldownSeconds,
    adminCount: limits.adminUserIds.size,
    recording: ledger.recording,
  };
}
