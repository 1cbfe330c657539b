import { ConfigError, readIntEnv } from "./env.js";

export interface LimitsConfig {
  readonly defaultDailyLimit: number;
  readonly monthlyGlobalCap: number;
  readonly cooldownSeconds: number;
  readonly adminUserIds: ReadonlySet<string>;
}

export function loadLimitsConfig(): LimitsConfig {
  const defaultDailyLimit = readIntEnv("DEFAULT_DAILY_LIMIT", 10);
  if (defaultDailyLimit < 1) {
    throw new ConfigError(`DEFAULT_DAILY_LIMIT must be at least 1, got ${defaultDailyLimit}`);
  }

  return {
    defaultDailyLimit,
    monthlyGlobalCap: readIntEnv("MONTHLY_GLOBAL_CAP", 100),
    cooldownSeconds: readIntEnv("COOLDOWN_SECONDS", 5),
    adminUserIds: parseAdminIds(process.env.ADMIN_USER_IDS),
  };
}

export function parseAdminIds(raw: string | undefined): ReadonlySet<string> {
  const ids = (raw ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return new Set(ids);
}
