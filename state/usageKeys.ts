function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local calendar date, `YYYY-MM-DD`. */
export function dayKey(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/** Local calendar month, `YYYY-MM`. */
export function monthKey(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}`;
}

/** Unix time in fractional seconds, the unit stored in `last_ts`. */
export function nowSeconds(): number {
  return Date.now() / 1000;
}

const USER_ID_PATTERN = /^\d+$/;

/** Telegram user ids are positive integers; anything else must not reach a store path. */
export function isUserId(value: string): boolean {
  return USER_ID_PATTERN.test(value);
}

export const usagePaths = {
  daily: (userId: string, day: string): string => `/usage/${userId}/${day}`,
  dailyCount: (userId: string, day: string): string => `/usage/${userId}/${day}/count`,
  dailyLastTs: (userId: string, day: string): string => `/usage/${userId}/${day}/last_ts`,
  monthlyTotal: (month: string): string => `/usage_images/${month}/total_count`,
  dailyLimit: (userId: string): string => `/limits/${userId}/daily`,
} as const;
