import { logger } from "../config/logger.js";
import {
  isJsonObject,
  supportsAtomicIncrement,
  toCount,
  type CounterStore,
  type JsonValue,
  type StoreRead,
} from "./counterStore.js";
import { dayKey, monthKey, nowSeconds, usagePaths } from "./usageKeys.js";

export interface DailyUsage {
  readonly count: number;
  /** Unix seconds of the last admitted request; 0 when there was none. */
  readonly lastTs: number;
}

export const ZERO_USAGE: DailyUsage = { count: 0, lastTs: 0 };

/** Which of the three independent increment steps reached the store. */
export interface IncrementReport {
  readonly countWritten: boolean;
  readonly timestampWritten: boolean;
  readonly monthlyWritten: boolean;
}

/**
 * Per-user daily usage, per-user limit overrides and the global monthly total.
 *
 * Mutations return whether the store accepted them. None of them throw, and
 * none are transactional: concurrent callers can overwrite each other.
 */
export interface UsageLedger {
  /** False when the ledger runs without a store and only reports defaults. */
  readonly recording: boolean;
  getUsage(userId: string): Promise<DailyUsage>;
  setUsage(userId: string, count: number, lastTs: number): Promise<boolean>;
  /** Writes today's `last_ts` alone; the count is left as stored. */
  stampLastRequest(userId: string, lastTs: number): Promise<boolean>;
  incrementUsage(userId: string): Promise<IncrementReport>;
  getDailyLimit(userId: string): Promise<number>;
  setDailyLimit(userId: string, daily: number): Promise<boolean>;
  getMonthlyTotal(): Promise<number>;
  resetUserDaily(userId: string): Promise<boolean>;
  resetMonthlyTotal(): Promise<boolean>;
}

export interface LedgerOptions {
  readonly defaultDailyLimit: number;
}

function toTimestamp(value: JsonValue | undefined): number | undefined {
  const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric) || numeric < 0) {
    return undefined;
  }
  return numeric;
}

function countOrZero(read: StoreRead): number {
  return read.status === "present" ? (toCount(read.value) ?? 0) : 0;
}

export class StoreUsageLedger implements UsageLedger {
  readonly recording = true;

  constructor(
    private readonly store: CounterStore,
    private readonly options: LedgerOptions,
  ) {}

  async getUsage(userId: string): Promise<DailyUsage> {
    const read = await this.store.read(usagePaths.daily(userId, dayKey()));
    if (read.status === "absent" || !isJsonObject(read.value)) {
      return ZERO_USAGE;
    }

    return {
      count: toCount(read.value["count"]) ?? 0,
      lastTs: toTimestamp(read.value["last_ts"]) ?? 0,
    };
  }

  async setUsage(userId: string, count: number, lastTs: number): Promise<boolean> {
    return this.store.write(usagePaths.daily(userId, dayKey()), { count, last_ts: lastTs });
  }

  async stampLastRequest(userId: string, lastTs: number): Promise<boolean> {
    return this.store.write(usagePaths.dailyLastTs(userId, dayKey()), lastTs);
  }

  /**
   * Three separate steps with no rollback: today's count, today's timestamp,
   * then the monthly total. A failed step is logged and the following steps
   * still run, so the counters can drift apart.
   */
  async incrementUsage(userId: string): Promise<IncrementReport> {
    const day = dayKey();
    const countWritten = await this.incrementCounter(usagePaths.dailyCount(userId, day));
    const timestampWritten = await this.store.write(usagePaths.dailyLastTs(userId, day), nowSeconds());
    const monthlyWritten = await this.incrementCounter(usagePaths.monthlyTotal(monthKey()));

    const report: IncrementReport = { countWritten, timestampWritten, monthlyWritten };
    if (!countWritten || !timestampWritten || !monthlyWritten) {
      logger.warn({ userId, ...report }, "Usage increment partially applied");
    }
    return report;
  }

  async getDailyLimit(userId: string): Promise<number> {
    const read = await this.store.read(usagePaths.dailyLimit(userId));
    const override = read.status === "present" ? toCount(read.value) : undefined;
    return override !== undefined && override > 0 ? override : this.options.defaultDailyLimit;
  }

  async setDailyLimit(userId: string, daily: number): Promise<boolean> {
    return this.store.write(usagePaths.dailyLimit(userId), daily);
  }

  async getMonthlyTotal(): Promise<number> {
    return countOrZero(await this.store.read(usagePaths.monthlyTotal(monthKey())));
  }

  async resetUserDaily(userId: string): Promise<boolean> {
    return this.setUsage(userId, ZERO_USAGE.count, ZERO_USAGE.lastTs);
  }

  async resetMonthlyTotal(): Promise<boolean> {
    return this.store.write(usagePaths.monthlyTotal(monthKey()), 0);
  }

  private async incrementCounter(path: string): Promise<boolean> {
    if (supportsAtomicIncrement(this.store)) {
      return (await this.store.increment(path)) !== null;
    }

    // Read-then-write: two concurrent increments can read the same value and lose one.
    const current = countOrZero(await this.store.read(path));
    return this.store.write(path, current + 1);
  }
}

/** Ledger used when no store is configured: reads return defaults, writes are dropped. */
export class FailOpenUsageLedger implements UsageLedger {
  readonly recording = false;

  constructor(private readonly options: LedgerOptions) {}

  async getUsage(): Promise<DailyUsage> {
    return ZERO_USAGE;
  }

  async setUsage(): Promise<boolean> {
    return false;
  }

  async stampLastRequest(): Promise<boolean> {
    return false;
  }

  async incrementUsage(): Promise<IncrementReport> {
    return { countWritten: false, timestampWritten: false, monthlyWritten: false };
  }

  async getDailyLimit(): Promise<number> {
    return this.options.defaultDailyLimit;
  }

  async setDailyLimit(): Promise<boolean> {
    return false;
  }

  async getMonthlyTotal(): Promise<number> {
    return 0;
  }

  async resetUserDaily(): Promise<boolean> {
    return false;
  }

  async resetMonthlyTotal(): Promise<boolean> {
    return false;
  }
}

export function createUsageLedger(store: CounterStore | null, options: LedgerOptions): UsageLedger {
  if (!store) {
    logger.warn("Usage store not configured. Limits fail open and usage is not recorded.");
    return new FailOpenUsageLedger(options);
  }

  logger.info({ store: store.name }, "Usage ledger backed by store");
  return new StoreUsageLedger(store, options);
}
