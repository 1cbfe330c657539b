import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ConfigError, loadEnvFile, readIntEnv } from "./env.js";
import { loadLimitsConfig, parseAdminIds } from "./limits.js";
import { loadServicesConfig } from "./services.js";
import { loadStoreConfig } from "./store.js";

const MANAGED_VARS = [
  "DEFAULT_DAILY_LIMIT",
  "MONTHLY_GLOBAL_CAP",
  "COOLDOWN_SECONDS",
  "ADMIN_USER_IDS",
  "USAGE_STORE",
  "FIREBASE_DB_URL",
  "FIREBASE_AUTH_TOKEN",
  "USAGE_SQLITE_PATH",
  "STORE_TIMEOUT_MS",
  "TELEGRAM_BOT_TOKEN",
  "GEMINI_API_KEY",
  "GEMINI_MODEL",
  "VERTEX_PROJECT_ID",
  "VERTEX_LOCATION",
  "GOOGLE_API_KEY",
  "SEARCH_ENGINE_ID",
];

describe("config", () => {
  beforeEach(() => {
    for (const name of MANAGED_VARS) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("readIntEnv", () => {
    it("should fall back when the variable is blank", () => {
      expect(readIntEnv("COOLDOWN_SECONDS", 5)).toBe(5);
    });

    it("should parse a trimmed integer", () => {
      vi.stubEnv("COOLDOWN_SECONDS", " 12 ");

      expect(readIntEnv("COOLDOWN_SECONDS", 5)).toBe(12);
    });

    it.each(["-1", "2.5", "ten"])("should reject %s", (raw) => {
      vi.stubEnv("COOLDOWN_SECONDS", raw);

      expect(() => readIntEnv("COOLDOWN_SECONDS", 5)).toThrow(
        new ConfigError(`COOLDOWN_SECONDS must be a non-negative integer, got "${raw}"`),
      );
    });
  });

  describe("loadEnvFile", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-env-"));
    });

    afterEach(() => {
      delete process.env["RELAY_ENV_FILE_VALUE"];
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should load variables from the file", () => {
      const envPath = path.join(dir, ".env");
      fs.writeFileSync(envPath, "RELAY_ENV_FILE_VALUE=from-file\n");

      expect(loadEnvFile(envPath)).toBe(true);
      expect(process.env["RELAY_ENV_FILE_VALUE"]).toBe("from-file");
    });

    it("should report a missing file", () => {
      expect(loadEnvFile(path.join(dir, "missing.env"))).toBe(false);
    });
  });

  describe("loadLimitsConfig", () => {
    it("should use defaults", () => {
      expect(loadLimitsConfig()).toEqual({
        defaultDailyLimit: 10,
        monthlyGlobalCap: 100,
        cooldownSeconds: 5,
        adminUserIds: new Set(),
      });
    });

    it("should read overrides and admin ids", () => {
      vi.stubEnv("DEFAULT_DAILY_LIMIT", "3");
      vi.stubEnv("MONTHLY_GLOBAL_CAP", "50");
      vi.stubEnv("COOLDOWN_SECONDS", "0");
      vi.stubEnv("ADMIN_USER_IDS", "1, 2");

      expect(loadLimitsConfig()).toEqual({
        defaultDailyLimit: 3,
        monthlyGlobalCap: 50,
        cooldownSeconds: 0,
        adminUserIds: new Set(["1", "2"]),
      });
    });

    it("should reject a zero default daily limit", () => {
      vi.stubEnv("DEFAULT_DAILY_LIMIT", "0");

      expect(() => loadLimitsConfig()).toThrow("DEFAULT_DAILY_LIMIT must be at least 1, got 0");
    });

    it("should drop empty admin ids", () => {
      expect(parseAdminIds(" 5,,6 , ")).toEqual(new Set(["5", "6"]));
    });
  });

  describe("loadStoreConfig", () => {
    it("should disable the store when nothing is configured", () => {
      expect(loadStoreConfig()).toEqual({
        kind: "none",
        firebaseUrl: undefined,
        firebaseAuthToken: undefined,
        sqlitePath: "state/usage.db",
        timeoutMs: 10_000,
      });
    });

    it("should pick firebase when a database URL is set", () => {
      vi.stubEnv("FIREBASE_DB_URL", "https://relay-test.example.com//");
      vi.stubEnv("FIREBASE_AUTH_TOKEN", "test-secret");

      const config = loadStoreConfig();

      expect(config.kind).toBe("firebase");
      expect(config.firebaseUrl).toBe("https://relay-test.example.com");
      expect(config.firebaseAuthToken).toBe("test-secret");
    });

    it("should honour an explicit store kind in any case", () => {
      vi.stubEnv("USAGE_STORE", "SQLite");
      vi.stubEnv("USAGE_SQLITE_PATH", "/tmp/usage-test.db");

      expect(loadStoreConfig()).toMatchObject({ kind: "sqlite", sqlitePath: "/tmp/usage-test.db" });
    });

    it("should reject an unknown store kind", () => {
      vi.stubEnv("USAGE_STORE", "redis");

      expect(() => loadStoreConfig()).toThrow(
        'USAGE_STORE must be one of firebase, sqlite, memory, none, got "redis"',
      );
    });
  });

  describe("loadServicesConfig", () => {
    it("should require a Telegram token", () => {
      expect(() => loadServicesConfig()).toThrow("TELEGRAM_BOT_TOKEN is required");
    });

    it("should leave optional services out when their keys are missing", () => {
      vi.stubEnv("TELEGRAM_BOT_TOKEN", "test-token");

      expect(loadServicesConfig()).toEqual({
        telegram: { token: "test-token" },
        gemini: undefined,
        vertex: undefined,
        webSearch: undefined,
      });
    });

    it("should configure every service when all keys are present", () => {
      vi.stubEnv("TELEGRAM_BOT_TOKEN", "test-token");
      vi.stubEnv("GEMINI_API_KEY", "test-key");
      vi.stubEnv("VERTEX_PROJECT_ID", "test-project");
      vi.stubEnv("GOOGLE_API_KEY", "test-search-key");
      vi.stubEnv("SEARCH_ENGINE_ID", "test-cx");

      expect(loadServicesConfig()).toEqual({
        telegram: { token: "test-token" },
        gemini: { apiKey: "test-key", model: "gemini-1.5-flash", timeoutMs: 60_000 },
        vertex: { projectId: "test-project", location: "us-central1", apiKey: "test-key", timeoutMs: 120_000 },
        webSearch: { apiKey: "test-search-key", searchEngineId: "test-cx", timeoutMs: 15_000 },
      });
    });
  });
});
