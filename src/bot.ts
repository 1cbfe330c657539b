import { envLoaded } from "../config/loadEnv.js";
import { loadLimitsConfig } from "../config/limits.js";
import { logger } from "../config/logger.js";
import { loadServicesConfig, type ServicesConfig } from "../config/services.js";
import { loadStoreConfig } from "../config/store.js";
import { TelegramBotApi } from "../interfaces/telegram.js";
import { startTelegramBot, type BotServices } from "../interfaces/telegramBot.js";
import { askGemini } from "../llm/client.js";
import { generateImage } from "../llm/imageClient.js";
import { searchWeb } from "../services/webSearch.js";
import { SqliteCounterStore } from "../state/sqliteStore.js";
import { createCounterStore } from "../state/storeFactory.js";
import { createUsageLedger } from "../state/usageLedger.js";

function createBotServices(config: ServicesConfig): BotServices {
  const { gemini, vertex, webSearch } = config;
  return {
    ask: gemini ? (question) => askGemini(gemini, question) : undefined,
    generateImage: vertex ? (request) => generateImage(vertex, request) : undefined,
    search: webSearch ? (query) => searchWeb(webSearch, query) : undefined,
  };
}

logger.info({ envLoaded }, "surfer-relay Telegram bot initializing...");

const limits = loadLimitsConfig();
const services = loadServicesConfig();
const storeConfig = loadStoreConfig();
const store = createCounterStore(storeConfig);
const ledger = createUsageLedger(store, { defaultDailyLimit: limits.defaultDailyLimit });

logger.info(
  {
    store: store?.name ?? "none",
    defaultDailyLimit: limits.defaultDailyLimit,
    monthlyGlobalCap: limits.monthlyGlobalCap,
    cooldownSeconds: limits.cooldownSeconds,
    admins: limits.adminUserIds.size,
    ask: services.gemini !== undefined,
    image: services.vertex !== undefined,
    search: services.webSearch !== undefined,
  },
  "Configuration loaded",
);

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());
process.once("SIGTERM", () => controller.abort());

try {
  await startTelegramBot(
    {
      api: new TelegramBotApi(services.telegram.token),
      ledger,
      limits,
      services: createBotServices(services),
    },
    controller.signal,
  );
} finally {
  if (store instanceof SqliteCounterStore) {
    store.close();
  }
}
