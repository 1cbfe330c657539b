import type { LimitsConfig } from "../config/limits.js";
import { logger } from "../config/logger.js";
import { admitAndRecord, type AdmissionOutcome } from "../execution/admission.js";
import type { AskResponse } from "../llm/client.js";
import type { ImageRequest } from "../llm/imageClient.js";
import {
  getQuotaReport,
  getUsageStats,
  isAdmin,
  resetMonthlyQuota,
  resetUserQuota,
  setUserDailyLimit,
  type QuotaReport,
} from "../services/adminService.js";
import type { SearchResult } from "../services/webSearch.js";
import { safeMath } from "../shared/safeMath.js";
import { isUserId } from "../state/usageKeys.js";
import type { UsageLedger } from "../state/usageLedger.js";
import { parseCommand, parseImageArgs, parseLimitArgs } from "./commandArgs.js";
import type { BotCommand, TelegramApi, TelegramUpdate } from "./telegram.js";

const ERROR_BACKOFF_MS = 5000;

/** External collaborators; a missing one makes its command reply that it is unavailable. */
export interface BotServices {
  readonly ask?: (question: string) => Promise<AskResponse>;
  readonly generateImage?: (request: ImageRequest) => Promise<Buffer | null>;
  readonly search?: (query: string) => Promise<readonly SearchResult[]>;
}

export interface BotContext {
  readonly api: TelegramApi;
  readonly ledger: UsageLedger;
  readonly limits: LimitsConfig;
  readonly services: BotServices;
}

interface CommandRequest {
  readonly chatId: number;
  readonly userId: string;
  readonly args: readonly string[];
  readonly argsText: string;
}

export const BOT_COMMANDS: readonly BotCommand[] = [
  { command: "help", description: "Show help" },
  { command: "ask", description: "Ask AI" },
  { command: "search", description: "Safe math or Google" },
  { command: "image", description: "Generate AI image" },
  { command: "quota", description: "Show usage" },
];

const HELP_TEXT = [
  "*Surfer Bot Help*",
  "",
  "/ask `<question>` - Ask AI.",
  "/search `<query>` - Safe math or Google.",
  "/image `<prompt>` [--size 512|768|1024 --seed <n> --no <neg>]",
  "/quota - your daily usage.",
  "/checkquota `[user_id]` - usage for you, or any user if admin.",
  "/resetquota `<user_id>` - admin only.",
  "/setlimit `<user_id> <n>` - admin only.",
  "/resetmonth - admin only.",
  "/stats - admin only.",
].join("\n");

export async function startTelegramBot(ctx: BotContext, signal?: AbortSignal): Promise<void> {
  const registered = await ctx.api.setMyCommands(BOT_COMMANDS);
  logger.info({ registered }, "Telegram bot starting (long-polling)...");

  let offset = 0;
  const inFlight = new Set<Promise<void>>();

  while (!signal?.aborted) {
    try {
      const updates = await ctx.api.getUpdates(offset);
      const last = updates.at(-1);
      if (last) {
        offset = last.update_id + 1;
      }

      // Handled in the background so a slow generation never holds up the next poll.
      for (const update of updates) {
        const task: Promise<void> = handleUpdate(ctx, update)
          .catch((error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ updateId: update.update_id, error: message }, "Update handling failed");
          })
          .finally(() => {
            inFlight.delete(task);
          });
        inFlight.add(task);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, "Telegram polling error, retrying...");
      await sleep(ERROR_BACKOFF_MS);
    }
  }

  if (inFlight.size > 0) {
    logger.info({ pending: inFlight.size }, "Waiting for in-flight updates");
    await Promise.allSettled(inFlight);
  }
  logger.info("Telegram bot stopped");
}

export async function handleUpdate(ctx: BotContext, update: TelegramUpdate): Promise<void> {
  const message = update.message;
  if (!message?.text) return;

  const parsed = parseCommand(message.text);
  if (!parsed) return;

  const request: CommandRequest = {
    chatId: message.chat.id,
    userId: String(message.from?.id ?? message.chat.id),
    args: parsed.args,
    argsText: parsed.argsText,
  };

  logger.info({ command: parsed.command, userId: request.userId }, "Processing Telegram command");

  try {
    await dispatchCommand(ctx, parsed.command, request);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ command: parsed.command, userId: request.userId, error: errorMessage }, "Command failed");
    await ctx.api.sendMessage(request.chatId, "Something went wrong. Please try again later.");
  }
}

async function dispatchCommand(ctx: BotContext, command: string, request: CommandRequest): Promise<void> {
  switch (command) {
    case "/help":
    case "/start":
      await ctx.api.sendMessage(request.chatId, HELP_TEXT, "Markdown");
      break;
    case "/ask":
      await handleAsk(ctx, request);
      break;
    case "/search":
      await handleSearch(ctx, request);
      break;
    case "/image":
      await handleImage(ctx, request);
      break;
    case "/quota":
      await replyWithReport(ctx, request.chatId, request.userId);
      break;
    case "/checkquota":
      await handleCheckQuota(ctx, request);
      break;
    case "/resetquota":
      await handleResetQuota(ctx, request);
      break;
    case "/setlimit":
      await handleSetLimit(ctx, request);
      break;
    case "/resetmonth":
      await handleResetMonth(ctx, request);
      break;
    case "/stats":
      await handleStats(ctx, request);
      break;
    default:
      await ctx.api.sendMessage(request.chatId, "Unknown command. Use /help to see the available commands.");
  }
}

async function handleAsk(ctx: BotContext, request: CommandRequest): Promise<void> {
  if (!request.argsText) {
    await ctx.api.sendMessage(request.chatId, "Usage: /ask <question>");
    return;
  }
  if (!ctx.services.ask) {
    await ctx.api.sendMessage(request.chatId, "AI answers are not configured.");
    return;
  }

  try {
    const answer = await ctx.services.ask(request.argsText);
    await ctx.api.sendMessage(request.chatId, answer.text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ userId: request.userId, error: message }, "Ask failed");
    await ctx.api.sendMessage(request.chatId, "Could not get an answer right now.");
  }
}

async function handleSearch(ctx: BotContext, request: CommandRequest): Promise<void> {
  if (!request.argsText) {
    await ctx.api.sendMessage(request.chatId, "Usage: /search <query>");
    return;
  }

  const value = safeMath(request.argsText);
  if (value !== null) {
    await ctx.api.sendMessage(request.chatId, `${request.argsText.trim()} = ${value}`);
    return;
  }

  if (!ctx.services.search) {
    await ctx.api.sendMessage(request.chatId, "Web search is not configured.");
    return;
  }

  try {
    const results = await ctx.services.search(request.argsText);
    if (results.length === 0) {
      await ctx.api.sendMessage(request.chatId, "No results found.");
      return;
    }
    const lines = results.map((r, i) => `${i + 1}. ${r.title}\n${r.link}${r.snippet ? `\n${r.snippet}` : ""}`);
    await ctx.api.sendMessage(request.chatId, lines.join("\n\n"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ userId: request.userId, error: message }, "Search failed");
    await ctx.api.sendMessage(request.chatId, "Search failed. Please try again later.");
  }
}

async function handleImage(ctx: BotContext, request: CommandRequest): Promise<void> {
  const generate = ctx.services.generateImage;
  if (!generate) {
    await ctx.api.sendMessage(request.chatId, "Image generation is not configured.");
    return;
  }

  const imageRequest = parseImageArgs(request.argsText);
  if (!imageRequest.prompt) {
    await ctx.api.sendMessage(
      request.chatId,
      "Usage: /image <prompt> [--size 512|768|1024] [--seed <n>] [--no <negative>]",
    );
    return;
  }

  const outcome = await admitAndRecord(
    ctx.ledger,
    { cooldownSeconds: ctx.limits.cooldownSeconds, monthlyCap: ctx.limits.monthlyGlobalCap },
    request.userId,
    () => generate(imageRequest),
  );

  if (outcome.status === "admitted") {
    const sent = await ctx.api.sendPhoto(request.chatId, outcome.result, imageRequest.prompt);
    if (!sent) {
      logger.warn({ userId: request.userId }, "Generated image could not be delivered");
    }
    return;
  }

  await ctx.api.sendMessage(request.chatId, describeRejection(outcome));
}

export function describeRejection(outcome: Exclude<AdmissionOutcome<unknown>, { status: "admitted" }>): string {
  switch (outcome.status) {
    case "cooldown":
      return `Please wait ${outcome.retryAfterSeconds}s before your next image.`;
    case "quota_exceeded":
      return outcome.scope === "daily"
        ? `Daily limit reached (${outcome.used}/${outcome.limit}). Try again tomorrow.`
        : `The monthly image budget is used up (${outcome.used}/${outcome.limit}).`;
    case "generation_failed":
      return "Image generation failed. Your quota was not used.";
  }
}

export function formatQuotaReport(report: QuotaReport): string {
  const lines = [
    `User ${report.userId}`,
    `Usage today: ${report.used}/${report.dailyLimit} (${report.remaining} left)`,
    `Monthly images: ${report.monthlyTotal}/${report.monthlyCap}`,
  ];
  if (!report.recording) {
    lines.push("Usage store offline: limits are not enforced.");
  }
  return lines.join("\n");
}

async function replyWithReport(ctx: BotContext, chatId: number, userId: string): Promise<void> {
  const report = await getQuotaReport(ctx.ledger, ctx.limits.monthlyGlobalCap, userId);
  await ctx.api.sendMessage(chatId, formatQuotaReport(report));
}

async function handleCheckQuota(ctx: BotContext, request: CommandRequest): Promise<void> {
  const requested = request.args[0];
  if (requested !== undefined && !isUserId(requested)) {
    await ctx.api.sendMessage(request.chatId, "Usage: /checkquota [user_id]");
    return;
  }

  const target = requested ?? request.userId;
  if (target !== request.userId && !isAdmin(ctx.limits, request.userId)) {
    await ctx.api.sendMessage(request.chatId, "Only admins can check other users.");
    return;
  }
  await replyWithReport(ctx, request.chatId, target);
}

async function requireAdmin(ctx: BotContext, request: CommandRequest): Promise<boolean> {
  if (isAdmin(ctx.limits, request.userId)) return true;

  logger.warn({ userId: request.userId }, "Non-admin tried an admin command");
  await ctx.api.sendMessage(request.chatId, "This command is for admins only.");
  return false;
}

async function handleResetQuota(ctx: BotContext, request: CommandRequest): Promise<void> {
  if (!(await requireAdmin(ctx, request))) return;

  const target = request.args[0];
  if (!target || !isUserId(target)) {
    await ctx.api.sendMessage(request.chatId, "Usage: /resetquota <user_id>");
    return;
  }

  const result = await resetUserQuota(ctx.ledger, target, request.userId);
  await ctx.api.sendMessage(request.chatId, result.message);
}

async function handleSetLimit(ctx: BotContext, request: CommandRequest): Promise<void> {
  if (!(await requireAdmin(ctx, request))) return;

  const parsed = parseLimitArgs(request.args);
  if (!parsed) {
    await ctx.api.sendMessage(request.chatId, "Usage: /setlimit <user_id> <n>");
    return;
  }

  const result = await setUserDailyLimit(ctx.ledger, parsed.userId, parsed.daily, request.userId);
  await ctx.api.sendMessage(request.chatId, result.message);
}

async function handleResetMonth(ctx: BotContext, request: CommandRequest): Promise<void> {
  if (!(await requireAdmin(ctx, request))) return;

  const result = await resetMonthlyQuota(ctx.ledger, request.userId);
  await ctx.api.sendMessage(request.chatId, result.message);
}

async function handleStats(ctx: BotContext, request: CommandRequest): Promise<void> {
  if (!(await requireAdmin(ctx, request))) return;

  const stats = await getUsageStats(ctx.ledger, ctx.limits);
  const lines = [
    `Monthly images: ${stats.monthlyTotal}/${stats.monthlyCap}`,
    `Default daily limit: ${stats.defaultDailyLimit}`,
    `Cooldown: ${stats.cooldownSeconds}s`,
    `Admins: ${stats.adminCount}`,
    `Usage store: ${stats.recording ? "online" : "offline (fail-open)"}`,
  ];
  await ctx.api.sendMessage(request.chatId, lines.join("\n"));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
