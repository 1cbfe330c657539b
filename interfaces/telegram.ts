import { logger } from "../config/logger.js";

const TELEGRAM_MAX_CHARS = 4000;
const REQUEST_TIMEOUT_MS = 15_000;
const POLLING_TIMEOUT_SECONDS = 30;

export interface TelegramUser {
  readonly id: number;
  readonly username?: string;
}

export interface TelegramMessage {
  readonly message_id: number;
  readonly chat: { readonly id: number };
  readonly from?: TelegramUser;
  readonly text?: string;
}

export interface TelegramUpdate {
  readonly update_id: number;
  readonly message?: TelegramMessage;
}

export interface BotCommand {
  readonly command: string;
  readonly description: string;
}

interface TelegramResponse<T> {
  readonly ok: boolean;
  readonly result: T;
  readonly description?: string;
}

/** The slice of the Bot API the relay uses. Handlers depend on this, not on fetch. */
export interface TelegramApi {
  getUpdates(offset: number): Promise<readonly TelegramUpdate[]>;
  sendMessage(chatId: number, text: string, parseMode?: "Markdown"): Promise<boolean>;
  sendPhoto(chatId: number, photo: Buffer, caption?: string): Promise<boolean>;
  setMyCommands(commands: readonly BotCommand[]): Promise<boolean>;
}

export function splitMessage(text: string, maxLength: number = TELEGRAM_MAX_CHARS): readonly string[] {
  if (text.length <= maxLength) return [text];

  const parts: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      parts.push(remaining);
      break;
    }

    let splitIdx = remaining.lastIndexOf("\n", maxLength);
    if (splitIdx <= 0) {
      splitIdx = maxLength;
    }

    parts.push(remaining.slice(0, splitIdx));
    remaining = remaining.slice(splitIdx).trimStart();
  }

  return parts;
}

export class TelegramBotApi implements TelegramApi {
  constructor(private readonly token: string) {}

  async getUpdates(offset: number): Promise<readonly TelegramUpdate[]> {
    const response = await fetch(this.methodUrl("getUpdates"), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ offset, timeout: POLLING_TIMEOUT_SECONDS, allowed_updates: ["message"] }),
      signal: AbortSignal.timeout((POLLING_TIMEOUT_SECONDS + 10) * 1000),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Telegram getUpdates failed: ${response.status} ${body}`);
    }

    const data = (await response.json()) as TelegramResponse<readonly TelegramUpdate[]>;
    return data.result;
  }

  async sendMessage(chatId: number, text: string, parseMode?: "Markdown"): Promise<boolean> {
    let delivered = true;

    for (const chunk of splitMessage(text)) {
      let sent = await this.trySend(chatId, chunk, parseMode);
      if (!sent && parseMode) {
        logger.warn("Markdown failed, retrying as plain text");
        sent = await this.trySend(chatId, chunk, undefined);
      }
      delivered = delivered && sent;
    }

    return delivered;
  }

  async sendPhoto(chatId: number, photo: Buffer, caption?: string): Promise<boolean> {
    const form = new FormData();
    form.append("chat_id", String(chatId));
    form.append("photo", new Blob([new Uint8Array(photo)], { type: "image/png" }), "image.png");
    if (caption) {
      form.append("caption", caption.slice(0, 1024));
    }

    return this.post("sendPhoto", form);
  }

  async setMyCommands(commands: readonly BotCommand[]): Promise<boolean> {
    return this.postJson("setMyCommands", { commands });
  }

  private async trySend(chatId: number, text: string, parseMode: string | undefined): Promise<boolean> {
    const payload: Record<string, string | number> = { chat_id: chatId, text };
    if (parseMode) {
      payload["parse_mode"] = parseMode;
    }
    return this.postJson("sendMessage", payload);
  }

  private postJson(method: string, payload: unknown): Promise<boolean> {
    return this.post(method, JSON.stringify(payload), { "Content-Type": "application/json" });
  }

  private async post(
    method: string,
    body: string | FormData,
    headers?: Record<string, string>,
  ): Promise<boolean> {
    try {
      const response = await fetch(this.methodUrl(method), {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (!response.ok) {
        const responseBody = await response.text();
        logger.error({ method, status: response.status, body: responseBody }, "Telegram API error");
        return false;
      }

      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ method, error: message }, "Telegram API request failed");
      return false;
    }
  }

  private methodUrl(method: string): string {
    return `https://api.telegram.org/bot${this.token}/${method}`;
  }
}
