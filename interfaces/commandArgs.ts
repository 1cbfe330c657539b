import type { ImageRequest, ImageSize } from "../llm/imageClient.js";
import { isUserId } from "../state/usageKeys.js";

export interface ParsedCommand {
  /** Lowercased, without the `@botname` suffix Telegram adds in groups. */
  readonly command: string;
  readonly argsText: string;
  readonly args: readonly string[];
}

export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) return null;

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  const head = match?.[1] ?? trimmed;
  const argsText = (match?.[2] ?? "").trim();
  const command = head.split("@")[0]?.toLowerCase() ?? head.toLowerCase();

  return {
    command,
    argsText,
    args: argsText.length > 0 ? argsText.split(/\s+/) : [],
  };
}

const SIZE_FLAG = /--size\s+(512|768|1024)/;
const SEED_FLAG = /--seed\s+(\d+)/;
const NEGATIVE_FLAG = /--no\s+([^\n]+)/;

function isImageSize(value: string | undefined): value is ImageSize {
  return value === "512" || value === "768" || value === "1024";
}

/**
 * Extracts `--size 512|768|1024`, `--seed <n>` and `--no <text to end of line>`
 * from an `/image` argument string; whatever remains is the prompt.
 */
export function parseImageArgs(argsText: string): ImageRequest {
  let text = argsText;
  let size: ImageSize | undefined;
  let seed: number | undefined;
  let negative: string | undefined;

  const sizeMatch = SIZE_FLAG.exec(text);
  if (sizeMatch && isImageSize(sizeMatch[1])) {
    size = sizeMatch[1];
    text = text.replace(new RegExp(SIZE_FLAG.source, "g"), "");
  }

  const seedMatch = SEED_FLAG.exec(text);
  if (seedMatch?.[1]) {
    seed = Number(seedMatch[1]);
    text = text.replace(new RegExp(SEED_FLAG.source, "g"), "");
  }

  const negativeMatch = NEGATIVE_FLAG.exec(text);
  if (negativeMatch?.[1]) {
    negative = negativeMatch[1].trim();
    text = text.replace(new RegExp(NEGATIVE_FLAG.source, "g"), "");
  }

  return { prompt: text.replace(/\s+/g, " ").trim(), size, seed, negative };
}

/** Parses `/setlimit <user_id> <n>` arguments. */
export function parseLimitArgs(
  args: readonly string[],
): { readonly userId: string; readonly daily: number } | null {
  const [userId, rawDaily] = args;
  if (!userId || !rawDaily || !isUserId(userId) || !/^\d+$/.test(rawDaily)) return null;
  return { userId, daily: Number(rawDaily) };
}
