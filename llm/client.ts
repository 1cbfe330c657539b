import type { GeminiConfig } from "../config/services.js";
import { logger } from "../config/logger.js";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";
const MAX_OUTPUT_TOKENS = 1024;

export interface AskResponse {
  readonly text: string;
  readonly totalTokens: number;
}

interface GeminiResponse {
  readonly candidates?: ReadonlyArray<{
    readonly content?: {
      readonly parts?: ReadonlyArray<{ readonly text?: string }>;
    };
    readonly finishReason?: string;
  }>;
  readonly usageMetadata?: {
    readonly totalTokenCount?: number;
  };
}

/** Single attempt; callers decide what a failure means for the user. */
export async function askGemini(config: GeminiConfig, question: string): Promise<AskResponse> {
  const url = `${GEMINI_BASE_URL}/${encodeURIComponent(config.model)}:generateContent`;

  logger.info({ model: config.model, chars: question.length }, "Calling Gemini");

  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-goog-api-key": config.apiKey,
    },
    body: JSON.stringify({
      contents: [{ role: "user", parts: [{ text: question }] }],
      generationConfig: { maxOutputTokens: MAX_OUTPUT_TOKENS },
    }),
    signal: AbortSignal.timeout(config.timeoutMs),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`Gemini API ${response.status}: ${body}`);
  }

  const data = (await response.json()) as GeminiResponse;
  const candidate = data.candidates?.[0];
  const text = candidate?.content?.parts
    ?.map((part) => part.text ?? "")
    .join("")
    .trim();

  if (!text) {
    throw new Error(`Gemini returned empty content (finishReason: ${candidate?.finishReason ?? "none"})`);
  }

  return { text, totalTokens: data.usageMetadata?.totalTokenCount ?? 0 };
}
