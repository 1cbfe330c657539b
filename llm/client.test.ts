import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import type { GeminiConfig } from "../config/services.js";
import { askGemini } from "./client.js";

const CONFIG: GeminiConfig = { apiKey: "test-key", model: "gemini-1.5-flash", timeoutMs: 1000 };

function jsonResponse(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => (typeof body === "string" ? body : JSON.stringify(body)),
  };
}

describe("askGemini", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should join the candidate parts and report token usage", async () => {
    mockFetch.mockResolvedValue(
      jsonResponse(200, {
        candidates: [{ content: { parts: [{ text: "Hello " }, { text: "world " }] } }],
        usageMetadata: { totalTokenCount: 9 },
      }),
    );

    expect(await askGemini(CONFIG, "greet me")).toEqual({ text: "Hello world", totalTokens: 9 });
    expect(mockFetch).toHaveBeenCalledWith(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-flash:generateContent",
      expect.objectContaining({
        method: "POST",
        headers: { "Content-Type": "application/json", "x-goog-api-key": "test-key" },
      }),
    );
  });

  it("should throw on an empty answer", async () => {
    mockFetch.mockResolvedValue(jsonResponse(200, { candidates: [{ finishReason: "SAFETY" }] }));

    await expect(askGemini(CONFIG, "anything")).rejects.toThrow(
      "Gemini returned empty content (finishReason: SAFETY)",
    );
  });

  it("should throw on an error status", async () => {
    mockFetch.mockResolvedValue(jsonResponse(500, "oops"));

    await expect(askGemini(CONFIG, "anything")).rejects.toThrow("Gemini API 500: oops");
  });
});
