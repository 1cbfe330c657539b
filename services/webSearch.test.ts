import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { searchWeb } from "./webSearch.js";

const CONFIG = { apiKey: "test-key", searchEngineId: "test-cx", timeoutMs: 1000 };

describe("searchWeb", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return up to three linked results with tidy snippets", async () => {
    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({
        items: [
          { title: "No link" },
          { title: "Fox", link: "https://example.com/fox", snippet: "red\n  fox" },
          { link: "https://example.com/untitled" },
          { title: "Den", link: "https://example.com/den", snippet: "burrow" },
          { title: "Extra", link: "https://example.com/extra", snippet: "dropped" },
        ],
      }),
    });

    expect(await searchWeb(CONFIG, "red fox")).toEqual([
      { title: "Fox", link: "https://example.com/fox", snippet: "red fox" },
      { title: "https://example.com/untitled", link: "https://example.com/untitled", snippet: "" },
      { title: "Den", link: "https://example.com/den", snippet: "burrow" },
    ]);
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://www.googleapis.com/customsearch/v1?key=test-key&cx=test-cx&q=red+fox&num=3",
    );
  });

  it("should throw on an error status", async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 429, text: async () => "quota" });

    await expect(searchWeb(CONFIG, "red fox")).rejects.toThrow("Custom Search API 429: quota");
  });
});
