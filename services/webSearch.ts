import type { WebSearchConfig } from "../config/services.js";
import { logger } from "../config/logger.js";

const CUSTOM_SEARCH_URL = "https://www.googleapis.com/customsearch/v1";
const MAX_RESULTS = 3;

export interface SearchResult {
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
}

interface CustomSearchResponse {
  readonly items?: ReadonlyArray<{
    readonly title?: string;
    readonly link?: string;
    readonly snippet?: string;
  }>;
}

export async function searchWeb(config: WebSearchConfig, query: string): Promise<readonly SearchResult[]> {
  const params = new URLSearchParams({
    key: config.apiKey,
    cx: config.searchEngineId,
    q: query,
    num: String(MAX_RESULTS),
  });

  const response = await fetch(`${CUSTOM_SEARCH_URL}?${params.toString()}`, {
    signal: AbortSignal.timeout(config.timeoutMs),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`Custom Search API ${response.status}: ${body}`);
  }

  const data = (await response.json()) as CustomSearchResponse;
  const results = (data.items ?? [])
    .filter((item) => item.link)
    .slice(0, MAX_RESULTS)
    .map((item) => ({
      title: item.title ?? item.link ?? "",
      link: item.link ?? "",
      snippet: item.snippet?.replace(/\s+/g, " ").trim() ?? "",
    }));

  logger.info({ results: results.length }, "Web search completed");
  return results;
}
