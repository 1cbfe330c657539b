import { ConfigError, readOptionalEnv } from "./env.js";

export interface TelegramConfig {
  readonly token: string;
}

export interface GeminiConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
}

export interface VertexImageConfig {
  readonly projectId: string;
  readonly location: string;
  readonly apiKey: string;
  readonly timeoutMs: number;
}

export interface WebSearchConfig {
  readonly apiKey: string;
  readonly searchEngineId: string;
  readonly timeoutMs: number;
}

/** External collaborators; any of them may be missing, in which case the command replies that it is unavailable. */
export interface ServicesConfig {
  readonly telegram: TelegramConfig;
  readonly gemini?: GeminiConfig;
  readonly vertex?: VertexImageConfig;
  readonly webSearch?: WebSearchConfig;
}

export function loadServicesConfig(): ServicesConfig {
  const token = readOptionalEnv("TELEGRAM_BOT_TOKEN");
  if (!token) {
    throw new ConfigError("TELEGRAM_BOT_TOKEN is required");
  }

  const geminiKey = readOptionalEnv("GEMINI_API_KEY");
  const vertexProject = readOptionalEnv("VERTEX_PROJECT_ID");
  const googleKey = readOptionalEnv("GOOGLE_API_KEY");
  const searchEngineId = readOptionalEnv("SEARCH_ENGINE_ID");

  return {
    telegram: { token },
    gemini: geminiKey
      ? {
          apiKey: geminiKey,
          model: readOptionalEnv("GEMINI_MODEL") ?? "gemini-1.5-flash",
          timeoutMs: 60_000,
        }
      : undefined,
    vertex:
      geminiKey && vertexProject
        ? {
            projectId: vertexProject,
            location: readOptionalEnv("VERTEX_LOCATION") ?? "us-central1",
            apiKey: geminiKey,
            timeoutMs: 120_000,
          }
        : undefined,
    webSearch:
      googleKey && searchEngineId
        ? { apiKey: googleKey, searchEngineId, timeoutMs: 15_000 }
        : undefined,
  };
}
