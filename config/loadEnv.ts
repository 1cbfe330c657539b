import path from "node:path";
import { loadEnvFile } from "./env.js";

// Imported ahead of the logger so LOG_LEVEL and NODE_ENV from .env apply to it.
export const envLoaded = loadEnvFile(path.resolve(process.cwd(), ".env"));
