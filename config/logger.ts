import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";

export const logger = pino({
  name: "surfer-relay",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          singleLine: true,
        },
      }
    : undefined,
  level: process.env.LOG_LEVEL ?? "info",
  redact: ["token", "apiKey", "*.token", "*.apiKey"],
});
