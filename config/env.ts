export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const INTEGER_PATTERN = /^\d+$/;

/**
 * Reads a non-negative integer from the environment.
 * Unset or blank variables yield the fallback; anything else that is not a
 * plain decimal integer is a configuration error.
 */
export function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;

  if (!INTEGER_PATTERN.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }

  return Number(raw);
}

export function readOptionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function loadEnvFile(envPath: string): boolean {
  try {
    process.loadEnvFile(envPath);
    return true;
  } catch {
    // .env may not exist in production environments
    return false;
  }
}
