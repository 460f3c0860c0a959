/**
 * Telegram bot configuration
 */

export const DEFAULT_HEALTH_PORT = 10000;
export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";

/**
 * Bot configuration from environment
 */
export interface BotConfig {
  token: string;
  geminiApiKey: string;
  /** Gemini model identifier */
  geminiModel: string;
  /** Port of the health responder */
  healthPort: number;
}

/**
 * Missing or invalid startup configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`${name} not found in environment variables`);
  }
  return value;
}

function parsePort(raw: string | undefined): number {
  if (!raw) return DEFAULT_HEALTH_PORT;

  const port = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(port) || port > 65535) {
    throw new ConfigError(`PORT must be a valid port number, got "${raw}"`);
  }
  return port;
}

/**
 * Load bot configuration from environment variables
 */
export function loadBotConfig(env: Env = process.env): BotConfig {
  const token = requireEnv(env, "TELEGRAM_BOT_TOKEN");
  const geminiApiKey = requireEnv(env, "GEMINI_API_KEY");

  return {
    token,
    geminiApiKey,
    geminiModel: env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    healthPort: parsePort(env.PORT),
  };
}
