/**
 * Startup sequence
 * Config first, then the health server and the polling loop
 */

import { loadBotConfig, ConfigError } from "./config.js";
import { createGeminiClient } from "./ai.js";
import { createBot, LAUNCH_OPTIONS } from "./app.js";
import { startHealthServer } from "../health/server.js";
import { createLogger, errorMessage } from "./logger.js";

const log = createLogger("bot");

type Env = Record<string, string | undefined>;

export async function main(env: Env = process.env): Promise<void> {
  log.info("Starting Telegram Bot with Gemini AI...");

  const config = loadBotConfig(env);

  const ai = createGeminiClient({
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
  });
  log.info("Bot initialized with Gemini AI");

  // Independent of the bot loop
  startHealthServer(config.healthPort);

  const bot = createBot(config.token, ai);

  // Enable graceful stop
  process.once("SIGINT", () => bot.stop("SIGINT"));
  process.once("SIGTERM", () => bot.stop("SIGTERM"));

  log.info("Bot is running! Press Ctrl+C to stop.");
  await bot.launch(LAUNCH_OPTIONS);
}

/**
 * Run the bot; any startup failure exits with code 1
 */
export async function run(
  env: Env = process.env,
  exit: (code: number) => void = (code) => process.exit(code)
): Promise<void> {
  try {
    await main(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
    } else {
      log.error(`Failed to start bot: ${errorMessage(err)}`);
    }
    exit(1);
  }
}
