/**
 * Telegram Bot with Gemini AI
 * Entry point - loads .env and runs the bot
 */

import "dotenv/config";
import { run } from "./bootstrap.js";

await run();
