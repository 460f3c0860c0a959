/**
 * Dispatch error handler
 * Logs failures that escape a handler; never replies, never rethrows
 */

import { createLogger, errorMessage } from "../logger.js";

const log = createLogger("dispatch");

function describeUpdate(update: unknown): string {
  try {
    return JSON.stringify(update) ?? String(update);
  } catch {
    return String(update);
  }
}

export function handleDispatchError(error: unknown, update: unknown): void {
  log.error(`Update ${describeUpdate(update)} caused error ${errorMessage(error)}`);
}
