/**
 * Console logger
 * Emits "<time> - <name> - <LEVEL> - <message>" lines
 */

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatLogLine(
  name: string,
  level: LogLevel,
  message: string,
  now: Date = new Date()
): string {
  return `${now.toISOString()} - ${name} - ${level} - ${message}`;
}

/**
 * Create a named logger writing to the console
 */
export function createLogger(name: string): Logger {
  return {
    info: (message) => console.log(formatLogLine(name, "INFO", message)),
    warn: (message) => console.warn(formatLogLine(name, "WARN", message)),
    error: (message) => console.error(formatLogLine(name, "ERROR", message)),
  };
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
