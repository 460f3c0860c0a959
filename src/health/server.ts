/**
 * Health responder
 * GET /* → 200 "Telegram Bot is running!" for uptime checks
 */

import { createServer, type Server } from "node:http";
import { createLogger, errorMessage } from "../bot/logger.js";

export const HEALTH_BODY = "Telegram Bot is running!";

const log = createLogger("health");

/**
 * Create the health HTTP server (not listening)
 */
export function createHealthServer(): Server {
  return createServer((req, res) => {
    if (req.method !== "GET") {
      res.writeHead(501, { "Content-Type": "text/plain" });
      res.end("Unsupported method");
      return;
    }

    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(HEALTH_BODY);
  });
}

/**
 * Start the health server on all interfaces.
 * A bind failure is logged and stays confined to this server.
 */
export function startHealthServer(port: number, host = "0.0.0.0"): Server {
  const server = createHealthServer();

  server.on("error", (err) => {
    log.error(`Health server failed: ${errorMessage(err)}`);
  });

  server.listen(port, host, () => {
    const address = server.address();
    const boundPort = address && typeof address === "object" ? address.port : port;
    log.info(`Health server running on port ${boundPort}`);
  });

  // Never keeps the process alive on its own
  server.unref();

  return server;
}
