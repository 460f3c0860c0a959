/**
 * Start handler - /start command
 */

import type { ConversationHandler, OutboundReply } from "../types.js";
import { formatWelcome } from "../formatters/telegram.js";
import { createLogger } from "../logger.js";

const log = createLogger("start");

export const startHandler: ConversationHandler = {
  async handle(event, transport) {
    const reply: OutboundReply = { chatId: event.chatId, text: formatWelcome() };
    await transport.sendReply(reply);
    log.info(`Started conversation with user ${event.senderName}`);
    return reply;
  },
};
